import { createConsoleLogger } from '../logger.js';
import { EnvConfigError, loadEnvConfig } from '../env.js';
import type { EnvConfig } from '../env.js';
import type { Logger } from '../types.js';

/**
 * Where CLI messages are printed, stdout by default
 */
export interface CliOutput {
  print(line: string): void;
}

export const consoleOutput: CliOutput = {
  print: (line) => console.log(line),
};

export interface CliContext {
  output?: CliOutput;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export interface ResolvedCliContext {
  output: CliOutput;
  logger: Logger;
  env: EnvConfig;
}

/**
 * Fill in CLI defaults from the environment
 *
 * @returns the context, or undefined after printing why the environment is invalid
 */
export function resolveCliContext(context: CliContext): ResolvedCliContext | undefined {
  const output = context.output ?? consoleOutput;

  try {
    const env = loadEnvConfig(context.env ?? process.env);
    const logger = context.logger ?? createConsoleLogger(env.logLevel);
    return { output, logger, env };
  } catch (error) {
    if (error instanceof EnvConfigError) {
      output.print(`${error.message}:\n${error.getDetails()}`);
      return undefined;
    }
    throw error;
  }
}

export function isHelpFlag(arg: string): boolean {
  return arg === '-h' || arg === '--help';
}

/**
 * Positional arguments, flags removed
 */
export function positionalArgs(args: string[]): string[] {
  return args.filter((arg) => !arg.startsWith('-'));
}

/**
 * Unknown flags, and positionals past the first `maxPositionals`
 */
export function unrecognizedArgs(args: string[], maxPositionals: number): string[] {
  const flags = args.filter((arg) => arg.startsWith('-') && !isHelpFlag(arg));
  return [...flags, ...positionalArgs(args).slice(maxPositionals)];
}

/**
 * Print usage plus the rejected arguments
 *
 * @returns Process exit code
 */
export function rejectArgs(
  output: CliOutput,
  usage: string,
  program: string,
  rejected: string[]
): number {
  output.print(usage);
  output.print(`${program}: error: unrecognized arguments: ${rejected.join(' ')}`);
  return 1;
}
