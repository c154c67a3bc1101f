import { z } from 'zod';
import type { LogLevel } from './types.js';

/**
 * Environment variables understood by the CLI tools.
 * The binaries call dotenv.config() before reading them, so a .env file works too.
 */
const EnvSchema = z.object({
  POT_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
  POT_OUTPUT_DIR: z.string().min(1).optional(),
});

export interface EnvConfig {
  logLevel: LogLevel;
  outputDir?: string;
}

/**
 * Custom error for invalid environment configuration
 */
export class EnvConfigError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'EnvConfigError';
  }

  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}

/**
 * Read and validate tool settings from the environment
 *
 * @param env - Environment to read, defaults to process.env
 * @throws EnvConfigError if a variable has an invalid value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    throw new EnvConfigError('Invalid environment configuration', result.error);
  }

  return {
    logLevel: result.data.POT_LOG_LEVEL,
    outputDir: result.data.POT_OUTPUT_DIR,
  };
}
