import { extractConfigToPot } from '../extract.js';
import {
  isHelpFlag,
  positionalArgs,
  rejectArgs,
  resolveCliContext,
  unrecognizedArgs,
} from './common.js';
import type { CliContext } from './common.js';

export const CONFIG_TO_POT_USAGE = 'usage: config-to-pot [-h] config_path';
export const CONFIG_FAILURE_MESSAGE = 'Could not find or parse provided config';

const HELP_TEXT = [
  CONFIG_TO_POT_USAGE,
  '',
  'Create a .pot file for an os-installer config',
  '',
  'positional arguments:',
  '  config_path',
  '',
  'options:',
  '  -h, --help   show this help message and exit',
].join('\n');

/**
 * config-to-pot entry point
 *
 * @param args - Arguments after the executable name
 * @returns Process exit code
 */
export async function runConfigToPot(args: string[], context: CliContext = {}): Promise<number> {
  const resolved = resolveCliContext(context);
  if (!resolved) return 1;

  const { output, logger, env } = resolved;

  if (args.some(isHelpFlag)) {
    output.print(HELP_TEXT);
    return 0;
  }

  const rejected = unrecognizedArgs(args, 1);
  if (rejected.length > 0) {
    return rejectArgs(output, CONFIG_TO_POT_USAGE, 'config-to-pot', rejected);
  }

  const [configPath] = positionalArgs(args);
  if (!configPath) {
    output.print(CONFIG_TO_POT_USAGE);
    return 1;
  }

  try {
    await extractConfigToPot(configPath, {
      logger,
      advisorySink: (message) => output.print(message),
      outputDir: env.outputDir,
    });
    return 0;
  } catch (error) {
    logger.debug('Extraction failed', {
      error: error instanceof Error ? error.message : 'Unknown',
    });
    output.print(CONFIG_FAILURE_MESSAGE);
    return 1;
  }
}
