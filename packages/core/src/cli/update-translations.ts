import { access } from 'fs/promises';
import { basename } from 'path';
import { updateTranslations } from '../translations/updater.js';
import { ConfigLoadError, ConfigParseError } from '../config/schema.js';
import { CONFIG_FAILURE_MESSAGE } from './config-to-pot.js';
import {
  isHelpFlag,
  positionalArgs,
  rejectArgs,
  resolveCliContext,
  unrecognizedArgs,
} from './common.js';
import type { CliContext } from './common.js';

export const UPDATE_TRANSLATIONS_USAGE = 'usage: update-translations [-h] [config_path]';
export const DEFAULT_CONFIG_PATH = 'config.yaml';

/**
 * update-translations entry point
 *
 * @param args - Arguments after the executable name
 * @returns Process exit code
 */
export async function runUpdateTranslations(
  args: string[],
  context: CliContext = {}
): Promise<number> {
  const resolved = resolveCliContext(context);
  if (!resolved) return 1;

  const { output, logger, env } = resolved;

  if (args.some(isHelpFlag)) {
    output.print(UPDATE_TRANSLATIONS_USAGE);
    return 0;
  }

  const rejected = unrecognizedArgs(args, 1);
  if (rejected.length > 0) {
    return rejectArgs(output, UPDATE_TRANSLATIONS_USAGE, 'update-translations', rejected);
  }

  const configPath = positionalArgs(args)[0] ?? DEFAULT_CONFIG_PATH;

  try {
    await access(configPath);
  } catch {
    output.print(`Run this script from the folder that contains ${basename(configPath)}`);
    return 1;
  }

  output.print(`Updating os-installer translations for ${configPath}`);

  try {
    await updateTranslations(configPath, {
      logger,
      advisorySink: (message) => output.print(message),
      outputDir: env.outputDir,
      progress: {
        templateWritten: (potPath) => output.print(`Updating .po files from ${potPath}`),
        catalogMerged: (poPath) => output.print(`  ${poPath}`),
        compileStarted: () => output.print('Generating .mo files'),
        binaryCompiled: (moPath) => output.print(`  ${moPath}`),
      },
    });

    return 0;
  } catch (error) {
    if (error instanceof ConfigLoadError || error instanceof ConfigParseError) {
      logger.debug('Extraction failed', { error: error.message });
      output.print(CONFIG_FAILURE_MESSAGE);
      return 1;
    }

    output.print(
      `Could not update translations: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return 1;
  }
}
