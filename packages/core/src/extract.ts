import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { ConfigLoader } from './config/loader.js';
import { PotWriter } from './pot/writer.js';
import { ConfigStringExtractor, consoleAdvisorySink } from './pot/extractor.js';
import type { ExtractOptions, PotExtractionResult } from './types.js';

export const POT_FILE_NAME = 'config.pot';

/**
 * Directory the template and catalogs live in: `po/` beside the config,
 * unless overridden
 */
export function resolvePoDir(configPath: string, outputDir?: string): string {
  return outputDir ?? join(dirname(configPath), 'po');
}

/**
 * Extract the translatable strings of a config into `po/config.pot`
 *
 * The config is fully read and parsed before anything is written.
 * The template is overwritten on every run.
 *
 * @param configPath - Path to the installer config.yaml
 * @returns Path of the written template and the entries it holds
 * @throws ConfigLoadError / ConfigParseError if the config cannot be read or parsed
 *
 * @example
 * ```typescript
 * const result = await extractConfigToPot('config.yaml');
 * console.log(`${result.entries.length} strings written to ${result.potPath}`);
 * ```
 */
export async function extractConfigToPot(
  configPath: string,
  options: ExtractOptions = {}
): Promise<PotExtractionResult> {
  const { logger } = options;
  const sink = options.advisorySink ?? consoleAdvisorySink;

  const config = await new ConfigLoader(logger).loadConfig(configPath);

  const poDir = resolvePoDir(configPath, options.outputDir);
  await mkdir(poDir, { recursive: true });

  const advisories: string[] = [];
  const writer = new PotWriter();
  const extractor = new ConfigStringExtractor(writer, (message) => {
    advisories.push(message);
    sink(message);
  });

  writer.writeHeader();
  extractor.handleConfig(config);

  const potPath = join(poDir, POT_FILE_NAME);
  await writeFile(potPath, writer.toString(), 'utf-8');

  logger?.info(`Wrote ${writer.getEntries().length} entries to ${potPath}`, {
    advisories: advisories.length,
  });

  return {
    potPath,
    entries: writer.getEntries(),
    advisories,
  };
}
