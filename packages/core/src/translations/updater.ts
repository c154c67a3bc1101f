import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { extractConfigToPot, resolvePoDir } from '../extract.js';
import { POT_CREATION_DATE } from '../pot/writer.js';
import {
  compileBinaryCatalog,
  compileCatalog,
  countTranslations,
  mergeCatalog,
  parseCatalog,
} from './merger.js';
import type { GetTextTranslations } from 'gettext-parser';
import type { CatalogUpdate, UpdateTranslationsOptions, UpdateTranslationsResult } from '../types.js';

export const DEFAULT_MO_FILE_NAME = 'os-installer-config.mo';

/**
 * Language code of a catalog file: the name without `.po`, up to the first `_`
 *
 * @example
 * ```typescript
 * languageFromPoFile('pt_BR.po'); // 'pt'
 * ```
 */
export function languageFromPoFile(fileName: string): string {
  return basename(fileName, '.po').split('_')[0];
}

/**
 * Regenerate the template, merge it into every `po/*.po` catalog, then
 * compile each catalog to `po/<language>/LC_MESSAGES/<moFileName>`
 *
 * @param configPath - Path to the installer config.yaml
 * @throws ConfigLoadError / ConfigParseError if the config cannot be read or parsed
 * @throws CatalogMergeError if a catalog cannot be parsed
 */
export async function updateTranslations(
  configPath: string,
  options: UpdateTranslationsOptions = {}
): Promise<UpdateTranslationsResult> {
  const { logger, progress } = options;
  const moFileName = options.moFileName ?? DEFAULT_MO_FILE_NAME;

  const extraction = await extractConfigToPot(configPath, options);
  progress?.templateWritten?.(extraction.potPath);

  const poDir = resolvePoDir(configPath, options.outputDir);

  const poFiles = (await readdir(poDir)).filter((file) => extname(file) === '.po').sort();

  logger?.debug(`Found ${poFiles.length} catalogs in ${poDir}`);

  // Merge every catalog, then compile them
  const mergedCatalogs: Array<{ poFile: string; poPath: string; merged: GetTextTranslations }> = [];

  for (const poFile of poFiles) {
    const poPath = join(poDir, poFile);
    const catalog = parseCatalog(await readFile(poPath), poPath);
    const merged = mergeCatalog(catalog, extraction.entries, POT_CREATION_DATE);

    await writeFile(poPath, compileCatalog(merged, extraction.entries));
    progress?.catalogMerged?.(poPath);

    mergedCatalogs.push({ poFile, poPath, merged });
  }

  const catalogs: CatalogUpdate[] = [];
  progress?.compileStarted?.();

  for (const { poFile, poPath, merged } of mergedCatalogs) {
    const language = languageFromPoFile(poFile);
    const moDir = join(poDir, language, 'LC_MESSAGES');
    await mkdir(moDir, { recursive: true });

    const moPath = join(moDir, moFileName);
    await writeFile(moPath, compileBinaryCatalog(merged));
    progress?.binaryCompiled?.(moPath);

    const counts = countTranslations(merged);
    logger?.info(`Updated ${poPath}`, { language, ...counts });

    catalogs.push({ poPath, moPath, language, ...counts });
  }

  return { potPath: extraction.potPath, catalogs };
}
