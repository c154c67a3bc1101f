/**
 * Translation System - catalog merging and .mo compilation
 */

export {
  CatalogMergeError,
  parseCatalog,
  mergeCatalog,
  countTranslations,
  compileCatalog,
  templateOrder,
  compileBinaryCatalog,
} from './merger.js';

export { updateTranslations, languageFromPoFile, DEFAULT_MO_FILE_NAME } from './updater.js';
