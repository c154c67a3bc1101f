/**
 * Installer config translation tools
 *
 * Extracts the translatable strings of an os-installer config.yaml into a
 * gettext template and keeps the per-language catalogs in sync with it.
 */

export { extractConfigToPot, resolvePoDir, POT_FILE_NAME } from './extract.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export { loadEnvConfig, EnvConfigError, type EnvConfig } from './env.js';
export { runConfigToPot } from './cli/config-to-pot.js';
export { runUpdateTranslations } from './cli/update-translations.js';

export type {
  Logger,
  LogLevel,
  AdvisorySink,
  ExtractOptions,
  PotExtractionResult,
  UpdateTranslationsOptions,
  UpdateTranslationsResult,
  CatalogUpdate,
} from './types.js';

// Export config system
export * from './config/index.js';

// Export template system
export * from './pot/index.js';

// Export translation system
export * from './translations/index.js';
