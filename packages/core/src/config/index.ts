/**
 * Config System - installer config parsing, validation and loading
 */

export {
  InstallerConfigSchema,
  ConfigParseError,
  ConfigLoadError,
  type InstallerConfig,
  type WelcomePage,
  type DesktopEntry,
  type ChoiceEntry,
  type OptionEntry,
} from './schema.js';

export { parseInstallerConfig, validateInstallerConfig } from './parser.js';

export { ConfigLoader } from './loader.js';
