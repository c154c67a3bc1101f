import { readFile } from 'fs/promises';
import { parseInstallerConfig } from './parser.js';
import { ConfigLoadError } from './schema.js';
import type { InstallerConfig } from './schema.js';
import type { Logger } from '../types.js';

/**
 * Config Loader - Loads installer configs from filesystem
 */
export class ConfigLoader {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Load a config file
   *
   * The whole file is read before parsing starts.
   *
   * @param filePath - Path to config YAML file
   * @returns Parsed config
   * @throws ConfigLoadError if the file cannot be read
   * @throws ConfigParseError if the content is not a valid config
   */
  async loadConfig(filePath: string): Promise<InstallerConfig> {
    let content: string;

    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      this.logger?.debug(`Failed to read config from ${filePath}`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      throw new ConfigLoadError(`Failed to read config from ${filePath}`, { cause: error });
    }

    try {
      const config = parseInstallerConfig(content);

      this.logger?.debug(`Loaded config from ${filePath}`);

      return config;
    } catch (error) {
      this.logger?.debug(`Failed to parse config from ${filePath}`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      throw error;
    }
  }
}
