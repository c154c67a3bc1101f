import { parse as parseYaml } from 'yaml';
import { InstallerConfigSchema, ConfigParseError } from './schema.js';
import type { InstallerConfig } from './schema.js';

/**
 * Parse YAML config content and check its container shapes
 *
 * @param yamlContent - Raw config.yaml content
 * @returns Validated InstallerConfig
 * @throws ConfigParseError if the YAML is malformed, empty or has the wrong shape
 *
 * @example
 * ```typescript
 * const config = parseInstallerConfig(await readFile('config.yaml', 'utf-8'));
 * console.log(config.welcome_page?.text);
 * ```
 */
export function parseInstallerConfig(yamlContent: string): InstallerConfig {
  let parsed: unknown;

  try {
    parsed = parseYaml(yamlContent);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigParseError(`Failed to parse YAML config: ${error.message}`, undefined, {
        cause: error,
      });
    }
    throw new ConfigParseError('Unknown error parsing config', undefined, { cause: error });
  }

  if (parsed === null || parsed === undefined) {
    throw new ConfigParseError('Config file is empty or contains only comments');
  }

  return validateInstallerConfig(parsed);
}

/**
 * Validate a config object (already parsed)
 *
 * @throws ConfigParseError if validation fails
 */
export function validateInstallerConfig(configObj: unknown): InstallerConfig {
  const result = InstallerConfigSchema.safeParse(configObj);

  if (!result.success) {
    throw new ConfigParseError('Config validation failed', result.error);
  }

  return result.data;
}
