/**
 * Configuration loading with defaults.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';

export const DEFAULT_CONFIG_PATH = '.layersmith.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicitly
 * named file that is missing is an error.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath)) && configPath === undefined) {
    return getDefaultConfig();
  }

  return loadYamlWithSchema(fullPath, ConfigSchema);
}
