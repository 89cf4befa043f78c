import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { DEFAULT_CONFIG_PATH } from './config-defaults.js';
import { type Config, resolveConfig, validateConfigSafe } from './config-schema.js';

/**
 * Load configuration from a YAML file and fill in defaults.
 *
 * The default path is optional: when it does not exist, built-in defaults are
 * used. A path the user named explicitly must exist.
 *
 * @throws ConfigError if the file is missing (explicit path), unparsable or invalid
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, explicit = false): Promise<Config> {
  const absolutePath = resolve(process.cwd(), configPath);

  if (!existsSync(absolutePath)) {
    if (explicit) {
      throw new ConfigError(`Configuration file not found: "${absolutePath}"`);
    }
    return resolveConfig();
  }

  const content = await readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML: ${errorMessage(error)}`);
  }

  // An empty file parses to undefined
  const result = validateConfigSafe(resolveEnvRecursive(rawConfig ?? {}));
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in "${absolutePath}": ${result.error}`);
  }

  return resolveConfig(result.data);
}
