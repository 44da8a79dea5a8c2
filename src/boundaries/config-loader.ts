import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../schemas/config-schemas';
import { ConfigError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';
import { debug } from '../output/logger';
import { parseEngineConfigYaml } from './yaml-parser';

/**
 * Load and validate the engine configuration.
 *
 * Without an explicit path a missing `.claimcite.yaml` in `cwd` means
 * defaults. An explicit path that does not exist is an error.
 */
export function loadEngineConfig(cwd: string = process.cwd(), configPath?: string): EngineConfig {
  const yamlPath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  if (!existsSync(yamlPath)) {
    if (configPath) {
      throw new ConfigError(`Missing configuration file at ${yamlPath}`);
    }
    debug(`No ${DEFAULT_CONFIG_FILENAME} found, using defaults`);
    return DEFAULT_ENGINE_CONFIG;
  }

  let raw: string;
  try {
    raw = readFileSync(yamlPath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`);
  }

  debug(`Loaded configuration from ${yamlPath}`);
  return parseEngineConfigYaml(raw);
}
