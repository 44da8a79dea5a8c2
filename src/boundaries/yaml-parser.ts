import * as YAML from 'yaml';
import { z } from 'zod';
import { ENGINE_CONFIG_SCHEMA, type EngineConfig } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { formatZodIssues } from './format-issues';

export function validateEngineConfig(raw: unknown): EngineConfig {
  try {
    return ENGINE_CONFIG_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid configuration: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }
}

export function parseEngineConfigYaml(yamlContent: string): EngineConfig {
  let raw: unknown;

  try {
    // An empty document parses to null
    raw = YAML.parse(yamlContent) ?? {};
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'YAML parsing');
    throw new ConfigError(`Failed to parse YAML: ${err.message}`);
  }

  return validateEngineConfig(raw);
}
