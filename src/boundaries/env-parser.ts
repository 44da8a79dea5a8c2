import { z } from 'zod';
import { ENV_SCHEMA, type EnvConfig } from '../schemas/env-schemas';
import type { EngineConfig } from '../schemas/config-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';
import { formatZodIssues } from './format-issues';
import { validateEngineConfig } from './yaml-parser';

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid environment variables: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`);
  }
}

/**
 * Environment variables win over the config file. The merged result is
 * validated again so an override cannot break the threshold ordering.
 */
export function applyEnvironmentOverrides(config: EngineConfig, env: EnvConfig): EngineConfig {
  const merged = {
    ...config,
    thresholds: {
      ...config.thresholds,
      ...(env.CONFIDENCE_THRESHOLD !== undefined && { verified: env.CONFIDENCE_THRESHOLD }),
    },
    extraction: {
      ...config.extraction,
      factCheck: {
        minLength: env.MIN_CLAIM_LENGTH ?? config.extraction.factCheck.minLength,
        maxLength: env.MAX_CLAIM_LENGTH ?? config.extraction.factCheck.maxLength,
      },
    },
  };
  return validateEngineConfig(merged);
}
