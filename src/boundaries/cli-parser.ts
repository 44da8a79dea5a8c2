import { z } from 'zod';
import {
  CITE_OPTIONS_SCHEMA,
  VERIFY_OPTIONS_SCHEMA,
  type CiteOptions,
  type VerifyOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';
import { formatZodIssues } from './format-issues';

export function parseCiteOptions(raw: unknown): CiteOptions {
  try {
    return CITE_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid cite options: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'Cite option parsing');
    throw new ValidationError(`Cite option parsing failed: ${err.message}`);
  }
}

export function parseVerifyOptions(raw: unknown): VerifyOptions {
  try {
    return VERIFY_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid verify options: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'Verify option parsing');
    throw new ValidationError(`Verify option parsing failed: ${err.message}`);
  }
}
