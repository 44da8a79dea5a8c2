import { z } from 'zod';

// Environment overrides for the engine configuration
export const ENV_SCHEMA = z.object({
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  MIN_CLAIM_LENGTH: z.coerce.number().int().nonnegative().optional(),
  MAX_CLAIM_LENGTH: z.coerce.number().int().positive().optional(),
});

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
