import { z } from 'zod';

const WEIGHT_SUM_TOLERANCE = 1e-6;

const UNIT_INTERVAL = z.number().min(0).max(1);

// Confidence formula weights. Policy values, not mechanism.
export const SCORING_WEIGHTS_SCHEMA = z
  .object({
    textSimilarity: UNIT_INTERVAL.default(0.3),
    numberOverlap: UNIT_INTERVAL.default(0.35),
    keywordOverlap: UNIT_INTERVAL.default(0.25),
    typeMatch: UNIT_INTERVAL.default(0.1),
  })
  .refine(
    (w) =>
      Math.abs(w.textSimilarity + w.numberOverlap + w.keywordOverlap + w.typeMatch - 1) <
      WEIGHT_SUM_TOLERANCE,
    { message: 'Scoring weights must sum to 1.0' }
  );

export const THRESHOLDS_SCHEMA = z
  .object({
    verified: UNIT_INTERVAL.default(0.7),
    needsReview: UNIT_INTERVAL.default(0.4),
    // Best matches below this are treated as "no source found" when citing
    citationMatchFloor: UNIT_INTERVAL.default(0.3),
    // A matched claim is cited only when its confidence exceeds this
    citationConfidence: UNIT_INTERVAL.default(0.3),
  })
  .refine((t) => t.needsReview <= t.verified, {
    message: 'needsReview threshold must not exceed the verified threshold',
  });

const LENGTH_BOUNDS_SCHEMA = z
  .object({
    minLength: z.number().int().nonnegative(),
    maxLength: z.number().int().positive(),
  })
  .refine((b) => b.minLength <= b.maxLength, {
    message: 'minLength must not exceed maxLength',
  });

export const EXTRACTION_SCHEMA = z.object({
  factCheck: LENGTH_BOUNDS_SCHEMA.default({ minLength: 10, maxLength: 200 }),
  citation: LENGTH_BOUNDS_SCHEMA.default({ minLength: 21, maxLength: 1000 }),
  minWords: z.number().int().nonnegative().default(3),
  dedupWindow: z.number().int().nonnegative().default(10),
  maxKeywords: z.number().int().positive().default(10),
});

export const REPORT_SCHEMA = z.object({
  excerptLength: z.number().int().positive().default(200),
});

// Engine configuration, loaded from .claimcite.yaml
export const ENGINE_CONFIG_SCHEMA = z.object({
  weights: SCORING_WEIGHTS_SCHEMA.default({}),
  thresholds: THRESHOLDS_SCHEMA.default({}),
  extraction: EXTRACTION_SCHEMA.default({}),
  report: REPORT_SCHEMA.default({}),
});

// Inferred types
export type EngineConfig = z.infer<typeof ENGINE_CONFIG_SCHEMA>;
export type EngineConfigInput = z.input<typeof ENGINE_CONFIG_SCHEMA>;
export type ScoringWeights = z.infer<typeof SCORING_WEIGHTS_SCHEMA>;
export type Thresholds = z.infer<typeof THRESHOLDS_SCHEMA>;
export type ExtractionSettings = z.infer<typeof EXTRACTION_SCHEMA>;
export type LengthBounds = z.infer<typeof LENGTH_BOUNDS_SCHEMA>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = ENGINE_CONFIG_SCHEMA.parse({});
