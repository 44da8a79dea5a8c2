/**
 * Library entry point. The CLI in `index.ts` is a thin shell over these
 * functions; nothing here reads files or the environment.
 */
export { extractClaims, isValidClaim, type ExtractOptions } from './claims/extractor';
export { CLAIM_RULES, findRule, ruleMatches, splitFragments, type Fragment } from './claims/patterns';
export { deriveTokens, extractDates, extractKeywords, extractNumbers, numericValue } from './claims/tokens';
export { computeLineCol, sectionAt, type Location } from './claims/location';
export * from './claims/types';

export { indexEvidence, normalizeResearchData, type IndexOptions } from './evidence/indexer';
export * from './evidence/types';
export type { ResearchData, ResearchResult } from './schemas/research-schemas';

export * from './scoring/index';

export { addCitations, type CitationOptions } from './citations/citation-renderer';
export { formatCitation, isCitationStyle } from './citations/styles';
export * from './citations/types';

export { verifyFacts, type VerifyOptions } from './verification/fact-check-reporter';
export { generateRecommendations } from './verification/recommendations';
export * from './verification/types';

export {
  DEFAULT_ENGINE_CONFIG,
  ENGINE_CONFIG_SCHEMA,
  type EngineConfig,
  type EngineConfigInput,
  type ExtractionSettings,
  type LengthBounds,
  type ScoringWeights,
  type Thresholds,
} from './schemas/config-schemas';
export { validateEngineConfig } from './boundaries/yaml-parser';

export * from './errors/index';
