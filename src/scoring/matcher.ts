import { token_set_ratio } from 'fuzzball';
import { DEFAULT_ENGINE_CONFIG, type ScoringWeights } from '../schemas/config-schemas';
import { numericValue } from '../claims/tokens';
import { ClaimType, type Claim, type ClaimTypeName } from '../claims/types';
import { EvidenceType, type EvidenceItem, type EvidenceTypeName } from '../evidence/types';
import type { MatchResult, SubScores } from './types';

const EXACT_NUMBER_SCORE = 1.0;
const CLOSE_NUMBER_SCORE = 0.7;
const SMALL_VALUE_LIMIT = 10;
const SMALL_VALUE_TOLERANCE = 1;
const RELATIVE_TOLERANCE = 0.1;

/*
 * Which evidence type supports each claim type. Numeric shapes are all
 * statistics even though the claim rules name them more precisely.
 */
const EVIDENCE_AFFINITY: Record<ClaimTypeName, EvidenceTypeName> = {
  [ClaimType.STATISTIC]: EvidenceType.STATISTIC,
  [ClaimType.FINANCIAL]: EvidenceType.STATISTIC,
  [ClaimType.GROWTH]: EvidenceType.STATISTIC,
  [ClaimType.MARKET]: EvidenceType.STATISTIC,
  [ClaimType.TEMPORAL]: EvidenceType.STATISTIC,
  [ClaimType.QUANTITATIVE]: EvidenceType.STATISTIC,
  [ClaimType.COMPARATIVE]: EvidenceType.STATISTIC,
  [ClaimType.RESEARCH]: EvidenceType.RESEARCH_FINDING,
  [ClaimType.ATTRIBUTION]: EvidenceType.EXPERT_OPINION,
};

export function roundConfidence(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Token-set similarity of the two texts, lower-cased, in [0, 1].
 */
export function textSimilarity(a: string, b: string): number {
  if (!a.trim() || !b.trim()) return 0;
  return token_set_ratio(a.toLowerCase(), b.toLowerCase()) / 100;
}

/**
 * Close means within 1 for values up to 10, otherwise within 10% of the larger value.
 */
export function isCloseNumber(a: number, b: number): boolean {
  const larger = Math.max(Math.abs(a), Math.abs(b));
  if (larger <= SMALL_VALUE_LIMIT) {
    return Math.abs(a - b) <= SMALL_VALUE_TOLERANCE;
  }
  return Math.abs(a - b) / larger <= RELATIVE_TOLERANCE;
}

/*
 * Score of one claim number against the evidence numbers: exact beats close,
 * wherever they appear in the list.
 */
function scoreNumber(claimNumber: string, evidenceValues: number[]): number {
  const value = numericValue(claimNumber);
  if (value === null) return 0;
  if (evidenceValues.some((v) => v === value)) return EXACT_NUMBER_SCORE;
  if (evidenceValues.some((v) => isCloseNumber(value, v))) return CLOSE_NUMBER_SCORE;
  return 0;
}

function numericValues(tokens: string[]): number[] {
  return tokens.map(numericValue).filter((v): v is number => v !== null);
}

/**
 * Mean per-claim-number score. 0 when either side has no numbers.
 */
export function numberOverlap(claimNumbers: string[], evidenceNumbers: string[]): number {
  if (claimNumbers.length === 0 || evidenceNumbers.length === 0) return 0;
  const evidenceValues = numericValues(evidenceNumbers);
  const total = claimNumbers.reduce((sum, n) => sum + scoreNumber(n, evidenceValues), 0);
  return total / claimNumbers.length;
}

/**
 * Claim numbers that have an exact or close counterpart in the evidence.
 */
export function matchingNumbers(claimNumbers: string[], evidenceNumbers: string[]): string[] {
  const evidenceValues = numericValues(evidenceNumbers);
  return claimNumbers.filter((n) => scoreNumber(n, evidenceValues) > 0);
}

export function matchingKeywords(claimKeywords: string[], evidenceKeywords: string[]): string[] {
  const evidence = new Set(evidenceKeywords);
  return claimKeywords.filter((k) => evidence.has(k));
}

/**
 * Share of the claim's keywords found in the evidence. 0 when the claim has none.
 */
export function keywordOverlap(claimKeywords: string[], evidenceKeywords: string[]): number {
  const claimSet = new Set(claimKeywords);
  if (claimSet.size === 0) return 0;
  return matchingKeywords(Array.from(claimSet), evidenceKeywords).length / claimSet.size;
}

export function typeMatches(claimType: ClaimTypeName, evidenceType: EvidenceTypeName): boolean {
  return EVIDENCE_AFFINITY[claimType] === evidenceType;
}

export function computeSubScores(claim: Claim, evidence: EvidenceItem): SubScores {
  return {
    textSimilarity: textSimilarity(claim.text, evidence.text),
    numberOverlap: numberOverlap(claim.numbers, evidence.numbers),
    keywordOverlap: keywordOverlap(claim.keywords, evidence.keywords),
    typeMatch: typeMatches(claim.type, evidence.type) ? 1 : 0,
  };
}

/**
 * Weighted sum of the sub-scores, capped at 1 and rounded to three decimals.
 */
export function combineScores(scores: SubScores, weights: ScoringWeights): number {
  const raw =
    scores.textSimilarity * weights.textSimilarity +
    scores.numberOverlap * weights.numberOverlap +
    scores.keywordOverlap * weights.keywordOverlap +
    scores.typeMatch * weights.typeMatch;
  return roundConfidence(Math.min(1, Math.max(0, raw)));
}

export function evaluateMatch(
  claim: Claim,
  evidence: EvidenceItem,
  weights: ScoringWeights = DEFAULT_ENGINE_CONFIG.weights
): MatchResult {
  const scores = computeSubScores(claim, evidence);
  return {
    claimId: claim.id,
    evidence,
    confidence: combineScores(scores, weights),
    scores,
  };
}

/**
 * Confidence that the evidence supports the claim, in [0, 1].
 */
export function score(
  claim: Claim,
  evidence: EvidenceItem,
  weights: ScoringWeights = DEFAULT_ENGINE_CONFIG.weights
): number {
  return evaluateMatch(claim, evidence, weights).confidence;
}

export interface BestMatchOptions {
  weights?: ScoringWeights;
  // Best matches scoring below this are discarded
  floor?: number;
}

/**
 * Highest-scoring evidence item for the claim. Ties keep the item inserted
 * first. Returns null for an empty pool, a zero best score, or a best score
 * under the floor.
 */
export function bestMatch(
  claim: Claim,
  pool: EvidenceItem[],
  options: BestMatchOptions = {}
): MatchResult | null {
  const weights = options.weights ?? DEFAULT_ENGINE_CONFIG.weights;
  const floor = options.floor ?? 0;

  let best: MatchResult | null = null;
  for (const evidence of pool) {
    const result = evaluateMatch(claim, evidence, weights);
    if (!best || result.confidence > best.confidence) {
      best = result;
    }
  }

  if (!best || best.confidence === 0 || best.confidence < floor) return null;
  return best;
}
