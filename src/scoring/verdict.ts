import { DEFAULT_ENGINE_CONFIG, type Thresholds } from '../schemas/config-schemas';
import type { ClaimPriority } from '../claims/types';
import { roundConfidence } from './matcher';
import { ClaimStatus, type ClaimStatusName } from './types';

const NEEDS_REVIEW_CREDIT = 0.6;

/**
 * Maps a confidence onto the fact-check bands.
 */
export function classifyConfidence(
  confidence: number,
  thresholds: Thresholds = DEFAULT_ENGINE_CONFIG.thresholds
): ClaimStatusName {
  if (confidence >= thresholds.verified) return ClaimStatus.VERIFIED;
  if (confidence >= thresholds.needsReview) return ClaimStatus.NEEDS_REVIEW;
  return ClaimStatus.UNSUPPORTED;
}

// Priority 1 weighs 3, priority 3 weighs 1
export function priorityWeight(priority: ClaimPriority): number {
  return 4 - priority;
}

export interface ScoredClaim {
  priority: ClaimPriority;
  status: ClaimStatusName;
  confidence: number;
}

/**
 * Priority-weighted mean credit over all claims. Verified claims earn their
 * confidence, needs-review claims 60% of it, unsupported claims nothing.
 * An empty list scores 1: there is nothing inaccurate to report.
 */
export function calculateAccuracyScore(claims: ScoredClaim[]): number {
  if (claims.length === 0) return 1;

  let weighted = 0;
  let totalWeight = 0;
  for (const claim of claims) {
    const weight = priorityWeight(claim.priority);
    let credit = 0;
    if (claim.status === ClaimStatus.VERIFIED) credit = claim.confidence;
    else if (claim.status === ClaimStatus.NEEDS_REVIEW) credit = claim.confidence * NEEDS_REVIEW_CREDIT;
    weighted += credit * weight;
    totalWeight += weight;
  }

  return roundConfidence(Math.min(1, weighted / totalWeight));
}
