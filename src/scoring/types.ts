import type { EvidenceItem } from '../evidence/types';

export const ClaimStatus = {
    VERIFIED: 'verified',
    NEEDS_REVIEW: 'needs_review',
    UNSUPPORTED: 'unsupported',
} as const;

export type ClaimStatusName = typeof ClaimStatus[keyof typeof ClaimStatus];

/**
 * Component scores, each in [0, 1] before weighting.
 */
export interface SubScores {
    textSimilarity: number;
    numberOverlap: number;
    keywordOverlap: number;
    typeMatch: number;
}

export interface MatchResult {
    claimId: number;
    evidence: EvidenceItem;
    confidence: number; // [0, 1], three decimals
    scores: SubScores;
}
