import type { Claim } from '../claims/types';
import type { EvidenceTypeName } from '../evidence/types';
import type { ClaimStatusName } from '../scoring/types';

export interface VerificationDetails {
  matchType: EvidenceTypeName | null;
  matchingNumbers: string[];
  matchingKeywords: string[];
}

export interface VerifiedClaim extends Claim {
  status: ClaimStatusName;
  confidence: number;
  supportingSource: string | null;
  supportingTextExcerpt: string | null;
  details: VerificationDetails;
}

export interface VerificationStatistics {
  totalClaims: number;
  verified: number;
  unsupported: number;
  needsReview: number;
}

export interface VerificationMetadata {
  processingTimeSeconds: number;
  claimsExtracted: number;
  confidenceThreshold: number;
  noResearchData?: boolean;
  error?: string;
}

export interface VerificationReport {
  verifiedClaims: VerifiedClaim[];
  statistics: VerificationStatistics;
  recommendations: string[];
  accuracyScore: number;
  metadata: VerificationMetadata;
}
