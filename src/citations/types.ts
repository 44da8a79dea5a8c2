import type { ClaimTypeName } from '../claims/types';

export const CitationStyle = {
  APA: 'apa',
  MLA: 'mla',
  CHICAGO: 'chicago',
} as const;

export type CitationStyleName = typeof CitationStyle[keyof typeof CitationStyle];

export interface CitationEntry {
  id: number; // dense, starting at 1
  source: string; // source key
  formatted: string;
  url: string | null;
  accessed: string; // YYYY-MM-DD
  style: CitationStyleName;
}

export const UncitedReason = {
  NO_MATCH: 'No matching source found',
  LOW_CONFIDENCE: 'Low confidence match',
} as const;

export type UncitedReasonText = typeof UncitedReason[keyof typeof UncitedReason];

export interface UncitedClaim {
  text: string;
  type: ClaimTypeName;
  reason: UncitedReasonText;
}

export interface CitationMetadata {
  processingTimeSeconds: number;
  totalClaimsIdentified: number;
  claimsWithSources: number;
  citationStyle: CitationStyleName;
  successRate: number;
  noResearchData?: boolean;
  error?: string;
}

export interface CitationResult {
  citedContent: string;
  bibliography: CitationEntry[];
  citationCount: number;
  uncitedClaims: UncitedClaim[];
  metadata: CitationMetadata;
}
