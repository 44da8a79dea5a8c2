import type { TokenProfile } from '../claims/types';

/**
 * Evidence type constants to avoid magic strings.
 */
export const EvidenceType = {
    STATISTIC: 'statistic',
    EXPERT_OPINION: 'expert_opinion',
    RESEARCH_FINDING: 'research_finding',
} as const;

export type EvidenceTypeName = typeof EvidenceType[keyof typeof EvidenceType];

export interface EvidenceItem extends TokenProfile {
    text: string;
    type: EvidenceTypeName;
    // URL or opaque label; also the bibliography key
    source: string;
    // Query that produced the item, for query/answer records
    query?: string;
}
