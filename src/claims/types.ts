/**
 * Claim type constants to avoid magic strings.
 */
export const ClaimType = {
    STATISTIC: 'statistic',
    FINANCIAL: 'financial',
    GROWTH: 'growth',
    MARKET: 'market',
    TEMPORAL: 'temporal',
    RESEARCH: 'research',
    QUANTITATIVE: 'quantitative',
    COMPARATIVE: 'comparative',
    ATTRIBUTION: 'attribution',
} as const;

export type ClaimTypeName = typeof ClaimType[keyof typeof ClaimType];

// 1 = highest
export type ClaimPriority = 1 | 2 | 3;

/**
 * A syntactic shape of a verifiable statement. Rules run in registration
 * order; when two rules hit the same position the earlier one wins.
 */
export interface ClaimRule {
    readonly name: string;
    readonly type: ClaimTypeName;
    readonly priority: ClaimPriority;
    readonly description: string;
    readonly pattern: RegExp;
}

/**
 * Tokens derived from a piece of text. Claims and evidence share this shape
 * so matching works over one vocabulary.
 */
export interface TokenProfile {
    numbers: string[];
    dates: string[];
    keywords: string[];
}

export interface Claim extends TokenProfile {
    id: number;
    text: string;
    type: ClaimTypeName;
    rule: string;
    priority: ClaimPriority;
    start: number; // offset of the first character
    end: number; // offset after the last character
    location: string; // nearest preceding heading, lower-cased
}

export const ExtractionMode = {
    FACT_CHECK: 'fact-check',
    CITATION: 'citation',
} as const;

export type ExtractionModeName = typeof ExtractionMode[keyof typeof ExtractionMode];
