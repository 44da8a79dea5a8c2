import { ClaimType, type ClaimPriority, type ClaimRule, type ClaimTypeName } from './types';

/*
 * A claim is the sentence fragment around a core shape. The fragment stops at
 * a sentence terminator or a line break; a period followed by a digit is a
 * decimal point and does not end the fragment.
 */
const FRAGMENT = /(?:[^.!?\n]|\.(?=\d))+/g;
const LAZY_FRAGMENT = String.raw`(?:[^.!?\n]|\.(?=\d))*?`;

const DECIMAL = String.raw`\d+(?:\.\d+)?`;
const PERCENT = String.raw`${DECIMAL}(?:%|\s*percent\b)`;
const AMOUNT = String.raw`(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?`;
const SCALE = String.raw`(?:\s*(?:billion|million|thousand|bn|k)\b)?`;

function rule(
    name: string,
    type: ClaimTypeName,
    priority: ClaimPriority,
    core: string,
    description: string
): ClaimRule {
    return {
        name,
        type,
        priority,
        description,
        pattern: new RegExp(core, 'i'),
    };
}

/**
 * Registered in priority order. Within a priority the more specific shape
 * comes first so it claims the fragment.
 */
export const CLAIM_RULES: readonly ClaimRule[] = [
    rule(
        'growth_metrics',
        ClaimType.GROWTH,
        1,
        String.raw`\b(?:grew|increased|decreased|rose|fell|improved|declined|dropped|jumped)\s+(?:by\s+)?${PERCENT}`,
        'Growth and change metrics'
    ),
    rule(
        'financial_figures',
        ClaimType.FINANCIAL,
        1,
        String.raw`\$${AMOUNT}${SCALE}`,
        'Financial figures and amounts'
    ),
    rule(
        'percentage_statistics',
        ClaimType.STATISTIC,
        1,
        String.raw`\b${PERCENT}`,
        'Percentage-based statistics'
    ),
    rule(
        'market_data',
        ClaimType.MARKET,
        2,
        String.raw`\b(?:market|industry|sector)\s+(?:size|value|worth)${LAZY_FRAGMENT}\$?\d+`,
        'Market size and industry data'
    ),
    rule(
        'temporal_claims',
        ClaimType.TEMPORAL,
        2,
        String.raw`\b(?:in|during|by|since)\s+(?:19|20)\d{2}\b`,
        'Time-specific claims'
    ),
    rule(
        'research_findings',
        ClaimType.RESEARCH,
        2,
        String.raw`\b(?:study|studies|research|survey|report|analysis)\s+(?:shows|showed|found|finds|indicates|indicated|reveals|revealed|suggests|suggested)\b`,
        'Research and study findings'
    ),
    rule(
        'quantitative_claims',
        ClaimType.QUANTITATIVE,
        3,
        String.raw`\b${AMOUNT}${SCALE}\s*(?:users|customers|companies|businesses|people|organizations|employees)\b`,
        'Quantitative business claims'
    ),
    rule(
        'comparative_claims',
        ClaimType.COMPARATIVE,
        3,
        String.raw`(?:\b${DECIMAL}x|\btimes)\s+(?:more|less|faster|slower|better|worse|higher|lower)\b|\b(?:compared\s+(?:to|with)|versus|(?:more|less|higher|lower)\s+than)\b`,
        'Comparative claims and comparison phrasing'
    ),
    rule(
        'expert_attributions',
        ClaimType.ATTRIBUTION,
        3,
        String.raw`\b(?:according to|experts|analysts|researchers)\b`,
        'Expert opinion attributions'
    ),
];

export interface Fragment {
    text: string;
    start: number;
}

/** Splits text into sentence fragments in a single pass. */
export function splitFragments(text: string): Fragment[] {
    const fragments: Fragment[] = [];
    for (const m of text.matchAll(FRAGMENT)) {
        if (m.index === undefined) continue;
        fragments.push({ text: m[0], start: m.index });
    }
    return fragments;
}

/** Tests a rule's core shape against one fragment. */
export function ruleMatches(rule: ClaimRule, fragment: string): boolean {
    return fragment.search(rule.pattern) !== -1;
}

export function findRule(name: string): ClaimRule | undefined {
    return CLAIM_RULES.find((r) => r.name === name);
}
