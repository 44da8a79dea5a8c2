import { describe, it, expect } from 'vitest';
import { extractClaims } from '../src/claims/extractor';
import { ClaimType, type Claim } from '../src/claims/types';
import { indexEvidence, normalizeResearchData } from '../src/evidence/indexer';
import { EvidenceType, type EvidenceItem } from '../src/evidence/types';
import {
  bestMatch,
  combineScores,
  evaluateMatch,
  isCloseNumber,
  keywordOverlap,
  matchingNumbers,
  numberOverlap,
  score,
  textSimilarity,
  typeMatches,
} from '../src/scoring/matcher';
import { classifyConfidence } from '../src/scoring/verdict';
import { ClaimStatus } from '../src/scoring/types';
import { DEFAULT_ENGINE_CONFIG } from '../src/schemas/config-schemas';

function onlyClaim(text: string): Claim {
  const [claim] = extractClaims(text);
  if (!claim) throw new Error(`no claim in: ${text}`);
  return claim;
}

function statistics(...items: string[]): EvidenceItem[] {
  return indexEvidence(normalizeResearchData({ statistics: items }));
}

describe('numbers', () => {
  it('treats values up to 10 as close within 1', () => {
    expect(isCloseNumber(5, 6)).toBe(true);
    expect(isCloseNumber(5, 7)).toBe(false);
  });

  it('treats larger values as close within 10%', () => {
    expect(isCloseNumber(100, 109)).toBe(true);
    expect(isCloseNumber(100, 120)).toBe(false);
  });

  it('scores exact matches above close matches', () => {
    expect(numberOverlap(['40%'], ['40%'])).toBe(1);
    expect(numberOverlap(['40%'], ['42%'])).toBe(0.7);
    expect(numberOverlap(['10'], ['11', '10'])).toBe(1);
  });

  it('averages over the claim numbers', () => {
    expect(numberOverlap(['40%', '2024'], ['40%'])).toBe(0.5);
  });

  it('compares values with their scale applied', () => {
    expect(numberOverlap(['$2 billion'], ['$2000 million'])).toBe(1);
  });

  it('is zero when either side has no numbers', () => {
    expect(numberOverlap([], ['5'])).toBe(0);
    expect(numberOverlap(['5'], [])).toBe(0);
  });

  it('lists the claim numbers with a counterpart', () => {
    expect(matchingNumbers(['40%', '2024', '7'], ['42%'])).toEqual(['40%']);
  });
});

describe('keywordOverlap', () => {
  it('is the share of claim keywords present in the evidence', () => {
    expect(keywordOverlap(['churn', 'rate'], ['rate'])).toBe(0.5);
    expect(keywordOverlap([], ['rate'])).toBe(0);
  });
});

describe('typeMatches', () => {
  it('maps numeric claim types to statistics', () => {
    expect(typeMatches(ClaimType.GROWTH, EvidenceType.STATISTIC)).toBe(true);
    expect(typeMatches(ClaimType.GROWTH, EvidenceType.RESEARCH_FINDING)).toBe(false);
  });

  it('maps research and attribution claims to their evidence types', () => {
    expect(typeMatches(ClaimType.RESEARCH, EvidenceType.RESEARCH_FINDING)).toBe(true);
    expect(typeMatches(ClaimType.ATTRIBUTION, EvidenceType.EXPERT_OPINION)).toBe(true);
  });
});

describe('textSimilarity', () => {
  it('is 1 for identical text regardless of case', () => {
    expect(textSimilarity('Revenue grew', 'revenue GREW')).toBe(1);
  });

  it('is 0 when either side is blank', () => {
    expect(textSimilarity('', 'anything')).toBe(0);
  });
});

describe('combineScores', () => {
  const weights = DEFAULT_ENGINE_CONFIG.weights;

  it('weights each sub-score', () => {
    expect(
      combineScores({ textSimilarity: 0.5, numberOverlap: 0, keywordOverlap: 0, typeMatch: 0 }, weights)
    ).toBe(0.15);
    expect(
      combineScores({ textSimilarity: 1, numberOverlap: 1, keywordOverlap: 1, typeMatch: 1 }, weights)
    ).toBe(1);
  });
});

describe('score', () => {
  it('verifies a claim whose figures and year match a statistic', () => {
    const claim = onlyClaim('Sales grew by 25% in 2023 according to a recent study.');
    const [evidence] = statistics('Sales increased 25% in 2023');
    if (!evidence) throw new Error('no evidence');

    const result = evaluateMatch(claim, evidence);

    expect(result.scores.numberOverlap).toBe(1);
    expect(result.scores.keywordOverlap).toBe(0.2);
    expect(result.scores.typeMatch).toBe(1);
    expect(result.confidence).toBeGreaterThanOrEqual(0.728);
    expect(result.confidence).toBeLessThanOrEqual(0.8);
    expect(classifyConfidence(result.confidence)).toBe(ClaimStatus.VERIFIED);
  });

  it('leaves a claim unsupported when the figures disagree', () => {
    const claim = onlyClaim('Adoption rose by 90% last year.');
    const [evidence] = statistics('30% growth');
    if (!evidence) throw new Error('no evidence');

    const confidence = score(claim, evidence);

    expect(confidence).toBeGreaterThanOrEqual(0.1);
    expect(confidence).toBeLessThan(0.4);
    expect(classifyConfidence(confidence)).toBe(ClaimStatus.UNSUPPORTED);
  });

  it('flags a matching figure without matching wording for review', () => {
    const claim = onlyClaim('Churn fell by 12% among enterprise accounts.');
    const [evidence] = statistics('Retention data: 12% drop');
    if (!evidence) throw new Error('no evidence');

    const confidence = score(claim, evidence);

    expect(confidence).toBeGreaterThanOrEqual(0.45);
    expect(confidence).toBeLessThan(0.7);
    expect(classifyConfidence(confidence)).toBe(ClaimStatus.NEEDS_REVIEW);
  });
});

describe('bestMatch', () => {
  const claim = onlyClaim('Revenue increased by 40% in 2024.');

  it('picks the highest-scoring item', () => {
    const pool = statistics('Headcount stayed flat', 'Revenue increased by 40% in 2024');
    const match = bestMatch(claim, pool);

    expect(match?.evidence.text).toBe('Revenue increased by 40% in 2024');
    expect(match?.confidence).toBe(1);
    expect(match?.claimId).toBe(1);
  });

  it('keeps the first item on a tie', () => {
    const pool = indexEvidence(
      normalizeResearchData({
        results: [
          { query: 'a', answer: 'Revenue increased by 40% in 2024', sources: ['https://a.example.com'] },
          { query: 'b', answer: 'Revenue increased by 40% in 2024', sources: ['https://b.example.com'] },
        ],
      })
    );

    expect(bestMatch(claim, pool)?.evidence.source).toBe('https://a.example.com');
  });

  it('returns null for an empty pool', () => {
    expect(bestMatch(claim, [])).toBeNull();
  });

  it('returns null when the best score is under the floor', () => {
    const pool = statistics('Headcount stayed flat');
    expect(bestMatch(claim, pool, { floor: 0.99 })).toBeNull();
  });
});
