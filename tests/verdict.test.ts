import { describe, it, expect } from 'vitest';
import { calculateAccuracyScore, classifyConfidence, priorityWeight } from '../src/scoring/verdict';
import { ClaimStatus } from '../src/scoring/types';
import { ENGINE_CONFIG_SCHEMA } from '../src/schemas/config-schemas';

describe('classifyConfidence', () => {
  it('uses inclusive lower bounds for each band', () => {
    expect(classifyConfidence(0.7)).toBe(ClaimStatus.VERIFIED);
    expect(classifyConfidence(0.699)).toBe(ClaimStatus.NEEDS_REVIEW);
    expect(classifyConfidence(0.4)).toBe(ClaimStatus.NEEDS_REVIEW);
    expect(classifyConfidence(0.399)).toBe(ClaimStatus.UNSUPPORTED);
  });

  it('accepts custom thresholds', () => {
    const { thresholds } = ENGINE_CONFIG_SCHEMA.parse({ thresholds: { verified: 0.9 } });
    expect(classifyConfidence(0.8, thresholds)).toBe(ClaimStatus.NEEDS_REVIEW);
  });
});

describe('calculateAccuracyScore', () => {
  it('weights priority 1 three times priority 3', () => {
    expect(priorityWeight(1)).toBe(3);
    expect(priorityWeight(3)).toBe(1);
    expect(
      calculateAccuracyScore([
        { priority: 1, status: ClaimStatus.VERIFIED, confidence: 1 },
        { priority: 3, status: ClaimStatus.UNSUPPORTED, confidence: 0.1 },
      ])
    ).toBe(0.75);
  });

  it('gives needs-review claims 60% credit', () => {
    expect(
      calculateAccuracyScore([{ priority: 2, status: ClaimStatus.NEEDS_REVIEW, confidence: 0.5 }])
    ).toBe(0.3);
    expect(
      calculateAccuracyScore([
        { priority: 1, status: ClaimStatus.VERIFIED, confidence: 0.9 },
        { priority: 2, status: ClaimStatus.NEEDS_REVIEW, confidence: 0.5 },
      ])
    ).toBe(0.66);
  });

  it('scores an empty list as fully accurate', () => {
    expect(calculateAccuracyScore([])).toBe(1);
  });
});
