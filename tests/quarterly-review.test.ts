import { describe, it, expect, afterEach, vi } from 'vitest';
import path from 'path';
import { fileURLToPath } from 'url';
import { prepareRun } from '../src/cli/run-context';
import { OutputFormat } from '../src/cli/types';
import { addCitations } from '../src/citations/citation-renderer';
import { CitationStyle, UncitedReason } from '../src/citations/types';
import { verifyFacts } from '../src/verification/fact-check-reporter';
import { ClaimStatus } from '../src/scoring/types';
import { DEFAULT_ENGINE_CONFIG } from '../src/schemas/config-schemas';
import { setSilentMode } from '../src/output/logger';

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

function loadFixture() {
  return prepareRun('quarterly-review.md', {
    verbose: false,
    output: OutputFormat.Line,
    research: 'quarterly-research.json',
  }, FIXTURES);
}

describe('quarterly review fixture', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    setSilentMode(false);
  });

  it('prepares a run from files on disk', () => {
    const context = loadFixture();

    expect(context.relFile).toBe('quarterly-review.md');
    expect(context.config).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(context.content.startsWith('# Quarterly Review\n')).toBe(true);
  });

  it('applies environment overrides', () => {
    vi.stubEnv('CONFIDENCE_THRESHOLD', '0.95');
    expect(loadFixture().config.thresholds.verified).toBe(0.95);
  });

  it('verifies claims per section', () => {
    const { content, research } = loadFixture();
    const report = verifyFacts(content, research);

    expect(report.verifiedClaims.map((c) => [c.text, c.location, c.status])).toEqual([
      ['Revenue increased by 40% in 2024', 'quarterly review', ClaimStatus.VERIFIED],
      [
        'Over 5,000 customers switched providers during the last fiscal quarter',
        'quarterly review',
        ClaimStatus.UNSUPPORTED,
      ],
      ['Profit rose by 12% in 2024', 'outlook', ClaimStatus.VERIFIED],
    ]);
    expect(report.verifiedClaims.map((c) => [c.confidence, c.supportingSource])).toEqual([
      [1, 'https://example.com/overview'],
      [expect.any(Number), expect.any(String)],
      [0.9, 'https://example.com/profit'],
    ]);
    expect(report.accuracyScore).toBe(0.814);
    expect(report.recommendations).toEqual(['Remove or find sources for 1 unsupported claims']);
  });

  it('cites matched claims and leaves the rest of the text alone', () => {
    const { content, research } = loadFixture();
    const result = addCitations(content, research, CitationStyle.CHICAGO, {
      now: () => new Date(Date.UTC(2026, 9, 5)),
    });

    expect(result.citedContent).toBe(
      [
        '# Quarterly Review',
        '',
        'Revenue increased by 40% in 2024 [1]. Over 5,000 customers switched providers during the last fiscal quarter.',
        '',
        '## Outlook',
        '',
        'Profit rose by 12% in 2024 [2].',
        '',
        '',
        '## References',
        '',
        '1. Example.Com, accessed October 05, 2026, https://example.com/overview.',
        '2. Example.Com, accessed October 05, 2026, https://example.com/profit.',
        '',
      ].join('\n')
    );
    expect(result.uncitedClaims).toEqual([
      {
        text: 'Over 5,000 customers switched providers during the last fiscal quarter',
        type: 'quantitative',
        reason: UncitedReason.NO_MATCH,
      },
    ]);
    expect(result.metadata.claimsWithSources).toBe(2);
    expect(result.metadata.successRate).toBeCloseTo(0.667, 3);
  });

  it('produces identical results on repeated runs', () => {
    const { content, research } = loadFixture();
    const now = () => new Date(Date.UTC(2026, 9, 5));
    const cite = () => {
      const { metadata, ...rest } = addCitations(content, research, CitationStyle.APA, { now });
      return { ...rest, metadata: { ...metadata, processingTimeSeconds: 0 } };
    };
    const verify = () => {
      const { metadata, ...rest } = verifyFacts(content, research);
      return { ...rest, metadata: { ...metadata, processingTimeSeconds: 0 } };
    };

    expect(cite()).toEqual(cite());
    expect(verify()).toEqual(verify());
  });

  it('keeps scores within the unit interval', () => {
    const { content, research } = loadFixture();
    const report = verifyFacts(content, research);

    expect(report.accuracyScore).toBeGreaterThanOrEqual(0);
    expect(report.accuracyScore).toBeLessThanOrEqual(1);
    expect(report.verifiedClaims).toHaveLength(3);
    for (const claim of report.verifiedClaims) {
      expect(claim.confidence).toBeGreaterThanOrEqual(0);
      expect(claim.confidence).toBeLessThanOrEqual(1);
    }
  });
});
