import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../schemas/config-schemas';
import { extractClaims } from '../claims/extractor';
import { ExtractionMode, type Claim } from '../claims/types';
import { indexEvidence, normalizeResearchData } from '../evidence/indexer';
import { bestMatch, matchingKeywords, matchingNumbers } from '../scoring/matcher';
import { calculateAccuracyScore, classifyConfidence } from '../scoring/verdict';
import { ClaimStatus, type MatchResult } from '../scoring/types';
import { handleUnknownError } from '../errors/index';
import { debug, warn, error as logError } from '../output/logger';
import {
  NO_CLAIMS_RECOMMENDATION,
  NO_RESEARCH_RECOMMENDATION,
  generateRecommendations,
} from './recommendations';
import type {
  VerificationReport,
  VerificationStatistics,
  VerifiedClaim,
} from './types';

export interface VerifyOptions {
  config?: EngineConfig;
}

export function excerpt(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function toVerifiedClaim(
  claim: Claim,
  match: MatchResult | null,
  config: EngineConfig
): VerifiedClaim {
  const confidence = match?.confidence ?? 0;
  return {
    ...claim,
    status: classifyConfidence(confidence, config.thresholds),
    confidence,
    supportingSource: match?.evidence.source ?? null,
    supportingTextExcerpt: match ? excerpt(match.evidence.text, config.report.excerptLength) : null,
    details: {
      matchType: match?.evidence.type ?? null,
      matchingNumbers: match ? matchingNumbers(claim.numbers, match.evidence.numbers) : [],
      matchingKeywords: match ? matchingKeywords(claim.keywords, match.evidence.keywords) : [],
    },
  };
}

export function summarize(claims: VerifiedClaim[]): VerificationStatistics {
  return {
    totalClaims: claims.length,
    verified: claims.filter((c) => c.status === ClaimStatus.VERIFIED).length,
    unsupported: claims.filter((c) => c.status === ClaimStatus.UNSUPPORTED).length,
    needsReview: claims.filter((c) => c.status === ClaimStatus.NEEDS_REVIEW).length,
  };
}

/**
 * Fact-checks an article against a research bundle.
 *
 * Without evidence every extracted claim is reported unsupported and the
 * accuracy score is 0. With evidence but no claims the score is 1. Never
 * throws: an internal failure yields an empty report carrying the error.
 */
export function verifyFacts(
  content: string,
  researchData: unknown,
  options: VerifyOptions = {}
): VerificationReport {
  const startedAt = Date.now();
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const elapsed = (): number => (Date.now() - startedAt) / 1000;

  try {
    const research = normalizeResearchData(researchData);
    const pool = indexEvidence(research, { maxKeywords: config.extraction.maxKeywords });
    const claims = extractClaims(content, {
      mode: ExtractionMode.FACT_CHECK,
      settings: config.extraction,
    });

    if (pool.length === 0) {
      warn('No research data available for fact-checking');
      const verifiedClaims = claims.map((c) => toVerifiedClaim(c, null, config));
      return {
        verifiedClaims,
        statistics: summarize(verifiedClaims),
        recommendations: [NO_RESEARCH_RECOMMENDATION],
        accuracyScore: 0,
        metadata: {
          processingTimeSeconds: elapsed(),
          claimsExtracted: claims.length,
          confidenceThreshold: config.thresholds.verified,
          noResearchData: true,
        },
      };
    }

    if (claims.length === 0) {
      return {
        verifiedClaims: [],
        statistics: summarize([]),
        recommendations: [NO_CLAIMS_RECOMMENDATION],
        accuracyScore: 1,
        metadata: {
          processingTimeSeconds: elapsed(),
          claimsExtracted: 0,
          confidenceThreshold: config.thresholds.verified,
        },
      };
    }

    const verifiedClaims = claims.map((claim) =>
      toVerifiedClaim(claim, bestMatch(claim, pool, { weights: config.weights }), config)
    );
    const statistics = summarize(verifiedClaims);
    const accuracyScore = calculateAccuracyScore(verifiedClaims);

    debug(
      `Fact-checking completed: ${statistics.verified}/${statistics.totalClaims} claims verified, accuracy score: ${accuracyScore}`
    );

    return {
      verifiedClaims,
      statistics,
      recommendations: generateRecommendations(verifiedClaims),
      accuracyScore,
      metadata: {
        processingTimeSeconds: elapsed(),
        claimsExtracted: claims.length,
        confidenceThreshold: config.thresholds.verified,
      },
    };
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Verifying facts');
    logError(`Error in fact-checking process: ${err.message}`);
    return {
      verifiedClaims: [],
      statistics: summarize([]),
      recommendations: [`Fact-checking failed: ${err.message}`],
      accuracyScore: 0,
      metadata: {
        processingTimeSeconds: elapsed(),
        claimsExtracted: 0,
        confidenceThreshold: config.thresholds.verified,
        error: err.message,
      },
    };
  }
}
