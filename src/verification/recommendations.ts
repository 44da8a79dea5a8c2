import { ClaimStatus } from '../scoring/types';
import type { ClaimTypeName } from '../claims/types';
import type { VerifiedClaim } from './types';

const HIGH_PRIORITY_LIMIT = 2;
const TYPE_CALLOUT_MINIMUM = 2;

export const NO_RESEARCH_RECOMMENDATION = 'No research data available for fact verification';
export const NO_CLAIMS_RECOMMENDATION = 'No factual claims detected for verification';
export const ALL_SUPPORTED_RECOMMENDATION = 'All claims are well-supported by research data';

/**
 * One line per class of problem found in the verified claims.
 */
export function generateRecommendations(claims: VerifiedClaim[]): string[] {
  const recommendations: string[] = [];
  const unsupported = claims.filter((c) => c.status === ClaimStatus.UNSUPPORTED);
  const needsReview = claims.filter((c) => c.status === ClaimStatus.NEEDS_REVIEW);

  if (unsupported.length > 0) {
    recommendations.push(
      `Remove or find sources for ${unsupported.length} unsupported claims`
    );
    const highPriority = unsupported.filter((c) => c.priority <= HIGH_PRIORITY_LIMIT);
    if (highPriority.length > 0) {
      recommendations.push(
        `Priority: Verify ${highPriority.length} high-priority statistical claims`
      );
    }
  }

  if (needsReview.length > 0) {
    recommendations.push(
      `Review and strengthen sources for ${needsReview.length} partially supported claims`
    );
  }

  const unsupportedByType = new Map<ClaimTypeName, number>();
  for (const claim of unsupported) {
    unsupportedByType.set(claim.type, (unsupportedByType.get(claim.type) ?? 0) + 1);
  }
  for (const [type, count] of unsupportedByType) {
    if (count >= TYPE_CALLOUT_MINIMUM) {
      recommendations.push(`Focus on verifying ${type} claims - ${count} found unsupported`);
    }
  }

  if (recommendations.length === 0) {
    recommendations.push(ALL_SUPPORTED_RECOMMENDATION);
  }
  return recommendations;
}
