export {
  type BestMatchOptions,
  bestMatch,
  combineScores,
  computeSubScores,
  evaluateMatch,
  isCloseNumber,
  keywordOverlap,
  matchingKeywords,
  matchingNumbers,
  numberOverlap,
  roundConfidence,
  score,
  textSimilarity,
  typeMatches,
} from './matcher';
export {
  type ScoredClaim,
  calculateAccuracyScore,
  classifyConfidence,
  priorityWeight,
} from './verdict';
export * from './types';
