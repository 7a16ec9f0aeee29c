/**
 * PAIRWISE ARENA - Analysis Module
 *
 * Coverage and confidence gaps in the outcome corpus, and what to run next.
 */

export { ConfidenceAnalyzer, DEFAULT_SUGGESTION_OPTIONS } from './confidence';

export type {
  Suggestion,
  SuggestionPriority,
  SuggestionOptions,
  AnalyzerOptions,
  PairCount,
  PairRatingDiff,
  ModelCount,
  ModelSummary,
} from './confidence';
