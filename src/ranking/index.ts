/**
 * PAIRWISE ARENA - Ranking Module
 *
 * Four independent estimators over the same pairwise outcomes:
 *   - ELO: incremental logistic ratings, persisted across runs
 *   - Bradley-Terry: batch maximum-likelihood strengths from a win matrix
 *   - Direct: round-robin win probability over a fully compared subset
 *   - Focus: win-rate ratios relative to one reference model, with
 *     transitive inference through intermediate models
 *
 * None of them is "the" ranking; callers pick the assumptions they want.
 */

// ELO
export {
  EloRatingSystem,
  overallKey,
  categoryKey,
  DEFAULT_K_FACTOR,
  DEFAULT_STARTING_RATING,
  DEFAULT_PROMPTSET,
  CATEGORY_SEPARATOR,
} from './elo';

export type { RatingKey, MatchRecord, EloOptions, EloStoreData, RankedRating } from './elo';

export { readRatingStore, loadRatings, saveRatings, decodeRatingKey, EloStoreSchema } from './elo-store';

// Bradley-Terry
export {
  BradleyTerryModel,
  generateBradleyTerryRankings,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_CONVERGENCE_THRESHOLD,
  MIN_STRENGTH,
} from './bradley-terry';

export type { BradleyTerryOptions, RankedStrength } from './bradley-terry';

// Direct comparison
export { DirectComparisonRanking } from './direct';
export type { DirectScore, MissingComparison, HeadToHead } from './direct';

// Focus ranking
export { FocusRanking, DEFAULT_MAX_DEPTH } from './focus';
export type { WinRatioGraph, RatioKind, FocusRankingRow, FocusTally, FocusComparison } from './focus';

// Leaderboards
export {
  applyOutcomes,
  applyComparison,
  rebuildEloRatings,
  loadOrRebuildRatings,
  updateEloRatings,
  buildLeaderboard,
  saveLeaderboard,
} from './leaderboard';

export type { Leaderboard, RatingsSource } from './leaderboard';
