/**
 * PAIRWISE ARENA - Outcomes Module
 *
 * Persisted comparison records and the aggregates every estimator reads.
 */

export {
  ComparisonRecordSchema,
  CategoryTallySchema,
  JudgmentSchema,
  outcomeTotal,
} from './types';

export type {
  ModelId,
  Category,
  CategoryTally,
  Judgment,
  ComparisonRecord,
  PairOutcome,
  OutcomeSet,
  Scope,
} from './types';

export { unorderedPair, pairKey, allPairs, orient, winRate } from './pairs';
export type { UnorderedPair, OrientedOutcome } from './pairs';

export {
  FileOutcomeStore,
  InMemoryOutcomeStore,
  outcomeSetFromRecord,
  comparisonFilename,
  parseComparisonFilename,
} from './store';
export type { OutcomeStore } from './store';

export { createWinMatrix, matchCounts, buildWinMatrix, loadCorpus } from './aggregates';
export type { WinMatrix, CorpusSnapshot } from './aggregates';
