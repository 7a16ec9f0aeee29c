/**
 * PAIRWISE ARENA - Leaderboards
 *
 * Feeds stored comparisons into the ELO system and shapes its ratings into a
 * leaderboard document (overall plus one table per category).
 */

import { promises as fs } from 'fs';
import path from 'path';
import { describeLoadError } from '../errors';
import {
  loadCorpus,
  outcomeSetFromRecord,
  outcomeTotal,
  type Category,
  type ComparisonRecord,
  type OutcomeSet,
  type OutcomeStore,
  type Scope,
} from '../outcomes';
import { EloRatingSystem, type EloOptions, type RankedRating } from './elo';
import { loadRatings, readRatingStore, saveRatings } from './elo-store';

// ─── Applying Comparisons ─────────────────────────────────────────────────────

/**
 * Register one pair's results: the overall tally, then each category with at
 * least one game as an independent category match.
 */
export function applyOutcomes(elo: EloRatingSystem, outcomes: OutcomeSet): void {
  const { overall } = outcomes;
  elo.registerMatchResult(overall.modelA, overall.modelB, overall.winsA, overall.winsB, overall.ties);

  for (const [category, outcome] of outcomes.byCategory) {
    if (outcomeTotal(outcome) === 0) continue;
    elo.registerMatchResult(outcome.modelA, outcome.modelB, outcome.winsA, outcome.winsB, outcome.ties, category);
  }
}

export function applyComparison(elo: EloRatingSystem, record: ComparisonRecord): void {
  applyOutcomes(elo, outcomeSetFromRecord(record, { promptset: record.promptset }));
}

/** Replay every stored comparison for a scope, in listing order, into a fresh system. */
export async function rebuildEloRatings(
  store: OutcomeStore,
  scope: Scope,
  options: Omit<EloOptions, 'promptset'> = {},
): Promise<EloRatingSystem> {
  const elo = new EloRatingSystem({ ...options, promptset: scope.promptset });
  const corpus = await loadCorpus(store, scope);
  for (const outcomes of corpus.outcomes.values()) {
    applyOutcomes(elo, outcomes);
  }
  console.log(`[Leaderboard] Rebuilt ELO ratings from ${corpus.outcomes.size} comparisons`);
  return elo;
}

export type RatingsSource = 'stored' | 'rebuilt';

/**
 * The ELO store at `filePath`, or ratings rebuilt from the archive when it is
 * missing or unusable. Nothing is written back.
 */
export async function loadOrRebuildRatings(
  store: OutcomeStore,
  scope: Scope,
  filePath: string,
  options: Omit<EloOptions, 'promptset'> = {},
): Promise<{ elo: EloRatingSystem; source: RatingsSource }> {
  const result = await readRatingStore(filePath, scope.promptset);
  if (result.ok) return { elo: result.value, source: 'stored' };

  if (result.error.kind !== 'not-found') {
    console.error(`[Leaderboard] Ignoring stored ratings: ${describeLoadError(result.error)}`);
  }
  const elo = await rebuildEloRatings(store, scope, options);
  return { elo, source: 'rebuilt' };
}

/** Load the store at `filePath`, apply the records, save once. */
export async function updateEloRatings(
  records: readonly ComparisonRecord[],
  filePath: string,
  promptset: string,
  defaults: Omit<EloOptions, 'promptset'> = {},
): Promise<EloRatingSystem> {
  const elo = await loadRatings(filePath, promptset, defaults);
  for (const record of records) applyComparison(elo, record);
  await saveRatings(elo, filePath);
  return elo;
}

// ─── Leaderboard Document ─────────────────────────────────────────────────────

export interface Leaderboard {
  generatedAt: string;
  promptset: string;
  overall: RankedRating[];
  categories: Record<Category, RankedRating[]>;
}

export function buildLeaderboard(elo: EloRatingSystem, now: Date = new Date()): Leaderboard {
  const categories: Record<Category, RankedRating[]> = {};
  for (const category of [...elo.getCategories()].sort()) {
    categories[category] = elo.getRankings(category);
  }
  return {
    generatedAt: now.toISOString(),
    promptset: elo.promptset,
    overall: elo.getRankings(),
    categories,
  };
}

export async function saveLeaderboard(leaderboard: Leaderboard, filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(leaderboard, null, 2), 'utf8');
  console.log(`[Leaderboard] Saved leaderboard to ${filePath}`);
}
