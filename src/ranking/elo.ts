/**
 * PAIRWISE ARENA - ELO Rating System
 *
 * Incremental logistic ratings for pairwise comparisons. A whole comparison
 * run between two models (N prompts) is folded into one match whose score is
 * the fraction of points model A took, ties counting half:
 *
 *   score_a  = (wins_a + 0.5 * draws) / total
 *   expected = 1 / (1 + 10^((R_b - R_a) / 400))
 *   delta    = K * (score_a - expected)
 *   R_a += delta, R_b -= delta
 *
 * Ratings are kept per model overall and, independently, per model within
 * each category. Category ratings never move the overall rating.
 *
 * The system is a plain value: load it, apply matches, save it (elo-store.ts).
 */

import { UsageError } from '../errors';
import type { Category, ModelId } from '../outcomes';

// ─── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_K_FACTOR = 32;
export const DEFAULT_STARTING_RATING = 1400;
export const DEFAULT_PROMPTSET = 'basic1';

/**
 * Joins model and category in persisted composite keys (`model__category`).
 * Not permitted inside model ids or category names.
 */
export const CATEGORY_SEPARATOR = '__';

// ─── Types ────────────────────────────────────────────────────────────────────

export type RatingKey =
  | { kind: 'overall'; model: ModelId }
  | { kind: 'category'; model: ModelId; category: Category };

/** Append-only audit entry. Never replayed to derive ratings. */
export interface MatchRecord {
  modelA: ModelId;
  modelB: ModelId;
  oldRatingA: number;
  oldRatingB: number;
  newRatingA: number;
  newRatingB: number;
  scoreA: number;
  category: Category | null;
}

export interface EloOptions {
  kFactor?: number;
  startingRating?: number;
  promptset?: string;
}

/** Persisted shape. Category ratings are flattened to `model__category` keys here only. */
export interface EloStoreData {
  ratings: Record<string, number>;
  k_factor: number;
  starting_elo: number;
  promptset: string;
  match_history: Array<{
    model_a: ModelId;
    model_b: ModelId;
    old_rating_a: number;
    old_rating_b: number;
    new_rating_a: number;
    new_rating_b: number;
    score_a: number;
    category: Category | null;
  }>;
}

export interface RankedRating {
  model: ModelId;
  rating: number;
}

export function overallKey(model: ModelId): RatingKey {
  return { kind: 'overall', model };
}

export function categoryKey(model: ModelId, category: Category): RatingKey {
  return { kind: 'category', model, category };
}

function toKey(target: ModelId | RatingKey): RatingKey {
  return typeof target === 'string' ? overallKey(target) : target;
}

function assertRateable(key: RatingKey): void {
  if (key.model.includes(CATEGORY_SEPARATOR)) {
    throw new UsageError(`Model id '${key.model}' contains reserved separator '${CATEGORY_SEPARATOR}'`);
  }
  if (key.kind === 'category' && key.category.includes(CATEGORY_SEPARATOR)) {
    throw new UsageError(`Category '${key.category}' contains reserved separator '${CATEGORY_SEPARATOR}'`);
  }
}

function assertCount(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`${label} must be a non-negative integer, got ${value}`);
  }
}

// ─── Rating System ────────────────────────────────────────────────────────────

export class EloRatingSystem {
  readonly kFactor: number;
  readonly startingRating: number;
  readonly promptset: string;

  private overall = new Map<ModelId, number>();
  private categories = new Map<Category, Map<ModelId, number>>();
  private history: MatchRecord[] = [];

  constructor(options: EloOptions = {}) {
    this.kFactor = options.kFactor ?? DEFAULT_K_FACTOR;
    this.startingRating = options.startingRating ?? DEFAULT_STARTING_RATING;
    this.promptset = options.promptset ?? DEFAULT_PROMPTSET;
  }

  /** Stored rating, or the starting rating for anything never rated. */
  getRating(target: ModelId | RatingKey): number {
    const key = toKey(target);
    const table = key.kind === 'overall' ? this.overall : this.categories.get(key.category);
    return table?.get(key.model) ?? this.startingRating;
  }

  /** Overwrite a rating without recording a match. Used when restoring state. */
  setRating(target: ModelId | RatingKey, rating: number): void {
    const key = toKey(target);
    assertRateable(key);
    this.tableFor(key).set(key.model, rating);
  }

  /** Probability that `a` scores against `b`. `expectedScore(a, b) + expectedScore(b, a) === 1`. */
  expectedScore(a: ModelId | RatingKey, b: ModelId | RatingKey): number {
    const ratingA = this.getRating(a);
    const ratingB = this.getRating(b);
    return 1 / (1 + Math.pow(10, (ratingB - ratingA) / 400));
  }

  /**
   * Apply one match. `scoreA` is in [0, 1]. With a category, only the
   * category ratings of both models move.
   * Returns the new ratings of a and b.
   */
  updateRatings(
    modelA: ModelId,
    modelB: ModelId,
    scoreA: number,
    category: Category | null = null,
  ): [number, number] {
    if (modelA === modelB) {
      throw new UsageError(`Cannot rate ${modelA} against itself`);
    }
    if (!(scoreA >= 0 && scoreA <= 1)) {
      throw new UsageError(`Score must be within [0, 1], got ${scoreA}`);
    }

    const keyA = category === null ? overallKey(modelA) : categoryKey(modelA, category);
    const keyB = category === null ? overallKey(modelB) : categoryKey(modelB, category);
    assertRateable(keyA);
    assertRateable(keyB);

    const oldA = this.getRating(keyA);
    const oldB = this.getRating(keyB);
    const delta = this.kFactor * (scoreA - this.expectedScore(keyA, keyB));
    const newA = oldA + delta;
    const newB = oldB - delta;

    const table = this.tableFor(keyA);
    table.set(modelA, newA);
    table.set(modelB, newB);

    this.history.push({
      modelA,
      modelB,
      oldRatingA: oldA,
      oldRatingB: oldB,
      newRatingA: newA,
      newRatingB: newB,
      scoreA,
      category,
    });

    return [newA, newB];
  }

  /**
   * Fold a batch of comparisons into a single match.
   * A batch with no games is logged and ignored.
   */
  registerMatchResult(
    modelA: ModelId,
    modelB: ModelId,
    winsA: number,
    winsB: number,
    draws: number = 0,
    category: Category | null = null,
  ): void {
    assertCount(winsA, 'winsA');
    assertCount(winsB, 'winsB');
    assertCount(draws, 'draws');

    const total = winsA + winsB + draws;
    if (total === 0) {
      console.warn(`[Elo] Attempted to register match with zero comparisons between ${modelA} and ${modelB}`);
      return;
    }

    const scoreA = (winsA + 0.5 * draws) / total;
    this.updateRatings(modelA, modelB, scoreA, category);
    console.log(
      `[Elo] Registered ${modelA} vs ${modelB} = ${winsA}-${winsB}-${draws} in ${category ?? 'all categories'}`,
    );
  }

  /** Ratings sorted highest first; equal ratings keep first-rated order. */
  getRankings(category?: Category): RankedRating[] {
    const table = category === undefined ? this.overall : this.categories.get(category);
    if (!table) return [];
    return [...table.entries()]
      .map(([model, rating]) => ({ model, rating }))
      .sort((a, b) => b.rating - a.rating);
  }

  /** Models with an overall rating. */
  getAllModels(): ModelId[] {
    return [...this.overall.keys()];
  }

  getCategories(): Category[] {
    return [...this.categories.keys()];
  }

  getMatchHistory(): readonly MatchRecord[] {
    return [...this.history];
  }

  /** Append history entries as loaded from storage. */
  restoreHistory(records: readonly MatchRecord[]): void {
    this.history.push(...records);
  }

  /** Every stored rating with its key, overall first. */
  entries(): Array<[RatingKey, number]> {
    const out: Array<[RatingKey, number]> = [];
    for (const [model, rating] of this.overall) out.push([overallKey(model), rating]);
    for (const [category, table] of this.categories) {
      for (const [model, rating] of table) out.push([categoryKey(model, category), rating]);
    }
    return out;
  }

  toJSON(): EloStoreData {
    const ratings: Record<string, number> = {};
    for (const [key, rating] of this.entries()) {
      const name = key.kind === 'overall' ? key.model : `${key.model}${CATEGORY_SEPARATOR}${key.category}`;
      ratings[name] = rating;
    }
    return {
      ratings,
      k_factor: this.kFactor,
      starting_elo: this.startingRating,
      promptset: this.promptset,
      match_history: this.history.map((m) => ({
        model_a: m.modelA,
        model_b: m.modelB,
        old_rating_a: m.oldRatingA,
        old_rating_b: m.oldRatingB,
        new_rating_a: m.newRatingA,
        new_rating_b: m.newRatingB,
        score_a: m.scoreA,
        category: m.category,
      })),
    };
  }

  private tableFor(key: RatingKey): Map<ModelId, number> {
    if (key.kind === 'overall') return this.overall;
    let table = this.categories.get(key.category);
    if (!table) {
      table = new Map();
      this.categories.set(key.category, table);
    }
    return table;
  }
}
