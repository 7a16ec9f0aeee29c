/**
 * PAIRWISE ARENA - Confidence / Gap Analyzer
 *
 * Looks at how well the outcome corpus covers the known models and suggests
 * the comparisons worth running next. Sources, in priority order:
 *
 *   1. pairs never compared
 *   2. pairs with too few games overall
 *   3. pairs whose ELO ratings are close (only with a rating store)
 *   4. pairs with too few games in one category
 *
 * A pair suggested at one priority is never repeated at a lower one.
 */

import {
  allPairs,
  loadCorpus,
  outcomeTotal,
  unorderedPair,
  type Category,
  type CorpusSnapshot,
  type ModelId,
  type OutcomeStore,
  type Scope,
  type UnorderedPair,
} from '../outcomes';
import type { EloRatingSystem } from '../ranking';

// ─── Types ────────────────────────────────────────────────────────────────────

export type SuggestionPriority = 1 | 2 | 3 | 4;

export interface Suggestion {
  modelA: ModelId;
  modelB: ModelId;
  reason: string;
  priority: SuggestionPriority;
  category?: Category;
  promptset: string;
}

export interface PairCount {
  pair: UnorderedPair;
  count: number;
}

export interface PairRatingDiff {
  pair: UnorderedPair;
  diff: number;
}

export interface ModelCount {
  model: ModelId;
  count: number;
}

export interface AnalyzerOptions {
  /** Ratings for close-rating detection; omitted means that source is skipped. */
  elo?: EloRatingSystem;
  /** Categories to check for gaps; defaults to those seen in the corpus. */
  categories?: readonly Category[];
}

export interface SuggestionOptions {
  minComparisons?: number;
  minPerCategory?: number;
  maxRatingDiff?: number;
  maxSuggestions?: number;
}

export interface ModelSummary {
  totalModels: number;
  totalComparisons: number;
  modelComparisonCounts: Record<ModelId, number>;
  /** Share of each model's games per category, in percent. */
  modelCategoryDistribution: Record<ModelId, Record<Category, number>>;
  /** Empty without a rating store. */
  modelRatings: Record<ModelId, number>;
}

export const DEFAULT_SUGGESTION_OPTIONS = {
  minComparisons: 5,
  minPerCategory: 2,
  maxRatingDiff: 50,
  maxSuggestions: 10,
} as const satisfies Required<SuggestionOptions>;

// ─── Analyzer ─────────────────────────────────────────────────────────────────

export class ConfidenceAnalyzer {
  readonly models: ModelId[];
  readonly categories: Category[];

  /** Games per compared pair, keyed by pair key, in corpus order. */
  private pairCounts = new Map<string, PairCount>();
  /** Games per category per pair key. */
  private categoryCounts = new Map<Category, Map<string, number>>();
  private modelCategoryCounts = new Map<ModelId, Map<Category, number>>();

  private constructor(
    corpus: CorpusSnapshot,
    private readonly scope: Scope,
    private readonly elo: EloRatingSystem | undefined,
    categories: readonly Category[] | undefined,
  ) {
    this.models = corpus.models;
    const observed = new Set<Category>();

    for (const [key, outcomes] of corpus.outcomes) {
      const total = outcomeTotal(outcomes.overall);
      if (total === 0) continue;

      const { modelA, modelB } = outcomes.overall;
      this.pairCounts.set(key, { pair: unorderedPair(modelA, modelB), count: total });

      for (const [category, outcome] of outcomes.byCategory) {
        observed.add(category);
        const games = outcomeTotal(outcome);
        if (games === 0) continue;

        let perPair = this.categoryCounts.get(category);
        if (!perPair) {
          perPair = new Map();
          this.categoryCounts.set(category, perPair);
        }
        perPair.set(key, (perPair.get(key) ?? 0) + games);
        this.bumpModelCategory(modelA, category, games);
        this.bumpModelCategory(modelB, category, games);
      }
    }

    this.categories = categories ? [...categories] : [...observed].sort();
    console.log(
      `[Confidence] Loaded data for ${this.models.length} models and ${this.pairCounts.size} model pairs`,
    );
  }

  static async create(
    store: OutcomeStore,
    scope: Scope,
    options: AnalyzerOptions = {},
  ): Promise<ConfidenceAnalyzer> {
    const corpus = await loadCorpus(store, scope);
    return new ConfidenceAnalyzer(corpus, scope, options.elo, options.categories);
  }

  /** Pairs of known models with no recorded games, in sorted order. */
  getMissingComparisons(): UnorderedPair[] {
    return allPairs(this.models).filter((pair) => !this.pairCounts.has(pair.key));
  }

  /** Compared pairs with fewer than `minComparisons` games, fewest first. */
  getLowConfidencePairs(minComparisons: number = 5): PairCount[] {
    return [...this.pairCounts.values()]
      .filter((entry) => entry.count < minComparisons)
      .sort((a, b) => a.count - b.count);
  }

  /** Pairs of known models within `maxDiff` ELO points, closest first. */
  getCloseRatingPairs(maxDiff: number = 50): PairRatingDiff[] {
    const elo = this.elo;
    if (!elo) {
      console.warn('[Confidence] No ELO ratings available for this promptset');
      return [];
    }

    return allPairs(this.models)
      .map((pair) => ({ pair, diff: Math.abs(elo.getRating(pair.first) - elo.getRating(pair.second)) }))
      .filter((entry) => entry.diff <= maxDiff)
      .sort((a, b) => a.diff - b.diff);
  }

  /** Per category, compared pairs with fewer than `minPerCategory` games there. */
  getCategoryGaps(minPerCategory: number = 3): Map<Category, PairCount[]> {
    const gaps = new Map<Category, PairCount[]>();
    for (const category of this.categories) {
      const perPair = this.categoryCounts.get(category);
      const entries: PairCount[] = [];
      for (const [key, { pair }] of this.pairCounts) {
        const count = perPair?.get(key) ?? 0;
        if (count < minPerCategory) entries.push({ pair, count });
      }
      gaps.set(category, entries.sort((a, b) => a.count - b.count));
    }
    return gaps;
  }

  /** Merge every source into one deduplicated list, highest priority first. */
  generateSuggestions(options: SuggestionOptions = {}): Suggestion[] {
    const minComparisons = options.minComparisons ?? DEFAULT_SUGGESTION_OPTIONS.minComparisons;
    const minPerCategory = options.minPerCategory ?? DEFAULT_SUGGESTION_OPTIONS.minPerCategory;
    const maxRatingDiff = options.maxRatingDiff ?? DEFAULT_SUGGESTION_OPTIONS.maxRatingDiff;
    const maxSuggestions = options.maxSuggestions ?? DEFAULT_SUGGESTION_OPTIONS.maxSuggestions;
    const promptset = this.scope.promptset;
    const suggestions: Suggestion[] = [];
    const seen = new Set<string>();

    const add = (pair: UnorderedPair, priority: SuggestionPriority, reason: string, category?: Category): void => {
      if (seen.has(pair.key)) return;
      seen.add(pair.key);
      const suggestion: Suggestion = { modelA: pair.first, modelB: pair.second, reason, priority, promptset };
      if (category !== undefined) suggestion.category = category;
      suggestions.push(suggestion);
    };

    for (const pair of this.getMissingComparisons().slice(0, maxSuggestions)) {
      add(pair, 1, 'These models have never been compared');
    }

    for (const { pair, count } of this.getLowConfidencePairs(minComparisons).slice(0, maxSuggestions)) {
      add(pair, 2, `Only ${count} comparisons (recommended: ${minComparisons})`);
    }

    if (this.elo) {
      for (const { pair, diff } of this.getCloseRatingPairs(maxRatingDiff).slice(0, maxSuggestions)) {
        add(pair, 3, `Close ELO ratings (diff: ${diff.toFixed(1)})`);
      }
    }

    const gaps = this.getCategoryGaps(minPerCategory);
    if (gaps.size > 0) {
      const perCategory = Math.max(1, Math.floor(maxSuggestions / gaps.size));
      for (const [category, entries] of gaps) {
        for (const { pair, count } of entries.slice(0, perCategory)) {
          add(pair, 4, `Only ${count} comparisons in '${category}' category`, category);
        }
      }
    }

    return suggestions.sort((a, b) => a.priority - b.priority).slice(0, maxSuggestions);
  }

  /** Every known model by total games played, fewest first. */
  getUnderrepresentedModels(): ModelCount[] {
    const totals = this.modelTotals();
    return this.models
      .map((model) => ({ model, count: totals.get(model) ?? 0 }))
      .sort((a, b) => a.count - b.count);
  }

  getModelSummary(): ModelSummary {
    const totals = this.modelTotals();

    const modelComparisonCounts: Record<ModelId, number> = {};
    for (const model of this.models) modelComparisonCounts[model] = totals.get(model) ?? 0;

    const modelCategoryDistribution: Record<ModelId, Record<Category, number>> = {};
    for (const [model, perCategory] of this.modelCategoryCounts) {
      let sum = 0;
      for (const count of perCategory.values()) sum += count;
      if (sum === 0) continue;

      const distribution: Record<Category, number> = {};
      for (const [category, count] of perCategory) distribution[category] = (count / sum) * 100;
      modelCategoryDistribution[model] = distribution;
    }

    const modelRatings: Record<ModelId, number> = {};
    if (this.elo) {
      for (const model of this.models) modelRatings[model] = this.elo.getRating(model);
    }

    let totalComparisons = 0;
    for (const { count } of this.pairCounts.values()) totalComparisons += count;

    return {
      totalModels: this.models.length,
      totalComparisons,
      modelComparisonCounts,
      modelCategoryDistribution,
      modelRatings,
    };
  }

  private modelTotals(): Map<ModelId, number> {
    const totals = new Map<ModelId, number>();
    for (const { pair, count } of this.pairCounts.values()) {
      totals.set(pair.first, (totals.get(pair.first) ?? 0) + count);
      totals.set(pair.second, (totals.get(pair.second) ?? 0) + count);
    }
    return totals;
  }

  private bumpModelCategory(model: ModelId, category: Category, games: number): void {
    let perCategory = this.modelCategoryCounts.get(model);
    if (!perCategory) {
      perCategory = new Map();
      this.modelCategoryCounts.set(model, perCategory);
    }
    perCategory.set(category, (perCategory.get(category) ?? 0) + games);
  }
}
