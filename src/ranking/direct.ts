/**
 * PAIRWISE ARENA - Direct Comparison Ranking
 *
 * Round-robin ranking of a fixed subset using only observed head-to-head
 * results. Every pair in the subset must have been compared; nothing is
 * inferred for a missing pair.
 *
 *   P(a beats b) = (wins_a + 0.5 * ties) / total
 *   score(a)     = mean of P(a beats x) over the other models
 */

import { UsageError } from '../errors';
import {
  orient,
  unorderedPair,
  type ModelId,
  type OutcomeStore,
  type Scope,
  type UnorderedPair,
} from '../outcomes';

export interface DirectScore {
  model: ModelId;
  score: number;
}

/** A comparison the caller still needs to run. */
export interface MissingComparison {
  modelA: ModelId;
  modelB: ModelId;
  promptset: string;
}

export interface HeadToHead {
  modelA: ModelId;
  modelB: ModelId;
  winsA: number;
  winsB: number;
  ties: number;
  total: number;
}

export class DirectComparisonRanking {
  models: ModelId[] = [];
  /** Unordered pairs in the subset with no stored outcome, in subset order. */
  missingComparisons: UnorderedPair[] = [];
  /** `null` until a complete computation; entries aligned to `models`. */
  probabilityMatrix: Array<Array<number | null>> | null = null;

  private wins: number[][] = [];
  private totals: number[][] = [];
  private scope: Scope | null = null;

  constructor(private readonly store: OutcomeStore) {}

  /**
   * Load every pair in the subset. Returns false, with `missingComparisons`
   * filled, when any pair has never been compared.
   */
  async computeRankings(models: readonly ModelId[], scope: Scope): Promise<boolean> {
    if (new Set(models).size !== models.length) {
      throw new UsageError('Model list contains duplicates');
    }

    const n = models.length;

    this.models = [...models];
    this.scope = scope;
    this.missingComparisons = [];
    this.probabilityMatrix = null;
    this.wins = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    this.totals = Array.from({ length: n }, () => new Array<number>(n).fill(0));

    for (let i = 0; i < n - 1; i++) {
      for (let j = i + 1; j < n; j++) {
        const outcomes = await this.store.load(models[i], models[j], scope);
        const view = outcomes ? orient(outcomes.overall, models[i]) : null;
        if (!view || view.total === 0) {
          this.missingComparisons.push(unorderedPair(models[i], models[j]));
          continue;
        }

        this.wins[i][j] = view.own;
        this.wins[j][i] = view.other;
        this.totals[i][j] = view.total;
        this.totals[j][i] = view.total;
      }
    }

    if (this.missingComparisons.length > 0) {
      console.log(`[Direct] ${this.missingComparisons.length} comparisons missing for a complete ranking`);
      return false;
    }

    this.probabilityMatrix = this.models.map((_, i) =>
      this.models.map((__, j) => {
        if (i === j) return 0.5;
        const total = this.totals[i][j];
        if (total === 0) return null;
        const ties = total - this.wins[i][j] - this.wins[j][i];
        return (this.wins[i][j] + 0.5 * ties) / total;
      }),
    );
    return true;
  }

  /** Mean win probability per model, highest first. */
  getRankings(): DirectScore[] {
    const matrix = this.probabilityMatrix;
    if (!matrix) {
      throw new UsageError('Rankings have not been computed yet. Call computeRankings() first.');
    }

    return this.models
      .map((model, i) => {
        const probabilities = matrix[i].filter((p, j): p is number => j !== i && p !== null);
        const score = probabilities.length
          ? probabilities.reduce((sum, p) => sum + p, 0) / probabilities.length
          : 0;
        return { model, score };
      })
      .sort((a, b) => b.score - a.score);
  }

  /** Structured list of comparisons to run before the ranking is complete. */
  getMissingComparisonCommands(): MissingComparison[] {
    const promptset = this.scope?.promptset ?? '';
    return this.missingComparisons.map((pair) => ({
      modelA: pair.first,
      modelB: pair.second,
      promptset,
    }));
  }

  /** Raw results for every compared pair in subset order. */
  getHeadToHead(): HeadToHead[] {
    const rows: HeadToHead[] = [];
    for (let i = 0; i < this.models.length - 1; i++) {
      for (let j = i + 1; j < this.models.length; j++) {
        const total = this.totals[i][j];
        if (total === 0) continue;
        const winsA = this.wins[i][j];
        const winsB = this.wins[j][i];
        rows.push({
          modelA: this.models[i],
          modelB: this.models[j],
          winsA,
          winsB,
          ties: total - winsA - winsB,
          total,
        });
      }
    }
    return rows;
  }
}
