/**
 * PAIRWISE ARENA - Bradley-Terry Estimator
 *
 * Batch maximum-likelihood strengths from a win matrix, fit with Zermelo's
 * iterative update:
 *
 *   p_i ← W_i / Σ_j [ n_ij / (p_i + p_j) ] · p_j      for j with n_ij > 0
 *
 * where W_i is i's total wins and n_ij = W[i][j] + W[j][i] the decisive games
 * between i and j. Ties are not part of the model and are ignored.
 *
 * Strengths sum to 1 after every sweep. A model with no games keeps its
 * strength for the whole fit.
 */

import { UsageError } from '../errors';
import { buildWinMatrix, matchCounts, type ModelId, type OutcomeStore, type Scope, type WinMatrix } from '../outcomes';

// ─── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_MAX_ITERATIONS = 100;
export const DEFAULT_CONVERGENCE_THRESHOLD = 1e-6;

/** Floor for a compared model that has never won, so it stays strictly positive. */
export const MIN_STRENGTH = 1e-10;

// ─── Types ────────────────────────────────────────────────────────────────────

export interface BradleyTerryOptions {
  maxIterations?: number;
  convergenceThreshold?: number;
}

export interface RankedStrength {
  model: ModelId;
  strength: number;
}

// ─── Model ────────────────────────────────────────────────────────────────────

export class BradleyTerryModel {
  readonly maxIterations: number;
  readonly convergenceThreshold: number;

  private models: ModelId[] = [];
  private strengths: number[] | null = null;

  /** Sweeps run by the last fit. */
  iterations = 0;
  /** Whether the last fit stopped below the threshold rather than at the cap. */
  converged = false;

  constructor(options: BradleyTerryOptions = {}) {
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.convergenceThreshold = options.convergenceThreshold ?? DEFAULT_CONVERGENCE_THRESHOLD;
  }

  fit(matrix: WinMatrix): Map<ModelId, number> {
    const n = matrix.models.length;
    const counts = matchCounts(matrix);
    const wins = matrix.wins.map((row) => row.reduce((sum, w) => sum + w, 0));
    const isolated = counts.map((row) => row.every((c) => c === 0));

    let strengths = new Array<number>(n).fill(n > 0 ? 1 / n : 0);
    const isolatedMass = strengths.reduce((sum, s, i) => (isolated[i] ? sum + s : sum), 0);

    this.iterations = 0;
    this.converged = false;

    while (this.iterations < this.maxIterations) {
      this.iterations++;
      const next = strengths.slice();

      for (let i = 0; i < n; i++) {
        if (isolated[i]) continue;

        let denominator = 0;
        for (let j = 0; j < n; j++) {
          if (i === j || counts[i][j] === 0) continue;
          denominator += (counts[i][j] * strengths[j]) / (strengths[i] + strengths[j]);
        }
        if (denominator > 0) {
          next[i] = Math.max(wins[i] / denominator, MIN_STRENGTH);
        }
      }

      // Isolated models hold their mass; the rest share what is left.
      const activeMass = next.reduce((sum, s, i) => (isolated[i] ? sum : sum + s), 0);
      if (activeMass > 0) {
        const scale = (1 - isolatedMass) / activeMass;
        for (let i = 0; i < n; i++) {
          if (!isolated[i]) next[i] *= scale;
        }
      }

      let maxChange = 0;
      for (let i = 0; i < n; i++) {
        maxChange = Math.max(maxChange, Math.abs(next[i] - strengths[i]));
      }
      strengths = next;

      if (maxChange < this.convergenceThreshold) {
        this.converged = true;
        break;
      }
    }

    this.models = [...matrix.models];
    this.strengths = strengths;

    if (!this.converged && n > 0) {
      console.warn(`[BradleyTerry] Stopped at ${this.maxIterations} iterations without converging`);
    }

    return new Map(this.models.map((model, i) => [model, strengths[i]]));
  }

  /** `P[i][j]` = chance models[i] beats models[j]; 0.5 on the diagonal. */
  probabilityMatrix(): number[][] {
    const strengths = this.requireFit();
    return strengths.map((si, i) =>
      strengths.map((sj, j) => (i === j ? 0.5 : si / (si + sj))),
    );
  }

  /** Strengths highest first; equal strengths keep matrix order. */
  getRankings(): RankedStrength[] {
    const strengths = this.requireFit();
    return this.models
      .map((model, i) => ({ model, strength: strengths[i] }))
      .sort((a, b) => b.strength - a.strength);
  }

  getModels(): ModelId[] {
    return [...this.models];
  }

  private requireFit(): number[] {
    if (!this.strengths) {
      throw new UsageError('Model has not been fitted yet. Call fit() first.');
    }
    return this.strengths;
  }
}

/** Fit a model over `models` using every stored outcome among them. */
export async function generateBradleyTerryRankings(
  models: readonly ModelId[],
  store: OutcomeStore,
  scope: Scope,
  options: BradleyTerryOptions = {},
): Promise<BradleyTerryModel> {
  const matrix = await buildWinMatrix(models, store, scope);
  const model = new BradleyTerryModel(options);
  model.fit(matrix);
  return model;
}
