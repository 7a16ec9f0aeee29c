/**
 * PAIRWISE ARENA - Outcome Aggregates
 *
 * Dense views over the outcome store: the square win matrix consumed by
 * Bradley-Terry, and a corpus snapshot (every stored pair for a scope)
 * consumed by the analyzer and focus ranking.
 */

import { UsageError } from '../errors';
import { orient, pairKey } from './pairs';
import type { OutcomeStore } from './store';
import type { ModelId, OutcomeSet, Scope } from './types';

// ─── Win Matrix ───────────────────────────────────────────────────────────────

/**
 * `wins[i][j]` = wins of models[i] over models[j].
 * `ties[i][j]` = ties between them (symmetric).
 */
export interface WinMatrix {
  models: ModelId[];
  wins: number[][];
  ties: number[][];
}

function zeros(n: number): number[][] {
  return Array.from({ length: n }, () => new Array<number>(n).fill(0));
}

/**
 * Build a win matrix from literal rows. Ties default to all zeros.
 * Throws UsageError on duplicate models or mismatched dimensions.
 */
export function createWinMatrix(
  models: readonly ModelId[],
  wins: readonly (readonly number[])[],
  ties?: readonly (readonly number[])[],
): WinMatrix {
  const n = models.length;
  if (new Set(models).size !== n) {
    throw new UsageError('Win matrix models must be unique');
  }
  const check = (rows: readonly (readonly number[])[], label: string): void => {
    if (rows.length !== n || rows.some((row) => row.length !== n)) {
      throw new UsageError(`${label} matrix must be ${n}x${n}`);
    }
  };
  check(wins, 'Win');
  if (ties) check(ties, 'Tie');

  return {
    models: [...models],
    wins: wins.map((row) => [...row]),
    ties: ties ? ties.map((row) => [...row]) : zeros(n),
  };
}

/** Decisive games played between each pair: `W[i][j] + W[j][i]`. Always symmetric. */
export function matchCounts(matrix: WinMatrix): number[][] {
  const n = matrix.models.length;
  const counts = zeros(n);
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      if (i !== j) counts[i][j] = matrix.wins[i][j] + matrix.wins[j][i];
    }
  }
  return counts;
}

/**
 * Load every pair among `models` from the store into a win matrix.
 * Pairs with no stored outcome stay at zero.
 */
export async function buildWinMatrix(
  models: readonly ModelId[],
  store: OutcomeStore,
  scope: Scope,
): Promise<WinMatrix> {
  const matrix = createWinMatrix(models, zeros(models.length));

  for (let i = 0; i < models.length - 1; i++) {
    for (let j = i + 1; j < models.length; j++) {
      const outcomes = await store.load(models[i], models[j], scope);
      if (!outcomes) continue;

      const view = orient(outcomes.overall, models[i]);
      if (!view) continue;

      matrix.wins[i][j] = view.own;
      matrix.wins[j][i] = view.other;
      matrix.ties[i][j] = view.ties;
      matrix.ties[j][i] = view.ties;
    }
  }
  return matrix;
}

// ─── Corpus Snapshot ──────────────────────────────────────────────────────────

export interface CorpusSnapshot {
  /** Every model appearing in a stored pair, sorted. */
  models: ModelId[];
  /** Outcomes keyed by `pairKey(a, b)`, in listing order. */
  outcomes: Map<string, OutcomeSet>;
}

/** Load every stored pair for a scope once. */
export async function loadCorpus(store: OutcomeStore, scope: Scope): Promise<CorpusSnapshot> {
  const models = new Set<ModelId>();
  const outcomes = new Map<string, OutcomeSet>();

  for (const [a, b] of await store.listAll(scope)) {
    const set = await store.load(a, b, scope);
    if (!set) continue;
    models.add(a);
    models.add(b);
    outcomes.set(pairKey(a, b), set);
  }

  return { models: [...models].sort(), outcomes };
}
