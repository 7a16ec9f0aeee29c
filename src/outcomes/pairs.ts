/**
 * PAIRWISE ARENA - Pair Keys
 */

import type { ModelId, PairOutcome } from './types';

/** A model pair in canonical (code-unit lexicographic) order. */
export interface UnorderedPair {
  readonly first: ModelId;
  readonly second: ModelId;
  /** Stable lookup key; identical for (a, b) and (b, a). */
  readonly key: string;
}

export function unorderedPair(a: ModelId, b: ModelId): UnorderedPair {
  const [first, second] = a <= b ? [a, b] : [b, a];
  return { first, second, key: JSON.stringify([first, second]) };
}

export function pairKey(a: ModelId, b: ModelId): string {
  return unorderedPair(a, b).key;
}

/**
 * Every unordered pair of the given models, in input order
 * (models[0] with models[1..], then models[1] with models[2..], ...).
 */
export function allPairs(models: readonly ModelId[]): UnorderedPair[] {
  const pairs: UnorderedPair[] = [];
  for (let i = 0; i < models.length - 1; i++) {
    for (let j = i + 1; j < models.length; j++) {
      pairs.push(unorderedPair(models[i], models[j]));
    }
  }
  return pairs;
}

/** A pair outcome seen from one participant's side. */
export interface OrientedOutcome {
  own: number;
  other: number;
  ties: number;
  total: number;
}

/**
 * View an outcome from `model`'s side.
 * Returns null when `model` did not take part.
 */
export function orient(outcome: PairOutcome, model: ModelId): OrientedOutcome | null {
  const total = outcome.winsA + outcome.winsB + outcome.ties;
  if (model === outcome.modelA) {
    return { own: outcome.winsA, other: outcome.winsB, ties: outcome.ties, total };
  }
  if (model === outcome.modelB) {
    return { own: outcome.winsB, other: outcome.winsA, ties: outcome.ties, total };
  }
  return null;
}

/** Win rate with ties counted as half a win; 0 when nothing was played. */
export function winRate(view: OrientedOutcome): number {
  if (view.total === 0) return 0;
  return (view.own + 0.5 * view.ties) / view.total;
}
