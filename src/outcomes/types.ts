/**
 * PAIRWISE ARENA - Outcome Types
 *
 * Runtime schemas for persisted comparison records and the immutable
 * aggregates every estimator consumes.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

/** Opaque model identifier. Equality is exact string equality. */
export type ModelId = string;

/** Opaque category (topic) name inside a promptset. */
export type Category = string;

// ---------------------------------------------------------------------------
// Persisted comparison record
// ---------------------------------------------------------------------------

const countSchema = z.number().int().nonnegative();

export const CategoryTallySchema = z.object({
  winsA: countSchema,
  winsB: countSchema,
  ties: countSchema,
});
export type CategoryTally = z.infer<typeof CategoryTallySchema>;

export const JudgmentSchema = z.object({
  prompt: z.string(),
  category: z.string(),
  winner: z.enum(['a', 'b', 'tie']),
  reason: z.string().optional(),
});
export type Judgment = z.infer<typeof JudgmentSchema>;

/**
 * One completed comparison run between two models on a promptset.
 * A re-run replaces the stored record for the pair; records are never merged.
 */
export const ComparisonRecordSchema = z
  .object({
    modelA: z.string().min(1),
    modelB: z.string().min(1),
    promptset: z.string().min(1),
    timestamp: z.string(),
    categoryResults: z.record(z.string(), CategoryTallySchema),
    /** Individual verdicts, kept for audit. Not read by the estimators. */
    judgments: z.array(JudgmentSchema).optional(),
  })
  .refine((record) => record.modelA !== record.modelB, {
    message: 'modelA and modelB must differ',
    path: ['modelB'],
  });
export type ComparisonRecord = z.infer<typeof ComparisonRecordSchema>;

// ---------------------------------------------------------------------------
// In-memory aggregates
// ---------------------------------------------------------------------------

/**
 * Win/loss/tie counts for an ordered pair. `category` is null for the
 * overall aggregate across every category in scope.
 */
export interface PairOutcome {
  readonly modelA: ModelId;
  readonly modelB: ModelId;
  readonly category: Category | null;
  readonly winsA: number;
  readonly winsB: number;
  readonly ties: number;
}

/** Everything known about one pair within one scope. */
export interface OutcomeSet {
  readonly overall: PairOutcome;
  readonly byCategory: ReadonlyMap<Category, PairOutcome>;
}

/**
 * Which outcomes belong together for a ranking run. With `categories`,
 * only those categories contribute to the overall aggregate.
 */
export interface Scope {
  promptset: string;
  categories?: readonly Category[];
}

export function outcomeTotal(outcome: PairOutcome): number {
  return outcome.winsA + outcome.winsB + outcome.ties;
}
