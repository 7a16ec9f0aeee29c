/**
 * PAIRWISE ARENA - ELO Persistence
 *
 * Load → mutate → save, each an explicit step. `readRatingStore` reports
 * why a file could not be used; `loadRatings` logs that and falls back to a
 * fresh system for the caller.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { err, ok, isFileNotFound, describeLoadError, type LoadError, type Result } from '../errors';
import {
  CATEGORY_SEPARATOR,
  DEFAULT_K_FACTOR,
  DEFAULT_STARTING_RATING,
  EloRatingSystem,
  categoryKey,
  overallKey,
  type EloOptions,
  type RatingKey,
} from './elo';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const MatchRecordSchema = z.object({
  model_a: z.string(),
  model_b: z.string(),
  old_rating_a: z.number(),
  old_rating_b: z.number(),
  new_rating_a: z.number(),
  new_rating_b: z.number(),
  score_a: z.number(),
  category: z.string().nullable().default(null),
});

export const EloStoreSchema = z.object({
  ratings: z.record(z.string(), z.number()).default({}),
  k_factor: z.number().int().positive().default(DEFAULT_K_FACTOR),
  starting_elo: z.number().default(DEFAULT_STARTING_RATING),
  promptset: z.string().optional(),
  match_history: z.array(MatchRecordSchema).default([]),
});

/** `model__category` → category key; anything else is an overall key. */
export function decodeRatingKey(name: string): RatingKey {
  const at = name.indexOf(CATEGORY_SEPARATOR);
  if (at === -1) return overallKey(name);
  return categoryKey(name.slice(0, at), name.slice(at + CATEGORY_SEPARATOR.length));
}

// ---------------------------------------------------------------------------
// Read / load / save
// ---------------------------------------------------------------------------

/**
 * Parse a stored ELO file. `promptset` is used only when the file has none.
 */
export async function readRatingStore(
  filePath: string,
  promptset?: string,
): Promise<Result<EloRatingSystem, LoadError>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return err({
      kind: isFileNotFound(error) ? 'not-found' : 'unreadable',
      path: filePath,
      message: String(error),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return err({ kind: 'unreadable', path: filePath, message: String(error) });
  }

  const parsed = EloStoreSchema.safeParse(json);
  if (!parsed.success) {
    return err({
      kind: 'invalid',
      path: filePath,
      message: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    });
  }

  const data = parsed.data;
  const system = new EloRatingSystem({
    kFactor: data.k_factor,
    startingRating: data.starting_elo,
    promptset: data.promptset ?? promptset,
  });

  try {
    for (const [name, rating] of Object.entries(data.ratings)) {
      system.setRating(decodeRatingKey(name), rating);
    }
  } catch (error) {
    return err({ kind: 'invalid', path: filePath, message: String(error) });
  }

  system.restoreHistory(
    data.match_history.map((m) => ({
      modelA: m.model_a,
      modelB: m.model_b,
      oldRatingA: m.old_rating_a,
      oldRatingB: m.old_rating_b,
      newRatingA: m.new_rating_a,
      newRatingB: m.new_rating_b,
      scoreA: m.score_a,
      category: m.category,
    })),
  );

  return ok(system);
}

/**
 * Load a rating store, or a fresh one when the file is missing or corrupt.
 * A missing file is expected on first run and only warned about.
 */
export async function loadRatings(
  filePath: string,
  promptset: string,
  defaults: Omit<EloOptions, 'promptset'> = {},
): Promise<EloRatingSystem> {
  const result = await readRatingStore(filePath, promptset);
  if (result.ok) {
    console.log(
      `[Elo] Loaded ${result.value.getAllModels().length} models from ${filePath} for promptset '${result.value.promptset}'`,
    );
    return result.value;
  }

  if (result.error.kind === 'not-found') {
    console.warn(`[Elo] Ratings file ${filePath} does not exist, starting fresh for promptset '${promptset}'`);
  } else {
    console.error(`[Elo] Error loading ratings, starting fresh: ${describeLoadError(result.error)}`);
  }
  return new EloRatingSystem({ ...defaults, promptset });
}

export async function saveRatings(system: EloRatingSystem, filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(system, null, 2), 'utf8');
  console.log(`[Elo] Saved ratings to ${filePath}`);
}
