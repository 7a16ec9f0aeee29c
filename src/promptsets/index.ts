/**
 * PAIRWISE ARENA - Promptsets
 *
 * A promptset maps each category to its prompts and lives in
 * `<PROMPTSET_DIR>/<name>.json`. The engine only needs the category names;
 * the prompts are for the external comparison runner.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { describeLoadError, err, isFileNotFound, ok, type LoadError, type Result } from '../errors';
import type { Category } from '../outcomes';

export const PromptsetSchema = z.record(z.string().min(1), z.array(z.string()));
export type Promptset = z.infer<typeof PromptsetSchema>;

/** Categories of the bundled `basic1` promptset. */
export const BASIC1_CATEGORIES: readonly Category[] = [
  'General Knowledge',
  'Creative Writing',
  'Programming',
  'Reasoning',
  'Summarization',
];

export function promptsetPath(dir: string, name: string): string {
  return path.join(dir, `${name}.json`);
}

export async function readPromptset(dir: string, name: string): Promise<Result<Promptset, LoadError>> {
  const filePath = promptsetPath(dir, name);

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

  const parsed = PromptsetSchema.safeParse(json);
  if (!parsed.success) {
    return err({ kind: 'invalid', path: filePath, message: parsed.error.issues[0]?.message ?? 'invalid promptset' });
  }
  return ok(parsed.data);
}

/** Category names of a promptset, or the bundled basic1 list when it cannot be read. */
export async function getPromptCategories(dir: string, name: string): Promise<Category[]> {
  const result = await readPromptset(dir, name);
  if (result.ok) return Object.keys(result.value);

  console.warn(`[Promptsets] Falling back to basic1 categories: ${describeLoadError(result.error)}`);
  return [...BASIC1_CATEGORIES];
}
