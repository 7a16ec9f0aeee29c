/**
 * PAIRWISE ARENA - Outcome Store
 *
 * Adapter between persisted comparison records and the aggregates the
 * estimators need. Two implementations share one interface:
 *
 *   - FileOutcomeStore: JSON archive on disk, one file per pair per promptset
 *       <archiveDir>/<promptset>/comparisons/<a>__vs__<b>.json
 *   - InMemoryOutcomeStore: records held in a Map (tests, embedding)
 *
 * Missing or corrupt records come back as null, never as exceptions.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { err, ok, isFileNotFound, UsageError, type LoadError, type Result } from '../errors';
import { unorderedPair } from './pairs';
import {
  ComparisonRecordSchema,
  type Category,
  type ComparisonRecord,
  type ModelId,
  type OutcomeSet,
  type PairOutcome,
  type Scope,
} from './types';

// ─── Interface ────────────────────────────────────────────────────────────────

export interface OutcomeStore {
  /** Outcomes for the pair in scope, oriented as stored; null when never compared. */
  load(modelA: ModelId, modelB: ModelId, scope: Scope): Promise<OutcomeSet | null>;
  /** Every pair with a stored record in the scope's promptset. */
  listAll(scope: Scope): Promise<Array<[ModelId, ModelId]>>;
}

// ─── Record → OutcomeSet ─────────────────────────────────────────────────────

/**
 * Aggregate a record's per-category tallies for a scope.
 * Categories outside `scope.categories` (when given) are left out entirely.
 */
export function outcomeSetFromRecord(record: ComparisonRecord, scope: Scope): OutcomeSet {
  const allowed = scope.categories ? new Set<Category>(scope.categories) : null;
  const byCategory = new Map<Category, PairOutcome>();

  let winsA = 0;
  let winsB = 0;
  let ties = 0;

  for (const [category, tally] of Object.entries(record.categoryResults)) {
    if (allowed && !allowed.has(category)) continue;

    byCategory.set(category, {
      modelA: record.modelA,
      modelB: record.modelB,
      category,
      winsA: tally.winsA,
      winsB: tally.winsB,
      ties: tally.ties,
    });
    winsA += tally.winsA;
    winsB += tally.winsB;
    ties += tally.ties;
  }

  return {
    overall: { modelA: record.modelA, modelB: record.modelB, category: null, winsA, winsB, ties },
    byCategory,
  };
}

function validateRecord(record: ComparisonRecord): ComparisonRecord {
  const parsed = ComparisonRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new UsageError(`Invalid comparison record: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}

// ─── In-Memory Store ──────────────────────────────────────────────────────────

export class InMemoryOutcomeStore implements OutcomeStore {
  private records = new Map<string, ComparisonRecord>();

  constructor(records: ComparisonRecord[] = []) {
    for (const record of records) this.save(record);
  }

  private static keyFor(promptset: string, a: ModelId, b: ModelId): string {
    return `${promptset}\u0000${unorderedPair(a, b).key}`;
  }

  /** Store a record, superseding any earlier record for the same pair. */
  save(record: ComparisonRecord): void {
    const valid = validateRecord(record);
    const key = InMemoryOutcomeStore.keyFor(valid.promptset, valid.modelA, valid.modelB);
    // Delete first so a re-run moves to the end of the listing order.
    this.records.delete(key);
    this.records.set(key, valid);
  }

  async load(modelA: ModelId, modelB: ModelId, scope: Scope): Promise<OutcomeSet | null> {
    if (modelA === modelB) return null;
    const record = this.records.get(InMemoryOutcomeStore.keyFor(scope.promptset, modelA, modelB));
    return record ? outcomeSetFromRecord(record, scope) : null;
  }

  async listAll(scope: Scope): Promise<Array<[ModelId, ModelId]>> {
    const pairs: Array<[ModelId, ModelId]> = [];
    for (const record of this.records.values()) {
      if (record.promptset === scope.promptset) pairs.push([record.modelA, record.modelB]);
    }
    return pairs;
  }
}

// ─── File Store ───────────────────────────────────────────────────────────────

const PAIR_SEPARATOR = '__vs__';

function filenameSafe(model: ModelId): string {
  return model.replace(/[:/]/g, '_');
}

/** Archive filename for a pair; independent of argument order. */
export function comparisonFilename(modelA: ModelId, modelB: ModelId): string {
  const pair = unorderedPair(modelA, modelB);
  return `${filenameSafe(pair.first)}${PAIR_SEPARATOR}${filenameSafe(pair.second)}.json`;
}

/**
 * Split an archive filename into its two (filename-safe) model names.
 * Throws UsageError for anything that is not `<a>__vs__<b>.json`.
 */
export function parseComparisonFilename(filename: string): [string, string] {
  if (!filename.endsWith('.json')) {
    throw new UsageError(`Not a comparison file: ${filename}`);
  }
  const parts = filename.slice(0, -'.json'.length).split(PAIR_SEPARATOR);
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    throw new UsageError(`Invalid comparison filename format: ${filename}`);
  }
  return [parts[0], parts[1]];
}

export class FileOutcomeStore implements OutcomeStore {
  constructor(private readonly archiveDir: string) {}

  comparisonsDir(promptset: string): string {
    return path.join(this.archiveDir, promptset, 'comparisons');
  }

  recordPath(promptset: string, modelA: ModelId, modelB: ModelId): string {
    return path.join(this.comparisonsDir(promptset), comparisonFilename(modelA, modelB));
  }

  /** Write a record, superseding any earlier record for the same pair. */
  async save(record: ComparisonRecord): Promise<string> {
    const valid = validateRecord(record);
    const filePath = this.recordPath(valid.promptset, valid.modelA, valid.modelB);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(valid, null, 2), 'utf8');
    console.log(`[OutcomeStore] Saved comparison result to ${filePath}`);
    return filePath;
  }

  async load(modelA: ModelId, modelB: ModelId, scope: Scope): Promise<OutcomeSet | null> {
    if (modelA === modelB) return null;

    const filePath = this.recordPath(scope.promptset, modelA, modelB);
    const result = await this.readRecord(filePath);
    if (!result.ok) {
      if (result.error.kind !== 'not-found') {
        console.error(`[OutcomeStore] Ignoring ${result.error.kind} record ${filePath}: ${result.error.message}`);
      }
      return null;
    }

    // Distinct ids can share a filename once ':' and '/' are flattened.
    const requested = unorderedPair(modelA, modelB).key;
    const stored = unorderedPair(result.value.modelA, result.value.modelB).key;
    if (requested !== stored) {
      console.warn(`[OutcomeStore] ${filePath} holds ${stored}, not ${requested}`);
      return null;
    }

    return outcomeSetFromRecord(result.value, scope);
  }

  async listAll(scope: Scope): Promise<Array<[ModelId, ModelId]>> {
    const dir = this.comparisonsDir(scope.promptset);

    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (error) {
      if (isFileNotFound(error)) return [];
      throw error;
    }

    const files = entries.filter((name) => name.endsWith('.json')).sort();
    console.log(`[OutcomeStore] Found ${files.length} comparison files for promptset '${scope.promptset}'`);

    const pairs: Array<[ModelId, ModelId]> = [];
    for (const file of files) {
      try {
        parseComparisonFilename(file);
      } catch (error) {
        if (!(error instanceof UsageError)) throw error;
        console.warn(`[OutcomeStore] Skipping ${file}: ${error.message}`);
        continue;
      }

      const filePath = path.join(dir, file);
      const result = await this.readRecord(filePath);
      if (!result.ok) {
        console.error(`[OutcomeStore] Skipping ${result.error.kind} record ${filePath}: ${result.error.message}`);
        continue;
      }
      pairs.push([result.value.modelA, result.value.modelB]);
    }
    return pairs;
  }

  private async readRecord(filePath: string): Promise<Result<ComparisonRecord, LoadError>> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      const kind = isFileNotFound(error) ? 'not-found' : 'unreadable';
      return err({ kind, path: filePath, message: String(error) });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      return err({ kind: 'unreadable', path: filePath, message: String(error) });
    }

    const parsed = ComparisonRecordSchema.safeParse(json);
    if (!parsed.success) {
      return err({
        kind: 'invalid',
        path: filePath,
        message: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      });
    }
    return ok(parsed.data);
  }
}
