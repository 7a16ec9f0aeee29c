/**
 * PAIRWISE ARENA - Error Taxonomy
 *
 * Missing data is never an exception in this codebase: lookups return null,
 * empty collections, false or Infinity and callers branch on those. Only
 * misuse of an API raises, and only persisted-state loading uses Result.
 */

// ─── Usage Errors ─────────────────────────────────────────────────────────────

/**
 * Raised when an API is called in an invalid state or with arguments that
 * can never be valid (querying a model before fitting it, a malformed
 * archive filename, negative match counts).
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ─── Result ───────────────────────────────────────────────────────────────────

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ─── Load Errors ──────────────────────────────────────────────────────────────

/**
 * Why a persisted file could not be turned into a value.
 *
 * - not-found:  the file does not exist (expected on first run)
 * - unreadable: the file exists but could not be read or parsed as JSON
 * - invalid:    the JSON does not match the expected schema
 */
export type LoadErrorKind = 'not-found' | 'unreadable' | 'invalid';

export interface LoadError {
  kind: LoadErrorKind;
  path: string;
  message: string;
}

export function describeLoadError(error: LoadError): string {
  return `${error.kind}: ${error.path} (${error.message})`;
}

/** Node fs errors carry a string `code`; anything else is reported as unreadable. */
export function isFileNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
