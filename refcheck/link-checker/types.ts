/**
 * Types for the link-checker pipeline.
 */

/** A parsed reference whose validity is to be determined. */
export interface Link {
  readonly href: string;
  readonly text?: string;
  /** Directory a relative path resolves against (the source document's directory). */
  readonly base?: string;
}

/** Where a link was found. Never inspected by verifiers. */
export interface Location {
  readonly file: string;
  readonly line?: number;
  readonly column?: number;
}

export type LocatedLink = readonly [Location, Link];

export type IgnoreReason = 'policy' | 'unreachable' | 'error';

export type ValidationResult =
  | { readonly kind: 'valid' }
  | { readonly kind: 'unsupported' }
  | { readonly kind: 'ignored'; readonly reason: IgnoreReason; readonly detail?: string };

export type ResultKind = ValidationResult['kind'];

export const VALID: ValidationResult = { kind: 'valid' };
export const UNSUPPORTED: ValidationResult = { kind: 'unsupported' };

export function ignored(reason: IgnoreReason, detail?: string): ValidationResult {
  return detail === undefined ? { kind: 'ignored', reason } : { kind: 'ignored', reason, detail };
}

// ── Cache ────────────────────────────────────────────────────────────────────

/**
 * Shared lookup of already-confirmed links. `true` means known valid;
 * `false` and `undefined` both mean "not determined".
 */
export interface Cache {
  isValid(key: string): boolean | undefined | Promise<boolean | undefined>;
}

export interface CacheEntry {
  ok: boolean;
  status?: number;
  error?: string;
  checkedAt: number;
}

/** A cache that verifiers may write their results into. */
export interface RecordingCache extends Cache {
  record(key: string, entry: Omit<CacheEntry, 'checkedAt'>): void;
}

export function canRecord(cache: Cache): cache is RecordingCache {
  return 'record' in cache && typeof cache.record === 'function';
}

// ── Verifiers ────────────────────────────────────────────────────────────────

export type VerifierFn = (link: Link, cache: Cache) => ValidationResult | Promise<ValidationResult>;

/**
 * Something used to check whether a link is valid.
 *
 * Implementations must return `unsupported` quickly for links they do not
 * understand so the next verifier in the chain can be tried, and should turn
 * their own failures into `ignored` rather than throwing.
 */
export interface Verifier {
  verify(link: Link, cache: Cache): ValidationResult | Promise<ValidationResult>;
}

export function toVerifier(verifier: Verifier | VerifierFn): Verifier {
  return typeof verifier === 'function' ? { verify: verifier } : verifier;
}
