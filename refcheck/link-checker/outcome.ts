/**
 * Outcome: the aggregate classification of every link in one run.
 *
 * Entries are kept in three collections keyed by result kind, each sorted in
 * a canonical order over every field. Two Outcomes holding the same multiset
 * of entries therefore have identical layout, which makes `merge`
 * commutative as well as associative, with `Outcome.empty()` as identity.
 */

import type { Link, Location, ResultKind, ValidationResult } from './types.ts';

export interface OutcomeEntry {
  readonly location: Location;
  readonly link: Link;
  readonly result: ValidationResult;
}

// ── Canonical ordering ───────────────────────────────────────────────────────

function cmpStr(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// Absent sorts before present so `undefined` and '' / 0 never tie.
function cmpOptStr(a: string | undefined, b: string | undefined): number {
  if (a === undefined || b === undefined) return a === b ? 0 : a === undefined ? -1 : 1;
  return cmpStr(a, b);
}

function cmpOptNum(a: number | undefined, b: number | undefined): number {
  if (a === undefined || b === undefined) return a === b ? 0 : a === undefined ? -1 : 1;
  return a - b;
}

function resultKey(result: ValidationResult): [string, string | undefined] {
  return result.kind === 'ignored' ? [result.reason, result.detail] : ['', undefined];
}

export function compareEntries(a: OutcomeEntry, b: OutcomeEntry): number {
  const [reasonA, detailA] = resultKey(a.result);
  const [reasonB, detailB] = resultKey(b.result);
  return (
    cmpStr(a.location.file, b.location.file) ||
    cmpOptNum(a.location.line, b.location.line) ||
    cmpOptNum(a.location.column, b.location.column) ||
    cmpStr(a.link.href, b.link.href) ||
    cmpOptStr(a.link.text, b.link.text) ||
    cmpOptStr(a.link.base, b.link.base) ||
    cmpStr(a.result.kind, b.result.kind) ||
    cmpStr(reasonA, reasonB) ||
    cmpOptStr(detailA, detailB)
  );
}

function mergeSorted(left: readonly OutcomeEntry[], right: readonly OutcomeEntry[]): OutcomeEntry[] {
  if (left.length === 0) return [...right];
  if (right.length === 0) return [...left];

  const out = new Array<OutcomeEntry>(left.length + right.length);
  let i = 0;
  let j = 0;
  let k = 0;
  while (i < left.length && j < right.length) {
    out[k++] = compareEntries(left[i], right[j]) <= 0 ? left[i++] : right[j++];
  }
  while (i < left.length) out[k++] = left[i++];
  while (j < right.length) out[k++] = right[j++];
  return out;
}

/** Index of the first element that sorts after `entry`. */
function upperBound(entries: readonly OutcomeEntry[], entry: OutcomeEntry): number {
  let lo = 0;
  let hi = entries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compareEntries(entries[mid], entry) <= 0) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

// ── Outcome ──────────────────────────────────────────────────────────────────

export class Outcome {
  private static readonly EMPTY = new Outcome([], [], []);

  private constructor(
    readonly valid: readonly OutcomeEntry[],
    readonly unsupported: readonly OutcomeEntry[],
    readonly ignored: readonly OutcomeEntry[],
  ) {
    Object.freeze(valid);
    Object.freeze(unsupported);
    Object.freeze(ignored);
  }

  static empty(): Outcome {
    return Outcome.EMPTY;
  }

  /** Build an Outcome from entries in any order. */
  static fromEntries(entries: Iterable<OutcomeEntry>): Outcome {
    const buckets: Record<ResultKind, OutcomeEntry[]> = { valid: [], unsupported: [], ignored: [] };
    for (const entry of entries) {
      buckets[entry.result.kind].push(entry);
    }
    return new Outcome(
      buckets.valid.sort(compareEntries),
      buckets.unsupported.sort(compareEntries),
      buckets.ignored.sort(compareEntries),
    );
  }

  static merge(left: Outcome, right: Outcome): Outcome {
    if (left.size === 0) return right;
    if (right.size === 0) return left;
    return new Outcome(
      mergeSorted(left.valid, right.valid),
      mergeSorted(left.unsupported, right.unsupported),
      mergeSorted(left.ignored, right.ignored),
    );
  }

  withResult(location: Location, link: Link, result: ValidationResult): Outcome {
    const entry: OutcomeEntry = { location, link, result };
    const bucket = this.ofKind(result.kind);
    const next = [...bucket];
    next.splice(upperBound(bucket, entry), 0, entry);

    return new Outcome(
      result.kind === 'valid' ? next : this.valid,
      result.kind === 'unsupported' ? next : this.unsupported,
      result.kind === 'ignored' ? next : this.ignored,
    );
  }

  ofKind(kind: ResultKind): readonly OutcomeEntry[] {
    switch (kind) {
      case 'valid': return this.valid;
      case 'unsupported': return this.unsupported;
      case 'ignored': return this.ignored;
    }
  }

  get size(): number {
    return this.valid.length + this.unsupported.length + this.ignored.length;
  }

  counts(): Record<ResultKind, number> {
    return {
      valid: this.valid.length,
      unsupported: this.unsupported.length,
      ignored: this.ignored.length,
    };
  }

  /** Every entry: valid first, then unsupported, then ignored. */
  entries(): OutcomeEntry[] {
    return [...this.valid, ...this.unsupported, ...this.ignored];
  }

  equals(other: Outcome): boolean {
    const kinds: ResultKind[] = ['valid', 'unsupported', 'ignored'];
    return kinds.every((kind) => {
      const a = this.ofKind(kind);
      const b = other.ofKind(kind);
      return a.length === b.length && a.every((entry, i) => compareEntries(entry, b[i]) === 0);
    });
  }
}

/** Combine partial Outcomes pairwise, as a balanced tree. */
export function reduceOutcomes(outcomes: readonly Outcome[]): Outcome {
  let level = [...outcomes];
  if (level.length === 0) return Outcome.empty();

  while (level.length > 1) {
    const next: Outcome[] = [];
    for (let i = 0; i < level.length; i += 2) {
      next.push(i + 1 < level.length ? Outcome.merge(level[i], level[i + 1]) : level[i]);
    }
    level = next;
  }
  return level[0];
}
