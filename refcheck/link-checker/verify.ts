/**
 * Link verification: dispatch and concurrent orchestration.
 *
 * `verifyOne` decides a single link: cache first, then each verifier in the
 * order given until one is decisive. `verify` runs a pool of workers over a
 * shared (possibly lazy) input, each folding into its own partial Outcome,
 * then reduces the partials pairwise.
 */

import { createLogger } from '../lib/output.ts';
import type { Logger } from '../lib/output.ts';
import { Outcome, reduceOutcomes } from './outcome.ts';
import type { OutcomeEntry } from './outcome.ts';
import { UNSUPPORTED, VALID, ignored, toVerifier } from './types.ts';
import type {
  Cache, Link, LocatedLink, Location, ValidationResult, Verifier, VerifierFn,
} from './types.ts';

// ── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_CONCURRENCY = 20;

// ── Types ────────────────────────────────────────────────────────────────────

export type LinkSource = Iterable<LocatedLink> | AsyncIterable<LocatedLink>;

export interface VerifyOptions {
  /** Number of concurrent workers. */
  concurrency?: number;
  /** Called after each link is classified. */
  onResult?: (location: Location, link: Link, result: ValidationResult) => void;
  logger?: Logger;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Dispatch ─────────────────────────────────────────────────────────────────

async function lookupCache(cache: Cache, key: string, logger: Logger): Promise<boolean> {
  try {
    return (await cache.isValid(key)) === true;
  } catch (err: unknown) {
    logger.warn(`  Warning: cache lookup failed for ${key}: ${errorMessage(err)}`);
    return false;
  }
}

/** Classify a single link. */
export async function verifyOne(
  link: Link,
  verifiers: ReadonlyArray<Verifier | VerifierFn>,
  cache: Cache,
  logger: Logger = createLogger(),
): Promise<ValidationResult> {
  if (await lookupCache(cache, link.href, logger)) {
    return VALID;
  }

  for (const candidate of verifiers) {
    let result: ValidationResult;
    try {
      result = await toVerifier(candidate).verify(link, cache);
    } catch (err: unknown) {
      const message = errorMessage(err);
      logger.error(`  Verifier failed on ${link.href}: ${message}`);
      return ignored('error', message);
    }
    if (result.kind !== 'unsupported') return result;
  }

  return UNSUPPORTED;
}

// ── Orchestration ────────────────────────────────────────────────────────────

function isAsyncIterable(source: LinkSource): source is AsyncIterable<LocatedLink> {
  return Symbol.asyncIterator in source;
}

/**
 * Pull items from a shared iterator. JavaScript runs each `next()` to
 * completion before another worker can call it, so every item is claimed
 * exactly once.
 */
function claimer(source: LinkSource): () => Promise<IteratorResult<LocatedLink>> {
  if (isAsyncIterable(source)) {
    const iterator = source[Symbol.asyncIterator]();
    return () => iterator.next();
  }
  const iterator = source[Symbol.iterator]();
  let done = false;
  return async () => {
    // Stop asking once any worker has seen the end
    if (done) return { done: true, value: undefined };
    const next = iterator.next();
    if (next.done) done = true;
    return next;
  };
}

/**
 * Verify every (location, link) pair and return one Outcome covering each
 * pair exactly once.
 */
export async function verify(
  links: LinkSource,
  verifiers: ReadonlyArray<Verifier | VerifierFn>,
  cache: Cache,
  options: VerifyOptions = {},
): Promise<Outcome> {
  const requested = options.concurrency ?? DEFAULT_CONCURRENCY;
  const concurrency = Math.max(1, Math.floor(Number.isFinite(requested) ? requested : DEFAULT_CONCURRENCY));
  const logger = options.logger ?? createLogger();
  const chain = verifiers.map(toVerifier);
  const next = claimer(links);

  async function worker(): Promise<Outcome> {
    const partial: OutcomeEntry[] = [];
    for (;;) {
      const item = await next();
      if (item.done) break;

      const [location, link] = item.value;
      const result = await verifyOne(link, chain, cache, logger);
      partial.push({ location, link, result });
      options.onResult?.(location, link, result);
    }
    return Outcome.fromEntries(partial);
  }

  const workers: Promise<Outcome>[] = [];
  for (let i = 0; i < concurrency; i++) {
    workers.push(worker());
  }
  return reduceOutcomes(await Promise.all(workers));
}
