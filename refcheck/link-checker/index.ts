/**
 * Link checker: public API.
 *
 * The engine (`verify`, `verifyOne`, `Outcome`) classifies pre-parsed links
 * through a chain of verifiers and a shared cache. Collectors, verifiers,
 * caches and reporting are the pieces the `check-links` command wires up.
 */

export type {
  Link, Location, LocatedLink, IgnoreReason, ValidationResult, ResultKind,
  Cache, CacheEntry, RecordingCache, Verifier, VerifierFn,
} from './types.ts';
export { VALID, UNSUPPORTED, ignored, canRecord, toVerifier } from './types.ts';

export type { OutcomeEntry } from './outcome.ts';
export { Outcome, compareEntries, reduceOutcomes } from './outcome.ts';

export type { LinkSource, VerifyOptions } from './verify.ts';
export { DEFAULT_CONCURRENCY, verify, verifyOne } from './verify.ts';

export type { CacheTtl, LinkCacheData } from './cache.ts';
export { DEFAULT_CACHE_TTL, FileCache, MemoryCache } from './cache.ts';

export type { FileVerifierOptions } from './file-verifier.ts';
export { candidatePaths, createFileVerifier, resolveLinkPath } from './file-verifier.ts';

export type { FetchLike, WebVerifierOptions } from './web-verifier.ts';
export { createWebVerifier, matchesDomainList } from './web-verifier.ts';

export type { CollectOptions, ExtractedLink } from './collectors.ts';
export { collectLinks, extractLinks, findDocuments } from './collectors.ts';

export type { RefcheckReport, ReportEntry, ReportSummary } from './report.ts';
export { generateReport, isFailure, printSummary } from './report.ts';
