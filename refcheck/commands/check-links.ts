/**
 * Check-Links Command Handler
 *
 * Finds documents, extracts their links and classifies every link through
 * the path and web verifiers, using the on-disk result cache.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import type { CommandResult, ParsedCliArgs } from '../lib/cli.ts';
import { formatDuration, parseIntOpt, stringOpt } from '../lib/cli.ts';
import { loadConfig } from '../lib/config.ts';
import { createLogger, createProgress, formatCount } from '../lib/output.ts';
import type { Logger } from '../lib/output.ts';
import {
  FileCache,
  MemoryCache,
  collectLinks,
  createFileVerifier,
  createWebVerifier,
  findDocuments,
  generateReport,
  printSummary,
  verify,
} from '../link-checker/index.ts';
import type { FetchLike, RecordingCache } from '../link-checker/index.ts';

/** Flags that never take a value. */
export const BOOLEAN_FLAGS = ['verbose', 'clear-cache', 'strict', 'ci', 'help', 'report'] as const;

export interface CheckLinksDeps {
  cwd?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

export async function runCheckLinks(
  args: string[],
  options: ParsedCliArgs,
  deps: CheckLinksDeps = {},
): Promise<CommandResult> {
  const cwd = deps.cwd ?? process.cwd();
  const log = deps.logger ?? createLogger(options.ci === true);
  const verbose = options.verbose === true;
  const started = Date.now();

  const config = loadConfig(stringOpt(options.config) ?? process.env.REFCHECK_CONFIG, cwd);
  const root = resolve(cwd, stringOpt(options.root) ?? config.root);
  const concurrency = parseIntOpt(options.concurrency, config.concurrency);
  const timeoutMs = parseIntOpt(options.timeout, config.timeoutMs);

  if (concurrency < 1) {
    return { output: `Error: --concurrency must be at least 1 (got ${concurrency})`, exitCode: 1 };
  }

  log.heading('Link Check\n');
  log.log(`  Root: ${root}`);
  log.log(`  Concurrency: ${concurrency}`);
  log.log('');

  // Load or clear cache
  let cache: RecordingCache;
  let fileCache: FileCache | null = null;
  if (options.cache === false) {
    cache = new MemoryCache();
    log.dim('  Cache disabled.\n');
  } else {
    fileCache = FileCache.load(resolve(root, config.cacheFile));
    if (options['clear-cache'] === true) {
      fileCache.clear();
      log.log('  Cache cleared.\n');
    } else if (fileCache.size > 0) {
      log.log(`  Loaded ${fileCache.size} cached results.\n`);
    }
    cache = fileCache;
  }

  // Collect documents
  const onUnreadable = (path: string, message: string): void => {
    log.warn(`  Warning: could not read ${path}: ${message}`);
  };
  const paths = args.length > 0
    ? args.map(p => resolve(cwd, p))
    : config.include.map(p => resolve(root, p));
  const files = findDocuments(paths, {
    extensions: config.extensions,
    exclude: config.exclude,
    onUnreadable,
  });
  log.log(`  Found ${formatCount(files.length, 'document')}\n`);

  // Check links
  const verifiers = [
    createFileVerifier({ root, extensions: config.extensions }),
    createWebVerifier({ ignoredDomains: config.ignoredDomains, timeoutMs, fetch: deps.fetch }),
  ];
  const progress = createProgress(null, '  Checked', log.ciMode || verbose);

  const outcome = await verify(collectLinks(files, { root, onUnreadable }), verifiers, cache, {
    concurrency,
    logger: log,
    onResult: (location, link, result) => {
      progress.update();
      if (!verbose) return;
      const where = location.line !== undefined ? `${location.file}:${location.line}` : location.file;
      const label = result.kind === 'ignored' ? `ignored (${result.reason})` : result.kind;
      log.dim(`  [${label}] ${link.href}  ${where}`);
    },
  });
  progress.done();

  if (fileCache) {
    const saveError = fileCache.save();
    if (saveError) log.warn(`  Warning: could not save link cache: ${saveError}`);
  }

  const report = generateReport(outcome);
  printSummary(report, log, verbose);

  // Save JSON report
  if (options.report !== undefined && options.report !== false) {
    const reportFile = typeof options.report === 'string'
      ? resolve(cwd, options.report)
      : resolve(root, config.reportFile);
    mkdirSync(dirname(reportFile), { recursive: true });
    writeFileSync(reportFile, JSON.stringify(report, null, 2));
    log.log(`\n  Report saved to: ${reportFile}`);
  }

  const { summary } = report;
  const failed = summary.unreachable > 0 || summary.errors > 0
    || (options.strict === true && summary.unsupported > 0);
  const broken = summary.unreachable + summary.errors;
  if (broken > 0) {
    log.error(`\n  ${formatCount(broken, 'broken link')} found`);
  } else if (failed) {
    log.error(`\n  ${formatCount(summary.unsupported, 'unsupported link')} found (--strict)`);
  } else {
    log.success('\n  All links OK');
  }

  log.dim(`  Finished in ${formatDuration(Date.now() - started)}`);
  return { output: '', exitCode: failed ? 1 : 0 };
}

export function getHelp(): string {
  return `
Check-Links - Verify links in Markdown documents

Usage:
  refcheck [paths...] [options]

Paths default to the "include" list of the config file, resolved against the root.

Options:
  --config=<file>     Config file (default: refcheck.config.yaml, or $REFCHECK_CONFIG)
  --root=<dir>        Directory that root-absolute links resolve against
  --concurrency=<n>   Number of concurrent checks (default: 20)
  --timeout=<ms>      Per-request timeout for web links (default: 15000)
  --report[=<file>]   Write a JSON report (default: .cache/refcheck-report.json)
  --verbose           Show every link as it is checked
  --clear-cache       Ignore and overwrite cached results
  --no-cache          Do not read or write the cache file
  --strict            Also fail when links are unsupported
  --ci                Plain output without colors or progress
  --help              Show this help

Exit code is 1 when any link is unreachable or a verifier failed.

Examples:
  refcheck docs/ README.md
  refcheck --report --verbose
  refcheck --no-cache --concurrency=5
`;
}
