/**
 * Report generation and output formatting for link check results.
 */

import type { Logger } from '../lib/output.ts';
import type { Outcome, OutcomeEntry } from './outcome.ts';
import type { IgnoreReason } from './types.ts';

export interface ReportEntry {
  href: string;
  file: string;
  line?: number;
  column?: number;
  text?: string;
  reason?: IgnoreReason;
  detail?: string;
}

export interface ReportSummary {
  total: number;
  valid: number;
  unsupported: number;
  /** All ignored links; `unreachable` and `errors` are subsets of this. */
  ignored: number;
  unreachable: number;
  errors: number;
}

export interface RefcheckReport {
  timestamp: string;
  summary: ReportSummary;
  unsupported: ReportEntry[];
  ignored: ReportEntry[];
}

const MAX_FAILURES_SHOWN = 50;
const MAX_OTHERS_SHOWN = 20;
const MAX_SOURCES_SHOWN = 3;

function toReportEntry({ location, link, result }: OutcomeEntry): ReportEntry {
  const entry: ReportEntry = { href: link.href, file: location.file };
  if (location.line !== undefined) entry.line = location.line;
  if (location.column !== undefined) entry.column = location.column;
  if (link.text !== undefined) entry.text = link.text;
  if (result.kind === 'ignored') {
    entry.reason = result.reason;
    if (result.detail !== undefined) entry.detail = result.detail;
  }
  return entry;
}

/** Whether an entry counts as a broken link rather than a deliberate skip. */
export function isFailure(entry: ReportEntry): boolean {
  return entry.reason === 'unreachable' || entry.reason === 'error';
}

/** Generate a structured report from an Outcome. */
export function generateReport(outcome: Outcome, now: Date = new Date()): RefcheckReport {
  const unsupported = outcome.unsupported.map(toReportEntry);
  const ignored = outcome.ignored.map(toReportEntry);

  const summary: ReportSummary = {
    total: outcome.size,
    valid: outcome.valid.length,
    unsupported: unsupported.length,
    ignored: ignored.length,
    unreachable: ignored.filter(e => e.reason === 'unreachable').length,
    errors: ignored.filter(e => e.reason === 'error').length,
  };

  return {
    timestamp: now.toISOString(),
    summary,
    unsupported,
    ignored,
  };
}

// ── Console output ───────────────────────────────────────────────────────────

function formatSource(entry: ReportEntry): string {
  return entry.line !== undefined ? `${entry.file}:${entry.line}` : entry.file;
}

/** Group entries that share an href and detail, keeping first-seen order. */
function groupByHref(entries: ReportEntry[]): Array<{ href: string; detail?: string; sources: ReportEntry[] }> {
  const groups = new Map<string, { href: string; detail?: string; sources: ReportEntry[] }>();
  for (const entry of entries) {
    const key = `${entry.href}\n${entry.detail ?? ''}`;
    const group = groups.get(key);
    if (group) {
      group.sources.push(entry);
    } else {
      groups.set(key, { href: entry.href, detail: entry.detail, sources: [entry] });
    }
  }
  return Array.from(groups.values());
}

function printGroups(
  logger: Logger,
  title: string,
  entries: ReportEntry[],
  limit: number,
): void {
  const groups = groupByHref(entries);
  if (groups.length === 0) return;

  logger.log(`\n  ${title} (${groups.length}):\n`);
  for (const group of groups.slice(0, limit)) {
    logger.log(`  - ${group.href}`);
    if (group.detail) logger.log(`    Status: ${group.detail}`);
    for (const src of group.sources.slice(0, MAX_SOURCES_SHOWN)) {
      logger.log(`    Source: ${formatSource(src)}`);
    }
    if (group.sources.length > MAX_SOURCES_SHOWN) {
      logger.log(`    ... and ${group.sources.length - MAX_SOURCES_SHOWN} more sources`);
    }
  }
  if (groups.length > limit) {
    logger.log(`  ... and ${groups.length - limit} more`);
  }
}

/** Print a human-readable summary. Skipped and unsupported links only when verbose. */
export function printSummary(report: RefcheckReport, logger: Logger, verbose: boolean = false): void {
  const { summary } = report;

  logger.log('\n' + '='.repeat(60));
  logger.log('  Link Check Results');
  logger.log('='.repeat(60));
  logger.log(`  Total links:   ${summary.total}`);
  logger.log(`  Valid:         ${summary.valid}`);
  logger.log(`  Unsupported:   ${summary.unsupported}`);
  logger.log(`  Ignored:       ${summary.ignored}`);
  logger.log(`    Unreachable: ${summary.unreachable}`);
  logger.log(`    Errors:      ${summary.errors}`);
  logger.log('='.repeat(60));

  const failures = report.ignored.filter(isFailure);
  printGroups(logger, 'Broken links', failures, MAX_FAILURES_SHOWN);

  if (verbose) {
    printGroups(logger, 'Skipped links', report.ignored.filter(e => !isFailure(e)), MAX_OTHERS_SHOWN);
    printGroups(logger, 'Unsupported links', report.unsupported, MAX_OTHERS_SHOWN);
  }
}
