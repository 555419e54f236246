/**
 * Shared CLI Utilities
 *
 * Argument parsing and small formatting helpers for the command handlers.
 */

/**
 * Parsed CLI arguments.
 * Named options are stored as key-value pairs.
 * Positional arguments are stored in _positional.
 */
export interface ParsedCliArgs {
  _positional: string[];
  [key: string]: string | boolean | string[];
}

export interface CommandResult {
  output: string;
  exitCode: number;
}

export type CommandHandler = (args: string[], options: ParsedCliArgs) => Promise<CommandResult>;

/**
 * Parse an integer CLI option with a fallback.
 * Returns fallback on undefined, boolean flags, or NaN.
 * Correctly handles 0 (valid).
 */
export function parseIntOpt(val: unknown, fallback: number): number {
  if (typeof val !== 'string') return fallback;
  const n = parseInt(val, 10);
  return Number.isNaN(n) ? fallback : n;
}

/**
 * Read a string option; boolean flags and missing keys give undefined.
 */
export function stringOpt(val: unknown): string | undefined {
  return typeof val === 'string' ? val : undefined;
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Parse CLI arguments, handling both --key=value and --key value formats.
 * Bare '--' separators are skipped. Boolean flags (no value) are set to true.
 * `--no-<flag>` sets `<flag>` to false. Keys listed in `booleanFlags`
 * never consume the following argument.
 */
export function parseCliArgs(argv: string[], booleanFlags: readonly string[] = []): ParsedCliArgs {
  const opts: ParsedCliArgs = { _positional: [] };
  const flags = new Set(booleanFlags);
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') continue;
    if (arg.startsWith('--')) {
      const raw = arg.slice(2);
      const eqIdx = raw.indexOf('=');
      if (eqIdx !== -1) {
        // --key=value format
        opts[raw.slice(0, eqIdx)] = raw.slice(eqIdx + 1);
      } else if (raw.startsWith('no-')) {
        opts[raw.slice(3)] = false;
      } else {
        // --key value or --flag format
        const next = argv[i + 1];
        if (!flags.has(raw) && next !== undefined && !next.startsWith('-')) {
          opts[raw] = next;
          i++;
        } else {
          opts[raw] = true;
        }
      }
    } else {
      opts._positional.push(arg);
    }
  }
  return opts;
}
