/**
 * Output Utilities
 *
 * Terminal colors, formatting, and logging utilities.
 * Supports CI mode (no colors) via --ci flag or CI=true environment variable.
 */

export interface Colors {
  red: string;
  green: string;
  yellow: string;
  blue: string;
  dim: string;
  bold: string;
  reset: string;
}

export interface Logger {
  ciMode: boolean;
  log: (...args: unknown[]) => void;
  error: (msg: string) => void;
  warn: (msg: string) => void;
  success: (msg: string) => void;
  dim: (msg: string) => void;
  heading: (msg: string) => void;
}

export interface ProgressTracker {
  update: (increment?: number) => void;
  done: () => void;
}

/**
 * Detect if running in CI mode
 */
export function isCI(): boolean {
  return process.argv.includes('--ci') || process.env.CI === 'true';
}

/**
 * Get color codes (empty strings in CI mode)
 */
export function getColors(ciMode: boolean = isCI()): Colors {
  if (ciMode) {
    return { red: '', green: '', yellow: '', blue: '', dim: '', bold: '', reset: '' };
  }

  return {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    dim: '\x1b[2m',
    bold: '\x1b[1m',
    reset: '\x1b[0m',
  };
}

/**
 * Create a logger with color support
 */
export function createLogger(ciMode: boolean = isCI()): Logger {
  const c = getColors(ciMode);

  return {
    ciMode,

    log: (...args: unknown[]) => console.log(...args),
    error: (msg: string) => console.log(`${c.red}${msg}${c.reset}`),
    warn: (msg: string) => console.log(`${c.yellow}${msg}${c.reset}`),
    success: (msg: string) => console.log(`${c.green}${msg}${c.reset}`),
    dim: (msg: string) => console.log(`${c.dim}${msg}${c.reset}`),

    heading: (msg: string) => console.log(`${c.bold}${c.blue}${msg}${c.reset}`),
  };
}

/**
 * Format a count with proper pluralization
 */
export function formatCount(count: number, singular: string, plural: string | null = null): string {
  const form = count === 1 ? singular : (plural || singular + 's');
  return `${count} ${form}`;
}

/**
 * Create a progress indicator for long operations.
 * Writes nothing in CI mode, where carriage-return rewrites just add noise.
 */
export function createProgress(
  total: number | null,
  label: string = 'Processing',
  ciMode: boolean = isCI(),
): ProgressTracker {
  let current = 0;

  return {
    update: (increment: number = 1) => {
      current += increment;
      if (!ciMode) {
        const of = total === null ? '' : `/${total}`;
        process.stdout.write(`\r${label}: ${current}${of}`);
      }
    },
    done: () => {
      if (!ciMode && current > 0) {
        process.stdout.write('\n');
      }
    },
  };
}
