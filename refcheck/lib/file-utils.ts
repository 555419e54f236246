/**
 * File Utilities
 *
 * Document discovery for the link collector.
 */

import { existsSync, readdirSync, statSync } from 'fs';
import type { Stats } from 'fs';
import { join } from 'path';

export interface FindFilesOptions {
  /** File extensions to collect, including the dot. */
  extensions: readonly string[];
  /** Path segments to skip, matched against each directory or file name. */
  exclude?: readonly string[];
  /** Called with the path and error message when an entry cannot be read; the entry is skipped. */
  onUnreadable?: (dir: string, message: string) => void;
}

/**
 * Find files matching specific extensions recursively.
 * Results are sorted so repeated runs see documents in the same order.
 */
export function findFiles(dir: string, options: FindFilesOptions, results: string[] = []): string[] {
  if (!existsSync(dir)) return results;

  const exclude = new Set(options.exclude ?? []);
  let names: string[];
  try {
    names = readdirSync(dir).sort();
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    options.onUnreadable?.(dir, message);
    return results;
  }

  for (const name of names) {
    if (exclude.has(name)) continue;
    const filePath = join(dir, name);
    let stat: Stats;
    try {
      stat = statSync(filePath);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      options.onUnreadable?.(filePath, message);
      continue;
    }
    if (stat.isDirectory()) {
      findFiles(filePath, options, results);
    } else if (options.extensions.some(ext => name.endsWith(ext))) {
      results.push(filePath);
    }
  }
  return results;
}
