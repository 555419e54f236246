/**
 * refcheck configuration: `refcheck.config.yaml`, validated with Zod.
 *
 * Every key is optional; missing keys take the defaults below. CLI flags are
 * applied on top by the command handler.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const DEFAULT_CONFIG_FILE = 'refcheck.config.yaml';

/** Domains that block all automated access. */
export const DEFAULT_IGNORED_DOMAINS = [
  'twitter.com', 'x.com', 'linkedin.com', 'facebook.com', 't.co',
];

export const RefcheckConfigSchema = z.object({
  root: z.string().min(1).default('.'),
  include: z.array(z.string().min(1)).min(1).default(['.']),
  exclude: z.array(z.string().min(1)).default(['node_modules', '.git']),
  extensions: z.array(z.string().startsWith('.')).min(1).default(['.md', '.mdx']),
  concurrency: z.number().int().positive().default(20),
  timeoutMs: z.number().int().positive().default(15_000),
  ignoredDomains: z.array(z.string().min(1)).default(DEFAULT_IGNORED_DOMAINS),
  cacheFile: z.string().min(1).default('.cache/refcheck-cache.json'),
  reportFile: z.string().min(1).default('.cache/refcheck-report.json'),
}).strict();

export type RefcheckConfig = z.infer<typeof RefcheckConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string, readonly file?: string) {
    super(file ? `${file}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

/** Turn Zod issues into `path: message` lines. */
function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Validate an already-parsed config value. `null`/`undefined` (an empty
 * YAML file) yields the defaults.
 */
export function parseConfig(raw: unknown, file?: string): RefcheckConfig {
  const result = RefcheckConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`invalid configuration\n${formatIssues(result.error)}`, file);
  }
  return result.data;
}

/**
 * Load the config file. An explicitly named file must exist; the default
 * file is optional.
 */
export function loadConfig(path?: string, cwd: string = process.cwd()): RefcheckConfig {
  const file = resolve(cwd, path ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(file)) {
    if (path) throw new ConfigError('config file not found', file);
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(file, 'utf-8'));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`could not parse YAML: ${message}`, file);
  }
  return parseConfig(raw, file);
}
