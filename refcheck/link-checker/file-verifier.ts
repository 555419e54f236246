/**
 * Path verifier: checks that relative, root-absolute and `file:` links
 * point at something on disk.
 *
 * Extension-less links are resolved against the configured extensions:
 * `guide/setup` matches `guide/setup.md` or `guide/setup/index.md`.
 */

import { existsSync } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { UNSUPPORTED, VALID, ignored } from './types.ts';
import type { Link, ValidationResult, Verifier } from './types.ts';

const SCHEME_RE = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;

export interface FileVerifierOptions {
  /** Directory that root-absolute links (`/docs/x`) resolve against. */
  root: string;
  /** Extensions tried for extension-less links. */
  extensions?: readonly string[];
}

/** Strip `#fragment` and `?query`, then percent-decode. */
function cleanPath(href: string): string {
  const path = href.split('#')[0].split('?')[0];
  try {
    return decodeURIComponent(path);
  } catch {
    return path;
  }
}

/**
 * Map a link to the absolute path it names, or null when this verifier
 * does not handle the link.
 */
export function resolveLinkPath(link: Link, root: string): string | null {
  const { href } = link;
  if (href === '' || href.startsWith('#')) return null;

  if (href.startsWith('file:')) {
    // file:///abs and file:/abs are URLs; file:rel is relative to the document
    if (href.startsWith('file:/')) {
      try {
        return fileURLToPath(href.split('#')[0].split('?')[0]);
      } catch {
        return null;
      }
    }
    return resolveRelative(cleanPath(href.slice('file:'.length)), link.base ?? root, root);
  }

  if (SCHEME_RE.test(href)) return null;
  return resolveRelative(cleanPath(href), link.base ?? root, root);
}

function resolveRelative(path: string, base: string, root: string): string {
  if (path.startsWith('/')) return join(root, path);
  return isAbsolute(path) ? path : resolve(base, path);
}

/** Paths to try for a resolved link, most specific first. */
export function candidatePaths(path: string, extensions: readonly string[]): string[] {
  const trimmed = path.replace(/[\\/]+$/, '');
  return [
    path,
    ...extensions.map(ext => trimmed + ext),
    ...extensions.map(ext => join(trimmed, 'index' + ext)),
  ];
}

export function createFileVerifier(options: FileVerifierOptions): Verifier {
  const root = resolve(options.root);
  const extensions = options.extensions ?? ['.md', '.mdx'];

  return {
    verify(link: Link): ValidationResult {
      const path = resolveLinkPath(link, root);
      if (path === null) return UNSUPPORTED;

      // Template placeholders like `/docs/.../page`
      if (link.href.includes('...')) return ignored('policy', 'placeholder path');

      const found = candidatePaths(path, extensions).some(p => existsSync(p));
      return found ? VALID : ignored('unreachable', 'file not found');
    },
  };
}
