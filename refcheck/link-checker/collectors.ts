/**
 * Link collectors: find documents and extract the references they contain.
 *
 * Covers: markdown links and images, HTML href attributes, footnote URLs and
 * bare http(s) URLs. Code blocks, inline code and frontmatter are skipped.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { dirname, relative, resolve } from 'path';
import { findFiles } from '../lib/file-utils.ts';
import type { FindFilesOptions } from '../lib/file-utils.ts';
import { frontmatterLineCount, isInCodeBlock } from '../lib/markdown-utils.ts';
import type { LocatedLink } from './types.ts';

export interface ExtractedLink {
  href: string;
  text: string;
  /** 1-based line in the document. */
  line: number;
  /** 1-based column where the reference starts. */
  column: number;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Check if a URL looks truncated (unbalanced parentheses from markdown parsing).
 */
function isTruncatedUrl(url: string): boolean {
  try {
    const path = new URL(url).pathname;
    const openParens = (path.match(/\(/g) || []).length;
    const closeParens = (path.match(/\)/g) || []).length;
    return openParens > closeParens;
  } catch {
    return true;
  }
}

function isAnchor(href: string): boolean {
  return href === '' || href.startsWith('#');
}

// ── Extraction ───────────────────────────────────────────────────────────────

/**
 * Extract references from markdown content, in document order per pattern.
 */
export function extractLinks(content: string): ExtractedLink[] {
  const links: ExtractedLink[] = [];

  // [text](href "title") and ![alt](src); <href> form allowed, one level of parens in href
  const mdLinkRegex = /!?\[([^\]]*)\]\(\s*<?((?:[^()\s>]|\([^()\s>]*\))*)>?(?:\s+["'][^"']*["'])?\s*\)/g;
  const hrefRegex = /href=["']([^"']+)["']/g;
  const footnoteUrlRegex = /\[\^[^\]]+\]:\s*(?:\[[^\]]*\]\()?(https?:\/\/[^\s)]+)/g;
  const bareUrlRegex = /(?<!\[)\bhttps?:\/\/[^\s<>"'\])}`]+/g;

  const lines = content.split('\n');
  const skipLines = frontmatterLineCount(content);
  let position = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineStart = position;
    position += line.length + 1;
    if (i < skipLines) continue;

    const seen = new Set<string>();
    const found = (href: string, text: string, index: number): void => {
      if (isInCodeBlock(content, lineStart + index)) return;
      seen.add(href);
      if (isAnchor(href)) return;
      links.push({ href, text, line: i + 1, column: index + 1 });
    };

    let match: RegExpExecArray | null;

    mdLinkRegex.lastIndex = 0;
    while ((match = mdLinkRegex.exec(line)) !== null) {
      found(match[2], match[1], match.index);
    }

    hrefRegex.lastIndex = 0;
    while ((match = hrefRegex.exec(line)) !== null) {
      found(match[1], '', match.index);
    }

    footnoteUrlRegex.lastIndex = 0;
    while ((match = footnoteUrlRegex.exec(line)) !== null) {
      found(match[1], 'footnote', match.index);
    }

    bareUrlRegex.lastIndex = 0;
    while ((match = bareUrlRegex.exec(line)) !== null) {
      const url = match[0].replace(/[.,;:!?]+$/, '');
      if (seen.has(url) || seen.has(match[0])) continue;
      if (isTruncatedUrl(url)) continue;
      if (isInCodeBlock(content, lineStart + match.index)) continue;
      links.push({ href: url, text: '', line: i + 1, column: match.index + 1 });
    }
  }

  return links;
}

// ── Document collection ──────────────────────────────────────────────────────

/**
 * Find every document with a matching extension under the given paths.
 * A path naming a file is taken as-is, whatever its extension.
 */
export function findDocuments(paths: readonly string[], options: FindFilesOptions): string[] {
  const files: string[] = [];
  for (const path of paths) {
    if (existsSync(path) && statSync(path).isFile()) {
      files.push(path);
    } else {
      findFiles(path, options, files);
    }
  }
  return [...new Set(files)];
}

export interface CollectOptions {
  /** Location paths are reported relative to this directory. */
  root: string;
  /** Called when a document cannot be read; the document is skipped. */
  onUnreadable?: (file: string, message: string) => void;
}

/**
 * Lazily yield (location, link) pairs for every reference in the given
 * documents. Relative links resolve against their document's directory.
 */
export function* collectLinks(files: Iterable<string>, options: CollectOptions): Generator<LocatedLink> {
  const root = resolve(options.root);

  for (const file of files) {
    const path = resolve(root, file);
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (err: unknown) {
      options.onUnreadable?.(path, err instanceof Error ? err.message : String(err));
      continue;
    }

    const location = { file: relative(root, path) };
    const base = dirname(path);
    for (const { href, text, line, column } of extractLinks(content)) {
      yield [
        { ...location, line, column },
        text === '' ? { href, base } : { href, text, base },
      ];
    }
  }
}
