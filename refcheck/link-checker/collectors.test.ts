import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { collectLinks, extractLinks, findDocuments } from './collectors.ts';

const FENCE = '```';

describe('extractLinks', () => {
  const content = [
    '---',
    'title: Test',
    'link: https://frontmatter.example.com',
    '---',
    '# Heading',
    '',
    'See [the guide](./guide.md) and [docs](https://example.com/docs "Docs").',
    'Visit https://example.com/plain. for more.',
    '<a href="https://example.com/html">x</a>',
    '[^1]: https://example.com/footnote',
    '`[inline](./inline.md)` and [anchor](#top)',
    '',
    `${FENCE}js`,
    'const u = "https://example.com/in-code";',
    FENCE,
    '![logo](/img/logo.png)',
  ].join('\n');

  it('finds every kind of reference with its line and column', () => {
    expect(extractLinks(content)).toEqual([
      { href: './guide.md', text: 'the guide', line: 7, column: 5 },
      { href: 'https://example.com/docs', text: 'docs', line: 7, column: 33 },
      { href: 'https://example.com/plain', text: '', line: 8, column: 7 },
      { href: 'https://example.com/html', text: '', line: 9, column: 4 },
      { href: 'https://example.com/footnote', text: 'footnote', line: 10, column: 1 },
      { href: '/img/logo.png', text: 'logo', line: 16, column: 1 },
    ]);
  });

  it('returns nothing for plain prose', () => {
    expect(extractLinks('No links here.\nNor here.')).toEqual([]);
  });

  it('skips bare URLs with unbalanced parentheses', () => {
    expect(extractLinks('See https://en.wikipedia.org/wiki/Foo_(bar) here')).toEqual([]);
  });

  it('keeps balanced parentheses inside a link target', () => {
    expect(extractLinks('[W](https://en.wikipedia.org/wiki/Foo_(bar)) and [g](./guide.md)')).toEqual([
      { href: 'https://en.wikipedia.org/wiki/Foo_(bar)', text: 'W', line: 1, column: 1 },
      { href: './guide.md', text: 'g', line: 1, column: 50 },
    ]);
  });

  it('keeps repeated links as separate occurrences', () => {
    expect(extractLinks('[a](./x.md)\n[b](./x.md)')).toEqual([
      { href: './x.md', text: 'a', line: 1, column: 1 },
      { href: './x.md', text: 'b', line: 2, column: 1 },
    ]);
  });
});

describe('document collection', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'refcheck-collect-'));
    mkdirSync(join(root, 'docs'));
    mkdirSync(join(root, 'node_modules'));
    writeFileSync(join(root, 'README.md'), '[a](docs/a.md)\n');
    writeFileSync(join(root, 'notes.txt'), 'https://example.com/\n');
    writeFileSync(join(root, 'docs', 'a.md'), '[b](./b.md)\nhttps://example.com/x\n');
    writeFileSync(join(root, 'docs', 'b.mdx'), '# B\n');
    writeFileSync(join(root, 'node_modules', 'dep.md'), '[dep](./dep.md)\n');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('findDocuments walks directories in sorted order and skips excluded names', () => {
    const files = findDocuments([root], { extensions: ['.md', '.mdx'], exclude: ['node_modules'] });
    expect(files).toEqual([
      join(root, 'README.md'),
      join(root, 'docs', 'a.md'),
      join(root, 'docs', 'b.mdx'),
    ]);
  });

  it('findDocuments takes named files as-is and drops duplicates', () => {
    const files = findDocuments(
      [join(root, 'notes.txt'), join(root, 'docs'), join(root, 'docs', 'a.md')],
      { extensions: ['.md'] },
    );
    expect(files).toEqual([join(root, 'notes.txt'), join(root, 'docs', 'a.md')]);
  });

  it('findDocuments skips entries it cannot stat and reports them', () => {
    symlinkSync(join(root, 'gone.md'), join(root, 'docs', 'dangling.md'));
    const onUnreadable = vi.fn();

    const files = findDocuments([join(root, 'docs')], { extensions: ['.md'], onUnreadable });

    expect(files).toEqual([join(root, 'docs', 'a.md')]);
    expect(onUnreadable).toHaveBeenCalledTimes(1);
    expect(onUnreadable.mock.calls[0][0]).toBe(join(root, 'docs', 'dangling.md'));
  });

  it('collectLinks yields located links relative to root', () => {
    const links = [...collectLinks([join(root, 'README.md'), join(root, 'docs', 'a.md')], { root })];
    expect(links).toEqual([
      [{ file: 'README.md', line: 1, column: 1 }, { href: 'docs/a.md', text: 'a', base: root }],
      [{ file: 'docs/a.md', line: 1, column: 1 }, { href: './b.md', text: 'b', base: join(root, 'docs') }],
      [{ file: 'docs/a.md', line: 2, column: 1 }, { href: 'https://example.com/x', base: join(root, 'docs') }],
    ]);
  });

  it('collectLinks reads lazily and skips unreadable documents', () => {
    const onUnreadable = vi.fn();
    const links = collectLinks([join(root, 'missing.md'), join(root, 'README.md')], { root, onUnreadable });
    expect(onUnreadable).not.toHaveBeenCalled();

    expect([...links]).toHaveLength(1);
    expect(onUnreadable).toHaveBeenCalledTimes(1);
    expect(onUnreadable.mock.calls[0][0]).toBe(join(root, 'missing.md'));
  });
});
