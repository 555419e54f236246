/**
 * Markdown Utilities
 *
 * Position-based context detection used by the link collector.
 */

/** Match YAML frontmatter at the very start of a document. */
export const FRONTMATTER_RE = /^---\n[\s\S]*?\n---\n?/;

/**
 * Check if a position is inside a code block (fenced or inline)
 */
export function isInCodeBlock(content: string, position: number): boolean {
  const before = content.slice(0, position);

  // Count triple backticks - if odd, we're inside a fenced code block
  const tripleBackticks = (before.match(/```/g) || []).length;
  if (tripleBackticks % 2 === 1) return true;

  // Check inline code (simplistic - just check if between backticks on same line)
  const lastNewline = before.lastIndexOf('\n');
  const currentLine = before.slice(lastNewline + 1);
  const backticks = (currentLine.match(/`/g) || []).length;
  return backticks % 2 === 1;
}

/**
 * Number of lines taken by leading frontmatter, so body line numbers can be
 * mapped back to the file. Zero when there is none.
 */
export function frontmatterLineCount(content: string): number {
  const match = content.match(FRONTMATTER_RE);
  if (!match) return 0;
  return match[0].split('\n').length - (match[0].endsWith('\n') ? 1 : 0);
}
