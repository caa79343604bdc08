/**
 * Path handling for Kobo content identifiers.
 *
 * Identifiers look like `book.epub!OPS!xhtml/Chapter01.xhtml#chapter01_4`.
 * They are split into segments that each start at a separator and keep it,
 * so `a/b` is a prefix of `a/b#c` but not of `a/bc`.
 */

const SEPARATORS = new Set(['/', '!', '#']);

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

const LEVEL_SUFFIX = /-(\d+)$/;

/** Split an identifier into segments, or return null when it cannot be parsed */
export function splitContentId(id: string): string[] | null {
  if (id.trim() === '' || CONTROL_CHARS.test(id)) return null;

  const segments: string[] = [];
  let current = '';
  for (const ch of id) {
    if (SEPARATORS.has(ch) && current !== '') {
      segments.push(current);
      current = ch;
    } else {
      current += ch;
    }
  }
  if (current !== '') segments.push(current);
  return segments;
}

/** True when every segment of `prefix` matches the start of `path` */
export function isPathPrefix(prefix: readonly string[], path: readonly string[]): boolean {
  if (prefix.length > path.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (prefix[i] !== path[i]) return false;
  }
  return true;
}

export function isProperPathPrefix(prefix: readonly string[], path: readonly string[]): boolean {
  return prefix.length < path.length && isPathPrefix(prefix, path);
}

/**
 * Segment-by-segment comparison. Segments compare by code unit so the
 * result never depends on the locale; an ancestor sorts before its descendants.
 */
export function comparePaths(a: readonly string[], b: readonly string[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return a.length - b.length;
}

/**
 * Kobo TOC rows carry their level as a trailing `-N`:
 * `Chapter01.xhtml#chapter01_4-2` → `Chapter01.xhtml#chapter01_4`.
 */
export function stripLevelSuffix(contentId: string): string {
  return contentId.replace(LEVEL_SUFFIX, '');
}

/** Level encoded in the trailing `-N` suffix; 1 when there is none */
export function extractLevel(contentId: string): number {
  const match = LEVEL_SUFFIX.exec(contentId);
  if (!match) return 1;
  const level = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(level) ? level : 1;
}
