import { splitLines } from './lines.js';

export type LineMatcher = (line: string) => boolean;

function foldCase(value: string): string {
  return value.toLowerCase();
}

/**
 * Builds the containment predicate for `query`. The query is folded once;
 * each candidate line is folded on every call when `caseInsensitive` is set.
 *
 * An empty query matches every line, blank lines included.
 */
export function createLineMatcher(
  query: string,
  caseInsensitive: boolean
): LineMatcher {
  if (query.length === 0) return () => true;

  if (!caseInsensitive) {
    return (line: string): boolean => line.includes(query);
  }

  const needle = foldCase(query);
  return (line: string): boolean => foldCase(line).includes(needle);
}

/**
 * Lazily yields the lines of `contents` that contain `query`, in document
 * order. Single pass: call again to rescan.
 */
export function* searchLines(
  query: string,
  contents: string,
  caseInsensitive: boolean
): Generator<string, void> {
  const matches = createLineMatcher(query, caseInsensitive);
  for (const line of splitLines(contents)) {
    if (matches(line)) yield line;
  }
}

export function search(
  query: string,
  contents: string,
  caseInsensitive: boolean
): string[] {
  return Array.from(searchLines(query, contents, caseInsensitive));
}
