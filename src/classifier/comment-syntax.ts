import type { CommentPair, CommentSyntax } from "./types.js";

export const DEFAULT_COMMENT_PREFIXES: readonly string[] = ["#", "//"];

export const DEFAULT_COMMENT_PAIRS: readonly CommentPair[] = [
  { start: '"""', end: '"""' },
  { start: "'''", end: "'''" },
  { start: "/*", end: "*/" },
];

export const DEFAULT_COMMENT_SYNTAX: CommentSyntax = {
  prefixes: DEFAULT_COMMENT_PREFIXES,
  pairs: DEFAULT_COMMENT_PAIRS,
};

/**
 * Zip start and end delimiters into pairs. Lists that are empty or of
 * different lengths yield `null` so callers fall back to the defaults.
 */
export function pairDelimiters(
  starts: readonly string[],
  ends: readonly string[],
): CommentPair[] | null {
  if (starts.length === 0 || starts.length !== ends.length) {
    return null;
  }
  return starts.map((start, index) => ({ start, end: ends[index] ?? "" }));
}
