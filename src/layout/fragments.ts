/**
 * Width budget for one output line. Each configured character counts as two
 * units so that full-width scripts fit the same budget.
 */
export function fragmentWidth(charsPerLine: number): number {
  return charsPerLine * 2;
}

/**
 * Split a code line into `ceil(length / width)` fragments. A fragment with a
 * full `width` of text remaining keeps one unit in reserve and takes
 * `width - 1` characters; the final fragment takes the rest verbatim.
 * Characters are counted as code points, so surrogate pairs stay whole.
 */
export function splitIntoFragments(line: string, width: number): string[] {
  if (!Number.isInteger(width) || width < 1) {
    throw new Error(`Fragment width must be a positive integer, got ${width}`);
  }
  const chars = Array.from(line);
  const count = Math.ceil(chars.length / width);
  const fragments: string[] = [];
  for (let index = 0; index < count; index += 1) {
    const start = index * width;
    const remaining = chars.length - start;
    const end = remaining >= width ? start + width - 1 : chars.length;
    fragments.push(chars.slice(start, end).join(""));
  }
  return fragments;
}
