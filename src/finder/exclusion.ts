import path from "node:path";
import type { ExcludeMatch } from "./types.js";

/**
 * Resolve exclusions to absolute paths without trailing separators.
 */
export function normalizeExclusions(
  excludes: readonly string[],
  baseDir: string = process.cwd(),
): string[] {
  return excludes.map((exclude) =>
    stripTrailingSeparators(path.resolve(baseDir, exclude)),
  );
}

export function stripTrailingSeparators(value: string): string {
  let end = value.length;
  while (end > 1 && isSeparator(value[end - 1])) {
    end -= 1;
  }
  return value.slice(0, end);
}

export function isExcluded(
  absolutePath: string,
  excludes: readonly string[],
  mode: ExcludeMatch = "boundary",
): boolean {
  for (const exclude of excludes) {
    if (!absolutePath.startsWith(exclude)) {
      continue;
    }
    if (mode === "prefix") {
      return true;
    }
    if (
      absolutePath.length === exclude.length ||
      isSeparator(exclude[exclude.length - 1]) ||
      isSeparator(absolutePath[exclude.length])
    ) {
      return true;
    }
  }
  return false;
}

function isSeparator(char: string | undefined): boolean {
  return char === path.sep || char === "/";
}
