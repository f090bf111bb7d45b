import type { HeaderAlignment } from "../document/types.js";
import type { ExcludeMatch } from "../finder/types.js";
import {
  DEFAULT_HEADER_ALIGNMENT,
  EXCLUDE_MATCHES,
  HEADER_ALIGNMENTS,
  MIN_CHARS_PER_LINE,
  MIN_FONT_SIZE,
} from "./defaults.js";
import type { ConfigInput, Mutable } from "./types.js";

const STRING_KEYS = ["title", "entryFile", "fontName", "output"] as const;
const STRING_LIST_KEYS = [
  "inputDirs",
  "extensions",
  "commentPrefixes",
  "multilineStarts",
  "multilineEnds",
  "excludes",
] as const;
const NUMBER_KEYS = [
  "fontSize",
  "spaceBefore",
  "spaceAfter",
  "lineSpacing",
] as const;

const NUMBER_MINIMUMS: Readonly<Record<(typeof NUMBER_KEYS)[number], number>> =
  {
    fontSize: MIN_FONT_SIZE,
    spaceBefore: 0,
    spaceAfter: 0,
    lineSpacing: 0,
  };

const CONFIG_KEYS = new Set<string>([
  ...STRING_KEYS,
  ...STRING_LIST_KEYS,
  ...NUMBER_KEYS,
  "charsPerLine",
  "headerAlignment",
  "excludeMatch",
  "insertPageBreaks",
]);

/**
 * Validate a parsed config document. Every problem is collected and reported
 * in a single error.
 */
export function validateConfig(input: unknown): ConfigInput {
  const errors: string[] = [];
  const config = parseConfig(input, errors);
  if (errors.length > 0) {
    throw new Error(`Invalid config: ${errors.join("; ")}`);
  }
  return config;
}

function parseConfig(input: unknown, errors: string[]): ConfigInput {
  if (input === undefined || input === null) {
    return {};
  }
  if (!isRecord(input)) {
    errors.push("config must be an object");
    return {};
  }

  for (const key of Object.keys(input)) {
    if (!CONFIG_KEYS.has(key)) {
      errors.push(`config has unknown key '${key}'`);
    }
  }

  const config: Mutable<ConfigInput> = {};

  for (const key of STRING_KEYS) {
    const value = input[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "string") {
      errors.push(`${key} must be a string`);
      continue;
    }
    config[key] = value;
  }

  for (const key of STRING_LIST_KEYS) {
    const value = input[key];
    if (value === undefined) {
      continue;
    }
    config[key] = parseStringArray(value, key, errors);
  }

  for (const key of NUMBER_KEYS) {
    const value = input[key];
    if (value === undefined) {
      continue;
    }
    const minimum = NUMBER_MINIMUMS[key];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      errors.push(`${key} must be a number`);
      continue;
    }
    if (value < minimum) {
      errors.push(`${key} must be >= ${minimum}`);
      continue;
    }
    config[key] = value;
  }

  const charsPerLine = input.charsPerLine;
  if (charsPerLine !== undefined) {
    if (
      typeof charsPerLine !== "number" ||
      !Number.isInteger(charsPerLine) ||
      charsPerLine < MIN_CHARS_PER_LINE
    ) {
      errors.push(`charsPerLine must be an integer >= ${MIN_CHARS_PER_LINE}`);
    } else {
      config.charsPerLine = charsPerLine;
    }
  }

  if (input.headerAlignment !== undefined) {
    config.headerAlignment = parseHeaderAlignment(input.headerAlignment);
  }

  const excludeMatch = input.excludeMatch;
  if (excludeMatch !== undefined) {
    if (isExcludeMatch(excludeMatch)) {
      config.excludeMatch = excludeMatch;
    } else {
      errors.push(`excludeMatch must be one of ${EXCLUDE_MATCHES.join(", ")}`);
    }
  }

  const insertPageBreaks = input.insertPageBreaks;
  if (insertPageBreaks !== undefined) {
    if (typeof insertPageBreaks !== "boolean") {
      errors.push("insertPageBreaks must be a boolean");
    } else {
      config.insertPageBreaks = insertPageBreaks;
    }
  }

  return config;
}

/**
 * Unknown alignments fall back to centered headers.
 */
export function parseHeaderAlignment(value: unknown): HeaderAlignment {
  return HEADER_ALIGNMENTS.find((alignment) => alignment === value) ??
    DEFAULT_HEADER_ALIGNMENT;
}

export function isExcludeMatch(value: unknown): value is ExcludeMatch {
  return EXCLUDE_MATCHES.some((mode) => mode === value);
}

function parseStringArray(
  input: unknown,
  path: string,
  errors: string[],
): string[] {
  if (!Array.isArray(input)) {
    errors.push(`${path} must be an array`);
    return [];
  }
  const values: string[] = [];
  input.forEach((entry, index) => {
    if (typeof entry !== "string" || entry.length === 0) {
      errors.push(`${path}[${index}] must be a non-empty string`);
      return;
    }
    values.push(entry);
  });
  return values;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
