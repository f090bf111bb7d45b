import fs from "node:fs/promises";
import path from "node:path";
import {
  DEFAULT_COMMENT_PAIRS,
  DEFAULT_COMMENT_PREFIXES,
  pairDelimiters,
} from "../classifier/comment-syntax.js";
import { normalizeExclusions } from "../finder/exclusion.js";
import {
  DEFAULT_CHARS_PER_LINE,
  DEFAULT_EXCLUDE_MATCH,
  DEFAULT_EXTENSIONS,
  DEFAULT_FONT_NAME,
  DEFAULT_FONT_SIZE,
  DEFAULT_HEADER_ALIGNMENT,
  DEFAULT_INPUT_DIRS,
  DEFAULT_LINE_SPACING,
  DEFAULT_OUTPUT,
  DEFAULT_SPACE_AFTER,
  DEFAULT_SPACE_BEFORE,
  DEFAULT_TITLE,
} from "./defaults.js";
import type { ConfigInput, GenerateConfig, Mutable } from "./types.js";

const CONFIG_FIELDS = [
  "title",
  "inputDirs",
  "entryFile",
  "extensions",
  "commentPrefixes",
  "multilineStarts",
  "multilineEnds",
  "fontName",
  "fontSize",
  "spaceBefore",
  "spaceAfter",
  "lineSpacing",
  "charsPerLine",
  "headerAlignment",
  "excludes",
  "excludeMatch",
  "output",
  "insertPageBreaks",
] as const satisfies ReadonlyArray<keyof ConfigInput>;

export interface ResolveOptions {
  readonly cwd?: string;
  readonly onDefaultPairs?: (reason: string) => void;
}

/**
 * Merge config layers (later layers win; an empty list counts as unset),
 * apply defaults and make every path absolute. Does not touch the filesystem; see {@link assertInputsExist}.
 */
export function resolveConfig(
  layers: readonly ConfigInput[],
  options: ResolveOptions = {},
): GenerateConfig {
  const merged = mergeLayers(layers);
  const cwd = options.cwd ?? process.cwd();
  const resolve = (value: string): string => path.resolve(cwd, value);

  const starts = merged.multilineStarts ?? [];
  const ends = merged.multilineEnds ?? [];
  const pairs = pairDelimiters(starts, ends);
  if (!pairs && (starts.length > 0 || ends.length > 0)) {
    options.onDefaultPairs?.(
      `got ${starts.length} multi-line comment start(s) and ${ends.length} end(s)`,
    );
  }

  return {
    title: merged.title ?? DEFAULT_TITLE,
    inputDirs: nonEmpty(merged.inputDirs, DEFAULT_INPUT_DIRS).map(resolve),
    entryFile: merged.entryFile ? resolve(merged.entryFile) : undefined,
    extensions: nonEmpty(merged.extensions, DEFAULT_EXTENSIONS),
    syntax: {
      prefixes: nonEmpty(merged.commentPrefixes, DEFAULT_COMMENT_PREFIXES),
      pairs: pairs ?? DEFAULT_COMMENT_PAIRS,
    },
    style: {
      fontName: merged.fontName ?? DEFAULT_FONT_NAME,
      fontSize: merged.fontSize ?? DEFAULT_FONT_SIZE,
      spaceBefore: merged.spaceBefore ?? DEFAULT_SPACE_BEFORE,
      spaceAfter: merged.spaceAfter ?? DEFAULT_SPACE_AFTER,
      lineSpacing: merged.lineSpacing ?? DEFAULT_LINE_SPACING,
    },
    charsPerLine: merged.charsPerLine ?? DEFAULT_CHARS_PER_LINE,
    headerAlignment: merged.headerAlignment ?? DEFAULT_HEADER_ALIGNMENT,
    excludes: normalizeExclusions(merged.excludes ?? [], cwd),
    excludeMatch: merged.excludeMatch ?? DEFAULT_EXCLUDE_MATCH,
    output: resolve(merged.output ?? DEFAULT_OUTPUT),
    insertPageBreaks: merged.insertPageBreaks ?? false,
  };
}

/**
 * Reject missing input directories, entry file or exclusions before any
 * file is read.
 */
export async function assertInputsExist(config: GenerateConfig): Promise<void> {
  for (const inputDir of config.inputDirs) {
    const stats = await safeStat(inputDir);
    if (!stats) {
      throw new Error(
        `Input directory does not exist: ${inputDir}. Provide a valid directory.`,
      );
    }
    if (!stats.isDirectory()) {
      throw new Error(
        `Input path must be a directory: ${inputDir}. Provide a directory to walk.`,
      );
    }
  }

  if (config.entryFile) {
    const stats = await safeStat(config.entryFile);
    if (!stats || !stats.isFile()) {
      throw new Error(
        `Entry file does not exist: ${config.entryFile}. Provide a valid file.`,
      );
    }
  }

  for (const exclude of config.excludes) {
    if (!(await safeStat(exclude))) {
      throw new Error(`Excluded path does not exist: ${exclude}`);
    }
  }
}

function mergeLayers(layers: readonly ConfigInput[]): ConfigInput {
  const merged: Mutable<ConfigInput> = {};
  for (const layer of layers) {
    for (const key of CONFIG_FIELDS) {
      copyDefined(merged, layer, key);
    }
  }
  return merged;
}

function copyDefined<K extends keyof ConfigInput>(
  target: Mutable<ConfigInput>,
  source: ConfigInput,
  key: K,
): void {
  const value = source[key];
  if (value === undefined || (Array.isArray(value) && value.length === 0)) {
    return;
  }
  target[key] = value;
}

function nonEmpty(
  values: readonly string[] | undefined,
  fallback: readonly string[],
): readonly string[] {
  return values && values.length > 0 ? values : fallback;
}

async function safeStat(
  targetPath: string,
): Promise<Awaited<ReturnType<typeof fs.stat>> | null> {
  try {
    return await fs.stat(targetPath);
  } catch {
    return null;
  }
}
