import type { CommentSyntax } from "../classifier/types.js";
import type { HeaderAlignment, ParagraphStyle } from "../document/types.js";
import type { ExcludeMatch } from "../finder/types.js";

export interface ConfigInput {
  readonly title?: string;
  readonly inputDirs?: readonly string[];
  readonly entryFile?: string;
  readonly extensions?: readonly string[];
  readonly commentPrefixes?: readonly string[];
  readonly multilineStarts?: readonly string[];
  readonly multilineEnds?: readonly string[];
  readonly fontName?: string;
  readonly fontSize?: number;
  readonly spaceBefore?: number;
  readonly spaceAfter?: number;
  readonly lineSpacing?: number;
  readonly charsPerLine?: number;
  readonly headerAlignment?: HeaderAlignment;
  readonly excludes?: readonly string[];
  readonly excludeMatch?: ExcludeMatch;
  readonly output?: string;
  readonly insertPageBreaks?: boolean;
}

export interface GenerateConfig {
  readonly title: string;
  readonly inputDirs: readonly string[];
  readonly entryFile?: string;
  readonly extensions: readonly string[];
  readonly syntax: CommentSyntax;
  readonly style: ParagraphStyle;
  readonly charsPerLine: number;
  readonly headerAlignment: HeaderAlignment;
  readonly excludes: readonly string[];
  readonly excludeMatch: ExcludeMatch;
  readonly output: string;
  readonly insertPageBreaks: boolean;
}

export type Mutable<T> = { -readonly [K in keyof T]: T[K] };
