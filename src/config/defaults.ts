import type { HeaderAlignment } from "../document/types.js";
import type { ExcludeMatch } from "../finder/types.js";

export const DEFAULT_TITLE = "Software Copyright Source Listing V1.0";
export const DEFAULT_INPUT_DIRS: readonly string[] = ["."];
export const DEFAULT_EXTENSIONS: readonly string[] = ["py"];
export const DEFAULT_FONT_NAME = "宋体";
export const DEFAULT_FONT_SIZE = 10.5;
export const DEFAULT_SPACE_BEFORE = 0;
export const DEFAULT_SPACE_AFTER = 2.3;
export const DEFAULT_LINE_SPACING = 10.5;
export const DEFAULT_CHARS_PER_LINE = 30;
export const DEFAULT_HEADER_ALIGNMENT: HeaderAlignment = "center";
export const DEFAULT_EXCLUDE_MATCH: ExcludeMatch = "boundary";
export const DEFAULT_OUTPUT = "code.docx";

export const HEADER_ALIGNMENTS: readonly HeaderAlignment[] = [
  "left",
  "center",
  "right",
];
export const EXCLUDE_MATCHES: readonly ExcludeMatch[] = ["prefix", "boundary"];

export const MIN_FONT_SIZE = 1;
export const MIN_CHARS_PER_LINE = 1;
