export type ExcludeMatch = "prefix" | "boundary";

export interface WalkOptions {
  readonly extensions: readonly string[];
  readonly excludes?: readonly string[];
  readonly excludeMatch?: ExcludeMatch;
  readonly onDirectory?: (directory: string, fileCount: number) => void;
}

export interface SelectionOptions extends WalkOptions {
  readonly inputDirs: readonly string[];
  readonly entryFile?: string;
}
