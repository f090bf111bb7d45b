import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { isExcluded } from "./exclusion.js";
import type { SelectionOptions, WalkOptions } from "./types.js";

/**
 * Depth-first walk yielding absolute paths of code files under `rootDir`.
 * Entries come in the order the platform lists them; siblings are not sorted.
 * A directory reached twice through symbolic links is walked only once.
 */
export async function* walkCodeFiles(
  rootDir: string,
  options: WalkOptions,
): AsyncGenerator<string, void, undefined> {
  yield* walkDirectory(path.resolve(rootDir), options, new Set<string>());
}

async function* walkDirectory(
  directory: string,
  options: WalkOptions,
  visitedDirs: Set<string>,
): AsyncGenerator<string, void, undefined> {
  const realDirectory = await fs.realpath(directory);
  if (visitedDirs.has(realDirectory)) {
    return;
  }
  visitedDirs.add(realDirectory);

  const excludes = options.excludes ?? [];
  const dirents = await fs.readdir(directory, { withFileTypes: true });
  let found = 0;

  for (const dirent of dirents) {
    if (isHidden(dirent.name)) {
      continue;
    }
    const absolutePath = path.join(directory, dirent.name);
    if (isExcluded(absolutePath, excludes, options.excludeMatch)) {
      continue;
    }

    const kind = await entryKind(absolutePath, dirent);
    if (kind === "file") {
      if (hasExtension(dirent.name, options.extensions)) {
        found += 1;
        yield absolutePath;
      }
      continue;
    }
    if (kind === "directory") {
      for await (const file of walkDirectory(
        absolutePath,
        options,
        visitedDirs,
      )) {
        found += 1;
        yield file;
      }
    }
  }

  options.onDirectory?.(directory, found);
}

export async function findCodeFiles(
  rootDir: string,
  options: WalkOptions,
): Promise<string[]> {
  const files: string[] = [];
  for await (const file of walkCodeFiles(rootDir, options)) {
    files.push(file);
  }
  return files;
}

/**
 * Collect code files from every input directory in order, then move the
 * entry file (when given) to the front.
 */
export async function selectFiles(
  options: SelectionOptions,
): Promise<string[]> {
  const files: string[] = [];
  for (const inputDir of options.inputDirs) {
    files.push(...(await findCodeFiles(inputDir, options)));
  }

  if (!options.entryFile) {
    return files;
  }

  const entryPath = path.resolve(options.entryFile);
  const existing = files.indexOf(entryPath);
  if (existing !== -1) {
    files.splice(existing, 1);
  }
  files.unshift(entryPath);
  return files;
}

export function isHidden(name: string): boolean {
  return name.startsWith(".");
}

export function hasExtension(
  name: string,
  extensions: readonly string[],
): boolean {
  return extensions.some((extension) => name.endsWith(extension));
}

type EntryKind = "file" | "directory" | "other";

async function entryKind(
  absolutePath: string,
  dirent: Dirent,
): Promise<EntryKind> {
  if (dirent.isFile()) {
    return "file";
  }
  if (dirent.isDirectory()) {
    return "directory";
  }
  if (!dirent.isSymbolicLink()) {
    return "other";
  }

  const stats = await safeStat(absolutePath);
  if (!stats) {
    return "other";
  }
  if (stats.isFile()) {
    return "file";
  }
  return stats.isDirectory() ? "directory" : "other";
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
