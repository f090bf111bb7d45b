import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { validateConfig } from "./config-validator.js";
import type { ConfigInput } from "./types.js";

/**
 * Load a YAML config file. Relative paths inside it are resolved against the
 * directory that holds the file.
 */
export async function loadConfigFile(configPath: string): Promise<ConfigInput> {
  const resolvedPath = path.resolve(configPath);
  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf8");
  } catch {
    throw new Error(
      `Config file not found: ${resolvedPath}. Check the --config path.`,
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to parse config file ${resolvedPath}: ${reason}`);
  }

  const config = validateConfig(parsed);
  return rebasePaths(config, path.dirname(resolvedPath));
}

export function rebasePaths(config: ConfigInput, baseDir: string): ConfigInput {
  const resolve = (value: string): string => path.resolve(baseDir, value);
  return {
    ...config,
    inputDirs: config.inputDirs?.map(resolve),
    entryFile: config.entryFile ? resolve(config.entryFile) : undefined,
    excludes: config.excludes?.map(resolve),
    output: config.output ? resolve(config.output) : undefined,
  };
}
