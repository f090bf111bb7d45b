import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_COMMENT_PAIRS } from "../../src/classifier/index.js";
import {
  assertInputsExist,
  loadConfigFile,
  parseHeaderAlignment,
  resolveConfig,
  validateConfig,
} from "../../src/config/index.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "codeprint-config-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("resolveConfig", () => {
  it("applies defaults", () => {
    const config = resolveConfig([], { cwd: "/work" });

    expect(config).toEqual({
      title: "Software Copyright Source Listing V1.0",
      inputDirs: ["/work"],
      entryFile: undefined,
      extensions: ["py"],
      syntax: { prefixes: ["#", "//"], pairs: DEFAULT_COMMENT_PAIRS },
      style: {
        fontName: "宋体",
        fontSize: 10.5,
        spaceBefore: 0,
        spaceAfter: 2.3,
        lineSpacing: 10.5,
      },
      charsPerLine: 30,
      headerAlignment: "center",
      excludes: [],
      excludeMatch: "boundary",
      output: "/work/code.docx",
      insertPageBreaks: false,
    });
  });

  it("lets later layers override earlier ones", () => {
    const config = resolveConfig(
      [
        { title: "From file", fontSize: 12, extensions: ["ts"] },
        { title: "From flags", fontSize: undefined, extensions: [] },
      ],
      { cwd: "/work" },
    );

    expect(config.title).toBe("From flags");
    expect(config.style.fontSize).toBe(12);
    expect(config.extensions).toEqual(["ts"]);
  });

  it("falls back to defaults when every layer leaves a list empty", () => {
    const config = resolveConfig(
      [{ commentPrefixes: [] }, { commentPrefixes: [] }],
      { cwd: "/work" },
    );

    expect(config.syntax.prefixes).toEqual(["#", "//"]);
  });

  it("pairs multi-line delimiters in order", () => {
    const config = resolveConfig(
      [{ multilineStarts: ["<!--", "{-"], multilineEnds: ["-->", "-}"] }],
      { cwd: "/work" },
    );

    expect(config.syntax.pairs).toEqual([
      { start: "<!--", end: "-->" },
      { start: "{-", end: "-}" },
    ]);
  });

  it("falls back to default pairs when counts differ", () => {
    const reasons: string[] = [];
    const config = resolveConfig(
      [{ multilineStarts: ["<!--", "{-"], multilineEnds: ["-->"] }],
      { cwd: "/work", onDefaultPairs: (reason) => reasons.push(reason) },
    );

    expect(config.syntax.pairs).toEqual(DEFAULT_COMMENT_PAIRS);
    expect(reasons).toEqual([
      "got 2 multi-line comment start(s) and 1 end(s)",
    ]);
  });

  it("normalizes exclusions and output relative to cwd", () => {
    const config = resolveConfig(
      [{ excludes: ["build/", "/abs/dir//"], output: "out/listing.docx" }],
      { cwd: "/work" },
    );

    expect(config.excludes).toEqual(["/work/build", "/abs/dir"]);
    expect(config.output).toBe("/work/out/listing.docx");
  });
});

describe("validateConfig", () => {
  it("accepts a complete config", () => {
    const config = validateConfig({
      title: "Demo",
      inputDirs: ["src"],
      extensions: ["ts", "tsx"],
      fontSize: 12,
      charsPerLine: 40,
      headerAlignment: "left",
      excludeMatch: "prefix",
      insertPageBreaks: true,
    });

    expect(config).toEqual({
      title: "Demo",
      inputDirs: ["src"],
      extensions: ["ts", "tsx"],
      fontSize: 12,
      charsPerLine: 40,
      headerAlignment: "left",
      excludeMatch: "prefix",
      insertPageBreaks: true,
    });
  });

  it("treats an empty document as no settings", () => {
    expect(validateConfig(null)).toEqual({});
  });

  it("collects every problem into one error", () => {
    expect(() =>
      validateConfig({
        title: 3,
        fontSize: 0.5,
        charsPerLine: 2.5,
        extensions: ["py", ""],
        excludeMatch: "glob",
        colour: "red",
      }),
    ).toThrow(
      "Invalid config: config has unknown key 'colour'; title must be a string; " +
        "extensions[1] must be a non-empty string; fontSize must be >= 1; " +
        "charsPerLine must be an integer >= 1; " +
        "excludeMatch must be one of prefix, boundary",
    );
  });

  it("rejects a non-object document", () => {
    expect(() => validateConfig(["a"])).toThrow(
      "Invalid config: config must be an object",
    );
  });

  it("falls back to a centered header for unknown alignments", () => {
    expect(validateConfig({ headerAlignment: "justify" })).toEqual({
      headerAlignment: "center",
    });
    expect(parseHeaderAlignment("right")).toBe("right");
  });
});

describe("loadConfigFile", () => {
  it("reads YAML and resolves paths against the file", async () => {
    const configPath = path.join(tempDir, "codeprint.yml");
    await fs.writeFile(
      configPath,
      [
        "title: Listing V2.0",
        "inputDirs:",
        "  - src",
        "entryFile: src/main.py",
        "excludes:",
        "  - src/vendor",
        "output: dist/code.docx",
        "insertPageBreaks: true",
        "",
      ].join("\n"),
      "utf8",
    );

    const config = await loadConfigFile(configPath);

    expect(config).toEqual({
      title: "Listing V2.0",
      inputDirs: [path.join(tempDir, "src")],
      entryFile: path.join(tempDir, "src", "main.py"),
      excludes: [path.join(tempDir, "src", "vendor")],
      output: path.join(tempDir, "dist", "code.docx"),
      insertPageBreaks: true,
    });
  });

  it("reports a missing file", async () => {
    const configPath = path.join(tempDir, "missing.yml");
    await expect(loadConfigFile(configPath)).rejects.toThrow(
      `Config file not found: ${configPath}. Check the --config path.`,
    );
  });

  it("reports YAML syntax errors", async () => {
    const configPath = path.join(tempDir, "broken.yml");
    await fs.writeFile(configPath, "title: [unclosed\n", "utf8");

    await expect(loadConfigFile(configPath)).rejects.toThrow(
      `Unable to parse config file ${configPath}`,
    );
  });
});

describe("assertInputsExist", () => {
  it("rejects a missing input directory", async () => {
    const missing = path.join(tempDir, "nope");
    const config = resolveConfig([{ inputDirs: [missing] }], { cwd: tempDir });

    await expect(assertInputsExist(config)).rejects.toThrow(
      `Input directory does not exist: ${missing}. Provide a valid directory.`,
    );
  });

  it("rejects an input path that is a file", async () => {
    const filePath = path.join(tempDir, "file.py");
    await fs.writeFile(filePath, "x = 1\n", "utf8");
    const config = resolveConfig([{ inputDirs: [filePath] }], { cwd: tempDir });

    await expect(assertInputsExist(config)).rejects.toThrow(
      `Input path must be a directory: ${filePath}`,
    );
  });

  it("rejects a missing entry file", async () => {
    const entryFile = path.join(tempDir, "main.py");
    const config = resolveConfig([{ inputDirs: [tempDir], entryFile }], {
      cwd: tempDir,
    });

    await expect(assertInputsExist(config)).rejects.toThrow(
      `Entry file does not exist: ${entryFile}`,
    );
  });

  it("rejects a missing exclusion", async () => {
    const exclude = path.join(tempDir, "vendor");
    const config = resolveConfig([{ inputDirs: [tempDir], excludes: [exclude] }], {
      cwd: tempDir,
    });

    await expect(assertInputsExist(config)).rejects.toThrow(
      `Excluded path does not exist: ${exclude}`,
    );
  });

  it("accepts existing inputs", async () => {
    const config = resolveConfig([{ inputDirs: [tempDir] }], { cwd: tempDir });
    await expect(assertInputsExist(config)).resolves.toBeUndefined();
  });
});
