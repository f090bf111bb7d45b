#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command, InvalidArgumentError, Option } from "commander";
import {
  EXCLUDE_MATCHES,
  HEADER_ALIGNMENTS,
  MIN_CHARS_PER_LINE,
  MIN_FONT_SIZE,
} from "../config/defaults.js";
import type { HeaderAlignment } from "../document/types.js";
import type { ExcludeMatch } from "../finder/types.js";
import { runGenerateCommand } from "./generate-command.js";
import { createLogger } from "./logger.js";

interface CliFlags {
  readonly title?: string;
  readonly entryFile?: string;
  readonly indir?: string[];
  readonly ext?: string[];
  readonly commentChar?: string[];
  readonly multilineCommentStart?: string[];
  readonly multilineCommentEnd?: string[];
  readonly fontName?: string;
  readonly fontSize?: number;
  readonly spaceBefore?: number;
  readonly spaceAfter?: number;
  readonly lineSpacing?: number;
  readonly charsInLine?: number;
  readonly paragraphAlignment?: HeaderAlignment;
  readonly exclude?: string[];
  readonly excludeMatch?: ExcludeMatch;
  readonly outfile?: string;
  readonly insertPage?: boolean;
  readonly config?: string;
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("codeprint")
  .description(
    "Collect source files into a paginated .docx listing without comments or blank lines",
  )
  .version(toolVersion)
  .option(
    "-t, --title <title>",
    "Software name and version, used as the page header",
  )
  .option("--entry-file <path>", "File placed first in the listing")
  .option(
    "-i, --indir <dir>",
    "Source directory, repeatable (default: .)",
    collect,
  )
  .option(
    "-e, --ext <ext>",
    "Source file extension, repeatable (default: py)",
    collect,
  )
  .option(
    "-c, --comment-char <prefix>",
    "Single-line comment prefix, repeatable (default: #, //)",
    collect,
  )
  .option(
    "--multiline-comment-start <start>",
    "Multi-line comment start, paired with --multiline-comment-end",
    collect,
  )
  .option(
    "--multiline-comment-end <end>",
    "Multi-line comment end, paired with --multiline-comment-start",
    collect,
  )
  .option("--font-name <name>", "Font name (default: 宋体)")
  .option(
    "--font-size <points>",
    "Font size in points (default: 10.5)",
    parseMinimum("font size", MIN_FONT_SIZE),
  )
  .option(
    "--space-before <points>",
    "Space before each paragraph (default: 0)",
    parseMinimum("space before", 0),
  )
  .option(
    "--space-after <points>",
    "Space after each paragraph (default: 2.3)",
    parseMinimum("space after", 0),
  )
  .option(
    "--line-spacing <points>",
    "Exact line spacing (default: 10.5)",
    parseMinimum("line spacing", 0),
  )
  .option(
    "--chars-in-line <count>",
    "Full-width characters per line (default: 30)",
    parseCharsPerLine,
  )
  .addOption(
    new Option(
      "--paragraph-alignment <alignment>",
      "Header alignment (default: center)",
    ).choices(HEADER_ALIGNMENTS),
  )
  .option("--exclude <path>", "File or directory to skip, repeatable", collect)
  .addOption(
    new Option(
      "--exclude-match <mode>",
      "How exclusions match paths (default: boundary)",
    ).choices(EXCLUDE_MATCHES),
  )
  .option("-o, --outfile <file>", "Output .docx file (default: code.docx)")
  .option("-p, --insert-page", "Insert a page break every 50 lines")
  .option("--config <path>", "YAML config file")
  .option("-v, --verbose", "Print debug output")
  .option("-q, --quiet", "Suppress the summary line")
  .action(async () => {
    const flags = program.opts<CliFlags>();
    const logger = createLogger({
      verbose: flags.verbose,
      quiet: flags.quiet,
    });
    try {
      await runGenerateCommand(
        {
          config: flags.config,
          title: flags.title,
          inputDirs: flags.indir,
          entryFile: flags.entryFile,
          extensions: flags.ext,
          commentPrefixes: flags.commentChar,
          multilineStarts: flags.multilineCommentStart,
          multilineEnds: flags.multilineCommentEnd,
          fontName: flags.fontName,
          fontSize: flags.fontSize,
          spaceBefore: flags.spaceBefore,
          spaceAfter: flags.spaceAfter,
          lineSpacing: flags.lineSpacing,
          charsPerLine: flags.charsInLine,
          headerAlignment: flags.paragraphAlignment,
          excludes: flags.exclude,
          excludeMatch: flags.excludeMatch,
          output: flags.outfile,
          insertPageBreaks: flags.insertPage,
        },
        { logger },
      );
    } catch (error) {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function parseMinimum(label: string, minimum: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < minimum) {
      throw new InvalidArgumentError(`${label} must be a number >= ${minimum}`);
    }
    return parsed;
  };
}

function parseCharsPerLine(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < MIN_CHARS_PER_LINE) {
    throw new InvalidArgumentError(
      `chars in line must be an integer >= ${MIN_CHARS_PER_LINE}`,
    );
  }
  return parsed;
}
