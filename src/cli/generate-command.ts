import { LineScanner } from "../classifier/line-classifier.js";
import { loadConfigFile } from "../config/config-loader.js";
import {
  assertInputsExist,
  resolveConfig,
} from "../config/resolve-config.js";
import type { ConfigInput, GenerateConfig } from "../config/types.js";
import { DocxCodeDocument } from "../document/docx-document.js";
import type { CodeDocument } from "../document/types.js";
import { selectFiles } from "../finder/code-finder.js";
import {
  addLineCounts,
  emptyLineCounts,
  writeCodeFile,
  type LineCounts,
} from "../layout/file-writer.js";
import { PaginatedWriter } from "../layout/paginated-writer.js";
import { silentLogger, type Logger } from "./logger.js";

export interface GenerateOptions extends ConfigInput {
  readonly config?: string;
  readonly cwd?: string;
}

export interface GenerateResult {
  readonly config: GenerateConfig;
  readonly files: readonly string[];
  readonly lines: LineCounts;
  readonly fragments: number;
  readonly pageBreaks: number;
  readonly output: string;
}

export interface GenerateDependencies {
  readonly logger?: Logger;
  readonly createDocument?: () => CodeDocument;
}

export async function runGenerateCommand(
  options: GenerateOptions,
  dependencies: GenerateDependencies = {},
): Promise<GenerateResult> {
  const logger = dependencies.logger ?? silentLogger;
  const createDocument =
    dependencies.createDocument ?? (() => new DocxCodeDocument());

  const { config: configPath, cwd, ...cliInput } = options;
  const fileInput = configPath ? await loadConfigFile(configPath) : {};
  const config = resolveConfig([fileInput, cliInput], {
    cwd,
    onDefaultPairs: (reason) =>
      logger.debug(`using default multi-line comment pairs (${reason})`),
  });
  await assertInputsExist(config);

  const files = await selectFiles({
    inputDirs: config.inputDirs,
    entryFile: config.entryFile,
    extensions: config.extensions,
    excludes: config.excludes,
    excludeMatch: config.excludeMatch,
    onDirectory: (directory, count) =>
      logger.debug(`found ${count} code file(s) in ${directory}`),
  });

  const document = createDocument();
  const writer = new PaginatedWriter(document, {
    style: config.style,
    charsPerLine: config.charsPerLine,
    insertPageBreaks: config.insertPageBreaks,
  });
  const scanner = new LineScanner(config.syntax);

  writer.writeHeader(config.title, config.headerAlignment);
  let lines = emptyLineCounts();
  for (const file of files) {
    const counts = await writeCodeFile(file, scanner, writer);
    logger.debug(
      `${file}: ${counts.code} code, ${counts.comment} comment, ${counts.blank} blank`,
    );
    lines = addLineCounts(lines, counts);
  }
  await document.save(config.output);

  logger.info(
    `Wrote ${writer.fragmentCount} line(s) from ${files.length} file(s) to ${config.output}` +
      ` (${lines.code} code, ${lines.comment} comment, ${lines.blank} blank; ${writer.pageBreakCount} page break(s))`,
  );

  return {
    config,
    files,
    lines,
    fragments: writer.fragmentCount,
    pageBreaks: writer.pageBreakCount,
    output: config.output,
  };
}
