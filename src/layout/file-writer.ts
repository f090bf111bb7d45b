import fs from "node:fs/promises";
import type { LineScanner } from "../classifier/line-classifier.js";
import { LineKind } from "../classifier/types.js";
import type { PaginatedWriter } from "./paginated-writer.js";

export interface LineCounts {
  readonly blank: number;
  readonly comment: number;
  readonly code: number;
}

const LINE_BREAK = /\r\n|\r|\n/;

export function emptyLineCounts(): LineCounts {
  return { blank: 0, comment: 0, code: 0 };
}

export function addLineCounts(a: LineCounts, b: LineCounts): LineCounts {
  return {
    blank: a.blank + b.blank,
    comment: a.comment + b.comment,
    code: a.code + b.code,
  };
}

/**
 * Read one source file, run it through the scanner and emit its code lines.
 * The scanner is reset first so an unterminated comment never carries over
 * from the previous file.
 */
export async function writeCodeFile(
  filePath: string,
  scanner: LineScanner,
  writer: PaginatedWriter,
): Promise<LineCounts> {
  scanner.reset();
  const text = await readUtf8(filePath);
  const counts = { blank: 0, comment: 0, code: 0 };

  for (const rawLine of splitLines(text)) {
    const line = rawLine.trimEnd();
    const kind = scanner.classify(line);
    if (kind === LineKind.Blank) {
      counts.blank += 1;
      continue;
    }
    if (kind === LineKind.Comment) {
      counts.comment += 1;
      continue;
    }
    counts.code += 1;
    writer.emit(line);
  }

  return counts;
}

function splitLines(text: string): string[] {
  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

async function readUtf8(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to decode ${filePath} as UTF-8: ${reason}`);
  }
}
