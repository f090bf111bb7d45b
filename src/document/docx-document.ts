import fs from "node:fs/promises";
import path from "node:path";
import {
  AlignmentType,
  Document,
  Header,
  LineRuleType,
  Packer,
  PageBreak,
  Paragraph,
  TextRun,
} from "docx";
import type {
  AppendOptions,
  CodeDocument,
  FontStyle,
  HeaderAlignment,
  ParagraphStyle,
} from "./types.js";

const TWIPS_PER_POINT = 20;

const ALIGNMENTS = {
  left: AlignmentType.LEFT,
  center: AlignmentType.CENTER,
  right: AlignmentType.RIGHT,
} as const;

export class DocxCodeDocument implements CodeDocument {
  private header: Paragraph | null = null;
  private readonly paragraphs: Paragraph[] = [];

  setHeader(text: string, alignment: HeaderAlignment, font: FontStyle): void {
    this.header = new Paragraph({
      alignment: ALIGNMENTS[alignment],
      children: [createRun(text, font)],
    });
  }

  appendParagraph(
    text: string,
    style: ParagraphStyle,
    options: AppendOptions = {},
  ): void {
    const children: Array<TextRun | PageBreak> = [createRun(text, style)];
    if (options.pageBreak) {
      children.push(new PageBreak());
    }
    this.paragraphs.push(
      new Paragraph({
        spacing: {
          before: toTwips(style.spaceBefore),
          after: toTwips(style.spaceAfter),
          line: toTwips(style.lineSpacing),
          lineRule: LineRuleType.EXACT,
        },
        children,
      }),
    );
  }

  get paragraphCount(): number {
    return this.paragraphs.length;
  }

  async save(filePath: string): Promise<void> {
    const document = new Document({
      sections: [
        {
          headers: this.header
            ? { default: new Header({ children: [this.header] }) }
            : undefined,
          children: this.paragraphs,
        },
      ],
    });
    const buffer = await Packer.toBuffer(document);
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.writeFile(filePath, buffer);
  }
}

function createRun(text: string, font: FontStyle): TextRun {
  return new TextRun({
    text,
    font: font.fontName,
    // half-points
    size: Math.round(font.fontSize * 2),
  });
}

function toTwips(points: number): number {
  return Math.round(points * TWIPS_PER_POINT);
}
