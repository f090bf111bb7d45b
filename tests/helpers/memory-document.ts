import type {
  AppendOptions,
  CodeDocument,
  FontStyle,
  HeaderAlignment,
  ParagraphStyle,
} from "../../src/document/types.js";

export interface RecordedParagraph {
  readonly text: string;
  readonly style: ParagraphStyle;
  readonly pageBreak: boolean;
}

export class MemoryDocument implements CodeDocument {
  header: { text: string; alignment: HeaderAlignment; font: FontStyle } | null =
    null;
  readonly paragraphs: RecordedParagraph[] = [];
  readonly savedTo: string[] = [];

  setHeader(text: string, alignment: HeaderAlignment, font: FontStyle): void {
    this.header = { text, alignment, font };
  }

  appendParagraph(
    text: string,
    style: ParagraphStyle,
    options: AppendOptions = {},
  ): void {
    this.paragraphs.push({ text, style, pageBreak: Boolean(options.pageBreak) });
  }

  async save(filePath: string): Promise<void> {
    this.savedTo.push(filePath);
  }
}
