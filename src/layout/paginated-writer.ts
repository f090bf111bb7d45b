import type {
  CodeDocument,
  FontStyle,
  HeaderAlignment,
  ParagraphStyle,
} from "../document/types.js";
import { fragmentWidth, splitIntoFragments } from "./fragments.js";

export const FRAGMENTS_PER_PAGE = 50;

export interface WriterOptions {
  readonly style: ParagraphStyle;
  readonly charsPerLine: number;
  readonly insertPageBreaks: boolean;
}

/**
 * Appends code lines to a document as fixed-width fragments. The fragment
 * counter spans the whole run, so page breaks fall every
 * {@link FRAGMENTS_PER_PAGE} fragments regardless of file boundaries.
 */
export class PaginatedWriter {
  private fragments = 0;
  private pageBreaks = 0;
  private readonly width: number;

  constructor(
    private readonly document: CodeDocument,
    private readonly options: WriterOptions,
  ) {
    this.width = fragmentWidth(options.charsPerLine);
  }

  get fragmentCount(): number {
    return this.fragments;
  }

  get pageBreakCount(): number {
    return this.pageBreaks;
  }

  writeHeader(title: string, alignment: HeaderAlignment): void {
    const font: FontStyle = {
      fontName: this.options.style.fontName,
      fontSize: this.options.style.fontSize,
    };
    this.document.setHeader(title, alignment, font);
  }

  emit(codeLine: string): number {
    const fragments = splitIntoFragments(codeLine, this.width);
    for (const fragment of fragments) {
      this.fragments += 1;
      const pageBreak =
        this.options.insertPageBreaks &&
        this.fragments % FRAGMENTS_PER_PAGE === 0;
      if (pageBreak) {
        this.pageBreaks += 1;
      }
      this.document.appendParagraph(fragment, this.options.style, {
        pageBreak,
      });
    }
    return fragments.length;
  }
}
