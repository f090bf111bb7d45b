export type HeaderAlignment = "left" | "center" | "right";

export interface FontStyle {
  readonly fontName: string;
  /** Point size. */
  readonly fontSize: number;
}

export interface ParagraphStyle extends FontStyle {
  readonly spaceBefore: number;
  readonly spaceAfter: number;
  readonly lineSpacing: number;
}

export interface AppendOptions {
  readonly pageBreak?: boolean;
}

/**
 * Sink for the generated listing. Implementations decide how paragraphs
 * are rendered and persisted.
 */
export interface CodeDocument {
  setHeader(text: string, alignment: HeaderAlignment, font: FontStyle): void;
  appendParagraph(
    text: string,
    style: ParagraphStyle,
    options?: AppendOptions,
  ): void;
  save(filePath: string): Promise<void>;
}
