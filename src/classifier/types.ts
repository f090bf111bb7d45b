export enum LineKind {
  Blank = "blank",
  Comment = "comment",
  Code = "code",
}

export interface CommentPair {
  readonly start: string;
  readonly end: string;
}

export type ScannerState =
  | { readonly kind: "closed" }
  | { readonly kind: "open"; readonly pair: CommentPair };

export interface CommentSyntax {
  readonly prefixes: readonly string[];
  readonly pairs: readonly CommentPair[];
}

export interface Classification {
  readonly kind: LineKind;
  readonly state: ScannerState;
}
