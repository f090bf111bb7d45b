export {
  CLOSED,
  LineScanner,
  classifyLine,
  openState,
} from "./line-classifier.js";
export {
  DEFAULT_COMMENT_PAIRS,
  DEFAULT_COMMENT_PREFIXES,
  DEFAULT_COMMENT_SYNTAX,
  pairDelimiters,
} from "./comment-syntax.js";
export { LineKind } from "./types.js";
export type {
  Classification,
  CommentPair,
  CommentSyntax,
  ScannerState,
} from "./types.js";
