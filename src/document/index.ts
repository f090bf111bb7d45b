export { DocxCodeDocument } from "./docx-document.js";
export type {
  AppendOptions,
  CodeDocument,
  FontStyle,
  HeaderAlignment,
  ParagraphStyle,
} from "./types.js";
