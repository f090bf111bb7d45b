export {
  addLineCounts,
  emptyLineCounts,
  writeCodeFile,
} from "./file-writer.js";
export type { LineCounts } from "./file-writer.js";
export { fragmentWidth, splitIntoFragments } from "./fragments.js";
export { FRAGMENTS_PER_PAGE, PaginatedWriter } from "./paginated-writer.js";
export type { WriterOptions } from "./paginated-writer.js";
