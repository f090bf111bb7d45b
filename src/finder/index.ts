export {
  findCodeFiles,
  hasExtension,
  isHidden,
  selectFiles,
  walkCodeFiles,
} from "./code-finder.js";
export {
  isExcluded,
  normalizeExclusions,
  stripTrailingSeparators,
} from "./exclusion.js";
export type { ExcludeMatch, SelectionOptions, WalkOptions } from "./types.js";
