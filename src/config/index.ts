export { loadConfigFile, rebasePaths } from "./config-loader.js";
export {
  isExcludeMatch,
  parseHeaderAlignment,
  validateConfig,
} from "./config-validator.js";
export { assertInputsExist, resolveConfig } from "./resolve-config.js";
export type { ResolveOptions } from "./resolve-config.js";
export * from "./defaults.js";
export type { ConfigInput, GenerateConfig } from "./types.js";
