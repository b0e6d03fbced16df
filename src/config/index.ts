export { CONFIG_FILE_NAMES, loadConfig, parseConfig } from "./config-loader.js";
export { ConfigSchema, formatIssues } from "./schema.js";
export { resolveRulesDirectory } from "./runtime-paths.js";
export type { LoadedConfig } from "./config-loader.js";
export type { ScanConfig } from "./schema.js";
