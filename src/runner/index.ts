export { scanPaths } from "./scan-paths.js";
export type { ScanPathsOptions } from "./scan-paths.js";
