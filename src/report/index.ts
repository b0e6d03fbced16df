export { buildRunResult, groupFindings, sortFindings } from "./run-result.js";
export { buildRecommendations } from "./recommendations.js";
export type {
  FrameworkGroup,
  RunInput,
  RunResult,
  RunSummary,
  SeverityCounts,
} from "./types.js";
