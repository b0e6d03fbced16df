export {
  evaluateArtifacts,
  evaluateRule,
  ruleAppliesTo,
  scanArtifact,
} from "./rule-engine.js";
export { extractEvidence, gapEvidence, lineStarts, locate } from "./evidence.js";
export { createFinding, createFindingId } from "./finding-factory.js";
export { maskSecret, redactSensitive } from "./redaction.js";
export type { FindingDetails } from "./finding-factory.js";
export type { EvaluateOptions, Evidence, Finding, Location } from "./types.js";
