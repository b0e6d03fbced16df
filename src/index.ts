export * from "./config/index.js";
export * from "./ingest/index.js";
export * from "./report/index.js";
export * from "./rules/index.js";
export * from "./runner/index.js";
export * from "./scanner/index.js";
export {
  ArtifactLoadError,
  ComplianceError,
  ConfigLoadError,
  RuleLoadError,
  TargetError,
} from "./errors.js";
export {
  configureLogger,
  createLogger,
  LOG_LEVELS,
} from "./utils/logger.js";
export type { LogLevel, Logger, LoggerConfig } from "./utils/logger.js";
