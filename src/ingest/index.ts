export { discoverFiles, parseIgnoreRule } from "./file-discovery.js";
export { classifyFile, isBinaryPath } from "./file-classifier.js";
export { decodeText, loadArtifact, loadArtifacts } from "./artifact-loader.js";
export {
  artifactIdFor,
  isGitUrl,
  repositoryName,
  resolveTargets,
} from "./repo-loader.js";
export type { LoadArtifactsOptions } from "./artifact-loader.js";
export type { ResolveTargetsOptions } from "./repo-loader.js";
export type {
  Artifact,
  ArtifactFailure,
  ArtifactSource,
  ContentType,
  FileClass,
  FileDiscoveryOptions,
  FileEntry,
  LoadArtifactsResult,
  ScanTarget,
  TargetContext,
} from "./types.js";
export { CONTENT_TYPES } from "./types.js";
