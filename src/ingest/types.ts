export type ContentType = "code" | "config" | "document";

export const CONTENT_TYPES: readonly ContentType[] = [
  "code",
  "config",
  "document",
];

/**
 * Result of classifying a path. `unknown` files are discovered but never
 * loaded or scanned.
 */
export type FileClass = ContentType | "unknown";

export interface FileEntry {
  readonly absolutePath: string;
  readonly relativePath: string;
  readonly sizeBytes: number;
  readonly contentType: FileClass;
}

export interface FileDiscoveryOptions {
  readonly maxFileSizeBytes?: number;
  readonly ignoreFileNames?: readonly string[];
  readonly ignorePatterns?: readonly string[];
}

export interface Artifact {
  /** Stable identifier within a run, a POSIX path. */
  readonly id: string;
  readonly absolutePath: string;
  readonly contentType: ContentType;
  readonly sizeBytes: number;
  readonly text: string;
}

export interface ArtifactFailure {
  readonly artifact_id: string;
  readonly reason: string;
}

export interface ArtifactSource {
  readonly id: string;
  readonly absolutePath: string;
  readonly contentType: ContentType;
  readonly sizeBytes: number;
}

export interface LoadArtifactsResult {
  readonly artifacts: readonly Artifact[];
  readonly failures: readonly ArtifactFailure[];
}

export interface ScanTarget {
  readonly input: string;
  readonly rootPath: string;
  readonly source: "file" | "directory" | "git";
  readonly repoUrl?: string;
  readonly files: readonly ArtifactSource[];
  readonly skipped: number;
}

export interface TargetContext {
  readonly targets: readonly ScanTarget[];
  readonly sources: readonly ArtifactSource[];
  readonly cleanup: () => Promise<void>;
}
