import type { ArtifactFailure } from "../ingest/types.js";
import type { FrameworkId, Severity } from "../rules/types.js";
import type { Finding } from "../scanner/types.js";

export type SeverityCounts = Record<Severity, number>;

export interface RunSummary {
  readonly files_scanned: number;
  readonly files_failed: number;
  readonly files_skipped: number;
  readonly rules_evaluated: number;
  readonly total_findings: number;
  readonly by_severity: SeverityCounts;
  readonly by_framework: Readonly<Record<FrameworkId, number>>;
  readonly by_framework_severity: Readonly<Record<FrameworkId, SeverityCounts>>;
}

export interface RunResult {
  readonly scan_id: string;
  readonly started_at: string;
  readonly completed_at: string;
  readonly duration_ms: number;
  readonly targets: readonly string[];
  readonly rules_version: string;
  readonly frameworks: Readonly<Record<FrameworkId, string>>;
  readonly summary: RunSummary;
  readonly findings: readonly Finding[];
  readonly failures: readonly ArtifactFailure[];
  readonly top_risks: readonly Finding[];
  readonly recommendations: readonly string[];
}

export interface RunInput {
  readonly scanId?: string;
  readonly targets: readonly string[];
  readonly artifactIds: readonly string[];
  readonly ruleIds: readonly string[];
  readonly rulesVersion: string;
  /** Frameworks reported in the summary, id to display name. */
  readonly frameworks: Readonly<Record<FrameworkId, string>>;
  /** One finding set per evaluated artifact. */
  readonly partials: readonly (readonly Finding[])[];
  readonly failures?: readonly ArtifactFailure[];
  readonly filesSkipped?: number;
  readonly startedAt: Date;
  readonly completedAt: Date;
}

export interface FrameworkGroup {
  readonly framework: FrameworkId;
  readonly name: string;
  readonly total: number;
  readonly by_severity: Readonly<Record<Severity, readonly Finding[]>>;
}
