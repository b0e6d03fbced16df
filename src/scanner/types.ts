import type { ContentType } from "../ingest/types.js";
import type {
  Confidence,
  FrameworkId,
  RuleKind,
  Severity,
} from "../rules/types.js";

/** 1-based line and column, 0-based offset into the normalized text. */
export interface Location {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface Evidence {
  readonly path: string;
  readonly start_line: number;
  readonly end_line: number;
  readonly snippet: string;
  readonly match: string;
}

export interface Finding {
  readonly id: string;
  readonly rule_id: string;
  readonly kind: RuleKind;
  readonly artifact_id: string;
  readonly content_type: ContentType;
  readonly framework: FrameworkId;
  readonly control_id: string;
  readonly severity: Severity;
  readonly confidence: Confidence;
  readonly needs_review: boolean;
  readonly title: string;
  readonly description: string;
  readonly remediation: string;
  readonly location: Location;
  readonly evidence: Evidence;
  /** Number of matches folded into this finding. 1 for gap findings. */
  readonly occurrences: number;
  readonly matched_lines: readonly number[];
  readonly tags?: readonly string[];
}

export interface EvaluateOptions {
  readonly concurrency?: number;
}
