import type { ContentType } from "../ingest/types.js";

export type Severity = "critical" | "high" | "medium" | "low" | "info";

/** Most severe first. */
export const SEVERITIES: readonly Severity[] = [
  "critical",
  "high",
  "medium",
  "low",
  "info",
];

export type Confidence = "high" | "medium" | "low";

export const CONFIDENCES: readonly Confidence[] = ["high", "medium", "low"];

/**
 * `match` rules report content that is present; `require` rules report
 * content that is missing.
 */
export type RuleKind = "match" | "require";

export const RULE_KINDS: readonly RuleKind[] = ["match", "require"];

/** Framework key as declared in the catalog meta file, e.g. `gdpr`. */
export type FrameworkId = string;

export interface RulePattern {
  readonly regex: string;
  readonly description: string;
}

export interface RuleScope {
  readonly content_types: readonly ContentType[];
  readonly file_globs?: readonly string[];
}

export interface RuleDefinition {
  readonly id: string;
  readonly kind: RuleKind;
  readonly framework: FrameworkId;
  readonly control_id: string;
  readonly title: string;
  readonly description: string;
  readonly severity: Severity;
  readonly confidence: Confidence;
  readonly needs_review: boolean;
  readonly scope: RuleScope;
  readonly patterns: readonly RulePattern[];
  readonly applies_when?: readonly RulePattern[];
  readonly validator?: string;
  readonly remediation: string;
  readonly tags?: readonly string[];
}

export interface CompiledPattern {
  readonly description: string;
  /** Always carries the `g`, `i` and `m` flags. */
  readonly regex: RegExp;
}

export type MatchValidator = (matchedText: string) => boolean;

export interface Rule extends RuleDefinition {
  readonly compiled: readonly CompiledPattern[];
  readonly compiledPreconditions: readonly CompiledPattern[];
  readonly accepts?: MatchValidator;
}

export interface RuleMeta {
  readonly rule_format_version: string;
  readonly frameworks: Readonly<Record<FrameworkId, string>>;
}

export interface LoadedRules {
  readonly rules: readonly Rule[];
  readonly meta: RuleMeta;
}
