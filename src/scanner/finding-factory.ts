import crypto from "node:crypto";
import type { Artifact } from "../ingest/types.js";
import type { Rule } from "../rules/types.js";
import type { Evidence, Finding, Location } from "./types.js";

export interface FindingDetails {
  readonly location: Location;
  readonly evidence: Evidence;
  readonly matchedText: string;
  readonly matchedLines: readonly number[];
  readonly occurrences: number;
}

export function createFinding(
  rule: Rule,
  artifact: Artifact,
  details: FindingDetails,
): Finding {
  return Object.freeze({
    id: createFindingId(
      rule.id,
      artifact.id,
      details.location.line,
      details.matchedText,
    ),
    rule_id: rule.id,
    kind: rule.kind,
    artifact_id: artifact.id,
    content_type: artifact.contentType,
    framework: rule.framework,
    control_id: rule.control_id,
    severity: rule.severity,
    confidence: rule.confidence,
    needs_review: rule.needs_review,
    title: rule.title,
    description: rule.description,
    remediation: rule.remediation,
    location: details.location,
    evidence: details.evidence,
    occurrences: details.occurrences,
    matched_lines: details.matchedLines,
    tags: rule.tags,
  });
}

export function createFindingId(
  ruleId: string,
  artifactId: string,
  line: number,
  matchedText: string,
): string {
  const input = `${ruleId}:${artifactId}:${line}:${matchedText}`;
  const hash = crypto.createHash("sha256").update(input).digest("hex");
  return hash.slice(0, 12);
}
