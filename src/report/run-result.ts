import crypto from "node:crypto";
import { ComplianceError } from "../errors.js";
import { SEVERITIES, type FrameworkId, type Severity } from "../rules/types.js";
import type { Finding } from "../scanner/types.js";
import { buildRecommendations } from "./recommendations.js";
import type {
  FrameworkGroup,
  RunInput,
  RunResult,
  RunSummary,
  SeverityCounts,
} from "./types.js";

const TOP_RISK_LIMIT = 10;

const SEVERITY_RANK = new Map<Severity, number>(
  SEVERITIES.map((severity, index) => [severity, index]),
);

/**
 * Merge the per-artifact finding sets of a run into its result. This is the
 * only place partial results meet. Findings outside the selected frameworks
 * are dropped, duplicates (same id) are folded, and any finding that points
 * at a rule or artifact outside the run is rejected.
 */
export function buildRunResult(input: RunInput): RunResult {
  const artifactIds = new Set(input.artifactIds);
  const ruleIds = new Set(input.ruleIds);
  const frameworks = Object.keys(input.frameworks);
  const selected = new Set(frameworks);

  const merged = new Map<string, Finding>();
  for (const partial of input.partials) {
    for (const finding of partial) {
      assertBelongsToRun(finding, artifactIds, ruleIds);
      if (!selected.has(finding.framework) || merged.has(finding.id)) {
        continue;
      }
      merged.set(finding.id, finding);
    }
  }

  const findings = sortFindings(Array.from(merged.values()));
  const failures = input.failures ?? [];

  return {
    scan_id: input.scanId ?? crypto.randomUUID(),
    started_at: input.startedAt.toISOString(),
    completed_at: input.completedAt.toISOString(),
    duration_ms: input.completedAt.getTime() - input.startedAt.getTime(),
    targets: input.targets,
    rules_version: input.rulesVersion,
    frameworks: input.frameworks,
    summary: summarize(findings, frameworks, {
      files_scanned: artifactIds.size,
      files_failed: failures.length,
      files_skipped: input.filesSkipped ?? 0,
      rules_evaluated: ruleIds.size,
    }),
    findings,
    failures,
    top_risks: findings
      .filter((f) => f.severity === "critical" || f.severity === "high")
      .slice(0, TOP_RISK_LIMIT),
    recommendations: buildRecommendations(findings),
  };
}

/**
 * Group findings by framework, then by severity. Every framework in
 * `frameworks` appears, even without findings.
 */
export function groupFindings(
  findings: readonly Finding[],
  frameworks: Readonly<Record<FrameworkId, string>>,
): FrameworkGroup[] {
  return Object.entries(frameworks).map(([framework, name]) => {
    const bySeverity = emptyBuckets();
    let total = 0;
    for (const finding of sortFindings(findings)) {
      if (finding.framework !== framework) {
        continue;
      }
      bySeverity[finding.severity].push(finding);
      total += 1;
    }
    return { framework, name, total, by_severity: bySeverity };
  });
}

export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort((a, b) => {
    const aRank = SEVERITY_RANK.get(a.severity) ?? SEVERITIES.length;
    const bRank = SEVERITY_RANK.get(b.severity) ?? SEVERITIES.length;
    if (aRank !== bRank) {
      return aRank - bRank;
    }
    return a.id.localeCompare(b.id);
  });
}

function summarize(
  findings: readonly Finding[],
  frameworks: readonly FrameworkId[],
  files: Pick<
    RunSummary,
    "files_scanned" | "files_failed" | "files_skipped" | "rules_evaluated"
  >,
): RunSummary {
  const bySeverity = emptyCounts();
  const byFramework: Record<FrameworkId, number> = {};
  const byFrameworkSeverity: Record<FrameworkId, SeverityCounts> = {};
  for (const framework of frameworks) {
    byFramework[framework] = 0;
    byFrameworkSeverity[framework] = emptyCounts();
  }

  for (const finding of findings) {
    bySeverity[finding.severity] += 1;
    byFramework[finding.framework] = (byFramework[finding.framework] ?? 0) + 1;
    const counts = byFrameworkSeverity[finding.framework] ?? emptyCounts();
    counts[finding.severity] += 1;
    byFrameworkSeverity[finding.framework] = counts;
  }

  return {
    ...files,
    total_findings: findings.length,
    by_severity: bySeverity,
    by_framework: byFramework,
    by_framework_severity: byFrameworkSeverity,
  };
}

function assertBelongsToRun(
  finding: Finding,
  artifactIds: ReadonlySet<string>,
  ruleIds: ReadonlySet<string>,
): void {
  if (!ruleIds.has(finding.rule_id)) {
    throw new ComplianceError(
      `Finding ${finding.id} references rule ${finding.rule_id}, which is not part of this run`,
    );
  }
  if (!artifactIds.has(finding.artifact_id)) {
    throw new ComplianceError(
      `Finding ${finding.id} references artifact ${finding.artifact_id}, which is not part of this run`,
    );
  }
}

function emptyCounts(): SeverityCounts {
  return { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
}

function emptyBuckets(): Record<Severity, Finding[]> {
  return { critical: [], high: [], medium: [], low: [], info: [] };
}
