import { describe, expect, it } from "vitest";
import { ComplianceError } from "../../src/errors.js";
import type { ContentType } from "../../src/ingest/types.js";
import { buildRecommendations } from "../../src/report/recommendations.js";
import { buildRunResult, groupFindings } from "../../src/report/run-result.js";
import type { RunInput } from "../../src/report/types.js";
import type { RuleDefinition } from "../../src/rules/types.js";
import { gapEvidence } from "../../src/scanner/evidence.js";
import { createFinding } from "../../src/scanner/finding-factory.js";
import type { Finding } from "../../src/scanner/types.js";
import { makeArtifact, makeRule } from "../fixtures.js";

function makeFinding(
  rule: Partial<RuleDefinition>,
  line = 1,
  contentType: ContentType = "code",
  artifactId = "app.py",
): Finding {
  return createFinding(
    makeRule(rule),
    makeArtifact(artifactId, "", contentType),
    {
      location: { line, column: 1, offset: 0 },
      evidence: gapEvidence(artifactId, "evidence"),
      matchedText: `match-${line}`,
      matchedLines: [line],
      occurrences: 1,
    },
  );
}

const secret = makeFinding({
  id: "SEC-1",
  framework: "soc2",
  severity: "critical",
  tags: ["secret"],
});
const gap = makeFinding(
  { id: "DOC-1", kind: "require", framework: "gdpr", severity: "medium" },
  1,
  "document",
  "policy.md",
);
const iso = makeFinding({ id: "ISO-1", framework: "iso27001", severity: "high" });

function runInput(overrides: Partial<RunInput> = {}): RunInput {
  return {
    scanId: "scan-1",
    targets: ["."],
    artifactIds: ["app.py", "policy.md"],
    ruleIds: ["SEC-1", "DOC-1", "ISO-1"],
    rulesVersion: "1.0",
    frameworks: { soc2: "SOC 2", gdpr: "GDPR" },
    partials: [[gap], [secret, iso], [secret]],
    startedAt: new Date("2024-05-01T10:00:00.000Z"),
    completedAt: new Date("2024-05-01T10:00:01.500Z"),
    ...overrides,
  };
}

describe("buildRunResult", () => {
  it("merges partials, drops other frameworks and sorts by severity", () => {
    const result = buildRunResult(runInput());

    expect(result.findings.map((finding) => finding.rule_id)).toEqual([
      "SEC-1",
      "DOC-1",
    ]);
    expect(result.top_risks.map((finding) => finding.rule_id)).toEqual([
      "SEC-1",
    ]);
    expect(result.scan_id).toBe("scan-1");
    expect(result.started_at).toBe("2024-05-01T10:00:00.000Z");
    expect(result.duration_ms).toBe(1500);
    expect(result.summary).toEqual({
      files_scanned: 2,
      files_failed: 0,
      files_skipped: 0,
      rules_evaluated: 3,
      total_findings: 2,
      by_severity: { critical: 1, high: 0, medium: 1, low: 0, info: 0 },
      by_framework: { soc2: 1, gdpr: 1 },
      by_framework_severity: {
        soc2: { critical: 1, high: 0, medium: 0, low: 0, info: 0 },
        gdpr: { critical: 0, high: 0, medium: 1, low: 0, info: 0 },
      },
    });
    expect(result.recommendations).toEqual([
      "Address 1 critical finding immediately",
      "Close 1 policy documentation gap before the next audit",
    ]);
  });

  it("carries failures and skipped counts into the summary", () => {
    const result = buildRunResult(
      runInput({
        failures: [{ artifact_id: "bad.txt", reason: "invalid UTF-8 encoding" }],
        filesSkipped: 4,
      }),
    );

    expect(result.failures).toEqual([
      { artifact_id: "bad.txt", reason: "invalid UTF-8 encoding" },
    ]);
    expect(result.summary.files_failed).toBe(1);
    expect(result.summary.files_skipped).toBe(4);
  });

  it("generates a scan id when none is given", () => {
    const result = buildRunResult(runInput({ scanId: undefined }));

    expect(result.scan_id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("rejects findings for rules outside the run", () => {
    expect(() => buildRunResult(runInput({ ruleIds: ["DOC-1", "ISO-1"] }))).toThrow(
      ComplianceError,
    );
  });

  it("rejects findings for artifacts outside the run", () => {
    expect(() => buildRunResult(runInput({ artifactIds: ["app.py"] }))).toThrow(
      "references artifact policy.md, which is not part of this run",
    );
  });
});

describe("groupFindings", () => {
  it("lists every framework, with or without findings", () => {
    const groups = groupFindings([gap, secret], {
      soc2: "SOC 2",
      gdpr: "GDPR",
      iso27001: "ISO 27001",
    });

    expect(groups.map((group) => [group.framework, group.total])).toEqual([
      ["soc2", 1],
      ["gdpr", 1],
      ["iso27001", 0],
    ]);
    expect(groups[0]?.by_severity.critical).toEqual([secret]);
  });
});

describe("buildRecommendations", () => {
  it("returns nothing without findings", () => {
    expect(buildRecommendations([])).toEqual([]);
  });

  it("recommends PII handling above three PII findings", () => {
    const findings = [1, 2, 3, 4].map((line) =>
      makeFinding({ id: "PII-1", severity: "low", tags: ["pii"] }, line),
    );

    expect(buildRecommendations(findings)).toEqual([
      "Implement comprehensive PII handling and masking procedures",
    ]);
  });

  it("caps the list at five", () => {
    const findings = [
      ...[1, 2, 3].map((line) =>
        makeFinding(
          { id: "SEC-1", severity: "critical", tags: ["secret"] },
          line,
          "config",
        ),
      ),
      makeFinding({ id: "PII-1", severity: "high", tags: ["pii"] }, 4),
      makeFinding({ id: "DOC-1", kind: "require", severity: "medium" }, 5),
      ...[6, 7, 8].map((line) =>
        makeFinding({ id: "PII-2", severity: "low", tags: ["pii"] }, line),
      ),
    ];

    expect(buildRecommendations(findings)).toEqual([
      "Address 3 critical findings immediately",
      "Review and remediate 1 high-severity finding",
      "Close 1 policy documentation gap before the next audit",
      "Implement comprehensive PII handling and masking procedures",
      "Audit and rotate exposed credentials, and move secrets into a secret manager",
    ]);
  });
});
