import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RuleLoadError, TargetError } from "../../src/errors.js";
import { scanPaths } from "../../src/runner/scan-paths.js";
import { configureLogger } from "../../src/utils/logger.js";
import { writeText } from "../fixtures.js";

let tempDir: string;

function clock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1) + 250 * tick++);
}

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "compliscan-scan-"));
  await writeText(
    path.join(tempDir, "app.py"),
    'password = "hunter22"\nADMIN = "admin@example.com"\n',
  );
  await writeText(
    path.join(tempDir, "policy.md"),
    "# Security Policy\nAccess control is reviewed quarterly.\n",
  );
  await writeText(path.join(tempDir, "bad.txt"), Buffer.from([0xff, 0xfe]));
});

afterEach(async () => {
  configureLogger({ level: "info" });
  await fs.rm(tempDir, { recursive: true, force: true });
});

describe("scanPaths", () => {
  it("scans a directory with the built-in catalog", async () => {
    const result = await scanPaths(["."], {
      cwd: tempDir,
      scanId: "scan-1",
      now: clock(),
      logLevel: "error",
    });

    expect(result.findings.map((finding) => finding.rule_id).sort()).toEqual([
      "GDPR-DOC-001",
      "GDPR-DOC-002",
      "GDPR-DOC-003",
      "GDPR-DOC-004",
      "GDPR-PII-001",
      "ISO-DOC-002",
      "ISO-DOC-003",
      "SOC2-DOC-002",
      "SOC2-DOC-003",
      "SOC2-SEC-003",
    ]);
    expect(result.failures).toEqual([
      { artifact_id: "bad.txt", reason: "invalid UTF-8 encoding" },
    ]);
    expect(result.summary.files_scanned).toBe(2);
    expect(result.summary.files_failed).toBe(1);
    expect(result.summary.rules_evaluated).toBe(27);
    expect(result.summary.by_severity).toEqual({
      critical: 0,
      high: 1,
      medium: 9,
      low: 0,
      info: 0,
    });
    expect(result.duration_ms).toBe(250);
    expect(result.rules_version).toBe("1.0");
    expect(result.recommendations).toEqual([
      "Review and remediate 1 high-severity finding",
      "Close 8 policy documentation gaps before the next audit",
    ]);

    const [topRisk] = result.top_risks;
    expect(topRisk?.rule_id).toBe("SOC2-SEC-003");
    expect(topRisk?.artifact_id).toBe("app.py");
    expect(topRisk?.evidence.snippet).toBe(
      'password = "hunter22"\nADMIN = "****@****.***"\n',
    );
  });

  it("is deterministic across runs and concurrency levels", async () => {
    const first = await scanPaths(["."], {
      cwd: tempDir,
      scanId: "scan-1",
      now: clock(),
      concurrency: 1,
      logLevel: "error",
    });
    const second = await scanPaths(["."], {
      cwd: tempDir,
      scanId: "scan-1",
      now: clock(),
      concurrency: 8,
      logLevel: "error",
    });

    expect(second).toEqual(first);
  });

  it("narrows to the selected frameworks", async () => {
    const result = await scanPaths(["."], {
      cwd: tempDir,
      frameworks: ["soc2"],
      excludeRules: ["SOC2-DOC-003"],
      logLevel: "error",
    });

    expect(result.findings.map((finding) => finding.rule_id).sort()).toEqual([
      "SOC2-DOC-002",
      "SOC2-SEC-003",
    ]);
    expect(result.frameworks).toEqual({
      soc2: "SOC 2 Trust Services Criteria",
    });
    expect(result.summary.rules_evaluated).toBe(9);
  });

  it("applies the config file in the working directory", async () => {
    await writeText(
      path.join(tempDir, ".compliscan.yaml"),
      "frameworks: [gdpr]\nexclude_rules: [GDPR-PII-001]\nlog_level: error\n",
    );

    const result = await scanPaths(["."], { cwd: tempDir });

    expect(result.findings.map((finding) => finding.rule_id).sort()).toEqual([
      "GDPR-DOC-001",
      "GDPR-DOC-002",
      "GDPR-DOC-003",
      "GDPR-DOC-004",
    ]);
  });

  it("merges an override catalog over the built-in rules", async () => {
    const rulesDir = path.join(tempDir, "custom-rules");
    await writeText(path.join(rulesDir, "_meta.yaml"), 'rule_format_version: "2.0"\n');
    await writeText(
      path.join(rulesDir, "secrets.yaml"),
      `rules:
  - id: SOC2-SEC-003
    framework: soc2
    control_id: "CC 6.1"
    title: Hardcoded password
    description: Password in source
    severity: critical
    scope:
      content_types: [code]
    patterns:
      - regex: 'password\\s*='
        description: password assignment
    remediation: Rotate it
`,
    );

    const result = await scanPaths(["app.py"], {
      cwd: tempDir,
      rulesDir: "custom-rules",
      frameworks: ["soc2"],
      logLevel: "error",
    });

    expect(result.rules_version).toBe("2.0");
    expect(result.findings.map((finding) => [finding.rule_id, finding.severity])).toEqual([
      ["SOC2-SEC-003", "critical"],
    ]);
  });

  it("scans with a custom catalog alone", async () => {
    const rulesDir = path.join(tempDir, "internal-rules");
    await writeText(
      path.join(rulesDir, "_meta.yaml"),
      'rule_format_version: "1.0"\nframeworks:\n  internal: Internal baseline\n',
    );
    await writeText(
      path.join(rulesDir, "internal.yaml"),
      `rules:
  - id: INT-001
    framework: internal
    control_id: "SEC-1"
    title: Known weak password
    description: A known weak password is in use
    severity: high
    scope:
      content_types: [code]
    patterns:
      - regex: 'hunter2'
        description: weak password
    remediation: Change it
`,
    );

    const result = await scanPaths(["app.py"], {
      cwd: tempDir,
      rulesDir: "internal-rules",
      builtinRules: false,
      logLevel: "error",
    });

    expect(result.summary.rules_evaluated).toBe(1);
    expect(result.frameworks).toEqual({ internal: "Internal baseline" });
    expect(result.findings.map((finding) => finding.rule_id)).toEqual([
      "INT-001",
    ]);
  });

  it("rejects unknown frameworks before reading targets", async () => {
    await expect(
      scanPaths(["missing"], {
        cwd: tempDir,
        frameworks: ["pci"],
        logLevel: "error",
      }),
    ).rejects.toThrow(RuleLoadError);
  });

  it("restores the caller's log level afterwards", async () => {
    configureLogger({ level: "warn" });

    await scanPaths(["app.py"], { cwd: tempDir, logLevel: "error" });

    expect(configureLogger({}).level).toBe("warn");
  });

  it("skips a self-referencing symlink instead of failing the run", async () => {
    await fs.symlink("loop", path.join(tempDir, "loop"));

    const result = await scanPaths(["."], {
      cwd: tempDir,
      frameworks: ["soc2"],
      logLevel: "error",
    });

    expect(result.summary.files_scanned).toBe(2);
    expect(result.failures).toEqual([
      { artifact_id: "bad.txt", reason: "invalid UTF-8 encoding" },
    ]);
  });

  it("rejects an empty target list", async () => {
    await expect(scanPaths([], { cwd: tempDir })).rejects.toThrow(TargetError);
  });
});
