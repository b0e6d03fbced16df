import type { Finding } from "../scanner/types.js";

const MAX_RECOMMENDATIONS = 5;

export function buildRecommendations(findings: readonly Finding[]): string[] {
  const recommendations: string[] = [];

  const critical = count(findings, (f) => f.severity === "critical");
  if (critical > 0) {
    recommendations.push(
      `Address ${plural(critical, "critical finding")} immediately`,
    );
  }

  const high = count(findings, (f) => f.severity === "high");
  if (high > 0) {
    recommendations.push(
      `Review and remediate ${plural(high, "high-severity finding")}`,
    );
  }

  const gaps = count(findings, (f) => f.kind === "require");
  if (gaps > 0) {
    recommendations.push(
      `Close ${plural(gaps, "policy documentation gap")} before the next audit`,
    );
  }

  if (count(findings, (f) => hasTag(f, "pii")) > 3) {
    recommendations.push(
      "Implement comprehensive PII handling and masking procedures",
    );
  }

  if (count(findings, (f) => hasTag(f, "secret")) > 2) {
    recommendations.push(
      "Audit and rotate exposed credentials, and move secrets into a secret manager",
    );
  }

  const risky = count(
    findings,
    (f) =>
      f.content_type === "config" &&
      (f.severity === "critical" || f.severity === "high"),
  );
  if (risky > 2) {
    recommendations.push(
      "Review system configurations against security baselines",
    );
  }

  return recommendations.slice(0, MAX_RECOMMENDATIONS);
}

function hasTag(finding: Finding, tag: string): boolean {
  return finding.tags?.includes(tag) ?? false;
}

function count(
  findings: readonly Finding[],
  predicate: (finding: Finding) => boolean,
): number {
  return findings.filter(predicate).length;
}

function plural(value: number, noun: string): string {
  return `${value} ${noun}${value === 1 ? "" : "s"}`;
}
