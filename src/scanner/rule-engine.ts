import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { minimatch } from "minimatch";
import type { Artifact } from "../ingest/types.js";
import type { Rule } from "../rules/types.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { createLogger } from "../utils/logger.js";
import {
  extractEvidence,
  gapEvidence,
  lineStarts,
  locate,
} from "./evidence.js";
import { createFinding } from "./finding-factory.js";
import type { EvaluateOptions, Finding } from "./types.js";

const logger = createLogger("engine");

const DEFAULT_CONCURRENCY = 8;

interface Hit {
  readonly index: number;
  readonly text: string;
}

/**
 * Evaluate one rule against one artifact. Pure: the same inputs always give
 * the same result, and nothing outside the return value is touched.
 */
export function evaluateRule(artifact: Artifact, rule: Rule): Finding | null {
  if (!ruleAppliesTo(rule, artifact)) {
    return null;
  }
  return rule.kind === "require"
    ? evaluateRequirement(artifact, rule)
    : evaluateMatches(artifact, rule);
}

export function scanArtifact(
  artifact: Artifact,
  rules: readonly Rule[],
): Finding[] {
  const findings: Finding[] = [];
  for (const rule of rules) {
    const finding = evaluateRule(artifact, rule);
    if (finding) {
      findings.push(finding);
    }
  }
  return findings;
}

/**
 * Scan artifacts concurrently. Each artifact yields its own partial finding
 * set; merging them is left to the aggregator.
 */
export async function evaluateArtifacts(
  artifacts: readonly Artifact[],
  rules: readonly Rule[],
  options: EvaluateOptions = {},
): Promise<Finding[][]> {
  return await mapWithConcurrency(
    artifacts,
    options.concurrency ?? DEFAULT_CONCURRENCY,
    async (artifact) => {
      await yieldToEventLoop();
      const findings = scanArtifact(artifact, rules);
      logger.debug(`${artifact.id}: ${findings.length} findings`);
      return findings;
    },
  );
}

export function ruleAppliesTo(rule: Rule, artifact: Artifact): boolean {
  if (!rule.scope.content_types.includes(artifact.contentType)) {
    return false;
  }
  const globs = rule.scope.file_globs;
  if (!globs || globs.length === 0) {
    return true;
  }
  return globs.some((glob) =>
    minimatch(artifact.id, glob, { dot: true, matchBase: !glob.includes("/") }),
  );
}

function evaluateMatches(artifact: Artifact, rule: Rule): Finding | null {
  const hits: Hit[] = [];
  for (const pattern of rule.compiled) {
    for (const match of artifact.text.matchAll(pattern.regex)) {
      const text = match[0];
      if (!text || (rule.accepts && !rule.accepts(text))) {
        continue;
      }
      hits.push({ index: match.index ?? 0, text });
    }
  }

  hits.sort((a, b) => a.index - b.index || a.text.localeCompare(b.text));
  const [first] = hits;
  if (!first) {
    return null;
  }

  const starts = lineStarts(artifact.text);
  const location = locate(starts, first.index);
  const lines = new Set(hits.map((hit) => locate(starts, hit.index).line));

  return createFinding(rule, artifact, {
    location,
    evidence: extractEvidence(
      artifact.id,
      artifact.text,
      location.line,
      first.text,
    ),
    matchedText: first.text,
    matchedLines: Array.from(lines).sort((a, b) => a - b),
    occurrences: hits.length,
  });
}

function evaluateRequirement(artifact: Artifact, rule: Rule): Finding | null {
  const text = artifact.text;
  const preconditions = rule.compiledPreconditions;
  if (
    preconditions.length > 0 &&
    !preconditions.some((pattern) => text.search(pattern.regex) !== -1)
  ) {
    return null;
  }
  if (rule.compiled.some((pattern) => text.search(pattern.regex) !== -1)) {
    return null;
  }

  const message = `Missing: ${rule.patterns
    .map((pattern) => pattern.description)
    .join(", ")}`;
  return createFinding(rule, artifact, {
    location: { line: 1, column: 1, offset: 0 },
    evidence: gapEvidence(artifact.id, message),
    matchedText: message,
    matchedLines: [],
    occurrences: 1,
  });
}
