import fs from "node:fs/promises";
import path from "node:path";
import type { Artifact, ContentType } from "../src/ingest/types.js";
import { compileRule } from "../src/rules/rule-loader.js";
import type { Rule, RuleDefinition } from "../src/rules/types.js";

const BASE_RULE: RuleDefinition = {
  id: "TEST-001",
  kind: "match",
  framework: "gdpr",
  control_id: "Article 32",
  title: "Test rule",
  description: "Rule used in tests",
  severity: "high",
  confidence: "high",
  needs_review: false,
  scope: { content_types: ["code", "config", "document"] },
  patterns: [{ regex: "password\\s*=", description: "password assignment" }],
  remediation: "Fix it",
};

export function makeRule(overrides: Partial<RuleDefinition> = {}): Rule {
  const errors: string[] = [];
  const rule = compileRule({ ...BASE_RULE, ...overrides }, errors);
  if (!rule) {
    throw new Error(errors.join("; "));
  }
  return rule;
}

export function makeArtifact(
  id: string,
  text: string,
  contentType: ContentType = "code",
): Artifact {
  return {
    id,
    absolutePath: `/virtual/${id}`,
    contentType,
    sizeBytes: Buffer.byteLength(text),
    text,
  };
}

export async function writeText(
  filePath: string,
  content: string | Uint8Array,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}
