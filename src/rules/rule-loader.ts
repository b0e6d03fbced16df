import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { RuleLoadError } from "../errors.js";
import { CONTENT_TYPES, type ContentType } from "../ingest/types.js";
import { createLogger } from "../utils/logger.js";
import { getValidator } from "./validators.js";
import {
  CONFIDENCES,
  RULE_KINDS,
  SEVERITIES,
  type CompiledPattern,
  type Confidence,
  type LoadedRules,
  type Rule,
  type RuleDefinition,
  type RuleKind,
  type RuleMeta,
  type RulePattern,
  type RuleScope,
  type Severity,
} from "./types.js";

const logger = createLogger("rules");

const META_FILE = "_meta.yaml";

const RULE_KEYS = new Set([
  "id",
  "kind",
  "framework",
  "control_id",
  "title",
  "description",
  "severity",
  "confidence",
  "needs_review",
  "scope",
  "patterns",
  "applies_when",
  "validator",
  "remediation",
  "tags",
]);

export interface LoadRulesOptions {
  readonly baseDir: string;
  readonly overrideDir?: string;
}

/**
 * Load the base catalog and, when given, an override catalog whose rules
 * replace base rules of the same id.
 */
export async function loadRulesWithOverrides(
  options: LoadRulesOptions,
): Promise<LoadedRules> {
  const base = await loadRules(options.baseDir);
  if (!options.overrideDir) {
    return base;
  }

  const override = await loadRules(options.overrideDir, base.meta.frameworks);
  const merged = new Map<string, Rule>();
  for (const rule of base.rules) {
    merged.set(rule.id, rule);
  }
  for (const rule of override.rules) {
    if (merged.has(rule.id)) {
      logger.debug(`Rule ${rule.id} overridden by ${options.overrideDir}`);
    }
    merged.set(rule.id, rule);
  }

  return {
    rules: sortRules(Array.from(merged.values())),
    meta: {
      rule_format_version: override.meta.rule_format_version,
      frameworks: { ...base.meta.frameworks, ...override.meta.frameworks },
    },
  };
}

/**
 * Load and compile every `*.yaml` rule file in `rulesDir`. Any malformed
 * rule, invalid regex, unknown framework or duplicate id rejects with a
 * {@link RuleLoadError}.
 */
export async function loadRules(
  rulesDir: string,
  inheritedFrameworks: Readonly<Record<string, string>> = {},
): Promise<LoadedRules> {
  const meta = await loadMeta(path.join(rulesDir, META_FILE));
  const frameworks = { ...inheritedFrameworks, ...meta.frameworks };
  const entries = await fs.readdir(rulesDir, { withFileTypes: true });
  const fileNames = entries
    .filter(
      (entry) =>
        entry.isFile() &&
        /\.ya?ml$/.test(entry.name) &&
        entry.name !== META_FILE,
    )
    .map((entry) => entry.name)
    .sort();

  const rules: Rule[] = [];
  const origins = new Map<string, string>();
  for (const fileName of fileNames) {
    const filePath = path.join(rulesDir, fileName);
    for (const rule of await loadRuleFile(filePath, frameworks)) {
      const previous = origins.get(rule.id);
      if (previous) {
        throw new RuleLoadError(filePath, [
          `duplicate rule id ${rule.id} (first defined in ${previous})`,
        ]);
      }
      origins.set(rule.id, filePath);
      rules.push(rule);
    }
  }

  logger.debug(`Loaded ${rules.length} rules from ${rulesDir}`);
  return { rules: sortRules(rules), meta: { ...meta, frameworks } };
}

async function loadMeta(metaPath: string): Promise<RuleMeta> {
  const doc = await readYaml(metaPath);
  if (!isRecord(doc)) {
    throw new RuleLoadError(metaPath, ["meta file must be a mapping"]);
  }

  const problems: string[] = [];
  const version = doc.rule_format_version;
  if (typeof version !== "string" && typeof version !== "number") {
    problems.push("rule_format_version is required");
  }

  const frameworks: Record<string, string> = {};
  if (doc.frameworks !== undefined) {
    if (!isRecord(doc.frameworks)) {
      problems.push("frameworks must map framework ids to names");
    } else {
      for (const [id, name] of Object.entries(doc.frameworks)) {
        if (typeof name !== "string" || !name) {
          problems.push(`frameworks.${id} must be a non-empty string`);
          continue;
        }
        frameworks[id] = name;
      }
    }
  }

  if (problems.length > 0) {
    throw new RuleLoadError(metaPath, problems);
  }
  return { rule_format_version: String(version), frameworks };
}

async function loadRuleFile(
  filePath: string,
  frameworks: Readonly<Record<string, string>>,
): Promise<Rule[]> {
  const doc = await readYaml(filePath);
  if (!isRecord(doc) || !Array.isArray(doc.rules)) {
    throw new RuleLoadError(filePath, ["expected a top-level `rules` list"]);
  }

  const problems: string[] = [];
  const rules: Rule[] = [];
  doc.rules.forEach((input: unknown, index: number) => {
    const before = problems.length;
    const definition = parseRule(input, `rules[${index}]`, problems, frameworks);
    if (problems.length > before) {
      return;
    }
    const rule = compileRule(definition, problems);
    if (rule) {
      rules.push(rule);
    }
  });

  if (problems.length > 0) {
    throw new RuleLoadError(filePath, problems);
  }
  return rules;
}

async function readYaml(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RuleLoadError(filePath, [message]);
  }

  try {
    return yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RuleLoadError(filePath, [`invalid YAML: ${message}`]);
  }
}

/**
 * Validate one raw rule. Problems are appended to `errors`; the returned
 * value is only meaningful when none were added.
 */
export function parseRule(
  input: unknown,
  label: string,
  errors: string[],
  frameworks: Readonly<Record<string, string>>,
): RuleDefinition {
  if (!isRecord(input)) {
    errors.push(`${label} must be a mapping`);
    return emptyRule();
  }

  const id = requireString(input, "id", label, errors);
  const where = id ? `${label} (${id})` : label;

  for (const key of Object.keys(input)) {
    if (!RULE_KEYS.has(key)) {
      errors.push(`${where}: unknown key '${key}'`);
    }
  }

  const kind = optionalEnum<RuleKind>(input.kind, RULE_KINDS, "match");
  if (!kind) {
    errors.push(`${where}.kind must be one of ${RULE_KINDS.join(", ")}`);
  }

  const framework = requireString(input, "framework", where, errors);
  if (framework && !Object.hasOwn(frameworks, framework)) {
    errors.push(`${where}.framework '${framework}' is not declared in ${META_FILE}`);
  }

  const severity = optionalEnum<Severity>(input.severity, SEVERITIES);
  if (!severity) {
    errors.push(`${where}.severity must be one of ${SEVERITIES.join(", ")}`);
  }

  const confidence = optionalEnum<Confidence>(
    input.confidence,
    CONFIDENCES,
    "high",
  );
  if (!confidence) {
    errors.push(`${where}.confidence must be one of ${CONFIDENCES.join(", ")}`);
  }

  const needsReview = input.needs_review ?? false;
  if (typeof needsReview !== "boolean") {
    errors.push(`${where}.needs_review must be a boolean`);
  }

  const patterns = parsePatterns(input.patterns, `${where}.patterns`, errors);
  if (patterns.length === 0) {
    errors.push(`${where}.patterns must list at least one pattern`);
  }

  const appliesWhen =
    input.applies_when === undefined
      ? undefined
      : parsePatterns(input.applies_when, `${where}.applies_when`, errors);
  if (appliesWhen && kind !== "require") {
    errors.push(`${where}.applies_when is only valid on require rules`);
  }

  const validator = input.validator;
  if (validator !== undefined) {
    if (typeof validator !== "string" || !getValidator(validator)) {
      errors.push(`${where}.validator '${String(validator)}' is not a known validator`);
    } else if (kind !== "match") {
      errors.push(`${where}.validator is only valid on match rules`);
    }
  }

  return {
    id,
    kind: kind ?? "match",
    framework,
    control_id: requireString(input, "control_id", where, errors),
    title: requireString(input, "title", where, errors),
    description: requireString(input, "description", where, errors),
    severity: severity ?? "info",
    confidence: confidence ?? "high",
    needs_review: needsReview === true,
    scope: parseScope(input.scope, `${where}.scope`, errors),
    patterns,
    applies_when: appliesWhen,
    validator: typeof validator === "string" ? validator : undefined,
    remediation: requireString(input, "remediation", where, errors),
    tags: parseStringList(input.tags, `${where}.tags`, errors),
  };
}

/**
 * Compile the patterns of a validated rule. Returns `null` and records a
 * problem when a regex does not compile or matches the empty string.
 */
export function compileRule(
  definition: RuleDefinition,
  errors: string[],
): Rule | null {
  const before = errors.length;
  const compiled = compilePatterns(definition.id, definition.patterns, errors);
  const compiledPreconditions = compilePatterns(
    definition.id,
    definition.applies_when ?? [],
    errors,
  );
  if (errors.length > before) {
    return null;
  }

  const accepts = definition.validator
    ? getValidator(definition.validator)
    : undefined;
  return Object.freeze({
    ...definition,
    compiled,
    compiledPreconditions,
    accepts,
  });
}

function compilePatterns(
  ruleId: string,
  patterns: readonly RulePattern[],
  errors: string[],
): CompiledPattern[] {
  const compiled: CompiledPattern[] = [];
  for (const pattern of patterns) {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern.regex, "gim");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      errors.push(`${ruleId}: invalid regex /${pattern.regex}/: ${message}`);
      continue;
    }
    if ("".search(regex) === 0) {
      errors.push(`${ruleId}: regex /${pattern.regex}/ matches the empty string`);
      continue;
    }
    compiled.push({ description: pattern.description, regex });
  }
  return compiled;
}

function parseScope(input: unknown, label: string, errors: string[]): RuleScope {
  if (!isRecord(input)) {
    errors.push(`${label} must be a mapping with content_types`);
    return { content_types: [] };
  }

  const contentTypes: ContentType[] = [];
  const rawTypes = input.content_types;
  if (!Array.isArray(rawTypes) || rawTypes.length === 0) {
    errors.push(`${label}.content_types must be a non-empty list`);
  } else {
    for (const value of rawTypes) {
      const type = optionalEnum<ContentType>(value, CONTENT_TYPES);
      if (!type) {
        errors.push(
          `${label}.content_types: '${String(value)}' is not one of ${CONTENT_TYPES.join(", ")}`,
        );
        continue;
      }
      contentTypes.push(type);
    }
  }

  return {
    content_types: contentTypes,
    file_globs: parseStringList(input.file_globs, `${label}.file_globs`, errors),
  };
}

function parsePatterns(
  input: unknown,
  label: string,
  errors: string[],
): RulePattern[] {
  if (!Array.isArray(input)) {
    errors.push(`${label} must be a list`);
    return [];
  }

  const patterns: RulePattern[] = [];
  input.forEach((value: unknown, index: number) => {
    if (
      !isRecord(value) ||
      typeof value.regex !== "string" ||
      !value.regex ||
      typeof value.description !== "string" ||
      !value.description
    ) {
      errors.push(`${label}[${index}] needs a regex and a description`);
      return;
    }
    patterns.push({ regex: value.regex, description: value.description });
  });
  return patterns;
}

function parseStringList(
  input: unknown,
  label: string,
  errors: string[],
): string[] | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (!Array.isArray(input) || !input.every((item) => typeof item === "string")) {
    errors.push(`${label} must be a list of strings`);
    return undefined;
  }
  return input.filter((item): item is string => typeof item === "string");
}

function requireString(
  input: Record<string, unknown>,
  key: string,
  label: string,
  errors: string[],
): string {
  const value = input[key];
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value !== "string" || !value.trim()) {
    errors.push(`${label}.${key} is required`);
    return "";
  }
  return value;
}

function optionalEnum<T extends string>(
  value: unknown,
  allowed: readonly T[],
  fallback?: T,
): T | undefined {
  if (value === undefined) {
    return fallback;
  }
  return allowed.find((candidate) => candidate === value);
}

function sortRules(rules: Rule[]): Rule[] {
  return rules.sort((a, b) => a.id.localeCompare(b.id));
}

function emptyRule(): RuleDefinition {
  return {
    id: "",
    kind: "match",
    framework: "",
    control_id: "",
    title: "",
    description: "",
    severity: "info",
    confidence: "high",
    needs_review: false,
    scope: { content_types: [] },
    patterns: [],
    remediation: "",
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
