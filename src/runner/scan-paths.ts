import path from "node:path";
import { loadConfig } from "../config/config-loader.js";
import { resolveRulesDirectory } from "../config/runtime-paths.js";
import type { ScanConfig } from "../config/schema.js";
import { RuleLoadError, TargetError } from "../errors.js";
import { loadArtifacts } from "../ingest/artifact-loader.js";
import { resolveTargets } from "../ingest/repo-loader.js";
import { buildRunResult } from "../report/run-result.js";
import type { RunResult } from "../report/types.js";
import { selectRules } from "../rules/rule-filter.js";
import { loadRules, loadRulesWithOverrides } from "../rules/rule-loader.js";
import type { FrameworkId, LoadedRules } from "../rules/types.js";
import { evaluateArtifacts } from "../scanner/rule-engine.js";
import {
  configureLogger,
  createLogger,
  type LogLevel,
} from "../utils/logger.js";

const logger = createLogger("scan");

export interface ScanPathsOptions {
  /** Only evaluate rules of these frameworks. */
  readonly frameworks?: readonly FrameworkId[];
  /** Catalog merged over the built-in one (or used alone, see `builtinRules`). */
  readonly rulesDir?: string;
  /** Set to `false` to scan with `rulesDir` only. */
  readonly builtinRules?: boolean;
  readonly configPath?: string;
  readonly cwd?: string;
  readonly concurrency?: number;
  readonly maxFileSizeBytes?: number;
  readonly excludeRules?: readonly string[];
  readonly ignore?: readonly string[];
  readonly logLevel?: LogLevel;
  readonly scanId?: string;
  readonly now?: () => Date;
}

/**
 * Scan files, directories or git URLs against the rule catalog.
 *
 * The catalog is loaded and compiled first, so a broken rule rejects before
 * any target is read. Artifacts that cannot be decoded are reported in
 * `failures` and do not stop the run.
 */
export async function scanPaths(
  targets: readonly string[],
  options: ScanPathsOptions = {},
): Promise<RunResult> {
  if (targets.length === 0) {
    throw new TargetError("", "At least one scan target is required.");
  }

  const cwd = path.resolve(options.cwd ?? process.cwd());
  const { config } = await loadConfig(cwd, options.configPath);
  const previousLogger = configureLogger({
    level: options.logLevel ?? config.log_level,
  });
  try {
    return await runScan(targets, options, cwd, config);
  } finally {
    configureLogger(previousLogger);
  }
}

async function runScan(
  targets: readonly string[],
  options: ScanPathsOptions,
  cwd: string,
  config: ScanConfig,
): Promise<RunResult> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();

  const loaded = await loadCatalog(
    options.builtinRules ?? true,
    options.rulesDir ? path.resolve(cwd, options.rulesDir) : config.rules_dir,
  );
  const frameworks = options.frameworks ?? config.frameworks ?? [];
  const rules = selectRules(loaded, {
    frameworks,
    excludeRules: [...config.exclude_rules, ...(options.excludeRules ?? [])],
  });
  const concurrency = options.concurrency ?? config.concurrency;

  const context = await resolveTargets(targets, {
    cwd,
    maxFileSizeBytes: options.maxFileSizeBytes ?? config.max_file_size_bytes,
    ignorePatterns: [...config.ignore, ...(options.ignore ?? [])],
  });

  try {
    const { artifacts, failures } = await loadArtifacts(context.sources, {
      concurrency,
    });
    const partials = await evaluateArtifacts(artifacts, rules, {
      concurrency,
    });

    const result = buildRunResult({
      scanId: options.scanId,
      targets,
      artifactIds: artifacts.map((artifact) => artifact.id),
      ruleIds: rules.map((rule) => rule.id),
      rulesVersion: loaded.meta.rule_format_version,
      frameworks: pickFrameworks(loaded.meta.frameworks, frameworks),
      partials,
      failures,
      filesSkipped: context.targets.reduce(
        (total, target) => total + target.skipped,
        0,
      ),
      startedAt,
      completedAt: now(),
    });

    logger.info(
      `Scanned ${artifacts.length} artifacts with ${rules.length} rules: ${result.summary.total_findings} findings, ${failures.length} failures`,
    );
    return result;
  } finally {
    await context.cleanup();
  }
}

async function loadCatalog(
  builtinRules: boolean,
  rulesDir: string | undefined,
): Promise<LoadedRules> {
  if (!builtinRules) {
    if (!rulesDir) {
      throw new RuleLoadError("rulesDir", [
        "a rules directory is required when built-in rules are disabled",
      ]);
    }
    return await loadRules(rulesDir);
  }
  return await loadRulesWithOverrides({
    baseDir: await resolveRulesDirectory(),
    overrideDir: rulesDir,
  });
}

function pickFrameworks(
  declared: Readonly<Record<FrameworkId, string>>,
  selected: readonly FrameworkId[],
): Record<FrameworkId, string> {
  if (selected.length === 0) {
    return { ...declared };
  }
  const picked: Record<FrameworkId, string> = {};
  for (const framework of selected) {
    const name = declared[framework];
    if (name !== undefined) {
      picked[framework] = name;
    }
  }
  return picked;
}
