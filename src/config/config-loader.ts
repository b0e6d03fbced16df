import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigLoadError } from "../errors.js";
import { isMissingFile } from "../ingest/file-discovery.js";
import { ConfigSchema, formatIssues, type ScanConfig } from "./schema.js";

export const CONFIG_FILE_NAMES = [
  ".compliscan.yaml",
  ".compliscan.yml",
  "compliscan.config.yaml",
] as const;

export interface LoadedConfig {
  readonly config: ScanConfig;
  /** `null` when no file was found and defaults apply. */
  readonly path: string | null;
}

/**
 * Load the scan configuration. An explicit path must exist; otherwise the
 * first of {@link CONFIG_FILE_NAMES} found in `cwd` is used, falling back to
 * defaults. `rules_dir` is resolved relative to the file that names it.
 */
export async function loadConfig(
  cwd: string,
  explicitPath?: string,
): Promise<LoadedConfig> {
  if (explicitPath) {
    const configPath = path.resolve(cwd, explicitPath);
    const raw = await readConfigFile(configPath);
    if (raw === null) {
      throw new ConfigLoadError(configPath, ["file not found"]);
    }
    return { config: parseConfig(raw, configPath), path: configPath };
  }

  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(cwd, name);
    const raw = await readConfigFile(configPath);
    if (raw !== null) {
      return { config: parseConfig(raw, configPath), path: configPath };
    }
  }

  return { config: ConfigSchema.parse({}), path: null };
}

export function parseConfig(raw: string, configPath: string): ScanConfig {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(configPath, [`invalid YAML: ${message}`]);
  }

  const result = ConfigSchema.safeParse(doc ?? {});
  if (!result.success) {
    throw new ConfigLoadError(configPath, formatIssues(result.error));
  }

  const config = result.data;
  if (config.rules_dir) {
    return {
      ...config,
      rules_dir: path.resolve(path.dirname(configPath), config.rules_dir),
    };
  }
  return config;
}

async function readConfigFile(configPath: string): Promise<string | null> {
  try {
    return await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}
