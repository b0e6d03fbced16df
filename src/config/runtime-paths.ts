import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { RuleLoadError } from "../errors.js";

/**
 * Locate the built-in rule catalog: `rules/` at the package root, then
 * `rules/` in the working directory.
 */
export async function resolveRulesDirectory(): Promise<string> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const bundledRulesDir = path.resolve(moduleDir, "..", "..", "rules");
  if (await existsDirectory(bundledRulesDir)) {
    return bundledRulesDir;
  }

  const cwdRulesDir = path.resolve(process.cwd(), "rules");
  if (await existsDirectory(cwdRulesDir)) {
    return cwdRulesDir;
  }

  throw new RuleLoadError(bundledRulesDir, [
    "built-in rules directory not found",
  ]);
}

async function existsDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
