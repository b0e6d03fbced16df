import { RuleLoadError } from "../errors.js";
import type { FrameworkId, LoadedRules, Rule } from "./types.js";

export interface RuleSelection {
  readonly frameworks?: readonly FrameworkId[];
  readonly excludeRules?: readonly string[];
}

/**
 * Narrow a loaded catalog to the selected frameworks, minus excluded rule
 * ids. Naming a framework the catalog does not declare is a load error.
 */
export function selectRules(
  loaded: LoadedRules,
  selection: RuleSelection = {},
): Rule[] {
  const frameworks = selection.frameworks ?? [];
  const unknown = frameworks.filter(
    (framework) => !Object.hasOwn(loaded.meta.frameworks, framework),
  );
  if (unknown.length > 0) {
    throw new RuleLoadError(
      "frameworks",
      unknown.map((framework) => `unknown framework '${framework}'`),
    );
  }

  const wanted = new Set(frameworks);
  const excluded = new Set(selection.excludeRules ?? []);
  return loaded.rules.filter(
    (rule) =>
      (wanted.size === 0 || wanted.has(rule.framework)) &&
      !excluded.has(rule.id),
  );
}
