export { loadRules, loadRulesWithOverrides, parseRule, compileRule } from "./rule-loader.js";
export { selectRules } from "./rule-filter.js";
export { luhnCheck, getValidator, MATCH_VALIDATORS } from "./validators.js";
export type { LoadRulesOptions } from "./rule-loader.js";
export type { RuleSelection } from "./rule-filter.js";
export type {
  CompiledPattern,
  Confidence,
  FrameworkId,
  LoadedRules,
  MatchValidator,
  Rule,
  RuleDefinition,
  RuleKind,
  RuleMeta,
  RulePattern,
  RuleScope,
  Severity,
} from "./types.js";
export { CONFIDENCES, RULE_KINDS, SEVERITIES } from "./types.js";
