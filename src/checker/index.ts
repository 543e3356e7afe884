export { RULE_CATALOGUE, findRule, isKnownRuleId } from "./catalogue.js";
export { enabledRules, runRules } from "./rule-engine.js";
export { CONTEXT_CHARS, TextIndex } from "./text-index.js";
export {
  createAggregateMatch,
  createPointMatch,
  toRuleRecord,
} from "./match-factory.js";
export { RuleId } from "./rule-ids.js";
export type {
  DisabledRuleIds,
  MatchCategory,
  MatchSeverity,
  RuleCheck,
  RuleDefinition,
  RuleGroup,
  RuleMatch,
  RuleRecord,
  RunRulesOptions,
} from "./types.js";
