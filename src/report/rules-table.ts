import type { DisabledRuleIds, RuleDefinition } from "../checker/types.js";
import { renderAsciiTable } from "./report-utils.js";

export function renderRulesTable(
  rules: readonly RuleDefinition[],
  disabledRuleIds: DisabledRuleIds = [],
): string {
  const disabled = new Set(disabledRuleIds);
  return renderAsciiTable(
    rules.map((rule) => [
      rule.id,
      rule.category,
      rule.severity,
      rule.group,
      disabled.has(rule.id) ? "disabled" : "enabled",
      rule.description,
    ]),
    ["Rule", "Category", "Severity", "Group", "State", "Description"],
  );
}
