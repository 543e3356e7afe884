import { createLogger, type Logger } from "../logging/logger.js";
import { RULE_CATALOGUE } from "./catalogue.js";
import { TextIndex } from "./text-index.js";
import type {
  DisabledRuleIds,
  RuleDefinition,
  RuleMatch,
  RunRulesOptions,
} from "./types.js";

const defaultLogger = createLogger({ level: "warn", context: "checker" });

/**
 * Run every enabled rule over `text` and return their matches in catalogue
 * order. Ids in `disabledRuleIds` that name no rule are ignored.
 *
 * A rule that throws contributes no matches; the failure is reported to
 * `options.logger` (stderr by default) at warn level.
 */
export function runRules(
  text: string,
  disabledRuleIds: DisabledRuleIds = [],
  options: RunRulesOptions = {},
): RuleMatch[] {
  const disabled = new Set(disabledRuleIds);
  const rules = options.rules ?? RULE_CATALOGUE;
  const logger = options.logger ?? defaultLogger;
  const index = new TextIndex(text);
  const matches: RuleMatch[] = [];

  for (const rule of rules) {
    if (disabled.has(rule.id)) {
      continue;
    }
    for (const match of runRule(rule, index, logger)) {
      matches.push(match);
    }
  }

  return matches;
}

export function enabledRules(
  disabledRuleIds: DisabledRuleIds = [],
  rules: readonly RuleDefinition[] = RULE_CATALOGUE,
): RuleDefinition[] {
  const disabled = new Set(disabledRuleIds);
  return rules.filter((rule) => !disabled.has(rule.id));
}

function runRule(
  rule: RuleDefinition,
  index: TextIndex,
  logger: Logger,
): RuleMatch[] {
  try {
    return rule.check(index);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Rule ${rule.id} failed; skipping its matches`, {
      rule_id: rule.id,
      error: message,
    });
    return [];
  }
}
