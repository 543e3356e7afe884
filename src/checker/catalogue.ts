import { unclosedBracketsRule } from "./checks/brackets.js";
import { hiddenCharactersRule } from "./checks/hidden-characters.js";
import {
  doubleHyphenEmdashRule,
  multipleBlankLinesRule,
  tabCharactersRule,
} from "./checks/layout.js";
import {
  inconsistentQuotesRule,
  straightVsCurlyQuotesRule,
} from "./checks/quotes.js";
import { repeatedWordsRule } from "./checks/repeated-words.js";
import {
  doubleSpacesRule,
  missingSpaceAfterPunctRule,
  spaceBeforePunctRule,
  trailingWhitespaceRule,
} from "./checks/spacing.js";
import type { RuleDefinition } from "./types.js";

/**
 * Built-in rules in the order they run and report. The grouping is for
 * readers only; it has no effect beyond this order.
 */
export const RULE_CATALOGUE: readonly RuleDefinition[] = Object.freeze([
  // high value
  doubleSpacesRule,
  repeatedWordsRule,
  missingSpaceAfterPunctRule,
  spaceBeforePunctRule,
  unclosedBracketsRule,
  trailingWhitespaceRule,
  // medium value
  multipleBlankLinesRule,
  inconsistentQuotesRule,
  tabCharactersRule,
  doubleHyphenEmdashRule,
  // lower priority
  hiddenCharactersRule,
  straightVsCurlyQuotesRule,
]);

export function findRule(
  ruleId: string,
  rules: readonly RuleDefinition[] = RULE_CATALOGUE,
): RuleDefinition | undefined {
  return rules.find((rule) => rule.id === ruleId);
}

export function isKnownRuleId(ruleId: string): boolean {
  return findRule(ruleId) !== undefined;
}
