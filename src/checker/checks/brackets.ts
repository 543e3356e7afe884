import { createAggregateMatch } from "../match-factory.js";
import { RuleId } from "../rule-ids.js";
import type { TextIndex } from "../text-index.js";
import type { RuleDefinition, RuleMatch } from "../types.js";

export const BRACKET_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ["(", ")"],
  ["[", "]"],
  ["{", "}"],
];

export const unclosedBracketsRule: RuleDefinition = {
  id: RuleId.UnclosedBrackets,
  name: "Unclosed Bracket",
  category: "formatting",
  severity: "high",
  group: "high",
  description:
    "Different counts of opening and closing brackets, per bracket pair",
  check: checkUnclosedBrackets,
};

// Counts only: ") (" balances even though neither bracket is closed.
function checkUnclosedBrackets(index: TextIndex): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const [open, close] of BRACKET_PAIRS) {
    const openCount = index.count(open);
    const closeCount = index.count(close);
    const diff = openCount - closeCount;
    if (diff > 0) {
      matches.push(
        createAggregateMatch(unclosedBracketsRule, {
          matchedText: `${diff} unclosed '${open}'`,
          suggestion: `Add ${diff} closing '${close}'`,
          location: "Document-wide",
          context: `Found ${openCount} '${open}' but only ${closeCount} '${close}'`,
        }),
      );
    } else if (diff < 0) {
      matches.push(
        createAggregateMatch(unclosedBracketsRule, {
          name: "Extra Closing Bracket",
          matchedText: `${-diff} extra '${close}'`,
          suggestion: `Remove ${-diff} extra '${close}' or add opening '${open}'`,
          location: "Document-wide",
          context: `Found ${closeCount} '${close}' but only ${openCount} '${open}'`,
        }),
      );
    }
  }
  return matches;
}
