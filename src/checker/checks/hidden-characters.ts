import { createAggregateMatch } from "../match-factory.js";
import { RuleId } from "../rule-ids.js";
import type { TextIndex } from "../text-index.js";
import type { RuleDefinition, RuleMatch } from "../types.js";

export const HIDDEN_CHARACTERS: ReadonlyArray<readonly [string, string]> = [
  ["\u200b", "zero-width space"],
  ["\u200c", "zero-width non-joiner"],
  ["\u200d", "zero-width joiner"],
  ["\ufeff", "byte order mark"],
  ["\u00a0", "non-breaking space"],
  ["\u2060", "word joiner"],
];

export const hiddenCharactersRule: RuleDefinition = {
  id: RuleId.HiddenCharacters,
  name: "Hidden Characters",
  category: "formatting",
  severity: "medium",
  group: "low",
  description: "Zero-width, byte-order-mark and non-breaking space characters",
  check: checkHiddenCharacters,
};

function checkHiddenCharacters(index: TextIndex): RuleMatch[] {
  const found: string[] = [];
  for (const [char, name] of HIDDEN_CHARACTERS) {
    const count = index.count(char);
    if (count > 0) {
      found.push(`${name}: ${count}`);
    }
  }
  if (found.length === 0) {
    return [];
  }
  return [
    createAggregateMatch(hiddenCharactersRule, {
      matchedText: "Found hidden characters",
      suggestion: "Remove hidden characters that may cause display issues",
      location: "Document-wide",
      context: found.join(", "),
    }),
  ];
}
