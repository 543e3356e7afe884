import { createPointMatch } from "../match-factory.js";
import { RuleId } from "../rule-ids.js";
import type { TextIndex } from "../text-index.js";
import type { RuleDefinition, RuleMatch } from "../types.js";
import { WORD_CHAR, findAll } from "./patterns.js";

// Words that are often doubled on purpose ("had had", "very very").
export const REPEATED_WORD_STOPLIST: ReadonlySet<string> = new Set([
  "that",
  "had",
  "very",
  "really",
  "blah",
]);

const REPEATED_WORD = new RegExp(
  `(?<!${WORD_CHAR})(${WORD_CHAR}+)\\s+\\1(?!${WORD_CHAR})`,
  "giu",
);

export const repeatedWordsRule: RuleDefinition = {
  id: RuleId.RepeatedWords,
  name: "Repeated Word",
  category: "grammar",
  severity: "high",
  group: "high",
  description: "The same word twice in a row, ignoring case",
  check: checkRepeatedWords,
};

function checkRepeatedWords(index: TextIndex): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const match of findAll(REPEATED_WORD, index.text)) {
    const word = match[1] ?? "";
    if (REPEATED_WORD_STOPLIST.has(word.toLowerCase())) {
      continue;
    }
    matches.push(
      createPointMatch(repeatedWordsRule, index, {
        start: match.index,
        end: match.index + match[0].length,
        matchedText: match[0],
        suggestion: `Remove duplicate '${word}'`,
      }),
    );
  }
  return matches;
}
