import { createAggregateMatch, createPointMatch } from "../match-factory.js";
import { RuleId } from "../rule-ids.js";
import type { TextIndex } from "../text-index.js";
import type { RuleDefinition, RuleMatch } from "../types.js";
import { WORD_CHAR, findAll } from "./patterns.js";

const EM_DASH = "—";

export const multipleBlankLinesRule: RuleDefinition = {
  id: RuleId.MultipleBlankLines,
  name: "Multiple Blank Lines",
  category: "formatting",
  severity: "low",
  group: "medium",
  description: "Runs of three or more newlines",
  check: checkMultipleBlankLines,
};

export const tabCharactersRule: RuleDefinition = {
  id: RuleId.TabCharacters,
  name: "Tab Characters",
  category: "formatting",
  severity: "low",
  group: "medium",
  description: "Tab characters anywhere in the document",
  check: checkTabCharacters,
};

export const doubleHyphenEmdashRule: RuleDefinition = {
  id: RuleId.DoubleHyphenEmdash,
  name: "Double Hyphen Instead of Em-Dash",
  category: "formatting",
  severity: "low",
  group: "medium",
  description: "A doubled hyphen between two words, standing in for an em-dash",
  check: checkDoubleHyphenEmdash,
};

function checkMultipleBlankLines(index: TextIndex): RuleMatch[] {
  return findAll(/\n{3,}/g, index.text).map((match) =>
    createAggregateMatch(multipleBlankLinesRule, {
      matchedText: `${match[0].length - 1} consecutive blank lines`,
      suggestion: "Reduce to single blank line",
      location: index.lineLocation(match.index),
      context: "Excessive vertical spacing",
    }),
  );
}

function checkTabCharacters(index: TextIndex): RuleMatch[] {
  const tabCount = index.count("\t");
  if (tabCount === 0) {
    return [];
  }
  return [
    createAggregateMatch(tabCharactersRule, {
      matchedText: `${tabCount} tab character(s)`,
      suggestion: "Replace tabs with spaces for consistent formatting",
      location: "Multiple locations",
      context: "Tabs may render inconsistently across applications",
    }),
  ];
}

function checkDoubleHyphenEmdash(index: TextIndex): RuleMatch[] {
  const pattern = new RegExp(`(${WORD_CHAR})\\s*--\\s*(${WORD_CHAR})`, "gu");
  return findAll(pattern, index.text).map((match) =>
    createPointMatch(doubleHyphenEmdashRule, index, {
      start: match.index,
      end: match.index + match[0].length,
      matchedText: match[0],
      suggestion: `${match[1] ?? ""}${EM_DASH}${match[2] ?? ""}`,
    }),
  );
}
