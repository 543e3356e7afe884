import { createAggregateMatch, createPointMatch } from "../match-factory.js";
import { RuleId } from "../rule-ids.js";
import type { TextIndex } from "../text-index.js";
import type { RuleDefinition, RuleMatch } from "../types.js";
import { SPACING_PUNCTUATION, WORD_CHAR, findAll } from "./patterns.js";

const URL_MARKERS = ["http", "www.", "ftp", ".com", ".org"] as const;

export const URL_LOOKBACK_CHARS = 10;

const DIGIT = /\p{Nd}/u;

export const doubleSpacesRule: RuleDefinition = {
  id: RuleId.DoubleSpaces,
  name: "Double Spaces",
  category: "spacing",
  severity: "medium",
  group: "high",
  description: "Two or more consecutive spaces outside leading indentation",
  check: checkDoubleSpaces,
};

export const missingSpaceAfterPunctRule: RuleDefinition = {
  id: RuleId.MissingSpaceAfterPunct,
  name: "Missing Space After Punctuation",
  category: "spacing",
  severity: "medium",
  group: "high",
  description: "Punctuation immediately followed by a letter",
  check: checkMissingSpaceAfterPunct,
};

export const spaceBeforePunctRule: RuleDefinition = {
  id: RuleId.SpaceBeforePunct,
  name: "Space Before Punctuation",
  category: "spacing",
  severity: "medium",
  group: "high",
  description: "Whitespace between a word and the punctuation that follows it",
  check: checkSpaceBeforePunct,
};

export const trailingWhitespaceRule: RuleDefinition = {
  id: RuleId.TrailingWhitespace,
  name: "Trailing Whitespace",
  category: "formatting",
  severity: "low",
  group: "high",
  description: "Lines ending in whitespace, reported as one aggregate",
  check: checkTrailingWhitespace,
};

function checkDoubleSpaces(index: TextIndex): RuleMatch[] {
  const { text } = index;
  const matches: RuleMatch[] = [];
  for (const match of findAll(/ {2,}/g, text)) {
    const start = match.index;
    if (start === 0 || text[start - 1] === "\n") {
      continue;
    }
    matches.push(
      createPointMatch(doubleSpacesRule, index, {
        start,
        end: start + match[0].length,
        matchedText: `'${match[0]}'`,
        suggestion: "Replace with single space",
        location: index.positionLocation(start),
      }),
    );
  }
  return matches;
}

function checkMissingSpaceAfterPunct(index: TextIndex): RuleMatch[] {
  const { text } = index;
  const matches: RuleMatch[] = [];
  for (const match of findAll(/([.,;:!?])([A-Za-z])/g, text)) {
    const start = match.index;
    const punct = match[1] ?? "";
    const letter = match[2] ?? "";
    if (looksLikeUrl(text, start)) {
      continue;
    }
    if (punct === "." && start > 0 && DIGIT.test(text[start - 1] ?? "")) {
      continue;
    }
    matches.push(
      createPointMatch(missingSpaceAfterPunctRule, index, {
        start,
        end: start + match[0].length,
        matchedText: match[0],
        suggestion: `${punct} ${letter}`,
      }),
    );
  }
  return matches;
}

/**
 * Looks back at most URL_LOOKBACK_CHARS before the punctuation, and forward
 * over the rest of the token it sits in, for URL or domain markers. A URL
 * starting further back than the lookback is not recognised.
 */
function looksLikeUrl(text: string, start: number): boolean {
  const tail = /\S*/y;
  tail.lastIndex = start;
  const tokenEnd = tail.exec(text) ? tail.lastIndex : start;
  const window = text
    .slice(Math.max(0, start - URL_LOOKBACK_CHARS), tokenEnd)
    .toLowerCase();
  return URL_MARKERS.some((marker) => window.includes(marker));
}

function checkSpaceBeforePunct(index: TextIndex): RuleMatch[] {
  const pattern = new RegExp(`(${WORD_CHAR})\\s+(${SPACING_PUNCTUATION})`, "gu");
  return findAll(pattern, index.text).map((match) =>
    createPointMatch(spaceBeforePunctRule, index, {
      start: match.index,
      end: match.index + match[0].length,
      matchedText: match[0],
      suggestion: `${match[1] ?? ""}${match[2] ?? ""}`,
    }),
  );
}

function checkTrailingWhitespace(index: TextIndex): RuleMatch[] {
  const lines = index.text.split("\n");
  const trailingCount = lines.filter((line) => line !== line.trimEnd()).length;
  if (trailingCount === 0) {
    return [];
  }
  return [
    createAggregateMatch(trailingWhitespaceRule, {
      matchedText: `${trailingCount} line(s) with trailing whitespace`,
      suggestion: "Remove trailing spaces",
      location: "Multiple lines",
      context: `Found in ${trailingCount} of ${lines.length} lines`,
    }),
  ];
}
