import { createAggregateMatch } from "../match-factory.js";
import { RuleId } from "../rule-ids.js";
import type { TextIndex } from "../text-index.js";
import type { RuleDefinition, RuleMatch } from "../types.js";

export const QUOTE_CHARS = {
  straightDouble: '"',
  straightSingle: "'",
  leftDouble: "“",
  rightDouble: "”",
  leftSingle: "‘",
  rightSingle: "’",
} as const;

// Apostrophes are common, so a handful of each style is not worth flagging.
export const APOSTROPHE_MIX_MIN = 3;

export const STRAIGHT_ONLY_MIN = 10;

export const inconsistentQuotesRule: RuleDefinition = {
  id: RuleId.InconsistentQuotes,
  name: "Inconsistent Quotes",
  category: "formatting",
  severity: "low",
  group: "medium",
  description: "Straight and curly quotes (or apostrophes) mixed in one document",
  check: checkInconsistentQuotes,
};

export const straightVsCurlyQuotesRule: RuleDefinition = {
  id: RuleId.StraightVsCurlyQuotes,
  name: "Straight Quotes Only",
  category: "formatting",
  severity: "low",
  group: "low",
  description: "Many straight quotes and no curly quotes at all",
  check: checkStraightVsCurlyQuotes,
};

interface QuoteCounts {
  readonly straightDouble: number;
  readonly curlyDouble: number;
  readonly straightSingle: number;
  readonly curlySingle: number;
}

function countQuotes(index: TextIndex): QuoteCounts {
  return {
    straightDouble: index.count(QUOTE_CHARS.straightDouble),
    curlyDouble:
      index.count(QUOTE_CHARS.leftDouble) + index.count(QUOTE_CHARS.rightDouble),
    straightSingle: index.count(QUOTE_CHARS.straightSingle),
    curlySingle:
      index.count(QUOTE_CHARS.leftSingle) + index.count(QUOTE_CHARS.rightSingle),
  };
}

function checkInconsistentQuotes(index: TextIndex): RuleMatch[] {
  const counts = countQuotes(index);
  const matches: RuleMatch[] = [];

  if (counts.straightDouble > 0 && counts.curlyDouble > 0) {
    matches.push(
      createAggregateMatch(inconsistentQuotesRule, {
        name: "Inconsistent Double Quotes",
        matchedText: `Mix of " (${counts.straightDouble}) and “/” (${counts.curlyDouble})`,
        suggestion: "Use consistent quote style throughout",
        location: "Document-wide",
        context: "Consider using curly quotes for published documents",
      }),
    );
  }

  if (
    counts.straightSingle > APOSTROPHE_MIX_MIN &&
    counts.curlySingle > APOSTROPHE_MIX_MIN
  ) {
    matches.push(
      createAggregateMatch(inconsistentQuotesRule, {
        name: "Inconsistent Single Quotes/Apostrophes",
        matchedText: `Mix of ' (${counts.straightSingle}) and ‘/’ (${counts.curlySingle})`,
        suggestion: "Use consistent apostrophe style",
        location: "Document-wide",
        context: "May indicate copy-paste from different sources",
      }),
    );
  }

  return matches;
}

function checkStraightVsCurlyQuotes(index: TextIndex): RuleMatch[] {
  const counts = countQuotes(index);
  const straight = counts.straightDouble + counts.straightSingle;
  const curly = counts.curlyDouble + counts.curlySingle;
  if (straight <= STRAIGHT_ONLY_MIN || curly > 0) {
    return [];
  }
  return [
    createAggregateMatch(straightVsCurlyQuotesRule, {
      matchedText: `${straight} straight quotes`,
      suggestion: "Consider using curly quotes for professional documents",
      location: "Document-wide",
      context: "Straight quotes are fine for code/technical docs",
    }),
  ];
}
