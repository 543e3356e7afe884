import { describe, expect, it } from "vitest";
import {
  analyzeText,
  createIssue,
  matchToIssue,
  mergeIssues,
  parseExternalIssues,
  runRules,
  truncateText,
} from "../../src/index.js";
import { Logger, type LogEntry } from "../../src/logging/logger.js";

const FIXED_NOW = (): Date => new Date("2024-01-02T03:04:05.000Z");

const missingPricing = createIssue({
  source: "external",
  category: "missing_content",
  severity: "high",
  title: "Missing pricing",
  description: "No pricing section",
});

describe("analyzeText", () => {
  it("turns rule matches into scored issues", () => {
    const result = analyzeText({ text: "the the cat sat  down", now: FIXED_NOW });

    expect(result.title).toBe("Untitled");
    expect(result.analyzed_at).toBe("2024-01-02T03:04:05.000Z");
    expect(result.issues.map((issue) => issue.title)).toEqual([
      "Double Spaces",
      "Repeated Word",
    ]);
    expect(result.issues.every((issue) => issue.source === "rule")).toBe(true);
    expect(result.rule_matches.map((match) => match.source)).toEqual([
      "rule",
      "rule",
    ]);
    expect(result.score).toEqual({
      spelling_grammar: 90,
      required_content: 100,
      math_accuracy: 100,
      overall: 95,
    });
  });

  it("puts external issues ahead of rule issues", () => {
    const result = analyzeText({
      text: "the the cat sat  down",
      externalIssues: [missingPricing],
    });

    expect(result.issues.map((issue) => issue.title)).toEqual([
      "Missing pricing",
      "Double Spaces",
      "Repeated Word",
    ]);
    expect(result.score.required_content).toBe(85);
    expect(result.score.overall).toBe(89);
  });

  it("records disabled rules sorted and without duplicates", () => {
    const result = analyzeText({
      text: "the the cat sat  down",
      disabledRules: ["tab-characters", "double-spaces", "tab-characters"],
    });

    expect(result.disabled_rules).toEqual(["double-spaces", "tab-characters"]);
    expect(result.issues.map((issue) => issue.rule_id)).toEqual(["repeated-words"]);
    expect(result.score.overall).toBe(97);
  });

  it("analyzes only the first maxChars characters", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ level: "info" }).addTransport((entry) =>
      entries.push(entry),
    );

    const result = analyzeText({
      text: "hello world  again",
      maxChars: 11,
      logger,
    });

    expect(result.truncated).toBe(true);
    expect(result.text_length).toBe(18);
    expect(result.analyzed_length).toBe(11);
    expect(result.issues).toEqual([]);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.context).toBe("analysis");
    expect(entries[0]?.message).toBe("Document truncated before analysis");
    expect(entries[0]?.data).toEqual({ original_length: 18, analyzed_length: 11 });
  });

  it("keeps separate issues for matches on the same line", () => {
    const result = analyzeText({ text: "a  b  c" });
    expect(result.issues.map((issue) => issue.location)).toEqual([
      "Line 1, position 1",
      "Line 1, position 4",
    ]);
    expect(new Set(result.issues.map((issue) => issue.id)).size).toBe(2);
  });

  it("keeps identical findings on one line as separate issues", () => {
    const punctuation = analyzeText({ text: "Hi,there. Hi,there." });
    expect(punctuation.rule_matches).toHaveLength(2);
    expect(punctuation.issues.map((issue) => issue.location)).toEqual([
      "Line 1",
      "Line 1",
    ]);
    expect(new Set(punctuation.issues.map((issue) => issue.id)).size).toBe(2);
    expect(punctuation.score.spelling_grammar).toBe(90);

    const repeated = analyzeText({ text: "the the and the the" });
    expect(repeated.rule_matches).toHaveLength(2);
    expect(repeated.issues).toHaveLength(2);
    expect(repeated.score.spelling_grammar).toBe(90);
  });

  it("gives the same ids on every run", () => {
    const first = analyzeText({ text: "the the and the the" });
    const second = analyzeText({ text: "the the and the the" });
    expect(second.issues.map((issue) => issue.id)).toEqual(
      first.issues.map((issue) => issue.id),
    );
  });
});

describe("matchToIssue", () => {
  it("describes the matched text and keeps the rule id", () => {
    const [match] = runRules("the the cat");
    expect(match).toBeDefined();
    if (!match) {
      return;
    }

    const issue = matchToIssue(match);
    expect(issue.id).toMatch(/^[0-9a-f]{12}$/);
    expect(issue).toMatchObject({
      source: "rule",
      rule_id: "repeated-words",
      category: "grammar",
      severity: "high",
      title: "Repeated Word",
      description: "Found: 'the the'",
      location: "Line 1",
      suggestion: "Remove duplicate 'the'",
      affects_score: true,
    });
    expect(matchToIssue(match).id).toBe(issue.id);
    expect(matchToIssue(match, 1).id).not.toBe(issue.id);
  });
});

describe("parseExternalIssues", () => {
  it("accepts well-formed issues", () => {
    const [issue] = parseExternalIssues([
      { category: "concern", severity: "info", title: "Tone", suggestion: "Soften" },
    ]);

    expect(issue).toMatchObject({
      source: "external",
      category: "concern",
      severity: "info",
      title: "Tone",
      description: "",
      suggestion: "Soften",
      affects_score: false,
    });
  });

  it("honours an explicit affects_score", () => {
    const [issue] = parseExternalIssues([
      { category: "style", severity: "low", title: "Wordy", affects_score: true },
    ]);
    expect(issue?.affects_score).toBe(true);
  });

  it("rejects input that is not an array", () => {
    expect(() => parseExternalIssues({ issues: [] })).toThrow(
      "Invalid issues: expected an array",
    );
  });

  it("reports every problem in one error", () => {
    expect(() =>
      parseExternalIssues([
        { category: "bogus", severity: "high", title: "", extra: 1 },
        42,
      ]),
    ).toThrow(
      "Invalid issues: issues[0].extra is not allowed; " +
        "issues[0].category must be one of spelling, grammar, spacing, formatting, math, missing_content, style, bannt, opportunity, concern; " +
        "issues[0].title must be a non-empty string; " +
        "issues[1] must be an object",
    );
  });
});

describe("mergeIssues", () => {
  it("drops later issues whose id was already seen", () => {
    const other = createIssue({
      source: "external",
      category: "style",
      severity: "low",
      title: "Passive voice",
      description: "Prefer active voice",
    });

    expect(mergeIssues([missingPricing], [missingPricing, other])).toEqual([
      missingPricing,
      other,
    ]);
  });
});

describe("truncateText", () => {
  it("leaves short text alone", () => {
    expect(truncateText("abc", 3)).toEqual({
      text: "abc",
      truncated: false,
      originalLength: 3,
    });
  });

  it("rejects a non-positive budget", () => {
    expect(() => truncateText("abc", 0)).toThrow(
      "maxChars must be a positive integer, got 0",
    );
  });
});
