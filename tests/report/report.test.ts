import { describe, expect, it } from "vitest";
import { analyzeText } from "../../src/analysis/analyzer.js";
import { createIssue } from "../../src/analysis/issue-factory.js";
import { RULE_CATALOGUE } from "../../src/checker/catalogue.js";
import { buildJsonReport } from "../../src/report/json-reporter.js";
import { renderMarkdownReport } from "../../src/report/markdown-reporter.js";
import {
  clipText,
  formatBand,
  renderAsciiBox,
  singleLine,
} from "../../src/report/report-utils.js";
import { renderRulesTable } from "../../src/report/rules-table.js";
import type { ReviewReport } from "../../src/report/types.js";

const FIXED_NOW = (): Date => new Date("2024-01-02T03:04:05.000Z");

const passiveVoice = createIssue({
  source: "external",
  category: "style",
  severity: "low",
  title: "Passive voice",
  description: "Prefer active voice",
  suggestion: "Use active voice",
});

function sampleReport(): ReviewReport {
  return buildJsonReport({
    toolVersion: "1.2.3",
    source: "docs/proposal.txt",
    analysis: analyzeText({
      text: "the the cat sat  down",
      title: "proposal.txt",
      externalIssues: [passiveVoice],
      now: FIXED_NOW,
    }),
  });
}

describe("json report", () => {
  it("summarizes score and severity counts", () => {
    const report = sampleReport();

    expect(report.tool).toEqual({ name: "docreview", version: "1.2.3" });
    expect(report.title).toBe("proposal.txt");
    expect(report.source).toBe("docs/proposal.txt");
    expect(report.summary.overall).toBe(95);
    expect(report.summary.band).toBe("good");
    expect(report.summary.counts).toEqual({
      critical: 0,
      high: 1,
      medium: 1,
      low: 1,
      info: 0,
      total: 3,
    });
    expect(report.metadata).toEqual({
      analyzed_at: "2024-01-02T03:04:05.000Z",
      text_length: 21,
      analyzed_length: 21,
      truncated: false,
      disabled_rules: [],
    });
    expect(report.rule_matches).toHaveLength(2);
  });

  it("orders issues by severity", () => {
    const report = sampleReport();
    expect(report.issues.map((issue) => issue.title)).toEqual([
      "Repeated Word",
      "Double Spaces",
      "Passive voice",
    ]);
  });

  it("keeps analysis order within a severity", () => {
    const note = createIssue({
      source: "external",
      category: "opportunity",
      severity: "info",
      title: "Add a summary",
      description: "Consider an executive summary",
    });
    const report = buildJsonReport({
      toolVersion: "1.2.3",
      source: "-",
      analysis: analyzeText({ text: "a  b  c", externalIssues: [note] }),
    });

    expect(report.issues.map((issue) => issue.location)).toEqual([
      "Line 1, position 1",
      "Line 1, position 4",
      undefined,
    ]);
  });
});

describe("markdown report", () => {
  it("renders the header and score breakdown", () => {
    const lines = renderMarkdownReport(sampleReport()).split("\n");

    expect(lines[1]).toContain("| Document Review Report");
    expect(lines).toContain(
      "| Issues: 3 (critical 0, high 1, medium 1, low 1, info 0) |",
    );
    expect(lines.some((line) => line.startsWith("| Score: 95/100 (Good) "))).toBe(
      true,
    );
    expect(lines).toContain("| Spelling/Grammar | 90/100  |");
    expect(lines).toContain("| Required Content | 100/100 |");
    expect(lines).toContain("### Issues");
  });

  it("limits the issue table", () => {
    const output = renderMarkdownReport(sampleReport(), { maxIssues: 1 });

    expect(output).toContain("Repeated Word");
    expect(output).not.toContain("Double Spaces");
    expect(output).toContain("Showing 1 of 3 issues. Use --max-issues to adjust.");
  });

  it("lists suggestions when asked", () => {
    const output = renderMarkdownReport(sampleReport(), { showSuggestions: true });
    const suggestions = output.split("### Suggestions\n\n")[1]?.split("\n");

    expect(suggestions).toEqual([
      "- Repeated Word (Line 1): Remove duplicate 'the'",
      "- Double Spaces (Line 1, position 15): Replace with single space",
      "- Passive voice: Use active voice",
    ]);
  });

  it("omits issues from a summary-only report", () => {
    const output = renderMarkdownReport(sampleReport(), { showIssues: false });
    expect(output).not.toContain("### Issues");
    expect(output).toContain("Document Review Report");
  });

  it("says so when there are no issues", () => {
    const report = buildJsonReport({
      toolVersion: "1.2.3",
      source: "clean.txt",
      analysis: analyzeText({ text: "All good here." }),
    });
    expect(renderMarkdownReport(report, { showSummary: false })).toBe(
      "No issues detected.",
    );
  });

  it("notes truncated input", () => {
    const report = buildJsonReport({
      toolVersion: "1.2.3",
      source: "long.txt",
      analysis: analyzeText({ text: "hello world  again", maxChars: 11 }),
    });
    expect(renderMarkdownReport(report, { showIssues: false })).toContain(
      "Note: analyzed the first 11 of 18 characters.",
    );
  });
});

describe("rules table", () => {
  it("marks disabled rules", () => {
    const lines = renderRulesTable(RULE_CATALOGUE, ["double-spaces"]).split("\n");
    const doubleSpaces = lines.find((line) => line.startsWith("| double-spaces "));
    const repeatedWords = lines.find((line) => line.startsWith("| repeated-words "));

    expect(doubleSpaces).toContain("| disabled |");
    expect(repeatedWords).toContain("| enabled  |");
    expect(lines).toHaveLength(RULE_CATALOGUE.length + 4);
  });
});

describe("report utils", () => {
  it("formats text helpers", () => {
    expect(formatBand("fair")).toBe("Fair");
    expect(clipText("abcdefgh", 6)).toBe("abc...");
    expect(clipText("abc", 6)).toBe("abc");
    expect(singleLine("a\r\nb\tc")).toBe("a b c");
  });

  it("draws a box around lines", () => {
    expect(renderAsciiBox(["ab", "c"])).toBe("+----+\n| ab |\n| c  |\n+----+");
  });
});
