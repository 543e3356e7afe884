import type { Issue } from "../analysis/types.js";
import type { ReviewReport } from "./types.js";
import {
  clipText,
  formatBand,
  renderAsciiBox,
  renderAsciiTable,
  singleLine,
} from "./report-utils.js";

export interface MarkdownRenderOptions {
  readonly showSummary?: boolean;
  readonly showIssues?: boolean;
  readonly maxIssues?: number;
  readonly showSuggestions?: boolean;
  readonly titleWidth?: number;
}

export function renderMarkdownReport(
  report: ReviewReport,
  options: MarkdownRenderOptions = {},
): string {
  const showSummary = options.showSummary ?? true;
  const showIssues = options.showIssues ?? true;
  const showSuggestions = options.showSuggestions ?? false;
  const titleWidth = options.titleWidth ?? 60;
  const lines: string[] = [];

  if (showSummary) {
    lines.push(renderHeaderBlock(report));
    lines.push("");
    lines.push(renderBreakdownTable(report));
    if (report.metadata.truncated) {
      lines.push("");
      lines.push(
        `Note: analyzed the first ${report.metadata.analyzed_length} of ${report.metadata.text_length} characters.`,
      );
    }
  }

  if (!showIssues) {
    return lines.join("\n");
  }

  const total = report.issues.length;
  const issues = applyIssueLimit(report.issues, options.maxIssues);
  if (lines.length > 0) {
    lines.push("");
  }
  if (total === 0) {
    lines.push("No issues detected.");
    return lines.join("\n");
  }

  lines.push("### Issues");
  lines.push("");
  lines.push(
    renderAsciiTable(
      issues.map((issue) => [
        issue.id,
        issue.severity,
        issue.category,
        issue.location ?? "-",
        clipText(singleLine(issue.title), titleWidth),
      ]),
      ["ID", "Severity", "Category", "Location", "Title"],
    ),
  );

  if (total > issues.length) {
    lines.push("");
    lines.push(
      `Showing ${issues.length} of ${total} issues. Use --max-issues to adjust.`,
    );
  }

  if (showSuggestions) {
    const withSuggestions = issues.filter((issue) => issue.suggestion);
    if (withSuggestions.length > 0) {
      lines.push("");
      lines.push("### Suggestions");
      lines.push("");
      for (const issue of withSuggestions) {
        lines.push(renderSuggestion(issue));
      }
    }
  }

  return lines.join("\n");
}

function renderHeaderBlock(report: ReviewReport): string {
  const { counts } = report.summary;
  return renderAsciiBox([
    "Document Review Report",
    `Title: ${report.title}`,
    `Source: ${report.source}`,
    `Score: ${report.summary.overall}/100 (${formatBand(report.summary.band)})`,
    `Issues: ${counts.total} (critical ${counts.critical}, high ${counts.high}, medium ${counts.medium}, low ${counts.low}, info ${counts.info})`,
  ]);
}

function renderBreakdownTable(report: ReviewReport): string {
  const { breakdown } = report.summary;
  return renderAsciiTable(
    [
      ["Spelling/Grammar", `${breakdown.spelling_grammar}/100`],
      ["Required Content", `${breakdown.required_content}/100`],
      ["Math Accuracy", `${breakdown.math_accuracy}/100`],
    ],
    ["Category", "Score"],
  );
}

function renderSuggestion(issue: Issue): string {
  const location = issue.location ? ` (${issue.location})` : "";
  return `- ${issue.title}${location}: ${singleLine(issue.suggestion ?? "")}`;
}

function applyIssueLimit<T>(items: readonly T[], limit?: number): T[] {
  if (!limit || limit <= 0) {
    return [...items];
  }
  return items.slice(0, limit);
}
