import type { AnalysisResult, Issue } from "../analysis/types.js";
import { scoreBand } from "../scoring/score-calculator.js";
import type { ReviewReport, SummaryCounts } from "./types.js";

export interface ReportInput {
  readonly toolVersion: string;
  readonly source: string;
  readonly analysis: AnalysisResult;
}

const SEVERITY_RANK = new Map([
  ["critical", 0],
  ["high", 1],
  ["medium", 2],
  ["low", 3],
  ["info", 4],
]);

export function buildJsonReport(input: ReportInput): ReviewReport {
  const { analysis } = input;
  return {
    tool: { name: "docreview", version: input.toolVersion },
    title: analysis.title,
    source: input.source,
    summary: {
      overall: analysis.score.overall,
      band: scoreBand(analysis.score.overall),
      breakdown: analysis.score,
      counts: countIssues(analysis.issues),
    },
    issues: sortIssues(analysis.issues),
    rule_matches: analysis.rule_matches,
    metadata: {
      analyzed_at: analysis.analyzed_at,
      text_length: analysis.text_length,
      analyzed_length: analysis.analyzed_length,
      truncated: analysis.truncated,
      disabled_rules: analysis.disabled_rules,
    },
  };
}

function countIssues(issues: readonly Issue[]): SummaryCounts {
  const counts: SummaryCounts = {
    critical: 0,
    high: 0,
    medium: 0,
    low: 0,
    info: 0,
    total: issues.length,
  };

  for (const issue of issues) {
    counts[issue.severity] += 1;
  }

  return counts;
}

// Stable sort: issues of equal severity keep their analysis order.
function sortIssues(issues: readonly Issue[]): Issue[] {
  return [...issues].sort((a, b) => {
    const aRank = SEVERITY_RANK.get(a.severity) ?? SEVERITY_RANK.size;
    const bRank = SEVERITY_RANK.get(b.severity) ?? SEVERITY_RANK.size;
    return aRank - bRank;
  });
}
