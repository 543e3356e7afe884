import type { Issue } from "../analysis/types.js";
import type { RuleRecord } from "../checker/types.js";
import type { ScoreBand, ScoreBreakdown } from "../scoring/types.js";

export interface ToolInfo {
  readonly name: "docreview";
  readonly version: string;
}

export interface SummaryCounts {
  critical: number;
  high: number;
  medium: number;
  low: number;
  info: number;
  total: number;
}

export interface SummaryInfo {
  readonly overall: number;
  readonly band: ScoreBand;
  readonly breakdown: ScoreBreakdown;
  readonly counts: SummaryCounts;
}

export interface ReportMetadata {
  readonly analyzed_at: string;
  readonly text_length: number;
  readonly analyzed_length: number;
  readonly truncated: boolean;
  readonly disabled_rules: readonly string[];
}

export interface ReviewReport {
  readonly tool: ToolInfo;
  readonly title: string;
  readonly source: string;
  readonly summary: SummaryInfo;
  readonly issues: readonly Issue[];
  readonly rule_matches: readonly RuleRecord[];
  readonly metadata: ReportMetadata;
}
