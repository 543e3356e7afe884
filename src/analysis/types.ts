import type { DisabledRuleIds, RuleRecord } from "../checker/types.js";
import type { ScoreBreakdown } from "../scoring/types.js";
import type { Logger } from "../logging/logger.js";

export const ISSUE_CATEGORIES = [
  "spelling",
  "grammar",
  "spacing",
  "formatting",
  "math",
  "missing_content",
  "style",
  "bannt",
  "opportunity",
  "concern",
] as const;

export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

export const ISSUE_SEVERITIES = [
  "critical",
  "high",
  "medium",
  "low",
  "info",
] as const;

export type IssueSeverity = (typeof ISSUE_SEVERITIES)[number];

/** `rule` for deterministic checks, `external` for anything merged in (LLM output). */
export type IssueSource = "rule" | "external";

export interface Issue {
  readonly id: string;
  readonly source: IssueSource;
  readonly rule_id?: string;
  readonly category: IssueCategory;
  readonly severity: IssueSeverity;
  readonly title: string;
  readonly description: string;
  readonly location?: string;
  readonly context?: string;
  readonly suggestion?: string;
  readonly affects_score: boolean;
}

export interface AnalyzeInput {
  readonly text: string;
  readonly title?: string;
  readonly disabledRules?: DisabledRuleIds;
  readonly externalIssues?: readonly Issue[];
  readonly maxChars?: number;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export interface AnalysisResult {
  readonly title: string;
  readonly analyzed_at: string;
  readonly text_length: number;
  readonly analyzed_length: number;
  readonly truncated: boolean;
  readonly score: ScoreBreakdown;
  readonly issues: readonly Issue[];
  readonly rule_matches: readonly RuleRecord[];
  readonly disabled_rules: readonly string[];
}
