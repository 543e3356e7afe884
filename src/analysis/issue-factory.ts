import crypto from "node:crypto";
import type { RuleMatch } from "../checker/types.js";
import type {
  Issue,
  IssueCategory,
  IssueSeverity,
  IssueSource,
} from "./types.js";

export interface IssueInput {
  readonly source: IssueSource;
  readonly rule_id?: string;
  readonly category: IssueCategory;
  readonly severity: IssueSeverity;
  readonly title: string;
  readonly description: string;
  readonly location?: string;
  readonly context?: string;
  readonly suggestion?: string;
  readonly affects_score?: boolean;
  /** Position among matches of the same rule; keeps identical findings apart. */
  readonly ordinal?: number;
}

export function createIssue(input: IssueInput): Issue {
  const key = input.rule_id ?? input.category;
  const id = createIssueId(
    input.source,
    input.ordinal === undefined ? key : `${key}#${input.ordinal}`,
    input.location ?? "",
    input.title,
    input.description,
    input.context ?? "",
  );
  return {
    id,
    source: input.source,
    rule_id: input.rule_id,
    category: input.category,
    severity: input.severity,
    title: input.title,
    description: input.description,
    location: input.location,
    context: input.context,
    suggestion: input.suggestion,
    affects_score: input.affects_score ?? defaultAffectsScore(input.severity),
  };
}

export function createIssueId(
  source: IssueSource,
  key: string,
  location: string,
  title: string,
  description: string,
  context: string,
): string {
  const input = `${source}:${key}:${location}:${title}:${description}:${context}`;
  const hash = crypto.createHash("sha256").update(input).digest("hex");
  return hash.slice(0, 12);
}

/** Low and info issues are flagged but do not move the score. */
export function defaultAffectsScore(severity: IssueSeverity): boolean {
  return severity !== "low" && severity !== "info";
}

export function matchToIssue(match: RuleMatch, ordinal = 0): Issue {
  return createIssue({
    source: "rule",
    rule_id: match.rule_id,
    category: match.category,
    severity: match.severity,
    title: match.rule_name,
    description: `Found: '${match.matched_text}'`,
    location: match.location,
    context: match.context,
    suggestion: match.suggestion || undefined,
    ordinal,
  });
}
