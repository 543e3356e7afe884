import type { TextIndex } from "./text-index.js";
import type {
  MatchCategory,
  MatchSeverity,
  RuleMatch,
  RuleRecord,
} from "./types.js";

export interface RuleIdentity {
  readonly id: string;
  readonly name: string;
  readonly category: MatchCategory;
  readonly severity: MatchSeverity;
}

export interface PointMatchInput {
  readonly start: number;
  readonly end: number;
  readonly matchedText: string;
  readonly suggestion: string;
  readonly location?: string;
}

export interface AggregateMatchInput {
  readonly name?: string;
  readonly matchedText: string;
  readonly suggestion: string;
  readonly location: string;
  readonly context: string;
}

export function createPointMatch(
  rule: RuleIdentity,
  index: TextIndex,
  input: PointMatchInput,
): RuleMatch {
  return {
    rule_id: rule.id,
    rule_name: rule.name,
    category: rule.category,
    severity: rule.severity,
    matched_text: input.matchedText,
    suggestion: input.suggestion,
    location: input.location ?? index.lineLocation(input.start),
    context: index.contextAround(input.start, input.end),
  };
}

export function createAggregateMatch(
  rule: RuleIdentity,
  input: AggregateMatchInput,
): RuleMatch {
  return {
    rule_id: rule.id,
    rule_name: input.name ?? rule.name,
    category: rule.category,
    severity: rule.severity,
    matched_text: input.matchedText,
    suggestion: input.suggestion,
    location: input.location,
    context: input.context,
  };
}

export function toRuleRecord(match: RuleMatch): RuleRecord {
  return {
    rule_id: match.rule_id,
    rule_name: match.rule_name,
    category: match.category,
    severity: match.severity,
    matched_text: match.matched_text,
    suggestion: match.suggestion,
    location: match.location,
    context: match.context,
    source: "rule",
  };
}
