import { runRules } from "../checker/rule-engine.js";
import { toRuleRecord } from "../checker/match-factory.js";
import type { RuleMatch } from "../checker/types.js";
import { calculateScore } from "../scoring/score-calculator.js";
import { matchToIssue } from "./issue-factory.js";
import { mergeIssues } from "./merge.js";
import { truncateText } from "./truncate.js";
import type { AnalysisResult, AnalyzeInput, Issue } from "./types.js";

const DEFAULT_TITLE = "Untitled";

/**
 * Check a document body: cap it to the character budget, run the rule
 * engine, fold its matches into issues after any external ones, and score
 * the result.
 */
export function analyzeText(input: AnalyzeInput): AnalysisResult {
  const disabledRules = [...new Set(input.disabledRules ?? [])].sort();
  const capped = truncateText(input.text, input.maxChars);
  const logger = input.logger?.child("analysis");

  if (capped.truncated) {
    logger?.info("Document truncated before analysis", {
      original_length: capped.originalLength,
      analyzed_length: capped.text.length,
    });
  }

  const matches = runRules(capped.text, disabledRules, {
    logger: input.logger?.child("checker"),
  });
  logger?.debug("Rule checks complete", {
    matches: matches.length,
    disabled_rules: disabledRules.length,
  });

  const issues = mergeIssues(input.externalIssues ?? [], ruleIssues(matches));
  const now = input.now ?? (() => new Date());

  return {
    title: input.title ?? DEFAULT_TITLE,
    analyzed_at: now().toISOString(),
    text_length: capped.originalLength,
    analyzed_length: capped.text.length,
    truncated: capped.truncated,
    score: calculateScore(issues),
    issues,
    rule_matches: matches.map((match) => toRuleRecord(match)),
    disabled_rules: disabledRules,
  };
}

function ruleIssues(matches: readonly RuleMatch[]): Issue[] {
  const seen = new Map<string, number>();
  return matches.map((match) => {
    const ordinal = seen.get(match.rule_id) ?? 0;
    seen.set(match.rule_id, ordinal + 1);
    return matchToIssue(match, ordinal);
  });
}
