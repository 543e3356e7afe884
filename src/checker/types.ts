import type { Logger } from "../logging/logger.js";
import type { TextIndex } from "./text-index.js";

export type MatchCategory = "spelling" | "grammar" | "spacing" | "formatting";

export type MatchSeverity = "high" | "medium" | "low";

export type RuleGroup = "high" | "medium" | "low";

export interface RuleMatch {
  readonly rule_id: string;
  readonly rule_name: string;
  readonly category: MatchCategory;
  readonly severity: MatchSeverity;
  readonly matched_text: string;
  readonly suggestion: string;
  readonly location: string;
  readonly context: string;
}

export interface RuleRecord extends RuleMatch {
  readonly source: "rule";
}

/** Rule ids to skip. */
export type DisabledRuleIds = ReadonlySet<string> | readonly string[];

export type RuleCheck = (index: TextIndex) => RuleMatch[];

/**
 * One entry of the rule catalogue. `name` is the label used for point
 * findings; some aggregate checks emit more specific labels per match.
 */
export interface RuleDefinition {
  readonly id: string;
  readonly name: string;
  readonly category: MatchCategory;
  readonly severity: MatchSeverity;
  readonly group: RuleGroup;
  readonly description: string;
  readonly check: RuleCheck;
}

export interface RunRulesOptions {
  readonly rules?: readonly RuleDefinition[];
  readonly logger?: Logger;
}
