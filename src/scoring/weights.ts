import type { IssueCategory } from "../analysis/types.js";

export const MAX_SCORE = 100;

export const ScoreCategory = {
  SpellingGrammar: "spelling_grammar",
  RequiredContent: "required_content",
  MathAccuracy: "math_accuracy",
} as const;

export type ScoreCategory = (typeof ScoreCategory)[keyof typeof ScoreCategory];

/** Points lost per scoring issue. */
export const ISSUE_PENALTIES: Readonly<Record<ScoreCategory, number>> = {
  [ScoreCategory.SpellingGrammar]: 5,
  [ScoreCategory.RequiredContent]: 15,
  [ScoreCategory.MathAccuracy]: 0,
};

/** Share of the overall score, in percent. */
export const SCORE_WEIGHTS: Readonly<Record<ScoreCategory, number>> = {
  [ScoreCategory.SpellingGrammar]: 50,
  [ScoreCategory.RequiredContent]: 40,
  [ScoreCategory.MathAccuracy]: 10,
};

export const CATEGORY_MAP: Readonly<Partial<Record<IssueCategory, ScoreCategory>>> = {
  spelling: ScoreCategory.SpellingGrammar,
  grammar: ScoreCategory.SpellingGrammar,
  spacing: ScoreCategory.SpellingGrammar,
  missing_content: ScoreCategory.RequiredContent,
};

export const SCORE_BANDS = {
  good: 80,
  fair: 60,
} as const;
