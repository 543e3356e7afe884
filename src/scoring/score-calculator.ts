import type { Issue } from "../analysis/types.js";
import type { ScoreBand, ScoreBreakdown } from "./types.js";
import {
  CATEGORY_MAP,
  ISSUE_PENALTIES,
  MAX_SCORE,
  SCORE_BANDS,
  SCORE_WEIGHTS,
  ScoreCategory,
} from "./weights.js";

export function calculateScore(issues: readonly Issue[]): ScoreBreakdown {
  const counts: Record<ScoreCategory, number> = {
    [ScoreCategory.SpellingGrammar]: 0,
    [ScoreCategory.RequiredContent]: 0,
    [ScoreCategory.MathAccuracy]: 0,
  };

  for (const issue of issues) {
    if (!issue.affects_score) {
      continue;
    }
    const category = CATEGORY_MAP[issue.category];
    if (category) {
      counts[category] += 1;
    }
  }

  const spellingGrammar = categoryScore(counts, ScoreCategory.SpellingGrammar);
  const requiredContent = categoryScore(counts, ScoreCategory.RequiredContent);
  // No math checks exist yet, so this stays at the maximum.
  const mathAccuracy = categoryScore(counts, ScoreCategory.MathAccuracy);

  return {
    spelling_grammar: spellingGrammar,
    required_content: requiredContent,
    math_accuracy: mathAccuracy,
    overall: overallScore(spellingGrammar, requiredContent, mathAccuracy),
  };
}

export function scoreBand(overall: number): ScoreBand {
  if (overall >= SCORE_BANDS.good) {
    return "good";
  }
  if (overall >= SCORE_BANDS.fair) {
    return "fair";
  }
  return "poor";
}

function categoryScore(
  counts: Readonly<Record<ScoreCategory, number>>,
  category: ScoreCategory,
): number {
  return Math.max(0, MAX_SCORE - counts[category] * ISSUE_PENALTIES[category]);
}

function overallScore(
  spellingGrammar: number,
  requiredContent: number,
  mathAccuracy: number,
): number {
  const weighted =
    spellingGrammar * SCORE_WEIGHTS[ScoreCategory.SpellingGrammar] +
    requiredContent * SCORE_WEIGHTS[ScoreCategory.RequiredContent] +
    mathAccuracy * SCORE_WEIGHTS[ScoreCategory.MathAccuracy];
  return Math.floor(weighted / 100);
}
