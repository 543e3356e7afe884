export { calculateScore, scoreBand } from "./score-calculator.js";
export type { ScoreBand, ScoreBreakdown } from "./types.js";
export {
  CATEGORY_MAP,
  ISSUE_PENALTIES,
  MAX_SCORE,
  SCORE_BANDS,
  SCORE_WEIGHTS,
  ScoreCategory,
} from "./weights.js";
