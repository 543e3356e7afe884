export interface ScoreBreakdown {
  readonly spelling_grammar: number;
  readonly required_content: number;
  readonly math_accuracy: number;
  readonly overall: number;
}

export type ScoreBand = "good" | "fair" | "poor";
