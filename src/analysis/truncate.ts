export const MAX_ANALYSIS_CHARS = 30_000;

export interface TruncatedText {
  readonly text: string;
  readonly truncated: boolean;
  readonly originalLength: number;
}

export function truncateText(
  text: string,
  maxChars: number = MAX_ANALYSIS_CHARS,
): TruncatedText {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new Error(`maxChars must be a positive integer, got ${maxChars}`);
  }
  if (text.length <= maxChars) {
    return { text, truncated: false, originalLength: text.length };
  }
  return {
    text: text.slice(0, maxChars),
    truncated: true,
    originalLength: text.length,
  };
}
