/** Unicode letter, digit or underscore. */
export const WORD_CHAR = "[\\p{L}\\p{N}_]";

export const SPACING_PUNCTUATION = "[.,;:!?]";

/**
 * All matches of `pattern` over `text`, left to right. A fresh regex is
 * compiled per call so no `lastIndex` state leaks between runs.
 */
export function findAll(pattern: RegExp, text: string): RegExpExecArray[] {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  const regex = new RegExp(pattern.source, flags);
  const matches: RegExpExecArray[] = [];
  let match = regex.exec(text);
  while (match) {
    matches.push(match);
    if (match[0].length === 0) {
      regex.lastIndex += 1;
    }
    match = regex.exec(text);
  }
  return matches;
}
