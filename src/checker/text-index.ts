export const CONTEXT_CHARS = 30;

const ELLIPSIS = "...";

/**
 * Newline index over a document body, built once per run and shared by
 * every check.
 */
export class TextIndex {
  readonly text: string;
  private readonly newlineOffsets: readonly number[];

  constructor(text: string) {
    this.text = text;
    this.newlineOffsets = collectNewlines(text);
  }

  get lineCount(): number {
    return this.newlineOffsets.length + 1;
  }

  /** 1-indexed line holding `offset`: newlines strictly before it, plus one. */
  lineNumberAt(offset: number): number {
    let low = 0;
    let high = this.newlineOffsets.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const newline = this.newlineOffsets[mid] ?? Number.POSITIVE_INFINITY;
      if (newline < offset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low + 1;
  }

  contextAround(start: number, end: number, width = CONTEXT_CHARS): string {
    const contextStart = Math.max(0, start - width);
    const contextEnd = Math.min(this.text.length, end + width);
    const prefix = contextStart > 0 ? ELLIPSIS : "";
    const suffix = contextEnd < this.text.length ? ELLIPSIS : "";
    return `${prefix}${this.text.slice(contextStart, contextEnd)}${suffix}`;
  }

  lineLocation(offset: number): string {
    return `Line ${this.lineNumberAt(offset)}`;
  }

  positionLocation(offset: number): string {
    return `Line ${this.lineNumberAt(offset)}, position ${offset}`;
  }

  count(needle: string): number {
    if (needle.length === 0) {
      return 0;
    }
    let total = 0;
    let index = this.text.indexOf(needle);
    while (index !== -1) {
      total += 1;
      index = this.text.indexOf(needle, index + needle.length);
    }
    return total;
  }
}

function collectNewlines(text: string): number[] {
  const offsets: number[] = [];
  let index = text.indexOf("\n");
  while (index !== -1) {
    offsets.push(index);
    index = text.indexOf("\n", index + 1);
  }
  return offsets;
}
