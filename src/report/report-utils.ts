import type { ScoreBand } from "../scoring/types.js";

export function formatBand(band: ScoreBand): string {
  return band.charAt(0).toUpperCase() + band.slice(1);
}

export function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const border = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => `| ${line.padEnd(width)} |`);
  return [border, ...body, border].join("\n");
}

export function renderAsciiTable(
  rows: readonly string[][],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const renderRow = (cells: readonly string[]): string =>
    `| ${cells.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join(" | ")} |`;
  return [border, renderRow(headers), border, ...rows.map(renderRow), border].join(
    "\n",
  );
}

export function clipText(input: string, max: number): string {
  if (input.length <= max) {
    return input;
  }
  return `${input.slice(0, Math.max(0, max - 3))}...`;
}

/** Collapse line breaks and tabs so a table cell stays on one line. */
export function singleLine(input: string): string {
  return input.replace(/[\r\n\t]+/g, " ");
}
