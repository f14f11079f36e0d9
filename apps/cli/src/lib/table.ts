import { theme } from "./theme.ts";

// --------------- ANSI Utilities ---------------

function stripAnsi(value: string): string {
  return value.replace(/\x1b\[[0-9;]*m/g, "");
}

// --------------- Types ---------------

export interface TableOptions {
  headers: string[];
  rows: string[][];
  /** Left indent in spaces (default: 2) */
  indent?: number;
}

// --------------- Internals ---------------

function computeColumnWidths(headers: string[], rows: string[][]): number[] {
  return headers.map((header, index) => {
    const cellWidths = rows.map((row) => stripAnsi(row[index] ?? "").length);
    return Math.max(stripAnsi(header).length, ...cellWidths);
  });
}

function buildRowRenderer(widths: number[], indent: number) {
  const pad = " ".repeat(indent);
  return (cols: string[]) =>
    pad +
    cols
      .map((col, index) => {
        const gap = index < cols.length - 1 ? 2 : 0;
        const padding = (widths[index] ?? 0) - stripAnsi(col).length + gap;
        return `${col}${" ".repeat(Math.max(0, padding))}`;
      })
      .join("")
      .trimEnd();
}

// --------------- Rendering ---------------

/**
 * Lay out a table as plain lines, header first. Column widths ignore
 * ANSI colour codes so themed cells still line up.
 */
export function formatTable(options: TableOptions): string[] {
  const { headers, rows, indent = 2 } = options;
  const widths = computeColumnWidths(headers, rows);
  const render = buildRowRenderer(widths, indent);
  return [render(headers), ...rows.map(render)];
}

/**
 * Render a table to stdout with a muted header row.
 */
export function renderTable(options: TableOptions): void {
  const [header, ...body] = formatTable(options);
  if (header !== undefined) console.log(theme.muted(header));
  for (const line of body) {
    console.log(line);
  }
}
