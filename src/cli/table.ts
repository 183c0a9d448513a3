/**
 * Grid table rendering
 *
 * +-------+-------+
 * | name  | count |
 * +-------+-------+
 * | alpha |     3 |
 * +-------+-------+
 */

export type ColumnAlign = 'left' | 'right';

export interface RenderTableOptions {
  /** Per-column alignment (default left) */
  align?: ColumnAlign[];
}

function pad(text: string, width: number, align: ColumnAlign): string {
  return align === 'right' ? text.padStart(width) : text.padEnd(width);
}

/**
 * Shorten a cell to at most `maxWidth` characters, marking the cut with an ellipsis
 */
export function truncate(text: string, maxWidth: number): string {
  if (maxWidth < 1 || text.length <= maxWidth) {
    return text;
  }
  return `${text.slice(0, maxWidth - 1)}…`;
}

export function renderTable(headers: string[], rows: string[][], options: RenderTableOptions = {}): string {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length))
  );
  const alignOf = (i: number): ColumnAlign => options.align?.[i] ?? 'left';

  const border = `+${widths.map((width) => '-'.repeat(width + 2)).join('+')}+`;
  const line = (cells: string[]): string =>
    `|${widths.map((width, i) => ` ${pad(cells[i] ?? '', width, alignOf(i))} `).join('|')}|`;

  const lines = [border, line(headers), border];
  for (const row of rows) {
    lines.push(line(row));
  }
  lines.push(border);

  return lines.join('\n');
}
