export type Alignment = 'left' | 'center';

export interface TableOptions {
  /** per column; center when absent */
  align?: readonly Alignment[];
  /** extra row under a divider, e.g. totals */
  footer?: readonly string[];
}

function fit(text: string, width: number, align: Alignment): string {
  const gap = width - text.length;
  if (align === 'left') return text + ' '.repeat(gap);
  const left = Math.floor(gap / 2);
  return ' '.repeat(left) + text + ' '.repeat(gap - left);
}

/**
 * Render rows as a bordered text table:
 *
 *   +-----+-------+
 *   | no. |  key  |
 *   +-----+-------+
 *   |  1  | ABC-1 |
 *   +-----+-------+
 */
export function renderTable(header: readonly string[], rows: readonly (readonly string[])[], options: TableOptions = {}): string {
  const all = options.footer ? [header, ...rows, options.footer] : [header, ...rows];
  const widths = header.map((_, column) => Math.max(...all.map((row) => (row[column] ?? '').length)));
  const divider = `+${widths.map((width) => '-'.repeat(width + 2)).join('+')}+`;
  const line = (row: readonly string[], alignTo: (column: number) => Alignment) =>
    `| ${widths.map((width, column) => fit(row[column] ?? '', width, alignTo(column))).join(' | ')} |`;

  const bodyAlign = (column: number) => options.align?.[column] ?? 'center';
  const lines = [divider, line(header, () => 'center'), divider, ...rows.map((row) => line(row, bodyAlign)), divider];
  if (options.footer) {
    lines.push(line(options.footer, bodyAlign), divider);
  }
  return lines.join('\n');
}
