import { colors, StyleFn } from './colors';

export type Tone = 'info' | 'success' | 'warning' | 'error';

export interface StyledCell {
  text: string;
  style?: StyleFn;
}

export type Cell = string | StyledCell;

const TONE_STYLE: Record<Tone, StyleFn> = {
  info: colors.cyan,
  success: colors.green,
  warning: colors.yellow,
  error: colors.red,
};

const cellText = (cell: Cell): string => (typeof cell === 'string' ? cell : cell.text);

const styleCell = (cell: Cell, padded: string): string =>
  typeof cell === 'string' || !cell.style ? padded : cell.style(padded);

function padRight(text: string, width: number): string {
  if (text.length >= width) return text;
  return text + ' '.repeat(width - text.length);
}

function centre(text: string, width: number): string {
  const left = Math.floor((width - text.length) / 2);
  return padRight(' '.repeat(Math.max(left, 0)) + text, width);
}

/**
 * A rounded box with the title set into the top border.
 */
export function renderPanel(title: string, lines: Cell[], tone: Tone = 'info'): string {
  const border = TONE_STYLE[tone];
  const titleText = ` ${title} `;
  const inner = Math.max(titleText.length + 2, ...lines.map((line) => cellText(line).length + 2));

  const topFill = inner - titleText.length;
  const topLeft = Math.floor(topFill / 2);
  const top =
    border('╭' + '─'.repeat(topLeft)) +
    colors.bold(border(titleText)) +
    border('─'.repeat(topFill - topLeft) + '╮');

  const body = lines.map(
    (line) => border('│') + ' ' + styleCell(line, padRight(cellText(line), inner - 2)) + ' ' + border('│'),
  );

  const bottom = border('╰' + '─'.repeat(inner) + '╯');
  return [top, ...body, bottom].join('\n');
}

/**
 * A bordered table with a header row and an optional centred title.
 */
export function renderTable(
  title: string | undefined,
  columns: string[],
  rows: Cell[][],
  tone: Tone = 'info',
): string {
  const border = TONE_STYLE[tone];
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...rows.map((row) => cellText(row[index] ?? '').length)),
  );

  const rule = (left: string, join: string, right: string): string =>
    border(left + widths.map((w) => '─'.repeat(w + 2)).join(join) + right);

  const line = (cells: Cell[], headerStyle?: StyleFn): string =>
    border('│') +
    cells
      .map((cell, i) => {
        const padded = padRight(cellText(cell), widths[i]);
        return ' ' + (headerStyle ? headerStyle(padded) : styleCell(cell, padded)) + ' ';
      })
      .join(border('│')) +
    border('│');

  const lines: string[] = [];
  if (title) {
    const totalWidth = widths.reduce((sum, w) => sum + w + 3, 1);
    lines.push(colors.bold(border(centre(title, totalWidth).trimEnd())));
  }
  lines.push(rule('┌', '┬', '┐'));
  lines.push(line(columns, colors.bold));
  lines.push(rule('├', '┼', '┤'));
  for (const row of rows) {
    lines.push(line(columns.map((_, i) => row[i] ?? '')));
  }
  lines.push(rule('└', '┴', '┘'));
  return lines.join('\n');
}

/**
 * Fixed-point with trailing zeros dropped: 0.01000000 -> 0.01, 12.0 -> 12
 */
export function formatDecimal(value: number, maxDecimals: number): string {
  const fixed = value.toFixed(maxDecimals);
  return fixed.includes('.') ? fixed.replace(/0+$/, '').replace(/\.$/, '') : fixed;
}

export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
