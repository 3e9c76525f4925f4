import type { ColumnKey, ColumnSpec, RowValues } from '../types.js';

/** Column order and widths are part of the log file format */
export const COLUMNS: readonly ColumnSpec[] = [
  { key: 'timestamp', title: 'TIMESTAMP', width: 25 },
  { key: 'task', title: 'TASK', width: 15 },
  { key: 'function', title: 'FUNCTION', width: 30 },
  { key: 'file', title: 'FILE', width: 25 },
  { key: 'message', title: 'MESSAGE', width: 50 },
  { key: 'process_type', title: 'PROCESS_TYPE', width: 15 },
  { key: 'status', title: 'STATUS', width: 15 },
];

/** Spaces between the column border and its content, on each side */
export const PADDING = 1;

export const MESSAGE_WIDTH = columnWidth('message');

export function columnWidth(key: ColumnKey): number {
  const col = COLUMNS.find(c => c.key === key);
  return col ? col.width : 0;
}

/** Width of a whole row, borders included */
export function tableWidth(): number {
  return COLUMNS.reduce((sum, c) => sum + c.width + PADDING * 2 + 1, 1);
}

export function separatorLine(): string {
  let line = '+';
  for (const col of COLUMNS) {
    line += '-'.repeat(col.width + PADDING * 2) + '+';
  }
  return line;
}

/**
 * Title centered in a cell of width + 2 * PADDING.
 * Odd leftover space goes to the left side.
 */
function centeredCell(title: string, width: number): string {
  const free = Math.max(width + PADDING * 2 - title.length, 0);
  const left = Math.ceil(free / 2);
  return ' '.repeat(left) + title + ' '.repeat(free - left);
}

export function headerLine(): string {
  let line = '|';
  for (const col of COLUMNS) {
    line += centeredCell(col.title, col.width) + '|';
  }
  return line;
}

/** separator / titles / separator, newline-terminated */
export function tableHeader(): string {
  const sep = separatorLine();
  return `${sep}\n${headerLine()}\n${sep}\n`;
}

function cell(content: string, width: number): string {
  return ' '.repeat(PADDING) + content + ' '.repeat(Math.max(width - content.length, 0) + PADDING);
}

export function truncate(value: string, width: number): string {
  return value.length > width ? value.slice(0, width) : value;
}

/**
 * Full row. Every value except the message is truncated to its column;
 * the message is expected to be wrapped already.
 */
export function formatRow(values: RowValues): string {
  let line = '|';
  for (const col of COLUMNS) {
    const raw = values[col.key];
    const content = col.key === 'message' ? raw : truncate(raw, col.width);
    line += cell(content, col.width) + '|';
  }
  return line;
}

/** Row carrying only a message line; other cells stay blank */
export function formatContinuationRow(messageLine: string): string {
  let line = '|';
  for (const col of COLUMNS) {
    line += (col.key === 'message' ? cell(messageLine, col.width) : ' '.repeat(col.width + PADDING * 2)) + '|';
  }
  return line;
}

/** Footer text left-aligned, closing border at the table's right edge */
export function footerLine(text: string): string {
  const body = `| ${text}`;
  const inner = tableWidth() - 1;
  return body + ' '.repeat(Math.max(inner - body.length, 1)) + '|';
}
