import chalk from 'chalk';

export interface TableColumn<Row> {
  header: string;
  value: (row: Row) => string;
  width?: number;
  align?: 'left' | 'right';
}

export interface TableOptions<Row> {
  columns: TableColumn<Row>[];
  border?: boolean;
  padding?: number;
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export const visibleLength = (str: string): number => str.replace(ANSI_PATTERN, '').length;

const padString = (str: string, width: number, align: 'left' | 'right' = 'left'): string => {
  const padding = ' '.repeat(Math.max(0, width - visibleLength(str)));
  return align === 'right' ? padding + str : str + padding;
};

export const createTable = <Row>(rows: Row[], options: TableOptions<Row>): string => {
  const { columns, border = false, padding = 2 } = options;

  const cells = rows.map((row) => columns.map((col) => col.value(row)));
  const widths = columns.map(
    (col, i) => col.width ?? Math.max(col.header.length, ...cells.map((rowCells) => visibleLength(rowCells[i])))
  );

  const pad = ' '.repeat(padding);
  const rule = chalk.dim(widths.map((w) => '─'.repeat(w)).join(pad));
  const lines: string[] = [];

  const headerRow = columns.map((col, i) => chalk.bold(padString(col.header, widths[i], col.align))).join(pad);
  if (border) {
    lines.push(rule);
  }
  lines.push(headerRow, rule);

  for (const rowCells of cells) {
    lines.push(rowCells.map((cell, i) => padString(cell, widths[i], columns[i].align)).join(pad));
  }

  if (border) {
    lines.push(rule);
  }
  return lines.join('\n');
};

export const printTable = <Row>(rows: Row[], options: TableOptions<Row>): void => {
  console.log(createTable(rows, options));
};
