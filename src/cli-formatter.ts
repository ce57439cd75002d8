import chalk from 'chalk';
import { highlight } from 'cli-highlight';

export type TableCell = string | number | boolean | null | undefined;
export type TableRow = Record<string, TableCell>;

export function renderJson(data: unknown): void {
  const text = JSON.stringify(data, null, 2);
  if (!process.stdout.isTTY) {
    console.log(text);
    return;
  }
  console.log(highlight(text, { language: 'json', ignoreIllegals: true }));
}

export function renderTable(data: TableRow[]): void {
  formatTable(data).forEach((line) => console.log(line));
}

/**
 * Box-drawn table with one column per key seen across the rows
 */
export function formatTable(data: TableRow[]): string[] {
  if (data.length === 0) {
    return ['(empty)'];
  }
  const keys = Array.from(new Set(data.flatMap((row) => Object.keys(row))));
  const headers = keys.map((key) => formatKey(key));
  const cells = data.map((row) => keys.map((key) => formatValue(row[key])));
  const widths = keys.map((_key, index) =>
    Math.max(visibleLength(headers[index]), ...cells.map((row) => visibleLength(row[index])))
  );

  const horizontal = (width: number) => '─'.repeat(width + 2);
  const line = (values: string[]) =>
    '│' + values.map((value, index) => ` ${padAnsi(value, widths[index])} `).join('│') + '│';

  return [
    '┌' + widths.map(horizontal).join('┬') + '┐',
    line(headers),
    '├' + widths.map(horizontal).join('┼') + '┤',
    ...cells.map(line),
    '└' + widths.map(horizontal).join('┴') + '┘',
  ];
}

function humanizeKey(key: string): string {
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/_/g, ' ')
    .replace(/\b\w/g, (char) => char.toUpperCase())
    .trim();
}

export function formatKey(key: string): string {
  return chalk.yellow(humanizeKey(key));
}

export function formatValue(value: TableCell): string {
  if (typeof value === 'boolean') {
    return value ? chalk.green('yes') : chalk.red('no');
  }
  if (value === null || value === undefined) {
    return chalk.dim('-');
  }
  return String(value);
}

export function visibleLength(text: string): number {
  return text.replace(/\u001b\[[0-9;]*m/g, '').length;
}

function padAnsi(text: string, width: number): string {
  const len = visibleLength(text);
  if (len >= width) {
    return text;
  }
  return text + ' '.repeat(width - len);
}

export function printSuccess(message: string): void {
  console.log(chalk.green('✅'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('❌'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.cyan('ℹ️'), message);
}

export function printWarning(message: string): void {
  console.error(chalk.yellow('⚠️'), message);
}
