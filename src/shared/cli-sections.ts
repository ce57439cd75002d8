import chalk from 'chalk';

/**
 * Title plus body lines and a trailing blank line; nothing for an empty body
 */
export function formatSection(title: string, lines: string[]): string[] {
  if (lines.length === 0) {
    return [];
  }
  return [chalk.bold(title), ...lines, ''];
}

export function renderSection(title: string, lines: string[]) {
  formatSection(title, lines).forEach((line) => console.log(line));
}

export function renderKeyValueSection(title: string, pairs: Array<{ label: string; value?: string | null }>) {
  const lines = pairs
    .filter((pair) => pair.value !== undefined && pair.value !== null && pair.value !== '')
    .map((pair) => `  ${chalk.yellow(pair.label + ':')} ${pair.value}`);
  renderSection(title, lines);
}
