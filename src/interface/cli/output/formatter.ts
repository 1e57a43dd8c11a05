/**
 * CLI output formatter with picocolors
 */

import pc from 'picocolors';

export function formatSuccess(message: string): string {
  return pc.green(`OK ${message}`);
}

export function formatWarning(message: string): string {
  return pc.yellow(`WARN ${message}`);
}

export function formatError(message: string): string {
  return pc.red(`Error: ${message}`);
}

export function formatHint(message: string): string {
  return pc.cyan(`Hint: ${message}`);
}

export function formatDim(text: string): string {
  return pc.dim(text);
}

export function formatBold(text: string): string {
  return pc.bold(text);
}

export function indent(text: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return text
    .split('\n')
    .map((line) => pad + line)
    .join('\n');
}

/**
 * Left-aligned columns; the last column is not padded.
 */
export function formatTable(rows: string[][]): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows
    .map((row) =>
      row
        .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
        .join('  '),
    )
    .join('\n');
}
