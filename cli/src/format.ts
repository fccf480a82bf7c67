/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('—') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.error(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function statusColor(status: string): string {
  if (status === 'Shipped') return chalk.blue(status);
  if (status === 'Ready') return chalk.green(status);
  return status;
}

/** Stock level coloured against its reorder level */
export function stockColor(stockLevel: number, reorderLevel: number): string {
  if (stockLevel <= 0) return chalk.red(String(stockLevel));
  if (stockLevel <= reorderLevel) return chalk.yellow(String(stockLevel));
  return chalk.green(String(stockLevel));
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/** Strip colour codes so padding measures visible width */
function visibleLength(text: string): number {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\u001b\[[0-9;]*m/g, '').length;
}

function padVisible(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - visibleLength(text)));
}

export function table(rows: Record<string, unknown>[], columns?: string[]): void {
  if (rows.length === 0) {
    console.log(chalk.dim('  No results'));
    return;
  }

  const cols = columns || Object.keys(rows[0]);
  const widths = cols.map((c) =>
    Math.max(c.length, ...rows.map((r) => visibleLength(String(r[c] ?? ''))))
  );

  // Header
  const header = cols.map((c, i) => c.padEnd(widths[i])).join('  ');
  console.log(chalk.bold(`  ${header}`));
  console.log(chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`));

  // Rows
  for (const row of rows) {
    const line = cols.map((c, i) => padVisible(String(row[c] ?? ''), widths[i])).join('  ');
    console.log(`  ${line}`);
  }
}
