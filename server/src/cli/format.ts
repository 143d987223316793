/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | boolean | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('—') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.log(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function writeStatusColor(status: string): string {
  if (status === 'written') return chalk.green(status);
  if (status === 'skipped') return chalk.yellow(status);
  return chalk.red(status);
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
