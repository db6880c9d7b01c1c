/**
 * UI utilities for the Chatcast CLI
 * Provides colored output, spinners, and table formatting
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import Table from 'cli-table3';

import type { IDisplayRecord } from '@chatcast/livechat';

/**
 * Print a success message with green check prefix
 */
export function success(msg: string): void {
  console.log(chalk.green('✔'), msg);
}

/**
 * Print an error message with red cross prefix
 */
export function error(msg: string): void {
  console.error(chalk.red('✖'), msg);
}

/**
 * Print a warning message with yellow warning prefix
 */
export function warn(msg: string): void {
  console.log(chalk.yellow('⚠'), msg);
}

/**
 * Print a bold section header with underline
 */
export function header(title: string): void {
  const line = '─'.repeat(Math.max(40, title.length + 4));
  console.log();
  console.log(chalk.bold(title));
  console.log(chalk.dim(line));
}

/**
 * Print dimmed text for secondary information
 */
export function dim(msg: string): void {
  console.log(chalk.dim(msg));
}

/**
 * Format and print a key-value pair with consistent alignment
 */
export function label(key: string, value: string): void {
  const paddedKey = key.padEnd(18);
  console.log(`  ${chalk.dim(paddedKey)}${value}`);
}

export function createSpinner(text: string): Ora {
  return ora({
    text,
    spinner: 'dots',
  });
}

/**
 * Create a configured cli-table3 instance with sensible defaults
 */
export function createTable(options?: Table.TableConstructorOptions): Table.Table {
  const defaultOptions: Table.TableConstructorOptions = {
    chars: {
      top: '─',
      'top-mid': '┬',
      'top-left': '┌',
      'top-right': '┐',
      bottom: '─',
      'bottom-mid': '┴',
      'bottom-left': '└',
      'bottom-right': '┘',
      left: '│',
      'left-mid': '├',
      mid: '─',
      'mid-mid': '┼',
      right: '│',
      'right-mid': '┤',
      middle: '│',
    },
    style: {
      'padding-left': 1,
      'padding-right': 1,
      head: ['cyan'],
      border: ['dim'],
    },
  };

  return new Table({ ...defaultOptions, ...options });
}

/**
 * One chat record as a terminal line: `HH:MM:SS author: text`.
 * Bot lines are cyan, System lines yellow, owners and moderators green.
 */
export function formatRecord(record: IDisplayRecord): string {
  const time = chalk.dim(record.timestamp.slice(11, 19));
  let author: string;
  if (record.kind === 'system') {
    author = chalk.yellow(record.author);
  } else if (record.kind === 'bot') {
    author = chalk.cyan(record.author);
  } else if (record.isPrivileged) {
    author = chalk.green(record.author);
  } else {
    author = chalk.bold(record.author);
  }
  const suffix = record.kind === 'bot' && record.delivered === false ? chalk.dim(' (not delivered)') : '';
  return `${time} ${author}: ${record.text}${suffix}`;
}
