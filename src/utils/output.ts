/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat, ConfigDiff } from '../types.js';
import type { KindOutcome, KindStatus, RunReport } from '../coordinator/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print a diff in a human-readable format
 */
export function printDiff(diffs: ConfigDiff[], format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(diffs, null, 2));
    return;
  }

  if (diffs.length === 0) {
    console.log(chalk.gray('No changes detected'));
    return;
  }

  console.log(chalk.bold(`\n${diffs.length} change(s) detected:\n`));

  for (const diff of diffs) {
    const icon = getDiffIcon(diff.type);
    const color = getDiffColor(diff.type);
    console.log(color(`${icon} ${diff.path}`));

    if (diff.type === 'modified') {
      console.log(chalk.red(`  - ${formatValue(diff.actual)}`));
      console.log(chalk.green(`  + ${formatValue(diff.desired)}`));
    } else if (diff.type === 'added') {
      console.log(chalk.green(`  + ${formatValue(diff.desired)}`));
    }
  }
}

/**
 * Print one line per kind, then its actions and warnings
 */
export function printRunReport(report: RunReport): void {
  for (const outcome of report.outcomes) {
    console.log(`${getStatusColor(outcome.status)(formatStatus(outcome))} ${chalk.bold(outcome.kind)}`);
    for (const action of outcome.actions) {
      console.log(chalk.gray(`    ${action}`));
    }
    for (const warning of outcome.warnings) {
      console.log(chalk.yellow(`    ⚠ ${warning}`));
    }
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // verbose output never goes to stdout
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

// Helper functions

function getDiffIcon(type: ConfigDiff['type']): string {
  switch (type) {
    case 'added':
      return '+';
    case 'modified':
      return '~';
  }
}

function getDiffColor(type: ConfigDiff['type']): typeof chalk.green {
  switch (type) {
    case 'added':
      return chalk.green;
    case 'modified':
      return chalk.yellow;
  }
}

function formatStatus(outcome: KindOutcome): string {
  switch (outcome.status) {
    case 'skipped':
      return '  skipped  ';
    case 'planned':
      return `  ${outcome.changes.length} pending`.padEnd(11);
    case 'unchanged':
      return '  ok       ';
    case 'changed':
      return '  changed  ';
  }
}

function getStatusColor(status: KindStatus): typeof chalk.green {
  switch (status) {
    case 'skipped':
      return chalk.gray;
    case 'planned':
      return chalk.yellow;
    case 'unchanged':
      return chalk.green;
    case 'changed':
      return chalk.cyan;
  }
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'string') {
    return value.length > 50 ? value.slice(0, 50) + '...' : value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
