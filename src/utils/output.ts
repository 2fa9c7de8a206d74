/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { StatusLevel } from '../reconcilers/status.js';
import type { PlanSummary, ReconciliationResult, RelationSummary } from '../reconcilers/types.js';
import type { RelationStatus } from '../relations/types.js';
import type { CommandResult, OutputFormat } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
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
 * Print a key/value table
 */
export function printStatus(status: Record<string, unknown>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  for (const [key, value] of Object.entries(status)) {
    console.log(`  ${chalk.gray(key + ':')} ${formatValue(value)}`);
  }
}

/**
 * Print relation states, one line per relation
 */
export function printRelations(relations: RelationSummary[]): void {
  if (relations.length === 0) {
    console.log(chalk.gray('  No relations'));
    return;
  }
  for (const relation of relations) {
    const color = relationColor(relation.status);
    const peers = relation.peers.length > 0 ? chalk.gray(` (${relation.peers.join(', ')})`) : '';
    const reason = relation.reason ? chalk.gray(` - ${relation.reason}`) : '';
    console.log(`  ${color(relation.status.padEnd(8))} ${relation.name}${peers}${reason}`);
  }
}

/**
 * Print what a reconciliation pass did
 */
export function printReconciliation(result: ReconciliationResult): void {
  const color = statusColor(result.status.level);
  const message = result.status.message ? `: ${result.status.message}` : '';
  console.log(chalk.bold(`\n${result.event}`), color(`${result.status.level}${message}`));

  printPlan('applied', result.applied, chalk.green);
  printPlan('deferred', result.deferred, chalk.yellow);

  for (const failure of result.failures) {
    const attempts = failure.attempts !== undefined ? chalk.gray(` after ${failure.attempts} attempt(s)`) : '';
    console.log(chalk.red('  ✗'), `${failure.code}: ${failure.message}${attempts}`);
  }
  if (result.rolledBack > 0) {
    console.log(chalk.yellow('  ↺'), `rolled back ${result.rolledBack} secret change(s)`);
  }
  if (result.restartPending) {
    console.log(chalk.yellow('  ⏸'), 'restart pending');
  }
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

// Helper functions

function printPlan(label: string, plan: PlanSummary[], color: typeof chalk.green): void {
  if (plan.length === 0) return;
  console.log(chalk.gray(`  ${label}:`));
  for (const step of plan) {
    console.log(color(`    ${step.kind}`), step.target);
  }
}

function statusColor(level: StatusLevel): typeof chalk.green {
  switch (level) {
    case 'active':
      return chalk.green;
    case 'blocked':
      return chalk.red;
    case 'waiting':
    case 'maintenance':
      return chalk.yellow;
  }
}

function relationColor(status: RelationStatus): typeof chalk.green {
  switch (status) {
    case 'active':
      return chalk.green;
    case 'joining':
      return chalk.cyan;
    case 'broken':
      return chalk.red;
    case 'absent':
      return chalk.gray;
  }
}

/**
 * Format a value for one table cell
 */
export function formatValue(value: unknown): string {
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
