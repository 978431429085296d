/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { Diagnostic } from '../reconcilers/diagnostics.js';
import type { FieldChange, Plan, PlanAction, PlanActionType } from '../reconcilers/access-policies/plan.js';

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
 * Print the diagnostics of one resource, errors in red, warnings in yellow
 */
export function printDiagnostics(address: string, diagnostics: readonly Diagnostic[]): void {
  for (const d of diagnostics) {
    const color = d.severity === 'error' ? chalk.red : chalk.yellow;
    const label = d.severity === 'error' ? 'Error' : 'Warning';
    const where = d.attribute ? chalk.gray(` [${d.attribute}]`) : '';
    console.log(color(`  ${label}: ${d.summary}`) + where);
    console.log(chalk.gray(`    ${address}: ${d.detail}`));
  }
}

/**
 * Print a plan in a human-readable format
 */
export function printPlan(plan: Plan, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(plan, null, 2));
    return;
  }

  const pending = plan.actions.filter((a) => a.type !== 'noop');
  if (pending.length === 0) {
    console.log(chalk.gray('No changes. Access policies match the declared state.'));
    return;
  }

  console.log(chalk.bold(`\n${pending.length} change(s) planned:\n`));
  for (const action of pending) {
    printPlanAction(action);
  }

  const { toCreate, toReplace, toDelete } = plan.summary;
  console.log(
    chalk.bold(`\nPlan: ${toCreate} to create, ${toReplace} to replace, ${toDelete} to delete.`)
  );
}

function printPlanAction(action: PlanAction): void {
  const color = getActionColor(action.type);
  const id = action.resourceId ? chalk.gray(` (${action.resourceId})`) : '';
  console.log(color(`${getActionIcon(action.type)} ${action.address}`) + id, chalk.gray(`# ${action.reason}`));
  for (const change of action.changes) {
    printChange(change);
  }
}

function printChange(change: FieldChange): void {
  console.log(
    `    ${change.field}: ${chalk.red(formatValue(change.oldValue))} → ${chalk.green(formatValue(change.newValue))}`
  );
}

/**
 * Print a key/value table
 */
export function printStatus(
  status: Record<string, unknown>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  for (const [key, value] of Object.entries(status)) {
    const label = formatLabel(key);
    console.log(`  ${chalk.gray(label + ':')} ${formatValue(value)}`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // stdout carries JSON output
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

function getActionIcon(type: PlanActionType): string {
  switch (type) {
    case 'create':
      return '+';
    case 'delete':
      return '-';
    case 'replace':
      return '-/+';
    case 'noop':
      return ' ';
  }
}

function getActionColor(type: PlanActionType): typeof chalk.green {
  switch (type) {
    case 'create':
      return chalk.green;
    case 'delete':
      return chalk.red;
    case 'replace':
      return chalk.yellow;
    case 'noop':
      return chalk.gray;
  }
}

export function formatValue(value: unknown): string {
  if (value === undefined || value === null || value === '') {
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

function formatLabel(key: string): string {
  // camelCase to Title Case
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
