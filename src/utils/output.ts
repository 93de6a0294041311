/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ValidationIssue, ValidationResult } from '../manifests/validator.js';
import { describePlan } from '../reconcile/plan.js';
import { describeEntry, formatWalkLine, summarizeReport, type WalkLine } from '../reconcile/render.js';
import type { ApplyPlan, ExecutionEntry, ExecutionReport } from '../reconcile/types.js';

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

  // Human-readable format
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
 * Print a structural diff of one object
 */
export function printWalk(title: string, lines: readonly WalkLine[]): void {
  console.log(chalk.bold(title));
  for (const line of lines) {
    const text = formatWalkLine(line);
    switch (line.side) {
      case 'added':
        console.log(chalk.green(text));
        break;
      case 'removed':
        console.log(chalk.red(text));
        break;
      case 'context':
        console.log(chalk.gray(text));
        break;
    }
  }
}

/**
 * Print the actionable steps of a plan
 */
export function printPlan(plan: ApplyPlan): void {
  const lines = describePlan(plan);
  if (lines.length === 0) {
    console.log(chalk.gray('No changes detected'));
    return;
  }

  console.log(chalk.bold(`\n${lines.length} change(s) planned:\n`));
  for (const line of lines) {
    const color = /\] (conflict|unreadable) /.test(line)
      ? chalk.red
      : line.includes('] delete ')
        ? chalk.yellow
        : chalk.cyan;
    console.log(color(`  ${line}`));
  }
}

function entryColor(entry: ExecutionEntry): typeof chalk.green {
  if (entry.readiness?.status === 'failed') return chalk.red;
  switch (entry.outcome) {
    case 'created':
    case 'patched':
    case 'deleted':
      return entry.readiness?.status === 'timed-out' || entry.readiness?.status === 'cancelled'
        ? chalk.yellow
        : chalk.green;
    case 'noop':
    case 'cancelled':
      return chalk.gray;
    case 'conflict':
    case 'skipped-dependency':
      return chalk.yellow;
    case 'failed':
      return chalk.red;
  }
}

/**
 * Print one line per execution entry followed by the summary
 */
export function printReport(report: ExecutionReport): void {
  console.log(chalk.bold('\nResults:\n'));
  for (const entry of report.entries) {
    console.log(entryColor(entry)(`  ${describeEntry(entry)}`));
  }
  const summary = summarizeReport(report);
  console.log(report.success ? chalk.green(`\n${summary}`) : chalk.red(`\n${summary}`));
}

function printIssue(issue: ValidationIssue): void {
  const icon = issue.severity === 'error' ? chalk.red('✗') : chalk.yellow('⚠');
  console.log(icon, `[${issue.code}] ${issue.path}`);
  console.log(`   ${issue.message}`);
  for (const suggestion of issue.suggestions ?? []) {
    console.log(chalk.gray(`     • ${suggestion}`));
  }
}

/**
 * Print validation issues, errors first
 */
export function printValidation(result: ValidationResult): void {
  result.errors.forEach(printIssue);
  result.warnings.forEach(printIssue);
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
  console.error(chalk.red('✗'), message);
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

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}
