import { writeFileSync } from 'node:fs';
import { extname } from 'node:path';
import chalk from 'chalk';
import type { CheckCategory } from './category-runner.js';
import type { CategorySummary, RunSummary } from './runner.js';
import { failedChecks, hasFailures } from './runner.js';
import type { CheckResult, FailedCheck } from './types.js';

export interface ReporterOptions {
  verbose?: boolean;
  json?: boolean;
}

export type ExportFormat = 'json' | 'text';

const CHECK_ICON = chalk.green('✓');
const FAIL_ICON = chalk.red('✗');
const PENDING_ICON = chalk.yellow('○');
const RULE_WIDTH = 60;

/** Formats a duration given in seconds. */
export function formatDuration(seconds: number): string {
  const ms = seconds * 1000;
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${seconds.toFixed(1)}s`;
}

export function formatRate(rate: number): string {
  return `${rate.toFixed(1)}%`;
}

function padRight(str: string, len: number): string {
  return str.padEnd(len);
}

export function printHeader(endpoint: string): void {
  console.log(chalk.bold('\nS3 Compatibility Check'));
  console.log(chalk.gray(`Endpoint: ${endpoint}`));
  console.log(chalk.gray('═'.repeat(RULE_WIDTH)));
}

export function printCategoryStart(category: CheckCategory): void {
  console.log(`\n ${PENDING_ICON} ${chalk.bold(category.name)} ${chalk.gray(`- ${category.description}`)}`);
}

export function printCheckResult(result: CheckResult, options: ReporterOptions = {}): void {
  const icon = result.success ? CHECK_ICON : FAIL_ICON;
  const duration = result.duration > 0 ? chalk.gray(formatDuration(result.duration).padStart(8)) : chalk.gray('-'.padStart(8));

  console.log(`   ${icon} ${padRight(result.name, 40)}${duration}    ${result.message}`);

  if (!result.success && options.verbose && Object.keys(result.details).length > 0) {
    console.log(chalk.gray(`     └─ ${JSON.stringify(result.details)}`));
  }
}

export function printCategoryComplete(summary: CategorySummary, options: ReporterOptions = {}): void {
  for (const result of summary.results) {
    printCheckResult(result, options);
  }
  if (summary.error) {
    console.log(chalk.red(`   ${FAIL_ICON} ${summary.error}`));
  }
  for (const cleanup of summary.cleanupErrors) {
    console.log(chalk.yellow(`     └─ Cleanup: ${cleanup}`));
  }
}

function categoryLine(category: CategorySummary): string {
  const counts = `${category.passed}/${category.total} (${formatRate(category.successRate)})`;
  return `${padRight(category.name, 18)}${padRight(counts, 18)}[${formatDuration(category.duration)}]`;
}

export function printSummary(summary: RunSummary): void {
  console.log(chalk.gray(`\n${'═'.repeat(RULE_WIDTH)}`));
  console.log(chalk.bold('   Summary'));

  for (const category of summary.categories) {
    const icon = category.failed === 0 && !category.error ? CHECK_ICON : FAIL_ICON;
    console.log(`   ${icon} ${categoryLine(category)}${category.error ? chalk.red(' error') : ''}`);
  }

  const failures = failedChecks(summary);
  if (failures.length > 0) {
    console.log(chalk.red.bold('\n   FAILED CHECKS'));
    for (const failure of failures) {
      console.log(chalk.red(`   ${FAIL_ICON} ${failure.category}/${failure.checkName}: ${failure.message}`));
    }
  }

  console.log(chalk.gray('═'.repeat(RULE_WIDTH)));
  const passed = chalk.green(`${summary.totalPassed}/${summary.totalChecks} checks passed (${formatRate(summary.overallSuccessRate)})`);
  console.log(`   ${passed}    Total: ${formatDuration(summary.overallDuration)}`);

  if (hasFailures(summary)) {
    console.log(chalk.red.bold(`\n   Status: INCOMPATIBLE ✗\n`));
  } else {
    console.log(chalk.green.bold(`\n   Status: COMPATIBLE ✓\n`));
  }
}

export interface JsonReport {
  status: 'compatible' | 'incompatible';
  summary: RunSummary;
  failedChecks: FailedCheck[];
}

export function buildJsonReport(summary: RunSummary): JsonReport {
  return {
    status: hasFailures(summary) ? 'incompatible' : 'compatible',
    summary,
    failedChecks: failedChecks(summary),
  };
}

export function printJson(summary: RunSummary): void {
  console.log(JSON.stringify(buildJsonReport(summary), null, 2));
}

/** Plain-text report without color codes, for files. */
export function formatTextReport(summary: RunSummary): string {
  const lines = [
    'S3 Compatibility Check Report',
    '='.repeat(RULE_WIDTH),
    `Started:  ${summary.startedAt}`,
    `Finished: ${summary.finishedAt}`,
    `Duration: ${formatDuration(summary.overallDuration)}`,
    `Checks:   ${summary.totalPassed}/${summary.totalChecks} passed (${formatRate(summary.overallSuccessRate)})`,
    '',
  ];

  for (const category of summary.categories) {
    lines.push(categoryLine(category));
    if (category.error) {
      lines.push(`  ERROR ${category.error}`);
    }
    for (const result of category.results) {
      lines.push(`  ${result.success ? 'PASS' : 'FAIL'} ${result.name}: ${result.message}`);
    }
    for (const cleanup of category.cleanupErrors) {
      lines.push(`  CLEANUP ${cleanup}`);
    }
    lines.push('');
  }

  const failures = failedChecks(summary);
  if (failures.length > 0) {
    lines.push('FAILED CHECKS');
    for (const failure of failures) {
      lines.push(`  ${failure.category}/${failure.checkName}: ${failure.message}`);
    }
    lines.push('');
  }

  lines.push(`Status: ${hasFailures(summary) ? 'INCOMPATIBLE' : 'COMPATIBLE'}`);
  return lines.join('\n') + '\n';
}

/** An explicit format wins; otherwise `.json` files get JSON and everything else text. */
export function resolveExportFormat(file: string, format?: string): ExportFormat {
  if (format === 'json' || format === 'text') return format;
  return extname(file).toLowerCase() === '.json' ? 'json' : 'text';
}

export function exportResults(summary: RunSummary, file: string, format: ExportFormat): void {
  const content = format === 'json' ? JSON.stringify(buildJsonReport(summary), null, 2) + '\n' : formatTextReport(summary);
  writeFileSync(file, content, 'utf8');
}

export class Reporter {
  private options: ReporterOptions;

  constructor(options: ReporterOptions = {}) {
    this.options = options;
  }

  start(endpoint: string): void {
    if (!this.options.json) {
      printHeader(endpoint);
    }
  }

  onCategoryStart(category: CheckCategory): void {
    if (!this.options.json) {
      printCategoryStart(category);
    }
  }

  onCategoryComplete(summary: CategorySummary): void {
    if (!this.options.json) {
      printCategoryComplete(summary, this.options);
    }
  }

  finish(summary: RunSummary): void {
    if (this.options.json) {
      printJson(summary);
    } else {
      printSummary(summary);
    }
  }
}
