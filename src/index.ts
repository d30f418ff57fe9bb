#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { allCategories, getCategoriesByName, quickCategories } from './checks/index.js';
import { CATEGORY_NAMES, LOG_LEVELS, generateEnvTemplate, loadConfig } from './config.js';
import type { CategoryName, CheckerConfig, LogLevel } from './config.js';
import { createLogger } from './logger.js';
import { Reporter, exportResults, resolveExportFormat } from './reporter.js';
import { CheckOrchestrator, hasFailures } from './runner.js';
import { S3Gateway } from './s3-gateway.js';

interface CheckOptions {
  only?: string;
  quick?: boolean;
  verbose?: boolean;
  json?: boolean;
  cleanup: boolean;
  concurrency?: number;
  export?: string;
  exportFormat?: string;
  logLevel?: LogLevel;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

function logLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find(l => l === value);
  if (!level) {
    throw new InvalidArgumentError(`Must be one of ${LOG_LEVELS.join(', ')}.`);
  }
  return level;
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(2);
}

function applyOverrides(config: CheckerConfig, options: CheckOptions): CheckerConfig {
  return {
    ...config,
    testData: { ...config.testData, cleanupEnabled: config.testData.cleanupEnabled && options.cleanup },
    logging: { ...config.logging, level: options.logLevel ?? (options.verbose ? 'debug' : config.logging.level) },
    concurrency: options.concurrency ?? config.concurrency,
  };
}

function selectScopes(options: CheckOptions): string[] | 'all' {
  if (options.quick) {
    return quickCategories.map(c => c.name);
  }
  if (!options.only) {
    return 'all';
  }

  const { found, unknown } = getCategoriesByName(options.only.split(','));
  if (unknown.length > 0) {
    console.error(`Ignoring unknown categories: ${unknown.join(', ')}`);
  }
  if (found.length === 0) {
    console.error('Available categories:', CATEGORY_NAMES.join(', '));
    fail(`No categories found matching: ${options.only}`);
  }
  return found.map(c => c.name);
}

const program = new Command();

program
  .name('s3check')
  .description('Checks that a storage endpoint implements the S3 API correctly')
  .version('1.0.0');

program
  .command('check', { isDefault: true })
  .description('Run compatibility checks against the configured endpoint')
  .option('--only <categories>', 'Run specific categories (comma-separated)')
  .option('--quick', 'Run only quick categories (buckets, objects, tagging)')
  .option('--verbose', 'Show failure details and debug logs')
  .option('--json', 'Output results as JSON')
  .option('--no-cleanup', 'Leave test buckets and objects in place')
  .option('--concurrency <n>', 'Categories to run at once', positiveInt)
  .option('--export <file>', 'Write results to a file')
  .option('--export-format <format>', 'Export format: json or text (default: from file extension)')
  .option('--log-level <level>', 'Log level', logLevel)
  .action(async (options: CheckOptions) => {
    let config: CheckerConfig;
    try {
      config = applyOverrides(loadConfig(), options);
    } catch (error) {
      fail(error instanceof Error ? error.message : 'An unknown error occurred');
    }

    const scopes = selectScopes(options);
    const logger = createLogger({ level: config.logging.level, pretty: config.logging.pretty, file: config.logging.file });
    const gateway = S3Gateway.fromConfig(config.connection, config.timeouts.operationMs, logger);
    const orchestrator = new CheckOrchestrator({ config, gateway, logger });
    const reporter = new Reporter({ verbose: options.verbose, json: options.json });

    try {
      await orchestrator.initialize();
    } catch (error) {
      fail(error instanceof Error ? error.message : 'An unknown error occurred');
    }

    if (orchestrator.resolveCategories(scopes).length === 0) {
      fail('None of the selected categories is enabled in the configuration');
    }

    reporter.start(config.connection.endpointUrl);
    const summary = await orchestrator.runChecks(scopes, {
      onCategoryStart: category => reporter.onCategoryStart(category),
      onCategoryComplete: category => reporter.onCategoryComplete(category),
    });
    reporter.finish(summary);

    if (options.export) {
      const format = resolveExportFormat(options.export, options.exportFormat);
      exportResults(summary, options.export, format);
      if (!options.json) {
        console.log(`Results exported to ${options.export} (${format})`);
      }
    }

    process.exit(hasFailures(summary) ? 1 : 0);
  });

program
  .command('scopes')
  .description('List check categories and whether they are enabled')
  .action(() => {
    let checks: Record<CategoryName, boolean> | undefined;
    try {
      checks = loadConfig().checks;
    } catch {
      // Without a valid configuration every category shows as enabled.
      checks = undefined;
    }

    for (const category of allCategories) {
      const enabled = checks ? checks[category.name] : true;
      const flags = [enabled ? 'enabled' : 'disabled', ...(category.quick ? ['quick'] : [])].join(', ');
      console.log(`${category.name.padEnd(18)}${category.description} (${flags})`);
    }
  });

program
  .command('init')
  .description('Write a .env configuration template')
  .argument('[file]', 'Target file', '.env')
  .option('--overwrite', 'Replace an existing file')
  .action((file: string, options: { overwrite?: boolean }) => {
    try {
      generateEnvTemplate(file, { overwrite: options.overwrite });
      console.log(`Wrote configuration template to ${file}`);
    } catch (error) {
      fail(error instanceof Error ? error.message : 'An unknown error occurred');
    }
  });

await program.parseAsync();
