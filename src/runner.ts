import type { CategoryInstance, CheckCategory } from './category-runner.js';
import { allCategories } from './checks/index.js';
import type { CheckerConfig } from './config.js';
import { validateConfig } from './config.js';
import { RunDeadline } from './deadline.js';
import { CheckerError, InitError, OrchestrationError, describeError } from './errors.js';
import type { StorageGateway } from './gateway.js';
import { successRate } from './ledger.js';
import type { Logger } from './logger.js';
import { mapConcurrent } from './pool.js';
import type { CheckResult, FailedCheck } from './types.js';

export interface CategorySummary {
  name: string;
  description: string;
  total: number;
  passed: number;
  failed: number;
  successRate: number;
  /** Seconds, including cleanup. */
  duration: number;
  /** Set when the category raised outside probe isolation; results are then empty. */
  error?: string;
  results: readonly CheckResult[];
  cleanupErrors: string[];
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  /** Seconds. */
  overallDuration: number;
  totalCategories: number;
  executedCategories: string[];
  totalChecks: number;
  totalPassed: number;
  totalFailed: number;
  overallSuccessRate: number;
  categories: CategorySummary[];
}

export interface InitReport {
  warnings: string[];
  bucketCount: number;
  available: string[];
}

export interface RunHooks {
  onCategoryStart?: (category: CheckCategory) => void;
  onCategoryComplete?: (summary: CategorySummary) => void;
}

export interface OrchestratorOptions {
  config: CheckerConfig;
  gateway: StorageGateway;
  logger: Logger;
  /** Defaults to every registered category. */
  categories?: CheckCategory[];
}

export type Scopes = 'all' | Iterable<string>;

/** Pure aggregation over per-category summaries. */
export function summarize(categories: CategorySummary[], startedAt: Date, finishedAt: Date): RunSummary {
  const totalChecks = categories.reduce((sum, c) => sum + c.total, 0);
  const totalPassed = categories.reduce((sum, c) => sum + c.passed, 0);
  const totalFailed = categories.reduce((sum, c) => sum + c.failed, 0);

  return {
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    overallDuration: (finishedAt.getTime() - startedAt.getTime()) / 1000,
    totalCategories: categories.length,
    executedCategories: categories.map(c => c.name),
    totalChecks,
    totalPassed,
    totalFailed,
    overallSuccessRate: successRate(totalPassed, totalChecks),
    categories,
  };
}

export function failedChecks(summary: RunSummary): FailedCheck[] {
  return summary.categories.flatMap(category =>
    category.results
      .filter(result => !result.success)
      .map(result => ({
        category: category.name,
        checkName: result.name,
        message: result.message,
        details: result.details,
        duration: result.duration,
      })),
  );
}

/** True when any check failed or any category raised. */
export function hasFailures(summary: RunSummary): boolean {
  return summary.totalFailed > 0 || summary.categories.some(c => c.error !== undefined);
}

/**
 * Selects, runs, cleans up, and aggregates check categories. One category's
 * fault never stops the run.
 */
export class CheckOrchestrator {
  private readonly config: CheckerConfig;
  private readonly gateway: StorageGateway;
  private readonly logger: Logger;
  private readonly categories: CheckCategory[];
  private ready = false;
  private last?: RunSummary;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.gateway = options.gateway;
    this.logger = options.logger;
    this.categories = options.categories ?? allCategories;
  }

  /** Validates settings and fails fast when the endpoint is unreachable. */
  async initialize(): Promise<InitReport> {
    const warnings = validateConfig(this.config);
    for (const warning of warnings) {
      this.logger.warn(warning);
    }

    const info = this.gateway.connectionInfo();
    this.logger.info({ endpoint: info.endpoint, region: info.region, accessKey: info.accessKey }, 'connecting');

    const listed = await this.gateway.listBuckets();
    if (!listed.ok) {
      throw new InitError(
        `Cannot reach storage endpoint ${info.endpoint}: ${listed.error.code} (status: ${listed.error.httpStatus})`,
        listed.error,
      );
    }

    const bucketCount = listed.value.buckets.length;
    this.logger.info({ bucketCount }, 'liveness probe succeeded');
    this.ready = true;

    return { warnings, bucketCount, available: this.categories.map(c => c.name) };
  }

  /** Requested ∩ enabled ∩ registered, in registry order. */
  resolveCategories(scopes: Scopes = 'all'): CheckCategory[] {
    const enabled = this.categories.filter(c => this.config.checks[c.name]);
    if (scopes === 'all') {
      return enabled;
    }
    const wanted = new Set([...scopes].map(s => s.toLowerCase()));
    return enabled.filter(c => wanted.has(c.name));
  }

  async runChecks(scopes: Scopes = 'all', hooks: RunHooks = {}): Promise<RunSummary> {
    if (!this.ready) {
      throw new CheckerError('initialize() must succeed before runChecks()', 'INIT_FAILED');
    }

    const selected = this.resolveCategories(scopes);
    const deadline = new RunDeadline(this.config.timeouts.runDeadlineMs);
    const startedAt = new Date();

    this.logger.info({ categories: selected.map(c => c.name), concurrency: this.config.concurrency }, 'starting run');

    const summaries = await mapConcurrent(selected, this.config.concurrency, async category => {
      hooks.onCategoryStart?.(category);
      const summary = await this.runCategory(category, deadline);
      hooks.onCategoryComplete?.(summary);
      return summary;
    });

    const summary = summarize(summaries, startedAt, new Date());
    this.last = summary;
    this.logger.info(
      { checks: summary.totalChecks, passed: summary.totalPassed, failed: summary.totalFailed, durationSec: summary.overallDuration },
      'run completed',
    );
    return summary;
  }

  get summary(): RunSummary | undefined {
    return this.last;
  }

  getFailedChecks(): FailedCheck[] {
    return this.last ? failedChecks(this.last) : [];
  }

  private async runCategory(category: CheckCategory, deadline: RunDeadline): Promise<CategorySummary> {
    const logger = this.logger.child({ category: category.name });
    const started = performance.now();
    let instance: CategoryInstance | undefined;
    let error: string | undefined;

    logger.info(category.description);

    try {
      instance = category.create({ gateway: this.gateway, logger, testData: this.config.testData, deadline });
      await instance.runChecks();
    } catch (cause) {
      const failure = new OrchestrationError(category.name, cause);
      error = failure.message;
      logger.error({ err: cause }, failure.message);
    }

    const cleanupErrors: string[] = [];
    if (instance) {
      if (this.config.testData.cleanupEnabled) {
        try {
          for (const failure of await instance.cleanup()) {
            cleanupErrors.push(failure.message);
          }
        } catch (cause) {
          cleanupErrors.push(describeError(cause));
          logger.error({ err: cause }, 'cleanup raised');
        }
      } else {
        instance.skipCleanup();
        logger.info('cleanup disabled; test resources left in place');
      }
    }

    const duration = (performance.now() - started) / 1000;
    if (error !== undefined || !instance) {
      return { name: category.name, description: category.description, total: 0, passed: 0, failed: 0, successRate: 0, duration, error, results: [], cleanupErrors };
    }

    const { ledger } = instance;
    return {
      name: category.name,
      description: category.description,
      total: ledger.total,
      passed: ledger.passed,
      failed: ledger.failed,
      successRate: ledger.successRate,
      duration,
      results: ledger.results,
      cleanupErrors,
    };
  }
}
