import { CleanupRegistry } from './cleanup.js';
import type { CleanupItem } from './cleanup.js';
import type { CategoryName, TestDataConfig } from './config.js';
import { RunDeadline } from './deadline.js';
import { CleanupError, ProvisioningError, describeError } from './errors.js';
import type { StorageGateway } from './gateway.js';
import { ResultLedger } from './ledger.js';
import type { Logger } from './logger.js';
import type { CheckResult, Details } from './types.js';

export type CategoryState = 'uninitialized' | 'bucket_provisioned' | 'probing' | 'cleaning' | 'done' | 'done_partial';

/** What the orchestrator hands every category instance. */
export interface CategoryEnv {
  gateway: StorageGateway;
  logger: Logger;
  testData: TestDataConfig;
  deadline: RunDeadline;
}

export interface ProbeContext<S> {
  runner: CategoryRunner;
  gateway: StorageGateway;
  testData: TestDataConfig;
  bucket: string;
  state: S;
  logger: Logger;
}

export interface Probe<S> {
  name: string;
  run(ctx: ProbeContext<S>): Promise<void>;
}

export interface CategoryDefinition<S> {
  name: CategoryName;
  description: string;
  /** Included in `--quick` runs. */
  quick?: boolean;
  bucketPrefix: string;
  initialState(): S;
  /**
   * Runs after the bucket exists and before any probe. Returning false
   * records nothing further; the setup itself must add the failing result.
   */
  setup?(ctx: ProbeContext<S>): Promise<boolean>;
  probes: Probe<S>[];
}

/** One run of one category: its own bucket, ledger, and cleanup queue. */
export interface CategoryInstance {
  readonly state: CategoryState;
  readonly ledger: ResultLedger;
  runChecks(): Promise<readonly CheckResult[]>;
  cleanup(): Promise<CleanupError[]>;
  /** Ends the lifecycle without draining, when cleanup is disabled. */
  skipCleanup(): void;
}

export interface CheckCategory {
  name: CategoryName;
  description: string;
  quick: boolean;
  probeNames: string[];
  create(env: CategoryEnv): CategoryInstance;
}

export const RUN_DEADLINE_RESULT = 'run_deadline_exceeded';

/**
 * Shared helper each category holds. Records results, tracks created
 * resources, and drives the lifecycle
 * uninitialized → bucket_provisioned → probing → cleaning → done.
 */
export class CategoryRunner {
  readonly ledger: ResultLedger;
  readonly logger: Logger;
  private readonly registry: CleanupRegistry;
  private readonly env: CategoryEnv;
  private current: CategoryState = 'uninitialized';
  private lastStamp = 0;
  private cleaned = false;

  constructor(category: string, env: CategoryEnv) {
    this.env = env;
    this.logger = env.logger;
    this.ledger = new ResultLedger(category);
    this.registry = new CleanupRegistry(env.gateway, env.logger);
  }

  get state(): CategoryState {
    return this.current;
  }

  get category(): string {
    return this.ledger.category;
  }

  addResult(name: string, success: boolean, message: string, details: Details = {}, duration = 0): CheckResult {
    const result = this.ledger.append({ name, success, message, details, duration });
    if (success) {
      this.logger.info({ check: name, durationSec: round(duration) }, `✓ ${name}: ${message}`);
    } else {
      this.logger.warn({ check: name, durationSec: round(duration), details }, `✗ ${name}: ${message}`);
    }
    return result;
  }

  pass(name: string, message: string, details?: Details, duration?: number): CheckResult {
    return this.addResult(name, true, message, details, duration);
  }

  fail(name: string, message: string, details?: Details, duration?: number): CheckResult {
    return this.addResult(name, false, message, details, duration);
  }

  addCleanupItem(item: CleanupItem): void {
    this.registry.register(item);
  }

  removeCleanupItems(predicate: (item: CleanupItem) => boolean): number {
    return this.registry.remove(predicate);
  }

  pendingCleanup(): readonly CleanupItem[] {
    return this.registry.pending();
  }

  /**
   * `{prefix}-{epoch ms}`. Stamps are strictly increasing within a runner so
   * two names taken in the same millisecond never collide.
   */
  generateUniqueName(prefix = 's3check'): string {
    const stamp = Math.max(Date.now(), this.lastStamp + 1);
    this.lastStamp = stamp;
    return `${prefix}-${stamp}`;
  }

  /** Times an async call; the second element is elapsed seconds. */
  async timed<T>(fn: () => Promise<T>): Promise<[T, number]> {
    const start = performance.now();
    const value = await fn();
    return [value, (performance.now() - start) / 1000];
  }

  async execute<S>(definition: CategoryDefinition<S>): Promise<readonly CheckResult[]> {
    if (this.current !== 'uninitialized') {
      throw new Error(`Category ${this.category} has already run`);
    }

    const bucket = this.generateUniqueName(definition.bucketPrefix);
    const created = await this.env.gateway.createBucket(bucket);

    if (!created.ok) {
      const failure = new ProvisioningError(bucket, created.error);
      this.fail(`${definition.name}_bucket_creation`, failure.message, { bucket, ...created.error.toDetails() });
      this.current = 'done_partial';
      return this.ledger.results;
    }

    this.addCleanupItem({ kind: 'bucket', name: bucket });
    this.current = 'bucket_provisioned';
    this.logger.info({ bucket }, 'created test bucket');

    const ctx: ProbeContext<S> = {
      runner: this,
      gateway: this.env.gateway,
      testData: this.env.testData,
      bucket,
      state: definition.initialState(),
      logger: this.logger,
    };

    this.current = 'probing';

    const { setup } = definition;
    if (setup && !(await this.isolate(`${definition.name}_setup`, () => setup(ctx)))) {
      return this.ledger.results;
    }

    for (const [index, probe] of definition.probes.entries()) {
      if (this.env.deadline.expired()) {
        const skipped = definition.probes.slice(index).map(p => p.name);
        this.fail(RUN_DEADLINE_RESULT, `Run deadline exceeded; ${skipped.length} probe(s) not run`, { skipped });
        break;
      }
      await this.isolate(probe.name, async () => {
        await probe.run(ctx);
        return true;
      });
    }

    this.logger.info({ checks: this.ledger.total, failed: this.ledger.failed }, 'category checks completed');
    return this.ledger.results;
  }

  /** Converts anything a probe throws into one failing result. */
  private async isolate(name: string, fn: () => Promise<boolean>): Promise<boolean> {
    try {
      return await fn();
    } catch (error) {
      this.fail(name, `Probe raised an unexpected error: ${describeError(error)}`, {
        error_type: error instanceof Error ? error.name : typeof error,
      });
      return false;
    }
  }

  async cleanup(): Promise<CleanupError[]> {
    if (this.cleaned) {
      return [];
    }
    this.cleaned = true;
    const finalState: CategoryState = this.current === 'done_partial' ? 'done_partial' : 'done';
    this.current = 'cleaning';
    const errors = await this.registry.drain();
    this.current = finalState;
    return errors;
  }

  skipCleanup(): void {
    if (this.current !== 'done_partial') {
      this.current = 'done';
    }
  }
}

function round(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}

/** Binds a definition into a registrable category. */
export function defineCategory<S>(definition: CategoryDefinition<S>): CheckCategory {
  return {
    name: definition.name,
    description: definition.description,
    quick: definition.quick ?? false,
    probeNames: definition.probes.map(p => p.name),
    create(env: CategoryEnv): CategoryInstance {
      const runner = new CategoryRunner(definition.name, env);
      return {
        get state() {
          return runner.state;
        },
        ledger: runner.ledger,
        runChecks: () => runner.execute(definition),
        cleanup: () => runner.cleanup(),
        skipCleanup: () => runner.skipCleanup(),
      };
    },
  };
}
