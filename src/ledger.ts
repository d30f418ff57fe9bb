import type { CheckResult, Details } from './types.js';

export interface LedgerSummary {
  category: string;
  total: number;
  passed: number;
  failed: number;
  /** Percentage in [0, 100]; 0 when nothing was recorded. */
  successRate: number;
}

export function successRate(passed: number, total: number): number {
  return total === 0 ? 0 : (passed / total) * 100;
}

export interface NewResult {
  name: string;
  success: boolean;
  message: string;
  details?: Details;
  duration?: number;
  timestamp?: Date;
}

/**
 * Append-only record of one category's results. Aggregates are computed
 * from the entries on every read.
 */
export class ResultLedger {
  readonly category: string;
  private readonly entries: CheckResult[] = [];

  constructor(category: string) {
    this.category = category;
  }

  append(input: NewResult): CheckResult {
    const result: CheckResult = Object.freeze({
      name: input.name,
      success: input.success,
      message: input.message,
      details: Object.freeze({ ...input.details }),
      duration: input.duration ?? 0,
      timestamp: (input.timestamp ?? new Date()).toISOString(),
    });
    this.entries.push(result);
    return result;
  }

  get results(): readonly CheckResult[] {
    return this.entries.slice();
  }

  get total(): number {
    return this.entries.length;
  }

  get passed(): number {
    return this.entries.filter(r => r.success).length;
  }

  get failed(): number {
    return this.entries.filter(r => !r.success).length;
  }

  get successRate(): number {
    return successRate(this.passed, this.total);
  }

  failures(): CheckResult[] {
    return this.entries.filter(r => !r.success);
  }

  summary(): LedgerSummary {
    return {
      category: this.category,
      total: this.total,
      passed: this.passed,
      failed: this.failed,
      successRate: this.successRate,
    };
  }
}
