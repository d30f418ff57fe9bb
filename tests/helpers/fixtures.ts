/**
 * Shared fixtures: configuration, category environments, and result lookups.
 */
import type { CategoryEnv, CategoryInstance, CheckCategory } from '../../src/category-runner.js';
import type { CategoryName, CheckerConfig, TestDataConfig } from '../../src/config.js';
import { RunDeadline } from '../../src/deadline.js';
import type { StorageGateway } from '../../src/gateway.js';
import { createSilentLogger } from '../../src/logger.js';
import type { CheckResult } from '../../src/types.js';

// Small sizes keep the in-memory runs fast; the memory gateway enforces no part minimum.
export const TEST_DATA: TestDataConfig = {
  smallFileSize: 1024,
  mediumFileSize: 8192,
  largeFileSize: 65536,
  multipartChunkSize: 4096,
  testFileContent: 'S3 compatibility test data',
  cleanupEnabled: true,
};

export function allChecks(enabled = true): Record<CategoryName, boolean> {
  return {
    buckets: enabled,
    objects: enabled,
    multipart: enabled,
    versioning: enabled,
    tagging: enabled,
    attributes: enabled,
    metadata: enabled,
    range_requests: enabled,
    error_conditions: enabled,
    sync: enabled,
  };
}

export function testConfig(overrides: Partial<CheckerConfig> = {}): CheckerConfig {
  return {
    connection: {
      endpointUrl: 'https://s3.test.invalid',
      accessKey: 'test-access-key',
      secretKey: 'test-secret',
      region: 'us-east-1',
      verifyTls: true,
      maxRetries: 0,
      forcePathStyle: true,
    },
    testData: { ...TEST_DATA },
    logging: { level: 'fatal', pretty: false },
    checks: allChecks(),
    timeouts: { operationMs: 5000, runDeadlineMs: 0 },
    concurrency: 1,
    ...overrides,
  };
}

export function categoryEnv(gateway: StorageGateway, overrides: Partial<CategoryEnv> = {}): CategoryEnv {
  return {
    gateway,
    logger: createSilentLogger(),
    testData: { ...TEST_DATA },
    deadline: RunDeadline.none(),
    ...overrides,
  };
}

/** Runs one category to completion, including cleanup. */
export async function runCategory(
  category: CheckCategory,
  gateway: StorageGateway,
  overrides: Partial<CategoryEnv> = {},
): Promise<{ instance: CategoryInstance; results: readonly CheckResult[] }> {
  const instance = category.create(categoryEnv(gateway, overrides));
  const results = await instance.runChecks();
  await instance.cleanup();
  return { instance, results };
}

export function resultNamed(results: readonly CheckResult[], name: string): CheckResult {
  const result = results.find(r => r.name === name);
  if (!result) {
    throw new Error(`No result named ${name}; have ${results.map(r => r.name).join(', ')}`);
  }
  return result;
}

export function failures(results: readonly CheckResult[]): string[] {
  return results.filter(r => !r.success).map(r => `${r.name}: ${r.message}`);
}
