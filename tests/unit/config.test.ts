/**
 * Unit Tests: environment parsing, validation warnings, and the .env template.
 */
import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parse } from 'dotenv';
import { describe, it, expect } from 'vitest';
import { CATEGORY_NAMES, generateEnvTemplate, loadConfig, validateConfig } from '../../src/config.js';
import { ConfigError } from '../../src/errors.js';
import { allChecks, testConfig } from '../helpers/fixtures.js';

const REQUIRED = {
  S3_ENDPOINT_URL: 'http://storage.test.invalid:9000',
  S3_ACCESS_KEY: 'test-access-key',
  S3_SECRET_KEY: 'test-secret',
};

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('applies defaults for everything optional', () => {
    const config = loadConfig(REQUIRED);

    expect(config.connection).toEqual({
      endpointUrl: 'http://storage.test.invalid:9000',
      accessKey: 'test-access-key',
      secretKey: 'test-secret',
      region: 'us-east-1',
      verifyTls: false,
      maxRetries: 3,
      forcePathStyle: true,
    });
    expect(config.testData).toEqual({
      smallFileSize: 1024,
      mediumFileSize: 1048576,
      largeFileSize: 10485760,
      multipartChunkSize: 5242880,
      testFileContent: 'S3 compatibility test data',
      cleanupEnabled: true,
    });
    expect(config.checks).toEqual(allChecks());
    expect(config.timeouts).toEqual({ operationMs: 30000, runDeadlineMs: 0 });
    expect(config.concurrency).toBe(1);
    expect(config.logging).toEqual({ level: 'info', pretty: false, file: undefined });
  });

  it('parses booleans and integers', () => {
    const config = loadConfig({
      ...REQUIRED,
      S3_VERIFY_TLS: 'yes',
      S3_MAX_RETRIES: '0',
      CHECK_SYNC: 'off',
      CHECK_MULTIPART: 'FALSE',
      CLEANUP_ENABLED: '0',
      RUN_DEADLINE_MS: '60000',
      CONCURRENCY: '4',
      LOG_LEVEL: 'debug',
    });

    expect(config.connection.verifyTls).toBe(true);
    expect(config.connection.maxRetries).toBe(0);
    expect(config.checks.sync).toBe(false);
    expect(config.checks.multipart).toBe(false);
    expect(config.checks.objects).toBe(true);
    expect(config.testData.cleanupEnabled).toBe(false);
    expect(config.timeouts.runDeadlineMs).toBe(60000);
    expect(config.concurrency).toBe(4);
    expect(config.logging.level).toBe('debug');
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ ...REQUIRED, S3_MAX_RETRIES: '  ', S3_VERIFY_TLS: '' });
    expect(config.connection.maxRetries).toBe(3);
    expect(config.connection.verifyTls).toBe(false);
  });

  it('lists every missing credential', () => {
    const error = configErrorOf(() => loadConfig({}));
    expect(error.issues).toEqual(['S3_ENDPOINT_URL is required', 'S3_ACCESS_KEY is required', 'S3_SECRET_KEY is required']);
    expect(error.code).toBe('CONFIG_INVALID');
  });

  it('rejects an endpoint without a scheme', () => {
    const error = configErrorOf(() => loadConfig({ ...REQUIRED, S3_ENDPOINT_URL: 'storage.test.invalid' }));
    expect(error.issues).toEqual(['S3_ENDPOINT_URL must start with http:// or https://']);
  });

  it('rejects an unparseable boolean', () => {
    const error = configErrorOf(() => loadConfig({ ...REQUIRED, CLEANUP_ENABLED: 'maybe' }));
    expect(error.issues).toEqual(['CLEANUP_ENABLED: Expected a boolean, got "maybe"']);
  });

  it('rejects a multipart chunk below 5 MiB', () => {
    const error = configErrorOf(() => loadConfig({ ...REQUIRED, TEST_MULTIPART_CHUNK_SIZE: '1024' }));
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^TEST_MULTIPART_CHUNK_SIZE: /);
  });

  it('rejects an unknown log level', () => {
    const error = configErrorOf(() => loadConfig({ ...REQUIRED, LOG_LEVEL: 'chatty' }));
    expect(error.issues[0]).toMatch(/^LOG_LEVEL: /);
  });
});

describe('validateConfig', () => {
  it('has nothing to say about a sensible configuration', () => {
    expect(validateConfig(testConfig())).toEqual([]);
  });

  it('warns about placeholders, disabled TLS, and localhost', () => {
    const config = loadConfig({
      S3_ENDPOINT_URL: 'http://localhost:9000',
      S3_ACCESS_KEY: 'minioadmin',
      S3_SECRET_KEY: 'minioadmin',
    });

    expect(validateConfig(config)).toEqual([
      'Credentials look like placeholder values',
      'TLS certificate verification is disabled',
      'Endpoint points at localhost',
    ]);
  });

  it('warns when the large file would not span two parts', () => {
    const config = testConfig();
    config.testData.largeFileSize = 1024;
    expect(validateConfig(config)).toEqual(['TEST_LARGE_FILE_SIZE is smaller than TEST_MULTIPART_CHUNK_SIZE']);
  });

  it('throws when every category is disabled', () => {
    const error = configErrorOf(() => validateConfig(testConfig({ checks: allChecks(false) })));
    expect(error.issues).toEqual(['At least one CHECK_<CATEGORY> flag must be enabled']);
  });
});

describe('generateEnvTemplate', () => {
  const dir = mkdtempSync(join(tmpdir(), 's3check-config-'));

  it('writes a template that loads cleanly', () => {
    const path = join(dir, 'fresh.env');
    generateEnvTemplate(path);

    const values = parse(readFileSync(path, 'utf8'));
    for (const name of CATEGORY_NAMES) {
      expect(values[`CHECK_${name.toUpperCase()}`]).toBe('true');
    }
    const config = loadConfig(values);
    expect(config.connection.endpointUrl).toBe('http://localhost:9000');
    expect(config.testData.multipartChunkSize).toBe(5242880);
    expect(config.logging.file).toBeUndefined();
  });

  it('refuses to overwrite unless asked', () => {
    const path = join(dir, 'existing.env');
    generateEnvTemplate(path);

    expect(() => generateEnvTemplate(path)).toThrow(ConfigError);
    expect(() => generateEnvTemplate(path, { overwrite: true })).not.toThrow();
  });
});
