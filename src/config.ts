import { existsSync, writeFileSync } from 'node:fs';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';

loadDotenv();

export const CATEGORY_NAMES = [
  'buckets',
  'objects',
  'multipart',
  'versioning',
  'tagging',
  'attributes',
  'metadata',
  'range_requests',
  'error_conditions',
  'sync',
] as const;

export type CategoryName = (typeof CATEGORY_NAMES)[number];

/** Smallest part size S3 accepts for every part but the last. */
export const MIN_MULTIPART_CHUNK_SIZE = 5 * 1024 * 1024;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

const bool = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v == null || v.trim() === '') return fallback;
      const normalized = v.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
      if (['false', '0', 'no', 'off'].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${v}"` });
      return z.NEVER;
    });

const int = (fallback: number, min = 0) =>
  z
    .string()
    .optional()
    .transform((v) => (v == null || v.trim() === '' ? fallback : Number(v)))
    .pipe(z.number().int().min(min));

const EnvSchema = z.object({
  S3_ENDPOINT_URL: z
    .string({ required_error: 'S3_ENDPOINT_URL is required' })
    .regex(/^https?:\/\//, 'S3_ENDPOINT_URL must start with http:// or https://'),
  S3_ACCESS_KEY: z.string({ required_error: 'S3_ACCESS_KEY is required' }).min(1, 'S3_ACCESS_KEY is required'),
  S3_SECRET_KEY: z.string({ required_error: 'S3_SECRET_KEY is required' }).min(1, 'S3_SECRET_KEY is required'),
  S3_REGION: z.string().default('us-east-1'),
  S3_VERIFY_TLS: bool(false),
  S3_MAX_RETRIES: int(3),
  S3_FORCE_PATH_STYLE: bool(true),

  TEST_SMALL_FILE_SIZE: int(1024),
  TEST_MEDIUM_FILE_SIZE: int(1024 * 1024),
  TEST_LARGE_FILE_SIZE: int(10 * 1024 * 1024),
  TEST_MULTIPART_CHUNK_SIZE: int(MIN_MULTIPART_CHUNK_SIZE, MIN_MULTIPART_CHUNK_SIZE),
  TEST_FILE_CONTENT: z.string().min(1).default('S3 compatibility test data'),
  CLEANUP_ENABLED: bool(true),

  CHECK_BUCKETS: bool(true),
  CHECK_OBJECTS: bool(true),
  CHECK_MULTIPART: bool(true),
  CHECK_VERSIONING: bool(true),
  CHECK_TAGGING: bool(true),
  CHECK_ATTRIBUTES: bool(true),
  CHECK_METADATA: bool(true),
  CHECK_RANGE_REQUESTS: bool(true),
  CHECK_ERROR_CONDITIONS: bool(true),
  CHECK_SYNC: bool(true),

  OPERATION_TIMEOUT_MS: int(30000, 1),
  RUN_DEADLINE_MS: int(0),
  CONCURRENCY: int(1, 1),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_PRETTY: bool(false),
  LOG_FILE: z.string().optional(),
});

export interface ConnectionConfig {
  endpointUrl: string;
  accessKey: string;
  secretKey: string;
  region: string;
  verifyTls: boolean;
  maxRetries: number;
  forcePathStyle: boolean;
}

export interface TestDataConfig {
  smallFileSize: number;
  mediumFileSize: number;
  largeFileSize: number;
  multipartChunkSize: number;
  testFileContent: string;
  cleanupEnabled: boolean;
}

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  file?: string;
}

export interface TimeoutConfig {
  operationMs: number;
  /** 0 disables the run deadline. */
  runDeadlineMs: number;
}

export interface CheckerConfig {
  connection: ConnectionConfig;
  testData: TestDataConfig;
  logging: LoggingConfig;
  checks: Record<CategoryName, boolean>;
  timeouts: TimeoutConfig;
  concurrency: number;
}

export type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): CheckerConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join('.');
        return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
      }),
    );
  }

  const e = parsed.data;

  return {
    connection: {
      endpointUrl: e.S3_ENDPOINT_URL,
      accessKey: e.S3_ACCESS_KEY,
      secretKey: e.S3_SECRET_KEY,
      region: e.S3_REGION,
      verifyTls: e.S3_VERIFY_TLS,
      maxRetries: e.S3_MAX_RETRIES,
      forcePathStyle: e.S3_FORCE_PATH_STYLE,
    },
    testData: {
      smallFileSize: e.TEST_SMALL_FILE_SIZE,
      mediumFileSize: e.TEST_MEDIUM_FILE_SIZE,
      largeFileSize: e.TEST_LARGE_FILE_SIZE,
      multipartChunkSize: e.TEST_MULTIPART_CHUNK_SIZE,
      testFileContent: e.TEST_FILE_CONTENT,
      cleanupEnabled: e.CLEANUP_ENABLED,
    },
    logging: {
      level: e.LOG_LEVEL,
      pretty: e.LOG_PRETTY,
      file: e.LOG_FILE,
    },
    checks: {
      buckets: e.CHECK_BUCKETS,
      objects: e.CHECK_OBJECTS,
      multipart: e.CHECK_MULTIPART,
      versioning: e.CHECK_VERSIONING,
      tagging: e.CHECK_TAGGING,
      attributes: e.CHECK_ATTRIBUTES,
      metadata: e.CHECK_METADATA,
      range_requests: e.CHECK_RANGE_REQUESTS,
      error_conditions: e.CHECK_ERROR_CONDITIONS,
      sync: e.CHECK_SYNC,
    },
    timeouts: {
      operationMs: e.OPERATION_TIMEOUT_MS,
      runDeadlineMs: e.RUN_DEADLINE_MS,
    },
    concurrency: e.CONCURRENCY,
  };
}

const PLACEHOLDER_KEYS = new Set(['your-access-key', 'your-secret-key', 'changeme', 'minioadmin']);

/**
 * Returns warnings for settings that are legal but suspicious. Throws when
 * no category is enabled, since such a run would check nothing.
 */
export function validateConfig(config: CheckerConfig): string[] {
  const warnings: string[] = [];
  const { connection } = config;

  if (!Object.values(config.checks).some(Boolean)) {
    throw new ConfigError(['At least one CHECK_<CATEGORY> flag must be enabled']);
  }

  if (PLACEHOLDER_KEYS.has(connection.accessKey) || PLACEHOLDER_KEYS.has(connection.secretKey)) {
    warnings.push('Credentials look like placeholder values');
  }
  if (!connection.verifyTls) {
    warnings.push('TLS certificate verification is disabled');
  }
  if (/^https?:\/\/(localhost|127\.0\.0\.1)(:|\/|$)/.test(connection.endpointUrl)) {
    warnings.push('Endpoint points at localhost');
  }
  if (config.testData.largeFileSize < config.testData.multipartChunkSize) {
    warnings.push('TEST_LARGE_FILE_SIZE is smaller than TEST_MULTIPART_CHUNK_SIZE');
  }

  return warnings;
}

const ENV_TEMPLATE = `# s3check configuration
# Connection
S3_ENDPOINT_URL=http://localhost:9000
S3_ACCESS_KEY=your-access-key
S3_SECRET_KEY=your-secret-key
S3_REGION=us-east-1
S3_VERIFY_TLS=false
S3_MAX_RETRIES=3
S3_FORCE_PATH_STYLE=true

# Test data (bytes)
TEST_SMALL_FILE_SIZE=1024
TEST_MEDIUM_FILE_SIZE=1048576
TEST_LARGE_FILE_SIZE=10485760
# Must be at least 5242880 (5 MiB)
TEST_MULTIPART_CHUNK_SIZE=5242880
TEST_FILE_CONTENT=S3 compatibility test data
CLEANUP_ENABLED=true

# Categories
${CATEGORY_NAMES.map((name) => `CHECK_${name.toUpperCase()}=true`).join('\n')}

# Timeouts (milliseconds, RUN_DEADLINE_MS=0 means none)
OPERATION_TIMEOUT_MS=30000
RUN_DEADLINE_MS=0
CONCURRENCY=1

# Logging
LOG_LEVEL=info
LOG_PRETTY=false
# LOG_FILE=s3check.log
`;

export function generateEnvTemplate(path: string, options: { overwrite?: boolean } = {}): void {
  if (existsSync(path) && !options.overwrite) {
    throw new ConfigError([`${path} already exists (use --overwrite to replace it)`]);
  }
  writeFileSync(path, ENV_TEMPLATE, 'utf8');
}
