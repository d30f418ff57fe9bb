export { CheckOrchestrator, summarize, failedChecks, hasFailures } from './runner.js';
export type { CategorySummary, RunSummary, RunHooks, InitReport, OrchestratorOptions, Scopes } from './runner.js';
export { CategoryRunner, defineCategory, RUN_DEADLINE_RESULT } from './category-runner.js';
export type { CategoryDefinition, CategoryEnv, CategoryInstance, CheckCategory, Probe, ProbeContext } from './category-runner.js';
export { categoryRegistry, allCategories, quickCategories, getCategoriesByName } from './checks/index.js';
export { CleanupRegistry, describeItem } from './cleanup.js';
export type { CleanupItem } from './cleanup.js';
export { ResultLedger, successRate } from './ledger.js';
export { RunDeadline } from './deadline.js';
export { S3Gateway, createS3Client, toGatewayError } from './s3-gateway.js';
export type * from './gateway.js';
export { loadConfig, validateConfig, generateEnvTemplate, CATEGORY_NAMES } from './config.js';
export type { CheckerConfig, CategoryName } from './config.js';
export * from './errors.js';
export { createLogger, createSilentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { Reporter, buildJsonReport, exportResults, formatTextReport } from './reporter.js';
export type { CheckResult, FailedCheck } from './types.js';
export { ok, err } from './result.js';
export type { Result } from './result.js';
