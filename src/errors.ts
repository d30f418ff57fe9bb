/**
 * Error taxonomy for the checker.
 *
 * GatewayError is the only error a probe interprets; it travels inside a
 * Result and is never thrown past the gateway. The CheckerError family
 * covers the layers around the probes.
 */

export interface GatewayErrorShape {
  code: string;
  httpStatus: number;
  operation: string;
  message: string;
  rawDetails?: Record<string, unknown>;
}

export class GatewayError extends Error {
  readonly code: string;
  readonly httpStatus: number;
  readonly operation: string;
  readonly rawDetails: Record<string, unknown>;

  constructor(shape: GatewayErrorShape) {
    super(shape.message);
    this.name = 'GatewayError';
    this.code = shape.code;
    this.httpStatus = shape.httpStatus;
    this.operation = shape.operation;
    this.rawDetails = shape.rawDetails ?? {};
  }

  /** Compact form used in result details and log lines. */
  toDetails(): Record<string, unknown> {
    return {
      error_code: this.code,
      status_code: this.httpStatus,
      operation: this.operation,
    };
  }

  override toString(): string {
    return `${this.operation} failed: ${this.code} (status: ${this.httpStatus}) ${this.message}`;
  }
}

export type CheckerErrorCode =
  | 'CONFIG_INVALID'
  | 'INIT_FAILED'
  | 'PROVISIONING_FAILED'
  | 'CLEANUP_FAILED'
  | 'CATEGORY_FAILED';

export class CheckerError extends Error {
  readonly code: CheckerErrorCode;

  constructor(message: string, code: CheckerErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CheckerError';
    this.code = code;
  }
}

export class ConfigError extends CheckerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class InitError extends CheckerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INIT_FAILED', { cause });
    this.name = 'InitError';
  }
}

export class ProvisioningError extends CheckerError {
  readonly bucket: string;

  constructor(bucket: string, cause: GatewayError) {
    super(`Failed to create test bucket ${bucket}: ${cause.code} (status: ${cause.httpStatus})`, 'PROVISIONING_FAILED', { cause });
    this.name = 'ProvisioningError';
    this.bucket = bucket;
  }
}

export class CleanupError extends CheckerError {
  readonly resource: string;

  constructor(resource: string, cause: GatewayError) {
    super(`Failed to clean up ${resource}: ${cause.code} (status: ${cause.httpStatus})`, 'CLEANUP_FAILED', { cause });
    this.name = 'CleanupError';
    this.resource = resource;
  }
}

export class OrchestrationError extends CheckerError {
  readonly category: string;

  constructor(category: string, cause: unknown) {
    super(`Category ${category} failed: ${describeError(cause)}`, 'CATEGORY_FAILED', { cause });
    this.name = 'OrchestrationError';
    this.category = category;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
