import type { CategoryRunner } from '../category-runner.js';
import type { GatewayError } from '../errors.js';
import type { GatewayResult } from '../gateway.js';
import type { Details } from '../types.js';

/** HTTP statuses that count as a correct rejection, per scenario. */
export const ACCEPTED_STATUS = {
  validation: [400, 403],
  missing: [404],
  conflict: [409],
  optionalFeature: [400, 501],
  sizeLimit: [400, 413],
  invalidRange: [400, 416],
  missingOrInvalid: [400, 404],
} as const satisfies Record<string, readonly number[]>;

/** Minimum preserved fraction for threshold probes. */
export const THRESHOLDS = {
  standardHeaders: 0.8,
  customMetadata: 0.9,
  encodedValues: 0.7,
  copyPreservation: 0.8,
  keyCase: 0.5,
} as const;

export function meetsThreshold(preserved: number, total: number, threshold: number): boolean {
  return total > 0 && preserved / total >= threshold;
}

export function ratio(preserved: number, total: number): number {
  return total === 0 ? 0 : preserved / total;
}

export function isStatusIn(error: GatewayError, accepted: readonly number[]): boolean {
  return accepted.includes(error.httpStatus);
}

export interface RejectionExpectation {
  name: string;
  description: string;
  accepted: readonly number[];
  details?: Details;
  /** Called when the store accepted the request, e.g. to delete what it created. */
  onAccepted?: () => Promise<unknown>;
}

/**
 * Records the outcome of a request the store should refuse: pass only when
 * it fails with an accepted status. An unexpected success is a failure of
 * the store under test.
 */
export async function expectRejection<T>(
  runner: CategoryRunner,
  request: () => Promise<GatewayResult<T>>,
  expectation: RejectionExpectation,
): Promise<boolean> {
  const [result, duration] = await runner.timed(request);
  const { name, description, accepted, details = {} } = expectation;

  if (result.ok) {
    runner.fail(name, `Accepted unexpectedly: ${description}`, { ...details, note: 'Should have been rejected' }, duration);
    if (expectation.onAccepted) {
      await expectation.onAccepted();
    }
    return false;
  }

  const error = result.error;
  if (isStatusIn(error, accepted)) {
    runner.pass(name, `Correctly rejected: ${description}`, { ...details, ...error.toDetails() }, duration);
    return true;
  }

  runner.fail(
    name,
    `Rejected with unexpected status ${error.httpStatus}: ${description}`,
    { ...details, ...error.toDetails(), accepted_statuses: [...accepted] },
    duration,
  );
  return false;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function stripQuotes(etag: string | undefined): string {
  return (etag ?? '').replace(/^"|"$/g, '');
}

export function sameStringSet(a: Iterable<string>, b: Iterable<string>): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every(v => right.has(v));
}

/** Slugifies a label for use inside a result name. */
export function slug(label: string): string {
  return label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_|_$/g, '');
}
