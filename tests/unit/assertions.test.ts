/**
 * Unit Tests: probe assertion helpers.
 */
import { describe, it, expect, vi } from 'vitest';
import { CategoryRunner } from '../../src/category-runner.js';
import { GatewayError } from '../../src/errors.js';
import { err, ok } from '../../src/result.js';
import {
  ACCEPTED_STATUS,
  bytesEqual,
  expectRejection,
  meetsThreshold,
  ratio,
  sameStringSet,
  slug,
  stripQuotes,
} from '../../src/checks/assertions.js';
import { toBytes } from '../../src/checks/test-data.js';
import { MemoryGateway } from '../helpers/memory-gateway.js';
import { categoryEnv } from '../helpers/fixtures.js';

function rejection(httpStatus: number) {
  return new GatewayError({ code: 'InvalidArgument', httpStatus, operation: 'put_object', message: 'rejected' });
}

describe('thresholds', () => {
  it('meetsThreshold compares the preserved fraction', () => {
    expect(meetsThreshold(8, 10, 0.8)).toBe(true);
    expect(meetsThreshold(7, 10, 0.8)).toBe(false);
    expect(meetsThreshold(0, 0, 0.5)).toBe(false);
  });

  it('ratio is 0 for an empty total', () => {
    expect(ratio(0, 0)).toBe(0);
    expect(ratio(3, 4)).toBe(0.75);
  });
});

describe('value helpers', () => {
  it('stripQuotes removes surrounding quotes only', () => {
    expect(stripQuotes('"abc"')).toBe('abc');
    expect(stripQuotes('abc')).toBe('abc');
    expect(stripQuotes('"abc-2"')).toBe('abc-2');
    expect(stripQuotes(undefined)).toBe('');
  });

  it('slug lowercases and joins words with underscores', () => {
    expect(slug('Content-Type Header')).toBe('content_type_header');
    expect(slug('  --Cache Control--  ')).toBe('cache_control');
  });

  it('sameStringSet ignores order and duplicates', () => {
    expect(sameStringSet(['a', 'b'], ['b', 'a', 'a'])).toBe(true);
    expect(sameStringSet(['a'], ['a', 'b'])).toBe(false);
  });

  it('bytesEqual compares length and content', () => {
    expect(bytesEqual(toBytes('abc'), toBytes('abc'))).toBe(true);
    expect(bytesEqual(toBytes('abc'), toBytes('abd'))).toBe(false);
    expect(bytesEqual(toBytes('abc'), toBytes('ab'))).toBe(false);
  });
});

describe('expectRejection', () => {
  const runner = () => new CategoryRunner('error_conditions', categoryEnv(new MemoryGateway()));

  it('passes on an accepted status', async () => {
    const r = runner();

    const passed = await expectRejection(r, async () => err(rejection(400)), {
      name: 'bad_input',
      description: 'bad input',
      accepted: ACCEPTED_STATUS.validation,
      details: { key: 'k' },
    });

    expect(passed).toBe(true);
    const [result] = r.ledger.results;
    expect(result.success).toBe(true);
    expect(result.message).toBe('Correctly rejected: bad input');
    expect(result.details).toEqual({ key: 'k', error_code: 'InvalidArgument', status_code: 400, operation: 'put_object' });
  });

  it('fails on an unexpected status', async () => {
    const r = runner();

    const passed = await expectRejection(r, async () => err(rejection(500)), {
      name: 'bad_input',
      description: 'bad input',
      accepted: ACCEPTED_STATUS.validation,
    });

    expect(passed).toBe(false);
    const [result] = r.ledger.results;
    expect(result.message).toBe('Rejected with unexpected status 500: bad input');
    expect(result.details).toEqual({ error_code: 'InvalidArgument', status_code: 500, operation: 'put_object', accepted_statuses: [400, 403] });
  });

  it('fails when the store accepts, then runs the compensation hook', async () => {
    const r = runner();
    const onAccepted = vi.fn(async () => undefined);

    const passed = await expectRejection(r, async () => ok({ status: 200 }), {
      name: 'bad_input',
      description: 'bad input',
      accepted: ACCEPTED_STATUS.validation,
      onAccepted,
    });

    expect(passed).toBe(false);
    const [result] = r.ledger.results;
    expect(result.success).toBe(false);
    expect(result.message).toBe('Accepted unexpectedly: bad input');
    expect(result.details).toEqual({ note: 'Should have been rejected' });
    expect(onAccepted).toHaveBeenCalledTimes(1);
  });
});
