/**
 * Contract Tests: every check category against a conforming in-memory store.
 *
 * A store that behaves like S3 must pass every check, and each category must
 * leave nothing behind.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import type { CategoryName } from '../../src/config.js';
import { categoryRegistry } from '../../src/checks/index.js';
import { MemoryGateway } from '../helpers/memory-gateway.js';
import { failures, resultNamed, runCategory } from '../helpers/fixtures.js';

const EXPECTED_RESULT_COUNTS: Record<CategoryName, number> = {
  buckets: 12,
  objects: 12,
  multipart: 10,
  versioning: 11,
  tagging: 5,
  attributes: 5,
  metadata: 11,
  range_requests: 26,
  error_conditions: 34,
  sync: 5,
};

describe('check categories against a conforming store', () => {
  let gateway: MemoryGateway;

  beforeEach(() => {
    gateway = new MemoryGateway();
  });

  for (const [name, count] of Object.entries(EXPECTED_RESULT_COUNTS)) {
    it(`${name}: every check passes and resources are removed`, async () => {
      const category = Object.values(categoryRegistry).find(c => c.name === name);
      if (!category) throw new Error(`unregistered category ${name}`);

      const { instance, results } = await runCategory(category, gateway);

      expect(failures(results)).toEqual([]);
      expect(results).toHaveLength(count);
      expect(instance.state).toBe('done');
      expect(gateway.bucketNames()).toEqual([]);
    });
  }

  it('buckets records each operation by name', async () => {
    const { results } = await runCategory(categoryRegistry.buckets, gateway);

    expect(results.map(r => r.name)).toEqual([
      'bucket_creation',
      'bucket_creation_invalid_name',
      'bucket_listing',
      'bucket_listing_structure',
      'bucket_head_existing',
      'bucket_head_nonexistent',
      'bucket_versioning_default',
      'bucket_versioning_enable',
      'bucket_tagging_put_get',
      'bucket_tagging_delete',
      'bucket_deletion_empty',
      'bucket_deletion_nonexistent',
    ]);
    expect(resultNamed(results, 'bucket_head_nonexistent').details).toMatchObject({ error_code: 'NotFound', status_code: 404 });
  });

  it('tagging records each operation by name', async () => {
    const { results } = await runCategory(categoryRegistry.tagging, gateway);

    expect(results.map(r => [r.name, r.message])).toEqual([
      ['tagging_bucket_put_get', 'All 3 bucket tags match'],
      ['tagging_bucket_delete', 'Bucket tags removed'],
      ['tagging_object_put_get', 'All 3 object tags match'],
      ['tagging_object_update', 'Object tag set replaced'],
      ['tagging_object_delete', 'Object tags removed'],
    ]);
  });
});

describe('check categories against a faulty store', () => {
  let gateway: MemoryGateway;

  beforeEach(() => {
    gateway = new MemoryGateway();
  });

  it('reports unsupported object tagging and still cleans up', async () => {
    gateway.failOn('putObjectTagging', { code: 'NotImplemented', httpStatus: 501 });

    const { results } = await runCategory(categoryRegistry.tagging, gateway);

    expect(failures(results)).toEqual([
      'tagging_object_put_get: PutObjectTagging failed: NotImplemented',
      'tagging_object_update: Replacing object tags failed: NotImplemented',
    ]);
    expect(results).toHaveLength(5);
    expect(gateway.bucketNames()).toEqual([]);
  });

  it('reports a missing V1 listing without affecting the rest', async () => {
    gateway.failOn('listObjects', { code: 'NotImplemented', httpStatus: 501 });

    const { results } = await runCategory(categoryRegistry.objects, gateway);

    expect(failures(results)).toEqual(['object_listing_v1: ListObjects failed: NotImplemented']);
    expect(gateway.bucketNames()).toEqual([]);
  });

  it('records a single result when the test bucket cannot be created', async () => {
    gateway.failOn('createBucket', { code: 'TooManyBuckets', httpStatus: 400 }, { times: 1 });

    const { instance, results } = await runCategory(categoryRegistry.range_requests, gateway);

    expect(results.map(r => r.name)).toEqual(['range_requests_bucket_creation']);
    expect(results[0].success).toBe(false);
    expect(instance.state).toBe('done_partial');
    expect(gateway.callsTo('getObject')).toEqual([]);
  });

  it('reports cleanup failures without changing results', async () => {
    gateway.failOn('deleteBucket', { code: 'AccessDenied', httpStatus: 403 }, { when: args => String(args[0]).startsWith('sync-') });

    const category = categoryRegistry.sync;
    const { instance, results } = await runCategory(category, gateway);

    expect(failures(results)).toEqual([]);
    expect(instance.state).toBe('done');
    expect(gateway.bucketNames()).toHaveLength(1);
  });
});
