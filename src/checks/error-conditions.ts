import { defineCategory } from '../category-runner.js';
import type { Probe, ProbeContext } from '../category-runner.js';
import type { GatewayResult } from '../gateway.js';
import { ACCEPTED_STATUS, expectRejection, isStatusIn, slug } from './assertions.js';
import type { NoState } from './helpers.js';
import { putTracked } from './helpers.js';
import { toBytes } from './test-data.js';

type Ctx = ProbeContext<NoState>;

const NOT_IMPLEMENTED = 501;

const invalidBucketNames: Probe<NoState> = {
  name: 'invalid_bucket_names',
  async run(ctx: Ctx) {
    const names: [string, string][] = [
      ['bucket_with_underscores', 'Underscores'],
      ['BUCKET-WITH-CAPITALS', 'Capital letters'],
      ['bucket-', 'Ending with hyphen'],
      ['-bucket', 'Starting with hyphen'],
      ['a'.repeat(64), 'Too long (64 chars)'],
      ['ab', 'Too short (2 chars)'],
      ['bucket..name', 'Consecutive dots'],
      ['192.168.1.1', 'Formatted as IP address'],
      ['bucket name', 'Contains a space'],
    ];

    for (const [bucket, description] of names) {
      await expectRejection(ctx.runner, () => ctx.gateway.createBucket(bucket), {
        name: `invalid_bucket_name_${slug(description)}`,
        description: `bucket name ${description.toLowerCase()}`,
        accepted: ACCEPTED_STATUS.validation,
        details: { bucket_name: bucket },
        onAccepted: () => ctx.gateway.deleteBucket(bucket),
      });
    }
  },
};

const missingBucketOperations: Probe<NoState> = {
  name: 'nonexistent_bucket_operations',
  async run(ctx: Ctx) {
    const bucket = ctx.runner.generateUniqueName('nonexistent-bucket');
    const operations: [string, () => Promise<GatewayResult<unknown>>][] = [
      ['head_bucket', () => ctx.gateway.headBucket(bucket)],
      ['delete_bucket', () => ctx.gateway.deleteBucket(bucket)],
      ['put_object', () => ctx.gateway.putObject({ bucket, key: 'test', body: toBytes('data') })],
      ['get_object', () => ctx.gateway.getObject({ bucket, key: 'test' })],
      ['list_objects', () => ctx.gateway.listObjectsV2({ bucket })],
    ];

    for (const [operation, request] of operations) {
      await expectRejection(ctx.runner, request, {
        name: `nonexistent_bucket_${operation}`,
        description: `${operation} on a missing bucket`,
        accepted: ACCEPTED_STATUS.missing,
        details: { bucket_name: bucket, operation },
      });
    }
  },
};

const invalidObjectKeys: Probe<NoState> = {
  name: 'invalid_object_keys',
  async run(ctx: Ctx) {
    const keys: [string, string][] = [
      ['/' + 'a'.repeat(1024), 'Too long'],
      ['object\x00null', 'Null character'],
      ['object\x01control', 'Control character'],
    ];

    for (const [key, description] of keys) {
      await expectRejection(ctx.runner, () => ctx.gateway.putObject({ bucket: ctx.bucket, key, body: toBytes('test data') }), {
        name: `invalid_object_key_${slug(description)}`,
        description: `object key with ${description.toLowerCase()}`,
        accepted: ACCEPTED_STATUS.validation,
        details: { object_key: JSON.stringify(key) },
        onAccepted: async () => {
          ctx.runner.addCleanupItem({ kind: 'object', bucket: ctx.bucket, key });
        },
      });
    }
  },
};

const missingObjectOperations: Probe<NoState> = {
  name: 'nonexistent_object_operations',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('nonexistent-object');
    const ref = { bucket: ctx.bucket, key };
    const operations: [string, () => Promise<GatewayResult<unknown>>][] = [
      ['get_object', () => ctx.gateway.getObject(ref)],
      ['head_object', () => ctx.gateway.headObject(ref)],
      ['copy_object', () => ctx.gateway.copyObject({ bucket: ctx.bucket, key: `${key}-copy`, sourceBucket: ctx.bucket, sourceKey: key })],
      ['get_object_tagging', () => ctx.gateway.getObjectTagging(ref)],
    ];

    for (const [operation, request] of operations) {
      await expectRejection(ctx.runner, request, {
        name: `nonexistent_object_${operation}`,
        description: `${operation} on a missing object`,
        accepted: ACCEPTED_STATUS.missing,
        details: { object_key: key, operation },
      });
    }

    // DeleteObject is idempotent; success and 404 are both correct.
    const [deleted, duration] = await ctx.runner.timed(() => ctx.gateway.deleteObject(ref));
    if (deleted.ok) {
      ctx.runner.pass('nonexistent_object_delete_object', 'Delete of a missing object succeeded (idempotent)', { object_key: key, status_code: deleted.value.status }, duration);
    } else {
      const missing = isStatusIn(deleted.error, ACCEPTED_STATUS.missing);
      ctx.runner.addResult(
        'nonexistent_object_delete_object',
        missing,
        missing ? 'Delete of a missing object returned 404' : `Delete of a missing object failed: ${deleted.error.code}`,
        { object_key: key, ...deleted.error.toDetails() },
        duration,
      );
    }
  },
};

const malformedRequests: Probe<NoState> = {
  name: 'malformed_requests',
  async run(ctx: Ctx) {
    const uploadId = 'invalid-upload-id-12345';
    await expectRejection(
      ctx.runner,
      () =>
        ctx.gateway.completeMultipartUpload({
          bucket: ctx.bucket,
          key: 'test-multipart',
          uploadId,
          parts: [{ partNumber: 1, etag: '"fake-etag"' }],
        }),
      {
        name: 'malformed_complete_multipart',
        description: 'completion of an unknown multipart upload',
        accepted: ACCEPTED_STATUS.missingOrInvalid,
        details: { upload_id: uploadId },
      },
    );

    await expectRejection(
      ctx.runner,
      () =>
        ctx.gateway.putBucketTagging(ctx.bucket, [
          { key: 'Duplicate', value: 'first' },
          { key: 'Duplicate', value: 'second' },
        ]),
      {
        name: 'malformed_bucket_tagging',
        description: 'bucket tag set with a duplicate key',
        accepted: [400],
        details: { bucket: ctx.bucket },
      },
    );

    // MFA delete cannot be configured without an MFA token.
    const [versioning, duration] = await ctx.runner.timed(() =>
      ctx.gateway.putBucketVersioning({ bucket: ctx.bucket, status: 'Enabled', mfaDelete: 'Enabled' }),
    );
    if (versioning.ok) {
      ctx.runner.fail('malformed_versioning_config', 'Accepted unexpectedly: versioning with MFA delete and no MFA token', { bucket: ctx.bucket }, duration);
    } else if (isStatusIn(versioning.error, ACCEPTED_STATUS.validation)) {
      ctx.runner.pass('malformed_versioning_config', 'Correctly rejected: versioning with MFA delete and no MFA token', versioning.error.toDetails(), duration);
    } else if (versioning.error.httpStatus === NOT_IMPLEMENTED) {
      ctx.runner.pass('malformed_versioning_config', 'MFA delete not implemented (acceptable)', { ...versioning.error.toDetails(), note: 'MFA delete is optional' }, duration);
    } else {
      ctx.runner.fail('malformed_versioning_config', `Rejected with unexpected status ${versioning.error.httpStatus}`, versioning.error.toDetails(), duration);
    }
  },
};

const bucketPolicyAccess: Probe<NoState> = {
  name: 'bucket_policy_access',
  async run(ctx: Ctx) {
    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.getBucketPolicy(ctx.bucket));
    if (result.ok) {
      ctx.runner.fail('bucket_policy_access', 'Bucket policy returned for a bucket that never had one', { bucket: ctx.bucket }, duration);
      return;
    }

    const { httpStatus } = result.error;
    const message =
      httpStatus === 404
        ? 'Bucket policy not found (no policy set)'
        : httpStatus === 403 || httpStatus === NOT_IMPLEMENTED
          ? 'Bucket policy access denied or not implemented'
          : `Bucket policy access returned unexpected error: ${result.error.code}`;
    ctx.runner.addResult('bucket_policy_access', [403, 404, NOT_IMPLEMENTED].includes(httpStatus), message, result.error.toDetails(), duration);
  },
};

const missingResources: Probe<NoState> = {
  name: 'missing_resource_404',
  async run(ctx: Ctx) {
    const missingBucket = ctx.runner.generateUniqueName('missing-bucket');
    const resources: [string, () => Promise<GatewayResult<unknown>>][] = [
      ['bucket', () => ctx.gateway.headBucket(missingBucket)],
      ['object', () => ctx.gateway.getObject({ bucket: ctx.bucket, key: ctx.runner.generateUniqueName('missing-object') })],
      ['object_metadata', () => ctx.gateway.headObject({ bucket: ctx.bucket, key: ctx.runner.generateUniqueName('missing-metadata') })],
      ['object_tags', () => ctx.gateway.getObjectTagging({ bucket: ctx.bucket, key: ctx.runner.generateUniqueName('missing-tags') })],
    ];

    for (const [resource, request] of resources) {
      await expectRejection(ctx.runner, request, {
        name: `missing_${resource}_404`,
        description: `lookup of a missing ${resource.replace('_', ' ')}`,
        accepted: ACCEPTED_STATUS.missing,
        details: { resource_type: resource },
      });
    }
  },
};

const invalidVersionId: Probe<NoState> = {
  name: 'invalid_version_id',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('param-test-object');
    const put = await putTracked(ctx, { key, body: toBytes('test data for parameter validation') });
    if (!put.ok) {
      ctx.runner.fail('invalid_version_id', `Failed to upload object for version lookup: ${put.error.code}`, put.error.toDetails());
      return;
    }

    const versionId = 'invalid-version-id-12345';
    await expectRejection(ctx.runner, () => ctx.gateway.getObject({ bucket: ctx.bucket, key, versionId }), {
      name: 'invalid_version_id',
      description: 'GET with an unknown version id',
      accepted: ACCEPTED_STATUS.missingOrInvalid,
      details: { object_key: key, version_id: versionId },
    });
  },
};

const oversizedMetadata: Probe<NoState> = {
  name: 'large_metadata_limit',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('large-metadata-test');
    const metadata = Object.fromEntries(Array.from({ length: 20 }, (_, i) => [`key${i}`, 'x'.repeat(1000)]));
    const size = Object.entries(metadata).reduce((sum, [k, v]) => sum + k.length + v.length, 0);

    await expectRejection(ctx.runner, () => putTracked(ctx, { key, body: toBytes('test'), metadata }), {
      name: 'large_metadata_limit',
      description: `${size} bytes of user metadata`,
      accepted: ACCEPTED_STATUS.sizeLimit,
      details: { object_key: key, metadata_size: size },
    });
  },
};

const conflicts: Probe<NoState> = {
  name: 'conflicting_operations',
  async run(ctx: Ctx) {
    const [duplicate, duration] = await ctx.runner.timed(() => ctx.gateway.createBucket(ctx.bucket));
    if (duplicate.ok) {
      ctx.runner.pass('duplicate_bucket_creation', 'Duplicate bucket creation succeeded (idempotent)', { bucket: ctx.bucket }, duration);
    } else {
      const rejected = ['BucketAlreadyExists', 'BucketAlreadyOwnedByYou'].includes(duplicate.error.code);
      ctx.runner.addResult(
        'duplicate_bucket_creation',
        rejected,
        rejected ? 'Duplicate bucket creation rejected' : `Duplicate bucket creation returned unexpected error: ${duplicate.error.code}`,
        duplicate.error.toDetails(),
        duration,
      );
    }

    const key = ctx.runner.generateUniqueName('blocking-object');
    const put = await putTracked(ctx, { key, body: toBytes('blocking object') });
    if (!put.ok) {
      ctx.runner.fail('delete_bucket_with_objects', `Failed to upload blocking object: ${put.error.code}`, put.error.toDetails());
      return;
    }

    const [deleted, deleteDuration] = await ctx.runner.timed(() => ctx.gateway.deleteBucket(ctx.bucket));
    if (deleted.ok) {
      ctx.runner.fail('delete_bucket_with_objects', 'Bucket deletion succeeded despite containing objects', { bucket: ctx.bucket, object_key: key }, deleteDuration);
      return;
    }

    const notEmpty = deleted.error.code === 'BucketNotEmpty' || isStatusIn(deleted.error, ACCEPTED_STATUS.conflict);
    ctx.runner.addResult(
      'delete_bucket_with_objects',
      notEmpty,
      notEmpty ? 'Non-empty bucket deletion rejected' : `Non-empty bucket deletion returned unexpected error: ${deleted.error.code}`,
      { object_key: key, ...deleted.error.toDetails() },
      deleteDuration,
    );
  },
};

export const errorConditionsCategory = defineCategory<NoState>({
  name: 'error_conditions',
  description: 'Error responses for invalid, missing and conflicting requests',
  bucketPrefix: 'error-test-bucket',
  initialState: () => ({}),
  probes: [
    invalidBucketNames,
    missingBucketOperations,
    invalidObjectKeys,
    missingObjectOperations,
    malformedRequests,
    bucketPolicyAccess,
    missingResources,
    invalidVersionId,
    oversizedMetadata,
    conflicts,
  ],
});
