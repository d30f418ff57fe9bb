import { defineCategory } from '../category-runner.js';
import type { Probe, ProbeContext } from '../category-runner.js';
import type { Tag } from '../gateway.js';
import { ACCEPTED_STATUS, expectRejection } from './assertions.js';
import { requireState, sameTags, tagsToRecord } from './helpers.js';

interface BucketState {
  secondaryBucket?: string;
}

type Ctx = ProbeContext<BucketState>;

const INVALID_BUCKET_NAME = 'Invalid_Bucket_Name_With_Underscores_And_Capitals';

const BUCKET_TAGS: Tag[] = [
  { key: 'Environment', value: 'Test' },
  { key: 'Purpose', value: 'S3CompatibilityCheck' },
];

const bucketCreation: Probe<BucketState> = {
  name: 'bucket_creation',
  async run(ctx: Ctx) {
    const bucket = ctx.runner.generateUniqueName('s3check-create');
    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.createBucket(bucket));

    if (!result.ok) {
      ctx.runner.fail('bucket_creation', `Failed to create bucket: ${result.error.code}`, { bucket, ...result.error.toDetails() }, duration);
      return;
    }

    ctx.runner.addCleanupItem({ kind: 'bucket', name: bucket });
    ctx.state.secondaryBucket = bucket;
    ctx.runner.pass('bucket_creation', `Created bucket ${bucket}`, { bucket, status_code: result.value.status }, duration);
  },
};

const bucketCreationInvalidName: Probe<BucketState> = {
  name: 'bucket_creation_invalid_name',
  async run(ctx: Ctx) {
    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.createBucket(INVALID_BUCKET_NAME));

    if (result.ok) {
      ctx.runner.fail(
        'bucket_creation_invalid_name',
        'Bucket with an invalid name was created',
        { bucket: INVALID_BUCKET_NAME, note: 'Should have been rejected' },
        duration,
      );
      await ctx.gateway.deleteBucket(INVALID_BUCKET_NAME);
      return;
    }

    const { code, httpStatus } = result.error;
    const rejected = code === 'InvalidBucketName' || code === 'BucketAlreadyExists' || httpStatus === 400;
    ctx.runner.addResult(
      'bucket_creation_invalid_name',
      rejected,
      rejected ? 'Invalid bucket name correctly rejected' : `Invalid bucket name rejected with unexpected error: ${code}`,
      { bucket: INVALID_BUCKET_NAME, ...result.error.toDetails() },
      duration,
    );
  },
};

const bucketListing: Probe<BucketState> = {
  name: 'bucket_listing',
  async run(ctx: Ctx) {
    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.listBuckets());

    if (!result.ok) {
      ctx.runner.fail('bucket_listing', `Failed to list buckets: ${result.error.code}`, result.error.toDetails(), duration);
      return;
    }

    const { buckets } = result.value;
    const found = buckets.some(b => b.name === ctx.bucket);
    ctx.runner.addResult(
      'bucket_listing',
      found,
      found ? `Listed ${buckets.length} bucket(s) including the test bucket` : 'Test bucket missing from listing',
      { bucket_count: buckets.length, test_bucket: ctx.bucket },
      duration,
    );

    const malformed = buckets.filter(b => !b.name || !b.creationDate);
    ctx.runner.addResult(
      'bucket_listing_structure',
      malformed.length === 0,
      malformed.length === 0
        ? 'Every listed bucket has Name and CreationDate'
        : `${malformed.length} listed bucket(s) lack Name or CreationDate`,
      { bucket_count: buckets.length, malformed_count: malformed.length },
    );
  },
};

const bucketHead: Probe<BucketState> = {
  name: 'bucket_head',
  async run(ctx: Ctx) {
    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.headBucket(ctx.bucket));
    if (result.ok) {
      ctx.runner.pass('bucket_head_existing', 'HEAD on existing bucket succeeded', { bucket: ctx.bucket, status_code: result.value.status }, duration);
    } else {
      ctx.runner.fail('bucket_head_existing', `HEAD on existing bucket failed: ${result.error.code}`, result.error.toDetails(), duration);
    }

    const missing = ctx.runner.generateUniqueName('s3check-missing');
    await expectRejection(ctx.runner, () => ctx.gateway.headBucket(missing), {
      name: 'bucket_head_nonexistent',
      description: 'HEAD on a bucket that does not exist',
      accepted: ACCEPTED_STATUS.missing,
      details: { bucket: missing },
    });
  },
};

const bucketVersioning: Probe<BucketState> = {
  name: 'bucket_versioning',
  async run(ctx: Ctx) {
    const [initial, duration] = await ctx.runner.timed(() => ctx.gateway.getBucketVersioning(ctx.bucket));
    if (!initial.ok) {
      ctx.runner.fail('bucket_versioning_default', `Failed to read versioning: ${initial.error.code}`, initial.error.toDetails(), duration);
    } else {
      const status = initial.value.versioningStatus;
      const disabled = status === undefined || status === 'Disabled';
      ctx.runner.addResult(
        'bucket_versioning_default',
        disabled,
        disabled ? 'Versioning is off on a new bucket' : `New bucket reports versioning status ${status}`,
        { versioning_status: status ?? null },
        duration,
      );
    }

    const [enabled, enableDuration] = await ctx.runner.timed(() => ctx.gateway.putBucketVersioning({ bucket: ctx.bucket, status: 'Enabled' }));
    if (!enabled.ok) {
      ctx.runner.fail('bucket_versioning_enable', `Failed to enable versioning: ${enabled.error.code}`, enabled.error.toDetails(), enableDuration);
      return;
    }

    const after = await ctx.gateway.getBucketVersioning(ctx.bucket);
    const status = after.ok ? after.value.versioningStatus : undefined;
    ctx.runner.addResult(
      'bucket_versioning_enable',
      status === 'Enabled',
      status === 'Enabled' ? 'Versioning enabled and read back' : `Versioning status after enable: ${status ?? 'unreadable'}`,
      { versioning_status: status ?? null },
      enableDuration,
    );
  },
};

const bucketTagging: Probe<BucketState> = {
  name: 'bucket_tagging',
  async run(ctx: Ctx) {
    const [put, duration] = await ctx.runner.timed(() => ctx.gateway.putBucketTagging(ctx.bucket, BUCKET_TAGS));
    if (!put.ok) {
      ctx.runner.fail('bucket_tagging_put_get', `Failed to tag bucket: ${put.error.code}`, put.error.toDetails(), duration);
      return;
    }

    const got = await ctx.gateway.getBucketTagging(ctx.bucket);
    if (!got.ok) {
      ctx.runner.fail('bucket_tagging_put_get', `Failed to read bucket tags: ${got.error.code}`, got.error.toDetails(), duration);
      return;
    }

    const match = sameTags(BUCKET_TAGS, got.value.tags);
    ctx.runner.addResult(
      'bucket_tagging_put_get',
      match,
      match ? 'Bucket tags round-tripped' : 'Bucket tags differ from what was set',
      { expected: tagsToRecord(BUCKET_TAGS), actual: tagsToRecord(got.value.tags) },
      duration,
    );

    const [deleted, deleteDuration] = await ctx.runner.timed(() => ctx.gateway.deleteBucketTagging(ctx.bucket));
    if (!deleted.ok) {
      ctx.runner.fail('bucket_tagging_delete', `Failed to delete bucket tags: ${deleted.error.code}`, deleted.error.toDetails(), deleteDuration);
      return;
    }

    const afterDelete = await ctx.gateway.getBucketTagging(ctx.bucket);
    const cleared = afterDelete.ok ? afterDelete.value.tags.length === 0 : afterDelete.error.httpStatus === 404;
    ctx.runner.addResult(
      'bucket_tagging_delete',
      cleared,
      cleared ? 'Bucket tags removed' : 'Bucket tags still present after delete',
      afterDelete.ok ? { remaining: tagsToRecord(afterDelete.value.tags) } : afterDelete.error.toDetails(),
      deleteDuration,
    );
  },
};

const bucketDeletion: Probe<BucketState> = {
  name: 'bucket_deletion',
  async run(ctx: Ctx) {
    const bucket = requireState(ctx, 'bucket_deletion_empty', ctx.state.secondaryBucket, 'secondary bucket');
    if (bucket) {
      const [result, duration] = await ctx.runner.timed(() => ctx.gateway.deleteBucket(bucket));
      if (result.ok) {
        ctx.runner.removeCleanupItems(item => item.kind === 'bucket' && item.name === bucket);
        ctx.state.secondaryBucket = undefined;
        ctx.runner.pass('bucket_deletion_empty', `Deleted empty bucket ${bucket}`, { bucket, status_code: result.value.status }, duration);
      } else {
        ctx.runner.fail('bucket_deletion_empty', `Failed to delete empty bucket: ${result.error.code}`, { bucket, ...result.error.toDetails() }, duration);
      }
    }

    const missing = ctx.runner.generateUniqueName('s3check-missing');
    await expectRejection(ctx.runner, () => ctx.gateway.deleteBucket(missing), {
      name: 'bucket_deletion_nonexistent',
      description: 'DELETE on a bucket that does not exist',
      accepted: ACCEPTED_STATUS.missing,
      details: { bucket: missing },
    });
  },
};

export const bucketsCategory = defineCategory<BucketState>({
  name: 'buckets',
  description: 'Bucket creation, listing, HEAD, versioning, tagging and deletion',
  quick: true,
  bucketPrefix: 'buckets-test-bucket',
  initialState: () => ({}),
  probes: [bucketCreation, bucketCreationInvalidName, bucketListing, bucketHead, bucketVersioning, bucketTagging, bucketDeletion],
});
