import { defineCategory } from '../category-runner.js';
import type { Probe, ProbeContext } from '../category-runner.js';
import type { Tag } from '../gateway.js';
import { putTracked, requireState, sameTags, tagsToRecord } from './helpers.js';
import { toBytes } from './test-data.js';

interface TaggingState {
  objectKey?: string;
}

type Ctx = ProbeContext<TaggingState>;

const BUCKET_TAGS: Tag[] = [
  { key: 'Environment', value: 'Test' },
  { key: 'Purpose', value: 'S3CompatibilityCheck' },
  { key: 'Project', value: 'AutomatedTesting' },
];

const OBJECT_TAGS: Tag[] = [
  { key: 'ObjectType', value: 'TestData' },
  { key: 'Category', value: 'TaggingTest' },
  { key: 'Temporary', value: 'True' },
];

const UPDATED_OBJECT_TAGS: Tag[] = [
  { key: 'Status', value: 'Updated' },
  { key: 'Version', value: '2.0' },
];

const bucketTags: Probe<TaggingState> = {
  name: 'tagging_bucket_put_get',
  async run(ctx: Ctx) {
    const [put, duration] = await ctx.runner.timed(() => ctx.gateway.putBucketTagging(ctx.bucket, BUCKET_TAGS));
    if (!put.ok) {
      ctx.runner.fail('tagging_bucket_put_get', `PutBucketTagging failed: ${put.error.code}`, put.error.toDetails(), duration);
      return;
    }

    const got = await ctx.gateway.getBucketTagging(ctx.bucket);
    if (!got.ok) {
      ctx.runner.fail('tagging_bucket_put_get', `GetBucketTagging failed: ${got.error.code}`, got.error.toDetails(), duration);
      return;
    }

    const match = sameTags(BUCKET_TAGS, got.value.tags);
    ctx.runner.addResult(
      'tagging_bucket_put_get',
      match,
      match ? `All ${BUCKET_TAGS.length} bucket tags match` : 'Bucket tags differ from what was set',
      { expected: tagsToRecord(BUCKET_TAGS), actual: tagsToRecord(got.value.tags) },
      duration,
    );
  },
};

const bucketTagsDelete: Probe<TaggingState> = {
  name: 'tagging_bucket_delete',
  async run(ctx: Ctx) {
    const [deleted, duration] = await ctx.runner.timed(() => ctx.gateway.deleteBucketTagging(ctx.bucket));
    if (!deleted.ok) {
      ctx.runner.fail('tagging_bucket_delete', `DeleteBucketTagging failed: ${deleted.error.code}`, deleted.error.toDetails(), duration);
      return;
    }

    const got = await ctx.gateway.getBucketTagging(ctx.bucket);
    const cleared = got.ok ? got.value.tags.length === 0 : got.error.httpStatus === 404;
    ctx.runner.addResult(
      'tagging_bucket_delete',
      cleared,
      cleared ? 'Bucket tags removed' : 'Bucket tags remain after delete',
      got.ok ? { remaining: tagsToRecord(got.value.tags) } : got.error.toDetails(),
      duration,
    );
  },
};

const objectTags: Probe<TaggingState> = {
  name: 'tagging_object_put_get',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('tagging-object');
    const uploaded = await putTracked(ctx, { key, body: toBytes('Test data for tagging operations') });
    if (!uploaded.ok) {
      ctx.runner.fail('tagging_object_put_get', `Failed to upload object for tagging: ${uploaded.error.code}`, uploaded.error.toDetails());
      return;
    }
    ctx.state.objectKey = key;

    const [put, duration] = await ctx.runner.timed(() => ctx.gateway.putObjectTagging({ bucket: ctx.bucket, key }, OBJECT_TAGS));
    if (!put.ok) {
      ctx.runner.fail('tagging_object_put_get', `PutObjectTagging failed: ${put.error.code}`, put.error.toDetails(), duration);
      return;
    }

    const got = await ctx.gateway.getObjectTagging({ bucket: ctx.bucket, key });
    if (!got.ok) {
      ctx.runner.fail('tagging_object_put_get', `GetObjectTagging failed: ${got.error.code}`, got.error.toDetails(), duration);
      return;
    }

    const match = sameTags(OBJECT_TAGS, got.value.tags);
    ctx.runner.addResult(
      'tagging_object_put_get',
      match,
      match ? `All ${OBJECT_TAGS.length} object tags match` : 'Object tags differ from what was set',
      { key, expected: tagsToRecord(OBJECT_TAGS), actual: tagsToRecord(got.value.tags) },
      duration,
    );
  },
};

const objectTagsUpdate: Probe<TaggingState> = {
  name: 'tagging_object_update',
  async run(ctx: Ctx) {
    const key = requireState(ctx, 'tagging_object_update', ctx.state.objectKey, 'tagged object');
    if (!key) return;

    const [put, duration] = await ctx.runner.timed(() => ctx.gateway.putObjectTagging({ bucket: ctx.bucket, key }, UPDATED_OBJECT_TAGS));
    if (!put.ok) {
      ctx.runner.fail('tagging_object_update', `Replacing object tags failed: ${put.error.code}`, put.error.toDetails(), duration);
      return;
    }

    const got = await ctx.gateway.getObjectTagging({ bucket: ctx.bucket, key });
    if (!got.ok) {
      ctx.runner.fail('tagging_object_update', `GetObjectTagging failed: ${got.error.code}`, got.error.toDetails(), duration);
      return;
    }

    // The new set replaces the old one entirely.
    const match = sameTags(UPDATED_OBJECT_TAGS, got.value.tags);
    ctx.runner.addResult(
      'tagging_object_update',
      match,
      match ? 'Object tag set replaced' : 'Object tags were merged or lost on update',
      { key, expected: tagsToRecord(UPDATED_OBJECT_TAGS), actual: tagsToRecord(got.value.tags) },
      duration,
    );
  },
};

const objectTagsDelete: Probe<TaggingState> = {
  name: 'tagging_object_delete',
  async run(ctx: Ctx) {
    const key = requireState(ctx, 'tagging_object_delete', ctx.state.objectKey, 'tagged object');
    if (!key) return;

    const [deleted, duration] = await ctx.runner.timed(() => ctx.gateway.deleteObjectTagging({ bucket: ctx.bucket, key }));
    if (!deleted.ok) {
      ctx.runner.fail('tagging_object_delete', `DeleteObjectTagging failed: ${deleted.error.code}`, deleted.error.toDetails(), duration);
      return;
    }

    const got = await ctx.gateway.getObjectTagging({ bucket: ctx.bucket, key });
    const cleared = got.ok ? got.value.tags.length === 0 : got.error.httpStatus === 404;
    ctx.runner.addResult(
      'tagging_object_delete',
      cleared,
      cleared ? 'Object tags removed' : 'Object tags remain after delete',
      got.ok ? { key, remaining: tagsToRecord(got.value.tags) } : { key, ...got.error.toDetails() },
      duration,
    );
  },
};

export const taggingCategory = defineCategory<TaggingState>({
  name: 'tagging',
  description: 'Bucket and object tag sets: put, get, replace and delete',
  quick: true,
  bucketPrefix: 'tagging-test-bucket',
  initialState: () => ({}),
  probes: [bucketTags, bucketTagsDelete, objectTags, objectTagsUpdate, objectTagsDelete],
});
