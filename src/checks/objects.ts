import { defineCategory } from '../category-runner.js';
import type { Probe, ProbeContext } from '../category-runner.js';
import type { Tag } from '../gateway.js';
import { ACCEPTED_STATUS, bytesEqual, expectRejection, stripQuotes } from './assertions.js';
import { putTracked, requireState, sameTags, tagsToRecord } from './helpers.js';
import { generateTestData } from './test-data.js';

interface StoredObject {
  key: string;
  data: Uint8Array;
  etag?: string;
}

interface ObjectState {
  small?: StoredObject;
  listing?: { prefix: string; keys: string[] };
}

type Ctx = ProbeContext<ObjectState>;

const DOWNLOAD_SIZE = 2048;

const OBJECT_TAGS: Tag[] = [
  { key: 'Environment', value: 'Test' },
  { key: 'ObjectType', value: 'MetadataTest' },
];

function uploadProbe(name: string, label: string, size: (ctx: Ctx) => number, extra: { contentType?: string; metadata?: Record<string, string> } = {}): Probe<ObjectState> {
  return {
    name,
    async run(ctx: Ctx) {
      const key = ctx.runner.generateUniqueName(`${label}-object`);
      const data = generateTestData(size(ctx), ctx.testData.testFileContent);
      const [result, duration] = await ctx.runner.timed(() => putTracked(ctx, { key, body: data, ...extra }));

      if (!result.ok) {
        ctx.runner.fail(name, `Failed to upload ${label} object: ${result.error.code}`, { key, size: data.byteLength, ...result.error.toDetails() }, duration);
        return;
      }

      const { etag } = result.value;
      if (label === 'small') {
        ctx.state.small = { key, data, etag };
      }
      ctx.runner.addResult(
        name,
        Boolean(etag),
        etag ? `Uploaded ${data.byteLength} bytes` : 'Upload succeeded without an ETag',
        { key, size: data.byteLength, etag: etag ?? null, ...(extra.metadata && { metadata: extra.metadata }) },
        duration,
      );
    },
  };
}

const objectDownload: Probe<ObjectState> = {
  name: 'object_download',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('download-object');
    const data = generateTestData(DOWNLOAD_SIZE, ctx.testData.testFileContent);
    const put = await putTracked(ctx, { key, body: data });
    if (!put.ok) {
      ctx.runner.fail('object_download', `Failed to upload object for download: ${put.error.code}`, put.error.toDetails());
      return;
    }

    const [got, duration] = await ctx.runner.timed(() => ctx.gateway.getObject({ bucket: ctx.bucket, key }));
    if (!got.ok) {
      ctx.runner.fail('object_download', `Failed to download object: ${got.error.code}`, { key, ...got.error.toDetails() }, duration);
    } else {
      const match = bytesEqual(got.value.body, data);
      ctx.runner.addResult(
        'object_download',
        match,
        match ? `Downloaded ${got.value.body.byteLength} bytes, content matches` : 'Downloaded content differs from upload',
        { key, expected_size: data.byteLength, actual_size: got.value.body.byteLength },
        duration,
      );
    }

    const missing = ctx.runner.generateUniqueName('missing-object');
    await expectRejection(ctx.runner, () => ctx.gateway.getObject({ bucket: ctx.bucket, key: missing }), {
      name: 'object_download_nonexistent',
      description: 'GET on an object that does not exist',
      accepted: ACCEPTED_STATUS.missing,
      details: { key: missing },
    });
  },
};

const objectHead: Probe<ObjectState> = {
  name: 'object_head_operation',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('head-object');
    const data = generateTestData(ctx.testData.smallFileSize, ctx.testData.testFileContent);
    const put = await putTracked(ctx, { key, body: data, contentType: 'text/plain', metadata: { 'test-field': 'head-test' } });
    if (!put.ok) {
      ctx.runner.fail('object_head_operation', `Failed to upload object for HEAD: ${put.error.code}`, put.error.toDetails());
      return;
    }

    const [head, duration] = await ctx.runner.timed(() => ctx.gateway.headObject({ bucket: ctx.bucket, key }));
    if (!head.ok) {
      ctx.runner.fail('object_head_operation', `HEAD failed: ${head.error.code}`, { key, ...head.error.toDetails() }, duration);
      return;
    }

    const checks = {
      content_length: head.value.contentLength === data.byteLength,
      etag: stripQuotes(head.value.etag) === stripQuotes(put.value.etag) && Boolean(head.value.etag),
      content_type: Boolean(head.value.contentType),
      metadata: head.value.metadata['test-field'] === 'head-test',
    };
    const passed = Object.values(checks).filter(Boolean).length;
    ctx.runner.addResult(
      'object_head_operation',
      passed >= 3,
      `HEAD returned ${passed}/4 expected fields`,
      { key, checks, content_length: head.value.contentLength ?? null, content_type: head.value.contentType ?? null },
      duration,
    );
  },
};

const objectCopy: Probe<ObjectState> = {
  name: 'object_copy',
  async run(ctx: Ctx) {
    const source = requireState(ctx, 'object_copy', ctx.state.small, 'uploaded small object');
    if (!source) return;

    const key = ctx.runner.generateUniqueName('copied-object');
    const [copied, duration] = await ctx.runner.timed(() =>
      ctx.gateway.copyObject({ bucket: ctx.bucket, key, sourceBucket: ctx.bucket, sourceKey: source.key }),
    );
    if (!copied.ok) {
      ctx.runner.fail('object_copy', `Copy failed: ${copied.error.code}`, { source: source.key, key, ...copied.error.toDetails() }, duration);
      return;
    }
    ctx.runner.addCleanupItem({ kind: 'object', bucket: ctx.bucket, key, versionId: copied.value.versionId });

    const got = await ctx.gateway.getObject({ bucket: ctx.bucket, key });
    const match = got.ok && bytesEqual(got.value.body, source.data);
    ctx.runner.addResult(
      'object_copy',
      match,
      match ? 'Copied object content matches source' : 'Copied object content differs from source',
      { source: source.key, key, ...(got.ok ? { size: got.value.body.byteLength } : got.error.toDetails()) },
      duration,
    );
  },
};

const LISTING_COUNT = 3;

const objectListingV2: Probe<ObjectState> = {
  name: 'object_listing_v2',
  async run(ctx: Ctx) {
    const prefix = `${ctx.runner.generateUniqueName('list-test')}/`;
    const keys: string[] = [];

    for (let i = 0; i < LISTING_COUNT; i++) {
      const key = `${prefix}object-${i}.txt`;
      const put = await putTracked(ctx, { key, body: generateTestData(64, `listing object ${i}`) });
      if (!put.ok) {
        ctx.runner.fail('object_listing_v2', `Failed to upload listing object ${key}: ${put.error.code}`, put.error.toDetails());
        return;
      }
      keys.push(key);
    }
    ctx.state.listing = { prefix, keys };

    const [listed, duration] = await ctx.runner.timed(() => ctx.gateway.listObjectsV2({ bucket: ctx.bucket, prefix }));
    if (!listed.ok) {
      ctx.runner.fail('object_listing_v2', `ListObjectsV2 failed: ${listed.error.code}`, listed.error.toDetails(), duration);
      return;
    }

    const found = new Set(listed.value.objects.map(o => o.key));
    const missing = keys.filter(k => !found.has(k));
    ctx.runner.addResult(
      'object_listing_v2',
      missing.length === 0,
      missing.length === 0 ? `Found all ${keys.length} objects under prefix` : `${missing.length} object(s) missing from listing`,
      { prefix, expected: keys.length, listed: listed.value.objects.length, missing },
      duration,
    );
  },
};

const objectListingV1: Probe<ObjectState> = {
  name: 'object_listing_v1',
  async run(ctx: Ctx) {
    const listing = requireState(ctx, 'object_listing_v1', ctx.state.listing, 'listing fixture');
    if (!listing) return;

    const [listed, duration] = await ctx.runner.timed(() => ctx.gateway.listObjects({ bucket: ctx.bucket, prefix: listing.prefix }));
    if (!listed.ok) {
      ctx.runner.fail('object_listing_v1', `ListObjects failed: ${listed.error.code}`, listed.error.toDetails(), duration);
      return;
    }

    const found = new Set(listed.value.objects.map(o => o.key));
    const missing = listing.keys.filter(k => !found.has(k));
    ctx.runner.addResult(
      'object_listing_v1',
      missing.length === 0,
      missing.length === 0 ? `Found all ${listing.keys.length} objects under prefix` : `${missing.length} object(s) missing from listing`,
      { prefix: listing.prefix, listed: listed.value.objects.length, missing },
      duration,
    );
  },
};

const objectTagging: Probe<ObjectState> = {
  name: 'object_tagging',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('tagged-object');
    const put = await putTracked(ctx, { key, body: generateTestData(128, ctx.testData.testFileContent) });
    if (!put.ok) {
      ctx.runner.fail('object_tagging', `Failed to upload object for tagging: ${put.error.code}`, put.error.toDetails());
      return;
    }

    const [tagged, duration] = await ctx.runner.timed(() => ctx.gateway.putObjectTagging({ bucket: ctx.bucket, key }, OBJECT_TAGS));
    if (!tagged.ok) {
      ctx.runner.fail('object_tagging', `Failed to tag object: ${tagged.error.code}`, tagged.error.toDetails(), duration);
      return;
    }

    const got = await ctx.gateway.getObjectTagging({ bucket: ctx.bucket, key });
    if (!got.ok) {
      ctx.runner.fail('object_tagging', `Failed to read object tags: ${got.error.code}`, got.error.toDetails(), duration);
      return;
    }

    const match = sameTags(OBJECT_TAGS, got.value.tags);
    ctx.runner.addResult(
      'object_tagging',
      match,
      match ? 'Object tags round-tripped' : 'Object tags differ from what was set',
      { key, expected: tagsToRecord(OBJECT_TAGS), actual: tagsToRecord(got.value.tags) },
      duration,
    );
  },
};

const objectDeletion: Probe<ObjectState> = {
  name: 'object_deletion',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('delete-object');
    const put = await putTracked(ctx, { key, body: generateTestData(64, ctx.testData.testFileContent) });
    if (!put.ok) {
      ctx.runner.fail('object_deletion', `Failed to upload object for deletion: ${put.error.code}`, put.error.toDetails());
      return;
    }

    const [deleted, duration] = await ctx.runner.timed(() => ctx.gateway.deleteObject({ bucket: ctx.bucket, key }));
    if (!deleted.ok) {
      ctx.runner.fail('object_deletion', `Delete failed: ${deleted.error.code}`, deleted.error.toDetails(), duration);
    } else {
      const head = await ctx.gateway.headObject({ bucket: ctx.bucket, key });
      const gone = !head.ok && head.error.httpStatus === 404;
      if (gone && !put.value.versionId) {
        ctx.runner.removeCleanupItems(item => item.kind === 'object' && item.key === key);
      }
      ctx.runner.addResult(
        'object_deletion',
        gone,
        gone ? 'Deleted object is no longer reachable' : 'Object still reachable after delete',
        { key, head_status: head.ok ? head.value.status : head.error.httpStatus },
        duration,
      );
    }

    const missing = ctx.runner.generateUniqueName('never-created');
    const [again, againDuration] = await ctx.runner.timed(() => ctx.gateway.deleteObject({ bucket: ctx.bucket, key: missing }));
    if (again.ok) {
      ctx.runner.pass('object_deletion_nonexistent', 'Delete on a missing object succeeded (idempotent)', { key: missing, status_code: again.value.status }, againDuration);
    } else if (again.error.httpStatus === 404) {
      ctx.runner.pass('object_deletion_nonexistent', 'Delete on a missing object returned 404', { key: missing, ...again.error.toDetails() }, againDuration);
    } else {
      ctx.runner.fail('object_deletion_nonexistent', `Delete on a missing object failed: ${again.error.code}`, again.error.toDetails(), againDuration);
    }
  },
};

export const objectsCategory = defineCategory<ObjectState>({
  name: 'objects',
  description: 'Object upload, download, HEAD, copy, listing, tagging and deletion',
  quick: true,
  bucketPrefix: 'objects-test-bucket',
  initialState: () => ({}),
  probes: [
    uploadProbe('object_upload_small', 'small', ctx => ctx.testData.smallFileSize),
    uploadProbe('object_upload_medium', 'medium', ctx => ctx.testData.mediumFileSize),
    uploadProbe('object_upload_with_metadata', 'metadata', ctx => ctx.testData.smallFileSize, {
      contentType: 'text/plain',
      metadata: { author: 's3check', 'test-type': 'metadata-upload', 'custom-field': 'custom-value' },
    }),
    objectDownload,
    objectHead,
    objectCopy,
    objectListingV2,
    objectListingV1,
    objectTagging,
    objectDeletion,
  ],
});
