import { defineCategory } from '../category-runner.js';
import type { Probe, ProbeContext } from '../category-runner.js';
import type { CompletedPart } from '../gateway.js';
import { ACCEPTED_STATUS, isStatusIn, stripQuotes } from './assertions.js';
import { putTracked } from './helpers.js';
import { generateTestData, repeatText } from './test-data.js';

interface AttributeObject {
  key: string;
  size: number;
  etag?: string;
}

interface AttributesState {
  small?: AttributeObject;
  medium?: AttributeObject;
}

type Ctx = ProbeContext<AttributesState>;

const MULTIPART_TAIL_SIZE = 1024;

async function upload(ctx: Ctx, label: string, body: Uint8Array, extra: { contentType?: string; metadata?: Record<string, string> }): Promise<AttributeObject | undefined> {
  const key = ctx.runner.generateUniqueName(`attributes-${label}`);
  const put = await putTracked(ctx, { key, body, ...extra });
  if (!put.ok) {
    ctx.runner.fail('attributes_setup', `Failed to upload ${label} object: ${put.error.code}`, { key, ...put.error.toDetails() });
    return undefined;
  }
  return { key, size: body.byteLength, etag: put.value.etag };
}

async function setup(ctx: Ctx): Promise<boolean> {
  ctx.state.small = await upload(ctx, 'small', repeatText('Small test data for attributes testing', 10), { contentType: 'text/plain' });
  if (!ctx.state.small) return false;
  ctx.state.medium = await upload(ctx, 'medium', repeatText('Medium test data for attributes testing ', 1000), {
    metadata: { purpose: 'attributes-test', size: 'medium' },
  });
  return ctx.state.medium !== undefined;
}

/** Both objects exist once setup has succeeded. */
function objects(ctx: Ctx): { small: AttributeObject; medium: AttributeObject } | undefined {
  const { small, medium } = ctx.state;
  return small && medium ? { small, medium } : undefined;
}

const etagAttribute: Probe<AttributesState> = {
  name: 'attributes_etag',
  async run(ctx: Ctx) {
    const objs = objects(ctx);
    if (!objs) return;
    const { small } = objs;

    const [result, duration] = await ctx.runner.timed(() =>
      ctx.gateway.getObjectAttributes({ bucket: ctx.bucket, key: small.key, attributes: ['ETag'] }),
    );
    if (!result.ok) {
      ctx.runner.fail('attributes_etag', `GetObjectAttributes failed: ${result.error.code}`, result.error.toDetails(), duration);
      return;
    }

    const match = Boolean(result.value.etag) && stripQuotes(result.value.etag) === stripQuotes(small.etag);
    ctx.runner.addResult(
      'attributes_etag',
      match,
      match ? 'ETag attribute matches upload' : 'ETag attribute differs from upload',
      { expected: stripQuotes(small.etag), actual: result.value.etag ? stripQuotes(result.value.etag) : null },
      duration,
    );
  },
};

const sizeAndStorage: Probe<AttributesState> = {
  name: 'attributes_size_and_storage',
  async run(ctx: Ctx) {
    const objs = objects(ctx);
    if (!objs) return;

    for (const [label, object] of [['small', objs.small], ['medium', objs.medium]] as const) {
      const name = `attributes_size_and_storage_${label}`;
      const [result, duration] = await ctx.runner.timed(() =>
        ctx.gateway.getObjectAttributes({ bucket: ctx.bucket, key: object.key, attributes: ['ObjectSize', 'StorageClass'] }),
      );
      if (!result.ok) {
        ctx.runner.fail(name, `GetObjectAttributes failed: ${result.error.code}`, result.error.toDetails(), duration);
        continue;
      }

      const sizeMatches = result.value.objectSize === object.size;
      ctx.runner.addResult(
        name,
        sizeMatches,
        sizeMatches ? `ObjectSize ${object.size} matches` : `ObjectSize ${result.value.objectSize ?? 'missing'} != ${object.size}`,
        { expected_size: object.size, actual_size: result.value.objectSize ?? null, storage_class: result.value.storageClass ?? null },
        duration,
      );
    }
  },
};

const multipleAttributes: Probe<AttributesState> = {
  name: 'attributes_multiple',
  async run(ctx: Ctx) {
    const objs = objects(ctx);
    if (!objs) return;
    const { medium } = objs;

    const [result, duration] = await ctx.runner.timed(() =>
      ctx.gateway.getObjectAttributes({ bucket: ctx.bucket, key: medium.key, attributes: ['ETag', 'ObjectSize', 'StorageClass'] }),
    );
    if (!result.ok) {
      ctx.runner.fail('attributes_multiple', `GetObjectAttributes failed: ${result.error.code}`, result.error.toDetails(), duration);
      return;
    }

    const returned = {
      etag: result.value.etag !== undefined,
      object_size: result.value.objectSize !== undefined,
      storage_class: result.value.storageClass !== undefined,
    };
    const count = Object.values(returned).filter(Boolean).length;
    ctx.runner.addResult('attributes_multiple', count >= 2, `Returned ${count}/3 requested attributes`, { returned }, duration);
  },
};

const multipartParts: Probe<AttributesState> = {
  name: 'attributes_multipart_parts',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('attributes-multipart');
    const created = await ctx.gateway.createMultipartUpload({ bucket: ctx.bucket, key });
    if (!created.ok) {
      ctx.runner.fail('attributes_multipart_setup', `Failed to initiate multipart upload: ${created.error.code}`, created.error.toDetails());
      return;
    }
    const upload = { bucket: ctx.bucket, key, uploadId: created.value.uploadId };
    ctx.runner.addCleanupItem({ kind: 'multipart_upload', ...upload });

    // Every part but the last must meet the minimum part size.
    const sizes = [ctx.testData.multipartChunkSize, MULTIPART_TAIL_SIZE];
    const parts: CompletedPart[] = [];
    for (const [i, size] of sizes.entries()) {
      const part = await ctx.gateway.uploadPart({ ...upload, partNumber: i + 1, body: generateTestData(size, `attributes part ${i + 1}`) });
      if (!part.ok) {
        ctx.runner.fail('attributes_multipart_setup', `Failed to upload part ${i + 1}: ${part.error.code}`, part.error.toDetails());
        return;
      }
      parts.push({ partNumber: i + 1, etag: part.value.etag });
    }

    const completed = await ctx.gateway.completeMultipartUpload({ ...upload, parts });
    if (!completed.ok) {
      ctx.runner.fail('attributes_multipart_setup', `Failed to complete multipart upload: ${completed.error.code}`, completed.error.toDetails());
      return;
    }
    ctx.runner.removeCleanupItems(item => item.kind === 'multipart_upload' && item.uploadId === upload.uploadId);
    ctx.runner.addCleanupItem({ kind: 'object', bucket: ctx.bucket, key, versionId: completed.value.versionId });

    const [result, duration] = await ctx.runner.timed(() =>
      ctx.gateway.getObjectAttributes({ bucket: ctx.bucket, key, attributes: ['ObjectParts'] }),
    );

    if (!result.ok) {
      const tolerated = isStatusIn(result.error, ACCEPTED_STATUS.optionalFeature);
      ctx.runner.addResult(
        'attributes_multipart_parts',
        tolerated,
        tolerated ? 'ObjectParts attribute not supported (acceptable)' : `ObjectParts request failed: ${result.error.code}`,
        tolerated ? { ...result.error.toDetails(), note: 'ObjectParts is an optional feature' } : result.error.toDetails(),
        duration,
      );
      return;
    }

    const total = result.value.objectParts?.totalPartsCount;
    ctx.runner.addResult(
      'attributes_multipart_parts',
      total === sizes.length,
      total === sizes.length ? `ObjectParts reports ${total} parts` : `ObjectParts reports ${total ?? 'no'} parts, expected ${sizes.length}`,
      { expected_parts: sizes.length, total_parts_count: total ?? null },
      duration,
    );
  },
};

export const attributesCategory = defineCategory<AttributesState>({
  name: 'attributes',
  description: 'GetObjectAttributes: ETag, size, storage class and multipart parts',
  bucketPrefix: 'attributes-test-bucket',
  initialState: () => ({}),
  setup,
  probes: [etagAttribute, sizeAndStorage, multipleAttributes, multipartParts],
});
