import { defineCategory } from '../category-runner.js';
import type { Probe, ProbeContext } from '../category-runner.js';
import type { CleanupItem } from '../cleanup.js';
import type { CompletedPart, MultipartRef } from '../gateway.js';
import { ACCEPTED_STATUS, expectRejection } from './assertions.js';
import { requireState } from './helpers.js';
import { generateTestData, multipartPartData } from './test-data.js';

interface MultipartState {
  upload?: MultipartRef;
  parts: CompletedPart[];
  partSizes: number[];
  completedKey?: string;
  aborted?: MultipartRef;
}

type Ctx = ProbeContext<MultipartState>;

const PART_COUNT = 3;
const ABORT_PART_SIZE = 1024;

function isUpload(ref: MultipartRef) {
  return (item: CleanupItem) => item.kind === 'multipart_upload' && item.uploadId === ref.uploadId;
}

const createUpload: Probe<MultipartState> = {
  name: 'multipart_upload_creation',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('multipart-object');
    const [result, duration] = await ctx.runner.timed(() =>
      ctx.gateway.createMultipartUpload({ bucket: ctx.bucket, key, contentType: 'application/octet-stream' }),
    );

    if (!result.ok) {
      ctx.runner.fail('multipart_upload_creation', `Failed to initiate multipart upload: ${result.error.code}`, { key, ...result.error.toDetails() }, duration);
      return;
    }

    const upload = { bucket: ctx.bucket, key, uploadId: result.value.uploadId };
    ctx.runner.addCleanupItem({ kind: 'multipart_upload', ...upload });
    ctx.state.upload = upload;
    ctx.runner.pass('multipart_upload_creation', 'Multipart upload initiated', { key, upload_id: upload.uploadId }, duration);
  },
};

function partProbe(partNumber: number): Probe<MultipartState> {
  const name = `multipart_part_upload_${partNumber}`;
  return {
    name,
    async run(ctx: Ctx) {
      const upload = requireState(ctx, name, ctx.state.upload, 'multipart upload');
      if (!upload) return;

      const body = multipartPartData(partNumber, ctx.testData.multipartChunkSize);
      const [result, duration] = await ctx.runner.timed(() => ctx.gateway.uploadPart({ ...upload, partNumber, body }));

      if (!result.ok) {
        ctx.runner.fail(name, `Failed to upload part ${partNumber}: ${result.error.code}`, { part_number: partNumber, ...result.error.toDetails() }, duration);
        return;
      }

      ctx.state.parts.push({ partNumber, etag: result.value.etag });
      ctx.state.partSizes.push(body.byteLength);
      ctx.runner.pass(name, `Uploaded part ${partNumber} (${body.byteLength} bytes)`, { part_number: partNumber, etag: result.value.etag, size: body.byteLength }, duration);
    },
  };
}

const listParts: Probe<MultipartState> = {
  name: 'multipart_list_parts',
  async run(ctx: Ctx) {
    const upload = requireState(ctx, 'multipart_list_parts', ctx.state.upload, 'multipart upload');
    if (!upload) return;

    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.listParts(upload));
    if (!result.ok) {
      ctx.runner.fail('multipart_list_parts', `ListParts failed: ${result.error.code}`, result.error.toDetails(), duration);
      return;
    }

    const listed = result.value.parts;
    const expected = ctx.state.parts;
    const match =
      listed.length === expected.length &&
      expected.every((part, i) => listed[i].partNumber === part.partNumber && listed[i].etag === part.etag);

    ctx.runner.addResult(
      'multipart_list_parts',
      match,
      match ? `Listed ${listed.length} part(s) matching uploads` : 'Listed parts differ from uploaded parts',
      {
        expected: expected.map(p => p.partNumber),
        listed: listed.map(p => p.partNumber),
      },
      duration,
    );
  },
};

const completeUpload: Probe<MultipartState> = {
  name: 'multipart_completion',
  async run(ctx: Ctx) {
    const upload = requireState(ctx, 'multipart_completion', ctx.state.upload, 'multipart upload');
    if (!upload) return;
    if (ctx.state.parts.length === 0) {
      ctx.runner.fail('multipart_completion', 'No uploaded parts to complete', { upload_id: upload.uploadId });
      return;
    }

    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.completeMultipartUpload({ ...upload, parts: ctx.state.parts }));
    if (!result.ok) {
      ctx.runner.fail('multipart_completion', `Failed to complete multipart upload: ${result.error.code}`, result.error.toDetails(), duration);
      return;
    }

    // The upload no longer exists; the assembled object does.
    ctx.runner.removeCleanupItems(isUpload(upload));
    ctx.runner.addCleanupItem({ kind: 'object', bucket: upload.bucket, key: upload.key, versionId: result.value.versionId });
    ctx.state.completedKey = upload.key;

    ctx.runner.addResult(
      'multipart_completion',
      Boolean(result.value.etag),
      result.value.etag ? `Completed upload of ${ctx.state.parts.length} part(s)` : 'Completion response lacks an ETag',
      { key: upload.key, etag: result.value.etag ?? null, part_count: ctx.state.parts.length },
      duration,
    );
  },
};

const verifyCompletion: Probe<MultipartState> = {
  name: 'multipart_completion_verification',
  async run(ctx: Ctx) {
    const key = requireState(ctx, 'multipart_completion_verification', ctx.state.completedKey, 'completed multipart object');
    if (!key) return;

    const expectedSize = ctx.state.partSizes.reduce((sum, size) => sum + size, 0);
    const [head, duration] = await ctx.runner.timed(() => ctx.gateway.headObject({ bucket: ctx.bucket, key }));
    if (!head.ok) {
      ctx.runner.fail('multipart_completion_verification', `HEAD on assembled object failed: ${head.error.code}`, head.error.toDetails(), duration);
      return;
    }

    const match = head.value.contentLength === expectedSize;
    ctx.runner.addResult(
      'multipart_completion_verification',
      match,
      match ? `Assembled object is ${expectedSize} bytes` : 'Assembled object size differs from sum of parts',
      { key, expected_size: expectedSize, actual_size: head.value.contentLength ?? null },
      duration,
    );
  },
};

const abortUpload: Probe<MultipartState> = {
  name: 'multipart_abort',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('multipart-abort');
    const created = await ctx.gateway.createMultipartUpload({ bucket: ctx.bucket, key });
    if (!created.ok) {
      ctx.runner.fail('multipart_abort', `Failed to initiate upload to abort: ${created.error.code}`, created.error.toDetails());
      return;
    }

    const upload = { bucket: ctx.bucket, key, uploadId: created.value.uploadId };
    ctx.runner.addCleanupItem({ kind: 'multipart_upload', ...upload });

    const part = await ctx.gateway.uploadPart({ ...upload, partNumber: 1, body: generateTestData(ABORT_PART_SIZE, ctx.testData.testFileContent) });
    if (!part.ok) {
      ctx.runner.fail('multipart_abort', `Failed to upload part before abort: ${part.error.code}`, part.error.toDetails());
      return;
    }

    const [aborted, duration] = await ctx.runner.timed(() => ctx.gateway.abortMultipartUpload(upload));
    if (!aborted.ok) {
      ctx.runner.fail('multipart_abort', `Abort failed: ${aborted.error.code}`, aborted.error.toDetails(), duration);
      return;
    }

    ctx.runner.removeCleanupItems(isUpload(upload));
    ctx.state.aborted = upload;
    ctx.runner.pass('multipart_abort', 'Multipart upload aborted', { key, upload_id: upload.uploadId, status_code: aborted.value.status }, duration);
  },
};

const verifyAbort: Probe<MultipartState> = {
  name: 'multipart_abort_verification',
  async run(ctx: Ctx) {
    const upload = requireState(ctx, 'multipart_abort_verification', ctx.state.aborted, 'aborted multipart upload');
    if (!upload) return;

    await expectRejection(ctx.runner, () => ctx.gateway.listParts(upload), {
      name: 'multipart_abort_verification',
      description: 'ListParts on an aborted upload',
      accepted: ACCEPTED_STATUS.missing,
      details: { key: upload.key, upload_id: upload.uploadId },
    });
  },
};

const listUploads: Probe<MultipartState> = {
  name: 'multipart_list_uploads',
  async run(ctx: Ctx) {
    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.listMultipartUploads(ctx.bucket));
    if (!result.ok) {
      ctx.runner.fail('multipart_list_uploads', `ListMultipartUploads failed: ${result.error.code}`, result.error.toDetails(), duration);
      return;
    }
    ctx.runner.pass('multipart_list_uploads', `Listed ${result.value.uploads.length} in-progress upload(s)`, { upload_count: result.value.uploads.length }, duration);
  },
};

export const multipartCategory = defineCategory<MultipartState>({
  name: 'multipart',
  description: 'Multipart upload lifecycle: initiate, parts, list, complete, abort',
  bucketPrefix: 'multipart-test-bucket',
  initialState: () => ({ parts: [], partSizes: [] }),
  probes: [
    createUpload,
    ...Array.from({ length: PART_COUNT }, (_, i) => partProbe(i + 1)),
    listParts,
    completeUpload,
    verifyCompletion,
    abortUpload,
    verifyAbort,
    listUploads,
  ],
});
