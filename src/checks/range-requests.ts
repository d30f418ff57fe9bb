import { defineCategory } from '../category-runner.js';
import type { Probe, ProbeContext } from '../category-runner.js';
import type { GetObjectOutput, GatewayResult } from '../gateway.js';
import { ACCEPTED_STATUS, bytesEqual, isStatusIn, slug, stripQuotes } from './assertions.js';
import { putTracked } from './helpers.js';
import { createRangeTestData } from './test-data.js';

interface RangeState {
  key: string;
  data: Uint8Array;
}

type Ctx = ProbeContext<RangeState>;

const PARTIAL_CONTENT = 206;

async function setup(ctx: Ctx): Promise<boolean> {
  const put = await putTracked(ctx, { key: ctx.state.key, body: ctx.state.data, contentType: 'application/octet-stream' });
  if (!put.ok) {
    ctx.runner.fail('range_test_data_upload', `Failed to upload range test object: ${put.error.code}`, {
      key: ctx.state.key,
      ...put.error.toDetails(),
    });
    return false;
  }
  return true;
}

function getRange(ctx: Ctx, range: string, ifMatch?: string): Promise<[GatewayResult<GetObjectOutput>, number]> {
  return ctx.runner.timed(() => ctx.gateway.getObject({ bucket: ctx.bucket, key: ctx.state.key, range, ifMatch }));
}

const singleByte: Probe<RangeState> = {
  name: 'range_single_byte',
  async run(ctx: Ctx) {
    const last = ctx.state.data.byteLength - 1;
    const cases: [string, number, string][] = [
      ['bytes=0-0', 0, 'First byte'],
      ['bytes=99-99', 99, '100th byte'],
      ['bytes=500-500', 500, 'Middle byte'],
      ['bytes=-1', last, 'Last byte'],
    ];

    for (const [range, offset, description] of cases) {
      const name = `range_single_byte_${slug(description)}`;
      const expected = ctx.state.data.subarray(offset, offset + 1);
      const [result, duration] = await getRange(ctx, range);

      if (!result.ok) {
        ctx.runner.fail(name, `Failed to retrieve ${description}: ${result.error.code}`, { range, ...result.error.toDetails() }, duration);
        continue;
      }

      const res = result.value;
      const passed: string[] = [];
      if (res.status === PARTIAL_CONTENT) passed.push('status_206');
      if (res.contentRange) {
        passed.push('content_range_header');
        if (res.contentRange.startsWith(`bytes ${offset}-${offset}/`)) passed.push('content_range_correct');
      }
      if (bytesEqual(res.body, expected)) passed.push('data_matches');
      if (res.contentLength === expected.byteLength) passed.push('content_length_correct');

      ctx.runner.addResult(
        name,
        passed.length >= 3,
        passed.length >= 3 ? `Retrieved ${description} with a range request` : `Range request for ${description} failed validation (${passed.length}/5 checks)`,
        { range, passed_checks: passed, content_range: res.contentRange ?? null, status_code: res.status },
        duration,
      );
    }
  },
};

const partialRanges: Probe<RangeState> = {
  name: 'range_partial',
  async run(ctx: Ctx) {
    const size = ctx.state.data.byteLength;
    const cases: [number, number, string][] = [
      [0, 99, 'First 100 bytes'],
      [100, 299, 'Second and third lines'],
      [1000, 1999, '1KB chunk from middle'],
      [5000, 7499, '2.5KB chunk'],
      [size - 100, size - 1, 'Last 100 bytes'],
      // An end past the object is clamped to its last byte.
      [0, 999_999, 'End beyond object size'],
    ];

    for (const [start, end, description] of cases) {
      const name = `range_partial_${start}_${end}`;
      const range = `bytes=${start}-${end}`;
      const expected = ctx.state.data.subarray(start, Math.min(end, size - 1) + 1);
      const [result, duration] = await getRange(ctx, range);

      if (!result.ok) {
        ctx.runner.fail(name, `Failed partial range request for ${description}: ${result.error.code}`, { range, ...result.error.toDetails() }, duration);
        continue;
      }

      const matches = bytesEqual(result.value.body, expected);
      const success = matches && result.value.status === PARTIAL_CONTENT;
      ctx.runner.addResult(
        name,
        success,
        success ? `Retrieved ${description} (${expected.byteLength} bytes)` : `Range validation failed for ${description}`,
        {
          range,
          expected_size: expected.byteLength,
          actual_size: result.value.body.byteLength,
          data_matches: matches,
          status_code: result.value.status,
          content_range: result.value.contentRange ?? null,
        },
        duration,
      );
    }
  },
};

const suffixRanges: Probe<RangeState> = {
  name: 'range_suffix',
  async run(ctx: Ctx) {
    const size = ctx.state.data.byteLength;
    for (const length of [1, 10, 100, 1000, size]) {
      const name = `range_suffix_${length}`;
      const range = `bytes=-${length}`;
      const expected = ctx.state.data.subarray(Math.max(0, size - length));
      const [result, duration] = await getRange(ctx, range);

      if (!result.ok) {
        ctx.runner.fail(name, `Failed suffix range request: ${result.error.code}`, { range, ...result.error.toDetails() }, duration);
        continue;
      }

      const matches = bytesEqual(result.value.body, expected);
      const success = matches && result.value.status === PARTIAL_CONTENT;
      ctx.runner.addResult(
        name,
        success,
        success ? `Retrieved last ${length} byte(s)` : `Suffix range validation failed for last ${length} byte(s)`,
        { range, expected_size: expected.byteLength, actual_size: result.value.body.byteLength, status_code: result.value.status },
        duration,
      );
    }
  },
};

const multipleRanges: Probe<RangeState> = {
  name: 'range_multiple',
  async run(ctx: Ctx) {
    const cases: [string, string][] = [
      ['bytes=0-99,200-299', 'Two 100-byte chunks'],
      ['bytes=0-49,100-149,200-249', 'Three 50-byte chunks'],
      ['bytes=0-9,-10', 'First and last 10 bytes'],
    ];

    for (const [range, description] of cases) {
      const name = `range_multiple_${slug(description)}`;
      const [result, duration] = await getRange(ctx, range);

      if (!result.ok) {
        const tolerated = isStatusIn(result.error, ACCEPTED_STATUS.optionalFeature);
        ctx.runner.addResult(
          name,
          tolerated,
          tolerated ? `Multiple ranges not supported (acceptable): ${description}` : `Multiple range request failed: ${description}`,
          tolerated ? { range, ...result.error.toDetails(), note: 'Multiple ranges are optional' } : { range, ...result.error.toDetails() },
          duration,
        );
        continue;
      }

      const { contentType, status } = result.value;
      const multipart = contentType?.includes('multipart/byteranges') ?? false;
      const success = multipart || status === PARTIAL_CONTENT;
      const message = multipart
        ? `Multipart byteranges response: ${description}`
        : status === PARTIAL_CONTENT
          ? `Single range returned (acceptable): ${description}`
          : `Unexpected response to multiple ranges: ${description}`;
      ctx.runner.addResult(name, success, message, { range, content_type: contentType ?? null, status_code: status }, duration);
    }
  },
};

const invalidRanges: Probe<RangeState> = {
  name: 'range_invalid',
  async run(ctx: Ctx) {
    const cases: [string, string][] = [
      ['bytes=abc-def', 'Non-numeric range'],
      ['bytes=100-50', 'End before start'],
      ['bytes=999999-999999', 'Start beyond object size'],
      ['invalid-range-header', 'Malformed range header'],
      ['bytes=', 'Empty range'],
      ['bytes=-', 'Empty suffix range'],
    ];

    for (const [range, description] of cases) {
      const name = `range_invalid_${slug(description)}`;
      const [result, duration] = await getRange(ctx, range);

      if (!result.ok) {
        const rejected = isStatusIn(result.error, ACCEPTED_STATUS.invalidRange);
        ctx.runner.addResult(
          name,
          rejected,
          rejected ? `Invalid range rejected: ${description}` : `Invalid range returned unexpected error: ${description}`,
          { range, ...result.error.toDetails() },
          duration,
        );
        continue;
      }

      // Ignoring an unsatisfiable range and returning the whole object is allowed.
      const status = result.value.status;
      const message =
        status === 200
          ? `Invalid range ignored, full object returned: ${description}`
          : status === PARTIAL_CONTENT
            ? `Invalid range returned partial content: ${description}`
            : `Invalid range succeeded unexpectedly: ${description}`;
      ctx.runner.addResult(name, status === 200, message, { range, status_code: status }, duration);
    }
  },
};

const etagConditioned: Probe<RangeState> = {
  name: 'range_with_etag',
  async run(ctx: Ctx) {
    const head = await ctx.gateway.headObject({ bucket: ctx.bucket, key: ctx.state.key });
    const etag = head.ok ? stripQuotes(head.value.etag) : '';
    if (!etag) {
      ctx.runner.fail('range_with_etag', 'Could not retrieve ETag for conditional range requests', head.ok ? { key: ctx.state.key } : head.error.toDetails());
      return;
    }

    const range = 'bytes=0-99';
    const [matching, matchDuration] = await getRange(ctx, range, `"${etag}"`);
    if (matching.ok) {
      const success = matching.value.status === PARTIAL_CONTENT;
      ctx.runner.addResult(
        'range_with_matching_etag',
        success,
        success ? 'Range request with matching ETag returned partial content' : 'Range request with matching ETag returned unexpected status',
        { range, etag, status_code: matching.value.status },
        matchDuration,
      );
    } else {
      ctx.runner.fail('range_with_matching_etag', `Range request with matching ETag failed: ${matching.error.code}`, { etag, ...matching.error.toDetails() }, matchDuration);
    }

    const fake = 'fake-etag-12345';
    const [nonMatching, missDuration] = await getRange(ctx, range, `"${fake}"`);
    if (nonMatching.ok) {
      ctx.runner.fail(
        'range_with_nonmatching_etag',
        'Range request with non-matching ETag was served',
        { range, fake_etag: fake, real_etag: etag, status_code: nonMatching.value.status },
        missDuration,
      );
      return;
    }

    const precondition = nonMatching.error.httpStatus === 412;
    ctx.runner.addResult(
      'range_with_nonmatching_etag',
      precondition,
      precondition ? 'Range request with non-matching ETag failed the precondition' : `Range request with non-matching ETag failed with ${nonMatching.error.code}`,
      { fake_etag: fake, ...nonMatching.error.toDetails() },
      missDuration,
    );
  },
};

export const rangeRequestsCategory = defineCategory<RangeState>({
  name: 'range_requests',
  description: 'Byte-range GETs: single, partial, suffix, multiple, invalid and conditional',
  bucketPrefix: 'range-test-bucket',
  initialState: () => ({ key: `range-test-object-${Date.now()}`, data: createRangeTestData() }),
  setup,
  probes: [singleByte, partialRanges, suffixRanges, multipleRanges, invalidRanges, etagConditioned],
});
