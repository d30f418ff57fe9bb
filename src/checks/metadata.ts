import { defineCategory } from '../category-runner.js';
import type { Probe, ProbeContext } from '../category-runner.js';
import type { Metadata, ObjectHead, PutObjectInput } from '../gateway.js';
import { ACCEPTED_STATUS, THRESHOLDS, expectRejection, meetsThreshold, ratio } from './assertions.js';
import type { NoState } from './helpers.js';
import { putTracked } from './helpers.js';
import { generateTestData, toBytes } from './test-data.js';

type Ctx = ProbeContext<NoState>;

/**
 * Uploads an object, then HEADs it. Failures on either step are recorded
 * under `name`; the head is returned only when both succeed.
 */
async function putThenHead(
  ctx: Ctx,
  name: string,
  input: Omit<PutObjectInput, 'bucket'>,
): Promise<{ head: ObjectHead; duration: number } | undefined> {
  const [put, duration] = await ctx.runner.timed(() => putTracked(ctx, input));
  if (!put.ok) {
    ctx.runner.fail(name, `Upload failed: ${put.error.code}`, { key: input.key, ...put.error.toDetails() }, duration);
    return undefined;
  }

  const head = await ctx.gateway.headObject({ bucket: ctx.bucket, key: input.key });
  if (!head.ok) {
    ctx.runner.fail(name, `HEAD after upload failed: ${head.error.code}`, { key: input.key, ...head.error.toDetails() }, duration);
    return undefined;
  }
  return { head: head.value, duration };
}

function preservedKeys(expected: Metadata, actual: Metadata): string[] {
  return Object.entries(expected)
    .filter(([key, value]) => actual[key] === value)
    .map(([key]) => key);
}

function testData(ctx: Ctx, size: number): Uint8Array {
  return generateTestData(size, ctx.testData.testFileContent);
}

// A fixed instant; compared as a parsed date since servers may reformat it.
const EXPIRES = new Date(Date.UTC(2030, 9, 21, 7, 28, 0));

const standardHeaders: Probe<NoState> = {
  name: 'standard_metadata_headers',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('standard-metadata-test');
    const expected = {
      contentType: 'application/json',
      contentEncoding: 'gzip',
      contentDisposition: 'attachment; filename="test.json"',
      contentLanguage: 'en-US',
      cacheControl: 'max-age=3600, no-cache',
    };

    const outcome = await putThenHead(ctx, 'standard_metadata_headers', { key, body: testData(ctx, 1024), ...expected, expires: EXPIRES });
    if (!outcome) return;
    const { head, duration } = outcome;

    const checks: [string, boolean][] = [
      ['ContentType', head.contentType === expected.contentType],
      ['ContentEncoding', head.contentEncoding === expected.contentEncoding],
      ['ContentDisposition', head.contentDisposition === expected.contentDisposition],
      ['ContentLanguage', head.contentLanguage === expected.contentLanguage],
      ['CacheControl', head.cacheControl === expected.cacheControl],
      ['Expires', head.expires !== undefined && Date.parse(head.expires) === EXPIRES.getTime()],
    ];
    const verified = checks.filter(([, ok]) => ok).map(([header]) => header);
    const total = checks.length;

    ctx.runner.addResult(
      'standard_metadata_headers',
      meetsThreshold(verified.length, total, THRESHOLDS.standardHeaders),
      `Standard metadata headers: ${verified.length}/${total} preserved correctly`,
      { key, verified_headers: verified, success_rate: ratio(verified.length, total) },
      duration,
    );
  },
};

const customMetadata: Probe<NoState> = {
  name: 'custom_metadata_preservation',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('custom-metadata-test');
    const metadata: Metadata = {
      author: 's3check',
      project: 'metadata-testing',
      version: '1.0.0',
      environment: 'test',
      'numeric-value': '42',
      'boolean-value': 'true',
      'special-chars': 'test@example.com',
    };

    const outcome = await putThenHead(ctx, 'custom_metadata_preservation', { key, body: testData(ctx, 512), metadata, contentType: 'text/plain' });
    if (!outcome) return;

    const preserved = preservedKeys(metadata, outcome.head.metadata);
    const total = Object.keys(metadata).length;
    ctx.runner.addResult(
      'custom_metadata_preservation',
      meetsThreshold(preserved.length, total, THRESHOLDS.customMetadata),
      `Custom metadata: ${preserved.length}/${total} fields preserved correctly`,
      { key, verified_fields: preserved, returned_metadata: outcome.head.metadata, success_rate: ratio(preserved.length, total) },
      outcome.duration,
    );
  },
};

/** RFC 2047 encoded-word, the form S3 accepts for non-ASCII header values. */
export function encodedWord(value: string): string {
  return `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`;
}

const encodedValues: Probe<NoState> = {
  name: 'metadata_encoding_handling',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('encoding-metadata-test');
    const metadata: Metadata = {
      'ascii-text': 'simple-ascii-value',
      'utf8-text': encodedWord('café-München-日本'),
      spaces: 'value with spaces',
      'url-encoded': encodeURIComponent('test@example.com'),
      'special-symbols': '!@#$%^&*()',
      numbers: '123456789',
      mixed: 'Test_123-Value@2024',
    };

    const outcome = await putThenHead(ctx, 'metadata_encoding_handling', {
      key,
      body: testData(ctx, 256),
      metadata,
      contentType: 'application/octet-stream',
    });
    if (!outcome) return;

    const returned = outcome.head.metadata;
    const results = Object.fromEntries(
      Object.entries(metadata).map(([field, value]) => [
        field,
        returned[field] === value ? 'preserved' : returned[field] !== undefined ? 'modified' : 'missing',
      ]),
    );
    const preserved = Object.values(results).filter(r => r === 'preserved').length;
    const total = Object.keys(metadata).length;

    ctx.runner.addResult(
      'metadata_encoding_handling',
      meetsThreshold(preserved, total, THRESHOLDS.encodedValues),
      `Metadata encoding: ${preserved}/${total} values preserved correctly`,
      { key, encoding_results: results, success_rate: ratio(preserved, total) },
      outcome.duration,
    );
  },
};

const sizeLimits: Probe<NoState> = {
  name: 'metadata_size_limits',
  async run(ctx: Ctx) {
    const largeKey = ctx.runner.generateUniqueName('large-value-metadata');
    const largeValue = 'x'.repeat(2048);
    await expectRejection(
      ctx.runner,
      () => putTracked(ctx, { key: largeKey, body: toBytes('test data'), metadata: { 'large-field': largeValue } }),
      {
        name: 'metadata_large_value_limit',
        description: `metadata value of ${largeValue.length} bytes`,
        accepted: ACCEPTED_STATUS.sizeLimit,
        details: { key: largeKey, value_size: largeValue.length },
      },
    );

    const manyKey = ctx.runner.generateUniqueName('many-fields-metadata');
    const many: Metadata = Object.fromEntries(Array.from({ length: 100 }, (_, i) => [`field${i}`, `value${i}`.repeat(50)]));
    const totalSize = Object.entries(many).reduce((sum, [k, v]) => sum + k.length + v.length, 0);
    await expectRejection(ctx.runner, () => putTracked(ctx, { key: manyKey, body: toBytes('test data'), metadata: many }), {
      name: 'metadata_total_size_limit',
      description: `${Object.keys(many).length} metadata fields totalling ${totalSize} bytes`,
      accepted: ACCEPTED_STATUS.sizeLimit,
      details: { key: manyKey, field_count: Object.keys(many).length, total_size: totalSize },
    });
  },
};

const caseHandling: Probe<NoState> = {
  name: 'metadata_case_handling',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('case-sensitivity-test');
    const metadata: Metadata = { lowercase: 'value1', UPPERCASE: 'value2', MixedCase: 'value3', camelCase: 'value4' };

    const outcome = await putThenHead(ctx, 'metadata_case_handling', { key, body: testData(ctx, 256), metadata });
    if (!outcome) return;

    // Header names are case-insensitive, so stores commonly lowercase them.
    const returned = outcome.head.metadata;
    const byLower = new Map(Object.entries(returned).map(([k, v]) => [k.toLowerCase(), v]));
    const results = Object.fromEntries(
      Object.entries(metadata).map(([field, value]) => {
        if (returned[field] === value) return [field, 'exact_match'];
        return [field, byLower.get(field.toLowerCase()) === value ? 'case_changed' : 'missing'];
      }),
    );
    const exact = Object.values(results).filter(r => r === 'exact_match').length;
    const found = Object.values(results).filter(r => r !== 'missing').length;
    const total = Object.keys(metadata).length;

    ctx.runner.addResult(
      'metadata_case_handling',
      found === total,
      `Case handling: ${found}/${total} values retrievable, ${exact} with exact key case`,
      { key, case_results: results, exact_matches: exact, exact_ratio: ratio(exact, total), returned_metadata: returned },
      outcome.duration,
    );
  },
};

const copyBehavior: Probe<NoState> = {
  name: 'metadata_copy_behavior',
  async run(ctx: Ctx) {
    const sourceKey = ctx.runner.generateUniqueName('copy-source-metadata');
    const source: Metadata = { 'original-author': 'source-creator', 'creation-time': '2024-01-01', category: 'original' };

    const put = await putTracked(ctx, { key: sourceKey, body: testData(ctx, 512), metadata: source, contentType: 'text/plain' });
    if (!put.ok) {
      ctx.runner.fail('metadata_copy_preservation', `Failed to create copy source: ${put.error.code}`, { key: sourceKey, ...put.error.toDetails() });
      return;
    }

    const copyTo = async (name: string, key: string, extra: { metadataDirective?: 'REPLACE'; metadata?: Metadata }) => {
      const [copied, duration] = await ctx.runner.timed(() =>
        ctx.gateway.copyObject({ bucket: ctx.bucket, key, sourceBucket: ctx.bucket, sourceKey, ...extra }),
      );
      if (!copied.ok) {
        ctx.runner.fail(name, `Copy failed: ${copied.error.code}`, { source_key: sourceKey, dest_key: key, ...copied.error.toDetails() }, duration);
        return undefined;
      }
      ctx.runner.addCleanupItem({ kind: 'object', bucket: ctx.bucket, key, versionId: copied.value.versionId });

      const head = await ctx.gateway.headObject({ bucket: ctx.bucket, key });
      if (!head.ok) {
        ctx.runner.fail(name, `HEAD on copy failed: ${head.error.code}`, { dest_key: key, ...head.error.toDetails() }, duration);
        return undefined;
      }
      return { metadata: head.value.metadata, duration };
    };

    const destKey = ctx.runner.generateUniqueName('copy-dest-metadata');
    const copied = await copyTo('metadata_copy_preservation', destKey, {});
    if (copied) {
      const preserved = preservedKeys(source, copied.metadata);
      const total = Object.keys(source).length;
      ctx.runner.addResult(
        'metadata_copy_preservation',
        meetsThreshold(preserved.length, total, THRESHOLDS.copyPreservation),
        `Copy metadata preservation: ${preserved.length}/${total} fields preserved`,
        { source_key: sourceKey, dest_key: destKey, preserved_fields: preserved, dest_metadata: copied.metadata },
        copied.duration,
      );
    }

    const replacement: Metadata = { 'new-author': 'copy-creator', 'modified-time': '2024-12-01', category: 'modified' };
    const replaceKey = ctx.runner.generateUniqueName('copy-replacement-metadata');
    const replaced = await copyTo('metadata_copy_replacement', replaceKey, { metadataDirective: 'REPLACE', metadata: replacement });
    if (!replaced) return;

    const newSet = preservedKeys(replacement, replaced.metadata).length === Object.keys(replacement).length;
    const oldRemoved = Object.keys(source).every(field => field in replacement || !(field in replaced.metadata));
    ctx.runner.addResult(
      'metadata_copy_replacement',
      newSet && oldRemoved,
      `Copy with REPLACE: new metadata set=${newSet}, old metadata removed=${oldRemoved}`,
      { source_key: sourceKey, replacement_key: replaceKey, replace_metadata: replaced.metadata },
      replaced.duration,
    );
  },
};

const SYSTEM_FIELDS = ['contentType', 'contentLength', 'etag', 'lastModified'] as const;
const SYSTEM_HEADER_NAMES = ['content-type', 'content-length', 'etag', 'last-modified'];

const systemVsUser: Probe<NoState> = {
  name: 'system_user_metadata_distinction',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('system-user-metadata-test');
    const user: Metadata = { 'user-field': 'user-value', application: 'test-app' };

    const outcome = await putThenHead(ctx, 'system_user_metadata_distinction', {
      key,
      body: testData(ctx, 1024),
      metadata: user,
      contentType: 'application/json',
      cacheControl: 'no-cache',
      contentEncoding: 'identity',
    });
    if (!outcome) return;
    const { head } = outcome;

    const systemPresent = SYSTEM_FIELDS.filter(field => head[field] !== undefined);
    const userPreserved = preservedKeys(user, head.metadata).length === Object.keys(user).length;
    const separated = !Object.keys(head.metadata).some(k => SYSTEM_HEADER_NAMES.includes(k.toLowerCase()));
    const success = userPreserved && systemPresent.length >= 3 && separated;

    ctx.runner.addResult(
      'system_user_metadata_distinction',
      success,
      `System/user metadata: system fields=${systemPresent.length}, user preserved=${userPreserved}, separated=${separated}`,
      { key, system_metadata_present: systemPresent, returned_user_metadata: head.metadata },
      outcome.duration,
    );
  },
};

const emptyValues: Probe<NoState> = {
  name: 'empty_metadata_values',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('empty-metadata-test');
    const outcome = await putThenHead(ctx, 'empty_metadata_values', {
      key,
      body: toBytes('test'),
      metadata: { 'empty-field': '', 'normal-field': 'value' },
    });
    if (!outcome) return;

    const returned = outcome.head.metadata;
    const emptyPresent = 'empty-field' in returned;
    const normalPreserved = returned['normal-field'] === 'value';
    ctx.runner.addResult(
      'empty_metadata_values',
      normalPreserved,
      `Empty metadata values: empty field present=${emptyPresent}, normal field preserved=${normalPreserved}`,
      { key, returned_metadata: returned },
      outcome.duration,
    );
  },
};

const noMetadataBaseline: Probe<NoState> = {
  name: 'no_metadata_baseline',
  async run(ctx: Ctx) {
    const key = ctx.runner.generateUniqueName('no-metadata-test');
    const outcome = await putThenHead(ctx, 'no_metadata_baseline', { key, body: toBytes('test without metadata') });
    if (!outcome) return;

    const count = Object.keys(outcome.head.metadata).length;
    ctx.runner.addResult(
      'no_metadata_baseline',
      count === 0,
      `No metadata baseline: user metadata count=${count}`,
      { key, user_metadata: outcome.head.metadata },
      outcome.duration,
    );
  },
};

export const metadataCategory = defineCategory<NoState>({
  name: 'metadata',
  description: 'Standard headers, custom metadata, encoding, limits and copy behavior',
  bucketPrefix: 'metadata-test-bucket',
  initialState: () => ({}),
  probes: [
    standardHeaders,
    customMetadata,
    encodedValues,
    sizeLimits,
    caseHandling,
    copyBehavior,
    systemVsUser,
    emptyValues,
    noMetadataBaseline,
  ],
});
