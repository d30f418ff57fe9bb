/**
 * In-process S3 stand-in for unit and contract tests.
 *
 * Implements StorageGateway over plain maps with the status codes and error
 * codes a conforming store returns, so every category can run end to end
 * without a network. Calls are recorded, and any operation can be made to
 * fail with `failOn`.
 */
import { createHash } from 'node:crypto';
import { stripQuotes } from '../../src/checks/assertions.js';
import { GatewayError } from '../../src/errors.js';
import type {
  BucketSummary,
  CompleteMultipartInput,
  CompleteMultipartOutput,
  ConnectionInfo,
  CopyObjectInput,
  CopyObjectOutput,
  CreateMultipartInput,
  DeleteObjectOutput,
  GatewayResult,
  GetObjectAttributesInput,
  GetObjectInput,
  GetObjectOutput,
  ListObjectsInput,
  ListObjectsOutput,
  ListVersionsOutput,
  Metadata,
  MultipartRef,
  ObjectAttributes,
  ObjectHead,
  ObjectRef,
  ObjectVersion,
  PartSummary,
  PutObjectInput,
  PutObjectOutput,
  PutVersioningInput,
  ResponseMeta,
  StorageGateway,
  Tag,
  UploadPartInput,
  UploadSummary,
  VersioningStatus,
} from '../../src/gateway.js';
import { err, ok } from '../../src/result.js';
import type { Result } from '../../src/result.js';

export type GatewayOperation = Exclude<keyof StorageGateway, 'connectionInfo'>;

export interface RecordedCall {
  operation: GatewayOperation;
  args: unknown[];
}

export interface MemoryGatewayOptions {
  /** Smallest size accepted for every part but the last. 0 disables the check. */
  minPartSize?: number;
  /** User metadata budget in bytes (keys plus values). */
  maxMetadataSize?: number;
}

interface Rejection {
  code: string;
  httpStatus: number;
  message: string;
}

type Outcome<T> = Result<T, Rejection>;

interface FaultRule {
  operation: GatewayOperation;
  code: string;
  httpStatus: number;
  remaining: number;
  when?: (args: unknown[]) => boolean;
}

type ContentHeaders = Pick<PutObjectInput, 'contentType' | 'contentEncoding' | 'contentDisposition' | 'contentLanguage' | 'cacheControl' | 'expires'>;

interface StoredObject {
  versionId: string;
  deleteMarker: boolean;
  body: Uint8Array;
  etag: string;
  lastModified: Date;
  headers: ContentHeaders;
  metadata: Metadata;
  tags: Tag[];
  partSizes?: number[];
}

interface PendingUpload {
  key: string;
  uploadId: string;
  headers: ContentHeaders;
  metadata: Metadata;
  parts: Map<number, { etag: string; body: Uint8Array }>;
}

interface BucketRecord {
  name: string;
  creationDate: Date;
  versioning?: VersioningStatus;
  tags?: Tag[];
  /** Oldest first; the last entry is the current version. */
  objects: Map<string, StoredObject[]>;
  uploads: Map<string, PendingUpload>;
}

const NULL_VERSION = 'null';
const MAX_KEY_BYTES = 1024;
const DEFAULT_LIST_LIMIT = 1000;

function reject(code: string, httpStatus: number, message: string): Outcome<never> {
  return err({ code, httpStatus, message });
}

function snakeCase(operation: string): string {
  return operation.replace(/[A-Z]/g, c => `_${c.toLowerCase()}`);
}

function md5(data: Uint8Array | string): string {
  return createHash('md5').update(data).digest('hex');
}

function concat(chunks: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(chunks.reduce((sum, c) => sum + c.byteLength, 0));
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

function lowercaseKeys(metadata: Metadata = {}): Metadata {
  return Object.fromEntries(Object.entries(metadata).map(([k, v]) => [k.toLowerCase(), v]));
}

function metadataSize(metadata: Metadata): number {
  return Object.entries(metadata).reduce((sum, [k, v]) => sum + Buffer.byteLength(k) + Buffer.byteLength(v), 0);
}

export function isValidBucketName(name: string): boolean {
  return /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/.test(name) && !name.includes('..') && !/^\d+\.\d+\.\d+\.\d+$/.test(name);
}

type ByteRange = { kind: 'range'; start: number; end: number } | { kind: 'ignore' } | { kind: 'unsatisfiable' };

/**
 * Resolves a Range header against an object size. Only the first range of a
 * multi-range request is served; syntactically invalid headers are ignored.
 */
export function resolveRange(header: string, size: number): ByteRange {
  const match = /^bytes=(.*)$/.exec(header.trim());
  if (!match) return { kind: 'ignore' };

  const first = match[1].split(',')[0].trim();
  const spec = /^(\d*)-(\d*)$/.exec(first);
  if (!spec || (spec[1] === '' && spec[2] === '')) return { kind: 'ignore' };

  if (spec[1] === '') {
    const length = Number(spec[2]);
    if (length === 0 || size === 0) return { kind: 'unsatisfiable' };
    return { kind: 'range', start: Math.max(0, size - length), end: size - 1 };
  }

  const start = Number(spec[1]);
  const end = spec[2] === '' ? size - 1 : Number(spec[2]);
  if (end < start) return { kind: 'ignore' };
  if (start >= size) return { kind: 'unsatisfiable' };
  return { kind: 'range', start, end: Math.min(end, size - 1) };
}

function headOf(object: StoredObject): ObjectHead {
  return {
    status: 200,
    contentLength: object.body.byteLength,
    contentType: object.headers.contentType ?? 'binary/octet-stream',
    contentEncoding: object.headers.contentEncoding,
    contentDisposition: object.headers.contentDisposition,
    contentLanguage: object.headers.contentLanguage,
    cacheControl: object.headers.cacheControl,
    expires: object.headers.expires?.toUTCString(),
    etag: object.etag,
    lastModified: object.lastModified,
    versionId: object.versionId === NULL_VERSION ? undefined : object.versionId,
    metadata: { ...object.metadata },
  };
}

function validateTags(tags: Tag[]): Outcome<Tag[]> {
  const keys = new Set(tags.map(t => t.key));
  if (keys.size !== tags.length) {
    return reject('InvalidTag', 400, 'Cannot provide multiple Tags with the same key');
  }
  return ok(tags.map(t => ({ ...t })));
}

export class MemoryGateway implements StorageGateway {
  readonly calls: RecordedCall[] = [];
  private readonly buckets = new Map<string, BucketRecord>();
  private readonly faults: FaultRule[] = [];
  private readonly minPartSize: number;
  private readonly maxMetadataSize: number;
  private sequence = 0;

  constructor(options: MemoryGatewayOptions = {}) {
    this.minPartSize = options.minPartSize ?? 0;
    this.maxMetadataSize = options.maxMetadataSize ?? 2048;
  }

  /** Makes `operation` fail with the given error, `times` times (default: always). */
  failOn(
    operation: GatewayOperation,
    error: { code: string; httpStatus: number },
    options: { times?: number; when?: (args: unknown[]) => boolean } = {},
  ): void {
    this.faults.push({ operation, ...error, remaining: options.times ?? Infinity, when: options.when });
  }

  callsTo(operation: GatewayOperation): unknown[][] {
    return this.calls.filter(c => c.operation === operation).map(c => c.args);
  }

  bucketNames(): string[] {
    return [...this.buckets.keys()].sort();
  }

  /** Current (non-deleted) keys in a bucket, sorted. */
  objectKeys(bucket: string): string[] {
    const record = this.buckets.get(bucket);
    return record ? this.currentObjects(record, '').map(([key]) => key) : [];
  }

  /** Every stored version and delete marker in a bucket. */
  versionCount(bucket: string): number {
    const record = this.buckets.get(bucket);
    return record ? [...record.objects.values()].reduce((sum, versions) => sum + versions.length, 0) : 0;
  }

  uploadCount(bucket: string): number {
    return this.buckets.get(bucket)?.uploads.size ?? 0;
  }

  connectionInfo(): ConnectionInfo {
    return { endpoint: 'memory://local', region: 'us-east-1', verifyTls: true, accessKey: 'test-acc...' };
  }

  private async call<T>(operation: GatewayOperation, args: unknown[], fn: () => Outcome<T>): Promise<GatewayResult<T>> {
    this.calls.push({ operation, args });
    const name = snakeCase(operation);

    const rule = this.faults.find(r => r.operation === operation && r.remaining > 0 && (!r.when || r.when(args)));
    if (rule) {
      rule.remaining--;
      return err(new GatewayError({ code: rule.code, httpStatus: rule.httpStatus, operation: name, message: `Injected ${rule.code}` }));
    }

    const outcome = fn();
    if (outcome.ok) return outcome;
    return err(new GatewayError({ operation: name, ...outcome.error }));
  }

  private nextId(prefix: string): string {
    this.sequence++;
    return `${prefix}-${String(this.sequence).padStart(6, '0')}`;
  }

  private bucket(name: string): Outcome<BucketRecord> {
    const record = this.buckets.get(name);
    return record ? ok(record) : reject('NoSuchBucket', 404, 'The specified bucket does not exist');
  }

  private currentObjects(record: BucketRecord, prefix: string): [string, StoredObject][] {
    const out: [string, StoredObject][] = [];
    for (const [key, versions] of record.objects) {
      const latest = versions.at(-1);
      if (key.startsWith(prefix) && latest && !latest.deleteMarker) {
        out.push([key, latest]);
      }
    }
    return out.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  private findObject(record: BucketRecord, key: string, versionId: string | undefined, missingCode = 'NoSuchKey'): Outcome<StoredObject> {
    const versions = record.objects.get(key) ?? [];
    if (versionId !== undefined) {
      const version = versions.find(v => v.versionId === versionId);
      if (!version) return reject('NoSuchVersion', 404, 'The specified version does not exist');
      if (version.deleteMarker) return reject('MethodNotAllowed', 405, 'The specified version is a delete marker');
      return ok(version);
    }
    const latest = versions.at(-1);
    if (!latest || latest.deleteMarker) return reject(missingCode, 404, 'The specified key does not exist');
    return ok(latest);
  }

  private validateKey(key: string): Outcome<string> {
    if (Buffer.byteLength(key) > MAX_KEY_BYTES) return reject('KeyTooLongError', 400, 'Your key is too long');
    if (/[\x00-\x1f]/.test(key)) return reject('InvalidArgument', 400, 'Object key contains control characters');
    return ok(key);
  }

  private validateMetadata(metadata: Metadata): Outcome<Metadata> {
    if (metadataSize(metadata) > this.maxMetadataSize) {
      return reject('MetadataTooLarge', 400, `Your metadata headers exceed the maximum allowed metadata size of ${this.maxMetadataSize} bytes`);
    }
    return ok(metadata);
  }

  /** Appends a new current version, honoring the bucket's versioning state. */
  private store(record: BucketRecord, key: string, object: Omit<StoredObject, 'versionId' | 'deleteMarker' | 'lastModified'>): StoredObject {
    const versioned = record.versioning === 'Enabled';
    const stored: StoredObject = {
      ...object,
      versionId: versioned ? this.nextId('version') : NULL_VERSION,
      deleteMarker: false,
      lastModified: new Date(),
    };
    const versions = (record.objects.get(key) ?? []).filter(v => versioned || v.versionId !== NULL_VERSION);
    versions.push(stored);
    record.objects.set(key, versions);
    return stored;
  }

  private visibleVersion(object: StoredObject): string | undefined {
    return object.versionId === NULL_VERSION ? undefined : object.versionId;
  }

  listBuckets(): Promise<GatewayResult<{ buckets: BucketSummary[] } & ResponseMeta>> {
    return this.call('listBuckets', [], () =>
      ok({ status: 200, buckets: [...this.buckets.values()].map(b => ({ name: b.name, creationDate: b.creationDate })) }),
    );
  }

  createBucket(bucket: string): Promise<GatewayResult<ResponseMeta>> {
    return this.call('createBucket', [bucket], () => {
      if (!isValidBucketName(bucket)) return reject('InvalidBucketName', 400, 'The specified bucket is not valid');
      if (this.buckets.has(bucket)) return reject('BucketAlreadyOwnedByYou', 409, 'Your previous request to create the named bucket succeeded');
      this.buckets.set(bucket, { name: bucket, creationDate: new Date(), objects: new Map(), uploads: new Map() });
      return ok({ status: 200 });
    });
  }

  deleteBucket(bucket: string): Promise<GatewayResult<ResponseMeta>> {
    return this.call('deleteBucket', [bucket], () => {
      const record = this.bucket(bucket);
      if (!record.ok) return record;
      if ([...record.value.objects.values()].some(versions => versions.length > 0)) {
        return reject('BucketNotEmpty', 409, 'The bucket you tried to delete is not empty');
      }
      this.buckets.delete(bucket);
      return ok({ status: 204 });
    });
  }

  headBucket(bucket: string): Promise<GatewayResult<ResponseMeta>> {
    return this.call('headBucket', [bucket], () => (this.buckets.has(bucket) ? ok({ status: 200 }) : reject('NotFound', 404, 'Not Found')));
  }

  getBucketPolicy(bucket: string): Promise<GatewayResult<{ policy?: string } & ResponseMeta>> {
    return this.call<{ policy?: string } & ResponseMeta>('getBucketPolicy', [bucket], () => {
      const record = this.bucket(bucket);
      if (!record.ok) return record;
      return reject('NoSuchBucketPolicy', 404, 'The bucket policy does not exist');
    });
  }

  getBucketVersioning(bucket: string): Promise<GatewayResult<{ versioningStatus?: string } & ResponseMeta>> {
    return this.call('getBucketVersioning', [bucket], () => {
      const record = this.bucket(bucket);
      if (!record.ok) return record;
      return ok({ status: 200, versioningStatus: record.value.versioning });
    });
  }

  putBucketVersioning(input: PutVersioningInput): Promise<GatewayResult<ResponseMeta>> {
    return this.call('putBucketVersioning', [input], () => {
      const record = this.bucket(input.bucket);
      if (!record.ok) return record;
      if (input.mfaDelete === 'Enabled') {
        return reject('InvalidRequest', 400, 'MFA Authentication must be used for this request');
      }
      record.value.versioning = input.status;
      return ok({ status: 200 });
    });
  }

  getBucketTagging(bucket: string): Promise<GatewayResult<{ tags: Tag[] } & ResponseMeta>> {
    return this.call('getBucketTagging', [bucket], () => {
      const record = this.bucket(bucket);
      if (!record.ok) return record;
      const { tags } = record.value;
      if (!tags) return reject('NoSuchTagSet', 404, 'The TagSet does not exist');
      return ok({ status: 200, tags: tags.map(t => ({ ...t })) });
    });
  }

  putBucketTagging(bucket: string, tags: Tag[]): Promise<GatewayResult<ResponseMeta>> {
    return this.call('putBucketTagging', [bucket, tags], () => {
      const record = this.bucket(bucket);
      if (!record.ok) return record;
      const valid = validateTags(tags);
      if (!valid.ok) return valid;
      record.value.tags = valid.value;
      return ok({ status: 204 });
    });
  }

  deleteBucketTagging(bucket: string): Promise<GatewayResult<ResponseMeta>> {
    return this.call('deleteBucketTagging', [bucket], () => {
      const record = this.bucket(bucket);
      if (!record.ok) return record;
      record.value.tags = undefined;
      return ok({ status: 204 });
    });
  }

  putObject(input: PutObjectInput): Promise<GatewayResult<PutObjectOutput>> {
    return this.call('putObject', [input], () => {
      const record = this.bucket(input.bucket);
      if (!record.ok) return record;
      const key = this.validateKey(input.key);
      if (!key.ok) return key;
      const metadata = this.validateMetadata(lowercaseKeys(input.metadata));
      if (!metadata.ok) return metadata;

      const { bucket: _bucket, key: _key, body, metadata: _metadata, ...headers } = input;
      const stored = this.store(record.value, input.key, {
        body: body.slice(),
        etag: `"${md5(body)}"`,
        headers,
        metadata: metadata.value,
        tags: [],
      });
      return ok({ status: 200, etag: stored.etag, versionId: this.visibleVersion(stored) });
    });
  }

  getObject(input: GetObjectInput): Promise<GatewayResult<GetObjectOutput>> {
    return this.call('getObject', [input], () => {
      const record = this.bucket(input.bucket);
      if (!record.ok) return record;
      const found = this.findObject(record.value, input.key, input.versionId);
      if (!found.ok) return found;
      const object = found.value;

      if (input.ifMatch !== undefined && input.ifMatch !== '*' && stripQuotes(input.ifMatch) !== stripQuotes(object.etag)) {
        return reject('PreconditionFailed', 412, 'At least one of the pre-conditions you specified did not hold');
      }

      const head = headOf(object);
      const size = object.body.byteLength;
      const range = input.range === undefined ? { kind: 'ignore' as const } : resolveRange(input.range, size);

      if (range.kind === 'unsatisfiable') {
        return reject('InvalidRange', 416, 'The requested range is not satisfiable');
      }
      if (range.kind === 'ignore') {
        return ok({ ...head, body: object.body.slice() });
      }

      const body = object.body.slice(range.start, range.end + 1);
      return ok({
        ...head,
        status: 206,
        body,
        contentLength: body.byteLength,
        contentRange: `bytes ${range.start}-${range.end}/${size}`,
      });
    });
  }

  headObject(ref: ObjectRef): Promise<GatewayResult<ObjectHead>> {
    return this.call('headObject', [ref], () => {
      const record = this.bucket(ref.bucket);
      if (!record.ok) return record;
      const found = this.findObject(record.value, ref.key, ref.versionId, 'NotFound');
      if (!found.ok) return found;
      return ok(headOf(found.value));
    });
  }

  deleteObject(ref: ObjectRef): Promise<GatewayResult<DeleteObjectOutput>> {
    return this.call('deleteObject', [ref], () => {
      const record = this.bucket(ref.bucket);
      if (!record.ok) return record;
      const { objects, versioning } = record.value;
      const versions = objects.get(ref.key) ?? [];

      if (ref.versionId !== undefined) {
        const target = versions.find(v => v.versionId === ref.versionId);
        const remaining = versions.filter(v => v.versionId !== ref.versionId);
        if (remaining.length > 0) objects.set(ref.key, remaining);
        else objects.delete(ref.key);
        return ok({ status: 204, versionId: ref.versionId, deleteMarker: target?.deleteMarker });
      }

      if (versioning === 'Enabled') {
        const marker: StoredObject = {
          versionId: this.nextId('version'),
          deleteMarker: true,
          body: new Uint8Array(0),
          etag: '',
          lastModified: new Date(),
          headers: {},
          metadata: {},
          tags: [],
        };
        objects.set(ref.key, [...versions, marker]);
        return ok({ status: 204, versionId: marker.versionId, deleteMarker: true });
      }

      const remaining = versions.filter(v => v.versionId !== NULL_VERSION);
      if (remaining.length > 0) objects.set(ref.key, remaining);
      else objects.delete(ref.key);
      return ok({ status: 204 });
    });
  }

  copyObject(input: CopyObjectInput): Promise<GatewayResult<CopyObjectOutput>> {
    return this.call('copyObject', [input], () => {
      const source = this.bucket(input.sourceBucket);
      if (!source.ok) return source;
      const target = this.bucket(input.bucket);
      if (!target.ok) return target;
      const key = this.validateKey(input.key);
      if (!key.ok) return key;
      const found = this.findObject(source.value, input.sourceKey, undefined);
      if (!found.ok) return found;
      const object = found.value;

      const replace = input.metadataDirective === 'REPLACE';
      const metadata = this.validateMetadata(replace ? lowercaseKeys(input.metadata) : { ...object.metadata });
      if (!metadata.ok) return metadata;

      const stored = this.store(target.value, input.key, {
        body: object.body.slice(),
        etag: object.etag,
        headers: replace ? { contentType: input.contentType } : { ...object.headers },
        metadata: metadata.value,
        tags: object.tags.map(t => ({ ...t })),
        partSizes: object.partSizes,
      });
      return ok({ status: 200, etag: stored.etag, versionId: this.visibleVersion(stored) });
    });
  }

  private list(input: ListObjectsInput, continuationToken?: string): Outcome<ListObjectsOutput> {
    const record = this.bucket(input.bucket);
    if (!record.ok) return record;

    const limit = input.maxKeys ?? DEFAULT_LIST_LIMIT;
    const rest = this.currentObjects(record.value, input.prefix ?? '').filter(([key]) => continuationToken === undefined || key > continuationToken);
    const page = rest.slice(0, limit);
    const isTruncated = rest.length > page.length;

    return ok({
      status: 200,
      objects: page.map(([key, object]) => ({ key, size: object.body.byteLength, etag: object.etag, lastModified: object.lastModified })),
      isTruncated,
      nextContinuationToken: isTruncated ? page.at(-1)?.[0] : undefined,
      keyCount: page.length,
    });
  }

  listObjectsV2(input: ListObjectsInput): Promise<GatewayResult<ListObjectsOutput>> {
    return this.call('listObjectsV2', [input], () => this.list(input, input.continuationToken));
  }

  listObjects(input: ListObjectsInput): Promise<GatewayResult<ListObjectsOutput>> {
    return this.call('listObjects', [input], () => {
      const listed = this.list(input);
      if (!listed.ok) return listed;
      const { nextContinuationToken: _token, keyCount: _count, ...v1 } = listed.value;
      return ok(v1);
    });
  }

  listObjectVersions(input: ListObjectsInput): Promise<GatewayResult<ListVersionsOutput>> {
    return this.call('listObjectVersions', [input], () => {
      const record = this.bucket(input.bucket);
      if (!record.ok) return record;

      const prefix = input.prefix ?? '';
      const versions: ObjectVersion[] = [];
      const deleteMarkers: ObjectVersion[] = [];
      const keys = [...record.value.objects.keys()].filter(k => k.startsWith(prefix)).sort();

      for (const key of keys) {
        // Newest first, as S3 lists them.
        const entries = [...(record.value.objects.get(key) ?? [])].reverse();
        for (const [index, entry] of entries.entries()) {
          const listed = { key, versionId: entry.versionId, isLatest: index === 0 };
          (entry.deleteMarker ? deleteMarkers : versions).push(listed);
        }
      }
      return ok({ status: 200, versions, deleteMarkers });
    });
  }

  getObjectTagging(ref: ObjectRef): Promise<GatewayResult<{ tags: Tag[] } & ResponseMeta>> {
    return this.call('getObjectTagging', [ref], () => {
      const record = this.bucket(ref.bucket);
      if (!record.ok) return record;
      const found = this.findObject(record.value, ref.key, ref.versionId);
      if (!found.ok) return found;
      return ok({ status: 200, tags: found.value.tags.map(t => ({ ...t })) });
    });
  }

  putObjectTagging(ref: ObjectRef, tags: Tag[]): Promise<GatewayResult<ResponseMeta>> {
    return this.call('putObjectTagging', [ref, tags], () => {
      const record = this.bucket(ref.bucket);
      if (!record.ok) return record;
      const found = this.findObject(record.value, ref.key, ref.versionId);
      if (!found.ok) return found;
      const valid = validateTags(tags);
      if (!valid.ok) return valid;
      found.value.tags = valid.value;
      return ok({ status: 200 });
    });
  }

  deleteObjectTagging(ref: ObjectRef): Promise<GatewayResult<ResponseMeta>> {
    return this.call('deleteObjectTagging', [ref], () => {
      const record = this.bucket(ref.bucket);
      if (!record.ok) return record;
      const found = this.findObject(record.value, ref.key, ref.versionId);
      if (!found.ok) return found;
      found.value.tags = [];
      return ok({ status: 204 });
    });
  }

  getObjectAttributes(input: GetObjectAttributesInput): Promise<GatewayResult<ObjectAttributes>> {
    return this.call('getObjectAttributes', [input], () => {
      const record = this.bucket(input.bucket);
      if (!record.ok) return record;
      const found = this.findObject(record.value, input.key, undefined);
      if (!found.ok) return found;
      const object = found.value;
      const wants = new Set(input.attributes);

      const attributes: ObjectAttributes = { status: 200 };
      // GetObjectAttributes reports the ETag without quotes.
      if (wants.has('ETag')) attributes.etag = stripQuotes(object.etag);
      if (wants.has('ObjectSize')) attributes.objectSize = object.body.byteLength;
      if (wants.has('StorageClass')) attributes.storageClass = 'STANDARD';
      if (wants.has('ObjectParts') && object.partSizes) {
        attributes.objectParts = {
          totalPartsCount: object.partSizes.length,
          parts: object.partSizes.map((size, i) => ({ partNumber: i + 1, size })),
        };
      }
      return ok(attributes);
    });
  }

  private upload(ref: MultipartRef): Outcome<{ record: BucketRecord; upload: PendingUpload }> {
    const record = this.bucket(ref.bucket);
    if (!record.ok) return record;
    const upload = record.value.uploads.get(ref.uploadId);
    if (!upload || upload.key !== ref.key) {
      return reject('NoSuchUpload', 404, 'The specified multipart upload does not exist');
    }
    return ok({ record: record.value, upload });
  }

  createMultipartUpload(input: CreateMultipartInput): Promise<GatewayResult<{ uploadId: string } & ResponseMeta>> {
    return this.call('createMultipartUpload', [input], () => {
      const record = this.bucket(input.bucket);
      if (!record.ok) return record;
      const key = this.validateKey(input.key);
      if (!key.ok) return key;
      const metadata = this.validateMetadata(lowercaseKeys(input.metadata));
      if (!metadata.ok) return metadata;

      const uploadId = this.nextId('upload');
      record.value.uploads.set(uploadId, {
        key: input.key,
        uploadId,
        headers: { contentType: input.contentType },
        metadata: metadata.value,
        parts: new Map(),
      });
      return ok({ status: 200, uploadId });
    });
  }

  uploadPart(input: UploadPartInput): Promise<GatewayResult<{ etag: string } & ResponseMeta>> {
    return this.call('uploadPart', [input], () => {
      const found = this.upload(input);
      if (!found.ok) return found;
      if (!Number.isInteger(input.partNumber) || input.partNumber < 1 || input.partNumber > 10000) {
        return reject('InvalidArgument', 400, 'Part number must be an integer between 1 and 10000');
      }
      const etag = `"${md5(input.body)}"`;
      found.value.upload.parts.set(input.partNumber, { etag, body: input.body.slice() });
      return ok({ status: 200, etag });
    });
  }

  completeMultipartUpload(input: CompleteMultipartInput): Promise<GatewayResult<CompleteMultipartOutput>> {
    return this.call('completeMultipartUpload', [input], () => {
      const found = this.upload(input);
      if (!found.ok) return found;
      const { record, upload } = found.value;
      if (input.parts.length === 0) {
        return reject('MalformedXML', 400, 'The XML you provided was not well-formed');
      }

      const bodies: Uint8Array[] = [];
      const digests: string[] = [];
      let previous = 0;
      for (const [index, part] of input.parts.entries()) {
        if (part.partNumber <= previous) return reject('InvalidPartOrder', 400, 'The list of parts was not in ascending order');
        previous = part.partNumber;

        const stored = upload.parts.get(part.partNumber);
        if (!stored || stripQuotes(stored.etag) !== stripQuotes(part.etag)) {
          return reject('InvalidPart', 400, `Part ${part.partNumber} could not be found or its ETag did not match`);
        }
        if (index < input.parts.length - 1 && stored.body.byteLength < this.minPartSize) {
          return reject('EntityTooSmall', 400, 'Your proposed upload is smaller than the minimum allowed object size');
        }
        bodies.push(stored.body);
        digests.push(stripQuotes(stored.etag));
      }

      const stored = this.store(record, upload.key, {
        body: concat(bodies),
        etag: `"${md5(digests.join(''))}-${bodies.length}"`,
        headers: upload.headers,
        metadata: upload.metadata,
        tags: [],
        partSizes: bodies.map(b => b.byteLength),
      });
      record.uploads.delete(upload.uploadId);
      return ok({
        status: 200,
        etag: stored.etag,
        location: `memory://local/${record.name}/${upload.key}`,
        versionId: this.visibleVersion(stored),
      });
    });
  }

  abortMultipartUpload(ref: MultipartRef): Promise<GatewayResult<ResponseMeta>> {
    return this.call('abortMultipartUpload', [ref], () => {
      const found = this.upload(ref);
      if (!found.ok) return found;
      found.value.record.uploads.delete(ref.uploadId);
      return ok({ status: 204 });
    });
  }

  listMultipartUploads(bucket: string): Promise<GatewayResult<{ uploads: UploadSummary[] } & ResponseMeta>> {
    return this.call('listMultipartUploads', [bucket], () => {
      const record = this.bucket(bucket);
      if (!record.ok) return record;
      return ok({ status: 200, uploads: [...record.value.uploads.values()].map(u => ({ key: u.key, uploadId: u.uploadId })) });
    });
  }

  listParts(ref: MultipartRef): Promise<GatewayResult<{ parts: PartSummary[] } & ResponseMeta>> {
    return this.call('listParts', [ref], () => {
      const found = this.upload(ref);
      if (!found.ok) return found;
      const parts = [...found.value.upload.parts.entries()]
        .sort(([a], [b]) => a - b)
        .map(([partNumber, part]) => ({ partNumber, etag: part.etag, size: part.body.byteLength }));
      return ok({ status: 200, parts });
    });
  }
}
