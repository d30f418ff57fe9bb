import { Agent } from 'node:https';
import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CopyObjectCommand,
  CreateBucketCommand,
  CreateMultipartUploadCommand,
  DeleteBucketCommand,
  DeleteBucketTaggingCommand,
  DeleteObjectCommand,
  DeleteObjectTaggingCommand,
  GetBucketPolicyCommand,
  GetBucketTaggingCommand,
  GetBucketVersioningCommand,
  GetObjectAttributesCommand,
  GetObjectCommand,
  GetObjectTaggingCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListMultipartUploadsCommand,
  ListObjectsCommand,
  ListObjectsV2Command,
  ListObjectVersionsCommand,
  ListPartsCommand,
  PutBucketTaggingCommand,
  PutBucketVersioningCommand,
  PutObjectCommand,
  PutObjectTaggingCommand,
  S3Client,
  S3ServiceException,
  UploadPartCommand,
} from '@aws-sdk/client-s3';
import type { Tag as S3Tag } from '@aws-sdk/client-s3';
import type { ConnectionConfig } from './config.js';
import { GatewayError } from './errors.js';
import type {
  CompleteMultipartInput,
  ConnectionInfo,
  CopyObjectInput,
  CreateMultipartInput,
  GatewayResult,
  GetObjectAttributesInput,
  GetObjectInput,
  ListObjectsInput,
  MultipartRef,
  ObjectHead,
  ObjectRef,
  PutObjectInput,
  PutVersioningInput,
  StorageGateway,
  Tag,
  UploadPartInput,
} from './gateway.js';
import type { Logger } from './logger.js';
import { err, ok } from './result.js';

export interface S3GatewayOptions {
  /** Per-operation timeout in milliseconds. */
  timeoutMs: number;
  connection: ConnectionConfig;
  logger: Logger;
}

interface HasMetadata {
  $metadata: { httpStatusCode?: number };
}

class OperationTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'Timeout';
  }
}

export function createS3Client(connection: ConnectionConfig): S3Client {
  return new S3Client({
    endpoint: connection.endpointUrl,
    region: connection.region,
    credentials: {
      accessKeyId: connection.accessKey,
      secretAccessKey: connection.secretKey,
    },
    forcePathStyle: connection.forcePathStyle,
    maxAttempts: connection.maxRetries + 1,
    requestHandler: {
      httpsAgent: new Agent({ rejectUnauthorized: connection.verifyTls }),
    },
  });
}

function statusOf(output: HasMetadata): number {
  return output.$metadata.httpStatusCode ?? 200;
}

function readStatus(error: object): number {
  if ('$metadata' in error) {
    const meta = error.$metadata;
    if (typeof meta === 'object' && meta !== null && 'httpStatusCode' in meta && typeof meta.httpStatusCode === 'number') {
      return meta.httpStatusCode;
    }
  }
  return 0;
}

/** Normalizes anything the SDK throws into a GatewayError. */
export function toGatewayError(operation: string, error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  if (error instanceof S3ServiceException) {
    return new GatewayError({
      code: error.name,
      httpStatus: error.$metadata.httpStatusCode ?? 0,
      operation,
      message: error.message,
      rawDetails: {
        requestId: error.$metadata.requestId,
        fault: error.$fault,
      },
    });
  }
  if (error instanceof Error) {
    return new GatewayError({
      code: error.name,
      httpStatus: readStatus(error),
      operation,
      message: error.message,
    });
  }
  return new GatewayError({
    code: 'UnknownError',
    httpStatus: 0,
    operation,
    message: String(error),
  });
}

function toS3Tags(tags: Tag[]): S3Tag[] {
  return tags.map((t) => ({ Key: t.key, Value: t.value }));
}

function fromS3Tags(tags: S3Tag[] | undefined): Tag[] {
  return (tags ?? []).map((t) => ({ key: t.Key ?? '', value: t.Value ?? '' }));
}

function encodeCopySource(bucket: string, key: string): string {
  return `${bucket}/${encodeURIComponent(key).replace(/%2F/g, '/')}`;
}

/**
 * StorageGateway backed by the AWS SDK. Retries are delegated to the SDK's
 * retry strategy (maxAttempts); every call is raced against the configured
 * operation timeout.
 */
export class S3Gateway implements StorageGateway {
  private readonly client: S3Client;
  private readonly timeoutMs: number;
  private readonly connection: ConnectionConfig;
  private readonly logger: Logger;

  constructor(client: S3Client, options: S3GatewayOptions) {
    this.client = client;
    this.timeoutMs = options.timeoutMs;
    this.connection = options.connection;
    this.logger = options.logger;
  }

  static fromConfig(connection: ConnectionConfig, timeoutMs: number, logger: Logger): S3Gateway {
    return new S3Gateway(createS3Client(connection), {
      timeoutMs,
      connection,
      logger: logger.child({ component: 'gateway' }),
    });
  }

  connectionInfo(): ConnectionInfo {
    return {
      endpoint: this.connection.endpointUrl,
      region: this.connection.region,
      verifyTls: this.connection.verifyTls,
      accessKey: `${this.connection.accessKey.slice(0, 8)}...`,
    };
  }

  private async call<T>(operation: string, params: Record<string, unknown>, fn: () => Promise<T>): Promise<GatewayResult<T>> {
    this.logger.debug({ operation, ...params }, 'request');
    const started = performance.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new OperationTimeoutError(operation, this.timeoutMs)), this.timeoutMs);
    });

    try {
      const value = await Promise.race([fn(), timeout]);
      this.logger.debug({ operation, durationMs: Math.round(performance.now() - started) }, 'response');
      return ok(value);
    } catch (error) {
      const gatewayError = toGatewayError(operation, error);
      this.logger.debug(
        { operation, code: gatewayError.code, status: gatewayError.httpStatus, durationMs: Math.round(performance.now() - started) },
        'error response',
      );
      return err(gatewayError);
    } finally {
      clearTimeout(timer);
    }
  }

  listBuckets() {
    return this.call('list_buckets', {}, async () => {
      const out = await this.client.send(new ListBucketsCommand({}));
      return {
        status: statusOf(out),
        buckets: (out.Buckets ?? []).map((b) => ({ name: b.Name, creationDate: b.CreationDate })),
      };
    });
  }

  createBucket(bucket: string) {
    return this.call('create_bucket', { bucket }, async () => {
      const out = await this.client.send(new CreateBucketCommand({ Bucket: bucket }));
      return { status: statusOf(out) };
    });
  }

  deleteBucket(bucket: string) {
    return this.call('delete_bucket', { bucket }, async () => {
      const out = await this.client.send(new DeleteBucketCommand({ Bucket: bucket }));
      return { status: statusOf(out) };
    });
  }

  headBucket(bucket: string) {
    return this.call('head_bucket', { bucket }, async () => {
      const out = await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return { status: statusOf(out) };
    });
  }

  getBucketPolicy(bucket: string) {
    return this.call('get_bucket_policy', { bucket }, async () => {
      const out = await this.client.send(new GetBucketPolicyCommand({ Bucket: bucket }));
      return { status: statusOf(out), policy: out.Policy };
    });
  }

  getBucketVersioning(bucket: string) {
    return this.call('get_bucket_versioning', { bucket }, async () => {
      const out = await this.client.send(new GetBucketVersioningCommand({ Bucket: bucket }));
      return { status: statusOf(out), versioningStatus: out.Status };
    });
  }

  putBucketVersioning(input: PutVersioningInput) {
    return this.call('put_bucket_versioning', { bucket: input.bucket, versioning: input.status }, async () => {
      const out = await this.client.send(
        new PutBucketVersioningCommand({
          Bucket: input.bucket,
          VersioningConfiguration: { Status: input.status, MFADelete: input.mfaDelete },
        }),
      );
      return { status: statusOf(out) };
    });
  }

  getBucketTagging(bucket: string) {
    return this.call('get_bucket_tagging', { bucket }, async () => {
      const out = await this.client.send(new GetBucketTaggingCommand({ Bucket: bucket }));
      return { status: statusOf(out), tags: fromS3Tags(out.TagSet) };
    });
  }

  putBucketTagging(bucket: string, tags: Tag[]) {
    return this.call('put_bucket_tagging', { bucket, tagCount: tags.length }, async () => {
      const out = await this.client.send(new PutBucketTaggingCommand({ Bucket: bucket, Tagging: { TagSet: toS3Tags(tags) } }));
      return { status: statusOf(out) };
    });
  }

  deleteBucketTagging(bucket: string) {
    return this.call('delete_bucket_tagging', { bucket }, async () => {
      const out = await this.client.send(new DeleteBucketTaggingCommand({ Bucket: bucket }));
      return { status: statusOf(out) };
    });
  }

  putObject(input: PutObjectInput) {
    return this.call('put_object', { bucket: input.bucket, key: input.key, size: input.body.byteLength }, async () => {
      const out = await this.client.send(
        new PutObjectCommand({
          Bucket: input.bucket,
          Key: input.key,
          Body: input.body,
          ContentType: input.contentType,
          ContentEncoding: input.contentEncoding,
          ContentDisposition: input.contentDisposition,
          ContentLanguage: input.contentLanguage,
          CacheControl: input.cacheControl,
          Expires: input.expires,
          Metadata: input.metadata,
        }),
      );
      return { status: statusOf(out), etag: out.ETag, versionId: out.VersionId };
    });
  }

  getObject(input: GetObjectInput) {
    return this.call('get_object', { bucket: input.bucket, key: input.key, range: input.range }, async () => {
      const out = await this.client.send(
        new GetObjectCommand({
          Bucket: input.bucket,
          Key: input.key,
          Range: input.range,
          VersionId: input.versionId,
          IfMatch: input.ifMatch,
        }),
      );
      const body = out.Body ? await out.Body.transformToByteArray() : new Uint8Array(0);
      return {
        status: statusOf(out),
        body,
        contentRange: out.ContentRange,
        contentLength: out.ContentLength,
        contentType: out.ContentType,
        contentEncoding: out.ContentEncoding,
        contentDisposition: out.ContentDisposition,
        contentLanguage: out.ContentLanguage,
        cacheControl: out.CacheControl,
        expires: out.Expires?.toUTCString(),
        etag: out.ETag,
        lastModified: out.LastModified,
        versionId: out.VersionId,
        metadata: out.Metadata ?? {},
      };
    });
  }

  headObject(ref: ObjectRef) {
    return this.call('head_object', { ...ref }, async (): Promise<ObjectHead> => {
      const out = await this.client.send(new HeadObjectCommand({ Bucket: ref.bucket, Key: ref.key, VersionId: ref.versionId }));
      return {
        status: statusOf(out),
        contentLength: out.ContentLength,
        contentType: out.ContentType,
        contentEncoding: out.ContentEncoding,
        contentDisposition: out.ContentDisposition,
        contentLanguage: out.ContentLanguage,
        cacheControl: out.CacheControl,
        expires: out.Expires?.toUTCString(),
        etag: out.ETag,
        lastModified: out.LastModified,
        versionId: out.VersionId,
        metadata: out.Metadata ?? {},
      };
    });
  }

  deleteObject(ref: ObjectRef) {
    return this.call('delete_object', { ...ref }, async () => {
      const out = await this.client.send(new DeleteObjectCommand({ Bucket: ref.bucket, Key: ref.key, VersionId: ref.versionId }));
      return { status: statusOf(out), versionId: out.VersionId, deleteMarker: out.DeleteMarker };
    });
  }

  copyObject(input: CopyObjectInput) {
    return this.call('copy_object', { bucket: input.bucket, key: input.key, source: `${input.sourceBucket}/${input.sourceKey}` }, async () => {
      const out = await this.client.send(
        new CopyObjectCommand({
          Bucket: input.bucket,
          Key: input.key,
          CopySource: encodeCopySource(input.sourceBucket, input.sourceKey),
          MetadataDirective: input.metadataDirective,
          Metadata: input.metadata,
          ContentType: input.contentType,
        }),
      );
      return { status: statusOf(out), etag: out.CopyObjectResult?.ETag, versionId: out.VersionId };
    });
  }

  listObjectsV2(input: ListObjectsInput) {
    return this.call('list_objects_v2', { ...input }, async () => {
      const out = await this.client.send(
        new ListObjectsV2Command({
          Bucket: input.bucket,
          Prefix: input.prefix,
          MaxKeys: input.maxKeys,
          ContinuationToken: input.continuationToken,
        }),
      );
      return {
        status: statusOf(out),
        objects: (out.Contents ?? []).map((o) => ({ key: o.Key ?? '', size: o.Size, etag: o.ETag, lastModified: o.LastModified })),
        isTruncated: out.IsTruncated ?? false,
        nextContinuationToken: out.NextContinuationToken,
        keyCount: out.KeyCount,
      };
    });
  }

  listObjects(input: ListObjectsInput) {
    return this.call('list_objects', { ...input }, async () => {
      const out = await this.client.send(new ListObjectsCommand({ Bucket: input.bucket, Prefix: input.prefix, MaxKeys: input.maxKeys }));
      return {
        status: statusOf(out),
        objects: (out.Contents ?? []).map((o) => ({ key: o.Key ?? '', size: o.Size, etag: o.ETag, lastModified: o.LastModified })),
        isTruncated: out.IsTruncated ?? false,
      };
    });
  }

  listObjectVersions(input: ListObjectsInput) {
    return this.call('list_object_versions', { ...input }, async () => {
      const out = await this.client.send(new ListObjectVersionsCommand({ Bucket: input.bucket, Prefix: input.prefix, MaxKeys: input.maxKeys }));
      return {
        status: statusOf(out),
        versions: (out.Versions ?? []).map((v) => ({ key: v.Key ?? '', versionId: v.VersionId ?? '', isLatest: v.IsLatest ?? false })),
        deleteMarkers: (out.DeleteMarkers ?? []).map((d) => ({ key: d.Key ?? '', versionId: d.VersionId ?? '', isLatest: d.IsLatest ?? false })),
      };
    });
  }

  getObjectTagging(ref: ObjectRef) {
    return this.call('get_object_tagging', { ...ref }, async () => {
      const out = await this.client.send(new GetObjectTaggingCommand({ Bucket: ref.bucket, Key: ref.key, VersionId: ref.versionId }));
      return { status: statusOf(out), tags: fromS3Tags(out.TagSet) };
    });
  }

  putObjectTagging(ref: ObjectRef, tags: Tag[]) {
    return this.call('put_object_tagging', { ...ref, tagCount: tags.length }, async () => {
      const out = await this.client.send(
        new PutObjectTaggingCommand({ Bucket: ref.bucket, Key: ref.key, VersionId: ref.versionId, Tagging: { TagSet: toS3Tags(tags) } }),
      );
      return { status: statusOf(out) };
    });
  }

  deleteObjectTagging(ref: ObjectRef) {
    return this.call('delete_object_tagging', { ...ref }, async () => {
      const out = await this.client.send(new DeleteObjectTaggingCommand({ Bucket: ref.bucket, Key: ref.key, VersionId: ref.versionId }));
      return { status: statusOf(out) };
    });
  }

  getObjectAttributes(input: GetObjectAttributesInput) {
    return this.call('get_object_attributes', { bucket: input.bucket, key: input.key, attributes: input.attributes }, async () => {
      const out = await this.client.send(
        new GetObjectAttributesCommand({
          Bucket: input.bucket,
          Key: input.key,
          ObjectAttributes: input.attributes,
          MaxParts: input.maxParts,
        }),
      );
      return {
        status: statusOf(out),
        etag: out.ETag,
        objectSize: out.ObjectSize,
        storageClass: out.StorageClass,
        ...(out.ObjectParts && {
          objectParts: {
            totalPartsCount: out.ObjectParts.TotalPartsCount,
            parts: (out.ObjectParts.Parts ?? []).map((p) => ({ partNumber: p.PartNumber, size: p.Size })),
          },
        }),
      };
    });
  }

  createMultipartUpload(input: CreateMultipartInput) {
    return this.call('create_multipart_upload', { bucket: input.bucket, key: input.key }, async () => {
      const out = await this.client.send(
        new CreateMultipartUploadCommand({
          Bucket: input.bucket,
          Key: input.key,
          ContentType: input.contentType,
          Metadata: input.metadata,
        }),
      );
      if (!out.UploadId) {
        throw new GatewayError({
          code: 'MissingUploadId',
          httpStatus: statusOf(out),
          operation: 'create_multipart_upload',
          message: 'Response did not include an UploadId',
        });
      }
      return { status: statusOf(out), uploadId: out.UploadId };
    });
  }

  uploadPart(input: UploadPartInput) {
    return this.call('upload_part', { bucket: input.bucket, key: input.key, partNumber: input.partNumber, size: input.body.byteLength }, async () => {
      const out = await this.client.send(
        new UploadPartCommand({
          Bucket: input.bucket,
          Key: input.key,
          UploadId: input.uploadId,
          PartNumber: input.partNumber,
          Body: input.body,
        }),
      );
      if (!out.ETag) {
        throw new GatewayError({
          code: 'MissingETag',
          httpStatus: statusOf(out),
          operation: 'upload_part',
          message: `Part ${input.partNumber} response did not include an ETag`,
        });
      }
      return { status: statusOf(out), etag: out.ETag };
    });
  }

  completeMultipartUpload(input: CompleteMultipartInput) {
    return this.call('complete_multipart_upload', { bucket: input.bucket, key: input.key, partCount: input.parts.length }, async () => {
      const out = await this.client.send(
        new CompleteMultipartUploadCommand({
          Bucket: input.bucket,
          Key: input.key,
          UploadId: input.uploadId,
          MultipartUpload: { Parts: input.parts.map((p) => ({ PartNumber: p.partNumber, ETag: p.etag })) },
        }),
      );
      return { status: statusOf(out), etag: out.ETag, location: out.Location, versionId: out.VersionId };
    });
  }

  abortMultipartUpload(ref: MultipartRef) {
    return this.call('abort_multipart_upload', { ...ref }, async () => {
      const out = await this.client.send(new AbortMultipartUploadCommand({ Bucket: ref.bucket, Key: ref.key, UploadId: ref.uploadId }));
      return { status: statusOf(out) };
    });
  }

  listMultipartUploads(bucket: string) {
    return this.call('list_multipart_uploads', { bucket }, async () => {
      const out = await this.client.send(new ListMultipartUploadsCommand({ Bucket: bucket }));
      return {
        status: statusOf(out),
        uploads: (out.Uploads ?? []).map((u) => ({ key: u.Key ?? '', uploadId: u.UploadId ?? '' })),
      };
    });
  }

  listParts(ref: MultipartRef) {
    return this.call('list_parts', { ...ref }, async () => {
      const out = await this.client.send(new ListPartsCommand({ Bucket: ref.bucket, Key: ref.key, UploadId: ref.uploadId }));
      return {
        status: statusOf(out),
        parts: (out.Parts ?? []).map((p) => ({ partNumber: p.PartNumber ?? 0, etag: p.ETag, size: p.Size })),
      };
    });
  }
}
