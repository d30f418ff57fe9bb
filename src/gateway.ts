import type { GatewayError } from './errors.js';
import type { Result } from './result.js';

export type GatewayResult<T> = Result<T, GatewayError>;

/** HTTP status of the response that produced a successful payload. */
export interface ResponseMeta {
  status: number;
}

export interface Tag {
  key: string;
  value: string;
}

export type Metadata = Record<string, string>;

export interface BucketSummary {
  name?: string;
  creationDate?: Date;
}

export interface ObjectSummary {
  key: string;
  size?: number;
  etag?: string;
  lastModified?: Date;
}

export interface PutObjectInput {
  bucket: string;
  key: string;
  body: Uint8Array;
  contentType?: string;
  contentEncoding?: string;
  contentDisposition?: string;
  contentLanguage?: string;
  cacheControl?: string;
  expires?: Date;
  metadata?: Metadata;
}

export interface PutObjectOutput extends ResponseMeta {
  etag?: string;
  versionId?: string;
}

export interface GetObjectInput {
  bucket: string;
  key: string;
  range?: string;
  versionId?: string;
  ifMatch?: string;
}

export interface ObjectHead extends ResponseMeta {
  contentLength?: number;
  contentType?: string;
  contentEncoding?: string;
  contentDisposition?: string;
  contentLanguage?: string;
  cacheControl?: string;
  expires?: string;
  etag?: string;
  lastModified?: Date;
  versionId?: string;
  metadata: Metadata;
}

export interface GetObjectOutput extends ObjectHead {
  body: Uint8Array;
  contentRange?: string;
}

export interface ObjectRef {
  bucket: string;
  key: string;
  versionId?: string;
}

export interface DeleteObjectOutput extends ResponseMeta {
  versionId?: string;
  deleteMarker?: boolean;
}

export type MetadataDirective = 'COPY' | 'REPLACE';

export interface CopyObjectInput {
  bucket: string;
  key: string;
  sourceBucket: string;
  sourceKey: string;
  metadataDirective?: MetadataDirective;
  metadata?: Metadata;
  contentType?: string;
}

export interface CopyObjectOutput extends ResponseMeta {
  etag?: string;
  versionId?: string;
}

export interface ListObjectsInput {
  bucket: string;
  prefix?: string;
  maxKeys?: number;
  continuationToken?: string;
}

export interface ListObjectsOutput extends ResponseMeta {
  objects: ObjectSummary[];
  isTruncated: boolean;
  nextContinuationToken?: string;
  keyCount?: number;
}

export interface ObjectVersion {
  key: string;
  versionId: string;
  isLatest: boolean;
}

export interface ListVersionsOutput extends ResponseMeta {
  versions: ObjectVersion[];
  deleteMarkers: ObjectVersion[];
}

export type ObjectAttributeName = 'ETag' | 'ObjectSize' | 'StorageClass' | 'ObjectParts' | 'Checksum';

export interface GetObjectAttributesInput {
  bucket: string;
  key: string;
  attributes: ObjectAttributeName[];
  maxParts?: number;
}

export interface ObjectAttributes extends ResponseMeta {
  etag?: string;
  objectSize?: number;
  storageClass?: string;
  objectParts?: {
    totalPartsCount?: number;
    parts: { partNumber?: number; size?: number }[];
  };
}

export interface CreateMultipartInput {
  bucket: string;
  key: string;
  contentType?: string;
  metadata?: Metadata;
}

export interface UploadPartInput {
  bucket: string;
  key: string;
  uploadId: string;
  partNumber: number;
  body: Uint8Array;
}

export interface CompletedPart {
  partNumber: number;
  etag: string;
}

export interface MultipartRef {
  bucket: string;
  key: string;
  uploadId: string;
}

export interface CompleteMultipartInput extends MultipartRef {
  parts: CompletedPart[];
}

export interface CompleteMultipartOutput extends ResponseMeta {
  etag?: string;
  location?: string;
  versionId?: string;
}

export interface PartSummary {
  partNumber: number;
  etag?: string;
  size?: number;
}

export interface UploadSummary {
  key: string;
  uploadId: string;
}

export type VersioningStatus = 'Enabled' | 'Suspended';

export interface PutVersioningInput {
  bucket: string;
  status: VersioningStatus;
  /** Sends an MFA-delete setting without an MFA token when set. */
  mfaDelete?: 'Enabled' | 'Disabled';
}

export interface ConnectionInfo {
  endpoint: string;
  region: string;
  verifyTls: boolean;
  accessKey: string;
}

/**
 * Capability over a remote S3-compatible store. Every operation resolves to
 * a GatewayResult; no operation rejects. Retries happen behind this seam.
 */
export interface StorageGateway {
  connectionInfo(): ConnectionInfo;

  listBuckets(): Promise<GatewayResult<{ buckets: BucketSummary[] } & ResponseMeta>>;
  createBucket(bucket: string): Promise<GatewayResult<ResponseMeta>>;
  deleteBucket(bucket: string): Promise<GatewayResult<ResponseMeta>>;
  headBucket(bucket: string): Promise<GatewayResult<ResponseMeta>>;
  getBucketPolicy(bucket: string): Promise<GatewayResult<{ policy?: string } & ResponseMeta>>;

  getBucketVersioning(bucket: string): Promise<GatewayResult<{ versioningStatus?: string } & ResponseMeta>>;
  putBucketVersioning(input: PutVersioningInput): Promise<GatewayResult<ResponseMeta>>;

  getBucketTagging(bucket: string): Promise<GatewayResult<{ tags: Tag[] } & ResponseMeta>>;
  putBucketTagging(bucket: string, tags: Tag[]): Promise<GatewayResult<ResponseMeta>>;
  deleteBucketTagging(bucket: string): Promise<GatewayResult<ResponseMeta>>;

  putObject(input: PutObjectInput): Promise<GatewayResult<PutObjectOutput>>;
  getObject(input: GetObjectInput): Promise<GatewayResult<GetObjectOutput>>;
  headObject(ref: ObjectRef): Promise<GatewayResult<ObjectHead>>;
  deleteObject(ref: ObjectRef): Promise<GatewayResult<DeleteObjectOutput>>;
  copyObject(input: CopyObjectInput): Promise<GatewayResult<CopyObjectOutput>>;
  listObjectsV2(input: ListObjectsInput): Promise<GatewayResult<ListObjectsOutput>>;
  listObjects(input: ListObjectsInput): Promise<GatewayResult<ListObjectsOutput>>;
  listObjectVersions(input: ListObjectsInput): Promise<GatewayResult<ListVersionsOutput>>;

  getObjectTagging(ref: ObjectRef): Promise<GatewayResult<{ tags: Tag[] } & ResponseMeta>>;
  putObjectTagging(ref: ObjectRef, tags: Tag[]): Promise<GatewayResult<ResponseMeta>>;
  deleteObjectTagging(ref: ObjectRef): Promise<GatewayResult<ResponseMeta>>;
  getObjectAttributes(input: GetObjectAttributesInput): Promise<GatewayResult<ObjectAttributes>>;

  createMultipartUpload(input: CreateMultipartInput): Promise<GatewayResult<{ uploadId: string } & ResponseMeta>>;
  uploadPart(input: UploadPartInput): Promise<GatewayResult<{ etag: string } & ResponseMeta>>;
  completeMultipartUpload(input: CompleteMultipartInput): Promise<GatewayResult<CompleteMultipartOutput>>;
  abortMultipartUpload(ref: MultipartRef): Promise<GatewayResult<ResponseMeta>>;
  listMultipartUploads(bucket: string): Promise<GatewayResult<{ uploads: UploadSummary[] } & ResponseMeta>>;
  listParts(ref: MultipartRef): Promise<GatewayResult<{ parts: PartSummary[] } & ResponseMeta>>;
}
