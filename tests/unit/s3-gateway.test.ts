/**
 * Unit Tests: S3Gateway request mapping and error normalization.
 *
 * The SDK client is real; only `send` is replaced, so command construction
 * is exercised without a network.
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  CompleteMultipartUploadCommand,
  CopyObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutBucketVersioningCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { GatewayError } from '../../src/errors.js';
import { createSilentLogger } from '../../src/logger.js';
import { S3Gateway, toGatewayError } from '../../src/s3-gateway.js';
import { toBytes } from '../../src/checks/test-data.js';
import { testConfig } from '../helpers/fixtures.js';

const meta = (httpStatusCode: number) => ({ $metadata: { httpStatusCode } });

describe('S3Gateway', () => {
  let send: ReturnType<typeof vi.fn>;
  let gateway: S3Gateway;
  const { connection } = testConfig();

  beforeEach(() => {
    const client = new S3Client({
      endpoint: connection.endpointUrl,
      region: connection.region,
      credentials: { accessKeyId: connection.accessKey, secretAccessKey: connection.secretKey },
    });
    send = vi.fn();
    client.send = send;
    gateway = new S3Gateway(client, { timeoutMs: 200, connection, logger: createSilentLogger() });
  });

  it('masks the access key in connection info', () => {
    expect(gateway.connectionInfo()).toEqual({
      endpoint: 'https://s3.test.invalid',
      region: 'us-east-1',
      verifyTls: true,
      accessKey: 'test-acc...',
    });
  });

  it('maps putObject onto PutObjectCommand', async () => {
    send.mockResolvedValueOnce({ ...meta(200), ETag: '"abc"', VersionId: 'v1' });

    const result = await gateway.putObject({
      bucket: 'b',
      key: 'k.txt',
      body: toBytes('hello'),
      contentType: 'text/plain',
      metadata: { author: 'tester' },
    });

    expect(result).toEqual({ ok: true, value: { status: 200, etag: '"abc"', versionId: 'v1' } });
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutObjectCommand);
    expect(command.input).toMatchObject({ Bucket: 'b', Key: 'k.txt', ContentType: 'text/plain', Metadata: { author: 'tester' } });
  });

  it('reads the body and range headers from getObject', async () => {
    send.mockResolvedValueOnce({
      ...meta(206),
      Body: { transformToByteArray: async () => toBytes('0123') },
      ContentRange: 'bytes 0-3/10',
      ContentLength: 4,
      ETag: '"e"',
      Expires: new Date('2030-01-01T00:00:00.000Z'),
    });

    const result = await gateway.getObject({ bucket: 'b', key: 'k', range: 'bytes=0-3' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.status).toBe(206);
    expect(Buffer.from(result.value.body).toString()).toBe('0123');
    expect(result.value.contentRange).toBe('bytes 0-3/10');
    expect(result.value.expires).toBe('Tue, 01 Jan 2030 00:00:00 GMT');
    expect(result.value.metadata).toEqual({});
    expect(send.mock.calls[0][0]).toBeInstanceOf(GetObjectCommand);
    expect(send.mock.calls[0][0].input).toMatchObject({ Bucket: 'b', Key: 'k', Range: 'bytes=0-3' });
  });

  it('returns an empty body when the response has none', async () => {
    send.mockResolvedValueOnce({ ...meta(200) });
    const result = await gateway.getObject({ bucket: 'b', key: 'empty' });
    expect(result.ok && result.value.body.byteLength).toBe(0);
  });

  it('normalizes service exceptions into a failed result', async () => {
    send.mockRejectedValueOnce(new NoSuchKey({ ...meta(404), message: 'The specified key does not exist.' }));

    const result = await gateway.getObject({ bucket: 'b', key: 'missing' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(GatewayError);
    expect(result.error.code).toBe('NoSuchKey');
    expect(result.error.httpStatus).toBe(404);
    expect(result.error.operation).toBe('get_object');
    expect(result.error.toDetails()).toEqual({ error_code: 'NoSuchKey', status_code: 404, operation: 'get_object' });
  });

  it('turns a hung request into a Timeout error', async () => {
    send.mockReturnValueOnce(new Promise(() => {}));

    const result = await gateway.headBucket('slow-bucket');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('Timeout');
    expect(result.error.httpStatus).toBe(0);
    expect(result.error.message).toBe('head_bucket timed out after 200ms');
  });

  it('URL-encodes the copy source but keeps slashes', async () => {
    send.mockResolvedValueOnce({ ...meta(200), CopyObjectResult: { ETag: '"c"' } });

    const result = await gateway.copyObject({ bucket: 'dst', key: 'copy', sourceBucket: 'src', sourceKey: 'dir/a b.txt', metadataDirective: 'COPY' });

    expect(result).toEqual({ ok: true, value: { status: 200, etag: '"c"', versionId: undefined } });
    expect(send.mock.calls[0][0]).toBeInstanceOf(CopyObjectCommand);
    expect(send.mock.calls[0][0].input.CopySource).toBe('src/dir/a%20b.txt');
  });

  it('passes listing pagination through', async () => {
    send.mockResolvedValueOnce({
      ...meta(200),
      Contents: [{ Key: 'a', Size: 1 }],
      IsTruncated: true,
      NextContinuationToken: 'token-1',
      KeyCount: 1,
    });

    const result = await gateway.listObjectsV2({ bucket: 'b', prefix: 'p/', maxKeys: 1, continuationToken: 'token-0' });

    expect(result.ok && result.value).toEqual({
      status: 200,
      objects: [{ key: 'a', size: 1, etag: undefined, lastModified: undefined }],
      isTruncated: true,
      nextContinuationToken: 'token-1',
      keyCount: 1,
    });
    expect(send.mock.calls[0][0]).toBeInstanceOf(ListObjectsV2Command);
    expect(send.mock.calls[0][0].input).toEqual({ Bucket: 'b', Prefix: 'p/', MaxKeys: 1, ContinuationToken: 'token-0' });
  });

  it('sends the versioning configuration including MFA delete', async () => {
    send.mockResolvedValueOnce({ ...meta(200) });

    await gateway.putBucketVersioning({ bucket: 'b', status: 'Enabled', mfaDelete: 'Enabled' });

    expect(send.mock.calls[0][0]).toBeInstanceOf(PutBucketVersioningCommand);
    expect(send.mock.calls[0][0].input.VersioningConfiguration).toEqual({ Status: 'Enabled', MFADelete: 'Enabled' });
  });

  it('maps completed parts in the order given', async () => {
    send.mockResolvedValueOnce({ ...meta(200), ETag: '"m-2"' });

    await gateway.completeMultipartUpload({
      bucket: 'b',
      key: 'k',
      uploadId: 'u',
      parts: [
        { partNumber: 1, etag: '"p1"' },
        { partNumber: 2, etag: '"p2"' },
      ],
    });

    expect(send.mock.calls[0][0]).toBeInstanceOf(CompleteMultipartUploadCommand);
    expect(send.mock.calls[0][0].input.MultipartUpload).toEqual({
      Parts: [
        { PartNumber: 1, ETag: '"p1"' },
        { PartNumber: 2, ETag: '"p2"' },
      ],
    });
  });

  it('fails createMultipartUpload when no upload id comes back', async () => {
    send.mockResolvedValueOnce({ ...meta(200) });

    const result = await gateway.createMultipartUpload({ bucket: 'b', key: 'k' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('MissingUploadId');
    expect(result.error.operation).toBe('create_multipart_upload');
  });
});

describe('toGatewayError', () => {
  it('keeps an existing GatewayError', () => {
    const original = new GatewayError({ code: 'X', httpStatus: 400, operation: 'put_object', message: 'x' });
    expect(toGatewayError('other', original)).toBe(original);
  });

  it('reads the status of a service exception', () => {
    const error = new S3ServiceException({ name: 'SlowDown', $fault: 'server', ...meta(503), message: 'Please reduce your request rate.' });
    const normalized = toGatewayError('put_object', error);
    expect([normalized.code, normalized.httpStatus, normalized.rawDetails.fault]).toEqual(['SlowDown', 503, 'server']);
  });

  it('reads $metadata from plain errors', () => {
    const error = Object.assign(new Error('bad gateway'), { name: 'BadGateway', ...meta(502) });
    const normalized = toGatewayError('head_bucket', error);
    expect([normalized.code, normalized.httpStatus, normalized.message]).toEqual(['BadGateway', 502, 'bad gateway']);
  });

  it('uses status 0 for network errors', () => {
    const error = Object.assign(new Error('connect ECONNREFUSED'), { name: 'ECONNREFUSED' });
    expect(toGatewayError('list_buckets', error).httpStatus).toBe(0);
  });

  it('wraps non-error values', () => {
    const normalized = toGatewayError('list_buckets', 'weird');
    expect([normalized.code, normalized.message]).toEqual(['UnknownError', 'weird']);
  });
});
