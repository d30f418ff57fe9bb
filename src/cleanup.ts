import { CleanupError, GatewayError, describeError } from './errors.js';
import type { GatewayResult, StorageGateway } from './gateway.js';
import type { Logger } from './logger.js';

export type CleanupItem =
  | { kind: 'object'; bucket: string; key: string; versionId?: string }
  | { kind: 'multipart_upload'; bucket: string; key: string; uploadId: string }
  | { kind: 'bucket'; name: string };

export type CleanupKind = CleanupItem['kind'];

// Objects go before uploads, uploads before their bucket.
const PRIORITY: Record<CleanupKind, number> = {
  object: 0,
  multipart_upload: 1,
  bucket: 2,
};

export function describeItem(item: CleanupItem): string {
  switch (item.kind) {
    case 'object':
      return `object ${item.bucket}/${item.key}${item.versionId ? ` (version ${item.versionId})` : ''}`;
    case 'multipart_upload':
      return `multipart upload ${item.bucket}/${item.key} (${item.uploadId})`;
    case 'bucket':
      return `bucket ${item.name}`;
  }
}

function isMissing(error: GatewayError): boolean {
  return error.httpStatus === 404;
}

/**
 * Resources created by one category's probes. Items are registered only
 * after the store confirmed the creation, and drained once in dependency
 * order. Teardown failures are collected, never thrown.
 */
export class CleanupRegistry {
  private items: CleanupItem[] = [];
  private readonly gateway: StorageGateway;
  private readonly logger: Logger;

  constructor(gateway: StorageGateway, logger: Logger) {
    this.gateway = gateway;
    this.logger = logger;
  }

  register(item: CleanupItem): void {
    this.items.push(item);
    this.logger.debug({ resource: describeItem(item) }, 'registered for cleanup');
  }

  /** Drops matching items, for resources a probe already removed or replaced. */
  remove(predicate: (item: CleanupItem) => boolean): number {
    const before = this.items.length;
    this.items = this.items.filter(item => !predicate(item));
    return before - this.items.length;
  }

  get size(): number {
    return this.items.length;
  }

  pending(): readonly CleanupItem[] {
    return this.items.slice();
  }

  async drain(): Promise<CleanupError[]> {
    // Take ownership of the queue first so a second drain is a no-op.
    const queue = this.items
      .map((item, index) => ({ item, index }))
      .sort((a, b) => PRIORITY[a.item.kind] - PRIORITY[b.item.kind] || a.index - b.index)
      .map(entry => entry.item);
    this.items = [];

    const errors: CleanupError[] = [];

    for (const item of queue) {
      const resource = describeItem(item);
      try {
        const result = await this.teardown(item);
        if (!result.ok && !isMissing(result.error)) {
          errors.push(new CleanupError(resource, result.error));
          this.logger.warn({ resource, code: result.error.code, status: result.error.httpStatus }, 'cleanup failed');
        } else {
          this.logger.debug({ resource }, 'cleaned up');
        }
      } catch (error) {
        const wrapped = new GatewayError({
          code: 'CleanupException',
          httpStatus: 0,
          operation: 'cleanup',
          message: describeError(error),
        });
        errors.push(new CleanupError(resource, wrapped));
        this.logger.warn({ resource, err: error }, 'cleanup raised');
      }
    }

    if (errors.length > 0) {
      this.logger.warn({ failures: errors.length, attempted: queue.length }, 'cleanup completed with errors');
    }

    return errors;
  }

  private teardown(item: CleanupItem): Promise<GatewayResult<unknown>> {
    switch (item.kind) {
      case 'object':
        return this.gateway.deleteObject({ bucket: item.bucket, key: item.key, versionId: item.versionId });
      case 'multipart_upload':
        return this.gateway.abortMultipartUpload({ bucket: item.bucket, key: item.key, uploadId: item.uploadId });
      case 'bucket':
        return this.teardownBucket(item.name);
    }
  }

  /** Best-effort emptying before the delete; a non-empty bucket cannot be removed. */
  private async teardownBucket(bucket: string): Promise<GatewayResult<unknown>> {
    let token: string | undefined;
    do {
      const listed = await this.gateway.listObjectsV2({ bucket, continuationToken: token });
      if (!listed.ok) break;
      for (const object of listed.value.objects) {
        await this.gateway.deleteObject({ bucket, key: object.key });
      }
      token = listed.value.isTruncated ? listed.value.nextContinuationToken : undefined;
    } while (token);

    const versions = await this.gateway.listObjectVersions({ bucket });
    if (versions.ok) {
      for (const version of [...versions.value.versions, ...versions.value.deleteMarkers]) {
        await this.gateway.deleteObject({ bucket, key: version.key, versionId: version.versionId });
      }
    }

    return this.gateway.deleteBucket(bucket);
  }
}
