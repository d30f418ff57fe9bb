import { defineCategory } from '../category-runner.js';
import type { Probe, ProbeContext } from '../category-runner.js';
import { bytesEqual } from './assertions.js';
import { putTracked } from './helpers.js';
import { toBytes } from './test-data.js';

interface SyncState {
  /** Root under which the directory tree is uploaded. */
  dirPrefix: string;
  treeUploaded: boolean;
}

type Ctx = ProbeContext<SyncState>;

const DIRECTORY_TREE = [
  'docs/readme.txt',
  'docs/api/overview.txt',
  'docs/api/reference.txt',
  'src/main.ts',
  'src/utils/helper.ts',
  'src/utils/config.ts',
  'tests/main.test.ts',
  'tests/integration/api.test.ts',
];

const PAGE_SIZE = 2;

async function setup(ctx: Ctx): Promise<boolean> {
  ctx.state.dirPrefix = ctx.runner.generateUniqueName('dir-sync');
  return true;
}

/** Uploads every entry, returning the keys that succeeded and total elapsed seconds. */
async function uploadAll(ctx: Ctx, entries: { key: string; body: Uint8Array; contentType?: string }[]): Promise<{ uploaded: string[]; duration: number }> {
  const uploaded: string[] = [];
  let duration = 0;
  for (const entry of entries) {
    const [result, elapsed] = await ctx.runner.timed(() => putTracked(ctx, entry));
    duration += elapsed;
    if (result.ok) {
      uploaded.push(entry.key);
    } else {
      ctx.logger.debug({ key: entry.key, code: result.error.code }, 'sync upload failed');
    }
  }
  return { uploaded, duration };
}

const batchUpload: Probe<SyncState> = {
  name: 'sync_batch_upload',
  async run(ctx: Ctx) {
    const entries = Array.from({ length: 5 }, (_, i) => ({
      key: ctx.runner.generateUniqueName(`batch-upload-${i}`),
      body: toBytes(`Batch upload test data for object ${i}\n`.repeat(10)),
    }));

    const { uploaded, duration } = await uploadAll(ctx, entries);
    const total = entries.length;
    const message =
      uploaded.length === total
        ? `Uploaded ${total} objects in batch`
        : uploaded.length > 0
          ? `Partial batch upload: ${uploaded.length}/${total} objects uploaded`
          : `Batch upload failed: 0/${total} objects uploaded`;

    ctx.runner.addResult(
      'sync_batch_upload',
      uploaded.length === total,
      message,
      { objects_count: total, successful_uploads: uploaded.length, average_duration: duration / total },
      duration,
    );
  },
};

const directoryStructure: Probe<SyncState> = {
  name: 'sync_directory_structure',
  async run(ctx: Ctx) {
    const entries = DIRECTORY_TREE.map(path => ({
      key: `${ctx.state.dirPrefix}/${path}`,
      body: toBytes(`Content of ${path}\nGenerated for sync testing\n`),
      contentType: 'text/plain',
    }));

    const { uploaded, duration } = await uploadAll(ctx, entries);
    ctx.state.treeUploaded = uploaded.length === entries.length;

    ctx.runner.addResult(
      'sync_directory_structure',
      ctx.state.treeUploaded,
      ctx.state.treeUploaded
        ? `Uploaded directory structure (${uploaded.length} files)`
        : `Directory structure upload failed: ${uploaded.length}/${entries.length} files`,
      { prefix: ctx.state.dirPrefix, files_count: entries.length, successful_uploads: uploaded.length },
      duration,
    );
  },
};

const batchDownload: Probe<SyncState> = {
  name: 'sync_batch_download',
  async run(ctx: Ctx) {
    const entries = Array.from({ length: 3 }, (_, i) => ({
      key: ctx.runner.generateUniqueName(`download-test-${i}`),
      body: toBytes(`Download test content for object ${i}\n`.repeat(50)),
    }));
    const { uploaded } = await uploadAll(ctx, entries);
    const available = entries.filter(entry => uploaded.includes(entry.key));

    if (available.length === 0) {
      ctx.runner.fail('sync_batch_download', 'No objects available for batch download', { bucket: ctx.bucket });
      return;
    }

    let downloaded = 0;
    let matches = 0;
    let duration = 0;
    for (const entry of available) {
      const [result, elapsed] = await ctx.runner.timed(() => ctx.gateway.getObject({ bucket: ctx.bucket, key: entry.key }));
      duration += elapsed;
      if (!result.ok) continue;
      downloaded++;
      if (bytesEqual(result.value.body, entry.body)) matches++;
    }

    const total = available.length;
    const success = downloaded === total && matches === total;
    ctx.runner.addResult(
      'sync_batch_download',
      success,
      success
        ? `Downloaded and verified ${downloaded} objects`
        : `Batch download issues: ${downloaded}/${total} downloaded, ${matches}/${total} data matches`,
      { objects_count: total, successful_downloads: downloaded, data_matches: matches },
      duration,
    );
  },
};

const listingByPrefix: Probe<SyncState> = {
  name: 'sync_listing_prefix',
  async run(ctx: Ctx) {
    if (!ctx.state.treeUploaded) {
      ctx.runner.fail('sync_listing_prefix', 'No directory structure available; an earlier probe did not complete', { prefix: ctx.state.dirPrefix });
      return;
    }

    const prefix = `${ctx.state.dirPrefix}/docs/`;
    const expected = DIRECTORY_TREE.filter(path => path.startsWith('docs/')).map(path => `${ctx.state.dirPrefix}/${path}`);
    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.listObjectsV2({ bucket: ctx.bucket, prefix }));
    if (!result.ok) {
      ctx.runner.fail('sync_listing_prefix', `Listing by prefix failed: ${result.error.code}`, { prefix, ...result.error.toDetails() }, duration);
      return;
    }

    const keys = result.value.objects.map(o => o.key);
    const success = keys.length === expected.length && expected.every(key => keys.includes(key));
    ctx.runner.addResult(
      'sync_listing_prefix',
      success,
      success ? `Listed ${keys.length} objects under ${prefix}` : `Expected ${expected.length} objects under ${prefix}, found ${keys.length}`,
      { prefix, objects_found: keys.length, expected_count: expected.length },
      duration,
    );
  },
};

const listingPagination: Probe<SyncState> = {
  name: 'sync_listing_pagination',
  async run(ctx: Ctx) {
    if (!ctx.state.treeUploaded) {
      ctx.runner.fail('sync_listing_pagination', 'No directory structure available; an earlier probe did not complete', { prefix: ctx.state.dirPrefix });
      return;
    }

    const prefix = `${ctx.state.dirPrefix}/`;
    const keys: string[] = [];
    const pageSizes: number[] = [];
    let token: string | undefined;
    let duration = 0;

    do {
      const [page, elapsed] = await ctx.runner.timed(() =>
        ctx.gateway.listObjectsV2({ bucket: ctx.bucket, prefix, maxKeys: PAGE_SIZE, continuationToken: token }),
      );
      duration += elapsed;
      if (!page.ok) {
        ctx.runner.fail('sync_listing_pagination', `Paginated listing failed after ${pageSizes.length} page(s): ${page.error.code}`, page.error.toDetails(), duration);
        return;
      }
      pageSizes.push(page.value.objects.length);
      keys.push(...page.value.objects.map(o => o.key));
      token = page.value.isTruncated ? page.value.nextContinuationToken : undefined;
    } while (token);

    const expectedCount = DIRECTORY_TREE.length;
    const withinPageSize = pageSizes.every(size => size <= PAGE_SIZE);
    const complete = new Set(keys).size === expectedCount && keys.length === expectedCount;
    ctx.runner.addResult(
      'sync_listing_pagination',
      withinPageSize && complete,
      `Paginated listing returned ${keys.length}/${expectedCount} objects over ${pageSizes.length} page(s)`,
      { max_keys: PAGE_SIZE, page_sizes: pageSizes, objects_returned: keys.length },
      duration,
    );
  },
};

export const syncCategory = defineCategory<SyncState>({
  name: 'sync',
  description: 'Sync-style batch uploads, downloads, prefix listing and pagination',
  bucketPrefix: 'sync-test-bucket',
  initialState: () => ({ dirPrefix: '', treeUploaded: false }),
  setup,
  probes: [batchUpload, directoryStructure, batchDownload, listingByPrefix, listingPagination],
});
