import { defineCategory } from '../category-runner.js';
import type { Probe, ProbeContext } from '../category-runner.js';
import { ACCEPTED_STATUS, bytesEqual, expectRejection, sameStringSet } from './assertions.js';
import { putTracked, requireState } from './helpers.js';
import { toBytes } from './test-data.js';

interface StoredVersion {
  number: number;
  versionId: string;
  content: Uint8Array;
}

interface VersioningState {
  key: string;
  enabled: boolean;
  versions: StoredVersion[];
  deleted?: StoredVersion;
}

type Ctx = ProbeContext<VersioningState>;

const VERSION_COUNT = 3;

const defaultDisabled: Probe<VersioningState> = {
  name: 'versioning_default_disabled',
  async run(ctx: Ctx) {
    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.getBucketVersioning(ctx.bucket));
    if (!result.ok) {
      ctx.runner.fail('versioning_default_disabled', `GetBucketVersioning failed: ${result.error.code}`, result.error.toDetails(), duration);
      return;
    }
    const status = result.value.versioningStatus;
    const off = status === undefined || status === 'Disabled';
    ctx.runner.addResult(
      'versioning_default_disabled',
      off,
      off ? 'Versioning is off by default' : `New bucket reports versioning ${status}`,
      { versioning_status: status ?? null },
      duration,
    );
  },
};

const enable: Probe<VersioningState> = {
  name: 'versioning_enable',
  async run(ctx: Ctx) {
    const [put, duration] = await ctx.runner.timed(() => ctx.gateway.putBucketVersioning({ bucket: ctx.bucket, status: 'Enabled' }));
    if (!put.ok) {
      ctx.runner.fail('versioning_enable', `Failed to enable versioning: ${put.error.code}`, put.error.toDetails(), duration);
      return;
    }

    const got = await ctx.gateway.getBucketVersioning(ctx.bucket);
    const status = got.ok ? got.value.versioningStatus : undefined;
    ctx.state.enabled = status === 'Enabled';
    ctx.runner.addResult(
      'versioning_enable',
      ctx.state.enabled,
      ctx.state.enabled ? 'Versioning enabled' : `Versioning status after enable: ${status ?? 'unreadable'}`,
      { versioning_status: status ?? null },
      duration,
    );
  },
};

function createVersion(n: number): Probe<VersioningState> {
  const name = `versioning_create_version_${n}`;
  return {
    name,
    async run(ctx: Ctx) {
      const content = toBytes(`Version ${n} content - test data`);
      const [put, duration] = await ctx.runner.timed(() => putTracked(ctx, { key: ctx.state.key, body: content }));
      if (!put.ok) {
        ctx.runner.fail(name, `Failed to write version ${n}: ${put.error.code}`, put.error.toDetails(), duration);
        return;
      }

      const { versionId } = put.value;
      if (!versionId) {
        ctx.runner.fail(name, `Write of version ${n} returned no VersionId`, { key: ctx.state.key, versioning_enabled: ctx.state.enabled }, duration);
        return;
      }

      ctx.state.versions.push({ number: n, versionId, content });
      ctx.runner.pass(name, `Created version ${n}`, { key: ctx.state.key, version_id: versionId }, duration);
    },
  };
}

const listVersions: Probe<VersioningState> = {
  name: 'versioning_list_versions',
  async run(ctx: Ctx) {
    if (ctx.state.versions.length === 0) {
      ctx.runner.fail('versioning_list_versions', 'No object versions available; an earlier probe did not complete');
      return;
    }

    const [result, duration] = await ctx.runner.timed(() => ctx.gateway.listObjectVersions({ bucket: ctx.bucket, prefix: ctx.state.key }));
    if (!result.ok) {
      ctx.runner.fail('versioning_list_versions', `ListObjectVersions failed: ${result.error.code}`, result.error.toDetails(), duration);
      return;
    }

    const listed = result.value.versions.filter(v => v.key === ctx.state.key).map(v => v.versionId);
    const expected = ctx.state.versions.map(v => v.versionId);
    const match = sameStringSet(expected, listed);
    ctx.runner.addResult(
      'versioning_list_versions',
      match,
      match ? `Listed all ${expected.length} versions` : 'Listed versions differ from created versions',
      { expected, listed },
      duration,
    );
  },
};

const getVersions: Probe<VersioningState> = {
  name: 'versioning_get_versions',
  async run(ctx: Ctx) {
    if (ctx.state.versions.length === 0) {
      ctx.runner.fail('versioning_get_versions', 'No object versions available; an earlier probe did not complete');
      return;
    }

    for (const version of ctx.state.versions) {
      const name = `versioning_get_version_${version.number}`;
      const [got, duration] = await ctx.runner.timed(() =>
        ctx.gateway.getObject({ bucket: ctx.bucket, key: ctx.state.key, versionId: version.versionId }),
      );
      if (!got.ok) {
        ctx.runner.fail(name, `Failed to read version ${version.number}: ${got.error.code}`, got.error.toDetails(), duration);
        continue;
      }
      const match = bytesEqual(got.value.body, version.content);
      ctx.runner.addResult(
        name,
        match,
        match ? `Version ${version.number} content matches` : `Version ${version.number} content differs`,
        { version_id: version.versionId },
        duration,
      );
    }
  },
};

const deleteVersion: Probe<VersioningState> = {
  name: 'versioning_delete_version',
  async run(ctx: Ctx) {
    const target = requireState(ctx, 'versioning_delete_version', ctx.state.versions[0], 'object version');
    if (!target) return;

    const [result, duration] = await ctx.runner.timed(() =>
      ctx.gateway.deleteObject({ bucket: ctx.bucket, key: ctx.state.key, versionId: target.versionId }),
    );
    if (!result.ok) {
      ctx.runner.fail('versioning_delete_version', `Failed to delete version ${target.number}: ${result.error.code}`, result.error.toDetails(), duration);
      return;
    }

    ctx.runner.removeCleanupItems(item => item.kind === 'object' && item.versionId === target.versionId);
    ctx.state.deleted = target;
    ctx.runner.pass('versioning_delete_version', `Deleted version ${target.number}`, { version_id: target.versionId }, duration);
  },
};

const verifyDeletedVersion: Probe<VersioningState> = {
  name: 'versioning_delete_verification',
  async run(ctx: Ctx) {
    const deleted = requireState(ctx, 'versioning_delete_verification', ctx.state.deleted, 'deleted version');
    if (!deleted) return;

    await expectRejection(ctx.runner, () => ctx.gateway.getObject({ bucket: ctx.bucket, key: ctx.state.key, versionId: deleted.versionId }), {
      name: 'versioning_delete_verification',
      description: 'GET of a permanently deleted version',
      accepted: ACCEPTED_STATUS.missingOrInvalid,
      details: { version_id: deleted.versionId },
    });
  },
};

export const versioningCategory = defineCategory<VersioningState>({
  name: 'versioning',
  description: 'Bucket versioning: enable, multiple versions, version listing, reads and deletes',
  bucketPrefix: 'versioning-test-bucket',
  initialState: () => ({ key: `versioned-object-${Date.now()}`, enabled: false, versions: [] }),
  probes: [
    defaultDisabled,
    enable,
    ...Array.from({ length: VERSION_COUNT }, (_, i) => createVersion(i + 1)),
    listVersions,
    getVersions,
    deleteVersion,
    verifyDeletedVersion,
  ],
});
