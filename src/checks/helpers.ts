import type { ProbeContext } from '../category-runner.js';
import type { GatewayResult, PutObjectInput, PutObjectOutput, Tag } from '../gateway.js';

export type NoState = Record<string, never>;

/** Puts an object into the scoped bucket and queues it for cleanup on success. */
export async function putTracked<S>(
  ctx: ProbeContext<S>,
  input: Omit<PutObjectInput, 'bucket'>,
): Promise<GatewayResult<PutObjectOutput>> {
  const result = await ctx.gateway.putObject({ bucket: ctx.bucket, ...input });
  if (result.ok) {
    ctx.runner.addCleanupItem({ kind: 'object', bucket: ctx.bucket, key: input.key, versionId: result.value.versionId });
  }
  return result;
}

/**
 * Narrows state a probe depends on. When it is missing, records the
 * failure under `name` and returns undefined.
 */
export function requireState<S, T>(ctx: ProbeContext<S>, name: string, value: T | undefined, what: string): T | undefined {
  if (value === undefined) {
    ctx.runner.fail(name, `No ${what} available; an earlier probe did not complete`, { bucket: ctx.bucket });
  }
  return value;
}

export function tagsToRecord(tags: Tag[]): Record<string, string> {
  return Object.fromEntries(tags.map(t => [t.key, t.value]));
}

export function sameTags(expected: Tag[], actual: Tag[]): boolean {
  const want = tagsToRecord(expected);
  const got = tagsToRecord(actual);
  return (
    Object.keys(want).length === Object.keys(got).length &&
    Object.entries(want).every(([key, value]) => got[key] === value)
  );
}
