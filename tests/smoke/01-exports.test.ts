/**
 * Smoke Tests: the library entry point exports its documented API.
 *
 * Catches broken re-exports, which the unit tests miss because they import
 * modules directly.
 */
import { describe, it, expect } from 'vitest';

describe('library entry point', () => {
  it('exports the orchestrator and aggregation helpers', async () => {
    const mod = await import('../../src/lib.js');
    expect(typeof mod.CheckOrchestrator).toBe('function');
    expect(typeof mod.summarize).toBe('function');
    expect(typeof mod.failedChecks).toBe('function');
    expect(typeof mod.hasFailures).toBe('function');
  });

  it('exports the category machinery', async () => {
    const mod = await import('../../src/lib.js');
    expect(typeof mod.CategoryRunner).toBe('function');
    expect(typeof mod.defineCategory).toBe('function');
    expect(mod.RUN_DEADLINE_RESULT).toBe('run_deadline_exceeded');
    expect(mod.allCategories).toHaveLength(10);
    expect(Object.keys(mod.categoryRegistry)).toEqual([...mod.CATEGORY_NAMES]);
  });

  it('exports the S3 gateway', async () => {
    const mod = await import('../../src/lib.js');
    expect(typeof mod.S3Gateway).toBe('function');
    expect(typeof mod.createS3Client).toBe('function');
    expect(typeof mod.toGatewayError).toBe('function');
  });

  it('exports the error family', async () => {
    const mod = await import('../../src/lib.js');
    const error = new mod.OrchestrationError('sync', new Error('boom'));
    expect(error).toBeInstanceOf(mod.CheckerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('Category sync failed: boom');
  });

  it('exports configuration and logging', async () => {
    const mod = await import('../../src/lib.js');
    expect(typeof mod.loadConfig).toBe('function');
    expect(typeof mod.validateConfig).toBe('function');
    expect(typeof mod.createLogger).toBe('function');
    expect(mod.createSilentLogger().level).toBe('silent');
  });

  it('exports result helpers', async () => {
    const mod = await import('../../src/lib.js');
    expect(mod.ok(1)).toEqual({ ok: true, value: 1 });
    expect(mod.err('x')).toEqual({ ok: false, error: 'x' });
  });
});
