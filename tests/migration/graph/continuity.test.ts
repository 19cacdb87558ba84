import { describe, it, expect, jest } from '@jest/globals';
import { StoreApiError } from '../../../lib/store/errors';
import { createRetryConfig } from '../../../lib/store/http/retry';
import { MemoryRecordStore } from '../../../lib/store/memory-store';
import { ContinuityCache } from '../../../lib/migration/graph/continuity';
import { buildSchemas } from './fixtures';

function targetWithUsers(): MemoryRecordStore {
  const target = new MemoryRecordStore({ schemas: buildSchemas() });
  target.seed('User', [
    { id: 'U1', Username: 'kept@example.test' },
    { id: 'U-integration', Username: 'integration@example.test' },
  ]);
  return target;
}

describe('ContinuityCache', () => {
  it('preserves references to users present in the target', async () => {
    const cache = new ContinuityCache(targetWithUsers(), { User: 'U-fallback' });

    await cache.prime('User', ['U1', 'U2']);

    expect(cache.resolve('User', 'U1')).toEqual({ outcome: 'preserved', value: 'U1' });
    expect(cache.resolve('User', 'U2')).toEqual({ outcome: 'fallback', value: 'U-fallback' });
    expect(cache.exists('User', 'U2')).toBe(false);
  });

  it('drops references without a fallback', () => {
    const cache = new ContinuityCache(targetWithUsers());

    expect(cache.exists('User', 'U1')).toBeUndefined();
    expect(cache.resolve('User', 'U1')).toEqual({ outcome: 'dropped' });
  });

  it('queries only ids it has not seen', async () => {
    const target = targetWithUsers();
    const query = jest.spyOn(target, 'queryRecords');
    const cache = new ContinuityCache(target);

    await cache.prime('User', ['U1', 'U2', 'U1']);
    await cache.prime('User', ['U1', 'U2']);

    expect(query).toHaveBeenCalledTimes(1);
    expect(query).toHaveBeenCalledWith({ entityType: 'User', ids: ['U1', 'U2'] });
  });

  it('retries a lookup interrupted by the target', async () => {
    const target = targetWithUsers();
    const query = jest.spyOn(target, 'queryRecords').mockRejectedValueOnce(new StoreApiError('Unavailable', 503));
    const cache = new ContinuityCache(target, {}, createRetryConfig({ maxAttempts: 2, baseDelay: 1, useJitter: false }));

    await cache.prime('User', ['U1']);

    expect(query).toHaveBeenCalledTimes(2);
    expect(cache.resolve('User', 'U1')).toEqual({ outcome: 'preserved', value: 'U1' });
  });

  it('leaves ids unprimed when the lookup keeps failing', async () => {
    const target = targetWithUsers();
    jest.spyOn(target, 'queryRecords').mockRejectedValue(new StoreApiError('Malformed query', 400));
    const cache = new ContinuityCache(target, { User: 'U-fallback' }, createRetryConfig({ maxAttempts: 1 }));

    await expect(cache.prime('User', ['U1', 'U2'])).resolves.toBeUndefined();

    expect(cache.exists('User', 'U1')).toBeUndefined();
    expect(cache.resolve('User', 'U1')).toEqual({ outcome: 'fallback', value: 'U-fallback' });
  });

  it('selects fallbacks by query', async () => {
    const cache = new ContinuityCache(targetWithUsers(), { Group: 'G-default' });

    await cache.loadFallbacks({
      User: { Username: 'integration@example.test' },
      Queue: { Name: 'Unassigned' },
      Group: { Name: 'ignored' },
    });

    expect(cache.fallback('User')).toBe('U-integration');
    expect(cache.exists('User', 'U-integration')).toBe(true);
    expect(cache.fallback('Queue')).toBeUndefined();
    expect(cache.fallback('Group')).toBe('G-default');
  });
});
