import { describe, it, expect, jest } from '@jest/globals';
import { MemoryRecordStore } from '../../../lib/store/memory-store';
import { createStableNameResolver } from '../../../lib/store/stable-name';
import type { RecordId, StableNameLookup } from '../../../lib/store/types';
import { StableNameCache } from '../../../lib/migration/graph/stable-name-cache';
import { buildSchemas } from './fixtures';

function stores() {
  const source = new MemoryRecordStore({ schemas: buildSchemas() });
  const target = new MemoryRecordStore({ schemas: buildSchemas() });
  source.seed('RecordType', [
    { id: 'RT-src-1', DeveloperName: 'Enterprise', SobjectType: 'Account' },
    { id: 'RT-src-2', DeveloperName: 'Enterprise', SobjectType: 'Opportunity' },
    { id: 'RT-src-3', DeveloperName: 'Legacy', SobjectType: 'Account' },
  ]);
  target.seed('RecordType', [
    { id: 'RT-tgt-1', DeveloperName: 'Enterprise', SobjectType: 'Opportunity' },
    { id: 'RT-tgt-2', DeveloperName: 'Enterprise', SobjectType: 'Account' },
  ]);
  return { source, target };
}

describe('createStableNameResolver', () => {
  it('matches on name within the scope', async () => {
    const { source, target } = stores();
    const resolver = createStableNameResolver(source, target, { nameField: 'DeveloperName', scopeField: 'SobjectType' });

    expect(await resolver.resolveStableName('RecordType', 'RT-src-1')).toBe('RT-tgt-2');
    expect(await resolver.resolveStableName('RecordType', 'RT-src-2')).toBe('RT-tgt-1');
    expect(await resolver.resolveStableName('RecordType', 'RT-src-3')).toBeNull();
    expect(await resolver.resolveStableName('RecordType', 'RT-missing')).toBeNull();
  });

  it('matches the first record by name alone without a scope', async () => {
    const { source, target } = stores();
    const resolver = createStableNameResolver(source, target, { nameField: 'DeveloperName' });

    expect(await resolver.resolveStableName('RecordType', 'RT-src-1')).toBe('RT-tgt-1');
  });
});

describe('StableNameCache', () => {
  it('looks each value up once and caches misses', async () => {
    const { source, target } = stores();
    const resolver = createStableNameResolver(source, target, { nameField: 'DeveloperName', scopeField: 'SobjectType' });
    const spy = jest.spyOn(resolver, 'resolveStableName');
    const cache = new StableNameCache(resolver);

    const [first, second] = await Promise.all([
      cache.resolve('RecordType', 'RT-src-1'),
      cache.resolve('RecordType', 'RT-src-1'),
    ]);
    await cache.prime('RecordType', ['RT-src-1', 'RT-src-3', 'RT-src-3']);

    expect([first, second]).toEqual(['RT-tgt-2', 'RT-tgt-2']);
    expect(spy).toHaveBeenCalledTimes(2);
    expect(cache.peek('RecordType', 'RT-src-3')).toBeNull();
    expect(cache.peek('RecordType', 'RT-src-2')).toBeUndefined();
    expect(cache.getStats()).toEqual({ lookups: 2, cached: 2, misses: 1 });
    expect(cache.getMisses()).toEqual([
      { entityType: 'RecordType', sourceRef: 'RT-src-3', reason: 'no record with the same stable name in target' },
    ]);
  });

  it('records lookup errors as misses', async () => {
    const failing: StableNameLookup = {
      async resolveStableName(): Promise<RecordId | null> {
        throw new Error('lookup unavailable');
      },
    };
    const cache = new StableNameCache(failing);

    expect(await cache.resolve('RecordType', 'RT-src-1')).toBeNull();
    expect(cache.getMisses()[0].reason).toBe('lookup unavailable');
  });

  it('misses everything without a lookup', async () => {
    const cache = new StableNameCache(null);

    expect(await cache.resolve('RecordType', 'RT-src-1')).toBeNull();
    expect(cache.getMisses()[0].reason).toBe('no stable-name lookup configured');
  });
});
