import { describe, it, expect } from '@jest/globals';
import { IdentityMap } from '../../../lib/migration/graph/identity-map';

describe('IdentityMap', () => {
  it('keeps the first target id written for a key', () => {
    const map = new IdentityMap();

    expect(map.set('Account', 'A1', 'tgt-1')).toBe(true);
    expect(map.set('Account', 'A1', 'tgt-2')).toBe(false);
    expect(map.get('Account', 'A1')).toBe('tgt-1');
  });

  it('scopes ids by entity type', () => {
    const map = new IdentityMap();
    map.set('Account', 'X1', 'tgt-account');

    expect(map.has('Contact', 'X1')).toBe(false);
    expect(map.get('Contact', 'X1')).toBeUndefined();
  });

  it('seeds from snapshots and counts only new entries', () => {
    const map = new IdentityMap();
    map.set('Account', 'A1', 'tgt-a1');

    const added = map.seed([
      { entityType: 'Account', sourceId: 'A1', targetId: 'tgt-other' },
      { entityType: 'Account', sourceId: 'A2', targetId: 'tgt-a2' },
      { entityType: 'Contact', sourceId: 'C1', targetId: 'tgt-c1' },
    ]);

    expect(added).toBe(2);
    expect(map.get('Account', 'A1')).toBe('tgt-a1');
    expect(map.sourceIds('Account')).toEqual(['A1', 'A2']);
    expect(map.size()).toBe(3);
    expect(map.size('Contact')).toBe(1);
    expect(map.entityTypes()).toEqual(['Account', 'Contact']);
  });
});
