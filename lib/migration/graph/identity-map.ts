import type { EntityType, RecordId } from '../../store/types';

/**
 * Source id -> target id per entity type.
 * Entries are written once; a later write for the same key is ignored.
 */
export class IdentityMap {
  private readonly maps = new Map<EntityType, Map<RecordId, RecordId>>();

  get(entityType: EntityType, sourceId: RecordId): RecordId | undefined {
    return this.maps.get(entityType)?.get(sourceId);
  }

  has(entityType: EntityType, sourceId: RecordId): boolean {
    return this.maps.get(entityType)?.has(sourceId) ?? false;
  }

  /**
   * @returns false when the key was already mapped (the existing entry is kept)
   */
  set(entityType: EntityType, sourceId: RecordId, targetId: RecordId): boolean {
    let map = this.maps.get(entityType);
    if (!map) {
      map = new Map();
      this.maps.set(entityType, map);
    }

    if (map.has(sourceId)) {
      return false;
    }

    map.set(sourceId, targetId);
    return true;
  }

  /**
   * Mapped source ids of a type, in insertion order
   */
  sourceIds(entityType: EntityType): RecordId[] {
    return Array.from(this.maps.get(entityType)?.keys() ?? []);
  }

  size(entityType?: EntityType): number {
    if (entityType !== undefined) {
      return this.maps.get(entityType)?.size ?? 0;
    }
    let total = 0;
    for (const map of this.maps.values()) {
      total += map.size;
    }
    return total;
  }

  entityTypes(): EntityType[] {
    return Array.from(this.maps.keys());
  }

  /**
   * Seed from a previous run's snapshots
   *
   * @returns Number of entries added
   */
  seed(entries: Iterable<{ entityType: EntityType; sourceId: RecordId; targetId: RecordId }>): number {
    let added = 0;
    for (const entry of entries) {
      if (this.set(entry.entityType, entry.sourceId, entry.targetId)) {
        added++;
      }
    }
    return added;
  }
}
