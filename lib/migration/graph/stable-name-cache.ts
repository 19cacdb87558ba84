import type { EntityType, RecordId, StableNameLookup } from '../../store/types';
import { logger } from '../logging';

export interface ResolutionMiss {
  entityType: EntityType;
  sourceRef: RecordId;
  reason: string;
}

/**
 * Run-scoped cache of stable-name resolutions.
 * Each (entity type, source value) pair is looked up once; misses are cached too.
 */
export class StableNameCache {
  private readonly resolved = new Map<string, RecordId | null>();
  private readonly inFlight = new Map<string, Promise<RecordId | null>>();
  private readonly misses: ResolutionMiss[] = [];
  private lookups = 0;

  constructor(private readonly lookup: StableNameLookup | null) {}

  async resolve(entityType: EntityType, sourceRef: RecordId): Promise<RecordId | null> {
    const key = `${entityType}:${sourceRef}`;
    const cached = this.resolved.get(key);
    if (cached !== undefined) {
      return cached;
    }

    let pending = this.inFlight.get(key);
    if (!pending) {
      pending = this.lookupOnce(entityType, sourceRef, key).finally(() => this.inFlight.delete(key));
      this.inFlight.set(key, pending);
    }
    return pending;
  }

  async prime(entityType: EntityType, sourceRefs: Iterable<RecordId>): Promise<void> {
    for (const ref of new Set(sourceRefs)) {
      await this.resolve(entityType, ref);
    }
  }

  /**
   * Cached resolution: a target id, null for a known miss, undefined when not looked up yet
   */
  peek(entityType: EntityType, sourceRef: RecordId): RecordId | null | undefined {
    return this.resolved.get(`${entityType}:${sourceRef}`);
  }

  getMisses(): readonly ResolutionMiss[] {
    return this.misses;
  }

  getStats(): { lookups: number; cached: number; misses: number } {
    return { lookups: this.lookups, cached: this.resolved.size, misses: this.misses.length };
  }

  private async lookupOnce(entityType: EntityType, sourceRef: RecordId, key: string): Promise<RecordId | null> {
    this.lookups++;
    let targetId: RecordId | null = null;
    let reason = 'no record with the same stable name in target';

    if (!this.lookup) {
      reason = 'no stable-name lookup configured';
    } else {
      try {
        targetId = await this.lookup.resolveStableName(entityType, sourceRef);
      } catch (error) {
        reason = error instanceof Error ? error.message : String(error);
      }
    }

    this.resolved.set(key, targetId);
    if (targetId === null) {
      this.misses.push({ entityType, sourceRef, reason });
      logger.warn('Stable-name resolution missed; field left unset', { entityType, sourceRef, reason });
    }

    return targetId;
  }
}
