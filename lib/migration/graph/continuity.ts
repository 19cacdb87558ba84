/**
 * Identity-continuity cache
 *
 * Records of continuity types (users, owners) are never migrated: a reference
 * keeps its source value when that record exists in the target, otherwise it
 * takes the configured fallback. Existence is looked up in batches ahead of
 * rewriting and answered synchronously afterwards.
 */

import { DEFAULT_RETRY_CONFIG, RetryConfig, withRetry } from '../../store/http/retry';
import type { EntityType, FieldMap, RecordId, RecordStore, SourceRecord } from '../../store/types';
import { logger } from '../logging';

export const EXISTENCE_CHUNK_SIZE = 200;

export type ContinuityResolution =
  | { outcome: 'preserved'; value: RecordId }
  | { outcome: 'fallback'; value: RecordId }
  | { outcome: 'dropped' };

export class ContinuityCache {
  private readonly existence = new Map<EntityType, Map<RecordId, boolean>>();
  private readonly fallbacks: Map<EntityType, RecordId>;

  constructor(
    private readonly target: RecordStore,
    fallbackIds: Record<EntityType, RecordId> = {},
    private readonly retry: RetryConfig = DEFAULT_RETRY_CONFIG
  ) {
    this.fallbacks = new Map(Object.entries(fallbackIds));
  }

  /**
   * Discover fallback records in the target for types without a configured fallback id
   */
  async loadFallbacks(fallbackWhere: Record<EntityType, FieldMap>): Promise<void> {
    for (const [entityType, where] of Object.entries(fallbackWhere)) {
      if (this.fallbacks.has(entityType)) continue;

      const [match] = await this.target.queryRecords({ entityType, where, limit: 1 });
      if (match) {
        this.fallbacks.set(entityType, match.id);
        this.known(entityType).set(match.id, true);
        logger.info('Fallback record selected', { entityType, targetId: match.id });
      } else {
        logger.warn('No fallback record found', { entityType, where });
      }
    }
  }

  /**
   * Look up existence of every id not yet known. A chunk whose lookup keeps
   * failing stays unprimed, so its ids resolve to the fallback or are dropped.
   */
  async prime(entityType: EntityType, ids: Iterable<RecordId>): Promise<void> {
    const known = this.known(entityType);
    const unknown = Array.from(new Set(ids)).filter(id => !known.has(id));

    for (let i = 0; i < unknown.length; i += EXISTENCE_CHUNK_SIZE) {
      const chunk = unknown.slice(i, i + EXISTENCE_CHUNK_SIZE);
      let found: SourceRecord[];
      try {
        found = await withRetry(() => this.target.queryRecords({ entityType, ids: chunk }), this.retry, {
          operation: 'queryRecords',
          entityType,
        });
      } catch (error) {
        logger.warn('Existence lookup failed; references treated as absent', {
          entityType,
          ids: chunk.length,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }
      const present = new Set(found.map(record => record.id));
      for (const id of chunk) {
        known.set(id, present.has(id));
      }
    }
  }

  /**
   * undefined when the id has not been primed
   */
  exists(entityType: EntityType, id: RecordId): boolean | undefined {
    return this.existence.get(entityType)?.get(id);
  }

  fallback(entityType: EntityType): RecordId | undefined {
    return this.fallbacks.get(entityType);
  }

  /**
   * Unprimed ids are treated as absent
   */
  resolve(entityType: EntityType, id: RecordId): ContinuityResolution {
    if (this.exists(entityType, id)) {
      return { outcome: 'preserved', value: id };
    }

    const fallback = this.fallbacks.get(entityType);
    if (fallback) {
      return { outcome: 'fallback', value: fallback };
    }

    return { outcome: 'dropped' };
  }

  private known(entityType: EntityType): Map<RecordId, boolean> {
    let known = this.existence.get(entityType);
    if (!known) {
      known = new Map();
      this.existence.set(entityType, known);
    }
    return known;
  }
}
