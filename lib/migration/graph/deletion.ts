import { FatalSetupError } from '../../store/errors';
import type { EntityType, RecordId, RecordStore } from '../../store/types';
import type { RunEventLog } from '../logging';

export interface PurgeTargetOptions {
  /** Records that must survive the purge, per entity type */
  protectedIds?: Record<EntityType, RecordId[]>;
  events?: RunEventLog;
}

export interface PurgeTargetResult {
  deleted: Record<EntityType, number>;
  protected: Record<EntityType, number>;
}

/**
 * Delete existing target records before re-populating.
 * Types are purged in reverse of the given dependency order so dependants go first.
 *
 * @throws {FatalSetupError} When any deletion fails; re-populating would collide
 */
export async function purgeTargetRecords(
  target: RecordStore,
  dependencyOrder: EntityType[],
  options: PurgeTargetOptions = {}
): Promise<PurgeTargetResult> {
  const result: PurgeTargetResult = { deleted: {}, protected: {} };

  for (const entityType of [...dependencyOrder].reverse()) {
    const keep = new Set(options.protectedIds?.[entityType] ?? []);
    const records = await target.queryRecords({ entityType });
    const failures: string[] = [];
    let deleted = 0;
    let kept = 0;

    for (const record of records) {
      if (keep.has(record.id)) {
        kept++;
        continue;
      }
      try {
        await target.deleteRecord(entityType, record.id);
        deleted++;
      } catch (error) {
        failures.push(`${record.id}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    result.deleted[entityType] = deleted;
    result.protected[entityType] = kept;
    await options.events?.event('Purged existing target records', { entityType, deleted, protected: kept });

    if (failures.length > 0) {
      throw new FatalSetupError(
        `Failed to delete ${failures.length} existing ${entityType} records: ${failures.slice(0, 5).join('; ')}`
      );
    }
  }

  return result;
}
