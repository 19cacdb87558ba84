/**
 * Backpatch Engine (Phase 2)
 *
 * Rewrites the references of every snapshotted record to their true target
 * ids once the identity map is complete. A field is patched only when it is a
 * reference, is updateable after create, resolves to something other than the
 * referenced type's placeholder and differs from what Phase 1 wrote.
 *
 * Updates go out in batches; a failed batch falls back to per-record updates
 * and a failed record falls back to per-field updates.
 */

import { RetryConfig, DEFAULT_RETRY_CONFIG, withRetry } from '../../store/http/retry';
import type { EntityType, FieldMap, RecordId, RecordStore, RecordUpdate } from '../../store/types';
import type { RunEventLog } from '../logging';
import { BatchAccumulator, FlushOutcome } from './batch-accumulator';
import type { DummyRegistry } from './dummy-registry';
import type { EntityMetadataTable } from './entity-metadata';
import type { FailureLogger } from './failure-logger';
import type { IdentityMap } from './identity-map';
import type { Snapshot, SnapshotStore } from './snapshot-store';
import type { StableNameCache } from './stable-name-cache';

export interface BackpatchResult {
  entityType: EntityType;
  updated: number;
  skipped: number;
  errored: number;
  /** Fields written across all updated records */
  fieldsPatched: number;
  fieldErrors: number;
  /** Reference fields left unset because their target never resolved */
  unresolved: number;
}

export interface PlannedUpdate {
  fields: FieldMap;
  unresolved: string[];
}

export interface BackpatchEngineOptions {
  target: RecordStore;
  metadata: EntityMetadataTable;
  identityMap: IdentityMap;
  dummies: DummyRegistry;
  snapshots: SnapshotStore;
  stableNames: StableNameCache;
  failures: FailureLogger;
  events: RunEventLog;
  continuityTypes?: ReadonlySet<EntityType>;
  stableNameTypes?: ReadonlySet<EntityType>;
  batchSize?: number;
  maxCellsPerBatch?: number;
  flushTimeoutMs?: number;
  retry?: RetryConfig;
}

interface UpdateContext {
  sourceId: RecordId;
}

export class BackpatchEngine {
  private readonly continuityTypes: ReadonlySet<EntityType>;
  private readonly stableNameTypes: ReadonlySet<EntityType>;
  private readonly retry: RetryConfig;

  constructor(private readonly options: BackpatchEngineOptions) {
    this.continuityTypes = options.continuityTypes ?? new Set();
    this.stableNameTypes = options.stableNameTypes ?? new Set();
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
  }

  /**
   * Reference corrections for one snapshot
   */
  async planUpdate(snapshot: Snapshot): Promise<PlannedUpdate> {
    const fields: FieldMap = {};
    const unresolved: string[] = [];

    for (const spec of this.options.metadata.referenceFields(snapshot.entityType)) {
      const referencedType = spec.referencedType;
      if (!referencedType || spec.immutableAfterCreate || spec.createable === false) continue;
      if (this.continuityTypes.has(referencedType)) continue;

      const sourceValue = snapshot.record[spec.name];
      if (typeof sourceValue !== 'string' || sourceValue.length === 0) continue;

      const desired = this.stableNameTypes.has(referencedType)
        ? await this.options.stableNames.resolve(referencedType, sourceValue)
        : this.options.identityMap.get(referencedType, sourceValue) ?? null;

      if (desired === null) {
        unresolved.push(spec.name);
        continue;
      }

      if (this.options.dummies.isDummy(referencedType, desired)) continue;
      if (snapshot.appliedReferences?.[spec.name] === desired) continue;

      fields[spec.name] = desired;
    }

    return { fields, unresolved };
  }

  async backpatch(entityType: EntityType): Promise<BackpatchResult> {
    const result: BackpatchResult = {
      entityType,
      updated: 0,
      skipped: 0,
      errored: 0,
      fieldsPatched: 0,
      fieldErrors: 0,
      unresolved: 0,
    };

    const snapshots = await this.options.snapshots.readSnapshots(entityType);
    const accumulator = new BatchAccumulator<RecordUpdate, UpdateContext, RecordId>({
      submit: async (type, updates) => {
        await this.options.target.bulkUpdate(type, updates);
        return updates.map(update => update.id);
      },
      batchSize: this.options.batchSize,
      maxCellsPerBatch: this.options.maxCellsPerBatch,
      payloadWidth: update => Object.keys(update.fields).length + 1,
      flushTimeoutMs: this.options.flushTimeoutMs,
      retry: this.retry,
    });

    for (const snapshot of snapshots) {
      const plan = await this.planUpdate(snapshot);
      result.unresolved += plan.unresolved.length;

      if (Object.keys(plan.fields).length === 0) {
        result.skipped++;
        continue;
      }

      const outcome = await accumulator.add(
        entityType,
        { id: snapshot.targetId, fields: plan.fields },
        { sourceId: snapshot.sourceId }
      );
      if (outcome) {
        await this.handleOutcome(accumulator, outcome, result);
      }
    }

    while (accumulator.pendingCount(entityType) > 0) {
      const outcome = await accumulator.flush(entityType);
      if (!outcome) break;
      await this.handleOutcome(accumulator, outcome, result);
    }

    await this.options.events.event('Backpatch complete', { ...result });
    return result;
  }

  private async handleOutcome(
    accumulator: BatchAccumulator<RecordUpdate, UpdateContext, RecordId>,
    outcome: FlushOutcome<RecordUpdate, UpdateContext, RecordId>,
    result: BackpatchResult
  ): Promise<void> {
    const { entityType } = outcome;

    if (outcome.status === 'flushed') {
      result.updated += outcome.entries.length;
      result.fieldsPatched += outcome.entries.reduce((sum, entry) => sum + Object.keys(entry.payload.fields).length, 0);
      await this.options.events.batch('Backpatch batch applied', outcome.batchNumber, {
        entityType,
        size: outcome.entries.length,
        durationMs: outcome.durationMs,
      });
      return;
    }

    await this.options.failures.logFailure({ kind: 'BatchFailure', entityType, error: outcome.error });
    await this.options.events.batch(
      'Backpatch batch failed; falling back to per-record updates',
      outcome.batchNumber,
      { entityType, size: outcome.entries.length },
      'warn'
    );

    for (const entry of accumulator.clear(entityType)) {
      await this.updateRecord(entityType, entry.payload, entry.context, result);
    }
  }

  private async updateRecord(
    entityType: EntityType,
    update: RecordUpdate,
    context: UpdateContext,
    result: BackpatchResult
  ): Promise<void> {
    try {
      await withRetry(() => this.options.target.updateRecord(entityType, update.id, update.fields), this.retry, {
        operation: 'updateRecord',
        entityType,
      });
      result.updated++;
      result.fieldsPatched += Object.keys(update.fields).length;
      return;
    } catch (error) {
      await this.options.events.record(
        'Record update failed; retrying field by field',
        entityType,
        context.sourceId,
        update.id,
        { error: error instanceof Error ? error.message : String(error) },
        'warn'
      );
    }

    let failedFields = 0;
    for (const [field, value] of Object.entries(update.fields)) {
      try {
        await withRetry(() => this.options.target.updateRecord(entityType, update.id, { [field]: value }), this.retry, {
          operation: 'updateField',
          entityType,
        });
        result.fieldsPatched++;
      } catch (error) {
        failedFields++;
        result.fieldErrors++;
        await this.options.failures.logFailure({
          kind: 'BackpatchFieldFailure',
          entityType,
          sourceId: context.sourceId,
          targetId: update.id,
          field,
          error,
        });
        await this.options.events.error('Backpatch field update failed', error, {
          entityType,
          sourceId: context.sourceId,
          targetId: update.id,
          field,
        });
      }
    }

    if (failedFields > 0) {
      result.errored++;
    } else {
      result.updated++;
    }
  }
}
