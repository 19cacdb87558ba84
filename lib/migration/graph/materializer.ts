/**
 * Graph Materializer (Phase 1)
 *
 * Creates every requested record in the target with all required references
 * satisfiable, recording source -> target ids in the identity map and a
 * snapshot of the original record for backpatch.
 *
 * Node state per (entity type, source id):
 *   resolving -> submitted -> mapped | failed
 * A dependency that is still resolving (self or mutual reference) is never
 * recursed into again; the rewriter gives it the placeholder instead.
 */

import {
  DuplicateRecordError,
  FatalSetupError,
  MaterializationError,
} from '../../store/errors';
import { RetryConfig, DEFAULT_RETRY_CONFIG, withRetry, withTimeout } from '../../store/http/retry';
import type { EntityType, FieldMap, RecordId, RecordStore, SourceRecord } from '../../store/types';
import type { RunEventLog } from '../logging';
import { BatchAccumulator, BatchEntry, FlushOutcome, recoverBulkResults } from './batch-accumulator';
import type { ContinuityCache } from './continuity';
import type { DummyRegistry } from './dummy-registry';
import type { EntityMetadataTable } from './entity-metadata';
import type { FailureLogger } from './failure-logger';
import type { IdentityMap } from './identity-map';
import { sanitizePayload, SanitizeOptions } from './payload-sanitizer';
import { rewriteReferences, RewriteResult } from './reference-rewriter';
import type { SnapshotStore } from './snapshot-store';
import type { StableNameCache } from './stable-name-cache';

export type NodeState = 'resolving' | 'submitted' | 'mapped' | 'failed';

export type MaterializeResult =
  | { status: 'mapped'; targetId: RecordId }
  | { status: 'queued' }
  | { status: 'in_progress' }
  | { status: 'failed'; reason: string }
  | { status: 'not_found' };

export interface MaterializeOptions {
  /** Use this record instead of fetching or the prefetch registry */
  record?: SourceRecord;
  /** Throw MaterializationError when the record ends up not created */
  required?: boolean;
  /** Create immediately instead of queueing for bulk */
  single?: boolean;
}

interface PendingCreate {
  sourceId: RecordId;
  record: FieldMap;
  appliedReferences: Record<string, RecordId>;
}

export interface MaterializerStats {
  created: number;
  adopted: number;
  failed: number;
}

export interface GraphMaterializerOptions {
  source: RecordStore;
  target: RecordStore;
  metadata: EntityMetadataTable;
  identityMap: IdentityMap;
  dummies: DummyRegistry;
  snapshots: SnapshotStore;
  continuity: ContinuityCache;
  stableNames: StableNameCache;
  failures: FailureLogger;
  events: RunEventLog;
  continuityTypes?: ReadonlySet<EntityType>;
  stableNameTypes?: ReadonlySet<EntityType>;
  excludedFields?: Record<EntityType, readonly string[]>;
  /** Types created one record at a time */
  singleCreateTypes?: ReadonlySet<EntityType>;
  sanitize?: SanitizeOptions;
  batchSize?: number;
  maxCellsPerBatch?: number;
  flushTimeoutMs?: number;
  retry?: RetryConfig;
}

function nodeKey(entityType: EntityType, sourceId: RecordId): string {
  return `${entityType}:${sourceId}`;
}

export class GraphMaterializer {
  private readonly states = new Map<string, NodeState>();
  private readonly prefetched = new Map<string, SourceRecord>();
  private readonly stats = new Map<EntityType, MaterializerStats>();
  private readonly accumulator: BatchAccumulator<FieldMap, PendingCreate, RecordId>;
  private readonly continuityTypes: ReadonlySet<EntityType>;
  private readonly stableNameTypes: ReadonlySet<EntityType>;
  private readonly retry: RetryConfig;

  constructor(private readonly options: GraphMaterializerOptions) {
    this.continuityTypes = options.continuityTypes ?? new Set();
    this.stableNameTypes = options.stableNameTypes ?? new Set();
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;

    this.accumulator = new BatchAccumulator<FieldMap, PendingCreate, RecordId>({
      submit: (entityType, payloads) => options.target.bulkCreate(entityType, payloads),
      batchSize: options.batchSize,
      maxCellsPerBatch: options.maxCellsPerBatch,
      payloadWidth: payload => Object.keys(payload).length,
      flushTimeoutMs: options.flushTimeoutMs,
      retry: this.retry,
      recoverResults: recoverBulkResults,
    });
  }

  /**
   * Make records available without a per-record fetch, looking up the
   * continuity references of the whole set in one pass per type
   */
  async registerPrefetched(records: Iterable<SourceRecord>): Promise<void> {
    const continuityIds = new Map<EntityType, Set<RecordId>>();

    for (const record of records) {
      this.prefetched.set(nodeKey(record.entityType, record.id), record);

      for (const { referencedType, value } of this.lookupReferences(record)) {
        if (!this.continuityTypes.has(referencedType)) continue;
        const ids = continuityIds.get(referencedType) ?? new Set<RecordId>();
        ids.add(value);
        continuityIds.set(referencedType, ids);
      }
    }

    for (const [entityType, ids] of continuityIds) {
      await this.options.continuity.prime(entityType, ids);
    }
  }

  getState(entityType: EntityType, sourceId: RecordId): NodeState | undefined {
    return this.states.get(nodeKey(entityType, sourceId));
  }

  getStats(): Record<EntityType, MaterializerStats> {
    return Object.fromEntries(this.stats);
  }

  pendingCount(entityType?: EntityType): number {
    return this.accumulator.pendingCount(entityType);
  }

  async materialize(
    entityType: EntityType,
    sourceId: RecordId,
    options: MaterializeOptions = {}
  ): Promise<MaterializeResult> {
    const result = await this.resolve(entityType, sourceId, options);

    if (options.required && (result.status === 'failed' || result.status === 'not_found')) {
      throw new MaterializationError(
        entityType,
        sourceId,
        `Required ${entityType} ${sourceId} was not created: ${result.status === 'failed' ? result.reason : 'source record not found'}`
      );
    }

    return result;
  }

  /**
   * Submit every pending payload of a type
   */
  async flush(entityType: EntityType): Promise<void> {
    while (this.accumulator.pendingCount(entityType) > 0) {
      const outcome = await this.accumulator.flush(entityType);
      if (!outcome) break;
      await this.handleOutcome(outcome);
    }
  }

  async flushAll(): Promise<void> {
    for (const entityType of this.accumulator.pendingTypes()) {
      await this.flush(entityType);
    }
  }

  private async resolve(
    entityType: EntityType,
    sourceId: RecordId,
    options: MaterializeOptions
  ): Promise<MaterializeResult> {
    const mapped = this.options.identityMap.get(entityType, sourceId);
    if (mapped !== undefined) {
      return { status: 'mapped', targetId: mapped };
    }

    const key = nodeKey(entityType, sourceId);
    const state = this.states.get(key);
    if (state === 'resolving') return { status: 'in_progress' };
    if (state === 'submitted') return { status: 'queued' };
    if (state === 'failed') return { status: 'failed', reason: 'previously failed in this run' };

    this.states.set(key, 'resolving');

    let record: SourceRecord | null;
    try {
      record = options.record ?? this.prefetched.get(key) ?? (await this.fetch(entityType, sourceId));
    } catch (error) {
      return this.fail(entityType, sourceId, 'Source record fetch failed', error);
    }

    if (!record) {
      this.states.set(key, 'failed');
      this.bump(entityType, 'failed');
      await this.options.failures.logFailure({
        kind: 'RecordCreateFailure',
        entityType,
        sourceId,
        error: new Error(`Source ${entityType} ${sourceId} not found`),
        category: 'validation',
      });
      return { status: 'not_found' };
    }
    this.prefetched.delete(key);

    let rewritten: RewriteResult;
    try {
      await this.resolveDependencies(record);
      await this.primeLookups(record);
      rewritten = rewriteReferences(record, {
        metadata: this.options.metadata,
        identityMap: this.options.identityMap,
        dummies: this.options.dummies,
        continuityTypes: this.continuityTypes,
        continuity: this.options.continuity,
        stableNameTypes: this.stableNameTypes,
        stableNames: this.options.stableNames,
        excludedFields: this.options.excludedFields,
      });
    } catch (error) {
      if (error instanceof FatalSetupError) {
        this.states.delete(key);
        throw error;
      }
      return this.fail(entityType, sourceId, 'Record could not be prepared', error);
    }

    const { payload, changes } = sanitizePayload(
      rewritten.payload,
      this.options.metadata.get(entityType),
      this.options.sanitize
    );
    if (changes.length > 0) {
      await this.options.events.record('Adjusted values to target domains', entityType, sourceId, undefined, {
        fields: changes.map(change => change.field),
      });
    }

    const pending: PendingCreate = {
      sourceId,
      record: { ...record.fields },
      appliedReferences: rewritten.appliedReferences,
    };

    this.states.set(key, 'submitted');

    if (options.single || this.options.singleCreateTypes?.has(entityType)) {
      await this.createSingle(entityType, { payload, context: pending });
    } else {
      const outcome = await this.accumulator.add(entityType, payload, pending);
      if (outcome) {
        await this.handleOutcome(outcome);
      }
    }

    return this.currentResult(entityType, sourceId);
  }

  private async fail(
    entityType: EntityType,
    sourceId: RecordId,
    message: string,
    error: unknown
  ): Promise<MaterializeResult> {
    this.states.set(nodeKey(entityType, sourceId), 'failed');
    this.bump(entityType, 'failed');
    await this.options.failures.logFailure({ kind: 'RecordCreateFailure', entityType, sourceId, error });
    await this.options.events.error(message, error, { entityType, sourceId });
    return { status: 'failed', reason: error instanceof Error ? error.message : String(error) };
  }

  private currentResult(entityType: EntityType, sourceId: RecordId): MaterializeResult {
    const targetId = this.options.identityMap.get(entityType, sourceId);
    if (targetId !== undefined) {
      return { status: 'mapped', targetId };
    }
    return this.states.get(nodeKey(entityType, sourceId)) === 'failed'
      ? { status: 'failed', reason: 'create failed' }
      : { status: 'queued' };
  }

  private async fetch(entityType: EntityType, sourceId: RecordId): Promise<SourceRecord | null> {
    return withRetry(() => this.options.source.fetchRecord(entityType, sourceId), this.retry, {
      operation: 'fetchRecord',
      entityType,
    });
  }

  /**
   * Same-type references are materialized first; references to records that
   * are queued are flushed so the real id is available to the rewriter.
   */
  private async resolveDependencies(record: SourceRecord): Promise<void> {
    for (const field of this.options.metadata.referenceFields(record.entityType)) {
      const referencedType = field.referencedType;
      const value = record.fields[field.name];
      if (!referencedType || typeof value !== 'string' || value.length === 0) continue;
      if (this.continuityTypes.has(referencedType) || this.stableNameTypes.has(referencedType)) continue;
      if (referencedType === record.entityType && value === record.id) continue;
      if (this.options.identityMap.has(referencedType, value)) continue;

      const depState = this.states.get(nodeKey(referencedType, value));

      if (referencedType === record.entityType && depState === undefined) {
        try {
          await this.resolve(referencedType, value, {});
        } catch (error) {
          if (error instanceof FatalSetupError) throw error;
          await this.options.events.error('Dependency could not be materialized', error, {
            entityType: referencedType,
            sourceId: value,
            dependant: record.id,
          });
        }
      }

      if (this.states.get(nodeKey(referencedType, value)) === 'submitted') {
        await this.flush(referencedType);
      }
    }
  }

  /**
   * Ids already primed (prefetched records) are not looked up again
   */
  private async primeLookups(record: SourceRecord): Promise<void> {
    const continuityIds = new Map<EntityType, RecordId[]>();

    for (const { referencedType, value } of this.lookupReferences(record)) {
      if (this.continuityTypes.has(referencedType)) {
        continuityIds.set(referencedType, [...(continuityIds.get(referencedType) ?? []), value]);
      } else if (this.stableNameTypes.has(referencedType)) {
        await this.options.stableNames.resolve(referencedType, value);
      }
    }

    for (const [entityType, ids] of continuityIds) {
      await this.options.continuity.prime(entityType, ids);
    }
  }

  private lookupReferences(record: SourceRecord): Array<{ referencedType: EntityType; value: RecordId }> {
    const references: Array<{ referencedType: EntityType; value: RecordId }> = [];
    for (const field of this.options.metadata.referenceFields(record.entityType)) {
      const referencedType = field.referencedType;
      const value = record.fields[field.name];
      if (!referencedType || typeof value !== 'string' || value.length === 0) continue;
      references.push({ referencedType, value });
    }
    return references;
  }

  private async handleOutcome(outcome: FlushOutcome<FieldMap, PendingCreate, RecordId>): Promise<void> {
    const { entityType } = outcome;

    if (outcome.status === 'flushed') {
      await this.options.events.batch('Batch created', outcome.batchNumber, {
        entityType,
        size: outcome.entries.length,
        durationMs: outcome.durationMs,
      });
      for (let i = 0; i < outcome.entries.length; i++) {
        await this.commit(entityType, outcome.entries[i].context, outcome.results[i], 'created');
      }
      return;
    }

    await this.options.failures.logFailure({
      kind: 'BatchFailure',
      entityType,
      error: outcome.error,
    });
    await this.options.events.batch(
      'Batch create failed; falling back to single-record creates',
      outcome.batchNumber,
      {
        entityType,
        size: outcome.entries.length,
        recovered: outcome.recoveredResults?.filter(id => id !== null).length ?? 0,
        error: outcome.error instanceof Error ? outcome.error.message : String(outcome.error),
      },
      'warn'
    );

    // Take the entries out before any single create so nothing is submitted twice
    const cleared = this.accumulator.clear(entityType);
    const recovered = outcome.recoveredResults;

    for (let i = 0; i < cleared.length; i++) {
      const entry = cleared[i];
      const recoveredId = i < outcome.entries.length ? recovered?.[i] : undefined;
      if (recoveredId) {
        await this.commit(entityType, entry.context, recoveredId, 'created');
      } else {
        await this.createSingle(entityType, entry);
      }
    }
  }

  private async createSingle(entityType: EntityType, entry: BatchEntry<FieldMap, PendingCreate>): Promise<void> {
    const { sourceId } = entry.context;

    try {
      const targetId = await withRetry(
        () =>
          withTimeout(
            this.options.target.createRecord(entityType, entry.payload),
            this.options.flushTimeoutMs ?? 0,
            `Create of ${entityType} ${sourceId}`
          ),
        this.retry,
        { operation: 'createRecord', entityType }
      );
      await this.commit(entityType, entry.context, targetId, 'created');
    } catch (error) {
      if (error instanceof DuplicateRecordError && error.existingId) {
        await this.commit(entityType, entry.context, error.existingId, 'adopted');
        return;
      }

      this.states.set(nodeKey(entityType, sourceId), 'failed');
      this.bump(entityType, 'failed');
      await this.options.failures.logFailure({ kind: 'RecordCreateFailure', entityType, sourceId, error });
      await this.options.events.error('Record create failed', error, { entityType, sourceId });
    }
  }

  private async commit(
    entityType: EntityType,
    pending: PendingCreate,
    targetId: RecordId,
    how: 'created' | 'adopted'
  ): Promise<void> {
    const key = nodeKey(entityType, pending.sourceId);
    if (!this.options.identityMap.set(entityType, pending.sourceId, targetId)) {
      await this.options.events.event(
        'Identity already mapped; keeping the first target id',
        { entityType, sourceId: pending.sourceId, ignoredTargetId: targetId },
        'warn'
      );
      this.states.set(key, 'mapped');
      return;
    }

    this.states.set(key, 'mapped');
    this.bump(entityType, how);

    // Adopted records keep no applied references: backpatch rewrites every reference
    await this.options.snapshots.appendSnapshot(
      entityType,
      pending.sourceId,
      targetId,
      pending.record,
      how === 'created' ? pending.appliedReferences : undefined
    );

    await this.options.events.record(
      how === 'created' ? 'Record created' : 'Duplicate recovered; adopted existing record',
      entityType,
      pending.sourceId,
      targetId,
      undefined,
      how === 'created' ? 'debug' : 'info'
    );
  }

  private bump(entityType: EntityType, counter: keyof MaterializerStats): void {
    const stats = this.stats.get(entityType) ?? { created: 0, adopted: 0, failed: 0 };
    stats[counter]++;
    this.stats.set(entityType, stats);
  }
}
