/**
 * Batch accumulator / flusher
 *
 * Collects payloads per entity type and submits them in bulk, either when the
 * pending count reaches the effective batch size or on demand. Results are
 * correlated to payloads strictly by position.
 *
 * A failed flush keeps its entries pending. Callers that switch to per-record
 * fallback must take them out with clear().
 */

import { EventEmitter } from 'events';
import { BatchOrderError, BulkOperationError } from '../../store/errors';
import { RetryConfig, DEFAULT_RETRY_CONFIG, withRetry, withTimeout } from '../../store/http/retry';
import type { EntityType } from '../../store/types';

export interface BatchEntry<TPayload, TContext> {
  payload: TPayload;
  context: TContext;
}

export type FlushOutcome<TPayload, TContext, TResult> =
  | {
      status: 'flushed';
      entityType: EntityType;
      batchNumber: number;
      entries: BatchEntry<TPayload, TContext>[];
      /** results[i] belongs to entries[i] */
      results: TResult[];
      durationMs: number;
    }
  | {
      status: 'failed';
      entityType: EntityType;
      batchNumber: number;
      entries: BatchEntry<TPayload, TContext>[];
      error: unknown;
      /** Positional partial results, present only when their length matches the batch */
      recoveredResults?: Array<TResult | null>;
      durationMs: number;
    };

export interface BatchAccumulatorConfig<TPayload, TResult> {
  submit: (entityType: EntityType, payloads: TPayload[]) => Promise<TResult[]>;
  /** Maximum payloads per flush (default: 200) */
  batchSize?: number;
  /** Upper bound on payload width x batch size; shrinks batches of wide payloads */
  maxCellsPerBatch?: number;
  payloadWidth?: (payload: TPayload) => number;
  /** Bounded wait per flush; 0 disables */
  flushTimeoutMs?: number;
  retry?: RetryConfig;
  /** Extract positional partial results from a bulk error */
  recoverResults?: (error: unknown) => Array<TResult | null> | undefined;
}

/**
 * Events
 * - batchStart (entityType, batchNumber, size)
 * - batchComplete (outcome)
 * - batchFailed (outcome)
 */
export class BatchAccumulator<TPayload, TContext, TResult> extends EventEmitter {
  private readonly queues = new Map<EntityType, BatchEntry<TPayload, TContext>[]>();
  private readonly locks = new Map<EntityType, Promise<unknown>>();
  private readonly config: Required<Omit<BatchAccumulatorConfig<TPayload, TResult>, 'recoverResults'>> &
    Pick<BatchAccumulatorConfig<TPayload, TResult>, 'recoverResults'>;
  private batchCounter = 0;

  constructor(config: BatchAccumulatorConfig<TPayload, TResult>) {
    super();
    this.config = {
      submit: config.submit,
      batchSize: config.batchSize ?? 200,
      maxCellsPerBatch: config.maxCellsPerBatch ?? Number.POSITIVE_INFINITY,
      payloadWidth: config.payloadWidth ?? (() => 1),
      flushTimeoutMs: config.flushTimeoutMs ?? 0,
      retry: config.retry ?? DEFAULT_RETRY_CONFIG,
      recoverResults: config.recoverResults,
    };
  }

  /**
   * Queue a payload. Flushes the type when the pending count reaches the effective batch size.
   *
   * @returns The flush outcome when the add triggered a flush, else null
   */
  async add(
    entityType: EntityType,
    payload: TPayload,
    context: TContext
  ): Promise<FlushOutcome<TPayload, TContext, TResult> | null> {
    const queue = this.queue(entityType);
    queue.push({ payload, context });

    if (queue.length >= this.effectiveBatchSize(entityType)) {
      return this.flush(entityType);
    }
    return null;
  }

  /**
   * Submit up to one effective batch of pending payloads for a type
   *
   * @returns null when nothing is pending
   */
  flush(entityType: EntityType): Promise<FlushOutcome<TPayload, TContext, TResult> | null> {
    const previous = this.locks.get(entityType) ?? Promise.resolve();
    const next = previous.then(
      () => this.submitBatch(entityType),
      () => this.submitBatch(entityType)
    );
    this.locks.set(entityType, next);
    return next.finally(() => {
      if (this.locks.get(entityType) === next) {
        this.locks.delete(entityType);
      }
    });
  }

  /**
   * Flush a type until nothing is pending or a flush fails
   */
  async drain(entityType: EntityType): Promise<FlushOutcome<TPayload, TContext, TResult>[]> {
    const outcomes: FlushOutcome<TPayload, TContext, TResult>[] = [];
    while (this.pendingCount(entityType) > 0) {
      const outcome = await this.flush(entityType);
      if (!outcome) break;
      outcomes.push(outcome);
      if (outcome.status === 'failed') break;
    }
    return outcomes;
  }

  async flushAll(): Promise<FlushOutcome<TPayload, TContext, TResult>[]> {
    const outcomes: FlushOutcome<TPayload, TContext, TResult>[] = [];
    for (const entityType of this.pendingTypes()) {
      outcomes.push(...(await this.drain(entityType)));
    }
    return outcomes;
  }

  pendingCount(entityType?: EntityType): number {
    if (entityType !== undefined) {
      return this.queues.get(entityType)?.length ?? 0;
    }
    let total = 0;
    for (const queue of this.queues.values()) {
      total += queue.length;
    }
    return total;
  }

  pendingTypes(): EntityType[] {
    return Array.from(this.queues.entries())
      .filter(([, queue]) => queue.length > 0)
      .map(([entityType]) => entityType);
  }

  /**
   * Remove and return every pending entry of a type
   */
  clear(entityType: EntityType): BatchEntry<TPayload, TContext>[] {
    const queue = this.queues.get(entityType) ?? [];
    this.queues.set(entityType, []);
    return queue;
  }

  /**
   * Batch size after the width limit: widest pending payload x size stays within maxCellsPerBatch
   */
  effectiveBatchSize(entityType: EntityType): number {
    const queue = this.queues.get(entityType) ?? [];
    const width = queue.reduce((max, entry) => Math.max(max, this.config.payloadWidth(entry.payload)), 1);
    const byWidth = Math.floor(this.config.maxCellsPerBatch / Math.max(width, 1));
    return Math.max(1, Math.min(this.config.batchSize, byWidth));
  }

  private queue(entityType: EntityType): BatchEntry<TPayload, TContext>[] {
    let queue = this.queues.get(entityType);
    if (!queue) {
      queue = [];
      this.queues.set(entityType, queue);
    }
    return queue;
  }

  private async submitBatch(entityType: EntityType): Promise<FlushOutcome<TPayload, TContext, TResult> | null> {
    const queue = this.queue(entityType);
    if (queue.length === 0) {
      return null;
    }

    const entries = queue.slice(0, this.effectiveBatchSize(entityType));
    const batchNumber = ++this.batchCounter;
    const startedAt = Date.now();
    this.emit('batchStart', entityType, batchNumber, entries.length);

    try {
      const results = await withRetry(
        () =>
          withTimeout(
            this.config.submit(entityType, entries.map(entry => entry.payload)),
            this.config.flushTimeoutMs,
            `Flush of ${entries.length} ${entityType} payloads`
          ),
        this.config.retry,
        { operation: 'flush', entityType }
      );

      if (results.length !== entries.length) {
        throw new BatchOrderError(entries.length, results.length);
      }

      // Only the submitted entries leave the queue; later adds stay pending
      queue.splice(0, entries.length);

      const outcome: FlushOutcome<TPayload, TContext, TResult> = {
        status: 'flushed',
        entityType,
        batchNumber,
        entries,
        results,
        durationMs: Date.now() - startedAt,
      };
      this.emit('batchComplete', outcome);
      return outcome;
    } catch (error) {
      const recovered = this.config.recoverResults?.(error);
      const outcome: FlushOutcome<TPayload, TContext, TResult> = {
        status: 'failed',
        entityType,
        batchNumber,
        entries,
        error,
        recoveredResults: recovered && recovered.length === entries.length ? recovered : undefined,
        durationMs: Date.now() - startedAt,
      };
      this.emit('batchFailed', outcome);
      return outcome;
    }
  }
}

/**
 * Positional results carried by a BulkOperationError
 */
export function recoverBulkResults(error: unknown): Array<string | null> | undefined {
  return error instanceof BulkOperationError ? error.results : undefined;
}
