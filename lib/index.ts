export * from './store/types';
export * from './store/errors';
export { withRetry, withTimeout, createRetryConfig, DEFAULT_RETRY_CONFIG } from './store/http/retry';
export type { RetryConfig } from './store/http/retry';
export { MemoryRecordStore } from './store/memory-store';
export type { MemoryRecordStoreOptions, BulkCreateFailure } from './store/memory-store';
export { createStableNameResolver } from './store/stable-name';

export { loadEngineConfig } from './migration/config';
export type { EngineConfig } from './migration/config';
export { logger, createRunEventLog, formatDuration } from './migration/logging';
export type { RunEventLog } from './migration/logging';
export { shutdownAllLoggers } from './migration/file-logger';

export { parseMigrationPlan, loadMigrationPlan, MigrationPlanSchema } from './migration/graph/run-plan';
export type { MigrationPlan, MigrationPlanInput } from './migration/graph/run-plan';
export { runGraphMigration } from './migration/graph/runner';
export type { MigrationCollaborators, MigrationRunResult } from './migration/graph/runner';
export { EntityMetadataTable } from './migration/graph/entity-metadata';
export { planEntityOrder } from './migration/graph/planner';
export { IdentityMap } from './migration/graph/identity-map';
export { DummyRegistry } from './migration/graph/dummy-registry';
export { ContinuityCache } from './migration/graph/continuity';
export { StableNameCache } from './migration/graph/stable-name-cache';
export { rewriteReferences } from './migration/graph/reference-rewriter';
export type { RewriteContext, RewriteResult, ReferenceDecision } from './migration/graph/reference-rewriter';
export { sanitizePayload } from './migration/graph/payload-sanitizer';
export { BatchAccumulator } from './migration/graph/batch-accumulator';
export type { FlushOutcome, BatchEntry } from './migration/graph/batch-accumulator';
export { GraphMaterializer } from './migration/graph/materializer';
export type { MaterializeResult } from './migration/graph/materializer';
export { BackpatchEngine } from './migration/graph/backpatch';
export type { BackpatchResult } from './migration/graph/backpatch';
export { InMemorySnapshotStore, FileSnapshotStore } from './migration/graph/snapshot-store';
export type { Snapshot, SnapshotStore } from './migration/graph/snapshot-store';
export { FailureLogger } from './migration/graph/failure-logger';
export type { MigrationFailure, FailureKind } from './migration/graph/failure-logger';
export { classifyError } from './migration/graph/error-classifier';
export { prefetchRootGraph, discoverRelated } from './migration/graph/discovery';
export { purgeTargetRecords } from './migration/graph/deletion';
export { createRunReport, formatRunReport } from './migration/graph/reporter';
export type { MigrationRunReport } from './migration/graph/reporter';
