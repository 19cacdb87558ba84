/**
 * Two-phase graph migration run
 *
 * metadata -> optional target purge -> snapshot reset (or resume seed) ->
 * placeholders -> Phase 1 materialization -> Phase 2 backpatch ->
 * placeholder purge -> report
 *
 * Only FatalSetupError (and configuration errors) abort a run; record, batch
 * and field failures are contained, logged and counted.
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { FatalSetupError, MigrationConfigError } from '../../store/errors';
import { createRetryConfig } from '../../store/http/retry';
import { createStableNameResolver } from '../../store/stable-name';
import type { EntityType, RecordStore, StableNameLookup } from '../../store/types';
import { EngineConfig, loadEngineConfig } from '../config';
import { removeMigrationLogger } from '../file-logger';
import { DEFAULT_LOG_CONFIG } from '../log-config';
import { createRunEventLog, logger } from '../logging';
import { BackpatchEngine, BackpatchResult } from './backpatch';
import { ContinuityCache } from './continuity';
import { purgeTargetRecords } from './deletion';
import { discoverRelated, prefetchRootGraph } from './discovery';
import { DummyPurgeResult, DummyRegistry } from './dummy-registry';
import { EntityMetadataTable } from './entity-metadata';
import { FailureLogger } from './failure-logger';
import { IdentityMap } from './identity-map';
import { GraphMaterializer } from './materializer';
import { planEntityOrder } from './planner';
import { createRunReport, formatRunReport, MigrationRunReport } from './reporter';
import type { MigrationPlan } from './run-plan';
import { FileSnapshotStore, SnapshotStore } from './snapshot-store';
import { StableNameCache } from './stable-name-cache';

export interface MigrationCollaborators {
  source: RecordStore;
  target: RecordStore;
  /** Defaults to JSONL files under the configured snapshot directory */
  snapshots?: SnapshotStore;
  /** Defaults to name matching between source and target per plan.stableNames */
  stableNameLookup?: StableNameLookup;
  now?: () => Date;
}

export interface MigrationRunResult {
  report: MigrationRunReport;
  identityMap: IdentityMap;
  phase2: BackpatchResult[];
}

function buildStableNameLookup(
  collaborators: MigrationCollaborators,
  plan: MigrationPlan
): StableNameLookup | null {
  if (collaborators.stableNameLookup) {
    return collaborators.stableNameLookup;
  }

  const resolvers = new Map(
    Object.entries(plan.stableNames).map(([entityType, options]) => [
      entityType,
      createStableNameResolver(collaborators.source, collaborators.target, options),
    ])
  );
  if (resolvers.size === 0) {
    return null;
  }

  return {
    async resolveStableName(entityType, sourceRef) {
      const resolver = resolvers.get(entityType);
      return resolver ? resolver.resolveStableName(entityType, sourceRef) : null;
    },
  };
}

/**
 * Types needing a placeholder: every required-reference target of a migrated type plus templated types
 */
function placeholderTypes(
  metadata: EntityMetadataTable,
  order: EntityType[],
  external: ReadonlySet<EntityType>,
  templated: EntityType[]
): EntityType[] {
  const needed = new Set<EntityType>(templated.filter(type => !external.has(type)));
  for (const type of order) {
    for (const target of metadata.requiredReferenceTargets(type, external)) {
      needed.add(target);
    }
  }
  return order.filter(type => needed.has(type));
}

export async function runGraphMigration(
  collaborators: MigrationCollaborators,
  plan: MigrationPlan,
  config: EngineConfig = loadEngineConfig()
): Promise<MigrationRunResult> {
  const runId = plan.runId ?? uuidv4();
  const now = collaborators.now ?? (() => new Date());
  const startedAt = now();
  const { source, target } = collaborators;

  const events = createRunEventLog(
    runId,
    config.fileLogging ? { ...DEFAULT_LOG_CONFIG, baseDir: path.resolve(config.logDir) } : undefined
  );
  const failures = new FailureLogger(runId, config.fileLogging ? config.logDir : undefined);
  const snapshots = collaborators.snapshots ?? new FileSnapshotStore(path.join(config.snapshotDir, runId));
  const retry = createRetryConfig({ maxAttempts: config.maxRetries });

  const continuityTypes = new Set(plan.continuity.types);
  const stableNameTypes = new Set(Object.keys(plan.stableNames));
  const external = new Set<EntityType>([...continuityTypes, ...stableNameTypes]);

  try {
    await events.event('Migration run started', {
      roots: plan.roots.map(root => ({ entityType: root.entityType, count: root.ids.length })),
      related: plan.related.map(relation => relation.entityType),
      resume: plan.resume,
    });

    const requested = [
      ...plan.roots.map(root => root.entityType),
      ...plan.related.map(relation => relation.entityType),
      ...plan.entityTypes,
      ...Object.keys(plan.dummyTemplates),
    ];
    const metadata = await EntityMetadataTable.load(target, requested, {
      externalTypes: external,
      immutableFields: plan.immutableFields,
    });

    for (const relation of plan.related) {
      if (!metadata.field(relation.entityType, relation.parentField)?.referencedType) {
        throw new MigrationConfigError(
          `${relation.entityType}.${relation.parentField} is not a reference field`
        );
      }
    }

    const { order } = planEntityOrder(metadata, metadata.entityTypes(), external);

    if (plan.purgeTarget.enabled) {
      await purgeTargetRecords(target, order, { protectedIds: plan.purgeTarget.protectedIds, events });
    }

    const identityMap = new IdentityMap();
    if (plan.resume) {
      for (const entityType of await snapshots.listEntityTypes()) {
        const seeded = identityMap.seed(await snapshots.readSnapshots(entityType));
        await events.event('Identity map seeded from snapshots', { entityType, seeded });
      }
    } else {
      await snapshots.clearSnapshots();
    }

    const dummies = new DummyRegistry({
      target,
      metadata,
      templates: plan.dummyTemplates,
      external,
      retain: plan.retainDummies,
      events,
      now,
    });
    await dummies.ensureAll(placeholderTypes(metadata, order, external, Object.keys(plan.dummyTemplates)));

    const continuity = new ContinuityCache(target, plan.continuity.fallbackIds, retry);
    await continuity.loadFallbacks(plan.continuity.fallbackWhere);
    const stableNames = new StableNameCache(buildStableNameLookup(collaborators, plan));

    const shared = {
      target,
      metadata,
      identityMap,
      dummies,
      snapshots,
      stableNames,
      failures,
      events,
      continuityTypes,
      stableNameTypes,
      batchSize: config.batchSize,
      maxCellsPerBatch: config.maxCellsPerBatch,
      flushTimeoutMs: config.flushTimeoutMs,
      retry,
    };

    // Phase 1
    const materializer = new GraphMaterializer({
      ...shared,
      source,
      continuity,
      excludedFields: plan.excludedFields,
      singleCreateTypes: new Set(plan.singleCreateTypes),
      sanitize: { maskEmails: plan.maskEmails },
    });

    for (const root of plan.roots) {
      const graph = await prefetchRootGraph(source, metadata, root.entityType, root.ids, root.prefetchLimit);
      await materializer.registerPrefetched([...graph.roots, ...graph.discovered]);

      for (const id of graph.missing) {
        await materializer.materialize(root.entityType, id);
      }
      for (const record of [...graph.roots, ...graph.discovered]) {
        await materializer.materialize(root.entityType, record.id);
      }
      await materializer.flush(root.entityType);
    }

    for (const relation of plan.related) {
      // Parents must be mapped before their children are discovered
      await materializer.flushAll();

      const parentType = metadata.field(relation.entityType, relation.parentField)?.referencedType;
      if (!parentType) continue;

      const children = await discoverRelated(source, relation, identityMap.sourceIds(parentType));
      await materializer.registerPrefetched(children);
      for (const child of children) {
        await materializer.materialize(relation.entityType, child.id);
      }
      await materializer.flush(relation.entityType);
    }

    await materializer.flushAll();
    await events.event('Phase 1 complete', { mapped: identityMap.size(), stats: materializer.getStats() });

    // Phase 2
    const backpatch = new BackpatchEngine(shared);
    const phase2: BackpatchResult[] = [];
    for (const entityType of order) {
      if (identityMap.size(entityType) === 0) continue;
      phase2.push(await backpatch.backpatch(entityType));
    }

    await failures.logFailuresBulk(
      stableNames.getMisses().map(miss => ({
        kind: 'ResolutionMiss' as const,
        entityType: miss.entityType,
        sourceId: miss.sourceRef,
        error: new Error(miss.reason),
      }))
    );

    let placeholders: DummyPurgeResult | null = null;
    if (plan.purgeDummies) {
      placeholders = await dummies.purge();
    }

    const report = createRunReport({
      runId,
      startedAt,
      completedAt: now(),
      entityTypes: order.filter(type => identityMap.size(type) > 0),
      phase1: materializer.getStats(),
      phase2,
      failures: failures.getFailures(),
      placeholders,
    });

    await events.event('Migration run finished', { status: report.status, totals: report.totals });
    for (const line of formatRunReport(report)) {
      logger.info(line);
    }

    return { report, identityMap, phase2 };
  } catch (error) {
    await events.error(
      error instanceof FatalSetupError ? 'Run aborted by setup failure' : 'Run aborted',
      error
    );
    throw error;
  } finally {
    if (config.fileLogging) {
      await removeMigrationLogger(runId);
    }
  }
}
