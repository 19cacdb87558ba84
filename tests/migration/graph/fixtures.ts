/**
 * Shared schemas and engine wiring for graph migration tests
 */

import { MemoryRecordStore } from '../../../lib/store/memory-store';
import { createStableNameResolver } from '../../../lib/store/stable-name';
import { createRetryConfig } from '../../../lib/store/http/retry';
import type { EntityType, FieldMap, FieldSpec, RecordId } from '../../../lib/store/types';
import type { RunEventLog } from '../../../lib/migration/logging';
import { BackpatchEngine } from '../../../lib/migration/graph/backpatch';
import { ContinuityCache } from '../../../lib/migration/graph/continuity';
import { DummyRegistry } from '../../../lib/migration/graph/dummy-registry';
import { EntityMetadataTable } from '../../../lib/migration/graph/entity-metadata';
import { FailureLogger } from '../../../lib/migration/graph/failure-logger';
import { IdentityMap } from '../../../lib/migration/graph/identity-map';
import { GraphMaterializer } from '../../../lib/migration/graph/materializer';
import { InMemorySnapshotStore } from '../../../lib/migration/graph/snapshot-store';
import { StableNameCache } from '../../../lib/migration/graph/stable-name-cache';

export const FIXED_NOW = new Date('2024-03-01T00:00:00.000Z');

export const NO_RETRY = createRetryConfig({ maxAttempts: 1 });

export function scalar(name: string, overrides: Partial<FieldSpec> = {}): FieldSpec {
  return { name, kind: 'scalar', required: false, immutableAfterCreate: false, dataType: 'string', ...overrides };
}

export function reference(name: string, referencedType: EntityType, overrides: Partial<FieldSpec> = {}): FieldSpec {
  return { name, kind: 'reference', referencedType, required: false, immutableAfterCreate: false, dataType: 'id', ...overrides };
}

export function buildSchemas(
  options: { requiredParent?: boolean; requiredManager?: boolean } = {}
): Record<EntityType, FieldSpec[]> {
  return {
    Account: [
      scalar('Id', { dataType: 'id', createable: false }),
      scalar('Name', { required: true }),
      scalar('Industry', { dataType: 'picklist', allowedValues: ['Banking', 'Retail', 'Other'] }),
      reference('ParentId', 'Account', { required: options.requiredParent ?? false }),
      reference('OwnerId', 'User'),
      reference('RecordTypeId', 'RecordType'),
    ],
    Contact: [
      scalar('LastName', { required: true }),
      scalar('Email', { dataType: 'email' }),
      reference('AccountId', 'Account', { required: true }),
      reference('ReportsToId', 'Contact', { required: options.requiredManager ?? false }),
    ],
    Opportunity: [
      scalar('Name', { required: true }),
      scalar('StageName', { required: true, dataType: 'picklist', allowedValues: ['Prospecting', 'Closed Won'] }),
      scalar('CloseDate', { required: true, dataType: 'date' }),
      reference('AccountId', 'Account', { required: true, immutableAfterCreate: true }),
      reference('PrimaryContactId', 'Contact'),
    ],
    User: [scalar('Username', { required: true })],
    RecordType: [scalar('DeveloperName', { required: true }), scalar('SobjectType', { required: true })],
  };
}

/**
 * Event sink that drops everything
 */
export const silentEvents: RunEventLog = {
  async event() {},
  async record() {},
  async batch() {},
  async error() {},
};

type SeedRecords = Record<EntityType, Array<{ id: RecordId } & FieldMap>>;

export interface HarnessOptions {
  source?: SeedRecords;
  target?: SeedRecords;
  types?: EntityType[];
  /** Account.ParentId required; the Account placeholder then points at a seeded anchor */
  requiredParent?: boolean;
  /** Contact.ReportsToId required */
  requiredManager?: boolean;
  placeholders?: EntityType[];
  templates?: Record<EntityType, FieldMap>;
  fallbackIds?: Record<EntityType, RecordId>;
  uniqueFields?: Record<EntityType, string[]>;
  singleCreateTypes?: EntityType[];
  batchSize?: number;
}

export const ANCHOR_ACCOUNT = 'tgt-anchor';

export async function createHarness(options: HarnessOptions = {}) {
  const schemas = buildSchemas({ requiredParent: options.requiredParent, requiredManager: options.requiredManager });
  const source = new MemoryRecordStore({ schemas, idPrefix: 'src' });
  const target = new MemoryRecordStore({ schemas, idPrefix: 'tgt', uniqueFields: options.uniqueFields });

  for (const [entityType, records] of Object.entries(options.source ?? {})) {
    source.seed(entityType, records);
  }
  if (options.requiredParent) {
    target.seed('Account', [{ id: ANCHOR_ACCOUNT, Name: 'Anchor' }]);
  }
  for (const [entityType, records] of Object.entries(options.target ?? {})) {
    target.seed(entityType, records);
  }

  const continuityTypes = new Set(['User']);
  const stableNameTypes = new Set(['RecordType']);
  const external = new Set([...continuityTypes, ...stableNameTypes]);

  const metadata = await EntityMetadataTable.load(target, options.types ?? ['Account', 'Contact', 'Opportunity'], {
    externalTypes: external,
  });

  const templates =
    options.templates ??
    (options.requiredParent ? { Account: { Name: 'NO ACCOUNT', ParentId: ANCHOR_ACCOUNT } } : {});

  const dummies = new DummyRegistry({ target, metadata, templates, external, now: () => FIXED_NOW });
  await dummies.ensureAll(options.placeholders ?? ['Account']);

  const identityMap = new IdentityMap();
  const snapshots = new InMemorySnapshotStore();
  const continuity = new ContinuityCache(target, options.fallbackIds ?? {}, NO_RETRY);
  const stableNames = new StableNameCache(
    createStableNameResolver(source, target, { nameField: 'DeveloperName', scopeField: 'SobjectType' })
  );
  const failures = new FailureLogger('test-run');

  const shared = {
    target,
    metadata,
    identityMap,
    dummies,
    snapshots,
    stableNames,
    failures,
    events: silentEvents,
    continuityTypes,
    stableNameTypes,
    batchSize: options.batchSize,
    retry: NO_RETRY,
  };

  const materializer = new GraphMaterializer({
    ...shared,
    source,
    continuity,
    singleCreateTypes: new Set(options.singleCreateTypes ?? []),
  });
  const backpatch = new BackpatchEngine(shared);

  return { ...shared, source, continuity, materializer, backpatch };
}

export type Harness = Awaited<ReturnType<typeof createHarness>>;
