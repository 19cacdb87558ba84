/**
 * Source-side discovery
 *
 * Batched prefetch of a root set with the same-type records that point at it,
 * and discovery of child records of already migrated parents.
 */

import type { EntityType, RecordId, RecordStore, SourceRecord } from '../../store/types';
import type { EntityMetadataTable } from './entity-metadata';
import { logger } from '../logging';

export const DISCOVERY_CHUNK_SIZE = 200;

export interface RootGraph {
  /** Roots in requested order */
  roots: SourceRecord[];
  /** Same-type records that reference a root, in query order */
  discovered: SourceRecord[];
  /** Requested root ids absent from the source */
  missing: RecordId[];
}

/**
 * One query for the roots plus every record whose same-type reference points at a root
 */
export async function prefetchRootGraph(
  source: RecordStore,
  metadata: EntityMetadataTable,
  entityType: EntityType,
  rootIds: RecordId[],
  limit?: number
): Promise<RootGraph> {
  const uniqueRoots = Array.from(new Set(rootIds));
  const selfFields = metadata.selfReferenceFields(entityType).map(field => field.name);

  const records = await source.queryRecords({
    entityType,
    ids: uniqueRoots,
    anyOf: selfFields.map(field => ({ field, in: uniqueRoots })),
    limit,
  });

  const byId = new Map(records.map(record => [record.id, record]));
  const rootSet = new Set(uniqueRoots);
  const roots: SourceRecord[] = [];
  const missing: RecordId[] = [];

  for (const id of uniqueRoots) {
    const record = byId.get(id);
    if (record) {
      roots.push(record);
    } else {
      missing.push(id);
    }
  }

  const discovered = records.filter(record => !rootSet.has(record.id));

  logger.info('Prefetched root graph', {
    entityType,
    roots: roots.length,
    discovered: discovered.length,
    missing: missing.length,
  });

  return { roots, discovered, missing };
}

export interface RelationSpec {
  entityType: EntityType;
  parentField: string;
  /** -1 for unlimited, 0 skips the relation */
  limitPerParent: number;
}

/**
 * Children of the given parents, grouped in parent order and capped per parent
 */
export async function discoverRelated(
  source: RecordStore,
  relation: RelationSpec,
  parentIds: RecordId[],
  chunkSize: number = DISCOVERY_CHUNK_SIZE
): Promise<SourceRecord[]> {
  if (relation.limitPerParent === 0 || parentIds.length === 0) {
    return [];
  }

  const byParent = new Map<RecordId, SourceRecord[]>();
  for (let i = 0; i < parentIds.length; i += chunkSize) {
    const chunk = parentIds.slice(i, i + chunkSize);
    const children = await source.queryRecords({
      entityType: relation.entityType,
      anyOf: [{ field: relation.parentField, in: chunk }],
    });

    for (const child of children) {
      const parent = child.fields[relation.parentField];
      if (typeof parent !== 'string') continue;
      const list = byParent.get(parent) ?? [];
      list.push(child);
      byParent.set(parent, list);
    }
  }

  const seen = new Set<RecordId>();
  const ordered: SourceRecord[] = [];
  for (const parentId of parentIds) {
    const children = byParent.get(parentId) ?? [];
    const capped = relation.limitPerParent < 0 ? children : children.slice(0, relation.limitPerParent);
    for (const child of capped) {
      if (seen.has(child.id)) continue;
      seen.add(child.id);
      ordered.push(child);
    }
  }

  logger.info('Discovered related records', {
    entityType: relation.entityType,
    parentField: relation.parentField,
    parents: parentIds.length,
    records: ordered.length,
  });

  return ordered;
}
