/**
 * Reference Rewriter
 *
 * Turns a source record into a target-shaped create payload. Pure and
 * synchronous: every lookup it needs (identity map, placeholders, continuity
 * existence, stable names) must already be answerable from memory.
 *
 * Per reference field:
 * 1. continuity types keep the source value when it exists in the target,
 *    else take the fallback, else are dropped
 * 2. stable-name types take the cached resolution, else are dropped
 * 3. mapped references take the target id
 * 4. required references take the placeholder of the referenced type
 * 5. optional references are dropped and restored by backpatch
 */

import { FatalSetupError } from '../../store/errors';
import type { EntityType, FieldMap, FieldSpec, RecordId, SourceRecord } from '../../store/types';
import type { EntityMetadataTable } from './entity-metadata';
import type { ContinuityResolution } from './continuity';

export type ReferenceOutcome =
  | 'mapped'
  | 'dummy'
  | 'dropped'
  | 'preserved'
  | 'fallback'
  | 'stable_name';

export interface ReferenceDecision {
  field: string;
  referencedType: EntityType;
  sourceValue: RecordId | null;
  outcome: ReferenceOutcome;
  value?: RecordId;
}

export interface RewriteContext {
  metadata: EntityMetadataTable;
  identityMap: { get(entityType: EntityType, sourceId: RecordId): RecordId | undefined };
  dummies: { get(entityType: EntityType): RecordId | undefined };
  continuityTypes?: ReadonlySet<EntityType>;
  continuity?: { resolve(entityType: EntityType, id: RecordId): ContinuityResolution };
  stableNameTypes?: ReadonlySet<EntityType>;
  stableNames?: { peek(entityType: EntityType, sourceRef: RecordId): RecordId | null | undefined };
  /** Fields never copied, per entity type */
  excludedFields?: Record<EntityType, readonly string[]>;
}

export interface RewriteResult {
  payload: FieldMap;
  decisions: ReferenceDecision[];
  /** Reference values written into the payload */
  appliedReferences: Record<string, RecordId>;
}

const ID_FIELDS = new Set(['id', 'Id']);

function referenceValue(value: unknown): RecordId | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function rewriteReferences(record: SourceRecord, context: RewriteContext): RewriteResult {
  const fields = context.metadata.get(record.entityType);
  const excluded = new Set(context.excludedFields?.[record.entityType] ?? []);
  const payload: FieldMap = {};
  const decisions: ReferenceDecision[] = [];
  const appliedReferences: Record<string, RecordId> = {};

  for (const spec of fields) {
    if (ID_FIELDS.has(spec.name) || excluded.has(spec.name) || spec.createable === false) {
      continue;
    }

    if (spec.kind === 'scalar' || !spec.referencedType) {
      if (spec.name in record.fields) {
        payload[spec.name] = record.fields[spec.name];
      }
      continue;
    }

    const decision = decideReference(record, spec, spec.referencedType, context);
    if (!decision) continue;

    decisions.push(decision);
    if (decision.value !== undefined) {
      payload[spec.name] = decision.value;
      appliedReferences[spec.name] = decision.value;
    }
  }

  return { payload, decisions, appliedReferences };
}

function decideReference(
  record: SourceRecord,
  spec: FieldSpec,
  referencedType: EntityType,
  context: RewriteContext
): ReferenceDecision | null {
  const sourceValue = referenceValue(record.fields[spec.name]);
  const base = { field: spec.name, referencedType, sourceValue };

  if (context.continuityTypes?.has(referencedType)) {
    if (sourceValue === null) return null;
    const resolution: ContinuityResolution =
      context.continuity?.resolve(referencedType, sourceValue) ?? { outcome: 'dropped' };
    return resolution.outcome === 'dropped'
      ? { ...base, outcome: 'dropped' }
      : { ...base, outcome: resolution.outcome, value: resolution.value };
  }

  if (context.stableNameTypes?.has(referencedType)) {
    if (sourceValue === null) return null;
    const resolved = context.stableNames?.peek(referencedType, sourceValue);
    return resolved ? { ...base, outcome: 'stable_name', value: resolved } : { ...base, outcome: 'dropped' };
  }

  if (sourceValue !== null) {
    const mapped = context.identityMap.get(referencedType, sourceValue);
    if (mapped !== undefined) {
      return { ...base, outcome: 'mapped', value: mapped };
    }
  }

  if (spec.required) {
    const dummy = context.dummies.get(referencedType);
    if (dummy === undefined) {
      throw new FatalSetupError(
        `No placeholder available for required reference ${record.entityType}.${spec.name} -> ${referencedType}`
      );
    }
    return { ...base, outcome: 'dummy', value: dummy };
  }

  return sourceValue === null ? null : { ...base, outcome: 'dropped' };
}
