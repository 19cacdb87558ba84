import type { EntityType, RecordId, RecordStore, StableNameLookup } from './types';

export interface StableNameResolverOptions {
  /** Field holding the stable name, e.g. 'DeveloperName' */
  nameField: string;
  /** Optional field that scopes names, e.g. 'SobjectType' */
  scopeField?: string;
}

/**
 * Resolve a source category record to the target record carrying the same stable name.
 * Scope values are copied from the source record when a scope field is configured.
 */
export function createStableNameResolver(
  source: RecordStore,
  target: RecordStore,
  options: StableNameResolverOptions
): StableNameLookup {
  return {
    async resolveStableName(entityType: EntityType, sourceRef: RecordId): Promise<RecordId | null> {
      const sourceRecord = await source.fetchRecord(entityType, sourceRef);
      const name = sourceRecord?.fields[options.nameField];
      if (!sourceRecord || typeof name !== 'string' || name.length === 0) {
        return null;
      }

      const where: Record<string, unknown> = { [options.nameField]: name };
      if (options.scopeField) {
        where[options.scopeField] = sourceRecord.fields[options.scopeField];
      }

      const matches = await target.queryRecords({ entityType, where, limit: 1 });
      return matches[0]?.id ?? null;
    },
  };
}
