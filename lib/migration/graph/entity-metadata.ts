/**
 * Entity metadata table
 *
 * Field descriptions for every entity type the run touches, loaded from the
 * target store once before materialization begins and frozen afterwards.
 */

import { FatalSetupError } from '../../store/errors';
import type { EntityType, FieldSpec, RecordStore } from '../../store/types';
import { logger } from '../logging';

export interface MetadataLoadOptions {
  /** Types that are never described (identity-continuity and stable-name types) */
  externalTypes?: Iterable<EntityType>;
  /** Extra immutable-after-create fields per type */
  immutableFields?: Record<EntityType, string[]>;
}

export class EntityMetadataTable {
  private readonly specs: ReadonlyMap<EntityType, readonly FieldSpec[]>;

  constructor(specs: Map<EntityType, FieldSpec[]>) {
    const frozen = new Map<EntityType, readonly FieldSpec[]>();
    for (const [type, fields] of specs) {
      frozen.set(type, Object.freeze(fields.map(field => Object.freeze({ ...field }))));
    }
    this.specs = frozen;
  }

  /**
   * Describe the requested types and every type they require a reference to
   *
   * @throws {FatalSetupError} When any description cannot be obtained
   */
  static async load(
    store: RecordStore,
    types: Iterable<EntityType>,
    options: MetadataLoadOptions = {}
  ): Promise<EntityMetadataTable> {
    const external = new Set(options.externalTypes ?? []);
    const overrides = options.immutableFields ?? {};
    const specs = new Map<EntityType, FieldSpec[]>();
    const queue = Array.from(types).filter(type => !external.has(type));

    while (queue.length > 0) {
      const type = queue.shift();
      if (type === undefined || specs.has(type)) continue;

      let fields: FieldSpec[];
      try {
        fields = await store.describeEntity(type);
      } catch (error) {
        throw new FatalSetupError(
          `Unable to load metadata for ${type}: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      }

      const immutable = new Set(overrides[type] ?? []);
      specs.set(
        type,
        fields.map(field =>
          immutable.has(field.name) ? { ...field, immutableAfterCreate: true } : field
        )
      );

      for (const field of fields) {
        if (
          field.kind === 'reference' &&
          field.required &&
          field.referencedType &&
          !external.has(field.referencedType) &&
          !specs.has(field.referencedType)
        ) {
          queue.push(field.referencedType);
        }
      }
    }

    logger.info('Entity metadata loaded', {
      entityTypes: Array.from(specs.keys()),
      fieldCount: Array.from(specs.values()).reduce((sum, fields) => sum + fields.length, 0),
    });

    return new EntityMetadataTable(specs);
  }

  has(entityType: EntityType): boolean {
    return this.specs.has(entityType);
  }

  entityTypes(): EntityType[] {
    return Array.from(this.specs.keys());
  }

  /**
   * @throws {FatalSetupError} For types outside the table
   */
  get(entityType: EntityType): readonly FieldSpec[] {
    const fields = this.specs.get(entityType);
    if (!fields) {
      throw new FatalSetupError(`No metadata loaded for ${entityType}`);
    }
    return fields;
  }

  field(entityType: EntityType, name: string): FieldSpec | undefined {
    return this.specs.get(entityType)?.find(field => field.name === name);
  }

  referenceFields(entityType: EntityType): FieldSpec[] {
    return this.get(entityType).filter(field => field.kind === 'reference' && field.referencedType);
  }

  /**
   * Reference fields pointing back at the same entity type
   */
  selfReferenceFields(entityType: EntityType): FieldSpec[] {
    return this.referenceFields(entityType).filter(field => field.referencedType === entityType);
  }

  /**
   * Types targeted by required references, excluding the given external types
   */
  requiredReferenceTargets(entityType: EntityType, external: ReadonlySet<EntityType> = new Set()): EntityType[] {
    const targets = new Set<EntityType>();
    for (const field of this.referenceFields(entityType)) {
      if (field.required && field.referencedType && !external.has(field.referencedType)) {
        targets.add(field.referencedType);
      }
    }
    return Array.from(targets);
  }
}
