/**
 * In-memory record store
 *
 * Implements the full RecordStore contract against plain maps. Used for dry runs
 * and as the source/target stand-in in tests. Required fields, unique fields and
 * update restrictions are enforced the way a real target would enforce them, and
 * failures can be injected per entity type.
 */

import {
  BulkOperationError,
  DuplicateRecordError,
  StoreApiError,
} from './errors';
import type {
  EntityType,
  FieldMap,
  FieldSpec,
  RecordId,
  RecordQuery,
  RecordStore,
  RecordUpdate,
  SourceRecord,
} from './types';

export interface MemoryRecordStoreOptions {
  schemas: Record<EntityType, FieldSpec[]>;
  /** Prefix for generated ids, e.g. 'tgt' gives 'tgt-Account-1' */
  idPrefix?: string;
  /** Fields whose values must be unique per entity type */
  uniqueFields?: Record<EntityType, string[]>;
}

export interface BulkCreateFailure {
  /** Rows that are actually created before the failure is reported */
  succeedIndexes?: number[];
  /** Whether the error carries positional results (default: true when rows succeed) */
  reportResults?: boolean;
  message?: string;
}

type CreatePredicate = (payload: FieldMap) => boolean;

export class MemoryRecordStore implements RecordStore {
  private readonly schemas: Map<EntityType, FieldSpec[]>;
  private readonly records = new Map<EntityType, Map<RecordId, FieldMap>>();
  private readonly idPrefix: string;
  private readonly uniqueFields: Record<EntityType, string[]>;
  private sequence = 0;

  private readonly bulkCreateFailures = new Map<EntityType, BulkCreateFailure[]>();
  private readonly createRejections = new Map<EntityType, Array<{ when: CreatePredicate; error: Error }>>();
  private readonly bulkUpdateFailures = new Map<EntityType, number>();
  private readonly rejectedFields = new Map<EntityType, Map<string, string>>();
  private readonly describeFailures = new Set<EntityType>();

  constructor(options: MemoryRecordStoreOptions) {
    this.schemas = new Map(Object.entries(options.schemas));
    this.idPrefix = options.idPrefix ?? 'mem';
    this.uniqueFields = options.uniqueFields ?? {};
  }

  /**
   * Insert records with caller-chosen ids, bypassing validation
   */
  seed(entityType: EntityType, records: Array<{ id: RecordId } & FieldMap>): void {
    const table = this.table(entityType);
    for (const { id, ...fields } of records) {
      table.set(id, { ...fields });
    }
  }

  /**
   * Records of a type in insertion order
   */
  listRecords(entityType: EntityType): SourceRecord[] {
    return Array.from(this.table(entityType).entries()).map(([id, fields]) => ({
      entityType,
      id,
      fields: { ...fields },
    }));
  }

  getFields(entityType: EntityType, id: RecordId): FieldMap | undefined {
    const fields = this.table(entityType).get(id);
    return fields ? { ...fields } : undefined;
  }

  count(entityType: EntityType): number {
    return this.table(entityType).size;
  }

  // Failure injection

  failNextBulkCreate(entityType: EntityType, failure: BulkCreateFailure = {}): void {
    const queue = this.bulkCreateFailures.get(entityType) ?? [];
    queue.push(failure);
    this.bulkCreateFailures.set(entityType, queue);
  }

  rejectCreateWhen(entityType: EntityType, when: CreatePredicate, error: Error): void {
    const rules = this.createRejections.get(entityType) ?? [];
    rules.push({ when, error });
    this.createRejections.set(entityType, rules);
  }

  failNextBulkUpdates(entityType: EntityType, times = 1): void {
    this.bulkUpdateFailures.set(entityType, (this.bulkUpdateFailures.get(entityType) ?? 0) + times);
  }

  /**
   * Any update that carries this field is rejected
   */
  rejectFieldUpdates(entityType: EntityType, field: string, message = `Field ${field} cannot be updated`): void {
    const fields = this.rejectedFields.get(entityType) ?? new Map<string, string>();
    fields.set(field, message);
    this.rejectedFields.set(entityType, fields);
  }

  failDescribe(entityType: EntityType): void {
    this.describeFailures.add(entityType);
  }

  // RecordStore

  async fetchRecord(entityType: EntityType, id: RecordId): Promise<SourceRecord | null> {
    const fields = this.table(entityType).get(id);
    return fields ? { entityType, id, fields: { ...fields } } : null;
  }

  async queryRecords(query: RecordQuery): Promise<SourceRecord[]> {
    const matches: SourceRecord[] = [];
    const ids = query.ids ? new Set(query.ids) : undefined;
    const anyOf = (query.anyOf ?? []).map(condition => ({
      field: condition.field,
      values: new Set(condition.in),
    }));
    const unrestricted = !ids && anyOf.length === 0;

    for (const [id, fields] of this.table(query.entityType)) {
      const selected =
        unrestricted ||
        (ids?.has(id) ?? false) ||
        anyOf.some(condition => {
          const value = fields[condition.field];
          return typeof value === 'string' && condition.values.has(value);
        });

      if (!selected) continue;

      const where = query.where ?? {};
      if (!Object.entries(where).every(([field, value]) => fields[field] === value)) {
        continue;
      }

      matches.push({ entityType: query.entityType, id, fields: { ...fields } });
      if (query.limit !== undefined && matches.length >= query.limit) {
        break;
      }
    }

    return matches;
  }

  async createRecord(entityType: EntityType, payload: FieldMap): Promise<RecordId> {
    return this.insert(entityType, payload);
  }

  async bulkCreate(entityType: EntityType, payloads: FieldMap[]): Promise<RecordId[]> {
    const injected = this.bulkCreateFailures.get(entityType)?.shift();
    if (injected) {
      const succeed = new Set(injected.succeedIndexes ?? []);
      const results = payloads.map((payload, index) =>
        succeed.has(index) ? this.insert(entityType, payload) : null
      );
      const reportResults = injected.reportResults ?? succeed.size > 0;
      throw new BulkOperationError(
        injected.message ?? `Bulk create of ${payloads.length} ${entityType} records failed`,
        reportResults ? results : undefined
      );
    }

    const results: Array<RecordId | null> = [];
    let failures = 0;
    for (const payload of payloads) {
      try {
        results.push(this.insert(entityType, payload));
      } catch {
        results.push(null);
        failures++;
      }
    }

    if (failures > 0) {
      throw new BulkOperationError(
        `${failures} of ${payloads.length} ${entityType} rows failed`,
        results
      );
    }

    return results.filter((id): id is RecordId => id !== null);
  }

  async updateRecord(entityType: EntityType, id: RecordId, fields: FieldMap): Promise<void> {
    this.validateUpdate(entityType, id, fields);
    this.applyUpdate(entityType, id, fields);
  }

  async bulkUpdate(entityType: EntityType, updates: RecordUpdate[]): Promise<void> {
    const remaining = this.bulkUpdateFailures.get(entityType) ?? 0;
    if (remaining > 0) {
      this.bulkUpdateFailures.set(entityType, remaining - 1);
      throw new BulkOperationError(`Bulk update of ${updates.length} ${entityType} records failed`);
    }

    for (const update of updates) {
      this.validateUpdate(entityType, update.id, update.fields);
    }
    for (const update of updates) {
      this.applyUpdate(entityType, update.id, update.fields);
    }
  }

  async deleteRecord(entityType: EntityType, id: RecordId): Promise<void> {
    if (!this.table(entityType).delete(id)) {
      throw new StoreApiError(`${entityType} ${id} not found`, 404, 'NOT_FOUND');
    }
  }

  async describeEntity(entityType: EntityType): Promise<FieldSpec[]> {
    const schema = this.schemas.get(entityType);
    if (!schema || this.describeFailures.has(entityType)) {
      throw new StoreApiError(`Unknown entity type ${entityType}`, 404, 'NOT_FOUND');
    }
    return schema.map(field => ({ ...field }));
  }

  private table(entityType: EntityType): Map<RecordId, FieldMap> {
    let table = this.records.get(entityType);
    if (!table) {
      table = new Map();
      this.records.set(entityType, table);
    }
    return table;
  }

  private insert(entityType: EntityType, payload: FieldMap): RecordId {
    for (const rule of this.createRejections.get(entityType) ?? []) {
      if (rule.when(payload)) {
        throw rule.error;
      }
    }

    const schema = this.schemas.get(entityType) ?? [];
    for (const field of schema) {
      const value = payload[field.name];
      if (field.required && (value === undefined || value === null || value === '')) {
        throw new StoreApiError(
          `Required field missing: ${field.name}`,
          400,
          'REQUIRED_FIELD_MISSING',
          `${entityType}.${field.name}`
        );
      }
    }

    const table = this.table(entityType);
    for (const unique of this.uniqueFields[entityType] ?? []) {
      const value = payload[unique];
      if (value === undefined || value === null) continue;
      for (const [existingId, fields] of table) {
        if (fields[unique] === value) {
          throw new DuplicateRecordError(entityType, existingId);
        }
      }
    }

    this.sequence++;
    const id = `${this.idPrefix}-${entityType}-${this.sequence}`;
    table.set(id, { ...payload });
    return id;
  }

  private validateUpdate(entityType: EntityType, id: RecordId, fields: FieldMap): void {
    if (!this.table(entityType).has(id)) {
      throw new StoreApiError(`${entityType} ${id} not found`, 404, 'NOT_FOUND');
    }

    const schema = this.schemas.get(entityType) ?? [];
    for (const name of Object.keys(fields)) {
      const rejected = this.rejectedFields.get(entityType)?.get(name);
      if (rejected) {
        throw new StoreApiError(rejected, 400, 'FIELD_REJECTED', `${entityType}.${name}`);
      }
      if (schema.find(field => field.name === name)?.immutableAfterCreate) {
        throw new StoreApiError(
          `Field ${name} is not updateable`,
          400,
          'INVALID_FIELD_FOR_UPDATE',
          `${entityType}.${name}`
        );
      }
    }
  }

  private applyUpdate(entityType: EntityType, id: RecordId, fields: FieldMap): void {
    const table = this.table(entityType);
    const current = table.get(id);
    if (current) {
      table.set(id, { ...current, ...fields });
    }
  }
}
