/**
 * Record store contracts
 * Shapes shared by the source store, the target store and the migration engine
 */

export type RecordId = string;

export type EntityType = string;

export type FieldKind = 'scalar' | 'reference';

export type FieldDataType =
  | 'string'
  | 'textarea'
  | 'email'
  | 'boolean'
  | 'number'
  | 'date'
  | 'picklist'
  | 'multipicklist'
  | 'id';

/**
 * Field description returned by schema introspection
 */
export interface FieldSpec {
  name: string;
  kind: FieldKind;
  /** Target entity type when kind is 'reference' */
  referencedType?: EntityType;
  required: boolean;
  immutableAfterCreate: boolean;
  dataType?: FieldDataType;
  /** Enumerated value domain for picklist fields */
  allowedValues?: string[];
  /** Defaults to true */
  createable?: boolean;
}

export type FieldValue = unknown;

export type FieldMap = Record<string, FieldValue>;

export interface SourceRecord {
  entityType: EntityType;
  id: RecordId;
  fields: FieldMap;
}

/**
 * Record filter
 *
 * A record matches when its id is one of `ids` OR any `anyOf` condition holds.
 * `where` equality conditions are ANDed on top. Without `ids` and `anyOf`
 * every record of the type matches.
 */
export interface RecordQuery {
  entityType: EntityType;
  ids?: RecordId[];
  anyOf?: Array<{ field: string; in: RecordId[] }>;
  where?: FieldMap;
  limit?: number;
}

export interface RecordUpdate {
  id: RecordId;
  fields: FieldMap;
}

/**
 * Query and command API of a record store
 */
export interface RecordStore {
  /** Resolves null when the record does not exist */
  fetchRecord(entityType: EntityType, id: RecordId): Promise<SourceRecord | null>;
  queryRecords(query: RecordQuery): Promise<SourceRecord[]>;
  /** Rejects with DuplicateRecordError when a unique constraint is hit */
  createRecord(entityType: EntityType, payload: FieldMap): Promise<RecordId>;
  /**
   * Resolves ids in submission order. Rejects with BulkOperationError, which may
   * carry positional partial results.
   */
  bulkCreate(entityType: EntityType, payloads: FieldMap[]): Promise<RecordId[]>;
  updateRecord(entityType: EntityType, id: RecordId, fields: FieldMap): Promise<void>;
  bulkUpdate(entityType: EntityType, updates: RecordUpdate[]): Promise<void>;
  deleteRecord(entityType: EntityType, id: RecordId): Promise<void>;
  describeEntity(entityType: EntityType): Promise<FieldSpec[]>;
}

/**
 * Resolves category/subtype references by stable name rather than identity
 */
export interface StableNameLookup {
  resolveStableName(entityType: EntityType, sourceRef: RecordId): Promise<RecordId | null>;
}
