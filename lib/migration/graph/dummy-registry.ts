/**
 * Dummy Registry
 *
 * One placeholder target record per entity type, standing in for required
 * references whose real counterpart has not been created yet. Placeholders are
 * created once per run in dependency order and never replaced.
 */

import { FatalSetupError } from '../../store/errors';
import type { EntityType, FieldMap, FieldSpec, RecordId, RecordStore } from '../../store/types';
import type { EntityMetadataTable } from './entity-metadata';
import type { RunEventLog } from '../logging';

const TODAY_TOKEN = /^\$today(?:\+(\d+))?$/;
const DUMMY_TOKEN = /^\$dummy:(.+)$/;

export interface DummyRegistryOptions {
  target: RecordStore;
  metadata: EntityMetadataTable;
  /** Field values per type; strings may use $today, $today+N and $dummy:<Type> */
  templates?: Record<EntityType, FieldMap>;
  /** Types never given a placeholder (continuity and stable-name types) */
  external?: ReadonlySet<EntityType>;
  /** Types whose placeholder survives the run and is reused by later runs */
  retain?: Iterable<EntityType>;
  events?: RunEventLog;
  now?: () => Date;
}

export interface DummyPurgeResult {
  deleted: EntityType[];
  retained: EntityType[];
  failed: Array<{ entityType: EntityType; targetId: RecordId; error: string }>;
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function placeholderName(entityType: EntityType): string {
  return `NO ${entityType.replace(/([a-z0-9])([A-Z])/g, '$1 $2').toUpperCase()}`;
}

export class DummyRegistry {
  private readonly ids = new Map<EntityType, RecordId>();
  private readonly pending = new Map<EntityType, Promise<RecordId>>();
  private readonly creationOrder: EntityType[] = [];
  private readonly retain: Set<EntityType>;
  private readonly external: ReadonlySet<EntityType>;

  constructor(private readonly options: DummyRegistryOptions) {
    this.retain = new Set(options.retain ?? []);
    this.external = options.external ?? new Set();
  }

  /**
   * Placeholder id for a type, creating it on first use
   *
   * @throws {FatalSetupError} When the placeholder cannot be created
   */
  ensure(entityType: EntityType): Promise<RecordId> {
    return this.ensureWithPath(entityType, []);
  }

  async ensureAll(entityTypes: Iterable<EntityType>): Promise<Record<EntityType, RecordId>> {
    const created: Record<EntityType, RecordId> = {};
    for (const type of entityTypes) {
      created[type] = await this.ensure(type);
    }
    return created;
  }

  get(entityType: EntityType): RecordId | undefined {
    return this.ids.get(entityType);
  }

  isDummy(entityType: EntityType, id: RecordId): boolean {
    return this.ids.get(entityType) === id;
  }

  entries(): Array<{ entityType: EntityType; targetId: RecordId }> {
    return this.creationOrder.flatMap(entityType => {
      const targetId = this.ids.get(entityType);
      return targetId ? [{ entityType, targetId }] : [];
    });
  }

  /**
   * Delete every placeholder except retained ones, dependants first
   */
  async purge(): Promise<DummyPurgeResult> {
    const result: DummyPurgeResult = { deleted: [], retained: [], failed: [] };

    for (const { entityType, targetId } of this.entries().reverse()) {
      if (this.retain.has(entityType)) {
        result.retained.push(entityType);
        continue;
      }

      try {
        await this.options.target.deleteRecord(entityType, targetId);
        result.deleted.push(entityType);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        result.failed.push({ entityType, targetId, error: message });
        await this.options.events?.error('Failed to delete placeholder record', error, { entityType, targetId });
      }
    }

    return result;
  }

  private ensureWithPath(entityType: EntityType, path: EntityType[]): Promise<RecordId> {
    const existing = this.ids.get(entityType);
    if (existing) {
      return Promise.resolve(existing);
    }

    if (path.includes(entityType)) {
      return Promise.reject(
        new FatalSetupError(`Placeholder records form a cycle: ${[...path, entityType].join(' -> ')}`)
      );
    }

    let pending = this.pending.get(entityType);
    if (!pending) {
      pending = this.create(entityType, [...path, entityType]).finally(() => {
        this.pending.delete(entityType);
      });
      this.pending.set(entityType, pending);
    }
    return pending;
  }

  private async create(entityType: EntityType, path: EntityType[]): Promise<RecordId> {
    if (this.external.has(entityType)) {
      throw new FatalSetupError(`${entityType} records cannot be given a placeholder`);
    }

    const payload = await this.buildPayload(entityType, path);

    let targetId: RecordId;
    try {
      const adopted = this.retain.has(entityType) ? await this.findRetained(entityType) : null;
      if (adopted) {
        this.register(entityType, adopted);
        await this.options.events?.event('Reusing retained placeholder record', { entityType, targetId: adopted });
        return adopted;
      }

      targetId = await this.options.target.createRecord(entityType, payload);
    } catch (error) {
      throw new FatalSetupError(
        `Unable to create placeholder ${entityType}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    this.register(entityType, targetId);
    await this.options.events?.event('Placeholder record created', { entityType, targetId });
    return targetId;
  }

  private register(entityType: EntityType, targetId: RecordId): void {
    this.ids.set(entityType, targetId);
    this.creationOrder.push(entityType);
  }

  /**
   * Template values plus synthesized values for every other required field
   */
  async buildPayload(entityType: EntityType, path: EntityType[] = [entityType]): Promise<FieldMap> {
    const template = this.options.templates?.[entityType] ?? {};
    const payload: FieldMap = {};

    for (const [field, value] of Object.entries(template)) {
      payload[field] = await this.resolveTemplateValue(value, path);
    }

    for (const field of this.options.metadata.get(entityType)) {
      if (!field.required || field.createable === false || field.name in payload) continue;

      if (field.kind === 'reference') {
        if (field.referencedType && !this.external.has(field.referencedType)) {
          payload[field.name] = await this.ensureWithPath(field.referencedType, path);
        }
        continue;
      }

      payload[field.name] = this.synthesizeScalar(entityType, field);
    }

    return payload;
  }

  private async resolveTemplateValue(value: unknown, path: EntityType[]): Promise<unknown> {
    if (typeof value !== 'string') {
      return value;
    }

    const today = TODAY_TOKEN.exec(value);
    if (today) {
      const date = this.now();
      date.setUTCDate(date.getUTCDate() + (today[1] ? parseInt(today[1], 10) : 0));
      return formatDate(date);
    }

    const dummy = DUMMY_TOKEN.exec(value);
    if (dummy) {
      return this.ensureWithPath(dummy[1], path);
    }

    return value;
  }

  private synthesizeScalar(entityType: EntityType, field: FieldSpec): unknown {
    switch (field.dataType) {
      case 'picklist':
      case 'multipicklist':
        return field.allowedValues?.[0] ?? placeholderName(entityType);
      case 'date':
        return formatDate(this.now());
      case 'boolean':
        return false;
      case 'number':
        return 0;
      case 'email':
        return 'placeholder@example.invalid';
      default:
        return placeholderName(entityType);
    }
  }

  private async findRetained(entityType: EntityType): Promise<RecordId | null> {
    const where: FieldMap = {};
    for (const [field, value] of Object.entries(this.options.templates?.[entityType] ?? {})) {
      if (typeof value === 'string' && (TODAY_TOKEN.test(value) || DUMMY_TOKEN.test(value))) continue;
      where[field] = value;
    }
    if (Object.keys(where).length === 0) {
      return null;
    }

    const matches = await this.options.target.queryRecords({ entityType, where, limit: 1 });
    return matches[0]?.id ?? null;
  }

  private now(): Date {
    return this.options.now ? new Date(this.options.now().getTime()) : new Date();
  }
}
