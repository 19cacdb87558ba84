/**
 * Snapshot store
 *
 * Append-only log of (entity type, source id, target id, original record)
 * written in Phase 1 and read once per type in Phase 2. The file store keeps
 * one JSONL file per entity type.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { isMissingFileError } from '../../store/errors';
import type { EntityType, FieldMap, RecordId } from '../../store/types';
import { logger } from '../logging';

const SnapshotSchema = z.object({
  entityType: z.string(),
  sourceId: z.string(),
  targetId: z.string(),
  record: z.record(z.unknown()),
  appliedReferences: z.record(z.string()).optional(),
  createdAt: z.string(),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

export interface SnapshotStore {
  appendSnapshot(
    entityType: EntityType,
    sourceId: RecordId,
    targetId: RecordId,
    record: FieldMap,
    appliedReferences?: Record<string, RecordId>
  ): Promise<void>;
  readSnapshots(entityType: EntityType): Promise<Snapshot[]>;
  clearSnapshots(): Promise<void>;
  listEntityTypes(): Promise<EntityType[]>;
}

function buildSnapshot(
  entityType: EntityType,
  sourceId: RecordId,
  targetId: RecordId,
  record: FieldMap,
  appliedReferences?: Record<string, RecordId>
): Snapshot {
  return {
    entityType,
    sourceId,
    targetId,
    record: { ...record },
    ...(appliedReferences ? { appliedReferences: { ...appliedReferences } } : {}),
    createdAt: new Date().toISOString(),
  };
}

export class InMemorySnapshotStore implements SnapshotStore {
  private readonly snapshots = new Map<EntityType, Snapshot[]>();

  async appendSnapshot(
    entityType: EntityType,
    sourceId: RecordId,
    targetId: RecordId,
    record: FieldMap,
    appliedReferences?: Record<string, RecordId>
  ): Promise<void> {
    const list = this.snapshots.get(entityType) ?? [];
    list.push(buildSnapshot(entityType, sourceId, targetId, record, appliedReferences));
    this.snapshots.set(entityType, list);
  }

  async readSnapshots(entityType: EntityType): Promise<Snapshot[]> {
    return (this.snapshots.get(entityType) ?? []).map(snapshot => ({ ...snapshot }));
  }

  async clearSnapshots(): Promise<void> {
    this.snapshots.clear();
  }

  async listEntityTypes(): Promise<EntityType[]> {
    return Array.from(this.snapshots.keys());
  }
}

const SNAPSHOT_EXTENSION = '.jsonl';

export class FileSnapshotStore implements SnapshotStore {
  private readonly baseDir: string;
  private readonly writeQueue = new Map<EntityType, Promise<void>>();

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  private filePath(entityType: EntityType): string {
    return path.join(this.baseDir, `${entityType.replace(/[^a-zA-Z0-9._-]/g, '_')}${SNAPSHOT_EXTENSION}`);
  }

  private async enqueueWrite(entityType: EntityType, task: () => Promise<void>): Promise<void> {
    const previous = this.writeQueue.get(entityType) ?? Promise.resolve();
    const next = previous
      .catch((error: unknown) => {
        logger.error('Previous snapshot write failed - continuing', {
          entityType,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .then(task);

    this.writeQueue.set(entityType, next);

    try {
      await next;
    } finally {
      if (this.writeQueue.get(entityType) === next) {
        this.writeQueue.delete(entityType);
      }
    }
  }

  async appendSnapshot(
    entityType: EntityType,
    sourceId: RecordId,
    targetId: RecordId,
    record: FieldMap,
    appliedReferences?: Record<string, RecordId>
  ): Promise<void> {
    const line = JSON.stringify(buildSnapshot(entityType, sourceId, targetId, record, appliedReferences)) + '\n';

    await this.enqueueWrite(entityType, async () => {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.appendFile(this.filePath(entityType), line, { encoding: 'utf8', flag: 'a' });
    });
  }

  async readSnapshots(entityType: EntityType): Promise<Snapshot[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath(entityType), 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    const snapshots: Snapshot[] = [];
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      try {
        const parsed = SnapshotSchema.safeParse(JSON.parse(trimmed));
        if (parsed.success) {
          snapshots.push(parsed.data);
        } else {
          logger.warn('Skipping malformed snapshot line', { entityType, issues: parsed.error.issues.length });
        }
      } catch (parseError) {
        logger.warn('Skipping unreadable snapshot line', {
          entityType,
          error: parseError instanceof Error ? parseError.message : String(parseError),
        });
      }
    }

    return snapshots;
  }

  async clearSnapshots(): Promise<void> {
    const files = await this.readDir();
    await Promise.all(
      files
        .filter(file => file.endsWith(SNAPSHOT_EXTENSION))
        .map(file => fs.unlink(path.join(this.baseDir, file)))
    );
    logger.info('Cleared snapshot files', { baseDir: this.baseDir });
  }

  async listEntityTypes(): Promise<EntityType[]> {
    const types: EntityType[] = [];
    for (const file of await this.readDir()) {
      if (!file.endsWith(SNAPSHOT_EXTENSION)) continue;
      // Type names are read back from the first line rather than the sanitized file name
      const content = await fs.readFile(path.join(this.baseDir, file), 'utf8');
      const firstLine = content.split('\n').find(line => line.trim().length > 0);
      if (!firstLine) continue;
      try {
        const parsed = SnapshotSchema.safeParse(JSON.parse(firstLine));
        if (parsed.success) {
          types.push(parsed.data.entityType);
        }
      } catch (parseError) {
        logger.warn('Skipping unreadable snapshot file', {
          file,
          error: parseError instanceof Error ? parseError.message : String(parseError),
        });
      }
    }
    return types;
  }

  private async readDir(): Promise<string[]> {
    try {
      return await fs.readdir(this.baseDir);
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }
  }
}
