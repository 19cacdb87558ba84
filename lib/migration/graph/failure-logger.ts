/**
 * Failure logger
 *
 * Keeps the run's contained failures in memory for the report and, when a log
 * directory is given, appends them to <dir>/<runId>/failures.log as JSONL.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { isMissingFileError } from '../../store/errors';
import { logger } from '../logging';
import { classifyError, ErrorCategory } from './error-classifier';

export type FailureKind =
  | 'RecordCreateFailure'
  | 'BatchFailure'
  | 'BackpatchFieldFailure'
  | 'ResolutionMiss'
  | 'PlaceholderPurgeFailure';

const FailureSchema = z.object({
  kind: z.enum([
    'RecordCreateFailure',
    'BatchFailure',
    'BackpatchFieldFailure',
    'ResolutionMiss',
    'PlaceholderPurgeFailure',
  ]),
  entityType: z.string(),
  sourceId: z.string().optional(),
  targetId: z.string().optional(),
  field: z.string().optional(),
  category: z.enum(['network', 'rate_limit', 'validation', 'permission', 'duplicate', 'batch', 'unknown']),
  message: z.string(),
  code: z.string().optional(),
  occurredAt: z.string(),
});

export type MigrationFailure = z.infer<typeof FailureSchema>;

export interface FailureInput {
  kind: FailureKind;
  entityType: string;
  sourceId?: string;
  targetId?: string;
  field?: string;
  error: unknown;
  category?: ErrorCategory;
}

export function toFailure(input: FailureInput): MigrationFailure {
  const classified = classifyError(input.error);
  return {
    kind: input.kind,
    entityType: input.entityType,
    ...(input.sourceId !== undefined ? { sourceId: input.sourceId } : {}),
    ...(input.targetId !== undefined ? { targetId: input.targetId } : {}),
    ...(input.field !== undefined ? { field: input.field } : {}),
    category: input.category ?? classified.category,
    message: classified.message,
    ...(classified.code ? { code: classified.code } : {}),
    occurredAt: new Date().toISOString(),
  };
}

export class FailureLogger {
  private readonly failures: MigrationFailure[] = [];
  private readonly logPath: string | null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly runId: string, baseLogPath?: string) {
    this.logPath = baseLogPath
      ? path.join(path.resolve(baseLogPath), runId.replace(/[^a-zA-Z0-9._-]/g, '_'), 'failures.log')
      : null;
  }

  async logFailure(input: FailureInput): Promise<MigrationFailure> {
    const failure = toFailure(input);
    this.failures.push(failure);
    await this.append([failure]);
    return failure;
  }

  async logFailuresBulk(inputs: FailureInput[]): Promise<MigrationFailure[]> {
    if (inputs.length === 0) {
      return [];
    }
    const failures = inputs.map(toFailure);
    this.failures.push(...failures);
    await this.append(failures);
    return failures;
  }

  getFailures(kind?: FailureKind): MigrationFailure[] {
    return kind ? this.failures.filter(failure => failure.kind === kind) : [...this.failures];
  }

  /**
   * Read failures back from the run's log file
   */
  async readFailures(): Promise<MigrationFailure[]> {
    if (!this.logPath) {
      return this.getFailures();
    }

    let content: string;
    try {
      content = await fs.readFile(this.logPath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    const failures: MigrationFailure[] = [];
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      try {
        const parsed = FailureSchema.safeParse(JSON.parse(trimmed));
        if (parsed.success) {
          failures.push(parsed.data);
        } else {
          logger.warn('Skipping malformed failure line', { runId: this.runId });
        }
      } catch (parseError) {
        logger.warn('Failed to parse failure line', {
          runId: this.runId,
          error: parseError instanceof Error ? parseError.message : String(parseError),
        });
      }
    }
    return failures;
  }

  private async append(failures: MigrationFailure[]): Promise<void> {
    const logPath = this.logPath;
    if (!logPath) {
      return;
    }

    const lines = failures.map(failure => JSON.stringify(failure)).join('\n') + '\n';
    const next = this.writeQueue
      .catch((error: unknown) => {
        logger.error('Previous failure log write failed - continuing', {
          runId: this.runId,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .then(async () => {
        await fs.mkdir(path.dirname(logPath), { recursive: true });
        await fs.appendFile(logPath, lines, { encoding: 'utf8', flag: 'a', mode: 0o640 });
      });

    this.writeQueue = next;
    await next;
  }
}
