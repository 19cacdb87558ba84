import { z } from 'zod';
import path from 'path';
import { MigrationConfigError } from '../store/errors';

/**
 * Engine configuration schema
 * Validates the environment variables that tune batching, persistence and retries
 */
const EngineConfigSchema = z.object({
  batchSize: z.number().int().min(1).max(10000).default(200),
  maxCellsPerBatch: z.number().int().min(1).default(10000),
  flushTimeoutMs: z.number().int().min(0).default(120000),
  maxRetries: z.number().int().min(1).max(10).default(4),
  snapshotDir: z.string().min(1).default('migration-snapshots'),
  logDir: z.string().min(1).default(path.join('logs', 'migrations')),
  fileLogging: z.boolean().default(true),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

function intFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Load and validate engine configuration from environment variables
 *
 * @throws {MigrationConfigError} If a variable is present but invalid
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = EngineConfigSchema.safeParse({
    batchSize: intFromEnv(env.MIGRATION_BATCH_SIZE),
    maxCellsPerBatch: intFromEnv(env.MIGRATION_MAX_CELLS_PER_BATCH),
    flushTimeoutMs: intFromEnv(env.MIGRATION_FLUSH_TIMEOUT_MS),
    maxRetries: intFromEnv(env.MIGRATION_MAX_RETRIES),
    snapshotDir: env.MIGRATION_SNAPSHOT_DIR || undefined,
    logDir: env.MIGRATION_LOG_DIR || undefined,
    fileLogging: env.MIGRATION_FILE_LOGGING === undefined ? undefined : env.MIGRATION_FILE_LOGGING !== 'false',
  });

  if (!result.success) {
    throw toConfigError('Engine configuration validation failed', result.error);
  }

  return result.data;
}

/**
 * Convert zod issues into a MigrationConfigError listing every issue
 */
export function toConfigError(title: string, error: z.ZodError): MigrationConfigError {
  const issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return new MigrationConfigError(
    `${title}:\n${issues.map(issue => `  - ${issue}`).join('\n')}`,
    issues
  );
}
