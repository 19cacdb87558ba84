import { describe, it, expect } from '@jest/globals';
import path from 'path';
import { MigrationConfigError } from '../../lib/store/errors';
import { loadEngineConfig } from '../../lib/migration/config';

describe('loadEngineConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(loadEngineConfig({})).toEqual({
      batchSize: 200,
      maxCellsPerBatch: 10000,
      flushTimeoutMs: 120000,
      maxRetries: 4,
      snapshotDir: 'migration-snapshots',
      logDir: path.join('logs', 'migrations'),
      fileLogging: true,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadEngineConfig({
      MIGRATION_BATCH_SIZE: '50',
      MIGRATION_FLUSH_TIMEOUT_MS: '0',
      MIGRATION_SNAPSHOT_DIR: '/tmp/snapshots',
      MIGRATION_FILE_LOGGING: 'false',
    });

    expect(config.batchSize).toBe(50);
    expect(config.flushTimeoutMs).toBe(0);
    expect(config.snapshotDir).toBe('/tmp/snapshots');
    expect(config.fileLogging).toBe(false);
  });

  it('lists every invalid variable', () => {
    let caught: unknown;
    try {
      loadEngineConfig({ MIGRATION_BATCH_SIZE: '0', MIGRATION_MAX_RETRIES: 'many' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MigrationConfigError);
    if (caught instanceof MigrationConfigError) {
      expect(caught.issues.map(issue => issue.split(':')[0])).toEqual(['batchSize', 'maxRetries']);
      expect(caught.message.startsWith('Engine configuration validation failed:\n  - batchSize: ')).toBe(true);
    }
  });
});
