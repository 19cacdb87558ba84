/**
 * Log configuration for migration runs
 *
 * File-based logging with size rotation and age-based cleanup.
 */

import path from 'path';
import { promises as fs } from 'fs';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogConfig {
  /** Base directory for all run logs */
  baseDir: string;
  /** Log level threshold */
  level: LogLevel;
  /** Maximum file size before rotation (bytes) */
  maxFileSize: number;
  /** Maximum age of rotated log files (days) */
  maxAge: number;
  /** Whether to echo entries to the console */
  consoleEnabled: boolean;
  /** Interval of the buffered flush (ms) */
  flushIntervalMs: number;
}

export interface MigrationLogPaths {
  /** Directory for this run's logs */
  runDir: string;
  /** Run-level events */
  migrationLog: string;
  /** Per-record create/adopt/update events */
  recordsLog: string;
  /** Flush-level events */
  batchesLog: string;
  /** Detailed error traces */
  errorsLog: string;
  /** Failure records (JSONL) */
  failuresLog: string;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return 'DEBUG';
    case 'WARN':
      return 'WARN';
    case 'ERROR':
      return 'ERROR';
    default:
      return 'INFO';
  }
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  baseDir: path.resolve(process.cwd(), process.env.MIGRATION_LOG_DIR || path.join('logs', 'migrations')),
  level: parseLogLevel(process.env.LOG_LEVEL),
  maxFileSize: 50 * 1024 * 1024, // 50MB
  maxAge: 30,
  consoleEnabled: process.env.MIGRATION_LOG_CONSOLE === 'true',
  flushIntervalMs: 1000,
};

/**
 * Get log paths for a specific run
 */
export function getMigrationLogPaths(
  runId: string,
  baseDir: string = DEFAULT_LOG_CONFIG.baseDir
): MigrationLogPaths {
  // Keep the run id usable as a directory name
  const safeId = runId.replace(/[^a-zA-Z0-9._-]/g, '_');
  const runDir = path.join(baseDir, safeId);

  return {
    runDir,
    migrationLog: path.join(runDir, 'migration.log'),
    recordsLog: path.join(runDir, 'records.log'),
    batchesLog: path.join(runDir, 'batches.log'),
    errorsLog: path.join(runDir, 'errors.log'),
    failuresLog: path.join(runDir, 'failures.log'),
  };
}

export async function ensureLogDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a log level passes the configured threshold
 */
export function shouldLog(level: LogLevel, config: LogConfig = DEFAULT_LOG_CONFIG): boolean {
  return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[config.level];
}

export function formatLogLevel(level: LogLevel): string {
  return level.padEnd(5, ' ');
}

/**
 * Check if a file needs rotation based on size
 */
export async function needsRotation(filePath: string, maxSize: number): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size >= maxSize;
  } catch {
    // Not created yet
    return false;
  }
}

/**
 * Rotate a log file (rename with timestamp)
 */
export async function rotateLogFile(filePath: string): Promise<void> {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  await fs.rename(filePath, `${filePath}.${timestamp}`);
}

/**
 * Remove rotated log files older than maxAge days
 */
export async function cleanupOldLogs(runDir: string, maxAge: number): Promise<number> {
  const files = await fs.readdir(runDir);
  const maxAgeMs = maxAge * 24 * 60 * 60 * 1000;
  const now = Date.now();
  let removed = 0;

  for (const file of files) {
    // Current files carry no timestamp suffix
    if (!file.includes('.log.')) continue;

    const filePath = path.join(runDir, file);
    const stats = await fs.stat(filePath);
    if (now - stats.mtimeMs > maxAgeMs) {
      await fs.unlink(filePath);
      removed++;
    }
  }

  return removed;
}
