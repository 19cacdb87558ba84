/**
 * Migration logging utilities
 * Console logger plus run-scoped event logging with file persistence
 */

import { getMigrationLogger, MigrationFileLogger } from './file-logger';
import { LogConfig, LogLevel as FileLogLevel, parseLogLevel } from './log-config';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function consoleThreshold(): LogLevel {
  switch (parseLogLevel(process.env.LOG_LEVEL)) {
    case 'DEBUG':
      return 'debug';
    case 'WARN':
      return 'warn';
    case 'ERROR':
      return 'error';
    default:
      return 'info';
  }
}

function getLogFunction(level: LogLevel): (...args: unknown[]) => void {
  switch (level) {
    case 'debug':
      return console.debug;
    case 'warn':
      return console.warn;
    case 'error':
      return console.error;
    default:
      return console.info;
  }
}

function write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[consoleThreshold()]) {
    return;
  }
  getLogFunction(level)(message, data ? JSON.stringify(data) : '');
}

/**
 * Console logger for code running outside a run's file logger
 */
export const logger = {
  info: (message: string, data?: Record<string, unknown>) => write('info', message, data),
  error: (message: string, data?: Record<string, unknown>) => write('error', message, data),
  warn: (message: string, data?: Record<string, unknown>) => write('warn', message, data),
  debug: (message: string, data?: Record<string, unknown>) => write('debug', message, data),
};

function toFileLogLevel(level: LogLevel): FileLogLevel {
  return parseLogLevel(level);
}

/**
 * Run-scoped event sink used by the engine.
 * Every event goes to the console logger; with a file config it is also written
 * to the run's log streams.
 */
export interface RunEventLog {
  event(message: string, data?: Record<string, unknown>, level?: LogLevel): Promise<void>;
  record(
    message: string,
    entityType: string,
    sourceId: string,
    targetId?: string,
    data?: Record<string, unknown>,
    level?: LogLevel
  ): Promise<void>;
  batch(message: string, batchNumber: number, data?: Record<string, unknown>, level?: LogLevel): Promise<void>;
  error(message: string, error: unknown, data?: Record<string, unknown>): Promise<void>;
}

export function createRunEventLog(runId: string, fileConfig?: LogConfig): RunEventLog {
  const fileLogger = fileConfig ? getMigrationLogger(runId, fileConfig) : null;

  async function toFile(task: (log: MigrationFileLogger) => Promise<void>): Promise<void> {
    if (!fileLogger) return;
    try {
      await task(await fileLogger);
    } catch (error) {
      logger.error(`Failed to write run log for ${runId}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return {
    async event(message, data, level = 'info') {
      write(level, `[Run ${runId}] ${message}`, data);
      await toFile(log => log.logMigration(toFileLogLevel(level), message, data));
    },

    async record(message, entityType, sourceId, targetId, data, level = 'debug') {
      write(level, `[Run ${runId}] ${message}`, { ...data, entityType, sourceId, targetId });
      await toFile(log => log.logRecord(toFileLogLevel(level), message, entityType, sourceId, targetId, data));
    },

    async batch(message, batchNumber, data, level = 'info') {
      write(level, `[Run ${runId}] ${message}`, { ...data, batchNumber });
      await toFile(log => log.logBatch(toFileLogLevel(level), message, batchNumber, data));
    },

    async error(message, error, data) {
      const detail = error instanceof Error ? error : String(error);
      write('error', `[Run ${runId}] ${message}`, {
        ...data,
        error: detail instanceof Error ? detail.message : detail,
      });
      await toFile(log => log.logError(message, detail, data));
    },
  };
}

/**
 * Format a duration in ms for log lines and reports
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3600000) return `${(ms / 60000).toFixed(1)}m`;
  return `${(ms / 3600000).toFixed(1)}h`;
}
