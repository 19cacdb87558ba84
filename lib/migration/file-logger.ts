/**
 * File-based logger for migration runs
 *
 * Structured JSON lines to one stream per concern, buffered and flushed on an
 * interval. ERROR entries are flushed immediately.
 */

import { createWriteStream, WriteStream } from 'fs';
import {
  LogConfig,
  LogLevel,
  MigrationLogPaths,
  DEFAULT_LOG_CONFIG,
  getMigrationLogPaths,
  ensureLogDirectory,
  shouldLog,
  formatLogLevel,
  needsRotation,
  rotateLogFile,
  cleanupOldLogs,
} from './log-config';

export type LogStream = 'migration' | 'records' | 'batches' | 'errors';

const LOG_STREAMS: LogStream[] = ['migration', 'records', 'batches', 'errors'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  runId: string;
  message: string;
  [key: string]: unknown;
}

export class MigrationFileLogger {
  private readonly runId: string;
  private readonly paths: MigrationLogPaths;
  private readonly config: LogConfig;
  private readonly streams = new Map<LogStream, WriteStream>();
  private readonly writeQueues = new Map<LogStream, string[]>();
  private flushTimer: NodeJS.Timeout | null = null;
  private isShuttingDown = false;

  constructor(runId: string, config: LogConfig = DEFAULT_LOG_CONFIG) {
    this.runId = runId;
    this.config = config;
    this.paths = getMigrationLogPaths(runId, config.baseDir);
  }

  /**
   * Create the run directory and open the streams
   */
  async initialize(): Promise<void> {
    await ensureLogDirectory(this.paths.runDir);

    await this.createStream('migration', this.paths.migrationLog);
    await this.createStream('records', this.paths.recordsLog);
    await this.createStream('batches', this.paths.batchesLog);
    await this.createStream('errors', this.paths.errorsLog);

    this.flushTimer = setInterval(() => {
      if (!this.isShuttingDown) {
        this.flushAll().catch((error: unknown) => {
          console.error(`Periodic log flush failed for run ${this.runId}:`, error);
        });
      }
    }, this.config.flushIntervalMs);
    this.flushTimer.unref();

    await cleanupOldLogs(this.paths.runDir, this.config.maxAge);
  }

  private async createStream(streamType: LogStream, filePath: string): Promise<void> {
    if (await needsRotation(filePath, this.config.maxFileSize)) {
      await rotateLogFile(filePath);
    }

    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
    stream.on('error', (error) => {
      console.error(`Error writing to ${streamType} log:`, error);
    });

    this.streams.set(streamType, stream);
    this.writeQueues.set(streamType, []);
  }

  async logMigration(level: LogLevel, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log('migration', level, message, data);
  }

  /**
   * Per-record event (records.log)
   */
  async logRecord(
    level: LogLevel,
    message: string,
    entityType: string,
    sourceId: string,
    targetId?: string,
    data?: Record<string, unknown>
  ): Promise<void> {
    await this.log('records', level, message, { ...data, entityType, sourceId, targetId });
  }

  /**
   * Flush-level event (batches.log)
   */
  async logBatch(
    level: LogLevel,
    message: string,
    batchNumber: number,
    data?: Record<string, unknown>
  ): Promise<void> {
    await this.log('batches', level, message, { ...data, batchNumber });
  }

  async logError(
    message: string,
    error: Error | string,
    data?: Record<string, unknown>
  ): Promise<void> {
    await this.log('errors', 'ERROR', message, {
      ...data,
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined,
    });
  }

  private async log(
    stream: LogStream,
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ): Promise<void> {
    if (!shouldLog(level, this.config)) {
      return;
    }

    const entry: LogEntry = {
      ...data,
      timestamp: new Date().toISOString(),
      level,
      runId: this.runId,
      message,
    };

    this.writeQueues.get(stream)?.push(JSON.stringify(entry) + '\n');

    if (this.config.consoleEnabled) {
      console.log(`[${entry.timestamp}] [${formatLogLevel(level)}] [${stream}] ${message}`);
    }

    if (level === 'ERROR') {
      await this.flush(stream);
    }
  }

  private async flush(stream: LogStream): Promise<void> {
    const queue = this.writeQueues.get(stream);
    const writeStream = this.streams.get(stream);

    if (!queue || !writeStream || queue.length === 0) {
      return;
    }

    const data = queue.join('');
    queue.length = 0;

    return new Promise((resolve, reject) => {
      writeStream.write(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  async flushAll(): Promise<void> {
    await Promise.all(LOG_STREAMS.map(stream => this.flush(stream)));
  }

  /**
   * Flush buffers and close streams
   */
  async shutdown(): Promise<void> {
    this.isShuttingDown = true;

    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }

    await this.flushAll();

    await Promise.all(
      Array.from(this.streams.values()).map(
        stream => new Promise<void>(resolve => stream.end(() => resolve()))
      )
    );
    this.streams.clear();
  }

  getLogPaths(): MigrationLogPaths {
    return this.paths;
  }
}

/**
 * Keeps one logger per run id
 */
class LoggerRegistry {
  private readonly loggers = new Map<string, Promise<MigrationFileLogger>>();

  getLogger(runId: string, config?: LogConfig): Promise<MigrationFileLogger> {
    let pending = this.loggers.get(runId);

    if (!pending) {
      const logger = new MigrationFileLogger(runId, config);
      pending = logger.initialize().then(() => logger);
      this.loggers.set(runId, pending);
      pending.catch(() => this.loggers.delete(runId));
    }

    return pending;
  }

  async removeLogger(runId: string): Promise<void> {
    const pending = this.loggers.get(runId);
    if (pending) {
      this.loggers.delete(runId);
      const logger = await pending;
      await logger.shutdown();
    }
  }

  async shutdownAll(): Promise<void> {
    const pending = Array.from(this.loggers.values());
    this.loggers.clear();
    const loggers = await Promise.all(pending);
    await Promise.all(loggers.map(logger => logger.shutdown()));
  }
}

const loggerRegistry = new LoggerRegistry();

export function getMigrationLogger(runId: string, config?: LogConfig): Promise<MigrationFileLogger> {
  return loggerRegistry.getLogger(runId, config);
}

export function removeMigrationLogger(runId: string): Promise<void> {
  return loggerRegistry.removeLogger(runId);
}

/**
 * Shutdown all active loggers (call during process shutdown)
 */
export function shutdownAllLoggers(): Promise<void> {
  return loggerRegistry.shutdownAll();
}
