/**
 * Error types raised by record stores and the migration engine
 */

import type { RecordId } from './types';

/**
 * Base error for record store API failures
 */
export class StoreApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly errorCode?: string,
    public readonly errorDetail?: string,
    public readonly response?: unknown
  ) {
    super(message);
    this.name = 'StoreApiError';
    Object.setPrototypeOf(this, StoreApiError.prototype);
  }

  isServerError(): boolean {
    return this.statusCode !== undefined && this.statusCode >= 500;
  }

  isRateLimited(): boolean {
    return this.statusCode === 429;
  }
}

/**
 * Unique-constraint violation on create.
 * `existingId` names the target record that already holds the unique value, when the store reports it.
 */
export class DuplicateRecordError extends Error {
  constructor(
    public readonly entityType: string,
    public readonly existingId?: RecordId,
    message?: string
  ) {
    super(message ?? `Duplicate ${entityType}${existingId ? ` with id: ${existingId}` : ''}`);
    this.name = 'DuplicateRecordError';
    Object.setPrototypeOf(this, DuplicateRecordError.prototype);
  }
}

/**
 * Bulk create/update failure.
 * `results[i]` is the id produced for payload i, or null when that row failed.
 */
export class BulkOperationError extends Error {
  constructor(
    message: string,
    public readonly results?: Array<RecordId | null>
  ) {
    super(message);
    this.name = 'BulkOperationError';
    Object.setPrototypeOf(this, BulkOperationError.prototype);
  }
}

/**
 * Run-aborting failure: metadata or a placeholder record could not be obtained
 */
export class FatalSetupError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'FatalSetupError';
    Object.setPrototypeOf(this, FatalSetupError.prototype);
  }
}

/**
 * Thrown when a record the caller explicitly required could not be created
 */
export class MaterializationError extends Error {
  constructor(
    public readonly entityType: string,
    public readonly sourceId: RecordId,
    message: string
  ) {
    super(message);
    this.name = 'MaterializationError';
    Object.setPrototypeOf(this, MaterializationError.prototype);
  }
}

/**
 * Bulk response whose length does not match the submitted batch
 */
export class BatchOrderError extends Error {
  constructor(
    public readonly expected: number,
    public readonly received: number
  ) {
    super(`Bulk response returned ${received} results for ${expected} payloads`);
    this.name = 'BatchOrderError';
    Object.setPrototypeOf(this, BatchOrderError.prototype);
  }
}

export class FlushTimeoutError extends Error {
  constructor(public readonly timeoutMs: number, operation: string) {
    super(`${operation} did not complete within ${timeoutMs}ms`);
    this.name = 'FlushTimeoutError';
    Object.setPrototypeOf(this, FlushTimeoutError.prototype);
  }
}

/**
 * Error for configuration and plan issues
 */
export class MigrationConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'MigrationConfigError';
    Object.setPrototypeOf(this, MigrationConfigError.prototype);
  }
}

/**
 * Check if an error is transient and should be retried
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof StoreApiError) {
    // Rate limits, server errors and network errors (no status code)
    return (
      error.isRateLimited() ||
      error.isServerError() ||
      error.statusCode === undefined
    );
  }

  if (error instanceof FlushTimeoutError) {
    return false;
  }

  if (typeof error === 'object' && error !== null && 'code' in error) {
    return ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN'].includes(String(error.code));
  }

  return false;
}

/**
 * ENOENT from fs, whichever realm created the error object
 */
export function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Extract retry-after value from error (in seconds)
 */
export function getRetryAfter(error: StoreApiError): number | null {
  const response = error.response;
  if (!response || typeof response !== 'object' || !('headers' in response)) {
    return null;
  }

  const headers = response.headers;
  if (!headers || typeof headers !== 'object' || !('retry-after' in headers)) {
    return null;
  }

  const seconds = parseInt(String(headers['retry-after']), 10);
  return isNaN(seconds) ? null : seconds;
}
