/**
 * Error classification for migration failures
 *
 * - network: connectivity or server trouble (retryable)
 * - rate_limit: store throttling (retryable with backoff)
 * - validation: rejected data (not retryable without a fix)
 * - permission: authorization failures (not retryable)
 * - duplicate: unique-constraint conflicts (recovered by adoption when an id is named)
 * - batch: a bulk submission failed as a whole
 * - unknown: anything else
 */

import {
  BatchOrderError,
  BulkOperationError,
  DuplicateRecordError,
  FlushTimeoutError,
  StoreApiError,
} from '../../store/errors';

export type ErrorCategory =
  | 'network'
  | 'rate_limit'
  | 'validation'
  | 'permission'
  | 'duplicate'
  | 'batch'
  | 'unknown';

export interface ClassifiedError {
  category: ErrorCategory;
  message: string;
  shouldRetry: boolean;
  code?: string;
  details?: Record<string, unknown>;
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof DuplicateRecordError) {
    return {
      category: 'duplicate',
      message: error.message,
      shouldRetry: false,
      code: 'DUPLICATE_RECORD',
      details: error.existingId ? { existingId: error.existingId } : undefined,
    };
  }

  if (error instanceof FlushTimeoutError) {
    return {
      category: 'network',
      message: error.message,
      shouldRetry: false,
      code: 'FLUSH_TIMEOUT',
      details: { timeoutMs: error.timeoutMs },
    };
  }

  if (error instanceof BulkOperationError || error instanceof BatchOrderError) {
    return {
      category: 'batch',
      message: error.message,
      shouldRetry: false,
      code: error instanceof BatchOrderError ? 'BATCH_ORDER_MISMATCH' : 'BULK_OPERATION_FAILED',
    };
  }

  if (error instanceof StoreApiError) {
    const { statusCode, errorCode, errorDetail } = error;
    const details = { statusCode, errorCode, errorDetail };

    if (error.isRateLimited()) {
      return { category: 'rate_limit', message: 'Store rate limit exceeded', shouldRetry: true, code: 'RATE_LIMIT_EXCEEDED', details };
    }

    if (statusCode === undefined || error.isServerError()) {
      return {
        category: 'network',
        message: statusCode ? `Server error: ${statusCode}` : error.message,
        shouldRetry: true,
        code: 'SERVER_ERROR',
        details,
      };
    }

    if (statusCode === 401 || statusCode === 403) {
      return { category: 'permission', message: 'Permission denied', shouldRetry: false, code: 'PERMISSION_DENIED', details };
    }

    return {
      category: 'validation',
      message: error.message,
      shouldRetry: false,
      code: errorCode ?? 'VALIDATION_ERROR',
      details,
    };
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnrefused') ||
      message.includes('econnreset')
    ) {
      return { category: 'network', message: error.message, shouldRetry: true, code: 'NETWORK_ERROR' };
    }

    if (message.includes('required') || message.includes('invalid')) {
      return { category: 'validation', message: error.message, shouldRetry: false, code: 'VALIDATION_ERROR' };
    }
  }

  return {
    category: 'unknown',
    message: error instanceof Error ? error.message : String(error),
    shouldRetry: false,
    code: 'UNKNOWN_ERROR',
  };
}

export function getErrorCategoryLabel(category: ErrorCategory): string {
  const labels: Record<ErrorCategory, string> = {
    network: 'Network Error',
    rate_limit: 'Rate Limit',
    validation: 'Validation Error',
    permission: 'Permission Denied',
    duplicate: 'Duplicate Record',
    batch: 'Batch Failure',
    unknown: 'Unknown Error',
  };

  return labels[category];
}
