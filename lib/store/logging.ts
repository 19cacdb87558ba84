/**
 * Structured logging for record store operations
 */

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

interface LogContext {
  [key: string]: unknown;
}

const SENSITIVE_KEYS = [
  'password',
  'access_token',
  'refresh_token',
  'client_secret',
  'secret',
  'authorization',
];

/**
 * Structured logger for store operations
 * Outputs JSON-formatted logs for easier parsing and monitoring
 */
export function storeLog(
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    service: 'store',
    message,
    ...context,
  };

  const sanitized = redactSensitiveData(logEntry);

  switch (level) {
    case 'error':
      console.error(JSON.stringify(sanitized));
      break;
    case 'warn':
      console.warn(JSON.stringify(sanitized));
      break;
    case 'debug':
      if (process.env.LOG_LEVEL === 'DEBUG') {
        console.debug(JSON.stringify(sanitized));
      }
      break;
    default:
      console.log(JSON.stringify(sanitized));
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redact sensitive data from log entries
 */
export function redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = { ...data };

  for (const key of Object.keys(redacted)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))) {
      redacted[key] = '[REDACTED]';
      continue;
    }

    const value = redacted[key];
    if (isPlainObject(value)) {
      redacted[key] = redactSensitiveData(value);
    }
  }

  return redacted;
}
