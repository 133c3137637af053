/**
 * Kubernetes Error Handling Utilities
 *
 * Centralized classification of Kubernetes API errors. The 1.x client throws
 * `ApiException` carrying `code` and a `body` that is either a parsed
 * `V1Status` or its JSON text.
 */

import { DriverError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { getProperty, isRecord } from '../../utils/index.js';

const logger = getComponentLogger('kubernetes-errors');

function errorBody(error: unknown): Record<string, unknown> | undefined {
  const body = getProperty(error, 'body');
  if (isRecord(body)) {
    return body;
  }
  if (typeof body === 'string' && body.trim().startsWith('{')) {
    try {
      const parsed: unknown = JSON.parse(body);
      return isRecord(parsed) ? parsed : undefined;
    } catch {
      return undefined;
    }
  }
  return undefined;
}

/**
 * Extract the HTTP status code from a Kubernetes API error.
 *
 * Handles `code` (1.x ApiException), a direct `statusCode`, a nested
 * `response.statusCode` and a `code` inside the status body.
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  const candidates = [
    getProperty(error, 'code'),
    getProperty(error, 'statusCode'),
    getProperty(getProperty(error, 'response'), 'statusCode'),
    errorBody(error)?.code,
  ];
  for (const candidate of candidates) {
    if (typeof candidate === 'number') {
      return candidate;
    }
  }

  logger.debug('Could not extract status code from error', {
    errorType: typeof error,
    errorKeys: isRecord(error) ? Object.keys(error) : [],
  });
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * Conflict errors occur when creating an object that already exists or when
 * optimistic locking fails
 */
export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409;
}

export function getErrorReason(error: unknown): string | undefined {
  const reason = errorBody(error)?.reason;
  return typeof reason === 'string' ? reason : undefined;
}

/**
 * Format a Kubernetes API error into a human-readable message.
 *
 * @example
 * formatKubernetesError(error)
 * // "Kubernetes API error (403): Forbidden: secrets is forbidden"
 */
export function formatKubernetesError(error: unknown): string {
  if (!isRecord(error) && !(error instanceof Error)) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const parts = [statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error'];

  const reason = getErrorReason(error);
  if (reason) {
    parts.push(reason);
  }

  const bodyMessage = errorBody(error)?.message;
  if (typeof bodyMessage === 'string') {
    parts.push(bodyMessage);
  } else if (error instanceof Error) {
    parts.push(error.message);
  }

  return parts.join(': ');
}

/**
 * Wrap an API failure in a DriverError; the original error is kept verbatim
 */
export function toDriverError(operation: string, error: unknown): DriverError {
  if (error instanceof DriverError) {
    return error;
  }
  return new DriverError(
    `${operation} failed: ${formatKubernetesError(error)}`,
    operation,
    getErrorStatusCode(error),
    error
  );
}
