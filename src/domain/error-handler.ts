/**
 * Error handling and mapping for registry and municipality lookups
 */

import type { ErrorCode, ConversionError } from './types.js';
import { logger } from './logger.js';

/**
 * Map HTTP status codes from Kartverket / Geonorge services to error codes
 *
 * @param status - HTTP status code
 * @returns Error code; unexpected statuses map to INTERNAL_ERROR
 */
export function mapHttpStatusToErrorCode(status: number): ErrorCode {
  if (status === 400 || status === 404) {
    return 'LOOKUP_FAILED';
  }
  if (status === 429 || status === 503) {
    return 'RATE_LIMITED';
  }
  if (status >= 500) {
    return 'SOURCE_UNAVAILABLE';
  }
  return 'INTERNAL_ERROR';
}

/**
 * Create a structured conversion error. RATE_LIMITED and SOURCE_UNAVAILABLE
 * are retryable.
 *
 * @param code - Error code
 * @param message - Message shown to the caller
 * @param details - Upstream status, municipality code and the like
 * @returns Structured error
 */
export function createConversionError(
  code: ErrorCode,
  message: string,
  details?: ConversionError['details']
): ConversionError {
  const retryable = code === 'RATE_LIMITED' || code === 'SOURCE_UNAVAILABLE';

  return {
    code,
    message,
    retryable,
    details,
  };
}

/**
 * Narrow an unknown thrown value to a structured conversion error
 */
export function isConversionError(value: unknown): value is ConversionError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value &&
    typeof value.code === 'string' &&
    typeof value.message === 'string'
  );
}

/**
 * Wrap anything thrown into a structured error, keeping structured ones as-is
 *
 * @param error - Thrown value
 * @param fallbackMessage - Message for values that are not conversion errors
 * @returns Structured error, INTERNAL_ERROR unless already structured
 */
export function toConversionError(error: unknown, fallbackMessage: string): ConversionError {
  if (isConversionError(error)) {
    return error;
  }

  return createConversionError('INTERNAL_ERROR', fallbackMessage, {
    error: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Handle an HTTP error response from an upstream service
 *
 * @param url - Requested URL
 * @param status - HTTP status code
 * @param statusText - HTTP status text
 * @param headers - Response headers (for Retry-After)
 * @param requestId - Request id for log correlation
 * @returns Structured error carrying the upstream status
 */
export function handleHttpError(
  url: string,
  status: number,
  statusText: string,
  headers?: Headers,
  requestId?: string
): ConversionError {
  const code = mapHttpStatusToErrorCode(status);

  let message: string;
  switch (code) {
    case 'LOOKUP_FAILED':
      message = `Upstream lookup failed: ${statusText}`;
      break;
    case 'RATE_LIMITED':
      message = 'Kartverket service is rate limiting requests. Please try again later.';
      break;
    case 'SOURCE_UNAVAILABLE':
      message = 'Kartverket service is currently unavailable.';
      break;
    default:
      message = `Unexpected upstream response: ${status} ${statusText}`;
  }

  const details: ConversionError['details'] = {
    upstreamStatus: status,
    url,
  };

  if (requestId) {
    details.requestId = requestId;
  }

  if (code === 'RATE_LIMITED' && headers) {
    const retryAfter = headers.get('Retry-After');
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        details.retryAfterSeconds = seconds;
      }
    }
  }

  logger.warn('HTTP error from upstream', {
    url,
    status,
    statusText,
    code,
    requestId,
  });

  return createConversionError(code, message, details);
}

/**
 * Handle network errors (connection refused, timeout, DNS)
 *
 * @param error - Error thrown by fetch
 * @param url - Requested URL
 * @param requestId - Request id for log correlation
 * @returns SOURCE_UNAVAILABLE error
 */
export function handleNetworkError(error: Error, url: string, requestId?: string): ConversionError {
  logger.error('Network error calling upstream', {
    url,
    error: error.message,
    requestId,
  });

  return createConversionError(
    'SOURCE_UNAVAILABLE',
    'Unable to reach Kartverket service. Please try again later.',
    {
      url,
      requestId,
      networkError: error.message,
    }
  );
}

/**
 * A static extract or auxiliary file that is required but missing
 */
export function createMissingExtractError(path: string, municipalityCode: string): ConversionError {
  return createConversionError(
    'SOURCE_UNAVAILABLE',
    `Static extract not found for ${municipalityCode}: ${path}`,
    { path, municipalityCode }
  );
}
