/**
 * Unit tests for error-handler
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  mapHttpStatusToErrorCode,
  createConversionError,
  isConversionError,
  toConversionError,
  handleHttpError,
  handleNetworkError,
  createMissingExtractError,
} from './error-handler.js';

vi.mock('./logger.js', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { logger } from './logger.js';

const WFS_URL = 'https://wfs.example.test/stedsnavn';

describe('mapHttpStatusToErrorCode', () => {
  it('should map 400 and 404 to LOOKUP_FAILED', () => {
    expect(mapHttpStatusToErrorCode(400)).toBe('LOOKUP_FAILED');
    expect(mapHttpStatusToErrorCode(404)).toBe('LOOKUP_FAILED');
  });

  it('should map 429 and 503 to RATE_LIMITED', () => {
    expect(mapHttpStatusToErrorCode(429)).toBe('RATE_LIMITED');
    expect(mapHttpStatusToErrorCode(503)).toBe('RATE_LIMITED');
  });

  it('should map other 5xx to SOURCE_UNAVAILABLE', () => {
    expect(mapHttpStatusToErrorCode(500)).toBe('SOURCE_UNAVAILABLE');
    expect(mapHttpStatusToErrorCode(502)).toBe('SOURCE_UNAVAILABLE');
  });

  it('should map unknown status to INTERNAL_ERROR', () => {
    expect(mapHttpStatusToErrorCode(401)).toBe('INTERNAL_ERROR');
    expect(mapHttpStatusToErrorCode(418)).toBe('INTERNAL_ERROR');
  });
});

describe('createConversionError', () => {
  it('should create error with correct structure', () => {
    expect(createConversionError('LOOKUP_FAILED', 'Unknown municipality')).toEqual({
      code: 'LOOKUP_FAILED',
      message: 'Unknown municipality',
      retryable: false,
      details: undefined,
    });
  });

  it('should mark RATE_LIMITED and SOURCE_UNAVAILABLE as retryable', () => {
    expect(createConversionError('RATE_LIMITED', 'x').retryable).toBe(true);
    expect(createConversionError('SOURCE_UNAVAILABLE', 'x').retryable).toBe(true);
  });

  it('should mark INVALID_INPUT as not retryable', () => {
    expect(createConversionError('INVALID_INPUT', 'x').retryable).toBe(false);
  });
});

describe('isConversionError / toConversionError', () => {
  it('should recognise structured errors', () => {
    expect(isConversionError(createConversionError('LOOKUP_FAILED', 'x'))).toBe(true);
    expect(isConversionError(new Error('plain'))).toBe(false);
    expect(isConversionError(null)).toBe(false);
  });

  it('should keep structured errors as-is', () => {
    const original = createConversionError('RATE_LIMITED', 'slow down');
    expect(toConversionError(original, 'fallback')).toBe(original);
  });

  it('should wrap plain errors as INTERNAL_ERROR', () => {
    expect(toConversionError(new Error('boom'), 'Conversion failed')).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'Conversion failed',
      retryable: false,
      details: { error: 'boom' },
    });
  });
});

describe('handleHttpError', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should handle 404 as a lookup failure', () => {
    const error = handleHttpError(WFS_URL, 404, 'Not Found', new Headers(), 'req-1');

    expect(error.code).toBe('LOOKUP_FAILED');
    expect(error.message).toBe('Upstream lookup failed: Not Found');
    expect(error.details?.upstreamStatus).toBe(404);
    expect(error.details?.requestId).toBe('req-1');
    expect(error.details?.url).toBe(WFS_URL);
  });

  it('should extract Retry-After header for rate limit', () => {
    const headers = new Headers({ 'Retry-After': '30' });
    const error = handleHttpError(WFS_URL, 429, 'Too Many Requests', headers);

    expect(error.code).toBe('RATE_LIMITED');
    expect(error.details?.retryAfterSeconds).toBe(30);
  });

  it('should ignore invalid Retry-After header', () => {
    const headers = new Headers({ 'Retry-After': 'later' });
    const error = handleHttpError(WFS_URL, 429, 'Too Many Requests', headers);

    expect(error.details?.retryAfterSeconds).toBeUndefined();
  });

  it('should log HTTP error', () => {
    handleHttpError(WFS_URL, 500, 'Internal Server Error', new Headers(), 'req-2');

    expect(logger.warn).toHaveBeenCalledWith(
      'HTTP error from upstream',
      expect.objectContaining({
        status: 500,
        code: 'SOURCE_UNAVAILABLE',
        requestId: 'req-2',
      })
    );
  });
});

describe('handleNetworkError', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should handle connection error', () => {
    const error = handleNetworkError(new Error('Connection refused'), WFS_URL, 'req-3');

    expect(error.code).toBe('SOURCE_UNAVAILABLE');
    expect(error.retryable).toBe(true);
    expect(error.details?.networkError).toBe('Connection refused');
    expect(logger.error).toHaveBeenCalledWith(
      'Network error calling upstream',
      expect.objectContaining({ error: 'Connection refused', requestId: 'req-3' })
    );
  });
});

describe('createMissingExtractError', () => {
  it('should describe the missing file', () => {
    const error = createMissingExtractError('/data/x.gml', '4601');

    expect(error.code).toBe('SOURCE_UNAVAILABLE');
    expect(error.message).toBe('Static extract not found for 4601: /data/x.gml');
    expect(error.details).toEqual({ path: '/data/x.gml', municipalityCode: '4601' });
  });
});
