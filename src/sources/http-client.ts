/**
 * HTTP client for Kartverket and Geonorge services
 */

import { randomUUID } from 'node:crypto';
import { handleHttpError, handleNetworkError, isConversionError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { getRequestId } from '../domain/request-context.js';

/**
 * Options for HTTP fetch requests
 */
export interface FetchOptions {
  /** Query parameters appended to the URL */
  query?: Record<string, string>;
  /** Request headers */
  headers?: Record<string, string>;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Request ID for tracking (taken from the request context or generated) */
  requestId?: string;
}

export interface HttpResponse<T> {
  data: T;
  status: number;
  headers: Headers;
}

/**
 * GET-only client with timeouts and structured errors
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly defaultTimeout: number;

  /**
   * @param baseUrl - Service base URL, e.g. https://ws.geonorge.no/kommuneinfo/v1
   * @param defaultTimeout - Default timeout in milliseconds
   */
  constructor(baseUrl: string, defaultTimeout = 60000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.defaultTimeout = defaultTimeout;

    logger.debug('HttpClient initialized', {
      baseUrl: this.baseUrl,
      defaultTimeout: this.defaultTimeout,
    });
  }

  /**
   * Join a path and query onto the base URL
   *
   * @param path - Path below the base URL, starting with a slash
   * @param query - Query parameters, encoded with URLSearchParams
   * @returns Absolute request URL
   */
  buildUrl(path: string, query?: Record<string, string>): string {
    const url = `${this.baseUrl}${path}`;
    if (!query || Object.keys(query).length === 0) {
      return url;
    }
    return `${url}?${new URLSearchParams(query).toString()}`;
  }

  /**
   * Fetch a response body as text (GML from the WFS)
   *
   * @param path - Path below the base URL
   * @param options - Query, timeout and request id
   * @returns Body text with status and timing
   * @throws ConversionError on HTTP errors or network failures
   */
  async getText(path: string, options: FetchOptions = {}): Promise<HttpResponse<string>> {
    return this.request(path, options, response => response.text());
  }

  /**
   * Fetch and parse a JSON body. The result is unvalidated.
   *
   * @param path - Path below the base URL
   * @param options - Query, timeout and request id
   * @returns Parsed body with status and timing
   * @throws ConversionError on HTTP errors or network failures
   */
  async getJson(path: string, options: FetchOptions = {}): Promise<HttpResponse<unknown>> {
    return this.request(path, options, async response => {
      const data: unknown = await response.json();
      return data;
    });
  }

  private async request<T>(
    path: string,
    options: FetchOptions,
    read: (response: Response) => Promise<T>
  ): Promise<HttpResponse<T>> {
    const requestId = options.requestId || getRequestId() || randomUUID();
    const timeout = options.timeout || this.defaultTimeout;
    const url = this.buildUrl(path, options.query);
    const startTime = Date.now();

    logger.debug('Upstream request starting', { requestId, url });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: options.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        logger.logUpstreamCall(url, response.status, Date.now() - startTime, undefined, requestId);
        throw handleHttpError(url, response.status, response.statusText, response.headers, requestId);
      }

      const data = await read(response);
      const bytes = typeof data === 'string' ? Buffer.byteLength(data) : undefined;
      logger.logUpstreamCall(url, response.status, Date.now() - startTime, bytes, requestId);

      return { data, status: response.status, headers: response.headers };
    } catch (error) {
      // Structured errors were already logged by handleHttpError
      if (isConversionError(error)) {
        throw error;
      }

      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw handleNetworkError(new Error(`Request timeout after ${timeout}ms`), url, requestId);
        }
        throw handleNetworkError(error, url, requestId);
      }

      throw handleNetworkError(new Error(String(error)), url, requestId);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
