/**
 * Fetch-based HTTP transport implementation
 */

import { NetworkError, isMTurkError } from '../errors/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Request timeout in milliseconds */
  timeout: number;
  /** Fetch implementation; defaults to the global fetch */
  fetch?: typeof fetch;
}

/**
 * Fetch-based HTTP transport implementation
 *
 * Uses Node's global Fetch API. Non-2xx statuses are returned, not thrown:
 * the requester API reports errors in the XML body.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;
  private readonly fetchFn: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.options = options;
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Sends an HTTP request and returns buffered response
   */
  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await this.fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        signal: controller.signal,
      });

      const body = await response.text();

      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body,
      };
    } catch (error) {
      throw this.handleError(error, request);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Converts Headers object to plain object
   */
  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key] = value;
    });
    return result;
  }

  /**
   * Handles errors from fetch operations
   */
  private handleError(error: unknown, request: HttpRequest): Error {
    if (isMTurkError(error)) {
      return error;
    }

    if (error instanceof Error) {
      // Timeout/abort errors
      if (error.name === 'AbortError' || error.name === 'TimeoutError') {
        return NetworkError.timeout(this.options.timeout);
      }

      // Node's fetch reports the socket error as the cause
      const cause = error.cause instanceof Error ? error.cause : undefined;
      const message = `${error.message} ${cause?.message ?? ''}`.toLowerCase();

      if (message.includes('enotfound') || message.includes('eai_again')) {
        return NetworkError.dnsError(request.url, error);
      }

      return NetworkError.connectionFailed(cause?.message ?? error.message, error);
    }

    return NetworkError.connectionFailed(String(error), error);
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeout: number = 30000): HttpTransport {
  return new FetchTransport({ timeout });
}
