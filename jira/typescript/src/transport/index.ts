/**
 * HTTP transport layer for the Jira client.
 */

import { NetworkError, TimeoutError } from '../errors/index.js';

/**
 * HTTP method type.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Fully built request handed to a transport.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /** Serialized body */
  body?: string;
  /** Caller cancellation */
  signal?: AbortSignal;
}

/**
 * Raw transport response.
 */
export interface TransportResponse {
  status: number;
  /** Header names lower-cased */
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * Transport interface
 */
export interface HttpTransport {
  request(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Default fetch-based transport.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeoutMs?: number;

  /**
   * @param options.timeoutMs - Abort after this many milliseconds. Unset means no timeout.
   */
  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    let timedOut = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => controller.abort(request.signal?.reason);
    if (request.signal?.aborted) {
      onAbort();
    } else {
      request.signal?.addEventListener('abort', onAbort, { once: true });
    }

    if (this.timeoutMs !== undefined) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.timeoutMs);
    }

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      const body = new Uint8Array(await response.arrayBuffer());

      return { status: response.status, headers, body };
    } catch (error) {
      if (timedOut && this.timeoutMs !== undefined) {
        throw new TimeoutError(this.timeoutMs);
      }
      if (error instanceof Error) {
        throw new NetworkError(error.message, error);
      }
      throw new NetworkError('Unknown network error');
    } finally {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
      }
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}
