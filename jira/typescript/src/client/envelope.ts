/**
 * Response envelope returned alongside every decoded result.
 */

import type { HttpMethod } from '../transport/index.js';

const utf8 = new TextDecoder('utf-8');

/**
 * Status code, raw body bytes and the endpoint that produced them.
 * Exists for one call; nothing in the client keeps a reference to it.
 */
export class ResponseEnvelope {
  /** HTTP status code */
  readonly status: number;
  /** Response headers, keys lower-cased */
  readonly headers: Readonly<Record<string, string>>;
  /** Raw response body */
  readonly bytes: Uint8Array;
  /** Relative path plus encoded query, e.g. `rest/api/2/version/10000` */
  readonly endpoint: string;
  /** HTTP method used */
  readonly method: HttpMethod;

  constructor(init: {
    status: number;
    headers: Record<string, string>;
    bytes: Uint8Array;
    endpoint: string;
    method: HttpMethod;
  }) {
    this.status = init.status;
    this.headers = { ...init.headers };
    this.bytes = init.bytes;
    this.endpoint = init.endpoint;
    this.method = init.method;
  }

  /**
   * Whether the status is in the 2xx range.
   */
  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  /**
   * Body decoded as UTF-8.
   */
  text(): string {
    return utf8.decode(this.bytes);
  }
}

/**
 * Decoded result paired with its envelope.
 */
export interface JiraResponse<T> {
  data: T;
  response: ResponseEnvelope;
}
