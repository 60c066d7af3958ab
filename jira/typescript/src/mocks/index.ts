/**
 * Mocks for testing Jira API integrations.
 */

import { HttpMethod, HttpTransport, TransportRequest, TransportResponse } from '../transport/index.js';

/**
 * Mock response configuration. `data` is serialized as JSON unless `body`
 * gives the raw text.
 */
export interface MockResponse {
  data?: unknown;
  /** Raw body, sent as-is */
  body?: string;
  status?: number;
  headers?: Record<string, string>;
  delay?: number;
}

/**
 * Mock request matcher
 */
export interface MockMatcher {
  url?: string | RegExp;
  method?: HttpMethod;
}

/**
 * A request seen by the mock transport.
 */
export interface RecordedCall {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Mock HTTP transport for testing
 */
export class MockHttpTransport implements HttpTransport {
  private mocks: Array<{ matcher: MockMatcher; response: MockResponse }> = [];
  private calls: RecordedCall[] = [];
  private failure?: Error;
  private readonly defaultResponse: MockResponse = {
    status: 200,
    headers: {},
    body: '',
  };

  /**
   * Add mock response. Later mocks do not override earlier ones that match.
   */
  mock(matcher: MockMatcher | string, response: MockResponse): this {
    const normalizedMatcher = typeof matcher === 'string' ? { url: matcher } : matcher;
    this.mocks.push({ matcher: normalizedMatcher, response });
    return this;
  }

  /**
   * Mock a JSON response with a status (default 200).
   */
  mockJson(matcher: MockMatcher | string, data: unknown, status = 200): this {
    return this.mock(matcher, { data, status, headers: { 'content-type': 'application/json' } });
  }

  /**
   * Mock a response with no body.
   */
  mockStatus(matcher: MockMatcher | string, status: number, headers: Record<string, string> = {}): this {
    return this.mock(matcher, { status, headers, body: '' });
  }

  /**
   * Make every request fail with the given error, as a transport failure would.
   */
  failWith(error: Error): this {
    this.failure = error;
    return this;
  }

  getCalls(): RecordedCall[] {
    return [...this.calls];
  }

  /**
   * The most recent call, if any.
   */
  lastCall(): RecordedCall | undefined {
    return this.calls[this.calls.length - 1];
  }

  /**
   * Clear all mocks and calls
   */
  reset(): this {
    this.mocks = [];
    this.calls = [];
    this.failure = undefined;
    return this;
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    this.calls.push({
      url: request.url,
      method: request.method,
      headers: { ...request.headers },
      body: request.body,
    });

    if (this.failure) {
      throw this.failure;
    }

    const mock = this.mocks.find(({ matcher }) => {
      if (matcher.url && !matchesUrl(request.url, matcher.url)) return false;
      if (matcher.method && request.method !== matcher.method) return false;
      return true;
    });
    const response = mock?.response ?? this.defaultResponse;

    if (response.delay) {
      await new Promise((resolve) => setTimeout(resolve, response.delay));
    }

    const text = response.body ?? (response.data === undefined ? '' : JSON.stringify(response.data));
    return {
      status: response.status ?? 200,
      headers: lowerCaseKeys(response.headers ?? {}),
      body: new TextEncoder().encode(text),
    };
  }
}

function matchesUrl(url: string, pattern: string | RegExp): boolean {
  return typeof pattern === 'string' ? url.includes(pattern) : pattern.test(url);
}

function lowerCaseKeys(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}
