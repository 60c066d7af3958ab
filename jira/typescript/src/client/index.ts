/**
 * Jira client core.
 *
 * Every service call goes through the same two steps: `newRequest` builds a
 * fully-qualified request with merged headers, and `call`/`execute` performs
 * exactly one round trip and wraps the answer in a {@link ResponseEnvelope}.
 * There is no retry, queueing or caching here.
 */

import { JiraConfig, JiraConfigBuilder } from '../config/index.js';
import {
  DecodeError,
  JiraApiErrorResponse,
  isJiraError,
  parseJiraApiError,
} from '../errors/index.js';
import { Credentials } from '../auth/index.js';
import { FetchTransport, HttpMethod, HttpTransport } from '../transport/index.js';
import {
  Observability,
  createNoopObservability,
  MetricNames,
  Logger,
  MetricsCollector,
  Tracer,
} from '../observability/index.js';
import { ResponseEnvelope, JiraResponse } from './envelope.js';
import { QueryParams, encodeQuery } from './url.js';
import { FilterShareService, FilterShareServiceImpl } from '../services/filter-share.js';
import { ProjectVersionService, ProjectVersionServiceImpl } from '../services/project-version.js';
import { IssueMetadataService, IssueMetadataServiceImpl } from '../services/issue-metadata.js';
import { IssueWatcherService, IssueWatcherServiceImpl } from '../services/issue-watcher.js';
import { DashboardService, DashboardServiceImpl } from '../services/dashboard.js';

export { ResponseEnvelope } from './envelope.js';
export type { JiraResponse } from './envelope.js';
export { encodeQuery, pathSegment } from './url.js';
export type { QueryParams, QueryValue } from './url.js';

// ============================================================================
// Request Types
// ============================================================================

/**
 * Options for {@link JiraClient.newRequest}.
 */
export interface NewRequestOptions {
  /** Query parameters, encoded in insertion order */
  query?: QueryParams;
  /** JSON payload; `undefined` sends no body */
  body?: unknown;
  /** Headers applied after the defaults */
  headers?: Record<string, string>;
  /** Caller cancellation, passed to the transport */
  signal?: AbortSignal;
}

/**
 * A built request, ready to send.
 */
export interface JiraRequest {
  readonly method: HttpMethod;
  /** Absolute URL */
  readonly url: string;
  /** Path relative to the site plus the encoded query */
  readonly endpoint: string;
  readonly headers: Readonly<Record<string, string>>;
  /** Serialized JSON body */
  readonly body?: string;
  readonly signal?: AbortSignal;
}

/**
 * Client construction options.
 */
export interface JiraClientOptions {
  /** Transport override (tests, proxies). Defaults to {@link FetchTransport}. */
  transport?: HttpTransport;
  observability?: Observability;
}

// ============================================================================
// Jira Client
// ============================================================================

/**
 * Jira Cloud REST client.
 *
 * Services keep a reference to the client rather than a copy of its
 * configuration, so credential changes made through {@link credentials}
 * reach all of them.
 */
export class JiraClient {
  private readonly config: JiraConfig;
  private readonly transport: HttpTransport;
  private readonly observability: Observability;

  /** Shared credentials and user agent */
  readonly credentials: Credentials;

  readonly filterShare: FilterShareService;
  readonly projectVersion: ProjectVersionService;
  readonly issueMetadata: IssueMetadataService;
  readonly issueWatcher: IssueWatcherService;
  readonly dashboard: DashboardService;

  constructor(config: JiraConfig, options: JiraClientOptions = {}) {
    this.config = config;
    this.observability = options.observability ?? createNoopObservability();
    this.transport = options.transport ?? new FetchTransport({ timeoutMs: config.requestTimeoutMs });
    this.credentials = new Credentials(config.auth, config.userAgent);

    this.filterShare = new FilterShareServiceImpl(this);
    this.projectVersion = new ProjectVersionServiceImpl(this);
    this.issueMetadata = new IssueMetadataServiceImpl(this);
    this.issueWatcher = new IssueWatcherServiceImpl(this);
    this.dashboard = new DashboardServiceImpl(this);
  }

  get logger(): Logger {
    return this.observability.logger;
  }

  get metrics(): MetricsCollector {
    return this.observability.metrics;
  }

  get tracer(): Tracer {
    return this.observability.tracer;
  }

  get configuration(): JiraConfig {
    return this.config;
  }

  /**
   * Builds a request against the configured site.
   *
   * @param path - Path relative to the site, e.g. `rest/api/2/version/10000`
   */
  async newRequest(method: HttpMethod, path: string, options: NewRequestOptions = {}): Promise<JiraRequest> {
    const relative = path.replace(/^\/+/, '');
    const queryString = encodeQuery(options.query);
    const endpoint = queryString ? `${relative}?${queryString}` : relative;

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.credentials.userAgent,
    };
    mergeHeaders(headers, this.config.defaultHeaders);
    mergeHeaders(headers, await this.credentials.getAuthHeaders());

    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      mergeHeaders(headers, { 'Content-Type': 'application/json' });
    }
    mergeHeaders(headers, options.headers);

    return {
      method,
      url: `${this.config.siteUrl}/${endpoint}`,
      endpoint,
      headers,
      body,
      signal: options.signal,
    };
  }

  /**
   * Sends a request and decodes the JSON body.
   *
   * @throws DecodeError when the body is empty or not JSON
   */
  async call<T>(request: JiraRequest): Promise<JiraResponse<T>> {
    const response = await this.execute(request);
    return { data: decodeBody<T>(response), response };
  }

  /**
   * Sends a request without decoding the body.
   *
   * Non-2xx answers throw the error mapped by {@link parseJiraApiError};
   * the thrown error carries the envelope.
   */
  async execute(request: JiraRequest): Promise<ResponseEnvelope> {
    const startTime = Date.now();

    return this.tracer.withSpan(
      'jira.request',
      async (span) => {
        span.setAttribute('http.method', request.method);
        span.setAttribute('http.path', request.endpoint);

        try {
          const raw = await this.transport.request({
            method: request.method,
            url: request.url,
            headers: { ...request.headers },
            body: request.body,
            signal: request.signal,
          });

          const response = new ResponseEnvelope({
            status: raw.status,
            headers: raw.headers,
            bytes: raw.body,
            endpoint: request.endpoint,
            method: request.method,
          });

          span.setAttribute('http.status_code', response.status);
          this.logger.debug('Jira request completed', {
            method: request.method,
            endpoint: request.endpoint,
            status: response.status,
          });

          if (!response.ok) {
            throw parseJiraApiError(response, readErrorBody(response));
          }

          this.metrics.increment(MetricNames.OPERATIONS_TOTAL, 1, {
            operation: request.method,
            status: 'success',
          });
          this.metrics.timing(MetricNames.OPERATION_LATENCY, Date.now() - startTime, {
            operation: request.method,
          });
          span.setStatus('OK');

          return response;
        } catch (error) {
          this.metrics.increment(MetricNames.ERRORS_TOTAL, 1, {
            operation: request.method,
            error_type: isJiraError(error) ? error.code : 'unknown',
          });
          if (error instanceof Error) {
            span.recordException(error);
          }
          throw error;
        }
      },
      { operation: `${request.method} ${request.endpoint}` }
    );
  }
}

// ============================================================================
// Header Merging
// ============================================================================

/**
 * Copies `source` into `target`. Header names compare case-insensitively,
 * so a later entry replaces an earlier one whatever its spelling.
 */
function mergeHeaders(target: Record<string, string>, source: Record<string, string> | undefined): void {
  if (!source) return;
  for (const [name, value] of Object.entries(source)) {
    const lower = name.toLowerCase();
    for (const existing of Object.keys(target)) {
      if (existing.toLowerCase() === lower) {
        delete target[existing];
      }
    }
    target[name] = value;
  }
}

// ============================================================================
// Body Decoding
// ============================================================================

function decodeBody<T>(response: ResponseEnvelope): T {
  const text = response.text();
  if (text.trim().length === 0) {
    throw new DecodeError(response, new Error('empty response body'));
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError(response, error instanceof Error ? error : undefined);
  }
}

/**
 * Extracts Jira's `errorMessages`/`errors` from an error body, if present.
 */
function readErrorBody(response: ResponseEnvelope): JiraApiErrorResponse | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(response.text());
  } catch {
    // Plain-text or HTML error pages carry no structured messages.
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return null;
  }

  const result: JiraApiErrorResponse = {};
  if ('errorMessages' in parsed && Array.isArray(parsed.errorMessages)) {
    result.errorMessages = parsed.errorMessages.filter((m): m is string => typeof m === 'string');
  }
  if ('errors' in parsed && typeof parsed.errors === 'object' && parsed.errors !== null) {
    const errors: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed.errors)) {
      if (typeof value === 'string') errors[key] = value;
    }
    result.errors = errors;
  }
  return result;
}

// ============================================================================
// Client Factory
// ============================================================================

/**
 * Creates a Jira client from a configuration.
 */
export function createJiraClient(config: JiraConfig, options?: JiraClientOptions): JiraClient {
  return new JiraClient(config, options);
}

/**
 * Creates a Jira client from environment variables.
 */
export function createJiraClientFromEnv(options?: JiraClientOptions): JiraClient {
  const config = JiraConfigBuilder.fromEnv().build();
  return new JiraClient(config, options);
}
