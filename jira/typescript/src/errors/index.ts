/**
 * Jira error types and handling.
 *
 * Errors fall into four groups: pre-flight validation (raised before any I/O),
 * transport, decode, and remote API errors. The last two carry the response
 * envelope so callers can inspect the status code and raw body.
 */

import type { ResponseEnvelope } from '../client/envelope.js';

/**
 * Error codes for Jira errors.
 */
export enum JiraErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
  NoAuthentication = 'NO_AUTHENTICATION',

  // Pre-flight validation
  ValidationError = 'VALIDATION_ERROR',
  InvalidScope = 'INVALID_SCOPE',
  NoProjectId = 'NO_PROJECT_ID',
  NoVersionId = 'NO_VERSION_ID',
  NoIssueKeyOrId = 'NO_ISSUE_KEY_OR_ID',
  NoFilterId = 'NO_FILTER_ID',
  NoDashboardId = 'NO_DASHBOARD_ID',

  // Remote API errors
  AuthenticationError = 'AUTHENTICATION_ERROR',
  PermissionDenied = 'PERMISSION_DENIED',
  ResourceNotFound = 'RESOURCE_NOT_FOUND',
  Conflict = 'CONFLICT',
  RateLimited = 'RATE_LIMITED',
  ServerError = 'SERVER_ERROR',
  ApiError = 'API_ERROR',

  // Transport errors
  NetworkError = 'NETWORK_ERROR',
  TimeoutError = 'TIMEOUT_ERROR',

  // Decode errors
  DecodeError = 'DECODE_ERROR',
}

/**
 * Jira API error response structure.
 */
export interface JiraApiErrorResponse {
  /** Error messages array */
  errorMessages?: string[];
  /** Field-specific errors */
  errors?: Record<string, string>;
}

/**
 * Base Jira error class.
 */
export class JiraError extends Error {
  /** Error code */
  readonly code: JiraErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;
  /** Response envelope, present when the server answered */
  readonly response?: ResponseEnvelope;

  constructor(options: {
    code: JiraErrorCode;
    message: string;
    statusCode?: number;
    details?: Record<string, unknown>;
    response?: ResponseEnvelope;
    cause?: Error;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'JiraError';
    this.code = options.code;
    this.statusCode = options.statusCode ?? options.response?.status;
    this.details = options.details;
    this.response = options.response;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      endpoint: this.response?.endpoint,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends JiraError {
  constructor(message: string) {
    super({
      code: JiraErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * No authentication configured.
 */
export class NoAuthenticationError extends JiraError {
  constructor() {
    super({
      code: JiraErrorCode.NoAuthentication,
      message: 'No authentication configured (basic auth or bearer token required)',
    });
    this.name = 'NoAuthenticationError';
  }
}

// ============================================================================
// Pre-flight Validation Errors
// ============================================================================

/**
 * Validation error. Raised locally for bad input, or mapped from a 400.
 */
export class ValidationError extends JiraError {
  constructor(
    errors: string[],
    fieldErrors?: Record<string, string>,
    response?: ResponseEnvelope
  ) {
    super({
      code: JiraErrorCode.ValidationError,
      message: `Validation failed: ${errors.join(', ')}`,
      details: { errors, fieldErrors },
      response,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Share scope outside the allowed set.
 */
export class InvalidScopeError extends JiraError {
  constructor(scope: string, allowed: readonly string[]) {
    super({
      code: JiraErrorCode.InvalidScope,
      message: `Invalid share scope "${scope}", expected one of: ${allowed.join(', ')}`,
      details: { scope, allowed: [...allowed] },
    });
    this.name = 'InvalidScopeError';
  }
}

export class NoProjectIdError extends JiraError {
  constructor() {
    super({ code: JiraErrorCode.NoProjectId, message: 'Project key or ID is required' });
    this.name = 'NoProjectIdError';
  }
}

export class NoVersionIdError extends JiraError {
  constructor() {
    super({ code: JiraErrorCode.NoVersionId, message: 'Version ID is required' });
    this.name = 'NoVersionIdError';
  }
}

export class NoIssueKeyOrIdError extends JiraError {
  constructor() {
    super({ code: JiraErrorCode.NoIssueKeyOrId, message: 'Issue key or ID is required' });
    this.name = 'NoIssueKeyOrIdError';
  }
}

export class NoFilterIdError extends JiraError {
  constructor() {
    super({ code: JiraErrorCode.NoFilterId, message: 'Filter ID is required' });
    this.name = 'NoFilterIdError';
  }
}

export class NoDashboardIdError extends JiraError {
  constructor() {
    super({ code: JiraErrorCode.NoDashboardId, message: 'Dashboard ID is required' });
    this.name = 'NoDashboardIdError';
  }
}

// ============================================================================
// Remote API Errors
// ============================================================================

/**
 * Authentication failed.
 */
export class AuthenticationError extends JiraError {
  constructor(message: string = 'Authentication failed', response?: ResponseEnvelope) {
    super({
      code: JiraErrorCode.AuthenticationError,
      message,
      statusCode: 401,
      response,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * Permission denied.
 */
export class PermissionDeniedError extends JiraError {
  constructor(message: string = 'Permission denied for this operation', response?: ResponseEnvelope) {
    super({
      code: JiraErrorCode.PermissionDenied,
      message,
      statusCode: 403,
      response,
    });
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Resource not found.
 */
export class ResourceNotFoundError extends JiraError {
  constructor(resource: string, response?: ResponseEnvelope) {
    super({
      code: JiraErrorCode.ResourceNotFound,
      message: `Resource not found: ${resource}`,
      statusCode: 404,
      details: { resource },
      response,
    });
    this.name = 'ResourceNotFoundError';
  }
}

/**
 * Request conflicts with the current state of the resource.
 */
export class ConflictError extends JiraError {
  constructor(message: string, response?: ResponseEnvelope) {
    super({
      code: JiraErrorCode.Conflict,
      message: `Conflict: ${message}`,
      statusCode: 409,
      response,
    });
    this.name = 'ConflictError';
  }
}

/**
 * Rate limited by Jira API. The client does not wait or retry; the hint is
 * exposed for callers that do.
 */
export class RateLimitedError extends JiraError {
  /** Server's retry-after hint in milliseconds */
  readonly retryAfterMs?: number;

  constructor(retryAfterMs: number | undefined, response?: ResponseEnvelope) {
    super({
      code: JiraErrorCode.RateLimited,
      message: retryAfterMs !== undefined
        ? `Rate limited, retry after ${retryAfterMs}ms`
        : 'Rate limited',
      statusCode: 429,
      response,
    });
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Jira server error.
 */
export class ServerError extends JiraError {
  constructor(statusCode: number, message: string = 'Jira server error', response?: ResponseEnvelope) {
    super({
      code: JiraErrorCode.ServerError,
      message,
      statusCode,
      response,
    });
    this.name = 'ServerError';
  }
}

/**
 * Any other non-2xx answer.
 */
export class ApiError extends JiraError {
  constructor(statusCode: number, message: string, response?: ResponseEnvelope) {
    super({
      code: JiraErrorCode.ApiError,
      message,
      statusCode,
      response,
    });
    this.name = 'ApiError';
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

/**
 * Network error.
 */
export class NetworkError extends JiraError {
  constructor(message: string, cause?: Error) {
    super({
      code: JiraErrorCode.NetworkError,
      message: `Network error: ${message}`,
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * Request timeout.
 */
export class TimeoutError extends JiraError {
  constructor(timeoutMs: number) {
    super({
      code: JiraErrorCode.TimeoutError,
      message: `Request timed out after ${timeoutMs}ms`,
      details: { timeoutMs },
    });
    this.name = 'TimeoutError';
  }
}

// ============================================================================
// Decode Errors
// ============================================================================

/**
 * Response body is not valid JSON.
 */
export class DecodeError extends JiraError {
  constructor(response: ResponseEnvelope, cause?: Error) {
    super({
      code: JiraErrorCode.DecodeError,
      message: `Failed to decode response body from ${response.endpoint}`,
      response,
      cause,
    });
    this.name = 'DecodeError';
  }
}

// ============================================================================
// Error Parsing Utilities
// ============================================================================

/**
 * Parses a Jira API error response into the appropriate error type.
 */
export function parseJiraApiError(
  response: ResponseEnvelope,
  body: JiraApiErrorResponse | null
): JiraError {
  const statusCode = response.status;
  const errorMessages = body?.errorMessages ?? [];
  const fieldErrors = body?.errors ?? {};
  const message = errorMessages.length > 0
    ? errorMessages.join('; ')
    : Object.entries(fieldErrors).map(([k, v]) => `${k}: ${v}`).join('; ') || `HTTP ${statusCode}`;

  switch (statusCode) {
    case 400:
      if (Object.keys(fieldErrors).length > 0) {
        return new ValidationError(errorMessages.length > 0 ? errorMessages : [message], fieldErrors, response);
      }
      return new ValidationError([message], undefined, response);

    case 401:
      return new AuthenticationError(message, response);

    case 403:
      return new PermissionDeniedError(message, response);

    case 404:
      return new ResourceNotFoundError(errorMessages.length > 0 ? message : response.endpoint, response);

    case 409:
      return new ConflictError(message, response);

    case 429: {
      const header = response.headers['retry-after'];
      const seconds = header !== undefined ? parseFloat(header) : NaN;
      return new RateLimitedError(Number.isNaN(seconds) ? undefined : seconds * 1000, response);
    }

    default:
      if (statusCode >= 500) {
        return new ServerError(statusCode, message, response);
      }
      return new ApiError(statusCode, message, response);
  }
}

/**
 * Checks if an error is a Jira error.
 */
export function isJiraError(error: unknown): error is JiraError {
  return error instanceof JiraError;
}
