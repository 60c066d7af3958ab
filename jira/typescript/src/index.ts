/**
 * Jira Cloud REST client.
 *
 * Typed access to filter sharing, project versions, issue metadata, issue
 * watchers and dashboards. Every call is one request built by
 * `JiraClient.newRequest` and sent by `JiraClient.call`, returning the
 * decoded body alongside the raw response envelope.
 *
 * @module jira-cloud-client
 */

// ============================================================================
// Configuration
// ============================================================================

export { JiraConfigBuilder, SecretString, DEFAULT_USER_AGENT } from './config/index.js';
export type { JiraConfig, AuthMethod } from './config/index.js';

// ============================================================================
// Types
// ============================================================================

export {
  isJsonObject,
  SHARE_SCOPES,
  ShareScopeSchema,
  DASHBOARD_FILTERS,
} from './types/index.js';
export type {
  // Base types
  IssueKeyOrId,
  ProjectKeyOrId,
  AccountId,
  JiraUserSummary,
  JiraProjectSummary,
  JsonValue,
  JsonObject,

  // Filter sharing
  ShareScope,
  ShareFilterScope,
  SharePermissionType,
  SharePermission,
  ProjectRoleSummary,
  GroupSummary,
  PermissionFilterPayload,

  // Versions
  JiraVersion,
  VersionIssuesStatus,
  VersionOperation,
  VersionPage,
  VersionPayload,
  VersionStatus,
  VersionOrderBy,
  VersionSearchOptions,
  VersionRelatedIssueCounts,
  VersionUnresolvedIssueCount,
  VersionDeleteOptions,

  // Metadata
  CreateMetaOptions,

  // Watchers
  IssueWatchers,

  // Dashboards
  Dashboard,
  DashboardFilter,
  DashboardPage,
  DashboardSearchOptions,
  DashboardSearchPage,
  DashboardPayload,
} from './types/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  JiraErrorCode,
  JiraError,
  ConfigurationError,
  NoAuthenticationError,
  ValidationError,
  InvalidScopeError,
  NoProjectIdError,
  NoVersionIdError,
  NoIssueKeyOrIdError,
  NoFilterIdError,
  NoDashboardIdError,
  AuthenticationError,
  PermissionDeniedError,
  ResourceNotFoundError,
  ConflictError,
  RateLimitedError,
  ServerError,
  ApiError,
  NetworkError,
  TimeoutError,
  DecodeError,
  parseJiraApiError,
  isJiraError,
} from './errors/index.js';
export type { JiraApiErrorResponse } from './errors/index.js';

// ============================================================================
// Authentication
// ============================================================================

export {
  BasicAuthProvider,
  BearerTokenAuthProvider,
  Credentials,
  createAuthProvider,
} from './auth/index.js';
export type { AuthProvider, Headers } from './auth/index.js';

// ============================================================================
// Transport
// ============================================================================

export { FetchTransport } from './transport/index.js';
export type {
  HttpMethod,
  HttpTransport,
  TransportRequest,
  TransportResponse,
} from './transport/index.js';

// ============================================================================
// Client
// ============================================================================

export {
  JiraClient,
  ResponseEnvelope,
  createJiraClient,
  createJiraClientFromEnv,
  encodeQuery,
  pathSegment,
} from './client/index.js';
export type {
  JiraClientOptions,
  JiraRequest,
  JiraResponse,
  NewRequestOptions,
  QueryParams,
  QueryValue,
} from './client/index.js';

// ============================================================================
// Services
// ============================================================================

export {
  FilterShareServiceImpl,
  createFilterShareService,
  ProjectVersionServiceImpl,
  createProjectVersionService,
  IssueMetadataServiceImpl,
  createIssueMetadataService,
  IssueWatcherServiceImpl,
  createIssueWatcherService,
  DashboardServiceImpl,
  createDashboardService,
} from './services/index.js';
export type {
  FilterShareService,
  ProjectVersionService,
  IssueMetadataService,
  IssueWatcherService,
  DashboardService,
} from './services/index.js';

// ============================================================================
// Observability
// ============================================================================

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  NoopTracer,
  InMemoryTracer,
  InMemorySpanContext,
  createNoopObservability,
  createInMemoryObservability,
  createConsoleObservability,
} from './observability/index.js';
export type {
  Logger,
  LogEntry,
  MetricsCollector,
  MetricEntry,
  Tracer,
  SpanContext,
  SpanStatus,
  Observability,
} from './observability/index.js';

// ============================================================================
// Testing
// ============================================================================

export { MockHttpTransport } from './mocks/index.js';
export type { MockResponse, MockMatcher, RecordedCall } from './mocks/index.js';
export {
  TEST_SITE_URL,
  userFixtures,
  sharePermissionFixtures,
  versionFixtures,
  watcherFixtures,
  dashboardFixtures,
} from './fixtures/index.js';
