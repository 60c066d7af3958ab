/**
 * Dashboard service (REST API v3).
 */

import type { JiraClient, JiraResponse, ResponseEnvelope } from '../client/index.js';
import { pathSegment, validatePage } from '../client/url.js';
import {
  DASHBOARD_FILTERS,
  Dashboard,
  DashboardFilter,
  DashboardPage,
  DashboardPayload,
  DashboardSearchOptions,
  DashboardSearchPage,
} from '../types/index.js';
import { NoDashboardIdError, ValidationError } from '../errors/index.js';

const DASHBOARD_API = 'rest/api/3/dashboard';

// ============================================================================
// Dashboard Service Interface
// ============================================================================

export interface DashboardService {
  /**
   * List dashboards visible to the user.
   *
   * @param filter - `favourite` or `my` to narrow the list
   */
  gets(startAt: number, maxResults: number, filter?: string, signal?: AbortSignal): Promise<JiraResponse<DashboardPage>>;
  search(
    options: DashboardSearchOptions | undefined,
    startAt: number,
    maxResults: number,
    signal?: AbortSignal
  ): Promise<JiraResponse<DashboardSearchPage>>;
  get(dashboardId: string, signal?: AbortSignal): Promise<JiraResponse<Dashboard>>;
  create(payload: DashboardPayload, signal?: AbortSignal): Promise<JiraResponse<Dashboard>>;
  update(dashboardId: string, payload: DashboardPayload, signal?: AbortSignal): Promise<JiraResponse<Dashboard>>;
  delete(dashboardId: string, signal?: AbortSignal): Promise<ResponseEnvelope>;
  copy(dashboardId: string, payload: DashboardPayload, signal?: AbortSignal): Promise<JiraResponse<Dashboard>>;
}

// ============================================================================
// Dashboard Service Implementation
// ============================================================================

export class DashboardServiceImpl implements DashboardService {
  private readonly client: JiraClient;

  constructor(client: JiraClient) {
    this.client = client;
  }

  async gets(
    startAt: number,
    maxResults: number,
    filter?: string,
    signal?: AbortSignal
  ): Promise<JiraResponse<DashboardPage>> {
    return this.client.tracer.withSpan(
      'jira.dashboard.gets',
      async () => {
        validatePage(startAt, maxResults);
        let dashboardFilter: DashboardFilter | undefined;
        if (filter) {
          if (!isDashboardFilter(filter)) {
            throw new ValidationError([`filter must be one of: ${DASHBOARD_FILTERS.join(', ')}`]);
          }
          dashboardFilter = filter;
        }

        const request = await this.client.newRequest('GET', DASHBOARD_API, {
          query: { startAt, maxResults, filter: dashboardFilter },
          signal,
        });
        return this.client.call<DashboardPage>(request);
      },
      { operation: 'getDashboards' }
    );
  }

  async search(
    options: DashboardSearchOptions | undefined,
    startAt: number,
    maxResults: number,
    signal?: AbortSignal
  ): Promise<JiraResponse<DashboardSearchPage>> {
    return this.client.tracer.withSpan(
      'jira.dashboard.search',
      async () => {
        validatePage(startAt, maxResults);

        const request = await this.client.newRequest('GET', `${DASHBOARD_API}/search`, {
          query: {
            startAt,
            maxResults,
            dashboardName: options?.dashboardName,
            accountId: options?.accountId,
            groupname: options?.groupname,
            groupId: options?.groupId,
            projectId: options?.projectId,
            orderBy: options?.orderBy,
            status: options?.status,
            expand: options?.expand?.join(','),
          },
          signal,
        });
        return this.client.call<DashboardSearchPage>(request);
      },
      { operation: 'searchDashboards' }
    );
  }

  async get(dashboardId: string, signal?: AbortSignal): Promise<JiraResponse<Dashboard>> {
    return this.client.tracer.withSpan(
      'jira.dashboard.get',
      async (span) => {
        requireDashboard(dashboardId);
        span.setAttribute('dashboard', dashboardId);

        const request = await this.client.newRequest('GET', dashboardPath(dashboardId), { signal });
        return this.client.call<Dashboard>(request);
      },
      { operation: 'getDashboard' }
    );
  }

  async create(payload: DashboardPayload, signal?: AbortSignal): Promise<JiraResponse<Dashboard>> {
    return this.client.tracer.withSpan(
      'jira.dashboard.create',
      async () => {
        validatePayload(payload);

        const request = await this.client.newRequest('POST', DASHBOARD_API, { body: payload, signal });
        const result = await this.client.call<Dashboard>(request);

        this.client.logger.info('Dashboard created', { dashboardId: result.data.id });
        return result;
      },
      { operation: 'createDashboard' }
    );
  }

  async update(dashboardId: string, payload: DashboardPayload, signal?: AbortSignal): Promise<JiraResponse<Dashboard>> {
    return this.client.tracer.withSpan(
      'jira.dashboard.update',
      async (span) => {
        requireDashboard(dashboardId);
        validatePayload(payload);
        span.setAttribute('dashboard', dashboardId);

        const request = await this.client.newRequest('PUT', dashboardPath(dashboardId), { body: payload, signal });
        return this.client.call<Dashboard>(request);
      },
      { operation: 'updateDashboard' }
    );
  }

  async delete(dashboardId: string, signal?: AbortSignal): Promise<ResponseEnvelope> {
    return this.client.tracer.withSpan(
      'jira.dashboard.delete',
      async (span) => {
        requireDashboard(dashboardId);
        span.setAttribute('dashboard', dashboardId);

        const request = await this.client.newRequest('DELETE', dashboardPath(dashboardId), { signal });
        const response = await this.client.execute(request);

        this.client.logger.info('Dashboard deleted', { dashboardId });
        return response;
      },
      { operation: 'deleteDashboard' }
    );
  }

  async copy(dashboardId: string, payload: DashboardPayload, signal?: AbortSignal): Promise<JiraResponse<Dashboard>> {
    return this.client.tracer.withSpan(
      'jira.dashboard.copy',
      async (span) => {
        requireDashboard(dashboardId);
        validatePayload(payload);
        span.setAttribute('dashboard', dashboardId);

        const request = await this.client.newRequest('POST', `${dashboardPath(dashboardId)}/copy`, {
          body: payload,
          signal,
        });
        const result = await this.client.call<Dashboard>(request);

        this.client.logger.info('Dashboard copied', { sourceId: dashboardId, dashboardId: result.data.id });
        return result;
      },
      { operation: 'copyDashboard' }
    );
  }
}

// ============================================================================
// Helpers
// ============================================================================

function dashboardPath(dashboardId: string): string {
  return `${DASHBOARD_API}/${pathSegment(dashboardId)}`;
}

function isDashboardFilter(value: string): value is DashboardFilter {
  return DASHBOARD_FILTERS.some((f) => f === value);
}

function requireDashboard(dashboardId: string): void {
  if (!dashboardId || dashboardId.trim().length === 0) {
    throw new NoDashboardIdError();
  }
}

function validatePayload(payload: DashboardPayload): void {
  if (!payload.name || payload.name.trim().length === 0) {
    throw new ValidationError(['dashboard name is required']);
  }
}

/**
 * Creates a dashboard service.
 */
export function createDashboardService(client: JiraClient): DashboardService {
  return new DashboardServiceImpl(client);
}
