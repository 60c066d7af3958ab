/**
 * Filter sharing service.
 *
 * Default share scope and per-filter share permissions (REST API v2).
 */

import type { JiraClient, JiraResponse, ResponseEnvelope } from '../client/index.js';
import { pathSegment } from '../client/url.js';
import {
  SHARE_SCOPES,
  ShareScopeSchema,
  ShareFilterScope,
  SharePermission,
  PermissionFilterPayload,
} from '../types/index.js';
import { InvalidScopeError, NoFilterIdError, ValidationError } from '../errors/index.js';

const FILTER_API = 'rest/api/2/filter';

// ============================================================================
// Filter Share Service Interface
// ============================================================================

export interface FilterShareService {
  /** Get the default share scope for new filters and dashboards */
  scope(signal?: AbortSignal): Promise<JiraResponse<ShareFilterScope>>;
  /** Set the default share scope; one of GLOBAL, AUTHENTICATED, PRIVATE */
  setScope(scope: string, signal?: AbortSignal): Promise<ResponseEnvelope>;
  /** List the share permissions of a filter */
  gets(filterId: number, signal?: AbortSignal): Promise<JiraResponse<SharePermission[]>>;
  /** Add a share permission to a filter */
  add(filterId: number, payload: PermissionFilterPayload, signal?: AbortSignal): Promise<JiraResponse<SharePermission[]>>;
  /** Get one share permission of a filter */
  get(filterId: number, permissionId: number, signal?: AbortSignal): Promise<JiraResponse<SharePermission>>;
  /** Delete a share permission from a filter */
  delete(filterId: number, permissionId: number, signal?: AbortSignal): Promise<ResponseEnvelope>;
}

// ============================================================================
// Filter Share Service Implementation
// ============================================================================

export class FilterShareServiceImpl implements FilterShareService {
  private readonly client: JiraClient;

  constructor(client: JiraClient) {
    this.client = client;
  }

  async scope(signal?: AbortSignal): Promise<JiraResponse<ShareFilterScope>> {
    return this.client.tracer.withSpan(
      'jira.filterShare.scope',
      async () => {
        const request = await this.client.newRequest('GET', `${FILTER_API}/defaultShareScope`, { signal });
        return this.client.call<ShareFilterScope>(request);
      },
      { operation: 'getDefaultShareScope' }
    );
  }

  async setScope(scope: string, signal?: AbortSignal): Promise<ResponseEnvelope> {
    return this.client.tracer.withSpan(
      'jira.filterShare.setScope',
      async (span) => {
        const parsed = ShareScopeSchema.safeParse(scope);
        if (!parsed.success) {
          throw new InvalidScopeError(scope, SHARE_SCOPES);
        }
        span.setAttribute('scope', parsed.data);

        const body: ShareFilterScope = { scope: parsed.data };
        const request = await this.client.newRequest('PUT', `${FILTER_API}/defaultShareScope`, { body, signal });
        return this.client.execute(request);
      },
      { operation: 'setDefaultShareScope' }
    );
  }

  async gets(filterId: number, signal?: AbortSignal): Promise<JiraResponse<SharePermission[]>> {
    return this.client.tracer.withSpan(
      'jira.filterShare.gets',
      async (span) => {
        validateFilterId(filterId);
        span.setAttribute('filter', filterId);

        const request = await this.client.newRequest('GET', permissionsPath(filterId), { signal });
        return this.client.call<SharePermission[]>(request);
      },
      { operation: 'getSharePermissions' }
    );
  }

  async add(
    filterId: number,
    payload: PermissionFilterPayload,
    signal?: AbortSignal
  ): Promise<JiraResponse<SharePermission[]>> {
    return this.client.tracer.withSpan(
      'jira.filterShare.add',
      async (span) => {
        validateFilterId(filterId);
        if (!payload.type) {
          throw new ValidationError(['share permission type is required']);
        }
        span.setAttribute('filter', filterId);
        span.setAttribute('permission.type', payload.type);

        const request = await this.client.newRequest('POST', permissionsPath(filterId), {
          body: compactPayload(payload),
          signal,
        });
        const result = await this.client.call<SharePermission[]>(request);

        this.client.logger.info('Share permission added', { filterId, type: payload.type });
        return result;
      },
      { operation: 'addSharePermission' }
    );
  }

  async get(filterId: number, permissionId: number, signal?: AbortSignal): Promise<JiraResponse<SharePermission>> {
    return this.client.tracer.withSpan(
      'jira.filterShare.get',
      async (span) => {
        validateFilterId(filterId);
        validatePermissionId(permissionId);
        span.setAttribute('filter', filterId);

        const request = await this.client.newRequest('GET', permissionPath(filterId, permissionId), { signal });
        return this.client.call<SharePermission>(request);
      },
      { operation: 'getSharePermission' }
    );
  }

  async delete(filterId: number, permissionId: number, signal?: AbortSignal): Promise<ResponseEnvelope> {
    return this.client.tracer.withSpan(
      'jira.filterShare.delete',
      async (span) => {
        validateFilterId(filterId);
        validatePermissionId(permissionId);
        span.setAttribute('filter', filterId);

        const request = await this.client.newRequest('DELETE', permissionPath(filterId, permissionId), { signal });
        const response = await this.client.execute(request);

        this.client.logger.info('Share permission deleted', { filterId, permissionId });
        return response;
      },
      { operation: 'deleteSharePermission' }
    );
  }
}

// ============================================================================
// Helpers
// ============================================================================

function permissionsPath(filterId: number): string {
  return `${FILTER_API}/${pathSegment(filterId)}/permission`;
}

function permissionPath(filterId: number, permissionId: number): string {
  return `${permissionsPath(filterId)}/${pathSegment(permissionId)}`;
}

function validateFilterId(filterId: number): void {
  if (!Number.isInteger(filterId) || filterId <= 0) {
    throw new NoFilterIdError();
  }
}

function validatePermissionId(permissionId: number): void {
  if (!Number.isInteger(permissionId) || permissionId <= 0) {
    throw new ValidationError([`invalid share permission ID: ${permissionId}`]);
  }
}

/**
 * Drops empty optional fields so they are not sent at all.
 */
function compactPayload(payload: PermissionFilterPayload): PermissionFilterPayload {
  const result: PermissionFilterPayload = { type: payload.type };
  if (payload.projectId) result.projectId = payload.projectId;
  if (payload.groupname) result.groupname = payload.groupname;
  if (payload.projectRoleId) result.projectRoleId = payload.projectRoleId;
  if (payload.accountId) result.accountId = payload.accountId;
  return result;
}

/**
 * Creates a filter share service.
 */
export function createFilterShareService(client: JiraClient): FilterShareService {
  return new FilterShareServiceImpl(client);
}
