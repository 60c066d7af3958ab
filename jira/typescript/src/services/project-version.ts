/**
 * Project version service (REST API v2).
 */

import type { JiraClient, JiraResponse, ResponseEnvelope } from '../client/index.js';
import { pathSegment, validatePage } from '../client/url.js';
import {
  JiraVersion,
  ProjectKeyOrId,
  VersionDeleteOptions,
  VersionPage,
  VersionPayload,
  VersionRelatedIssueCounts,
  VersionSearchOptions,
  VersionUnresolvedIssueCount,
} from '../types/index.js';
import { NoProjectIdError, NoVersionIdError } from '../errors/index.js';

const API = 'rest/api/2';

// ============================================================================
// Project Version Service Interface
// ============================================================================

export interface ProjectVersionService {
  /** List every version of a project (unpaginated) */
  gets(projectKeyOrId: ProjectKeyOrId, signal?: AbortSignal): Promise<JiraResponse<JiraVersion[]>>;
  /** Get one page of a project's versions */
  search(
    projectKeyOrId: ProjectKeyOrId,
    options: VersionSearchOptions | undefined,
    startAt: number,
    maxResults: number,
    signal?: AbortSignal
  ): Promise<JiraResponse<VersionPage>>;
  create(payload: VersionPayload, signal?: AbortSignal): Promise<JiraResponse<JiraVersion>>;
  get(versionId: string, expand?: string[], signal?: AbortSignal): Promise<JiraResponse<JiraVersion>>;
  update(versionId: string, payload: VersionPayload, signal?: AbortSignal): Promise<JiraResponse<JiraVersion>>;
  /** Merge a version into another; the source version is deleted */
  merge(versionId: string, moveIssuesTo: string, signal?: AbortSignal): Promise<ResponseEnvelope>;
  relatedIssueCounts(versionId: string, signal?: AbortSignal): Promise<JiraResponse<VersionRelatedIssueCounts>>;
  unresolvedIssueCount(versionId: string, signal?: AbortSignal): Promise<JiraResponse<VersionUnresolvedIssueCount>>;
  delete(versionId: string, options?: VersionDeleteOptions, signal?: AbortSignal): Promise<ResponseEnvelope>;
}

// ============================================================================
// Project Version Service Implementation
// ============================================================================

export class ProjectVersionServiceImpl implements ProjectVersionService {
  private readonly client: JiraClient;

  constructor(client: JiraClient) {
    this.client = client;
  }

  async gets(projectKeyOrId: ProjectKeyOrId, signal?: AbortSignal): Promise<JiraResponse<JiraVersion[]>> {
    return this.client.tracer.withSpan(
      'jira.projectVersion.gets',
      async (span) => {
        requireProject(projectKeyOrId);
        span.setAttribute('project', projectKeyOrId);

        const request = await this.client.newRequest(
          'GET',
          `${API}/project/${pathSegment(projectKeyOrId)}/versions`,
          { signal }
        );
        return this.client.call<JiraVersion[]>(request);
      },
      { operation: 'getProjectVersions' }
    );
  }

  async search(
    projectKeyOrId: ProjectKeyOrId,
    options: VersionSearchOptions | undefined,
    startAt: number,
    maxResults: number,
    signal?: AbortSignal
  ): Promise<JiraResponse<VersionPage>> {
    return this.client.tracer.withSpan(
      'jira.projectVersion.search',
      async (span) => {
        requireProject(projectKeyOrId);
        validatePage(startAt, maxResults);
        span.setAttribute('project', projectKeyOrId);

        const request = await this.client.newRequest(
          'GET',
          `${API}/project/${pathSegment(projectKeyOrId)}/version`,
          {
            query: {
              startAt,
              maxResults,
              expand: options?.expand?.join(','),
              query: options?.query,
              status: options?.status?.join(','),
              orderBy: options?.orderBy,
            },
            signal,
          }
        );
        return this.client.call<VersionPage>(request);
      },
      { operation: 'searchProjectVersions' }
    );
  }

  async create(payload: VersionPayload, signal?: AbortSignal): Promise<JiraResponse<JiraVersion>> {
    return this.client.tracer.withSpan(
      'jira.projectVersion.create',
      async () => {
        const request = await this.client.newRequest('POST', `${API}/version`, { body: payload, signal });
        const result = await this.client.call<JiraVersion>(request);

        this.client.logger.info('Version created', { versionId: result.data.id, name: result.data.name });
        return result;
      },
      { operation: 'createVersion' }
    );
  }

  async get(versionId: string, expand?: string[], signal?: AbortSignal): Promise<JiraResponse<JiraVersion>> {
    return this.client.tracer.withSpan(
      'jira.projectVersion.get',
      async (span) => {
        requireVersion(versionId);
        span.setAttribute('version', versionId);

        const request = await this.client.newRequest('GET', versionPath(versionId), {
          query: { expand: expand?.join(',') },
          signal,
        });
        return this.client.call<JiraVersion>(request);
      },
      { operation: 'getVersion' }
    );
  }

  async update(versionId: string, payload: VersionPayload, signal?: AbortSignal): Promise<JiraResponse<JiraVersion>> {
    return this.client.tracer.withSpan(
      'jira.projectVersion.update',
      async (span) => {
        requireVersion(versionId);
        span.setAttribute('version', versionId);

        const request = await this.client.newRequest('PUT', versionPath(versionId), { body: payload, signal });
        return this.client.call<JiraVersion>(request);
      },
      { operation: 'updateVersion' }
    );
  }

  async merge(versionId: string, moveIssuesTo: string, signal?: AbortSignal): Promise<ResponseEnvelope> {
    return this.client.tracer.withSpan(
      'jira.projectVersion.merge',
      async (span) => {
        requireVersion(versionId);
        requireVersion(moveIssuesTo);
        span.setAttribute('version', versionId);
        span.setAttribute('version.target', moveIssuesTo);

        const request = await this.client.newRequest(
          'PUT',
          `${versionPath(versionId)}/mergeto/${pathSegment(moveIssuesTo)}`,
          { signal }
        );
        const response = await this.client.execute(request);

        this.client.logger.info('Version merged', { versionId, moveIssuesTo });
        return response;
      },
      { operation: 'mergeVersion' }
    );
  }

  async relatedIssueCounts(versionId: string, signal?: AbortSignal): Promise<JiraResponse<VersionRelatedIssueCounts>> {
    return this.client.tracer.withSpan(
      'jira.projectVersion.relatedIssueCounts',
      async (span) => {
        requireVersion(versionId);
        span.setAttribute('version', versionId);

        const request = await this.client.newRequest('GET', `${versionPath(versionId)}/relatedIssueCounts`, { signal });
        return this.client.call<VersionRelatedIssueCounts>(request);
      },
      { operation: 'getVersionRelatedIssueCounts' }
    );
  }

  async unresolvedIssueCount(
    versionId: string,
    signal?: AbortSignal
  ): Promise<JiraResponse<VersionUnresolvedIssueCount>> {
    return this.client.tracer.withSpan(
      'jira.projectVersion.unresolvedIssueCount',
      async (span) => {
        requireVersion(versionId);
        span.setAttribute('version', versionId);

        const request = await this.client.newRequest(
          'GET',
          `${versionPath(versionId)}/unresolvedIssueCount`,
          { signal }
        );
        return this.client.call<VersionUnresolvedIssueCount>(request);
      },
      { operation: 'getVersionUnresolvedIssueCount' }
    );
  }

  async delete(versionId: string, options?: VersionDeleteOptions, signal?: AbortSignal): Promise<ResponseEnvelope> {
    return this.client.tracer.withSpan(
      'jira.projectVersion.delete',
      async (span) => {
        requireVersion(versionId);
        span.setAttribute('version', versionId);

        const request = await this.client.newRequest('DELETE', versionPath(versionId), {
          query: {
            moveFixIssuesTo: options?.moveFixIssuesTo,
            moveAffectedIssuesTo: options?.moveAffectedIssuesTo,
          },
          signal,
        });
        const response = await this.client.execute(request);

        this.client.logger.info('Version deleted', { versionId });
        return response;
      },
      { operation: 'deleteVersion' }
    );
  }
}

// ============================================================================
// Helpers
// ============================================================================

function versionPath(versionId: string): string {
  return `${API}/version/${pathSegment(versionId)}`;
}

function requireProject(projectKeyOrId: string): void {
  if (!projectKeyOrId || projectKeyOrId.trim().length === 0) {
    throw new NoProjectIdError();
  }
}

function requireVersion(versionId: string): void {
  if (!versionId || versionId.trim().length === 0) {
    throw new NoVersionIdError();
  }
}

/**
 * Creates a project version service.
 */
export function createProjectVersionService(client: JiraClient): ProjectVersionService {
  return new ProjectVersionServiceImpl(client);
}
