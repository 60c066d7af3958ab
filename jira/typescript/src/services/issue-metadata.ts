/**
 * Issue metadata service (REST API v2).
 *
 * Edit and create metadata depend on the project's screens and field
 * configuration, so both are returned as plain JSON trees.
 */

import type { JiraClient, JiraResponse } from '../client/index.js';
import { pathSegment } from '../client/url.js';
import { CreateMetaOptions, IssueKeyOrId, JsonValue } from '../types/index.js';
import { NoIssueKeyOrIdError } from '../errors/index.js';

const ISSUE_API = 'rest/api/2/issue';

export interface IssueMetadataService {
  /** Get the fields that can be edited on an issue */
  get(
    issueKeyOrId: IssueKeyOrId,
    overrideScreenSecurity?: boolean,
    overrideEditableFlag?: boolean,
    signal?: AbortSignal
  ): Promise<JiraResponse<JsonValue>>;
  /** Get the projects, issue types and fields available when creating issues */
  create(options?: CreateMetaOptions, signal?: AbortSignal): Promise<JiraResponse<JsonValue>>;
}

export class IssueMetadataServiceImpl implements IssueMetadataService {
  private readonly client: JiraClient;

  constructor(client: JiraClient) {
    this.client = client;
  }

  async get(
    issueKeyOrId: IssueKeyOrId,
    overrideScreenSecurity = false,
    overrideEditableFlag = false,
    signal?: AbortSignal
  ): Promise<JiraResponse<JsonValue>> {
    return this.client.tracer.withSpan(
      'jira.issueMetadata.get',
      async (span) => {
        if (!issueKeyOrId || issueKeyOrId.trim().length === 0) {
          throw new NoIssueKeyOrIdError();
        }
        span.setAttribute('issue', issueKeyOrId);

        const request = await this.client.newRequest(
          'GET',
          `${ISSUE_API}/${pathSegment(issueKeyOrId)}/editmeta`,
          {
            query: {
              overrideEditableFlag: overrideEditableFlag ? true : undefined,
              overrideScreenSecurity: overrideScreenSecurity ? true : undefined,
            },
            signal,
          }
        );
        return this.client.call<JsonValue>(request);
      },
      { operation: 'getEditMeta' }
    );
  }

  async create(options: CreateMetaOptions = {}, signal?: AbortSignal): Promise<JiraResponse<JsonValue>> {
    return this.client.tracer.withSpan(
      'jira.issueMetadata.create',
      async () => {
        const request = await this.client.newRequest('GET', `${ISSUE_API}/createmeta`, {
          query: {
            projectIds: options.projectIds,
            projectKeys: options.projectKeys,
            issuetypeIds: options.issueTypeIds,
            issuetypeNames: options.issueTypeNames,
            expand: options.expand,
          },
          signal,
        });
        return this.client.call<JsonValue>(request);
      },
      { operation: 'getCreateMeta' }
    );
  }
}

export function createIssueMetadataService(client: JiraClient): IssueMetadataService {
  return new IssueMetadataServiceImpl(client);
}
