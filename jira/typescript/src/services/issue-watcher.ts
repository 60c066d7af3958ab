/**
 * Issue watcher service (REST API v3).
 */

import type { JiraClient, JiraResponse, ResponseEnvelope } from '../client/index.js';
import { pathSegment } from '../client/url.js';
import { AccountId, IssueKeyOrId, IssueWatchers } from '../types/index.js';
import { NoIssueKeyOrIdError } from '../errors/index.js';

const ISSUE_API = 'rest/api/3/issue';

// ============================================================================
// Issue Watcher Service Interface
// ============================================================================

export interface IssueWatcherService {
  get(issueKeyOrId: IssueKeyOrId, signal?: AbortSignal): Promise<JiraResponse<IssueWatchers>>;
  /**
   * Add a watcher. Without an account ID the calling user is added.
   */
  add(issueKeyOrId: IssueKeyOrId, accountId?: AccountId, signal?: AbortSignal): Promise<ResponseEnvelope>;
  /**
   * Remove a watcher. Without an account ID the calling user is removed.
   */
  delete(issueKeyOrId: IssueKeyOrId, accountId?: AccountId, signal?: AbortSignal): Promise<ResponseEnvelope>;
}

// ============================================================================
// Issue Watcher Service Implementation
// ============================================================================

export class IssueWatcherServiceImpl implements IssueWatcherService {
  private readonly client: JiraClient;

  constructor(client: JiraClient) {
    this.client = client;
  }

  async get(issueKeyOrId: IssueKeyOrId, signal?: AbortSignal): Promise<JiraResponse<IssueWatchers>> {
    return this.client.tracer.withSpan(
      'jira.issueWatcher.get',
      async (span) => {
        requireIssue(issueKeyOrId);
        span.setAttribute('issue', issueKeyOrId);

        const request = await this.client.newRequest('GET', watchersPath(issueKeyOrId), { signal });
        return this.client.call<IssueWatchers>(request);
      },
      { operation: 'getWatchers' }
    );
  }

  async add(issueKeyOrId: IssueKeyOrId, accountId?: AccountId, signal?: AbortSignal): Promise<ResponseEnvelope> {
    return this.client.tracer.withSpan(
      'jira.issueWatcher.add',
      async (span) => {
        requireIssue(issueKeyOrId);
        span.setAttribute('issue', issueKeyOrId);

        // Jira takes the bare account ID as a JSON string body.
        const request = await this.client.newRequest('POST', watchersPath(issueKeyOrId), {
          body: accountId ? accountId : undefined,
          signal,
        });
        const response = await this.client.execute(request);

        this.client.logger.info('Watcher added', { issueKeyOrId, accountId: accountId ?? 'self' });
        return response;
      },
      { operation: 'addWatcher' }
    );
  }

  async delete(issueKeyOrId: IssueKeyOrId, accountId?: AccountId, signal?: AbortSignal): Promise<ResponseEnvelope> {
    return this.client.tracer.withSpan(
      'jira.issueWatcher.delete',
      async (span) => {
        requireIssue(issueKeyOrId);
        span.setAttribute('issue', issueKeyOrId);

        const request = await this.client.newRequest('DELETE', watchersPath(issueKeyOrId), {
          query: { accountId },
          signal,
        });
        const response = await this.client.execute(request);

        this.client.logger.info('Watcher removed', { issueKeyOrId, accountId: accountId ?? 'self' });
        return response;
      },
      { operation: 'removeWatcher' }
    );
  }
}

function watchersPath(issueKeyOrId: IssueKeyOrId): string {
  return `${ISSUE_API}/${pathSegment(issueKeyOrId)}/watchers`;
}

function requireIssue(issueKeyOrId: IssueKeyOrId): void {
  if (!issueKeyOrId || issueKeyOrId.trim().length === 0) {
    throw new NoIssueKeyOrIdError();
  }
}

/**
 * Creates an issue watcher service.
 */
export function createIssueWatcherService(client: JiraClient): IssueWatcherService {
  return new IssueWatcherServiceImpl(client);
}
