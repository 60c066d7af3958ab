/**
 * Project version types.
 */

export interface VersionIssuesStatus {
  unmapped?: number;
  toDo?: number;
  inProgress?: number;
  done?: number;
}

export interface VersionOperation {
  id: string;
  styleClass?: string;
  label?: string;
  href?: string;
  weight?: number;
}

/**
 * Jira project version.
 */
export interface JiraVersion {
  self?: string;
  id: string;
  name: string;
  description?: string;
  archived?: boolean;
  released?: boolean;
  /** ISO date (YYYY-MM-DD) */
  startDate?: string;
  /** ISO date (YYYY-MM-DD) */
  releaseDate?: string;
  overdue?: boolean;
  userStartDate?: string;
  userReleaseDate?: string;
  projectId?: number;
  moveUnfixedIssuesTo?: string;
  operations?: VersionOperation[];
  issuesStatusForFixVersion?: VersionIssuesStatus;
}

/**
 * One page of versions from the paginated project endpoint.
 */
export interface VersionPage {
  self?: string;
  nextPage?: string;
  maxResults: number;
  startAt: number;
  total: number;
  isLast: boolean;
  values: JiraVersion[];
}

/**
 * Create/update payload.
 */
export interface VersionPayload {
  name?: string;
  description?: string;
  projectId?: number;
  /** Deprecated by Jira in favour of projectId */
  project?: string;
  archived?: boolean;
  released?: boolean;
  startDate?: string;
  releaseDate?: string;
  moveUnfixedIssuesTo?: string;
}

export type VersionStatus = 'released' | 'unreleased' | 'archived';

export type VersionOrderBy =
  | 'description' | '-description' | '+description'
  | 'name' | '-name' | '+name'
  | 'releaseDate' | '-releaseDate' | '+releaseDate'
  | 'sequence' | '-sequence' | '+sequence'
  | 'startDate' | '-startDate' | '+startDate';

/**
 * Filters for the paginated version search.
 */
export interface VersionSearchOptions {
  /** e.g. ["issuesstatus", "operations"] */
  expand?: string[];
  /** Matched against version name and description */
  query?: string;
  /** Sent comma-joined */
  status?: VersionStatus[];
  orderBy?: VersionOrderBy;
}

export interface VersionRelatedIssueCounts {
  self?: string;
  issuesFixedCount: number;
  issuesAffectedCount: number;
  issueCountWithCustomFieldsShowingVersion?: number;
  customFieldUsage?: Array<{
    fieldName: string;
    customFieldId: number;
    issueCountWithVersionInCustomField: number;
  }>;
}

export interface VersionUnresolvedIssueCount {
  self?: string;
  issuesUnresolvedCount: number;
  issuesCount: number;
}

/**
 * Where to move issues when a version is deleted.
 */
export interface VersionDeleteOptions {
  moveFixIssuesTo?: string;
  moveAffectedIssuesTo?: string;
}
