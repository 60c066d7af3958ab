/**
 * Filter sharing types.
 */

import { z } from 'zod';
import type { JiraProjectSummary, JiraUserSummary } from './common.js';

/**
 * Allowed default share scopes for new filters and dashboards.
 */
export const SHARE_SCOPES = ['GLOBAL', 'AUTHENTICATED', 'PRIVATE'] as const;

export const ShareScopeSchema = z.enum(SHARE_SCOPES);

/**
 * Sharing visibility level for a filter or dashboard.
 */
export type ShareScope = z.infer<typeof ShareScopeSchema>;

export interface ShareFilterScope {
  scope: ShareScope;
}

/**
 * Share permission kinds understood by Jira.
 */
export type SharePermissionType =
  | 'user'
  | 'group'
  | 'project'
  | 'projectRole'
  | 'global'
  | 'loggedin'
  | 'authenticated'
  | 'project-unknown';

export interface ProjectRoleSummary {
  self?: string;
  id: number;
  name: string;
  description?: string;
}

export interface GroupSummary {
  name: string;
  groupId?: string;
  self?: string;
}

/**
 * A rule granting visibility of a filter or dashboard.
 */
export interface SharePermission {
  id?: number;
  type: SharePermissionType;
  project?: JiraProjectSummary;
  role?: ProjectRoleSummary;
  group?: GroupSummary;
  user?: JiraUserSummary;
}

/**
 * Payload for adding a share permission. Unset fields are left out of the
 * JSON body.
 */
export interface PermissionFilterPayload {
  type: SharePermissionType;
  projectId?: string;
  groupname?: string;
  projectRoleId?: string;
  accountId?: string;
}
