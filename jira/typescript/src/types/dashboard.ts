/**
 * Dashboard types.
 */

import type { JiraUserSummary } from './common.js';
import type { SharePermission } from './filter.js';

export interface Dashboard {
  id: string;
  name: string;
  description?: string;
  self?: string;
  view?: string;
  isFavourite?: boolean;
  popularity?: number;
  rank?: number;
  owner?: JiraUserSummary;
  sharePermissions?: SharePermission[];
  editPermissions?: SharePermission[];
  systemDashboard?: boolean;
}

/**
 * Page returned by the dashboard listing endpoint.
 */
export interface DashboardPage {
  startAt: number;
  maxResults: number;
  total: number;
  prev?: string;
  next?: string;
  dashboards: Dashboard[];
}

/**
 * Page returned by the dashboard search endpoint.
 */
export interface DashboardSearchPage {
  self?: string;
  nextPage?: string;
  maxResults: number;
  startAt: number;
  total: number;
  isLast: boolean;
  values: Dashboard[];
}

export const DASHBOARD_FILTERS = ['favourite', 'my'] as const;

export type DashboardFilter = (typeof DASHBOARD_FILTERS)[number];

export interface DashboardSearchOptions {
  dashboardName?: string;
  accountId?: string;
  groupname?: string;
  groupId?: string;
  projectId?: number;
  orderBy?: string;
  status?: 'active' | 'archived' | 'deleted';
  expand?: string[];
}

/**
 * Create, update and copy payload.
 */
export interface DashboardPayload {
  name: string;
  description?: string;
  sharePermissions: SharePermission[];
  editPermissions?: SharePermission[];
}
