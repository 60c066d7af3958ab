/**
 * Test fixtures for Jira API testing.
 */

import {
  Dashboard,
  DashboardPage,
  IssueWatchers,
  JiraUserSummary,
  JiraVersion,
  SharePermission,
  VersionPage,
} from '../types/index.js';

export const TEST_SITE_URL = 'https://example.atlassian.net';

/**
 * User fixtures
 */
export const userFixtures = {
  user(overrides?: Partial<JiraUserSummary>): JiraUserSummary {
    return {
      self: `${TEST_SITE_URL}/rest/api/3/user?accountId=5b10a2844c20165700ede21g`,
      accountId: '5b10a2844c20165700ede21g',
      displayName: 'Test User',
      active: true,
      accountType: 'atlassian',
      ...overrides,
    };
  },
};

/**
 * Share permission fixtures
 */
export const sharePermissionFixtures = {
  group(overrides?: Partial<SharePermission>): SharePermission {
    return {
      id: 10000,
      type: 'group',
      group: { name: 'jira-administrators' },
      ...overrides,
    };
  },

  project(overrides?: Partial<SharePermission>): SharePermission {
    return {
      id: 10001,
      type: 'project',
      project: { id: '10002', key: 'TEST', name: 'Test Project' },
      ...overrides,
    };
  },
};

/**
 * Version fixtures
 */
export const versionFixtures = {
  version(overrides?: Partial<JiraVersion>): JiraVersion {
    return {
      self: `${TEST_SITE_URL}/rest/api/2/version/10000`,
      id: '10000',
      name: 'v1.0',
      description: 'First release',
      archived: false,
      released: false,
      projectId: 10002,
      ...overrides,
    };
  },

  page(values: JiraVersion[], overrides?: Partial<VersionPage>): VersionPage {
    return {
      startAt: 0,
      maxResults: 50,
      total: values.length,
      isLast: true,
      values,
      ...overrides,
    };
  },
};

/**
 * Watcher fixtures
 */
export const watcherFixtures = {
  watchers(watchers: JiraUserSummary[] = [userFixtures.user()]): IssueWatchers {
    return {
      self: `${TEST_SITE_URL}/rest/api/3/issue/TEST-1/watchers`,
      isWatching: false,
      watchCount: watchers.length,
      watchers,
    };
  },
};

/**
 * Dashboard fixtures
 */
export const dashboardFixtures = {
  dashboard(overrides?: Partial<Dashboard>): Dashboard {
    return {
      id: '10100',
      name: 'Team board',
      self: `${TEST_SITE_URL}/rest/api/3/dashboard/10100`,
      isFavourite: true,
      sharePermissions: [{ id: 10000, type: 'global' }],
      ...overrides,
    };
  },

  page(dashboards: Dashboard[], overrides?: Partial<DashboardPage>): DashboardPage {
    return {
      startAt: 0,
      maxResults: 50,
      total: dashboards.length,
      dashboards,
      ...overrides,
    };
  },
};
