/**
 * Lists the first page of dashboards visible to the configured user.
 *
 * Reads JIRA_SITE_URL, JIRA_AUTH_EMAIL and JIRA_API_TOKEN (or
 * JIRA_BEARER_TOKEN) from the environment.
 */

import {
  createJiraClientFromEnv,
  createConsoleObservability,
  isJiraError,
  LogLevel,
} from '../src/index.js';

async function listDashboards(): Promise<void> {
  const client = createJiraClientFromEnv({
    observability: createConsoleObservability(LogLevel.DEBUG),
  });

  try {
    const { data, response } = await client.dashboard.gets(0, 50);

    console.log('Response HTTP Code', response.status);
    console.log('HTTP Endpoint Used', response.endpoint);

    for (const dashboard of data.dashboards) {
      console.log(dashboard.id, dashboard.name);
    }
  } catch (error) {
    if (isJiraError(error) && error.response) {
      console.error('Response body', error.response.text());
    }
    throw error;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  listDashboards().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}

export { listDashboards };
