/**
 * Issue watcher types.
 */

import type { JiraUserSummary } from './common.js';

export interface IssueWatchers {
  self: string;
  isWatching: boolean;
  watchCount: number;
  watchers: JiraUserSummary[];
}
