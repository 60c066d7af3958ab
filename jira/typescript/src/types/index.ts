/**
 * Jira resource types.
 */

export * from './common.js';
export * from './filter.js';
export * from './version.js';
export * from './metadata.js';
export * from './watcher.js';
export * from './dashboard.js';
