/**
 * Jira services module.
 *
 * Re-exports all service interfaces and implementations.
 */

export * from './filter-share.js';
export * from './project-version.js';
export * from './issue-metadata.js';
export * from './issue-watcher.js';
export * from './dashboard.js';
