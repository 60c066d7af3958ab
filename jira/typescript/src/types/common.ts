/**
 * Base types shared across Jira resources.
 */

/**
 * Issue key (e.g., "PROJ-123") or numeric issue ID.
 */
export type IssueKeyOrId = string;

/**
 * Project key (e.g., "PROJ") or numeric project ID.
 */
export type ProjectKeyOrId = string;

/**
 * Account ID for Jira users.
 */
export type AccountId = string;

/**
 * User as embedded in other resources.
 */
export interface JiraUserSummary {
  self?: string;
  accountId: AccountId;
  displayName?: string;
  active?: boolean;
  accountType?: 'atlassian' | 'app' | 'customer';
  avatarUrls?: Record<string, string>;
}

/**
 * Project as embedded in other resources.
 */
export interface JiraProjectSummary {
  id: string;
  key: string;
  name?: string;
  self?: string;
  simplified?: boolean;
  projectTypeKey?: string;
}

/**
 * Any JSON value. Used where the response shape depends on instance
 * configuration and is deliberately left open.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Checks that a value is a non-array JSON object.
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
