/**
 * Issue create/edit metadata types.
 */

/**
 * Filters for the create metadata endpoint. Each list is sent as a repeated
 * query key.
 */
export interface CreateMetaOptions {
  projectIds?: string[];
  projectKeys?: string[];
  issueTypeIds?: string[];
  issueTypeNames?: string[];
  /** e.g. "projects.issuetypes.fields" */
  expand?: string;
}
