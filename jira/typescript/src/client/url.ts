/**
 * Path and query encoding shared by the client and its services.
 */

import { ValidationError } from '../errors/index.js';

/**
 * Query parameter value. `undefined`, empty strings and empty arrays are
 * dropped; arrays become one repeated key per element.
 */
export type QueryValue = string | number | boolean | readonly string[] | undefined;

export type QueryParams = Record<string, QueryValue>;

/**
 * Encodes a value for use as one path segment.
 */
export function pathSegment(value: string | number): string {
  return encodeURIComponent(String(value));
}

/**
 * Checks `startAt`/`maxResults` before they go into a query.
 *
 * @throws ValidationError listing every bad value
 */
export function validatePage(startAt: number, maxResults: number): void {
  const errors: string[] = [];
  if (!Number.isInteger(startAt) || startAt < 0) {
    errors.push('startAt must be a non-negative integer');
  }
  if (!Number.isInteger(maxResults) || maxResults < 0) {
    errors.push('maxResults must be a non-negative integer');
  }
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
}

/**
 * Encodes query parameters in insertion order, skipping absent and empty values.
 */
export function encodeQuery(query: QueryParams | undefined): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined) continue;
    if (typeof value === 'string') {
      if (value.length > 0) params.append(key, value);
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      params.append(key, String(value));
    } else {
      for (const item of value) {
        params.append(key, item);
      }
    }
  }
  return params.toString();
}
