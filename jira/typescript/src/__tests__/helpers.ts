/**
 * Shared setup for client and service tests.
 */

import { JiraClient, createJiraClient } from '../client/index.js';
import { JiraConfigBuilder } from '../config/index.js';
import { MockHttpTransport } from '../mocks/index.js';
import { createInMemoryObservability } from '../observability/index.js';
import { TEST_SITE_URL } from '../fixtures/index.js';

export const TEST_EMAIL = 'user@example.com';
export const TEST_TOKEN = 'test-token';

export interface TestContext {
  client: JiraClient;
  transport: MockHttpTransport;
  observability: ReturnType<typeof createInMemoryObservability>;
}

export function createTestClient(): TestContext {
  const transport = new MockHttpTransport();
  const observability = createInMemoryObservability();
  const config = new JiraConfigBuilder()
    .withSiteUrl(TEST_SITE_URL)
    .withBasicAuth(TEST_EMAIL, TEST_TOKEN)
    .build();
  const client = createJiraClient(config, { transport, observability });
  return { client, transport, observability };
}

/**
 * Awaits a promise that must reject with the given error type.
 */
export async function captureError<E extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}
