/**
 * Tests for configuration.
 */

import { describe, it, expect } from 'vitest';
import { JiraConfigBuilder, DEFAULT_USER_AGENT, SecretString } from '../config/index.js';
import { ConfigurationError, NoAuthenticationError } from '../errors/index.js';
import { createJiraClientFromEnv } from '../client/index.js';

describe('JiraConfigBuilder', () => {
  it('should build a basic auth configuration with defaults', () => {
    const config = new JiraConfigBuilder()
      .withSiteUrl('https://example.atlassian.net')
      .withBasicAuth('user@example.com', 'test-token')
      .build();

    expect(config).toEqual({
      siteUrl: 'https://example.atlassian.net',
      auth: { type: 'basic', email: 'user@example.com', token: 'test-token' },
      userAgent: DEFAULT_USER_AGENT,
      requestTimeoutMs: undefined,
      defaultHeaders: {},
    });
  });

  it('should strip trailing slashes from the site URL', () => {
    const config = new JiraConfigBuilder()
      .withSiteUrl('https://example.atlassian.net//')
      .withBearerToken('test-secret')
      .build();

    expect(config.siteUrl).toBe('https://example.atlassian.net');
  });

  it('should reject an invalid site URL', () => {
    expect(() => new JiraConfigBuilder().withSiteUrl('not a url')).toThrow(
      'Configuration error: Invalid site URL: not a url'
    );
  });

  it('should reject a non-HTTP site URL', () => {
    expect(() => new JiraConfigBuilder().withSiteUrl('ftp://example.com')).toThrow(ConfigurationError);
  });

  it('should require a site URL', () => {
    expect(() => new JiraConfigBuilder().withBearerToken('test-secret').build()).toThrow(
      'Configuration error: Site URL is required'
    );
  });

  it('should require credentials', () => {
    expect(() => new JiraConfigBuilder().withSiteUrl('https://example.atlassian.net').build()).toThrow(
      NoAuthenticationError
    );
  });

  it('should reject empty credentials', () => {
    expect(() => new JiraConfigBuilder().withBasicAuth('user@example.com', ' ')).toThrow(ConfigurationError);
    expect(() => new JiraConfigBuilder().withBearerToken('')).toThrow(ConfigurationError);
  });

  it('should reject a non-positive timeout', () => {
    expect(() => new JiraConfigBuilder().withRequestTimeout(0)).toThrow(
      'Configuration error: Request timeout must be positive'
    );
    expect(() => new JiraConfigBuilder().withRequestTimeout(Number.NaN)).toThrow(ConfigurationError);
  });

  it('should collect default headers and a custom user agent', () => {
    const config = new JiraConfigBuilder()
      .withSiteUrl('https://example.atlassian.net')
      .withBearerToken('test-secret')
      .withUserAgent('jira-tests/0.1')
      .withDefaultHeader('X-Trace', 'trace-1')
      .withRequestTimeout(5000)
      .build();

    expect(config.userAgent).toBe('jira-tests/0.1');
    expect(config.defaultHeaders).toEqual({ 'X-Trace': 'trace-1' });
    expect(config.requestTimeoutMs).toBe(5000);
  });

  describe('fromEnv', () => {
    it('should prefer basic auth over a bearer token', () => {
      const config = JiraConfigBuilder.fromEnv({
        JIRA_SITE_URL: 'https://example.atlassian.net/',
        JIRA_AUTH_EMAIL: 'user@example.com',
        JIRA_API_TOKEN: 'test-token',
        JIRA_BEARER_TOKEN: 'test-secret',
        JIRA_USER_AGENT: 'jira-tests/0.1',
        JIRA_TIMEOUT_SECONDS: '30',
      }).build();

      expect(config.siteUrl).toBe('https://example.atlassian.net');
      expect(config.auth).toEqual({ type: 'basic', email: 'user@example.com', token: 'test-token' });
      expect(config.userAgent).toBe('jira-tests/0.1');
      expect(config.requestTimeoutMs).toBe(30000);
    });

    it('should fall back to a bearer token', () => {
      const config = JiraConfigBuilder.fromEnv({
        JIRA_SITE_URL: 'https://example.atlassian.net',
        JIRA_BEARER_TOKEN: 'test-secret',
      }).build();

      expect(config.auth).toEqual({ type: 'bearer', token: 'test-secret' });
      expect(config.requestTimeoutMs).toBeUndefined();
    });

    it('should keep fractional timeout seconds', () => {
      const config = JiraConfigBuilder.fromEnv({
        JIRA_SITE_URL: 'https://example.atlassian.net',
        JIRA_BEARER_TOKEN: 'test-secret',
        JIRA_TIMEOUT_SECONDS: '0.5',
      }).build();

      expect(config.requestTimeoutMs).toBe(500);
    });

    it('should reject a timeout that is not a number', () => {
      expect(() =>
        JiraConfigBuilder.fromEnv({
          JIRA_SITE_URL: 'https://example.atlassian.net',
          JIRA_BEARER_TOKEN: 'test-secret',
          JIRA_TIMEOUT_SECONDS: 'soon',
        })
      ).toThrow('Configuration error: Request timeout must be positive');
    });

    it('should fail without a site URL', () => {
      expect(() => JiraConfigBuilder.fromEnv({ JIRA_BEARER_TOKEN: 'test-secret' }).build()).toThrow(
        ConfigurationError
      );
    });
  });
});

describe('createJiraClientFromEnv', () => {
  it('should fail when the environment has no credentials', () => {
    const saved = { ...process.env };
    try {
      process.env.JIRA_SITE_URL = 'https://example.atlassian.net';
      delete process.env.JIRA_AUTH_EMAIL;
      delete process.env.JIRA_API_TOKEN;
      delete process.env.JIRA_BEARER_TOKEN;
      delete process.env.JIRA_USER_AGENT;
      delete process.env.JIRA_TIMEOUT_SECONDS;

      expect(() => createJiraClientFromEnv()).toThrow(NoAuthenticationError);
    } finally {
      process.env = saved;
    }
  });
});

describe('SecretString', () => {
  it('should redact the value when printed or serialized', () => {
    const secret = new SecretString('test-secret');

    expect(String(secret)).toBe('[REDACTED]');
    expect(JSON.stringify({ token: secret })).toBe('{"token":"[REDACTED]"}');
    expect(secret.expose()).toBe('test-secret');
  });
});
