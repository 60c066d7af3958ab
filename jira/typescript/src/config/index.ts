/**
 * Jira client configuration and builder.
 */

import { z } from 'zod';
import { ConfigurationError, NoAuthenticationError } from '../errors/index.js';

// ============================================================================
// Authentication Types
// ============================================================================

/**
 * Authentication method types.
 */
export type AuthMethod =
  | { type: 'basic'; email: string; token: string }
  | { type: 'bearer'; token: string };

// ============================================================================
// Main Configuration Interface
// ============================================================================

/**
 * Jira client configuration. Read-only once built; credential and user agent
 * changes go through the client's `credentials` handle.
 */
export interface JiraConfig {
  /** Jira site URL (e.g., "https://your-domain.atlassian.net"), no trailing slash */
  readonly siteUrl: string;
  /** Authentication method */
  readonly auth: AuthMethod;
  /** User agent string */
  readonly userAgent: string;
  /** Request timeout in milliseconds. Unset means the transport default (none). */
  readonly requestTimeoutMs?: number;
  /** Headers merged into every request */
  readonly defaultHeaders: Readonly<Record<string, string>>;
}

/**
 * Default user agent.
 */
export const DEFAULT_USER_AGENT = 'jira-cloud-client/1.0.0';

const siteUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'Site URL must use HTTP or HTTPS protocol');

// ============================================================================
// SecretString
// ============================================================================

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Configuration Builder
// ============================================================================

/**
 * Builder for Jira client configuration.
 */
export class JiraConfigBuilder {
  private siteUrl?: string;
  private auth?: AuthMethod;
  private userAgent: string = DEFAULT_USER_AGENT;
  private requestTimeoutMs?: number;
  private defaultHeaders: Record<string, string> = {};

  /**
   * Sets the Jira site URL.
   * @param url - The site URL (e.g., "https://your-domain.atlassian.net")
   */
  withSiteUrl(url: string): this {
    if (!url || url.trim().length === 0) {
      throw new ConfigurationError('Site URL cannot be empty');
    }
    const parsed = siteUrlSchema.safeParse(url.trim());
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid site URL: ${url}`);
    }
    this.siteUrl = parsed.data.replace(/\/+$/, '');
    return this;
  }

  /**
   * Sets HTTP Basic authentication with an account email and API token.
   */
  withBasicAuth(email: string, token: string): this {
    if (!email || email.trim().length === 0) {
      throw new ConfigurationError('Email cannot be empty for basic auth');
    }
    if (!token || token.trim().length === 0) {
      throw new ConfigurationError('API token cannot be empty');
    }
    this.auth = { type: 'basic', email: email.trim(), token: token.trim() };
    return this;
  }

  /**
   * Sets bearer token authentication (personal access or OAuth access token).
   */
  withBearerToken(token: string): this {
    if (!token || token.trim().length === 0) {
      throw new ConfigurationError('Bearer token cannot be empty');
    }
    this.auth = { type: 'bearer', token: token.trim() };
    return this;
  }

  withUserAgent(userAgent: string): this {
    if (!userAgent || userAgent.trim().length === 0) {
      throw new ConfigurationError('User agent cannot be empty');
    }
    this.userAgent = userAgent;
    return this;
  }

  /**
   * @param timeoutMs - Timeout in milliseconds
   */
  withRequestTimeout(timeoutMs: number): this {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError('Request timeout must be positive');
    }
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  /**
   * Adds a header sent with every request.
   */
  withDefaultHeader(name: string, value: string): this {
    if (!name || name.trim().length === 0) {
      throw new ConfigurationError('Header name cannot be empty');
    }
    this.defaultHeaders = { ...this.defaultHeaders, [name]: value };
    return this;
  }

  /**
   * Creates a builder from environment variables.
   *
   * - JIRA_SITE_URL: Site URL (required)
   * - JIRA_AUTH_EMAIL / JIRA_API_TOKEN: basic auth pair
   * - JIRA_BEARER_TOKEN: bearer token, used when no basic auth pair is set
   * - JIRA_USER_AGENT: User agent override
   * - JIRA_TIMEOUT_SECONDS: Request timeout in seconds
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): JiraConfigBuilder {
    const builder = new JiraConfigBuilder();

    if (env.JIRA_SITE_URL) {
      builder.withSiteUrl(env.JIRA_SITE_URL);
    }

    if (env.JIRA_AUTH_EMAIL && env.JIRA_API_TOKEN) {
      builder.withBasicAuth(env.JIRA_AUTH_EMAIL, env.JIRA_API_TOKEN);
    } else if (env.JIRA_BEARER_TOKEN) {
      builder.withBearerToken(env.JIRA_BEARER_TOKEN);
    }

    if (env.JIRA_USER_AGENT) {
      builder.withUserAgent(env.JIRA_USER_AGENT);
    }

    const timeout = env.JIRA_TIMEOUT_SECONDS;
    if (timeout) {
      builder.withRequestTimeout(Number(timeout) * 1000);
    }

    return builder;
  }

  /**
   * Builds the Jira configuration.
   * @throws ConfigurationError if the site URL is missing
   * @throws NoAuthenticationError if no credentials were set
   */
  build(): JiraConfig {
    if (!this.siteUrl) {
      throw new ConfigurationError('Site URL is required');
    }
    if (!this.auth) {
      throw new NoAuthenticationError();
    }

    return {
      siteUrl: this.siteUrl,
      auth: { ...this.auth },
      userAgent: this.userAgent,
      requestTimeoutMs: this.requestTimeoutMs,
      defaultHeaders: { ...this.defaultHeaders },
    };
  }
}
