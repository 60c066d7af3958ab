/**
 * Authentication providers for the Jira client.
 *
 * Supports HTTP Basic (account email + API token) and bearer tokens.
 */

import { AuthMethod, SecretString } from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';

// ============================================================================
// Auth Provider Interface
// ============================================================================

/**
 * Request headers type.
 */
export type Headers = Record<string, string>;

/**
 * Auth provider interface.
 */
export interface AuthProvider {
  /** Get authentication headers for a request */
  getAuthHeaders(): Promise<Headers>;
}

/**
 * HTTP Basic authentication with an account email and API token.
 */
export class BasicAuthProvider implements AuthProvider {
  private readonly email: string;
  private readonly token: SecretString;

  constructor(email: string, token: string) {
    this.email = email;
    this.token = new SecretString(token);
  }

  async getAuthHeaders(): Promise<Headers> {
    const encoded = Buffer.from(`${this.email}:${this.token.expose()}`).toString('base64');
    return { Authorization: `Basic ${encoded}` };
  }
}

/**
 * Bearer token authentication.
 */
export class BearerTokenAuthProvider implements AuthProvider {
  private readonly token: SecretString;

  constructor(token: string) {
    this.token = new SecretString(token);
  }

  async getAuthHeaders(): Promise<Headers> {
    return { Authorization: `Bearer ${this.token.expose()}` };
  }
}

/**
 * Creates an auth provider from an auth method configuration.
 */
export function createAuthProvider(auth: AuthMethod): AuthProvider {
  switch (auth.type) {
    case 'basic':
      return new BasicAuthProvider(auth.email, auth.token);
    case 'bearer':
      return new BearerTokenAuthProvider(auth.token);
  }
}

// ============================================================================
// Credentials Handle
// ============================================================================

/**
 * Credentials and user agent shared by every service of a client.
 *
 * Only the setters write to it, so calls in flight always see a complete
 * provider; a change applies from the next request on.
 */
export class Credentials {
  private provider: AuthProvider;
  private agent: string;

  constructor(auth: AuthMethod, userAgent: string) {
    this.provider = createAuthProvider(auth);
    this.agent = userAgent;
  }

  /**
   * Switches to HTTP Basic authentication.
   */
  setBasicAuth(email: string, token: string): void {
    if (!email || email.trim().length === 0) {
      throw new ConfigurationError('Email cannot be empty for basic auth');
    }
    if (!token || token.trim().length === 0) {
      throw new ConfigurationError('API token cannot be empty');
    }
    this.provider = new BasicAuthProvider(email.trim(), token.trim());
  }

  /**
   * Switches to bearer token authentication.
   */
  setBearerToken(token: string): void {
    if (!token || token.trim().length === 0) {
      throw new ConfigurationError('Bearer token cannot be empty');
    }
    this.provider = new BearerTokenAuthProvider(token.trim());
  }

  setUserAgent(userAgent: string): void {
    if (!userAgent || userAgent.trim().length === 0) {
      throw new ConfigurationError('User agent cannot be empty');
    }
    this.agent = userAgent;
  }

  get userAgent(): string {
    return this.agent;
  }

  getAuthHeaders(): Promise<Headers> {
    return this.provider.getAuthHeaders();
  }
}
