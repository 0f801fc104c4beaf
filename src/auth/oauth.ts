import { randomBytes, createHash } from 'node:crypto';
import { OAuthError, errorMessage } from '../errors/index.js';
import { tryParseJson } from '../http/index.js';
import { isRecord } from '../plugins/sdk/values.js';
import type { OAuthCredentials } from '../types/index.js';

export interface PKCEChallenge {
  codeVerifier: string;
  codeChallenge: string;
  state: string;
}

/**
 * Generate a cryptographically secure random string for PKCE
 */
function generateRandomString(length: number): string {
  return randomBytes(length).toString('base64url').slice(0, length);
}

export function sha256Base64Url(input: string): string {
  return createHash('sha256').update(input).digest('base64url');
}

/**
 * Generate PKCE code verifier, S256 challenge and a CSRF state
 */
export function generatePKCE(): PKCEChallenge {
  // 43-128 characters from the unreserved set
  const codeVerifier = generateRandomString(64);
  return {
    codeVerifier,
    codeChallenge: sha256Base64Url(codeVerifier),
    state: generateRandomString(32),
  };
}

export function buildAuthorizationUrl(baseUrl: string, params: Record<string, string | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, value);
  }
  return `${baseUrl}?${search.toString()}`;
}

export interface TokenRequestOptions {
  /** Vendor name used in error messages. */
  provider: string;
  encoding?: 'form' | 'json';
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * POST to a token endpoint and normalize the answer into OAuthCredentials.
 */
export async function exchangeToken(
  url: string,
  params: Record<string, string>,
  options: TokenRequestOptions
): Promise<OAuthCredentials> {
  const json = options.encoding === 'json';
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': json ? 'application/json' : 'application/x-www-form-urlencoded',
        ...options.headers,
      },
      body: json ? JSON.stringify(params) : new URLSearchParams(params).toString(),
      signal: AbortSignal.timeout(options.timeoutMs ?? 15_000),
    });
  } catch (err) {
    throw new OAuthError(`Failed to reach ${options.provider} OAuth token endpoint: ${errorMessage(err)}`);
  }

  const text = await response.text();
  const data = tryParseJson(text);
  if (!isRecord(data)) {
    throw new OAuthError(`Invalid response from ${options.provider} OAuth token endpoint: ${text}`);
  }

  if (response.status >= 400) {
    const description = data.error_description ?? data.error;
    const detail = typeof description === 'string' && description ? description : text;
    throw new OAuthError(`${options.provider} OAuth token request failed: ${detail}`);
  }

  if (typeof data.access_token !== 'string' || !data.access_token) {
    throw new OAuthError(`${options.provider} OAuth token response missing access_token.`);
  }

  const expiresIn = Number(data.expires_in);
  return {
    accessToken: data.access_token,
    refreshToken: typeof data.refresh_token === 'string' ? data.refresh_token : undefined,
    expiresAt: Number.isFinite(expiresIn) && expiresIn > 0 ? Date.now() + expiresIn * 1000 : undefined,
    raw: data,
  };
}

/**
 * Check if credentials are expired or about to expire (within 5 minutes)
 */
export function isTokenExpired(credentials: OAuthCredentials, now = Date.now()): boolean {
  if (!credentials.expiresAt) {
    // no expiry means the token does not expire
    return false;
  }
  const bufferMs = 5 * 60 * 1000;
  return now >= credentials.expiresAt - bufferMs;
}

/**
 * Get valid credentials, refreshing if necessary. A refresh that returns no
 * new refresh token keeps the old one.
 */
export async function getValidCredentials(
  credentials: OAuthCredentials,
  refresh: (credentials: OAuthCredentials) => Promise<OAuthCredentials>
): Promise<OAuthCredentials> {
  if (!isTokenExpired(credentials)) {
    return credentials;
  }
  if (!credentials.refreshToken) {
    throw new OAuthError('Access token expired and no refresh token available');
  }

  const refreshed = await refresh(credentials);
  return { ...refreshed, refreshToken: refreshed.refreshToken ?? credentials.refreshToken };
}

/**
 * Validate that an OAuth state matches the expected value
 */
export function validateState(received: string, expected: string): boolean {
  if (!received || !expected) {
    return false;
  }
  if (received.length !== expected.length) {
    return false;
  }
  let result = 0;
  for (let i = 0; i < received.length; i++) {
    result |= received.charCodeAt(i) ^ expected.charCodeAt(i);
  }
  return result === 0;
}

export interface PendingOAuthState {
  provider: string;
  redirectUri: string;
  codeVerifier?: string;
  createdAt: number;
}

/**
 * In-memory store of authorize requests awaiting their callback, keyed by state.
 */
export class PendingOAuthStore {
  private pending = new Map<string, PendingOAuthState>();

  constructor(
    private ttlMs = 10 * 60 * 1000,
    private now: () => number = Date.now
  ) {}

  create(provider: string, redirectUri: string, usesPkce = false): { state: string; codeChallenge?: string } {
    this.prune();
    const pkce = generatePKCE();
    this.pending.set(pkce.state, {
      provider,
      redirectUri,
      codeVerifier: usesPkce ? pkce.codeVerifier : undefined,
      createdAt: this.now(),
    });
    return { state: pkce.state, codeChallenge: usesPkce ? pkce.codeChallenge : undefined };
  }

  /** Returns and forgets the pending entry; expired or unknown states give undefined. */
  consume(state: string): PendingOAuthState | undefined {
    for (const [key, entry] of this.pending) {
      if (validateState(state, key)) {
        this.pending.delete(key);
        return this.now() - entry.createdAt <= this.ttlMs ? entry : undefined;
      }
    }
    return undefined;
  }

  get size(): number {
    return this.pending.size;
  }

  private prune(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [key, entry] of this.pending) {
      if (entry.createdAt < cutoff) this.pending.delete(key);
    }
  }
}
