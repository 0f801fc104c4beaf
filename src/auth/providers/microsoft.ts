import { OAuthError } from '../../errors/index.js';
import type { OAuthProviderDefinition } from '../../types/index.js';
import { buildAuthorizationUrl, exchangeToken } from '../oauth.js';

export const MICROSOFT_SCOPES = ['offline_access', 'User.Read', 'Files.Read.All', 'Sites.Read.All'];

function endpoint(tenant: string | undefined, path: 'authorize' | 'token'): string {
  return `https://login.microsoftonline.com/${tenant ?? 'common'}/oauth2/v2.0/${path}`;
}

function callbackError(query: Record<string, string>): string | undefined {
  if (!query.error) return undefined;
  return query.error_description ? `${query.error}: ${query.error_description}` : query.error;
}

export const microsoftOAuthProvider: OAuthProviderDefinition = {
  name: 'microsoft',

  authorizationUrl({ redirectUri, client, state }) {
    return buildAuthorizationUrl(endpoint(client.tenant, 'authorize'), {
      client_id: client.clientId,
      response_type: 'code',
      redirect_uri: redirectUri,
      scope: MICROSOFT_SCOPES.join(' '),
      response_mode: 'query',
      state,
    });
  },

  async exchangeCode({ redirectUri, client, query }) {
    const error = callbackError(query);
    if (error) {
      throw new OAuthError(`Microsoft OAuth authorization failed: ${error}`);
    }
    if (!query.code) {
      throw new OAuthError('No code provided');
    }
    if (!client.clientSecret) {
      throw new OAuthError('Microsoft OAuth client configuration is incomplete.');
    }

    return exchangeToken(
      endpoint(client.tenant, 'token'),
      {
        client_id: client.clientId,
        client_secret: client.clientSecret,
        grant_type: 'authorization_code',
        redirect_uri: redirectUri,
        code: query.code,
        scope: MICROSOFT_SCOPES.join(' '),
      },
      { provider: 'Microsoft' }
    );
  },

  async refresh({ client, credentials }) {
    if (!credentials.refreshToken || !client.clientSecret) {
      throw new OAuthError('Missing required credentials for token refresh');
    }

    const refreshed = await exchangeToken(
      endpoint(client.tenant, 'token'),
      {
        client_id: client.clientId,
        client_secret: client.clientSecret,
        grant_type: 'refresh_token',
        refresh_token: credentials.refreshToken,
        scope: MICROSOFT_SCOPES.join(' '),
      },
      { provider: 'Microsoft' }
    );
    // Microsoft may rotate the refresh token
    return { ...refreshed, refreshToken: refreshed.refreshToken ?? credentials.refreshToken };
  },
};
