import { OAuthError } from '../../errors/index.js';
import type { OAuthCredentials, OAuthProviderDefinition } from '../../types/index.js';
import { buildAuthorizationUrl, exchangeToken } from '../oauth.js';

function zendeskUrl(subdomain: string, path: string): string {
  return `https://${subdomain}.zendesk.com${path}`;
}

async function requestToken(subdomain: string, params: Record<string, string>): Promise<OAuthCredentials> {
  const credentials = await exchangeToken(zendeskUrl(subdomain, '/oauth/tokens'), params, {
    provider: 'Zendesk',
    encoding: 'json',
  });
  return { ...credentials, raw: { ...credentials.raw, subdomain } };
}

export const zendeskOAuthProvider: OAuthProviderDefinition = {
  name: 'zendesk',

  authorizationUrl({ redirectUri, client, state }) {
    if (!client.subdomain) {
      throw new OAuthError('Zendesk subdomain is required in the OAuth client configuration.');
    }
    if (!client.clientId) {
      throw new OAuthError('Zendesk OAuth client_id is missing.');
    }

    return buildAuthorizationUrl(zendeskUrl(client.subdomain, '/oauth/authorizations/new'), {
      response_type: 'code',
      client_id: client.clientId,
      redirect_uri: redirectUri,
      state,
      scope: 'read write',
    });
  },

  async exchangeCode({ redirectUri, client, query }) {
    if (query.error) {
      const message = query.error_description ? `${query.error}: ${query.error_description}` : query.error;
      throw new OAuthError(`Zendesk OAuth authorization failed: ${message}`);
    }
    if (!query.code) {
      throw new OAuthError('Zendesk OAuth callback missing authorization code.');
    }
    if (!client.subdomain || !client.clientId || !client.clientSecret) {
      throw new OAuthError('Zendesk OAuth client configuration is incomplete.');
    }

    return requestToken(client.subdomain, {
      grant_type: 'authorization_code',
      code: query.code,
      redirect_uri: redirectUri,
      client_id: client.clientId,
      client_secret: client.clientSecret,
    });
  },

  async refresh({ client, credentials }) {
    if (!credentials.refreshToken) {
      throw new OAuthError('Zendesk OAuth refresh token is missing; please re-authorize.');
    }
    const stored = credentials.raw.subdomain;
    const subdomain = typeof stored === 'string' && stored ? stored : client.subdomain;
    if (!subdomain || !client.clientId || !client.clientSecret) {
      throw new OAuthError('Zendesk OAuth client configuration is incomplete.');
    }

    return requestToken(subdomain, {
      grant_type: 'refresh_token',
      refresh_token: credentials.refreshToken,
      client_id: client.clientId,
      client_secret: client.clientSecret,
    });
  },
};
