import { OAuthError } from '../../errors/index.js';
import { basicAuth } from '../../http/index.js';
import type { OAuthClientConfig, OAuthProviderDefinition } from '../../types/index.js';
import { buildAuthorizationUrl, exchangeToken } from '../oauth.js';

const AUTHORIZE_URL = 'https://airtable.com/oauth2/v1/authorize';
const TOKEN_URL = 'https://airtable.com/oauth2/v1/token';

export const AIRTABLE_SCOPES = ['data.records:read', 'schema.bases:read', 'webhook:manage'];

// Confidential clients authenticate with basic auth; public ones send client_id in the form.
function clientAuth(client: OAuthClientConfig): { headers: Record<string, string>; form: Record<string, string> } {
  if (client.clientSecret) {
    return { headers: { Authorization: basicAuth(client.clientId, client.clientSecret) }, form: {} };
  }
  return { headers: {}, form: { client_id: client.clientId } };
}

export const airtableOAuthProvider: OAuthProviderDefinition = {
  name: 'airtable',
  usesPkce: true,

  authorizationUrl({ redirectUri, client, state, codeChallenge }) {
    if (!codeChallenge) {
      throw new OAuthError('Airtable OAuth requires a PKCE code challenge.');
    }
    return buildAuthorizationUrl(AUTHORIZE_URL, {
      client_id: client.clientId,
      redirect_uri: redirectUri,
      response_type: 'code',
      scope: AIRTABLE_SCOPES.join(' '),
      state,
      code_challenge: codeChallenge,
      code_challenge_method: 'S256',
    });
  },

  async exchangeCode({ redirectUri, client, query, codeVerifier }) {
    if (query.error) {
      throw new OAuthError(`Airtable OAuth authorization failed: ${query.error_description ?? query.error}`);
    }
    if (!query.code) {
      throw new OAuthError('Airtable OAuth callback missing authorization code.');
    }
    if (!codeVerifier) {
      throw new OAuthError('Airtable OAuth callback has no matching code verifier.');
    }

    const auth = clientAuth(client);
    return exchangeToken(
      TOKEN_URL,
      {
        grant_type: 'authorization_code',
        code: query.code,
        redirect_uri: redirectUri,
        code_verifier: codeVerifier,
        ...auth.form,
      },
      { provider: 'Airtable', headers: auth.headers }
    );
  },

  async refresh({ client, credentials }) {
    if (!credentials.refreshToken) {
      throw new OAuthError('Airtable OAuth refresh token is missing; please re-authorize.');
    }

    const auth = clientAuth(client);
    return exchangeToken(
      TOKEN_URL,
      { grant_type: 'refresh_token', refresh_token: credentials.refreshToken, ...auth.form },
      { provider: 'Airtable', headers: auth.headers }
    );
  },
};
