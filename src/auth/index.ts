export {
  generatePKCE,
  buildAuthorizationUrl,
  exchangeToken,
  isTokenExpired,
  getValidCredentials,
  validateState,
  PendingOAuthStore,
  type PKCEChallenge,
  type PendingOAuthState,
  type TokenRequestOptions,
} from './oauth.js';
export { microsoftOAuthProvider, MICROSOFT_SCOPES } from './providers/microsoft.js';
export { airtableOAuthProvider, AIRTABLE_SCOPES } from './providers/airtable.js';
export { zendeskOAuthProvider } from './providers/zendesk.js';
