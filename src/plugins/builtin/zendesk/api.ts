import { createHmac, timingSafeEqual } from 'node:crypto';
import { TriggerValidationError } from '../../../errors/index.js';
import { basicAuth } from '../../../http/index.js';
import { header } from '../../sdk/webhook.js';
import type { WebhookRequest } from '../../../types/index.js';

export const REQUEST_TIMEOUT_MS = 15_000;

export type ZendeskAuth = { subdomain: string; headers: Record<string, string> };

/**
 * Build request headers from either API token credentials or an OAuth access token.
 * Returns a reason string when the credentials are incomplete.
 */
export function zendeskAuth(credentials: Record<string, string>): ZendeskAuth | string {
  const subdomain = credentials.subdomain;
  if (!subdomain) return 'Zendesk subdomain is required.';

  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (credentials.access_token) {
    headers.Authorization = `Bearer ${credentials.access_token}`;
  } else if (credentials.email && credentials.api_token) {
    headers.Authorization = basicAuth(`${credentials.email}/token`, credentials.api_token);
  } else {
    return 'Zendesk API Token and admin email are required.';
  }

  return { subdomain, headers };
}

export function zendeskApiUrl(subdomain: string, path: string): string {
  return `https://${subdomain}.zendesk.com/api/v2${path}`;
}

export function computeZendeskSignature(timestamp: string, rawBody: string, secret: string): string {
  return createHmac('sha256', secret).update(timestamp + rawBody).digest('base64');
}

export function verifyZendeskSignature(request: WebhookRequest, secret: string): void {
  const signature = header(request, 'x-zendesk-webhook-signature');
  const timestamp = header(request, 'x-zendesk-webhook-signature-timestamp');
  if (!signature || !timestamp) {
    throw new TriggerValidationError('Missing Zendesk webhook signature headers');
  }

  const expected = Buffer.from(computeZendeskSignature(timestamp, request.rawBody, secret));
  const received = Buffer.from(signature);
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    throw new TriggerValidationError('Invalid webhook signature');
  }
}
