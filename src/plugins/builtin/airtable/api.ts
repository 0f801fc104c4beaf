import { createHmac, timingSafeEqual } from 'node:crypto';
import { TriggerDispatchError, TriggerValidationError, errorMessage } from '../../../errors/index.js';
import { fetchWithTimeout, readJsonObject, vendorErrorMessage } from '../../../http/index.js';
import { header } from '../../sdk/webhook.js';
import { isRecord } from '../../sdk/values.js';
import type { WebhookRequest } from '../../../types/index.js';

export const AIRTABLE_API = 'https://api.airtable.com/v0';
export const REQUEST_TIMEOUT_MS = 15_000;
export const MAX_PAYLOAD_PAGES = 5;

export function airtableHeaders(accessToken: string): Record<string, string> {
  return {
    Authorization: `Bearer ${accessToken}`,
    'Content-Type': 'application/json',
  };
}

export function computeAirtableMac(rawBody: string, macSecretBase64: string): string {
  const key = Buffer.from(macSecretBase64, 'base64');
  return `hmac-sha256=${createHmac('sha256', key).update(rawBody).digest('hex')}`;
}

export function verifyAirtableMac(request: WebhookRequest, macSecretBase64: string): void {
  const received = header(request, 'x-airtable-content-mac');
  if (!received) {
    throw new TriggerValidationError('Missing X-Airtable-Content-MAC header');
  }

  const expected = Buffer.from(computeAirtableMac(request.rawBody, macSecretBase64));
  const actual = Buffer.from(received);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    throw new TriggerValidationError('Invalid webhook signature');
  }
}

export interface PayloadPage {
  payloads: Record<string, unknown>[];
  cursor: number | undefined;
}

/**
 * Read webhook payloads from the stored cursor on, following `mightHaveMore`
 * for at most MAX_PAYLOAD_PAGES pages.
 */
export async function fetchPayloads(
  accessToken: string,
  baseId: string,
  webhookId: string,
  cursor: number | undefined
): Promise<PayloadPage> {
  const payloads: Record<string, unknown>[] = [];
  let next = cursor;

  for (let page = 0; page < MAX_PAYLOAD_PAGES; page++) {
    const params = new URLSearchParams();
    if (next !== undefined) params.set('cursor', String(next));
    const query = params.toString();
    const url = `${AIRTABLE_API}/bases/${baseId}/webhooks/${webhookId}/payloads${query ? `?${query}` : ''}`;

    let response: Response;
    try {
      response = await fetchWithTimeout(url, { method: 'GET', headers: airtableHeaders(accessToken) }, REQUEST_TIMEOUT_MS);
    } catch (err) {
      throw new TriggerDispatchError(
        `Failed to fetch Airtable payloads: ${errorMessage(err)}`,
        err instanceof Error ? err : undefined
      );
    }
    const body = await readJsonObject(response);
    if (!response.ok) {
      throw new TriggerDispatchError(
        `Failed to fetch Airtable payloads (${response.status}): ${vendorErrorMessage(body, JSON.stringify(body))}`
      );
    }

    if (Array.isArray(body.payloads)) {
      for (const item of body.payloads) {
        if (isRecord(item)) payloads.push(item);
      }
    }
    if (typeof body.cursor === 'number') next = body.cursor;
    if (body.mightHaveMore !== true) break;
  }

  return { payloads, cursor: next };
}
