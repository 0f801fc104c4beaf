import { TriggerDispatchError } from '../../errors/index.js';
import type { WebhookRequest, WebhookResponse } from '../../types/index.js';
import { isRecord } from './values.js';

export function jsonResponse(body: unknown, status = 200): WebhookResponse {
  return {
    status,
    body: typeof body === 'string' ? body : JSON.stringify(body),
    contentType: 'application/json',
  };
}

export function textResponse(body: string, status = 200, contentType = 'text/plain'): WebhookResponse {
  return { status, body, contentType };
}

export function parseJsonBody(request: WebhookRequest): unknown {
  try {
    return JSON.parse(request.rawBody);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new TriggerDispatchError(`Failed to parse JSON payload: ${message}`);
  }
}

/**
 * Parse the body as a non-empty JSON object.
 */
export function parseJsonObject(request: WebhookRequest): Record<string, unknown> {
  const payload = parseJsonBody(request);
  if (!isRecord(payload)) {
    throw new TriggerDispatchError('Payload must be a JSON object');
  }
  if (Object.keys(payload).length === 0) {
    throw new TriggerDispatchError('Empty payload');
  }
  return payload;
}

export function parseFormBody(request: WebhookRequest): Record<string, string> {
  const params = new URLSearchParams(request.rawBody);
  const form: Record<string, string> = {};
  for (const [key, value] of params) {
    form[key] = value;
  }
  return form;
}

export function header(request: WebhookRequest, name: string): string | undefined {
  return request.headers[name.toLowerCase()];
}
