import type { WebhookRequest } from '../types/index.js';

export function mockJson(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export function mockText(body: string, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

export function mockEmpty(status = 204): Response {
  return new Response(null, { status });
}

export function webhookRequest(overrides: Partial<WebhookRequest> = {}): WebhookRequest {
  return {
    method: 'POST',
    url: 'https://hooks.test/webhook/sub-1',
    headers: {},
    query: {},
    rawBody: '',
    ...overrides,
  };
}

export class MemoryStorage {
  readonly values = new Map<string, string>();

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  delete(key: string): void {
    this.values.delete(key);
  }
}

/** Response body parsed for field-level assertions. */
export async function responseBody(response: Response) {
  return JSON.parse(await response.text());
}
