import { isRecord } from '../plugins/sdk/values.js';

export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Read a response body as a JSON object. Empty, non-JSON and non-object
 * bodies read as `{}`.
 */
export async function readJsonObject(response: Response): Promise<Record<string, unknown>> {
  const parsed = tryParseJson(await response.text());
  return isRecord(parsed) ? parsed : {};
}

/**
 * Pull a human readable message out of a vendor error body, trying
 * `error.message`, `error` as a string, then `message`.
 */
export function vendorErrorMessage(body: Record<string, unknown>, fallback: string): string {
  const error = body.error;
  if (isRecord(error) && typeof error.message === 'string') return error.message;
  if (typeof error === 'string' && error) return error;
  if (typeof body.message === 'string' && body.message) return body.message;
  return fallback;
}
