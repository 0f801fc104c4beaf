export { fetchWithRetry, fetchWithTimeout, sleep, DEFAULT_RETRY_STATUSES, type RetryOptions } from './retry.js';
export { pollUntil, type PollOptions } from './poll.js';

export function basicAuth(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
}
export { tryParseJson, readJsonObject, vendorErrorMessage } from './json.js';
