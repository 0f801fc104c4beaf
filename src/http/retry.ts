export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Total attempts, at least 1. */
  maxAttempts?: number;
  initialBackoffMs?: number;
  retryStatuses?: readonly number[];
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  log?: (message: string) => void;
}

export const DEFAULT_RETRY_STATUSES: readonly number[] = [429, 502, 503, 504];

// Retry-After in seconds; HTTP-date values are not honored
function parseRetryAfter(response: Response): number | undefined {
  const value = response.headers.get('retry-after');
  if (!value) return undefined;
  const seconds = Number.parseFloat(value);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

/**
 * One fetch bounded by a timeout. Vendor calls that are not safe to repeat
 * go through this.
 */
export async function fetchWithTimeout(url: string, init: RequestInit = {}, timeoutMs = 10_000): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * fetch with a per-attempt timeout, retrying network failures and retryable
 * statuses with doubling backoff. The last response is returned as-is once
 * attempts run out.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  options: RetryOptions = {}
): Promise<Response> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const retryStatuses = options.retryStatuses ?? DEFAULT_RETRY_STATUSES;
  const timeoutMs = options.timeoutMs ?? 10_000;
  const wait = options.sleep ?? sleep;
  let backoff = options.initialBackoffMs ?? 500;

  for (let attempt = 1; ; attempt++) {
    let response: Response;
    try {
      response = await fetchWithTimeout(url, init, timeoutMs);
    } catch (err) {
      if (attempt >= maxAttempts) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      options.log?.(`Request error (${reason}), retrying in ${backoff}ms (attempt ${attempt}/${maxAttempts})`);
      await wait(backoff);
      backoff *= 2;
      continue;
    }

    if (!retryStatuses.includes(response.status) || attempt >= maxAttempts) {
      return response;
    }

    // Release the connection held by the discarded response
    await response.body?.cancel();
    backoff = parseRetryAfter(response) ?? backoff;
    options.log?.(`Response ${response.status} from ${url}, retrying in ${backoff}ms (attempt ${attempt}/${maxAttempts})`);
    await wait(backoff);
    backoff *= 2;
  }
}
