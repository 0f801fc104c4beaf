import { readJsonObject, tryParseJson } from '../../../http/index.js';
import { errorMessage } from '../../../errors/index.js';
import { asString, isRecord } from '../../sdk/values.js';

export const WECOM_API = 'https://qyapi.weixin.qq.com/cgi-bin';
export const REQUEST_TIMEOUT_MS = 10_000;
export const MAX_TEXT_LENGTH = 2048;

export interface WeComApp {
  corpId: string;
  agentSecret: string;
  agentId: string;
}

interface CachedToken {
  token: string;
  expiresAt: number;
}

export interface AccessTokenCacheOptions {
  now?: () => number;
  log?: (message: string) => void;
}

/**
 * Access tokens keyed by `corpId:secret`, kept until a minute before
 * WeCom says they expire.
 */
export class AccessTokenCache {
  private entries = new Map<string, CachedToken>();
  private now: () => number;
  private log: (message: string) => void;

  constructor(options: AccessTokenCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.log = options.log ?? console.log;
  }

  async get(corpId: string, secret: string): Promise<string | null> {
    const key = `${corpId}:${secret}`;
    const cached = this.entries.get(key);
    if (cached && cached.expiresAt > this.now()) {
      return cached.token;
    }

    const url = new URL(`${WECOM_API}/gettoken`);
    url.searchParams.set('corpid', corpId);
    url.searchParams.set('corpsecret', secret);

    let body: Record<string, unknown>;
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
      body = await readJsonObject(response);
    } catch (err) {
      this.log(`[wecom] Failed to fetch access token: ${errorMessage(err)}`);
      return null;
    }

    if (body.errcode !== 0) {
      this.log(`[wecom] gettoken rejected: ${asString(body.errmsg) ?? JSON.stringify(body)}`);
      return null;
    }

    const token = asString(body.access_token);
    if (!token) return null;

    const expiresIn = typeof body.expires_in === 'number' ? body.expires_in : 7200;
    this.entries.set(key, { token, expiresAt: this.now() + (expiresIn - 60) * 1000 });
    return token;
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Send an app text message. Returns an error description, or undefined on success.
 */
export async function sendAppText(
  cache: AccessTokenCache,
  app: Partial<WeComApp>,
  userId: string,
  content: string
): Promise<string | undefined> {
  const { corpId, agentSecret, agentId } = app;
  if (!corpId || !agentSecret || !agentId) {
    return 'missing corp/app credentials';
  }

  const accessToken = await cache.get(corpId, agentSecret);
  if (!accessToken) {
    return 'unable to obtain access token';
  }

  const url = new URL(`${WECOM_API}/message/send`);
  url.searchParams.set('access_token', accessToken);

  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      touser: userId,
      msgtype: 'text',
      agentid: agentId,
      text: { content: Array.from(content).slice(0, MAX_TEXT_LENGTH).join('') },
      safe: 0,
    }),
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });

  const text = await response.text();
  const body = tryParseJson(text);
  if (!isRecord(body) || body.errcode !== 0) {
    return `send_failed:${text}`;
  }
  return undefined;
}
