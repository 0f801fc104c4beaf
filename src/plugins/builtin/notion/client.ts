import { fetchWithRetry, tryParseJson } from '../../../http/index.js';
import { errorMessage } from '../../../errors/index.js';
import { isRecord } from '../../sdk/values.js';

export class NotionAPIError extends Error {
  constructor(message: string, public cause?: Error) {
    super(message);
    this.name = 'NotionAPIError';
  }
}

export type NotionObject = Record<string, unknown>;

export interface NotionClientOptions {
  apiVersion?: string;
  timeoutMs?: number;
  maxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
  log?: (message: string) => void;
}

/**
 * Read-only Notion REST client used to hydrate webhook payloads.
 */
export class NotionClient {
  static readonly BASE_URL = 'https://api.notion.com/v1';
  static readonly DEFAULT_VERSION = '2025-09-03';

  private headers: Record<string, string>;
  private timeoutMs: number;
  private maxRetries: number;

  constructor(
    token: string,
    private options: NotionClientOptions = {}
  ) {
    if (!token) {
      throw new Error('integration_token is required');
    }
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.headers = {
      Authorization: `Bearer ${token}`,
      'Notion-Version': options.apiVersion ?? NotionClient.DEFAULT_VERSION,
      'Content-Type': 'application/json',
    };
  }

  fetchPage(pageId: string): Promise<NotionObject | null> {
    return this.get(`/pages/${pageId}`);
  }

  fetchDatabase(databaseId: string): Promise<NotionObject | null> {
    return this.get(`/databases/${databaseId}`);
  }

  fetchDataSource(dataSourceId: string): Promise<NotionObject | null> {
    return this.get(`/data_sources/${dataSourceId}`);
  }

  fetchBlock(blockId: string): Promise<NotionObject | null> {
    return this.get(`/blocks/${blockId}`);
  }

  fetchBlockChildren(blockId: string, options: { pageSize?: number } = {}): Promise<NotionObject | null> {
    const params = options.pageSize ? { page_size: String(options.pageSize) } : undefined;
    return this.get(`/blocks/${blockId}/children`, params);
  }

  /**
   * Direct lookup first; when that 404s, search the comments listed under the
   * block and then the discussion.
   */
  async fetchComment(
    commentId: string,
    options: { blockId?: string; discussionId?: string } = {}
  ): Promise<NotionObject | null> {
    const direct = await this.get(`/comments/${commentId}`);
    if (direct) return direct;

    const searches: Array<Record<string, string>> = [];
    if (options.blockId) searches.push({ block_id: options.blockId });
    if (options.discussionId) searches.push({ discussion_id: options.discussionId });

    for (const params of searches) {
      const listing = await this.get('/comments', params);
      const results = listing?.results;
      if (!Array.isArray(results)) continue;
      for (const item of results) {
        if (isRecord(item) && item.id === commentId) {
          return item;
        }
      }
    }

    return null;
  }

  private async get(path: string, params?: Record<string, string>): Promise<NotionObject | null> {
    const url = `${NotionClient.BASE_URL}${path}`;
    const target = params ? `${url}?${new URLSearchParams(params).toString()}` : url;

    let response: Response;
    try {
      response = await fetchWithRetry(
        target,
        { method: 'GET', headers: this.headers },
        {
          maxAttempts: this.maxRetries,
          timeoutMs: this.timeoutMs,
          sleep: this.options.sleep,
          log: this.options.log,
        }
      );
    } catch (err) {
      throw new NotionAPIError(`Request to ${url} failed: ${errorMessage(err)}`, err instanceof Error ? err : undefined);
    }

    if (response.status === 404) return null;

    if (response.ok) {
      if (response.status === 204) return null;
      try {
        const data: unknown = await response.json();
        return isRecord(data) ? data : null;
      } catch (err) {
        throw new NotionAPIError(`Invalid JSON response from ${url}`, err instanceof Error ? err : undefined);
      }
    }

    throw new NotionAPIError(await buildErrorMessage(response));
  }
}

async function buildErrorMessage(response: Response): Promise<string> {
  const text = await response.text();
  const payload = tryParseJson(text);
  let detail = text;
  if (isRecord(payload)) {
    detail = typeof payload.message === 'string' && payload.message ? payload.message : JSON.stringify(payload);
  }
  return `Notion API request failed (${response.status}): ${detail}`;
}
