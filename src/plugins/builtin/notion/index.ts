import { z } from 'zod';
import { definePlugin, defineAction } from '../../sdk/types.js';
import { invokeErrorFromStatus } from '../../../errors/index.js';
import { jsonMessage, type ActionContext } from '../../../types/index.js';
import { NotionClient } from './client.js';
import { notionWebhookTrigger } from './trigger.js';

function getApiKey(ctx: ActionContext): string {
  const key = ctx.credentials.api_key ?? ctx.env.NOTION_API_KEY;
  if (!key) {
    throw invokeErrorFromStatus(401, 'Notion API key required. Set NOTION_API_KEY or pass the api_key credential.');
  }
  return key;
}

async function notionApi(apiKey: string, method: string, endpoint: string, body?: unknown): Promise<unknown> {
  const response = await fetch(`${NotionClient.BASE_URL}${endpoint}`, {
    method,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
      'Notion-Version': NotionClient.DEFAULT_VERSION,
    },
    body: body ? JSON.stringify(body) : undefined,
  });

  const text = await response.text();
  if (!response.ok) {
    throw invokeErrorFromStatus(response.status, `Notion API error: ${response.status} ${text}`);
  }
  return text ? JSON.parse(text) : {};
}

const searchSchema = z.object({
  query: z.string().default(''),
  filter: z.enum(['page', 'data_source']).optional(),
  page_size: z.number().int().min(1).max(100).default(10),
});

const getPageSchema = z.object({
  page_id: z.string().min(1),
});

export default definePlugin({
  name: 'notion',
  version: '1.0.0',
  description: 'Notion webhooks with payload hydration, plus page search',

  actions: [
    defineAction({
      name: 'search',
      description: 'Search Notion pages and data sources shared with the integration',
      schema: searchSchema,
      async execute(ctx) {
        const apiKey = getApiKey(ctx);
        const { query, filter, page_size } = searchSchema.parse(ctx.config);

        ctx.log(`Searching Notion: ${query}`);

        const body: Record<string, unknown> = { query, page_size };
        if (filter) {
          body.filter = { property: 'object', value: filter };
        }

        return [jsonMessage(await notionApi(apiKey, 'POST', '/search', body))];
      },
    }),

    defineAction({
      name: 'get_page',
      description: 'Get a Notion page by ID',
      schema: getPageSchema,
      async execute(ctx) {
        const apiKey = getApiKey(ctx);
        const { page_id } = getPageSchema.parse(ctx.config);

        return [jsonMessage(await notionApi(apiKey, 'GET', `/pages/${page_id}`))];
      },
    }),
  ],

  triggers: [notionWebhookTrigger],
});
