import { z } from 'zod';
import { defineEvent } from '../../sdk/types.js';
import { asRecord, asString, isRecord, splitCsv } from '../../sdk/values.js';
import { EventIgnoredError, TriggerDispatchError } from '../../../errors/index.js';
import type { EventDefinition, Variables } from '../../../types/index.js';
import { NotionAPIError, NotionClient, type NotionObject } from './client.js';
import { SUPPORTED_EVENT_TYPES } from './event-types.js';

const eventParameters = z
  .object({
    workspace_filter: z.string().optional(),
  })
  .passthrough();

export type ClientFactory = (token: string) => NotionClient;

let clientFactory: ClientFactory = (token) => new NotionClient(token);

/** Swap the hydration client, e.g. for tests that need a fake sleep. */
export function setNotionClientFactory(factory: ClientFactory | undefined): void {
  clientFactory = factory ?? ((token) => new NotionClient(token));
}

async function fetchEntity(client: NotionClient, payload: Record<string, unknown>): Promise<NotionObject | null> {
  const entity = asRecord(payload.entity);
  const id = asString(entity.id);
  if (!id) return null;

  switch (entity.type) {
    case 'page':
      return client.fetchPage(id);
    case 'database':
      return client.fetchDatabase(id);
    case 'data_source':
      return client.fetchDataSource(id);
    case 'block':
      return client.fetchBlock(id);
    case 'comment': {
      const data = asRecord(payload.data);
      return client.fetchComment(id, {
        blockId: asString(data.page_id) ?? asString(asRecord(data.parent).id),
        discussionId: asString(data.discussion_id),
      });
    }
    default:
      return null;
  }
}

async function fetchUpdatedBlocks(client: NotionClient, payload: Record<string, unknown>): Promise<NotionObject[]> {
  const blocks = asRecord(payload.data).updated_blocks;
  if (!Array.isArray(blocks)) return [];

  const details: NotionObject[] = [];
  for (const block of blocks) {
    const id = isRecord(block) ? asString(block.id) : undefined;
    if (!id) continue;
    const detail = await client.fetchBlock(id);
    if (detail) details.push(detail);
  }
  return details;
}

/**
 * Add `entity_detail` (and `updated_blocks_detail` for content updates) to the
 * event variables. API failures are reported in `hydration_error`.
 */
export async function hydrate(
  eventType: string,
  payload: Record<string, unknown>,
  token: string,
  log: (message: string) => void
): Promise<Variables> {
  const variables: Variables = {};
  try {
    const client = clientFactory(token);
    variables.entity_detail = await fetchEntity(client, payload);
    if (eventType === 'page.content_updated') {
      const details = await fetchUpdatedBlocks(client, payload);
      if (details.length > 0) variables.updated_blocks_detail = details;
    }
  } catch (err) {
    if (!(err instanceof NotionAPIError)) throw err;
    log(`[notion] Hydration failed for ${eventType}: ${err.message}`);
    variables.hydration_error = err.message;
  }
  return variables;
}

function createNotionEvent(eventType: string): EventDefinition {
  return defineEvent({
    name: eventType.replace(/\./g, '_'),
    description: `Notion ${eventType.replace(/[._]/g, ' ')} webhook`,
    schema: eventParameters,

    async onEvent({ payload, parameters, subscription, log }) {
      if (!payload || Object.keys(payload).length === 0) {
        throw new TriggerDispatchError('No payload received');
      }

      if (payload.type !== eventType) {
        throw new EventIgnoredError();
      }

      const allowedWorkspaces = splitCsv(parameters.workspace_filter);
      if (allowedWorkspaces.length > 0) {
        const workspaceId = asString(payload.workspace_id);
        if (!workspaceId || !allowedWorkspaces.includes(workspaceId)) {
          throw new EventIgnoredError(`Workspace ${workspaceId ?? '(none)'} is filtered out`);
        }
      }

      const variables: Variables = { ...payload };
      const token = subscription.credentials.integration_token;
      if (token && !eventType.endsWith('.deleted')) {
        Object.assign(variables, await hydrate(eventType, payload, token, log));
      }
      return variables;
    },
  });
}

export const notionEvents: EventDefinition[] = SUPPORTED_EVENT_TYPES.map(createNotionEvent);
