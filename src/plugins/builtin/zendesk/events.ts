import { z } from 'zod';
import { defineEvent } from '../../sdk/types.js';
import { asRecord, asString, splitCsv } from '../../sdk/values.js';
import { EventIgnoredError, TriggerDispatchError } from '../../../errors/index.js';
import type { EventDefinition, Variables } from '../../../types/index.js';
import { checkTicketFilters, checkTransition, containsAny } from './filters.js';

const csv = z.string().optional();

const ticketParameters = z
  .object({
    status: csv,
    priority: csv,
    type: csv,
    tags: csv,
    subject_contains: csv,
    description_contains: csv,
    assignee: csv,
    group: csv,
    requester: csv,
  })
  .passthrough();

function requirePayload(payload: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!payload || Object.keys(payload).length === 0) {
    throw new TriggerDispatchError('No payload received');
  }
  return payload;
}

function lower(value: unknown): string {
  return typeof value === 'string' ? value.toLowerCase() : '';
}

type TicketHandler = (
  payload: Record<string, unknown>,
  ticket: Record<string, unknown>,
  parameters: Record<string, unknown>
) => Variables;

function ticketEvent(name: string, description: string, schema: z.ZodTypeAny, handle?: TicketHandler): EventDefinition {
  return defineEvent({
    name,
    description,
    schema,
    async onEvent({ payload, parameters }) {
      const body = requirePayload(payload);
      const ticket = asRecord(body.detail);
      checkTicketFilters(ticket, parameters);
      return handle ? handle(body, ticket, parameters) : { ticket };
    },
  });
}

const statusChanged = ticketEvent(
  'ticket_status_changed',
  'A ticket status changed',
  ticketParameters.extend({ from_status: csv, to_status: csv }),
  (payload, ticket, parameters) => {
    const change = asRecord(payload.event);
    const previous = lower(change.previous);
    const current = lower(change.current);
    checkTransition(previous, current, parameters.from_status, parameters.to_status);
    return { ticket, previous, current };
  }
);

const priorityChanged = ticketEvent(
  'ticket_priority_changed',
  'A ticket priority changed',
  ticketParameters.extend({ from_priority: csv, to_priority: csv }),
  (payload, ticket, parameters) => {
    const change = asRecord(payload.event);
    const previous = lower(change.previous);
    const current = lower(change.current);
    checkTransition(previous, current, parameters.from_priority, parameters.to_priority);
    return { ticket, previous, current };
  }
);

const commentCreated = ticketEvent(
  'ticket_comment_created',
  'A comment was added to a ticket',
  ticketParameters.extend({ is_public: z.enum(['any', 'true', 'false']).default('any'), body_contains: csv }),
  (payload, ticket, parameters) => {
    const comment = asRecord(asRecord(payload.event).comment);
    if (parameters.is_public !== 'any' && parameters.is_public !== undefined) {
      const isPublic = comment.is_public !== false;
      if (isPublic !== (parameters.is_public === 'true')) {
        throw new EventIgnoredError('Comment visibility is filtered out');
      }
    }
    if (!containsAny(comment.body, parameters.body_contains)) {
      throw new EventIgnoredError('Comment body does not match');
    }
    return { ticket, comment };
  }
);

const articleParameters = z.object({ locale: csv, title_contains: csv }).passthrough();

function articleEvent(name: string, description: string): EventDefinition {
  return defineEvent({
    name,
    description,
    schema: articleParameters,
    async onEvent({ payload, parameters }) {
      const body = requirePayload(payload);
      const detail = asRecord(body.detail);
      const meta = asRecord(body.event);

      const locales = splitCsv(parameters.locale, { lowercase: true });
      if (locales.length > 0 && !locales.includes(lower(meta.locale))) {
        throw new EventIgnoredError('Article locale is filtered out');
      }
      if (!containsAny(meta.title, parameters.title_contains)) {
        throw new EventIgnoredError('Article title does not match');
      }

      return {
        article: {
          id: detail.id,
          brand_id: detail.brand_id,
          user_id: detail.user_id,
          author_id: meta.author_id,
          category_id: meta.category_id,
          section_id: meta.section_id,
          locale: asString(meta.locale),
          title: asString(meta.title),
        },
      };
    },
  });
}

export const zendeskEvents: EventDefinition[] = [
  ticketEvent('ticket_created', 'A ticket was created', ticketParameters),
  ticketEvent('ticket_marked_as_spam', 'A ticket was marked as spam', ticketParameters),
  statusChanged,
  priorityChanged,
  commentCreated,
  articleEvent('article_published', 'A help center article was published'),
  articleEvent('article_unpublished', 'A help center article was unpublished'),
];
