import { randomUUID } from 'node:crypto';
import { defineTrigger } from '../../sdk/types.js';
import { jsonResponse, parseJsonObject } from '../../sdk/webhook.js';
import { asRecord, asString, asStringArray, splitCsv } from '../../sdk/values.js';
import {
  CredentialsValidateFailedError,
  SubscriptionError,
  UnsubscribeError,
  errorMessage,
} from '../../../errors/index.js';
import { readJsonObject, vendorErrorMessage } from '../../../http/index.js';
import { REQUEST_TIMEOUT_MS, verifyZendeskSignature, zendeskApiUrl, zendeskAuth } from './api.js';
import { zendeskEvents } from './events.js';

const TICKET_PREFIX = 'zen:event-type:ticket.';
const ARTICLE_PREFIX = 'zen:event-type:article.';

const TICKET_EVENTS: Record<string, string> = {
  created: 'ticket_created',
  marked_as_spam: 'ticket_marked_as_spam',
  status_changed: 'ticket_status_changed',
  priority_changed: 'ticket_priority_changed',
  comment_added: 'ticket_comment_created',
  comment_created: 'ticket_comment_created',
};

const ARTICLE_EVENTS: Record<string, string> = {
  published: 'article_published',
  unpublished: 'article_unpublished',
};

/** Event name to the Zendesk event type a webhook subscribes to. */
export const EVENT_SUBSCRIPTIONS: Record<string, string> = {
  ticket_created: `${TICKET_PREFIX}created`,
  ticket_marked_as_spam: `${TICKET_PREFIX}marked_as_spam`,
  ticket_status_changed: `${TICKET_PREFIX}status_changed`,
  ticket_priority_changed: `${TICKET_PREFIX}priority_changed`,
  ticket_comment_created: `${TICKET_PREFIX}comment_added`,
  article_published: `${ARTICLE_PREFIX}published`,
  article_unpublished: `${ARTICLE_PREFIX}unpublished`,
};

export function classifyZendeskEvent(type: string): string | undefined {
  if (type.startsWith(TICKET_PREFIX)) return TICKET_EVENTS[type.slice(TICKET_PREFIX.length)];
  if (type.startsWith(ARTICLE_PREFIX)) return ARTICLE_EVENTS[type.slice(ARTICLE_PREFIX.length)];
  return undefined;
}

function parseEvents(value: unknown): string[] {
  const raw = Array.isArray(value) ? asStringArray(value) : splitCsv(value);
  return raw.filter((event) => event in EVENT_SUBSCRIPTIONS);
}

export const zendeskWebhookTrigger = defineTrigger({
  name: 'webhook',
  description: 'Zendesk ticket and help center webhooks',

  subscription: {
    async validateCredentials(credentials) {
      const auth = zendeskAuth(credentials);
      if (typeof auth === 'string') {
        throw new CredentialsValidateFailedError(auth);
      }

      let response: Response;
      try {
        response = await fetch(zendeskApiUrl(auth.subdomain, '/webhooks'), {
          headers: auth.headers,
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
      } catch (err) {
        throw new CredentialsValidateFailedError(`Error while validating credentials: ${errorMessage(err)}`);
      }

      if (response.status >= 400) {
        const body = await readJsonObject(response);
        throw new CredentialsValidateFailedError(
          `Zendesk API token validation failed: ${vendorErrorMessage(body, `HTTP ${response.status}`)}`
        );
      }
    },

    async create({ endpoint, parameters, credentials }) {
      const auth = zendeskAuth(credentials);
      if (typeof auth === 'string') {
        throw new SubscriptionError(auth, 'MISSING_CREDENTIALS');
      }

      const events = parseEvents(parameters.events);
      const secret = asString(parameters.webhook_secret);
      const webhook: Record<string, unknown> = {
        name: `Conduit webhook ${randomUUID().slice(0, 8)}`,
        status: 'active',
        endpoint,
        http_method: 'POST',
        request_format: 'json',
        subscriptions: events.map((event) => EVENT_SUBSCRIPTIONS[event]),
      };
      if (secret) {
        webhook.signing_secret = { algorithm: 'sha256', secret };
      }

      let response: Response;
      try {
        response = await fetch(zendeskApiUrl(auth.subdomain, '/webhooks'), {
          method: 'POST',
          headers: auth.headers,
          body: JSON.stringify({ webhook }),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
      } catch (err) {
        throw new SubscriptionError(`Network error while creating webhook: ${errorMessage(err)}`, 'NETWORK_ERROR');
      }

      const body = await readJsonObject(response);
      if (response.status !== 201) {
        throw new SubscriptionError(
          `Failed to create Zendesk webhook: ${JSON.stringify(body)}`,
          'WEBHOOK_CREATION_FAILED',
          body
        );
      }

      const created = asRecord(body.webhook);
      return {
        endpoint,
        parameters,
        properties: {
          external_id: asString(created.id),
          events,
          status: asString(created.status) ?? 'active',
          webhook_secret: secret ?? null,
        },
        credentials,
        expiresAt: -1,
      };
    },

    async delete(subscription) {
      const externalId = asString(subscription.properties.external_id);
      if (!externalId) {
        throw new UnsubscribeError('Missing webhook ID information', 'MISSING_PROPERTIES');
      }
      const auth = zendeskAuth(subscription.credentials);
      if (typeof auth === 'string') {
        throw new UnsubscribeError(auth, 'MISSING_CREDENTIALS');
      }

      let response: Response;
      try {
        response = await fetch(zendeskApiUrl(auth.subdomain, `/webhooks/${externalId}`), {
          method: 'DELETE',
          headers: auth.headers,
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
      } catch (err) {
        throw new UnsubscribeError(`Network error while deleting webhook: ${errorMessage(err)}`, 'NETWORK_ERROR');
      }

      if (response.status === 204) {
        return { success: true, message: `Successfully removed webhook ${externalId} from Zendesk` };
      }

      const text = await response.text();
      if (response.status === 404) {
        throw new UnsubscribeError(`Webhook ${externalId} not found in Zendesk`, 'WEBHOOK_NOT_FOUND', text || undefined);
      }
      throw new UnsubscribeError(`Failed to delete webhook: ${text}`, 'WEBHOOK_DELETION_FAILED', text || undefined);
    },

    async refresh(subscription) {
      return subscription;
    },
  },

  async dispatch(subscription, request) {
    const payload = parseJsonObject(request);

    const secret = asString(subscription.properties.webhook_secret);
    if (secret) {
      verifyZendeskSignature(request, secret);
    }

    const event = classifyZendeskEvent(asString(payload.type) ?? '');
    return {
      events: event ? [event] : [],
      response: jsonResponse({ status: 'ok' }),
      payload,
    };
  },

  events: zendeskEvents,
});
