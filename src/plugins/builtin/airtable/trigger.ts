import { z } from 'zod';
import { defineEvent, defineTrigger } from '../../sdk/types.js';
import { parseJsonObject, textResponse } from '../../sdk/webhook.js';
import { asRecord, asString, asStringArray, splitCsv } from '../../sdk/values.js';
import {
  CredentialsValidateFailedError,
  EventIgnoredError,
  SubscriptionError,
  TriggerDispatchError,
  UnsubscribeError,
  errorMessage,
} from '../../../errors/index.js';
import { readJsonObject, tryParseJson, vendorErrorMessage } from '../../../http/index.js';
import type { EventDefinition, Subscription } from '../../../types/index.js';
import {
  AIRTABLE_API,
  REQUEST_TIMEOUT_MS,
  airtableHeaders,
  fetchPayloads,
  verifyAirtableMac,
} from './api.js';
import {
  collectRecords,
  isRecordEvent,
  matchesChangedFields,
  matchesFieldKeywords,
  matchesTables,
  presentRecordEvents,
  type RecordEventName,
} from './records.js';

const CURSOR_KEY = 'cursor';

function parseEvents(value: unknown): RecordEventName[] {
  const raw = Array.isArray(value) ? asStringArray(value) : splitCsv(value);
  return raw.filter(isRecordEvent);
}

function toUnixSeconds(value: unknown): number {
  if (typeof value !== 'string') return -1;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? -1 : Math.floor(ms / 1000);
}

function requireIds(subscription: Subscription): { baseId: string; webhookId: string } | undefined {
  const baseId = asString(subscription.properties.base_id);
  const webhookId = asString(subscription.properties.external_id);
  return baseId && webhookId ? { baseId, webhookId } : undefined;
}

const eventParameters = z
  .object({
    table_ids: z.string().optional(),
    changed_fields: z.string().optional(),
    field_filter_name: z.string().optional(),
    field_filter_keywords: z.string().optional(),
  })
  .passthrough();

function createRecordEvent(kind: RecordEventName, description: string): EventDefinition {
  return defineEvent({
    name: kind,
    description,
    schema: eventParameters,

    async onEvent({ payload, parameters }) {
      const batch = asRecord(payload);
      const payloads = Array.isArray(batch.payloads) ? batch.payloads.map(asRecord) : [];

      const tableIds = splitCsv(parameters.table_ids);
      const changedFields = kind === 'record_updated' ? splitCsv(parameters.changed_fields) : [];
      const fieldName = kind === 'record_deleted' ? undefined : asString(parameters.field_filter_name);
      const keywords = splitCsv(parameters.field_filter_keywords, { lowercase: true });

      const records = collectRecords(payloads, kind).filter(
        (record) =>
          matchesTables(record, tableIds) &&
          matchesChangedFields(record, changedFields) &&
          matchesFieldKeywords(record, fieldName, keywords)
      );
      if (records.length === 0) {
        throw new EventIgnoredError(`No ${kind.replace('record_', '')} records match the filters`);
      }

      return {
        base_id: batch.base_id,
        webhook_id: batch.webhook_id,
        timestamp: batch.timestamp,
        cursor: batch.cursor,
        records,
      };
    },
  });
}

export const airtableWebhookTrigger = defineTrigger({
  name: 'webhook',
  description: 'Airtable base webhooks for record changes',

  subscription: {
    async validateCredentials(credentials) {
      const accessToken = credentials.access_token;
      if (!accessToken) {
        throw new CredentialsValidateFailedError('Airtable Personal Access Token is required.');
      }

      let response: Response;
      try {
        response = await fetch(`${AIRTABLE_API}/meta/whoami`, {
          headers: airtableHeaders(accessToken),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
      } catch (err) {
        throw new CredentialsValidateFailedError(`Error while validating credentials: ${errorMessage(err)}`);
      }

      if (response.status >= 400) {
        const text = await response.text();
        const body = asRecord(tryParseJson(text));
        throw new CredentialsValidateFailedError(
          `Airtable token validation failed: ${vendorErrorMessage(body, text)}`
        );
      }
    },

    async create({ endpoint, parameters, credentials }) {
      const baseId = asString(parameters.base_id);
      if (!baseId) {
        throw new SubscriptionError('base_id is required to create webhook.', 'MISSING_BASE_ID');
      }
      const accessToken = credentials.access_token;
      if (!accessToken) {
        throw new SubscriptionError('Airtable Personal Access Token is required.', 'MISSING_CREDENTIALS');
      }

      const events = parseEvents(parameters.events);
      const filters: Record<string, unknown> = { dataTypes: events.length > 0 ? ['tableData'] : [] };
      const tableIds = splitCsv(parameters.table_ids);
      if (tableIds.length > 0) {
        filters.fromSources = tableIds.map((tableId) => ({ type: 'table', tableId }));
      }

      let response: Response;
      try {
        response = await fetch(`${AIRTABLE_API}/bases/${baseId}/webhooks`, {
          method: 'POST',
          headers: airtableHeaders(accessToken),
          body: JSON.stringify({ notificationUrl: endpoint, specification: { options: { filters } } }),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
      } catch (err) {
        throw new SubscriptionError(`Network error while creating webhook: ${errorMessage(err)}`, 'NETWORK_ERROR');
      }

      const body = await readJsonObject(response);
      if (response.status !== 200 && response.status !== 201) {
        throw new SubscriptionError(
          `Failed to create Airtable webhook: ${vendorErrorMessage(body, JSON.stringify(body))}`,
          'WEBHOOK_CREATION_FAILED',
          body
        );
      }

      return {
        endpoint,
        parameters,
        properties: {
          external_id: body.id,
          base_id: baseId,
          events,
          mac_secret: body.macSecretBase64,
          expiration_time: body.expirationTime,
        },
        credentials: { access_token: accessToken },
        expiresAt: toUnixSeconds(body.expirationTime),
      };
    },

    async delete(subscription) {
      const ids = requireIds(subscription);
      if (!ids) {
        throw new UnsubscribeError('Missing webhook ID or base ID information', 'MISSING_PROPERTIES');
      }
      const accessToken = subscription.credentials.access_token;
      if (!accessToken) {
        throw new UnsubscribeError('Airtable Personal Access Token is required.', 'MISSING_CREDENTIALS');
      }

      let response: Response;
      try {
        response = await fetch(`${AIRTABLE_API}/bases/${ids.baseId}/webhooks/${ids.webhookId}`, {
          method: 'DELETE',
          headers: airtableHeaders(accessToken),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
      } catch (err) {
        throw new UnsubscribeError(`Network error while deleting webhook: ${errorMessage(err)}`, 'NETWORK_ERROR');
      }

      if (response.status === 200 || response.status === 204) {
        return { success: true, message: `Successfully removed webhook ${ids.webhookId} from Airtable` };
      }

      const text = await response.text();
      if (response.status === 404) {
        throw new UnsubscribeError(`Webhook ${ids.webhookId} not found in Airtable`, 'WEBHOOK_NOT_FOUND', text || undefined);
      }
      throw new UnsubscribeError(`Failed to delete webhook: ${text}`, 'WEBHOOK_DELETION_FAILED', text || undefined);
    },

    // Webhooks created with personal access tokens expire after 7 days unless refreshed.
    async refresh(subscription) {
      const ids = requireIds(subscription);
      if (!ids) {
        throw new SubscriptionError('Missing webhook ID or base ID information', 'MISSING_PROPERTIES');
      }
      const accessToken = subscription.credentials.access_token;
      if (!accessToken) {
        throw new SubscriptionError('Airtable Personal Access Token is required.', 'MISSING_CREDENTIALS');
      }

      let response: Response;
      try {
        response = await fetch(`${AIRTABLE_API}/bases/${ids.baseId}/webhooks/${ids.webhookId}/refresh`, {
          method: 'POST',
          headers: airtableHeaders(accessToken),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
      } catch (err) {
        throw new SubscriptionError(`Network error while refreshing webhook: ${errorMessage(err)}`, 'NETWORK_ERROR');
      }

      const body = await readJsonObject(response);
      if (response.status !== 200) {
        throw new SubscriptionError(
          `Failed to refresh Airtable webhook: ${vendorErrorMessage(body, JSON.stringify(body))}`,
          'WEBHOOK_REFRESH_FAILED',
          body
        );
      }

      return {
        ...subscription,
        properties: { ...subscription.properties, expiration_time: body.expirationTime },
        expiresAt: toUnixSeconds(body.expirationTime),
      };
    },
  },

  // Airtable notifications are pings; the changes themselves are read from the
  // payloads endpoint.
  async dispatch(subscription, request, storage) {
    const notification = parseJsonObject(request);

    const macSecret = asString(subscription.properties.mac_secret);
    if (macSecret) {
      verifyAirtableMac(request, macSecret);
    }

    const baseId = asString(asRecord(notification.base).id) ?? asString(subscription.properties.base_id);
    const webhookId = asString(asRecord(notification.webhook).id) ?? asString(subscription.properties.external_id);
    if (!baseId || !webhookId) {
      throw new TriggerDispatchError('Notification is missing base or webhook id');
    }
    const accessToken = subscription.credentials.access_token;
    if (!accessToken) {
      throw new TriggerDispatchError('Subscription has no Airtable access token');
    }

    const stored = storage.get(CURSOR_KEY);
    const cursor = stored && /^\d+$/.test(stored) ? Number(stored) : undefined;
    const page = await fetchPayloads(accessToken, baseId, webhookId, cursor);
    if (page.cursor !== undefined) {
      storage.set(CURSOR_KEY, String(page.cursor));
    }

    const subscribed = parseEvents(subscription.properties.events);
    const events = presentRecordEvents(page.payloads).filter(
      (event) => subscribed.length === 0 || subscribed.includes(event)
    );

    return {
      events,
      response: textResponse('ok'),
      payload: {
        base_id: baseId,
        webhook_id: webhookId,
        timestamp: notification.timestamp,
        cursor: page.cursor,
        payloads: page.payloads,
      },
    };
  },

  events: [
    createRecordEvent('record_created', 'A record was created'),
    createRecordEvent('record_updated', 'Record cells changed'),
    createRecordEvent('record_deleted', 'A record was deleted'),
  ],
});
