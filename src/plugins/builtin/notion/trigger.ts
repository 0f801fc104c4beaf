import { createHmac, timingSafeEqual } from 'node:crypto';
import { defineTrigger } from '../../sdk/types.js';
import { jsonResponse, parseJsonObject, header } from '../../sdk/webhook.js';
import { asString, splitCsv } from '../../sdk/values.js';
import { SubscriptionError, TriggerDispatchError, TriggerValidationError } from '../../../errors/index.js';
import type { ParameterOption, WebhookRequest } from '../../../types/index.js';
import { notionEvents } from './events.js';
import { SUPPORTED_EVENT_TYPES, isSupportedEventType, type NotionEventType } from './event-types.js';

function parseEventTypes(value: unknown): NotionEventType[] {
  const raw = Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : splitCsv(value);
  return raw.map((v) => v.trim()).filter(isSupportedEventType);
}

export function computeNotionSignature(rawBody: string, verificationToken: string): string {
  return `sha256=${createHmac('sha256', verificationToken).update(rawBody).digest('hex')}`;
}

export function verifyNotionSignature(request: WebhookRequest, verificationToken: string): void {
  const signature = header(request, 'x-notion-signature');
  if (!signature) {
    throw new TriggerValidationError('Missing X-Notion-Signature header');
  }

  const prefix = 'sha256=';
  if (!signature.startsWith(prefix)) {
    throw new TriggerValidationError('Unsupported signature format');
  }

  const expected = Buffer.from(computeNotionSignature(request.rawBody, verificationToken).slice(prefix.length));
  const received = Buffer.from(signature.slice(prefix.length));
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    throw new TriggerValidationError('Invalid webhook signature');
  }
}

export const notionWebhookTrigger = defineTrigger({
  name: 'webhook',
  description: 'Receive Notion integration webhooks',

  subscription: {
    // Notion webhooks are registered by hand in the integration settings, so
    // creating a subscription only records the verification token and filters.
    async create({ endpoint, parameters, credentials }) {
      const verificationToken = asString(parameters.verification_token);
      if (!verificationToken) {
        throw new SubscriptionError('verification_token is required', 'missing_verification_token');
      }

      const eventTypes = parseEventTypes(parameters.event_types);
      const integrationToken = credentials.integration_token ?? asString(parameters.integration_token);
      const { integration_token: _omit, ...rest } = parameters;
      const subscriptionCredentials: Record<string, string> = integrationToken ? { integration_token: integrationToken } : {};

      return {
        endpoint,
        parameters: rest,
        properties: {
          verification_token: verificationToken,
          event_types: eventTypes.length > 0 ? eventTypes : null,
        },
        credentials: subscriptionCredentials,
        expiresAt: -1,
      };
    },

    async delete() {
      return { success: true, message: 'Subscription deleted' };
    },

    async refresh(subscription) {
      return subscription;
    },

    async parameterOptions(parameter): Promise<ParameterOption[]> {
      if (parameter !== 'event_types') return [];
      return SUPPORTED_EVENT_TYPES.map((type) => ({ value: type, label: type.replace(/\./g, ' → ') }));
    },
  },

  async dispatch(subscription, request) {
    if (!request.rawBody) {
      throw new TriggerDispatchError('Missing request body');
    }

    const payload = parseJsonObject(request);

    // The verification ping carries nothing but the token.
    const keys = Object.keys(payload);
    if (keys.length === 1 && keys[0] === 'verification_token') {
      console.log(`[notion] Verification token received for ${subscription.id}: ${asString(payload.verification_token) ?? ''}`);
      return { events: [], response: jsonResponse({ status: 'ok' }), payload };
    }

    const verificationToken = asString(subscription.properties.verification_token);
    if (verificationToken) {
      verifyNotionSignature(request, verificationToken);
    }

    const eventType = asString(payload.type);
    if (!eventType) {
      throw new TriggerDispatchError('Missing event type in payload');
    }

    const allowed = subscription.properties.event_types;
    if (Array.isArray(allowed) && allowed.length > 0 && !allowed.includes(eventType)) {
      return { events: [], response: jsonResponse({ status: 'ignored' }), payload };
    }

    return {
      events: [eventType.replace(/\./g, '_')],
      response: jsonResponse({ status: 'ok' }),
      payload,
    };
  },

  events: notionEvents,
});
