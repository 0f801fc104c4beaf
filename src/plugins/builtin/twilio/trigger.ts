import { defineTrigger } from '../../sdk/types.js';
import { parseFormBody, textResponse } from '../../sdk/webhook.js';
import { asRecord, asString } from '../../sdk/values.js';
import {
  CredentialsValidateFailedError,
  SubscriptionError,
  TriggerDispatchError,
  UnsubscribeError,
  errorMessage,
} from '../../../errors/index.js';
import { readJsonObject, vendorErrorMessage } from '../../../http/index.js';
import type { ParameterOption } from '../../../types/index.js';
import {
  REQUEST_TIMEOUT_MS,
  TWILIO_API,
  TWILIO_API_BASE,
  phoneNumberUrl,
  twilioHeaders,
  verifyTwilioSignature,
} from './api.js';
import { twilioEvents } from './events.js';

/** Twilio keeps the webhook forever; the subscription is re-checked monthly. */
export const WEBHOOK_TTL_SECONDS = 30 * 24 * 60 * 60;

const EMPTY_TWIML = '<?xml version="1.0" encoding="UTF-8"?><Response></Response>';

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function classifyTwilioEvent(form: Record<string, string>): string[] {
  const from = form.From ?? '';
  if (from.startsWith('whatsapp:') && 'Body' in form) return ['whatsapp_received'];
  if ('Body' in form && 'MessageSid' in form) return ['sms_received'];
  if ('CallSid' in form && 'CallStatus' in form) return ['call_received'];
  return [];
}

function formBody(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}

export const twilioWebhookTrigger = defineTrigger({
  name: 'webhook',
  description: 'Incoming SMS, WhatsApp messages and calls on a Twilio number',

  subscription: {
    async validateCredentials(credentials) {
      const { account_sid: accountSid, auth_token: authToken } = credentials;
      if (!accountSid) throw new CredentialsValidateFailedError('Twilio Account SID is required.');
      if (!authToken) throw new CredentialsValidateFailedError('Twilio Auth Token is required.');

      let response: Response;
      try {
        response = await fetch(`${TWILIO_API_BASE}/Accounts/${accountSid}.json`, {
          headers: twilioHeaders(accountSid, authToken),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
      } catch (err) {
        throw new CredentialsValidateFailedError(errorMessage(err));
      }

      if (response.status !== 200) {
        const body = await readJsonObject(response);
        throw new CredentialsValidateFailedError(vendorErrorMessage(body, 'Invalid credentials'));
      }
    },

    async create({ endpoint, parameters, credentials }) {
      const phoneNumberSid = asString(parameters.phone_number);
      if (!phoneNumberSid) {
        throw new SubscriptionError('Phone number is required', 'MISSING_PHONE_NUMBER');
      }
      const { account_sid: accountSid = '', auth_token: authToken = '' } = credentials;

      let response: Response;
      try {
        response = await fetch(phoneNumberUrl(accountSid, phoneNumberSid), {
          method: 'POST',
          headers: {
            ...twilioHeaders(accountSid, authToken),
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          body: formBody({ SmsUrl: endpoint, SmsMethod: 'POST', VoiceUrl: endpoint, VoiceMethod: 'POST' }),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
      } catch (err) {
        throw new SubscriptionError(`Network error while configuring webhook: ${errorMessage(err)}`, 'NETWORK_ERROR');
      }

      const body = await readJsonObject(response);
      if (response.status !== 200) {
        throw new SubscriptionError(
          `Failed to configure Twilio webhook: ${vendorErrorMessage(body, 'Unknown error')}`,
          'WEBHOOK_CONFIGURATION_FAILED',
          body
        );
      }

      return {
        endpoint,
        parameters,
        properties: {
          phone_number_sid: phoneNumberSid,
          phone_number: asString(body.phone_number) ?? null,
          friendly_name: asString(body.friendly_name) ?? null,
          auth_token: authToken,
        },
        credentials,
        expiresAt: nowSeconds() + WEBHOOK_TTL_SECONDS,
      };
    },

    async delete(subscription) {
      const phoneNumberSid = asString(subscription.properties.phone_number_sid);
      if (!phoneNumberSid) {
        throw new UnsubscribeError('Missing phone number SID in subscription', 'MISSING_PROPERTIES');
      }
      const { account_sid: accountSid = '', auth_token: authToken = '' } = subscription.credentials;

      let response: Response;
      try {
        response = await fetch(phoneNumberUrl(accountSid, phoneNumberSid), {
          method: 'POST',
          headers: {
            ...twilioHeaders(accountSid, authToken),
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          body: formBody({ SmsUrl: '', VoiceUrl: '' }),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
      } catch (err) {
        throw new UnsubscribeError(`Network error while removing webhook: ${errorMessage(err)}`, 'NETWORK_ERROR');
      }

      if (response.status === 200) {
        const phoneNumber = asString(subscription.properties.phone_number) ?? phoneNumberSid;
        return { success: true, message: `Successfully removed webhook from ${phoneNumber}` };
      }

      const body = await readJsonObject(response);
      throw new UnsubscribeError(
        `Failed to remove webhook: ${vendorErrorMessage(body, 'Unknown error')}`,
        'WEBHOOK_REMOVAL_FAILED',
        body
      );
    },

    async refresh(subscription) {
      return { ...subscription, expiresAt: nowSeconds() + WEBHOOK_TTL_SECONDS };
    },

    async parameterOptions(parameter, credentials) {
      if (parameter !== 'phone_number') return [];

      const { account_sid: accountSid, auth_token: authToken } = credentials;
      if (!accountSid || !authToken) {
        throw new SubscriptionError(
          'Account SID and Auth Token are required to fetch phone numbers',
          'MISSING_CREDENTIALS'
        );
      }

      const options: ParameterOption[] = [];
      let url: string | undefined = `${TWILIO_API_BASE}/Accounts/${accountSid}/IncomingPhoneNumbers.json?PageSize=100`;

      while (url) {
        let response: Response;
        try {
          response = await fetch(url, {
            headers: twilioHeaders(accountSid, authToken),
            signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
          });
        } catch (err) {
          throw new SubscriptionError(
            `Network error while fetching phone numbers: ${errorMessage(err)}`,
            'NETWORK_ERROR'
          );
        }
        const body = await readJsonObject(response);
        if (response.status !== 200) {
          throw new SubscriptionError(
            `Failed to fetch phone numbers from Twilio: ${vendorErrorMessage(body, `HTTP ${response.status}`)}`,
            'PHONE_NUMBER_LIST_FAILED',
            body
          );
        }

        const numbers = Array.isArray(body.incoming_phone_numbers) ? body.incoming_phone_numbers : [];
        for (const item of numbers) {
          const phone = asRecord(item);
          const sid = asString(phone.sid);
          const number = asString(phone.phone_number);
          if (!sid || !number) continue;
          const friendlyName = asString(phone.friendly_name);
          const label = friendlyName && friendlyName !== number ? `${friendlyName} (${number})` : number;
          options.push({ value: sid, label });
        }

        const next = asString(body.next_page_uri);
        url = next ? `${TWILIO_API}${next}` : undefined;
      }

      return options;
    },
  },

  async dispatch(subscription, request) {
    const form = parseFormBody(request);
    const authToken = asString(subscription.properties.auth_token);
    if (authToken) {
      verifyTwilioSignature(request, subscription.endpoint, form, authToken);
    }

    if (Object.keys(form).length === 0) {
      throw new TriggerDispatchError('Empty request body');
    }

    return {
      events: classifyTwilioEvent(form),
      response: textResponse(EMPTY_TWIML, 200, 'application/xml'),
      payload: form,
      userId: form.From ?? 'unknown',
    };
  },

  events: twilioEvents,
});
