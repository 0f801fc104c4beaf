import { createHmac, timingSafeEqual } from 'node:crypto';
import { TriggerValidationError } from '../../../errors/index.js';
import { basicAuth } from '../../../http/index.js';
import { header } from '../../sdk/webhook.js';
import type { WebhookRequest } from '../../../types/index.js';

export const TWILIO_API = 'https://api.twilio.com';
export const TWILIO_API_BASE = `${TWILIO_API}/2010-04-01`;
export const REQUEST_TIMEOUT_MS = 10_000;

export function twilioHeaders(accountSid: string, authToken: string): Record<string, string> {
  return { Authorization: basicAuth(accountSid, authToken) };
}

export function phoneNumberUrl(accountSid: string, phoneNumberSid: string): string {
  return `${TWILIO_API_BASE}/Accounts/${accountSid}/IncomingPhoneNumbers/${phoneNumberSid}.json`;
}

/**
 * Twilio signs the full callback URL followed by every form field as
 * key+value, sorted by key.
 */
export function computeTwilioSignature(url: string, form: Record<string, string>, authToken: string): string {
  const data = url + Object.keys(form).sort().map((key) => key + form[key]).join('');
  return createHmac('sha1', authToken).update(data).digest('base64');
}

export function verifyTwilioSignature(
  request: WebhookRequest,
  url: string,
  form: Record<string, string>,
  authToken: string
): void {
  const signature = header(request, 'x-twilio-signature');
  if (!signature) {
    throw new TriggerValidationError('Missing Twilio signature header');
  }

  const expected = Buffer.from(computeTwilioSignature(url, form, authToken));
  const received = Buffer.from(signature);
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    throw new TriggerValidationError('Invalid Twilio signature');
  }
}
