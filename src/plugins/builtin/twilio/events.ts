import { z } from 'zod';
import { defineEvent } from '../../sdk/types.js';
import { asString } from '../../sdk/values.js';
import { TriggerDispatchError } from '../../../errors/index.js';
import type { EventContext, EventDefinition } from '../../../types/index.js';
import { checkBodyContains, checkBodyRegex, checkCallStatus, checkFrom, checkProfileName } from './filters.js';

const optional = z.string().optional();

const messageParameters = z
  .object({ from_filter: optional, body_contains: optional, body_regex: optional })
  .passthrough();

function formPayload({ payload }: EventContext): Record<string, unknown> {
  if (!payload || Object.keys(payload).length === 0) {
    throw new TriggerDispatchError('No payload received');
  }
  return payload;
}

function checkMessage(payload: Record<string, unknown>, parameters: Record<string, unknown>): void {
  const body = asString(payload.Body) ?? '';
  checkFrom(asString(payload.From) ?? '', parameters.from_filter);
  checkBodyContains(body, parameters.body_contains);
  checkBodyRegex(body, parameters.body_regex);
}

export const twilioEvents: EventDefinition[] = [
  defineEvent({
    name: 'sms_received',
    description: 'An SMS arrived on the phone number',
    schema: messageParameters,
    async onEvent(ctx) {
      const payload = formPayload(ctx);
      checkMessage(payload, ctx.parameters);
      return { ...payload };
    },
  }),
  defineEvent({
    name: 'whatsapp_received',
    description: 'A WhatsApp message arrived on the phone number',
    schema: messageParameters.extend({ profile_name_filter: optional }),
    async onEvent(ctx) {
      const payload = formPayload(ctx);
      checkMessage(payload, ctx.parameters);
      checkProfileName(asString(payload.ProfileName), ctx.parameters.profile_name_filter);
      return { ...payload };
    },
  }),
  defineEvent({
    name: 'call_received',
    description: 'A voice call reached the phone number',
    schema: z.object({ from_filter: optional, call_status_filter: optional }).passthrough(),
    async onEvent(ctx) {
      const payload = formPayload(ctx);
      checkFrom(asString(payload.From) ?? '', ctx.parameters.from_filter);
      checkCallStatus(asString(payload.CallStatus) ?? '', ctx.parameters.call_status_filter);
      return { ...payload };
    },
  }),
];
