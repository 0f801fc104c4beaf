import { z } from 'zod';
import { definePlugin, defineAction } from '../../sdk/types.js';
import { InvokeBadRequestError, invokeErrorFromStatus } from '../../../errors/index.js';
import { readJsonObject } from '../../../http/index.js';
import { textMessage, type ActionContext } from '../../../types/index.js';
import { AccessTokenCache, REQUEST_TIMEOUT_MS, WECOM_API, sendAppText, type WeComApp } from './api.js';

const tokenCache = new AccessTokenCache();

const groupBotSchema = z.object({
  hook_key: z.string().uuid(),
  message_type: z.enum(['text', 'markdown', 'markdown_v2']).default('text'),
  content: z.string().min(1),
});

const sendTextSchema = z.object({
  user_id: z.string().min(1),
  content: z.string().min(1),
});

function getApp(ctx: ActionContext): Partial<WeComApp> {
  return {
    corpId: ctx.credentials.corp_id ?? ctx.env.WECOM_CORP_ID,
    agentSecret: ctx.credentials.agent_secret ?? ctx.env.WECOM_AGENT_SECRET,
    agentId: ctx.credentials.agent_id ?? ctx.env.WECOM_AGENT_ID,
  };
}

export default definePlugin({
  name: 'wecom',
  version: '1.0.0',
  description: 'WeCom group bots and app messages',

  actions: [
    defineAction({
      name: 'group_bot_send',
      description: 'Send a message to a WeCom group chat bot',
      schema: groupBotSchema,
      async execute(ctx) {
        const { hook_key, message_type, content } = groupBotSchema.parse(ctx.config);

        const url = new URL(`${WECOM_API}/webhook/send`);
        url.searchParams.set('key', hook_key);

        const response = await fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ msgtype: message_type, [message_type]: { content } }),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });

        if (!response.ok) {
          const text = await response.text();
          throw invokeErrorFromStatus(
            response.status,
            `Failed to send the message, status code: ${response.status}, response: ${text}`
          );
        }

        const body = await readJsonObject(response);
        if (typeof body.errcode === 'number' && body.errcode !== 0) {
          throw new InvokeBadRequestError(`WeCom rejected the message: ${String(body.errmsg)}`);
        }

        return [textMessage('Message sent successfully')];
      },
    }),

    defineAction({
      name: 'send_text',
      description: 'Send a text message to a WeCom user from the configured app',
      schema: sendTextSchema,
      async execute(ctx) {
        const { user_id, content } = sendTextSchema.parse(ctx.config);

        ctx.log(`Sending WeCom message to ${user_id}`);
        const error = await sendAppText(tokenCache, getApp(ctx), user_id, content);
        if (error) {
          throw new InvokeBadRequestError(`Failed to send WeCom message: ${error}`);
        }

        return [textMessage('Message sent successfully')];
      },
    }),
  ],
});
