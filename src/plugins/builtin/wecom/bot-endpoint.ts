import { randomUUID } from 'node:crypto';
import { errorMessage } from '../../../errors/index.js';
import type { WebhookRequest, WebhookResponse } from '../../../types/index.js';
import { jsonResponse, parseJsonBody, textResponse } from '../../sdk/webhook.js';
import { asRecord, asString, isRecord } from '../../sdk/values.js';
import { WeComCryptor } from './crypto.js';
import type { WeComResponder } from './endpoint.js';

export interface WeComBotSettings {
  token?: string;
  encodingAesKey?: string;
  /** Smart bots encrypt with an empty receive id. */
  receiveId?: string;
}

export interface WeComBotEndpointOptions {
  responder: WeComResponder;
  log?: (message: string) => void;
}

/**
 * Callback endpoint for a WeCom smart bot. Unlike the app callback, the
 * answer goes back in the HTTP response as an encrypted, already finished
 * stream message.
 */
export class WeComBotEndpoint {
  private responder: WeComResponder;
  private log: (message: string) => void;

  constructor(private settings: WeComBotSettings, options: WeComBotEndpointOptions) {
    this.responder = options.responder;
    this.log = options.log ?? console.log;
  }

  async handle(request: WebhookRequest): Promise<WebhookResponse> {
    const { token, encodingAesKey } = this.settings;
    if (!token || !encodingAesKey) {
      return textResponse('missing token or encoding key', 400);
    }

    let cryptor: WeComCryptor;
    try {
      cryptor = new WeComCryptor(token, encodingAesKey, this.settings.receiveId ?? '');
    } catch (err) {
      return textResponse(errorMessage(err), 400);
    }

    const { msg_signature: signature, timestamp, nonce, echostr } = request.query;

    if (request.method.toUpperCase() === 'GET') {
      if (!signature || !timestamp || !nonce || !echostr) {
        return textResponse('missing params', 400);
      }
      try {
        return textResponse(cryptor.decryptEcho(signature, timestamp, nonce, echostr));
      } catch (err) {
        return textResponse(errorMessage(err), 400);
      }
    }

    if (!signature || !timestamp || !nonce) {
      return textResponse('missing signature params', 400);
    }

    let body: unknown;
    try {
      body = parseJsonBody(request);
    } catch (err) {
      return textResponse(`invalid json: ${errorMessage(err)}`, 400);
    }

    const encrypt = isRecord(body) ? asString(body.encrypt) : undefined;
    if (!encrypt) {
      return textResponse('missing encrypt', 400);
    }

    let message: Record<string, unknown>;
    try {
      message = cryptor.decrypt(signature, timestamp, nonce, encrypt);
    } catch (err) {
      return textResponse(`decrypt_failed: ${errorMessage(err)}`, 400);
    }

    const content = (asString(asRecord(message.text).content) ?? '').trim();
    if (!content) {
      return textResponse('success');
    }

    const userId = asString(asRecord(message.from).userid) ?? '';
    let answer: string;
    try {
      answer = await this.responder(content, userId);
    } catch (err) {
      this.log(`[wecom] Bot reply to ${userId || 'unknown user'} failed: ${errorMessage(err)}`);
      answer = `Error: ${errorMessage(err)}`;
    }

    const reply = {
      msgtype: 'stream',
      stream: { id: asString(message.msgid) ?? randomUUID(), finish: true, content: answer },
    };
    return jsonResponse(cryptor.encryptReply(JSON.stringify(reply), timestamp, nonce));
  }
}
