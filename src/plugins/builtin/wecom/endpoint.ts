import { errorMessage } from '../../../errors/index.js';
import type { WebhookRequest, WebhookResponse } from '../../../types/index.js';
import { parseJsonBody, textResponse } from '../../sdk/webhook.js';
import { asString, isRecord } from '../../sdk/values.js';
import { AccessTokenCache, sendAppText } from './api.js';
import { WeComCryptor } from './crypto.js';

export interface WeComSettings {
  token?: string;
  encodingAesKey?: string;
  receiveId?: string;
  corpId?: string;
  agentSecret?: string;
  agentId?: string;
}

/** Produces the reply to an incoming text message. */
export type WeComResponder = (query: string, userId: string) => Promise<string>;

export interface WeComEndpointOptions {
  responder: WeComResponder;
  tokenCache?: AccessTokenCache;
  log?: (message: string) => void;
}

/**
 * Callback endpoint for a WeCom self-built app: answers the URL handshake
 * and replies to text messages through the app message API.
 */
export class WeComEndpoint {
  private responder: WeComResponder;
  private tokenCache: AccessTokenCache;
  private log: (message: string) => void;

  constructor(private settings: WeComSettings, options: WeComEndpointOptions) {
    this.responder = options.responder;
    this.log = options.log ?? console.log;
    this.tokenCache = options.tokenCache ?? new AccessTokenCache({ log: this.log });
  }

  async handle(request: WebhookRequest): Promise<WebhookResponse> {
    const { token, encodingAesKey, receiveId } = this.settings;
    if (!token || !encodingAesKey || !receiveId) {
      return textResponse('Missing WeCom credentials', 400);
    }

    let cryptor: WeComCryptor;
    try {
      cryptor = new WeComCryptor(token, encodingAesKey, receiveId);
    } catch (err) {
      return textResponse(errorMessage(err), 400);
    }

    const { msg_signature: signature, timestamp, nonce, echostr } = request.query;

    if (request.method.toUpperCase() === 'GET') {
      if (!signature || !timestamp || !nonce || !echostr) {
        return textResponse('missing echostr params', 400);
      }
      try {
        return textResponse(cryptor.decryptEcho(signature, timestamp, nonce, echostr));
      } catch (err) {
        return textResponse(errorMessage(err), 400);
      }
    }

    let body: unknown;
    try {
      body = parseJsonBody(request);
    } catch (err) {
      return textResponse(`invalid body: ${errorMessage(err)}`, 400);
    }

    const encrypt = isRecord(body) ? asString(body.encrypt) : undefined;
    if (!signature || !timestamp || !nonce || !encrypt) {
      return textResponse('missing signature or encrypt field', 400);
    }

    let message: Record<string, unknown>;
    try {
      message = cryptor.decrypt(signature, timestamp, nonce, encrypt);
    } catch (err) {
      return textResponse(`decrypt_failed: ${errorMessage(err)}`, 400);
    }

    const msgType = (asString(message.MsgType) ?? '').toLowerCase();
    const content = asString(message.Content) ?? '';
    const fromUser = asString(message.FromUserName);
    if (msgType !== 'text' || !content || !fromUser) {
      return textResponse('success');
    }

    try {
      const answer = await this.responder(content, fromUser);
      const sendError = await sendAppText(this.tokenCache, this.settings, fromUser, answer);
      if (sendError) {
        this.log(`[wecom] Reply to ${fromUser} failed: ${sendError}`);
        return textResponse(`error:${sendError}`);
      }
    } catch (err) {
      this.log(`[wecom] Reply to ${fromUser} failed: ${errorMessage(err)}`);
      return textResponse(`error:${errorMessage(err)}`);
    }

    return textResponse('success');
  }
}
