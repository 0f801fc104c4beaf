import { createHash } from 'node:crypto';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import wecomPlugin from './index.js';
import { WeComCryptor } from './crypto.js';
import { AccessTokenCache } from './api.js';
import { WeComEndpoint, type WeComSettings } from './endpoint.js';
import { WeComBotEndpoint } from './bot-endpoint.js';
import { invokeAction } from '../../sdk/runner.js';
import { InvokeBadRequestError } from '../../../errors/index.js';
import { mockJson, webhookRequest } from '../../../testing/http.js';
import { actionContext, findAction } from '../../../testing/plugins.js';

const AES_KEY = Buffer.alloc(32, 7).toString('base64').replace(/=$/, '');

const settings: WeComSettings = {
  token: 'test-token',
  encodingAesKey: AES_KEY,
  receiveId: 'corp1',
  corpId: 'corp1',
  agentSecret: 'test-secret',
  agentId: '1000002',
};

const cryptor = new WeComCryptor('test-token', AES_KEY, 'corp1');

function callbackRequest(message: Record<string, unknown>, signatureOverride?: string) {
  const encrypt = cryptor.encrypt(JSON.stringify(message));
  return webhookRequest({
    rawBody: JSON.stringify({ encrypt }),
    query: {
      msg_signature: signatureOverride ?? cryptor.signature('1700000000', 'nonce-1', encrypt),
      timestamp: '1700000000',
      nonce: 'nonce-1',
    },
  });
}

describe('WeComCryptor', () => {
  it('signs the sorted token, timestamp, nonce and ciphertext', () => {
    const expected = createHash('sha1').update(['test-token', '1', '2', 'abc'].sort().join('')).digest('hex');
    expect(cryptor.signature('1', '2', 'abc')).toBe(expected);
  });

  it('pads to 32-byte blocks', () => {
    // 16 random + 4 length + 7 message + 5 receive id fills one block exactly
    const ciphertext = cryptor.encrypt('{"a":1}', Buffer.alloc(16));
    expect(Buffer.from(ciphertext, 'base64').length).toBe(64);
  });

  it('decrypts what it encrypted', () => {
    const encrypt = cryptor.encrypt(JSON.stringify({ MsgType: 'text', Content: '你好' }));
    const signature = cryptor.signature('1700000000', 'n', encrypt);

    expect(cryptor.decrypt(signature, '1700000000', 'n', encrypt)).toEqual({ MsgType: 'text', Content: '你好' });
  });

  it('rejects a bad signature', () => {
    const encrypt = cryptor.encrypt('{}');
    expect(() => cryptor.decrypt('0'.repeat(40), '1', 'n', encrypt)).toThrow('Invalid msg_signature');
  });

  it('rejects a message for another receiver', () => {
    const other = new WeComCryptor('test-token', AES_KEY, 'corp2');
    const encrypt = cryptor.encrypt('{}');

    expect(() => other.decrypt(other.signature('1', 'n', encrypt), '1', 'n', encrypt)).toThrow('ReceiveId mismatch');
  });

  it('requires a 32-byte key', () => {
    expect(() => new WeComCryptor('test-token', 'abc', 'corp1')).toThrow('EncodingAESKey must decode to 32 bytes');
  });

  it('builds a signed reply', () => {
    const reply = cryptor.encryptReply('{"msgtype":"text"}', '1700000000', 'nonce-1');

    expect(reply.msgsignature).toBe(cryptor.signature('1700000000', 'nonce-1', reply.encrypt));
    expect(cryptor.decryptEcho(reply.msgsignature, '1700000000', 'nonce-1', reply.encrypt)).toBe('{"msgtype":"text"}');
  });
});

describe('WeCom', () => {
  const mockFetch = vi.fn();
  const originalFetch = global.fetch;

  beforeEach(() => {
    global.fetch = mockFetch;
    mockFetch.mockReset();
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  describe('AccessTokenCache', () => {
    it('caches tokens until a minute before expiry', async () => {
      let now = 1_000_000;
      const cache = new AccessTokenCache({ now: () => now, log: vi.fn() });
      mockFetch
        .mockResolvedValueOnce(mockJson({ errcode: 0, access_token: 'token-1', expires_in: 7200 }))
        .mockResolvedValueOnce(mockJson({ errcode: 0, access_token: 'token-2', expires_in: 7200 }));

      expect(await cache.get('corp1', 'test-secret')).toBe('token-1');
      now += 7140 * 1000 - 1;
      expect(await cache.get('corp1', 'test-secret')).toBe('token-1');
      now += 1;
      expect(await cache.get('corp1', 'test-secret')).toBe('token-2');

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(String(mockFetch.mock.calls[0][0])).toBe(
        'https://qyapi.weixin.qq.com/cgi-bin/gettoken?corpid=corp1&corpsecret=test-secret'
      );
    });

    it('returns null when WeCom rejects the secret', async () => {
      const log = vi.fn();
      const cache = new AccessTokenCache({ log });
      mockFetch.mockResolvedValueOnce(mockJson({ errcode: 40001, errmsg: 'invalid credential' }));

      expect(await cache.get('corp1', 'test-secret')).toBeNull();
      expect(log).toHaveBeenCalledWith('[wecom] gettoken rejected: invalid credential');
    });

    it('returns null on network failure', async () => {
      const cache = new AccessTokenCache({ log: vi.fn() });
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      expect(await cache.get('corp1', 'test-secret')).toBeNull();
    });
  });

  describe('WeComEndpoint', () => {
    function endpoint(responder = vi.fn().mockResolvedValue('hi zhang'), overrides: WeComSettings = {}) {
      return new WeComEndpoint(
        { ...settings, ...overrides },
        { responder, tokenCache: new AccessTokenCache({ log: vi.fn() }), log: vi.fn() }
      );
    }

    it('requires the callback settings', async () => {
      const response = await endpoint(vi.fn(), { token: undefined }).handle(webhookRequest());
      expect(response).toEqual({ status: 400, body: 'Missing WeCom credentials', contentType: 'text/plain' });
    });

    it('answers the URL handshake with the decrypted echo', async () => {
      const echostr = cryptor.encrypt('echo-123');
      const request = webhookRequest({
        method: 'GET',
        query: {
          msg_signature: cryptor.signature('1700000000', 'nonce-1', echostr),
          timestamp: '1700000000',
          nonce: 'nonce-1',
          echostr,
        },
      });

      expect(await endpoint().handle(request)).toEqual({ status: 200, body: 'echo-123', contentType: 'text/plain' });
    });

    it('rejects an incomplete handshake', async () => {
      const response = await endpoint().handle(webhookRequest({ method: 'GET', query: { timestamp: '1' } }));
      expect(response.status).toBe(400);
      expect(response.body).toBe('missing echostr params');
    });

    it('replies to text messages through the app API', async () => {
      const responder = vi.fn().mockResolvedValue('hi zhang');
      mockFetch
        .mockResolvedValueOnce(mockJson({ errcode: 0, access_token: 'test-access', expires_in: 7200 }))
        .mockResolvedValueOnce(mockJson({ errcode: 0, errmsg: 'ok' }));

      const response = await endpoint(responder).handle(
        callbackRequest({ MsgType: 'text', Content: 'hello', FromUserName: 'zhang' })
      );

      expect(response).toEqual({ status: 200, body: 'success', contentType: 'text/plain' });
      expect(responder).toHaveBeenCalledWith('hello', 'zhang');
      const [url, init] = mockFetch.mock.calls[1];
      expect(String(url)).toBe('https://qyapi.weixin.qq.com/cgi-bin/message/send?access_token=test-access');
      expect(JSON.parse(init.body)).toEqual({
        touser: 'zhang',
        msgtype: 'text',
        agentid: '1000002',
        text: { content: 'hi zhang' },
        safe: 0,
      });
    });

    it('truncates long replies', async () => {
      mockFetch
        .mockResolvedValueOnce(mockJson({ errcode: 0, access_token: 'test-access', expires_in: 7200 }))
        .mockResolvedValueOnce(mockJson({ errcode: 0 }));

      await endpoint(vi.fn().mockResolvedValue('x'.repeat(3000))).handle(
        callbackRequest({ MsgType: 'text', Content: 'hello', FromUserName: 'zhang' })
      );

      expect(JSON.parse(mockFetch.mock.calls[1][1].body).text.content).toHaveLength(2048);
    });

    it('truncates by characters without splitting surrogate pairs', async () => {
      mockFetch
        .mockResolvedValueOnce(mockJson({ errcode: 0, access_token: 'test-access', expires_in: 7200 }))
        .mockResolvedValueOnce(mockJson({ errcode: 0 }));

      await endpoint(vi.fn().mockResolvedValue('a' + '😀'.repeat(2100))).handle(
        callbackRequest({ MsgType: 'text', Content: 'hello', FromUserName: 'zhang' })
      );

      const sent: string = JSON.parse(mockFetch.mock.calls[1][1].body).text.content;
      expect(Array.from(sent)).toHaveLength(2048);
      expect(sent).toBe('a' + '😀'.repeat(2047));
    });

    it('acknowledges non-text messages without replying', async () => {
      const responder = vi.fn();

      const response = await endpoint(responder).handle(callbackRequest({ MsgType: 'image', FromUserName: 'zhang' }));

      expect(response.body).toBe('success');
      expect(responder).not.toHaveBeenCalled();
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('reports decrypt failures', async () => {
      const response = await endpoint().handle(
        callbackRequest({ MsgType: 'text', Content: 'hello', FromUserName: 'zhang' }, '0'.repeat(40))
      );

      expect(response).toEqual({ status: 400, body: 'decrypt_failed: Invalid msg_signature', contentType: 'text/plain' });
    });

    it('reports responder failures with status 200', async () => {
      const response = await endpoint(vi.fn().mockRejectedValue(new Error('model down'))).handle(
        callbackRequest({ MsgType: 'text', Content: 'hello', FromUserName: 'zhang' })
      );

      expect(response).toEqual({ status: 200, body: 'error:model down', contentType: 'text/plain' });
    });

    it('reports send failures', async () => {
      mockFetch
        .mockResolvedValueOnce(mockJson({ errcode: 0, access_token: 'test-access', expires_in: 7200 }))
        .mockResolvedValueOnce(mockJson({ errcode: 40014, errmsg: 'invalid access_token' }));

      const response = await endpoint().handle(
        callbackRequest({ MsgType: 'text', Content: 'hello', FromUserName: 'zhang' })
      );

      expect(response.body).toBe('error:send_failed:{"errcode":40014,"errmsg":"invalid access_token"}');
    });
  });

  describe('WeComBotEndpoint', () => {
    const botCryptor = new WeComCryptor('test-token', AES_KEY, '');

    function botRequest(message: Record<string, unknown>) {
      const encrypt = botCryptor.encrypt(JSON.stringify(message));
      return webhookRequest({
        rawBody: JSON.stringify({ encrypt }),
        query: {
          msg_signature: botCryptor.signature('1700000000', 'nonce-1', encrypt),
          timestamp: '1700000000',
          nonce: 'nonce-1',
        },
      });
    }

    function bot(responder = vi.fn().mockResolvedValue('hi zhang')) {
      return new WeComBotEndpoint({ token: 'test-token', encodingAesKey: AES_KEY }, { responder, log: vi.fn() });
    }

    function openReply(body: string): unknown {
      const reply = JSON.parse(body);
      expect(reply).toMatchObject({ timestamp: '1700000000', nonce: 'nonce-1' });
      return botCryptor.decrypt(reply.msgsignature, reply.timestamp, reply.nonce, reply.encrypt);
    }

    it('answers in the response with an encrypted finished stream', async () => {
      const responder = vi.fn().mockResolvedValue('hi zhang');

      const response = await bot(responder).handle(
        botRequest({ msgid: 'm1', msgtype: 'text', text: { content: ' hello ' }, from: { userid: 'zhang' } })
      );

      expect(response.status).toBe(200);
      expect(response.contentType).toBe('application/json');
      expect(responder).toHaveBeenCalledWith('hello', 'zhang');
      expect(openReply(response.body)).toEqual({
        msgtype: 'stream',
        stream: { id: 'm1', finish: true, content: 'hi zhang' },
      });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('puts responder failures into the reply', async () => {
      const response = await bot(vi.fn().mockRejectedValue(new Error('model down'))).handle(
        botRequest({ msgid: 'm2', msgtype: 'text', text: { content: 'hello' }, from: { userid: 'zhang' } })
      );

      expect(openReply(response.body)).toEqual({
        msgtype: 'stream',
        stream: { id: 'm2', finish: true, content: 'Error: model down' },
      });
    });

    it('acknowledges messages without text', async () => {
      const responder = vi.fn();

      const response = await bot(responder).handle(botRequest({ msgid: 'm3', msgtype: 'image' }));

      expect(response).toEqual({ status: 200, body: 'success', contentType: 'text/plain' });
      expect(responder).not.toHaveBeenCalled();
    });

    it('requires the signature query and the encrypt field', async () => {
      expect(await bot().handle(webhookRequest({ rawBody: '{}' }))).toEqual({
        status: 400,
        body: 'missing signature params',
        contentType: 'text/plain',
      });
      expect(
        await bot().handle(
          webhookRequest({ rawBody: '{}', query: { msg_signature: 'x', timestamp: '1', nonce: 'n' } })
        )
      ).toEqual({ status: 400, body: 'missing encrypt', contentType: 'text/plain' });
    });
  });

  describe('tools', () => {
    const HOOK_KEY = '3f2504e0-4f89-41d3-9a0c-0305e82c3301';

    it('sends markdown to a group bot', async () => {
      mockFetch.mockResolvedValueOnce(mockJson({ errcode: 0, errmsg: 'ok' }));

      const result = await invokeAction(
        findAction(wecomPlugin, 'group_bot_send'),
        actionContext({ hook_key: HOOK_KEY, message_type: 'markdown', content: '**deploy** done' })
      );

      expect(result).toEqual([{ type: 'text', text: 'Message sent successfully' }]);
      const [url, init] = mockFetch.mock.calls[0];
      expect(String(url)).toBe(`https://qyapi.weixin.qq.com/cgi-bin/webhook/send?key=${HOOK_KEY}`);
      expect(JSON.parse(init.body)).toEqual({ msgtype: 'markdown', markdown: { content: '**deploy** done' } });
    });

    it('rejects a hook key that is not a UUID', async () => {
      await expect(
        invokeAction(findAction(wecomPlugin, 'group_bot_send'), actionContext({ hook_key: 'abc', content: 'hi' }))
      ).rejects.toBeInstanceOf(InvokeBadRequestError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('surfaces WeCom error codes', async () => {
      mockFetch.mockResolvedValueOnce(mockJson({ errcode: 93000, errmsg: 'invalid webhook url' }));

      await expect(
        invokeAction(findAction(wecomPlugin, 'group_bot_send'), actionContext({ hook_key: HOOK_KEY, content: 'hi' }))
      ).rejects.toThrow('WeCom rejected the message: invalid webhook url');
    });

    it('sends an app text message', async () => {
      mockFetch
        .mockResolvedValueOnce(mockJson({ errcode: 0, access_token: 'test-access', expires_in: 7200 }))
        .mockResolvedValueOnce(mockJson({ errcode: 0 }));

      const result = await invokeAction(
        findAction(wecomPlugin, 'send_text'),
        actionContext(
          { user_id: 'zhang', content: 'build passed' },
          { corp_id: 'corp-tools', agent_secret: 'test-secret', agent_id: '1000002' }
        )
      );

      expect(result).toEqual([{ type: 'text', text: 'Message sent successfully' }]);
      expect(JSON.parse(mockFetch.mock.calls[1][1].body).touser).toBe('zhang');
    });

    it('requires app credentials for send_text', async () => {
      await expect(
        invokeAction(findAction(wecomPlugin, 'send_text'), actionContext({ user_id: 'zhang', content: 'hi' }))
      ).rejects.toThrow('Failed to send WeCom message: missing corp/app credentials');
    });
  });
});
