import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import openaiCompatiblePlugin from './index.js';
import { invokeAction } from '../../sdk/runner.js';
import { InvokeAuthorizationError, InvokeBadRequestError } from '../../../errors/index.js';
import { mockJson } from '../../../testing/http.js';
import { actionContext, findAction } from '../../../testing/plugins.js';

const credentials = { endpoint_url: 'https://llm.test/v1', model: 'local' };

describe('OpenAI-compatible Plugin', () => {
  const mockFetch = vi.fn();
  const originalFetch = global.fetch;

  beforeEach(() => {
    global.fetch = mockFetch;
    mockFetch.mockReset();
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('exposes chat, embed and rerank', () => {
    expect(openaiCompatiblePlugin.actions.map((a) => a.name)).toEqual(['chat', 'embed', 'rerank']);
  });

  it('requires an endpoint and model', async () => {
    const err = await invokeAction(findAction(openaiCompatiblePlugin, 'chat'), actionContext({ prompt: 'hi' })).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(InvokeAuthorizationError);
  });

  it('reads credentials from the environment', async () => {
    mockFetch.mockResolvedValueOnce(mockJson({ choices: [{ message: { content: 'hello' }, finish_reason: 'stop' }] }));

    await invokeAction(
      findAction(openaiCompatiblePlugin, 'chat'),
      actionContext({ prompt: 'hi' }, {}, { OPENAI_COMPATIBLE_BASE_URL: 'https://env.test/v1', OPENAI_COMPATIBLE_MODEL: 'env-model' })
    );

    expect(mockFetch.mock.calls[0][0]).toBe('https://env.test/v1/chat/completions');
    expect(JSON.parse(mockFetch.mock.calls[0][1].body).model).toBe('env-model');
  });

  it('chat puts the system prompt first and returns the reply', async () => {
    mockFetch.mockResolvedValueOnce(
      mockJson({
        choices: [{ message: { content: 'hello' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 2, completion_tokens: 1, total_tokens: 3 },
      })
    );

    const result = await invokeAction(
      findAction(openaiCompatiblePlugin, 'chat'),
      actionContext({ prompt: 'hi', system: 'be brief' }, credentials)
    );

    expect(result).toEqual([
      { type: 'text', text: 'hello' },
      {
        type: 'json',
        json: { usage: { promptTokens: 2, completionTokens: 1, totalTokens: 3 }, finish_reason: 'stop' },
      },
    ]);
    expect(JSON.parse(mockFetch.mock.calls[0][1].body).messages).toEqual([
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'hi' },
    ]);
  });

  it('rejects an empty prompt', async () => {
    const err = await invokeAction(
      findAction(openaiCompatiblePlugin, 'chat'),
      actionContext({ prompt: '' }, credentials)
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InvokeBadRequestError);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('embed returns the vectors', async () => {
    mockFetch.mockResolvedValueOnce(mockJson({ data: [{ index: 0, embedding: [1, 2] }] }));

    const result = await invokeAction(
      findAction(openaiCompatiblePlugin, 'embed'),
      actionContext({ texts: ['one'] }, credentials)
    );

    expect(result).toEqual([{ type: 'json', json: { embeddings: [[1, 2]], usage: null } }]);
  });

  it('rerank passes topN and threshold through', async () => {
    mockFetch.mockResolvedValueOnce(
      mockJson({
        results: [
          { index: 0, relevance_score: 0.1 },
          { index: 1, relevance_score: 0.8 },
        ],
      })
    );

    const result = await invokeAction(
      findAction(openaiCompatiblePlugin, 'rerank'),
      actionContext({ query: 'q', documents: ['x', 'y'], top_n: 1, score_threshold: 0.5 }, credentials)
    );

    expect(result).toEqual([{ type: 'json', json: { docs: [{ index: 1, score: 0.8, text: 'y' }] } }]);
  });
});
