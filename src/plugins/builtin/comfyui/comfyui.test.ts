import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import comfyuiPlugin from './index.js';
import { ComfyUIClient, mimeTypeFor } from './client.js';
import { invokeAction } from '../../sdk/runner.js';
import { InvokeBadRequestError, InvokeError, InvokeServerUnavailableError } from '../../../errors/index.js';
import { mockJson, mockText } from '../../../testing/http.js';
import { actionContext, findAction } from '../../../testing/plugins.js';

const BASE_URL = 'http://comfy.test:8188';

const finished = {
  p1: {
    outputs: {
      '9': { images: [{ filename: 'ComfyUI_00001_.png', subfolder: '', type: 'output' }] },
    },
    status: { status_str: 'success', completed: true },
  },
};

describe('ComfyUI', () => {
  const mockFetch = vi.fn();
  const originalFetch = global.fetch;

  beforeEach(() => {
    global.fetch = mockFetch;
    mockFetch.mockReset();
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('guesses image mime types from the extension', () => {
    expect(mimeTypeFor('out.PNG')).toBe('image/png');
    expect(mimeTypeFor('clip.webm')).toBe('video/webm');
    expect(mimeTypeFor('latent')).toBe('application/octet-stream');
  });

  describe('ComfyUIClient', () => {
    it('queues a prompt', async () => {
      mockFetch.mockResolvedValueOnce(mockJson({ prompt_id: 'p1', number: 1 }));
      const client = new ComfyUIClient(`${BASE_URL}/`, { apiKey: 'test-key' });

      const promptId = await client.queuePrompt({ '1': { class_type: 'KSampler', inputs: {} } }, 'client-1');

      expect(promptId).toBe('p1');
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('http://comfy.test:8188/prompt');
      expect(init.headers.Authorization).toBe('Bearer test-key');
      expect(JSON.parse(init.body)).toEqual({
        client_id: 'client-1',
        prompt: { '1': { class_type: 'KSampler', inputs: {} } },
      });
    });

    it('reports validation failures', async () => {
      mockFetch.mockResolvedValueOnce(
        mockJson({ error: { type: 'prompt_outputs_failed_validation', message: 'Prompt outputs failed validation' } }, 400)
      );

      const error = await new ComfyUIClient(BASE_URL).queuePrompt({}).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InvokeBadRequestError);
      expect(error).toMatchObject({ message: 'Error queuing the prompt: Prompt outputs failed validation' });
    });

    it('queues a prompt only once when the server answers 503', async () => {
      mockFetch
        .mockResolvedValueOnce(mockJson({ error: { message: 'busy' } }, 503, { 'retry-after': '0' }))
        .mockResolvedValueOnce(mockJson({ prompt_id: 'p1' }));

      const error = await new ComfyUIClient(BASE_URL).queuePrompt({}).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InvokeServerUnavailableError);
      expect(error).toMatchObject({ message: 'Error queuing the prompt: busy' });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('polls history until the prompt has outputs', async () => {
      const sleep = vi.fn().mockResolvedValue(undefined);
      mockFetch.mockResolvedValueOnce(mockJson({})).mockResolvedValueOnce(mockJson(finished));
      const client = new ComfyUIClient(BASE_URL, { poll: { intervalMs: 5, sleep } });

      const refs = await client.waitForOutputs('p1');

      expect(refs).toEqual([{ filename: 'ComfyUI_00001_.png', subfolder: '', type: 'output' }]);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(5);
      expect(mockFetch.mock.calls[1][0]).toBe('http://comfy.test:8188/history/p1');
    });

    it('fails when the prompt errored', async () => {
      mockFetch.mockResolvedValueOnce(mockJson({ p1: { outputs: {}, status: { status_str: 'error' } } }));

      await expect(new ComfyUIClient(BASE_URL).waitForOutputs('p1')).rejects.toThrow(
        'ComfyUI failed to run prompt p1'
      );
    });

    it('gives up after the poll budget', async () => {
      mockFetch.mockImplementation(async () => mockJson({}));
      const client = new ComfyUIClient(BASE_URL, { poll: { maxAttempts: 2, sleep: vi.fn().mockResolvedValue(undefined) } });

      await expect(client.waitForOutputs('p1')).rejects.toBeInstanceOf(InvokeError);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('does not repeat a failed history read', async () => {
      mockFetch.mockResolvedValueOnce(mockText('bad gateway', 502)).mockResolvedValueOnce(mockJson(finished));

      const error = await new ComfyUIClient(BASE_URL).getHistory('p1').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InvokeServerUnavailableError);
      expect(error).toMatchObject({ message: 'Failed to read ComfyUI history (502)' });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('downloads images from /view', async () => {
      mockFetch.mockResolvedValueOnce(mockText('png-bytes'));

      const data = await new ComfyUIClient(BASE_URL).fetchImage({ filename: 'a b.png', subfolder: '', type: 'output' });

      expect(data.toString()).toBe('png-bytes');
      expect(mockFetch.mock.calls[0][0]).toBe('http://comfy.test:8188/view?filename=a+b.png&subfolder=&type=output');
    });
  });

  describe('txt2img', () => {
    it('fills the template and returns the images as blobs', async () => {
      mockFetch
        .mockResolvedValueOnce(mockJson({ prompt_id: 'p1' }))
        .mockResolvedValueOnce(mockJson(finished))
        .mockResolvedValueOnce(mockText('png-bytes'));

      const result = await invokeAction(
        findAction(comfyuiPlugin, 'txt2img'),
        actionContext(
          {
            prompt: 'a lighthouse at dusk',
            model: 'sdxl.safetensors',
            width: 768,
            seed: 42,
            lora_names: 'detail, style',
            lora_strengths: '0.5',
          },
          { base_url: BASE_URL }
        )
      );

      expect(result).toEqual([
        { type: 'blob', blob: Buffer.from('png-bytes'), meta: { mimeType: 'image/png', filename: 'ComfyUI_00001_.png' } },
      ]);

      const { prompt } = JSON.parse(mockFetch.mock.calls[0][1].body);
      expect(prompt['4'].inputs.ckpt_name).toBe('sdxl.safetensors');
      expect(prompt['6'].inputs.text).toBe('a lighthouse at dusk');
      expect(prompt['7'].inputs.text).toBe('bad art, ugly, deformed, watermark, duplicated, discontinuous lines');
      expect(prompt['5'].inputs).toEqual({ width: 768, height: 1024, batch_size: 1 });
      expect(prompt['3'].inputs).toMatchObject({ seed: 42, steps: 20, cfg: 7, sampler_name: 'euler', model: ['11', 0] });
      expect(prompt['10'].inputs).toMatchObject({ lora_name: 'detail', strength_model: 0.5 });
      expect(prompt['11'].inputs).toMatchObject({ lora_name: 'style', strength_model: 1 });
    });

    it('requires a base url', async () => {
      await expect(
        invokeAction(findAction(comfyuiPlugin, 'txt2img'), actionContext({ prompt: 'x', model: 'm' }))
      ).rejects.toMatchObject({ name: 'InvokeAuthorizationError' });
    });
  });

  describe('run_workflow', () => {
    it('randomizes seeds before queuing', async () => {
      mockFetch
        .mockResolvedValueOnce(mockJson({ prompt_id: 'p1' }))
        .mockResolvedValueOnce(mockJson({ p1: { outputs: {} } }));

      const result = await invokeAction(
        findAction(comfyuiPlugin, 'run_workflow'),
        actionContext(
          { workflow_json: '{"1":{"inputs":{"seed":5},"class_type":"KSampler"}}', randomize_seed: true },
          { base_url: BASE_URL }
        )
      );

      expect(result).toEqual([]);
      const seed = JSON.parse(mockFetch.mock.calls[0][1].body).prompt['1'].inputs.seed;
      expect(String(seed)).toHaveLength(15);
    });

    it('rejects invalid workflow JSON', async () => {
      await expect(
        invokeAction(
          findAction(comfyuiPlugin, 'run_workflow'),
          actionContext({ workflow_json: '{not json' }, { base_url: BASE_URL })
        )
      ).rejects.toThrow(/^Invalid workflow JSON: /);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });
});
