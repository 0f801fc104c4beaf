import { randomUUID } from 'node:crypto';
import { InvokeBadRequestError, InvokeError, invokeErrorFromStatus } from '../../../errors/index.js';
import { fetchWithTimeout, pollUntil, readJsonObject, type PollOptions } from '../../../http/index.js';
import { asRecord, asString } from '../../sdk/values.js';

export interface ComfyUIImageRef {
  filename: string;
  subfolder: string;
  type: string;
}

export interface GeneratedImage {
  data: Buffer;
  filename: string;
  mimeType: string;
}

export interface ComfyUIClientOptions {
  apiKey?: string;
  poll?: PollOptions;
}

const MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
  mp4: 'video/mp4',
  webm: 'video/webm',
};

export function mimeTypeFor(filename: string): string {
  const ext = filename.split('.').pop()?.toLowerCase() ?? '';
  return MIME_TYPES[ext] ?? 'application/octet-stream';
}

function imageRefs(outputs: Record<string, unknown>): ComfyUIImageRef[] {
  const refs: ComfyUIImageRef[] = [];
  for (const output of Object.values(outputs)) {
    const images = asRecord(output).images;
    if (!Array.isArray(images)) continue;
    for (const item of images) {
      const image = asRecord(item);
      const filename = asString(image.filename);
      if (!filename) continue;
      refs.push({ filename, subfolder: asString(image.subfolder) ?? '', type: asString(image.type) ?? 'output' });
    }
  }
  return refs;
}

/**
 * HTTP client for a ComfyUI server. Completion is detected by polling
 * `/history/{promptId}`; the server only writes history once a prompt has run.
 */
export class ComfyUIClient {
  private baseUrl: string;
  private apiKey?: string;
  private poll: PollOptions;

  constructor(baseUrl: string, options: ComfyUIClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.poll = { intervalMs: 1000, maxAttempts: 300, ...options.poll };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  async queuePrompt(prompt: Record<string, unknown>, clientId: string = randomUUID()): Promise<string> {
    const response = await fetchWithTimeout(`${this.baseUrl}/prompt`, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({ client_id: clientId, prompt }),
    });

    const body = await readJsonObject(response);
    if (!response.ok) {
      const detail = asString(asRecord(body.error).message) ?? JSON.stringify(body);
      throw invokeErrorFromStatus(response.status, `Error queuing the prompt: ${detail}`);
    }

    const promptId = asString(body.prompt_id);
    if (!promptId) {
      throw new InvokeBadRequestError('Error queuing the prompt. Please check the workflow JSON.');
    }
    return promptId;
  }

  async getHistory(promptId: string): Promise<Record<string, unknown> | undefined> {
    const response = await fetchWithTimeout(`${this.baseUrl}/history/${encodeURIComponent(promptId)}`, {
      headers: this.headers(),
    });
    if (!response.ok) {
      throw invokeErrorFromStatus(response.status, `Failed to read ComfyUI history (${response.status})`);
    }
    const body = await readJsonObject(response);
    const entry = body[promptId];
    return entry === undefined ? undefined : asRecord(entry);
  }

  async waitForOutputs(promptId: string): Promise<ComfyUIImageRef[]> {
    return pollUntil(async () => {
      const entry = await this.getHistory(promptId);
      if (!entry) return undefined;

      const status = asRecord(entry.status);
      if (status.status_str === 'error') {
        throw new InvokeError(`ComfyUI failed to run prompt ${promptId}`);
      }
      return imageRefs(asRecord(entry.outputs));
    }, this.poll);
  }

  async fetchImage(image: ComfyUIImageRef): Promise<Buffer> {
    const params = new URLSearchParams({ filename: image.filename, subfolder: image.subfolder, type: image.type });
    const response = await fetchWithTimeout(`${this.baseUrl}/view?${params}`, { headers: this.headers() });
    if (!response.ok) {
      throw invokeErrorFromStatus(response.status, `Failed to download ${image.filename} (${response.status})`);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  async generate(prompt: Record<string, unknown>): Promise<GeneratedImage[]> {
    const promptId = await this.queuePrompt(prompt);
    const refs = await this.waitForOutputs(promptId);

    const images: GeneratedImage[] = [];
    for (const ref of refs) {
      images.push({ data: await this.fetchImage(ref), filename: ref.filename, mimeType: mimeTypeFor(ref.filename) });
    }
    return images;
  }
}
