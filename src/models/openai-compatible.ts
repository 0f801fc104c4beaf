import {
  CredentialsValidateFailedError,
  InvokeError,
  errorMessage,
  invokeErrorFromStatus,
  toInvokeError,
} from '../errors/index.js';
import { fetchWithTimeout, readJsonObject, tryParseJson, vendorErrorMessage } from '../http/index.js';
import { asRecord, asString, isRecord } from '../plugins/sdk/values.js';

export interface ModelCredentials {
  /** Base URL ending before `/chat/completions`, e.g. `https://host/v1`. */
  endpointUrl: string;
  apiKey?: string;
  model: string;
  /** Name sent on the wire when the endpoint knows the model by another name. */
  endpointModelName?: string;
  timeoutMs?: number;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

export type ChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: ToolCall[] }
  | { role: 'tool'; content: string; toolCallId: string };

export interface ToolSpec {
  name: string;
  description?: string;
  parameters: Record<string, unknown>;
}

export interface ChatRequest {
  messages: ChatMessage[];
  tools?: ToolSpec[];
  temperature?: number;
  maxTokens?: number;
  stop?: string[];
}

export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatResult {
  content: string;
  toolCalls: ToolCall[];
  usage?: Usage;
  finishReason?: string;
}

export interface ChatChunk {
  delta: string;
  toolCalls?: ToolCall[];
  finishReason?: string;
  usage?: Usage;
}

export interface EmbeddingResult {
  embeddings: number[][];
  usage?: Usage;
}

export interface RerankDocument {
  index: number;
  score: number;
  text: string;
}

export interface RerankOptions {
  topN?: number;
  scoreThreshold?: number;
}

function toWireMessage(message: ChatMessage): Record<string, unknown> {
  switch (message.role) {
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        ...(message.toolCalls?.length
          ? {
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: 'function',
                function: { name: call.name, arguments: call.arguments },
              })),
            }
          : {}),
      };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
    default:
      return { role: message.role, content: message.content };
  }
}

function parseUsage(value: unknown): Usage | undefined {
  if (!isRecord(value)) return undefined;
  const num = (v: unknown) => (typeof v === 'number' ? v : 0);
  return {
    promptTokens: num(value.prompt_tokens),
    completionTokens: num(value.completion_tokens),
    totalTokens: num(value.total_tokens),
  };
}

function parseToolCalls(value: unknown): ToolCall[] {
  if (!Array.isArray(value)) return [];
  return value.map((item) => {
    const call = asRecord(item);
    const fn = asRecord(call.function);
    return { id: asString(call.id) ?? '', name: asString(fn.name) ?? '', arguments: asString(fn.arguments) ?? '' };
  });
}

/** Accumulates streamed tool call fragments, keyed by their `index`. */
class ToolCallBuffer {
  private calls = new Map<number, ToolCall>();

  add(fragments: unknown): void {
    if (!Array.isArray(fragments)) return;
    for (const item of fragments) {
      const fragment = asRecord(item);
      const index = typeof fragment.index === 'number' ? fragment.index : this.calls.size;
      const fn = asRecord(fragment.function);
      const call = this.calls.get(index) ?? { id: '', name: '', arguments: '' };
      call.id = asString(fragment.id) ?? call.id;
      call.name += asString(fn.name) ?? '';
      call.arguments += asString(fn.arguments) ?? '';
      this.calls.set(index, call);
    }
  }

  drain(): ToolCall[] | undefined {
    if (this.calls.size === 0) return undefined;
    const calls = [...this.calls.entries()].sort(([a], [b]) => a - b).map(([, call]) => call);
    this.calls.clear();
    return calls;
  }
}

/**
 * Client for any endpoint speaking the OpenAI chat, embeddings and rerank
 * wire formats (vLLM, LocalAI, Ollama's /v1, hosted gateways).
 */
export class OpenAICompatibleModel {
  private baseUrl: string;

  constructor(private credentials: ModelCredentials) {
    this.baseUrl = credentials.endpointUrl.replace(/\/+$/, '');
  }

  get modelName(): string {
    return this.credentials.endpointModelName || this.credentials.model;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.credentials.apiKey) {
      headers.Authorization = `Bearer ${this.credentials.apiKey}`;
    }
    return headers;
  }

  private async post(path: string, body: Record<string, unknown>): Promise<Response> {
    let response: Response;
    try {
      response = await fetchWithTimeout(
        `${this.baseUrl}${path}`,
        { method: 'POST', headers: this.headers(), body: JSON.stringify(body) },
        this.credentials.timeoutMs ?? 60_000
      );
    } catch (err) {
      throw toInvokeError(err);
    }

    if (!response.ok) {
      const text = await response.text();
      const parsed = tryParseJson(text);
      const message = vendorErrorMessage(isRecord(parsed) ? parsed : {}, text.slice(0, 300) || response.statusText);
      throw invokeErrorFromStatus(response.status, `Model endpoint error (${response.status}): ${message}`);
    }
    return response;
  }

  private chatBody(request: ChatRequest, stream: boolean): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.modelName,
      messages: request.messages.map(toWireMessage),
      stream,
    };
    if (stream) body.stream_options = { include_usage: true };
    if (request.tools?.length) {
      body.tools = request.tools.map((tool) => ({
        type: 'function',
        function: { name: tool.name, description: tool.description, parameters: tool.parameters },
      }));
    }
    if (request.temperature !== undefined) body.temperature = request.temperature;
    if (request.maxTokens !== undefined) body.max_tokens = request.maxTokens;
    if (request.stop?.length) body.stop = request.stop;
    return body;
  }

  async chat(request: ChatRequest): Promise<ChatResult> {
    const response = await this.post('/chat/completions', this.chatBody(request, false));
    const body = await readJsonObject(response);

    const choice = asRecord(Array.isArray(body.choices) ? body.choices[0] : undefined);
    const message = asRecord(choice.message);
    return {
      content: asString(message.content) ?? '',
      toolCalls: parseToolCalls(message.tool_calls),
      usage: parseUsage(body.usage),
      finishReason: asString(choice.finish_reason),
    };
  }

  async *chatStream(request: ChatRequest): AsyncGenerator<ChatChunk> {
    const response = await this.post('/chat/completions', this.chatBody(request, true));
    const reader = response.body?.getReader();
    if (!reader) {
      throw new InvokeError('No response body from model endpoint');
    }

    const decoder = new TextDecoder();
    const toolCalls = new ToolCallBuffer();
    let buffer = '';

    try {
      while (true) {
        const { done, value } = await reader.read();
        buffer += done ? decoder.decode() : decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        // At end of stream the last line is complete even without a newline
        buffer = done ? '' : (lines.pop() ?? '');

        for (const line of lines) {
          const trimmed = line.trim();
          if (!trimmed.startsWith('data:')) continue;
          const data = trimmed.slice(5).trim();
          if (data === '[DONE]') {
            const pending = toolCalls.drain();
            if (pending) yield { delta: '', toolCalls: pending };
            return;
          }

          const event = tryParseJson(data);
          if (!isRecord(event)) {
            throw new InvokeError(`Malformed stream chunk from model endpoint: ${data.slice(0, 200)}`);
          }

          const usage = parseUsage(event.usage);
          const choice = asRecord(Array.isArray(event.choices) ? event.choices[0] : undefined);
          const delta = asRecord(choice.delta);
          toolCalls.add(delta.tool_calls);

          const content = asString(delta.content) ?? '';
          const finishReason = asString(choice.finish_reason);
          if (finishReason) {
            yield { delta: content, toolCalls: toolCalls.drain(), finishReason, usage };
          } else if (content || usage) {
            yield { delta: content, usage };
          }
        }

        if (done) break;
      }
    } finally {
      // Also runs when the consumer stops iterating early
      await reader.cancel();
    }

    const pending = toolCalls.drain();
    if (pending) yield { delta: '', toolCalls: pending };
  }

  async embed(texts: string[]): Promise<EmbeddingResult> {
    const response = await this.post('/embeddings', { model: this.modelName, input: texts, encoding_format: 'float' });
    const body = await readJsonObject(response);

    const data = Array.isArray(body.data) ? body.data.map(asRecord) : [];
    const embeddings = data
      .map((item, position) => ({
        index: typeof item.index === 'number' ? item.index : position,
        vector: Array.isArray(item.embedding) ? item.embedding.filter((n): n is number => typeof n === 'number') : [],
      }))
      .sort((a, b) => a.index - b.index)
      .map((item) => item.vector);

    return { embeddings, usage: parseUsage(body.usage) };
  }

  async rerank(query: string, docs: string[], options: RerankOptions = {}): Promise<RerankDocument[]> {
    if (docs.length === 0) return [];

    const response = await this.post('/rerank', {
      model: this.modelName,
      query,
      documents: docs,
      top_n: options.topN ?? docs.length,
    });
    const body = await readJsonObject(response);

    const results: RerankDocument[] = [];
    for (const item of Array.isArray(body.results) ? body.results : []) {
      const result = asRecord(item);
      const index = typeof result.index === 'number' ? result.index : 0;
      const text = docs[index];
      if (index < 0 || text === undefined) continue;
      results.push({ index, score: typeof result.relevance_score === 'number' ? result.relevance_score : 0, text });
    }

    results.sort((a, b) => b.score - a.score);
    const threshold = options.scoreThreshold;
    const kept = threshold === undefined ? results : results.filter((doc) => doc.score >= threshold);
    return options.topN ? kept.slice(0, options.topN) : kept;
  }

  async validateCredentials(): Promise<void> {
    try {
      await this.chat({ messages: [{ role: 'user', content: 'ping' }], maxTokens: 5 });
    } catch (err) {
      throw new CredentialsValidateFailedError(errorMessage(err), err instanceof Error ? err : undefined);
    }
  }
}
