import { z } from 'zod';
import { definePlugin, defineAction } from '../../sdk/types.js';
import { invokeErrorFromStatus } from '../../../errors/index.js';
import { OpenAICompatibleModel, type ChatMessage } from '../../../models/openai-compatible.js';
import { jsonMessage, textMessage, type ActionContext } from '../../../types/index.js';

function getModel(ctx: ActionContext): OpenAICompatibleModel {
  const endpointUrl = ctx.credentials.endpoint_url ?? ctx.env.OPENAI_COMPATIBLE_BASE_URL;
  const model = ctx.credentials.model ?? ctx.env.OPENAI_COMPATIBLE_MODEL;
  if (!endpointUrl || !model) {
    throw invokeErrorFromStatus(
      401,
      'Model credentials required: endpoint_url and model (or OPENAI_COMPATIBLE_BASE_URL, OPENAI_COMPATIBLE_MODEL).'
    );
  }

  return new OpenAICompatibleModel({
    endpointUrl,
    model,
    apiKey: ctx.credentials.api_key ?? ctx.env.OPENAI_COMPATIBLE_API_KEY,
    endpointModelName: ctx.credentials.endpoint_model_name,
  });
}

const chatSchema = z.object({
  prompt: z.string().min(1),
  system: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
});

const embedSchema = z.object({
  texts: z.array(z.string()).min(1),
});

const rerankSchema = z.object({
  query: z.string().min(1),
  documents: z.array(z.string()),
  top_n: z.number().int().positive().optional(),
  score_threshold: z.number().optional(),
});

export default definePlugin({
  name: 'openai_compatible',
  version: '1.0.0',
  description: 'Chat, embeddings and rerank against any OpenAI-compatible endpoint',

  actions: [
    defineAction({
      name: 'chat',
      description: 'Send a prompt to the model and return its reply',
      schema: chatSchema,
      async execute(ctx) {
        const model = getModel(ctx);
        const params = chatSchema.parse(ctx.config);

        const messages: ChatMessage[] = [];
        if (params.system) messages.push({ role: 'system', content: params.system });
        messages.push({ role: 'user', content: params.prompt });

        const result = await model.chat({
          messages,
          temperature: params.temperature,
          maxTokens: params.max_tokens,
        });
        ctx.log(`Model ${model.modelName} finished: ${result.finishReason ?? 'unknown'}`);

        return [
          textMessage(result.content),
          jsonMessage({ usage: result.usage ?? null, finish_reason: result.finishReason ?? null }),
        ];
      },
    }),

    defineAction({
      name: 'embed',
      description: 'Embed one or more texts',
      schema: embedSchema,
      async execute(ctx) {
        const { texts } = embedSchema.parse(ctx.config);
        const result = await getModel(ctx).embed(texts);
        return [jsonMessage({ embeddings: result.embeddings, usage: result.usage ?? null })];
      },
    }),

    defineAction({
      name: 'rerank',
      description: 'Order documents by relevance to a query',
      schema: rerankSchema,
      async execute(ctx) {
        const params = rerankSchema.parse(ctx.config);
        const docs = await getModel(ctx).rerank(params.query, params.documents, {
          topN: params.top_n,
          scoreThreshold: params.score_threshold,
        });
        return [jsonMessage({ docs })];
      },
    }),
  ],
});
