import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { definePlugin, defineAction } from '../../sdk/types.js';
import { InvokeBadRequestError, errorMessage, invokeErrorFromStatus } from '../../../errors/index.js';
import { splitCsv } from '../../sdk/values.js';
import { blobMessage, type ActionContext, type ToolMessage } from '../../../types/index.js';
import { ComfyUIClient, type GeneratedImage } from './client.js';
import { ComfyUIWorkflow, randomSeed } from './workflow.js';

// workflows/ sits at the package root, four levels above this module in both src/ and dist/
const TXT2IMG_TEMPLATE = new URL('../../../../workflows/txt2img.json', import.meta.url);

export async function loadTxt2ImgWorkflow(): Promise<ComfyUIWorkflow> {
  return new ComfyUIWorkflow(await readFile(TXT2IMG_TEMPLATE, 'utf8'));
}

function getClient(ctx: ActionContext): ComfyUIClient {
  const baseUrl = ctx.credentials.base_url ?? ctx.env.COMFYUI_BASE_URL;
  if (!baseUrl) {
    throw invokeErrorFromStatus(401, 'ComfyUI base_url required. Set COMFYUI_BASE_URL or pass the base_url credential.');
  }
  return new ComfyUIClient(baseUrl, { apiKey: ctx.credentials.api_key ?? ctx.env.COMFYUI_API_KEY });
}

function toMessages(images: GeneratedImage[]): ToolMessage[] {
  return images.map((image) => blobMessage(image.data, image.mimeType, image.filename));
}

const runWorkflowSchema = z.object({
  workflow_json: z.string().min(1),
  randomize_seed: z.boolean().default(false),
  image_names: z.string().optional(),
  image_ids: z.string().optional(),
});

const txt2imgSchema = z.object({
  prompt: z.string().min(1),
  negative_prompt: z.string().default('bad art, ugly, deformed, watermark, duplicated, discontinuous lines'),
  model: z.string().min(1),
  steps: z.number().int().min(1).max(150).default(20),
  width: z.number().int().min(64).max(4096).default(1024),
  height: z.number().int().min(64).max(4096).default(1024),
  cfg: z.number().default(7),
  sampler_name: z.string().default('euler'),
  scheduler: z.string().default('normal'),
  seed: z.number().int().nonnegative().optional(),
  lora_names: z.string().optional(),
  lora_strengths: z.string().optional(),
  flux_guidance: z.number().optional(),
});

export default definePlugin({
  name: 'comfyui',
  version: '1.0.0',
  description: 'Run ComfyUI workflows and text-to-image generation',

  actions: [
    defineAction({
      name: 'run_workflow',
      description: 'Queue an API-format ComfyUI workflow and return its output images',
      schema: runWorkflowSchema,
      async execute(ctx) {
        const client = getClient(ctx);
        const params = runWorkflowSchema.parse(ctx.config);

        let workflow: ComfyUIWorkflow;
        try {
          workflow = new ComfyUIWorkflow(params.workflow_json);
        } catch (err) {
          throw new InvokeBadRequestError(`Invalid workflow JSON: ${errorMessage(err)}`);
        }

        const imageNames = splitCsv(params.image_names);
        if (imageNames.length > 0) {
          const ids = params.image_ids ? splitCsv(params.image_ids) : undefined;
          try {
            workflow.setImageNames(imageNames, ids);
          } catch (err) {
            throw new InvokeBadRequestError(`The image node list does not match the images: ${errorMessage(err)}`);
          }
        }

        if (params.randomize_seed) {
          workflow.randomizeSeed();
        }

        ctx.log('Queuing ComfyUI workflow');
        return toMessages(await client.generate(workflow.toJSON()));
      },
    }),

    defineAction({
      name: 'txt2img',
      description: 'Generate images from a prompt with one checkpoint and optional LoRAs',
      schema: txt2imgSchema,
      async execute(ctx) {
        const client = getClient(ctx);
        const params = txt2imgSchema.parse(ctx.config);
        const workflow = await loadTxt2ImgWorkflow();

        const sampler = workflow.identifyNodeByClassType('KSampler');
        const positive = workflow.inputSource(sampler, 'inputs/positive');
        const negative = workflow.inputSource(sampler, 'inputs/negative');

        workflow.setModelLoader(undefined, params.model);
        workflow.setPrompt(positive, params.prompt);
        workflow.setPrompt(negative, params.negative_prompt);
        workflow.setEmptyLatentImage(undefined, params.width, params.height);
        workflow.setKSampler(sampler, {
          steps: params.steps,
          samplerName: params.sampler_name,
          scheduler: params.scheduler,
          cfg: params.cfg,
          denoise: 1,
          seed: params.seed ?? randomSeed(),
        });

        const strengths = splitCsv(params.lora_strengths).map(Number);
        splitCsv(params.lora_names).forEach((name, index) => {
          const strength = strengths[index];
          workflow.addLoraNode(sampler, positive, negative, name, Number.isFinite(strength) ? strength : 1);
        });

        if (params.flux_guidance !== undefined) {
          workflow.addFluxGuidance(sampler, params.flux_guidance);
        }

        ctx.log(`Generating ${params.width}x${params.height} image with ${params.model}`);
        return toMessages(await client.generate(workflow.toJSON()));
      },
    }),
  ],
});
