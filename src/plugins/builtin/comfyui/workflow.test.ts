import { describe, it, expect, beforeEach } from 'vitest';
import { ComfyUIWorkflow, randomSeed } from './workflow.js';
import { loadTxt2ImgWorkflow } from './index.js';

describe('ComfyUIWorkflow', () => {
  let workflow: ComfyUIWorkflow;

  beforeEach(async () => {
    workflow = await loadTxt2ImgWorkflow();
  });

  it('reads nested properties', () => {
    expect(workflow.getProperty('3', 'inputs/steps')).toBe(20);
    expect(workflow.getClassType('4')).toBe('CheckpointLoaderSimple');
    expect(workflow.getProperty('3', 'inputs/missing')).toBeNull();
    expect(workflow.getProperty('99', 'inputs/seed')).toBeNull();
  });

  it('only creates intermediate properties when allowed', () => {
    expect(() => workflow.setProperty('3', 'inputs/extra/deep', 1)).toThrow('Cannot create a new property.');

    workflow.setProperty('3', 'inputs/extra/deep', 1, true);
    expect(workflow.getProperty('3', 'inputs/extra/deep')).toBe(1);
  });

  it('identifies a single node by class type', () => {
    expect(workflow.identifyNodeByClassType('KSampler')).toBe('3');
    expect(workflow.getNodeIdsByClassType('CLIPTextEncode')).toEqual(['6', '7']);
    expect(() => workflow.identifyNodeByClassType('CLIPTextEncode')).toThrow(
      "There are some nodes with the class_name 'CLIPTextEncode'."
    );
    expect(() => workflow.identifyNodeByClassType('LoadImage')).toThrow(
      "There are no nodes with the class_name 'LoadImage'."
    );
  });

  it('checks the class of an explicit node id', () => {
    expect(() => workflow.setPrompt('3', 'a cat')).toThrow('Node 3 is not CLIPTextEncode');
  });

  it('randomizes seeds to fifteen digits', () => {
    workflow.randomizeSeed(() => 0);
    expect(workflow.getProperty('3', 'inputs/seed')).toBe(100_000_000_000_000);

    expect(randomSeed(() => 0.999999)).toBe(999_999_100_000_000);
  });

  it('sets sampler, latent and checkpoint inputs', () => {
    workflow.setKSampler(undefined, { steps: 30, samplerName: 'dpmpp_2m', scheduler: 'karras', cfg: 5, denoise: 1, seed: 7 });
    workflow.setEmptyLatentImage(undefined, 768, 512, 2);
    workflow.setModelLoader(undefined, 'sdxl.safetensors');

    const json = workflow.toJSON();
    expect(json['3']).toMatchObject({
      inputs: { steps: 30, sampler_name: 'dpmpp_2m', scheduler: 'karras', cfg: 5, denoise: 1, seed: 7 },
    });
    expect(json['5']).toMatchObject({ inputs: { width: 768, height: 512, batch_size: 2 } });
    expect(json['4']).toMatchObject({ inputs: { ckpt_name: 'sdxl.safetensors' } });
  });

  it('chains LoRA loaders in front of the sampler and encoders', () => {
    expect(workflow.addLoraNode('3', '6', '7', 'detail', 0.5)).toBe('10');
    expect(workflow.addLoraNode('3', '6', '7', 'style')).toBe('11');

    const json = workflow.toJSON();
    expect(json['10']).toMatchObject({
      class_type: 'LoraLoader',
      inputs: { lora_name: 'detail', strength_model: 0.5, strength_clip: 1, model: ['4', 0], clip: ['4', 1] },
    });
    expect(json['11']).toMatchObject({ inputs: { lora_name: 'style', model: ['10', 0], clip: ['10', 1] } });
    expect(workflow.getProperty('3', 'inputs/model')).toEqual(['11', 0]);
    expect(workflow.getProperty('6', 'inputs/clip')).toEqual(['11', 1]);
    expect(workflow.getProperty('7', 'inputs/clip')).toEqual(['11', 1]);
  });

  it('routes positive conditioning through FluxGuidance', () => {
    expect(workflow.addFluxGuidance('3', 3.5)).toBe('10');

    expect(workflow.toJSON()['10']).toMatchObject({
      class_type: 'FluxGuidance',
      inputs: { guidance: 3.5, conditioning: ['6', 0] },
    });
    expect(workflow.getProperty('3', 'inputs/positive')).toEqual(['10', 0]);
  });

  it('assigns image names to LoadImage nodes in order', () => {
    const images = new ComfyUIWorkflow({
      '1': { inputs: { image: '' }, class_type: 'LoadImage' },
      '2': { inputs: { image: '' }, class_type: 'LoadImage' },
    });

    images.setImageNames(['a.png', 'b.png']);
    expect(images.getProperty('2', 'inputs/image')).toBe('b.png');

    images.setImageNames(['c.png'], ['2']);
    expect(images.getProperty('2', 'inputs/image')).toBe('c.png');

    expect(() => images.setImageNames(['d.png'])).toThrow('The image node list does not match the uploaded images.');
  });
});
