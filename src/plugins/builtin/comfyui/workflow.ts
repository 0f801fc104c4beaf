import { isRecord } from '../../sdk/values.js';

type Json = Record<string, unknown>;

export interface KSamplerSettings {
  steps: number;
  samplerName: string;
  scheduler: string;
  cfg: number;
  denoise: number;
  seed: number;
}

function loraNode(): Json {
  return {
    inputs: { lora_name: '', strength_model: 1, strength_clip: 1, model: ['11', 0], clip: ['11', 1] },
    class_type: 'LoraLoader',
    _meta: { title: 'Load LoRA' },
  };
}

function fluxGuidanceNode(): Json {
  return {
    inputs: { guidance: 3.5, conditioning: ['6', 0] },
    class_type: 'FluxGuidance',
    _meta: { title: 'FluxGuidance' },
  };
}

/** A random integer with exactly 15 digits. */
export function randomSeed(random: () => number = Math.random): number {
  return 10 ** 14 + Math.floor(random() * 9 * 10 ** 14);
}

/**
 * A ComfyUI API-format workflow: node ids mapped to `{inputs, class_type}`.
 * Property paths are `/`-separated, e.g. `inputs/seed`.
 */
export class ComfyUIWorkflow {
  private nodes: Json;

  constructor(workflow: string | Json) {
    const parsed: unknown = typeof workflow === 'string' ? JSON.parse(workflow) : structuredClone(workflow);
    if (!isRecord(parsed)) {
      throw new Error('Workflow must be a JSON object of nodes');
    }
    this.nodes = parsed;
  }

  getProperty(nodeId: string, path: string): unknown {
    let current: unknown = this.nodes[nodeId];
    for (const name of path.split('/')) {
      if (!isRecord(current) || !(name in current)) return null;
      current = current[name];
    }
    return current;
  }

  setProperty(nodeId: string, path: string, value: unknown, canCreate = false): void {
    const node = this.nodes[nodeId];
    if (!isRecord(node)) {
      throw new Error(`Node ${nodeId} does not exist`);
    }

    const names = path.split('/');
    const last = names.pop() ?? path;
    let current = node;
    for (const name of names) {
      const next = current[name];
      if (isRecord(next)) {
        current = next;
        continue;
      }
      if (!canCreate || next !== undefined) {
        throw new Error('Cannot create a new property.');
      }
      const created: Json = {};
      current[name] = created;
      current = created;
    }
    current[last] = value;
  }

  getClassType(nodeId: string): string | undefined {
    const value = this.getProperty(nodeId, 'class_type');
    return typeof value === 'string' ? value : undefined;
  }

  getNodeIdsByClassType(classType: string): string[] {
    return Object.keys(this.nodes).filter((id) => this.getClassType(id) === classType);
  }

  identifyNodeByClassType(classType: string): string {
    const ids = this.getNodeIdsByClassType(classType);
    if (ids.length === 0) {
      throw new Error(`There are no nodes with the class_name '${classType}'.`);
    }
    if (ids.length > 1) {
      throw new Error(`There are some nodes with the class_name '${classType}'.`);
    }
    return ids[0];
  }

  randomizeSeed(random: () => number = Math.random): void {
    for (const id of Object.keys(this.nodes)) {
      for (const key of ['seed', 'noise_seed']) {
        const path = `inputs/${key}`;
        if (this.getProperty(id, path) !== null) {
          this.setProperty(id, path, randomSeed(random));
        }
      }
    }
  }

  setImageNames(imageNames: string[], orderedNodeIds?: string[]): void {
    const ids = orderedNodeIds ?? this.getNodeIdsByClassType('LoadImage');
    ids.forEach((id, index) => {
      const name = imageNames[index];
      if (name === undefined) {
        throw new Error('The image node list does not match the uploaded images.');
      }
      this.setProperty(id, 'inputs/image', name);
    });
  }

  setModelLoader(nodeId: string | undefined, ckptName: string): void {
    const id = this.expectClass(nodeId, 'CheckpointLoaderSimple');
    this.setProperty(id, 'inputs/ckpt_name', ckptName);
  }

  setKSampler(nodeId: string | undefined, settings: KSamplerSettings): void {
    const id = this.expectClass(nodeId, 'KSampler');
    this.setProperty(id, 'inputs/steps', settings.steps);
    this.setProperty(id, 'inputs/sampler_name', settings.samplerName);
    this.setProperty(id, 'inputs/scheduler', settings.scheduler);
    this.setProperty(id, 'inputs/cfg', settings.cfg);
    this.setProperty(id, 'inputs/denoise', settings.denoise);
    this.setProperty(id, 'inputs/seed', settings.seed);
  }

  setEmptyLatentImage(nodeId: string | undefined, width: number, height: number, batchSize = 1): void {
    const id = this.expectClass(nodeId, 'EmptyLatentImage');
    this.setProperty(id, 'inputs/width', width);
    this.setProperty(id, 'inputs/height', height);
    this.setProperty(id, 'inputs/batch_size', batchSize);
  }

  setPrompt(nodeId: string | undefined, prompt: string): void {
    const id = this.expectClass(nodeId, 'CLIPTextEncode');
    this.setProperty(id, 'inputs/text', prompt);
  }

  /** The node id an input is wired to, e.g. `inputs/positive` → `"6"`. */
  inputSource(nodeId: string, path: string): string {
    const link = this.getProperty(nodeId, path);
    if (!Array.isArray(link) || typeof link[0] !== 'string') {
      throw new Error(`Node ${nodeId} has no link at ${path}`);
    }
    return link[0];
  }

  /**
   * Insert a LoraLoader between the model/clip sources and the sampler and
   * both prompt encoders. Calling it again chains another LoRA.
   */
  addLoraNode(
    samplerNodeId: string,
    promptNodeId: string,
    negativePromptNodeId: string,
    loraName: string,
    strengthModel = 1,
    strengthClip = 1
  ): string {
    const modelSource = this.inputSource(samplerNodeId, 'inputs/model');
    const clipSource = this.inputSource(promptNodeId, 'inputs/clip');

    const loraId = this.nextNodeId();
    this.nodes[loraId] = loraNode();
    this.setProperty(loraId, 'inputs/lora_name', loraName);
    this.setProperty(loraId, 'inputs/strength_model', strengthModel);
    this.setProperty(loraId, 'inputs/strength_clip', strengthClip);
    this.setProperty(loraId, 'inputs/model', [modelSource, 0]);
    this.setProperty(loraId, 'inputs/clip', [clipSource, 1]);

    this.setProperty(samplerNodeId, 'inputs/model', [loraId, 0]);
    this.setProperty(promptNodeId, 'inputs/clip', [loraId, 1]);
    this.setProperty(negativePromptNodeId, 'inputs/clip', [loraId, 1]);
    return loraId;
  }

  addFluxGuidance(samplerNodeId: string, guidance: number): string {
    const positive = this.inputSource(samplerNodeId, 'inputs/positive');

    const id = this.nextNodeId();
    this.nodes[id] = fluxGuidanceNode();
    this.setProperty(id, 'inputs/guidance', guidance);
    this.setProperty(id, 'inputs/conditioning', [positive, 0]);
    this.setProperty(samplerNodeId, 'inputs/positive', [id, 0]);
    return id;
  }

  toJSON(): Json {
    return this.nodes;
  }

  private nextNodeId(): string {
    const ids = Object.keys(this.nodes)
      .map((id) => Number.parseInt(id, 10))
      .filter((id) => !Number.isNaN(id));
    return String(Math.max(0, ...ids) + 1);
  }

  private expectClass(nodeId: string | undefined, classType: string): string {
    const id = nodeId ?? this.identifyNodeByClassType(classType);
    if (this.getClassType(id) !== classType) {
      throw new Error(`Node ${id} is not ${classType}`);
    }
    return id;
  }
}
