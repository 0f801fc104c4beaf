import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PluginRegistry } from './registry.js';
import { PluginLoader } from './loader.js';
import { definePlugin, defineAction, defineTrigger } from './types.js';
import { loadBuiltinPlugins } from '../loader.js';
import { jsonResponse } from './webhook.js';
import { textMessage } from '../../types/index.js';

function webhookTrigger(name: string) {
  return defineTrigger({
    name,
    subscription: {
      create: async (input) => ({ ...input, properties: {}, expiresAt: -1 }),
      delete: async () => ({ success: true, message: 'removed' }),
      refresh: async (subscription) => subscription,
    },
    dispatch: async () => ({ events: [], response: jsonResponse({ ok: true }) }),
    events: [],
  });
}

describe('PluginRegistry', () => {
  let registry: PluginRegistry;

  beforeEach(() => {
    registry = new PluginRegistry();
  });

  it('should register a plugin', () => {
    const plugin = definePlugin({
      name: 'test-plugin',
      version: '1.0.0',
    });

    registry.register(plugin);

    expect(registry.getPlugin('test-plugin')).toBe(plugin);
    expect(registry.listPlugins()).toHaveLength(1);
  });

  it('should throw when registering duplicate plugin', () => {
    const plugin = definePlugin({
      name: 'test-plugin',
      version: '1.0.0',
    });

    registry.register(plugin);

    expect(() => registry.register(plugin)).toThrow('already registered');
  });

  it('should register and retrieve actions', () => {
    const action = defineAction({
      name: 'greet',
      execute: async (ctx) => [textMessage(`Hello, ${String(ctx.config.name)}`)],
    });

    registry.register(definePlugin({ name: 'greeting', version: '1.0.0', actions: [action] }));

    expect(registry.getAction('greeting.greet')).toBe(action);
  });

  it('should register and retrieve triggers', () => {
    const trigger = webhookTrigger('webhook');

    registry.register(definePlugin({ name: 'vendor', version: '1.0.0', triggers: [trigger] }));

    expect(registry.getTrigger('vendor.webhook')).toBe(trigger);
    expect(registry.listTriggers()).toEqual([{ plugin: 'vendor', qualifiedName: 'vendor.webhook', definition: trigger }]);
  });

  it('should unregister a plugin with its actions', () => {
    registry.register(
      definePlugin({
        name: 'temp-plugin',
        version: '1.0.0',
        actions: [defineAction({ name: 'temp-action', execute: async () => [] })],
      })
    );

    registry.unregister('temp-plugin');

    expect(registry.getPlugin('temp-plugin')).toBeUndefined();
    expect(registry.getAction('temp-plugin.temp-action')).toBeUndefined();
  });

  it('should list all actions with plugin info', () => {
    registry.register(
      definePlugin({
        name: 'multi',
        version: '1.0.0',
        actions: [
          defineAction({ name: 'action1', execute: async () => [] }),
          defineAction({ name: 'action2', execute: async () => [] }),
        ],
      })
    );

    const actions = registry.listActions();
    expect(actions.map((a) => a.qualifiedName)).toEqual(['multi.action1', 'multi.action2']);
    expect(actions.every((a) => a.plugin === 'multi')).toBe(true);
  });

  it('refuses a second plugin carrying the same OAuth provider', () => {
    const oauth = {
      name: 'shared',
      authorizationUrl: () => 'https://auth.test',
      exchangeCode: async () => ({ accessToken: 'a', raw: {} }),
      refresh: async () => ({ accessToken: 'b', raw: {} }),
    };
    registry.register(definePlugin({ name: 'one', version: '1.0.0', oauth }));

    expect(() => registry.register(definePlugin({ name: 'two', version: '1.0.0', oauth }))).toThrow(
      'OAuth provider "shared" is already registered'
    );
    expect(registry.getPlugin('two')).toBeUndefined();
  });
});

describe('loadBuiltinPlugins', () => {
  it('registers every vendor adapter and its OAuth providers', async () => {
    const registry = new PluginRegistry();
    const log = vi.fn();

    const loaded = await loadBuiltinPlugins(registry, log);

    expect(loaded.map((p) => p.name)).toEqual([
      'notion',
      'airtable',
      'zendesk',
      'twilio',
      'wecom',
      'jira',
      'comfyui',
      'microsoft',
      'openai_compatible',
    ]);
    expect(registry.getTrigger('notion.webhook')).toBeDefined();
    expect(registry.getOAuthProvider('microsoft')).toBeDefined();
    expect(registry.getOAuthProvider('airtable')).toBeDefined();
    expect(registry.getOAuthProvider('zendesk')).toBeDefined();
    expect(log).toHaveBeenCalledWith('[plugins] Loaded 9 built-in plugin(s)');
  });

  it('skips plugins that are already registered', async () => {
    const registry = new PluginRegistry();
    await loadBuiltinPlugins(registry, vi.fn());

    expect(await loadBuiltinPlugins(registry, vi.fn())).toEqual([]);
  });
});

describe('PluginLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'conduit-plugins-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns nothing for a missing directory', async () => {
    const loader = new PluginLoader(new PluginRegistry(), vi.fn());
    expect(await loader.loadFromDirectory(join(dir, 'nope'))).toEqual([]);
  });

  it('loads module plugins and skips invalid ones', async () => {
    await writeFile(
      join(dir, 'external.mjs'),
      "export default { name: 'external', version: '0.1.0', actions: [], triggers: [] };\n"
    );
    await writeFile(join(dir, 'broken.mjs'), "export default { name: 'broken' };\n");

    const registry = new PluginRegistry();
    const log = vi.fn();
    const loaded = await new PluginLoader(registry, log).loadFromDirectory(dir);

    expect(loaded.map((p) => p.name)).toEqual(['external']);
    expect(registry.getPlugin('external')).toBeDefined();
    expect(log).toHaveBeenCalledWith(
      `[plugins] Invalid plugin at ${join(dir, 'broken.mjs')}: missing name, version, actions or triggers`
    );
  });
});

describe('definePlugin', () => {
  it('rejects names that would break qualified lookups', () => {
    expect(() => definePlugin({ name: 'a.b', version: '1.0.0' })).toThrow('a.b: plugin name "a.b" must not contain "."');
    expect(() =>
      definePlugin({
        name: 'dup',
        version: '1.0.0',
        actions: [
          defineAction({ name: 'go', execute: async () => [] }),
          defineAction({ name: 'go', execute: async () => [] }),
        ],
      })
    ).toThrow('dup: duplicate action "go"');
  });
});
