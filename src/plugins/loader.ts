import { globalRegistry, type PluginRegistry } from './sdk/registry.js';
import type { ConduitPlugin } from '../types/index.js';

import notionPlugin from './builtin/notion/index.js';
import airtablePlugin from './builtin/airtable/index.js';
import zendeskPlugin from './builtin/zendesk/index.js';
import twilioPlugin from './builtin/twilio/index.js';
import wecomPlugin from './builtin/wecom/index.js';
import jiraPlugin from './builtin/jira/index.js';
import comfyuiPlugin from './builtin/comfyui/index.js';
import openaiCompatiblePlugin from './builtin/openai-compatible/index.js';
import microsoftPlugin from './builtin/microsoft/index.js';

export const builtinPlugins: readonly ConduitPlugin[] = [
  // Triggers
  notionPlugin,
  airtablePlugin,
  zendeskPlugin,
  twilioPlugin,
  // Tools
  wecomPlugin,
  jiraPlugin,
  comfyuiPlugin,
  microsoftPlugin,
  // Models
  openaiCompatiblePlugin,
];

/**
 * Register every built-in plugin and run its onLoad hook. A plugin that is
 * already registered is left as it is.
 */
export async function loadBuiltinPlugins(
  registry: PluginRegistry = globalRegistry,
  log: (message: string) => void = console.log
): Promise<ConduitPlugin[]> {
  const loaded: ConduitPlugin[] = [];

  for (const plugin of builtinPlugins) {
    if (registry.getPlugin(plugin.name)) continue;

    registry.register(plugin);
    if (plugin.hooks?.onLoad) {
      await plugin.hooks.onLoad();
    }
    loaded.push(plugin);
  }

  log(`[plugins] Loaded ${loaded.length} built-in plugin(s)`);
  return loaded;
}
