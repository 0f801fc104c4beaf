import { PluginError } from '../../errors/index.js';
import type {
  ConduitPlugin,
  ActionDefinition,
  TriggerDefinition,
  EventDefinition,
  ActionContext,
  EventContext,
  OAuthProviderDefinition,
  PluginHooks,
} from '../../types/index.js';

export type {
  ConduitPlugin,
  ActionDefinition,
  TriggerDefinition,
  EventDefinition,
  ActionContext,
  EventContext,
  OAuthProviderDefinition,
  PluginHooks,
};

function assertUnique(plugin: string, kind: string, names: string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (name.includes('.')) {
      throw new PluginError(`${plugin}: ${kind} name "${name}" must not contain "."`);
    }
    if (seen.has(name)) {
      throw new PluginError(`${plugin}: duplicate ${kind} "${name}"`);
    }
    seen.add(name);
  }
}

/**
 * Build a plugin, checking that action and trigger names can be qualified
 * as `plugin.name` without clashing.
 */
export function definePlugin(config: {
  name: string;
  version: string;
  description?: string;
  triggers?: TriggerDefinition[];
  actions?: ActionDefinition[];
  oauth?: OAuthProviderDefinition;
  hooks?: PluginHooks;
}): ConduitPlugin {
  const actions = config.actions ?? [];
  const triggers = config.triggers ?? [];
  assertUnique(config.name, 'plugin', [config.name]);
  assertUnique(config.name, 'action', actions.map((a) => a.name));
  assertUnique(config.name, 'trigger', triggers.map((t) => t.name));

  return { ...config, actions, triggers };
}

export function defineAction(config: ActionDefinition): ActionDefinition {
  return config;
}

export function defineTrigger(config: TriggerDefinition): TriggerDefinition {
  return config;
}

export function defineEvent(config: EventDefinition): EventDefinition {
  return config;
}
