import { PluginError } from '../../errors/index.js';
import type {
  ConduitPlugin,
  ActionDefinition,
  TriggerDefinition,
  OAuthProviderDefinition,
} from './types.js';

export interface Registered<T> {
  plugin: string;
  /** `plugin.name`, the key actions and triggers are looked up by. */
  qualifiedName: string;
  definition: T;
}

function qualify(plugin: string, name: string): string {
  return `${plugin}.${name}`;
}

/**
 * Plugins by name, with their actions and triggers indexed under qualified
 * names. OAuth providers are indexed by provider name, which may differ from
 * the plugin carrying them.
 */
export class PluginRegistry {
  private plugins = new Map<string, ConduitPlugin>();
  private actions = new Map<string, Registered<ActionDefinition>>();
  private triggers = new Map<string, Registered<TriggerDefinition>>();
  private oauthProviders = new Map<string, OAuthProviderDefinition>();

  register(plugin: ConduitPlugin): void {
    if (this.plugins.has(plugin.name)) {
      throw new PluginError(`Plugin "${plugin.name}" is already registered`);
    }
    if (plugin.oauth && this.oauthProviders.has(plugin.oauth.name)) {
      throw new PluginError(`OAuth provider "${plugin.oauth.name}" is already registered`);
    }

    this.plugins.set(plugin.name, plugin);

    for (const action of plugin.actions) {
      const qualifiedName = qualify(plugin.name, action.name);
      this.actions.set(qualifiedName, { plugin: plugin.name, qualifiedName, definition: action });
    }
    for (const trigger of plugin.triggers) {
      const qualifiedName = qualify(plugin.name, trigger.name);
      this.triggers.set(qualifiedName, { plugin: plugin.name, qualifiedName, definition: trigger });
    }
    if (plugin.oauth) {
      this.oauthProviders.set(plugin.oauth.name, plugin.oauth);
    }
  }

  unregister(pluginName: string): void {
    const plugin = this.plugins.get(pluginName);
    if (!plugin) return;

    for (const action of plugin.actions) this.actions.delete(qualify(pluginName, action.name));
    for (const trigger of plugin.triggers) this.triggers.delete(qualify(pluginName, trigger.name));
    if (plugin.oauth) this.oauthProviders.delete(plugin.oauth.name);

    this.plugins.delete(pluginName);
  }

  getPlugin(name: string): ConduitPlugin | undefined {
    return this.plugins.get(name);
  }

  getAction(qualifiedName: string): ActionDefinition | undefined {
    return this.actions.get(qualifiedName)?.definition;
  }

  getTrigger(qualifiedName: string): TriggerDefinition | undefined {
    return this.triggers.get(qualifiedName)?.definition;
  }

  getOAuthProvider(name: string): OAuthProviderDefinition | undefined {
    return this.oauthProviders.get(name);
  }

  listPlugins(): ConduitPlugin[] {
    return Array.from(this.plugins.values());
  }

  listActions(): Registered<ActionDefinition>[] {
    return Array.from(this.actions.values());
  }

  listTriggers(): Registered<TriggerDefinition>[] {
    return Array.from(this.triggers.values());
  }

  listOAuthProviders(): OAuthProviderDefinition[] {
    return Array.from(this.oauthProviders.values());
  }
}

export const globalRegistry = new PluginRegistry();
