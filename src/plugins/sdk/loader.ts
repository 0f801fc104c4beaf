import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ConduitPlugin } from './types.js';
import type { PluginRegistry } from './registry.js';
import { isRecord } from './values.js';

function isPlugin(value: unknown): value is ConduitPlugin {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.version === 'string' &&
    Array.isArray(value.actions) &&
    Array.isArray(value.triggers)
  );
}

/**
 * Loads third-party plugins from the configured plugins directory. Each entry
 * is either a directory holding `index.js` or a `.js`/`.mjs` file whose default
 * (or `plugin`) export is a plugin.
 */
export class PluginLoader {
  constructor(
    private registry: PluginRegistry,
    private log: (message: string) => void = console.warn
  ) {}

  async loadFromDirectory(dir: string): Promise<ConduitPlugin[]> {
    const loaded: ConduitPlugin[] = [];

    try {
      const entries = await readdir(dir, { withFileTypes: true });

      for (const entry of entries) {
        let pluginPath: string | null = null;
        if (entry.isDirectory()) {
          pluginPath = join(dir, entry.name, 'index.js');
        } else if (entry.name.endsWith('.js') || entry.name.endsWith('.mjs')) {
          pluginPath = join(dir, entry.name);
        }
        if (!pluginPath) continue;

        try {
          const plugin = await this.loadPlugin(pluginPath);
          if (plugin) {
            loaded.push(plugin);
          }
        } catch (err) {
          this.log(`[plugins] Failed to load plugin from ${pluginPath}: ${String(err)}`);
        }
      }
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
        throw err;
      }
    }

    return loaded;
  }

  async loadPlugin(path: string): Promise<ConduitPlugin | null> {
    const url = pathToFileURL(path).href;
    const module: Record<string, unknown> = await import(url);

    const plugin = module.default ?? module.plugin;

    if (!isPlugin(plugin)) {
      this.log(`[plugins] Invalid plugin at ${path}: missing name, version, actions or triggers`);
      return null;
    }

    this.registry.register(plugin);

    if (plugin.hooks?.onLoad) {
      await plugin.hooks.onLoad();
    }

    return plugin;
  }

  async unloadPlugin(name: string): Promise<void> {
    const plugin = this.registry.getPlugin(name);
    if (plugin?.hooks?.onUnload) {
      await plugin.hooks.onUnload();
    }
    this.registry.unregister(name);
  }
}
