import chalk from 'chalk';
import { PluginRegistry } from '../../plugins/sdk/registry.js';
import { loadBuiltinPlugins } from '../../plugins/loader.js';

/**
 * One line per plugin, then indented lines for its actions, triggers and
 * the events each trigger can fire.
 */
export function describePlugins(registry: PluginRegistry): string[] {
  const lines: string[] = [];
  for (const plugin of registry.listPlugins()) {
    const oauth = plugin.oauth ? ` [oauth: ${plugin.oauth.name}]` : '';
    lines.push(`${plugin.name}@${plugin.version}${oauth}`);
    for (const action of plugin.actions) {
      lines.push(`  action  ${plugin.name}.${action.name}`);
    }
    for (const trigger of plugin.triggers) {
      lines.push(`  trigger ${plugin.name}.${trigger.name}: ${trigger.events.map((e) => e.name).join(', ')}`);
    }
  }
  return lines;
}

export async function pluginsCommand(): Promise<void> {
  const registry = new PluginRegistry();
  await loadBuiltinPlugins(registry, () => undefined);

  console.log(chalk.cyan('\nBuilt-in plugins\n'));
  for (const line of describePlugins(registry)) {
    console.log(line.startsWith(' ') ? chalk.dim(line) : chalk.bold(line));
  }
  console.log();
}
