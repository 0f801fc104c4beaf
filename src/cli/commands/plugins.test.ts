import { describe, it, expect } from 'vitest';
import { describePlugins } from './plugins.js';
import { PluginRegistry } from '../../plugins/sdk/registry.js';
import { loadBuiltinPlugins } from '../../plugins/loader.js';

describe('describePlugins', () => {
  it('lists actions and trigger events under each plugin', async () => {
    const registry = new PluginRegistry();
    await loadBuiltinPlugins(registry, () => undefined);

    const lines = describePlugins(registry);

    expect(lines).toContain('zendesk@1.0.0 [oauth: zendesk]');
    expect(lines).toContain('  action  jira.create_issue');
    expect(lines).toContain('  action  openai_compatible.rerank');
    expect(lines.filter((line) => !line.startsWith(' '))).toHaveLength(9);
  });
});
