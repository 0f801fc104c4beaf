import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError, DEFAULT_DB_PATH, databasePath, loadConfig, parseConfig, resolveConfig, saveConfig } from './index.js';

describe('Config System', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'conduit-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('parseConfig', () => {
    it('fills in defaults for an empty document', () => {
      const config = parseConfig(null);

      expect(config.server).toEqual({ port: 3847, host: 'localhost' });
      expect(config.storage).toEqual({});
      expect(config.refresh).toEqual({ cron: '0 * * * *' });
      expect(config.model).toBeUndefined();
    });

    it('keeps OAuth clients and the reply model', () => {
      const config = parseConfig({
        oauth: { microsoft: { clientId: 'app-id', clientSecret: 'test-secret', tenant: 'contoso' } },
        model: { baseUrl: 'http://localhost:11434/v1', model: 'qwen' },
      });

      expect(config.oauth?.microsoft).toEqual({ clientId: 'app-id', clientSecret: 'test-secret', tenant: 'contoso' });
      expect(config.model).toEqual({ baseUrl: 'http://localhost:11434/v1', model: 'qwen' });
    });

    it('names the offending field', () => {
      expect(() => parseConfig({ server: { port: 'eighty' } })).toThrow(ConfigError);
      expect(() => parseConfig({ server: { port: 'eighty' } })).toThrow(/^Invalid config: server\.port: /);
    });
  });

  describe('resolveConfig', () => {
    it('applies environment overrides', () => {
      const config = resolveConfig(parseConfig({}), {
        CONDUIT_PORT: '9000',
        CONDUIT_HOST: '0.0.0.0',
        CONDUIT_PUBLIC_URL: 'https://hooks.test',
        CONDUIT_DB_PATH: '/tmp/subs.db',
      });

      expect(config.server).toEqual({ port: 9000, host: '0.0.0.0', publicUrl: 'https://hooks.test' });
      expect(databasePath(config)).toBe('/tmp/subs.db');
    });

    it('rejects a non-numeric port', () => {
      expect(() => resolveConfig(parseConfig({}), { CONDUIT_PORT: 'abc' })).toThrow('CONDUIT_PORT is not a number: abc');
    });

    it('leaves the config alone without overrides', () => {
      const config = resolveConfig(parseConfig({}), {});
      expect(databasePath(config)).toBe(DEFAULT_DB_PATH);
    });
  });

  describe('loadConfig / saveConfig', () => {
    it('returns defaults when the file is missing', async () => {
      const config = await loadConfig(join(dir, 'missing.yaml'));
      expect(config.server.port).toBe(3847);
    });

    it('reads YAML', async () => {
      const path = join(dir, 'config.yaml');
      await writeFile(path, 'server:\n  port: 4000\nrefresh:\n  cron: "*/15 * * * *"\n', 'utf-8');

      const config = await loadConfig(path);

      expect(config.server).toEqual({ port: 4000, host: 'localhost' });
      expect(config.refresh).toEqual({ cron: '*/15 * * * *' });
    });

    it('round-trips through saveConfig', async () => {
      const path = join(dir, 'nested', 'config.yaml');
      const config = parseConfig({ wecom: { token: 'test-token', corpId: 'corp' } });

      await saveConfig(config, path);

      expect(await readFile(path, 'utf-8')).toContain('corpId: corp');
      expect(await loadConfig(path)).toEqual(config);
    });
  });
});
