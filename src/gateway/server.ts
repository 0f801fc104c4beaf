import { serve } from '@hono/node-server';
import { Server } from 'node:http';
import { WebSocketServer } from 'ws';
import { databasePath } from '../config/index.js';
import { InvokeError } from '../errors/index.js';
import { OpenAICompatibleModel } from '../models/openai-compatible.js';
import { loadBuiltinPlugins } from '../plugins/loader.js';
import { PluginLoader } from '../plugins/sdk/loader.js';
import { globalRegistry, type PluginRegistry } from '../plugins/sdk/registry.js';
import { WeComEndpoint, type WeComResponder } from '../plugins/builtin/wecom/endpoint.js';
import { WeComBotEndpoint } from '../plugins/builtin/wecom/bot-endpoint.js';
import type { ConduitConfig, GatewayMessage } from '../types/index.js';
import { createGatewayApp, publicBaseUrl } from './app.js';
import { SubscriptionRefresher } from './refresher.js';
import { SocketHub } from './sockets.js';
import { SubscriptionStore } from './subscription-store.js';

export interface GatewayServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  broadcast(channel: string, message: GatewayMessage): void;
}

export interface GatewayServerOptions {
  registry?: PluginRegistry;
  log?: (message: string) => void;
}

/**
 * Replies to WeCom messages with the configured OpenAI-compatible model.
 */
export function modelResponder(model: ConduitConfig['model']): WeComResponder {
  if (!model) {
    return async () => {
      throw new InvokeError('No reply model configured; set model.baseUrl and model.model');
    };
  }

  const client = new OpenAICompatibleModel({ endpointUrl: model.baseUrl, apiKey: model.apiKey, model: model.model });
  return async (query) => {
    const result = await client.chat({ messages: [{ role: 'user', content: query }] });
    return result.content;
  };
}

export function createGatewayServer(config: ConduitConfig, options: GatewayServerOptions = {}): GatewayServer {
  const registry = options.registry ?? globalRegistry;
  const log = options.log ?? console.log;
  const store = new SubscriptionStore(databasePath(config));
  const hub = new SocketHub(log);
  const refresher = new SubscriptionRefresher(store, registry, { cron: config.refresh.cron, log });

  const wecom = config.wecom?.token
    ? new WeComEndpoint(config.wecom, { responder: modelResponder(config.model), log })
    : undefined;
  const wecomBot = config.wecomBot?.token
    ? new WeComBotEndpoint(config.wecomBot, { responder: modelResponder(config.model), log })
    : undefined;

  const app = createGatewayApp({
    config,
    registry,
    store,
    wecom,
    wecomBot,
    log,
    broadcast: (channel, message) => hub.broadcast(channel, message),
  });

  let httpServer: ReturnType<typeof serve> | null = null;
  let wss: WebSocketServer | null = null;

  return {
    async start() {
      await loadBuiltinPlugins(registry, log);
      const external = await new PluginLoader(registry, log).loadFromDirectory(config.pluginsDir);
      if (external.length > 0) {
        log(`[plugins] Loaded ${external.length} plugin(s) from ${config.pluginsDir}`);
      }

      const { port, host } = config.server;
      const server = serve({ fetch: app.fetch, port, hostname: host });
      httpServer = server;
      if (!(server instanceof Server)) {
        throw new Error('WebSocket upgrades need an HTTP/1.1 server');
      }
      wss = new WebSocketServer({ server });
      wss.on('connection', (socket) => hub.handleConnection(socket));

      refresher.start();

      log(`[gateway] Listening on http://${host}:${port}`);
      log(`[gateway] Webhooks are addressed under ${publicBaseUrl(config)}/webhook/`);
      if (wecom) log('[gateway] WeCom callback at /endpoints/wecom');
      if (wecomBot) log('[gateway] WeCom bot callback at /endpoints/wecom-bot');
    },

    async stop() {
      refresher.stop();
      hub.closeAll();
      wss?.close();
      httpServer?.close();
      store.close();
      log('[gateway] Stopped');
    },

    broadcast: (channel, message) => hub.broadcast(channel, message),
  };
}
