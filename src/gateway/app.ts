import { Hono, type Context } from 'hono';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { PendingOAuthStore } from '../auth/oauth.js';
import { tryParseJson } from '../http/index.js';
import type { PluginRegistry } from '../plugins/sdk/registry.js';
import { dispatchWebhook, invokeAction } from '../plugins/sdk/runner.js';
import type { WeComEndpoint } from '../plugins/builtin/wecom/endpoint.js';
import type { WeComBotEndpoint } from '../plugins/builtin/wecom/bot-endpoint.js';
import type {
  ConduitConfig,
  GatewayMessage,
  Subscription,
  ToolMessage,
  WebhookRequest,
  WebhookResponse,
} from '../types/index.js';
import { errorResponse } from './errors.js';
import type { SubscriptionStore } from './subscription-store.js';

export const VERSION = '0.1.0';

export interface GatewayDeps {
  config: ConduitConfig;
  registry: PluginRegistry;
  store: SubscriptionStore;
  broadcast: (channel: string, message: GatewayMessage) => void;
  pendingOAuth?: PendingOAuthStore;
  wecom?: WeComEndpoint;
  wecomBot?: WeComBotEndpoint;
  /** Environment handed to actions; defaults to process.env. */
  env?: Record<string, string>;
  now?: () => number;
  log?: (message: string) => void;
}

const createSubscriptionSchema = z.object({
  trigger: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
  credentials: z.record(z.string()).default({}),
});

const invokeSchema = z.object({
  config: z.record(z.unknown()).default({}),
  credentials: z.record(z.string()).default({}),
});

export function publicBaseUrl(config: ConduitConfig): string {
  const base = config.server.publicUrl ?? `http://${config.server.host}:${config.server.port}`;
  return base.replace(/\/+$/, '');
}

function processEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

/** Subscriptions as the API shows them: no credentials, no vendor secrets. */
function subscriptionView(subscription: Subscription) {
  return {
    id: subscription.id,
    trigger: subscription.trigger,
    endpoint: subscription.endpoint,
    parameters: subscription.parameters,
    expiresAt: subscription.expiresAt,
    createdAt: subscription.createdAt,
  };
}

function serializeMessage(message: ToolMessage) {
  if (message.type === 'blob') {
    return { type: 'blob', blob: message.blob.toString('base64'), meta: message.meta };
  }
  return message;
}

async function toWebhookRequest(c: Context): Promise<WebhookRequest> {
  const headers: Record<string, string> = {};
  c.req.raw.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });
  return {
    method: c.req.method,
    url: c.req.url,
    headers,
    query: c.req.query(),
    rawBody: await c.req.text(),
  };
}

function toResponse(response: WebhookResponse, headers: Record<string, string> = {}): Response {
  return new Response(response.body, {
    status: response.status,
    headers: { 'Content-Type': response.contentType, ...headers },
  });
}

function notFound(message: string): Response {
  return Response.json({ error: message }, { status: 404 });
}

async function readJson(c: Context): Promise<unknown> {
  const text = await c.req.text();
  return text ? tryParseJson(text) : {};
}

function badRequest(message: string): Response {
  return Response.json({ error: message }, { status: 400 });
}

export function createGatewayApp(deps: GatewayDeps): Hono {
  const { config, registry, store, broadcast } = deps;
  const app = new Hono();
  const pendingOAuth = deps.pendingOAuth ?? new PendingOAuthStore();
  const now = deps.now ?? Date.now;
  const log = deps.log ?? console.log;
  const baseUrl = publicBaseUrl(config);

  app.onError((err) => {
    log(`[gateway] ${err.name}: ${err.message}`);
    return errorResponse(err);
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: VERSION }));

  app.get('/api/plugins', (c) => {
    const plugins = registry.listPlugins().map((plugin) => ({
      name: plugin.name,
      version: plugin.version,
      description: plugin.description,
      actions: plugin.actions.map((a) => ({ name: a.name, description: a.description })),
      triggers: plugin.triggers.map((t) => ({
        name: t.name,
        description: t.description,
        events: t.events.map((e) => e.name),
      })),
      oauth: plugin.oauth?.name ?? null,
    }));
    return c.json({ plugins });
  });

  // Subscriptions

  app.get('/api/subscriptions', (c) => c.json({ subscriptions: store.list().map(subscriptionView) }));

  app.post('/api/subscriptions', async (c) => {
    const parsed = createSubscriptionSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return badRequest('Body must be {trigger, parameters?, credentials?}');
    }
    const { trigger: triggerName, parameters, credentials } = parsed.data;

    const trigger = registry.getTrigger(triggerName);
    if (!trigger) return notFound(`Unknown trigger: ${triggerName}`);

    if (trigger.subscription.validateCredentials) {
      await trigger.subscription.validateCredentials(credentials);
    }

    const id = randomUUID();
    const created = await trigger.subscription.create({
      endpoint: `${baseUrl}/webhook/${id}`,
      parameters,
      credentials,
    });
    const subscription: Subscription = {
      ...created,
      id,
      trigger: triggerName,
      createdAt: Math.floor(now() / 1000),
    };
    store.save(subscription);

    log(`[gateway] Created subscription ${id} for ${triggerName}`);
    broadcast('subscriptions', { type: 'subscription.created', payload: subscriptionView(subscription) });
    return c.json(subscriptionView(subscription), 201);
  });

  app.get('/api/subscriptions/:id', (c) => {
    const subscription = store.get(c.req.param('id'));
    return subscription ? c.json(subscriptionView(subscription)) : notFound('Subscription not found');
  });

  app.delete('/api/subscriptions/:id', async (c) => {
    const subscription = store.get(c.req.param('id'));
    if (!subscription) return notFound('Subscription not found');

    const trigger = registry.getTrigger(subscription.trigger);
    const result = trigger
      ? await trigger.subscription.delete(subscription)
      : { success: true, message: `Trigger ${subscription.trigger} is not loaded; removed locally` };

    store.delete(subscription.id);
    broadcast('subscriptions', { type: 'subscription.deleted', payload: { id: subscription.id } });
    return c.json(result);
  });

  app.post('/api/subscriptions/:id/refresh', async (c) => {
    const subscription = store.get(c.req.param('id'));
    if (!subscription) return notFound('Subscription not found');
    const trigger = registry.getTrigger(subscription.trigger);
    if (!trigger) return notFound(`Unknown trigger: ${subscription.trigger}`);

    const refreshed = await trigger.subscription.refresh(subscription);
    const saved = { ...refreshed, id: subscription.id, trigger: subscription.trigger };
    store.save(saved);
    return c.json(subscriptionView(saved));
  });

  app.get('/api/subscriptions/:id/options/:parameter', async (c) => {
    const subscription = store.get(c.req.param('id'));
    if (!subscription) return notFound('Subscription not found');
    const trigger = registry.getTrigger(subscription.trigger);
    const parameter = c.req.param('parameter');
    if (!trigger?.subscription.parameterOptions) {
      return notFound(`${subscription.trigger} has no options for ${parameter}`);
    }

    const options = await trigger.subscription.parameterOptions(parameter, subscription.credentials);
    return c.json({ options });
  });

  // Inbound webhooks

  app.all('/webhook/:id', async (c) => {
    const subscription = store.get(c.req.param('id'));
    if (!subscription) return notFound('Subscription not found');
    const trigger = registry.getTrigger(subscription.trigger);
    if (!trigger) return notFound(`Unknown trigger: ${subscription.trigger}`);

    const request = await toWebhookRequest(c);
    const result = await dispatchWebhook(trigger, subscription, request, store.storage(subscription.id), log);

    for (const fired of result.events) {
      broadcast('events', {
        type: `${subscription.trigger}.${fired.event}`,
        payload: { subscriptionId: subscription.id, userId: result.userId, variables: fired.variables },
      });
    }

    return toResponse(result.response, { 'X-Conduit-Events': result.events.map((e) => e.event).join(',') });
  });

  // Tool and model actions

  app.post('/api/actions/:plugin/:action', async (c) => {
    const name = `${c.req.param('plugin')}.${c.req.param('action')}`;
    const action = registry.getAction(name);
    if (!action) return notFound(`Unknown action: ${name}`);

    const parsed = invokeSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return badRequest('Body must be {config?, credentials?}');
    }

    const messages = await invokeAction(action, {
      config: parsed.data.config,
      credentials: parsed.data.credentials,
      env: deps.env ?? processEnv(),
      log: (message) => log(`[${name}] ${message}`),
    });
    return c.json({ messages: messages.map(serializeMessage) });
  });

  // OAuth

  app.get('/api/oauth/:provider/authorize', (c) => {
    const name = c.req.param('provider');
    const provider = registry.getOAuthProvider(name);
    if (!provider) return notFound(`Unknown OAuth provider: ${name}`);
    const client = config.oauth?.[name];
    if (!client) return badRequest(`OAuth client for ${name} is not configured`);

    const redirectUri = `${baseUrl}/api/oauth/${name}/callback`;
    const { state, codeChallenge } = pendingOAuth.create(name, redirectUri, provider.usesPkce);
    return c.redirect(provider.authorizationUrl({ redirectUri, client, state, codeChallenge }));
  });

  app.get('/api/oauth/:provider/callback', async (c) => {
    const name = c.req.param('provider');
    const provider = registry.getOAuthProvider(name);
    if (!provider) return notFound(`Unknown OAuth provider: ${name}`);
    const client = config.oauth?.[name];
    if (!client) return badRequest(`OAuth client for ${name} is not configured`);

    const query = c.req.query();
    const pending = pendingOAuth.consume(query.state ?? '');
    if (!pending || pending.provider !== name) {
      return badRequest('Invalid or expired OAuth state');
    }

    const credentials = await provider.exchangeCode({
      redirectUri: pending.redirectUri,
      client,
      query,
      codeVerifier: pending.codeVerifier,
    });

    log(`[gateway] OAuth completed for ${name}`);
    broadcast('oauth', { type: 'oauth.completed', payload: { provider: name } });
    return c.json({ provider: name, credentials });
  });

  // WeCom self-built app callback

  const wecom = async (c: Context) => {
    if (!deps.wecom) return notFound('WeCom endpoint is not configured');
    return toResponse(await deps.wecom.handle(await toWebhookRequest(c)));
  };
  app.get('/endpoints/wecom', wecom);
  app.post('/endpoints/wecom', wecom);

  // WeCom smart bot callback
  const wecomBot = async (c: Context) => {
    if (!deps.wecomBot) return notFound('WeCom bot endpoint is not configured');
    return toResponse(await deps.wecomBot.handle(await toWebhookRequest(c)));
  };
  app.get('/endpoints/wecom-bot', wecomBot);
  app.post('/endpoints/wecom-bot', wecomBot);

  return app;
}
