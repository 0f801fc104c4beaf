export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export {
  definePlugin,
  defineAction,
  defineTrigger,
  defineEvent,
  PluginRegistry,
  globalRegistry,
  PluginLoader,
  invokeAction,
  dispatchWebhook,
  parseJsonBody,
  parseFormBody,
  jsonResponse,
  textResponse,
  type DispatchResult,
  type FiredEvent,
} from './plugins/sdk/index.js';
export { loadBuiltinPlugins, builtinPlugins } from './plugins/loader.js';
export * from './auth/index.js';
export * from './models/openai-compatible.js';
export { fetchWithRetry, fetchWithTimeout, pollUntil, type RetryOptions, type PollOptions } from './http/index.js';
export { createGatewayApp, type GatewayDeps } from './gateway/app.js';
export { createGatewayServer, type GatewayServer } from './gateway/server.js';
export { SubscriptionStore } from './gateway/subscription-store.js';
export { SubscriptionRefresher } from './gateway/refresher.js';
