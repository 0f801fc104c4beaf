export {
  definePlugin,
  defineAction,
  defineTrigger,
  defineEvent,
  type ConduitPlugin,
  type ActionDefinition,
  type TriggerDefinition,
  type EventDefinition,
  type ActionContext,
  type EventContext,
  type OAuthProviderDefinition,
  type PluginHooks,
} from './types.js';

export { PluginRegistry, globalRegistry } from './registry.js';
export { PluginLoader } from './loader.js';
export { invokeAction, dispatchWebhook, type DispatchResult, type FiredEvent } from './runner.js';
export { parseJsonBody, parseFormBody, jsonResponse, textResponse } from './webhook.js';
