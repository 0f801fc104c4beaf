import { vi } from 'vitest';
import type {
  ActionContext,
  ActionDefinition,
  ConduitPlugin,
  EventContext,
  EventDefinition,
  Subscription,
  TriggerDefinition,
} from '../types/index.js';
import { MemoryStorage, webhookRequest } from './http.js';

export function findAction(plugin: ConduitPlugin, name: string): ActionDefinition {
  const action = plugin.actions.find((a) => a.name === name);
  if (!action) throw new Error(`No action ${name} in ${plugin.name}`);
  return action;
}

export function findEvent(trigger: TriggerDefinition, name: string): EventDefinition {
  const event = trigger.events.find((e) => e.name === name);
  if (!event) throw new Error(`No event ${name} in ${trigger.name}`);
  return event;
}

export function actionContext(
  config: Record<string, unknown>,
  credentials: Record<string, string> = {},
  env: Record<string, string> = {}
): ActionContext {
  return { config, credentials, env, log: vi.fn() };
}

export function makeSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    id: 'sub-1',
    trigger: 'test.webhook',
    endpoint: 'https://hooks.test/webhook/sub-1',
    parameters: {},
    properties: {},
    credentials: {},
    expiresAt: -1,
    createdAt: 0,
    ...overrides,
  };
}

export function eventContext(overrides: Partial<EventContext> = {}): EventContext {
  return {
    request: webhookRequest(),
    payload: undefined,
    parameters: {},
    subscription: makeSubscription(),
    storage: new MemoryStorage(),
    log: vi.fn(),
    ...overrides,
  };
}
