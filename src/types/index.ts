import type { z } from 'zod';

// Tool output messages

export type ToolMessage =
  | { type: 'text'; text: string }
  | { type: 'json'; json: unknown }
  | { type: 'blob'; blob: Buffer; meta: { mimeType: string; filename?: string } }
  | { type: 'image'; url: string }
  | { type: 'link'; url: string };

export function textMessage(text: string): ToolMessage {
  return { type: 'text', text };
}

export function jsonMessage(json: unknown): ToolMessage {
  return { type: 'json', json };
}

export function blobMessage(blob: Buffer, mimeType: string, filename?: string): ToolMessage {
  return { type: 'blob', blob, meta: { mimeType, filename } };
}

export function imageMessage(url: string): ToolMessage {
  return { type: 'image', url };
}

export function linkMessage(url: string): ToolMessage {
  return { type: 'link', url };
}

// Plugin Types

export interface ActionContext {
  config: Record<string, unknown>;
  credentials: Record<string, string>;
  env: Record<string, string>;
  log: (message: string) => void;
}

export interface ActionDefinition {
  name: string;
  description?: string;
  schema?: z.ZodTypeAny;
  execute: (context: ActionContext) => Promise<ToolMessage[]>;
}

// Webhook Types

export interface WebhookRequest {
  method: string;
  url: string;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  query: Record<string, string>;
  rawBody: string;
}

export interface WebhookResponse {
  status: number;
  body: string;
  contentType: string;
}

export interface Subscription {
  id: string;
  /** Qualified trigger name, e.g. `notion.webhook`. */
  trigger: string;
  endpoint: string;
  parameters: Record<string, unknown>;
  properties: Record<string, unknown>;
  credentials: Record<string, string>;
  /** Unix seconds; -1 means the subscription never expires. */
  expiresAt: number;
  createdAt: number;
}

export interface SubscriptionInput {
  endpoint: string;
  parameters: Record<string, unknown>;
  credentials: Record<string, string>;
}

export interface UnsubscribeResult {
  success: boolean;
  message: string;
}

export interface ParameterOption {
  value: string;
  label: string;
}

export interface KeyValueStorage {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  delete(key: string): void;
}

export interface EventDispatch {
  events: string[];
  response: WebhookResponse;
  payload?: Record<string, unknown>;
  userId?: string;
}

export type Variables = Record<string, unknown>;

export interface EventContext {
  request: WebhookRequest;
  payload: Record<string, unknown> | undefined;
  parameters: Record<string, unknown>;
  subscription: Subscription;
  storage: KeyValueStorage;
  log: (message: string) => void;
}

export interface EventDefinition {
  name: string;
  description?: string;
  schema?: z.ZodTypeAny;
  onEvent: (context: EventContext) => Promise<Variables>;
}

export interface SubscriptionConstructor {
  validateCredentials?: (credentials: Record<string, string>) => Promise<void>;
  create: (input: SubscriptionInput) => Promise<Omit<Subscription, 'id' | 'trigger' | 'createdAt'>>;
  delete: (subscription: Subscription) => Promise<UnsubscribeResult>;
  refresh: (subscription: Subscription) => Promise<Subscription>;
  parameterOptions?: (parameter: string, credentials: Record<string, string>) => Promise<ParameterOption[]>;
}

export interface TriggerDefinition {
  name: string;
  description?: string;
  subscription: SubscriptionConstructor;
  dispatch: (
    subscription: Subscription,
    request: WebhookRequest,
    storage: KeyValueStorage
  ) => Promise<EventDispatch>;
  events: EventDefinition[];
}

// OAuth Types

export interface OAuthClientConfig {
  clientId: string;
  clientSecret?: string;
  tenant?: string;
  subdomain?: string;
}

export interface OAuthCredentials {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: number; // Unix timestamp in milliseconds
  raw: Record<string, unknown>;
}

export interface AuthorizationUrlInput {
  redirectUri: string;
  client: OAuthClientConfig;
  state: string;
  codeChallenge?: string;
}

export interface ExchangeCodeInput {
  redirectUri: string;
  client: OAuthClientConfig;
  query: Record<string, string>;
  codeVerifier?: string;
}

export interface RefreshInput {
  client: OAuthClientConfig;
  credentials: OAuthCredentials;
}

export interface OAuthProviderDefinition {
  name: string;
  usesPkce?: boolean;
  authorizationUrl: (input: AuthorizationUrlInput) => string;
  exchangeCode: (input: ExchangeCodeInput) => Promise<OAuthCredentials>;
  refresh: (input: RefreshInput) => Promise<OAuthCredentials>;
}

export interface PluginHooks {
  onLoad?: () => Promise<void>;
  onUnload?: () => Promise<void>;
}

export interface ConduitPlugin {
  name: string;
  version: string;
  description?: string;
  actions: ActionDefinition[];
  triggers: TriggerDefinition[];
  oauth?: OAuthProviderDefinition;
  hooks?: PluginHooks;
}

// Gateway Types

export interface GatewayMessage {
  type: string;
  payload: unknown;
  id?: string;
  timestamp?: number;
}

// Config Types

export interface ConduitConfig {
  server: {
    port: number;
    host: string;
    publicUrl?: string;
  };
  storage: {
    dbPath?: string;
  };
  oauth?: Record<string, OAuthClientConfig>;
  wecom?: {
    token?: string;
    encodingAesKey?: string;
    receiveId?: string;
    corpId?: string;
    agentSecret?: string;
    agentId?: string;
  };
  wecomBot?: {
    token?: string;
    encodingAesKey?: string;
    receiveId?: string;
  };
  model?: {
    baseUrl: string;
    apiKey?: string;
    model: string;
  };
  refresh: {
    cron: string;
  };
  pluginsDir: string;
}
