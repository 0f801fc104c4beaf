import { ZodError, type z } from 'zod';
import {
  EventIgnoredError,
  InvokeBadRequestError,
  PluginError,
  TriggerDispatchError,
  toInvokeError,
} from '../../errors/index.js';
import type {
  ActionContext,
  ActionDefinition,
  KeyValueStorage,
  Subscription,
  ToolMessage,
  TriggerDefinition,
  Variables,
  WebhookRequest,
  WebhookResponse,
} from '../../types/index.js';
import { asRecord } from './values.js';

export interface FiredEvent {
  event: string;
  variables: Variables;
}

export interface DispatchResult {
  response: WebhookResponse;
  events: FiredEvent[];
  userId?: string;
}

function describeZodError(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseWith(schema: z.ZodTypeAny, value: unknown): Record<string, unknown> {
  return asRecord(schema.parse(value));
}

export async function invokeAction(action: ActionDefinition, ctx: ActionContext): Promise<ToolMessage[]> {
  let config = ctx.config;
  if (action.schema) {
    try {
      config = parseWith(action.schema, ctx.config);
    } catch (err) {
      if (err instanceof ZodError) {
        throw new InvokeBadRequestError(`Invalid parameters for ${action.name}: ${describeZodError(err)}`);
      }
      throw err;
    }
  }

  try {
    return await action.execute({ ...ctx, config });
  } catch (err) {
    if (err instanceof PluginError) throw err;
    throw toInvokeError(err);
  }
}

/**
 * Run a trigger's dispatch step, then every event it named. Events that filter
 * themselves out are skipped; the vendor still gets the dispatch response.
 */
export async function dispatchWebhook(
  trigger: TriggerDefinition,
  subscription: Subscription,
  request: WebhookRequest,
  storage: KeyValueStorage,
  log: (message: string) => void = console.log
): Promise<DispatchResult> {
  const dispatch = await trigger.dispatch(subscription, request, storage);
  const fired: FiredEvent[] = [];

  for (const name of dispatch.events) {
    const event = trigger.events.find((e) => e.name === name);
    if (!event) {
      log(`[dispatch] ${subscription.trigger} has no event named ${name}`);
      continue;
    }

    let parameters = subscription.parameters;
    if (event.schema) {
      try {
        parameters = parseWith(event.schema, subscription.parameters);
      } catch (err) {
        if (err instanceof ZodError) {
          throw new TriggerDispatchError(`Invalid parameters for ${name}: ${describeZodError(err)}`);
        }
        throw err;
      }
    }

    try {
      const variables = await event.onEvent({
        request,
        payload: dispatch.payload,
        parameters,
        subscription,
        storage,
        log,
      });
      fired.push({ event: name, variables });
    } catch (err) {
      if (err instanceof EventIgnoredError) {
        log(`[dispatch] ${subscription.trigger}/${name} ignored: ${err.message}`);
        continue;
      }
      throw err;
    }
  }

  return { response: dispatch.response, events: fired, userId: dispatch.userId };
}
