import {
  CredentialsValidateFailedError,
  InvokeError,
  OAuthError,
  SubscriptionError,
  TriggerDispatchError,
  TriggerValidationError,
  UnsubscribeError,
  errorMessage,
} from '../errors/index.js';

/**
 * HTTP status the gateway answers with when a plugin error escapes a route.
 */
export function errorStatus(err: unknown): number {
  if (err instanceof InvokeError) return err.status;
  if (err instanceof TriggerValidationError) return 401;
  if (
    err instanceof TriggerDispatchError ||
    err instanceof SubscriptionError ||
    err instanceof UnsubscribeError ||
    err instanceof CredentialsValidateFailedError ||
    err instanceof OAuthError
  ) {
    return 400;
  }
  return 500;
}

export function errorBody(err: unknown): { error: string; type?: string; code?: string } {
  if (err instanceof SubscriptionError || err instanceof UnsubscribeError) {
    return { error: err.message, type: err.name, code: err.errorCode };
  }
  if (err instanceof Error) {
    return { error: err.message, type: err.name };
  }
  return { error: errorMessage(err) };
}

export function errorResponse(err: unknown): Response {
  return Response.json(errorBody(err), { status: errorStatus(err) });
}
