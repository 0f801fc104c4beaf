export class PluginError extends Error {
  constructor(message: string, public cause?: Error) {
    super(message);
    this.name = 'PluginError';
  }
}

// Invocation errors (tools and models)

export class InvokeError extends PluginError {
  /** HTTP status the gateway answers with when this error escapes an action. */
  readonly status: number = 400;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'InvokeError';
  }
}

export class InvokeAuthorizationError extends InvokeError {
  override readonly status = 401;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'InvokeAuthorizationError';
  }
}

export class InvokeBadRequestError extends InvokeError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'InvokeBadRequestError';
  }
}

export class InvokeConnectionError extends InvokeError {
  override readonly status = 502;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'InvokeConnectionError';
  }
}

export class InvokeRateLimitError extends InvokeError {
  override readonly status = 429;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'InvokeRateLimitError';
  }
}

export class InvokeServerUnavailableError extends InvokeError {
  override readonly status = 502;

  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'InvokeServerUnavailableError';
  }
}

export class CredentialsValidateFailedError extends PluginError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'CredentialsValidateFailedError';
  }
}

// Trigger errors

export class TriggerDispatchError extends PluginError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'TriggerDispatchError';
  }
}

export class TriggerValidationError extends PluginError {
  constructor(message: string) {
    super(message);
    this.name = 'TriggerValidationError';
  }
}

/** Thrown by an event handler to drop an event that does not match its filters. */
export class EventIgnoredError extends PluginError {
  constructor(message = 'Event ignored') {
    super(message);
    this.name = 'EventIgnoredError';
  }
}

export class SubscriptionError extends PluginError {
  constructor(
    message: string,
    public errorCode: string,
    public externalResponse?: unknown,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'SubscriptionError';
  }
}

export class UnsubscribeError extends PluginError {
  constructor(
    message: string,
    public errorCode: string,
    public externalResponse?: unknown,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'UnsubscribeError';
  }
}

export class OAuthError extends PluginError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'OAuthError';
  }
}

/**
 * Map a vendor HTTP status onto the invoke error the host understands.
 */
export function invokeErrorFromStatus(status: number, message: string): InvokeError {
  if (status === 401 || status === 403) {
    return new InvokeAuthorizationError(message);
  }
  if (status === 429) {
    return new InvokeRateLimitError(message);
  }
  if (status >= 500) {
    return new InvokeServerUnavailableError(message);
  }
  return new InvokeBadRequestError(message);
}

/**
 * Normalize anything thrown while calling a vendor into an InvokeError.
 * fetch reports network failures as TypeError and timeouts as AbortError.
 */
export function toInvokeError(err: unknown): InvokeError {
  if (err instanceof InvokeError) return err;
  if (err instanceof Error) {
    if (err.name === 'AbortError' || err.name === 'TimeoutError') {
      return new InvokeConnectionError(`Request timed out: ${err.message}`, err);
    }
    if (err instanceof TypeError) {
      return new InvokeConnectionError(`Connection failed: ${err.message}`, err);
    }
    return new InvokeError(err.message, err);
  }
  return new InvokeError(String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
