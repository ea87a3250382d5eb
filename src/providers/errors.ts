/**
 * Tagged error hierarchy raised by the provider client.
 * Every upstream failure is mapped onto one of these classes so callers can
 * classify without inspecting HTTP details. Messages follow the
 * `<Provider>Exception - <upstream body>` convention; `String(err)` therefore
 * reads `RateLimitError: OpenaiException - {...}`.
 */

/** Generic provider failure. */
export class ProviderError extends Error {
  public readonly provider: string;
  public readonly model: string;
  public readonly statusCode: number;
  public readonly responseBody: string;

  constructor(provider: string, model: string, statusCode: number, responseBody: string) {
    super(`${exceptionPrefix(provider)} - ${responseBody}`);
    this.name = 'ProviderError';
    this.provider = provider;
    this.model = model;
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** 400: the provider rejected the request. */
export class BadRequestError extends ProviderError {
  constructor(provider: string, model: string, responseBody: string, statusCode = 400) {
    super(provider, model, statusCode, responseBody);
    this.name = 'BadRequestError';
  }
}

/** 422: structurally malformed request. A specialization of BadRequestError. */
export class UnprocessableEntityError extends BadRequestError {
  constructor(provider: string, model: string, responseBody: string) {
    super(provider, model, responseBody, 422);
    this.name = 'UnprocessableEntityError';
  }
}

/** 400 whose body says the prompt does not fit the model's context window. */
export class ContextWindowExceededError extends BadRequestError {
  constructor(provider: string, model: string, responseBody: string) {
    super(provider, model, responseBody);
    this.name = 'ContextWindowExceededError';
  }
}

/** 401: missing or invalid credentials. */
export class AuthenticationError extends ProviderError {
  constructor(provider: string, model: string, responseBody: string) {
    super(provider, model, 401, responseBody);
    this.name = 'AuthenticationError';
  }
}

/** 403: credentials valid but not allowed. */
export class PermissionDeniedError extends ProviderError {
  constructor(provider: string, model: string, responseBody: string) {
    super(provider, model, 403, responseBody);
    this.name = 'PermissionDeniedError';
  }
}

/** 404: the upstream model or endpoint does not exist. */
export class NotFoundError extends ProviderError {
  constructor(provider: string, model: string, responseBody: string) {
    super(provider, model, 404, responseBody);
    this.name = 'NotFoundError';
  }
}

/** 429: rate limited. */
export class RateLimitError extends ProviderError {
  public readonly retryAfterMs?: number;

  constructor(provider: string, model: string, responseBody: string, retryAfterMs?: number) {
    super(provider, model, 429, responseBody);
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * The call did not complete in time: either the local timeout in seconds
 * fired, or the upstream answered 408 with a body.
 */
export class RequestTimeoutError extends ProviderError {
  constructor(provider: string, model: string, detail: number | string) {
    super(provider, model, 408, typeof detail === 'number' ? `Request timed out after ${detail}s` : detail);
    this.name = 'RequestTimeoutError';
  }
}

/** 5xx other than 503, or an upstream payload that could not be understood. */
export class InternalServerError extends ProviderError {
  constructor(provider: string, model: string, responseBody: string, statusCode = 500) {
    super(provider, model, statusCode, responseBody);
    this.name = 'InternalServerError';
  }
}

/** 503: upstream temporarily unavailable. */
export class ServiceUnavailableError extends ProviderError {
  constructor(provider: string, model: string, responseBody: string) {
    super(provider, model, 503, responseBody);
    this.name = 'ServiceUnavailableError';
  }
}

/** Network-level failure: DNS, refused connection, reset socket. */
export class APIConnectionError extends ProviderError {
  constructor(provider: string, model: string, detail: string) {
    super(provider, model, 0, detail);
    this.name = 'APIConnectionError';
  }
}

const CONTEXT_WINDOW_PATTERN = /context[_ ]length[_ ]exceeded|maximum context length|context window/i;

/**
 * Map a non-OK upstream HTTP response onto the tagged hierarchy.
 */
export function errorFromStatus(
  provider: string,
  model: string,
  status: number,
  responseBody: string,
  retryAfterMs?: number,
): ProviderError {
  switch (status) {
    case 400:
      return CONTEXT_WINDOW_PATTERN.test(responseBody)
        ? new ContextWindowExceededError(provider, model, responseBody)
        : new BadRequestError(provider, model, responseBody);
    case 401:
      return new AuthenticationError(provider, model, responseBody);
    case 403:
      return new PermissionDeniedError(provider, model, responseBody);
    case 404:
      return new NotFoundError(provider, model, responseBody);
    case 408:
      return new RequestTimeoutError(provider, model, responseBody);
    case 422:
      return new UnprocessableEntityError(provider, model, responseBody);
    case 429:
      return new RateLimitError(provider, model, responseBody, retryAfterMs);
    case 503:
      return new ServiceUnavailableError(provider, model, responseBody);
    default:
      if (status >= 500) {
        return new InternalServerError(provider, model, responseBody, status);
      }
      return new BadRequestError(provider, model, responseBody, status);
  }
}

/**
 * Map a payload that carries an `error` object onto the hierarchy, using its
 * numeric `code` as the status (500 when absent). Returns null for any other
 * payload. Upstreams send these with a 200 status and inside streams.
 */
export function errorFromPayload(
  provider: string,
  model: string,
  payload: unknown,
  raw: string,
): ProviderError | null {
  if (typeof payload !== 'object' || payload === null || !('error' in payload)) {
    return null;
  }
  const inner = payload.error;
  if (typeof inner !== 'object' || inner === null || Array.isArray(inner)) {
    return null;
  }
  const code = 'code' in inner ? inner.code : undefined;
  return errorFromStatus(provider, model, typeof code === 'number' ? code : 500, raw);
}

/** Errors worth another attempt before a response has started. */
export function isRetryable(error: unknown): boolean {
  return (
    error instanceof RateLimitError ||
    error instanceof InternalServerError ||
    error instanceof ServiceUnavailableError ||
    error instanceof APIConnectionError ||
    error instanceof RequestTimeoutError
  );
}

function exceptionPrefix(provider: string): string {
  const name = provider.length > 0 ? provider.charAt(0).toUpperCase() + provider.slice(1) : 'Provider';
  return `${name}Exception`;
}
