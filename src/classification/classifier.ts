/**
 * Error classification: maps any thrown value onto the OpenAI-compatible
 * status/type/code triple returned to clients.
 *
 * Rules are scanned top to bottom and the first match wins, so
 * specializations (context window, unprocessable entity) sit above the
 * BadRequestError they extend.
 */

import { ModelDisabledError, ModelNotFoundError, RequestValidationError } from '../shared/errors.js';
import {
  APIConnectionError,
  AuthenticationError,
  BadRequestError,
  ContextWindowExceededError,
  InternalServerError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitError,
  RequestTimeoutError,
  ServiceUnavailableError,
  UnprocessableEntityError,
} from '../providers/errors.js';
import { extractErrorMessage } from './extract-message.js';

/** HTTP statuses a classified error can carry. */
export type ErrorStatus = 400 | 401 | 403 | 404 | 422 | 429 | 500 | 502 | 503 | 504;

export interface ErrorRule {
  /** Label used in ledger error text and logs. */
  kind: string;
  matches: (error: unknown) => boolean;
  status: ErrorStatus;
  type: string;
  code: string;
}

export interface ClassifiedError {
  kind: string;
  status: ErrorStatus;
  type: string;
  code: string;
  /** Human-readable message with provider wrapping removed. */
  message: string;
}

type ErrorClass = abstract new (...args: never[]) => Error;

function rule(errorClass: ErrorClass, kind: string, status: ErrorStatus, type: string, code: string): ErrorRule {
  return { kind, matches: (error) => error instanceof errorClass, status, type, code };
}

export const ERROR_RULES: readonly ErrorRule[] = Object.freeze([
  rule(RequestValidationError, 'RequestValidationError', 400, 'invalid_request_error', 'invalid_request'),
  rule(ModelNotFoundError, 'ModelNotFoundError', 404, 'invalid_request_error', 'model_not_found'),
  rule(ModelDisabledError, 'ModelDisabledError', 403, 'invalid_request_error', 'model_disabled'),
  rule(RateLimitError, 'RateLimitError', 429, 'rate_limit_error', 'rate_limit_exceeded'),
  rule(AuthenticationError, 'AuthenticationError', 401, 'authentication_error', 'invalid_api_key'),
  rule(PermissionDeniedError, 'PermissionDeniedError', 403, 'permission_denied', 'permission_denied'),
  rule(NotFoundError, 'NotFoundError', 404, 'invalid_request_error', 'model_not_found'),
  rule(RequestTimeoutError, 'RequestTimeoutError', 504, 'timeout_error', 'request_timeout'),
  rule(ContextWindowExceededError, 'ContextWindowExceededError', 400, 'invalid_request_error', 'context_length_exceeded'),
  rule(UnprocessableEntityError, 'UnprocessableEntityError', 422, 'invalid_request_error', 'malformed_request'),
  rule(BadRequestError, 'BadRequestError', 400, 'invalid_request_error', 'bad_request'),
  // Upstream 5xx are logged under one label so the dashboard groups them
  rule(InternalServerError, 'ProviderError', 503, 'service_unavailable', 'service_unavailable'),
  rule(ServiceUnavailableError, 'ProviderError', 503, 'service_unavailable', 'service_unavailable'),
  rule(APIConnectionError, 'APIConnectionError', 502, 'connection_error', 'connection_error'),
]);

const FALLBACK = { kind: 'UnexpectedError', status: 500, type: 'api_error', code: 'internal_error' } as const;

/**
 * Classify a thrown value against an ordered rule table.
 * Anything no rule claims is a 500 `api_error`.
 */
export function classifyError(error: unknown, rules: readonly ErrorRule[] = ERROR_RULES): ClassifiedError {
  const matched = rules.find((candidate) => candidate.matches(error)) ?? FALLBACK;
  return {
    kind: matched.kind,
    status: matched.status,
    type: matched.type,
    code: matched.code,
    message: extractErrorMessage(error),
  };
}

/** Ledger error text: `<Kind>: <clean message>`. */
export function describeForLedger(classified: ClassifiedError): string {
  return `${classified.kind}: ${classified.message}`;
}
