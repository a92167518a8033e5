import {
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  RateLimitError,
  ContentFilterError,
  ServerError,
  ProviderError,
} from '../types/error.js';
import { getRecord, getString, parseJsonRecord } from './json.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly provider: string;
};

/**
 * Pulls the human-readable message out of an error body.
 * Both providers answer with `{"error": {"message": ..., "type" | "code": ...}}`.
 */
export function extractErrorDetail(body: string): { readonly message: string; readonly code: string | null } {
  const parsed = parseJsonRecord(body);
  const error = getRecord(parsed ?? undefined, 'error');
  const message = getString(error, 'message');
  if (!message) {
    return { message: body, code: null };
  }
  return { message, code: getString(error, 'code') ?? getString(error, 'type') ?? null };
}

/**
 * Maps HTTP status codes and response bodies to the matching ProviderError subclass.
 * Status code decides first; 400 responses are classified by their message.
 */
export function mapHttpError(options: MapHttpErrorOptions): ProviderError {
  const { statusCode, body, provider } = options;
  const { message, code } = extractErrorDetail(body);

  switch (statusCode) {
    case 400:
      return classifyHttp400(message, provider, code, body, statusCode);

    case 401:
      return new AuthenticationError(`Authentication failed: ${message}`, statusCode, provider, code, body);

    case 403:
      return new AccessDeniedError(`Access denied: ${message}`, statusCode, provider, code, body);

    case 404:
      return new NotFoundError(`Resource not found: ${message}`, statusCode, provider, code, body);

    case 413:
      return new ContextLengthError(`Context length exceeded: ${message}`, statusCode, provider, code, body);

    case 422:
      return new InvalidRequestError(`Unprocessable entity: ${message}`, statusCode, provider, code, body);

    case 429:
      return new RateLimitError(`Rate limit exceeded: ${message}`, statusCode, provider, code, body);

    default:
      if (statusCode >= 500) {
        return new ServerError(`Server error: ${message}`, statusCode, provider, code, body);
      }

      return new ProviderError(`HTTP ${statusCode}: ${message}`, statusCode, provider, code, body);
  }
}

function classifyHttp400(
  message: string,
  provider: string,
  code: string | null,
  raw: string,
  statusCode: number,
): ProviderError {
  const lower = message.toLowerCase();

  if (
    lower.includes('content_filter') ||
    lower.includes('content_policy') ||
    lower.includes('safety')
  ) {
    return new ContentFilterError(`Content filtered: ${message}`, statusCode, provider, code, raw);
  }

  if (
    lower.includes('context_length') ||
    lower.includes('too many tokens') ||
    lower.includes('maximum context') ||
    lower.includes('prompt is too long')
  ) {
    return new ContextLengthError(`Context length exceeded: ${message}`, statusCode, provider, code, raw);
  }

  return new InvalidRequestError(`Invalid request: ${message}`, statusCode, provider, code, raw);
}
