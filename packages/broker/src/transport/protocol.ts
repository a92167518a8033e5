import { isRecord } from '@ai-request/llm';
import {
  InvalidConfigurationError,
  InvalidRequestError,
  MalformedInputError,
  UnknownRequestTypeError,
  err,
  ok,
  type BrokerError,
  type CompleteRequest,
  type InboundRequest,
  type OutboundEvent,
  type ProviderConfigInput,
  type Result,
  type ToolResponseRequest,
} from '../types/index.js';

type Fields = Record<string, unknown>;
type Check<E> = { readonly invalid: (field: string, expected: string) => E };

const requestCheck: Check<InvalidRequestError> = {
  invalid: (field, expected) => new InvalidRequestError(`Invalid request: field '${field}' must be ${expected}`),
};

const configCheck: Check<InvalidConfigurationError> = {
  invalid: (field, expected) =>
    new InvalidConfigurationError(`Invalid config: field '${field}' must be ${expected}`),
};

function requiredString<E>(fields: Fields, key: string, check: Check<E>): Result<string, E> {
  const value = fields[key];
  return typeof value === 'string' ? ok(value) : err(check.invalid(key, 'a string'));
}

/** JSON null reads the same as an omitted field. */
function optionalString<E>(fields: Fields, key: string, check: Check<E>): Result<string | undefined, E> {
  const value = fields[key];
  if (value === undefined || value === null) {
    return ok(undefined);
  }
  return typeof value === 'string' ? ok(value) : err(check.invalid(key, 'a string'));
}

function optionalInteger<E>(fields: Fields, key: string, check: Check<E>): Result<number | undefined, E> {
  const value = fields[key];
  if (value === undefined || value === null) {
    return ok(undefined);
  }
  return typeof value === 'number' && Number.isInteger(value) ? ok(value) : err(check.invalid(key, 'an integer'));
}

function decodeConfig(value: unknown): Result<ProviderConfigInput | undefined, BrokerError> {
  if (value === undefined || value === null) {
    return ok(undefined);
  }
  if (!isRecord(value)) {
    return err(new InvalidConfigurationError("Invalid config: field 'config' must be an object"));
  }

  const provider = optionalString(value, 'provider', configCheck);
  if (!provider.ok) return provider;
  const model = optionalString(value, 'model', configCheck);
  if (!model.ok) return model;
  const apiKey = optionalString(value, 'api_key', configCheck);
  if (!apiKey.ok) return apiKey;
  const baseUrl = optionalString(value, 'base_url', configCheck);
  if (!baseUrl.ok) return baseUrl;
  const timeout = optionalInteger(value, 'timeout', configCheck);
  if (!timeout.ok) return timeout;
  const maxToolCalls = optionalInteger(value, 'max_tool_calls', configCheck);
  if (!maxToolCalls.ok) return maxToolCalls;

  return ok({
    provider: provider.value,
    model: model.value,
    api_key: apiKey.value,
    base_url: baseUrl.value,
    timeout: timeout.value,
    max_tool_calls: maxToolCalls.value,
  });
}

/** Validates an already-parsed line against the two request shapes. */
export function decodeRequest(value: unknown): Result<InboundRequest, BrokerError> {
  if (!isRecord(value)) {
    return err(new MalformedInputError('Invalid request: expected a JSON object'));
  }

  const type = requiredString(value, 'type', requestCheck);
  if (!type.ok) return type;

  switch (type.value) {
    case 'complete': {
      const requestId = optionalString(value, 'request_id', requestCheck);
      if (!requestId.ok) return requestId;
      const context = requiredString(value, 'context', requestCheck);
      if (!context.ok) return context;
      const prompt = optionalString(value, 'prompt', requestCheck);
      if (!prompt.ok) return prompt;
      const config = decodeConfig(value['config']);
      if (!config.ok) return config;

      const request: CompleteRequest = {
        type: 'complete',
        request_id: requestId.value,
        context: context.value,
        prompt: prompt.value,
        config: config.value,
      };
      return ok(request);
    }
    case 'tool_response': {
      const requestId = requiredString(value, 'request_id', requestCheck);
      if (!requestId.ok) return requestId;
      const toolCallId = requiredString(value, 'tool_call_id', requestCheck);
      if (!toolCallId.ok) return toolCallId;
      const content = requiredString(value, 'content', requestCheck);
      if (!content.ok) return content;

      const request: ToolResponseRequest = {
        type: 'tool_response',
        request_id: requestId.value,
        tool_call_id: toolCallId.value,
        content: content.value,
      };
      return ok(request);
    }
    default:
      return err(new UnknownRequestTypeError(type.value));
  }
}

export function decodeLine(line: string): Result<InboundRequest, BrokerError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return err(new MalformedInputError(`Invalid JSON: ${detail}`));
  }
  return decodeRequest(parsed);
}

/** One NDJSON line, without the trailing newline. */
export function encodeEvent(event: OutboundEvent): string {
  return JSON.stringify(event);
}
