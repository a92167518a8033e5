import { ANTHROPIC_DEFAULT_BASE_URL, OPENAI_DEFAULT_BASE_URL } from '@ai-request/llm';
import {
  PROVIDER_NAMES,
  isProviderName,
  err,
  ok,
  InvalidConfigurationError,
  UnknownProviderError,
  type Environment,
  type ProviderConfig,
  type ProviderConfigInput,
  type ProviderName,
  type Result,
} from '../types/index.js';
import { parseLogLevel, type LogLevel } from '../logging/logger.js';

export const DEFAULT_PROVIDER: ProviderName = 'anthropic';
export const DEFAULT_TIMEOUT_SECONDS = 30;
/** Longest delay a Node timer takes (2^31 - 1 ms), in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;
export const DEFAULT_MAX_TOOL_CALLS = 3;
export const LOCAL_API_KEY_SENTINEL = 'none';
export const DEFAULT_LOCAL_BASE_URL = 'http://localhost:11434/v1';
export const DEFAULT_CONVERSATION_TTL_MS = 10 * 60 * 1000;

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-sonnet-4-5',
  openai: 'gpt-4o',
  local: 'deepseek-coder:6.7b',
};

const API_KEY_ENV_VARS: Record<ProviderName, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  local: 'AI_REQUEST_LOCAL_API_KEY',
};

const BASE_URL_ENV_VARS: Record<ProviderName, string> = {
  anthropic: 'ANTHROPIC_BASE_URL',
  openai: 'OPENAI_BASE_URL',
  local: 'AI_REQUEST_LOCAL_URL',
};

const DEFAULT_BASE_URLS: Record<ProviderName, string> = {
  anthropic: ANTHROPIC_DEFAULT_BASE_URL,
  openai: OPENAI_DEFAULT_BASE_URL,
  local: DEFAULT_LOCAL_BASE_URL,
};

const REASONING_MODEL_PATTERNS: ReadonlyArray<RegExp> = [
  /^o\d(?:$|-)/,
  /reasoner/,
  /(?:^|[-/:])r1(?:$|[-:])/,
];

/** Empty strings count as unset, matching how shells export blank variables. */
function envValue(env: Environment, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

function resolveInteger(
  bodyValue: number | undefined,
  env: Environment,
  envVar: string,
  fallback: number,
  minimum: number,
  field: string,
  maximum: number = Number.MAX_SAFE_INTEGER,
): Result<number, InvalidConfigurationError> {
  const range = maximum === Number.MAX_SAFE_INTEGER ? `>= ${minimum}` : `between ${minimum} and ${maximum}`;

  if (bodyValue !== undefined) {
    if (!Number.isInteger(bodyValue) || bodyValue < minimum || bodyValue > maximum) {
      return err(new InvalidConfigurationError(`Invalid ${field} '${bodyValue}': must be an integer ${range}`));
    }
    return ok(bodyValue);
  }

  const raw = envValue(env, envVar);
  if (raw === undefined) {
    return ok(fallback);
  }
  const parsed = /^\s*\d+\s*$/.test(raw) ? Number(raw) : NaN;
  if (Number.isNaN(parsed) || parsed < minimum || parsed > maximum) {
    return err(new InvalidConfigurationError(`Invalid ${envVar} '${raw}': must be an integer ${range}`));
  }
  return ok(parsed);
}

/**
 * Resolves the provider configuration for one request.
 *
 * Each field is taken from the request body first, then the environment, then a
 * built-in default. The API key is the exception: the provider's environment
 * variable wins over a key supplied in the body, which is only a fallback.
 */
export function resolveProviderConfig(
  input: ProviderConfigInput | undefined,
  env: Environment,
): Result<ProviderConfig, InvalidConfigurationError> {
  const providerValue = input?.provider || envValue(env, 'AI_REQUEST_PROVIDER') || DEFAULT_PROVIDER;
  if (!isProviderName(providerValue)) {
    return err(new UnknownProviderError(providerValue, PROVIDER_NAMES));
  }
  const provider = providerValue;

  const model = input?.model || envValue(env, 'AI_REQUEST_MODEL') || DEFAULT_MODELS[provider];

  const timeout = resolveInteger(
    input?.timeout,
    env,
    'AI_REQUEST_TIMEOUT',
    DEFAULT_TIMEOUT_SECONDS,
    1,
    'timeout',
    MAX_TIMEOUT_SECONDS,
  );
  if (!timeout.ok) {
    return timeout;
  }

  const maxToolCalls = resolveInteger(
    input?.max_tool_calls,
    env,
    'AI_REQUEST_MAX_TOOL_CALLS',
    DEFAULT_MAX_TOOL_CALLS,
    0,
    'max_tool_calls',
  );
  if (!maxToolCalls.ok) {
    return maxToolCalls;
  }

  const keyEnvVar = API_KEY_ENV_VARS[provider];
  let apiKey = envValue(env, keyEnvVar) || input?.api_key;
  if (!apiKey) {
    if (provider !== 'local') {
      return err(
        new InvalidConfigurationError(
          `API key not found for provider '${provider}'. Set ${keyEnvVar} environment variable.`,
        ),
      );
    }
    apiKey = LOCAL_API_KEY_SENTINEL;
  }

  const baseUrl = input?.base_url || envValue(env, BASE_URL_ENV_VARS[provider]) || DEFAULT_BASE_URLS[provider];

  return ok({
    provider,
    model,
    apiKey,
    baseUrl,
    timeout: timeout.value,
    maxToolCalls: maxToolCalls.value,
  });
}

export function isReasoningModel(model: string): boolean {
  const normalized = model.toLowerCase();
  return REASONING_MODEL_PATTERNS.some((pattern) => pattern.test(normalized));
}

export type BrokerSettings = {
  readonly logLevel: LogLevel;
  readonly conversationTtlMs: number;
};

/** Process-wide settings, read once at startup. */
export function loadBrokerSettings(env: Environment): Result<BrokerSettings, InvalidConfigurationError> {
  const rawLevel = envValue(env, 'AI_REQUEST_LOG_LEVEL');
  const logLevel = rawLevel === undefined ? 'warn' : parseLogLevel(rawLevel);
  if (logLevel === null) {
    return err(
      new InvalidConfigurationError(`Invalid AI_REQUEST_LOG_LEVEL '${rawLevel}': must be one of debug, info, warn, error`),
    );
  }

  const ttl = resolveInteger(
    undefined,
    env,
    'AI_REQUEST_CONVERSATION_TTL_MS',
    DEFAULT_CONVERSATION_TTL_MS,
    1,
    'conversation TTL',
  );
  if (!ttl.ok) {
    return ttl;
  }

  return ok({ logLevel, conversationTtlMs: ttl.value });
}
