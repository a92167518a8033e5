export const PROVIDER_NAMES = ['anthropic', 'openai', 'local'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/** The optional `config` object of a complete request, as sent on the wire. */
export type ProviderConfigInput = {
  readonly provider?: string;
  readonly model?: string;
  readonly api_key?: string;
  readonly base_url?: string;
  readonly timeout?: number;
  readonly max_tool_calls?: number;
};

export type ProviderConfig = {
  readonly provider: ProviderName;
  readonly model: string;
  readonly apiKey: string;
  readonly baseUrl: string;
  /** Seconds. */
  readonly timeout: number;
  readonly maxToolCalls: number;
};

export type Environment = Readonly<Record<string, string | undefined>>;
