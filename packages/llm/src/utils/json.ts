export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(record: JsonRecord | undefined, key: string): string | undefined {
  const value = record?.[key];
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(record: JsonRecord | undefined, key: string): number | undefined {
  const value = record?.[key];
  return typeof value === 'number' ? value : undefined;
}

export function getRecord(record: JsonRecord | undefined, key: string): JsonRecord | undefined {
  const value = record?.[key];
  return isRecord(value) ? value : undefined;
}

export function getArray(record: JsonRecord | undefined, key: string): ReadonlyArray<unknown> | undefined {
  const value = record?.[key];
  return Array.isArray(value) ? value : undefined;
}

/**
 * Parses one SSE data payload. Returns null for anything that is not a JSON object,
 * so callers can skip keep-alive and sentinel frames.
 */
export function parseJsonRecord(text: string): JsonRecord | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Decodes the concatenated argument fragments of a finished tool call.
 * Empty, undecodable, or non-object input yields an empty argument set.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  if (raw.trim() === '') {
    return {};
  }
  return parseJsonRecord(raw) ?? {};
}
