import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fetchStream } from './http.js';
import {
  AuthenticationError,
  NetworkError,
  ProviderError,
  RequestTimeoutError,
  ServerError,
} from '../types/error.js';

describe('fetchStream', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function requestInit(): RequestInit | undefined {
    return fetchMock.mock.calls[0]?.[1];
  }

  it('returns the raw Response without reading the body', async () => {
    const response = new Response('data: x\n\n', { status: 200 });
    fetchMock.mockResolvedValue(response);

    const result = await fetchStream({ url: 'https://example.com/api', provider: 'test' });

    expect(result).toBe(response);
    expect(result.bodyUsed).toBe(false);
  });

  it('posts the JSON-serialized body with the default Content-Type', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 200 }));

    await fetchStream({
      url: 'https://example.com/api',
      body: { key: 'value' },
      headers: { 'x-api-key': 'test-key' },
      provider: 'test',
    });

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://example.com/api');
    expect(requestInit()?.method).toBe('POST');
    expect(requestInit()?.body).toBe('{"key":"value"}');
    expect(requestInit()?.headers).toEqual({
      'Content-Type': 'application/json',
      'x-api-key': 'test-key',
    });
  });

  it('maps a 401 to AuthenticationError using the provider message', async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ error: { type: 'authentication_error', message: 'invalid x-api-key' } }), {
        status: 401,
      }),
    );

    const failure = fetchStream({ url: 'https://example.com/api', provider: 'anthropic' });

    await expect(failure).rejects.toThrow(AuthenticationError);
    await expect(failure).rejects.toThrow('Authentication failed: invalid x-api-key');
  });

  it('maps a 503 to ServerError', async () => {
    fetchMock.mockResolvedValue(new Response('upstream unavailable', { status: 503 }));

    await expect(fetchStream({ url: 'https://example.com/api', provider: 'openai' })).rejects.toThrow(
      ServerError,
    );
  });

  it('keeps status and provider on the thrown error', async () => {
    fetchMock.mockResolvedValue(new Response('nope', { status: 418 }));

    const error = await fetchStream({ url: 'https://example.com/api', provider: 'local' }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ statusCode: 418, provider: 'local', message: 'HTTP 418: nope' });
  });

  it('wraps connection failures in NetworkError', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED') }));

    await expect(fetchStream({ url: 'http://localhost:11434/v1', provider: 'local' })).rejects.toThrow(
      'Network error calling local: fetch failed (connect ECONNREFUSED)',
    );
    await expect(fetchStream({ url: 'http://localhost:11434/v1', provider: 'local' })).rejects.toThrow(
      NetworkError,
    );
  });

  it('throws RequestTimeoutError when headers do not arrive in time', async () => {
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(new DOMException('This operation was aborted', 'AbortError'));
          });
        }),
    );

    await expect(
      fetchStream({ url: 'https://example.com/api', provider: 'openai', timeout: { requestMs: 10 } }),
    ).rejects.toThrow(RequestTimeoutError);
  });
});
