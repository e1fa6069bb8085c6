import { describe, it, expect, vi } from 'vitest';
import { UpstreamClient } from '../upstream-client.js';
import type { HttpTransport } from '../upstream-client.js';
import { ClientDisconnectError, UpstreamError } from '../../modules/proxy/errors.js';
import { fakeAuth, fakeResponse } from '../../__tests__/test-utils.js';

function setup(overrides: { timeoutMs?: number; maxRetries?: number; sleep?: (ms: number) => Promise<void> } = {}) {
  const auth = fakeAuth();
  const transport = vi.fn<HttpTransport>();
  const delays: number[] = [];
  const client = new UpstreamClient({
    auth,
    transport,
    sleep: async (ms) => {
      delays.push(ms);
    },
    ...overrides,
  });
  return { auth, transport, delays, client };
}

function authorizationOf(transport: ReturnType<typeof setup>['transport'], call: number): string | undefined {
  return transport.mock.calls[call][1].headers.Authorization;
}

describe('UpstreamClient', () => {
  it('should POST the payload to generateAssistantResponse', async () => {
    const { transport, client } = setup();
    transport.mockResolvedValueOnce(fakeResponse(200));

    const response = await client.generateAssistantResponse({ hello: 'world' });

    expect(response.status).toBe(200);
    expect(transport).toHaveBeenCalledTimes(1);
    const [url, request] = transport.mock.calls[0];
    expect(url).toBe('https://q.us-east-1.amazonaws.com/generateAssistantResponse');
    expect(request.method).toBe('POST');
    expect(request.body).toBe('{"hello":"world"}');
    expect(request.headers.Authorization).toBe('Bearer test-token');
    expect(request.headers['amz-sdk-request']).toBe('attempt=1; max=4');
    expect(request.signal).toBeInstanceOf(AbortSignal);
  });

  it('should force a token refresh once on 403 and retry immediately', async () => {
    const { auth, transport, delays, client } = setup();
    transport.mockResolvedValueOnce(fakeResponse(403)).mockResolvedValueOnce(fakeResponse(200));

    const response = await client.generateAssistantResponse({});

    expect(response.status).toBe(200);
    expect(auth.forceRefresh).toHaveBeenCalledTimes(1);
    expect(auth.forceRefresh).toHaveBeenCalledWith('test-token');
    expect(authorizationOf(transport, 0)).toBe('Bearer test-token');
    expect(authorizationOf(transport, 1)).toBe('Bearer test-token-refreshed');
    expect(delays).toEqual([]);
  });

  it('should fail with forbidden when 403 persists after the refresh', async () => {
    const { auth, transport, client } = setup();
    transport.mockResolvedValue(fakeResponse(403, 'denied'));

    await expect(client.generateAssistantResponse({})).rejects.toMatchObject({
      kind: 'forbidden',
      statusCode: 403,
      message: 'Kiro API error: 403 - denied',
    });
    expect(transport).toHaveBeenCalledTimes(2);
    expect(auth.forceRefresh).toHaveBeenCalledTimes(1);
  });

  it('should count the forced refresh against the retry limit', async () => {
    const { auth, transport, delays, client } = setup();
    transport.mockResolvedValueOnce(fakeResponse(403)).mockResolvedValue(fakeResponse(429, 'slow down'));

    await expect(client.generateAssistantResponse({})).rejects.toMatchObject({ kind: 'rate_limited', statusCode: 429 });
    expect(transport).toHaveBeenCalledTimes(4);
    expect(auth.forceRefresh).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([1000, 2000]);
    expect(transport.mock.calls[3][1].headers['amz-sdk-request']).toBe('attempt=4; max=4');
  });

  it('should stop waiting for backoff when the client disconnects', async () => {
    const controller = new AbortController();
    const sleep = vi.fn((_ms: number) => {
      controller.abort();
      return new Promise<void>(() => {});
    });
    const { transport, client } = setup({ sleep });
    transport.mockResolvedValue(fakeResponse(503));

    await expect(client.generateAssistantResponse({}, { signal: controller.signal })).rejects.toBeInstanceOf(
      ClientDisconnectError
    );
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('should back off 1s, 2s, 4s on 429 and then give up', async () => {
    const { transport, delays, client } = setup();
    transport.mockResolvedValue(fakeResponse(429, 'slow down'));

    const error: unknown = await client.generateAssistantResponse({}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ kind: 'rate_limited', statusCode: 429, type: 'rate_limit_error', upstreamStatus: 429 });
    expect(delays).toEqual([1000, 2000, 4000]);
    expect(transport).toHaveBeenCalledTimes(4);
    expect(transport.mock.calls[3][1].headers['amz-sdk-request']).toBe('attempt=4; max=4');
  });

  it('should retry server errors until success', async () => {
    const { transport, delays, client } = setup();
    transport.mockResolvedValueOnce(fakeResponse(500)).mockResolvedValueOnce(fakeResponse(200));

    const response = await client.generateAssistantResponse({});

    expect(response.status).toBe(200);
    expect(delays).toEqual([1000]);
  });

  it('should not retry other client errors', async () => {
    const { transport, delays, client } = setup();
    transport.mockResolvedValue(fakeResponse(400, 'bad input'));

    await expect(client.generateAssistantResponse({})).rejects.toMatchObject({ kind: 'http', statusCode: 400 });
    expect(transport).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should retry network errors and map exhaustion to 502', async () => {
    const { transport, delays, client } = setup();
    transport.mockRejectedValue(new Error('socket hang up'));

    await expect(client.generateAssistantResponse({})).rejects.toMatchObject({
      kind: 'network',
      statusCode: 502,
      message: 'Kiro request failed: socket hang up',
    });
    expect(transport).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([1000, 2000, 4000]);
  });

  it('should map a timeout before response headers to 504', async () => {
    const { transport, client } = setup({ timeoutMs: 5, maxRetries: 0 });
    transport.mockImplementation(
      (_url, request) =>
        new Promise((_resolve, reject) => {
          request.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    await expect(client.generateAssistantResponse({})).rejects.toMatchObject({ kind: 'timeout', statusCode: 504 });
  });

  it('should not call upstream for an already aborted client', async () => {
    const { transport, client } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(client.generateAssistantResponse({}, { signal: controller.signal })).rejects.toBeInstanceOf(
      ClientDisconnectError
    );
    expect(transport).not.toHaveBeenCalled();
  });

  it('should cancel the attempt when the client disconnects mid-request', async () => {
    const { transport, delays, client } = setup();
    const controller = new AbortController();
    transport.mockImplementation(
      (_url, request) =>
        new Promise((_resolve, reject) => {
          request.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          controller.abort();
        })
    );

    await expect(client.generateAssistantResponse({}, { signal: controller.signal })).rejects.toBeInstanceOf(
      ClientDisconnectError
    );
    expect(transport).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should list available models', async () => {
    const { transport, client } = setup();
    transport.mockResolvedValueOnce(
      fakeResponse(200, JSON.stringify({ models: [{ modelId: 'claude-sonnet-4.5', modelName: 'Sonnet' }] }))
    );

    const result = await client.listAvailableModels();

    expect(transport.mock.calls[0][0]).toBe('https://q.us-east-1.amazonaws.com/ListAvailableModels?origin=AI_EDITOR');
    expect(transport.mock.calls[0][1].method).toBe('GET');
    expect(result.models).toEqual([{ modelId: 'claude-sonnet-4.5', modelName: 'Sonnet' }]);
  });

  it('should reject a models response that is not JSON', async () => {
    const { transport, client } = setup();
    transport.mockResolvedValueOnce(fakeResponse(200, '<html>'));

    await expect(client.listAvailableModels()).rejects.toMatchObject({ kind: 'http', statusCode: 502 });
  });
});
