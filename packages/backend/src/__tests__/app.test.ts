import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import type { Server } from 'http';
import { fetch } from 'undici';
import { createApp } from '../app.js';
import { GatewayService } from '../modules/proxy/index.js';
import { UpstreamClient } from '../lib/upstream-client.js';
import type { HttpTransport } from '../lib/upstream-client.js';
import { ModelCatalog } from '../modules/models/model-catalog.js';
import { fakeAuth, fakeResponse, kiroFrames, streamOf } from './test-utils.js';

const API_KEY = 'test-secret';

describe('app', () => {
  let server: Server;
  let baseUrl: string;
  let transport: Mock<HttpTransport>;

  beforeEach(async () => {
    const auth = fakeAuth();
    transport = vi.fn<HttpTransport>();
    const gateway = new GatewayService({
      auth,
      upstream: new UpstreamClient({ auth, transport, sleep: async () => {} }),
      catalog: new ModelCatalog({ fetchModels: async () => ({ models: [] }) }),
    });

    server = createApp({ gateway, apiKey: API_KEY }).listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  function post(body: unknown, headers: Record<string, string> = {}) {
    return fetch(`${baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${API_KEY}`, ...headers },
      body: JSON.stringify(body),
    });
  }

  it('should answer health checks without a key', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('should reject requests without an API key', async () => {
    const res = await fetch(`${baseUrl}/v1/models`);

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { message: 'Missing API key', type: 'authentication_error', code: 'unauthorized', param: null },
    });
  });

  it('should reject a wrong API key', async () => {
    const res = await fetch(`${baseUrl}/v1/models`, { headers: { Authorization: 'Bearer wrong-key' } });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { message: 'Invalid API key', type: 'authentication_error', code: 'api_key_invalid', param: null },
    });
  });

  it('should list models with the x-api-key header', async () => {
    const res = await fetch(`${baseUrl}/v1/models`, { headers: { 'x-api-key': API_KEY } });

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({ object: 'list' });
    expect(body).toHaveProperty('data.length', 6);
  });

  it('should return 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { message: 'Unknown route: GET /nope', type: 'invalid_request_error', code: 'not_found', param: null },
    });
  });

  it('should return 400 for an invalid body', async () => {
    const res = await post({ model: 'claude-sonnet-4-5' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        message: "Invalid request body at 'messages': Required",
        type: 'invalid_request_error',
        code: 'validation_error',
        param: null,
      },
    });
    expect(transport).not.toHaveBeenCalled();
  });

  it('should return 404 for an unknown model', async () => {
    const res = await post({ model: 'gpt-4o', messages: [{ role: 'user', content: 'Hi' }] });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: {
        message: "The model 'gpt-4o' does not exist",
        type: 'invalid_request_error',
        code: 'model_not_found',
        param: null,
      },
    });
  });

  it('should stream chat completions as SSE', async () => {
    transport.mockResolvedValueOnce(fakeResponse(200, '', streamOf(kiroFrames({ content: 'Hello' }))));

    const res = await post({ model: 'claude-sonnet-4-5', stream: true, messages: [{ role: 'user', content: 'Hi' }] });

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/event-stream');

    const lines = (await res.text()).split('\n\n').filter(Boolean);
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('data: [DONE]');

    const first: unknown = JSON.parse(lines[0].slice('data: '.length));
    const second: unknown = JSON.parse(lines[1].slice('data: '.length));
    expect(first).toMatchObject({
      object: 'chat.completion.chunk',
      model: 'claude-sonnet-4-5',
      choices: [{ index: 0, delta: { role: 'assistant', content: 'Hello' }, finish_reason: null }],
    });
    expect(second).toMatchObject({ choices: [{ index: 0, delta: {}, finish_reason: 'stop' }] });
  });

  it('should return a chat.completion for non-streaming requests', async () => {
    transport.mockResolvedValueOnce(fakeResponse(200, '', streamOf(kiroFrames({ content: 'Hello' }))));

    const res = await post({ model: 'claude-sonnet-4-5', messages: [{ role: 'user', content: 'Hi' }] });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      object: 'chat.completion',
      model: 'claude-sonnet-4-5',
      choices: [{ index: 0, message: { role: 'assistant', content: 'Hello' }, finish_reason: 'stop' }],
    });
  });

  it('should surface upstream rate limiting after retries', async () => {
    transport.mockResolvedValue(fakeResponse(429, 'slow down'));

    const res = await post({ model: 'claude-sonnet-4-5', stream: true, messages: [{ role: 'user', content: 'Hi' }] });

    expect(res.status).toBe(429);
    expect(await res.json()).toEqual({
      error: {
        message: 'Kiro API error: 429 - slow down',
        type: 'rate_limit_error',
        code: 'upstream_rate_limited',
        param: null,
      },
    });
    expect(transport).toHaveBeenCalledTimes(4);
  });
});
