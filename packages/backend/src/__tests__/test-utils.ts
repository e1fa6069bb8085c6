import { ReadableStream } from 'node:stream/web';
import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { UpstreamResponse } from '../lib/upstream-client.js';
import type { AuthManager } from '../modules/proxy/types.js';

const encoder = new TextEncoder();

/**
 * 模拟 Kiro event-stream：每个 JSON 负载前后夹带二进制帧头/校验字节
 */
export function kiroFrames(...payloads: object[]): Uint8Array[] {
  return payloads.map((payload) => {
    const json = encoder.encode(JSON.stringify(payload));
    const frame = new Uint8Array(json.length + 12);
    frame.set([0, 0, 1, 2, 0, 0, 0, 11], 0);
    frame.set(json, 8);
    frame.set([0xde, 0xad, 0xbe, 0xef], 8 + json.length);
    return frame;
  });
}

export function streamOf(chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(chunk);
      controller.close();
    },
  });
}

export function fakeResponse(status: number, text = '', body: ReadableStream<Uint8Array> | null = null): UpstreamResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: {},
    body,
    text: async () => text,
  };
}

export interface FakeAuth extends AuthManager {
  getAccessToken: Mock<() => Promise<string>>;
  forceRefresh: Mock<(stale?: string) => Promise<string>>;
}

export function fakeAuth(token = 'test-token'): FakeAuth {
  return {
    getAccessToken: vi.fn<() => Promise<string>>(async () => token),
    forceRefresh: vi.fn<(stale?: string) => Promise<string>>(async () => `${token}-refreshed`),
    getProfileArn: () => undefined,
    getRegion: () => 'us-east-1',
  };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}
