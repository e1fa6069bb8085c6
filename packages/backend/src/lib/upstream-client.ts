/**
 * Kiro 上游 HTTP 客户端
 *
 * 核心能力：
 * 1. 每次尝试重新生成请求头（携带当前 access token）
 * 2. 403 时强制刷新 token 并立即重试一次
 * 3. 429 / 5xx / 超时 / 网络错误按 1s、2s、4s 退避
 * 4. 以上重试共用同一上限（默认首次之外 3 次）
 * 5. 客户端断开时立即取消，不重试，也不再等待退避
 * 6. 代理支持（UPSTREAM_PROXY_URL）
 */

import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import type { ReadableStream } from 'node:stream/web';
import { UPSTREAM_RETRY, listModelsResponseSchema } from '@kiro-bridge/shared';
import type { ListModelsResponse } from '@kiro-bridge/shared';
import type { AuthManager } from '../modules/proxy/types.js';
import { ClientDisconnectError, UpstreamError } from '../modules/proxy/errors.js';
import type { UpstreamErrorKind } from '../modules/proxy/errors.js';
import { getKiroEndpoint, getKiroHeaders, KIRO_GENERATE_PATH, KIRO_MODELS_PATH } from '../modules/proxy/channels/kiro/models.js';
import { logger } from './logger.js';

// ==================== 传输层 ====================

export interface UpstreamRequest {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

/**
 * 统一的上游响应接口
 */
export interface UpstreamResponse {
  ok: boolean;
  status: number;
  headers: Record<string, string>;
  /** 流式 body，未读取前不缓冲 */
  body: ReadableStream<Uint8Array> | null;
  text(): Promise<string>;
}

export type HttpTransport = (url: string, request: UpstreamRequest) => Promise<UpstreamResponse>;

/**
 * 基于 undici fetch 的传输层
 */
export function createUndiciTransport(dispatcher?: Dispatcher): HttpTransport {
  return async (url, request) => {
    const response = await fetch(url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: request.signal,
      dispatcher,
    });

    // 收集响应头
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      ok: response.ok,
      status: response.status,
      headers,
      body: response.body,
      text: () => response.text(),
    };
  };
}

// ==================== 客户端 ====================

export interface UpstreamClientOptions {
  auth: AuthManager;
  transport: HttpTransport;
  /** 单次尝试超时（到收到响应头为止） */
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

type AttemptOutcome =
  | { kind: 'response'; response: UpstreamResponse }
  | { kind: 'timeout' }
  | { kind: 'network'; error: unknown };

function retryKindForStatus(status: number): UpstreamErrorKind | null {
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'server_error';
  return null;
}

export class UpstreamClient {
  private readonly auth: AuthManager;
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: UpstreamClientOptions) {
    this.auth = options.auth;
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.maxRetries = options.maxRetries ?? UPSTREAM_RETRY.MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? UPSTREAM_RETRY.BASE_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * 发送 generateAssistantResponse，返回未读取的流式响应
   */
  async generateAssistantResponse(payload: unknown, options: GenerateOptions = {}): Promise<UpstreamResponse> {
    const url = `${getKiroEndpoint(this.auth.getRegion())}${KIRO_GENERATE_PATH}`;
    return this.send(url, 'POST', JSON.stringify(payload), options.signal);
  }

  /**
   * 获取可用模型列表
   */
  async listAvailableModels(options: GenerateOptions = {}): Promise<ListModelsResponse> {
    const url = `${getKiroEndpoint(this.auth.getRegion())}${KIRO_MODELS_PATH}`;
    const response = await this.send(url, 'GET', undefined, options.signal);
    const text = await response.text();

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new UpstreamError('http', 'ListAvailableModels returned invalid JSON', response.status);
    }
    return listModelsResponseSchema.parse(data);
  }

  private async send(
    url: string,
    method: UpstreamRequest['method'],
    body: string | undefined,
    signal: AbortSignal | undefined
  ): Promise<UpstreamResponse> {
    let token = await this.auth.getAccessToken();
    let forcedRefresh = false;
    let retries = 0;
    let backoffs = 0;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new ClientDisconnectError();
      }

      const outcome = await this.attempt(url, {
        method,
        headers: getKiroHeaders(token, attempt, this.maxRetries + 1),
        body,
      }, signal);

      let failure: { kind: UpstreamErrorKind; message: string; status?: number };

      if (outcome.kind === 'response') {
        const { response } = outcome;

        if (response.ok) {
          return response;
        }

        // 403：token 可能已失效，强制刷新后立即重试（每个请求一次，占用重试次数）
        if (response.status === 403 && !forcedRefresh && retries < this.maxRetries) {
          forcedRefresh = true;
          retries++;
          await discardBody(response);
          logger.warn({ url, attempt }, 'Kiro returned 403, forcing token refresh');
          token = await this.auth.forceRefresh(token);
          continue;
        }

        const errorText = await readErrorText(response);
        const retryKind = retryKindForStatus(response.status);

        if (!retryKind) {
          logger.error({ url, status: response.status, error: errorText }, 'Kiro request failed');
          throw new UpstreamError(
            response.status === 403 ? 'forbidden' : 'http',
            `Kiro API error: ${response.status}${errorText ? ` - ${errorText}` : ''}`,
            response.status
          );
        }

        failure = {
          kind: retryKind,
          message: `Kiro API error: ${response.status}${errorText ? ` - ${errorText}` : ''}`,
          status: response.status,
        };
      } else if (outcome.kind === 'timeout') {
        failure = { kind: 'timeout', message: `Kiro request timed out after ${this.timeoutMs}ms` };
      } else {
        const reason = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
        failure = { kind: 'network', message: `Kiro request failed: ${reason}` };
      }

      if (retries >= this.maxRetries) {
        logger.error({ url, kind: failure.kind, status: failure.status, retries }, 'Kiro request retries exhausted');
        throw new UpstreamError(failure.kind, failure.message, failure.status);
      }

      const delay = this.baseDelayMs * 2 ** backoffs;
      backoffs++;
      retries++;
      logger.warn(
        { url, kind: failure.kind, status: failure.status, delay, retry: retries },
        'Kiro request failed, retrying'
      );
      await this.backoff(delay, signal);
    }
  }

  /**
   * 退避等待，客户端断开时立即结束
   */
  private async backoff(ms: number, signal: AbortSignal | undefined): Promise<void> {
    if (!signal) {
      await this.sleep(ms);
      return;
    }
    if (signal.aborted) {
      throw new ClientDisconnectError();
    }

    let onAbort = (): void => {};
    const aborted = new Promise<void>((resolve) => {
      onAbort = () => resolve();
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      await Promise.race([this.sleep(ms), aborted]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }

    if (signal.aborted) {
      throw new ClientDisconnectError();
    }
  }

  /**
   * 单次尝试：超时只覆盖到收到响应头为止，之后由客户端 signal 控制
   */
  private async attempt(url: string, request: UpstreamRequest, signal: AbortSignal | undefined): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const onClientAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onClientAbort, { once: true });

    try {
      const response = await this.transport(url, { ...request, signal: controller.signal });
      // 成功时保留监听：读取响应体期间客户端断开仍会取消上游
      return { kind: 'response', response };
    } catch (error) {
      signal?.removeEventListener('abort', onClientAbort);
      if (signal?.aborted) {
        throw new ClientDisconnectError();
      }
      if (timedOut) {
        return { kind: 'timeout' };
      }
      return { kind: 'network', error };
    } finally {
      clearTimeout(timer);
    }
  }
}

async function readErrorText(response: UpstreamResponse): Promise<string> {
  try {
    return (await response.text()).slice(0, 500);
  } catch (error) {
    logger.debug({ error }, 'Failed to read Kiro error body');
    return '';
  }
}

async function discardBody(response: UpstreamResponse): Promise<void> {
  if (!response.body) return;
  try {
    await response.body.cancel();
  } catch (error) {
    logger.debug({ error }, 'Failed to discard Kiro response body');
  }
}
