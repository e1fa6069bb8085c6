/**
 * 网关核心服务
 *
 * 入站 OpenAI 请求 → Kiro 请求 → 上游（重试 / 强制刷新）→ 事件解析 → 出站增量块
 */

import { v4 as uuidv4 } from 'uuid';
import { resolveModelAlias } from '@kiro-bridge/shared';
import type { ChatCompletion, ChatCompletionRequest, ModelListResponse } from '@kiro-bridge/shared';
import type { UpstreamClient, UpstreamResponse } from '../../lib/upstream-client.js';
import type { ModelCatalog } from '../models/model-catalog.js';
import type { AuthManager, ConvertResult, EventParser, OutboundChunk, RequestConverter } from './types.js';
import { ClientDisconnectError, UnknownModelError } from './errors.js';
import type { KiroRequest } from './channels/kiro/index.js';
import {
  KiroEventStreamParser,
  KiroStreamTranslator,
  convertKiroToOpenAI,
  decodeEventStream,
  estimateTokens,
  kiroRequestConverter,
} from './channels/kiro/index.js';
import { createCompletionId } from './openai-stream.js';
import { logger } from '../../lib/logger.js';

export interface FakeReasoningOptions {
  enabled: boolean;
  maxTokens: number;
}

export interface GatewayServiceOptions {
  auth: AuthManager;
  upstream: UpstreamClient;
  catalog: ModelCatalog;
  converter?: RequestConverter<KiroRequest>;
  createParser?: () => EventParser;
  fakeReasoning?: FakeReasoningOptions;
  generateConversationId?: () => string;
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

export class GatewayService {
  private readonly auth: AuthManager;
  private readonly upstream: UpstreamClient;
  private readonly catalog: ModelCatalog;
  private readonly converter: RequestConverter<KiroRequest>;
  private readonly createParser: () => EventParser;
  private readonly fakeReasoning: FakeReasoningOptions;
  private readonly generateConversationId: () => string;

  constructor(options: GatewayServiceOptions) {
    this.auth = options.auth;
    this.upstream = options.upstream;
    this.catalog = options.catalog;
    this.converter = options.converter ?? kiroRequestConverter;
    this.createParser = options.createParser ?? (() => new KiroEventStreamParser());
    this.fakeReasoning = options.fakeReasoning ?? { enabled: false, maxTokens: 0 };
    this.generateConversationId = options.generateConversationId ?? uuidv4;
  }

  /**
   * OpenAI 请求 → Kiro 请求体
   */
  convertRequest(request: ChatCompletionRequest): ConvertResult<KiroRequest> {
    return this.converter.convert(request, {
      conversationId: this.generateConversationId(),
      profileArn: this.auth.getProfileArn(),
      thinkingBudgetTokens: this.fakeReasoning.enabled ? this.fakeReasoning.maxTokens : undefined,
    });
  }

  /**
   * 发送请求并返回出站块序列
   *
   * 转换、鉴权和上游错误在返回前抛出（此时还未写响应头）
   */
  async streamCompletion(
    request: ChatCompletionRequest,
    options: CompletionOptions = {}
  ): Promise<AsyncIterable<OutboundChunk>> {
    // 未知模型不触发 token 刷新
    if (!resolveModelAlias(request.model)) {
      throw new UnknownModelError(request.model);
    }

    // 凭证先加载，profileArn 才可用
    await this.auth.getAccessToken();

    const { body, kiroModelId } = this.convertRequest(request);
    const response = await this.upstream.generateAssistantResponse(body, { signal: options.signal });

    logger.info(
      { model: request.model, kiroModelId, stream: request.stream, messages: request.messages.length },
      'Kiro stream started'
    );

    const translator = new KiroStreamTranslator({
      kiroModelId,
      promptTokensEstimate: estimateTokens(JSON.stringify(body.conversationState)),
      extractThinking: this.fakeReasoning.enabled,
    });

    return this.translate(response, this.createParser(), translator, options.signal);
  }

  /**
   * 非流式：聚合全部出站块
   */
  async complete(request: ChatCompletionRequest, options: CompletionOptions = {}): Promise<ChatCompletion> {
    const chunks: OutboundChunk[] = [];
    for await (const chunk of await this.streamCompletion(request, options)) {
      chunks.push(chunk);
    }

    if (options.signal?.aborted) {
      throw new ClientDisconnectError();
    }

    return convertKiroToOpenAI(chunks, {
      id: createCompletionId(),
      created: Math.floor(Date.now() / 1000),
      model: request.model,
    });
  }

  getModelCatalog(): Promise<ModelListResponse> {
    return this.catalog.list();
  }

  private async *translate(
    response: UpstreamResponse,
    parser: EventParser,
    translator: KiroStreamTranslator,
    signal: AbortSignal | undefined
  ): AsyncGenerator<OutboundChunk> {
    try {
      for await (const event of decodeEventStream(response.body ?? [], parser)) {
        if (signal?.aborted) {
          throw new ClientDisconnectError();
        }
        yield* translator.push(event);
      }
    } catch (error) {
      if (signal?.aborted || error instanceof ClientDisconnectError) {
        // 客户端已断开：丢弃未完成的工具调用，不再输出
        logger.info('Client disconnected, upstream stream cancelled');
        return;
      }
      // 读取中断：尽力输出 finish
      logger.error({ err: error }, 'Kiro stream read failed, finishing early');
    }

    yield* translator.finish();
  }
}
