/**
 * Proxy 模块类型定义
 * 语义事件、出站增量块，以及核心组件的接口
 */

import type { ChatCompletionRequest, FinishReason } from '@kiro-bridge/shared';

// ==================== 语义事件（上游 → 网关） ====================

export type SemanticEvent =
  | { type: 'content'; text: string }
  | { type: 'tool_start'; id: string; name: string }
  | { type: 'tool_input'; id: string; fragment: string }
  | { type: 'tool_stop'; id: string }
  | { type: 'usage'; credits: number }
  | { type: 'context_usage'; percent: number };

// ==================== 出站增量块（网关 → 客户端） ====================

export type OutboundChunk =
  | { type: 'text'; text: string }
  | { type: 'reasoning'; text: string }
  | { type: 'tool_call'; index: number; id: string; name: string; arguments: string }
  | { type: 'finish'; reason: FinishReason }
  | {
      type: 'usage';
      promptTokens: number;
      completionTokens: number;
      totalTokens: number;
      credits: number;
    };

// ==================== 组件接口 ====================

/**
 * 持有上游凭证，保证并发下只有一次刷新
 */
export interface AuthManager {
  getAccessToken(): Promise<string>;
  /** 上游返回 403 后调用；staleToken 已被替换时不再发起网络请求 */
  forceRefresh(staleToken?: string): Promise<string>;
  getProfileArn(): string | undefined;
  getRegion(): string;
}

export interface ConvertOptions {
  conversationId: string;
  profileArn?: string;
  thinkingBudgetTokens?: number;
}

export interface ConvertResult<TBody> {
  body: TBody;
  kiroModelId: string;
}

export interface RequestConverter<TBody> {
  convert(request: ChatCompletionRequest, options: ConvertOptions): ConvertResult<TBody>;
}

export interface EventParser {
  feed(chunk: Uint8Array | string): SemanticEvent[];
  end(): SemanticEvent[];
}
