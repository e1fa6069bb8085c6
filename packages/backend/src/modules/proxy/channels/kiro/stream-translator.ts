/**
 * 语义事件 → 出站增量块
 *
 * 工具调用在 stop 时一次性输出（参数已规范化为 JSON）；
 * 开启 extractThinking 时，开头的 <thinking>...</thinking> 作为 reasoning 输出。
 */

import { getContextWindow } from '@kiro-bridge/shared';
import type { OutboundChunk, SemanticEvent } from '../../types.js';
import { logger } from '../../../../lib/logger.js';

const THINKING_OPEN = '<thinking>';
const THINKING_CLOSE = '</thinking>';

export interface StreamTranslatorOptions {
  /** Kiro 模型 ID，用于换算上下文占用 */
  kiroModelId: string;
  /** 没有上下文占用百分比时使用的 prompt token 估算 */
  promptTokensEstimate?: number;
  extractThinking?: boolean;
}

interface PendingToolCall {
  id: string;
  name: string;
  arguments: string;
}

/**
 * 估算 token 数（约 4 字符 1 token）
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Thinking 标签解析（标签可能被拆分到多个事件）
 */
class ThinkingSplitter {
  private mode: 'detecting' | 'thinking' | 'text' = 'detecting';
  private pending = '';
  private trimNextText = false;

  push(content: string): OutboundChunk[] {
    this.pending += content;
    const chunks: OutboundChunk[] = [];

    while (this.pending.length > 0) {
      if (this.mode === 'detecting') {
        const trimmed = this.pending.trimStart();

        if (trimmed.startsWith(THINKING_OPEN)) {
          this.pending = trimmed.slice(THINKING_OPEN.length);
          this.mode = 'thinking';
          logger.debug('Detected <thinking> tag at start');
          continue;
        }

        // 可能是不完整的 <thinking> 标签，等待更多内容
        if (THINKING_OPEN.startsWith(trimmed)) {
          break;
        }

        this.mode = 'text';
        continue;
      }

      if (this.mode === 'thinking') {
        const closeIndex = this.pending.indexOf(THINKING_CLOSE);

        if (closeIndex !== -1) {
          const reasoning = this.pending.slice(0, closeIndex);
          if (reasoning) chunks.push({ type: 'reasoning', text: reasoning });
          this.pending = this.pending.slice(closeIndex + THINKING_CLOSE.length);
          this.mode = 'text';
          this.trimNextText = true;
          continue;
        }

        // 保留末尾可能是 </thinking> 一部分的内容
        const holdLength = partialSuffixLength(this.pending, THINKING_CLOSE);
        const safe = this.pending.slice(0, this.pending.length - holdLength);
        if (safe) chunks.push({ type: 'reasoning', text: safe });
        this.pending = this.pending.slice(safe.length);
        break;
      }

      let text = this.pending;
      this.pending = '';
      if (this.trimNextText) {
        text = text.trimStart();
        if (!text) break;
        this.trimNextText = false;
      }
      chunks.push({ type: 'text', text });
    }

    return chunks;
  }

  flush(): OutboundChunk[] {
    const rest = this.pending;
    this.pending = '';
    if (!rest) return [];
    return [{ type: this.mode === 'thinking' ? 'reasoning' : 'text', text: rest }];
  }
}

/**
 * text 末尾与 tag 开头重合的最大长度
 */
function partialSuffixLength(text: string, tag: string): number {
  for (let len = Math.min(tag.length - 1, text.length); len > 0; len--) {
    if (tag.startsWith(text.slice(text.length - len))) {
      return len;
    }
  }
  return 0;
}

function normalizeArguments(call: PendingToolCall): string {
  if (!call.arguments.trim()) {
    return '{}';
  }
  try {
    return JSON.stringify(JSON.parse(call.arguments));
  } catch {
    logger.warn({ toolName: call.name, args: call.arguments.slice(0, 200) }, 'Failed to parse tool arguments');
    return '{}';
  }
}

function isValidJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

export class KiroStreamTranslator {
  private readonly openTools = new Map<string, PendingToolCall>();
  private readonly emittedIds = new Set<string>();
  private readonly emittedKeys = new Set<string>();
  private readonly thinking: ThinkingSplitter | null;

  private nextToolIndex = 0;
  private completionChars = 0;
  private usageSeen = false;
  private credits = 0;
  private contextPercent: number | undefined;
  private finished = false;

  constructor(private readonly options: StreamTranslatorOptions) {
    this.thinking = options.extractThinking ? new ThinkingSplitter() : null;
  }

  push(event: SemanticEvent): OutboundChunk[] {
    switch (event.type) {
      case 'content':
        this.completionChars += event.text.length;
        return this.thinking ? this.thinking.push(event.text) : [{ type: 'text', text: event.text }];

      case 'tool_start':
        // 已打开的同一 id 视为续传
        if (!this.openTools.has(event.id)) {
          this.openTools.set(event.id, { id: event.id, name: event.name, arguments: '' });
        }
        return [];

      case 'tool_input': {
        const call = this.openTools.get(event.id);
        if (!call) {
          logger.debug({ toolUseId: event.id }, 'Dropping input for unknown tool call');
          return [];
        }
        call.arguments += event.fragment;
        return [];
      }

      case 'tool_stop': {
        const call = this.openTools.get(event.id);
        if (!call) return [];
        this.openTools.delete(event.id);
        return this.emitToolCall(call, normalizeArguments(call));
      }

      case 'usage':
        this.usageSeen = true;
        this.credits += event.credits;
        return [];

      case 'context_usage':
        this.contextPercent = event.percent;
        return [];

      default: {
        const exhaustive: never = event;
        return exhaustive;
      }
    }
  }

  /**
   * 流结束：补完参数完整的未关闭工具调用，然后输出 finish 和 usage
   */
  finish(): OutboundChunk[] {
    if (this.finished) return [];
    this.finished = true;

    const chunks: OutboundChunk[] = this.thinking ? this.thinking.flush() : [];

    for (const call of this.openTools.values()) {
      if (call.arguments.trim() && isValidJson(call.arguments)) {
        chunks.push(...this.emitToolCall(call, JSON.stringify(JSON.parse(call.arguments))));
      } else {
        logger.warn({ toolName: call.name, toolUseId: call.id }, 'Discarding incomplete tool call at end of stream');
      }
    }
    this.openTools.clear();

    chunks.push({ type: 'finish', reason: this.nextToolIndex > 0 ? 'tool_calls' : 'stop' });

    if (this.usageSeen) {
      const completionTokens = Math.ceil(this.completionChars / 4);
      const promptTokens = this.estimatePromptTokens(completionTokens);
      chunks.push({
        type: 'usage',
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
        credits: this.credits,
      });
    }

    return chunks;
  }

  get toolCallCount(): number {
    return this.nextToolIndex;
  }

  private estimatePromptTokens(completionTokens: number): number {
    if (this.contextPercent !== undefined) {
      const contextWindow = getContextWindow(this.options.kiroModelId);
      const totalTokens = Math.round((this.contextPercent / 100) * contextWindow);
      return Math.max(0, totalTokens - completionTokens);
    }
    return this.options.promptTokensEstimate ?? 0;
  }

  private emitToolCall(call: PendingToolCall, args: string): OutboundChunk[] {
    const key = `${call.name}-${args}`;
    if (this.emittedIds.has(call.id) || this.emittedKeys.has(key)) {
      logger.debug({ toolName: call.name, toolUseId: call.id }, 'Dropping duplicate tool call');
      return [];
    }

    this.emittedIds.add(call.id);
    this.emittedKeys.add(key);

    return [
      {
        type: 'tool_call',
        index: this.nextToolIndex++,
        id: call.id,
        name: call.name,
        arguments: args,
      },
    ];
  }
}
