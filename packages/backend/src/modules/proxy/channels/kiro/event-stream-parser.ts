/**
 * AWS Event Stream 解析器
 *
 * 不解码二进制帧头，直接在解码后的文本中定位已知的 JSON 事件前缀，
 * 再按括号深度找到完整对象。扫描状态跨 feed 保留，任意切分方式得到相同的事件序列。
 */

import { v4 as uuidv4 } from 'uuid';
import type { EventParser, SemanticEvent } from '../../types.js';
import { ParseError } from '../../errors.js';
import { InlineToolCallExtractor } from './inline-tool-calls.js';
import { logger } from '../../../../lib/logger.js';

type EventKind =
  | 'content'
  | 'tool_start'
  | 'tool_input'
  | 'tool_stop'
  | 'usage'
  | 'context_usage'
  | 'followup';

// 事件模式匹配
const EVENT_PATTERNS: ReadonlyArray<readonly [string, EventKind]> = [
  ['{"content":', 'content'],
  ['{"name":', 'tool_start'],
  ['{"input":', 'tool_input'],
  ['{"stop":', 'tool_stop'],
  ['{"usage":', 'usage'],
  ['{"contextUsagePercentage":', 'context_usage'],
  ['{"followupPrompt":', 'followup'],
];

const MAX_PATTERN_LENGTH = Math.max(...EVENT_PATTERNS.map(([pattern]) => pattern.length));

interface ScanState {
  mode: 'scanning' | 'object';
  kind: EventKind | null;
  /** 当前对象内的 { / [ 嵌套深度 */
  depth: number;
  /** 当前对象在 buffer 中的起始位置 */
  start: number;
  /** 下一个待检查字符的位置 */
  cursor: number;
  inString: boolean;
  escaped: boolean;
}

function scanningState(): ScanState {
  return { mode: 'scanning', kind: null, depth: 0, start: 0, cursor: 0, inString: false, escaped: false };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringifyInput(input: unknown): string {
  if (typeof input === 'string') return input;
  if (typeof input === 'object' && input !== null) return JSON.stringify(input);
  return '';
}

export function generateToolCallId(): string {
  return `call_${uuidv4().replace(/-/g, '').slice(0, 8)}`;
}

export interface KiroEventStreamParserOptions {
  /** 上游未给出 toolUseId 时使用（含 bracket 格式调用） */
  generateToolId?: () => string;
}

export class KiroEventStreamParser implements EventParser {
  private readonly decoder = new TextDecoder('utf-8');
  private readonly generateToolId: () => string;
  private readonly inline: InlineToolCallExtractor;

  private buffer = '';
  private state: ScanState = scanningState();
  private lastContent: string | null = null;
  private openToolId: string | null = null;
  private ended = false;

  constructor(options: KiroEventStreamParserOptions = {}) {
    this.generateToolId = options.generateToolId ?? generateToolCallId;
    this.inline = new InlineToolCallExtractor(this.generateToolId);
  }

  feed(chunk: Uint8Array | string): SemanticEvent[] {
    const text = typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
    return this.consume(text);
  }

  /**
   * 流结束：放出暂存内容，丢弃截断的对象
   */
  end(): SemanticEvent[] {
    if (this.ended) return [];
    this.ended = true;

    const events = this.consume(this.decoder.decode());

    if (this.state.mode === 'object') {
      logger.debug(
        { kind: this.state.kind, pendingChars: this.buffer.length - this.state.start },
        'Discarding truncated event at end of stream'
      );
    }
    this.buffer = '';
    this.state = scanningState();

    events.push(...this.inline.flush());
    return events;
  }

  private consume(text: string): SemanticEvent[] {
    this.buffer += text;
    const events: SemanticEvent[] = [];

    while (true) {
      if (this.state.mode === 'scanning') {
        if (!this.enterObject()) break;
      }

      const end = this.scanObject();
      if (end === -1) break;

      const kind = this.state.kind;
      const json = this.buffer.slice(this.state.start, end + 1);
      this.buffer = this.buffer.slice(end + 1);
      this.state = scanningState();

      if (kind) {
        events.push(...this.dispatch(kind, json));
      }
    }

    return events;
  }

  /**
   * 找到最早出现的事件前缀并进入对象模式；找不到时只保留可能是前缀一部分的尾部
   */
  private enterObject(): boolean {
    let earliestPos = -1;
    let earliestKind: EventKind | null = null;

    for (const [pattern, kind] of EVENT_PATTERNS) {
      const pos = this.buffer.indexOf(pattern);
      if (pos !== -1 && (earliestPos === -1 || pos < earliestPos)) {
        earliestPos = pos;
        earliestKind = kind;
      }
    }

    if (earliestPos === -1) {
      const keep = MAX_PATTERN_LENGTH - 1;
      if (this.buffer.length > keep) {
        this.buffer = this.buffer.slice(this.buffer.length - keep);
      }
      return false;
    }

    this.state = {
      mode: 'object',
      kind: earliestKind,
      depth: 0,
      start: earliestPos,
      cursor: earliestPos,
      inString: false,
      escaped: false,
    };
    return true;
  }

  /**
   * 从 cursor 继续扫描，返回对象结束位置；对象未完整时返回 -1
   */
  private scanObject(): number {
    const state = this.state;

    for (let i = state.cursor; i < this.buffer.length; i++) {
      const char = this.buffer[i];

      if (state.inString) {
        if (state.escaped) {
          state.escaped = false;
        } else if (char === '\\') {
          state.escaped = true;
        } else if (char === '"') {
          state.inString = false;
        }
        continue;
      }

      if (char === '"') {
        state.inString = true;
      } else if (char === '{' || char === '[') {
        state.depth++;
      } else if (char === '}' || char === ']') {
        state.depth--;
        if (state.depth === 0) {
          return i;
        }
      }
    }

    state.cursor = this.buffer.length;
    return -1;
  }

  private dispatch(kind: EventKind, json: string): SemanticEvent[] {
    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (error) {
      const err = new ParseError('Malformed event payload', json.slice(0, 200));
      logger.warn(
        { err, payload: err.payload, reason: error instanceof Error ? error.message : String(error) },
        'Skipping malformed Kiro event'
      );
      return [];
    }

    if (!isRecord(data)) {
      logger.warn({ payload: json.slice(0, 200) }, 'Skipping non-object Kiro event');
      return [];
    }

    switch (kind) {
      case 'content':
        return this.processContent(data);
      case 'tool_start':
        return this.processToolStart(data);
      case 'tool_input':
        return this.processToolInput(data);
      case 'tool_stop':
        return this.processToolStop(data);
      case 'usage':
        return typeof data.usage === 'number' ? [{ type: 'usage', credits: data.usage }] : [];
      case 'context_usage':
        return typeof data.contextUsagePercentage === 'number'
          ? [{ type: 'context_usage', percent: data.contextUsagePercentage }]
          : [];
      case 'followup':
        return [];
    }
  }

  private processContent(data: Record<string, unknown>): SemanticEvent[] {
    // 跳过 followupPrompt
    if (data.followupPrompt !== undefined) {
      return [];
    }

    const content = typeof data.content === 'string' ? data.content : '';

    // 去重重复内容
    if (!content || content === this.lastContent) {
      return [];
    }

    this.lastContent = content;
    return this.inline.push(content);
  }

  private processToolStart(data: Record<string, unknown>): SemanticEvent[] {
    // 结构化工具事件之前的文本不再等待
    const events: SemanticEvent[] = this.inline.flush();

    const id =
      typeof data.toolUseId === 'string' && data.toolUseId ? data.toolUseId : this.generateToolId();
    const name = typeof data.name === 'string' ? data.name : '';

    if (this.openToolId !== id) {
      // 完成之前的工具调用
      if (this.openToolId) {
        events.push({ type: 'tool_stop', id: this.openToolId });
      }
      events.push({ type: 'tool_start', id, name });
      this.openToolId = id;
    }

    const fragment = stringifyInput(data.input);
    if (fragment) {
      events.push({ type: 'tool_input', id, fragment });
    }

    // 如果同时有 stop，立即完成
    if (data.stop === true) {
      events.push({ type: 'tool_stop', id });
      this.openToolId = null;
    }

    return events;
  }

  private processToolInput(data: Record<string, unknown>): SemanticEvent[] {
    const id = typeof data.toolUseId === 'string' && data.toolUseId ? data.toolUseId : this.openToolId;
    if (!id) {
      logger.debug('Dropping tool input without an open tool call');
      return [];
    }

    const fragment = stringifyInput(data.input);
    return fragment ? [{ type: 'tool_input', id, fragment }] : [];
  }

  private processToolStop(data: Record<string, unknown>): SemanticEvent[] {
    if (!this.openToolId || data.stop !== true) {
      return [];
    }

    const id = this.openToolId;
    this.openToolId = null;
    return [{ type: 'tool_stop', id }];
  }
}

/**
 * 按需从字节流产出语义事件
 */
export async function* decodeEventStream(
  source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
  parser: EventParser = new KiroEventStreamParser()
): AsyncGenerator<SemanticEvent> {
  for await (const chunk of source) {
    yield* parser.feed(chunk);
  }
  yield* parser.end();
}
