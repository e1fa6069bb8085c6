/**
 * 文本中的 bracket 格式工具调用
 * 格式: [Called func_name with args: {...}]
 *
 * 增量识别：可能是调用头的文本先暂存，确定不是调用后再作为普通内容放出
 */

import type { SemanticEvent } from '../../types.js';
import { logger } from '../../../../lib/logger.js';

const HEADER_PATTERN = /^\[Called\s+(\w+)\s+with\s+args:\s*/i;

type HeaderToken = { literal: string } | { repeat: RegExp };

// 调用头的逐段描述，用于判断一段不完整的文本是否还可能成为调用头
const HEADER_TOKENS: HeaderToken[] = [
  { literal: '[called' },
  { repeat: /\s/ },
  { repeat: /\w/ },
  { repeat: /\s/ },
  { literal: 'with' },
  { repeat: /\s/ },
  { literal: 'args:' },
];

function couldBeHeaderPrefix(text: string): boolean {
  const lower = text.toLowerCase();
  let i = 0;

  for (const token of HEADER_TOKENS) {
    if (i === lower.length) return true;

    if ('literal' in token) {
      const rest = lower.slice(i, i + token.literal.length);
      if (!token.literal.startsWith(rest)) return false;
      i += rest.length;
      continue;
    }

    const from = i;
    while (i < lower.length && token.repeat.test(lower[i])) i++;
    if (i === from) return false;
  }

  return true;
}

/**
 * 找到从 start 开始的 JSON 对象的结束位置（考虑字符串与转义）
 */
export function findJsonObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      depth++;
    } else if (char === '}' || char === ']') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

type MatchResult =
  | { kind: 'incomplete' }
  | { kind: 'no_match' }
  | { kind: 'match'; name: string; args: string; length: number };

function matchCall(text: string): MatchResult {
  const header = HEADER_PATTERN.exec(text);
  if (!header) {
    return couldBeHeaderPrefix(text) ? { kind: 'incomplete' } : { kind: 'no_match' };
  }

  const jsonStart = header[0].length;
  if (jsonStart >= text.length) return { kind: 'incomplete' };
  if (text[jsonStart] !== '{') return { kind: 'no_match' };

  const jsonEnd = findJsonObjectEnd(text, jsonStart);
  if (jsonEnd === -1) return { kind: 'incomplete' };

  let close = jsonEnd + 1;
  while (close < text.length && /\s/.test(text[close])) close++;
  if (close >= text.length) return { kind: 'incomplete' };
  if (text[close] !== ']') return { kind: 'no_match' };

  const jsonStr = text.slice(jsonStart, jsonEnd + 1);
  try {
    const parsed: unknown = JSON.parse(jsonStr);
    return { kind: 'match', name: header[1], args: JSON.stringify(parsed), length: close + 1 };
  } catch {
    logger.warn({ funcName: header[1], jsonStr: jsonStr.slice(0, 100) }, 'Failed to parse bracket tool call');
    return { kind: 'no_match' };
  }
}

export class InlineToolCallExtractor {
  private pending = '';

  constructor(private readonly generateId: () => string) {}

  push(text: string): SemanticEvent[] {
    this.pending += text;
    return this.drain(false);
  }

  /**
   * 放出所有暂存文本（流结束或结构化工具事件到达时）
   */
  flush(): SemanticEvent[] {
    return this.drain(true);
  }

  private drain(final: boolean): SemanticEvent[] {
    const events: SemanticEvent[] = [];
    let plain = '';

    while (this.pending.length > 0) {
      const open = this.pending.indexOf('[');
      if (open === -1) {
        plain += this.pending;
        this.pending = '';
        break;
      }

      plain += this.pending.slice(0, open);
      this.pending = this.pending.slice(open);

      const result = matchCall(this.pending);

      if (result.kind === 'incomplete') {
        if (final) {
          plain += this.pending;
          this.pending = '';
        }
        break;
      }

      if (result.kind === 'no_match') {
        plain += '[';
        this.pending = this.pending.slice(1);
        continue;
      }

      if (plain) {
        events.push({ type: 'content', text: plain });
        plain = '';
      }

      const id = this.generateId();
      events.push(
        { type: 'tool_start', id, name: result.name },
        { type: 'tool_input', id, fragment: result.args },
        { type: 'tool_stop', id }
      );
      this.pending = this.pending.slice(result.length);
    }

    if (plain) {
      events.push({ type: 'content', text: plain });
    }

    return events;
  }
}
