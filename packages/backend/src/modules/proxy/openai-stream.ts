/**
 * 出站增量块 → OpenAI chat.completion.chunk / SSE 行
 */

import { v4 as uuidv4 } from 'uuid';
import { SSE_DONE_SENTINEL } from '@kiro-bridge/shared';
import type { ChatCompletionChunk, ChatCompletionDelta, FinishReason } from '@kiro-bridge/shared';
import type { OutboundChunk } from './types.js';

export function createCompletionId(): string {
  return `chatcmpl-${uuidv4().replace(/-/g, '')}`;
}

export interface ChunkEncoderOptions {
  id: string;
  created: number;
  model: string;
}

export class OpenAIChunkEncoder {
  private roleSent = false;

  constructor(private readonly options: ChunkEncoderOptions) {}

  encode(chunk: OutboundChunk): ChatCompletionChunk {
    switch (chunk.type) {
      case 'text':
        return this.withDelta({ content: chunk.text });
      case 'reasoning':
        return this.withDelta({ reasoning_content: chunk.text });
      case 'tool_call':
        return this.withDelta({
          tool_calls: [
            {
              index: chunk.index,
              id: chunk.id,
              type: 'function',
              function: { name: chunk.name, arguments: chunk.arguments },
            },
          ],
        });
      case 'finish':
        return this.withDelta({}, chunk.reason);
      case 'usage':
        // usage 单独一帧，choices 为空
        return {
          ...this.base(),
          choices: [],
          usage: {
            prompt_tokens: chunk.promptTokens,
            completion_tokens: chunk.completionTokens,
            total_tokens: chunk.totalTokens,
          },
        };
    }
  }

  private base(): Omit<ChatCompletionChunk, 'choices'> {
    return {
      id: this.options.id,
      object: 'chat.completion.chunk',
      created: this.options.created,
      model: this.options.model,
    };
  }

  private withDelta(delta: ChatCompletionDelta, finishReason: FinishReason | null = null): ChatCompletionChunk {
    // 第一帧带上 role
    const fullDelta: ChatCompletionDelta = this.roleSent ? delta : { role: 'assistant', ...delta };
    this.roleSent = true;

    return {
      ...this.base(),
      choices: [{ index: 0, delta: fullDelta, finish_reason: finishReason }],
    };
  }
}

export function formatSSE(data: unknown): string {
  return `data: ${JSON.stringify(data)}\n\n`;
}

export const SSE_DONE_LINE = `data: ${SSE_DONE_SENTINEL}\n\n`;
