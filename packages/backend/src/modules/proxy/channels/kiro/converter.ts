/**
 * OpenAI Chat ⇄ Kiro 转换器
 *
 * 请求方向：
 * 1. 消息转换：OpenAI messages → Kiro history + currentMessage
 * 2. System Prompt：注入到第一条用户消息
 * 3. 工具转换：OpenAI tools → Kiro toolSpecification
 * 4. 工具结果：tool 消息 → Kiro toolResults
 * 5. 图片转换：data URL → Kiro images
 *
 * 响应方向（非流式）：出站增量块聚合为 chat.completion
 */

import { resolveModelAlias } from '@kiro-bridge/shared';
import type {
  ChatCompletion,
  ChatCompletionRequest,
  ChatCompletionToolCall,
  ChatMessage,
  ChatTool,
  FinishReason,
  MessageContent,
} from '@kiro-bridge/shared';
import type { ConvertOptions, ConvertResult, OutboundChunk, RequestConverter } from '../../types.js';
import { UnknownModelError } from '../../errors.js';
import type {
  KiroHistoryMessage,
  KiroImage,
  KiroImageFormat,
  KiroRequest,
  KiroTool,
  KiroToolResult,
  KiroToolUse,
  KiroUserInputMessage,
} from './models.js';
import {
  CONTINUE_PLACEHOLDER,
  EMPTY_CONTENT_PLACEHOLDER,
  MAX_TOOL_DESCRIPTION_LENGTH,
  MAX_TOOL_NAME_LENGTH,
  TOOL_RESULTS_PLACEHOLDER,
  generateThinkingTags,
} from './models.js';
import { logger } from '../../../../lib/logger.js';

// ==================== 公共接口 ====================

export type KiroConvertResult = ConvertResult<KiroRequest>;

/**
 * 将 OpenAI 请求转换为 Kiro 格式
 */
export function convertOpenAIToKiro(
  request: ChatCompletionRequest,
  options: ConvertOptions
): KiroConvertResult {
  // 1. 映射模型 ID
  const kiroModelId = resolveModelAlias(request.model);
  if (!kiroModelId) {
    throw new UnknownModelError(request.model);
  }

  // 2. 转换工具（超长描述移到 system prompt）
  const { tools, documentation } = convertTools(request.tools);

  // 3. 提取 system prompt
  const systemPrompt = [extractSystemPrompt(request.messages), documentation]
    .filter(Boolean)
    .join('\n\n');

  // 4. 构建 provider 轮次
  const turns = buildTurns(request.messages, tools.length > 0);

  // 5. 构建历史消息和当前消息
  const { history, currentMessage } = buildMessages(turns, systemPrompt, kiroModelId, tools, options);

  const body: KiroRequest = {
    conversationState: {
      chatTriggerType: 'MANUAL',
      conversationId: options.conversationId,
      currentMessage: { userInputMessage: currentMessage },
      history,
    },
  };

  if (options.profileArn) {
    body.profileArn = options.profileArn;
  }

  logger.debug(
    {
      model: request.model,
      kiroModelId,
      historyLength: history.length,
      toolsCount: tools.length,
      hasToolResults: Boolean(currentMessage.userInputMessageContext?.toolResults),
      thinkingBudgetTokens: options.thinkingBudgetTokens,
    },
    'Converted OpenAI request to Kiro format'
  );

  return { body, kiroModelId };
}

export const kiroRequestConverter: RequestConverter<KiroRequest> = {
  convert: convertOpenAIToKiro,
};

// ==================== System Prompt ====================

function contentToText(content: MessageContent | null | undefined): string {
  if (!content) return '';
  if (typeof content === 'string') return content;

  return content
    .flatMap((part) => (part.type === 'text' ? [part.text] : []))
    .join('\n');
}

function extractSystemPrompt(messages: ChatMessage[]): string {
  return messages
    .flatMap((msg) => (msg.role === 'system' ? [contentToText(msg.content)] : []))
    .filter(Boolean)
    .join('\n\n');
}

// ==================== 轮次构建 ====================

interface UserTurn {
  role: 'user';
  texts: string[];
  images: KiroImage[];
  toolResults: KiroToolResult[];
}

interface AssistantTurn {
  role: 'assistant';
  texts: string[];
  toolUses: KiroToolUse[];
}

type Turn = UserTurn | AssistantTurn;

function userTurn(texts: string[] = [], images: KiroImage[] = [], toolResults: KiroToolResult[] = []): UserTurn {
  return { role: 'user', texts, images, toolResults };
}

/**
 * 把 OpenAI 消息映射为 provider 轮次，并合并相邻的同角色轮次
 *
 * 请求未声明 tools 时，tool_calls / tool 消息转为文本（上游拒绝孤立的工具块）
 */
function buildTurns(messages: ChatMessage[], hasTools: boolean): Turn[] {
  const turns: Turn[] = [];

  for (const msg of messages) {
    const turn = messageToTurn(msg, hasTools);
    if (!turn) continue;

    const prev = turns[turns.length - 1];
    if (prev && prev.role === 'user' && turn.role === 'user') {
      prev.texts.push(...turn.texts);
      prev.images.push(...turn.images);
      prev.toolResults.push(...turn.toolResults);
    } else if (prev && prev.role === 'assistant' && turn.role === 'assistant') {
      prev.texts.push(...turn.texts);
      prev.toolUses.push(...turn.toolUses);
    } else {
      turns.push(turn);
    }
  }

  // 以 assistant 开头时补一个占位 user
  if (turns.length > 0 && turns[0].role === 'assistant') {
    turns.unshift(userTurn());
  }

  // 以 assistant 结尾（或没有任何轮次）时追加 Continue
  const last = turns[turns.length - 1];
  if (!last || last.role === 'assistant') {
    turns.push(userTurn([CONTINUE_PLACEHOLDER]));
  }

  return turns;
}

function messageToTurn(msg: ChatMessage, hasTools: boolean): Turn | null {
  switch (msg.role) {
    case 'system':
      return null;

    case 'user': {
      const text = contentToText(msg.content);
      return userTurn(text ? [text] : [], extractImages(msg.content));
    }

    case 'tool': {
      const text = contentToText(msg.content);
      if (!hasTools) {
        return userTurn([formatToolResultText(msg.tool_call_id, text)]);
      }
      const result: KiroToolResult = {
        toolUseId: msg.tool_call_id,
        content: [{ text: text.trim() ? text : 'Command executed successfully.' }],
        status: 'success',
      };
      return userTurn([], [], [result]);
    }

    case 'assistant': {
      const text = contentToText(msg.content);
      const texts = text.trim() ? [text] : [];
      const toolUses: KiroToolUse[] = [];

      for (const call of msg.tool_calls ?? []) {
        if (hasTools) {
          toolUses.push({
            toolUseId: call.id,
            name: truncateToolName(call.function.name),
            input: parseToolInput(call.function.arguments),
          });
        } else {
          texts.push(formatToolCallText(call.function.name, call.function.arguments));
        }
      }

      return { role: 'assistant', texts, toolUses };
    }
  }
}

function formatToolCallText(name: string, args: string): string {
  return `[Tool Call (${name})]\n${args || '{}'}`.trim();
}

function formatToolResultText(toolCallId: string, text: string): string {
  return `[Tool Result (${toolCallId})]\n${text.trim() ? text : '(empty result)'}`.trim();
}

/**
 * 工具参数（JSON 字符串）→ 对象；无法解析时为 {}
 */
function parseToolInput(args: string): Record<string, unknown> {
  if (!args.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(args);
    if (isRecord(parsed)) {
      return parsed;
    }
  } catch {
    logger.warn({ args: args.slice(0, 200) }, 'Tool call arguments are not valid JSON, sending {}');
  }
  return {};
}

// ==================== 消息构建 ====================

interface BuildMessagesResult {
  history: KiroHistoryMessage[];
  currentMessage: KiroUserInputMessage;
}

function buildMessages(
  turns: Turn[],
  systemPrompt: string,
  modelId: string,
  tools: KiroTool[],
  options: ConvertOptions
): BuildMessagesResult {
  const history: KiroHistoryMessage[] = [];
  const current = turns[turns.length - 1];
  const previous = turns.slice(0, -1);

  for (const turn of previous) {
    if (turn.role === 'assistant') {
      history.push({
        assistantResponseMessage: {
          content: turn.texts.join('\n') || EMPTY_CONTENT_PLACEHOLDER,
          ...(turn.toolUses.length > 0 ? { toolUses: turn.toolUses } : {}),
        },
      });
      continue;
    }

    // history 中只带 toolResults，tools 只放在 currentMessage
    const userInputMessage: KiroUserInputMessage = {
      content: turn.texts.join('\n') || EMPTY_CONTENT_PLACEHOLDER,
      modelId,
      origin: 'AI_EDITOR',
    };
    if (turn.images.length > 0) {
      userInputMessage.images = turn.images;
    }
    if (turn.toolResults.length > 0) {
      userInputMessage.userInputMessageContext = { toolResults: turn.toolResults };
    }
    history.push({ userInputMessage });
  }

  const toolResults = current.role === 'user' ? current.toolResults : [];
  const images = current.role === 'user' ? current.images : [];

  let currentContent = current.texts.join('\n');
  if (!currentContent) {
    currentContent = toolResults.length > 0 ? TOOL_RESULTS_PLACEHOLDER : CONTINUE_PLACEHOLDER;
  }

  // 注入 system prompt（优先注入到第一条历史 user，否则注入到 current）
  if (systemPrompt) {
    const firstUser = history.find(
      (entry): entry is { userInputMessage: KiroUserInputMessage } => 'userInputMessage' in entry
    );
    if (firstUser) {
      firstUser.userInputMessage.content = `${systemPrompt}\n\n${firstUser.userInputMessage.content}`;
    } else {
      currentContent = `${systemPrompt}\n\n${currentContent}`;
    }
  }

  // 注入 thinking 标签
  if (options.thinkingBudgetTokens) {
    currentContent = `${generateThinkingTags(options.thinkingBudgetTokens)}\n\n${currentContent}`;
  }

  const currentMessage: KiroUserInputMessage = {
    content: currentContent,
    modelId,
    origin: 'AI_EDITOR',
  };

  if (images.length > 0) {
    currentMessage.images = images;
  }

  if (tools.length > 0 || toolResults.length > 0) {
    currentMessage.userInputMessageContext = {
      ...(tools.length > 0 ? { tools } : {}),
      ...(toolResults.length > 0 ? { toolResults } : {}),
    };
  }

  return { history, currentMessage };
}

// ==================== 图片 ====================

const DATA_URL_PATTERN = /^data:([^;,]+);base64,(.+)$/s;

function extractImages(content: MessageContent): KiroImage[] {
  if (typeof content === 'string') return [];

  const images: KiroImage[] = [];
  for (const part of content) {
    if (part.type !== 'image_url') continue;

    const match = DATA_URL_PATTERN.exec(part.image_url.url);
    if (!match) {
      logger.warn({ url: part.image_url.url.slice(0, 100) }, 'Only data URL images are supported, image dropped');
      continue;
    }

    const format = mapMediaTypeToFormat(match[1]);
    if (!format) {
      logger.warn({ mediaType: match[1] }, 'Unsupported image type, image dropped');
      continue;
    }

    images.push({ format, source: { bytes: match[2] } });
  }

  return images;
}

/**
 * 将 media type 映射为 Kiro 图片格式
 */
function mapMediaTypeToFormat(mediaType: string): KiroImageFormat | null {
  const lower = mediaType.toLowerCase();

  if (lower.includes('png')) return 'png';
  if (lower.includes('jpeg') || lower.includes('jpg')) return 'jpeg';
  if (lower.includes('gif')) return 'gif';
  if (lower.includes('webp')) return 'webp';

  return null;
}

// ==================== 工具转换 ====================

interface ConvertToolsResult {
  tools: KiroTool[];
  /** 超长工具描述，追加到 system prompt */
  documentation: string;
}

function convertTools(tools: ChatTool[] | undefined): ConvertToolsResult {
  if (!tools || tools.length === 0) {
    return { tools: [], documentation: '' };
  }

  const kiroTools: KiroTool[] = [];
  const docs: string[] = [];

  for (const tool of tools) {
    const name = truncateToolName(tool.function.name);
    let description = tool.function.description?.trim() || `Tool: ${name}`;

    if (description.length > MAX_TOOL_DESCRIPTION_LENGTH) {
      docs.push(`## Tool: ${name}\n\n${description}`);
      description = `[Full documentation in system prompt under '## Tool: ${name}']`;
    }

    kiroTools.push({
      toolSpecification: {
        name,
        description,
        inputSchema: {
          json: cleanJsonSchema(tool.function.parameters ?? { type: 'object', properties: {} }),
        },
      },
    });
  }

  return { tools: kiroTools, documentation: docs.join('\n\n') };
}

/**
 * 截断工具名称
 */
function truncateToolName(name: string): string {
  if (name.length <= MAX_TOOL_NAME_LENGTH) {
    return name;
  }
  const truncated = name.substring(0, MAX_TOOL_NAME_LENGTH);
  logger.warn(
    { originalName: name, truncatedName: truncated, maxLength: MAX_TOOL_NAME_LENGTH },
    'Tool name exceeded max length, truncated'
  );
  return truncated;
}

// Kiro 不支持的 JSON Schema 字段
const UNSUPPORTED_SCHEMA_KEYS = new Set([
  '$schema',
  'additionalProperties',
  'format',
  'default',
  'uniqueItems',
  'propertyNames',
  'const',
  'anyOf',
  'oneOf',
  'allOf',
  'exclusiveMinimum',
  'exclusiveMaximum',
  '$ref',
  '$defs',
  'definitions',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cleanSchemaValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(cleanSchemaValue);
  }
  if (isRecord(value)) {
    return cleanJsonSchema(value);
  }
  return value;
}

/**
 * 清理 JSON Schema 中不支持的字段
 */
export function cleanJsonSchema(schema: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(schema)) {
    // properties 下的键是字段名，不做过滤
    if (key === 'properties' && isRecord(value)) {
      const properties: Record<string, unknown> = {};
      for (const [prop, propSchema] of Object.entries(value)) {
        properties[prop] = cleanSchemaValue(propSchema);
      }
      result[key] = properties;
      continue;
    }

    if (UNSUPPORTED_SCHEMA_KEYS.has(key)) {
      continue;
    }
    result[key] = cleanSchemaValue(value);
  }

  return result;
}

// ==================== 响应方向 ====================

export interface CompletionMeta {
  id: string;
  created: number;
  model: string;
}

/**
 * 把出站增量块聚合为非流式 chat.completion
 */
export function convertKiroToOpenAI(chunks: OutboundChunk[], meta: CompletionMeta): ChatCompletion {
  let text = '';
  let reasoning = '';
  let finishReason: FinishReason = 'stop';
  const toolCalls: ChatCompletionToolCall[] = [];
  let usage: ChatCompletion['usage'];

  for (const chunk of chunks) {
    switch (chunk.type) {
      case 'text':
        text += chunk.text;
        break;
      case 'reasoning':
        reasoning += chunk.text;
        break;
      case 'tool_call':
        toolCalls.push({
          id: chunk.id,
          type: 'function',
          function: { name: chunk.name, arguments: chunk.arguments },
        });
        break;
      case 'finish':
        finishReason = chunk.reason;
        break;
      case 'usage':
        usage = {
          prompt_tokens: chunk.promptTokens,
          completion_tokens: chunk.completionTokens,
          total_tokens: chunk.totalTokens,
        };
        break;
    }
  }

  return {
    id: meta.id,
    object: 'chat.completion',
    created: meta.created,
    model: meta.model,
    choices: [
      {
        index: 0,
        message: {
          role: 'assistant',
          content: text || (toolCalls.length > 0 ? null : ''),
          ...(reasoning ? { reasoning_content: reasoning } : {}),
          ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
        },
        finish_reason: finishReason,
      },
    ],
    ...(usage ? { usage } : {}),
  };
}
