/**
 * Kiro (Amazon Q Developer) Channel
 *
 * OpenAI Chat 请求 → Kiro generateAssistantResponse，AWS event-stream → OpenAI 增量块
 */

// 类型定义
export * from './models.js';

// 请求转换
export { convertOpenAIToKiro, convertKiroToOpenAI, kiroRequestConverter, cleanJsonSchema } from './converter.js';
export type { KiroConvertResult, CompletionMeta } from './converter.js';

// 响应处理
export { KiroEventStreamParser, decodeEventStream, generateToolCallId } from './event-stream-parser.js';
export type { KiroEventStreamParserOptions } from './event-stream-parser.js';
export { InlineToolCallExtractor } from './inline-tool-calls.js';
export { KiroStreamTranslator, estimateTokens } from './stream-translator.js';
export type { StreamTranslatorOptions } from './stream-translator.js';
