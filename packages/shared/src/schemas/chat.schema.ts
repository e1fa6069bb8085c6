import { z } from 'zod';

// ==================== 消息内容 ====================

export const textContentPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const imageContentPartSchema = z.object({
  type: z.literal('image_url'),
  image_url: z.object({
    url: z.string().min(1),
    detail: z.enum(['auto', 'low', 'high']).optional(),
  }),
});

export const contentPartSchema = z.discriminatedUnion('type', [
  textContentPartSchema,
  imageContentPartSchema,
]);

export const messageContentSchema = z.union([z.string(), z.array(contentPartSchema)]);

// ==================== 工具调用 ====================

export const toolCallSchema = z.object({
  id: z.string().min(1),
  type: z.literal('function').default('function'),
  function: z.object({
    name: z.string().min(1),
    arguments: z.string().default(''),
  }),
});

export const toolSchema = z.object({
  type: z.literal('function'),
  function: z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    parameters: z.record(z.unknown()).optional(),
  }),
});

// ==================== 消息 ====================

export const systemMessageSchema = z.object({
  role: z.literal('system'),
  content: messageContentSchema,
  name: z.string().optional(),
});

export const userMessageSchema = z.object({
  role: z.literal('user'),
  content: messageContentSchema,
  name: z.string().optional(),
});

export const assistantMessageSchema = z.object({
  role: z.literal('assistant'),
  content: messageContentSchema.nullable().optional(),
  tool_calls: z.array(toolCallSchema).optional(),
  name: z.string().optional(),
});

export const toolMessageSchema = z.object({
  role: z.literal('tool'),
  content: messageContentSchema,
  tool_call_id: z.string().min(1),
});

export const chatMessageSchema = z.discriminatedUnion('role', [
  systemMessageSchema,
  userMessageSchema,
  assistantMessageSchema,
  toolMessageSchema,
]);

// ==================== 请求 ====================

export const chatCompletionRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(chatMessageSchema).min(1),
  tools: z.array(toolSchema).optional(),
  tool_choice: z.unknown().optional(),
  stream: z.boolean().optional().default(false),
  stream_options: z
    .object({
      include_usage: z.boolean().optional(),
    })
    .optional(),
  temperature: z.number().min(0).max(2).optional(),
  top_p: z.number().min(0).max(1).optional(),
  max_tokens: z.number().int().positive().optional(),
  user: z.string().optional(),
});

export type TextContentPart = z.infer<typeof textContentPartSchema>;
export type ImageContentPart = z.infer<typeof imageContentPartSchema>;
export type ContentPart = z.infer<typeof contentPartSchema>;
export type MessageContent = z.infer<typeof messageContentSchema>;
export type ToolCall = z.infer<typeof toolCallSchema>;
export type ChatTool = z.infer<typeof toolSchema>;
export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type ChatCompletionRequest = z.infer<typeof chatCompletionRequestSchema>;
export type ChatCompletionRequestInput = z.input<typeof chatCompletionRequestSchema>;
