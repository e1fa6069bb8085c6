/**
 * Kiro (Amazon Q Developer / CodeWhisperer) API 数据模型
 *
 * 请求走 generateAssistantResponse，响应是 AWS event-stream 二进制帧，
 * 帧内负载是 JSON 片段，由 event-stream-parser 提取。
 */

import * as os from 'os';
import * as crypto from 'crypto';

// ==================== Kiro 请求类型 ====================

/**
 * generateAssistantResponse 请求体
 */
export interface KiroRequest {
  conversationState: KiroConversationState;
  profileArn?: string; // AWS SSO OIDC 用户没有 profileArn，传了会 403
}

export interface KiroConversationState {
  chatTriggerType: 'MANUAL';
  conversationId: string;
  currentMessage: KiroCurrentMessage;
  history: KiroHistoryMessage[];
}

export interface KiroCurrentMessage {
  userInputMessage: KiroUserInputMessage;
}

export interface KiroUserInputMessage {
  content: string;
  modelId: string;
  origin: 'AI_EDITOR';
  images?: KiroImage[];
  userInputMessageContext?: KiroMessageContext;
}

export type KiroImageFormat = 'png' | 'jpeg' | 'gif' | 'webp';

export interface KiroImage {
  format: KiroImageFormat;
  source: {
    bytes: string; // base64
  };
}

export interface KiroMessageContext {
  tools?: KiroTool[];
  toolResults?: KiroToolResult[];
}

export interface KiroTool {
  toolSpecification: {
    name: string;
    description: string;
    inputSchema: {
      json: Record<string, unknown>;
    };
  };
}

export interface KiroToolResult {
  toolUseId: string;
  content: Array<{ text: string }>; // 注意：是数组，不是对象
  status: 'success' | 'error';
}

// ==================== 历史消息类型 ====================

export type KiroHistoryMessage =
  | { userInputMessage: KiroUserInputMessage }
  | { assistantResponseMessage: KiroAssistantResponseMessage };

export interface KiroAssistantResponseMessage {
  content: string;
  toolUses?: KiroToolUse[];
}

export interface KiroToolUse {
  toolUseId: string;
  name: string;
  input: Record<string, unknown>; // 对象，不是 JSON 字符串
}

// ==================== 端点 ====================

export function getKiroEndpoint(region: string): string {
  return `https://q.${region}.amazonaws.com`;
}

export const KIRO_GENERATE_PATH = '/generateAssistantResponse';

export const KIRO_MODELS_PATH = '/ListAvailableModels?origin=AI_EDITOR';

/**
 * Kiro 桌面登录的刷新端点
 */
export function getDesktopRefreshUrl(region: string): string {
  return `https://prod.${region}.auth.desktop.kiro.dev/refreshToken`;
}

/**
 * AWS SSO OIDC 刷新端点（凭证带 clientId/clientSecret 时使用）
 */
export function getOidcTokenUrl(region: string): string {
  return `https://oidc.${region}.amazonaws.com/token`;
}

// ==================== 请求头 ====================

const KIRO_VERSION = '0.7.45';

let fingerprint: string | undefined;

/**
 * 机器指纹：hostname + username 的 sha256
 */
function getMachineFingerprint(): string {
  if (!fingerprint) {
    const uniqueString = `${os.hostname()}-${os.userInfo().username}-kiro-bridge`;
    fingerprint = crypto.createHash('sha256').update(uniqueString).digest('hex');
  }
  return fingerprint;
}

/**
 * 生成 Kiro API 请求头（每次尝试都重新生成 invocation id）
 */
export function getKiroHeaders(accessToken: string, attempt = 1, maxAttempts = 4): Record<string, string> {
  const fp = getMachineFingerprint();

  return {
    Authorization: `Bearer ${accessToken}`,
    'Content-Type': 'application/json',
    Accept: 'application/json',
    'User-Agent': `aws-sdk-js/1.0.27 ua/2.1 os/${process.platform} lang/js md/nodejs#${process.versions.node} api/codewhispererstreaming#1.0.27 m/E KiroIDE-${KIRO_VERSION}-${fp}`,
    'x-amz-user-agent': `aws-sdk-js/1.0.27 KiroIDE-${KIRO_VERSION}-${fp}`,
    'x-amzn-codewhisperer-optout': 'true',
    'x-amzn-kiro-agent-mode': 'vibe',
    'amz-sdk-invocation-id': crypto.randomUUID(),
    'amz-sdk-request': `attempt=${attempt}; max=${maxAttempts}`,
  };
}

// ==================== 常量 ====================

/**
 * 生成 thinking 标签（fake reasoning）
 */
export function generateThinkingTags(budgetTokens: number): string {
  return `<thinking_mode>enabled</thinking_mode>
<max_thinking_length>${budgetTokens}</max_thinking_length>`;
}

/**
 * 工具名称最大长度（Kiro 限制）
 */
export const MAX_TOOL_NAME_LENGTH = 64;

/**
 * 工具描述最大长度（超过部分移到 system prompt）
 */
export const MAX_TOOL_DESCRIPTION_LENGTH = 4000;

/**
 * 空内容占位符（Kiro 要求非空内容）
 */
export const EMPTY_CONTENT_PLACEHOLDER = '...';

export const CONTINUE_PLACEHOLDER = 'Continue';

export const TOOL_RESULTS_PLACEHOLDER = '(Tool results provided above)';
