export const API_VERSION = 'v1';
export const OPENAI_API_PREFIX = `/${API_VERSION}`;

// SSE 结束标记（OpenAI 协议）
export const SSE_DONE_SENTINEL = '[DONE]';

export const DEFAULT_KIRO_REGION = 'us-east-1';

export const TOKEN_REFRESH = {
  THRESHOLD_SECONDS: 600,
  DEFAULT_EXPIRES_IN_SECONDS: 3600,
} as const;

export const UPSTREAM_RETRY = {
  MAX_RETRIES: 3,
  BASE_DELAY_MS: 1000,
} as const;

export const MODEL_CACHE_TTL_SECONDS = 3600;
