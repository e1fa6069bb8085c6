export const ErrorCodes = {
  // 通用
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  NOT_FOUND: 'NOT_FOUND',

  // 客户端认证（代理密钥）
  UNAUTHORIZED: 'UNAUTHORIZED',
  API_KEY_INVALID: 'API_KEY_INVALID',

  // 上游凭证
  UPSTREAM_AUTH_FAILED: 'UPSTREAM_AUTH_FAILED',

  // 模型
  MODEL_NOT_FOUND: 'MODEL_NOT_FOUND',

  // 上游调用
  UPSTREAM_RATE_LIMITED: 'UPSTREAM_RATE_LIMITED',
  UPSTREAM_SERVER_ERROR: 'UPSTREAM_SERVER_ERROR',
  UPSTREAM_TIMEOUT: 'UPSTREAM_TIMEOUT',
  UPSTREAM_NETWORK_ERROR: 'UPSTREAM_NETWORK_ERROR',
  UPSTREAM_FORBIDDEN: 'UPSTREAM_FORBIDDEN',
  UPSTREAM_ERROR: 'UPSTREAM_ERROR',

  // 流
  PARSE_ERROR: 'PARSE_ERROR',
  CLIENT_DISCONNECTED: 'CLIENT_DISCONNECTED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
