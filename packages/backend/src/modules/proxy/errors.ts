/**
 * 网关错误类型
 * 全部继承 AppError，由 errorHandler 统一映射为 OpenAI 错误结构
 */

import { ErrorCodes } from '@kiro-bridge/shared';
import { AppError } from '../../middlewares/error.middleware.js';

/**
 * 上游凭证刷新失败（重试耗尽或 refresh token 被拒绝）
 */
export class AuthError extends AppError {
  constructor(message: string, details?: unknown) {
    super(401, ErrorCodes.UPSTREAM_AUTH_FAILED, message, 'authentication_error', details);
    this.name = 'AuthError';
  }
}

export class UnknownModelError extends AppError {
  constructor(public readonly model: string) {
    super(404, ErrorCodes.MODEL_NOT_FOUND, `The model '${model}' does not exist`, 'invalid_request_error');
    this.name = 'UnknownModelError';
  }
}

export type UpstreamErrorKind =
  | 'rate_limited'
  | 'server_error'
  | 'timeout'
  | 'network'
  | 'forbidden'
  | 'http';

const KIND_TO_CODE: Record<UpstreamErrorKind, string> = {
  rate_limited: ErrorCodes.UPSTREAM_RATE_LIMITED,
  server_error: ErrorCodes.UPSTREAM_SERVER_ERROR,
  timeout: ErrorCodes.UPSTREAM_TIMEOUT,
  network: ErrorCodes.UPSTREAM_NETWORK_ERROR,
  forbidden: ErrorCodes.UPSTREAM_FORBIDDEN,
  http: ErrorCodes.UPSTREAM_ERROR,
};

function statusForKind(kind: UpstreamErrorKind, upstreamStatus?: number): number {
  switch (kind) {
    case 'rate_limited':
      return 429;
    case 'forbidden':
      return 403;
    case 'timeout':
      return 504;
    case 'server_error':
    case 'network':
      return 502;
    case 'http':
      // 其余 4xx 原样透传
      return upstreamStatus !== undefined && upstreamStatus >= 400 && upstreamStatus < 500
        ? upstreamStatus
        : 502;
  }
}

export class UpstreamError extends AppError {
  constructor(
    public readonly kind: UpstreamErrorKind,
    message: string,
    public readonly upstreamStatus?: number,
    details?: unknown
  ) {
    super(
      statusForKind(kind, upstreamStatus),
      KIND_TO_CODE[kind],
      message,
      kind === 'rate_limited' ? 'rate_limit_error' : 'api_error',
      details
    );
    this.name = 'UpstreamError';
  }
}

/**
 * 上游事件负载无法解析（记录后跳过，不会返回给客户端）
 */
export class ParseError extends AppError {
  constructor(message: string, public readonly payload: string) {
    super(502, ErrorCodes.PARSE_ERROR, message);
    this.name = 'ParseError';
  }
}

/**
 * 客户端断开（仅用于清理，不重试）
 */
export class ClientDisconnectError extends AppError {
  constructor() {
    super(499, ErrorCodes.CLIENT_DISCONNECTED, 'Client disconnected');
    this.name = 'ClientDisconnectError';
  }
}
