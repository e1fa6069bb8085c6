import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ErrorCodes } from '@kiro-bridge/shared';
import type { OpenAIErrorResponse, OpenAIErrorType } from '@kiro-bridge/shared';
import { logger } from '../lib/logger.js';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public type: OpenAIErrorType = 'api_error',
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ErrorPayload {
  status: number;
  body: OpenAIErrorResponse;
}

function envelope(message: string, type: OpenAIErrorType, code: string | null): OpenAIErrorResponse {
  return {
    error: {
      message,
      type,
      code: code ? code.toLowerCase() : null,
      param: null,
    },
  };
}

/**
 * 把任意错误映射为 OpenAI 错误结构（JSON 响应和 SSE 错误帧共用）
 */
export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof AppError) {
    return { status: err.statusCode, body: envelope(err.message, err.type, err.code) };
  }

  if (err instanceof ZodError) {
    const issue = err.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    const message = issue ? `Invalid request body${where}: ${issue.message}` : 'Invalid request body';
    return {
      status: 400,
      body: envelope(message, 'invalid_request_error', ErrorCodes.VALIDATION_ERROR),
    };
  }

  return {
    status: 500,
    body: envelope('Internal server error', 'server_error', ErrorCodes.INTERNAL_ERROR),
  };
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { status, body } = toErrorPayload(err);

  if (res.headersSent) {
    logger.error({ err }, 'Error after response started');
    res.end();
    return;
  }

  if (status >= 500) {
    logger.error({ err }, 'Error occurred');
  } else {
    logger.warn({ status, code: body.error.code, message: err.message }, 'Request failed');
  }

  res.status(status).json(body);
}

/**
 * 未匹配路由
 */
export function notFoundHandler(req: Request, res: Response): void {
  res
    .status(404)
    .json(envelope(`Unknown route: ${req.method} ${req.path}`, 'invalid_request_error', ErrorCodes.NOT_FOUND));
}
