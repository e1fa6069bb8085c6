import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'crypto';
import { ErrorCodes } from '@kiro-bridge/shared';
import { AppError } from '../../middlewares/error.middleware.js';

/**
 * 从请求中取出客户端密钥：x-api-key 优先，其次 Authorization: Bearer
 */
export function extractApiKey(req: Request): string | undefined {
  const xApiKey = req.get('x-api-key');
  if (xApiKey) {
    return xApiKey;
  }

  const authHeader = req.get('authorization');
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.slice(7).trim() || undefined;
  }

  return undefined;
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * 校验客户端密钥（PROXY_API_KEY）
 */
export function createProxyAuthMiddleware(expectedKey: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const apiKey = extractApiKey(req);

    if (!apiKey) {
      next(new AppError(401, ErrorCodes.UNAUTHORIZED, 'Missing API key', 'authentication_error'));
      return;
    }

    if (!safeEqual(apiKey, expectedKey)) {
      next(new AppError(401, ErrorCodes.API_KEY_INVALID, 'Invalid API key', 'authentication_error'));
      return;
    }

    next();
  };
}
