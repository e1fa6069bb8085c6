/**
 * Kiro token 刷新
 *
 * - Kiro 桌面登录：prod.{region}.auth.desktop.kiro.dev/refreshToken
 * - AWS SSO OIDC：oidc.{region}.amazonaws.com/token（需要 clientId/clientSecret）
 */

import { TOKEN_REFRESH, tokenRefreshResponseSchema } from '@kiro-bridge/shared';
import type { HttpTransport } from '../../lib/upstream-client.js';
import { getDesktopRefreshUrl, getOidcTokenUrl } from '../proxy/channels/kiro/models.js';
import { logger } from '../../lib/logger.js';
import type { Credential } from './credential.store.js';

export class RefreshRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number | undefined,
    /** 网络错误、429、5xx 可重试；4xx 表示 refresh token 被拒绝 */
    public readonly transient: boolean
  ) {
    super(message);
    this.name = 'RefreshRequestError';
  }
}

export interface RefreshResult {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  profileArn?: string;
}

export interface TokenRefresher {
  refreshToken(credential: Credential): Promise<RefreshResult>;
}

export interface KiroAuthServiceOptions {
  transport: HttpTransport;
  timeoutMs?: number;
  now?: () => number;
}

export class KiroAuthService implements TokenRefresher {
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(options: KiroAuthServiceOptions) {
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * 使用 refresh token 刷新 access token
   */
  async refreshToken(credential: Credential): Promise<RefreshResult> {
    const useOidc = Boolean(credential.clientId && credential.clientSecret);
    const url = useOidc ? getOidcTokenUrl(credential.region) : getDesktopRefreshUrl(credential.region);
    const body = useOidc
      ? {
          grantType: 'refresh_token',
          clientId: credential.clientId,
          clientSecret: credential.clientSecret,
          refreshToken: credential.refreshToken,
        }
      : { refreshToken: credential.refreshToken };

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let status: number;
    let text: string;
    try {
      const response = await this.transport(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ region: credential.region, reason }, 'Kiro token refresh request failed');
      throw new RefreshRequestError(`Token refresh request failed: ${reason}`, undefined, true);
    } finally {
      clearTimeout(timer);
    }

    if (status < 200 || status >= 300) {
      const transient = status === 429 || status >= 500;
      logger.error({ status, error: text.slice(0, 500), region: credential.region, useOidc }, 'Kiro token refresh failed');
      throw new RefreshRequestError(`Token refresh failed with status ${status}`, status, transient);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new RefreshRequestError('Token refresh response is not valid JSON', status, false);
    }

    const parsed = tokenRefreshResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new RefreshRequestError('Token refresh response is missing accessToken', status, false);
    }

    const expiresIn = parsed.data.expiresIn ?? TOKEN_REFRESH.DEFAULT_EXPIRES_IN_SECONDS;

    return {
      accessToken: parsed.data.accessToken,
      // 可能不返回新的 refresh token
      refreshToken: parsed.data.refreshToken ?? credential.refreshToken,
      expiresAt: new Date(this.now() + expiresIn * 1000),
      profileArn: parsed.data.profileArn,
    };
  }
}
