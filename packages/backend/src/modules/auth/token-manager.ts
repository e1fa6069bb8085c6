/**
 * Token 管理
 *
 * 唯一持有上游凭证的组件。即将过期（expiresAt - threshold）时刷新，
 * 并发调用共享同一个刷新 promise，保证只有一次网络请求。
 */

import { TOKEN_REFRESH } from '@kiro-bridge/shared';
import type { AuthManager } from '../proxy/types.js';
import { AuthError } from '../proxy/errors.js';
import { logger } from '../../lib/logger.js';
import type { Credential, CredentialStore } from './credential.store.js';
import { RefreshRequestError } from './kiro-auth.service.js';
import type { TokenRefresher } from './kiro-auth.service.js';

// 刷新失败的额外重试次数（1s、2s 退避）
const REFRESH_MAX_RETRIES = 2;
const REFRESH_BASE_DELAY_MS = 1000;

export interface TokenManagerOptions {
  store: CredentialStore;
  refresher: TokenRefresher;
  defaultRegion: string;
  thresholdSeconds?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class TokenManager implements AuthManager {
  private readonly store: CredentialStore;
  private readonly refresher: TokenRefresher;
  private readonly defaultRegion: string;
  private readonly thresholdMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private credential: Credential | null = null;
  private loading: Promise<Credential> | null = null;
  private refreshing: Promise<string> | null = null;

  constructor(options: TokenManagerOptions) {
    this.store = options.store;
    this.refresher = options.refresher;
    this.defaultRegion = options.defaultRegion;
    this.thresholdMs = (options.thresholdSeconds ?? TOKEN_REFRESH.THRESHOLD_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * 启动时读取凭证
   */
  async init(): Promise<void> {
    await this.ensureLoaded();
  }

  async getAccessToken(): Promise<string> {
    const credential = await this.ensureLoaded();
    if (this.isFresh(credential)) {
      return credential.accessToken;
    }
    return this.refresh('expiring');
  }

  async forceRefresh(staleToken?: string): Promise<string> {
    const credential = await this.ensureLoaded();

    // 其他请求已经换过 token
    if (staleToken !== undefined && credential.accessToken && credential.accessToken !== staleToken) {
      return credential.accessToken;
    }

    return this.refresh('forced');
  }

  getProfileArn(): string | undefined {
    return this.credential?.profileArn;
  }

  getRegion(): string {
    return this.credential?.region ?? this.defaultRegion;
  }

  private isFresh(credential: Credential): boolean {
    return Boolean(credential.accessToken) && credential.expiresAt.getTime() - this.thresholdMs > this.now();
  }

  private ensureLoaded(): Promise<Credential> {
    if (this.credential) {
      return Promise.resolve(this.credential);
    }
    if (!this.loading) {
      this.loading = this.store
        .load()
        .then((credential) => {
          this.credential = credential;
          return credential;
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return this.loading;
  }

  /**
   * 单飞刷新：已有刷新在进行时直接等待它
   */
  private refresh(reason: 'expiring' | 'forced'): Promise<string> {
    if (!this.refreshing) {
      this.refreshing = this.doRefresh(reason).finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async doRefresh(reason: 'expiring' | 'forced'): Promise<string> {
    const credential = await this.ensureLoaded();
    logger.info({ reason, region: credential.region }, 'Refreshing Kiro access token');

    for (let attempt = 0; ; attempt++) {
      try {
        const result = await this.refresher.refreshToken(credential);
        const updated: Credential = {
          ...credential,
          accessToken: result.accessToken,
          refreshToken: result.refreshToken,
          expiresAt: result.expiresAt,
          profileArn: result.profileArn ?? credential.profileArn,
        };
        this.credential = updated;
        logger.info({ expiresAt: updated.expiresAt.toISOString() }, 'Kiro access token refreshed');

        // 持久化失败不影响本次请求，token 在内存中仍然有效
        try {
          await this.store.save(updated);
        } catch (error) {
          logger.error({ err: error }, 'Failed to persist refreshed credentials');
        }

        return updated.accessToken;
      } catch (error) {
        const transient = error instanceof RefreshRequestError && error.transient;

        if (transient && attempt < REFRESH_MAX_RETRIES) {
          const delay = REFRESH_BASE_DELAY_MS * 2 ** attempt;
          logger.warn({ attempt: attempt + 1, delay, err: error }, 'Token refresh failed, retrying');
          await this.sleep(delay);
          continue;
        }

        logger.error({ err: error, attempts: attempt + 1 }, 'Token refresh failed');
        const message = error instanceof Error ? error.message : String(error);
        throw new AuthError(`Failed to refresh Kiro access token: ${message}`);
      }
    }
  }
}
