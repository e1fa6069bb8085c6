import { DEFAULT_KIRO_REGION } from '@kiro-bridge/shared';
import { env } from './config/env.js';
import { logger } from './lib/logger.js';
import { getProxyAgent } from './lib/proxy-agent.js';
import { UpstreamClient, createUndiciTransport } from './lib/upstream-client.js';
import { FileCredentialStore, MemoryCredentialStore } from './modules/auth/credential.store.js';
import type { CredentialStore } from './modules/auth/credential.store.js';
import { KiroAuthService } from './modules/auth/kiro-auth.service.js';
import { TokenManager } from './modules/auth/token-manager.js';
import { ModelCatalog } from './modules/models/model-catalog.js';
import { GatewayService } from './modules/proxy/index.js';
import { createApp } from './app.js';

/**
 * KIRO_REFRESH_TOKEN 优先；否则读取凭证文件
 */
function createCredentialStore(): CredentialStore {
  if (env.KIRO_REFRESH_TOKEN) {
    logger.info('Using refresh token from environment');
    return new MemoryCredentialStore({
      accessToken: '',
      refreshToken: env.KIRO_REFRESH_TOKEN,
      expiresAt: new Date(0),
      region: env.KIRO_REGION,
    });
  }
  return new FileCredentialStore(env.KIRO_CREDS_FILE, env.KIRO_REGION || DEFAULT_KIRO_REGION);
}

async function main() {
  try {
    const transport = createUndiciTransport(getProxyAgent());

    const tokenManager = new TokenManager({
      store: createCredentialStore(),
      refresher: new KiroAuthService({ transport }),
      defaultRegion: env.KIRO_REGION,
      thresholdSeconds: env.TOKEN_REFRESH_THRESHOLD_SECONDS,
    });
    await tokenManager.init();
    logger.info({ region: tokenManager.getRegion() }, 'Kiro credentials loaded');

    const upstream = new UpstreamClient({
      auth: tokenManager,
      transport,
      timeoutMs: env.UPSTREAM_TIMEOUT_MS,
    });

    const gateway = new GatewayService({
      auth: tokenManager,
      upstream,
      catalog: new ModelCatalog({
        fetchModels: () => upstream.listAvailableModels(),
        ttlSeconds: env.MODEL_CACHE_TTL_SECONDS,
      }),
      fakeReasoning: {
        enabled: env.FAKE_REASONING,
        maxTokens: env.FAKE_REASONING_MAX_TOKENS,
      },
    });

    const app = createApp({ gateway, apiKey: env.PROXY_API_KEY });

    const server = app.listen(env.PORT, () => {
      logger.info(`Server running on port ${env.PORT}`);

      if (env.UPSTREAM_PROXY_URL) {
        logger.info({ proxyUrl: env.UPSTREAM_PROXY_URL }, '✓ Upstream proxy ENABLED');
      }
      if (env.FAKE_REASONING) {
        logger.info({ maxTokens: env.FAKE_REASONING_MAX_TOKENS }, '✓ Fake reasoning ENABLED');
      }
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully`);

      server.close(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      });

      // Force shutdown after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

void main();
