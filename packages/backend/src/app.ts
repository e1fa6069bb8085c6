import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';
import { OPENAI_API_PREFIX } from '@kiro-bridge/shared';
import { logger } from './lib/logger.js';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware.js';
import { createProxyRoutes, ProxyController } from './modules/proxy/index.js';
import type { GatewayService } from './modules/proxy/index.js';

export interface AppDependencies {
  gateway: GatewayService;
  apiKey: string;
}

export function createApp({ gateway, apiKey }: AppDependencies): Express {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      crossOriginOpenerPolicy: false,
      crossOriginResourcePolicy: false,
      crossOriginEmbedderPolicy: false,
      contentSecurityPolicy: false,
      // 不强制 HTTPS
      hsts: false,
    })
  );
  app.use(cors());

  // Request logging
  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === '/health',
      },
    })
  );

  // Body parsing
  app.use(express.json({ limit: '10mb' }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // OpenAI 兼容路由
  app.use(OPENAI_API_PREFIX, createProxyRoutes(new ProxyController(gateway), apiKey));

  app.use(notFoundHandler);

  // Error handling
  app.use(errorHandler);

  return app;
}
