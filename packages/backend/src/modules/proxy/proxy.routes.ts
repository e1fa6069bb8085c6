import { Router, type IRouter } from 'express';
import type { ProxyController } from './proxy.controller.js';
import { createProxyAuthMiddleware } from './proxy.middleware.js';
import { asyncHandler } from '../../utils/async-handler.js';

export function createProxyRoutes(controller: ProxyController, apiKey: string): IRouter {
  const router: IRouter = Router();

  router.use(createProxyAuthMiddleware(apiKey));

  router.get('/models', asyncHandler(controller.listModels));
  router.post('/chat/completions', asyncHandler(controller.chatCompletions));

  return router;
}
