export { createProxyRoutes } from './proxy.routes.js';
export { GatewayService } from './proxy.service.js';
export { ProxyController } from './proxy.controller.js';
export { createProxyAuthMiddleware } from './proxy.middleware.js';
export * from './errors.js';
export type * from './types.js';
