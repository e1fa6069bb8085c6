/**
 * 上游 HTTP 代理配置
 * 用于访问 Kiro / AWS 端点
 */

import { ProxyAgent } from 'undici';
import { env } from '../config/env.js';
import { logger } from './logger.js';

let proxyAgent: ProxyAgent | undefined;

/**
 * 获取代理 Agent（如果配置了 UPSTREAM_PROXY_URL）
 */
export function getProxyAgent(): ProxyAgent | undefined {
  if (!env.UPSTREAM_PROXY_URL) {
    return undefined;
  }

  // 复用已创建的 ProxyAgent
  if (!proxyAgent) {
    proxyAgent = new ProxyAgent(env.UPSTREAM_PROXY_URL);
    logger.info({ proxyUrl: env.UPSTREAM_PROXY_URL }, 'Proxy agent initialized');
  }

  return proxyAgent;
}
