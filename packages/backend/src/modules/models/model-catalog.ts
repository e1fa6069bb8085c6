/**
 * 模型目录缓存
 *
 * 懒加载 ListAvailableModels，与别名表取交集（只列出能被请求的模型）；
 * 上游不可用时回退到静态模型表。
 */

import { KIRO_MODELS, MODEL_CACHE_TTL_SECONDS, getContextWindow, resolveModelAlias } from '@kiro-bridge/shared';
import type { ListModelsResponse, ModelListResponse, ModelObject } from '@kiro-bridge/shared';
import { logger } from '../../lib/logger.js';

// 回退结果只缓存较短时间，上游恢复后尽快刷新
const FALLBACK_TTL_MS = 60_000;

const OWNED_BY = 'kiro';

export interface ModelCatalogOptions {
  fetchModels: () => Promise<ListModelsResponse>;
  ttlSeconds?: number;
  now?: () => number;
}

interface CacheEntry {
  models: ModelObject[];
  expiresAt: number;
}

export class ModelCatalog {
  private readonly fetchModels: () => Promise<ListModelsResponse>;
  private readonly ttlMs: number;
  private readonly now: () => number;

  private cache: CacheEntry | null = null;
  private loading: Promise<ModelObject[]> | null = null;

  constructor(options: ModelCatalogOptions) {
    this.fetchModels = options.fetchModels;
    this.ttlMs = (options.ttlSeconds ?? MODEL_CACHE_TTL_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  async list(): Promise<ModelListResponse> {
    return { object: 'list', data: await this.getModels() };
  }

  private getModels(): Promise<ModelObject[]> {
    if (this.cache && this.cache.expiresAt > this.now()) {
      return Promise.resolve(this.cache.models);
    }
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async load(): Promise<ModelObject[]> {
    const created = Math.floor(this.now() / 1000);

    try {
      const response = await this.fetchModels();
      const models: ModelObject[] = [];

      for (const model of response.models) {
        if (!resolveModelAlias(model.modelId)) {
          logger.debug({ modelId: model.modelId }, 'Skipping model without alias mapping');
          continue;
        }
        models.push({
          id: model.modelId,
          object: 'model',
          created,
          owned_by: OWNED_BY,
          name: model.modelName ?? model.modelId,
          context_window: model.tokenLimits?.maxInputTokens ?? getContextWindow(model.modelId),
          ...(model.description ? { description: model.description } : {}),
        });
      }

      if (models.length > 0) {
        this.cache = { models, expiresAt: this.now() + this.ttlMs };
        logger.info({ count: models.length }, 'Model catalog refreshed from Kiro');
        return models;
      }

      logger.warn('Kiro returned no usable models, using static model table');
    } catch (error) {
      logger.warn({ err: error }, 'Failed to fetch Kiro models, using static model table');
    }

    const fallback = staticModels(created);
    this.cache = { models: fallback, expiresAt: this.now() + Math.min(FALLBACK_TTL_MS, this.ttlMs) };
    return fallback;
  }
}

export function staticModels(created: number): ModelObject[] {
  return KIRO_MODELS.map((model) => ({
    id: model.id,
    object: 'model',
    created,
    owned_by: OWNED_BY,
    name: model.name,
    context_window: model.contextWindow,
  }));
}
