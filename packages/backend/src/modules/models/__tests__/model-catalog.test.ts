import { describe, it, expect, vi } from 'vitest';
import type { ListModelsResponse } from '@kiro-bridge/shared';
import { ModelCatalog, staticModels } from '../model-catalog.js';

const NOW = 1_700_000_000_000;

function setup(ttlSeconds?: number) {
  let now = NOW;
  const fetchModels = vi.fn<() => Promise<ListModelsResponse>>();
  const catalog = new ModelCatalog({ fetchModels, ttlSeconds, now: () => now });
  return {
    fetchModels,
    catalog,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

const upstreamModels: ListModelsResponse = {
  models: [
    { modelId: 'claude-sonnet-4.5', modelName: 'Claude Sonnet 4.5', tokenLimits: { maxInputTokens: 180_000 } },
    { modelId: 'experimental-model' },
    { modelId: 'claude-haiku-4.5', description: 'Fast' },
  ],
};

describe('ModelCatalog', () => {
  it('should list upstream models that have an alias mapping', async () => {
    const { fetchModels, catalog } = setup();
    fetchModels.mockResolvedValue(upstreamModels);

    await expect(catalog.list()).resolves.toEqual({
      object: 'list',
      data: [
        {
          id: 'claude-sonnet-4.5',
          object: 'model',
          created: 1_700_000_000,
          owned_by: 'kiro',
          name: 'Claude Sonnet 4.5',
          context_window: 180_000,
        },
        {
          id: 'claude-haiku-4.5',
          object: 'model',
          created: 1_700_000_000,
          owned_by: 'kiro',
          name: 'claude-haiku-4.5',
          context_window: 200_000,
          description: 'Fast',
        },
      ],
    });
  });

  it('should cache until the TTL expires', async () => {
    const { fetchModels, catalog, advance } = setup(60);
    fetchModels.mockResolvedValue(upstreamModels);

    await catalog.list();
    advance(59_000);
    await catalog.list();
    expect(fetchModels).toHaveBeenCalledTimes(1);

    advance(2_000);
    await catalog.list();
    expect(fetchModels).toHaveBeenCalledTimes(2);
  });

  it('should share one upstream call between concurrent callers', async () => {
    const { fetchModels, catalog } = setup();
    fetchModels.mockResolvedValue(upstreamModels);

    await Promise.all([catalog.list(), catalog.list(), catalog.list()]);
    expect(fetchModels).toHaveBeenCalledTimes(1);
  });

  it('should fall back to the static table and retry after a minute', async () => {
    const { fetchModels, catalog, advance } = setup();
    fetchModels.mockRejectedValue(new Error('unavailable'));

    const result = await catalog.list();
    expect(result.data).toEqual(staticModels(1_700_000_000));
    expect(result.data.map((m) => m.id)).toEqual([
      'auto',
      'claude-sonnet-4',
      'claude-sonnet-4.5',
      'claude-haiku-4.5',
      'claude-opus-4.5',
      'claude-opus-4.6',
    ]);

    advance(30_000);
    await catalog.list();
    expect(fetchModels).toHaveBeenCalledTimes(1);

    advance(30_001);
    await catalog.list();
    expect(fetchModels).toHaveBeenCalledTimes(2);
  });

  it('should fall back when upstream returns no usable models', async () => {
    const { fetchModels, catalog } = setup();
    fetchModels.mockResolvedValue({ models: [{ modelId: 'experimental-model' }] });

    const result = await catalog.list();
    expect(result.data).toHaveLength(6);
  });
});
