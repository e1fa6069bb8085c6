/**
 * Kiro 模型配置（硬编码）
 *
 * Kiro 支持的模型 ID（从 ListAvailableModels API 获取）：
 * - auto
 * - claude-sonnet-4
 * - claude-sonnet-4.5
 * - claude-haiku-4.5
 * - claude-opus-4.5
 * - claude-opus-4.6
 */

export interface KiroModelInfo {
  id: string;
  name: string;
  contextWindow: number;
}

export const KIRO_MODELS: readonly KiroModelInfo[] = [
  { id: 'auto', name: 'Auto', contextWindow: 200_000 },
  { id: 'claude-sonnet-4', name: 'Claude Sonnet 4', contextWindow: 200_000 },
  { id: 'claude-sonnet-4.5', name: 'Claude Sonnet 4.5', contextWindow: 200_000 },
  { id: 'claude-haiku-4.5', name: 'Claude Haiku 4.5', contextWindow: 200_000 },
  { id: 'claude-opus-4.5', name: 'Claude Opus 4.5', contextWindow: 200_000 },
  { id: 'claude-opus-4.6', name: 'Claude Opus 4.6', contextWindow: 200_000 },
];

export const DEFAULT_CONTEXT_WINDOW = 200_000;

/**
 * 客户端模型名 → Kiro 模型 ID
 *
 * Kiro 自身的模型 ID 也作为别名收录
 */
export const MODEL_ALIASES: Readonly<Record<string, string>> = {
  auto: 'auto',

  // Claude Sonnet 4
  'claude-sonnet-4': 'claude-sonnet-4',
  'claude-sonnet-4-20250514': 'claude-sonnet-4',

  // Claude Sonnet 4.5
  'claude-sonnet-4.5': 'claude-sonnet-4.5',
  'claude-sonnet-4-5': 'claude-sonnet-4.5',
  'claude-sonnet-4-5-20250929': 'claude-sonnet-4.5',

  // Claude Haiku 4.5
  'claude-haiku-4.5': 'claude-haiku-4.5',
  'claude-haiku-4-5': 'claude-haiku-4.5',
  'claude-haiku-4-5-20251001': 'claude-haiku-4.5',

  // Claude Opus 4.5
  'claude-opus-4.5': 'claude-opus-4.5',
  'claude-opus-4-5': 'claude-opus-4.5',
  'claude-opus-4-5-20251101': 'claude-opus-4.5',

  // Claude Opus 4.6
  'claude-opus-4.6': 'claude-opus-4.6',
  'claude-opus-4-6': 'claude-opus-4.6',

  // 旧版本映射到最接近的模型
  'claude-3-7-sonnet-20250219': 'claude-sonnet-4.5',
  'claude-3.7-sonnet': 'claude-sonnet-4.5',
  'claude-3-5-sonnet-20241022': 'claude-sonnet-4',
  'claude-3.5-sonnet': 'claude-sonnet-4',
};

/**
 * 解析模型别名，未知别名返回 undefined
 */
export function resolveModelAlias(alias: string): string | undefined {
  const normalized = alias.toLowerCase().trim();
  return Object.prototype.hasOwnProperty.call(MODEL_ALIASES, normalized)
    ? MODEL_ALIASES[normalized]
    : undefined;
}

export function getContextWindow(modelId: string): number {
  return KIRO_MODELS.find((m) => m.id === modelId)?.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
}
