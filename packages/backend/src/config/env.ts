import os from 'os';
import path from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';
import { DEFAULT_KIRO_REGION, MODEL_CACHE_TTL_SECONDS, TOKEN_REFRESH } from '@kiro-bridge/shared';

dotenv.config();

const booleanString = z
  .string()
  .transform((v) => v === 'true')
  .default('false');

const envSchema = z.object({
  // Server
  PORT: z.coerce.number().default(8000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // 客户端访问代理时使用的密钥
  PROXY_API_KEY: z.string().min(1),

  // Kiro 凭证
  KIRO_CREDS_FILE: z
    .string()
    .default(path.join(os.homedir(), '.aws/sso/cache/kiro-auth-token.json')),
  KIRO_REFRESH_TOKEN: z.string().optional(),
  KIRO_REGION: z.string().default(DEFAULT_KIRO_REGION),
  TOKEN_REFRESH_THRESHOLD_SECONDS: z.coerce.number().int().min(0).default(TOKEN_REFRESH.THRESHOLD_SECONDS),

  // 上游
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  UPSTREAM_PROXY_URL: z.string().url().optional(),

  // 模型列表缓存
  MODEL_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(MODEL_CACHE_TTL_SECONDS),

  // Fake reasoning（注入 thinking 标签，并把 <thinking> 内容转为 reasoning_content）
  FAKE_REASONING: booleanString,
  FAKE_REASONING_MAX_TOKENS: z.coerce.number().int().positive().default(4000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  console.error(parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

export type Env = z.infer<typeof envSchema>;
