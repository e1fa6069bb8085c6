import { z } from 'zod';

/**
 * 凭证文件 Schema（AWS SSO 缓存格式，如 ~/.aws/sso/cache/kiro-auth-token.json）
 *
 * 未知字段原样保留，写回时不丢失
 */
export const credentialFileSchema = z
  .object({
    accessToken: z.string().default(''),
    refreshToken: z.string().min(1),
    expiresAt: z.string().datetime({ offset: true }).optional(),
    region: z.string().min(1).optional(),
    profileArn: z.string().optional(),
    // AWS SSO OIDC 设备注册信息（Kiro 桌面登录不需要）
    clientId: z.string().optional(),
    clientSecret: z.string().optional(),
  })
  .passthrough();

export type CredentialFile = z.infer<typeof credentialFileSchema>;

// 刷新接口响应
export const tokenRefreshResponseSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().optional(),
  expiresIn: z.number().positive().optional(),
  profileArn: z.string().optional(),
});

export type TokenRefreshResponse = z.infer<typeof tokenRefreshResponseSchema>;

// ListAvailableModels 响应
export const listModelsResponseSchema = z.object({
  models: z
    .array(
      z
        .object({
          modelId: z.string(),
          modelName: z.string().optional(),
          description: z.string().optional(),
          tokenLimits: z
            .object({
              maxInputTokens: z.number().optional(),
              maxOutputTokens: z.number().optional(),
            })
            .partial()
            .optional(),
        })
        .passthrough()
    )
    .default([]),
  defaultModel: z.object({ modelId: z.string() }).partial().optional(),
});

export type ListModelsResponse = z.infer<typeof listModelsResponseSchema>;
