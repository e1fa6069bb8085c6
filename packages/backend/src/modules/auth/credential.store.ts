/**
 * 凭证存储
 *
 * 文件格式为 AWS SSO 缓存格式（~/.aws/sso/cache/kiro-auth-token.json），
 * 写回时保留文件中的其他字段。
 */

import { promises as fs } from 'fs';
import path from 'path';
import { credentialFileSchema } from '@kiro-bridge/shared';
import type { CredentialFile } from '@kiro-bridge/shared';
import { AuthError } from '../proxy/errors.js';
import { logger } from '../../lib/logger.js';

export interface Credential {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  region: string;
  profileArn?: string;
  /** 存在 clientId/clientSecret 时走 AWS SSO OIDC 刷新 */
  clientId?: string;
  clientSecret?: string;
}

export interface CredentialStore {
  load(): Promise<Credential>;
  save(credential: Credential): Promise<void>;
}

function toCredential(file: CredentialFile, defaultRegion: string): Credential {
  return {
    accessToken: file.accessToken,
    refreshToken: file.refreshToken,
    // 没有过期时间视为已过期，首次使用时刷新
    expiresAt: file.expiresAt ? new Date(file.expiresAt) : new Date(0),
    region: file.region ?? defaultRegion,
    profileArn: file.profileArn,
    clientId: file.clientId,
    clientSecret: file.clientSecret,
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileCredentialStore implements CredentialStore {
  /** 最近一次读取的原始内容，写回时合并 */
  private raw: Record<string, unknown> = {};

  constructor(
    private readonly filePath: string,
    private readonly defaultRegion: string
  ) {}

  async load(): Promise<Credential> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new AuthError(`Credential file not found: ${this.filePath}`);
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new AuthError(`Credential file is not valid JSON: ${this.filePath}`);
    }

    const parsed = credentialFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthError(`Credential file is invalid: ${this.filePath}`, parsed.error.flatten().fieldErrors);
    }

    this.raw = parsed.data;
    logger.info({ path: this.filePath }, 'Loaded Kiro credentials');
    return toCredential(parsed.data, this.defaultRegion);
  }

  /**
   * 原子写入：同目录临时文件 + rename
   */
  async save(credential: Credential): Promise<void> {
    const content: Record<string, unknown> = {
      ...this.raw,
      accessToken: credential.accessToken,
      refreshToken: credential.refreshToken,
      expiresAt: credential.expiresAt.toISOString(),
      region: credential.region,
    };
    if (credential.profileArn) content.profileArn = credential.profileArn;
    if (credential.clientId) content.clientId = credential.clientId;
    if (credential.clientSecret) content.clientSecret = credential.clientSecret;

    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tmpPath, `${JSON.stringify(content, null, 2)}\n`, { encoding: 'utf8', mode: 0o600 });
    try {
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }

    this.raw = content;
    logger.debug({ path: this.filePath }, 'Persisted refreshed Kiro credentials');
  }
}

/**
 * 内存存储（环境变量引导、测试）
 */
export class MemoryCredentialStore implements CredentialStore {
  private credential: Credential;
  saveCount = 0;

  constructor(initial: Credential) {
    this.credential = { ...initial };
  }

  async load(): Promise<Credential> {
    return { ...this.credential };
  }

  async save(credential: Credential): Promise<void> {
    this.credential = { ...credential };
    this.saveCount++;
  }

  get current(): Credential {
    return { ...this.credential };
  }
}
