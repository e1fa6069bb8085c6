import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileCredentialStore } from '../credential.store.js';
import { AuthError } from '../../proxy/errors.js';

describe('FileCredentialStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kiro-creds-'));
    filePath = path.join(dir, 'kiro-auth-token.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load credentials and write them back keeping unknown fields', async () => {
    await fs.writeFile(
      filePath,
      JSON.stringify({
        accessToken: 'old-token',
        refreshToken: 'test-refresh',
        expiresAt: '2030-01-01T00:00:00.000Z',
        region: 'eu-west-1',
        authMethod: 'social',
        provider: 'Github',
      })
    );
    const store = new FileCredentialStore(filePath, 'us-east-1');

    const loaded = await store.load();
    expect(loaded).toEqual({
      accessToken: 'old-token',
      refreshToken: 'test-refresh',
      expiresAt: new Date('2030-01-01T00:00:00.000Z'),
      region: 'eu-west-1',
      profileArn: undefined,
      clientId: undefined,
      clientSecret: undefined,
    });

    await store.save({
      ...loaded,
      accessToken: 'new-token',
      expiresAt: new Date('2031-06-01T12:00:00.000Z'),
      profileArn: 'arn:test:profile',
    });

    const written: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
    expect(written).toEqual({
      accessToken: 'new-token',
      refreshToken: 'test-refresh',
      expiresAt: '2031-06-01T12:00:00.000Z',
      region: 'eu-west-1',
      authMethod: 'social',
      provider: 'Github',
      profileArn: 'arn:test:profile',
    });
    expect(await fs.readdir(dir)).toEqual(['kiro-auth-token.json']);
  });

  it('should treat a missing expiry as already expired', async () => {
    await fs.writeFile(filePath, JSON.stringify({ refreshToken: 'test-refresh' }));

    const loaded = await new FileCredentialStore(filePath, 'us-east-1').load();

    expect(loaded.expiresAt.getTime()).toBe(0);
    expect(loaded.accessToken).toBe('');
    expect(loaded.region).toBe('us-east-1');
  });

  it('should raise AuthError for a missing file', async () => {
    await expect(new FileCredentialStore(filePath, 'us-east-1').load()).rejects.toBeInstanceOf(AuthError);
  });

  it('should raise AuthError for invalid JSON', async () => {
    await fs.writeFile(filePath, '{not json');
    await expect(new FileCredentialStore(filePath, 'us-east-1').load()).rejects.toBeInstanceOf(AuthError);
  });

  it('should raise AuthError when the refresh token is missing', async () => {
    await fs.writeFile(filePath, JSON.stringify({ accessToken: 'a' }));
    await expect(new FileCredentialStore(filePath, 'us-east-1').load()).rejects.toBeInstanceOf(AuthError);
  });
});
