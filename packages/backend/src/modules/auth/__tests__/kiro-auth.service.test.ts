import { describe, it, expect, vi } from 'vitest';
import { KiroAuthService, RefreshRequestError } from '../kiro-auth.service.js';
import type { Credential } from '../credential.store.js';
import type { HttpTransport } from '../../../lib/upstream-client.js';
import { fakeResponse } from '../../../__tests__/test-utils.js';

const NOW = 1_700_000_000_000;

const desktopCredential: Credential = {
  accessToken: 'old-token',
  refreshToken: 'test-refresh',
  expiresAt: new Date(0),
  region: 'us-east-1',
};

function setup() {
  const transport = vi.fn<HttpTransport>();
  const service = new KiroAuthService({ transport, now: () => NOW });
  return { transport, service };
}

describe('KiroAuthService', () => {
  it('should refresh through the Kiro desktop endpoint', async () => {
    const { transport, service } = setup();
    transport.mockResolvedValueOnce(
      fakeResponse(200, JSON.stringify({ accessToken: 'new-token', expiresIn: 1800, profileArn: 'arn:test:profile' }))
    );

    const result = await service.refreshToken(desktopCredential);

    const [url, request] = transport.mock.calls[0];
    expect(url).toBe('https://prod.us-east-1.auth.desktop.kiro.dev/refreshToken');
    expect(request.method).toBe('POST');
    expect(request.body).toBe('{"refreshToken":"test-refresh"}');
    expect(result).toEqual({
      accessToken: 'new-token',
      refreshToken: 'test-refresh',
      expiresAt: new Date(NOW + 1_800_000),
      profileArn: 'arn:test:profile',
    });
  });

  it('should use AWS SSO OIDC when client credentials are present', async () => {
    const { transport, service } = setup();
    transport.mockResolvedValueOnce(fakeResponse(200, JSON.stringify({ accessToken: 'a', refreshToken: 'r2' })));

    const result = await service.refreshToken({
      ...desktopCredential,
      region: 'eu-west-1',
      clientId: 'test-client',
      clientSecret: 'test-secret',
    });

    const [url, request] = transport.mock.calls[0];
    expect(url).toBe('https://oidc.eu-west-1.amazonaws.com/token');
    expect(JSON.parse(request.body ?? '')).toEqual({
      grantType: 'refresh_token',
      clientId: 'test-client',
      clientSecret: 'test-secret',
      refreshToken: 'test-refresh',
    });
    expect(result.refreshToken).toBe('r2');
    expect(result.expiresAt).toEqual(new Date(NOW + 3_600_000));
  });

  it.each([
    { status: 401, transient: false },
    { status: 400, transient: false },
    { status: 429, transient: true },
    { status: 503, transient: true },
  ])('should classify status $status as transient=$transient', async ({ status, transient }) => {
    const { transport, service } = setup();
    transport.mockResolvedValueOnce(fakeResponse(status, 'nope'));

    const error: unknown = await service.refreshToken(desktopCredential).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RefreshRequestError);
    expect(error).toMatchObject({ status, transient, message: `Token refresh failed with status ${status}` });
  });

  it('should treat transport failures as transient', async () => {
    const { transport, service } = setup();
    transport.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND'));

    await expect(service.refreshToken(desktopCredential)).rejects.toMatchObject({
      status: undefined,
      transient: true,
      message: 'Token refresh request failed: getaddrinfo ENOTFOUND',
    });
  });

  it('should reject malformed refresh responses without retrying', async () => {
    const { transport, service } = setup();
    transport
      .mockResolvedValueOnce(fakeResponse(200, 'not json'))
      .mockResolvedValueOnce(fakeResponse(200, JSON.stringify({ expiresIn: 10 })));

    await expect(service.refreshToken(desktopCredential)).rejects.toMatchObject({ transient: false });
    await expect(service.refreshToken(desktopCredential)).rejects.toMatchObject({
      transient: false,
      message: 'Token refresh response is missing accessToken',
    });
  });
});
