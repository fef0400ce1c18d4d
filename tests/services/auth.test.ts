import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { AuthService, TOKEN_ENDPOINT } from '../../src/services/auth.js';
import { CredentialStore, type CredentialRecord } from '../../src/services/credentials.js';
import { AuthenticationError, ConfigurationError } from '../../src/lib/errors.js';
import type { AuthorizationCodeReceiver } from '../../src/services/authorization.js';
import { makeTempDir } from '../helpers/fixtures.js';

// Mock ofetch（保留真正的 FetchError）
vi.mock('ofetch', async (importOriginal) => ({
  ...(await importOriginal<typeof import('ofetch')>()),
  ofetch: vi.fn(),
}));

import { ofetch, FetchError } from 'ofetch';

const NOW_MS = 1_700_000_000_000;
const NOW_SEC = NOW_MS / 1000;
const BASIC = `Basic ${Buffer.from('test-key:test-secret').toString('base64')}`;

describe('AuthService', () => {
  let tempDir: string;
  let filePath: string;
  let store: CredentialStore;

  const writeCredentials = (extra: Partial<CredentialRecord>): void => {
    fs.writeFileSync(
      filePath,
      JSON.stringify({ consumer_key: 'test-key', consumer_secret: 'test-secret', redirect_uri: 'oob', ...extra })
    );
  };

  const readCredentials = (): CredentialRecord => new CredentialStore(filePath).load();

  const createService = (receiver?: AuthorizationCodeReceiver): AuthService =>
    new AuthService(store, { receiver, now: () => NOW_MS });

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    tempDir = makeTempDir('ff-standings-auth');
    filePath = path.join(tempDir, 'oauth2.json');
    store = new CredentialStore(filePath);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('getToken', () => {
    it('should return stored token without network when still valid', async () => {
      writeCredentials({ access_token: 'test-access', refresh_token: 'test-refresh', token_time: NOW_SEC - 100 });

      const token = await createService().getToken();

      expect(token).toBe('test-access');
      expect(ofetch).not.toHaveBeenCalled();
    });

    it('should treat token inside the expiry buffer as expired', async () => {
      writeCredentials({ access_token: 'old-access', refresh_token: 'test-refresh', token_time: NOW_SEC - 3550 });
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'fresh-access', expires_in: 3600 });

      expect(await createService().getToken()).toBe('fresh-access');
      expect(ofetch).toHaveBeenCalledTimes(1);
    });

    it('should refresh an expired token and persist it', async () => {
      writeCredentials({ access_token: 'old-access', refresh_token: 'test-refresh', token_time: NOW_SEC - 4000 });
      vi.mocked(ofetch).mockResolvedValueOnce({
        access_token: 'fresh-access',
        expires_in: 3600,
        token_type: 'bearer',
      });

      const token = await createService().getToken();

      expect(token).toBe('fresh-access');
      expect(ofetch).toHaveBeenCalledWith(TOKEN_ENDPOINT, {
        method: 'POST',
        headers: {
          Authorization: BASIC,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: 'grant_type=refresh_token&refresh_token=test-refresh&redirect_uri=oob',
      });

      const saved = readCredentials();
      expect(saved.access_token).toBe('fresh-access');
      // 更新回應未附 refresh_token 時沿用舊的
      expect(saved.refresh_token).toBe('test-refresh');
      expect(saved.token_time).toBe(NOW_SEC);
      expect(saved.token_type).toBe('bearer');
      expect(saved.expires_in).toBe(3600);
      expect(saved.consumer_key).toBe('test-key');
    });

    it('should refresh when token_time is missing', async () => {
      writeCredentials({ access_token: 'old-access', refresh_token: 'test-refresh' });
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'fresh-access' });

      expect(await createService().getToken()).toBe('fresh-access');
    });

    it('should store a rotated refresh token', async () => {
      writeCredentials({ access_token: 'old-access', refresh_token: 'test-refresh', token_time: 0 });
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'fresh-access', refresh_token: 'rotated-refresh' });

      await createService().getToken();

      expect(readCredentials().refresh_token).toBe('rotated-refresh');
    });

    it('should run the authorization flow when there is no refresh token', async () => {
      writeCredentials({});
      const receive = vi.fn(async (_url: string) => 'test-code');
      vi.mocked(ofetch).mockResolvedValueOnce({
        access_token: 'first-access',
        refresh_token: 'first-refresh',
        expires_in: 3600,
        xoauth_yahoo_guid: 'test-guid',
      });

      const token = await createService({ receive }).getToken();

      expect(token).toBe('first-access');
      expect(receive).toHaveBeenCalledTimes(1);
      const authorizeUrl = new URL(receive.mock.calls[0][0]);
      expect(authorizeUrl.searchParams.get('client_id')).toBe('test-key');
      expect(authorizeUrl.searchParams.get('redirect_uri')).toBe('oob');
      expect(authorizeUrl.searchParams.get('response_type')).toBe('code');
      expect(ofetch).toHaveBeenCalledWith(
        TOKEN_ENDPOINT,
        expect.objectContaining({
          body: 'grant_type=authorization_code&code=test-code&redirect_uri=oob',
        })
      );

      const saved = readCredentials();
      expect(saved.access_token).toBe('first-access');
      expect(saved.refresh_token).toBe('first-refresh');
      expect(saved.guid).toBe('test-guid');
    });

    it('should share one in-flight refresh between concurrent callers', async () => {
      writeCredentials({ access_token: 'old-access', refresh_token: 'test-refresh', token_time: 0 });
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'fresh-access' });
      const service = createService();

      const tokens = await Promise.all([service.getToken(), service.getToken(), service.getToken()]);

      expect(tokens).toEqual(['fresh-access', 'fresh-access', 'fresh-access']);
      expect(ofetch).toHaveBeenCalledTimes(1);
    });

    it('should not hit the network again after a refresh', async () => {
      writeCredentials({ access_token: 'old-access', refresh_token: 'test-refresh', token_time: 0 });
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'fresh-access' });
      const service = createService();

      await service.getToken();
      await service.getToken();

      expect(ofetch).toHaveBeenCalledTimes(1);
    });

    it('should throw AuthenticationError and keep the file when refresh is rejected', async () => {
      writeCredentials({ access_token: 'old-access', refresh_token: 'test-refresh', token_time: 0 });
      const rejection = new FetchError('[POST] "token": 400 Bad Request');
      rejection.statusCode = 400;
      rejection.data = { error: 'invalid_grant', error_description: 'token revoked' };
      vi.mocked(ofetch).mockRejectedValueOnce(rejection);

      const error = await createService().getToken().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toHaveProperty('message', '授權伺服器拒絕 refresh_token 請求（HTTP 400）：token revoked');
      expect(readCredentials().access_token).toBe('old-access');
    });

    it('should throw AuthenticationError when the response has no access_token', async () => {
      writeCredentials({ refresh_token: 'test-refresh' });
      vi.mocked(ofetch).mockResolvedValueOnce({ token_type: 'bearer' });

      await expect(createService().getToken()).rejects.toThrow('授權伺服器回應缺少 access_token');
    });

    it('should throw ConfigurationError before any request when the file is missing', async () => {
      await expect(createService().getToken()).rejects.toBeInstanceOf(ConfigurationError);
      expect(ofetch).not.toHaveBeenCalled();
    });
  });

  describe('renew', () => {
    it('should refresh even when the token is still valid', async () => {
      writeCredentials({ access_token: 'test-access', refresh_token: 'test-refresh', token_time: NOW_SEC });
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'renewed-access' });

      expect(await createService().renew()).toBe('renewed-access');
      expect(readCredentials().access_token).toBe('renewed-access');
    });
  });

  describe('getStatus', () => {
    it('should report a valid token and its expiry', () => {
      writeCredentials({ access_token: 'test-access', refresh_token: 'test-refresh', token_time: NOW_SEC - 100 });

      expect(createService().getStatus()).toEqual({
        credentialsPath: filePath,
        hasAccessToken: true,
        hasRefreshToken: true,
        valid: true,
        expiresAt: new Date((NOW_SEC - 100 + 3600 - 60) * 1000).toISOString(),
      });
    });

    it('should report an unauthorized file', () => {
      writeCredentials({});

      expect(createService().getStatus()).toEqual({
        credentialsPath: filePath,
        hasAccessToken: false,
        hasRefreshToken: false,
        valid: false,
        expiresAt: null,
      });
    });

    it('should honor a stored expires_in', () => {
      writeCredentials({ access_token: 'test-access', token_time: NOW_SEC - 200, expires_in: 120 });

      expect(createService().getStatus().valid).toBe(false);
    });
  });
});
