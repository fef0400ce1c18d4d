/**
 * Auth Service
 * OAuth2 認證服務 - 處理 Yahoo access token 的更新、首次授權與寫回
 */

import { ofetch, FetchError } from 'ofetch';
import type { AuthStatus, TokenProvider, TokenResponse } from '../types/auth.js';
import { AuthenticationError, errorMessage } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { CredentialRecord, CredentialStore } from './credentials.js';
import { buildAuthorizationUrl, createCodeReceiver, type AuthorizationCodeReceiver } from './authorization.js';

export const TOKEN_ENDPOINT = 'https://api.login.yahoo.com/oauth2/get_token';

/** Yahoo access token 有效期 */
export const DEFAULT_TOKEN_LIFETIME_SEC = 3600;

// Token 提前 60 秒過期，避免邊界問題
const TOKEN_EXPIRY_BUFFER_SEC = 60;

const logger = loggers.auth;

export interface AuthServiceOptions {
  /** 首次授權時取得 code 的方式（預設依 redirect_uri 決定） */
  receiver?: AuthorizationCodeReceiver;
  /** 目前時間（毫秒），測試用 */
  now?: () => number;
}

type TokenGrant =
  | { grant_type: 'refresh_token'; refresh_token: string }
  | { grant_type: 'authorization_code'; code: string };

export class AuthService implements TokenProvider {
  private readonly store: CredentialStore;
  private readonly receiver?: AuthorizationCodeReceiver;
  private readonly now: () => number;
  private credentials: CredentialRecord | null = null;

  // 單一飛行請求：避免同時多個呼叫者重複更新 token
  private inFlightTokenPromise: Promise<string> | null = null;

  constructor(store: CredentialStore, options: AuthServiceOptions = {}) {
    this.store = store;
    this.receiver = options.receiver;
    this.now = options.now ?? Date.now;
  }

  /**
   * 取得有效的 access token
   * - 有效：直接返回，不發網路請求
   * - 過期：以 refresh token 更新
   * - 尚未授權：進行互動式授權
   * 更新後的憑證會寫回憑證檔
   */
  async getToken(): Promise<string> {
    const credentials = this.loadCredentials();

    if (credentials.access_token && this.isTokenValid(credentials)) {
      return credentials.access_token;
    }

    if (this.inFlightTokenPromise) {
      return this.inFlightTokenPromise;
    }

    this.inFlightTokenPromise = credentials.refresh_token
      ? this.refresh(credentials, credentials.refresh_token)
      : this.authorize(credentials);

    try {
      return await this.inFlightTokenPromise;
    } finally {
      this.inFlightTokenPromise = null;
    }
  }

  /**
   * 強制重新取得 token（`auth login`）：有 refresh token 則更新，否則互動式授權
   */
  async renew(): Promise<string> {
    const credentials = this.loadCredentials();
    return credentials.refresh_token
      ? this.refresh(credentials, credentials.refresh_token)
      : this.authorize(credentials);
  }

  /**
   * 檢查 token 是否仍有效
   */
  isTokenValid(credentials: CredentialRecord): boolean {
    const expiresAt = this.getExpiresAt(credentials);
    return expiresAt !== null && this.now() < expiresAt;
  }

  getStatus(): AuthStatus {
    const credentials = this.loadCredentials();
    const expiresAt = this.getExpiresAt(credentials);
    return {
      credentialsPath: this.store.getPath(),
      hasAccessToken: Boolean(credentials.access_token),
      hasRefreshToken: Boolean(credentials.refresh_token),
      valid: Boolean(credentials.access_token) && this.isTokenValid(credentials),
      expiresAt: expiresAt === null ? null : new Date(expiresAt).toISOString(),
    };
  }

  /**
   * 到期時間（毫秒，已扣除 buffer）
   */
  private getExpiresAt(credentials: CredentialRecord): number | null {
    if (!credentials.access_token || credentials.token_time === undefined) {
      return null;
    }
    const lifetime = credentials.expires_in ?? DEFAULT_TOKEN_LIFETIME_SEC;
    return (credentials.token_time + lifetime - TOKEN_EXPIRY_BUFFER_SEC) * 1000;
  }

  private loadCredentials(): CredentialRecord {
    if (!this.credentials) {
      this.credentials = this.store.load();
    }
    return this.credentials;
  }

  private async refresh(credentials: CredentialRecord, refreshToken: string): Promise<string> {
    logger.info('Access token 已過期，更新中');
    const response = await this.requestToken(credentials, {
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });
    return this.persist(credentials, response);
  }

  private async authorize(credentials: CredentialRecord): Promise<string> {
    logger.info('尚未授權，開始互動式授權', { redirectUri: credentials.redirect_uri });
    const receiver = this.receiver ?? createCodeReceiver(credentials.redirect_uri);
    const code = await receiver.receive(buildAuthorizationUrl(credentials.consumer_key, credentials.redirect_uri));
    const response = await this.requestToken(credentials, { grant_type: 'authorization_code', code });
    return this.persist(credentials, response);
  }

  /**
   * 套用新 token 並寫回憑證檔
   */
  private persist(credentials: CredentialRecord, response: TokenResponse): string {
    const updated: CredentialRecord = {
      ...credentials,
      access_token: response.access_token,
      // 更新回應未附 refresh_token 時沿用舊的
      refresh_token: response.refresh_token ?? credentials.refresh_token,
      token_time: this.now() / 1000,
    };
    if (response.token_type) updated.token_type = response.token_type;
    if (response.expires_in) updated.expires_in = response.expires_in;
    if (response.xoauth_yahoo_guid) updated.guid = response.xoauth_yahoo_guid;

    this.store.save(updated);
    this.credentials = updated;
    logger.info('已寫回新的 access token', { path: this.store.getPath() });
    return response.access_token;
  }

  /**
   * 向 token endpoint 交換 token
   * @throws AuthenticationError 授權伺服器拒絕或無法連線
   */
  private async requestToken(credentials: CredentialRecord, grant: TokenGrant): Promise<TokenResponse> {
    const body = new URLSearchParams({
      ...grant,
      redirect_uri: credentials.redirect_uri,
    }).toString();
    const basic = Buffer.from(`${credentials.consumer_key}:${credentials.consumer_secret}`).toString('base64');

    let response: TokenResponse;
    try {
      response = await ofetch<TokenResponse>(TOKEN_ENDPOINT, {
        method: 'POST',
        headers: {
          Authorization: `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body,
      });
    } catch (error) {
      const status = error instanceof FetchError ? error.statusCode : undefined;
      logger.error('Token 交換失敗', error, { grantType: grant.grant_type, status });
      throw new AuthenticationError(
        `授權伺服器拒絕 ${grant.grant_type} 請求${status ? `（HTTP ${status}）` : ''}：${describeTokenError(error)}`,
        { cause: error }
      );
    }

    if (!response || typeof response.access_token !== 'string' || response.access_token.length === 0) {
      throw new AuthenticationError('授權伺服器回應缺少 access_token');
    }
    return response;
  }
}

/**
 * 取出 token endpoint 錯誤回應中的說明
 */
function describeTokenError(error: unknown): string {
  if (error instanceof FetchError) {
    const data: unknown = error.data;
    if (typeof data === 'object' && data !== null) {
      const description = 'error_description' in data ? data.error_description : undefined;
      const code = 'error' in data ? data.error : undefined;
      if (typeof description === 'string') return description;
      if (typeof code === 'string') return code;
    }
  }
  return errorMessage(error);
}
