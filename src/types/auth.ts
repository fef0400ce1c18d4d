/**
 * OAuth2 Token Response
 * Yahoo token endpoint 回傳格式
 */
export interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
  token_type?: string;
  xoauth_yahoo_guid?: string;
}

/**
 * 認證狀態（供 `auth status` 使用）
 */
export interface AuthStatus {
  credentialsPath: string;
  hasAccessToken: boolean;
  hasRefreshToken: boolean;
  valid: boolean;
  /** Access token 到期時間（ISO 8601），尚未授權時為 null */
  expiresAt: string | null;
}

/**
 * 取得 access token 的來源
 */
export interface TokenProvider {
  getToken(): Promise<string>;
}
