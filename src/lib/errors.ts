/**
 * Error Types
 * 所有錯誤都是終止性的：CLI 印出訊息後以對應的 exit code 結束
 */

export type ErrorCode = 'CONFIG_ERROR' | 'AUTH_ERROR' | 'FETCH_ERROR';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 憑證檔缺少、格式錯誤，或設定值無效
 */
export class ConfigurationError extends AppError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = 3;
}

/**
 * Token 交換或更新被授權伺服器拒絕
 */
export class AuthenticationError extends AppError {
  readonly code = 'AUTH_ERROR';
  readonly exitCode = 4;
}

/**
 * 網路錯誤或 API 非 2xx 回應
 */
export class ApiFetchError extends AppError {
  readonly code = 'FETCH_ERROR';
  readonly exitCode = 2;
  readonly status: number | null;
  readonly url: string;

  constructor(message: string, url: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.url = url;
    this.status = status;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * 取得錯誤訊息字串
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
