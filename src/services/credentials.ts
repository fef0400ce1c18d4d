/**
 * Credential Store
 * OAuth 憑證檔（oauth2.json）讀寫
 *
 * 檔案是 token 的唯一來源：啟動時讀取，更新 token 後原地寫回。
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

const logger = loggers.auth;

export const credentialSchema = z
  .object({
    consumer_key: z.string().trim().min(1, 'consumer_key 不可為空'),
    consumer_secret: z.string().trim().min(1, 'consumer_secret 不可為空'),
    redirect_uri: z.string().trim().min(1).default('oob'),
    access_token: z.string().min(1).optional(),
    refresh_token: z.string().min(1).optional(),
    /** Access token 核發時間（epoch 秒） */
    token_time: z.number().nonnegative().optional(),
    token_type: z.string().nullish(),
    /** Access token 有效秒數，未記錄時視為 3600 */
    expires_in: z.number().positive().optional(),
    guid: z.string().nullish(),
  })
  .passthrough();

export type CredentialRecord = z.infer<typeof credentialSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export class CredentialStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getPath(): string {
    return this.filePath;
  }

  /**
   * 讀取並驗證憑證檔
   * @throws ConfigurationError 檔案不存在、JSON 格式錯誤或欄位不符
   */
  load(): CredentialRecord {
    if (!fs.existsSync(this.filePath)) {
      throw new ConfigurationError(
        `找不到憑證檔 ${this.filePath}。請建立此檔並填入 consumer_key、consumer_secret 與 redirect_uri`
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`憑證檔 ${this.filePath} 不是有效的 JSON：${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = credentialSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`憑證檔 ${this.filePath} 格式錯誤：${formatIssues(parsed.error)}`, {
        cause: parsed.error,
      });
    }

    logger.debug('已讀取憑證檔', {
      path: this.filePath,
      hasAccessToken: Boolean(parsed.data.access_token),
      hasRefreshToken: Boolean(parsed.data.refresh_token),
    });
    return parsed.data;
  }

  /**
   * 寫回憑證檔（先寫暫存檔再 rename，避免寫到一半損毀）
   */
  save(record: CredentialRecord): void {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(tmpPath, JSON.stringify(record, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 });
    fs.renameSync(tmpPath, this.filePath);
    logger.debug('已寫回憑證檔', { path: this.filePath });
  }
}
