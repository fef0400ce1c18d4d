/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 *
 * 解析順序：CLI 選項 → 環境變數 → 設定檔 → 預設值
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { AppConfig, ConfigKey } from '../types/config.js';
import { ConfigurationError } from '../lib/errors.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'ff-standings');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_CREDENTIALS_FILE = 'oauth2.json';
export const DEFAULT_OUTPUT_DIR = 'Data';
export const DEFAULT_SPORT = 'nfl';

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'credentialsFile',
  'outputDir',
  'sport',
  'season',
  'leagueKey',
  'format',
];

export const ENV_VARS = {
  credentialsFile: 'FFS_CREDENTIALS_FILE',
  outputDir: 'FFS_OUTPUT_DIR',
  sport: 'FFS_SPORT',
  season: 'FFS_SEASON',
  leagueKey: 'FFS_LEAGUE_KEY',
} as const;

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * 解析賽季年份
 * @throws ConfigurationError 非四位數年份
 */
export function parseSeason(value: string): number {
  if (!/^\d{4}$/.test(value.trim())) {
    throw new ConfigurationError(`無效的賽季年份：「${value}」`);
  }
  return Number(value.trim());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 只保留已知且型別正確的鍵值
 */
function sanitize(raw: unknown): AppConfig {
  if (!isRecord(raw)) return {};

  const config: AppConfig = {};
  if (typeof raw.credentialsFile === 'string') config.credentialsFile = raw.credentialsFile;
  if (typeof raw.outputDir === 'string') config.outputDir = raw.outputDir;
  if (typeof raw.sport === 'string') config.sport = raw.sport;
  if (typeof raw.season === 'number' && Number.isInteger(raw.season)) config.season = raw.season;
  if (typeof raw.leagueKey === 'string') config.leagueKey = raw.leagueKey;
  if (raw.format === 'json' || raw.format === 'table') config.format = raw.format;
  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔，讀取失敗時視為空設定
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    try {
      return sanitize(JSON.parse(fs.readFileSync(this.configPath, 'utf-8')));
    } catch {
      return {};
    }
  }

  private save(): void {
    fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  /**
   * 以字串設定值（供 `config set` 使用），會驗證鍵與值
   */
  setFromString(key: string, value: string): void {
    if (!isConfigKey(key)) {
      throw new ConfigurationError(`未知的設定鍵：「${key}」（可用：${CONFIG_KEYS.join(', ')}）`);
    }

    switch (key) {
      case 'season':
        this.set('season', parseSeason(value));
        break;
      case 'format':
        if (value !== 'json' && value !== 'table') {
          throw new ConfigurationError(`無效的輸出格式：「${value}」（可用：json, table）`);
        }
        this.set('format', value);
        break;
      default:
        if (value.trim().length === 0) {
          throw new ConfigurationError(`設定值不可為空：${key}`);
        }
        this.set(key, value.trim());
    }
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得環境變數（空字串視為未設定）
   */
  private env(name: string): string | undefined {
    const value = process.env[name];
    return value && value.length > 0 ? value : undefined;
  }

  getCredentialsFile(override?: string): string {
    return path.resolve(
      override || this.env(ENV_VARS.credentialsFile) || this.config.credentialsFile || DEFAULT_CREDENTIALS_FILE
    );
  }

  getOutputDir(override?: string): string {
    return path.resolve(
      override || this.env(ENV_VARS.outputDir) || this.config.outputDir || DEFAULT_OUTPUT_DIR
    );
  }

  getSport(override?: string): string {
    return (override || this.env(ENV_VARS.sport) || this.config.sport || DEFAULT_SPORT).toLowerCase();
  }

  /**
   * 未指定時回傳 undefined，由 API 使用目前賽季
   */
  getSeason(override?: string): number | undefined {
    const raw = override || this.env(ENV_VARS.season);
    if (raw) {
      return parseSeason(raw);
    }
    return this.config.season;
  }

  getLeagueKey(override?: string): string | undefined {
    return override || this.env(ENV_VARS.leagueKey) || this.config.leagueKey;
  }

  getFormat(override?: string): 'json' | 'table' {
    const format = override || this.config.format;
    return format === 'json' ? 'json' : 'table';
  }
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}
