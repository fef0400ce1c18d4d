/**
 * 設定檔結構
 */
export interface AppConfig {
  /** OAuth 憑證檔路徑（oauth2.json） */
  credentialsFile?: string;
  /** standings.json / standings.csv 輸出目錄 */
  outputDir?: string;
  /** 遊戲代碼（nfl, nba, mlb, nhl） */
  sport?: string;
  /** 賽季年份 */
  season?: number;
  /** 指定聯盟（例如 449.l.12345） */
  leagueKey?: string;
  /** 預設輸出格式 */
  format?: 'json' | 'table';
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;
