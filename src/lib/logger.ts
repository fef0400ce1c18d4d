/**
 * Structured Logger - 結構化日誌系統
 * 特性：
 *   - JSON 格式輸出（易於機器解析）
 *   - 日誌級別控制（--verbose / --quiet）
 *   - runId 追蹤：同一次執行的日誌共用一個 id
 *   - 各階段耗時 (duration)
 *
 * 所有日誌寫到 stderr，stdout 保留給指令輸出（表格或 JSON）。
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 單次執行識別碼 */
  runId?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** HTTP 狀態碼 */
  status?: number;
  /** 執行時間（毫秒） */
  duration?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'warn') */
  minLevel?: LogLevel;
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 輸出函數 (default: console.error) */
  sink?: (line: string) => void;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

let currentRunId: string | undefined;

/**
 * 開始新的一次執行，之後所有日誌都會帶上此 runId
 */
export function startRun(runId: string = randomUUID()): string {
  currentRunId = runId;
  return runId;
}

export function getRunId(): string | undefined {
  return currentRunId;
}

export class StructuredLogger {
  private readonly component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel ?? 'warn',
      formatter: config.formatter ?? ((entry) => JSON.stringify(entry)),
      sink: config.sink ?? ((line) => console.error(line)),
      includeStack: config.includeStack !== false,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry = this.createEntry('error', message, context);
    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: error.message,
        code,
        stack: this.config.includeStack ? error.stack : undefined,
      };
    } else if (error !== undefined && error !== null) {
      entry.error = { name: 'Error', message: String(error) };
    }

    this.config.sink(this.config.formatter(entry));
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;
    this.config.sink(this.config.formatter(this.createEntry(level, message, context)));
  }

  private createEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
    };
    const enriched = this.enrichContext(context);
    if (enriched) {
      entry.context = enriched;
    }
    return entry;
  }

  /**
   * 自動補上目前的 runId
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    if (!currentRunId) return context;
    if (!context) return { runId: currentRunId };
    return context.runId ? context : { runId: currentRunId, ...context };
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.info(`${operation} 完成`, { ...context, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      this.error(`${operation} 失敗`, error, { ...context, duration: Date.now() - startTime });
      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例，按組件分類
 */
export const loggers = {
  auth: new StructuredLogger('Auth'),
  api: new StructuredLogger('API'),
  export: new StructuredLogger('Export'),
  cli: new StructuredLogger('CLI'),
};

/**
 * 一次調整所有預設 logger 的級別
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
