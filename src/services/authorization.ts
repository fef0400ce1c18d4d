/**
 * Authorization Code Receiver
 * 首次授權（3-legged OAuth2）：印出授權網址，取得使用者同意後的 code
 *
 * - redirect_uri 指向 localhost：在該 port 開一次性的 HTTP 監聽，從 redirect 取 code
 * - 其他（oob 或遠端網址）：在終端機提示使用者貼上 code
 */

import http from 'node:http';
import readline from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import { AuthenticationError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

const logger = loggers.auth;

export const AUTHORIZE_ENDPOINT = 'https://api.login.yahoo.com/oauth2/request_auth';

const DEFAULT_REDIRECT_TIMEOUT_MS = 5 * 60 * 1000;

export interface AuthorizationCodeReceiver {
  /**
   * 引導使用者完成授權並回傳 authorization code
   */
  receive(authorizeUrl: string): Promise<string>;
}

/**
 * 組出授權網址
 */
export function buildAuthorizationUrl(clientId: string, redirectUri: string): string {
  const url = new URL(AUTHORIZE_ENDPOINT);
  url.searchParams.set('client_id', clientId);
  url.searchParams.set('redirect_uri', redirectUri);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('language', 'en-us');
  return url.toString();
}

/**
 * redirect_uri 是否指向本機（可用本機監聽接收 code）
 */
export function isLoopbackRedirect(redirectUri: string): boolean {
  let url: URL;
  try {
    url = new URL(redirectUri);
  } catch {
    return false;
  }
  return url.protocol === 'http:' && ['localhost', '127.0.0.1', '[::1]'].includes(url.hostname);
}

/**
 * 從 redirect 的 query 取出 code
 * @throws AuthenticationError 使用者拒絕授權或缺少 code
 */
export function extractAuthorizationCode(params: URLSearchParams): string {
  const error = params.get('error');
  if (error) {
    const description = params.get('error_description');
    throw new AuthenticationError(`授權被拒絕：${error}${description ? `（${description}）` : ''}`);
  }
  const code = params.get('code');
  if (!code) {
    throw new AuthenticationError('授權回應缺少 code');
  }
  return code;
}

export interface PromptReceiverOptions {
  input?: Readable;
  output?: Writable;
}

/**
 * 終端機提示輸入 code（oob 流程）
 */
export class PromptCodeReceiver implements AuthorizationCodeReceiver {
  private readonly input: Readable;
  private readonly output: Writable;

  constructor(options: PromptReceiverOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stderr;
  }

  async receive(authorizeUrl: string): Promise<string> {
    this.output.write(`請在瀏覽器開啟以下網址並同意授權：\n\n  ${authorizeUrl}\n\n`);

    const rl = readline.createInterface({ input: this.input, output: this.output, terminal: false });
    try {
      const answer = (await rl.question('請輸入授權碼 (verifier)：')).trim();
      if (!answer) {
        throw new AuthenticationError('未輸入授權碼');
      }
      return answer;
    } finally {
      rl.close();
    }
  }
}

export interface LoopbackReceiverOptions {
  output?: Writable;
  timeoutMs?: number;
  /** 覆寫監聽 port（0 代表由系統指定） */
  port?: number;
  /** 開始監聽後呼叫，參數為實際 port */
  onListening?: (port: number) => void;
}

/**
 * 本機 redirect 監聽
 */
export class LoopbackCodeReceiver implements AuthorizationCodeReceiver {
  private readonly redirect: URL;
  private readonly output: Writable;
  private readonly timeoutMs: number;
  private readonly port: number;
  private readonly onListening?: (port: number) => void;

  constructor(redirectUri: string, options: LoopbackReceiverOptions = {}) {
    this.redirect = new URL(redirectUri);
    this.output = options.output ?? process.stderr;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REDIRECT_TIMEOUT_MS;
    this.port = options.port ?? Number(this.redirect.port || 80);
    this.onListening = options.onListening;
  }

  receive(authorizeUrl: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      let settled = false;

      const finish = (result: { code: string } | { error: unknown }): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        server.close();
        if ('code' in result) {
          resolve(result.code);
        } else {
          reject(result.error);
        }
      };

      const server = http.createServer((req, res) => {
        const requestUrl = new URL(req.url ?? '/', this.redirect.origin);
        if (requestUrl.pathname !== this.redirect.pathname) {
          res.writeHead(404).end();
          return;
        }

        try {
          const code = extractAuthorizationCode(requestUrl.searchParams);
          res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
          res.end('授權完成，可以關閉此視窗。');
          finish({ code });
        } catch (error) {
          res.writeHead(400, { 'Content-Type': 'text/plain; charset=utf-8' });
          res.end('授權失敗，請回到終端機查看訊息。');
          finish({ error });
        }
      });

      const timer = setTimeout(() => {
        finish({ error: new AuthenticationError(`等待授權逾時（${Math.round(this.timeoutMs / 1000)} 秒）`) });
      }, this.timeoutMs);

      server.on('error', (error) => {
        finish({ error: new AuthenticationError(`無法監聽 ${this.redirect.origin}：${error.message}`, { cause: error }) });
      });

      server.listen(this.port, this.redirect.hostname.replace(/^\[|\]$/g, ''), () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        logger.debug('等待授權 redirect', { port, path: this.redirect.pathname });
        this.output.write(`請在瀏覽器開啟以下網址並同意授權：\n\n  ${authorizeUrl}\n\n等待授權回應中...\n`);
        this.onListening?.(port);
      });
    });
  }
}

/**
 * 依 redirect_uri 選擇接收方式
 */
export function createCodeReceiver(redirectUri: string): AuthorizationCodeReceiver {
  return isLoopbackRedirect(redirectUri) ? new LoopbackCodeReceiver(redirectUri) : new PromptCodeReceiver();
}
