/**
 * Auth Command
 * 檢查與更新 OAuth token
 */

import { Command } from 'commander';
import { getConfigService } from '../services/config.js';
import { createAuthService } from '../lib/api-client.js';
import { outputData } from '../lib/output-formatter.js';

type AuthCommandOptions = {
  credentials?: string;
  format?: string;
};

export const authCommand = new Command('auth')
  .description('OAuth 認證管理');

/**
 * ff-standings auth status
 */
authCommand
  .command('status')
  .description('顯示 token 狀態（不發送網路請求）')
  .option('-c, --credentials <path>', 'OAuth 憑證檔路徑（預設 ./oauth2.json）')
  .action((_options: AuthCommandOptions, cmd: Command) => {
    const opts = cmd.optsWithGlobals<AuthCommandOptions>();
    const config = getConfigService();
    const status = createAuthService({ credentialsFile: config.getCredentialsFile(opts.credentials) }).getStatus();

    outputData(status, config.getFormat(opts.format), () => {
      console.log(`憑證檔：${status.credentialsPath}`);
      console.log(`Access token：${status.hasAccessToken ? '有' : '無'}`);
      console.log(`Refresh token：${status.hasRefreshToken ? '有' : '無'}`);
      console.log(`狀態：${status.valid ? '有效' : '需更新'}`);
      if (status.expiresAt) {
        console.log(`到期時間：${status.expiresAt}`);
      }
    });
  });

/**
 * ff-standings auth login
 */
authCommand
  .command('login')
  .description('更新 token；尚未授權時進行瀏覽器授權')
  .option('-c, --credentials <path>', 'OAuth 憑證檔路徑（預設 ./oauth2.json）')
  .action(async (_options: AuthCommandOptions, cmd: Command) => {
    const opts = cmd.optsWithGlobals<AuthCommandOptions>();
    const config = getConfigService();
    const auth = createAuthService({ credentialsFile: config.getCredentialsFile(opts.credentials) });

    await auth.renew();
    const status = auth.getStatus();

    outputData(status, config.getFormat(opts.format), () => {
      console.log(`已取得新的 access token，已寫回 ${status.credentialsPath}`);
      if (status.expiresAt) {
        console.log(`到期時間：${status.expiresAt}`);
      }
    });
  });
