/**
 * Config Command
 * 設定檔管理
 */

import { Command } from 'commander';
import { getConfigService, isConfigKey, CONFIG_KEYS } from '../services/config.js';
import { ConfigurationError } from '../lib/errors.js';

export const configCommand = new Command('config')
  .description('設定檔管理');

configCommand
  .command('list')
  .description('列出所有設定')
  .action(() => {
    console.log(JSON.stringify(getConfigService().getAll(), null, 2));
  });

configCommand
  .command('get <key>')
  .description('取得設定值')
  .action((key: string) => {
    if (!isConfigKey(key)) {
      throw new ConfigurationError(`未知的設定鍵：「${key}」（可用：${CONFIG_KEYS.join(', ')}）`);
    }
    const value = getConfigService().get(key);
    console.log(value === undefined ? '' : String(value));
  });

configCommand
  .command('set <key> <value>')
  .description(`設定值（${CONFIG_KEYS.join(', ')}）`)
  .action((key: string, value: string) => {
    getConfigService().setFromString(key, value);
    console.log(`已設定 ${key}`);
  });

configCommand
  .command('unset <key>')
  .description('刪除設定值')
  .action((key: string) => {
    if (!isConfigKey(key)) {
      throw new ConfigurationError(`未知的設定鍵：「${key}」（可用：${CONFIG_KEYS.join(', ')}）`);
    }
    getConfigService().delete(key);
    console.log(`已刪除 ${key}`);
  });

configCommand
  .command('path')
  .description('顯示設定檔路徑')
  .action(() => {
    console.log(getConfigService().getConfigPath());
  });
