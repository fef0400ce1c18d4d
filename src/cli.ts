import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { exportCommand } from './commands/export.js';
import { leaguesCommand } from './commands/leagues.js';
import { authCommand } from './commands/auth.js';
import { configCommand } from './commands/config.js';
import { isValidFormat } from './lib/output-formatter.js';
import { errorMessage, isAppError } from './lib/errors.js';
import { loggers, setLogLevel, startRun } from './lib/logger.js';

export const cli = new Command();

function parseFormat(value: string): string {
  if (!isValidFormat(value)) {
    throw new InvalidArgumentError('可用格式：json | table');
  }
  return value;
}

cli
  .name('ff-standings')
  .description('Export Yahoo Fantasy league standings to JSON and CSV')
  .version('0.1.0');

// 全域選項
cli
  .option('-f, --format <format>', '輸出格式: table (default) | json', parseFormat)
  .option('-q, --quiet', '安靜模式（只輸出錯誤日誌）')
  .option('-v, --verbose', '詳細模式（輸出 debug 日誌）');

cli.hook('preAction', (thisCommand) => {
  const { quiet, verbose } = thisCommand.opts<{ quiet?: boolean; verbose?: boolean }>();
  setLogLevel(verbose ? 'debug' : quiet ? 'error' : 'warn');
  startRun();
});

// 註冊指令；不帶參數執行時即為 export
cli.addCommand(exportCommand, { isDefault: true });
cli.addCommand(leaguesCommand);
cli.addCommand(authCommand);
cli.addCommand(configCommand);

// 所有指令的錯誤都交由 runCli 決定 exit code
function applyExitOverride(command: Command): void {
  command.exitOverride();
  command.commands.forEach(applyExitOverride);
}
applyExitOverride(cli);

/**
 * 錯誤對應的 exit code
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) return error.exitCode;
  if (isAppError(error)) return error.exitCode;
  return 1;
}

/**
 * 執行 CLI 並回傳 exit code
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  try {
    await cli.parseAsync([...argv]);
    return 0;
  } catch (error) {
    // commander 已自行印出用法錯誤與 --help/--version
    if (!(error instanceof CommanderError)) {
      if (!isAppError(error)) {
        loggers.cli.error('未預期的錯誤', error);
      }
      console.error(`錯誤：${errorMessage(error)}`);
    }
    return exitCodeFor(error);
  }
}
