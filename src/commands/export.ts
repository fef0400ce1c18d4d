/**
 * Export Command
 * 戰績表匯出指令（預設指令）
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { getConfigService } from '../services/config.js';
import { createStandingsService } from '../lib/api-client.js';
import { outputData } from '../lib/output-formatter.js';
import { formatDuration } from '../lib/logger.js';
import type { ExportResult, StandingsRow } from '../types/standings.js';

type ExportCommandOptions = {
  credentials?: string;
  outDir?: string;
  league?: string;
  season?: string;
  sport?: string;
  teams?: boolean;
  format?: string;
};

export const exportCommand = new Command('export')
  .description('匯出聯盟戰績表為 standings.json 與 standings.csv')
  .option('-c, --credentials <path>', 'OAuth 憑證檔路徑（預設 ./oauth2.json）')
  .option('-o, --out-dir <dir>', '輸出目錄（預設 ./Data）')
  .option('-l, --league <leagueKey>', '指定聯盟，例如 449.l.12345')
  .option('-s, --season <year>', '賽季年份（預設目前賽季）')
  .option('--sport <code>', '遊戲代碼：nfl | nba | mlb | nhl')
  .option('--teams', '同時匯出各隊名單（team_players.json / team_players.csv）')
  .action(async (_options: ExportCommandOptions, cmd: Command) => {
    const opts = cmd.optsWithGlobals<ExportCommandOptions>();
    const config = getConfigService();
    const format = config.getFormat(opts.format);
    const sport = config.getSport(opts.sport);
    const season = config.getSeason(opts.season);

    const service = createStandingsService({
      credentialsFile: config.getCredentialsFile(opts.credentials),
      outputDir: config.getOutputDir(opts.outDir),
    });

    const startTime = Date.now();
    const result = await service.run({
      sport,
      season,
      leagueKey: config.getLeagueKey(opts.league),
      teams: opts.teams === true,
    });

    outputData(result, format, () => printExportResult(result, Date.now() - startTime));
  });

/**
 * 戰績表（cli-table3）
 */
export function renderStandingsTable(rows: readonly StandingsRow[]): string {
  const table = new Table({
    head: ['Rank', 'Team', 'W', 'L', 'T', 'WinPct', 'PF', 'PA', 'Streak'],
    style: { head: ['cyan'] },
    colAligns: ['right', 'left', 'right', 'right', 'right', 'right', 'right', 'right', 'left'],
  });

  for (const row of rows) {
    table.push([
      row.rank ?? '-',
      row.team,
      row.wins,
      row.losses,
      row.ties,
      row.winPct.toFixed(3),
      row.pointsFor.toFixed(2),
      row.pointsAgainst.toFixed(2),
      row.streak,
    ]);
  }

  return table.toString();
}

/**
 * 輸出表格格式
 */
function printExportResult(result: ExportResult, elapsedMs: number): void {
  switch (result.status) {
    case 'no-league': {
      const season = result.season === undefined ? '目前賽季' : `${result.season} 賽季`;
      console.log(`找不到聯盟：此帳號在${season}沒有 ${result.sport.toUpperCase()} 聯盟`);
      return;
    }
    case 'no-standings':
      console.log(`使用聯盟：${result.league.name} (${result.league.leagueKey})`);
      console.log('尚無戰績資料（賽季可能尚未開始），未寫出任何檔案');
      return;
    case 'exported':
      console.log(`使用聯盟：${result.league.name} (${result.league.leagueKey})\n`);
      console.log(renderStandingsTable(result.rows));
      console.log(`\n共 ${result.rows.length} 隊，耗時 ${formatDuration(elapsedMs)}`);
      console.log(`已儲存：${result.files.json}`);
      console.log(`已儲存：${result.files.csv}`);
      if (result.roster) {
        console.log(`\n名單共 ${result.roster.players.length} 名球員`);
        console.log(`已儲存：${result.roster.files.json}`);
        console.log(`已儲存：${result.roster.files.csv}`);
      }
      return;
  }
}
