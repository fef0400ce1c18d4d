/**
 * Leagues Command
 * 列出帳號的聯盟（確認自動選擇會選到哪個聯盟）
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { getConfigService } from '../services/config.js';
import { getApiClient } from '../lib/api-client.js';
import { selectLeague } from '../lib/league-selector.js';
import { outputData } from '../lib/output-formatter.js';
import type { LeagueSummary } from '../types/standings.js';

type LeaguesCommandOptions = {
  credentials?: string;
  season?: string;
  sport?: string;
  format?: string;
};

export const leaguesCommand = new Command('leagues')
  .description('列出登入帳號的聯盟')
  .option('-c, --credentials <path>', 'OAuth 憑證檔路徑（預設 ./oauth2.json）')
  .option('-s, --season <year>', '賽季年份（預設目前賽季）')
  .option('--sport <code>', '遊戲代碼：nfl | nba | mlb | nhl')
  .action(async (_options: LeaguesCommandOptions, cmd: Command) => {
    const opts = cmd.optsWithGlobals<LeaguesCommandOptions>();
    const config = getConfigService();
    const sport = config.getSport(opts.sport);
    const season = config.getSeason(opts.season);

    const { client } = getApiClient({ credentialsFile: config.getCredentialsFile(opts.credentials) });
    const leagues = await client.getLeagues(sport, season);
    const selected = selectLeague(leagues);

    outputData(
      { sport, season: season ?? null, selected: selected?.leagueKey ?? null, leagues },
      config.getFormat(opts.format),
      () => {
        if (leagues.length === 0) {
          console.log(`找不到聯盟：此帳號沒有 ${sport.toUpperCase()} 聯盟`);
          return;
        }
        console.log(renderLeaguesTable(leagues, selected?.leagueKey));
        console.log(`\n共 ${leagues.length} 個聯盟（* 為預設選擇）`);
      }
    );
  });

export function renderLeaguesTable(leagues: readonly LeagueSummary[], selectedKey?: string): string {
  const table = new Table({
    head: ['', 'League Key', 'Name', 'Season', 'Teams'],
    style: { head: ['cyan'] },
  });

  for (const league of leagues) {
    table.push([
      league.leagueKey === selectedKey ? '*' : '',
      league.leagueKey,
      league.name,
      league.season,
      league.numTeams ?? '-',
    ]);
  }

  return table.toString();
}
