/**
 * Standings Service
 * 單次執行流程：認證 → 聯盟清單 → 選擇聯盟 → 戰績表 → 寫檔
 * 指定 teams 時再逐隊取得名單並寫出 team_players 檔
 */

import type { TokenProvider } from '../types/auth.js';
import type {
  ExportedFiles,
  ExportResult,
  LeagueSummary,
  RosterPlayer,
  StandingsRow,
  TeamRoster,
} from '../types/standings.js';
import { loggers } from '../lib/logger.js';
import { selectLeague } from '../lib/league-selector.js';
import type { StandingsResult } from './api.js';

const logger = loggers.export;

export interface StandingsExportOptions {
  sport: string;
  season?: number;
  /** 指定聯盟，未指定時自動選擇 */
  leagueKey?: string;
  /** 同時匯出各隊名單 */
  teams?: boolean;
}

export interface LeagueSource {
  getLeagues(sport: string, season?: number): Promise<LeagueSummary[]>;
  getStandings(leagueKey: string): Promise<StandingsResult>;
  getRoster(teamKey: string): Promise<TeamRoster>;
}

export interface StandingsSink {
  export(rows: readonly StandingsRow[]): ExportedFiles;
  exportRoster(players: readonly RosterPlayer[]): ExportedFiles;
}

export interface StandingsServiceDeps {
  auth: TokenProvider;
  client: LeagueSource;
  exporter: StandingsSink;
}

export class StandingsService {
  private readonly deps: StandingsServiceDeps;

  constructor(deps: StandingsServiceDeps) {
    this.deps = deps;
  }

  async run(options: StandingsExportOptions): Promise<ExportResult> {
    const { auth, client, exporter } = this.deps;

    // 先完成認證：憑證檔有問題時在任何網路請求之前就失敗
    await logger.trackAsync('認證', () => auth.getToken());

    const leagues = await logger.trackAsync('取得聯盟清單', () => client.getLeagues(options.sport, options.season), {
      sport: options.sport,
      season: options.season,
    });

    const league = selectLeague(leagues, options.leagueKey);
    if (!league) {
      logger.warn('找不到聯盟', { sport: options.sport, season: options.season });
      return { status: 'no-league', sport: options.sport, season: options.season };
    }
    if (leagues.length > 1 && !options.leagueKey) {
      logger.info('帳號有多個聯盟，已自動選擇', {
        leagueKey: league.leagueKey,
        candidates: leagues.map((item) => item.leagueKey),
      });
    }

    const standings = await logger.trackAsync('取得戰績表', () => client.getStandings(league.leagueKey), {
      leagueKey: league.leagueKey,
    });
    if (standings.rows.length === 0) {
      return { status: 'no-standings', league };
    }

    const files = exporter.export(standings.rows);
    if (!options.teams) {
      return { status: 'exported', league, rows: standings.rows, files };
    }

    const players = await logger.trackAsync('取得隊伍名單', () => this.fetchRosters(standings.rows), {
      leagueKey: league.leagueKey,
      teams: standings.rows.length,
    });
    const rosterFiles = exporter.exportRoster(players);
    return { status: 'exported', league, rows: standings.rows, files, roster: { players, files: rosterFiles } };
  }

  /**
   * 依戰績表順序逐隊取得名單，任一隊失敗即中止
   */
  private async fetchRosters(rows: readonly StandingsRow[]): Promise<RosterPlayer[]> {
    const players: RosterPlayer[] = [];
    for (const row of rows) {
      const roster = await this.deps.client.getRoster(row.teamKey);
      players.push(...roster.players);
    }
    return players;
  }
}
