/**
 * Yahoo Fantasy API Client
 * 處理聯盟清單與戰績表請求
 */

import { ofetch, FetchError } from 'ofetch';
import type { TokenProvider } from '../types/auth.js';
import type { LeagueSummary, StandingsRow, TeamRoster } from '../types/standings.js';
import { ApiFetchError, errorMessage } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { hasFantasyResource, parseLeagues, parseRoster, parseStandings } from '../lib/yahoo-response.js';

export const API_BASE = 'https://fantasysports.yahooapis.com/fantasy/v2';

const logger = loggers.api;

export interface StandingsResult {
  leagueKey: string;
  leagueName: string | null;
  rows: StandingsRow[];
}

export class YahooFantasyClient {
  private readonly auth: TokenProvider;

  constructor(auth: TokenProvider) {
    this.auth = auth;
  }

  /**
   * 取得登入使用者在指定遊戲/賽季的聯盟
   * @param sport 遊戲代碼，例如 nfl
   * @param season 賽季年份，未指定時為目前賽季
   */
  async getLeagues(sport: string, season?: number): Promise<LeagueSummary[]> {
    const games = season === undefined
      ? `games;game_codes=${encodeURIComponent(sport)}`
      : `games;game_codes=${encodeURIComponent(sport)};seasons=${season}`;
    const body = await this.request(`/users;use_login=1/${games}/leagues`, 'users');
    const leagues = parseLeagues(body);

    logger.debug('取得聯盟清單', { sport, season, count: leagues.length });
    return leagues;
  }

  /**
   * 取得聯盟戰績表（已依名次排序）
   */
  async getStandings(leagueKey: string): Promise<StandingsResult> {
    const body = await this.request(`/league/${encodeURIComponent(leagueKey)}/standings`, 'league');
    const { league, rows } = parseStandings(body);

    logger.debug('取得戰績表', { leagueKey, count: rows.length });
    return {
      leagueKey,
      leagueName: typeof league.name === 'string' ? league.name : null,
      rows,
    };
  }

  /**
   * 取得隊伍名單
   */
  async getRoster(teamKey: string): Promise<TeamRoster> {
    const body = await this.request(`/team/${encodeURIComponent(teamKey)}/roster`, 'team');
    const roster = parseRoster(body, teamKey);

    logger.debug('取得隊伍名單', { teamKey, count: roster.players.length });
    return roster;
  }

  /**
   * 發送 API 請求
   * @param resource fantasy_content 底下必須存在的資源
   * @throws ApiFetchError 網路錯誤、非 2xx 回應或無法辨識的回應內容
   */
  private async request(path: string, resource: 'users' | 'league' | 'team'): Promise<unknown> {
    const url = `${API_BASE}${path}`;
    const token = await this.auth.getToken();
    const startTime = Date.now();

    let body: unknown;
    try {
      body = await ofetch<unknown>(url, {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/json',
        },
        query: { format: 'json' },
      });
    } catch (error) {
      const status = error instanceof FetchError ? error.statusCode ?? null : null;
      logger.error('API 請求失敗', error, { url, status: status ?? undefined, duration: Date.now() - startTime });
      throw new ApiFetchError(
        status ? `API 請求失敗（HTTP ${status}）：${url}` : `API 請求失敗：${url}（${errorMessage(error)}）`,
        url,
        status,
        { cause: error }
      );
    }

    logger.debug('API 請求完成', { url, duration: Date.now() - startTime });

    if (!hasFantasyResource(body, resource)) {
      throw new ApiFetchError(`API 回應格式無法辨識：${url}`, url);
    }
    return body;
  }
}
