/**
 * Yahoo Fantasy API 回應解析
 *
 * Yahoo 的 JSON 有兩個特殊慣例：
 *   - 集合是以數字為鍵的物件並附 count：{ "0": {...}, "1": {...}, "count": 2 }
 *   - 實體被拆成單鍵片段的陣列：[{ "team_key": "..." }, { "name": "..." }, []]
 * 數值欄位可能是 number 或字串（".769"、"1234.56"、""）。
 */

import type { LeagueSummary, RosterPlayer, StandingsRow, TeamRoster } from '../types/standings.js';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 取出集合中的項目（支援陣列與 count 物件）
 */
export function collectionItems(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (!isRecord(value)) return [];

  const count = toNumber(value.count);
  const keys =
    count !== null
      ? Array.from({ length: count }, (_, i) => String(i))
      : Object.keys(value).filter((key) => /^\d+$/.test(key)).sort((a, b) => Number(a) - Number(b));

  return keys.map((key) => value[key]).filter((item) => item !== undefined);
}

/**
 * 合併片段陣列為單一物件（巢狀陣列會遞迴展開）
 */
export function mergeFragments(value: unknown): JsonRecord {
  if (isRecord(value)) return value;
  if (!Array.isArray(value)) return {};

  const merged: JsonRecord = {};
  for (const fragment of value) {
    Object.assign(merged, mergeFragments(fragment));
  }
  return merged;
}

/**
 * 依路徑取值，數字片段視為集合索引
 */
export function dig(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const segment of path) {
    if (typeof segment === 'number') {
      current = Array.isArray(current) ? current[segment] : isRecord(current) ? current[String(segment)] : undefined;
    } else {
      current = isRecord(current) ? current[segment] : undefined;
    }
    if (current === undefined) return undefined;
  }
  return current;
}

export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toInteger(value: unknown): number | null {
  const parsed = toNumber(value);
  return parsed === null ? null : Math.trunc(parsed);
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * 解析 users;use_login=1/games/leagues 回應
 */
export function parseLeagues(body: unknown): LeagueSummary[] {
  const leagues: LeagueSummary[] = [];

  for (const userEntry of collectionItems(dig(body, 'fantasy_content', 'users'))) {
    const user = dig(userEntry, 'user');
    const userParts = Array.isArray(user) ? user : [];
    const games = mergeFragments(userParts.slice(1)).games;

    for (const gameEntry of collectionItems(games)) {
      const game = dig(gameEntry, 'game');
      const gameParts = Array.isArray(game) ? game : [game];
      const gameMeta = mergeFragments(gameParts[0]);
      const gameCode = toText(gameMeta.code) ?? '';
      const gameLeagues = mergeFragments(gameParts.slice(1)).leagues;

      for (const leagueEntry of collectionItems(gameLeagues)) {
        const meta = mergeFragments(dig(leagueEntry, 'league'));
        const leagueKey = toText(meta.league_key);
        if (!leagueKey) continue;

        leagues.push({
          leagueKey,
          leagueId: toText(meta.league_id) ?? leagueKey.split('.l.')[1] ?? '',
          name: toText(meta.name) ?? leagueKey,
          season: toInteger(meta.season) ?? toInteger(gameMeta.season) ?? 0,
          numTeams: toInteger(meta.num_teams),
          gameCode: toText(meta.game_code) ?? gameCode,
        });
      }
    }
  }

  return leagues;
}

/**
 * 連勝/連敗轉為精簡字串：{ type: 'win', value: '3' } → W3
 */
export function formatStreak(streak: unknown): string {
  const fields = mergeFragments(streak);
  const type = toText(fields.type)?.toLowerCase() ?? '';
  const length = toInteger(fields.value);

  const letter = type === 'win' ? 'W' : type === 'loss' ? 'L' : type === 'tie' ? 'T' : type;
  if (!letter) return '';
  return length === null ? letter : `${letter}${length}`;
}

/**
 * 勝率：優先使用 Yahoo 回傳值，否則以 (勝 + 和/2) / 場數 計算
 */
export function computeWinPct(wins: number, losses: number, ties: number, reported: unknown): number {
  const pct = toNumber(reported);
  if (pct !== null) return pct;

  const games = wins + losses + ties;
  if (games === 0) return 0;
  return Math.round(((wins + ties / 2) / games) * 1000) / 1000;
}

function managerName(managers: unknown): string | null {
  for (const entry of collectionItems(managers)) {
    const manager = mergeFragments(dig(entry, 'manager'));
    const nickname = toText(manager.nickname);
    if (nickname) return nickname;
  }
  return null;
}

/**
 * 解析單一隊伍的 team 片段陣列
 */
export function parseStandingsTeam(team: unknown): StandingsRow | null {
  const fields = mergeFragments(team);
  const teamKey = toText(fields.team_key);
  if (!teamKey) return null;

  const standings = mergeFragments(fields.team_standings);
  const totals = mergeFragments(standings.outcome_totals);
  const wins = toInteger(totals.wins) ?? 0;
  const losses = toInteger(totals.losses) ?? 0;
  const ties = toInteger(totals.ties) ?? 0;
  const teamPoints = mergeFragments(fields.team_points);

  return {
    rank: toInteger(standings.rank),
    team: toText(fields.name) ?? teamKey,
    wins,
    losses,
    ties,
    winPct: computeWinPct(wins, losses, ties, totals.percentage),
    pointsFor: toNumber(standings.points_for) ?? toNumber(teamPoints.total) ?? 0,
    pointsAgainst: toNumber(standings.points_against) ?? 0,
    streak: formatStreak(standings.streak),
    playoffSeed: toInteger(standings.playoff_seed),
    teamKey,
    manager: managerName(fields.managers),
  };
}

/**
 * 排序：rank 由小到大（無 rank 排最後）；若全部沒有 rank，依勝率、勝場由高到低
 */
export function sortStandings(rows: StandingsRow[]): StandingsRow[] {
  const ranked = rows.some((row) => row.rank !== null);

  return [...rows].sort((a, b) => {
    if (ranked) {
      if (a.rank === null) return b.rank === null ? 0 : 1;
      if (b.rank === null) return -1;
      return a.rank - b.rank;
    }
    return b.winPct - a.winPct || b.wins - a.wins;
  });
}

/**
 * 解析 league/{key}/standings 回應
 */
export function parseStandings(body: unknown): { league: JsonRecord; rows: StandingsRow[] } {
  const league = dig(body, 'fantasy_content', 'league');
  const leagueParts = Array.isArray(league) ? league : [league];
  const meta = mergeFragments(leagueParts[0]);
  const standings = mergeFragments(leagueParts.slice(1)).standings;

  const rows: StandingsRow[] = [];
  for (const standingsEntry of collectionItems(standings)) {
    for (const teamEntry of collectionItems(dig(standingsEntry, 'teams'))) {
      const row = parseStandingsTeam(dig(teamEntry, 'team'));
      if (row) rows.push(row);
    }
  }

  return { league: meta, rows: sortStandings(rows) };
}

/**
 * 解析 team/{key}/roster 回應
 * @param fallbackTeamKey 回應未帶 team_key 時使用
 */
export function parseRoster(body: unknown, fallbackTeamKey = ''): TeamRoster {
  const team = dig(body, 'fantasy_content', 'team');
  const teamParts = Array.isArray(team) ? team : [team];
  const meta = mergeFragments(teamParts[0]);
  const teamKey = toText(meta.team_key) ?? fallbackTeamKey;
  const teamName = toText(meta.name);
  const roster = mergeFragments(teamParts.slice(1)).roster;

  const players: RosterPlayer[] = [];
  for (const rosterEntry of collectionItems(roster)) {
    for (const playerEntry of collectionItems(dig(rosterEntry, 'players'))) {
      const player = parseRosterPlayer(dig(playerEntry, 'player'), teamKey, teamName);
      if (player) players.push(player);
    }
  }

  return { teamKey, teamName, players };
}

/**
 * 解析單一球員：[ [基本資料片段...], { selected_position: [...] } ]
 */
export function parseRosterPlayer(player: unknown, teamKey: string, teamName: string | null): RosterPlayer | null {
  const parts = Array.isArray(player) ? player : [player];
  const info = mergeFragments(parts[0]);
  const playerKey = toText(info.player_key);
  if (!playerKey) return null;

  const selected = mergeFragments(mergeFragments(parts.slice(1)).selected_position);

  return {
    teamKey,
    team: teamName,
    playerKey,
    name: toText(dig(info, 'name', 'full')) ?? playerKey,
    position: toText(info.display_position),
    selectedPosition: toText(selected.position),
    status: toText(info.status),
  };
}

/**
 * 回應是否帶有 fantasy_content 及指定的資源（users、league、team）
 */
export function hasFantasyResource(body: unknown, resource: string): boolean {
  if (!isRecord(body) || !isRecord(body.fantasy_content)) return false;
  const value = body.fantasy_content[resource];
  return isRecord(value) || Array.isArray(value);
}
