/**
 * 聯盟摘要
 */
export interface LeagueSummary {
  /** 例如 449.l.12345 */
  leagueKey: string;
  leagueId: string;
  name: string;
  season: number;
  numTeams: number | null;
  gameCode: string;
}

/**
 * 戰績表單列
 */
export interface StandingsRow {
  rank: number | null;
  team: string;
  wins: number;
  losses: number;
  ties: number;
  winPct: number;
  pointsFor: number;
  pointsAgainst: number;
  /** 連勝/連敗，例如 W3、L1 */
  streak: string;
  playoffSeed: number | null;
  teamKey: string;
  manager: string | null;
}

/**
 * 隊伍名單中的球員
 */
export interface RosterPlayer {
  teamKey: string;
  team: string | null;
  playerKey: string;
  name: string;
  /** 可守位置，例如 WR、QB */
  position: string | null;
  /** 目前排入的位置（BN 為板凳） */
  selectedPosition: string | null;
  /** 傷病狀態，例如 Q、IR */
  status: string | null;
}

export interface TeamRoster {
  teamKey: string;
  teamName: string | null;
  players: RosterPlayer[];
}

export interface ExportedFiles {
  json: string;
  csv: string;
}

/**
 * 匯出流程結果
 */
export type ExportResult =
  | { status: 'no-league'; sport: string; season?: number }
  | { status: 'no-standings'; league: LeagueSummary }
  | {
      status: 'exported';
      league: LeagueSummary;
      rows: StandingsRow[];
      files: ExportedFiles;
      /** 有指定 --teams 時才有 */
      roster?: { players: RosterPlayer[]; files: ExportedFiles };
    };
