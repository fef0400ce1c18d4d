/**
 * Standings Exporter
 * 將戰績表寫成 standings.json 與 standings.csv，隊伍名單寫成 team_players.json 與 team_players.csv
 */

import fs from 'node:fs';
import path from 'node:path';
import type { ExportedFiles, RosterPlayer, StandingsRow } from '../types/standings.js';
import { formatCSV, formatJSON, type ColumnDef } from '../utils/output.js';
import { loggers } from '../lib/logger.js';

export const STANDINGS_JSON_FILE = 'standings.json';
export const STANDINGS_CSV_FILE = 'standings.csv';
export const ROSTER_JSON_FILE = 'team_players.json';
export const ROSTER_CSV_FILE = 'team_players.csv';

/**
 * CSV 欄位（順序固定）
 */
export const STANDINGS_COLUMNS: readonly ColumnDef<StandingsRow>[] = [
  { key: 'rank', label: 'Rank' },
  { key: 'team', label: 'Team' },
  { key: 'wins', label: 'W' },
  { key: 'losses', label: 'L' },
  { key: 'ties', label: 'T' },
  { key: 'winPct', label: 'WinPct' },
  { key: 'pointsFor', label: 'PF' },
  { key: 'pointsAgainst', label: 'PA' },
  { key: 'streak', label: 'Streak' },
  { key: 'playoffSeed', label: 'PlayoffSeed' },
  { key: 'teamKey', label: 'TeamKey' },
  { key: 'manager', label: 'Manager' },
];

export const ROSTER_COLUMNS: readonly ColumnDef<RosterPlayer>[] = [
  { key: 'teamKey', label: 'TeamKey' },
  { key: 'team', label: 'Team' },
  { key: 'playerKey', label: 'PlayerKey' },
  { key: 'name', label: 'Name' },
  { key: 'position', label: 'Position' },
  { key: 'selectedPosition', label: 'SelectedPosition' },
  { key: 'status', label: 'Status' },
];

export function toStandingsJson(rows: readonly StandingsRow[]): string {
  return formatJSON(rows) + '\n';
}

export function toStandingsCsv(rows: readonly StandingsRow[]): string {
  return formatCSV(rows, STANDINGS_COLUMNS) + '\n';
}

export function toRosterJson(players: readonly RosterPlayer[]): string {
  return formatJSON(players) + '\n';
}

export function toRosterCsv(players: readonly RosterPlayer[]): string {
  return formatCSV(players, ROSTER_COLUMNS) + '\n';
}

export class StandingsExporter {
  private readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = path.resolve(outputDir);
  }

  getOutputDir(): string {
    return this.outputDir;
  }

  /**
   * 寫出兩種格式，任一寫入失敗即拋出錯誤
   */
  export(rows: readonly StandingsRow[]): ExportedFiles {
    const files = this.write(STANDINGS_JSON_FILE, toStandingsJson(rows), STANDINGS_CSV_FILE, toStandingsCsv(rows));
    loggers.export.info('已寫出戰績表', { rows: rows.length, ...files });
    return files;
  }

  exportRoster(players: readonly RosterPlayer[]): ExportedFiles {
    const files = this.write(ROSTER_JSON_FILE, toRosterJson(players), ROSTER_CSV_FILE, toRosterCsv(players));
    loggers.export.info('已寫出隊伍名單', { players: players.length, ...files });
    return files;
  }

  private write(jsonName: string, json: string, csvName: string, csv: string): ExportedFiles {
    fs.mkdirSync(this.outputDir, { recursive: true });

    const files: ExportedFiles = {
      json: path.join(this.outputDir, jsonName),
      csv: path.join(this.outputDir, csvName),
    };
    fs.writeFileSync(files.json, json, 'utf-8');
    fs.writeFileSync(files.csv, csv, 'utf-8');
    return files;
  }
}
