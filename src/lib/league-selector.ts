/**
 * League Selector
 * 從使用者的聯盟清單中選出要匯出的聯盟
 */

import type { LeagueSummary } from '../types/standings.js';
import { ConfigurationError } from './errors.js';

/**
 * 選擇聯盟
 * - 清單為空：回傳 null（即使有指定 leagueKey）
 * - 有指定 leagueKey：必須在清單中，否則為設定錯誤
 * - 未指定：取賽季最新者，同賽季取 API 回傳順序的第一個
 */
export function selectLeague(leagues: LeagueSummary[], preferredKey?: string): LeagueSummary | null {
  if (leagues.length === 0) {
    return null;
  }

  if (preferredKey) {
    const match = leagues.find((league) => league.leagueKey === preferredKey);
    if (!match) {
      const available = leagues.map((league) => league.leagueKey).join(', ');
      throw new ConfigurationError(`指定的聯盟 ${preferredKey} 不在此帳號的聯盟清單中（可用：${available}）`);
    }
    return match;
  }

  let selected: LeagueSummary | null = null;
  for (const league of leagues) {
    if (!selected || league.season > selected.season) {
      selected = league;
    }
  }
  return selected;
}
