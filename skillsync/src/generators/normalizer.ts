import type { LeaderboardRow } from '../types/leaderboard';
import { isCredibleInstalls, ownerRepoFromUrl, skillSlugFromUrl } from '../adapters/fields';

export function normalizeRow(row: LeaderboardRow): LeaderboardRow {
  const normalized: LeaderboardRow = {
    ...row,
    // 排名在静态抓取中无法准确获取，统一置空
    rank: null,
    installs: isCredibleInstalls(row.installs) ? row.installs : null,
  };
  if (!normalized.skill_name && normalized.page_url) {
    normalized.skill_name = skillSlugFromUrl(normalized.page_url);
  }
  if (!normalized.owner_repo && normalized.page_url) {
    normalized.owner_repo = ownerRepoFromUrl(normalized.page_url);
  }
  return normalized;
}

/** 对任意来源的行做字段校验与兜底补全，不修改入参 */
export function normalizeRows(rows: LeaderboardRow[]): LeaderboardRow[] {
  return rows.map(normalizeRow);
}
