import _ from 'lodash';
import type { Category, LeaderboardRow } from '../types/leaderboard';
import {
  extractLeadingRank,
  extractOwnerRepo,
  extractTrailingInstalls,
  skillSlugFromUrl,
} from './fields';
import { dedupeByPageUrl } from './structural';

export function bracketLinkPattern(origin: string): RegExp {
  const host = _.escapeRegExp(new URL(origin).host);
  return new RegExp(`\\[(.*?)\\]\\((https?://${host}/[^)]+)\\)`, 'g');
}

/**
 * 解析方括号内的文本，形如 `1 ### name owner/repo 61.0K` 或 `name owner/repo 61.0K`。
 */
export function parseBracketLabel(
  label: string,
  url: string,
  category: Category,
): LeaderboardRow {
  return {
    rank: extractLeadingRank(label),
    skill_name: skillSlugFromUrl(url),
    owner_repo: extractOwnerRepo(label),
    installs: extractTrailingInstalls(label),
    page_url: url,
    category,
  };
}

/**
 * 回退解析：针对抓取工具产出的页面文本，识别 Markdown 链接形式的榜单项，如
 * `[1 ### vercel-react-best-practices vercel-labs/agent-skills 61.0K](https://skills.sh/vercel-labs/agent-skills/vercel-react-best-practices)`。
 *
 * 结果不做质量校验，可能为空。
 */
export function extractTextPattern(
  text: string,
  category: Category,
  origin: string,
): LeaderboardRow[] {
  const rows: LeaderboardRow[] = [];
  for (const m of text.matchAll(bracketLinkPattern(origin))) {
    rows.push(parseBracketLabel(m[1], m[2], category));
  }
  return dedupeByPageUrl(rows);
}
