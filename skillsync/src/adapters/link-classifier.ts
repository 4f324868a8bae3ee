import type { Category, LeaderboardRow } from '../types/leaderboard';
import {
  extractInstallsToken,
  extractRankToken,
  matchSkillPath,
  normalizeHref,
} from './fields';

export interface LinkNode {
  href: string;
  /** 链接自身的可见文本 */
  text: string;
  /** 链接所在父节点的可见文本，序号通常在链接之外 */
  containerText: string;
}

export function classifyLink(
  link: LinkNode,
  category: Category,
  origin: string,
): LeaderboardRow | null {
  const pageUrl = normalizeHref(link.href, origin);
  if (!pageUrl) {
    return null;
  }
  const path = matchSkillPath(pageUrl, origin);
  if (!path) {
    return null;
  }
  return {
    rank: extractRankToken(link.containerText),
    // 名称统一使用 slug，避免误抓数字等噪声
    skill_name: path.skill,
    owner_repo: `${path.owner}/${path.repo}`,
    installs: extractInstallsToken(link.text),
    page_url: pageUrl,
    category,
  };
}
