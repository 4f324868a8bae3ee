import * as cheerio from 'cheerio';
import _ from 'lodash';
import type { Category, LeaderboardRow, StructuralResult } from '../types/leaderboard';
import { collectStrings, visibleText } from './dom-text';
import { isSmallPlainInteger } from './fields';
import { classifyLink, type LinkNode } from './link-classifier';

/** 小整数安装量占比超过该值时，认为结构化解析抓到的是渲染噪声 */
export const SMALL_INSTALLS_RATIO_LIMIT = 0.5;

// 关闭脚本模式，<noscript> 内的榜单按普通元素解析
export function loadPage(html: string): cheerio.CheerioAPI {
  return cheerio.load(html, { scriptingEnabled: false });
}

export function collectLinks($: cheerio.CheerioAPI): LinkNode[] {
  return $('a[href]')
    .toArray()
    .map((a) => ({
      href: $(a).attr('href') ?? '',
      text: visibleText(a),
      containerText: a.parent ? visibleText(a.parent) : visibleText(a),
    }));
}

/** 按 page_url 去重，后出现的覆盖先出现的，顺序以首次出现为准 */
export function dedupeByPageUrl(rows: LeaderboardRow[]): LeaderboardRow[] {
  return Object.values(_.keyBy(rows, 'page_url'));
}

export function assessQuality(rows: LeaderboardRow[]): StructuralResult {
  if (rows.length === 0) {
    return {
      ok: false,
      reason: 'empty',
      message: 'No skill entries found in HTML, falling back to text parsing',
    };
  }
  const smallInstalls = rows.filter((r) => isSmallPlainInteger(r.installs)).length;
  if (smallInstalls / rows.length > SMALL_INSTALLS_RATIO_LIMIT) {
    return {
      ok: false,
      reason: 'low-quality',
      message: `Poor HTML extraction quality (${smallInstalls}/${rows.length} installs are small integers), falling back to text parsing`,
    };
  }
  return { ok: true, rows };
}

/**
 * 基于 HTML 结构解析榜单。
 *
 * 遍历所有链接并筛选 `/<owner>/<repo>/<skill>` 形式的技能页；结果为空或质量差时返回拒绝原因，由调用方回退到文本解析。
 */
export function extractStructural(
  html: string | cheerio.CheerioAPI,
  category: Category,
  origin: string,
): StructuralResult {
  const $ = typeof html === 'string' ? loadPage(html) : html;
  const candidates: LeaderboardRow[] = [];
  for (const link of collectLinks($)) {
    const row = classifyLink(link, category, origin);
    if (row) {
      candidates.push(row);
    }
  }
  return assessQuality(dedupeByPageUrl(candidates));
}

/** 提取页面纯文本，文本节点之间以换行分隔 */
export function flattenText(html: string): string {
  const $ = loadPage(html);
  return collectStrings($.root()[0], false).join('\n');
}
