import fs from 'fs-extra';
import type { SyncConfig } from '../config';
import { extractStructural, flattenText } from '../adapters/structural';
import { extractTextPattern } from '../adapters/text-pattern';
import { normalizeRows } from '../generators/normalizer';
import { saveSnapshot, type SavedSnapshot } from '../generators/snapshot';
import type { Category, ExtractionStrategy, LeaderboardRow } from '../types/leaderboard';
import { log } from '../utils/log';
import { createPageFetcher, type PageFetcher } from './fetcher';

export interface SyncDeps {
  fetchPage: PageFetcher;
  now?: () => Date;
}

export interface ExtractedPage {
  strategy: ExtractionStrategy;
  rows: LeaderboardRow[];
}

export interface CategoryResult extends SavedSnapshot {
  category: Category;
  strategy: ExtractionStrategy;
}

export interface CategoryFailure {
  category: Category;
  error: unknown;
}

export interface SyncReport {
  results: CategoryResult[];
  failures: CategoryFailure[];
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function toFallbackText(html: string): string {
  try {
    return flattenText(html);
  } catch (e) {
    log.warn(`Failed to flatten page text, using raw markup: ${errorMessage(e)}`);
    return html;
  }
}

/**
 * 解析一个页面并完成规范化。
 *
 * 优先用 HTML 结构解析；结果为空、质量差或解析抛错时回退到文本解析，回退结果不再做质量校验。
 */
export function extractPage(html: string, category: Category, origin: string): ExtractedPage {
  let reason: string;
  try {
    const result = extractStructural(html, category, origin);
    if (result.ok) {
      return { strategy: 'structural', rows: normalizeRows(result.rows) };
    }
    reason = result.message;
  } catch (e) {
    reason = `HTML parsing failed: ${errorMessage(e)}`;
  }
  log.info(`${reason}; trying text fallback parsing...`);
  const rows = extractTextPattern(toFallbackText(html), category, origin);
  return { strategy: 'text-pattern', rows: normalizeRows(rows) };
}

export async function syncCategory(
  category: Category,
  config: SyncConfig,
  deps: SyncDeps,
): Promise<CategoryResult> {
  const url = config.sourceUrls[category];
  log.info(`Syncing ${category} from ${url}`);
  const html = await deps.fetchPage(url);
  const { strategy, rows } = extractPage(html, category, config.siteOrigin);
  const saved = await saveSnapshot(config.outputDir, category, rows, deps.now?.());
  log.info(`Saved ${saved.count} rows -> ${saved.jsonPath} , ${saved.csvPath}`);
  return { category, strategy, ...saved };
}

/** 任一榜单失败时以非零状态退出 */
export function exitCodeFor(report: SyncReport): number {
  return report.failures.length > 0 ? 1 : 0;
}

/** 依次同步各榜单，单个榜单失败只记录日志，不影响其余榜单 */
export async function runSync(
  config: SyncConfig,
  deps: SyncDeps = { fetchPage: createPageFetcher(config) },
): Promise<SyncReport> {
  const report: SyncReport = { results: [], failures: [] };
  await fs.ensureDir(config.outputDir);
  for (const category of config.categories) {
    try {
      report.results.push(await syncCategory(category, config, deps));
    } catch (e) {
      log.error(`[ERROR] Failed to sync ${category}: ${errorMessage(e)}`);
      report.failures.push({ category, error: e });
    }
  }
  log.info('Done.');
  return report;
}
