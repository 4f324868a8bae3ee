export const CATEGORIES = ['all_time', 'trending', 'hot'] as const;

/** 榜单视图，决定抓取的来源页面，并标记该次抓取产出的每一行 */
export type Category = (typeof CATEGORIES)[number];

/**
 * 榜单中的一行。
 *
 * 字段名与落盘的 JSON / CSV 列名保持一致。
 */
export interface LeaderboardRow {
  /** 静态抓取无法可靠还原排名，规范化后始终为 null */
  rank: number | null;
  /** 技能 slug，取自链接路径的最后一段 */
  skill_name: string;
  /** 形如 `owner/repo` */
  owner_repo: string | null;
  /** 安装量原文，如 `61.0K`、`12,345` */
  installs: string | null;
  page_url: string;
  category: Category;
}

export const ROW_FIELDS = [
  'rank',
  'skill_name',
  'owner_repo',
  'installs',
  'page_url',
  'category',
] as const satisfies readonly (keyof LeaderboardRow)[];

export interface RunSnapshot {
  /** UTC，格式 `YYYY-MM-DDTHH:mm:ssZ` */
  timestamp: string;
  count: number;
  rows: LeaderboardRow[];
}

export type RejectionReason = 'empty' | 'low-quality';

/** 结构化解析的结果：要么得到可信的行，要么给出需要回退的原因 */
export type StructuralResult =
  | { ok: true; rows: LeaderboardRow[] }
  | { ok: false; reason: RejectionReason; message: string };

export type ExtractionStrategy = 'structural' | 'text-pattern';

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((c) => c === value);
}
