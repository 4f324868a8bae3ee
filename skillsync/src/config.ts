import path from 'path';
import { CATEGORIES, isCategory, type Category } from './types/leaderboard';

export interface SyncConfig {
  /** 各榜单视图对应的页面地址 */
  sourceUrls: Record<Category, string>;
  outputDir: string;
  userAgent: string;
  /** 单次请求超时（毫秒） */
  timeout: number;
  /** 技能页所在站点，用于拼接相对链接与匹配技能页地址 */
  siteOrigin: string;
  /** 本次同步的榜单，按固定顺序执行 */
  categories: Category[];
}

export type SyncConfigOverrides = Partial<Omit<SyncConfig, 'sourceUrls'>> & {
  sourceUrls?: Partial<Record<Category, string>>;
};

export const DEFAULT_CONFIG: Readonly<SyncConfig> = {
  sourceUrls: {
    all_time: 'https://skills.sh/',
    trending: 'https://skills.sh/trending',
    hot: 'https://skills.sh/hot',
  },
  outputDir: 'skills_sh',
  userAgent:
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0 Safari/537.36',
  timeout: 20000,
  siteOrigin: 'https://skills.sh',
  categories: [...CATEGORIES],
};

function assertHttpUrl(value: string, name: string) {
  let url: URL;
  try {
    url = new URL(value);
  } catch (e) {
    throw new Error(`Invalid config: ${name} must be an absolute URL, got "${value}"`, {
      cause: e,
    });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid config: ${name} must use http or https, got "${value}"`);
  }
}

export function resolveConfig(overrides: SyncConfigOverrides = {}): SyncConfig {
  const config: SyncConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    sourceUrls: { ...DEFAULT_CONFIG.sourceUrls, ...overrides.sourceUrls },
    categories: overrides.categories ?? [...DEFAULT_CONFIG.categories],
  };

  if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
    throw new Error(`Invalid config: timeout must be a positive number, got ${config.timeout}`);
  }
  if (!config.userAgent.trim()) {
    throw new Error('Invalid config: userAgent must not be empty');
  }
  if (!config.outputDir.trim()) {
    throw new Error('Invalid config: outputDir must not be empty');
  }
  for (const category of config.categories) {
    if (!isCategory(category)) {
      throw new Error(`Invalid config: unknown category "${category}"`);
    }
  }
  assertHttpUrl(config.siteOrigin, 'siteOrigin');
  for (const category of CATEGORIES) {
    assertHttpUrl(config.sourceUrls[category], `sourceUrls.${category}`);
  }

  // 保持 all_time、trending、hot 的固定顺序
  config.categories = CATEGORIES.filter((c) => config.categories.includes(c));
  config.outputDir = path.resolve(config.outputDir);
  return config;
}
