import _ from 'lodash';

// 数字按 Unicode 十进制数字匹配（含全角数字），单词边界同样按 Unicode 字母数字判断
const WORD_START = '(?<![\\p{L}\\p{N}_])';
const WORD_END = '(?![\\p{L}\\p{N}_])';

// 安装量形如 "61.0K"、"12,345" 或纯数字
const INSTALLS_PATTERN = '\\p{Nd}+[.,]?\\p{Nd}*[KkMm]?|\\p{Nd}+';
const INSTALLS_RE = new RegExp(`(${INSTALLS_PATTERN})`, 'u');
const TRAILING_INSTALLS_RE = new RegExp(`(${INSTALLS_PATTERN})$`, 'u');
const RANK_RE = new RegExp(`${WORD_START}(\\p{Nd}{1,3})${WORD_END}`, 'u');
const LEADING_RANK_RE = new RegExp(`^(\\p{Nd}{1,3})${WORD_END}`, 'u');
const OWNER_REPO_RE = /([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)/;
const SMALL_PLAIN_INTEGER_RE = /^\p{Nd}{1,2}$/u;
const MAGNITUDE_SUFFIX_RE = /[KkMm]/;
const PLAIN_INTEGER_RE = /^\s*[+-]?\d+(?:_\d+)*\s*$/;

/** 全角数字等兼容字符折叠为 ASCII 后再做数值解析 */
function toAsciiDigits(text: string): string {
  return text.normalize('NFKC');
}

export interface SkillPath {
  owner: string;
  repo: string;
  skill: string;
}

function hostPattern(origin: string): string {
  return _.escapeRegExp(new URL(origin).host);
}

/**
 * 将链接规范化为绝对地址。
 *
 * 以 `/` 开头的相对路径拼接站点 origin，`http(s)` 绝对地址原样返回，其他形式（锚点、`mailto:` 等）返回 `null`。
 */
export function normalizeHref(href: string, origin: string): string | null {
  const trimmed = href.trim();
  if (trimmed.startsWith('/')) {
    return `${origin.replace(/\/+$/, '')}${trimmed}`;
  }
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return null;
}

/** 仅接受 `<origin>/<owner>/<repo>/<skill>` 形式的技能页地址 */
export function matchSkillPath(url: string, origin: string): SkillPath | null {
  const re = new RegExp(`^https?://${hostPattern(origin)}/([^/]+)/([^/]+)/([^/?#]+)$`);
  const m = url.match(re);
  if (!m) {
    return null;
  }
  const [, owner, repo, skill] = m;
  return { owner, repo, skill };
}

export function extractInstallsToken(text: string): string | null {
  return text.match(INSTALLS_RE)?.[1] ?? null;
}

export function extractTrailingInstalls(text: string): string | null {
  return text.match(TRAILING_INSTALLS_RE)?.[1] ?? null;
}

export function extractRankToken(text: string): number | null {
  const m = text.match(RANK_RE);
  return m ? parseInt(toAsciiDigits(m[1]), 10) : null;
}

export function extractLeadingRank(text: string): number | null {
  const m = text.match(LEADING_RANK_RE);
  return m ? parseInt(toAsciiDigits(m[1]), 10) : null;
}

export function extractOwnerRepo(text: string): string | null {
  const m = text.match(OWNER_REPO_RE);
  return m ? `${m[1]}/${m[2]}` : null;
}

export function skillSlugFromUrl(url: string): string {
  return url.replace(/\/+$/, '').split('/').pop() ?? '';
}

/** `https://host/owner/repo/skill` 按 `/` 切分后，第 3、4 段即 owner 与 repo */
export function ownerRepoFromUrl(url: string): string | null {
  const parts = url.split('/');
  if (parts.length < 6) {
    return null;
  }
  return `${parts[3]}/${parts[4]}`;
}

export function isSmallPlainInteger(installs: string | null): boolean {
  return installs !== null && SMALL_PLAIN_INTEGER_RE.test(installs);
}

/** 带 K/M 量级后缀，或去掉分组符号后为不小于 1000 的整数 */
export function isCredibleInstalls(installs: string | null): boolean {
  if (installs === null) {
    return false;
  }
  if (MAGNITUDE_SUFFIX_RE.test(installs)) {
    return true;
  }
  const digits = toAsciiDigits(installs).replace(/[,.]/g, '');
  if (!PLAIN_INTEGER_RE.test(digits)) {
    return false;
  }
  return parseInt(digits.replace(/_/g, ''), 10) >= 1000;
}
