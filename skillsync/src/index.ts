export * from './types/leaderboard';
export * from './config';
export * from './adapters/fields';
export { classifyLink, type LinkNode } from './adapters/link-classifier';
export {
  assessQuality,
  dedupeByPageUrl,
  extractStructural,
  flattenText,
  SMALL_INSTALLS_RATIO_LIMIT,
} from './adapters/structural';
export { extractTextPattern, parseBracketLabel } from './adapters/text-pattern';
export { normalizeRow, normalizeRows } from './generators/normalizer';
export { buildSnapshot, formatTimestamp, saveSnapshot, toCsv } from './generators/snapshot';
export type { SavedSnapshot } from './generators/snapshot';
export { createPageFetcher, type PageFetcher } from './sync/fetcher';
export { exitCodeFor, extractPage, runSync, syncCategory } from './sync/orchestrator';
export type { CategoryFailure, CategoryResult, ExtractedPage, SyncDeps, SyncReport } from './sync/orchestrator';
export { log } from './utils/log';
