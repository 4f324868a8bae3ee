import path from 'path';
import fs from 'fs-extra';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import * as XLSX from 'xlsx';
import { ROW_FIELDS, type Category, type LeaderboardRow, type RunSnapshot } from '../types/leaderboard';

dayjs.extend(utc);

export const TIMESTAMP_FORMAT = 'YYYY-MM-DDTHH:mm:ss[Z]';

export interface SavedSnapshot {
  jsonPath: string;
  csvPath: string;
  count: number;
}

export function formatTimestamp(now: Date = new Date()): string {
  return dayjs(now).utc().format(TIMESTAMP_FORMAT);
}

export function buildSnapshot(rows: LeaderboardRow[], now?: Date): RunSnapshot {
  return {
    timestamp: formatTimestamp(now),
    count: rows.length,
    rows,
  };
}

export function toCsv(rows: LeaderboardRow[]): string {
  const sheet = XLSX.utils.json_to_sheet(rows, { header: [...ROW_FIELDS] });
  return `${XLSX.utils.sheet_to_csv(sheet)}\n`;
}

export function snapshotPaths(outputDir: string, category: Category) {
  const base = path.join(outputDir, `skills_sh_list_${category}`);
  return {
    jsonPath: `${base}.json`,
    csvPath: `${base}.csv`,
  };
}

/** 先写入临时文件再重命名，避免读者看到写了一半的快照 */
async function writeFileAtomic(file: string, content: string) {
  const tmp = `${file}.${process.pid}.tmp`;
  await fs.writeFile(tmp, content, 'utf-8');
  await fs.move(tmp, file, { overwrite: true });
}

export async function saveSnapshot(
  outputDir: string,
  category: Category,
  rows: LeaderboardRow[],
  now?: Date,
): Promise<SavedSnapshot> {
  await fs.ensureDir(outputDir);
  const { jsonPath, csvPath } = snapshotPaths(outputDir, category);
  await writeFileAtomic(jsonPath, JSON.stringify(buildSnapshot(rows, now), null, 2));
  await writeFileAtomic(csvPath, toCsv(rows));
  return { jsonPath, csvPath, count: rows.length };
}
