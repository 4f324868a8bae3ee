#!/usr/bin/env -S npx tsx

import path from 'path';
import fs from 'fs-extra';
import { program } from 'commander';
import { resolveConfig, type SyncConfigOverrides } from '../config';
import { buildSnapshot } from '../generators/snapshot';
import { exitCodeFor, extractPage, runSync } from '../sync/orchestrator';
import { CATEGORIES, isCategory, type Category } from '../types/leaderboard';

function parseCategories(values: string[]): Category[] {
  return values.map((value) => {
    if (!isCategory(value)) {
      throw new Error(`Unknown category "${value}", expected one of: ${CATEGORIES.join(', ')}`);
    }
    return value;
  });
}

program.name('skills-sh.ts').description('同步 skills.sh 技能榜单（All Time、Trending、Hot），保存为 CSV 和 JSON');

program
  .command('sync', { isDefault: true })
  .description('抓取榜单页面并写入快照')
  .option('-o, --output <dir>', '输出目录')
  .option('-t, --timeout <ms>', '单次请求超时（毫秒）')
  .option('-u, --user-agent <ua>', '请求使用的 User-Agent')
  .option('-c, --category <name...>', `仅同步指定榜单（${CATEGORIES.join(' / ')}）`)
  .action(
    async (options: { output?: string; timeout?: string; userAgent?: string; category?: string[] }) => {
      try {
        const overrides: SyncConfigOverrides = {};
        if (options.output) {
          overrides.outputDir = options.output;
        }
        if (options.timeout) {
          overrides.timeout = Number(options.timeout);
        }
        if (options.userAgent) {
          overrides.userAgent = options.userAgent;
        }
        if (options.category) {
          overrides.categories = parseCategories(options.category);
        }
        const report = await runSync(resolveConfig(overrides));
        process.exitCode = exitCodeFor(report);
      } catch (e) {
        console.error(e);
        process.exit(1);
      }
    },
  );

program
  .command('parse')
  .description('解析已保存的页面（HTML 或渲染后的文本）')
  .argument('<file>', '页面文件路径')
  .option('-c, --category <name>', '榜单类别', 'all_time')
  .option('-o, --output <file>', '输出 JSON 文件路径，省略时打印到标准输出')
  .action(async (file: string, options: { category: string; output?: string }) => {
    try {
      const [category] = parseCategories([options.category]);
      const { siteOrigin } = resolveConfig();
      const content = await fs.readFile(path.resolve(file), 'utf-8');
      const { rows } = extractPage(content, category, siteOrigin);
      const json = JSON.stringify(buildSnapshot(rows), null, 2);
      if (options.output) {
        await fs.writeFile(path.resolve(options.output), json, 'utf-8');
      } else {
        console.log(json);
      }
    } catch (e) {
      console.error(e);
      process.exit(1);
    }
  });

program.parse();
