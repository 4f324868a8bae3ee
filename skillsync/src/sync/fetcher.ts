import Axios, { isAxiosError } from 'axios';
import type { SyncConfig } from '../config';

export type PageFetcher = (url: string) => Promise<string>;

/** 单次尝试，不做重试；非 2xx、网络错误与超时均视为该榜单抓取失败 */
export function createPageFetcher(config: Pick<SyncConfig, 'userAgent' | 'timeout'>): PageFetcher {
  const req = Axios.create({
    timeout: config.timeout,
    responseType: 'text',
    headers: {
      'User-Agent': config.userAgent,
    },
  });

  return async (url: string) => {
    try {
      const res = await req.get<string>(url);
      return res.data;
    } catch (e) {
      if (isAxiosError(e)) {
        const detail = e.response
          ? `HTTP status ${e.response.status}`
          : e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT'
          ? `timed out after ${config.timeout}ms`
          : e.message;
        throw new Error(`Error occurred when fetching ${url}: ${detail}`, { cause: e });
      }
      throw e;
    }
  };
}
