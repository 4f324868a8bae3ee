import { afterEach, describe, it, expect, vi } from 'vitest';
import { log } from './log';

describe('log', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes error messages with a timestamp', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    log.error('[ERROR] Failed to sync hot: HTTP status 503');
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]).toHaveLength(1);
    expect(error.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3}\] \[ERROR\] Failed to sync hot: HTTP status 503$/,
    );
  });

  it('writes info to stdout and warnings to stderr', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    log.info('Done.');
    log.warn('Failed to flatten page text');
    expect(info.mock.calls[0][0]).toMatch(/\] Done\.$/);
    expect(warn.mock.calls[0][0]).toMatch(/\] Failed to flatten page text$/);
  });
});
