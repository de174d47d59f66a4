import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DEFAULT_CONFIG_FILE, getConfig, loadConfig, resetConfig } from '@/core/config';

let originalCwd: string;
let tempDir: string;

function writeConfig(content: unknown): void {
  mkdirSync(join(tempDir, 'config'), { recursive: true });
  writeFileSync(
    join(tempDir, 'config', 'config.json'),
    typeof content === 'string' ? content : JSON.stringify(content)
  );
}

describe('config loader', () => {
  beforeEach(() => {
    originalCwd = process.cwd();
    tempDir = mkdtempSync(join(tmpdir(), 'config-test-'));
    process.chdir(tempDir);
    resetConfig();
  });

  afterEach(() => {
    process.chdir(originalCwd);
    rmSync(tempDir, { recursive: true, force: true });
    resetConfig();
  });

  it('writes a default file when none exists', () => {
    const config = loadConfig();

    expect(config.stock_symbol).toBe('AAPL');
    expect(config.analysis_period_days).toBe(28);
    expect(config.max_articles_per_day).toBe(5);
    expect(config.news_api_page_size).toBe(100);
    const written = JSON.parse(readFileSync(join(tempDir, 'config', 'config.json'), 'utf-8'));
    expect(written).toEqual(DEFAULT_CONFIG_FILE);
  });

  it('reads sectioned files and fills missing keys with defaults', () => {
    writeConfig({
      general: { stock_symbol: ' msft ', analysis_period_days: 14 },
      together_ai: { together_temperature: 0.7 },
      news_api: { news_api_query_suffix: 'Microsoft', max_articles_per_day: null },
    });

    const config = loadConfig();

    expect(config.stock_symbol).toBe('MSFT');
    expect(config.analysis_period_days).toBe(14);
    expect(config.together_temperature).toBe(0.7);
    expect(config.together_top_k).toBe(40);
    expect(config.news_api_query_suffix).toBe('Microsoft');
    expect(config.max_articles_per_day).toBeNull();
    expect(config.prediction_path).toBeNull();
  });

  it('reads flat files', () => {
    writeConfig({ stock_symbol: 'TSLA', together_max_tokens: 512, news_api_refresh_no_news: true });

    const config = loadConfig();

    expect(config.stock_symbol).toBe('TSLA');
    expect(config.together_max_tokens).toBe(512);
    expect(config.news_api_refresh_no_news).toBe(true);
  });

  it('replaces only the invalid keys with defaults', () => {
    writeConfig({
      general: { stock_symbol: 'NVDA', analysis_period_days: -3 },
      news_api: { news_api_page_size: 500, news_api_language: 'de' },
    });

    const config = loadConfig();

    expect(config.stock_symbol).toBe('NVDA');
    expect(config.analysis_period_days).toBe(28);
    expect(config.news_api_page_size).toBe(100);
    expect(config.news_api_language).toBe('de');
  });

  it('resets a section that is not an object', () => {
    writeConfig({ general: { stock_symbol: 'AMD' }, news_api: 'broken' });

    const config = loadConfig();

    expect(config.stock_symbol).toBe('AMD');
    expect(config.news_api_sort_by).toBe('relevancy');
  });

  it('falls back to defaults for unreadable JSON', () => {
    writeConfig('{ "general": ');
    expect(loadConfig().stock_symbol).toBe('AAPL');
    expect(existsSync(join(tempDir, 'config', 'config.json'))).toBe(true);
  });

  it('caches until reset', () => {
    writeConfig({ general: { stock_symbol: 'META' } });
    expect(getConfig().stock_symbol).toBe('META');

    writeConfig({ general: { stock_symbol: 'INTC' } });
    expect(getConfig().stock_symbol).toBe('META');

    resetConfig();
    expect(getConfig().stock_symbol).toBe('INTC');
  });
});
