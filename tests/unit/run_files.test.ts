import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createRunDirectory, getReportPdfPath } from '@/run/files';
import { appendLogSummary, formatLogSummary } from '@/run/log_summary';

let tempDir: string;

describe('createRunDirectory', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'run-files-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates the per-run folder under output/logs', () => {
    const run = createRunDirectory('aapl', new Date(2024, 0, 5, 8, 9, 10), tempDir);

    const expectedDir = join(tempDir, 'output', 'logs', 'AAPL', 'AAPL_20240105_080910');
    expect(run).toEqual({
      reportDir: expectedDir,
      logFilePath: join(expectedDir, 'AAPL_20240105_080910.log'),
      timestamp: '20240105_080910',
    });
    expect(existsSync(expectedDir)).toBe(true);
    expect(getReportPdfPath(run, 'aapl')).toBe(join(expectedDir, 'AAPL_20240105_080910.pdf'));
  });
});

describe('formatLogSummary', () => {
  const rule = '='.repeat(50);

  it('includes news statistics when present', () => {
    expect(
      formatLogSummary(
        { daysFromCache: 20, daysFromRemote: 5, daysWithNoNews: 4 },
        { INFO: 12, WARNING: 2, ERROR: 0 }
      )
    ).toBe(
      [
        '',
        rule,
        'LOG SUMMARY:',
        '',
        'NEWS RETRIEVAL STATISTICS:',
        '- Number of days with news retrieved from Database: 20',
        '- Number of days with news retrieved with NewsAPI: 5',
        '- Number of days with no news: 4',
        '',
        'LOG MESSAGE COUNT:',
        'INFO: 12',
        'WARNING: 2',
        'ERROR: 0',
        rule,
        '',
      ].join('\n')
    );
  });

  it('omits the statistics block without news statistics', () => {
    expect(formatLogSummary(null, { INFO: 1, WARNING: 0, ERROR: 1 })).toBe(
      ['', rule, 'LOG SUMMARY:', '', 'LOG MESSAGE COUNT:', 'INFO: 1', 'WARNING: 0', 'ERROR: 1', rule, ''].join('\n')
    );
  });

  it('appends to an existing log file', () => {
    tempDir = mkdtempSync(join(tmpdir(), 'run-files-'));
    const logFile = join(tempDir, 'run.log');
    writeFileSync(logFile, 'first line\n');

    appendLogSummary(logFile, null, { INFO: 0, WARNING: 0, ERROR: 0 });

    expect(readFileSync(logFile, 'utf-8').startsWith(`first line\n\n${rule}\nLOG SUMMARY:`)).toBe(true);
    rmSync(tempDir, { recursive: true, force: true });
  });
});
