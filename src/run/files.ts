import { mkdirSync } from 'fs';
import { join } from 'path';
import { formatRunTimestamp, getCurrentDate } from '@/core/time';

export interface RunDirectory {
  reportDir: string;
  logFilePath: string;
  timestamp: string;
}

export function getLogsRoot(projectRoot: string = process.cwd()): string {
  return join(projectRoot, 'output', 'logs');
}

/**
 * Creates `output/logs/<SYMBOL>/<SYMBOL>_<timestamp>/` for one run. The log
 * file and every artifact of the run land there.
 */
export function createRunDirectory(
  symbol: string,
  now: Date = getCurrentDate(),
  projectRoot: string = process.cwd()
): RunDirectory {
  const upper = symbol.toUpperCase();
  const timestamp = formatRunTimestamp(now);
  const reportDir = join(getLogsRoot(projectRoot), upper, `${upper}_${timestamp}`);
  mkdirSync(reportDir, { recursive: true });

  return {
    reportDir,
    logFilePath: join(reportDir, `${upper}_${timestamp}.log`),
    timestamp,
  };
}

export function getReportPdfPath(run: RunDirectory, symbol: string): string {
  return join(run.reportDir, `${symbol.toUpperCase()}_${run.timestamp}.pdf`);
}
