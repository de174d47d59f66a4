/**
 * Logging with Pino - API keys are redacted
 *
 * Console output goes through pino-pretty outside production. A run can attach
 * a log file via `runLogSink`, which also keeps per-level message counters for
 * the end-of-run summary.
 */

import pino, { type DestinationStream } from 'pino';
import pretty from 'pino-pretty';
import { closeSync, openSync, writeSync } from 'fs';
import { isPlainObject } from './guards';

const redactPaths = [
  'apiKey',
  'api_key',
  'newsApiKey',
  'togetherApiKey',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  'headers.Authorization',
  'headers["X-Api-Key"]',
];

export interface LogCounters {
  INFO: number;
  WARNING: number;
  ERROR: number;
}

const LEVEL_LABELS: Record<number, keyof LogCounters> = {
  30: 'INFO',
  40: 'WARNING',
  50: 'ERROR',
};

/**
 * Destination that mirrors log lines into the current run's log file.
 * Writes are synchronous so a summary appended afterwards lands after them.
 */
export class RunLogSink implements DestinationStream {
  private fd: number | null = null;
  private filePath: string | null = null;
  private counters: LogCounters = { INFO: 0, WARNING: 0, ERROR: 0 };

  attach(filePath: string): void {
    this.detach();
    this.fd = openSync(filePath, 'w');
    this.filePath = filePath;
    this.resetCounters();
  }

  detach(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
    }
    this.fd = null;
    this.filePath = null;
  }

  getFilePath(): string | null {
    return this.filePath;
  }

  getCounters(): LogCounters {
    return { ...this.counters };
  }

  resetCounters(): void {
    this.counters = { INFO: 0, WARNING: 0, ERROR: 0 };
  }

  write(line: string): void {
    this.count(line);
    if (this.fd !== null) {
      writeSync(this.fd, line);
    }
  }

  private count(line: string): void {
    let entry: unknown;
    try {
      entry = JSON.parse(line);
    } catch {
      return;
    }
    if (!isPlainObject(entry) || typeof entry.level !== 'number') return;
    const label = LEVEL_LABELS[entry.level];
    if (label) {
      this.counters[label] += 1;
    }
  }
}

export const runLogSink = new RunLogSink();

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase() ?? '';
  return isLogLevel(raw) ? raw : 'info';
}

const consoleStream: DestinationStream =
  process.env.NODE_ENV !== 'production'
    ? pretty({
        colorize: true,
        ignore: 'pid,hostname',
        sync: true,
      })
    : pino.destination(1);

export const logger = pino(
  {
    level: resolveLevel(),
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
  },
  pino.multistream([
    { level: 'trace', stream: consoleStream },
    { level: 'info', stream: runLogSink },
  ])
);

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
