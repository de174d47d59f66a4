import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { RunLogSink } from '@/utils/logger';

let tempDir: string;

function line(level: number, msg: string): string {
  return JSON.stringify({ level, time: 0, msg }) + '\n';
}

describe('RunLogSink', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'run-log-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('counts info, warning and error lines', () => {
    const sink = new RunLogSink();
    sink.write(line(30, 'a'));
    sink.write(line(30, 'b'));
    sink.write(line(40, 'c'));
    sink.write(line(50, 'd'));
    sink.write(line(20, 'debug is not counted'));
    sink.write('not json\n');

    expect(sink.getCounters()).toEqual({ INFO: 2, WARNING: 1, ERROR: 1 });
  });

  it('mirrors lines into the attached file and resets counters on attach', () => {
    const sink = new RunLogSink();
    sink.write(line(30, 'before'));

    const filePath = join(tempDir, 'run.log');
    sink.attach(filePath);
    expect(sink.getFilePath()).toBe(filePath);
    expect(sink.getCounters()).toEqual({ INFO: 0, WARNING: 0, ERROR: 0 });

    sink.write(line(40, 'inside'));
    sink.detach();
    sink.write(line(30, 'after'));

    expect(readFileSync(filePath, 'utf-8')).toBe(line(40, 'inside'));
    expect(sink.getFilePath()).toBeNull();
    expect(sink.getCounters()).toEqual({ INFO: 1, WARNING: 1, ERROR: 0 });
  });
});
