import { describe, expect, it } from 'vitest';
import { CliArgumentError, parseCliArgs } from '@/cli/args';

const defaults = { symbol: 'AAPL', period: 28 };

describe('parseCliArgs', () => {
  it('falls back to the configured defaults', () => {
    expect(parseCliArgs([], defaults)).toEqual({
      symbol: 'AAPL',
      period: 28,
      showConfig: false,
      help: false,
    });
  });

  it('reads short, long and inline forms', () => {
    expect(parseCliArgs(['-s', 'MSFT', '-p', '14'], defaults)).toMatchObject({ symbol: 'MSFT', period: 14 });
    expect(parseCliArgs(['--symbol', 'TSLA', '--period', '7'], defaults)).toMatchObject({ symbol: 'TSLA', period: 7 });
    expect(parseCliArgs(['--symbol=NVDA', '--period=60'], defaults)).toMatchObject({ symbol: 'NVDA', period: 60 });
  });

  it('detects the config and help switches', () => {
    expect(parseCliArgs(['-c'], defaults).showConfig).toBe(true);
    expect(parseCliArgs(['--config'], defaults).showConfig).toBe(true);
    expect(parseCliArgs(['-h'], defaults).help).toBe(true);
  });

  it('rejects a period that is not a positive integer', () => {
    expect(() => parseCliArgs(['-p', 'ten'], defaults)).toThrow(CliArgumentError);
    expect(() => parseCliArgs(['--period=0'], defaults)).toThrow(
      "argument -p/--period: invalid positive integer: '0'"
    );
  });

  it('rejects an option without a value', () => {
    expect(() => parseCliArgs(['--symbol'], defaults)).toThrow(
      'argument -s/--symbol: expected one argument'
    );
    expect(() => parseCliArgs(['-s', '-c'], defaults)).toThrow(CliArgumentError);
  });
});
