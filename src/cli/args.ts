/**
 * Argument parsing for scripts/analyze_stock.ts
 *
 * Accepts `--symbol=X`, `--symbol X` and `-s X` (likewise for period).
 */

export interface AnalyzeCliArgs {
  symbol: string;
  period: number;
  showConfig: boolean;
  help: boolean;
}

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

export const USAGE = [
  'Usage: npm run analyze -- [options]',
  '',
  'Analyze the trend of a stock and generate a recommendation.',
  '',
  'Options:',
  '  -s, --symbol <SYMBOL>  Stock symbol to analyze (default from configuration)',
  '  -p, --period <DAYS>    Analysis period in days (default from configuration)',
  '  -c, --config           Show the current configuration and exit',
  '  -h, --help             Show this help and exit',
].join('\n');

function readOption(argv: string[], long: string, short: string): string | undefined {
  const eqArg = argv.find((arg) => arg.startsWith(`${long}=`));
  if (eqArg) return eqArg.slice(long.length + 1);

  const posIndex = argv.findIndex((arg) => arg === long || arg === short);
  if (posIndex < 0) return undefined;

  const value = argv[posIndex + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new CliArgumentError(`argument ${short}/${long}: expected one argument`);
  }
  return value;
}

export function parseCliArgs(
  argv: string[],
  defaults: { symbol: string; period: number }
): AnalyzeCliArgs {
  const symbolValue = readOption(argv, '--symbol', '-s');
  const periodValue = readOption(argv, '--period', '-p');

  let period = defaults.period;
  if (periodValue !== undefined) {
    if (!/^\d+$/.test(periodValue.trim()) || Number(periodValue) <= 0) {
      throw new CliArgumentError(`argument -p/--period: invalid positive integer: '${periodValue}'`);
    }
    period = Number(periodValue);
  }

  const symbol = symbolValue?.trim() ? symbolValue.trim() : defaults.symbol;

  return {
    symbol,
    period,
    showConfig: argv.includes('--config') || argv.includes('-c'),
    help: argv.includes('--help') || argv.includes('-h'),
  };
}
