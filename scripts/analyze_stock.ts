/**
 * Stock Analysis Script
 * Runs one analysis for a symbol and writes the PDF report and run log
 *
 * Usage: npx tsx scripts/analyze_stock.ts [-s SYMBOL] [-p DAYS] [-c]
 */

import 'dotenv/config';
import { parseCliArgs, CliArgumentError, USAGE, type AnalyzeCliArgs } from '../src/cli/args';
import { getConfig, type AppConfig } from '../src/core/config';
import { getEnvConfig, MissingEnvError, type EnvConfig } from '../src/core/env';
import { getCurrentDate } from '../src/core/time';
import { analyzeStock, createDefaultDependencies, type AnalysisResult } from '../src/run/analyze';
import { createRunDirectory } from '../src/run/files';
import { appendLogSummary } from '../src/run/log_summary';
import { createChildLogger, runLogSink } from '../src/utils/logger';

const logger = createChildLogger('analyze_stock');

const RESET = '\x1b[0m';
const RECOMMENDATION_STYLES: Record<string, { color: string; emoji: string }> = {
  BUY: { color: '\x1b[92m', emoji: '🟢' },
  SELL: { color: '\x1b[91m', emoji: '🔴' },
  HOLD: { color: '\x1b[93m', emoji: '🟡' },
};

function printConfig(config: AppConfig): void {
  console.log('\nCurrent configuration:');
  for (const [key, value] of Object.entries(config)) {
    console.log(`  ${key}: ${value}`);
  }
}

function printAnalysisResult(result: AnalysisResult): void {
  if (!result.success) {
    console.log(`\n❌ ERROR: ${result.error}\n`);
    return;
  }

  const style = RECOMMENDATION_STYLES[result.recommendation] ?? { color: RESET, emoji: '❓' };
  const rule = '='.repeat(80);
  const thinRule = '-'.repeat(80);

  console.log(`\n${rule}`);
  console.log(`📊 STOCK ANALYSIS: ${result.company} (${result.symbol})`);
  console.log(rule);
  console.log(`\n${style.emoji} RECOMMENDATION: ${style.color}${result.recommendation}${RESET}\n`);
  console.log('📝 DETAILED ANALYSIS:');
  console.log(thinRule);
  console.log(result.analysis);
  console.log(thinRule);

  if (result.pdfPath) {
    console.log(`\n📄 PDF REPORT: The report has been saved in ${result.pdfPath}`);
  }
  console.log(`\n${rule}\n`);
}

async function main(): Promise<number> {
  const config = getConfig();

  let args: AnalyzeCliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2), {
      symbol: config.stock_symbol,
      period: config.analysis_period_days,
    });
  } catch (error) {
    if (error instanceof CliArgumentError) {
      console.error(USAGE);
      console.error(`\nerror: ${error.message}`);
      return 2;
    }
    throw error;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  if (args.showConfig) {
    printConfig(config);
    return 0;
  }

  const run = createRunDirectory(args.symbol, getCurrentDate(), config.projectRoot);
  runLogSink.attach(run.logFilePath);

  let env: EnvConfig;
  try {
    env = getEnvConfig();
  } catch (error) {
    runLogSink.detach();
    if (error instanceof MissingEnvError) {
      logger.error({ variable: error.variable }, error.hint);
      console.log(`❌ Error: ${error.hint}`);
      return 1;
    }
    throw error;
  }

  const { result, newsStats } = await analyzeStock(createDefaultDependencies(config, env), {
    symbol: args.symbol,
    period: args.period,
    runDirectory: run,
  });

  printAnalysisResult(result);

  const counters = runLogSink.getCounters();
  runLogSink.detach();
  appendLogSummary(run.logFilePath, newsStats, counters);

  return result.success ? 0 : 1;
}

const startTime = Date.now();

main()
  .then((exitCode) => {
    console.log(`Execution time: ${((Date.now() - startTime) / 1000).toFixed(2)} seconds`);
    process.exitCode = exitCode;
  })
  .catch((error) => {
    runLogSink.detach();
    logger.error({ error }, 'Analysis run failed');
    process.exitCode = 1;
  });
