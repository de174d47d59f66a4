/**
 * One stock analysis run: price history, news, predictions, LLM analysis and
 * the PDF report. Every stage after price history degrades instead of failing.
 */

import { calculateTechnicalIndicators } from '@/analysis/technical';
import { getCompanyName } from '@/core/company';
import type { AppConfig } from '@/core/config';
import type { EnvConfig } from '@/core/env';
import { getCurrentDate } from '@/core/time';
import { generateAnalysisReport, type AnalysisReportInput } from '@/lib/reportGenerator';
import { StockAnalyst } from '@/llm/adapter';
import type { Recommendation } from '@/llm/recommendation';
import { TogetherClient } from '@/llm/together_client';
import { NewsFetchOrchestrator } from '@/news/orchestrator';
import { SymbolStore } from '@/news/symbol_store';
import type { NewsFetchStats } from '@/news/types';
import { PredictionIntegration } from '@/predictions/integration';
import { NewsApiClient } from '@/providers/newsapi/client';
import type { PriceHistoryProvider } from '@/providers/types';
import { YahooPriceHistoryProvider } from '@/providers/yahoo/price_history';
import { createChildLogger } from '@/utils/logger';
import { createRunDirectory, getReportPdfPath, type RunDirectory } from './files';

const logger = createChildLogger('analyze');

export interface PredictionSource {
  getPredictions(symbol: string): Promise<string | null>;
}

export interface AnalysisDependencies {
  config: AppConfig;
  priceHistory: PriceHistoryProvider;
  news: Pick<NewsFetchOrchestrator, 'fetch'>;
  analyst: Pick<StockAnalyst, 'analyze'>;
  predictions: PredictionSource;
  renderReport: (input: AnalysisReportInput, outputPath: string) => Promise<string>;
  resolveCompanyName: (symbol: string) => string;
  now: () => Date;
}

export interface AnalysisSuccess {
  success: true;
  company: string;
  symbol: string;
  analysis: string;
  recommendation: Recommendation;
  pdfPath?: string;
}

export interface AnalysisFailure {
  success: false;
  error: string;
}

export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

export interface AnalyzeStockOutcome {
  result: AnalysisResult;
  newsStats: NewsFetchStats | null;
}

export interface AnalyzeStockOptions {
  symbol?: string;
  period?: number;
  /** Existing run directory, e.g. the one holding the run's log file. */
  runDirectory?: RunDirectory;
}

export function createDefaultDependencies(config: AppConfig, env: EnvConfig): AnalysisDependencies {
  return {
    config,
    priceHistory: new YahooPriceHistoryProvider(),
    news: new NewsFetchOrchestrator({
      store: new SymbolStore(),
      client: new NewsApiClient(env.newsApiKey),
      settings: config,
    }),
    analyst: new StockAnalyst(new TogetherClient(env.togetherApiKey), config),
    predictions: new PredictionIntegration(config.prediction_path),
    renderReport: generateAnalysisReport,
    resolveCompanyName: (symbol) => getCompanyName(symbol, config.projectRoot),
    now: getCurrentDate,
  };
}

async function loadPredictions(deps: AnalysisDependencies, symbol: string): Promise<string | null> {
  try {
    const predictions = await deps.predictions.getPredictions(symbol);
    if (predictions) {
      logger.info({ symbol }, 'Predictions retrieved');
    } else {
      logger.warn({ symbol }, 'Unable to retrieve predictions, analysis will proceed without them');
    }
    return predictions;
  } catch (error) {
    logger.error({ symbol, error }, 'Error while retrieving predictions');
    return null;
  }
}

export async function analyzeStock(
  deps: AnalysisDependencies,
  options: AnalyzeStockOptions = {}
): Promise<AnalyzeStockOutcome> {
  const symbol = options.symbol ?? deps.config.stock_symbol;
  const period = options.period ?? deps.config.analysis_period_days;
  let newsStats: NewsFetchStats | null = null;

  try {
    logger.info({ symbol, period }, 'Starting analysis');
    const companyName = deps.resolveCompanyName(symbol);
    const run = options.runDirectory ?? createRunDirectory(symbol, deps.now(), deps.config.projectRoot);

    const bars = await deps.priceHistory.getDailyBars(symbol, period);
    if (!bars) {
      const error = `Unable to retrieve financial data for ${symbol}`;
      logger.error({ symbol }, error);
      return { result: { success: false, error }, newsStats };
    }
    const indicators = calculateTechnicalIndicators(bars);

    logger.info({ companyName, symbol }, 'Retrieving news');
    const news = await deps.news.fetch(companyName, symbol);
    newsStats = news.stats;

    const predictions = await loadPredictions(deps, symbol);

    const analysis = await deps.analyst.analyze({
      companyName,
      symbol,
      indicators,
      articles: news.articles,
      predictions,
      reportDir: run.reportDir,
    });

    const result: AnalysisSuccess = { success: true, ...analysis };

    try {
      result.pdfPath = await deps.renderReport(
        {
          symbol,
          companyName,
          periodDays: period,
          recommendation: analysis.recommendation,
          analysis: analysis.analysis,
          indicators,
          predictions,
          newsStats,
          articleCount: news.articles.length,
          generatedAt: deps.now(),
        },
        getReportPdfPath(run, symbol)
      );
    } catch (error) {
      logger.warn({ symbol, error }, 'Unable to generate PDF report');
    }

    logger.info({ symbol, recommendation: result.recommendation }, 'Analysis completed');
    return { result, newsStats };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ symbol, error }, 'Error during stock analysis');
    return { result: { success: false, error: message }, newsStats };
  }
}
