/**
 * LLM Adapter
 * Builds the analysis prompt, sends it to the completion model and derives
 * the recommendation. Failures never escape: they come back as the analysis text.
 */

import { writeFileSync } from 'fs';
import { join } from 'path';
import type { TechnicalIndicators } from '@/analysis/technical';
import type { AppConfig } from '@/core/config';
import type { Article } from '@/news/types';
import { createChildLogger } from '@/utils/logger';
import { extractRecommendation, type Recommendation } from './recommendation';
import { buildAnalysisPrompt, buildFinancialSummary, buildNewsSummary } from './templates';
import type { CompletionClient, CompletionParams } from './together_client';

const logger = createChildLogger('llm_adapter');

export const EMPTY_ANALYSIS_TEXT =
  'It was not possible to generate an analysis. Please try again later.';

export type LlmSettings = Pick<
  AppConfig,
  | 'together_model'
  | 'together_max_tokens'
  | 'together_temperature'
  | 'together_top_p'
  | 'together_top_k'
  | 'together_repetition_penalty'
  | 'investment_horizon'
  | 'output_language'
  | 'max_news_articles'
>;

export interface AnalysisInput {
  companyName: string;
  symbol: string;
  indicators: TechnicalIndicators | null;
  articles: Article[];
  predictions: string | null;
  /** Run directory for the prompt and response logs; omitted means no logs. */
  reportDir?: string;
}

export interface StockAnalysis {
  company: string;
  symbol: string;
  analysis: string;
  recommendation: Recommendation;
}

function toCompletionParams(settings: LlmSettings): CompletionParams {
  return {
    model: settings.together_model,
    maxTokens: settings.together_max_tokens,
    temperature: settings.together_temperature,
    topP: settings.together_top_p,
    topK: settings.together_top_k,
    repetitionPenalty: settings.together_repetition_penalty,
  };
}

function saveLog(reportDir: string, fileName: string, content: string): void {
  const filePath = join(reportDir, fileName);
  try {
    writeFileSync(filePath, content, 'utf-8');
    logger.info({ filePath }, 'LLM exchange saved');
  } catch (error) {
    logger.error({ filePath, error }, 'Error while saving LLM exchange');
  }
}

export class StockAnalyst {
  constructor(
    private readonly client: CompletionClient,
    private readonly settings: LlmSettings
  ) {}

  buildPrompt(input: AnalysisInput): string {
    return buildAnalysisPrompt({
      companyName: input.companyName,
      symbol: input.symbol,
      financialSummary: buildFinancialSummary(input.indicators),
      newsSummary: buildNewsSummary(input.articles, this.settings.max_news_articles),
      predictions: input.predictions,
      investmentHorizon: this.settings.investment_horizon,
      outputLanguage: this.settings.output_language,
    });
  }

  async analyze(input: AnalysisInput): Promise<StockAnalysis> {
    const { companyName, symbol, reportDir } = input;
    const fileSymbol = symbol.toUpperCase();

    try {
      const prompt = this.buildPrompt(input);
      if (reportDir) saveLog(reportDir, `${fileSymbol}_prompt.log`, prompt);

      logger.info({ symbol, model: this.settings.together_model }, 'Sending analysis request');
      const text = await this.client.complete(prompt, toCompletionParams(this.settings));
      const analysis = text.trim() || EMPTY_ANALYSIS_TEXT;
      logger.info({ symbol, length: analysis.length }, 'Analysis text received');

      if (reportDir) saveLog(reportDir, `${fileSymbol}_response.log`, analysis);

      return {
        company: companyName,
        symbol,
        analysis,
        recommendation: extractRecommendation(analysis),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ symbol, error }, 'Error during data analysis');
      return {
        company: companyName,
        symbol,
        analysis: `Error during analysis: ${message}`,
        recommendation: 'N/A',
      };
    }
  }
}
