/**
 * Prompt templates for the stock analysis request
 */

import type { TechnicalIndicators } from '@/analysis/technical';
import { articleDate } from '@/news/grouping';
import type { Article } from '@/news/types';
import { isPositiveInteger } from '@/utils/guards';

export interface PromptInput {
  companyName: string;
  symbol: string;
  financialSummary: string;
  newsSummary: string;
  predictions: string | null;
  investmentHorizon: string;
  outputLanguage: string;
}

export function buildFinancialSummary(indicators: TechnicalIndicators | null): string {
  if (!indicators) {
    return 'No financial data available.';
  }

  return [
    `- Initial price: $${indicators.firstPrice.toFixed(2)}`,
    `- Final price: $${indicators.lastPrice.toFixed(2)}`,
    `- Percentage change: ${indicators.trendPct.toFixed(2)}%`,
    `- Annualized volatility: ${indicators.volatility.toFixed(2)}%`,
    `- Average daily volume: ${indicators.avgVolume.toFixed(0)}`,
    `- RSI (Relative Strength Index): ${indicators.rsi.toFixed(2)}`,
  ].join('\n');
}

/** Numbered headline list; `maxArticles` of null lists everything. */
export function buildNewsSummary(articles: Article[], maxArticles: number | null): string {
  if (articles.length === 0) {
    return 'No news available.';
  }

  const shown = isPositiveInteger(maxArticles)
    ? articles.slice(0, maxArticles)
    : articles;

  const lines = [`RELEVANT NEWS FROM THE LAST 4 WEEKS (total: ${articles.length}):`];
  shown.forEach((article, index) => {
    const date = articleDate(article) ?? article.publishedAt;
    const title = article.title || 'No title';
    const source = article.source || 'Unknown source';
    lines.push(`${index + 1}. [${date}] ${title} (Source: ${source})`);
  });

  if (articles.length > shown.length) {
    lines.push(`... and ${articles.length - shown.length} more articles not shown.`);
  }
  return lines.join('\n') + '\n';
}

export function buildAnalysisPrompt(input: PromptInput): string {
  const { companyName, symbol } = input;
  const predictionText = input.predictions ? `${input.predictions}\n` : '';

  return `
<|begin_of_promptml|>
[System]
You are an expert financial analyst tasked with providing a comprehensive analysis and detailed recommendation for the stock ${companyName} (${symbol}). Your analysis must be strictly based on the provided data and must be professional, objective, and easily interpretable.

[Input_Data]
- Financial Data (last 4 weeks):
  ${input.financialSummary}

- Relevant news (last 4 weeks):
  ${input.newsSummary}

- Future value predictions for the next days (if available):
  ${predictionText}

- Investment horizon: ${input.investmentHorizon}

[Analysis_Objectives]
1. **Historical Assessment:** Examine the recent historical performance of the stock, identifying significant trends and comparing it with market benchmarks if applicable.
2. **Volatility and Risk Analysis:** Assess the level of volatility and associated risks, highlighting any critical thresholds.
3. **News Impact:** Analyze the influence of news, giving greater relevance to authoritative and recent sources.
4. **Technical Indicators:** Identify and evaluate other relevant technical indicators (e.g., moving averages, RSI, MACD, supports and resistances).
5. **Market Context:** Consider the macroeconomic and sector context, integrating it into the analysis.
6. **Predictive Analysis:** If available, analyze the predicted future values, compare them with historical trends, and assess their plausibility based on the current context.
7. **Operational Recommendation:** Provide a clear final recommendation (BUY, SELL, or HOLD) with a detailed justification, highlighting any uncertainties or risks.

[Output_Format]
Organize the output into clear and well-structured sections:
- **Introduction:** Summary of the context, objectives, and main findings.
- **Historical and Technical Analysis:** Detailing trends, technical indicators, and volatility/risk assessment.
- **Sentiment and News Analysis:** Qualitative assessment of the impact of news, weighted by source/date.
- **Context and Benchmark:** Any comparisons with the general market or sector benchmarks.
- **Future Projections:** Analysis of predicted values for the coming days, assessment of their consistency with technical and fundamental analysis, and identification of possible turning points.
- **Final Recommendation:** Conclusions and operational indications (BUY, SELL, or HOLD) with detailed evidence and justifications.

The output language must be ${input.outputLanguage}.

[Output_Formatting]
Use "**" before and after the titles of the various output sections.

[Output]
<|assistant|>
<|end_of_promptml|>
`;
}
