import React, { type ReactElement } from 'react';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { format } from 'date-fns';
import { type DocumentProps, renderToBuffer } from '@react-pdf/renderer';
import type { TechnicalIndicators } from '@/analysis/technical';
import type { Recommendation } from '@/llm/recommendation';
import type { NewsFetchStats } from '@/news/types';
import { createChildLogger } from '@/utils/logger';
import {
  AnalysisReportDocument,
  type AnalysisReportDocumentData,
  type AnalysisSection,
  type RecommendationTone,
} from './reportGeneratorDocument';

const logger = createChildLogger('report_generator');

const HEADING_PATTERN = /^\*\*(.+?)\*\*\s*(.*)$/;

export interface AnalysisReportInput {
  symbol: string;
  companyName: string;
  periodDays: number;
  recommendation: Recommendation;
  analysis: string;
  indicators: TechnicalIndicators | null;
  predictions: string | null;
  newsStats: NewsFetchStats | null;
  articleCount: number;
  generatedAt: Date;
}

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

function pct(value: number): string {
  return `${value.toFixed(2)}%`;
}

function stripEmphasis(text: string): string {
  return text.replace(/\*\*/g, '').trim();
}

function recommendationTone(recommendation: Recommendation): RecommendationTone {
  if (recommendation === 'BUY') return 'good';
  if (recommendation === 'HOLD') return 'mid';
  if (recommendation === 'SELL') return 'bad';
  return 'none';
}

/**
 * Splits the model's answer at lines opening with a `**Title**` marker. Text
 * before the first marker becomes an untitled section; blank lines separate
 * paragraphs.
 */
export function splitAnalysisSections(text: string): AnalysisSection[] {
  const sections: AnalysisSection[] = [];
  let current: AnalysisSection = { title: null, paragraphs: [] };
  let buffer: string[] = [];

  const flushParagraph = () => {
    if (buffer.length > 0) {
      current.paragraphs.push(buffer.join(' '));
      buffer = [];
    }
  };
  const flushSection = () => {
    flushParagraph();
    if (current.title !== null || current.paragraphs.length > 0) {
      sections.push(current);
    }
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const heading = HEADING_PATTERN.exec(line);
    if (heading) {
      flushSection();
      current = { title: heading[1].replace(/:\s*$/, '').trim(), paragraphs: [] };
      const rest = stripEmphasis(heading[2].replace(/^:\s*/, ''));
      if (rest) buffer.push(rest);
      continue;
    }
    if (!line) {
      flushParagraph();
      continue;
    }
    buffer.push(stripEmphasis(line));
  }
  flushSection();

  return sections;
}

function buildIndicatorRows(
  indicators: TechnicalIndicators | null
): AnalysisReportDocumentData['indicatorRows'] {
  if (!indicators) {
    return [{ label: 'Price data', value: 'Not available' }];
  }
  return [
    { label: 'Initial price', value: money(indicators.firstPrice) },
    { label: 'Final price', value: money(indicators.lastPrice) },
    { label: 'Change', value: pct(indicators.trendPct) },
    { label: 'Volatility (annualized)', value: pct(indicators.volatility) },
    { label: 'Average volume', value: Math.round(indicators.avgVolume).toLocaleString('en-US') },
    { label: 'RSI (14)', value: indicators.rsi.toFixed(2) },
    { label: 'MA (7)', value: indicators.ma7 === null ? 'n/a' : money(indicators.ma7) },
  ];
}

function buildNewsStatsRows(
  stats: NewsFetchStats | null,
  articleCount: number
): AnalysisReportDocumentData['newsStatsRows'] {
  if (!stats) {
    return [{ label: 'News statistics', value: 'Not available' }];
  }
  return [
    { label: 'Days from cache', value: String(stats.daysFromCache) },
    { label: 'Days from News API', value: String(stats.daysFromRemote) },
    { label: 'Days without news', value: String(stats.daysWithNoNews) },
    { label: 'Articles analyzed', value: String(articleCount) },
  ];
}

function buildPredictionLines(predictions: string | null): string[] {
  if (!predictions) return [];
  return predictions
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith('- '));
}

export function buildAnalysisReportData(input: AnalysisReportInput): AnalysisReportDocumentData {
  const periodLabel = input.indicators
    ? `${input.indicators.periodStart} to ${input.indicators.periodEnd} (${input.periodDays} days)`
    : `Last ${input.periodDays} days`;

  return {
    symbol: input.symbol.toUpperCase(),
    companyName: input.companyName,
    generatedAt: format(input.generatedAt, 'yyyy-MM-dd HH:mm'),
    periodLabel,
    recommendation: input.recommendation,
    recommendationTone: recommendationTone(input.recommendation),
    indicatorRows: buildIndicatorRows(input.indicators),
    predictionLines: buildPredictionLines(input.predictions),
    sections: splitAnalysisSections(input.analysis),
    newsStatsRows: buildNewsStatsRows(input.newsStats, input.articleCount),
  };
}

export async function renderAnalysisReport(data: AnalysisReportDocumentData): Promise<Buffer> {
  const element = React.createElement(AnalysisReportDocument, { data }) as unknown as ReactElement<DocumentProps>;
  return renderToBuffer(element);
}

/** Renders the report and writes it to `outputPath`, returning that path. */
export async function generateAnalysisReport(
  input: AnalysisReportInput,
  outputPath: string
): Promise<string> {
  const buffer = await renderAnalysisReport(buildAnalysisReportData(input));
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, buffer);
  logger.info({ outputPath, bytes: buffer.length }, 'PDF report written');
  return outputPath;
}
