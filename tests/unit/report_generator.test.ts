import { describe, expect, it } from 'vitest';
import { buildAnalysisReportData, splitAnalysisSections } from '@/lib/reportGenerator';

describe('splitAnalysisSections', () => {
  it('splits at bold titles and joins wrapped lines', () => {
    const text = [
      'Opening remark',
      '',
      '**Introduction:**',
      'First paragraph',
      'continued here',
      '',
      'Second paragraph',
      '**Final Recommendation:** BUY with **conviction**',
    ].join('\n');

    expect(splitAnalysisSections(text)).toEqual([
      { title: null, paragraphs: ['Opening remark'] },
      { title: 'Introduction', paragraphs: ['First paragraph continued here', 'Second paragraph'] },
      { title: 'Final Recommendation', paragraphs: ['BUY with conviction'] },
    ]);
  });

  it('accepts a colon after the closing marker', () => {
    expect(splitAnalysisSections('**Outlook**: steady')).toEqual([
      { title: 'Outlook', paragraphs: ['steady'] },
    ]);
  });

  it('returns nothing for empty text', () => {
    expect(splitAnalysisSections('')).toEqual([]);
  });
});

describe('buildAnalysisReportData', () => {
  const base = {
    symbol: 'aapl',
    companyName: 'Apple Inc.',
    periodDays: 28,
    analysis: '**Final Recommendation:** HOLD',
    predictions: 'FUTURE PREDICTIONS:\n- Day 1: $150.00\n- Day 2: $151.25\n',
    articleCount: 12,
    generatedAt: new Date(2024, 2, 15, 9, 5, 0),
  };

  it('fills every block from the analysis inputs', () => {
    const data = buildAnalysisReportData({
      ...base,
      recommendation: 'HOLD',
      indicators: {
        firstPrice: 100,
        lastPrice: 110,
        trendPct: 10,
        volatility: 18.25,
        avgVolume: 1234567.4,
        rsi: 55.5,
        ma7: null,
        periodStart: '2024-02-16',
        periodEnd: '2024-03-15',
      },
      newsStats: { daysFromCache: 20, daysFromRemote: 5, daysWithNoNews: 4 },
    });

    expect(data.symbol).toBe('AAPL');
    expect(data.generatedAt).toBe('2024-03-15 09:05');
    expect(data.periodLabel).toBe('2024-02-16 to 2024-03-15 (28 days)');
    expect(data.recommendationTone).toBe('mid');
    expect(data.indicatorRows).toEqual([
      { label: 'Initial price', value: '$100.00' },
      { label: 'Final price', value: '$110.00' },
      { label: 'Change', value: '10.00%' },
      { label: 'Volatility (annualized)', value: '18.25%' },
      { label: 'Average volume', value: '1,234,567' },
      { label: 'RSI (14)', value: '55.50' },
      { label: 'MA (7)', value: 'n/a' },
    ]);
    expect(data.predictionLines).toEqual(['- Day 1: $150.00', '- Day 2: $151.25']);
    expect(data.newsStatsRows).toEqual([
      { label: 'Days from cache', value: '20' },
      { label: 'Days from News API', value: '5' },
      { label: 'Days without news', value: '4' },
      { label: 'Articles analyzed', value: '12' },
    ]);
    expect(data.sections).toEqual([{ title: 'Final Recommendation', paragraphs: ['HOLD'] }]);
  });

  it('marks missing data', () => {
    const data = buildAnalysisReportData({
      ...base,
      recommendation: 'N/A',
      indicators: null,
      predictions: null,
      newsStats: null,
    });

    expect(data.periodLabel).toBe('Last 28 days');
    expect(data.recommendationTone).toBe('none');
    expect(data.indicatorRows).toEqual([{ label: 'Price data', value: 'Not available' }]);
    expect(data.predictionLines).toEqual([]);
    expect(data.newsStatsRows).toEqual([{ label: 'News statistics', value: 'Not available' }]);
  });
});
