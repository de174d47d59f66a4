import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { EMPTY_ANALYSIS_TEXT, StockAnalyst, type LlmSettings } from '@/llm/adapter';
import type { CompletionClient } from '@/llm/together_client';

const settings: LlmSettings = {
  together_model: 'test-model',
  together_max_tokens: 256,
  together_temperature: 0.3,
  together_top_p: 0.9,
  together_top_k: 40,
  together_repetition_penalty: 1,
  investment_horizon: 'medium term',
  output_language: 'english',
  max_news_articles: null,
};

let tempDir: string;

function clientReturning(text: string): CompletionClient {
  return { complete: vi.fn<CompletionClient['complete']>().mockResolvedValue(text) };
}

describe('StockAnalyst.analyze', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'llm-adapter-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  const input = {
    companyName: 'Apple Inc.',
    symbol: 'aapl',
    indicators: null,
    articles: [],
    predictions: null,
  };

  it('returns the trimmed analysis with its recommendation and saves both logs', async () => {
    const analyst = new StockAnalyst(clientReturning('  **Final Recommendation:** BUY \n'), settings);

    const result = await analyst.analyze({ ...input, reportDir: tempDir });

    expect(result).toEqual({
      company: 'Apple Inc.',
      symbol: 'aapl',
      analysis: '**Final Recommendation:** BUY',
      recommendation: 'BUY',
    });
    expect(readFileSync(join(tempDir, 'AAPL_response.log'), 'utf-8')).toBe('**Final Recommendation:** BUY');
    expect(readFileSync(join(tempDir, 'AAPL_prompt.log'), 'utf-8')).toContain('Apple Inc. (aapl)');
  });

  it('substitutes a fixed message for an empty completion', async () => {
    const analyst = new StockAnalyst(clientReturning('   '), settings);

    const result = await analyst.analyze(input);

    expect(result.analysis).toBe(EMPTY_ANALYSIS_TEXT);
    expect(result.recommendation).toBe('INDETERMINATE');
    expect(existsSync(join(tempDir, 'AAPL_prompt.log'))).toBe(false);
  });

  it('reports a failed call in the analysis text', async () => {
    const client: CompletionClient = {
      complete: vi.fn<CompletionClient['complete']>().mockRejectedValue(new Error('timeout')),
    };
    const analyst = new StockAnalyst(client, settings);

    const result = await analyst.analyze(input);

    expect(result.analysis).toBe('Error during analysis: timeout');
    expect(result.recommendation).toBe('N/A');
  });
});
