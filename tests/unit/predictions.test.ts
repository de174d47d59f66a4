import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  formatPredictions,
  parsePredictionCsv,
  PredictionIntegration,
} from '@/predictions/integration';
import type { ScriptRunner } from '@/utils/python';

describe('parsePredictionCsv', () => {
  it('numbers rows of a single predicted column', () => {
    expect(parsePredictionCsv('predicted\n101.5\nabc\n\n103\n')).toEqual([
      { date: 'Day 1', prediction: 101.5 },
      { date: 'Day 3', prediction: 103 },
    ]);
  });

  it('reads date and prediction rows', () => {
    expect(parsePredictionCsv('date,prediction\r\n2024-03-18,190.123\r\n2024-03-19,\r\nlonely\r\n')).toEqual([
      { date: '2024-03-18', prediction: 190.123 },
      { date: '2024-03-19', prediction: 0 },
    ]);
  });
});

describe('formatPredictions', () => {
  it('lists each point with two decimals', () => {
    expect(
      formatPredictions([
        { date: 'Day 1', prediction: 101.5 },
        { date: 'Day 2', prediction: 99.999 },
      ])
    ).toBe('FUTURE PREDICTIONS:\n- Day 1: $101.50\n- Day 2: $100.00\n');
  });

  it('reports when there is nothing to list', () => {
    expect(formatPredictions([])).toBe('No prediction data available.');
  });
});

describe('PredictionIntegration', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'predictions-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('is unavailable without a configured path', async () => {
    const runner = vi.fn<ScriptRunner>();
    const integration = new PredictionIntegration(null, runner);
    expect(integration.isAvailable).toBe(false);
    expect(await integration.getPredictions('AAPL')).toBeNull();
    expect(runner).not.toHaveBeenCalled();
  });

  it('is unavailable without config.json', () => {
    writeFileSync(join(tempDir, 'main.py'), '');
    expect(new PredictionIntegration(tempDir, vi.fn<ScriptRunner>()).isAvailable).toBe(false);
  });

  it('runs the scripts and formats the CSV named in config.json', async () => {
    writeFileSync(join(tempDir, 'main.py'), '');
    writeFileSync(join(tempDir, 'download_dataset.py'), '');
    writeFileSync(join(tempDir, 'out.csv'), 'predicted\n150\n151.25\n');
    writeFileSync(
      join(tempDir, 'config.json'),
      JSON.stringify({ prediction: { last_csv: 'out.csv' } })
    );
    const runner = vi.fn<ScriptRunner>().mockResolvedValue({ stdout: 'done', stderr: '' });

    const integration = new PredictionIntegration(tempDir, runner);
    const result = await integration.getPredictions('AAPL');

    expect(result).toBe('FUTURE PREDICTIONS:\n- Day 1: $150.00\n- Day 2: $151.25\n');
    expect(runner).toHaveBeenCalledTimes(2);
    expect(runner.mock.calls[0][1]).toEqual([join(tempDir, 'download_dataset.py')]);
    expect(runner.mock.calls[1][1]).toEqual([
      join(tempDir, 'main.py'),
      '--mode',
      'predict',
      '--symbol',
      'AAPL',
    ]);
    expect(runner.mock.calls[1][2].cwd).toBe(tempDir);
  });

  it('continues when the dataset download fails but stops when prediction fails', async () => {
    writeFileSync(join(tempDir, 'main.py'), '');
    writeFileSync(join(tempDir, 'download_dataset.py'), '');
    writeFileSync(join(tempDir, 'config.json'), '{}');
    const runner = vi
      .fn<ScriptRunner>()
      .mockRejectedValueOnce(new Error('download failed'))
      .mockRejectedValueOnce(new Error('predict failed'));

    const result = await new PredictionIntegration(tempDir, runner).getPredictions('AAPL');

    expect(result).toBeNull();
    expect(runner).toHaveBeenCalledTimes(2);
  });

  it('returns null when config.json names no CSV', async () => {
    writeFileSync(join(tempDir, 'main.py'), '');
    writeFileSync(join(tempDir, 'config.json'), JSON.stringify({ prediction: {} }));
    const runner = vi.fn<ScriptRunner>().mockResolvedValue({ stdout: '', stderr: '' });

    const result = await new PredictionIntegration(tempDir, runner).getPredictions('AAPL');

    expect(result).toBeNull();
    expect(runner).toHaveBeenCalledTimes(1);
  });
});
