/**
 * External price-prediction program
 *
 * The program lives in its own directory with `main.py`, an optional
 * `download_dataset.py` and a `config.json` whose `prediction.last_csv` names
 * the CSV written by the last prediction run.
 */

import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { isPlainObject } from '@/utils/guards';
import { createChildLogger } from '@/utils/logger';
import { resolvePythonExecutable, runPythonScript, type ScriptRunner } from '@/utils/python';

const logger = createChildLogger('predictions');

const SCRIPT_TIMEOUT_MS = 10 * 60 * 1000;

export interface PredictionPoint {
  date: string;
  prediction: number;
}

function splitCsvLine(line: string): string[] {
  return line.split(',').map((cell) => cell.trim());
}

/**
 * Two layouts are accepted: a single `predicted` column (rows become
 * `Day 1`, `Day 2`, ...) or `date,prediction` rows.
 */
export function parsePredictionCsv(content: string): PredictionPoint[] {
  const lines = content.split(/\r?\n/);
  const header = splitCsvLine(lines[0] ?? '');
  const rows = lines.slice(1).filter((line) => line.trim() !== '');
  const points: PredictionPoint[] = [];

  if (header.length === 1 && header[0].toLowerCase() === 'predicted') {
    logger.debug('Detected single predicted column');
    rows.forEach((line, index) => {
      const [cell] = splitCsvLine(line);
      const value = Number(cell);
      if (cell === '' || !Number.isFinite(value)) {
        logger.warn({ value: cell }, 'Unable to convert prediction value to a number');
        return;
      }
      points.push({ date: `Day ${index + 1}`, prediction: value });
    });
    return points;
  }

  for (const line of rows) {
    const cells = splitCsvLine(line);
    if (cells.length < 2) continue;
    const value = cells[1] === '' ? 0 : Number(cells[1]);
    if (!Number.isFinite(value)) {
      logger.warn({ value: cells[1] }, 'Unable to convert prediction value to a number');
      continue;
    }
    points.push({ date: cells[0], prediction: value });
  }
  return points;
}

export function formatPredictions(points: PredictionPoint[]): string {
  if (points.length === 0) {
    return 'No prediction data available.';
  }
  const lines = points.map((point) => `- ${point.date}: $${point.prediction.toFixed(2)}`);
  return `FUTURE PREDICTIONS:\n${lines.join('\n')}\n`;
}

export class PredictionIntegration {
  readonly isAvailable: boolean;
  private readonly mainScript: string;
  private readonly downloadScript: string;
  private readonly configPath: string;

  constructor(
    private readonly predictionPath: string | null,
    private readonly runScript: ScriptRunner = runPythonScript
  ) {
    const root = predictionPath ?? '';
    this.mainScript = path.join(root, 'main.py');
    this.downloadScript = path.join(root, 'download_dataset.py');
    this.configPath = path.join(root, 'config.json');
    this.isAvailable = this.checkAvailability();
  }

  private checkAvailability(): boolean {
    if (!this.predictionPath) {
      logger.info('No prediction program configured');
      return false;
    }
    if (!existsSync(this.predictionPath)) {
      logger.warn({ path: this.predictionPath }, 'Prediction program path does not exist');
      return false;
    }
    if (!existsSync(this.mainScript)) {
      logger.warn({ path: this.mainScript }, 'Prediction main script does not exist');
      return false;
    }
    if (!existsSync(this.downloadScript)) {
      logger.warn(
        { path: this.downloadScript },
        'Dataset download script does not exist, predictions will use existing data'
      );
    }
    if (!existsSync(this.configPath)) {
      logger.warn({ path: this.configPath }, 'Prediction configuration file does not exist');
      return false;
    }
    logger.info({ path: this.predictionPath }, 'Prediction program available');
    return true;
  }

  private async run(args: string[]): Promise<boolean> {
    const cwd = this.predictionPath ?? process.cwd();
    const python = resolvePythonExecutable([cwd, process.cwd()]);
    try {
      const result = await this.runScript(python, args, { cwd, timeoutMs: SCRIPT_TIMEOUT_MS });
      logger.debug({ script: args[0], output: result.stdout.trim() }, 'Script finished');
      return true;
    } catch (error) {
      logger.error({ script: args[0], error }, 'Error while running prediction script');
      return false;
    }
  }

  async downloadDataset(): Promise<boolean> {
    if (!existsSync(this.downloadScript)) {
      logger.warn('Download script not available, skipping dataset update');
      return true;
    }
    logger.info('Downloading updated dataset');
    return this.run([this.downloadScript]);
  }

  async runPrediction(symbol: string): Promise<boolean> {
    logger.info({ symbol }, 'Running prediction program');
    return this.run([this.mainScript, '--mode', 'predict', '--symbol', symbol]);
  }

  getPredictionFile(): string | null {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      logger.error({ path: this.configPath, error }, 'Error while reading prediction configuration');
      return null;
    }

    const prediction = isPlainObject(raw) ? raw.prediction : undefined;
    const csvPath = isPlainObject(prediction) ? prediction.last_csv : undefined;
    if (typeof csvPath !== 'string' || csvPath.trim() === '') {
      logger.error("Configuration 'prediction.last_csv' not found");
      return null;
    }

    const resolved = path.resolve(this.predictionPath ?? process.cwd(), csvPath);
    if (!existsSync(resolved)) {
      logger.error({ path: resolved }, 'Prediction file named in configuration does not exist');
      return null;
    }
    return resolved;
  }

  /** Formatted predictions for the prompt, or null when none could be produced. */
  async getPredictions(symbol: string): Promise<string | null> {
    if (!this.isAvailable) {
      logger.warn('Prediction program not available, continuing without predictions');
      return null;
    }

    if (!(await this.downloadDataset())) {
      logger.warn('Unable to download updated dataset, continuing with existing data');
    }

    if (!(await this.runPrediction(symbol))) {
      return null;
    }

    const csvPath = this.getPredictionFile();
    if (!csvPath) return null;

    let points: PredictionPoint[];
    try {
      points = parsePredictionCsv(readFileSync(csvPath, 'utf-8'));
    } catch (error) {
      logger.error({ path: csvPath, error }, 'Error while reading prediction file');
      return null;
    }

    if (points.length === 0) {
      logger.error({ path: csvPath }, 'No prediction data read from file');
      return null;
    }

    logger.info({ symbol, points: points.length }, 'Predictions ready');
    return formatPredictions(points);
  }
}
