/**
 * Application configuration loaded from config/config.json
 *
 * The file is split into sections (general, yahoo_finance, together_ai, news_api).
 * A file without any of those sections is read as a flat key/value map. Each key
 * is validated against schemas/config.v1.schema.json; an invalid value is
 * reported and replaced by its default while the rest of the file still applies.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { isPlainObject } from '@/utils/guards';
import { createChildLogger } from '@/utils/logger';
import { formatValidationErrors, getConfigValidator } from '@/validation/ajv_instance';
import {
  CONFIG_SECTIONS,
  type ConfigFile,
  type GeneralSection,
  type NewsApiSection,
  type TogetherAiSection,
} from './config_types';

const logger = createChildLogger('config');

export type AppConfig = GeneralSection &
  TogetherAiSection &
  NewsApiSection & {
    projectRoot: string;
  };

export const DEFAULT_CONFIG_FILE: ConfigFile = {
  general: {
    stock_symbol: 'AAPL',
    analysis_period_days: 28,
    prediction_path: null,
  },
  yahoo_finance: {},
  together_ai: {
    together_model: 'meta-llama/Llama-3.3-70B-Instruct-Turbo-Free',
    together_max_tokens: 2048,
    together_temperature: 0.3,
    together_top_p: 0.9,
    together_top_k: 40,
    together_repetition_penalty: 1.0,
    investment_horizon: 'medium term',
    output_language: 'english',
  },
  news_api: {
    max_news_articles: null,
    max_articles_per_day: 5,
    news_api_language: 'en',
    news_api_sort_by: 'relevancy',
    news_api_page_size: 100,
    news_api_query_suffix: '',
    news_api_refresh_no_news: false,
    news_api_refresh_articles: false,
  },
};

let cachedConfig: AppConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return join(projectRoot, 'config', 'config.json');
}

function toAppConfig(file: ConfigFile, projectRoot: string): AppConfig {
  const { general, together_ai: together, news_api: news } = file;
  return {
    stock_symbol: general.stock_symbol.trim().toUpperCase(),
    analysis_period_days: general.analysis_period_days,
    prediction_path: general.prediction_path,
    together_model: together.together_model,
    together_max_tokens: together.together_max_tokens,
    together_temperature: together.together_temperature,
    together_top_p: together.together_top_p,
    together_top_k: together.together_top_k,
    together_repetition_penalty: together.together_repetition_penalty,
    investment_horizon: together.investment_horizon,
    output_language: together.output_language,
    max_news_articles: news.max_news_articles,
    max_articles_per_day: news.max_articles_per_day,
    news_api_language: news.news_api_language,
    news_api_sort_by: news.news_api_sort_by,
    news_api_page_size: news.news_api_page_size,
    news_api_query_suffix: news.news_api_query_suffix,
    news_api_refresh_no_news: news.news_api_refresh_no_news,
    news_api_refresh_articles: news.news_api_refresh_articles,
    projectRoot,
  };
}

export function getDefaultConfig(projectRoot: string = getProjectRoot()): AppConfig {
  return toAppConfig(structuredClone(DEFAULT_CONFIG_FILE), projectRoot);
}

/**
 * Splits the raw file into sections. Legacy flat files are copied into every
 * section so each key is picked up by the section that owns it.
 */
function toSections(raw: Record<string, unknown>): Record<string, unknown> {
  const structured = CONFIG_SECTIONS.some((name) => {
    const section = raw[name];
    return isPlainObject(section) && Object.keys(section).length > 0;
  });

  if (!structured) {
    logger.debug('Configuration file has no sections, reading it as flat');
    return {
      general: { ...raw },
      yahoo_finance: {},
      together_ai: { ...raw },
      news_api: { ...raw },
    };
  }

  const sections: Record<string, unknown> = {};
  for (const name of CONFIG_SECTIONS) {
    const section = raw[name];
    sections[name] = isPlainObject(section) ? { ...section } : section ?? {};
  }
  return sections;
}

function defaultValueFor(section: string, key: string): unknown {
  for (const [name, values] of Object.entries(DEFAULT_CONFIG_FILE)) {
    if (name !== section) continue;
    for (const [candidate, value] of Object.entries(values)) {
      if (candidate === key) return value;
    }
  }
  return undefined;
}

/**
 * Validates the sections, dropping every invalid key so that the schema
 * defaults take its place on the second pass.
 */
function validateSections(candidate: Record<string, unknown>): ConfigFile | null {
  const validate = getConfigValidator();
  if (validate(candidate)) {
    return candidate;
  }

  for (const error of validate.errors ?? []) {
    const [section, key] = error.instancePath.split('/').slice(1);
    if (!section) continue;

    if (key === undefined) {
      logger.warn(
        { section, reason: error.message },
        'Invalid configuration section, using default values'
      );
      candidate[section] = {};
      continue;
    }

    const sectionValue = candidate[section];
    if (isPlainObject(sectionValue) && key in sectionValue) {
      logger.warn(
        {
          key,
          value: sectionValue[key],
          reason: error.message,
          default: defaultValueFor(section, key),
        },
        'Invalid value in configuration file, using default value'
      );
      delete sectionValue[key];
    }
  }

  if (validate(candidate)) {
    return candidate;
  }

  logger.error(
    { errors: formatValidationErrors(validate.errors) },
    'Configuration could not be repaired, using default values'
  );
  return null;
}

export function createDefaultConfig(configPath: string = getConfigPath()): void {
  try {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG_FILE, null, 4) + '\n', 'utf-8');
    logger.info({ configPath }, 'Default configuration file created');
  } catch (error) {
    logger.error({ configPath, error }, 'Error while creating default configuration file');
  }
}

export function loadConfig(): AppConfig {
  const projectRoot = getProjectRoot();
  const configPath = getConfigPath(projectRoot);

  if (!existsSync(configPath)) {
    logger.info({ configPath }, 'Configuration file not found, using default values');
    createDefaultConfig(configPath);
    return getDefaultConfig(projectRoot);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.error({ configPath, error }, 'Error while loading configuration, using default values');
    return getDefaultConfig(projectRoot);
  }

  if (!isPlainObject(raw)) {
    logger.error({ configPath }, 'Configuration file must contain a JSON object, using default values');
    return getDefaultConfig(projectRoot);
  }

  const file = validateSections(toSections(raw));
  if (!file) {
    return getDefaultConfig(projectRoot);
  }

  const config = toAppConfig(file, projectRoot);
  logger.info(
    { symbol: config.stock_symbol, model: config.together_model },
    'Configuration successfully loaded from file'
  );
  return config;
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
