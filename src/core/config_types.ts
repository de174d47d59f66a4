/**
 * Shape of config/config.json after schema validation (defaults applied).
 */

export interface GeneralSection {
  stock_symbol: string;
  analysis_period_days: number;
  prediction_path: string | null;
}

export interface TogetherAiSection {
  together_model: string;
  together_max_tokens: number;
  together_temperature: number;
  together_top_p: number;
  together_top_k: number;
  together_repetition_penalty: number;
  investment_horizon: string;
  output_language: string;
}

export interface NewsApiSection {
  max_news_articles: number | null;
  max_articles_per_day: number | null;
  news_api_language: string;
  news_api_sort_by: string;
  news_api_page_size: number;
  news_api_query_suffix: string;
  news_api_refresh_no_news: boolean;
  news_api_refresh_articles: boolean;
}

export interface ConfigFile {
  general: GeneralSection;
  yahoo_finance: Record<string, unknown>;
  together_ai: TogetherAiSection;
  news_api: NewsApiSection;
}

export type ConfigSectionName = keyof ConfigFile;

export const CONFIG_SECTIONS: ConfigSectionName[] = [
  'general',
  'yahoo_finance',
  'together_ai',
  'news_api',
];
