/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

export interface EnvConfig {
  newsApiKey: string;
  togetherApiKey: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  nodeEnv: 'development' | 'production' | 'test';
}

export class MissingEnvError extends Error {
  constructor(public readonly variable: string, public readonly hint: string) {
    super(`Missing required environment variable: ${variable}`);
    this.name = 'MissingEnvError';
  }
}

const LOG_LEVELS: EnvConfig['logLevel'][] = ['debug', 'info', 'warn', 'error'];
const NODE_ENVS: EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function requireEnvVar(name: string, hint: string): string {
  const value = getEnvVar(name);
  if (!value) {
    throw new MissingEnvError(name, hint);
  }
  return value;
}

export function loadEnvConfig(): EnvConfig {
  const newsApiKey = requireEnvVar(
    'NEWS_API_KEY',
    'API key for News API not found. Set NEWS_API_KEY in the .env file'
  );
  const togetherApiKey = requireEnvVar(
    'TOGETHER_API_KEY',
    'API key for Together API not found. Set TOGETHER_API_KEY in the .env file'
  );

  const logLevelRaw = getEnvVar('LOG_LEVEL') ?? 'info';
  const logLevel = LOG_LEVELS.find((level) => level === logLevelRaw) ?? 'info';

  const nodeEnvRaw = getEnvVar('NODE_ENV') ?? 'development';
  const nodeEnv = NODE_ENVS.find((env) => env === nodeEnvRaw) ?? 'development';

  return {
    newsApiKey,
    togetherApiKey,
    logLevel,
    nodeEnv,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
