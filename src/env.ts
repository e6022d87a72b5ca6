// Environment configuration for the Research Desk API
// Load model credentials, tool switches and loop limits from environment variables

import { logger } from './utils/logger.js';

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    logger.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    logger.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseTemperature(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 2) {
    logger.error(`Invalid MODEL_TEMPERATURE "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  DATABASE_PATH: strEnv(process.env.DATABASE_PATH, './data/research-desk.db'),

  // Language model
  LLM_PROVIDER: strEnv(process.env.LLM_PROVIDER, 'openai').toLowerCase(),
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),
  OPENAI_MODEL: strEnv(process.env.OPENAI_MODEL, 'gpt-4o-mini'),
  DEEPSEEK_API_KEY: strEnv(process.env.DEEPSEEK_API_KEY),
  DEEPSEEK_MODEL: strEnv(process.env.DEEPSEEK_MODEL, 'deepseek-chat'),
  EMBEDDING_MODEL: strEnv(process.env.EMBEDDING_MODEL, 'text-embedding-3-small'),
  MODEL_TEMPERATURE: parseTemperature(process.env.MODEL_TEMPERATURE, 0),
  MODEL_MAX_RETRIES: parsePositiveInt(process.env.MODEL_MAX_RETRIES, 2, 'MODEL_MAX_RETRIES'),

  // Orchestration
  MAX_TOOL_ROUNDS: parsePositiveInt(process.env.MAX_TOOL_ROUNDS, 6, 'MAX_TOOL_ROUNDS'),
  MAX_WEB_SOURCES: parsePositiveInt(process.env.MAX_WEB_SOURCES, 3, 'MAX_WEB_SOURCES'),
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 30000, 'TOOL_TIMEOUT_MS'),
  DOCUMENT_SEARCH_RESULTS: parsePositiveInt(process.env.DOCUMENT_SEARCH_RESULTS, 5, 'DOCUMENT_SEARCH_RESULTS'),

  // Features
  TOOLS_ENABLED: process.env.TOOLS_ENABLED !== 'false', // Default true
  WEB_SEARCH_ENABLED: process.env.WEB_SEARCH_ENABLED === 'true',
  BRAVE_SEARCH_API_KEY: process.env.BRAVE_SEARCH_API_KEY || '',
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'openai':
      return !!env.OPENAI_API_KEY;
    case 'deepseek':
      return !!env.DEEPSEEK_API_KEY;
    default:
      return false;
  }
}

export function listConfiguredProviders(): string[] {
  const providers = ['openai', 'deepseek'];
  return providers.filter(isProviderConfigured);
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  const configured = listConfiguredProviders();
  logger.info(
    {
      environment: env.NODE_ENV,
      server: `${env.HOST}:${env.PORT}`,
      database: env.DATABASE_PATH,
      provider: env.LLM_PROVIDER,
      configuredProviders: configured,
      toolsEnabled: env.TOOLS_ENABLED,
      webSearchEnabled: env.WEB_SEARCH_ENABLED && !!env.BRAVE_SEARCH_API_KEY,
      maxToolRounds: env.MAX_TOOL_ROUNDS,
      maxWebSources: env.MAX_WEB_SOURCES,
    },
    'Research Desk API configuration',
  );
  if (configured.length === 0) {
    logger.warn('No language model provider configured - chat turns will fail until an API key is set');
  }
}
