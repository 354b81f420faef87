// Environment configuration for the finance assistant
// Load all provider credentials and engine settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseRatio(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  defaultValue: T,
  name: string,
): T {
  const normalized = strEnv(value).toLowerCase();
  if (!normalized) return defaultValue;
  const match = choices.find(choice => choice === normalized);
  if (!match) {
    console.error(`Invalid ${name} "${value}", expected one of ${choices.join('|')}; using ${defaultValue}`);
    return defaultValue;
  }
  return match;
}

export const LLM_PROVIDERS = ['deepseek', 'openai', 'none'] as const;
export type LlmProviderName = (typeof LLM_PROVIDERS)[number];

export const EMBEDDING_PROVIDERS = ['openai', 'local'] as const;
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),

  // Data
  DATABASE_PATH: strEnv(process.env.DATABASE_PATH, './db/finance.db'),
  POLICY_DIR: strEnv(process.env.POLICY_DIR),

  // Language generation
  LLM_PROVIDER: parseChoice(process.env.LLM_PROVIDER, LLM_PROVIDERS, 'none', 'LLM_PROVIDER'),
  LLM_MODEL: strEnv(process.env.LLM_MODEL),
  DEEPSEEK_API_KEY: strEnv(process.env.DEEPSEEK_API_KEY),
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),

  // Retrieval
  EMBEDDING_PROVIDER: parseChoice(process.env.EMBEDDING_PROVIDER, EMBEDDING_PROVIDERS, 'local', 'EMBEDDING_PROVIDER'),
  RAG_TOP_K: parsePositiveInt(process.env.RAG_TOP_K, 3, 'RAG_TOP_K'),
  RAG_MIN_SIMILARITY: parseRatio(process.env.RAG_MIN_SIMILARITY, 0.2, 'RAG_MIN_SIMILARITY'),

  // Engine
  ASSISTANT_MAX_RETRIES: parsePositiveInt(process.env.ASSISTANT_MAX_RETRIES, 2, 'ASSISTANT_MAX_RETRIES'),
  ASSISTANT_MAX_STEPS: parsePositiveInt(process.env.ASSISTANT_MAX_STEPS, 8, 'ASSISTANT_MAX_STEPS'),
  ASSISTANT_STEP_TIMEOUT_MS: parsePositiveInt(process.env.ASSISTANT_STEP_TIMEOUT_MS, 10000, 'ASSISTANT_STEP_TIMEOUT_MS'),
  ASSISTANT_REQUEST_TIMEOUT_MS: parsePositiveInt(
    process.env.ASSISTANT_REQUEST_TIMEOUT_MS,
    60000,
    'ASSISTANT_REQUEST_TIMEOUT_MS',
  ),

  // Mail relay
  MAIL_WEBHOOK_URL: strEnv(process.env.MAIL_WEBHOOK_URL),
  MAIL_FROM: strEnv(process.env.MAIL_FROM, 'assistant@example.com'),
};

export interface EngineLimits {
  maxRetries: number;
  maxSteps: number;
  stepTimeoutMs: number;
}

// Explicit limits struct handed to the orchestrator at construction
export function engineLimitsFromEnv(): EngineLimits {
  return {
    maxRetries: env.ASSISTANT_MAX_RETRIES,
    maxSteps: Math.max(1, env.ASSISTANT_MAX_STEPS),
    stepTimeoutMs: Math.max(1, env.ASSISTANT_STEP_TIMEOUT_MS),
  };
}

export function isProviderConfigured(provider: LlmProviderName): boolean {
  switch (provider) {
    case 'deepseek':
      return !!env.DEEPSEEK_API_KEY;
    case 'openai':
      return !!env.OPENAI_API_KEY;
    default:
      return false;
  }
}

// Log configuration on startup (redact secrets)
export function logConfiguration(log: { info: (msg: string) => void }): void {
  log.info('Finance assistant configuration:');
  log.info(`  Environment: ${env.NODE_ENV}`);
  log.info(`  Server: ${env.HOST}:${env.PORT}`);
  log.info(`  Database: ${env.DATABASE_PATH}`);
  log.info(`  LLM provider: ${env.LLM_PROVIDER}${isProviderConfigured(env.LLM_PROVIDER) ? '' : ' (not configured)'}`);
  log.info(`  Embeddings: ${env.EMBEDDING_PROVIDER}`);
  log.info(`  Retrieval: top_k=${env.RAG_TOP_K} min_similarity=${env.RAG_MIN_SIMILARITY}`);
  log.info(
    `  Engine: max_retries=${env.ASSISTANT_MAX_RETRIES} max_steps=${env.ASSISTANT_MAX_STEPS} ` +
      `step_timeout_ms=${env.ASSISTANT_STEP_TIMEOUT_MS}`,
  );
  log.info(`  Mail relay: ${env.MAIL_WEBHOOK_URL ? 'configured' : 'disabled'}`);
}
