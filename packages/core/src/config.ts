/**
 * Environment configuration. Everything the pipeline needs is read here once
 * and handed to it as plain values; pipeline classes never touch process.env.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

export const DEFAULT_LLM_BASE_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_LLM_MODEL = 'llama-3.3-70b-versatile';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const envSchema = z.object({
  SERPAPI_KEY: z.string().optional(),
  LLM_API_KEY: z.string().optional(),
  GROQ_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default(DEFAULT_LLM_BASE_URL),
  LLM_MODEL: z.string().min(1).default(DEFAULT_LLM_MODEL),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_TOKENS: positiveInt(1000),
  LLM_TIMEOUT_MS: positiveInt(60_000),
  MAX_SEARCH_RESULTS: positiveInt(5),
  BATCH_SEARCH_SIZE: positiveInt(10),
  RETRY_ATTEMPTS: positiveInt(3),
  MIN_REQUEST_INTERVAL_MS: nonNegativeInt(2000),
  BATCH_PAUSE_MS: nonNegativeInt(2000),
  FAILURE_PAUSE_MS: nonNegativeInt(5000),
  PAGE_FETCH_TIMEOUT_MS: positiveInt(10_000),
  PAGE_CONTENT_MAX_CHARS: positiveInt(5000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface SearchConfig {
  apiKey: string;
  maxResults: number;
  retryAttempts: number;
  pageTimeoutMs: number;
  maxContentChars: number;
}

export interface LlmConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  minRequestIntervalMs: number;
  maxRetries: number;
}

export interface BatchConfig {
  batchSize: number;
  batchPauseMs: number;
  failurePauseMs: number;
}

export interface AppConfig {
  search: SearchConfig;
  llm: LlmConfig;
  batch: BatchConfig;
  logLevel: LogLevel;
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim();
    if (trimmed) out[key] = trimmed;
  }
  return out;
}

/**
 * Validate the environment. Throws a single ConfigError naming every missing
 * credential, or describing the first invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  const llmApiKey = vars.LLM_API_KEY ?? vars.GROQ_API_KEY;
  const missing: string[] = [];
  if (!vars.SERPAPI_KEY) missing.push('SERPAPI_KEY');
  if (!llmApiKey) missing.push('LLM_API_KEY');
  if (!vars.SERPAPI_KEY || !llmApiKey) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(', ')}`,
      missing,
    );
  }

  return {
    search: {
      apiKey: vars.SERPAPI_KEY,
      maxResults: vars.MAX_SEARCH_RESULTS,
      retryAttempts: vars.RETRY_ATTEMPTS,
      pageTimeoutMs: vars.PAGE_FETCH_TIMEOUT_MS,
      maxContentChars: vars.PAGE_CONTENT_MAX_CHARS,
    },
    llm: {
      apiKey: llmApiKey,
      baseUrl: vars.LLM_BASE_URL,
      model: vars.LLM_MODEL,
      temperature: vars.LLM_TEMPERATURE,
      maxTokens: vars.LLM_MAX_TOKENS,
      timeoutMs: vars.LLM_TIMEOUT_MS,
      minRequestIntervalMs: vars.MIN_REQUEST_INTERVAL_MS,
      maxRetries: vars.RETRY_ATTEMPTS,
    },
    batch: {
      batchSize: vars.BATCH_SEARCH_SIZE,
      batchPauseMs: vars.BATCH_PAUSE_MS,
      failurePauseMs: vars.FAILURE_PAUSE_MS,
    },
    logLevel: vars.LOG_LEVEL,
  };
}
