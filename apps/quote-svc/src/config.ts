import { config as loadEnv } from 'dotenv';

export interface ExtractionConfig {
  apiKey?: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  cacheTtlSeconds: number;
}

export interface ServiceConfig {
  port: number;
  corsOrigin: string;
  redisUrl?: string;
  extraction: ExtractionConfig;
}

const DEFAULT_PORT = 8012;
const DEFAULT_MODEL = 'gpt-4';
const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_CACHE_TTL_SECONDS = 3600;

function positiveNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const optional = (value: string | undefined) => (value && value.trim() ? value.trim() : undefined);

/**
 * Reads service settings from the environment. `.env` is loaded the first
 * time the default environment is used.
 */
export function loadConfig(env: NodeJS.ProcessEnv = loadDotenv()): ServiceConfig {
  return {
    port: positiveNumber(env.PORT, DEFAULT_PORT),
    corsOrigin: env.CORS_ORIGIN || '*',
    redisUrl: optional(env.REDIS_URL),
    extraction: {
      apiKey: optional(env.OPENAI_API_KEY),
      model: env.OPENAI_MODEL || DEFAULT_MODEL,
      baseUrl: (env.OPENAI_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, ''),
      timeoutMs: positiveNumber(env.EXTRACTION_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
      cacheTtlSeconds: positiveNumber(env.EXTRACTION_CACHE_TTL_SECONDS, DEFAULT_CACHE_TTL_SECONDS)
    }
  };
}

function loadDotenv(): NodeJS.ProcessEnv {
  loadEnv();
  return process.env;
}
