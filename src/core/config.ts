/**
 * Configuration Management
 * Loads and validates configuration from environment variables
 */

import { z } from 'zod';
import 'dotenv/config';
import { SdkError } from './errors.js';

/** Unset and blank (`KEY=`) variables both mean "not configured" */
const optionalSecret = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

const envSchema = z.object({
  // OpenRouter (LLM scoring + embeddings)
  OPENROUTER_API_KEY: optionalSecret,
  SCORING_MODEL: z.string().min(1).default('google/gemini-2.5-flash-lite'),
  EMBEDDING_MODEL: z.string().min(1).default('qwen/qwen3-embedding-8b'),
  SCORING_CONCURRENCY: z.coerce.number().int().positive().default(8),

  // L2 credentials for authenticated CLOB calls
  POLY_API_KEY: optionalSecret,
  POLY_API_SECRET: optionalSecret,
  POLY_API_PASSPHRASE: optionalSecret,
  POLY_ADDRESS: optionalSecret,

  // General
  DATA_DIR: z.string().default('./data'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
});

export type Env = z.infer<typeof envSchema>;

export interface Config {
  openRouter: {
    apiKey?: string;
    scoringModel: string;
    embeddingModel: string;
    scoringConcurrency: number;
  };

  polymarket: {
    apiKey?: string;
    apiSecret?: string;
    apiPassphrase?: string;
    address?: string;
    requestTimeoutMs: number;
  };

  dataDir: string;
}

let configInstance: Config | null = null;

/**
 * Load and validate configuration
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw SdkError.config(`Configuration validation failed:\n${errors}`);
  }

  const env = parseResult.data;

  return {
    openRouter: {
      apiKey: env.OPENROUTER_API_KEY,
      scoringModel: env.SCORING_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
      scoringConcurrency: env.SCORING_CONCURRENCY,
    },

    polymarket: {
      apiKey: env.POLY_API_KEY,
      apiSecret: env.POLY_API_SECRET,
      apiPassphrase: env.POLY_API_PASSPHRASE,
      address: env.POLY_ADDRESS,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    },

    dataDir: env.DATA_DIR,
  };
}

/**
 * Get configuration (lazy-loaded singleton)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Helper to require a configured value
 */
export function requireEnv(name: string, value: string | undefined): string {
  if (!value) {
    throw SdkError.config(`Missing required environment variable: ${name}`);
  }
  return value;
}
