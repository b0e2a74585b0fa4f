import path from 'path';
import { z } from 'zod';
import { MarketPlatformSchema, type MarketPlatform } from './schemas/market';
import { FatalError } from './utils/errors';

export const DEFAULT_ALIAS_TABLE_PATH = path.resolve(__dirname, '../data/aliases.json');

const envSchema = z.object({
  MARKET_API_BASE_URL: z.string().url().default('https://api.warframe.market/v1'),
  MARKET_PLATFORM: MarketPlatformSchema.default('pc'),
  MARKET_LANGUAGE: z.string().min(2).default('en'),
  MARKET_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  // Public API allows roughly three requests per second
  MARKET_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(350),
  PRICE_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  PRICE_RUN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  LOOKUP_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  LOOKUP_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  LOOKUP_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(5000),
  ALIAS_TABLE_PATH: z.string().min(1).default(DEFAULT_ALIAS_TABLE_PATH),
  // Applied by the logger at startup
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface MarketConfig {
  baseUrl: string;
  platform: MarketPlatform;
  language: string;
  timeoutMs: number;
  requestDelayMs: number;
}

export interface PricingConfig {
  concurrency: number;
  runTimeoutMs?: number;
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  market: MarketConfig;
  pricing: PricingConfig;
  aliasTablePath: string;
}

/**
 * Reads configuration from the environment. Empty strings count as unset so
 * that a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = envSchema.safeParse(cleaned);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new FatalError(`Invalid environment variables: ${problems.join('; ')}`, { problems });
  }

  const e = parsed.data;

  if (e.LOOKUP_MAX_DELAY_MS < e.LOOKUP_INITIAL_DELAY_MS) {
    throw new FatalError('LOOKUP_MAX_DELAY_MS must not be smaller than LOOKUP_INITIAL_DELAY_MS');
  }

  return {
    market: {
      baseUrl: e.MARKET_API_BASE_URL.replace(/\/+$/, ''),
      platform: e.MARKET_PLATFORM,
      language: e.MARKET_LANGUAGE,
      timeoutMs: e.MARKET_TIMEOUT_MS,
      requestDelayMs: e.MARKET_REQUEST_DELAY_MS,
    },
    pricing: {
      concurrency: e.PRICE_CONCURRENCY,
      runTimeoutMs: e.PRICE_RUN_TIMEOUT_MS,
      maxAttempts: e.LOOKUP_MAX_ATTEMPTS,
      initialDelayMs: e.LOOKUP_INITIAL_DELAY_MS,
      maxDelayMs: e.LOOKUP_MAX_DELAY_MS,
    },
    aliasTablePath: e.ALIAS_TABLE_PATH,
  };
}
