/**
 * RunContext: composition root for one pricing run.
 *
 * Everything with run lifetime (alias table, catalog index, canonicalizer
 * memo, price cache) hangs off this object instead of module state, so two
 * runs never share prices and tests can swap in an in-process market.
 */

import type { AppConfig } from '../config';
import { AliasTable } from '../aliases/AliasTable';
import { MarketClient } from '../pricing/MarketClient';
import { PriceCache } from '../pricing/PriceCache';
import type { Catalog, PriceResolver } from '../pricing/types';
import { Canonicalizer } from '../resolution/Canonicalizer';
import { createLogger, type Logger } from '../utils/logger';
import { RetryPolicy } from '../utils/retryPolicy';

export interface RunContext {
  config: AppConfig;
  logger: Logger;
  aliases: AliasTable;
  catalog: Catalog;
  canonicalizer: Canonicalizer;
  priceCache: PriceCache;
  close(): void;
}

export interface RunContextOverrides {
  aliases?: AliasTable;
  catalog?: Catalog;
  priceResolver?: PriceResolver;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
}

export function createLookupRetryPolicy(config: AppConfig): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: config.pricing.maxAttempts,
    initialDelay: config.pricing.initialDelayMs,
    maxDelay: config.pricing.maxDelayMs,
    factor: 2,
    jitter: true,
  });
}

export async function createRunContext(config: AppConfig, overrides: RunContextOverrides = {}): Promise<RunContext> {
  const logger = overrides.logger ?? createLogger('pipeline');
  const aliases = overrides.aliases ?? (await AliasTable.load(config.aliasTablePath));

  let market: MarketClient | undefined;
  const getMarket = (): MarketClient => {
    if (!market) market = new MarketClient(config.market);
    return market;
  };

  const catalog = overrides.catalog ?? getMarket();
  const priceResolver = overrides.priceResolver ?? getMarket();
  const retryPolicy = overrides.retryPolicy ?? createLookupRetryPolicy(config);

  const canonicalizer = new Canonicalizer(aliases, catalog);
  const priceCache = new PriceCache(priceResolver, retryPolicy);

  return {
    config,
    logger,
    aliases,
    catalog,
    canonicalizer,
    priceCache,
    close: () => priceCache.close(),
  };
}
