import NodeCache from 'node-cache';
import type { ItemCategory, PriceQuote } from '../types';
import { RetryPolicy } from '../utils/retryPolicy';
import { createLogger, type Logger } from '../utils/logger';
import type { PriceResolver } from './types';

export interface PriceCacheStats {
  hits: number;
  misses: number;
  keys: number;
}

/**
 * Run-scoped price memo keyed by canonical id.
 *
 * The first request for an id starts the lookup and stores its promise, so
 * concurrent and later requests share one external lookup. Failures are
 * stored as well: a lookup that exhausted its retries is not attempted again
 * in the same run.
 */
export class PriceCache {
  // stdTTL 0 and no check period: entries live exactly as long as the run
  private readonly cache = new NodeCache({ stdTTL: 0, checkperiod: 0, useClones: false });
  private readonly log: Logger;
  private lookups = 0;

  constructor(
    private readonly resolver: PriceResolver,
    private readonly retryPolicy: RetryPolicy = new RetryPolicy(),
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('price-cache');
  }

  get(itemId: string, category: ItemCategory): Promise<PriceQuote | null> {
    const cached = this.cache.get<Promise<PriceQuote | null>>(itemId);
    if (cached) {
      this.log.debug({ itemId }, 'Price cache hit');
      return cached;
    }

    const pending = this.lookup(itemId, category);
    this.cache.set(itemId, pending);
    return pending;
  }

  /** Number of external lookups started (one per distinct id). */
  get externalLookups(): number {
    return this.lookups;
  }

  stats(): PriceCacheStats {
    const { hits, misses, keys } = this.cache.getStats();
    return { hits, misses, keys };
  }

  close(): void {
    this.cache.flushAll();
    this.cache.close();
  }

  private async lookup(itemId: string, category: ItemCategory): Promise<PriceQuote | null> {
    this.lookups++;
    this.log.debug({ itemId, category }, 'Fetching price');

    const platinum = await this.retryPolicy.execute(
      () => this.resolver.fetchPrice(itemId, category),
      `price:${itemId}`,
    );

    if (platinum === null) {
      this.log.info({ itemId }, 'No sell orders for item');
      return null;
    }

    this.log.debug({ itemId, platinum }, 'Price fetched');
    return { itemId, platinum };
  }
}
