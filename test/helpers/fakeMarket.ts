import type { AppConfig } from '../../src/config';
import type { Catalog, PriceResolver } from '../../src/pricing/types';
import type { ItemCategory } from '../../src/types';
import { RetryPolicy } from '../../src/utils/retryPolicy';

/**
 * In-process stand-in for warframe.market. Every key of `prices` exists in the
 * catalog; a null price means the item is listed but has no sell orders.
 */
export class FakeMarket implements Catalog, PriceResolver {
  readonly priceCalls: string[] = [];
  readonly existsCalls: string[] = [];
  readonly categories = new Map<string, ItemCategory>();
  private readonly failures = new Map<string, Error[]>();

  constructor(
    private readonly prices: Record<string, number | null>,
    private readonly delayMs = 0,
  ) {}

  /** Queue errors thrown by the next lookups of `itemId`, in order. */
  failNext(itemId: string, ...errors: Error[]): this {
    this.failures.set(itemId, [...(this.failures.get(itemId) ?? []), ...errors]);
    return this;
  }

  async exists(candidateId: string): Promise<boolean> {
    this.existsCalls.push(candidateId);
    return Object.prototype.hasOwnProperty.call(this.prices, candidateId);
  }

  async fetchPrice(itemId: string, category: ItemCategory): Promise<number | null> {
    this.priceCalls.push(itemId);
    this.categories.set(itemId, category);
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }

    const next = this.failures.get(itemId)?.shift();
    if (next) throw next;

    return this.prices[itemId] ?? null;
  }
}

export function instantRetry(maxAttempts = 3): RetryPolicy {
  return new RetryPolicy({ maxAttempts, initialDelay: 0, jitter: false, sleep: async () => undefined });
}

export function testConfig(pricing: Partial<AppConfig['pricing']> = {}): AppConfig {
  return {
    market: {
      baseUrl: 'https://market.test/v1',
      platform: 'pc',
      language: 'en',
      timeoutMs: 1000,
      requestDelayMs: 0,
    },
    pricing: {
      concurrency: 2,
      maxAttempts: 3,
      initialDelayMs: 0,
      maxDelayMs: 0,
      ...pricing,
    },
    aliasTablePath: 'data/aliases.json',
  };
}
