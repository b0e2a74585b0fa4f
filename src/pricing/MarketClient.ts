import axios, { type AxiosRequestConfig } from 'axios';
import type { MarketConfig } from '../config';
import { ItemsResponseSchema, OrdersResponseSchema, type MarketOrder } from '../schemas/market';
import type { ItemCategory } from '../types';
import { FatalError, LookupError, errorMessage } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { RetryPolicy } from '../utils/retryPolicy';
import type { Catalog, PriceResolver } from './types';

/** The slice of an axios instance the client uses. */
export interface MarketHttp {
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

/**
 * Lowest asking price, preferring sellers who are in game right now.
 * Mods and arcanes are priced unranked when unranked listings exist.
 */
export function pickSellPrice(orders: readonly MarketOrder[], category: ItemCategory): number | null {
  let sells = orders.filter((order) => order.order_type === 'sell' && order.visible !== false);

  if (category !== 'Item') {
    const unranked = sells.filter((order) => order.mod_rank === undefined || order.mod_rank === 0);
    if (unranked.length > 0) sells = unranked;
  }

  const ingame = sells.filter((order) => order.user.status === 'ingame');
  const pool = ingame.length > 0 ? ingame : sells;
  if (pool.length === 0) return null;

  return Math.min(...pool.map((order) => order.platinum));
}

/**
 * warframe.market client. Serves as both the catalog (item index, loaded once
 * per instance) and the price resolver (orders per item).
 */
export class MarketClient implements Catalog, PriceResolver {
  private readonly http: MarketHttp;
  private readonly log: Logger;
  private readonly requestDelay: number;
  private requestQueue: Promise<void> = Promise.resolve();
  private index?: Promise<ReadonlySet<string>>;

  constructor(
    private readonly config: MarketConfig,
    http?: MarketHttp,
    private readonly indexRetry: RetryPolicy = new RetryPolicy({ maxAttempts: 3, initialDelay: 1000 }),
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('market-client');
    this.requestDelay = config.requestDelayMs;
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: {
          accept: 'application/json',
          platform: config.platform,
          language: config.language,
          'User-Agent': 'donation-pricer/1.0',
        },
      });
  }

  async exists(candidateId: string): Promise<boolean> {
    const index = await this.loadIndex();
    return index.has(candidateId);
  }

  async fetchPrice(itemId: string, category: ItemCategory): Promise<number | null> {
    const data = await this.request(`/items/${encodeURIComponent(itemId)}/orders`, itemId);
    if (data === null) return null;

    const parsed = OrdersResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new LookupError(`Unexpected orders response for ${itemId}`, false, itemId);
    }

    return pickSellPrice(parsed.data.payload.orders, category);
  }

  /** Item index; a failure here means the catalog is unreachable. */
  loadIndex(): Promise<ReadonlySet<string>> {
    if (!this.index) {
      this.index = this.fetchIndex();
      void this.index.catch(() => {
        this.index = undefined;
      });
    }
    return this.index;
  }

  private async fetchIndex(): Promise<ReadonlySet<string>> {
    try {
      const data = await this.indexRetry.execute(() => this.request('/items'), 'market:items');
      const parsed = ItemsResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new FatalError('Catalog returned an unexpected item index');
      }

      const index = new Set(parsed.data.payload.items.map((item) => item.url_name));
      this.log.info({ items: index.size, platform: this.config.platform }, 'Catalog index loaded');
      return index;
    } catch (error) {
      if (error instanceof FatalError) throw error;
      throw new FatalError(`Catalog unreachable: ${errorMessage(error)}`, { baseUrl: this.config.baseUrl }, { cause: error });
    }
  }

  // Requests go out one at a time with a fixed gap between them
  private schedule<T>(requestFn: () => Promise<T>): Promise<T> {
    const run = this.requestQueue
      .then(() => new Promise<void>((resolve) => setTimeout(resolve, this.requestDelay)))
      .then(requestFn);
    this.requestQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** GET returning the body, or null on 404. Errors are mapped to the lookup taxonomy. */
  private request(path: string, itemId?: string): Promise<unknown> {
    return this.schedule(async () => {
      try {
        const response = await this.http.get(path);
        return response.data;
      } catch (error) {
        if (!axios.isAxiosError(error)) throw error;

        const status = error.response?.status;
        if (status === 404) {
          this.log.info({ path }, 'Not found on market');
          return null;
        }
        if (status === 401 || status === 403) {
          this.log.error({ path, status }, 'Market rejected credentials');
          throw new FatalError(`Market API refused access (HTTP ${status})`, { path, status }, { cause: error });
        }

        const retryable = status === undefined || status === 429 || status >= 500;
        this.log.warn({ path, status, code: error.code, retryable }, 'Market request failed');
        throw new LookupError(
          `Market request ${path} failed: ${status ? `HTTP ${status}` : error.code ?? error.message}`,
          retryable,
          itemId,
          status,
          { cause: error },
        );
      }
    });
  }
}
