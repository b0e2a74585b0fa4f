import { DEFAULT_ALIAS_TABLE_PATH, loadConfig } from '../../src/config';
import { FatalError } from '../../src/utils/errors';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      market: {
        baseUrl: 'https://api.warframe.market/v1',
        platform: 'pc',
        language: 'en',
        timeoutMs: 10000,
        requestDelayMs: 350,
      },
      pricing: {
        concurrency: 4,
        runTimeoutMs: undefined,
        maxAttempts: 3,
        initialDelayMs: 500,
        maxDelayMs: 5000,
      },
      aliasTablePath: DEFAULT_ALIAS_TABLE_PATH,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      MARKET_API_BASE_URL: 'https://market.test/v1/',
      MARKET_PLATFORM: 'xbox',
      PRICE_CONCURRENCY: '8',
      PRICE_RUN_TIMEOUT_MS: '60000',
      ALIAS_TABLE_PATH: 'config/aliases.json',
    });

    expect(config.market.baseUrl).toBe('https://market.test/v1');
    expect(config.market.platform).toBe('xbox');
    expect(config.pricing.concurrency).toBe(8);
    expect(config.pricing.runTimeoutMs).toBe(60000);
    expect(config.aliasTablePath).toBe('config/aliases.json');
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ PRICE_CONCURRENCY: '  ', MARKET_PLATFORM: '' }).pricing.concurrency).toBe(4);
  });

  it.each([
    ['PRICE_CONCURRENCY', '0'],
    ['PRICE_CONCURRENCY', 'many'],
    ['MARKET_PLATFORM', 'pc-master'],
    ['MARKET_API_BASE_URL', 'not a url'],
    ['LOG_LEVEL', 'loud'],
  ])('rejects %s=%p', (name, value) => {
    expect(() => loadConfig({ [name]: value })).toThrow(FatalError);
    expect(() => loadConfig({ [name]: value })).toThrow(name);
  });

  it('rejects a maximum delay below the initial delay', () => {
    expect(() => loadConfig({ LOOKUP_INITIAL_DELAY_MS: '2000', LOOKUP_MAX_DELAY_MS: '1000' })).toThrow(
      'LOOKUP_MAX_DELAY_MS must not be smaller than LOOKUP_INITIAL_DELAY_MS',
    );
  });
});
