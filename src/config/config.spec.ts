import { buildConfig, NodeEnvironment, validate } from '.';

const REQUIRED = { DB_URL: 'postgres://localhost/checkout', CACHE_HOST: 'localhost' };

describe('config', () => {
  it('fills in defaults', () => {
    const config = buildConfig(validate({ ...REQUIRED }));

    expect(config.nodeEnv).toBe(NodeEnvironment.Development);
    expect(config.port).toBe(3000);
    expect(config.useTls).toBe(false);
    expect(config.checkout).toEqual({
      idleTimeoutMs: 1_800_000,
      sweepIntervalMs: 120_000,
      sweepBatchSize: 100,
      articleDataTimeoutMs: 3000,
      blockOnPriceChange: false,
      currency: 'EUR',
      paymentProviders: ['mock', 'invoice'],
    });
  });

  it('converts environment strings', () => {
    const config = buildConfig(
      validate({
        ...REQUIRED,
        CHECKOUT_IDLE_TIMEOUT_MINUTES: '15',
        ARTICLE_DATA_TIMEOUT_MS: '500',
        BLOCK_ON_PRICE_CHANGE: 'true',
        USE_TLS: 'false',
        IS_REDIS_CLUSTER: 'TRUE',
        PAYMENT_PROVIDERS: ' mock , ,card ',
      }),
    );

    expect(config.checkout.idleTimeoutMs).toBe(900_000);
    expect(config.checkout.articleDataTimeoutMs).toBe(500);
    expect(config.checkout.blockOnPriceChange).toBe(true);
    expect(config.useTls).toBe(false);
    expect(config.isRedisCluster).toBe(true);
    expect(config.checkout.paymentProviders).toEqual(['mock', 'card']);
  });

  it('requires the database url', () => {
    expect(() => validate({ CACHE_HOST: 'localhost' })).toThrow(/DB_URL/);
  });

  it('rejects a currency that is not an ISO code', () => {
    expect(() => validate({ ...REQUIRED, CHECKOUT_CURRENCY: 'euro' })).toThrow(
      /CHECKOUT_CURRENCY/,
    );
  });
});
