import { describe, expect, it } from 'vitest';
import { ValidationError } from '@/domain/errors';
import { loadCollectorEnv, parseFeed, requireEnv } from '@/infra/config/env';

describe('parseFeed', () => {
  it('kind:symbol[:param] を FeedKey にする', () => {
    expect(parseFeed('ticker:btcusdt')).toEqual({ kind: 'ticker', symbol: 'BTCUSDT' });
    expect(parseFeed('trade:ETHUSDT')).toEqual({ kind: 'trade', symbol: 'ETHUSDT' });
    expect(parseFeed('orderbook:BTCUSDT:50')).toEqual({ kind: 'orderbook', symbol: 'BTCUSDT', depth: 50 });
    expect(parseFeed('kline:ETHUSDT:1h')).toEqual({ kind: 'kline', symbol: 'ETHUSDT', interval: '1h' });
  });

  it('板の深さを省略すると 20', () => {
    expect(parseFeed('orderbook:BTC')).toEqual({ kind: 'orderbook', symbol: 'BTC', depth: 20 });
  });

  it.each(['ticker', 'ticker:BTC:1', 'orderbook:BTC:0', 'kline:BTC', 'kline:BTC:7m', 'funding:BTC', 'trade:BTC:a:b'])(
    '不正な指定 "%s" は ValidationError',
    (feed) => {
      expect(() => parseFeed(feed)).toThrow(ValidationError);
    }
  );
});

describe('requireEnv', () => {
  it('未設定や空白だけなら ValidationError', () => {
    expect(() => requireEnv({}, 'REDIS_URL')).toThrow('validation error: REDIS_URL: missing required environment variable');
    expect(() => requireEnv({ REDIS_URL: '  ' }, 'REDIS_URL')).toThrow(ValidationError);
    expect(requireEnv({ REDIS_URL: ' redis://localhost ' }, 'REDIS_URL')).toBe('redis://localhost');
  });
});

describe('loadCollectorEnv', () => {
  const base = {
    EXCHANGE_NAME: 'Binance',
    FEEDS: 'ticker:BTCUSDT, orderbook:BTCUSDT:50,',
    REDIS_URL: 'redis://localhost:6379/0',
  };

  it('必須項目と任意項目を読む', () => {
    expect(loadCollectorEnv({ ...base, METRICS_PORT: '9100', BUFFER_SIZE: '500', MAX_RECONNECT_ATTEMPTS: '0' })).toEqual({
      exchangeName: 'binance',
      feeds: [
        { kind: 'ticker', symbol: 'BTCUSDT' },
        { kind: 'orderbook', symbol: 'BTCUSDT', depth: 50 },
      ],
      redisUrl: 'redis://localhost:6379/0',
      metricsPort: 9100,
      streamConfig: { bufferSize: 500, maxReconnectAttempts: 0 },
    });
  });

  it('METRICS_PORT が無ければ null、上書きが無ければ空の設定', () => {
    const env = loadCollectorEnv(base);

    expect(env.metricsPort).toBeNull();
    expect(env.streamConfig).toEqual({});
  });

  it('数値でない値は ValidationError', () => {
    expect(() => loadCollectorEnv({ ...base, BUFFER_SIZE: 'many' })).toThrow(ValidationError);
  });

  it('フィードが空なら ValidationError', () => {
    expect(() => loadCollectorEnv({ ...base, FEEDS: ' , ' })).toThrow('at least one feed is required');
  });
});
