import { describe, expect, it } from 'vitest';
import { bestAsk, bestBid, feedKeyId, isKlineInterval, midPrice, normalizeSymbol, type OrderBook, spread } from '@/domain/types';

const book = (bids: number[], asks: number[]): OrderBook => ({
  symbol: 'BTCUSDT',
  bids: bids.map((price) => ({ price, qty: 1 })),
  asks: asks.map((price) => ({ price, qty: 1 })),
  lastUpdateId: 1,
  sequence: 1,
  timestamp: 0,
});

describe('domain/types', () => {
  it('feedKeyId はパラメータを含めた識別子を作る', () => {
    expect(feedKeyId({ kind: 'ticker', symbol: 'BTCUSDT' })).toBe('ticker:BTCUSDT');
    expect(feedKeyId({ kind: 'orderbook', symbol: 'BTCUSDT', depth: 20 })).toBe('orderbook:BTCUSDT:20');
    expect(feedKeyId({ kind: 'kline', symbol: 'ETHUSDT', interval: '1m' })).toBe('kline:ETHUSDT:1m');
  });

  it('normalizeSymbol は空白を除いて大文字にする', () => {
    expect(normalizeSymbol('  btcusdt ')).toBe('BTCUSDT');
  });

  it('isKlineInterval は既知の間隔だけ受け付ける', () => {
    expect(isKlineInterval('1M')).toBe(true);
    expect(isKlineInterval('2m')).toBe(false);
  });

  it('最良気配・スプレッド・仲値を計算する', () => {
    const b = book([100, 99], [102, 103]);

    expect(bestBid(b)).toEqual({ price: 100, qty: 1 });
    expect(bestAsk(b)).toEqual({ price: 102, qty: 1 });
    expect(spread(b)).toBe(2);
    expect(midPrice(b)).toBe(101);
  });

  it('片側が空ならスプレッドと仲値は null', () => {
    const b = book([100], []);

    expect(spread(b)).toBeNull();
    expect(midPrice(b)).toBeNull();
  });
});
