import type { OrderBookDiff, OrderBookSnapshotData, Ticker } from '@/domain/types';

export function ticker(symbol: string, lastPrice: number, timestamp = 1_700_000_000_000): Ticker {
  return {
    symbol,
    lastPrice,
    bidPrice: lastPrice - 1,
    askPrice: lastPrice + 1,
    high24h: lastPrice + 10,
    low24h: lastPrice - 10,
    volume24h: 42,
    timestamp,
  };
}

export function snapshot(
  lastUpdateId: number,
  bids: Array<[number, number]>,
  asks: Array<[number, number]>
): OrderBookSnapshotData {
  return {
    lastUpdateId,
    bids: bids.map(([price, qty]) => ({ price, qty })),
    asks: asks.map(([price, qty]) => ({ price, qty })),
    timestamp: 1_700_000_000_000,
  };
}

export function diff(
  firstUpdateId: number,
  finalUpdateId: number,
  bids: Array<[number, number]> = [],
  asks: Array<[number, number]> = []
): OrderBookDiff {
  return {
    firstUpdateId,
    finalUpdateId,
    bids: bids.map(([price, qty]) => ({ price, qty })),
    asks: asks.map(([price, qty]) => ({ price, qty })),
    timestamp: 1_700_000_000_000 + finalUpdateId,
  };
}

/**
 * マイクロタスクを流し切る（偽タイマー下でも動く）
 */
export async function settle(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
