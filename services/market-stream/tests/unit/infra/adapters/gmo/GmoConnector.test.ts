import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { describe, expect, it } from 'vitest';
import type { ExchangeConnector } from '@/application/interfaces/ExchangeConnector';
import { UnsupportedFeedError } from '@/domain/errors';
import { GmoConnector } from '@/infra/adapters/gmo/GmoConnector';

describe('GmoConnector', () => {
  const connector = new GmoConnector({ logger: new LoggerMock() });

  it('すべてのフィードを1本の public 接続に載せる', () => {
    expect(connector.connectionGroup({ kind: 'ticker', symbol: 'BTC' })).toBe('public');
    expect(connector.connectionGroup({ kind: 'orderbook', symbol: 'BTC', depth: 10 })).toBe('public');
    expect(connector.endpoint()).toBe('wss://api.coin.z.com/ws/public/v1');
  });

  it('トピックは channel:symbol', () => {
    expect(connector.topic({ kind: 'ticker', symbol: 'BTC' })).toBe('ticker:BTC');
    expect(connector.topic({ kind: 'orderbook', symbol: 'ETH', depth: 10 })).toBe('orderbooks:ETH');
    expect(connector.topic({ kind: 'trade', symbol: 'BTC_JPY' })).toBe('trades:BTC_JPY');
  });

  it('ローソク足は提供しない', () => {
    const kline = { kind: 'kline', symbol: 'BTC', interval: '1m' } as const;

    expect(() => connector.topic(kline)).toThrow(UnsupportedFeedError);
    expect(() => connector.connectionGroup(kline)).toThrow(UnsupportedFeedError);
  });

  it('購読コマンドはトピックごとに1件ずつ、1秒間隔で送る', () => {
    expect(connector.controlIntervalMs).toBe(1000);
    expect(connector.encodeSubscribe(['ticker:BTC', 'trades:BTC_JPY']).map((m): unknown => JSON.parse(m))).toEqual([
      { command: 'subscribe', channel: 'ticker', symbol: 'BTC' },
      { command: 'subscribe', channel: 'trades', symbol: 'BTC_JPY' },
    ]);
    expect(connector.encodeUnsubscribe(['orderbooks:ETH']).map((m): unknown => JSON.parse(m))).toEqual([
      { command: 'unsubscribe', channel: 'orderbooks', symbol: 'ETH' },
    ]);
  });

  it('板はストリーム上のスナップショットを使う', () => {
    const generic: ExchangeConnector = connector;

    expect(generic.fetchSnapshot).toBeUndefined();
  });
});
