import { eventMessage, FakeConnector } from '@test/unit/helpers/mocks/FakeConnector';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { diff, settle, snapshot, ticker } from '@test/unit/helpers/fixtures';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resolveStreamConfig, type StreamConfig } from '@/application/config/StreamConfig';
import { ConnectionMultiplexer } from '@/application/stream/ConnectionMultiplexer';
import { type EventSelector, MarketStream, selectors } from '@/application/stream/MarketStream';
import {
  AlreadySubscribedError,
  ConnectionLostError,
  ConnectTimeoutError,
  KeepaliveTimeoutError,
  NotSubscribedError,
  OrderBookGapError,
  ReconnectExhaustedError,
  StreamClosedError,
  StreamInterruptedError,
} from '@/domain/errors';
import type { ReadableChannel } from '@/application/stream/Channel';
import type { FeedKey } from '@/domain/types';

/**
 * 単体テスト: MarketStream
 *
 * FakeConnector + ConnectionMultiplexer の上で購読のライフサイクルを通しで確認する。
 * - idle → connecting → active ⇄ reconnecting → closing → closed
 * - データチャネルの溢れ
 * - 再接続の枯渇、keepalive / 接続のタイムアウト
 * - 回復可能な中断はエラーチャネルに流さない
 * - 板の初期スナップショットとギャップ
 * - どの状態からでも止められること
 */
const TICKER: FeedKey = { kind: 'ticker', symbol: 'BTCUSDT' };
const BOOK: FeedKey = { kind: 'orderbook', symbol: 'BTCUSDT', depth: 20 };

function drain<T>(channel: ReadableChannel<T>): T[] {
  const values: T[] = [];
  for (let value = channel.tryReceive(); value !== undefined; value = channel.tryReceive()) {
    values.push(value);
  }
  return values;
}

describe('MarketStream', () => {
  let connector: FakeConnector;
  let logger: LoggerMock;
  let multiplexer: ConnectionMultiplexer;
  const opened: Array<{ close(): Promise<void> }> = [];

  function open<T>(key: FeedKey, select: EventSelector<T>, overrides: Partial<StreamConfig> = {}): MarketStream<T> {
    const config = resolveStreamConfig({
      baseDelayMs: 100,
      maxDelayMs: 1000,
      pingIntervalMs: 1000,
      pongTimeoutMs: 500,
      connectTimeoutMs: 2000,
      ...overrides,
    });
    const stream = new MarketStream(key, multiplexer, config, select, { logger, random: () => 0 });
    opened.push(stream);
    return stream;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    connector = new FakeConnector();
    logger = new LoggerMock();
    multiplexer = new ConnectionMultiplexer(connector, { maxPendingDiffs: 100, logger });
  });

  afterEach(async () => {
    await Promise.all(opened.splice(0).map((stream) => stream.close()));
    vi.useRealTimers();
  });

  describe('ticker', () => {
    it('購読要求を送ると active になり、受信した ticker を届ける', async () => {
      const stream = open(TICKER, selectors.ticker);
      const data = stream.subscribe();
      expect(stream.state()).toBe('connecting');

      await settle();

      expect(stream.state()).toBe('active');
      const connection = connector.latest();
      expect(connection.sentJson()).toEqual([{ op: 'subscribe', topics: ['ticker:BTCUSDT'] }]);

      connection.receive(eventMessage('ticker:BTCUSDT', { kind: 'ticker', data: ticker('BTCUSDT', 100) }));

      expect(data.tryReceive()).toEqual(ticker('BTCUSDT', 100));
      expect(stream.stats()).toMatchObject({ state: 'active', emitted: 1, dropped: 0 });
    });

    it('バッファサイズ 1 で2件届くと2件目が残り、ドロップが1件記録される', async () => {
      const stream = open(TICKER, selectors.ticker, { bufferSize: 1 });
      const data = stream.subscribe();
      await settle();

      const connection = connector.latest();
      connection.receive(eventMessage('ticker:BTCUSDT', { kind: 'ticker', data: ticker('BTCUSDT', 100) }));
      connection.receive(eventMessage('ticker:BTCUSDT', { kind: 'ticker', data: ticker('BTCUSDT', 101) }));

      expect(drain(data).map((t) => t.lastPrice)).toEqual([101]);
      expect(stream.stats().dropped).toBe(1);
    });

    it('別のトピックのデータは届かない', async () => {
      const stream = open(TICKER, selectors.ticker);
      const data = stream.subscribe();
      await settle();

      connector.latest().receive(eventMessage('ticker:ETHUSDT', { kind: 'ticker', data: ticker('ETHUSDT', 5) }));

      expect(data.size).toBe(0);
    });

    it('状態遷移を onStateChange で通知する', async () => {
      const stream = open(TICKER, selectors.ticker);
      const transitions: string[] = [];
      stream.onStateChange((state, previous) => transitions.push(`${previous}->${state}`));

      stream.subscribe();
      await settle();
      await stream.unsubscribe();

      expect(transitions).toEqual(['idle->connecting', 'connecting->active', 'active->closing', 'closing->closed']);
    });

    it('状態遷移の監視関数が例外を投げても購読は止まらず、done() は解決する', async () => {
      const stream = open(TICKER, selectors.ticker);
      stream.onStateChange(() => {
        throw new Error('listener failure');
      });

      stream.subscribe();
      await settle();
      expect(stream.state()).toBe('active');

      await stream.unsubscribe();

      expect(stream.state()).toBe('closed');
      await expect(stream.done()).resolves.toBeUndefined();
      expect(logger.messages('error').filter((msg) => msg === 'State listener failed')).toHaveLength(4);
    });
  });

  describe('再接続', () => {
    it('接続が切れたら reconnecting に入り、バックオフ後に新しい接続で active に戻る', async () => {
      const stream = open(TICKER, selectors.ticker);
      stream.subscribe();
      await settle();

      connector.latest().drop(1006);
      await settle();

      expect(stream.state()).toBe('reconnecting');
      expect(logger.warn).toHaveBeenCalledWith('Feed interrupted', {
        err: new ConnectionLostError('socket closed (code=1006)'),
      });

      // random=0 なので 100ms * 0.5
      await vi.advanceTimersByTimeAsync(50);
      await settle();

      expect(stream.state()).toBe('active');
      expect(connector.connections).toHaveLength(2);
      expect(stream.stats()).toMatchObject({ reconnects: 1, attempts: 0 });
      // 回復した中断はエラーチャネルに残らない
      expect(drain(stream.errors())).toEqual([]);
    });

    it('maxReconnectAttempts=3 で接続に失敗し続けると、3回目の失敗で closed になり終端エラーを届ける', async () => {
      connector.openBehavior = 'fail';
      const stream = open(TICKER, selectors.ticker, { maxReconnectAttempts: 3 });
      const data = stream.subscribe();

      await settle();
      expect(stream.state()).toBe('reconnecting');
      await vi.advanceTimersByTimeAsync(50);
      await settle();
      await vi.advanceTimersByTimeAsync(100);
      await settle();

      expect(stream.state()).toBe('closed');
      expect(connector.openCalls).toHaveLength(3);
      expect(data.closed).toBe(true);

      const errors = drain(stream.errors());
      expect(errors).toHaveLength(1);
      const [terminal] = errors;
      expect(terminal).toBeInstanceOf(ReconnectExhaustedError);
      expect(terminal).toMatchObject({ attempts: 3 });
      expect(terminal.cause).toBeInstanceOf(ConnectionLostError);
      await expect(stream.done()).resolves.toBeUndefined();
    });

    it('再接続が無効なら最初の中断で StreamInterruptedError を届けて closed になる', async () => {
      const stream = open(TICKER, selectors.ticker, { reconnect: false, pingIntervalMs: 0 });
      stream.subscribe();
      await settle();

      connector.latest().drop();
      await settle();

      expect(stream.state()).toBe('closed');
      const errors = drain(stream.errors());
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(StreamInterruptedError);
      expect(errors[0].cause).toBeInstanceOf(ConnectionLostError);
      expect(connector.openCalls).toHaveLength(1);
    });
  });

  describe('タイムアウト', () => {
    it('ping に pong が返らなければ KeepaliveTimeoutError で reconnecting に入る', async () => {
      const stream = open(TICKER, selectors.ticker);
      stream.subscribe();
      await settle();
      const connection = connector.latest();

      vi.advanceTimersByTime(1000);
      expect(connection.pings).toBe(1);

      vi.advanceTimersByTime(500);
      await settle();

      expect(stream.state()).toBe('reconnecting');
      expect(connection.terminated).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith('Feed interrupted', { err: new KeepaliveTimeoutError(500) });
      expect(drain(stream.errors())).toEqual([]);
    });

    it('pong が返れば active のまま', async () => {
      const stream = open(TICKER, selectors.ticker);
      stream.subscribe();
      await settle();
      const connection = connector.latest();

      vi.advanceTimersByTime(1000);
      connection.pong();
      vi.advanceTimersByTime(500);
      await settle();

      expect(stream.state()).toBe('active');
    });

    it('connectTimeoutMs 以内に準備できなければ ConnectTimeoutError', async () => {
      connector.openBehavior = 'hang';
      const stream = open(TICKER, selectors.ticker);
      stream.subscribe();
      await settle();

      vi.advanceTimersByTime(2000);
      await settle();

      expect(stream.state()).toBe('reconnecting');
      expect(logger.warn).toHaveBeenCalledWith('Feed interrupted', { err: new ConnectTimeoutError(2000) });
      expect(drain(stream.errors())).toEqual([]);
    });
  });

  describe('板', () => {
    function receiveDiff(first: number, final: number, bids: Array<[number, number]> = [], asks: Array<[number, number]> = []) {
      connector.latest().receive(
        eventMessage('orderbook:BTCUSDT', {
          kind: 'orderbook.diff',
          symbol: 'BTCUSDT',
          data: diff(first, final, bids, asks),
        })
      );
    }

    it('最初の差分が届いてからスナップショットを取得し、適用後に差分を反映した板を届ける', async () => {
      const snapshots = connector.useSnapshots();
      const stream = open(BOOK, selectors.orderbook);
      const data = stream.subscribe();
      await settle();

      expect(stream.state()).toBe('connecting');
      expect(snapshots.fetch).not.toHaveBeenCalled();

      receiveDiff(101, 101, [[100, 2]]);
      expect(snapshots.fetch).toHaveBeenCalledTimes(1);
      expect(snapshots.fetch).toHaveBeenCalledWith('BTCUSDT', 20, expect.any(AbortSignal));

      snapshots.resolve(snapshot(100, [[100, 1]], [[101, 1]]));
      await settle();

      expect(stream.state()).toBe('active');
      expect(data.tryReceive()).toMatchObject({
        lastUpdateId: 101,
        bids: [{ price: 100, qty: 2 }],
        asks: [{ price: 101, qty: 1 }],
      });

      receiveDiff(102, 103, [[100, 0]], [[101, 2]]);

      const book = data.tryReceive();
      expect(book?.bids).toEqual([]);
      expect(book?.asks).toEqual([{ price: 101, qty: 2 }]);
      expect(book?.lastUpdateId).toBe(103);
    });

    it('スナップショットがバッファした差分より古ければ、再接続せずに取り直す', async () => {
      const snapshots = connector.useSnapshots();
      const stream = open(BOOK, selectors.orderbook);
      const data = stream.subscribe();
      await settle();

      receiveDiff(150, 151, [[100, 5]]);
      snapshots.resolve(snapshot(100, [[100, 1]], []));
      await settle();

      expect(snapshots.fetch).toHaveBeenCalledTimes(2);
      expect(stream.state()).toBe('connecting');

      snapshots.resolve(snapshot(150, [[100, 1]], []));
      await settle();

      expect(stream.state()).toBe('active');
      expect(data.tryReceive()).toMatchObject({ lastUpdateId: 151, bids: [{ price: 100, qty: 5 }] });
      expect(connector.openCalls).toHaveLength(1);
    });

    it('差分にギャップがあれば reconnecting に入るが、エラーチャネルには流さない', async () => {
      const snapshots = connector.useSnapshots();
      const stream = open(BOOK, selectors.orderbook);
      stream.subscribe();
      await settle();
      receiveDiff(101, 101);
      snapshots.resolve(snapshot(100, [[100, 1]], [[101, 1]]));
      await settle();
      expect(stream.state()).toBe('active');

      receiveDiff(105, 106);
      await settle();

      expect(stream.state()).toBe('reconnecting');
      expect(drain(stream.errors())).toEqual([]);
      const interrupted = logger.warn.mock.calls.find(([msg]) => msg === 'Feed interrupted');
      expect(interrupted?.[1]?.err).toBeInstanceOf(OrderBookGapError);
      expect(interrupted?.[1]?.err).toMatchObject({ expectedUpdateId: 102, receivedUpdateId: 105 });
    });
  });

  describe('購読の操作', () => {
    it('2回目の subscribe は AlreadySubscribedError', () => {
      const stream = open(TICKER, selectors.ticker);
      stream.subscribe();

      expect(() => stream.subscribe()).toThrow(AlreadySubscribedError);
    });

    it('購読前の unsubscribe は NotSubscribedError', async () => {
      const stream = open(TICKER, selectors.ticker);

      await expect(stream.unsubscribe()).rejects.toBeInstanceOf(NotSubscribedError);
    });

    it('閉じた後の subscribe は StreamClosedError', async () => {
      const stream = open(TICKER, selectors.ticker);
      await stream.close();

      expect(stream.state()).toBe('closed');
      expect(() => stream.subscribe()).toThrow(StreamClosedError);
    });

    it('unsubscribe で両チャネルが閉じ、以後は接続に何も送らない', async () => {
      const stream = open(TICKER, selectors.ticker);
      const data = stream.subscribe();
      await settle();
      const connection = connector.latest();
      const sent = connection.sent.length;

      await stream.unsubscribe();
      vi.advanceTimersByTime(10_000);

      expect(stream.state()).toBe('closed');
      expect(data.closed).toBe(true);
      expect(stream.errors().closed).toBe(true);
      expect(connection.closed).toBe(true);
      expect(connection.sent).toHaveLength(sent);
      expect(connection.pings).toBe(0);
    });

    it('AbortSignal を中断すると closed になる', async () => {
      const controller = new AbortController();
      const stream = open(TICKER, selectors.ticker);
      stream.subscribe(controller.signal);
      await settle();

      controller.abort();
      await stream.done();

      expect(stream.state()).toBe('closed');
      expect(drain(stream.errors())).toEqual([]);
    });

    it('中断済みの AbortSignal を渡すと接続せずに closed になる', async () => {
      const controller = new AbortController();
      controller.abort();
      const stream = open(TICKER, selectors.ticker);

      const data = stream.subscribe(controller.signal);
      await settle();

      expect(stream.state()).toBe('closed');
      expect(data.closed).toBe(true);
      expect(connector.openCalls).toHaveLength(0);
      await expect(stream.done()).resolves.toBeUndefined();
    });

    it('別の経路で閉じたら AbortSignal の監視を外す', async () => {
      const controller = new AbortController();
      const removeListener = vi.spyOn(controller.signal, 'removeEventListener');
      const stream = open(TICKER, selectors.ticker);
      stream.subscribe(controller.signal);
      await settle();

      await stream.unsubscribe();

      expect(removeListener).toHaveBeenCalledWith('abort', expect.any(Function));
    });

    it('reconnecting のバックオフ待ち中でも unsubscribe で閉じ、再接続しない', async () => {
      const stream = open(TICKER, selectors.ticker);
      const data = stream.subscribe();
      await settle();
      connector.latest().drop();
      await settle();
      expect(stream.state()).toBe('reconnecting');

      await stream.unsubscribe();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(stream.state()).toBe('closed');
      await expect(stream.done()).resolves.toBeUndefined();
      expect(data.closed).toBe(true);
      expect(stream.errors().closed).toBe(true);
      expect(connector.openCalls).toHaveLength(1);
    });

    it('板のスナップショット待ち（connecting）でも AbortSignal で閉じ、取得を中断する', async () => {
      const snapshots = connector.useSnapshots();
      const controller = new AbortController();
      const stream = open(BOOK, selectors.orderbook);
      const data = stream.subscribe(controller.signal);
      await settle();
      connector.latest().receive(
        eventMessage('orderbook:BTCUSDT', { kind: 'orderbook.diff', symbol: 'BTCUSDT', data: diff(101, 101) })
      );
      expect(snapshots.fetch).toHaveBeenCalledTimes(1);
      expect(stream.state()).toBe('connecting');

      controller.abort();
      await stream.done();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(stream.state()).toBe('closed');
      expect(data.closed).toBe(true);
      expect(stream.errors().closed).toBe(true);
      expect(snapshots.fetch.mock.calls[0][2].aborted).toBe(true);
      expect(connector.openCalls).toHaveLength(1);
    });
  });
});
