import { eventMessage, FakeConnector } from '@test/unit/helpers/mocks/FakeConnector';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { settle, ticker } from '@test/unit/helpers/fixtures';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MarketStreamClient } from '@/application/MarketStreamClient';
import { CollectStreamUsecase } from '@/application/usecases/CollectStreamUsecase';
import type { StreamPublisher } from '@/domain/repositories/StreamPublisher';
import { StreamCollector } from '@/presentation/collector/StreamCollector';

/**
 * 単体テスト: StreamCollector
 *
 * - 設定されたフィードをまとめて購読する
 * - stop() で全購読と接続を閉じ、start() の Promise が解決する
 */
describe('StreamCollector', () => {
  let connector: FakeConnector;
  let logger: LoggerMock;
  let publisher: StreamPublisher;
  let collector: StreamCollector;

  beforeEach(() => {
    connector = new FakeConnector();
    logger = new LoggerMock();
    publisher = {
      publish: vi.fn().mockResolvedValue(undefined),
      close: vi.fn().mockResolvedValue(undefined),
    };
    const client = new MarketStreamClient(connector, { logger });
    collector = new StreamCollector(
      client,
      [
        { kind: 'ticker', symbol: 'BTCUSDT' },
        { kind: 'trade', symbol: 'BTCUSDT' },
      ],
      new CollectStreamUsecase('fake', publisher, logger),
      logger
    );
  });

  it('フィードを1本の接続で購読し、受信データを配信する', async () => {
    const running = collector.start();
    await settle();

    const connection = connector.latest();
    expect(connector.connections).toHaveLength(1);
    expect(connection.sentJson()).toEqual([{ op: 'subscribe', topics: ['ticker:BTCUSDT', 'trade:BTCUSDT'] }]);

    connection.receive(eventMessage('ticker:BTCUSDT', { kind: 'ticker', data: ticker('BTCUSDT', 100) }));
    await settle();
    expect(publisher.publish).toHaveBeenCalledTimes(1);

    await collector.stop();
    await expect(running).resolves.toBeUndefined();
    expect(connection.closed).toBe(true);
    expect(logger.messages('info').filter((msg) => msg === 'Collection finished')).toHaveLength(2);
  });

  it('start() を2回呼んでも購読は1回だけ', async () => {
    const first = collector.start();
    const second = collector.start();
    await settle();

    expect(second).toBe(first);
    expect(connector.latest().sent).toHaveLength(1);

    await collector.stop();
  });
});
