import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { MarketStream } from '@/application/stream/MarketStream';
import { errorCode } from '@/domain/errors';
import type { NormalizedEvent } from '@/domain/models/NormalizedEvent';
import type { StreamPublisher } from '@/domain/repositories/StreamPublisher';
import { feedKeyId, type MarketEvent } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * アプリケーション層: ストリーム収集ユースケース
 *
 * 責務: 購読のデータチャネルを読み切って StreamPublisher へ配信し、
 * エラーチャネルをログとメトリクスに流す。両方のチャネルが閉じたら終わる。
 */
export class CollectStreamUsecase {
  private readonly logger: Logger;

  constructor(
    private readonly exchange: string,
    private readonly publisher: StreamPublisher,
    logger?: Logger,
    private readonly metrics?: MetricsCollector
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'CollectStreamUsecase' });
  }

  /**
   * 購読を開始し、閉じるまで配信し続ける。
   */
  async execute(stream: MarketStream<MarketEvent>, signal?: AbortSignal): Promise<void> {
    const data = stream.subscribe(signal);
    await Promise.all([this.drainData(stream, data), this.drainErrors(stream)]);
  }

  private async drainData(stream: MarketStream<MarketEvent>, data: AsyncIterable<MarketEvent>): Promise<void> {
    for await (const event of data) {
      try {
        await this.publisher.publish(toNormalizedEvent(this.exchange, event));
      } catch (error) {
        // 配信失敗は1件分だけ捨てて購読は続ける
        this.logger.warn('Publish failed', { stream: feedKeyId(stream.key), err: error });
      }
    }
  }

  private async drainErrors(stream: MarketStream<MarketEvent>): Promise<void> {
    for await (const error of stream.errors()) {
      this.metrics?.incrementError(errorCode(error));
      this.logger.warn('Stream error', { stream: feedKeyId(stream.key), err: error });
    }
  }
}

/**
 * MarketEvent を下流向けの NormalizedEvent にする。
 */
export function toNormalizedEvent(exchange: string, event: MarketEvent): NormalizedEvent {
  switch (event.kind) {
    case 'ticker':
      return { type: 'ticker', exchange, symbol: event.data.symbol, ts: event.data.timestamp, data: event.data };
    case 'trade':
      return { type: 'trade', exchange, symbol: event.data.symbol, ts: event.data.timestamp, data: event.data };
    case 'kline':
      return { type: 'kline', exchange, symbol: event.data.symbol, ts: event.data.closeTime, data: event.data };
    case 'orderbook':
      return { type: 'orderbook', exchange, symbol: event.data.symbol, ts: event.data.timestamp, data: event.data };
  }
}
