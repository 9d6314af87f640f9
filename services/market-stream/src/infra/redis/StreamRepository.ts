import Redis from 'ioredis';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { NormalizedEvent } from '@/domain/models/NormalizedEvent';
import type { StreamPublisher } from '@/domain/repositories/StreamPublisher';
import type { FeedKind } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export interface StreamRepositoryOptions {
  /** ストリームごとの概算上限件数（XADD MAXLEN ~）。未指定なら切り詰めない */
  maxLen?: number;
}

/**
 * インフラ層: Redis Stream への書き込み実装
 *
 * 責務: NormalizedEvent を Redis Stream に XADD する（実装の詳細を担当）。
 * 配信のみで、読み戻しや再生は行わない。
 */
export class StreamRepository implements StreamPublisher {
  private readonly redis: Redis;
  private readonly logger: Logger;

  /**
   * @param redis Redis 接続 URL、または生成済みのクライアント
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    redis: string | Redis,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector,
    private readonly options: StreamRepositoryOptions = {}
  ) {
    this.redis = typeof redis === 'string' ? new Redis(redis) : redis;
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'StreamRepository' });
  }

  /**
   * 正規化されたイベントを Redis Stream に配信する。
   */
  async publish(event: NormalizedEvent): Promise<void> {
    const stream = streamName(event.type);
    const fields = [
      'exchange',
      event.exchange,
      'symbol',
      event.symbol,
      'ts',
      event.ts.toString(),
      'data',
      JSON.stringify(event.data),
    ];

    try {
      if (this.options.maxLen !== undefined) {
        await this.redis.xadd(stream, 'MAXLEN', '~', this.options.maxLen, '*', ...fields);
      } else {
        await this.redis.xadd(stream, '*', ...fields);
      }
      this.metricsCollector?.incrementPublished(stream, event.symbol);
    } catch (error) {
      this.metricsCollector?.incrementError('publish_error');
      this.logger.error('XADD failed', { stream, symbol: event.symbol, err: error });
      throw error;
    }
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
  }
}

/**
 * イベントタイプから Redis Stream 名を取得する（md:ticker, md:orderbook, md:trade, md:kline）。
 */
export function streamName(type: FeedKind): string {
  return `md:${type}`;
}
