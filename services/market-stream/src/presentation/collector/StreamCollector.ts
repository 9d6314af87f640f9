import type { MarketStreamClient } from '@/application/MarketStreamClient';
import type { Logger } from '@/application/interfaces/Logger';
import type { CollectStreamUsecase } from '@/application/usecases/CollectStreamUsecase';
import { type FeedKey, feedKeyId } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * プレゼンテーション層: コレクタのランナー
 *
 * 責務: 設定されたフィードを購読し、ユースケースに委譲して流し続ける。
 * 接続の維持と再接続は各購読（MarketStream）が行う。
 */
export class StreamCollector {
  private readonly logger: Logger;
  private readonly controller = new AbortController();
  private running: Promise<void> | null = null;

  constructor(
    private readonly client: MarketStreamClient,
    private readonly feeds: readonly FeedKey[],
    private readonly usecase: CollectStreamUsecase,
    logger?: Logger
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'StreamCollector' });
  }

  /**
   * すべてのフィードの購読を開始する。戻り値はすべての購読が閉じたら解決する。
   */
  start(): Promise<void> {
    if (this.running) {
      return this.running;
    }
    const tasks = this.feeds.map(async (key) => {
      const stream = this.client.openFeed(key);
      this.logger.info('Collecting', { stream: feedKeyId(key) });
      await this.usecase.execute(stream, this.controller.signal);
      this.logger.info('Collection finished', { stream: feedKeyId(key), stats: stream.stats() });
    });
    this.running = Promise.all(tasks).then(() => undefined);
    return this.running;
  }

  /**
   * すべての購読を止め、共有接続を閉じる。
   */
  async stop(): Promise<void> {
    this.controller.abort();
    await this.client.close();
    await this.running;
  }
}
