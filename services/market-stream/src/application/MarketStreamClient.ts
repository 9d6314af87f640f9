import { resolveStreamConfig, type StreamConfig } from '@/application/config/StreamConfig';
import type { ExchangeConnector } from '@/application/interfaces/ExchangeConnector';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ConnectionMultiplexer } from '@/application/stream/ConnectionMultiplexer';
import { type EventSelector, MarketStream, selectors } from '@/application/stream/MarketStream';
import { ValidationError } from '@/domain/errors';
import {
  type FeedKey,
  type Kline,
  type KlineInterval,
  type MarketEvent,
  type OrderBook,
  normalizeSymbol,
  type Ticker,
  type Trade,
  isKlineInterval,
} from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export interface MarketStreamClientOptions {
  /** すべての購読に共通する設定の上書き */
  config?: Partial<StreamConfig>;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** バックオフのジッター用乱数源 */
  random?: () => number;
}

export const DEFAULT_ORDER_BOOK_DEPTH = 20;

/**
 * 1取引所分の購読を作る窓口。
 *
 * ```typescript
 * const client = new MarketStreamClient(registry.create('binance'));
 * const stream = client.tickerStream('BTCUSDT');
 * for await (const ticker of stream.subscribe()) {
 *   console.log(ticker.lastPrice);
 * }
 * ```
 */
export class MarketStreamClient {
  private readonly config: StreamConfig;
  private readonly multiplexer: ConnectionMultiplexer;
  private readonly logger: Logger;
  private readonly streams = new Set<{ close(): Promise<void> }>();
  private closed = false;

  /**
   * @throws {ValidationError} 設定が不正な場合
   */
  constructor(
    readonly connector: ExchangeConnector,
    private readonly options: MarketStreamClientOptions = {}
  ) {
    this.config = resolveStreamConfig(options.config);
    this.logger = (options.logger ?? LoggerFactory.create()).child({ exchange: connector.name });
    this.multiplexer = new ConnectionMultiplexer(connector, {
      maxPendingDiffs: this.config.maxPendingDiffs,
      logger: this.logger,
      metrics: options.metrics,
    });
  }

  get exchange(): string {
    return this.connector.name;
  }

  tickerStream(symbol: string, overrides?: Partial<StreamConfig>): MarketStream<Ticker> {
    return this.create({ kind: 'ticker', symbol: requireSymbol(symbol) }, selectors.ticker, overrides);
  }

  orderBookStream(
    symbol: string,
    depth = DEFAULT_ORDER_BOOK_DEPTH,
    overrides?: Partial<StreamConfig>
  ): MarketStream<OrderBook> {
    if (!Number.isInteger(depth) || depth <= 0) {
      throw new ValidationError('depth', `must be a positive integer, got ${depth}`);
    }
    return this.create({ kind: 'orderbook', symbol: requireSymbol(symbol), depth }, selectors.orderbook, overrides);
  }

  tradeStream(symbol: string, overrides?: Partial<StreamConfig>): MarketStream<Trade> {
    return this.create({ kind: 'trade', symbol: requireSymbol(symbol) }, selectors.trade, overrides);
  }

  klineStream(symbol: string, interval: KlineInterval, overrides?: Partial<StreamConfig>): MarketStream<Kline> {
    if (!isKlineInterval(interval)) {
      throw new ValidationError('interval', `unknown kline interval: ${String(interval)}`);
    }
    return this.create({ kind: 'kline', symbol: requireSymbol(symbol), interval }, selectors.kline, overrides);
  }

  /**
   * 任意のフィードを MarketEvent のまま購読する（コレクタ用）。
   */
  openFeed(key: FeedKey, overrides?: Partial<StreamConfig>): MarketStream<MarketEvent> {
    return this.create({ ...key, symbol: requireSymbol(key.symbol) }, selectors.any, overrides);
  }

  /**
   * 作ったすべての購読を閉じ、共有接続も閉じる。
   */
  async close(): Promise<void> {
    this.closed = true;
    await Promise.all([...this.streams].map((stream) => stream.close()));
    this.streams.clear();
    this.multiplexer.close();
  }

  private create<T>(key: FeedKey, select: EventSelector<T>, overrides?: Partial<StreamConfig>): MarketStream<T> {
    if (this.closed) {
      throw new ValidationError('client', 'client is closed');
    }
    // 取引所が提供しないフィードはここで落とす
    this.connector.topic(key);

    const config = overrides ? resolveStreamConfig({ ...this.config, ...overrides }) : this.config;
    const stream = new MarketStream(key, this.multiplexer, config, select, {
      logger: this.logger,
      metrics: this.options.metrics,
      random: this.options.random,
    });
    this.streams.add(stream);
    void stream.done().then(() => this.streams.delete(stream));
    return stream;
  }
}

function requireSymbol(symbol: string): string {
  const normalized = normalizeSymbol(symbol);
  if (normalized === '') {
    throw new ValidationError('symbol', 'must not be empty');
  }
  return normalized;
}
