import { Counter, Gauge, Registry } from 'prom-client';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { StreamState } from '@/domain/models/StreamState';
import type { FeedKind } from '@/domain/types';

const STATES = Object.values(StreamState);

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用してメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly receivedCounter: Counter;
  private readonly emittedCounter: Counter;
  private readonly droppedCounter: Counter;
  private readonly publishedCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly reconnectCounter: Counter;
  private readonly resyncCounter: Counter;
  private readonly stateGauge: Gauge;

  constructor() {
    this.register = new Registry();

    // 物理接続からの受信メッセージ数
    this.receivedCounter = new Counter({
      name: 'market_stream_messages_received_total',
      help: 'Total number of messages received from exchange connections',
      labelNames: ['provider', 'slot'],
      registers: [this.register],
    });

    this.emittedCounter = new Counter({
      name: 'market_stream_events_emitted_total',
      help: 'Total number of events delivered to subscriber channels',
      labelNames: ['feed', 'symbol'],
      registers: [this.register],
    });

    this.droppedCounter = new Counter({
      name: 'market_stream_events_dropped_total',
      help: 'Total number of events dropped on channel overflow',
      labelNames: ['feed', 'symbol'],
      registers: [this.register],
    });

    // Redis Stream への配信数
    this.publishedCounter = new Counter({
      name: 'market_stream_messages_published_total',
      help: 'Total number of messages published to Redis Stream',
      labelNames: ['stream', 'symbol'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'market_stream_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'market_stream_reconnects_total',
      help: 'Total number of reconnect attempts',
      labelNames: ['feed', 'symbol'],
      registers: [this.register],
    });

    this.resyncCounter = new Counter({
      name: 'market_stream_orderbook_resyncs_total',
      help: 'Total number of order book resynchronizations',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    // 現在の状態だけ 1、それ以外は 0
    this.stateGauge = new Gauge({
      name: 'market_stream_subscription_state',
      help: 'Current lifecycle state of each subscription (1 = current state)',
      labelNames: ['feed', 'symbol', 'state'],
      registers: [this.register],
    });
  }

  incrementReceived(provider: string, slot: string): void {
    this.receivedCounter.inc({ provider, slot });
  }

  incrementEmitted(feed: FeedKind, symbol: string): void {
    this.emittedCounter.inc({ feed, symbol });
  }

  incrementDropped(feed: FeedKind, symbol: string): void {
    this.droppedCounter.inc({ feed, symbol });
  }

  incrementPublished(stream: string, symbol: string): void {
    this.publishedCounter.inc({ stream, symbol });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementReconnect(feed: FeedKind, symbol: string): void {
    this.reconnectCounter.inc({ feed, symbol });
  }

  incrementResync(symbol: string): void {
    this.resyncCounter.inc({ symbol });
  }

  setState(feed: FeedKind, symbol: string, state: StreamState): void {
    for (const candidate of STATES) {
      this.stateGauge.set({ feed, symbol, state: candidate }, candidate === state ? 1 : 0);
    }
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): Registry {
    return this.register;
  }
}
