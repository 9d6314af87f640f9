import type { ExchangeConnector } from '@/application/interfaces/ExchangeConnector';
import type { FeedAttachment, FeedSink, FeedSource } from '@/application/interfaces/FeedSource';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ConnectionSlot } from '@/application/stream/ConnectionSlot';
import type { FeedKey } from '@/domain/types';

export interface ConnectionMultiplexerOptions {
  maxPendingDiffs: number;
  logger: Logger;
  metrics?: MetricsCollector;
}

/**
 * 購読レジストリ兼多重化層
 *
 * (エンドポイント, 接続グループ) ごとに1つの ConnectionSlot を共有させる。
 * スロットは最初の購読者で作られ、最後の購読者が外れるか接続を失った時点でマップから消える。
 */
export class ConnectionMultiplexer implements FeedSource {
  private readonly slots = new Map<string, ConnectionSlot>();
  private readonly generations = new Map<string, number>();
  private readonly logger: Logger;

  constructor(
    private readonly connector: ExchangeConnector,
    private readonly options: ConnectionMultiplexerOptions
  ) {
    this.logger = options.logger.child({ component: 'ConnectionMultiplexer', provider: connector.name });
  }

  /** 現在生きているスロットの数 */
  get slotCount(): number {
    return this.slots.size;
  }

  attach(key: FeedKey, sink: FeedSink): FeedAttachment {
    const group = this.connector.connectionGroup(key);
    const topic = this.connector.topic(key);
    const url = this.connector.endpoint(group);
    const slotId = `${url}#${group}`;

    let slot = this.slots.get(slotId);
    if (!slot) {
      slot = this.createSlot(slotId, group, url);
      const attachment = slot.attach(key, topic, sink);
      void slot.open();
      return attachment;
    }
    return slot.attach(key, topic, sink);
  }

  /**
   * すべてのスロットを閉じる。残っている購読者は中断される。
   */
  close(): void {
    for (const slot of [...this.slots.values()]) {
      slot.close('multiplexer closed');
    }
    this.slots.clear();
  }

  private createSlot(slotId: string, group: string, url: string): ConnectionSlot {
    const generation = (this.generations.get(slotId) ?? 0) + 1;
    this.generations.set(slotId, generation);

    const slot = new ConnectionSlot({
      connector: this.connector,
      group,
      url,
      generation,
      maxPendingDiffs: this.options.maxPendingDiffs,
      logger: this.logger,
      metrics: this.options.metrics,
      onRetired: (retired) => {
        if (this.slots.get(slotId) === retired) {
          this.slots.delete(slotId);
        }
      },
    });
    this.slots.set(slotId, slot);
    this.logger.debug('Slot created', { slot: group, generation });
    return slot;
  }
}
