import type { Logger } from '@/application/interfaces/Logger';
import { OrderBookGapError } from '@/domain/errors';
import { OrderBookReplica } from '@/domain/models/OrderBookReplica';
import type { OrderBookDiff, OrderBookSnapshotData } from '@/domain/types';

export interface OrderBookSynchronizerHooks {
  /** 新しいレプリカを公開する */
  onBook(replica: OrderBookReplica): void;
  /** ギャップを検出した。レプリカは破棄済みで、以後の入力は無視される */
  onGap(error: OrderBookGapError): void;
  /** スナップショットを取得できなかった */
  onFailure(error: Error): void;
}

export interface OrderBookSynchronizerOptions {
  /** スナップショット到着前に溜める差分の上限。超えたら古いものから捨てる */
  maxPendingDiffs: number;
  /** REST スナップショットの取得。無ければストリーム上の全量スナップショットを待つ */
  fetchSnapshot?: () => Promise<OrderBookSnapshotData>;
  /** スナップショットが最初の差分より古いときに取り直す回数 */
  maxSnapshotRetries?: number;
  logger: Logger;
}

export const DEFAULT_MAX_SNAPSHOT_RETRIES = 3;

type Phase = 'awaiting' | 'synced' | 'invalid';

/**
 * 板の整合性エンジン（1ルート = 1シンボルの板ストリームにつき1つ）
 *
 * - スナップショット前の差分はバッファし、スナップショット適用後に再生する
 * - REST スナップショットは最初の差分が届いてから取りに行き、バッファより古ければ取り直す
 * - 差分は `first <= last + 1 <= final` のときだけ適用し、それ以外は stale（無視）か gap（無効化）
 * - 取引所がストリーム上で全量スナップショットを送る場合は、受け取るたびに置き換える
 */
export class OrderBookSynchronizer {
  private phase: Phase = 'awaiting';
  private replica: OrderBookReplica | null = null;
  private pending: OrderBookDiff[] = [];
  private fetching = false;
  private snapshotRetries = 0;

  constructor(
    readonly symbol: string,
    private readonly options: OrderBookSynchronizerOptions,
    private readonly hooks: OrderBookSynchronizerHooks
  ) {}

  get current(): OrderBookReplica | null {
    return this.replica;
  }

  get pendingDiffs(): number {
    return this.pending.length;
  }

  get invalidated(): boolean {
    return this.phase === 'invalid';
  }

  get fetchingSnapshot(): boolean {
    return this.fetching;
  }

  handleSnapshot(snapshot: OrderBookSnapshotData): void {
    if (this.phase === 'invalid') {
      return;
    }
    if (this.replica && snapshot.lastUpdateId < this.replica.lastUpdateId) {
      this.options.logger.debug('Stale snapshot ignored', {
        symbol: this.symbol,
        lastUpdateId: snapshot.lastUpdateId,
        watermark: this.replica.lastUpdateId,
      });
      return;
    }

    const sequence = this.replica ? this.replica.sequence + 1 : 1;
    let replica = OrderBookReplica.fromSnapshot(this.symbol, snapshot, sequence);

    const buffered = this.pending;
    this.pending = [];
    for (const diff of buffered) {
      const classification = replica.classify(diff);
      if (classification === 'gap') {
        this.invalidate(replica.lastUpdateId + 1, diff.firstUpdateId);
        return;
      }
      if (classification === 'apply') {
        replica = replica.apply(diff);
      }
    }

    if (buffered.length > 0) {
      this.options.logger.debug('Buffered diffs replayed', { symbol: this.symbol, count: buffered.length });
    }
    this.phase = 'synced';
    this.publish(replica);
  }

  handleDiff(diff: OrderBookDiff): void {
    if (this.phase === 'invalid') {
      return;
    }

    if (this.phase === 'awaiting' || !this.replica) {
      this.pending.push(diff);
      if (this.pending.length > this.options.maxPendingDiffs) {
        this.pending.shift();
        this.options.logger.warn('Pending diff buffer overflow', { symbol: this.symbol });
      }
      this.requestSnapshot();
      return;
    }

    const classification = this.replica.classify(diff);
    switch (classification) {
      case 'stale':
        return;
      case 'gap':
        this.invalidate(this.replica.lastUpdateId + 1, diff.firstUpdateId);
        return;
      case 'apply':
        this.publish(this.replica.apply(diff));
        return;
    }
  }

  private requestSnapshot(): void {
    const { fetchSnapshot } = this.options;
    if (!fetchSnapshot || this.fetching) {
      return;
    }
    this.fetching = true;
    void this.load(fetchSnapshot);
  }

  /**
   * 取得の失敗は onFailure に流す。
   */
  private async load(fetchSnapshot: () => Promise<OrderBookSnapshotData>): Promise<void> {
    let snapshot: OrderBookSnapshotData;
    try {
      snapshot = await fetchSnapshot();
    } catch (error) {
      this.fetching = false;
      if (this.phase === 'awaiting') {
        this.phase = 'invalid';
        this.pending = [];
        this.hooks.onFailure(error instanceof Error ? error : new Error(String(error)));
      }
      return;
    }
    this.fetching = false;
    if (this.phase !== 'awaiting') {
      return;
    }

    const first = this.pending[0];
    const maxRetries = this.options.maxSnapshotRetries ?? DEFAULT_MAX_SNAPSHOT_RETRIES;
    if (first && snapshot.lastUpdateId < first.firstUpdateId - 1 && this.snapshotRetries < maxRetries) {
      this.snapshotRetries += 1;
      this.options.logger.debug('Snapshot older than buffered diffs, refetching', {
        symbol: this.symbol,
        lastUpdateId: snapshot.lastUpdateId,
        firstBuffered: first.firstUpdateId,
        retry: this.snapshotRetries,
      });
      this.requestSnapshot();
      return;
    }
    // 取り直しが尽きたら再生中の gap として扱う
    this.handleSnapshot(snapshot);
  }

  private publish(replica: OrderBookReplica): void {
    this.replica = replica;
    this.hooks.onBook(replica);
  }

  private invalidate(expected: number, received: number): void {
    this.phase = 'invalid';
    this.replica = null;
    this.pending = [];
    const error = new OrderBookGapError(this.symbol, expected, received);
    this.options.logger.warn('Order book gap detected', { symbol: this.symbol, expected, received });
    this.hooks.onGap(error);
  }
}
