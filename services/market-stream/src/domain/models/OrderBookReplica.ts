import type { OrderBook, OrderBookDiff, OrderBookSnapshotData, PriceLevel } from '@/domain/types';

/**
 * 差分の分類結果。
 * - `apply`: ウォーターマークと連続しており適用できる
 * - `stale`: 適用済み範囲に収まる（再送・古いデータ）。何もしない
 * - `gap`: 取りこぼしがある。レプリカは信用できない
 */
export type DiffClassification = 'apply' | 'stale' | 'gap';

type Side = 'bids' | 'asks';

/**
 * ドメイン層: 板のローカルレプリカ（不変オブジェクト）
 *
 * 差分を適用するたびに新しいインスタンスを返す。既存インスタンスは決して書き換えないので、
 * 読み手は参照を持ったままロックなしで読める。
 *
 * 不変条件:
 * - bids は価格の厳密な降順、asks は厳密な昇順
 * - 同じ価格帯は重複しない
 * - 数量 0 の価格帯は保持しない
 */
export class OrderBookReplica {
  private view: OrderBook | null = null;

  private constructor(
    readonly symbol: string,
    readonly bids: readonly PriceLevel[],
    readonly asks: readonly PriceLevel[],
    readonly lastUpdateId: number,
    readonly sequence: number,
    readonly timestamp: number
  ) {}

  /**
   * スナップショットからレプリカを作る。入力の並び順や重複は問わない（後勝ち）。
   */
  static fromSnapshot(symbol: string, snapshot: OrderBookSnapshotData, sequence = 1): OrderBookReplica {
    return new OrderBookReplica(
      symbol,
      mergeLevels([], snapshot.bids, 'bids'),
      mergeLevels([], snapshot.asks, 'asks'),
      snapshot.lastUpdateId,
      sequence,
      snapshot.timestamp
    );
  }

  /**
   * 差分がこのレプリカに対してどう扱われるべきかを判定する。
   * 適用条件は `firstUpdateId <= lastUpdateId + 1 <= finalUpdateId`。
   */
  classify(diff: OrderBookDiff): DiffClassification {
    const next = this.lastUpdateId + 1;
    if (diff.finalUpdateId < next) {
      return 'stale';
    }
    if (diff.firstUpdateId > next) {
      return 'gap';
    }
    return 'apply';
  }

  /**
   * 差分を適用した新しいレプリカを返す。
   * 適用できない差分（stale / gap）を渡した場合は RangeError を投げる。
   */
  apply(diff: OrderBookDiff): OrderBookReplica {
    const classification = this.classify(diff);
    if (classification !== 'apply') {
      throw new RangeError(
        `diff [${diff.firstUpdateId}, ${diff.finalUpdateId}] is ${classification} for watermark ${this.lastUpdateId}`
      );
    }

    return new OrderBookReplica(
      this.symbol,
      mergeLevels(this.bids, diff.bids, 'bids'),
      mergeLevels(this.asks, diff.asks, 'asks'),
      diff.finalUpdateId,
      this.sequence + 1,
      diff.timestamp
    );
  }

  /**
   * 公開用の凍結済みビューを返す。depth を指定すると上位 depth 件に切り詰める。
   */
  toOrderBook(depth?: number): OrderBook {
    if (depth === undefined || (depth >= this.bids.length && depth >= this.asks.length)) {
      this.view ??= freezeBook(this, this.bids, this.asks);
      return this.view;
    }
    return freezeBook(this, this.bids.slice(0, depth), this.asks.slice(0, depth));
  }
}

function freezeBook(
  replica: OrderBookReplica,
  bids: readonly PriceLevel[],
  asks: readonly PriceLevel[]
): OrderBook {
  return Object.freeze({
    symbol: replica.symbol,
    bids: Object.freeze(bids.slice()),
    asks: Object.freeze(asks.slice()),
    lastUpdateId: replica.lastUpdateId,
    sequence: replica.sequence,
    timestamp: replica.timestamp,
  });
}

/**
 * 既存の価格帯に更新をマージし、ソート済みの新しい配列を返す。
 * 数量 0（または非正）の更新はその価格帯を削除する。
 */
function mergeLevels(current: readonly PriceLevel[], updates: readonly PriceLevel[], side: Side): PriceLevel[] {
  const levels = new Map<number, number>();
  for (const level of current) {
    levels.set(level.price, level.qty);
  }
  for (const update of updates) {
    if (!Number.isFinite(update.price)) {
      continue;
    }
    if (update.qty > 0) {
      levels.set(update.price, update.qty);
    } else {
      levels.delete(update.price);
    }
  }

  const merged: PriceLevel[] = [];
  for (const [price, qty] of levels) {
    merged.push(Object.freeze({ price, qty }));
  }
  merged.sort(side === 'bids' ? (a, b) => b.price - a.price : (a, b) => a.price - b.price);
  return merged;
}
