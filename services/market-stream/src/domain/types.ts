/**
 * ドメイン層: マーケットデータの型定義（DTO 的な型のみ）
 *
 * 注意: ticker / trade / kline は単純なデータの入れ物で、振る舞いは持たない。
 * 板（OrderBook）の整合性ロジックは models/OrderBookReplica.ts に置く。
 */

/**
 * 購読対象となるフィード種別。
 */
export type FeedKind = 'ticker' | 'orderbook' | 'trade' | 'kline';

/**
 * ローソク足の間隔。
 */
export const KLINE_INTERVALS = [
  '1m',
  '3m',
  '5m',
  '15m',
  '30m',
  '1h',
  '2h',
  '4h',
  '6h',
  '8h',
  '12h',
  '1d',
  '3d',
  '1w',
  '1M',
] as const;

export type KlineInterval = (typeof KLINE_INTERVALS)[number];

export function isKlineInterval(value: string): value is KlineInterval {
  return KLINE_INTERVALS.some((interval) => interval === value);
}

/**
 * 1つの論理フィードを識別するキー（購読ハンドルの識別子）。
 * orderbook は板の深さ、kline は足の間隔をパラメータとして持つ。
 */
export type FeedKey =
  | { kind: 'ticker'; symbol: string }
  | { kind: 'trade'; symbol: string }
  | { kind: 'orderbook'; symbol: string; depth: number }
  | { kind: 'kline'; symbol: string; interval: KlineInterval };

/**
 * フィードキーをログやマップのキーに使える文字列にする。
 * 例: `orderbook:BTCUSDT:20`, `kline:ETHUSDT:1m`
 */
export function feedKeyId(key: FeedKey): string {
  switch (key.kind) {
    case 'orderbook':
      return `${key.kind}:${key.symbol}:${key.depth}`;
    case 'kline':
      return `${key.kind}:${key.symbol}:${key.interval}`;
    default:
      return `${key.kind}:${key.symbol}`;
  }
}

/**
 * シンボルを正規化する（前後の空白除去 + 大文字化）。
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export type TradeSide = 'buy' | 'sell';

/** 正規化された ticker */
export interface Ticker {
  readonly symbol: string;
  readonly lastPrice: number;
  readonly bidPrice: number;
  readonly askPrice: number;
  /** 取引所によっては提供されない */
  readonly bidQty?: number;
  readonly askQty?: number;
  readonly high24h: number;
  readonly low24h: number;
  readonly volume24h: number;
  /** エポックミリ秒 */
  readonly timestamp: number;
}

/** 正規化された約定 */
export interface Trade {
  readonly id: string;
  readonly symbol: string;
  readonly price: number;
  readonly qty: number;
  readonly side: TradeSide;
  readonly isBuyerMaker: boolean;
  readonly timestamp: number;
}

/** 正規化されたローソク足 */
export interface Kline {
  readonly symbol: string;
  readonly interval: KlineInterval;
  readonly openTime: number;
  readonly closeTime: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly quoteVolume: number;
  readonly tradeCount: number;
  /** 足が確定しているか */
  readonly isClosed: boolean;
}

/** 板の1価格帯 */
export interface PriceLevel {
  readonly price: number;
  readonly qty: number;
}

/**
 * 購読者に公開される板のスナップショット（不変）。
 * bids は価格の降順、asks は価格の昇順。
 */
export interface OrderBook {
  readonly symbol: string;
  readonly bids: readonly PriceLevel[];
  readonly asks: readonly PriceLevel[];
  /** 適用済みの最大 update ID（ウォーターマーク） */
  readonly lastUpdateId: number;
  /** 公開ごとに単調増加するカウンタ */
  readonly sequence: number;
  readonly timestamp: number;
}

/**
 * 取引所から受け取る板の全量スナップショット。
 */
export interface OrderBookSnapshotData {
  readonly lastUpdateId: number;
  readonly bids: readonly PriceLevel[];
  readonly asks: readonly PriceLevel[];
  readonly timestamp: number;
}

/**
 * 板の差分更新。`[firstUpdateId, finalUpdateId]` の範囲を持つ。
 * 数量 0 のエントリはその価格帯の削除を意味する。
 */
export interface OrderBookDiff {
  readonly firstUpdateId: number;
  readonly finalUpdateId: number;
  readonly bids: readonly PriceLevel[];
  readonly asks: readonly PriceLevel[];
  readonly timestamp: number;
}

/**
 * 購読者に届くデータ。フィード種別ごとの判別共用体。
 */
export type MarketEvent =
  | { kind: 'ticker'; data: Ticker }
  | { kind: 'trade'; data: Trade }
  | { kind: 'kline'; data: Kline }
  | { kind: 'orderbook'; data: OrderBook };

export type MarketData = MarketEvent['data'];

export function bestBid(book: OrderBook): PriceLevel | undefined {
  return book.bids[0];
}

export function bestAsk(book: OrderBook): PriceLevel | undefined {
  return book.asks[0];
}

/**
 * 最良売り - 最良買い。どちらかが空なら null。
 */
export function spread(book: OrderBook): number | null {
  const bid = bestBid(book);
  const ask = bestAsk(book);
  if (!bid || !ask) {
    return null;
  }
  return ask.price - bid.price;
}

export function midPrice(book: OrderBook): number | null {
  const bid = bestBid(book);
  const ask = bestAsk(book);
  if (!bid || !ask) {
    return null;
  }
  return (bid.price + ask.price) / 2;
}
