import type { FeedKind, MarketData } from '@/domain/types';

/**
 * 下流（Redis Stream など）へ配信する正規化済みイベント。
 * 取引所固有の形式を統一したフォーマットに変換したデータ。
 *
 * @template T データの型（ticker, orderbook, trade, kline ごとに異なる）
 */
export interface NormalizedEvent<T extends MarketData = MarketData> {
  /** マーケットデータの種別 */
  type: FeedKind;
  /** 取引所名（例: 'binance'） */
  exchange: string;
  /** 取引ペア（例: 'BTCUSDT'） */
  symbol: string;
  /** タイムスタンプ（エポックミリ秒） */
  ts: number;
  /** データ本体（種別ごとに異なる構造） */
  data: T;
}
