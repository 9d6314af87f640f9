import type { StreamState } from '@/domain/models/StreamState';
import type { FeedKind } from '@/domain/types';

/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: ストリームエンジンの観測値（受信・配送・ドロップ・再接続）の収集と公開を抽象化
 */
export interface MetricsCollector {
  /**
   * 物理接続から受信したメッセージ数をカウント
   * @param provider 取引所名
   * @param slot 接続スロット（接続グループ名）
   */
  incrementReceived(provider: string, slot: string): void;

  /**
   * 購読者のチャネルへ配送したイベント数をカウント
   */
  incrementEmitted(feed: FeedKind, symbol: string): void;

  /**
   * チャネル溢れで捨てたイベント数をカウント
   */
  incrementDropped(feed: FeedKind, symbol: string): void;

  /**
   * 配信メッセージ数をカウント
   * @param stream ストリーム名（md:ticker, md:orderbook など）
   */
  incrementPublished(stream: string, symbol: string): void;

  /**
   * エラー数をカウント
   * @param errorType エラーコード（decode_error, publish_error, orderbook_gap など）
   */
  incrementError(errorType: string): void;

  /**
   * 再接続回数をカウント
   */
  incrementReconnect(feed: FeedKind, symbol: string): void;

  /**
   * 板の再同期回数をカウント
   */
  incrementResync(symbol: string): void;

  /**
   * 購読の現在状態を記録
   */
  setState(feed: FeedKind, symbol: string, state: StreamState): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
