import type { FeedKey, MarketEvent } from '@/domain/types';

/**
 * 多重化された1フィードを受け取る側（購読のライフサイクル）が実装するコールバック。
 * どのコールバックも attach() の呼び出し中には呼ばれない。
 */
export interface FeedSink {
  /**
   * 接続が確立し購読要求を送り終えた。板フィードは初期スナップショットの適用まで待つ。
   * 板の最初の公開はこの通知で代替され、onEvent には届かない（latest() で取得する）。
   */
  onReady(): void;

  /** フィードのデータ。板は整合性チェック済みのスナップショットとして届く */
  onEvent(event: MarketEvent): void;

  /** 非致命的なプロトコルエラー（デコード失敗、取引所のエラー応答） */
  onError(error: Error): void;

  /** 接続断・板のギャップなど、再接続が必要な中断。1回の接続につき高々1度 */
  onInterrupted(error: Error): void;

  /** pong や受信メッセージなどの生存確認 */
  onAlive(): void;
}

/**
 * 1購読と共有接続を結ぶハンドル。購読側はトランスポートへ直接書き込まず、
 * すべてこのハンドル経由の「意図」として多重化層に渡す。
 */
export interface FeedAttachment {
  /** 共有接続へ ping を送る */
  ping(): void;

  /** 生存確認に失敗したことを通知する。共有接続は破棄され、全購読者が中断される */
  reportUnhealthy(error: Error): void;

  /** 直近に公開されたデータ（板のみ）。アクティブ化時に最新状態を届けるために使う */
  latest(): MarketEvent | undefined;

  /** 購読から外れる。冪等 */
  detach(): void;
}

/**
 * 論理フィードを提供する多重化層のインターフェース。
 */
export interface FeedSource {
  /**
   * @throws {UnsupportedFeedError} 取引所がこのフィードを提供しない場合
   */
  attach(key: FeedKey, sink: FeedSink): FeedAttachment;
}
