import type { Logger } from '@/application/interfaces/Logger';
import type { WebSocketConnection } from '@/application/interfaces/WebSocketConnection';
import type {
  FeedKey,
  Kline,
  OrderBookDiff,
  OrderBookSnapshotData,
  Ticker,
  Trade,
} from '@/domain/types';

/**
 * 取引所メッセージから取り出した、フィードに紐づくイベント。
 * 板はスナップショットと差分を区別したまま渡し、整合性はエンジン側で取る。
 */
export type ConnectorEvent =
  | { kind: 'ticker'; data: Ticker }
  | { kind: 'trade'; data: Trade }
  | { kind: 'kline'; data: Kline }
  | { kind: 'orderbook.snapshot'; symbol: string; data: OrderBookSnapshotData }
  | { kind: 'orderbook.diff'; symbol: string; data: OrderBookDiff };

/**
 * デコード結果。
 * - `event`: `topic` の購読者へ振り分けるデータ
 * - `control`: 購読応答や heartbeat など、購読者には届けないもの
 * - `error`: 取引所がストリーム上で返したエラー（非致命的）
 */
export type DecodedMessage =
  | { type: 'event'; topic: string; event: ConnectorEvent }
  | { type: 'control' }
  | { type: 'error'; error: Error };

/**
 * アプリケーション層: 取引所ごとの接続能力のインターフェース
 *
 * 責務: 接続先・購読トピック・制御メッセージ・デコードといった取引所固有の知識だけを持つ。
 * 接続の維持や再接続、多重化はエンジン（ConnectionMultiplexer）が担当する。
 */
export interface ExchangeConnector {
  /** 取引所名（例: 'binance'） */
  readonly name: string;

  /** 連続する制御メッセージの最小送信間隔（ミリ秒）。レート制限対策 */
  readonly controlIntervalMs: number;

  /**
   * フィードが乗る物理接続のグループ名を返す。同じグループのフィードは1本の接続を共有する。
   * @throws {UnsupportedFeedError} 取引所がこのフィードを提供しない場合
   */
  connectionGroup(key: FeedKey): string;

  /** 接続グループの WebSocket エンドポイント URL */
  endpoint(group: string): string;

  /**
   * フィードの購読トピック名。デコード結果の `topic` と一致させる。
   * @throws {UnsupportedFeedError} 取引所がこのフィードを提供しない場合
   */
  topic(key: FeedKey): string;

  /**
   * WebSocket 接続を確立する。signal が中断されたら接続を破棄して reject する。
   */
  open(url: string, signal: AbortSignal): Promise<WebSocketConnection>;

  /** トピックを購読する制御メッセージ（送信順） */
  encodeSubscribe(topics: readonly string[]): string[];

  /** トピックの購読を解除する制御メッセージ（送信順） */
  encodeUnsubscribe(topics: readonly string[]): string[];

  /**
   * 受信メッセージを解釈する。
   * @throws {DecodeError} 解釈できない場合（非致命的。メッセージは破棄される）
   */
  decode(data: string): DecodedMessage;

  /**
   * 板の全量スナップショットを REST で取得する。
   * 未実装の取引所はストリーム上でスナップショットを配信するものとして扱う。
   */
  fetchSnapshot?(symbol: string, depth: number, signal: AbortSignal): Promise<OrderBookSnapshotData>;
}

/**
 * コネクタ生成時のオプション。
 */
export interface ConnectorOptions {
  logger?: Logger;
  /** WebSocket エンドポイントの上書き（テストやテストネット用） */
  wsBaseUrl?: string;
  /** REST エンドポイントの上書き */
  restBaseUrl?: string;
}

export type ConnectorFactory = (options: ConnectorOptions) => ExchangeConnector;
