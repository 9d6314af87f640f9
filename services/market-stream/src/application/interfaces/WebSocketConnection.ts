/**
 * 取引所非依存の WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: 接続済みソケットのイベント処理と送信を抽象化する。
 * 実装は `ws` パッケージを使う infra/websocket/WsWebSocketConnection。
 * 受信データはテキスト（UTF-8）に変換済みで渡される。
 */
export interface WebSocketConnection {
  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): void;

  /**
   * メッセージを受信したときに呼ばれるコールバック
   */
  onMessage(callback: (data: string) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (code: number, reason: string) => void): void;

  /**
   * エラーが発生したときに呼ばれるコールバック
   */
  onError(callback: (error: Error) => void): void;

  /**
   * pong フレームを受信したときに呼ばれるコールバック（生存確認）
   */
  onPong(callback: () => void): void;

  /**
   * メッセージを送信する
   */
  send(data: string): void;

  /**
   * ping フレームを送信する
   */
  ping(): void;

  /**
   * 接続を閉じる（クローズハンドシェイクあり）
   */
  close(): void;

  /**
   * すべてのイベントリスナーを削除する
   */
  removeAllListeners(): void;

  /**
   * 接続を強制終了する
   */
  terminate(): void;
}
