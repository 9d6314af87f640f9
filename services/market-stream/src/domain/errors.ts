/**
 * ドメイン層: エラー分類
 *
 * - 設定エラー（ValidationError）: 生成時に即座に投げる
 * - プロトコルエラー（DecodeError, StreamError）: エラーチャネルに流し、購読は継続
 * - 接続エラー（ConnectionLostError, KeepaliveTimeoutError, ConnectTimeoutError）: 再接続を駆動し、状態遷移としてのみ現れる
 * - 整合性エラー（OrderBookGapError）: 接続エラーと同じ経路で再同期
 * - 終端エラー（ReconnectExhaustedError, StreamInterruptedError）: チャネルを閉じる直前に1度だけ流す
 */
export class MarketStreamError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends MarketStreamError {
  constructor(
    readonly field: string,
    message: string
  ) {
    super('validation_error', `validation error: ${field}: ${message}`);
  }
}

export class AlreadySubscribedError extends MarketStreamError {
  constructor(stream: string) {
    super('already_subscribed', `already subscribed: ${stream}`);
  }
}

export class NotSubscribedError extends MarketStreamError {
  constructor(stream: string) {
    super('not_subscribed', `not subscribed: ${stream}`);
  }
}

export class StreamClosedError extends MarketStreamError {
  constructor(stream: string) {
    super('stream_closed', `stream is closed: ${stream}`);
  }
}

export class DuplicateProviderError extends MarketStreamError {
  constructor(provider: string) {
    super('duplicate_provider', `provider "${provider}" already registered`);
  }
}

export class UnsupportedFeedError extends MarketStreamError {
  constructor(provider: string, feed: string) {
    super('unsupported_feed', `[${provider}] feed not supported: ${feed}`);
  }
}

/**
 * 受信メッセージを解釈できなかった。メッセージは破棄され、購読は続く。
 */
export class DecodeError extends MarketStreamError {
  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('decode_error', `[${provider}] ${message}`, options);
  }
}

/**
 * 取引所がストリーム上で返したエラー（購読拒否、レート制限など）。
 */
export class StreamError extends MarketStreamError {
  constructor(
    readonly provider: string,
    readonly stream: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('stream_error', `[${provider}] stream ${stream}: ${message}`, options);
  }
}

/**
 * REST API の失敗（板スナップショット取得など）。
 */
export class ExchangeError extends MarketStreamError {
  constructor(
    readonly provider: string,
    readonly status: number,
    message: string
  ) {
    super('exchange_error', `[${provider}] code=${status}: ${message}`);
  }
}

export class ConnectionLostError extends MarketStreamError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('connection_lost', `connection lost: ${reason}`, options);
  }
}

export class ConnectTimeoutError extends MarketStreamError {
  constructor(timeoutMs: number) {
    super('connect_timeout', `connection not ready within ${timeoutMs}ms`);
  }
}

export class KeepaliveTimeoutError extends MarketStreamError {
  constructor(timeoutMs: number) {
    super('keepalive_timeout', `no pong within ${timeoutMs}ms`);
  }
}

export class OrderBookGapError extends MarketStreamError {
  constructor(
    readonly symbol: string,
    readonly expectedUpdateId: number,
    readonly receivedUpdateId: number
  ) {
    super(
      'orderbook_gap',
      `order book gap for ${symbol}: expected update ${expectedUpdateId}, got ${receivedUpdateId}`
    );
  }
}

export class ReconnectExhaustedError extends MarketStreamError {
  constructor(
    readonly attempts: number,
    cause: Error
  ) {
    super('reconnect_exhausted', `reconnect attempts exhausted after ${attempts} attempts: ${cause.message}`, {
      cause,
    });
  }
}

/**
 * 再接続が無効な購読が中断された。
 */
export class StreamInterruptedError extends MarketStreamError {
  constructor(cause: Error) {
    super('stream_interrupted', `stream interrupted: ${cause.message}`, { cause });
  }
}

/**
 * 閉じたチャネルへの書き込み。正常系では起こらない（書き込み側の所有権で防ぐ）。
 */
export class ChannelClosedError extends MarketStreamError {
  constructor() {
    super('channel_closed', 'send on closed channel');
  }
}

/**
 * メトリクスのラベルに使うエラーコード。MarketStreamError 以外は fallback。
 */
export function errorCode(error: unknown, fallback = 'internal_error'): string {
  return error instanceof MarketStreamError ? error.code : fallback;
}
