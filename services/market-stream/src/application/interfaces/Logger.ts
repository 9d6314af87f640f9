/**
 * 構造化ログのメタデータ（pino の mergingObject に渡される）。
 */
export type LogMeta = Record<string, unknown>;

/**
 * ロガーインターフェース
 *
 * 実装は pino（infra/logger/PinoLogger）。
 * テストでは LoggerMock に差し替えるため、コンポーネントはこの型だけに依存する。
 */
export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;

  /**
   * コンテキスト（component, stream, slot など）を自動付与する子ロガーを作成
   * @param bindings 子ロガーに付与するコンテキスト情報
   */
  child(bindings: LogMeta): Logger;
}
