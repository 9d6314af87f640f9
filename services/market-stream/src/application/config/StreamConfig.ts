import { ValidationError } from '@/domain/errors';

/**
 * チャネルが満杯のときにどちらを捨てるか。
 * - `drop-oldest`: 溜まっている最古の要素を捨てて新しい要素を入れる（鮮度優先）
 * - `drop-newest`: 新しい要素を捨てて溜まっている要素を残す
 */
export type OverflowPolicy = 'drop-oldest' | 'drop-newest';

/**
 * 購読ごとの設定。
 */
export interface StreamConfig {
  /** データチャネルの容量。0 は待機中の読み手への直接受け渡しのみ */
  bufferSize: number;
  /** 既定は drop-oldest。遅い読み手には最新の値が残る代わりに、未読の古い値は失われる */
  overflowPolicy: OverflowPolicy;
  /** エラーチャネルの容量 */
  errorBufferSize: number;
  /** 切断時に自動で再接続するか */
  reconnect: boolean;
  /** 再接続を諦めるまでの連続失敗回数。0 は無制限 */
  maxReconnectAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** ping の送信間隔。0 で keepalive を無効化（再接続が無効な場合のみ可） */
  pingIntervalMs: number;
  pongTimeoutMs: number;
  /** 接続確立（板は初期スナップショット適用まで）のタイムアウト */
  connectTimeoutMs: number;
  /** スナップショット到着前に溜めておく板差分の上限 */
  maxPendingDiffs: number;
}

export const DEFAULT_STREAM_CONFIG: Readonly<StreamConfig> = Object.freeze({
  bufferSize: 100,
  overflowPolicy: 'drop-oldest',
  errorBufferSize: 10,
  reconnect: true,
  maxReconnectAttempts: 10,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  pingIntervalMs: 20000,
  pongTimeoutMs: 10000,
  connectTimeoutMs: 10000,
  maxPendingDiffs: 1000,
});

function requireNonNegativeInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(field, `must be a non-negative integer, got ${value}`);
  }
}

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(field, `must be positive, got ${value}`);
  }
}

/**
 * 設定値を検証する。不正な値は実行時ではなく生成時に落とす。
 * @throws {ValidationError}
 */
export function validateStreamConfig(config: StreamConfig): void {
  requireNonNegativeInteger('bufferSize', config.bufferSize);
  requireNonNegativeInteger('errorBufferSize', config.errorBufferSize);
  requireNonNegativeInteger('maxReconnectAttempts', config.maxReconnectAttempts);
  requireNonNegativeInteger('maxPendingDiffs', config.maxPendingDiffs);
  requirePositive('baseDelayMs', config.baseDelayMs);
  requirePositive('maxDelayMs', config.maxDelayMs);
  requirePositive('connectTimeoutMs', config.connectTimeoutMs);

  if (config.maxDelayMs < config.baseDelayMs) {
    throw new ValidationError(
      'maxDelayMs',
      `must be greater than or equal to baseDelayMs (${config.baseDelayMs}), got ${config.maxDelayMs}`
    );
  }
  if (config.overflowPolicy !== 'drop-oldest' && config.overflowPolicy !== 'drop-newest') {
    throw new ValidationError('overflowPolicy', `unknown policy: ${String(config.overflowPolicy)}`);
  }

  if (config.reconnect) {
    requirePositive('pingIntervalMs', config.pingIntervalMs);
    requirePositive('pongTimeoutMs', config.pongTimeoutMs);
  } else {
    requireNonNegativeInteger('pingIntervalMs', config.pingIntervalMs);
    if (config.pingIntervalMs > 0) {
      requirePositive('pongTimeoutMs', config.pongTimeoutMs);
    }
  }
}

/**
 * 既定値に上書き分を重ねて検証済みの設定を作る。
 * @throws {ValidationError}
 */
export function resolveStreamConfig(overrides: Partial<StreamConfig> = {}): StreamConfig {
  const config: StreamConfig = { ...DEFAULT_STREAM_CONFIG, ...overrides };
  validateStreamConfig(config);
  return config;
}
