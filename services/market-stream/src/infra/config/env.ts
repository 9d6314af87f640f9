import type { StreamConfig } from '@/application/config/StreamConfig';
import { ValidationError } from '@/domain/errors';
import { type FeedKey, isKlineInterval, normalizeSymbol } from '@/domain/types';

export interface CollectorEnv {
  exchangeName: string;
  feeds: FeedKey[];
  redisUrl: string;
  /** 未指定ならメトリクスサーバーを起動しない */
  metricsPort: number | null;
  streamConfig: Partial<StreamConfig>;
}

type Env = Record<string, string | undefined>;

const DEFAULT_FEED_DEPTH = 20;

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @throws {ValidationError} 環境変数が未設定の場合
 */
export function requireEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ValidationError(key, 'missing required environment variable');
  }
  return value;
}

function optionalInteger(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(key, `must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * `kind:symbol[:param]` を FeedKey にする。
 * 例: `ticker:BTCUSDT`, `orderbook:BTCUSDT:50`, `kline:ETHUSDT:1m`
 * @throws {ValidationError}
 */
export function parseFeed(feed: string): FeedKey {
  const [kind, rawSymbol, param, ...rest] = feed.trim().split(':');
  const symbol = normalizeSymbol(rawSymbol ?? '');
  if (!symbol || rest.length > 0) {
    throw new ValidationError('FEEDS', `malformed feed "${feed}"`);
  }

  switch (kind) {
    case 'ticker':
    case 'trade':
      if (param !== undefined) {
        throw new ValidationError('FEEDS', `${kind} takes no parameter: "${feed}"`);
      }
      return { kind, symbol };
    case 'orderbook': {
      const depth = param === undefined ? DEFAULT_FEED_DEPTH : Number(param);
      if (!Number.isInteger(depth) || depth <= 0) {
        throw new ValidationError('FEEDS', `invalid order book depth in "${feed}"`);
      }
      return { kind, symbol, depth };
    }
    case 'kline':
      if (param === undefined || !isKlineInterval(param)) {
        throw new ValidationError('FEEDS', `invalid kline interval in "${feed}"`);
      }
      return { kind, symbol, interval: param };
    default:
      throw new ValidationError('FEEDS', `unknown feed kind in "${feed}"`);
  }
}

/**
 * コレクタの起動設定を環境変数から読む。
 * @throws {ValidationError}
 */
export function loadCollectorEnv(env: Env = process.env): CollectorEnv {
  const feeds = requireEnv(env, 'FEEDS')
    .split(',')
    .map((feed) => feed.trim())
    .filter(Boolean)
    .map(parseFeed);
  if (feeds.length === 0) {
    throw new ValidationError('FEEDS', 'at least one feed is required');
  }

  const streamConfig: Partial<StreamConfig> = {};
  const bufferSize = optionalInteger(env, 'BUFFER_SIZE');
  if (bufferSize !== undefined) {
    streamConfig.bufferSize = bufferSize;
  }
  const maxReconnectAttempts = optionalInteger(env, 'MAX_RECONNECT_ATTEMPTS');
  if (maxReconnectAttempts !== undefined) {
    streamConfig.maxReconnectAttempts = maxReconnectAttempts;
  }

  return {
    exchangeName: requireEnv(env, 'EXCHANGE_NAME').toLowerCase(),
    feeds,
    redisUrl: requireEnv(env, 'REDIS_URL'),
    metricsPort: optionalInteger(env, 'METRICS_PORT') ?? null,
    streamConfig,
  };
}
