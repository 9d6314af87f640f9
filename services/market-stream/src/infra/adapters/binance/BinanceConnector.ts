import type {
  ConnectorOptions,
  DecodedMessage,
  ExchangeConnector,
} from '@/application/interfaces/ExchangeConnector';
import type { Logger } from '@/application/interfaces/Logger';
import type { WebSocketConnection } from '@/application/interfaces/WebSocketConnection';
import { DecodeError, ExchangeError } from '@/domain/errors';
import type { FeedKey, OrderBookSnapshotData } from '@/domain/types';
import { isRecord, readNumber, readTupleLevels } from '@/infra/adapters/parse';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { connectWebSocket } from '@/infra/websocket/WsWebSocketConnection';
import { BinanceMessageParser } from './BinanceMessageParser';
import type { BinanceControlRequest } from './types/BinanceControl';

export const BINANCE_WS_BASE_URL = 'wss://stream.binance.com:9443';
export const BINANCE_REST_BASE_URL = 'https://api.binance.com';

/** /api/v3/depth が受け付ける limit */
const DEPTH_LIMITS = [5, 10, 20, 50, 100, 500, 1000, 5000] as const;
/** 差分を積み上げるための最低限の取得件数 */
const MIN_SNAPSHOT_LIMIT = 100;
/** 1つの購読リクエストに載せるストリーム数 */
const MAX_PARAMS_PER_REQUEST = 100;

/**
 * 板の深さから REST の limit を選ぶ。
 */
export function snapshotLimit(depth: number): number {
  const wanted = Math.max(depth, MIN_SNAPSHOT_LIMIT);
  return DEPTH_LIMITS.find((limit) => limit >= wanted) ?? DEPTH_LIMITS[DEPTH_LIMITS.length - 1];
}

/**
 * インフラ層: Binance 現物の ExchangeConnector 実装
 *
 * フィード種別ごとに結合ストリームの接続を分け、SUBSCRIBE / UNSUBSCRIBE で増減させる。
 * 板は `@depth@100ms` の差分と REST の深さスナップショットを組み合わせる。
 */
export class BinanceConnector implements ExchangeConnector {
  readonly name = 'binance';
  /** 受信側の制御メッセージは 1 秒あたり 5 件まで */
  readonly controlIntervalMs = 250;
  private readonly parser = new BinanceMessageParser();
  private readonly wsBaseUrl: string;
  private readonly restBaseUrl: string;
  private readonly logger: Logger;
  private requestId = 0;

  constructor(options: ConnectorOptions = {}) {
    this.wsBaseUrl = options.wsBaseUrl ?? BINANCE_WS_BASE_URL;
    this.restBaseUrl = options.restBaseUrl ?? BINANCE_REST_BASE_URL;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'BinanceConnector' });
  }

  connectionGroup(key: FeedKey): string {
    return key.kind;
  }

  endpoint(): string {
    return `${this.wsBaseUrl}/stream`;
  }

  topic(key: FeedKey): string {
    const symbol = key.symbol.toLowerCase();
    switch (key.kind) {
      case 'ticker':
        return `${symbol}@ticker`;
      case 'trade':
        return `${symbol}@trade`;
      case 'kline':
        return `${symbol}@kline_${key.interval}`;
      case 'orderbook':
        return `${symbol}@depth@100ms`;
    }
  }

  open(url: string, signal: AbortSignal): Promise<WebSocketConnection> {
    this.logger.debug('Opening connection', { url });
    return connectWebSocket(url, signal);
  }

  encodeSubscribe(topics: readonly string[]): string[] {
    return this.encode('SUBSCRIBE', topics);
  }

  encodeUnsubscribe(topics: readonly string[]): string[] {
    return this.encode('UNSUBSCRIBE', topics);
  }

  decode(data: string): DecodedMessage {
    return this.parser.parse(data);
  }

  /**
   * @throws {ExchangeError} HTTP エラー
   * @throws {DecodeError} 応答を解釈できない場合
   */
  async fetchSnapshot(symbol: string, depth: number, signal: AbortSignal): Promise<OrderBookSnapshotData> {
    const url = new URL('/api/v3/depth', this.restBaseUrl);
    url.searchParams.set('symbol', symbol.toUpperCase());
    url.searchParams.set('limit', String(snapshotLimit(depth)));

    const response = await fetch(url, { signal });
    if (!response.ok) {
      throw new ExchangeError(this.name, response.status, await response.text());
    }

    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new DecodeError(this.name, 'depth snapshot is not an object');
    }
    const snapshot = {
      lastUpdateId: readNumber(this.name, body, 'lastUpdateId'),
      bids: readTupleLevels(this.name, body, 'bids'),
      asks: readTupleLevels(this.name, body, 'asks'),
      timestamp: Date.now(),
    };
    this.logger.debug('Depth snapshot fetched', {
      symbol,
      lastUpdateId: snapshot.lastUpdateId,
      levels: snapshot.bids.length + snapshot.asks.length,
    });
    return snapshot;
  }

  private encode(method: BinanceControlRequest['method'], topics: readonly string[]): string[] {
    const messages: string[] = [];
    for (let i = 0; i < topics.length; i += MAX_PARAMS_PER_REQUEST) {
      this.requestId += 1;
      const request: BinanceControlRequest = {
        method,
        params: topics.slice(i, i + MAX_PARAMS_PER_REQUEST),
        id: this.requestId,
      };
      messages.push(JSON.stringify(request));
    }
    return messages;
  }
}
