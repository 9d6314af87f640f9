import { type Mock, vi } from 'vitest';
import type { ConnectorEvent, DecodedMessage, ExchangeConnector } from '@/application/interfaces/ExchangeConnector';
import type { WebSocketConnection } from '@/application/interfaces/WebSocketConnection';
import { ConnectionLostError, DecodeError, StreamError } from '@/domain/errors';
import type { FeedKey, OrderBookSnapshotData } from '@/domain/types';
import { FakeWebSocketConnection } from './FakeWebSocketConnection';

export type OpenBehavior = 'open' | 'fail' | 'hang';

type FetchSnapshot = (symbol: string, depth: number, signal: AbortSignal) => Promise<OrderBookSnapshotData>;

/**
 * テスト用の ExchangeConnector
 *
 * ワイヤ形式はテスト専用の JSON:
 * - `{"topic": "...", "event": ConnectorEvent}` → event
 * - `{"ack": true}` → control
 * - `{"error": "..."}` → error
 * - それ以外 → DecodeError
 */
export class FakeConnector implements ExchangeConnector {
  readonly name = 'fake';
  controlIntervalMs = 0;
  openBehavior: OpenBehavior = 'open';
  readonly connections: FakeWebSocketConnection[] = [];
  readonly openCalls: string[] = [];
  fetchSnapshot?: FetchSnapshot;

  connectionGroup(key: FeedKey): string {
    return key.kind === 'orderbook' ? 'depth' : 'market';
  }

  endpoint(group: string): string {
    return `wss://fake.test/${group}`;
  }

  topic(key: FeedKey): string {
    switch (key.kind) {
      case 'kline':
        return `kline:${key.symbol}:${key.interval}`;
      default:
        return `${key.kind}:${key.symbol}`;
    }
  }

  async open(url: string, signal: AbortSignal): Promise<WebSocketConnection> {
    this.openCalls.push(url);
    switch (this.openBehavior) {
      case 'fail':
        throw new ConnectionLostError('connection refused');
      case 'hang':
        return new Promise((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new ConnectionLostError('aborted')), { once: true });
        });
      case 'open': {
        const connection = new FakeWebSocketConnection();
        this.connections.push(connection);
        return connection;
      }
    }
  }

  encodeSubscribe(topics: readonly string[]): string[] {
    return [JSON.stringify({ op: 'subscribe', topics })];
  }

  encodeUnsubscribe(topics: readonly string[]): string[] {
    return [JSON.stringify({ op: 'unsubscribe', topics })];
  }

  decode(data: string): DecodedMessage {
    const message: unknown = JSON.parse(data);
    if (typeof message !== 'object' || message === null) {
      throw new DecodeError(this.name, 'not an object');
    }
    if ('ack' in message) {
      return { type: 'control' };
    }
    if ('error' in message && typeof message.error === 'string') {
      return { type: 'error', error: new StreamError(this.name, 'test', message.error) };
    }
    if ('topic' in message && typeof message.topic === 'string' && 'event' in message && isConnectorEvent(message.event)) {
      return { type: 'event', topic: message.topic, event: message.event };
    }
    throw new DecodeError(this.name, 'unknown message');
  }

  /** 直近に開いた接続 */
  latest(): FakeWebSocketConnection {
    const connection = this.connections[this.connections.length - 1];
    if (!connection) {
      throw new Error('no connection opened');
    }
    return connection;
  }

  /**
   * REST スナップショットを使う取引所として振る舞わせる。戻り値の resolve で応答を返す。
   */
  useSnapshots(): {
    fetch: Mock<FetchSnapshot>;
    resolve: (snapshot: OrderBookSnapshotData) => void;
    reject: (error: Error) => void;
  } {
    const pending: Array<{ resolve: (s: OrderBookSnapshotData) => void; reject: (e: Error) => void }> = [];
    const fetch = vi.fn<FetchSnapshot>(
      () =>
        new Promise<OrderBookSnapshotData>((resolve, reject) => {
          pending.push({ resolve, reject });
        })
    );
    this.fetchSnapshot = fetch;
    return {
      fetch,
      resolve: (snapshot) => pending.shift()?.resolve(snapshot),
      reject: (error) => pending.shift()?.reject(error),
    };
  }
}

function isConnectorEvent(value: unknown): value is ConnectorEvent {
  return typeof value === 'object' && value !== null && 'kind' in value && typeof value.kind === 'string';
}

/**
 * テスト用ワイヤ形式のイベントメッセージ
 */
export function eventMessage(topic: string, event: ConnectorEvent): string {
  return JSON.stringify({ topic, event });
}
