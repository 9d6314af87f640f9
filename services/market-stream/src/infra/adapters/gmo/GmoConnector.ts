import type {
  ConnectorOptions,
  DecodedMessage,
  ExchangeConnector,
} from '@/application/interfaces/ExchangeConnector';
import type { Logger } from '@/application/interfaces/Logger';
import type { WebSocketConnection } from '@/application/interfaces/WebSocketConnection';
import { UnsupportedFeedError } from '@/domain/errors';
import { type FeedKey, feedKeyId } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { connectWebSocket } from '@/infra/websocket/WsWebSocketConnection';
import { GmoMessageParser } from './GmoMessageParser';
import { type GmoChannel, type GmoCommand, isGmoChannel } from './types/GmoCommand';
import { gmoTopic } from './types/GmoTopic';

export const GMO_WS_PUBLIC_URL = 'wss://api.coin.z.com/ws/public/v1';

/** GMO API のレート制限: 購読リクエストは1秒に1回 */
const SUBSCRIPTION_INTERVAL_MS = 1000;

/**
 * インフラ層: GMO コイン Public WebSocket の ExchangeConnector 実装
 *
 * 責務: チャンネル名・購読コマンド・メッセージパースといった GMO 固有のプロトコル知識。
 * ローソク足は WebSocket で配信されないため未対応。
 */
export class GmoConnector implements ExchangeConnector {
  readonly name = 'gmo';
  readonly controlIntervalMs = SUBSCRIPTION_INTERVAL_MS;
  private readonly parser = new GmoMessageParser();
  private readonly wsUrl: string;
  private readonly logger: Logger;

  constructor(options: ConnectorOptions = {}) {
    this.wsUrl = options.wsBaseUrl ?? GMO_WS_PUBLIC_URL;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'GmoConnector' });
  }

  connectionGroup(key: FeedKey): string {
    this.channelFor(key);
    return 'public';
  }

  endpoint(): string {
    return this.wsUrl;
  }

  topic(key: FeedKey): string {
    return gmoTopic(this.channelFor(key), key.symbol);
  }

  open(url: string, signal: AbortSignal): Promise<WebSocketConnection> {
    this.logger.debug('Opening connection', { url });
    return connectWebSocket(url, signal);
  }

  encodeSubscribe(topics: readonly string[]): string[] {
    return topics.map((topic) => JSON.stringify(toCommand('subscribe', topic)));
  }

  encodeUnsubscribe(topics: readonly string[]): string[] {
    return topics.map((topic) => JSON.stringify(toCommand('unsubscribe', topic)));
  }

  decode(data: string): DecodedMessage {
    return this.parser.parse(data);
  }

  private channelFor(key: FeedKey): GmoChannel {
    switch (key.kind) {
      case 'ticker':
        return 'ticker';
      case 'orderbook':
        return 'orderbooks';
      case 'trade':
        return 'trades';
      case 'kline':
        throw new UnsupportedFeedError(this.name, feedKeyId(key));
    }
  }
}

function toCommand(command: GmoCommand['command'], topic: string): GmoCommand {
  const separator = topic.indexOf(':');
  const channel = topic.slice(0, separator);
  if (separator < 0 || !isGmoChannel(channel)) {
    throw new RangeError(`not a GMO topic: ${topic}`);
  }
  return { command, channel, symbol: topic.slice(separator + 1) };
}
