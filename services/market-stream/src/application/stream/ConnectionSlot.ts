import type { ConnectorEvent, DecodedMessage, ExchangeConnector } from '@/application/interfaces/ExchangeConnector';
import type { FeedAttachment, FeedSink } from '@/application/interfaces/FeedSource';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { WebSocketConnection } from '@/application/interfaces/WebSocketConnection';
import { OrderBookSynchronizer } from '@/application/stream/OrderBookSynchronizer';
import { ConnectionLostError, DecodeError, errorCode } from '@/domain/errors';
import type { OrderBookReplica } from '@/domain/models/OrderBookReplica';
import type { FeedKey, MarketEvent } from '@/domain/types';

export interface ConnectionSlotOptions {
  connector: ExchangeConnector;
  group: string;
  url: string;
  /** 同じスロット ID で何本目の接続か */
  generation: number;
  maxPendingDiffs: number;
  logger: Logger;
  metrics?: MetricsCollector;
  /** スロットが使えなくなった（最後の購読者が外れた / 接続を失った） */
  onRetired: (slot: ConnectionSlot) => void;
}

interface Subscriber {
  key: FeedKey;
  sink: FeedSink;
  ready: boolean;
}

interface Route {
  topic: string;
  subscribers: Set<Subscriber>;
  /** 取引所に購読要求を送ったか */
  subscribed: boolean;
  book: OrderBookSynchronizer | null;
}

type SlotPhase = 'connecting' | 'open' | 'retired';

/**
 * 1本の物理接続と、その上に乗る購読トピックの参照カウント。
 *
 * 接続は最初の購読者で張り、最後の購読者が外れたら閉じる。
 * 接続を失ったスロットは再利用せず、購読者はそれぞれのバックオフ後に新しいスロットへ付け直す。
 * トランスポートへの書き込み（購読要求、ping）はすべてこのクラスが行う。
 */
export class ConnectionSlot {
  private phase: SlotPhase = 'connecting';
  private connection: WebSocketConnection | null = null;
  private readonly routes = new Map<string, Route>();
  private readonly controller = new AbortController();
  private readonly controlQueue: Array<{ message: string; onSent?: () => void }> = [];
  private controlTimer: NodeJS.Timeout | null = null;
  private lastControlAt = Number.NEGATIVE_INFINITY;
  private readonly logger: Logger;

  constructor(private readonly options: ConnectionSlotOptions) {
    this.logger = options.logger.child({
      component: 'ConnectionSlot',
      slot: options.group,
      generation: options.generation,
    });
  }

  get group(): string {
    return this.options.group;
  }

  get generation(): number {
    return this.options.generation;
  }

  get retired(): boolean {
    return this.phase === 'retired';
  }

  get topics(): string[] {
    return [...this.routes.keys()];
  }

  /**
   * 接続を開始する。接続できなければ購読者全員を中断してスロットを退役させる。
   */
  async open(): Promise<void> {
    const { connector, url } = this.options;
    let connection: WebSocketConnection;
    try {
      connection = await connector.open(url, this.controller.signal);
    } catch (error) {
      this.fail(
        error instanceof Error ? error : new ConnectionLostError(String(error)),
        'Connection failed'
      );
      return;
    }

    if (this.phase === 'retired') {
      connection.removeAllListeners();
      connection.terminate();
      return;
    }

    this.connection = connection;
    this.phase = 'open';
    connection.onMessage((data) => this.handleMessage(data));
    connection.onPong(() => this.notifyAlive());
    connection.onClose((code, reason) => {
      this.fail(new ConnectionLostError(`socket closed (code=${code}${reason ? ` ${reason}` : ''})`), 'Socket closed');
    });
    connection.onError((error) => {
      this.fail(new ConnectionLostError(error.message, { cause: error }), 'Socket error');
    });

    this.logger.info('Connected', { url, topics: this.routes.size });
    const topics = [...this.routes.values()].filter((route) => route.subscribers.size > 0);
    this.subscribe(topics);
  }

  /**
   * フィードの購読者を追加する。
   */
  attach(key: FeedKey, topic: string, sink: FeedSink): FeedAttachment {
    const subscriber: Subscriber = { key, sink, ready: false };
    let route = this.routes.get(topic);
    const isNewRoute = route === undefined;
    if (!route) {
      route = { topic, subscribers: new Set(), subscribed: false, book: null };
      this.routes.set(topic, route);
    }
    route.subscribers.add(subscriber);

    if (this.phase === 'open') {
      if (isNewRoute) {
        this.subscribe([route]);
      } else if (route.subscribed && (key.kind !== 'orderbook' || route.book?.current)) {
        const joined = route;
        queueMicrotask(() => this.markReady(joined, subscriber));
      }
    }

    let detached = false;
    const owner = route;
    return {
      ping: () => {
        if (this.phase === 'open' && this.connection) {
          this.connection.ping();
        }
      },
      reportUnhealthy: (error) => this.fail(error, 'Connection unhealthy'),
      latest: () => latestFor(owner, subscriber),
      detach: () => {
        if (detached) {
          return;
        }
        detached = true;
        this.detach(owner, subscriber);
      },
    };
  }

  /**
   * 接続を閉じ、残っている購読者を中断する。
   */
  close(reason: string): void {
    this.fail(new ConnectionLostError(reason), 'Slot closed', true);
  }

  private detach(route: Route, subscriber: Subscriber): void {
    route.subscribers.delete(subscriber);
    if (route.subscribers.size > 0 || this.phase === 'retired') {
      return;
    }

    this.routes.delete(route.topic);
    if (this.routes.size === 0) {
      this.retire();
      this.logger.info('Last subscriber left, slot closed');
      return;
    }
    if (route.subscribed && this.phase === 'open') {
      for (const message of this.options.connector.encodeUnsubscribe([route.topic])) {
        this.enqueueControl(message);
      }
    }
  }

  private subscribe(routes: Route[]): void {
    if (routes.length === 0) {
      return;
    }
    const messages = this.options.connector.encodeSubscribe(routes.map((route) => route.topic));
    messages.forEach((message, index) => {
      // 最後の制御メッセージを送った時点で全ルートの購読要求が出ている
      const onSent = index === messages.length - 1 ? () => this.onSubscribed(routes) : undefined;
      this.enqueueControl(message, onSent);
    });
  }

  private onSubscribed(routes: Route[]): void {
    for (const route of routes) {
      if (this.routes.get(route.topic) !== route) {
        continue;
      }
      route.subscribed = true;
      const first = route.subscribers.values().next();
      if (first.done) {
        continue;
      }
      if (first.value.key.kind === 'orderbook') {
        this.startBook(route, first.value.key.symbol, first.value.key.depth);
      } else {
        for (const subscriber of route.subscribers) {
          this.markReady(route, subscriber);
        }
      }
    }
  }

  private startBook(route: Route, symbol: string, depth: number): void {
    const { connector } = this.options;
    const signal = this.controller.signal;
    const fetchSnapshot = connector.fetchSnapshot?.bind(connector);
    const book = new OrderBookSynchronizer(
      symbol,
      {
        maxPendingDiffs: this.options.maxPendingDiffs,
        fetchSnapshot: fetchSnapshot ? () => fetchSnapshot(symbol, depth, signal) : undefined,
        logger: this.logger,
      },
      {
        onBook: (replica) => this.publishBook(route, replica),
        onGap: (error) => {
          this.options.metrics?.incrementResync(symbol);
          this.interruptRoute(route, error);
        },
        onFailure: (error) => this.interruptRoute(route, error),
      }
    );
    route.book = book;
  }

  private publishBook(route: Route, replica: OrderBookReplica): void {
    for (const subscriber of route.subscribers) {
      if (!subscriber.ready) {
        this.markReady(route, subscriber);
        continue;
      }
      if (subscriber.key.kind === 'orderbook') {
        subscriber.sink.onEvent({ kind: 'orderbook', data: replica.toOrderBook(subscriber.key.depth) });
      }
    }
  }

  private markReady(route: Route, subscriber: Subscriber): void {
    if (subscriber.ready || !route.subscribers.has(subscriber) || this.phase !== 'open') {
      return;
    }
    subscriber.ready = true;
    subscriber.sink.onReady();
  }

  /**
   * ルートの購読者全員を中断する。ルートは購読者が外れるまで残り、以後のデータは捨てる。
   */
  private interruptRoute(route: Route, error: Error): void {
    for (const subscriber of [...route.subscribers]) {
      subscriber.sink.onInterrupted(error);
    }
  }

  private handleMessage(data: string): void {
    this.options.metrics?.incrementReceived(this.options.connector.name, this.options.group);
    this.notifyAlive();

    let decoded: DecodedMessage;
    try {
      decoded = this.options.connector.decode(data);
    } catch (error) {
      const decodeError =
        error instanceof DecodeError
          ? error
          : new DecodeError(this.options.connector.name, 'failed to decode message', { cause: error });
      this.options.metrics?.incrementError(decodeError.code);
      this.broadcastError(decodeError);
      return;
    }

    switch (decoded.type) {
      case 'control':
        return;
      case 'error':
        this.logger.warn('Exchange reported an error', { err: decoded.error });
        this.broadcastError(decoded.error);
        return;
      case 'event':
        this.route(decoded.topic, decoded.event);
        return;
    }
  }

  private route(topic: string, event: ConnectorEvent): void {
    const route = this.routes.get(topic);
    if (!route) {
      this.logger.debug('Message for unknown topic dropped', { topic });
      return;
    }

    switch (event.kind) {
      case 'orderbook.snapshot':
        route.book?.handleSnapshot(event.data);
        return;
      case 'orderbook.diff':
        route.book?.handleDiff(event.data);
        return;
      default:
        this.deliver(route, toMarketEvent(event));
    }
  }

  private deliver(route: Route, event: MarketEvent): void {
    for (const subscriber of route.subscribers) {
      if (subscriber.ready) {
        subscriber.sink.onEvent(event);
      }
    }
  }

  private broadcastError(error: Error): void {
    for (const subscriber of this.subscribers()) {
      subscriber.sink.onError(error);
    }
  }

  private notifyAlive(): void {
    for (const subscriber of this.subscribers()) {
      subscriber.sink.onAlive();
    }
  }

  private subscribers(): Subscriber[] {
    const all: Subscriber[] = [];
    for (const route of this.routes.values()) {
      all.push(...route.subscribers);
    }
    return all;
  }

  private enqueueControl(message: string, onSent?: () => void): void {
    this.controlQueue.push({ message, onSent });
    this.flushControl();
  }

  private flushControl(): void {
    if (this.controlTimer || this.phase !== 'open') {
      return;
    }
    while (this.controlQueue.length > 0) {
      const wait = this.lastControlAt + this.options.connector.controlIntervalMs - Date.now();
      if (wait > 0) {
        this.controlTimer = setTimeout(() => {
          this.controlTimer = null;
          this.flushControl();
        }, wait);
        return;
      }
      const next = this.controlQueue.shift();
      if (!next || !this.connection) {
        return;
      }
      this.connection.send(next.message);
      this.lastControlAt = Date.now();
      next.onSent?.();
      if (this.phase !== 'open') {
        return;
      }
    }
  }

  /**
   * 接続を失った。購読者は全員中断され、スロットは退役する。
   * graceful でなければ close ハンドシェイクを待たずにソケットを捨てる。
   */
  private fail(error: Error, message: string, graceful = false): void {
    if (this.phase === 'retired') {
      return;
    }
    const subscribers = this.subscribers();
    this.retire(graceful);
    if (!graceful) {
      this.options.metrics?.incrementError(errorCode(error, 'connection_error'));
    }
    this.logger.warn(message, { err: error, subscribers: subscribers.length });
    for (const subscriber of subscribers) {
      subscriber.sink.onInterrupted(error);
    }
  }

  private retire(graceful = true): void {
    this.phase = 'retired';
    this.controller.abort();
    if (this.controlTimer) {
      clearTimeout(this.controlTimer);
      this.controlTimer = null;
    }
    this.controlQueue.length = 0;
    if (this.connection) {
      this.connection.removeAllListeners();
      if (graceful) {
        this.connection.close();
      } else {
        this.connection.terminate();
      }
      this.connection = null;
    }
    this.options.onRetired(this);
  }
}

function latestFor(route: Route, subscriber: Subscriber): MarketEvent | undefined {
  const replica = route.book?.current;
  if (!replica || subscriber.key.kind !== 'orderbook') {
    return undefined;
  }
  return { kind: 'orderbook', data: replica.toOrderBook(subscriber.key.depth) };
}

function toMarketEvent(event: Extract<ConnectorEvent, { kind: 'ticker' | 'trade' | 'kline' }>): MarketEvent {
  switch (event.kind) {
    case 'ticker':
      return { kind: 'ticker', data: event.data };
    case 'trade':
      return { kind: 'trade', data: event.data };
    case 'kline':
      return { kind: 'kline', data: event.data };
  }
}
