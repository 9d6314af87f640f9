import { type StreamConfig, validateStreamConfig } from '@/application/config/StreamConfig';
import type { FeedAttachment, FeedSink, FeedSource } from '@/application/interfaces/FeedSource';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { type ChannelWriter, createChannel, type ReadableChannel } from '@/application/stream/Channel';
import {
  AlreadySubscribedError,
  ConnectTimeoutError,
  errorCode,
  KeepaliveTimeoutError,
  NotSubscribedError,
  ReconnectExhaustedError,
  StreamClosedError,
  StreamInterruptedError,
} from '@/domain/errors';
import { canTransition, isTerminal, StreamState } from '@/domain/models/StreamState';
import { type FeedKey, feedKeyId, type MarketEvent } from '@/domain/types';
import { KeepaliveWatchdog } from '@/infra/keepalive/KeepaliveWatchdog';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { ReconnectManager } from '@/infra/reconnect/ReconnectManager';

/**
 * 購読の統計。
 */
export interface StreamStats {
  state: StreamState;
  /** データチャネルに渡したイベント数 */
  emitted: number;
  /** データチャネル溢れで捨てたイベント数 */
  dropped: number;
  /** エラーチャネル溢れで捨てたエラー数 */
  errorsDropped: number;
  /** reconnecting に入った回数 */
  reconnects: number;
  /** 現在の連続失敗回数（active になるとリセット） */
  attempts: number;
}

export type StateListener = (state: StreamState, previous: StreamState) => void;

export interface MarketStreamDependencies {
  logger?: Logger;
  metrics?: MetricsCollector;
  /** バックオフのジッター用乱数源 */
  random?: () => number;
}

/**
 * MarketEvent から購読者に渡す値を取り出す。対象外のイベントは undefined。
 */
export type EventSelector<T> = (event: MarketEvent) => T | undefined;

/**
 * 1論理フィードの購読ライフサイクル。
 *
 * ```
 * idle → connecting → active ⇄ reconnecting → closed
 *   (どこからでも) → closing → closed
 * ```
 *
 * データチャネルとエラーチャネルの書き込み側はこのクラスだけが持ち、closed に入る時に1度だけ閉じる。
 * 終端エラー（再接続の枯渇、再接続無効時の中断）は閉じる直前にエラーチャネルへ書く。
 */
export class MarketStream<T> {
  private current: StreamState = StreamState.Idle;
  private readonly data: ReadableChannel<T>;
  private readonly errorChannel: ReadableChannel<Error>;
  private dataWriter: ChannelWriter<T> | null;
  private errorWriter: ChannelWriter<Error> | null;
  private readonly lifecycle = new AbortController();
  private readonly reconnect: ReconnectManager;
  private readonly listeners = new Set<StateListener>();
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;
  private readonly finished: Promise<void>;
  private readonly resolveFinished: () => void;
  private releaseSignal: (() => void) | null = null;
  private emitted = 0;
  private reconnects = 0;

  /**
   * @throws {ValidationError} 設定が不正な場合
   */
  constructor(
    readonly key: FeedKey,
    private readonly source: FeedSource,
    private readonly config: StreamConfig,
    private readonly select: EventSelector<T>,
    deps: MarketStreamDependencies = {}
  ) {
    validateStreamConfig(config);
    this.logger = (deps.logger ?? LoggerFactory.create()).child({
      component: 'MarketStream',
      stream: feedKeyId(key),
    });
    this.metrics = deps.metrics;
    this.reconnect = new ReconnectManager(
      {
        baseDelayMs: config.baseDelayMs,
        maxDelayMs: config.maxDelayMs,
        maxAttempts: config.maxReconnectAttempts,
        random: deps.random,
      },
      this.logger
    );

    const data = createChannel<T>(config.bufferSize, config.overflowPolicy);
    const errors = createChannel<Error>(config.errorBufferSize, 'drop-oldest');
    this.data = data.reader;
    this.dataWriter = data.writer;
    this.errorChannel = errors.reader;
    this.errorWriter = errors.writer;
    let resolveFinished: () => void = () => undefined;
    this.finished = new Promise((resolve) => {
      resolveFinished = resolve;
    });
    this.resolveFinished = resolveFinished;
  }

  /**
   * 購読を開始し、データチャネルを返す。接続は裏で進む。
   * signal が中断されると unsubscribe と同じく closing → closed に進む。
   * @throws {AlreadySubscribedError} 既に購読中の場合
   * @throws {StreamClosedError} 既に閉じている場合
   */
  subscribe(signal?: AbortSignal): ReadableChannel<T> {
    if (isTerminal(this.current)) {
      throw new StreamClosedError(feedKeyId(this.key));
    }
    if (this.current !== StreamState.Idle) {
      throw new AlreadySubscribedError(feedKeyId(this.key));
    }

    if (signal?.aborted) {
      this.logger.info('Subscribe aborted before start');
      this.transition(StreamState.Closing);
      this.finalize(null);
      return this.data;
    }

    this.logger.info('Subscribing');
    if (signal) {
      const onAbort = () => this.beginClosing();
      signal.addEventListener('abort', onAbort, { once: true });
      this.releaseSignal = () => signal.removeEventListener('abort', onAbort);
    }
    void this.run();
    return this.data;
  }

  /**
   * 購読を止め、両方のチャネルが閉じるのを待つ。
   * @throws {NotSubscribedError} idle / closed の場合
   */
  async unsubscribe(): Promise<void> {
    if (this.current === StreamState.Idle || this.current === StreamState.Closed) {
      throw new NotSubscribedError(feedKeyId(this.key));
    }
    this.beginClosing();
    await this.finished;
  }

  /**
   * どの状態からでも閉じる。冪等。
   */
  async close(): Promise<void> {
    if (this.current === StreamState.Idle) {
      this.transition(StreamState.Closing);
      this.finalize(null);
    } else {
      this.beginClosing();
    }
    await this.finished;
  }

  /** エラーチャネル */
  errors(): ReadableChannel<Error> {
    return this.errorChannel;
  }

  /** closed に入ったら解決する */
  done(): Promise<void> {
    return this.finished;
  }

  state(): StreamState {
    return this.current;
  }

  stats(): StreamStats {
    return {
      state: this.current,
      emitted: this.emitted,
      dropped: this.data.dropped,
      errorsDropped: this.errorChannel.dropped,
      reconnects: this.reconnects,
      attempts: this.reconnect.attempts,
    };
  }

  /**
   * 状態遷移を監視する。戻り値を呼ぶと監視をやめる。
   */
  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private beginClosing(): void {
    if (isTerminal(this.current)) {
      return;
    }
    this.transition(StreamState.Closing);
    this.lifecycle.abort();
  }

  private async run(): Promise<void> {
    const signal = this.lifecycle.signal;
    let terminal: Error | null = null;

    try {
      for (;;) {
        if (!this.transition(StreamState.Connecting)) {
          break;
        }
        const failure = await this.connectOnce(signal);
        if (failure === null || signal.aborted) {
          break;
        }
        // 回復可能な中断は状態遷移でのみ伝え、エラーチャネルには流さない
        this.logger.warn('Feed interrupted', { err: failure });

        if (!this.config.reconnect) {
          terminal = new StreamInterruptedError(failure);
          break;
        }
        if (!this.transition(StreamState.Reconnecting)) {
          break;
        }
        this.reconnects += 1;
        this.metrics?.incrementReconnect(this.key.kind, this.key.symbol);

        const outcome = await this.reconnect.waitForRetry(failure, signal);
        if (outcome.type === 'exhausted') {
          terminal = new ReconnectExhaustedError(outcome.attempts, failure);
          break;
        }
        if (outcome.type === 'cancelled') {
          break;
        }
      }
    } catch (error) {
      terminal = error instanceof Error ? error : new Error(String(error));
    }

    this.finalize(terminal);
  }

  /**
   * 1回分の接続。中断されたらその原因を、購読が止められたら null を返す。
   */
  private connectOnce(signal: AbortSignal): Promise<Error | null> {
    return new Promise((resolve) => {
      let attachment: FeedAttachment | null = null;
      let ended = false;

      const watchdog = new KeepaliveWatchdog(
        { pingIntervalMs: this.config.pingIntervalMs, pongTimeoutMs: this.config.pongTimeoutMs },
        {
          ping: () => attachment?.ping(),
          onTimeout: () => {
            const error = new KeepaliveTimeoutError(this.config.pongTimeoutMs);
            end(error);
            attachment?.reportUnhealthy(error);
          },
        }
      );
      const timer = setTimeout(() => end(new ConnectTimeoutError(this.config.connectTimeoutMs)), this.config.connectTimeoutMs);

      const end = (result: Error | null) => {
        if (ended) {
          return;
        }
        ended = true;
        clearTimeout(timer);
        watchdog.disarm();
        signal.removeEventListener('abort', onAbort);
        attachment?.detach();
        resolve(result);
      };
      const onAbort = () => end(null);

      const sink: FeedSink = {
        onReady: () => {
          if (ended || !attachment) {
            return;
          }
          clearTimeout(timer);
          this.enterActive(attachment);
          watchdog.arm();
        },
        onEvent: (event) => {
          if (!ended && this.current === StreamState.Active) {
            this.deliver(event);
          }
        },
        onError: (error) => {
          if (!ended) {
            this.emitError(error);
          }
        },
        onInterrupted: (error) => end(error),
        onAlive: () => watchdog.notifyAlive(),
      };

      if (signal.aborted) {
        end(null);
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });

      try {
        attachment = this.source.attach(this.key, sink);
      } catch (error) {
        end(error instanceof Error ? error : new Error(String(error)));
        return;
      }
      if (ended) {
        attachment.detach();
      }
    });
  }

  private enterActive(attachment: FeedAttachment): void {
    if (!this.transition(StreamState.Active)) {
      return;
    }
    this.reconnect.reset();
    const latest = attachment.latest();
    if (latest) {
      this.deliver(latest);
    }
  }

  private deliver(event: MarketEvent): void {
    const writer = this.dataWriter;
    const value = this.select(event);
    if (!writer || value === undefined) {
      return;
    }
    const droppedBefore = writer.dropped;
    if (writer.emit(value)) {
      this.emitted += 1;
      this.metrics?.incrementEmitted(this.key.kind, this.key.symbol);
    }
    if (writer.dropped > droppedBefore) {
      this.metrics?.incrementDropped(this.key.kind, this.key.symbol);
    }
  }

  private emitError(error: Error): void {
    this.errorWriter?.emit(error);
  }

  /**
   * 状態を進める。許されない遷移なら何もせず false を返す。
   */
  private transition(next: StreamState): boolean {
    const previous = this.current;
    if (!canTransition(previous, next)) {
      return false;
    }
    this.current = next;
    this.logger.debug('State changed', { from: previous, to: next });
    this.metrics?.setState(this.key.kind, this.key.symbol, next);
    for (const listener of [...this.listeners]) {
      try {
        listener(next, previous);
      } catch (error) {
        this.logger.error('State listener failed', { err: error, state: next });
      }
    }
    return true;
  }

  private finalize(terminal: Error | null): void {
    if (this.current === StreamState.Closed) {
      return;
    }
    try {
      if (terminal) {
        this.logger.error('Stream terminated', { err: terminal });
        this.metrics?.incrementError(errorCode(terminal));
        this.emitError(terminal);
      }

      this.dataWriter?.close();
      this.errorWriter?.close();
      this.dataWriter = null;
      this.errorWriter = null;
      this.releaseSignal?.();
      this.releaseSignal = null;
      this.lifecycle.abort();
      this.transition(StreamState.Closed);
      this.logger.info('Stream closed');
    } finally {
      this.resolveFinished();
    }
  }
}

/**
 * フィード種別ごとの取り出し関数。
 */
export const selectors = {
  ticker: (event: MarketEvent) => (event.kind === 'ticker' ? event.data : undefined),
  trade: (event: MarketEvent) => (event.kind === 'trade' ? event.data : undefined),
  kline: (event: MarketEvent) => (event.kind === 'kline' ? event.data : undefined),
  orderbook: (event: MarketEvent) => (event.kind === 'orderbook' ? event.data : undefined),
  any: (event: MarketEvent) => event,
} satisfies Record<string, EventSelector<unknown>>;
