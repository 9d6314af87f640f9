import type { OverflowPolicy } from '@/application/config/StreamConfig';
import { ChannelClosedError } from '@/domain/errors';

/**
 * 受信専用のチャネル。購読者に渡すのはこちらだけ。
 *
 * ```typescript
 * for await (const ticker of stream.subscribe()) {
 *   console.log(ticker.lastPrice);
 * }
 * ```
 */
export interface ReadableChannel<T> extends AsyncIterable<T> {
  /**
   * 次の要素を待つ。閉じられて空になったら `{ done: true }`。
   */
  receive(): Promise<IteratorResult<T, undefined>>;

  /** 溜まっている要素を待たずに1つ取り出す。無ければ undefined */
  tryReceive(): T | undefined;

  readonly size: number;
  readonly capacity: number;
  /** 溢れて捨てた要素の数 */
  readonly dropped: number;
  readonly closed: boolean;
}

/**
 * 送信側。所有者（購読のライフサイクル）だけが持つ。
 */
export interface ChannelWriter<T> {
  /**
   * 待たずに送る。満杯なら溢れ方針に従って1つ捨てる。
   * @returns 渡した値がチャネルに入ったか（drop-newest で捨てられたら false）
   * @throws {ChannelClosedError} close 後の送信（所有者の契約違反）
   */
  emit(value: T): boolean;

  /** 閉じる。2回目以降は何もしない */
  close(): void;

  readonly dropped: number;
}

export interface Channel<T> {
  reader: ReadableChannel<T>;
  writer: ChannelWriter<T>;
}

type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

const DONE: IteratorReturnResult<undefined> = Object.freeze({ done: true, value: undefined });

/**
 * 容量付きのノンブロッキングチャネル。
 * 読み手が待っていれば直接渡し、いなければ容量までバッファし、それ以上は捨てる。
 */
class BoundedChannel<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private isClosed = false;
  private droppedCount = 0;

  constructor(
    readonly capacity: number,
    private readonly policy: OverflowPolicy
  ) {}

  get size(): number {
    return this.buffer.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  emit(value: T): boolean {
    if (this.isClosed) {
      throw new ChannelClosedError();
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value });
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }

    this.droppedCount += 1;
    if (this.policy === 'drop-oldest' && this.capacity > 0) {
      this.buffer.shift();
      this.buffer.push(value);
      return true;
    }
    return false;
  }

  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    // 待っている読み手はバッファが空のときにしか存在しない
    for (const waiter of this.waiters.splice(0)) {
      waiter(DONE);
    }
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.isClosed) {
      return Promise.resolve(DONE);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  tryReceive(): T | undefined {
    return this.buffer.shift();
  }
}

/**
 * チャネルを作り、読み手と書き手に分けて返す。
 */
export function createChannel<T>(capacity: number, policy: OverflowPolicy = 'drop-oldest'): Channel<T> {
  const channel = new BoundedChannel<T>(capacity, policy);

  const reader: ReadableChannel<T> = {
    receive: () => channel.receive(),
    tryReceive: () => channel.tryReceive(),
    get size() {
      return channel.size;
    },
    get capacity() {
      return channel.capacity;
    },
    get dropped() {
      return channel.dropped;
    },
    get closed() {
      return channel.closed;
    },
    async *[Symbol.asyncIterator]() {
      for (;;) {
        const result = await channel.receive();
        if (result.done) {
          return;
        }
        yield result.value;
      }
    },
  };

  const writer: ChannelWriter<T> = {
    emit: (value) => channel.emit(value),
    close: () => channel.close(),
    get dropped() {
      return channel.dropped;
    },
  };

  return { reader, writer };
}
