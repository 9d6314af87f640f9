import type { Logger } from '@/application/interfaces/Logger';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { type BackoffOptions, BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';

/**
 * 再接続待ちの結果。
 * - `retry`: 遅延が明けたので次の接続を試みてよい
 * - `exhausted`: 失敗回数が上限に達した
 * - `cancelled`: 待機中に中断された
 */
export type ReconnectOutcome =
  | { type: 'retry'; attempt: number; delayMs: number }
  | { type: 'exhausted'; attempts: number }
  | { type: 'cancelled' };

/**
 * インフラ層: 再接続スケジューラ
 *
 * 責務: 失敗の記録とバックオフ遅延の待機。接続そのものは呼び出し側（購読のライフサイクル）が行う。
 * 待機は AbortSignal で中断できる。
 */
export class ReconnectManager {
  private readonly backoff: BackoffStrategy;
  private readonly logger: Logger;
  private retryAt: number | null = null;

  /**
   * @param options バックオフの設定
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   */
  constructor(options: BackoffOptions, logger?: Logger) {
    this.backoff = new BackoffStrategy(options);
    this.logger = logger ?? LoggerFactory.create();
  }

  /** 連続失敗回数 */
  get attempts(): number {
    return this.backoff.attempts;
  }

  /** 次の接続を試みてよい時刻（エポックミリ秒）。待機中でなければ null */
  get nextRetryAt(): number | null {
    return this.retryAt;
  }

  /**
   * 失敗を記録し、バックオフ遅延だけ待つ。
   * @param cause 失敗の原因（ログ用）
   * @param signal 中断用シグナル
   */
  async waitForRetry(cause: Error, signal: AbortSignal): Promise<ReconnectOutcome> {
    const decision = this.backoff.next();
    if (decision.exhausted) {
      this.logger.error('Reconnect attempts exhausted', { attempts: decision.attempts, err: cause });
      return { type: 'exhausted', attempts: decision.attempts };
    }

    this.logger.warn('Reconnect scheduled', {
      attempt: decision.attempt,
      delayMs: decision.delayMs,
      reason: cause.message,
    });

    this.retryAt = Date.now() + decision.delayMs;
    const elapsed = await sleep(decision.delayMs, signal);
    this.retryAt = null;

    if (!elapsed) {
      return { type: 'cancelled' };
    }
    return { type: 'retry', attempt: decision.attempt, delayMs: decision.delayMs };
  }

  /**
   * 接続成功時にバックオフをリセットする。
   */
  reset(): void {
    this.backoff.reset();
    this.retryAt = null;
  }
}

/**
 * 中断可能な待機。時間が経過したら true、中断されたら false で解決する。
 */
export function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
