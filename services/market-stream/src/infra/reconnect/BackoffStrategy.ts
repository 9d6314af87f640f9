/**
 * バックオフ戦略の設定
 */
export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** 連続失敗の上限。0 は無制限 */
  maxAttempts: number;
  /** [0, 1) の乱数源。テストで固定するために差し替え可能 */
  random?: () => number;
}

/**
 * 次の試行の判断。上限に達したら遅延ではなく枯渇を返す。
 */
export type BackoffDecision =
  | { exhausted: false; attempt: number; delayMs: number }
  | { exhausted: true; attempts: number };

const MIN_JITTER = 0.5;

/**
 * インフラ層: ジッター付き指数バックオフ戦略の実装
 *
 * delay(attempt) = min(maxDelay, baseDelay * 2^attempt) * jitter（jitter は [0.5, 1.0]）
 * 再接続が一斉に起きないようにジッターをかける。
 */
export class BackoffStrategy {
  private attempt = 0;
  private readonly random: () => number;

  constructor(private readonly options: BackoffOptions) {
    this.random = options.random ?? Math.random;
  }

  /**
   * これまでの連続失敗回数
   */
  get attempts(): number {
    return this.attempt;
  }

  /**
   * ジッターをかける前の遅延（ミリ秒）。attempt に対して単調非減少で maxDelayMs が上限。
   */
  ceilingDelay(attempt: number): number {
    return Math.min(this.options.maxDelayMs, this.options.baseDelayMs * 2 ** attempt);
  }

  /**
   * ジッターをかけた遅延（ミリ秒）
   */
  delayFor(attempt: number): number {
    const jitter = MIN_JITTER + (1 - MIN_JITTER) * this.random();
    return Math.round(this.ceilingDelay(attempt) * jitter);
  }

  /**
   * 失敗を1回記録し、次の試行までの遅延を返す。
   * maxAttempts > 0 で失敗回数が上限に達していたら枯渇を返す。
   */
  next(): BackoffDecision {
    this.attempt += 1;
    const { maxAttempts } = this.options;
    if (maxAttempts > 0 && this.attempt >= maxAttempts) {
      return { exhausted: true, attempts: this.attempt };
    }
    return { exhausted: false, attempt: this.attempt, delayMs: this.delayFor(this.attempt - 1) };
  }

  /**
   * バックオフカウンターをリセットする。
   * 接続成功（active への遷移）時に呼び出される。
   */
  reset(): void {
    this.attempt = 0;
  }
}
