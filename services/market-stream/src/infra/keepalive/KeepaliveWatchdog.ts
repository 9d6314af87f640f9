export interface KeepaliveOptions {
  /** ping の送信間隔（ミリ秒）。0 以下なら何もしない */
  pingIntervalMs: number;
  /** ping 送信後に生存確認を待つ時間（ミリ秒） */
  pongTimeoutMs: number;
}

export interface KeepaliveHooks {
  /** ping を送る */
  ping(): void;
  /** 生存確認が途絶えた。1回の不調につき1度だけ呼ばれる */
  onTimeout(): void;
}

/**
 * インフラ層: 生存監視
 *
 * 責務: active の間だけ一定間隔で ping を送り、pongTimeoutMs 以内に pong
 * （または受信メッセージなどの生存確認）が無ければ不調を1度だけ通知する。
 * active 以外の状態では disarm され、再び active になるまで何もしない。
 */
export class KeepaliveWatchdog {
  private pingTimer: NodeJS.Timeout | null = null;
  private pongTimer: NodeJS.Timeout | null = null;
  private fired = false;

  constructor(
    private readonly options: KeepaliveOptions,
    private readonly hooks: KeepaliveHooks
  ) {}

  get enabled(): boolean {
    return this.options.pingIntervalMs > 0;
  }

  get armed(): boolean {
    return this.pingTimer !== null;
  }

  /**
   * 監視を開始する。既に動いていればやり直す。
   */
  arm(): void {
    this.disarm();
    if (!this.enabled) {
      return;
    }
    this.fired = false;
    this.pingTimer = setInterval(() => this.sendPing(), this.options.pingIntervalMs);
  }

  /**
   * 生存確認を受け取った。
   */
  notifyAlive(): void {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }

  /**
   * 監視を止める。
   */
  disarm(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    this.notifyAlive();
  }

  private sendPing(): void {
    this.hooks.ping();
    // 応答待ちが残っている間は期限を延ばさない
    if (!this.pongTimer) {
      this.pongTimer = setTimeout(() => this.expire(), this.options.pongTimeoutMs);
    }
  }

  private expire(): void {
    this.pongTimer = null;
    if (this.fired) {
      return;
    }
    this.fired = true;
    this.disarm();
    this.hooks.onTimeout();
  }
}
