/**
 * Single auto-exit countdown measured in real time
 * 以真实时间计量的单个自动退出倒计时
 *
 * Real time keeps the timeout from being stretched by the very slow-down it
 * is meant to end.
 * 使用真实时间，避免超时被它要结束的减速本身拉长。
 */
export class AutoExitScheduler {
  private _remaining: number | null = null;

  /**
   * @param guard Checked on expiry, the exit only fires when it returns true
   *              到期时检查，返回true才触发退出
   * @param onExpire Performs the exit 执行退出
   */
  constructor(
    private readonly guard: () => boolean,
    private readonly onExpire: () => void
  ) {}

  get isArmed(): boolean {
    return this._remaining !== null;
  }

  /** Seconds left, null when disarmed 剩余秒数，未启动时为null */
  get remaining(): number | null {
    return this._remaining;
  }

  /**
   * Start or replace the countdown
   * 启动或替换倒计时
   */
  arm(timeoutSeconds: number): void {
    this._remaining = Math.max(0, timeoutSeconds);
  }

  cancel(): void {
    this._remaining = null;
  }

  /**
   * Count down; on expiry the countdown is cleared before the guard runs
   * 倒计时；到期时先清除倒计时再检查守卫
   *
   * @returns Whether the exit fired 是否触发了退出
   */
  advance(realDt: number): boolean {
    if (this._remaining === null) return false;

    this._remaining -= realDt;
    if (this._remaining > 0) return false;

    this._remaining = null;
    if (!this.guard()) return false;

    this.onExpire();
    return true;
  }
}
