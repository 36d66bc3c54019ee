/**
 * Real-time delta sources
 * 真实时间增量来源
 */

export interface Clock {
  /**
   * Real seconds elapsed since the previous sample
   * 自上次采样以来经过的真实秒数
   */
  sample(): number;
}

/**
 * Clock backed by performance.now()
 * 基于performance.now()的时钟
 */
export class PerformanceClock implements Clock {
  private last = performance.now();

  sample(): number {
    const now = performance.now();
    const dt = (now - this.last) / 1000;
    this.last = now;
    return Math.max(0, dt);
  }
}

/**
 * Clock that advances by a fixed step on every sample (tests, offline replays)
 * 每次采样前进固定步长的时钟（测试、离线回放）
 */
export class ManualClock implements Clock {
  private _elapsed = 0;

  constructor(public step = 1 / 60) {}

  sample(): number {
    this._elapsed += this.step;
    return this.step;
  }

  /** Total seconds handed out so far 已发放的总秒数 */
  get elapsed(): number {
    return this._elapsed;
  }
}
