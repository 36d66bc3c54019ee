/**
 * Fixed timestep scheduler driven by the time state machine
 * 由时间状态机驱动的固定时间步调度器
 *
 * Key features:
 * - The machine is ticked with real frame time, so transitions and auto-exit stay wall-clock predictable
 * - Simulation time accumulates at the machine's current scale: 0 pauses, 0.3 is slow motion
 * - Anti-jitter: accumulator and optional EMA smoothing of frame time
 * - Spiral prevention: limits substeps per frame
 *
 * 核心特性：
 * - 状态机使用真实帧时间推进，过渡和自动退出与墙钟一致
 * - 模拟时间按状态机当前倍率累加：0为暂停，0.3为慢动作
 * - 抗抖动：累加器与可选的EMA帧时间平滑
 * - 防螺旋：限制单帧子步数
 */

import type { TimeStateMachine } from './TimeStateMachine';
import type { Clock } from './Clock';
import { PerformanceClock } from './Clock';

export interface FixedStepOpts {
  /** Fixed timestep in seconds, default 1/60 固定时间步长（秒），默认1/60 */
  fixedDt?: number;
  /** Maximum substeps per frame, default 5 单帧最大子步数，默认5 */
  maxSubSteps?: number;
  /** Maximum frame dt clamp in seconds, default 0.25 单帧最大dt夹紧值（秒），默认0.25 */
  clampDt?: number;
  /** EMA smoothing factor [0..1], default 0.1 EMA平滑因子[0..1]，默认0.1 */
  smoothFactor?: number;
}

export type FixedStep = (dt: number) => void;

export class FixedTimestepScheduler {
  /** Scaled time not yet consumed by fixed steps 尚未被固定步消耗的缩放时间 */
  private accumulator = 0;
  /** Smoothed delta time using EMA filter 使用EMA滤波的平滑delta时间 */
  private smoothedDt: number;
  /** Fixed steps run so far 已执行的固定步数 */
  private steps = 0;
  /** Scheduler configuration options 调度器配置选项 */
  private opts: Required<FixedStepOpts>;

  /**
   * @param machine Source of the time scale 时间倍率来源
   * @param step Simulation step, called with the fixed dt 模拟步，参数为固定dt
   * @param clock Used when tick() is called without a frame dt 未传入帧dt时使用
   */
  constructor(
    private readonly machine: TimeStateMachine,
    private readonly step: FixedStep,
    opts: FixedStepOpts = {},
    private readonly clock: Clock = new PerformanceClock()
  ) {
    this.opts = {
      fixedDt: 1 / 60,
      maxSubSteps: 5,
      clampDt: 0.25,
      smoothFactor: 0.1,
      ...opts
    };
    this.smoothedDt = this.opts.fixedDt;
  }

  /**
   * Set fixed timestep
   * 设置固定时间步长
   */
  setFixedDt(dt: number): void {
    this.opts.fixedDt = Math.max(1e-6, dt);
  }

  /**
   * Get current accumulator ratio for interpolation
   * 获取当前累加器比率用于插值
   */
  getAlpha(): number {
    return Math.max(0, Math.min(1, this.accumulator / this.opts.fixedDt));
  }

  /**
   * Run one frame
   * 执行一帧
   *
   * @param frameDt Real frame time in seconds, sampled from the clock when omitted
   *                实际帧时间（秒），省略时从时钟采样
   * @param render Optional render callback with interpolation alpha 可选渲染回调，提供插值alpha
   * @returns Number of fixed steps run this frame 本帧执行的固定步数
   */
  tick(frameDt?: number, render?: (alpha: number) => void): number {
    const realDt = Math.max(0, frameDt ?? this.clock.sample());

    // 1) Advance transitions and auto-exit in real time
    // 用真实时间推进过渡和自动退出
    this.machine.tick(realDt);

    // 2) Sample and smooth frame delta time
    // 采样并平滑帧delta时间
    const clamped = Math.min(realDt, this.opts.clampDt);
    this.smoothedDt += (clamped - this.smoothedDt) * this.opts.smoothFactor;

    // 3) Accumulate simulation time at the machine's scale
    // 按状态机倍率累加模拟时间
    this.accumulator += this.smoothedDt * this.machine.currentScale;

    // 4) Run fixed timestep simulation (spiral prevention)
    // 运行固定时间步模拟（防螺旋）
    let steps = 0;
    while (this.accumulator >= this.opts.fixedDt && steps < this.opts.maxSubSteps) {
      this.step(this.opts.fixedDt);
      this.accumulator -= this.opts.fixedDt;
      steps++;
    }
    this.steps += steps;

    if (render) {
      render(this.getAlpha());
    }
    return steps;
  }

  /**
   * Reset accumulator (useful for scene transitions)
   * 重置累加器（用于场景切换）
   */
  reset(): void {
    this.accumulator = 0;
  }

  /** Fixed steps run since construction 构造以来执行的固定步数 */
  get totalSteps(): number {
    return this.steps;
  }

  /**
   * Get current configuration
   * 获取当前配置
   */
  getConfig(): Required<FixedStepOpts> {
    return { ...this.opts };
  }

  /**
   * Update configuration
   * 更新配置
   */
  updateConfig(opts: Partial<FixedStepOpts>): void {
    Object.assign(this.opts, opts);
  }

  /**
   * Get debug information
   * 获取调试信息
   */
  getDebugInfo() {
    return {
      accumulator: this.accumulator,
      smoothedDt: this.smoothedDt,
      alpha: this.getAlpha(),
      timescale: this.machine.currentScale,
      config: this.opts
    };
  }
}
