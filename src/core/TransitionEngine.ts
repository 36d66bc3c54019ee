/**
 * Single in-flight scale transition
 * 单个进行中的倍率过渡
 *
 * Key points:
 * - At most one run; start() discards the previous run's progress
 * - Advanced with real (unscaled) delta time
 * - Scale is forced to the exact target on completion
 *
 * 要点：
 * - 最多一个过渡；start()丢弃之前过渡的进度
 * - 使用真实（未缩放）delta时间推进
 * - 结束时倍率精确等于目标值
 */

import { TransitionKind } from '../utils/TimeTypes';
import type { TransitionCurve, TransitionCurveRegistry } from './TransitionCurve';
import { DEFAULT_CURVES, InstantCurve } from './TransitionCurve';

/**
 * Callbacks fired while a run progresses
 * 过渡推进时触发的回调
 */
export interface TransitionObserver {
  onStarted(): void;
  onScaleChanged(scale: number): void;
  onCompleted(): void;
}

interface ActiveRun {
  curve: TransitionCurve;
  from: number;
  to: number;
  duration: number;
  elapsed: number;
}

/**
 * Read-only view of the active run
 * 当前过渡的只读视图
 */
export interface TransitionSnapshot {
  kind: TransitionKind;
  from: number;
  to: number;
  duration: number;
  elapsed: number;
}

export class TransitionEngine {
  private run: ActiveRun | null = null;
  private scale: number;

  constructor(
    initialScale: number,
    private readonly observer: TransitionObserver,
    private readonly curves: TransitionCurveRegistry = DEFAULT_CURVES
  ) {
    this.scale = initialScale;
  }

  /** Current (possibly mid-transition) scale 当前倍率 */
  get currentScale(): number {
    return this.scale;
  }

  get isActive(): boolean {
    return this.run !== null;
  }

  /**
   * Start a run, superseding any run still in flight.
   * The run is sampled at elapsed 0 right away, so instant runs finish here.
   * 开始过渡并取代进行中的过渡；立即在0时刻采样，瞬时过渡在此完成。
   */
  start(from: number, to: number, duration: number, kind: TransitionKind): void {
    const curve = this.curves.get(kind) ?? this.missingCurve(kind);
    const run: ActiveRun = {
      curve,
      from,
      to,
      duration: Math.max(0, duration),
      elapsed: 0
    };
    this.run = run;
    this.observer.onStarted();
    // onStarted may already have superseded this run
    if (this.run === run) this.step(0);
  }

  /**
   * Advance the active run by real delta time
   * 用真实delta时间推进当前过渡
   */
  advance(realDt: number): void {
    if (!this.run) return;
    this.step(realDt);
  }

  /**
   * Drop the active run, keeping the current scale
   * 丢弃当前过渡，保留当前倍率
   */
  cancel(): void {
    this.run = null;
  }

  getSnapshot(): TransitionSnapshot | null {
    if (!this.run) return null;
    const { curve, from, to, duration, elapsed } = this.run;
    return { kind: curve.kind, from, to, duration, elapsed };
  }

  private step(dt: number): void {
    const run = this.run;
    if (!run) return;

    run.elapsed += dt;
    const done = run.curve.isComplete(run.elapsed, run.duration);
    this.scale = done ? run.to : run.curve.sample(run.elapsed, run.duration, run.from, run.to);
    this.observer.onScaleChanged(this.scale);

    // A listener may have started a new run from inside onScaleChanged
    if (done && this.run === run) {
      this.run = null;
      this.observer.onCompleted();
    }
  }

  private missingCurve(kind: TransitionKind): TransitionCurve {
    console.warn(`[TransitionEngine] No curve registered for '${kind}', using instant`);
    return InstantCurve;
  }
}
