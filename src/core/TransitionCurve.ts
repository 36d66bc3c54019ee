/**
 * Transition curves, one per transition kind
 * 过渡曲线，每种过渡类型一个
 *
 * A curve maps elapsed real time to a scale value and tells the engine when
 * the run is over. The engine looks curves up in a registry, so a new kind
 * only needs a new curve.
 * 曲线将经过的真实时间映射为倍率，并告知引擎何时结束。
 */

import { TransitionKind } from '../utils/TimeTypes';

/** Fraction of a stepped run spent at zero 阶梯过渡停在0的时间比例 */
export const STEPPED_HOLD_FRACTION = 0.3;

export interface TransitionCurve {
  readonly kind: TransitionKind;
  /**
   * Scale at `elapsed` seconds into a run of `duration` seconds
   * 在时长为duration的过渡中，经过elapsed秒时的倍率
   */
  sample(elapsed: number, duration: number, from: number, to: number): number;
  /**
   * Whether the run is finished at `elapsed`
   * 在elapsed时过渡是否结束
   */
  isComplete(elapsed: number, duration: number): boolean;
}

/** Smoothstep easing u²(3−2u) 平滑阶梯缓动 */
export function smoothstep(u: number): number {
  return u * u * (3 - 2 * u);
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

function progress(elapsed: number, duration: number): number {
  if (duration <= 0) return 1;
  return Math.max(0, Math.min(1, elapsed / duration));
}

export const InstantCurve: TransitionCurve = {
  kind: TransitionKind.Instant,
  sample: (_elapsed, _duration, _from, to) => to,
  isComplete: () => true
};

export const SmoothCurve: TransitionCurve = {
  kind: TransitionKind.Smooth,
  sample(elapsed, duration, from, to) {
    const u = progress(elapsed, duration);
    // Land exactly on the target, no lerp residue
    if (u >= 1) return to;
    return lerp(from, to, smoothstep(u));
  },
  isComplete: (elapsed, duration) => progress(elapsed, duration) >= 1
};

export const SteppedCurve: TransitionCurve = {
  kind: TransitionKind.Stepped,
  sample(elapsed, duration, _from, to) {
    return elapsed < duration * STEPPED_HOLD_FRACTION ? 0 : to;
  },
  isComplete: (elapsed, duration) => elapsed >= duration
};

export type TransitionCurveRegistry = ReadonlyMap<TransitionKind, TransitionCurve>;

/**
 * Build a registry from curves, later entries replace earlier ones of the same kind
 * 由曲线构建注册表，同类型后者覆盖前者
 */
export function createCurveRegistry(...curves: TransitionCurve[]): TransitionCurveRegistry {
  const registry = new Map<TransitionKind, TransitionCurve>();
  for (const curve of curves) {
    registry.set(curve.kind, curve);
  }
  return registry;
}

export const DEFAULT_CURVES: TransitionCurveRegistry = createCurveRegistry(
  InstantCurve,
  SmoothCurve,
  SteppedCurve
);
