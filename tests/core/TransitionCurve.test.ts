import { describe, test, expect } from 'vitest';
import {
  InstantCurve,
  SmoothCurve,
  SteppedCurve,
  DEFAULT_CURVES,
  createCurveRegistry,
  smoothstep,
  lerp
} from '../../src/core/TransitionCurve';
import { TransitionKind } from '../../src/utils/TimeTypes';

describe('TransitionCurve', () => {
  test('smoothstep hits its endpoints and midpoint', () => {
    expect(smoothstep(0)).toBe(0);
    expect(smoothstep(0.5)).toBe(0.5);
    expect(smoothstep(1)).toBe(1);
  });

  test('lerp interpolates linearly', () => {
    expect(lerp(1, 0.5, 0)).toBe(1);
    expect(lerp(1, 0.5, 0.5)).toBe(0.75);
    expect(lerp(1, 0.5, 1)).toBe(0.5);
  });

  describe('InstantCurve', () => {
    test('returns the target immediately and is always complete', () => {
      expect(InstantCurve.sample(0, 0.5, 1, 0.3)).toBe(0.3);
      expect(InstantCurve.isComplete(0, 0.5)).toBe(true);
    });
  });

  describe('SmoothCurve', () => {
    test('starts at from and ends exactly at to', () => {
      expect(SmoothCurve.sample(0, 0.5, 1, 0.3)).toBe(1);
      expect(SmoothCurve.sample(0.5, 0.5, 1, 0.3)).toBe(0.3);
      expect(SmoothCurve.sample(2, 0.5, 1, 0.3)).toBe(0.3);
    });

    test('halfway is the midpoint of from and to', () => {
      expect(SmoothCurve.sample(0.25, 0.5, 1, 0.3)).toBeCloseTo(0.65, 10);
    });

    test('stays within [to, from] for a decreasing run', () => {
      for (let i = 0; i <= 20; i++) {
        const value = SmoothCurve.sample(i * 0.025, 0.5, 1, 0.3);
        expect(value).toBeGreaterThanOrEqual(0.3);
        expect(value).toBeLessThanOrEqual(1);
      }
    });

    test('completes once elapsed reaches duration', () => {
      expect(SmoothCurve.isComplete(0.25, 0.5)).toBe(false);
      expect(SmoothCurve.isComplete(0.5, 0.5)).toBe(true);
      expect(SmoothCurve.isComplete(0, 0)).toBe(true);
    });
  });

  describe('SteppedCurve', () => {
    test('holds 0 for the first 30% then snaps to target', () => {
      expect(SteppedCurve.sample(0, 1, 1, 0.3)).toBe(0);
      expect(SteppedCurve.sample(0.25, 1, 1, 0.3)).toBe(0);
      expect(SteppedCurve.sample(0.5, 1, 1, 0.3)).toBe(0.3);
    });

    test('completes only at the full duration', () => {
      expect(SteppedCurve.isComplete(0.5, 1)).toBe(false);
      expect(SteppedCurve.isComplete(1, 1)).toBe(true);
    });
  });

  test('default registry holds one curve per kind', () => {
    expect(DEFAULT_CURVES.get(TransitionKind.Instant)).toBe(InstantCurve);
    expect(DEFAULT_CURVES.get(TransitionKind.Smooth)).toBe(SmoothCurve);
    expect(DEFAULT_CURVES.get(TransitionKind.Stepped)).toBe(SteppedCurve);
  });

  test('later curves replace earlier ones of the same kind', () => {
    const linear = {
      kind: TransitionKind.Smooth,
      sample: (elapsed: number, duration: number, from: number, to: number) => lerp(from, to, elapsed / duration),
      isComplete: (elapsed: number, duration: number) => elapsed >= duration
    };
    const registry = createCurveRegistry(SmoothCurve, linear);
    expect(registry.size).toBe(1);
    expect(registry.get(TransitionKind.Smooth)).toBe(linear);
  });
});
