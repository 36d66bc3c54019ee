import { describe, expect, test } from 'vitest';
import { ManualClock, PerformanceClock } from '../../src/core/Clock';

describe('Clock', () => {
  test('ManualClock hands out its step on every sample', () => {
    const clock = new ManualClock(0.25);
    expect(clock.sample()).toBe(0.25);
    expect(clock.sample()).toBe(0.25);
    expect(clock.elapsed).toBe(0.5);
  });

  test('ManualClock step can change between samples', () => {
    const clock = new ManualClock();
    clock.step = 0.5;
    clock.sample();
    expect(clock.elapsed).toBe(0.5);
  });

  test('PerformanceClock never goes backwards', () => {
    const clock = new PerformanceClock();
    expect(clock.sample()).toBeGreaterThanOrEqual(0);
  });
});
