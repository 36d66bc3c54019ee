import { describe, test, expect } from 'vitest';
import { StateHistoryLog, DEFAULT_HISTORY_SIZE } from '../../src/core/StateHistoryLog';
import type { StateChangeRecord } from '../../src/utils/TimeTypes';
import { TimeState, TimeStatePriority, TransitionKind } from '../../src/utils/TimeTypes';

function record(reason: string): StateChangeRecord {
  return {
    fromState: TimeState.RealTime,
    toState: TimeState.SlowMotion,
    fromScale: 1,
    toScale: 0.3,
    duration: 0.5,
    kind: TransitionKind.Smooth,
    priority: TimeStatePriority.Normal,
    reason,
    timestamp: 1000
  };
}

describe('StateHistoryLog', () => {
  test('defaults to ten entries', () => {
    expect(new StateHistoryLog().capacity).toBe(DEFAULT_HISTORY_SIZE);
    expect(DEFAULT_HISTORY_SIZE).toBe(10);
  });

  test('rejects non-positive or fractional sizes', () => {
    expect(() => new StateHistoryLog(0)).toThrow('History size must be a positive integer, got 0');
    expect(() => new StateHistoryLog(2.5)).toThrow('History size must be a positive integer, got 2.5');
  });

  test('returns records oldest first', () => {
    const log = new StateHistoryLog(3);
    log.append(record('a'));
    log.append(record('b'));

    expect(log.snapshot().map(r => r.reason)).toEqual(['a', 'b']);
    expect(log.size).toBe(2);
  });

  test('evicts the oldest record once full', () => {
    const log = new StateHistoryLog(3);
    for (const reason of ['a', 'b', 'c', 'd', 'e']) {
      log.append(record(reason));
    }

    expect(log.size).toBe(3);
    expect(log.snapshot().map(r => r.reason)).toEqual(['c', 'd', 'e']);
  });

  test('snapshots are detached and frozen', () => {
    const log = new StateHistoryLog(2);
    const source = record('a');
    log.append(source);

    const snapshot = log.snapshot();
    log.append(record('b'));

    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
    expect(snapshot[0]).not.toBe(source);
    expect(snapshot[0]).toEqual(source);
  });

  test('clear empties the log', () => {
    const log = new StateHistoryLog(2);
    log.append(record('a'));
    log.clear();

    expect(log.size).toBe(0);
    expect(log.snapshot()).toEqual([]);
  });
});
