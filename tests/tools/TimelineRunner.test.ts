import { describe, expect, test } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { TimelineRunner, parseTimelineScript } from '../../tools/TimelineRunner';
import { AUTO_EXIT_REASON } from '../../src/core/TimeStateMachine';
import { TimeState, TimeStatePriority, TransitionKind } from '../../src/utils/TimeTypes';

describe('parseTimelineScript', () => {
  test('fills defaults and sorts actions by time', () => {
    const script = parseTimelineScript({
      actions: [
        { at: 2, action: 'toggle' },
        { at: 1, action: 'request', state: 'pause', priority: 'HIGH', kind: 'instant' }
      ]
    });

    expect(script.frameDt).toBe(1 / 60);
    expect(script.duration).toBe(3);
    expect(script.settings).toEqual({});
    expect(script.actions).toEqual([
      {
        at: 1,
        action: 'request',
        state: TimeState.Pause,
        priority: TimeStatePriority.High,
        kind: TransitionKind.Instant,
        reason: 'request'
      },
      { at: 2, action: 'toggle', reason: 'toggle' }
    ]);
  });

  test('parses settings tables', () => {
    const script = parseTimelineScript({
      actions: [],
      settings: {
        scales: { slowMotion: 0.2 },
        enableAutoExit: false,
        defaultTransitionKind: 'stepped'
      }
    });

    expect(script.duration).toBe(1);
    expect(script.settings).toEqual({
      scales: { [TimeState.SlowMotion]: 0.2 },
      enableAutoExit: false,
      defaultTransitionKind: TransitionKind.Stepped
    });
  });

  test('reports the first invalid field', () => {
    expect(() => parseTimelineScript([])).toThrow('script must be an object');
    expect(() => parseTimelineScript({ actions: 'x' })).toThrow('actions must be an array');
    expect(() => parseTimelineScript({ frameDt: 0, actions: [] })).toThrow('frameDt must be positive, got 0');
    expect(() => parseTimelineScript({ actions: [{ action: 'toggle' }] }))
      .toThrow('actions[0].at must be a non-negative number');
    expect(() => parseTimelineScript({ actions: [{ at: 0, action: 'warp' }] }))
      .toThrow('actions[0].action must be one of request, force, toggle, pause, resume, special');
    expect(() => parseTimelineScript({ actions: [{ at: 0, action: 'request', state: 'warp' }] }))
      .toThrow("actions[0]: unknown state 'warp'");
    expect(() => parseTimelineScript({ actions: [{ at: 0, action: 'request', state: 'pause', priority: 'urgent' }] }))
      .toThrow("actions[0]: unknown priority 'urgent'");
    expect(() => parseTimelineScript({ actions: [], settings: { scales: { warp: 1 } } }))
      .toThrow("settings.scales: unknown state 'warp'");
  });
});

describe('TimelineRunner', () => {
  test('replays actions and logs notifications at real time', () => {
    const script = parseTimelineScript({
      frameDt: 0.25,
      duration: 3,
      settings: { smoothDuration: 0.5 },
      actions: [
        { at: 0, action: 'toggle' },
        { at: 1, action: 'request', state: 'realTime', priority: 'low' },
        { at: 1, action: 'pause' },
        { at: 2, action: 'resume' }
      ]
    });

    const result = new TimelineRunner().run(script);

    expect(result.outcomes).toEqual([true, false, true, true]);
    expect(result.entries).toEqual([
      { time: 0, event: 'transitionStarted', detail: '' },
      { time: 0, event: 'stateChanged', detail: 'slowMotion' },
      { time: 0, event: 'enteredTacticalMode', detail: 'slowMotion' },
      { time: 0.5, event: 'transitionCompleted', detail: '0.300' },
      { time: 1, event: 'rejected', detail: 'request (request)' },
      { time: 1, event: 'transitionStarted', detail: '' },
      { time: 1, event: 'transitionCompleted', detail: '0.000' },
      { time: 1, event: 'stateChanged', detail: 'pause' },
      { time: 2, event: 'transitionStarted', detail: '' },
      { time: 2, event: 'stateChanged', detail: 'slowMotion' },
      { time: 2.5, event: 'transitionCompleted', detail: '0.300' }
    ]);
    expect(result.history.map(r => r.toState)).toEqual([
      TimeState.SlowMotion,
      TimeState.Pause,
      TimeState.SlowMotion
    ]);
    expect(result.finalState).toBe(TimeState.SlowMotion);
    expect(result.finalScale).toBe(0.3);
    expect(result.simulationSteps).toBeGreaterThan(0);
  });

  test('replays the bundled tactical sequence', () => {
    const file = path.resolve(__dirname, '../../examples/timelines/tactical-sequence.json');
    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));

    const result = new TimelineRunner().run(parseTimelineScript(raw));

    expect(result.outcomes).toEqual([true, true, false, true, true, true, true, false]);
    expect(result.entries.filter(e => e.event === 'autoExitTriggered')).toHaveLength(1);
    expect(result.history).toHaveLength(7);
    expect(result.history[1].reason).toBe(AUTO_EXIT_REASON);
    expect(result.history[6].priority).toBe(TimeStatePriority.Emergency);
    expect(result.finalState).toBe(TimeState.RealTime);
    expect(result.finalScale).toBe(1);
  });
});
