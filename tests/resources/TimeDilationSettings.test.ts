import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { TimeDilationSettings, DEFAULT_SCALES } from '../../src/resources/TimeDilationSettings';
import { TimeState, TransitionKind } from '../../src/utils/TimeTypes';

describe('TimeDilationSettings', () => {
  let warn: MockInstance;

  beforeEach(() => {
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  test('provides the default scales', () => {
    const settings = new TimeDilationSettings();
    for (const state of Object.values(TimeState)) {
      expect(settings.scaleFor(state)).toBe(DEFAULT_SCALES[state]);
    }
    expect(settings.scaleFor(TimeState.SlowMotion)).toBe(0.3);
    expect(warn).not.toHaveBeenCalled();
  });

  test('maps transition kinds to durations', () => {
    const settings = new TimeDilationSettings({ smoothDuration: 0.75, steppedDuration: 0.4 });
    expect(settings.durationFor(TransitionKind.Instant)).toBe(0);
    expect(settings.durationFor(TransitionKind.Smooth)).toBe(0.75);
    expect(settings.durationFor(TransitionKind.Stepped)).toBe(0.4);
    expect(settings.defaultTransitionKind()).toBe(TransitionKind.Smooth);
  });

  test('only states with a timeout are auto-exit eligible', () => {
    const settings = new TimeDilationSettings();
    expect(settings.autoExitEligible(TimeState.SlowMotion)).toBe(true);
    expect(settings.autoExitEligible(TimeState.CommandPlanning)).toBe(true);
    expect(settings.autoExitEligible(TimeState.Pause)).toBe(false);
    expect(settings.autoExitEligible(TimeState.RealTime)).toBe(false);
    expect(settings.autoExitTimeoutFor(TimeState.SlowMotion)).toBe(8);
    expect(settings.autoExitTimeoutFor(TimeState.CommandPlanning)).toBe(15);
    expect(settings.autoExitTimeoutFor(TimeState.Pause)).toBe(0);
  });

  test('the master switch disables every auto-exit', () => {
    const settings = new TimeDilationSettings({ enableAutoExit: false });
    expect(settings.autoExitEligible(TimeState.SlowMotion)).toBe(false);
  });

  test('extra timeouts make other states eligible', () => {
    const settings = new TimeDilationSettings({ autoExitTimeouts: { [TimeState.Pause]: 3 } });
    expect(settings.autoExitEligible(TimeState.Pause)).toBe(true);
    expect(settings.autoExitTimeoutFor(TimeState.SlowMotion)).toBe(8);
  });

  test('merges scale overrides over the defaults', () => {
    const settings = new TimeDilationSettings({ scales: { [TimeState.SlowMotion]: 0.4 } });
    expect(settings.scaleFor(TimeState.SlowMotion)).toBe(0.4);
    expect(settings.scaleFor(TimeState.RealTime)).toBe(1);
  });

  test('forces a non-zero pause scale to zero', () => {
    const settings = new TimeDilationSettings({ scales: { [TimeState.Pause]: 0.2 } });
    expect(settings.scaleFor(TimeState.Pause)).toBe(0);
    expect(warn).toHaveBeenCalledWith('[TimeDilationSettings] pause scale 0.2 is not a pause, using 0');
  });

  test('keeps command planning slower than slow motion', () => {
    const settings = new TimeDilationSettings({ scales: { [TimeState.CommandPlanning]: 0.5 } });
    expect(settings.scaleFor(TimeState.CommandPlanning)).toBe(0.15);
    expect(warn).toHaveBeenCalledWith(
      '[TimeDilationSettings] commandPlanning scale 0.5 exceeds slowMotion 0.3, using 0.15'
    );
  });

  test('keeps the planning timeout longer than the slow motion one', () => {
    const settings = new TimeDilationSettings({ autoExitTimeouts: { [TimeState.CommandPlanning]: 4 } });
    expect(settings.autoExitTimeoutFor(TimeState.CommandPlanning)).toBe(12);
    expect(warn).toHaveBeenCalledWith(
      '[TimeDilationSettings] commandPlanning timeout 4s is shorter than slowMotion 8s, using 12s'
    );
  });

  test('replaces negative durations and scales with zero', () => {
    const settings = new TimeDilationSettings({
      smoothDuration: -1,
      scales: { [TimeState.SpecialExecution]: -2 }
    });
    expect(settings.durationFor(TransitionKind.Smooth)).toBe(0);
    expect(settings.scaleFor(TimeState.SpecialExecution)).toBe(0);
    expect(warn).toHaveBeenCalledWith('[TimeDilationSettings] smoothDuration -1 is invalid, using 0');
    expect(warn).toHaveBeenCalledWith('[TimeDilationSettings] specialExecution scale -2 is invalid, using 0');
  });

  test('explicitly undefined options keep their defaults', () => {
    const settings = new TimeDilationSettings({
      smoothDuration: undefined,
      enableAutoExit: undefined,
      scales: { [TimeState.SlowMotion]: undefined },
      autoExitTimeouts: { [TimeState.CommandPlanning]: undefined }
    });
    expect(settings.durationFor(TransitionKind.Smooth)).toBe(0.5);
    expect(settings.autoExitEligible(TimeState.SlowMotion)).toBe(true);
    expect(settings.scaleFor(TimeState.SlowMotion)).toBe(0.3);
    expect(settings.autoExitTimeoutFor(TimeState.CommandPlanning)).toBe(15);
    expect(warn).not.toHaveBeenCalled();

    settings.updateConfig({ steppedDuration: undefined, scales: { [TimeState.Pause]: undefined } });
    expect(settings.durationFor(TransitionKind.Stepped)).toBe(0.2);
    expect(settings.scaleFor(TimeState.Pause)).toBe(0);
    expect(warn).not.toHaveBeenCalled();
  });

  test('the ATB fill multiplier defaults to one half', () => {
    expect(new TimeDilationSettings().atbFillMultiplier()).toBe(0.5);
    expect(new TimeDilationSettings({ atbFillMultiplier: 0.8 }).atbFillMultiplier()).toBe(0.8);
  });

  test('replaces a negative ATB fill multiplier with zero', () => {
    const settings = new TimeDilationSettings({ atbFillMultiplier: -1 });
    expect(settings.atbFillMultiplier()).toBe(0);
    expect(warn).toHaveBeenCalledWith('[TimeDilationSettings] atbFillMultiplier -1 is invalid, using 0');
  });

  test('getConfig returns a detached copy', () => {
    const settings = new TimeDilationSettings();
    const config = settings.getConfig();
    config.scales[TimeState.SlowMotion] = 0.9;

    expect(settings.scaleFor(TimeState.SlowMotion)).toBe(0.3);
  });

  test('updateConfig merges and re-validates', () => {
    const settings = new TimeDilationSettings();
    settings.updateConfig({ scales: { [TimeState.SlowMotion]: 0.2 }, defaultTransitionKind: TransitionKind.Stepped });

    expect(settings.scaleFor(TimeState.SlowMotion)).toBe(0.2);
    expect(settings.scaleFor(TimeState.CommandPlanning)).toBe(0.1);
    expect(settings.durationFor(TransitionKind.Smooth)).toBe(0.5);
    expect(settings.defaultTransitionKind()).toBe(TransitionKind.Stepped);

    settings.updateConfig({ scales: { [TimeState.SlowMotion]: 0.1, [TimeState.CommandPlanning]: 0.3 } });
    expect(settings.scaleFor(TimeState.CommandPlanning)).toBe(0.05);
  });
});
