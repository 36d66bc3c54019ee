/**
 * Time Dilation Settings Resource
 * 时间膨胀设置资源
 *
 * Default SettingsProvider: per-state scales, transition durations and
 * auto-exit timeouts, corrected into a consistent range on every update.
 * 默认的SettingsProvider：每个状态的倍率、过渡时长和自动退出超时，每次更新都会校正。
 */

import type { SettingsProvider } from '../utils/TimeTypes';
import { TimeState, TransitionKind } from '../utils/TimeTypes';

export type StateScaleTable = Partial<Record<TimeState, number>>;

export interface TimeDilationSettingsOptions {
  /** Target scale per state, merged over the defaults 每个状态的目标倍率 */
  scales?: StateScaleTable;
  /** Smooth transition duration in seconds, default 0.5 平滑过渡时长（秒），默认0.5 */
  smoothDuration?: number;
  /** Stepped transition duration in seconds, default 0.2 阶梯过渡时长（秒），默认0.2 */
  steppedDuration?: number;
  /** Kind used when a request names none, default Smooth 默认过渡类型 */
  defaultTransitionKind?: TransitionKind;
  /** Master switch for auto-exit, default true 自动退出总开关 */
  enableAutoExit?: boolean;
  /** Real-time timeout per state; a state with a timeout is eligible 每个状态的自动退出超时 */
  autoExitTimeouts?: StateScaleTable;
  /** ATB gauge fill multiplier in tactical mode, default 0.5 战术模式下ATB填充倍率，默认0.5 */
  atbFillMultiplier?: number;
}

export interface TimeDilationConfig {
  scales: StateScaleTable;
  smoothDuration: number;
  steppedDuration: number;
  defaultTransitionKind: TransitionKind;
  enableAutoExit: boolean;
  autoExitTimeouts: StateScaleTable;
  atbFillMultiplier: number;
}

export const DEFAULT_SCALES: Readonly<Record<TimeState, number>> = {
  [TimeState.RealTime]: 1,
  [TimeState.Pause]: 0,
  [TimeState.SlowMotion]: 0.3,
  [TimeState.CommandPlanning]: 0.1,
  [TimeState.SpecialExecution]: 0.6
};

export const DEFAULT_AUTO_EXIT_TIMEOUTS: Readonly<StateScaleTable> = {
  [TimeState.SlowMotion]: 8,
  [TimeState.CommandPlanning]: 15
};

/** Largest scale still treated as a pause 仍视为暂停的最大倍率 */
const MAX_PAUSE_SCALE = 0.05;

export class TimeDilationSettings implements SettingsProvider {
  private config: TimeDilationConfig;

  constructor(opts: TimeDilationSettingsOptions = {}) {
    this.config = this.normalize({
      smoothDuration: opts.smoothDuration ?? 0.5,
      steppedDuration: opts.steppedDuration ?? 0.2,
      defaultTransitionKind: opts.defaultTransitionKind ?? TransitionKind.Smooth,
      enableAutoExit: opts.enableAutoExit ?? true,
      atbFillMultiplier: opts.atbFillMultiplier ?? 0.5,
      scales: mergeTable(DEFAULT_SCALES, opts.scales),
      autoExitTimeouts: mergeTable(DEFAULT_AUTO_EXIT_TIMEOUTS, opts.autoExitTimeouts)
    });
  }

  scaleFor(state: TimeState): number | undefined {
    return this.config.scales[state];
  }

  durationFor(kind: TransitionKind): number {
    switch (kind) {
      case TransitionKind.Instant:
        return 0;
      case TransitionKind.Stepped:
        return this.config.steppedDuration;
      case TransitionKind.Smooth:
      default:
        return this.config.smoothDuration;
    }
  }

  autoExitEligible(state: TimeState): boolean {
    return this.config.enableAutoExit && this.config.autoExitTimeouts[state] !== undefined;
  }

  autoExitTimeoutFor(state: TimeState): number {
    return this.config.autoExitTimeouts[state] ?? 0;
  }

  defaultTransitionKind(): TransitionKind {
    return this.config.defaultTransitionKind;
  }

  atbFillMultiplier(): number {
    return this.config.atbFillMultiplier;
  }

  /**
   * Get current configuration
   * 获取当前配置
   */
  getConfig(): TimeDilationConfig {
    return {
      ...this.config,
      scales: { ...this.config.scales },
      autoExitTimeouts: { ...this.config.autoExitTimeouts }
    };
  }

  /**
   * Update configuration; tables are merged entry by entry
   * 更新配置；表格按条目合并
   */
  updateConfig(opts: TimeDilationSettingsOptions): void {
    const current = this.config;
    this.config = this.normalize({
      smoothDuration: opts.smoothDuration ?? current.smoothDuration,
      steppedDuration: opts.steppedDuration ?? current.steppedDuration,
      defaultTransitionKind: opts.defaultTransitionKind ?? current.defaultTransitionKind,
      enableAutoExit: opts.enableAutoExit ?? current.enableAutoExit,
      atbFillMultiplier: opts.atbFillMultiplier ?? current.atbFillMultiplier,
      scales: mergeTable(current.scales, opts.scales),
      autoExitTimeouts: mergeTable(current.autoExitTimeouts, opts.autoExitTimeouts)
    });
  }

  /**
   * Correct values that would put the states out of their intended order
   * 校正会打乱状态预期顺序的数值
   */
  private normalize(config: TimeDilationConfig): TimeDilationConfig {
    const out: TimeDilationConfig = {
      ...config,
      smoothDuration: nonNegative(config.smoothDuration, 'smoothDuration'),
      steppedDuration: nonNegative(config.steppedDuration, 'steppedDuration'),
      atbFillMultiplier: nonNegative(config.atbFillMultiplier, 'atbFillMultiplier'),
      scales: clampTable(config.scales, 'scale'),
      autoExitTimeouts: clampTable(config.autoExitTimeouts, 'auto-exit timeout')
    };

    const pause = out.scales[TimeState.Pause];
    if (pause !== undefined && pause > MAX_PAUSE_SCALE) {
      warn(`pause scale ${pause} is not a pause, using 0`);
      out.scales[TimeState.Pause] = 0;
    }

    const slow = out.scales[TimeState.SlowMotion];
    const planning = out.scales[TimeState.CommandPlanning];
    if (slow !== undefined && planning !== undefined && planning > slow) {
      warn(`commandPlanning scale ${planning} exceeds slowMotion ${slow}, using ${slow * 0.5}`);
      out.scales[TimeState.CommandPlanning] = slow * 0.5;
    }

    const slowTimeout = out.autoExitTimeouts[TimeState.SlowMotion];
    const planningTimeout = out.autoExitTimeouts[TimeState.CommandPlanning];
    if (slowTimeout !== undefined && planningTimeout !== undefined && planningTimeout < slowTimeout) {
      warn(`commandPlanning timeout ${planningTimeout}s is shorter than slowMotion ${slowTimeout}s, using ${slowTimeout * 1.5}s`);
      out.autoExitTimeouts[TimeState.CommandPlanning] = slowTimeout * 1.5;
    }

    return out;
  }
}

function warn(message: string): void {
  console.warn(`[TimeDilationSettings] ${message}`);
}

function nonNegative(value: number, name: string): number {
  if (Number.isFinite(value) && value >= 0) return value;
  warn(`${name} ${value} is invalid, using 0`);
  return 0;
}

/** Entries of `override` replace those of `base`; undefined entries are skipped */
function mergeTable(base: StateScaleTable, override: StateScaleTable = {}): StateScaleTable {
  const out: StateScaleTable = { ...base };
  for (const state of Object.values(TimeState)) {
    const value = override[state];
    if (value !== undefined) out[state] = value;
  }
  return out;
}

function clampTable(table: StateScaleTable, label: string): StateScaleTable {
  const out: StateScaleTable = {};
  for (const state of Object.values(TimeState)) {
    const value = table[state];
    if (value === undefined) continue;
    out[state] = nonNegative(value, `${state} ${label}`);
  }
  return out;
}
