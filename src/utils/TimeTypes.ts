/**
 * Time dilation type definitions
 * 时间膨胀类型定义
 */

/**
 * Simulation speed states
 * 模拟速度状态
 */
export enum TimeState {
  /** Normal speed, the rest state 正常速度（默认状态） */
  RealTime = 'realTime',
  /** Full pause for command queuing 完全暂停，用于指令排队 */
  Pause = 'pause',
  /** Slowed time for tactical decisions 战术决策用慢动作 */
  SlowMotion = 'slowMotion',
  /** Ultra-slow multi-step planning 超慢速多步规划 */
  CommandPlanning = 'commandPlanning',
  /** Variable-scale special execution 可变倍率的特殊执行 */
  SpecialExecution = 'specialExecution'
}

/**
 * Request priority levels, higher values win admission
 * 请求优先级，数值越高越优先
 */
export enum TimeStatePriority {
  Low = 0,
  Normal = 1,
  High = 2,
  Critical = 3,
  /** Always admitted 总是被接受 */
  Emergency = 4
}

/**
 * How a scale change is animated
 * 倍率变化的动画方式
 */
export enum TransitionKind {
  /** Jump to target 直接跳到目标 */
  Instant = 'instant',
  /** Smoothstep interpolation 平滑插值 */
  Smooth = 'smooth',
  /** Hold at zero, then snap to target 先停顿再跳到目标 */
  Stepped = 'stepped'
}

/** All priorities in ascending order 升序排列的全部优先级 */
export const PRIORITY_ORDER: readonly TimeStatePriority[] = [
  TimeStatePriority.Low,
  TimeStatePriority.Normal,
  TimeStatePriority.High,
  TimeStatePriority.Critical,
  TimeStatePriority.Emergency
];

/**
 * Immutable entry of the state history log
 * 状态历史日志的不可变条目
 */
export interface StateChangeRecord {
  readonly fromState: TimeState;
  readonly toState: TimeState;
  /** Scale at the moment the request was admitted 请求被接受时的倍率 */
  readonly fromScale: number;
  /** Target scale of the transition 过渡目标倍率 */
  readonly toScale: number;
  /** Transition duration in real seconds 过渡时长（真实秒） */
  readonly duration: number;
  readonly kind: TransitionKind;
  readonly priority: TimeStatePriority;
  readonly reason: string;
  /** Wall-clock time in ms since epoch 墙钟时间（毫秒） */
  readonly timestamp: number;
}

/**
 * Source of per-state scales, transition durations and auto-exit rules
 * 每个状态的倍率、过渡时长和自动退出规则的来源
 */
export interface SettingsProvider {
  /** Target scale, undefined when the state has no entry 目标倍率，无配置时为undefined */
  scaleFor(state: TimeState): number | undefined;
  durationFor(kind: TransitionKind): number;
  autoExitEligible(state: TimeState): boolean;
  autoExitTimeoutFor(state: TimeState): number;
  defaultTransitionKind(): TransitionKind;
  /** ATB gauge fill multiplier while in tactical mode ATB槽在战术模式下的填充倍率 */
  atbFillMultiplier(): number;
}

/**
 * Parse a state name (enum value) coming from untyped input
 * 解析来自无类型输入的状态名
 */
export function parseTimeState(value: unknown): TimeState | undefined {
  return Object.values(TimeState).find(s => s === value);
}

/**
 * Parse a transition kind name
 * 解析过渡类型名
 */
export function parseTransitionKind(value: unknown): TransitionKind | undefined {
  return Object.values(TransitionKind).find(k => k === value);
}

/**
 * Parse a priority by enum name ('normal', 'High') or numeric value
 * 按名称或数值解析优先级
 */
export function parseTimeStatePriority(value: unknown): TimeStatePriority | undefined {
  if (typeof value === 'number') {
    return PRIORITY_ORDER.find(p => p === value);
  }
  if (typeof value === 'string') {
    const lower = value.toLowerCase();
    return PRIORITY_ORDER.find(p => TimeStatePriority[p].toLowerCase() === lower);
  }
  return undefined;
}
