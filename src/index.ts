/**
 * Tactical Timescale - priority-arbitrated time dilation for real-time tactics games
 * 战术时间倍率 - 带优先级仲裁的即时战术游戏时间膨胀
 *
 * @packageDocumentation
 */

// Types
export {
  TimeState,
  TimeStatePriority,
  TransitionKind,
  PRIORITY_ORDER,
  parseTimeState,
  parseTransitionKind,
  parseTimeStatePriority
} from './utils/TimeTypes';
export type { StateChangeRecord, SettingsProvider } from './utils/TimeTypes';
export { EventPriority } from './utils/EventTypes';
export type {
  TimeStateEventMap,
  TimeStateEventName,
  TimeStateListener,
  EventListenerOptions,
  EventListenerInfo,
  EventStatistics
} from './utils/EventTypes';

// State machine
export { TimeStateMachine, AUTO_EXIT_REASON } from './core/TimeStateMachine';
export type { TimeStateMachineOptions, TimeStateMachineStatistics } from './core/TimeStateMachine';
export { admit } from './core/PriorityArbiter';
export { TimeEventBus } from './core/TimeEventBus';
export { StateHistoryLog, DEFAULT_HISTORY_SIZE } from './core/StateHistoryLog';
export { AutoExitScheduler } from './core/AutoExitScheduler';

// Transitions
export { TransitionEngine } from './core/TransitionEngine';
export type { TransitionObserver, TransitionSnapshot } from './core/TransitionEngine';
export {
  InstantCurve,
  SmoothCurve,
  SteppedCurve,
  DEFAULT_CURVES,
  STEPPED_HOLD_FRACTION,
  createCurveRegistry,
  smoothstep,
  lerp
} from './core/TransitionCurve';
export type { TransitionCurve, TransitionCurveRegistry } from './core/TransitionCurve';

// Frame driving
export { FixedTimestepScheduler } from './core/FixedTimestepScheduler';
export type { FixedStepOpts, FixedStep } from './core/FixedTimestepScheduler';
export { PerformanceClock, ManualClock } from './core/Clock';
export type { Clock } from './core/Clock';

// Settings
export {
  TimeDilationSettings,
  DEFAULT_SCALES,
  DEFAULT_AUTO_EXIT_TIMEOUTS
} from './resources/TimeDilationSettings';
export type {
  StateScaleTable,
  TimeDilationSettingsOptions,
  TimeDilationConfig
} from './resources/TimeDilationSettings';

// Diagnostics
export { HistorySerializer } from './serialize/HistorySerializer';
export {
  SerializationFormat,
  CURRENT_SERIALIZATION_VERSION
} from './utils/SerializationTypes';
export type {
  SerializationVersion,
  SerializationOptions,
  DeserializationOptions,
  SerializationResult,
  DeserializationResult
} from './utils/SerializationTypes';
