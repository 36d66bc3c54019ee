/**
 * Time state machine with priority arbitration
 * 带优先级仲裁的时间状态机
 *
 * Key points:
 * - requestStateChange() is the only way in; rejected requests return false and change nothing
 * - One transition run and one auto-exit countdown at a time, the latest request wins
 * - tick(realDt) advances both with real (unscaled) time
 * - Notifications are dispatched synchronously through `events`
 *
 * 要点：
 * - requestStateChange()是唯一入口；被拒绝的请求返回false且不产生任何变化
 * - 同时只有一个过渡和一个自动退出倒计时，最新请求生效
 * - tick(realDt)用真实（未缩放）时间推进两者
 * - 通知通过`events`同步分发
 *
 * @example
 * ```typescript
 * const machine = new TimeStateMachine(new TimeDilationSettings());
 *
 * machine.on('enteredTacticalMode', (state) => hud.showBanner(state));
 *
 * machine.requestStateChange(TimeState.SlowMotion, TimeStatePriority.Normal);
 *
 * // Every frame
 * machine.tick(realDeltaSeconds);
 * world.update(realDeltaSeconds * machine.currentScale);
 * ```
 */

import type { SettingsProvider, StateChangeRecord } from '../utils/TimeTypes';
import { TimeState, TimeStatePriority, TransitionKind } from '../utils/TimeTypes';
import type { EventListenerOptions, TimeStateEventName, TimeStateListener } from '../utils/EventTypes';
import { admit } from './PriorityArbiter';
import { TransitionEngine } from './TransitionEngine';
import type { TransitionSnapshot } from './TransitionEngine';
import type { TransitionCurveRegistry } from './TransitionCurve';
import { AutoExitScheduler } from './AutoExitScheduler';
import { StateHistoryLog, DEFAULT_HISTORY_SIZE } from './StateHistoryLog';
import { TimeEventBus } from './TimeEventBus';

/** Reason recorded for timeout-driven returns to real time 超时返回实时时记录的原因 */
export const AUTO_EXIT_REASON = 'AutoExitTimeout';

/** Scale used when neither the state nor RealTime has a configured scale */
const FALLBACK_SCALE = 1;

export interface TimeStateMachineOptions {
  /** History capacity, default 10 历史容量，默认10 */
  maxHistorySize?: number;
  /** Record admitted changes, default true 是否记录历史，默认true */
  trackHistory?: boolean;
  /** Log admissions and rejections to the console 在控制台输出调试日志 */
  debug?: boolean;
  /** Wall clock in ms, default Date.now 墙钟（毫秒） */
  now?: () => number;
  /** Transition curve registry 过渡曲线注册表 */
  curves?: TransitionCurveRegistry;
}

export interface TimeStateMachineStatistics {
  /** Requests that took effect 生效的请求数 */
  admitted: number;
  /** Requests refused by the arbiter 被仲裁拒绝的请求数 */
  rejected: number;
  /** Timeout-driven returns to real time 超时自动退出次数 */
  autoExits: number;
  /** Records currently held 当前保存的记录数 */
  historySize: number;
  historyCapacity: number;
}

export class TimeStateMachine {
  /** Observer registry 观察者注册表 */
  readonly events = new TimeEventBus();

  private readonly engine: TransitionEngine;
  private readonly autoExit: AutoExitScheduler;
  private readonly historyLog: StateHistoryLog;
  private readonly trackHistory: boolean;
  private readonly debug: boolean;
  private readonly now: () => number;

  private state = TimeState.RealTime;
  private prevState = TimeState.RealTime;
  private priority = TimeStatePriority.Normal;
  /** Bumped on every admitted change 每次状态变化递增 */
  private generation = 0;
  /** State carried by the last mode-boundary check 最近一次模式边界判断所用的状态 */
  private announcedState = TimeState.RealTime;
  private stats = { admitted: 0, rejected: 0, autoExits: 0 };

  constructor(
    private readonly settings: SettingsProvider,
    opts: TimeStateMachineOptions = {}
  ) {
    this.historyLog = new StateHistoryLog(opts.maxHistorySize ?? DEFAULT_HISTORY_SIZE);
    this.trackHistory = opts.trackHistory ?? true;
    this.debug = opts.debug ?? false;
    this.now = opts.now ?? Date.now;

    this.engine = new TransitionEngine(
      this.resolveScale(TimeState.RealTime),
      {
        onStarted: () => this.events.emit('transitionStarted'),
        onScaleChanged: scale => this.events.emit('scaleChanged', scale),
        onCompleted: () => this.events.emit('transitionCompleted')
      },
      opts.curves
    );
    this.autoExit = new AutoExitScheduler(
      () => this.canAutoExit(),
      () => this.performAutoExit()
    );
  }

  get currentState(): TimeState {
    return this.state;
  }

  /** State held before the latest admitted change 最近一次变化之前的状态 */
  get previousState(): TimeState {
    return this.prevState;
  }

  get currentScale(): number {
    return this.engine.currentScale;
  }

  get currentPriority(): TimeStatePriority {
    return this.priority;
  }

  get isTransitioning(): boolean {
    return this.engine.isActive;
  }

  get isInTacticalMode(): boolean {
    return this.state !== TimeState.RealTime;
  }

  get isInRealTime(): boolean {
    return this.state === TimeState.RealTime;
  }

  get isPaused(): boolean {
    return this.state === TimeState.Pause;
  }

  get isAutoExitArmed(): boolean {
    return this.autoExit.isArmed;
  }

  /** Real seconds until auto-exit, null when disarmed 距自动退出的真实秒数 */
  get autoExitRemaining(): number | null {
    return this.autoExit.remaining;
  }

  /**
   * Fill-rate multiplier for ATB gauges: the configured value in tactical mode, 1 in real time
   * ATB槽填充倍率：战术模式下为配置值，实时模式下为1
   */
  getATBTimeMultiplier(): number {
    return this.isInTacticalMode ? this.settings.atbFillMultiplier() : 1;
  }

  /**
   * Request a state change
   * 请求状态变化
   *
   * @param kind Defaults to the settings' default kind 默认使用设置中的过渡类型
   * @param reason Free text kept in the history 记录在历史中的原因
   * @returns false when the arbiter refuses, nothing changes then 仲裁拒绝时返回false且不做任何改变
   */
  requestStateChange(
    newState: TimeState,
    priority: TimeStatePriority = TimeStatePriority.Normal,
    kind?: TransitionKind,
    reason = ''
  ): boolean {
    return this.request(newState, priority, kind, reason);
  }

  /**
   * RealTime → SlowMotion, anything else → RealTime, both at Normal priority
   * RealTime切换到SlowMotion，其他状态切换回RealTime，均为Normal优先级
   */
  toggleTacticalMode(reason = 'Toggle Tactical Mode'): boolean {
    const target = this.state === TimeState.RealTime ? TimeState.SlowMotion : TimeState.RealTime;
    return this.request(target, TimeStatePriority.Normal, undefined, reason);
  }

  /**
   * Emergency, instant change that is always admitted
   * 总是被接受的紧急瞬时变化
   */
  forceState(state: TimeState, reason = 'Force State'): boolean {
    return this.request(state, TimeStatePriority.Emergency, TransitionKind.Instant, reason);
  }

  enterTacticalPause(reason = 'Tactical Pause'): boolean {
    return this.request(TimeState.Pause, TimeStatePriority.High, TransitionKind.Instant, reason);
  }

  /**
   * Leave the pause for the state held before it, at Normal priority.
   * The arbiter is not consulted, so a High pause can be left by a Normal caller.
   * 以Normal优先级回到暂停前的状态。不经过仲裁。
   *
   * @returns false when not paused 未暂停时返回false
   */
  exitTacticalPause(reason = 'Exit Tactical Pause'): boolean {
    if (!this.isPaused) return false;
    const target = this.prevState === TimeState.Pause ? TimeState.RealTime : this.prevState;
    this.apply(target, TimeStatePriority.Normal, this.settings.defaultTransitionKind(), reason);
    return true;
  }

  enterCommandPlanning(reason = 'Command Planning'): boolean {
    return this.request(TimeState.CommandPlanning, TimeStatePriority.High, undefined, reason);
  }

  /**
   * Enter special execution at Critical priority
   * 以Critical优先级进入特殊执行
   *
   * @param customScale Non-negative value overriding the configured target for this call only
   *                    非负值，仅本次覆盖配置的目标倍率
   */
  enterSpecialExecution(customScale?: number, reason = 'Special Execution'): boolean {
    const override = customScale !== undefined && customScale >= 0 ? customScale : undefined;
    return this.request(TimeState.SpecialExecution, TimeStatePriority.Critical, undefined, reason, override);
  }

  /**
   * Advance the transition, then the auto-exit countdown, by real seconds
   * 用真实秒数推进过渡，再推进自动退出倒计时
   */
  tick(realDeltaTime: number): void {
    const dt = Number.isFinite(realDeltaTime) && realDeltaTime > 0 ? realDeltaTime : 0;
    this.engine.advance(dt);
    this.autoExit.advance(dt);
  }

  /**
   * Oldest-first copy of the state history
   * 按时间顺序的状态历史副本
   */
  history(): readonly StateChangeRecord[] {
    return this.historyLog.snapshot();
  }

  clearHistory(): void {
    this.historyLog.clear();
  }

  getTransition(): TransitionSnapshot | null {
    return this.engine.getSnapshot();
  }

  getStatistics(): TimeStateMachineStatistics {
    return {
      ...this.stats,
      historySize: this.historyLog.size,
      historyCapacity: this.historyLog.capacity
    };
  }

  getDebugInfo(): string {
    return `State: ${this.state} | Scale: ${this.currentScale.toFixed(2)} | ` +
      `Priority: ${TimeStatePriority[this.priority]} | Transitioning: ${this.isTransitioning} | ` +
      `AutoExit: ${this.autoExit.isArmed}`;
  }

  on<K extends TimeStateEventName>(
    type: K,
    listener: TimeStateListener<K>,
    options?: EventListenerOptions
  ): string {
    return this.events.on(type, listener, options);
  }

  once<K extends TimeStateEventName>(
    type: K,
    listener: TimeStateListener<K>,
    options?: EventListenerOptions
  ): string {
    return this.events.once(type, listener, options);
  }

  off(listenerId: string): boolean {
    return this.events.off(listenerId);
  }

  /**
   * Release observers and drop any pending transition or countdown
   * 释放观察者并丢弃未完成的过渡和倒计时
   */
  dispose(): void {
    this.events.clear();
    this.engine.cancel();
    this.autoExit.cancel();
  }

  private request(
    newState: TimeState,
    priority: TimeStatePriority,
    kind: TransitionKind | undefined,
    reason: string,
    scaleOverride?: number
  ): boolean {
    if (!admit(priority, this.priority)) {
      this.stats.rejected++;
      if (this.debug) {
        console.warn(
          `[TimeStateMachine] Cannot change to ${newState}: priority ${TimeStatePriority[priority]} ` +
          `below ${TimeStatePriority[this.priority]} | Reason: ${reason}`
        );
      }
      return false;
    }

    this.apply(newState, priority, kind ?? this.settings.defaultTransitionKind(), reason, scaleOverride);
    return true;
  }

  private apply(
    newState: TimeState,
    priority: TimeStatePriority,
    kind: TransitionKind,
    reason: string,
    scaleOverride?: number
  ): void {
    this.stats.admitted++;
    const generation = ++this.generation;

    const previous = this.state;
    const fromScale = this.engine.currentScale;
    this.prevState = previous;
    this.state = newState;
    this.priority = priority;

    const toScale = scaleOverride ?? this.resolveScale(newState);
    const duration = kind === TransitionKind.Instant ? 0 : this.settings.durationFor(kind);

    // Countdown and history are settled before any listener runs
    this.autoExit.cancel();
    if (this.settings.autoExitEligible(newState)) {
      this.autoExit.arm(this.settings.autoExitTimeoutFor(newState));
    }

    const record: StateChangeRecord = {
      fromState: previous,
      toState: newState,
      fromScale,
      toScale,
      duration,
      kind,
      priority,
      reason,
      timestamp: this.now()
    };
    if (this.trackHistory) {
      this.historyLog.append(record);
    }

    if (this.debug) {
      console.log(
        `[TimeStateMachine] ${previous} -> ${newState} (Priority: ${TimeStatePriority[priority]}) | Reason: ${reason}`
      );
    }

    this.engine.start(fromScale, toScale, duration, kind);

    // A listener may have made another request; its notifications supersede ours
    // 监听器可能发起了新的请求，此时由新请求负责通知
    if (this.generation !== generation) return;
    this.events.emit('stateChanged', newState);

    if (this.generation !== generation) return;
    this.events.emit('stateChangeRecorded', record);

    if (this.generation !== generation) return;
    // Mode boundaries are judged against the last state observers were told about
    const announced = this.announcedState;
    this.announcedState = newState;
    if (announced === TimeState.RealTime && newState !== TimeState.RealTime) {
      this.events.emit('enteredTacticalMode', newState);
    } else if (announced !== TimeState.RealTime && newState === TimeState.RealTime) {
      this.events.emit('exitedTacticalMode', announced);
    }
  }

  private resolveScale(state: TimeState): number {
    const scale = this.settings.scaleFor(state);
    if (scale !== undefined) return scale;

    const fallback = this.settings.scaleFor(TimeState.RealTime) ?? FALLBACK_SCALE;
    console.warn(`[TimeStateMachine] No scale configured for ${state}, using ${fallback}`);
    return fallback;
  }

  private canAutoExit(): boolean {
    return !this.engine.isActive && this.priority <= TimeStatePriority.Normal;
  }

  private performAutoExit(): void {
    this.stats.autoExits++;
    this.events.emit('autoExitTriggered');
    this.request(TimeState.RealTime, TimeStatePriority.Normal, undefined, AUTO_EXIT_REASON);
  }
}
