/**
 * Scripted replay of time state requests
 * 时间状态请求的脚本化回放
 *
 * A timeline script lists actions at real-time offsets. The runner feeds
 * them to a fresh machine, ticking it through a FixedTimestepScheduler with
 * a ManualClock, and collects every notification on the way.
 * 时间线脚本按真实时间偏移列出动作。运行器将其送入新的状态机，
 * 通过使用ManualClock的FixedTimestepScheduler推进，并收集所有通知。
 */

import { TimeStateMachine } from '../src/core/TimeStateMachine';
import { FixedTimestepScheduler } from '../src/core/FixedTimestepScheduler';
import { ManualClock } from '../src/core/Clock';
import { TimeDilationSettings } from '../src/resources/TimeDilationSettings';
import type { StateScaleTable, TimeDilationSettingsOptions } from '../src/resources/TimeDilationSettings';
import type { StateChangeRecord, TransitionKind } from '../src/utils/TimeTypes';
import {
  TimeState,
  TimeStatePriority,
  parseTimeState,
  parseTimeStatePriority,
  parseTransitionKind
} from '../src/utils/TimeTypes';

export type TimelineAction =
  | { at: number; action: 'request'; state: TimeState; priority: TimeStatePriority; kind?: TransitionKind; reason: string }
  | { at: number; action: 'force'; state: TimeState; reason: string }
  | { at: number; action: 'toggle'; reason: string }
  | { at: number; action: 'pause'; reason: string }
  | { at: number; action: 'resume'; reason: string }
  | { at: number; action: 'special'; scale?: number; reason: string };

export interface TimelineScript {
  /** Real seconds per frame 每帧真实秒数 */
  frameDt: number;
  /** Real seconds to simulate 模拟的真实秒数 */
  duration: number;
  settings: TimeDilationSettingsOptions;
  actions: TimelineAction[];
}

export interface TimelineEntry {
  /** Real seconds since start 自开始以来的真实秒数 */
  time: number;
  event: string;
  detail: string;
}

export interface TimelineResult {
  entries: TimelineEntry[];
  /** Whether each action was admitted, in script order 每个动作是否被接受（脚本顺序） */
  outcomes: boolean[];
  history: readonly StateChangeRecord[];
  finalState: TimeState;
  finalScale: number;
  /** Fixed simulation steps run 执行的固定模拟步数 */
  simulationSteps: number;
}

const DEFAULT_FRAME_DT = 1 / 60;

const ACTIONS = ['request', 'force', 'toggle', 'pause', 'resume', 'special'] as const;

/**
 * Validate a parsed JSON script
 * 校验解析后的JSON脚本
 *
 * @throws Error describing the first invalid field 描述第一个无效字段的错误
 */
export function parseTimelineScript(input: unknown): TimelineScript {
  const root = fieldsOf(input, 'script');

  const frameDt = optionalNumber(root.get('frameDt'), 'frameDt') ?? DEFAULT_FRAME_DT;
  if (frameDt <= 0) {
    throw new Error(`frameDt must be positive, got ${frameDt}`);
  }

  const rawActions = root.get('actions');
  if (!Array.isArray(rawActions)) {
    throw new Error('actions must be an array');
  }
  const actions = rawActions.map((raw, index) => parseAction(raw, index));
  actions.sort((a, b) => a.at - b.at);

  const lastAt = actions.length > 0 ? actions[actions.length - 1].at : 0;
  const duration = optionalNumber(root.get('duration'), 'duration') ?? lastAt + 1;

  const rawSettings = root.get('settings');
  const settings = rawSettings === undefined ? {} : parseSettings(rawSettings);

  return { frameDt, duration, settings, actions };
}

export class TimelineRunner {
  /**
   * Replay a script against a new machine
   * 在新状态机上回放脚本
   */
  run(script: TimelineScript): TimelineResult {
    const machine = new TimeStateMachine(new TimeDilationSettings(script.settings));
    const clock = new ManualClock(script.frameDt);
    const scheduler = new FixedTimestepScheduler(machine, () => undefined, { smoothFactor: 1 }, clock);

    const entries: TimelineEntry[] = [];
    const log = (event: string, detail = '') => entries.push({ time: clock.elapsed, event, detail });

    machine.on('stateChanged', state => log('stateChanged', state));
    machine.on('transitionStarted', () => log('transitionStarted'));
    machine.on('transitionCompleted', () => log('transitionCompleted', machine.currentScale.toFixed(3)));
    machine.on('enteredTacticalMode', state => log('enteredTacticalMode', state));
    machine.on('exitedTacticalMode', state => log('exitedTacticalMode', state));
    machine.on('autoExitTriggered', () => log('autoExitTriggered'));

    const outcomes: boolean[] = [];
    let next = 0;
    const frames = Math.ceil(script.duration / script.frameDt - 1e-9);

    for (let frame = 0; frame <= frames; frame++) {
      while (next < script.actions.length && script.actions[next].at <= clock.elapsed + 1e-9) {
        const action = script.actions[next++];
        const admitted = this.perform(machine, action);
        outcomes.push(admitted);
        if (!admitted) {
          log('rejected', `${action.action} (${action.reason})`);
        }
      }
      if (frame < frames) {
        scheduler.tick();
      }
    }

    const result: TimelineResult = {
      entries,
      outcomes,
      history: machine.history(),
      finalState: machine.currentState,
      finalScale: machine.currentScale,
      simulationSteps: scheduler.totalSteps
    };
    machine.dispose();
    return result;
  }

  private perform(machine: TimeStateMachine, action: TimelineAction): boolean {
    switch (action.action) {
      case 'request':
        return machine.requestStateChange(action.state, action.priority, action.kind, action.reason);
      case 'force':
        return machine.forceState(action.state, action.reason);
      case 'toggle':
        return machine.toggleTacticalMode(action.reason);
      case 'pause':
        return machine.enterTacticalPause(action.reason);
      case 'resume':
        return machine.exitTacticalPause(action.reason);
      case 'special':
        return machine.enterSpecialExecution(action.scale, action.reason);
    }
  }
}

function fieldsOf(value: unknown, label: string): Map<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`${label} must be an object`);
  }
  return new Map<string, unknown>(Object.entries(value));
}

function optionalNumber(value: unknown, label: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${label} must be a number`);
  }
  return value;
}

function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`${label} must be a string`);
  }
  return value;
}

function requireState(value: unknown, label: string): TimeState {
  const state = parseTimeState(value);
  if (state === undefined) {
    throw new Error(`${label}: unknown state '${String(value)}'`);
  }
  return state;
}

function parseAction(raw: unknown, index: number): TimelineAction {
  const label = `actions[${index}]`;
  const fields = fieldsOf(raw, label);

  const at = optionalNumber(fields.get('at'), `${label}.at`);
  if (at === undefined || at < 0) {
    throw new Error(`${label}.at must be a non-negative number`);
  }

  const name = ACTIONS.find(a => a === fields.get('action'));
  if (name === undefined) {
    throw new Error(`${label}.action must be one of ${ACTIONS.join(', ')}`);
  }
  const reason = optionalString(fields.get('reason'), `${label}.reason`) ?? name;

  switch (name) {
    case 'request': {
      const state = requireState(fields.get('state'), label);
      const rawPriority = fields.get('priority');
      const priority = rawPriority === undefined ? TimeStatePriority.Normal : parseTimeStatePriority(rawPriority);
      if (priority === undefined) {
        throw new Error(`${label}: unknown priority '${String(rawPriority)}'`);
      }
      const rawKind = fields.get('kind');
      const kind = parseTransitionKind(rawKind);
      if (rawKind !== undefined && kind === undefined) {
        throw new Error(`${label}: unknown transition kind '${String(rawKind)}'`);
      }
      return { at, action: name, state, priority, kind, reason };
    }
    case 'force':
      return { at, action: name, state: requireState(fields.get('state'), label), reason };
    case 'special':
      return { at, action: name, scale: optionalNumber(fields.get('scale'), `${label}.scale`), reason };
    case 'toggle':
    case 'pause':
    case 'resume':
      return { at, action: name, reason };
  }
}

function parseTable(value: unknown, label: string): StateScaleTable {
  const fields = fieldsOf(value, label);
  const table: StateScaleTable = {};
  for (const [key, entry] of fields) {
    const state = requireState(key, label);
    const n = optionalNumber(entry, `${label}.${key}`);
    if (n !== undefined) table[state] = n;
  }
  return table;
}

function parseSettings(value: unknown): TimeDilationSettingsOptions {
  const fields = fieldsOf(value, 'settings');
  const settings: TimeDilationSettingsOptions = {};

  const scales = fields.get('scales');
  if (scales !== undefined) settings.scales = parseTable(scales, 'settings.scales');

  const timeouts = fields.get('autoExitTimeouts');
  if (timeouts !== undefined) settings.autoExitTimeouts = parseTable(timeouts, 'settings.autoExitTimeouts');

  const smooth = optionalNumber(fields.get('smoothDuration'), 'settings.smoothDuration');
  if (smooth !== undefined) settings.smoothDuration = smooth;

  const stepped = optionalNumber(fields.get('steppedDuration'), 'settings.steppedDuration');
  if (stepped !== undefined) settings.steppedDuration = stepped;

  const rawKind = fields.get('defaultTransitionKind');
  if (rawKind !== undefined) {
    const kind = parseTransitionKind(rawKind);
    if (kind === undefined) {
      throw new Error(`settings.defaultTransitionKind: unknown transition kind '${String(rawKind)}'`);
    }
    settings.defaultTransitionKind = kind;
  }

  const enableAutoExit = fields.get('enableAutoExit');
  if (enableAutoExit !== undefined) {
    if (typeof enableAutoExit !== 'boolean') {
      throw new Error('settings.enableAutoExit must be a boolean');
    }
    settings.enableAutoExit = enableAutoExit;
  }

  return settings;
}
