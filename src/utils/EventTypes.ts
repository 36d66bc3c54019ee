/**
 * Event system type definitions for time dilation notifications
 * 时间膨胀通知的事件系统类型定义
 */

import type { StateChangeRecord, TimeState } from './TimeTypes';

/**
 * Listener priority levels for controlling call order
 * 监听器优先级，用于控制调用顺序
 */
export enum EventPriority {
  /** Lowest priority 最低优先级 */
  Lowest = 0,
  /** Low priority 低优先级 */
  Low = 25,
  /** Normal priority 普通优先级 */
  Normal = 50,
  /** High priority 高优先级 */
  High = 75,
  /** Highest priority 最高优先级 */
  Highest = 100,
  /** Critical priority (internal bookkeeping) 关键优先级（内部记录） */
  Critical = 1000
}

/**
 * Notification payloads, keyed by event name
 * 通知载荷，按事件名索引
 */
export interface TimeStateEventMap {
  stateChanged: [state: TimeState];
  scaleChanged: [scale: number];
  transitionStarted: [];
  transitionCompleted: [];
  enteredTacticalMode: [state: TimeState];
  exitedTacticalMode: [previousState: TimeState];
  autoExitTriggered: [];
  stateChangeRecorded: [record: StateChangeRecord];
}

export type TimeStateEventName = keyof TimeStateEventMap;

export type TimeStateListener<K extends TimeStateEventName> = (...args: TimeStateEventMap[K]) => void;

/**
 * Event listener options
 * 事件监听器选项
 */
export interface EventListenerOptions {
  /** Listener priority 监听器优先级 */
  priority?: EventPriority;
  /** Whether listener should be called only once 是否只调用一次 */
  once?: boolean;
}

/**
 * Registered listener bookkeeping
 * 已注册监听器信息
 */
export interface EventListenerInfo<K extends TimeStateEventName> {
  id: string;
  listener: TimeStateListener<K>;
  priority: EventPriority;
  once: boolean;
}

/**
 * Event statistics for monitoring
 * 事件统计信息，用于监控
 */
export interface EventStatistics {
  /** Total events dispatched 分发的事件总数 */
  totalDispatched: number;
  /** Listener calls that threw 抛出异常的监听器调用次数 */
  listenerErrors: number;
}
