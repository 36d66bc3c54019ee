import type {
  EventListenerInfo,
  EventListenerOptions,
  EventStatistics,
  TimeStateEventMap,
  TimeStateEventName,
  TimeStateListener
} from '../utils/EventTypes';
import { EventPriority } from '../utils/EventTypes';

type ListenerTable = { [K in TimeStateEventName]?: EventListenerInfo<K>[] };

/**
 * Observer registry for time state notifications
 * 时间状态通知的观察者注册表
 *
 * Dispatch is synchronous: `emit` returns after every listener ran. Listeners
 * with a higher priority run first, equal priorities run in subscription order.
 * 分发是同步的：emit在所有监听器执行后返回。高优先级先执行，同优先级按订阅顺序。
 *
 * @example
 * ```typescript
 * const events = new TimeEventBus();
 *
 * const id = events.on('stateChanged', (state) => {
 *   console.log(`Now in ${state}`);
 * });
 *
 * events.once('autoExitTriggered', () => {
 *   console.log('Back to real time');
 * });
 *
 * events.off(id);
 * ```
 */
export class TimeEventBus {
  private _listeners: ListenerTable = {};
  private readonly _typeById = new Map<string, TimeStateEventName>();
  private _listenerIdCounter = 0;
  private _statistics: EventStatistics = {
    totalDispatched: 0,
    listenerErrors: 0
  };

  /**
   * Subscribe to an event
   * 订阅事件
   *
   * @returns Listener ID for unsubscription 用于取消订阅的监听器ID
   */
  on<K extends TimeStateEventName>(
    type: K,
    listener: TimeStateListener<K>,
    options: EventListenerOptions = {}
  ): string {
    const id = `listener_${++this._listenerIdCounter}`;
    const info: EventListenerInfo<K> = {
      id,
      listener,
      priority: options.priority ?? EventPriority.Normal,
      once: options.once ?? false
    };

    const listeners: EventListenerInfo<K>[] = this._listeners[type] ?? [];
    listeners.push(info);
    // Stable sort keeps subscription order within a priority
    listeners.sort((a, b) => b.priority - a.priority);
    const table: { [P in K]?: EventListenerInfo<P>[] } = this._listeners;
    table[type] = listeners;
    this._typeById.set(id, type);

    return id;
  }

  /**
   * Subscribe once (removed before its first call)
   * 订阅一次（首次调用前移除）
   */
  once<K extends TimeStateEventName>(
    type: K,
    listener: TimeStateListener<K>,
    options: EventListenerOptions = {}
  ): string {
    return this.on(type, listener, { ...options, once: true });
  }

  /**
   * Unsubscribe by listener ID
   * 通过监听器ID取消订阅
   *
   * @returns Whether a listener was removed 是否移除了监听器
   */
  off(listenerId: string): boolean {
    const type = this._typeById.get(listenerId);
    if (type === undefined) return false;
    this._typeById.delete(listenerId);
    return this._remove(type, listenerId);
  }

  /**
   * Remove all listeners of one event, or of every event when no type is given
   * 移除某事件的全部监听器；不传类型时移除所有
   *
   * @returns Number of listeners removed 移除的监听器数量
   */
  offAll(type?: TimeStateEventName): number {
    if (type === undefined) {
      const count = this._typeById.size;
      this._listeners = {};
      this._typeById.clear();
      return count;
    }

    const listeners = this._listeners[type];
    if (!listeners) return 0;
    for (const info of listeners) {
      this._typeById.delete(info.id);
    }
    delete this._listeners[type];
    return listeners.length;
  }

  /**
   * Dispatch an event to its listeners, synchronously and in order
   * 同步且有序地向监听器分发事件
   */
  emit<K extends TimeStateEventName>(type: K, ...args: TimeStateEventMap[K]): void {
    this._statistics.totalDispatched++;

    const listeners = this._listeners[type];
    if (!listeners) return;

    // Iterate a copy so listeners may subscribe or unsubscribe while we dispatch
    for (const info of listeners.slice()) {
      if (info.once) {
        this.off(info.id);
      }
      this._callListener(type, info, args);
    }
  }

  getListenerCount(type: TimeStateEventName): number {
    return this._listeners[type]?.length ?? 0;
  }

  hasListeners(type: TimeStateEventName): boolean {
    return this.getListenerCount(type) > 0;
  }

  /**
   * Get event bus statistics
   * 获取事件总线统计信息
   */
  getStatistics(): EventStatistics {
    return { ...this._statistics };
  }

  /**
   * Clear all listeners and reset statistics
   * 清除所有监听器并重置统计信息
   */
  clear(): void {
    this.offAll();
    this._statistics = {
      totalDispatched: 0,
      listenerErrors: 0
    };
  }

  private _remove<K extends TimeStateEventName>(type: K, listenerId: string): boolean {
    const listeners = this._listeners[type];
    if (!listeners) return false;

    const index = listeners.findIndex(l => l.id === listenerId);
    if (index === -1) return false;

    listeners.splice(index, 1);
    if (listeners.length === 0) {
      delete this._listeners[type];
    }
    return true;
  }

  /**
   * Call a single listener with error handling
   * 调用单个监听器并处理错误
   */
  private _callListener<K extends TimeStateEventName>(
    type: K,
    info: EventListenerInfo<K>,
    args: TimeStateEventMap[K]
  ): void {
    try {
      info.listener(...args);
    } catch (error) {
      this._statistics.listenerErrors++;
      // One failing observer must not abort a state change half-way
      console.error(`Error in time event listener for ${type}:`, error);
    }
  }
}
