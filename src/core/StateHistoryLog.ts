/**
 * Bounded history of admitted state changes
 * 已接受状态变化的有界历史
 */

import type { StateChangeRecord } from '../utils/TimeTypes';

export const DEFAULT_HISTORY_SIZE = 10;

/**
 * Ring buffer that evicts its oldest record once full
 * 满后淘汰最旧记录的环形缓冲区
 */
export class StateHistoryLog {
  private ring: Array<StateChangeRecord | undefined>;
  private idx = 0;
  private count = 0;

  constructor(maxSize = DEFAULT_HISTORY_SIZE) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`History size must be a positive integer, got ${maxSize}`);
    }
    this.ring = new Array<StateChangeRecord | undefined>(maxSize);
  }

  /**
   * Append a record, evicting the oldest when full
   * 追加记录，满时淘汰最旧的
   */
  append(record: StateChangeRecord): void {
    this.ring[this.idx] = Object.freeze({ ...record });
    this.idx = (this.idx + 1) % this.ring.length;
    this.count = Math.min(this.count + 1, this.ring.length);
  }

  /**
   * Oldest-first copy of the log, detached from the backing store
   * 按时间顺序的日志副本，与内部存储分离
   */
  snapshot(): readonly StateChangeRecord[] {
    const out: StateChangeRecord[] = [];
    const start = this.count < this.ring.length ? 0 : this.idx;
    for (let i = 0; i < this.count; i++) {
      const record = this.ring[(start + i) % this.ring.length];
      if (record) out.push(record);
    }
    return Object.freeze(out);
  }

  clear(): void {
    this.ring.fill(undefined);
    this.idx = 0;
    this.count = 0;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.ring.length;
  }
}
