/**
 * Admission rule for time state requests
 * 时间状态请求的准入规则
 */

import { TimeStatePriority } from '../utils/TimeTypes';

/**
 * Decide whether a request may replace the current state.
 * Emergency is always admitted, anything else needs at least the current priority.
 * 判断请求能否替换当前状态。Emergency总是通过，其余需不低于当前优先级。
 */
export function admit(requested: TimeStatePriority, current: TimeStatePriority): boolean {
  if (requested === TimeStatePriority.Emergency) {
    return true;
  }
  return requested >= current;
}
