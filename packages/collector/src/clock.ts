export interface Clock {
  nowMs(): number;
}

/**
 * Monotonic clock for interval polling; unaffected by wall-clock changes.
 */
export class MonotonicClock implements Clock {
  nowMs(): number {
    return performance.now();
  }
}
