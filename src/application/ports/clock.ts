/**
 * Time port.
 *
 * Purpose:
 * - Cooldown windows and backoff deadlines in the dispatcher
 * - Cycle durations in the watchdog service
 *
 * Injectable so tests can step time instead of sleeping.
 */
export interface Clock {
  /** Current time in milliseconds since the Unix epoch. */
  nowMs(): number;
}

export class SystemClock implements Clock {
  nowMs(): number {
    return Date.now();
  }
}
