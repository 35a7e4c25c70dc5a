/**
 * Clock - Microsecond wall-clock source
 *
 * Column write timestamps, TTL expiry and lock expiry horizons are all
 * expressed in microseconds since the epoch, matching the resolution
 * replicated row stores use for last-write-wins ordering.
 */
export interface Clock {
  nowMicros(): number
}

export const MICROS_PER_MILLI = 1000
export const MICROS_PER_SECOND = 1_000_000

/**
 * System clock backed by Date.now() (millisecond precision, microsecond units)
 */
export const systemClock: Clock = {
  nowMicros: () => Date.now() * MICROS_PER_MILLI,
}

/**
 * Manually advanced clock for tests and simulations
 *
 * Usage:
 *   const clock = new ManualClock(1_700_000_000_000_000)
 *   clock.advanceSeconds(30)
 */
export class ManualClock implements Clock {
  private current: number

  constructor(startMicros: number = 0) {
    this.current = startMicros
  }

  nowMicros(): number {
    return this.current
  }

  advanceMicros(micros: number): void {
    if (micros < 0) {
      throw new Error('Clock cannot move backwards')
    }
    this.current += micros
  }

  advanceMillis(millis: number): void {
    this.advanceMicros(millis * MICROS_PER_MILLI)
  }

  advanceSeconds(seconds: number): void {
    this.advanceMicros(seconds * MICROS_PER_SECOND)
  }

  set(micros: number): void {
    this.current = micros
  }
}
