import type { Delay } from "../../ports/delay"

export interface ExponentialOptions {
  /** Delay for attempt 0, also the floor. */
  base: Delay

  /** Ceiling; growth saturates here instead of overflowing. */
  ceiling: Delay

  /** Multiplier per attempt. Default: 2 */
  factor?: number
}

export interface ExponentialPolicy {
  getDelay(attempt: number): Delay
}

/**
 * `base * factor ** attempt`, held within [base, ceiling].
 * A factor below 1 therefore stays at `base`.
 */
export function exponential(opts: ExponentialOptions): ExponentialPolicy {
  const { base, ceiling, factor = 2 } = opts
  const floorMs = base.milliseconds
  const ceilingMs = ceiling.milliseconds

  return {
    getDelay(attempt: number): Delay {
      if (floorMs === 0) return { milliseconds: 0 }

      // Infinity once factor ** attempt overflows
      const grown = floorMs * factor ** attempt

      return { milliseconds: Math.max(floorMs, Math.min(ceilingMs, grown)) }
    },
  }
}
