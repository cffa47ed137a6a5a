import type { Delay } from "./delay"

/**
 * Perturbs a computed delay so concurrent callers do not retry in lockstep.
 * Output is sanitized and clamped by the caller.
 */
export interface JitterStrategy {
  apply(delay: Delay): Delay
}
