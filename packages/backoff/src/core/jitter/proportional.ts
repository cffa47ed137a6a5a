import { systemRandom } from "../../adapters/random"
import type { Delay } from "../../ports/delay"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"

/**
 * Proportional jitter: moves the delay up or down by at most `fraction` of
 * itself, uniformly.
 *
 * Range: [delay * (1 - fraction), delay * (1 + fraction))
 */
export function proportionalJitter(
  fraction: number,
  random: RandomSource = systemRandom,
): JitterStrategy {
  return {
    apply(delay: Delay): Delay {
      if (fraction === 0) return delay

      const spread = fraction * delay.milliseconds
      const offset = (random.next() * 2 - 1) * spread

      return { milliseconds: delay.milliseconds + offset }
    },
  }
}
