import { systemRandom } from "../adapters/random"
import type { BackoffStep } from "../ports/delay"
import type { RandomSource } from "../ports/random-source"
import { proportionalJitter } from "./jitter/proportional"
import type { BackoffSettings } from "./settings"
import { exponential } from "./strategies/exponential"

export function assertAttempt(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer (got ${value})`)
  }
}

function clamp(ms: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, ms))
}

/**
 * Element `attempt` of the sequence described by `settings`.
 *
 * The final slot (`retries - 1`) and anything past it is `null`. Earlier slots
 * grow from `min` by `factor`, get proportional jitter and are clamped to
 * [min, max]. Only a malformed `attempt` throws.
 */
export function computeDelay(
  settings: BackoffSettings,
  attempt: number,
  random: RandomSource = systemRandom,
): BackoffStep {
  assertAttempt("attempt", attempt)

  if (attempt >= settings.retries - 1) return null

  const minMs = settings.min.milliseconds
  const maxMs = settings.max.milliseconds

  const base = exponential({
    base: settings.min,
    ceiling: settings.max,
    factor: settings.factor,
  }).getDelay(attempt)
  const jittered = proportionalJitter(settings.jitter, random).apply(base)
  const ms = Number.isFinite(jittered.milliseconds)
    ? jittered.milliseconds
    : base.milliseconds

  return { milliseconds: clamp(ms, minMs, maxMs) }
}
