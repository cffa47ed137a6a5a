import type { Delay } from "../ports/delay"
import { ConfigurationError } from "./errors"

export const DEFAULT_MIN: Delay = Object.freeze({ milliseconds: 100 })
export const DEFAULT_MAX: Delay = Object.freeze({ milliseconds: 10_000 })
export const DEFAULT_FACTOR = 2
export const DEFAULT_JITTER = 0

export type BackoffSettings = Readonly<{
  /** Number of elements in the sequence; the last one is always `null`. */
  retries: number

  /** Floor for every delay, and the delay after the first failure. */
  min: Delay

  /** Ceiling for every delay. */
  max: Delay

  /** Growth multiplier per attempt. */
  factor: number

  /** Fraction of each delay that may be added or removed at random, in [0, 1]. */
  jitter: number
}>

export function validateRetries(retries: number): number {
  if (!Number.isSafeInteger(retries) || retries < 0) {
    throw new ConfigurationError("retries", retries, "must be a non-negative integer")
  }
  return retries
}

export function validateRange(min: Delay, max: Delay): { min: Delay; max: Delay } {
  const minMs = min.milliseconds
  const maxMs = max.milliseconds

  if (!Number.isFinite(minMs) || minMs < 0) {
    throw new ConfigurationError("min", minMs, "must be finite and >= 0")
  }

  if (!Number.isFinite(maxMs) || maxMs < 0) {
    throw new ConfigurationError("max", maxMs, "must be finite and >= 0")
  }

  if (maxMs < minMs) {
    throw new ConfigurationError("max", maxMs, `must be >= min (${minMs})`)
  }

  return {
    min: Object.freeze({ milliseconds: minMs }),
    max: Object.freeze({ milliseconds: maxMs }),
  }
}

export function validateFactor(factor: number): number {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new ConfigurationError("factor", factor, "must be finite and > 0")
  }
  return factor
}

export function validateJitter(jitter: number): number {
  if (!Number.isFinite(jitter) || jitter < 0 || jitter > 1) {
    throw new ConfigurationError("jitter", jitter, "must be within [0, 1]")
  }
  return jitter
}

export type SettingsInput = {
  retries: number
  min?: Delay | undefined
  max?: Delay | undefined
  factor?: number | undefined
  jitter?: number | undefined
}

/**
 * Validates every field and returns frozen settings. Nothing is clamped:
 * the first invalid field throws.
 */
export function resolveSettings(input: SettingsInput): BackoffSettings {
  const retries = validateRetries(input.retries)
  const { min, max } = validateRange(input.min ?? DEFAULT_MIN, input.max ?? DEFAULT_MAX)
  const factor = validateFactor(input.factor ?? DEFAULT_FACTOR)
  const jitter = validateJitter(input.jitter ?? DEFAULT_JITTER)

  return Object.freeze({ retries, min, max, factor, jitter })
}
