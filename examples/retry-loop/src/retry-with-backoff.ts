import { setTimeout as delay } from "node:timers/promises"
import type { BackoffStep } from "@pacer/backoff"
import { createNullLogger, type Logger } from "@pacer/logger"

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export type RetryWithBackoffDeps = {
  /** Default: `chunkedSleep()` over node timers, cancelled by `signal` */
  sleep?: Sleep
  logger?: Logger

  /** Checked before every attempt and passed to `sleep`. */
  signal?: AbortSignal
}

/** Longest delay a Node timer honours; anything longer fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647

const timerWait: Sleep = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : {})
}

/**
 * Wraps `wait` so delays beyond `MAX_TIMER_MS` run as consecutive waits
 * instead of firing early. `signal` is checked before each one.
 */
export function chunkedSleep(wait: Sleep = timerWait): Sleep {
  return async (ms, signal) => {
    let remaining = ms

    while (remaining > 0) {
      signal?.throwIfAborted()

      const chunk = Math.min(remaining, MAX_TIMER_MS)
      await wait(chunk, signal)
      remaining -= chunk
    }
  }
}

const defaultSleep = chunkedSleep()

/**
 * Runs `fn` until it resolves or the backoff runs out. Each failure takes the
 * next step: a delay means sleep and try again, `null` (or the end of the
 * sequence) rethrows the error.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  backoff: Iterable<BackoffStep>,
  deps: RetryWithBackoffDeps = {},
): Promise<T> {
  const { sleep = defaultSleep, logger = createNullLogger(), signal } = deps
  const steps = backoff[Symbol.iterator]()

  for (let attempt = 0; ; attempt++) {
    signal?.throwIfAborted()

    try {
      return await fn(attempt)
    } catch (err) {
      const next = steps.next()
      const step = next.done ? null : next.value

      if (step === null) {
        logger.error("retries exhausted", { attempt, err })
        throw err
      }

      logger.warn("attempt failed, retrying", { attempt, delayMs: step.milliseconds, err })
      await sleep(step.milliseconds, signal)
    }
  }
}
