import { createNullLogger, type Logger } from "@pacer/logger"
import { systemRandom } from "../adapters/random"
import type { BackoffStep, Delay } from "../ports/delay"
import type { RandomSource } from "../ports/random-source"
import { assertAttempt, computeDelay } from "./compute-delay"
import { type BackoffSettings, resolveSettings, type SettingsInput } from "./settings"

export type BackoffDeps = {
  random: RandomSource
  logger: Logger
}

export type BackoffOptions = Omit<SettingsInput, "retries"> & Partial<BackoffDeps>

/**
 * Immutable exponential backoff configuration that iterates as a finite
 * sequence of delays ending in `null`.
 *
 * @example
 * ```ts
 * const backoff = createBackoff(5).range({ milliseconds: 50 }, { milliseconds: 2_000 }).jitter(0.2)
 *
 * for (const step of backoff) {
 *   try {
 *     return await send()
 *   } catch (err) {
 *     if (step === null) throw err
 *     await sleep(step.milliseconds)
 *   }
 * }
 * ```
 */
export class Backoff implements Iterable<BackoffStep> {
  readonly settings: BackoffSettings
  private readonly deps: BackoffDeps

  /** @throws {ConfigurationError} when any setting is invalid */
  constructor(settings: SettingsInput, deps: Partial<BackoffDeps> = {}) {
    this.settings = resolveSettings(settings)
    this.deps = {
      random: deps.random ?? systemRandom,
      logger: deps.logger ?? createNullLogger(),
    }
  }

  range(min: Delay, max: Delay): Backoff {
    return this.with({ min, max })
  }

  factor(factor: number): Backoff {
    return this.with({ factor })
  }

  jitter(jitter: number): Backoff {
    return this.with({ jitter })
  }

  nthDelay(attempt: number): BackoffStep {
    const { retries } = this.settings
    const step = computeDelay(this.settings, attempt, this.deps.random)

    if (step === null) {
      this.deps.logger.debug("backoff exhausted", { attempt, retries })
    } else {
      this.deps.logger.debug("backoff delay computed", {
        attempt,
        retries,
        delayMs: step.milliseconds,
      })
    }

    return step
  }

  /**
   * Lazily yields the elements from index `from` on. Every call starts a new,
   * independently jittered sequence.
   */
  iter(from: number = 0): IterableIterator<BackoffStep> {
    assertAttempt("from", from)

    return this.steps(from)
  }

  [Symbol.iterator](): IterableIterator<BackoffStep> {
    return this.iter()
  }

  toJSON(): BackoffSettings {
    return this.settings
  }

  private *steps(from: number): Generator<BackoffStep, void, undefined> {
    for (let attempt = from; attempt < this.settings.retries; attempt++) {
      yield this.nthDelay(attempt)
    }
  }

  private with(patch: Partial<Omit<SettingsInput, "retries">>): Backoff {
    return new Backoff({ ...this.settings, ...patch }, this.deps)
  }
}

/**
 * @param retries - Number of elements in the sequence, including the final `null`.
 * @throws {ConfigurationError} when any setting is invalid
 */
export function createBackoff(retries: number, options: BackoffOptions = {}): Backoff {
  const { random, logger, ...settings } = options

  return new Backoff(
    { ...settings, retries },
    {
      ...(random && { random }),
      logger: (logger ?? createNullLogger()).child({ module: "backoff" }),
    },
  )
}
