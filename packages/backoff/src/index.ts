export { systemRandom } from "./adapters/random"
export {
  type BackoffSettingsJson,
  backoffSettingsSchema,
  MalformedSettingsError,
  type ParseBackoffOptions,
  parseBackoff,
  type SettingsIssue,
} from "./config/parse-backoff"
export { Backoff, type BackoffOptions, createBackoff } from "./core/backoff"
export { computeDelay } from "./core/compute-delay"
export { type BackoffField, ConfigurationError, isConfigurationError } from "./core/errors"
export { proportionalJitter } from "./core/jitter/proportional"
export {
  type BackoffSettings,
  DEFAULT_FACTOR,
  DEFAULT_JITTER,
  DEFAULT_MAX,
  DEFAULT_MIN,
} from "./core/settings"
export type { BackoffStep, Delay, Milliseconds } from "./ports/delay"
export type { JitterStrategy } from "./ports/jitter-strategy"
export type { RandomSource } from "./ports/random-source"
