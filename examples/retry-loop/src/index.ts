export {
  chunkedSleep,
  MAX_TIMER_MS,
  type RetryWithBackoffDeps,
  retryWithBackoff,
  type Sleep,
} from "./retry-with-backoff"
