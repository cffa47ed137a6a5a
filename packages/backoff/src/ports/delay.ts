export type Milliseconds = number

export type Delay = { milliseconds: Milliseconds }

/**
 * One element of a backoff sequence: how long to wait before the next
 * attempt, or `null` once retries are exhausted.
 */
export type BackoffStep = Delay | null
