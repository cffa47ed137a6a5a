/**
 * Source of randomness for jitter.
 *
 * @remarks
 * `next()` MUST return a floating-point number in the range [0, 1).
 * It need not be cryptographically strong.
 */
export interface RandomSource {
  next(): number
}
