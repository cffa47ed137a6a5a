import type { RandomSource } from "../ports/random-source"

/** `Math.random`, seeded once per process by the runtime. */
export const systemRandom: RandomSource = {
  next(): number {
    return Math.random()
  },
}
