import { exponential } from "../exponential"

const ceiling = { milliseconds: 10_000 }

describe("exponential", () => {
  it("returns base on attempt 0", () => {
    const policy = exponential({ base: { milliseconds: 100 }, ceiling })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 100 })
  })

  it("doubles by default", () => {
    const policy = exponential({ base: { milliseconds: 100 }, ceiling })

    expect(policy.getDelay(1)).toEqual({ milliseconds: 200 })
    expect(policy.getDelay(2)).toEqual({ milliseconds: 400 })
    expect(policy.getDelay(3)).toEqual({ milliseconds: 800 })
  })

  it("uses a custom factor", () => {
    const policy = exponential({ base: { milliseconds: 100 }, ceiling, factor: 3 })

    expect(policy.getDelay(1)).toEqual({ milliseconds: 300 })
    expect(policy.getDelay(2)).toEqual({ milliseconds: 900 })
  })

  it("handles a fractional factor", () => {
    const policy = exponential({ base: { milliseconds: 100 }, ceiling, factor: 1.5 })

    expect(policy.getDelay(1)).toEqual({ milliseconds: 150 })
    expect(policy.getDelay(2)).toEqual({ milliseconds: 225 })
  })

  it("stays at base for factor 1", () => {
    const policy = exponential({ base: { milliseconds: 100 }, ceiling, factor: 1 })

    expect(policy.getDelay(7)).toEqual({ milliseconds: 100 })
  })

  it("holds a shrinking factor at base", () => {
    const policy = exponential({ base: { milliseconds: 100 }, ceiling, factor: 0.5 })

    expect(policy.getDelay(3)).toEqual({ milliseconds: 100 })
  })

  it("caps at the ceiling", () => {
    const policy = exponential({ base: { milliseconds: 100 }, ceiling })

    expect(policy.getDelay(7)).toEqual({ milliseconds: 10_000 })
    expect(policy.getDelay(10)).toEqual({ milliseconds: 10_000 })
  })

  it("saturates instead of overflowing", () => {
    const policy = exponential({ base: { milliseconds: 100 }, ceiling })

    expect(policy.getDelay(5_000)).toEqual({ milliseconds: 10_000 })
  })

  it("keeps a zero base at zero", () => {
    const policy = exponential({ base: { milliseconds: 0 }, ceiling })

    expect(policy.getDelay(5_000)).toEqual({ milliseconds: 0 })
  })
})
