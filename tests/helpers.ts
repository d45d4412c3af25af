import { RandomSource } from "../src/crypto/RandomSource"

/**
 * Runs fn and returns what it threw. Fails the test if it returned normally.
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error("expected function to throw")
}

/**
 * Deterministic source that returns `fill` for every byte.
 */
export function fixedSource(fill: number): RandomSource {
  return (length) => new Uint8Array(length).fill(fill)
}

/**
 * Deterministic source that returns the bytes 0, 1, 2, … starting at `start`,
 * continuing from where the previous call stopped.
 */
export function countingSource(start = 0): RandomSource {
  let next = start
  return (length) => Uint8Array.from({ length }, () => next++ & 0xff)
}

/**
 * Calls fn with arguments its signature would reject, to exercise runtime
 * type guards on the public API.
 */
export function callUntyped(fn: (...args: never[]) => unknown, ...args: unknown[]): unknown {
  return Reflect.apply(fn, undefined, args)
}
