import { FUIDError } from "../errors/FUIDError"

/**
 * Number of bytes in the binary layout.
 */
const BYTE_LENGTH = 16

/** Largest representable value: 2^128 - 1. */
const MAX_VALUE = (1n << 128n) - 1n

const BYTE_MASK = 0xffn
const BITS_PER_BYTE = 8n

// ─────────────────────────────────────────────────────────────────────────────
// UInt128
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Immutable 128-bit unsigned integer.
 *
 * Backed by a native bigint, so every intermediate is exact. bigint itself
 * never wraps or saturates; the 128-bit ceiling is enforced here, on every
 * constructor and on mulAdd(), and reported as a FUIDError instead of being
 * truncated.
 *
 * No floating point is involved anywhere: divmod() and mulAdd() take
 * `number` arguments only for small operands (the Base62 radix and digit)
 * and convert them to bigint before use.
 */
export class UInt128 {
  static readonly BYTES = BYTE_LENGTH

  static readonly ZERO = new UInt128(0n)

  static readonly MAX = new UInt128(MAX_VALUE)

  private constructor(private readonly value: bigint) {}

  // ─── Construction ───────────────────────────────────────────────────────

  /**
   * Reads 16 bytes as a big-endian unsigned integer.
   * Total: every 16-byte input maps to exactly one value.
   *
   * @throws {TypeError}  bytes is not a Uint8Array.
   * @throws {RangeError} bytes is not exactly 16 bytes long.
   */
  static fromBytes(bytes: Uint8Array): UInt128 {
    if (!(bytes instanceof Uint8Array)) {
      throw new TypeError(
        `UInt128.fromBytes: expected a Uint8Array. Received: ${typeof bytes}`
      )
    }

    if (bytes.length !== BYTE_LENGTH) {
      throw new RangeError(
        `UInt128.fromBytes: input must be exactly ${BYTE_LENGTH} bytes. ` +
        `Received ${bytes.length} bytes.`
      )
    }

    let value = 0n
    for (let i = 0; i < BYTE_LENGTH; i++) {
      value = (value << BITS_PER_BYTE) | BigInt(bytes[i])
    }

    return new UInt128(value)
  }

  /**
   * @throws {FUIDError} OUT_OF_RANGE when value is negative or above 2^128 - 1.
   */
  static fromBigInt(value: bigint): UInt128 {
    if (typeof value !== "bigint") {
      throw new TypeError(
        `UInt128.fromBigInt: expected a bigint. Received: ${typeof value}`
      )
    }

    if (value < 0n || value > MAX_VALUE) {
      throw FUIDError.outOfRange("UInt128.fromBigInt", value)
    }

    return new UInt128(value)
  }

  /**
   * Accepts only safe integers; anything above Number.MAX_SAFE_INTEGER has
   * already lost precision before it reaches this method, so pass a bigint.
   *
   * @throws {TypeError} value is not a safe integer.
   * @throws {FUIDError} OUT_OF_RANGE when value is negative.
   */
  static fromNumber(value: number): UInt128 {
    if (!Number.isSafeInteger(value)) {
      throw new TypeError(
        `UInt128.fromNumber: expected a safe integer. Received: ${value}. ` +
        `Use UInt128.fromBigInt() for values above ${Number.MAX_SAFE_INTEGER}.`
      )
    }

    if (value < 0) {
      throw FUIDError.outOfRange("UInt128.fromNumber", value)
    }

    return new UInt128(BigInt(value))
  }

  // ─── Conversion ─────────────────────────────────────────────────────────

  /**
   * Returns a fresh 16-byte big-endian array. Always exactly 16 bytes,
   * including for zero.
   */
  toBytes(): Uint8Array {
    const out = new Uint8Array(BYTE_LENGTH)
    let remaining = this.value

    for (let i = BYTE_LENGTH - 1; i >= 0; i--) {
      out[i] = Number(remaining & BYTE_MASK)
      remaining >>= BITS_PER_BYTE
    }

    return out
  }

  toBigInt(): bigint {
    return this.value
  }

  // ─── Arithmetic ─────────────────────────────────────────────────────────

  /**
   * Divides by a small positive divisor.
   *
   * @param divisor - Positive safe integer (62 for Base62).
   * @returns quotient as a UInt128 and remainder in [0, divisor - 1].
   *
   * @throws {RangeError} divisor is not a positive safe integer.
   */
  divmod(divisor: number): { quotient: UInt128; remainder: number } {
    if (!Number.isSafeInteger(divisor) || divisor <= 0) {
      throw new RangeError(
        `UInt128.divmod: divisor must be a positive safe integer. Received: ${divisor}`
      )
    }

    const d = BigInt(divisor)

    return {
      quotient: new UInt128(this.value / d),
      remainder: Number(this.value % d),
    }
  }

  /**
   * Computes `this * multiplier + addend`.
   *
   * @throws {RangeError} multiplier or addend is not a non-negative safe integer.
   * @throws {FUIDError}  OVERFLOW when the result does not fit in 128 bits.
   */
  mulAdd(multiplier: number, addend: number): UInt128 {
    if (!Number.isSafeInteger(multiplier) || multiplier < 0) {
      throw new RangeError(
        `UInt128.mulAdd: multiplier must be a non-negative safe integer. Received: ${multiplier}`
      )
    }

    if (!Number.isSafeInteger(addend) || addend < 0) {
      throw new RangeError(
        `UInt128.mulAdd: addend must be a non-negative safe integer. Received: ${addend}`
      )
    }

    const result = this.value * BigInt(multiplier) + BigInt(addend)

    if (result > MAX_VALUE) {
      throw FUIDError.overflow(
        "UInt128.mulAdd",
        `${this.value} * ${multiplier} + ${addend} does not fit.`
      )
    }

    return new UInt128(result)
  }

  // ─── Comparison ─────────────────────────────────────────────────────────

  isZero(): boolean {
    return this.value === 0n
  }

  equals(other: UInt128): boolean {
    return this.value === other.value
  }

  compare(other: UInt128): -1 | 0 | 1 {
    if (this.value < other.value) return -1
    if (this.value > other.value) return 1
    return 0
  }
}
