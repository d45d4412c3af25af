import { UInt128 } from "../core/UInt128"
import { FUIDError } from "../errors/FUIDError"

/**
 * Base62 alphabet. Digit value = index.
 *
 * Order is frozen: 0–9, then A–Z, then a–z. This is also ASCII order, so two
 * canonical strings of equal length sort the same way as their values.
 * Changing it changes every FUID string ever issued.
 */
export const BASE62_ALPHABET =
  "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz"

const BASE = 62

/**
 * Longest canonical encoding: 2^128 - 1 needs 22 digits, since
 * 62^21 < 2^128 <= 62^22.
 */
export const MAX_BASE62_LENGTH = 22

/** Character for digit value 0, and the whole encoding of the zero FUID. */
const ZERO_DIGIT = BASE62_ALPHABET[0]

/**
 * Highest char code that can appear in the alphabet. Lookup table bound.
 */
const MAX_ASCII = 127

const VALID_CHARS_DESCRIPTION = "0–9, A–Z and a–z (case-sensitive)"

// ─────────────────────────────────────────────────────────────────────────────
// Base62Encoder
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Canonical Base62 encoder and decoder for 128-bit values.
 *
 * Output:
 *   - most significant digit first
 *   - no padding, no separators, 1–22 characters
 *   - no leading "0" digits, except "0" itself for the zero value
 *
 * Input:
 *   - case-sensitive ("a" is 36, "A" is 10)
 *   - leading "0" digits are accepted and carry no value, so
 *     decode("007") equals decode("7"). They are dropped on re-encode.
 *   - whitespace is not trimmed; it is an invalid character like any other
 */
export class Base62Encoder {
  /**
   * ASCII char code → digit value, -1 for characters outside the alphabet.
   * Built once at class load.
   */
  private static readonly DECODE_LOOKUP: Int8Array = (() => {
    const table = new Int8Array(MAX_ASCII + 1).fill(-1)

    for (let i = 0; i < BASE62_ALPHABET.length; i++) {
      table[BASE62_ALPHABET.charCodeAt(i)] = i
    }

    return table
  })()

  /** Encoding of 2^128 - 1. */
  private static readonly MAX_ENCODED: string = Base62Encoder.encode(UInt128.MAX)

  /**
   * Encodes a 128-bit value.
   *
   * Algorithm: divide by 62 until the quotient is zero, collecting
   * remainders (least significant first), then reverse.
   *
   * Total: never throws for a UInt128.
   */
  static encode(value: UInt128): string {
    if (!(value instanceof UInt128)) {
      throw new TypeError(
        `Base62Encoder.encode: expected a UInt128. Received: ${typeof value}`
      )
    }

    if (value.isZero()) {
      return ZERO_DIGIT
    }

    const digits: string[] = []
    let remaining = value

    while (!remaining.isZero()) {
      const { quotient, remainder } = remaining.divmod(BASE)
      digits.push(BASE62_ALPHABET[remainder])
      remaining = quotient
    }

    return digits.reverse().join("")
  }

  /**
   * Decodes a Base62 string to a 128-bit value.
   *
   * Each character is folded in left to right with mulAdd(62, digit), which
   * rejects the first step that would leave the 128-bit range.
   *
   * @throws {TypeError} input is not a string.
   * @throws {FUIDError} EMPTY_INPUT for "".
   * @throws {FUIDError} INVALID_CHARACTER for the first character outside the alphabet.
   * @throws {FUIDError} OVERFLOW when the value exceeds 2^128 - 1.
   */
  static decode(input: string): UInt128 {
    if (typeof input !== "string") {
      throw new TypeError(
        `Base62Encoder.decode: input must be a string. Received: ${typeof input}`
      )
    }

    if (input.length === 0) {
      throw FUIDError.emptyInput("Base62Encoder.decode")
    }

    let value = UInt128.ZERO

    for (let i = 0; i < input.length; i++) {
      const digit = Base62Encoder.digitAt(input, i)

      try {
        value = value.mulAdd(BASE, digit)
      } catch (err) {
        if (FUIDError.isFUIDError(err, "OVERFLOW")) {
          throw FUIDError.overflow(
            "Base62Encoder.decode",
            `Input "${input}" overflows at position ${i}; ` +
            `canonical FUIDs are at most ${MAX_BASE62_LENGTH} characters.`
          )
        }
        throw err
      }
    }

    return value
  }

  /**
   * Returns true if input decodes and re-encodes to exactly itself, i.e.
   * it is the unique string for its value. Never throws.
   */
  static isCanonical(input: string): boolean {
    if (typeof input !== "string" || input.length === 0 || input.length > MAX_BASE62_LENGTH) {
      return false
    }

    if (input.length > 1 && input[0] === ZERO_DIGIT) {
      return false
    }

    for (let i = 0; i < input.length; i++) {
      if (Base62Encoder.lookup(input.charCodeAt(i)) === -1) {
        return false
      }
    }

    // A 22-character string can still exceed 2^128 - 1. Alphabet order is
    // ASCII order, so for equal lengths string order is numeric order.
    if (input.length === MAX_BASE62_LENGTH) {
      return input <= Base62Encoder.MAX_ENCODED
    }

    return true
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private static lookup(charCode: number): number {
    return charCode > MAX_ASCII ? -1 : Base62Encoder.DECODE_LOOKUP[charCode]
  }

  private static digitAt(input: string, index: number): number {
    const digit = Base62Encoder.lookup(input.charCodeAt(index))

    if (digit === -1) {
      throw FUIDError.invalidCharacter(
        "Base62Encoder.decode",
        input[index],
        index,
        VALID_CHARS_DESCRIPTION
      )
    }

    return digit
  }
}
