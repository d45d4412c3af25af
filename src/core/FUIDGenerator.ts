import { RandomSource } from "../crypto/RandomSource"
import { FUIDError } from "../errors/FUIDError"
import { FUIDValue } from "./FUIDValue"
import { UInt128 } from "./UInt128"

/**
 * Bytes requested from the random source per FUID.
 */
const RANDOM_BYTES = UInt128.BYTES

/** Byte 6: high nibble is the version. */
const OFFSET_VERSION = 6

/** Byte 8: top two bits are the variant. */
const OFFSET_VARIANT = 8

/** Keeps the low nibble of byte 6, then ORs in version 4 (0100). */
const VERSION_CLEAR_MASK = 0x0f
const VERSION_4_BITS = 0x40

/** Keeps the low six bits of byte 8, then ORs in variant 10 (RFC 4122). */
const VARIANT_CLEAR_MASK = 0x3f
const VARIANT_RFC4122_BITS = 0x80

/**
 * Random (version 4) FUID generator.
 *
 * Binary layout (16 bytes, RFC 4122 order):
 *
 *   ┌──────────────┬──────────┬──────────────┬──────────┬────────────────┐
 *   │   random     │ ver|rand │   random     │ var|rand │    random      │
 *   │  bytes 0–5   │  byte 6  │   byte 7     │  byte 8  │  bytes 9–15    │
 *   └──────────────┴──────────┴──────────────┴──────────┴────────────────┘
 *     ver = 0100 (high nibble of byte 6), var = 10 (top bits of byte 8)
 *
 * 122 random bits remain, so every generated FUID is also a valid v4 UUID.
 *
 * Stateless: the random source is passed in on each call and never stored,
 * so one generator can serve any number of callers.
 */
export class FUIDGenerator {
  /**
   * Generates a new FUID.
   *
   * The source is called exactly once. Its bytes are copied before the
   * version and variant bits are written, so the source's buffer is never
   * modified.
   *
   * @param randomSource - Capability returning `length` random bytes.
   * @returns A FUIDValue with version 4 and the RFC 4122 variant.
   *
   * @throws {TypeError} randomSource is not a function.
   * @throws {FUIDError} RANDOM_SOURCE_ERROR if the source throws, or returns
   *                     anything other than a 16-byte Uint8Array. There is no
   *                     fallback to another source.
   */
  generate(randomSource: RandomSource): FUIDValue {
    if (typeof randomSource !== "function") {
      throw new TypeError(
        `FUIDGenerator.generate: randomSource must be a function. ` +
        `Received: ${typeof randomSource}`
      )
    }

    const bytes = this.readRandomBytes(randomSource)

    bytes[OFFSET_VERSION] = (bytes[OFFSET_VERSION] & VERSION_CLEAR_MASK) | VERSION_4_BITS
    bytes[OFFSET_VARIANT] = (bytes[OFFSET_VARIANT] & VARIANT_CLEAR_MASK) | VARIANT_RFC4122_BITS

    return FUIDValue.fromBinary(bytes)
  }

  /**
   * Calls the source and returns an owned copy of exactly RANDOM_BYTES bytes.
   */
  private readRandomBytes(randomSource: RandomSource): Uint8Array {
    let output: unknown

    try {
      output = randomSource(RANDOM_BYTES)
    } catch (err) {
      throw FUIDError.randomSource(
        "FUIDGenerator.generate",
        `The source threw while producing ${RANDOM_BYTES} bytes.`,
        err
      )
    }

    if (!(output instanceof Uint8Array)) {
      throw FUIDError.randomSource(
        "FUIDGenerator.generate",
        `Expected a Uint8Array, received ${output === null ? "null" : typeof output}.`
      )
    }

    if (output.length !== RANDOM_BYTES) {
      throw FUIDError.randomSource(
        "FUIDGenerator.generate",
        `Expected ${RANDOM_BYTES} bytes, received ${output.length}.`
      )
    }

    return new Uint8Array(output)
  }
}
