import { FUIDError } from "../errors/FUIDError"
import { ByteUtils } from "../utils/ByteUtils"

/** Bytes in a UUID. */
const UUID_BYTES = 16

/** Characters in the hyphenated text form: 32 hex digits + 4 hyphens. */
export const UUID_STRING_LENGTH = 36

/**
 * String indexes that must hold "-" in the 8-4-4-4-12 layout.
 *
 *   xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx
 *           ^    ^    ^    ^
 *           8    13   18   23
 */
const HYPHEN_POSITIONS: ReadonlySet<number> = new Set([8, 13, 18, 23])

const HYPHEN = "-"

const MAX_ASCII = 127

const VALID_CHARS_DESCRIPTION = "hexadecimal digits 0–9, a–f and A–F"

// ─────────────────────────────────────────────────────────────────────────────
// UUIDFormatter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Converts between 16 UUID bytes and the canonical hyphenated hex text.
 *
 * Byte order is the RFC 4122 order: text digit pairs map left to right onto
 * bytes 0–15, which is also the big-endian order of the 128-bit value.
 *
 * Output is always lowercase. Input accepts either case, but only the bare
 * 36-character form: no braces, no "urn:uuid:" prefix, no 32-digit form.
 */
export class UUIDFormatter {
  /**
   * ASCII char code → nibble value, -1 for non-hex characters.
   */
  private static readonly HEX_LOOKUP: Int8Array = (() => {
    const table = new Int8Array(MAX_ASCII + 1).fill(-1)
    const digits = "0123456789abcdef"

    for (let i = 0; i < digits.length; i++) {
      table[digits.charCodeAt(i)] = i
      table[digits.toUpperCase().charCodeAt(i)] = i
    }

    return table
  })()

  /**
   * @throws {TypeError}  bytes is not a Uint8Array.
   * @throws {RangeError} bytes is not exactly 16 bytes.
   */
  static format(bytes: Uint8Array): string {
    if (!(bytes instanceof Uint8Array)) {
      throw new TypeError(
        `UUIDFormatter.format: input must be a Uint8Array. Received: ${typeof bytes}`
      )
    }

    if (bytes.length !== UUID_BYTES) {
      throw new RangeError(
        `UUIDFormatter.format: input must be exactly ${UUID_BYTES} bytes. ` +
        `Received ${bytes.length} bytes.`
      )
    }

    const hex = ByteUtils.toHex(bytes)

    return (
      `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-` +
      `${hex.slice(16, 20)}-${hex.slice(20, 32)}`
    )
  }

  /**
   * Parses "xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx" into 16 bytes.
   *
   * Structure is checked before content, so a string that is both
   * misshapen and contains bad characters reports INVALID_FORMAT.
   *
   * @throws {TypeError} input is not a string.
   * @throws {FUIDError} INVALID_FORMAT when the length is not 36 or a hyphen
   *                     is missing, misplaced or extra.
   * @throws {FUIDError} INVALID_CHARACTER when a digit position holds a non-hex character.
   */
  static parse(input: string): Uint8Array {
    if (typeof input !== "string") {
      throw new TypeError(
        `UUIDFormatter.parse: input must be a string. Received: ${typeof input}`
      )
    }

    if (input.length !== UUID_STRING_LENGTH) {
      throw FUIDError.invalidFormat(
        "UUIDFormatter.parse",
        `Received ${input.length} characters, expected ${UUID_STRING_LENGTH}.`
      )
    }

    for (let i = 0; i < input.length; i++) {
      const isHyphen = input[i] === HYPHEN

      if (HYPHEN_POSITIONS.has(i) !== isHyphen) {
        throw FUIDError.invalidFormat(
          "UUIDFormatter.parse",
          isHyphen
            ? `Unexpected "-" at position ${i}.`
            : `Expected "-" at position ${i}, found "${input[i]}".`
        )
      }
    }

    const out = new Uint8Array(UUID_BYTES)
    let nibbleIndex = 0

    for (let i = 0; i < input.length; i++) {
      if (HYPHEN_POSITIONS.has(i)) {
        continue
      }

      const charCode = input.charCodeAt(i)
      const nibble = charCode > MAX_ASCII ? -1 : UUIDFormatter.HEX_LOOKUP[charCode]

      if (nibble === -1) {
        throw FUIDError.invalidCharacter(
          "UUIDFormatter.parse",
          input[i],
          i,
          VALID_CHARS_DESCRIPTION
        )
      }

      const byteIndex = nibbleIndex >> 1
      out[byteIndex] = (nibbleIndex & 1) === 0 ? nibble << 4 : out[byteIndex] | nibble
      nibbleIndex++
    }

    return out
  }
}
