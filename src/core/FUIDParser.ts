import { UUID_STRING_LENGTH } from "../encoding/UUIDFormatter"
import { FUIDInput, FUIDMetadata } from "../types"
import { FUIDValue } from "./FUIDValue"
import { UInt128 } from "./UInt128"

/** Marks a 36-character string as UUID text; "-" is not in the Base62 alphabet. */
const UUID_SEPARATOR = "-"

// ─────────────────────────────────────────────────────────────────────────────
// FUIDParser
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Turns any accepted FUID representation into a FUIDValue, and describes it.
 *
 * String routing:
 *   A 36-character string containing "-" is parsed as UUID text, anything
 *   else as Base62. No valid Base62 string contains "-", so the two never
 *   overlap, and a stray "-" in a short id is reported as INVALID_CHARACTER
 *   at its position.
 *
 * Accepted input types:
 *   - string      → Base62 ("TMXp8QPR6yGvKuV2GZQ10") or UUID text
 *   - bigint      → integer value
 *   - Uint8Array  → 16 big-endian bytes (Buffer included)
 *   - ArrayBuffer → 16 big-endian bytes
 *   - FUIDValue   → returned as-is
 */
export class FUIDParser {
  /**
   * Parses a FUID into its metadata.
   *
   * @returns Frozen FUIDMetadata with base62, uuid, bigint, version, variant, isRandomUUID.
   *
   * @throws {TypeError}  Input is null, undefined, or an unsupported type.
   * @throws {RangeError} Byte input is not exactly 16 bytes.
   * @throws {FUIDError}  The string is not valid Base62 / UUID text, or the
   *                      bigint is out of range.
   *
   * @example
   * ```ts
   * const meta = FUIDParser.parse("0f8fad5b-d9cb-469f-a165-70867728950e")
   * meta.base62       // "TMXp8QPR6yGvKuV2GZQ10"
   * meta.version      // 4
   * meta.isRandomUUID // true
   * ```
   */
  static parse(input: FUIDInput): FUIDMetadata {
    const value = FUIDParser.toValue(input)
    const version = value.version
    const variant = value.variant

    return Object.freeze({
      base62: value.toString(),
      uuid: value.toUUIDString(),
      bigint: value.toBigInt(),
      version,
      variant,
      isRandomUUID: version === 4 && variant === "RFC4122",
    })
  }

  /**
   * Normalizes any accepted representation to a FUIDValue.
   *
   * Throws descriptive errors for every invalid input. For a non-throwing
   * check use FUIDValidator.
   *
   * @throws {TypeError}  Input is null, undefined, or an unsupported type.
   * @throws {RangeError} Byte input is not exactly 16 bytes.
   * @throws {FUIDError}  Malformed string or out-of-range bigint.
   */
  static toValue(input: FUIDInput): FUIDValue {
    // ── null / undefined ────────────────────────────────────────────────────
    if (input === null || input === undefined) {
      throw new TypeError(
        `FUIDParser: input is required. ` +
        `Received: ${input === null ? "null" : "undefined"}`
      )
    }

    if (input instanceof FUIDValue) {
      return input
    }

    // ── string ───────────────────────────────────────────────────────────────
    if (typeof input === "string") {
      return FUIDParser.looksLikeUUID(input)
        ? FUIDValue.fromUUIDString(input)
        : FUIDValue.fromString(input)
    }

    // ── bigint ───────────────────────────────────────────────────────────────
    if (typeof input === "bigint") {
      return FUIDValue.fromBigInt(input)
    }

    // ── Uint8Array / Buffer ──────────────────────────────────────────────────
    if (input instanceof Uint8Array) {
      return FUIDParser.fromBytes(input)
    }

    // ── ArrayBuffer ──────────────────────────────────────────────────────────
    if (input instanceof ArrayBuffer) {
      return FUIDParser.fromBytes(new Uint8Array(input))
    }

    // ── Unsupported ──────────────────────────────────────────────────────────
    throw new TypeError(
      `FUIDParser: unsupported input type "${typeof input}". ` +
      `Accepted: string, bigint, Uint8Array, Buffer, ArrayBuffer, FUIDValue.`
    )
  }

  private static looksLikeUUID(input: string): boolean {
    return input.length === UUID_STRING_LENGTH && input.includes(UUID_SEPARATOR)
  }

  private static fromBytes(bytes: Uint8Array): FUIDValue {
    if (bytes.length !== UInt128.BYTES) {
      throw new RangeError(
        `FUIDParser: binary must be exactly ${UInt128.BYTES} bytes. ` +
        `Received ${bytes.length} bytes.`
      )
    }

    return FUIDValue.fromBinary(bytes)
  }
}
