import { FUIDValue } from "../core/FUIDValue"
import { FUIDErrorCode } from "../errors/FUIDError"

/**
 * Every representation a FUID can arrive in.
 *
 *   string      → Base62 ("TMXp8QPR6yGvKuV2GZQ10") or UUID text (36 characters with "-")
 *   bigint      → integer value in [0, 2^128 - 1]
 *   Uint8Array  → 16 bytes, big-endian (Buffer included)
 *   ArrayBuffer → 16 bytes, big-endian
 *   FUIDValue   → already parsed
 */
export type FUIDInput = string | bigint | Uint8Array | Buffer | ArrayBuffer | FUIDValue

/**
 * Variant field of the UUID layout, read from the top bits of byte 8.
 *
 *   0xx → NCS (reserved, backward compatibility)
 *   10x → RFC4122 (every generated FUID)
 *   110 → MICROSOFT (reserved, legacy GUIDs)
 *   111 → FUTURE (reserved)
 */
export type UUIDVariant = "NCS" | "RFC4122" | "MICROSOFT" | "FUTURE"

/**
 * Metadata describing a parsed FUID.
 */
export interface FUIDMetadata {
  /**
   * Canonical Base62 form.
   */
  base62: string

  /**
   * Lowercase hyphenated UUID form.
   */
  uuid: string

  /**
   * Integer value.
   */
  bigint: bigint

  /**
   * UUID version nibble (high 4 bits of byte 6). 4 for generated FUIDs.
   */
  version: number

  variant: UUIDVariant

  /**
   * True when version is 4 and variant is RFC4122, i.e. the value has the
   * layout FUIDGenerator produces.
   */
  isRandomUUID: boolean
}

/**
 * All reasons FUIDValidator can reject an input.
 */
export type ValidationFailureReason =
  | FUIDErrorCode
  | "NULL_INPUT"            // input is null or undefined
  | "UNSUPPORTED_TYPE"      // input is not one of the FUIDInput types
  | "INVALID_BINARY_LENGTH" // byte input is not exactly 16 bytes

/**
 * Result of FUIDValidator.validateDetailed().
 */
export type ValidationResult =
  | { valid: true; value: FUIDValue }
  | { valid: false; reason: ValidationFailureReason }
