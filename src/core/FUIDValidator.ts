import { FUIDError } from "../errors/FUIDError"
import { FUIDInput, ValidationResult } from "../types"
import { FUIDParser } from "./FUIDParser"
import { FUIDValue } from "./FUIDValue"

export interface ValidateOptions {
  /**
   * Also require version 4 and the RFC 4122 variant, i.e. a value this
   * library could have generated. Defaults to false.
   */
  requireRandom?: boolean
}

/**
 * Non-throwing validation for FUIDs from untrusted input.
 *
 * Every bad identifier maps to a typed reason instead of an exception, so a
 * request handler can reject it with a single branch. Errors that are not
 * about the identifier itself (a bug elsewhere) are rethrown.
 */
export class FUIDValidator {
  /**
   * @returns true if input parses (and meets options); false otherwise.
   *
   * @example
   * ```ts
   * if (!FUIDValidator.validate(req.params.id)) return res.status(400).send()
   * ```
   */
  static validate(input: FUIDInput, options?: ValidateOptions): boolean {
    return FUIDValidator.validateDetailed(input, options).valid
  }

  /**
   * Validates and returns the parsed value or the failure reason.
   *
   * @example
   * ```ts
   * const result = FUIDValidator.validateDetailed(input, { requireRandom: true })
   * if (!result.valid) {
   *   console.warn("FUID rejected", { reason: result.reason })
   *   return res.status(400).json({ error: "Invalid ID" })
   * }
   * const id = result.value
   * ```
   */
  static validateDetailed(input: FUIDInput, options?: ValidateOptions): ValidationResult {
    if (input === null || input === undefined) {
      return { valid: false, reason: "NULL_INPUT" }
    }

    let value: FUIDValue
    try {
      value = FUIDParser.toValue(input)
    } catch (err) {
      if (err instanceof FUIDError) {
        return { valid: false, reason: err.code }
      }
      if (err instanceof RangeError) {
        return { valid: false, reason: "INVALID_BINARY_LENGTH" }
      }
      if (err instanceof TypeError) {
        return { valid: false, reason: "UNSUPPORTED_TYPE" }
      }
      throw err
    }

    if (options?.requireRandom === true && (value.version !== 4 || value.variant !== "RFC4122")) {
      return { valid: false, reason: "NOT_RANDOM_UUID" }
    }

    return { valid: true, value }
  }
}
