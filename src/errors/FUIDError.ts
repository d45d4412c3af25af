/**
 * Every way a FUID conversion or generation can fail at runtime.
 *
 * Programming mistakes (passing a number where a string is expected, a
 * 15-byte buffer, bad initialize() options) are not listed here. Those throw
 * plain TypeError / RangeError.
 */
export type FUIDErrorCode =
  | "INVALID_CHARACTER"   // character outside the Base62 alphabet or a non-hex UUID digit
  | "EMPTY_INPUT"         // Base62 decode called on ""
  | "OVERFLOW"            // decoded value does not fit in 128 bits
  | "OUT_OF_RANGE"        // integer source is negative or above 2^128 - 1
  | "INVALID_FORMAT"      // UUID text is not 8-4-4-4-12
  | "RANDOM_SOURCE_ERROR" // entropy acquisition failed
  | "NOT_RANDOM_UUID"     // requireRandom was set and version/variant do not match

/**
 * Error thrown for malformed input, arithmetic overflow, random source
 * failures, and values rejected by a requireRandom check.
 *
 * Switch on `code` rather than on the message; messages are for humans and
 * may change.
 *
 * @example
 * ```ts
 * try {
 *   FUIDValue.fromString(req.params.id)
 * } catch (err) {
 *   if (err instanceof FUIDError && err.code === "INVALID_CHARACTER") {
 *     return res.status(400).json({ error: "Invalid ID" })
 *   }
 *   throw err
 * }
 * ```
 */
export class FUIDError extends Error {
  readonly code: FUIDErrorCode

  /** Offending character, set for INVALID_CHARACTER. */
  readonly character?: string

  /** 0-based index of the offending character, set for INVALID_CHARACTER. */
  readonly position?: number

  private constructor(
    code: FUIDErrorCode,
    message: string,
    details: { character?: string; position?: number; cause?: unknown } = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause })
    this.name = "FUIDError"
    this.code = code
    this.character = details.character
    this.position = details.position
  }

  static invalidCharacter(
    source: string,
    character: string,
    position: number,
    expected: string
  ): FUIDError {
    return new FUIDError(
      "INVALID_CHARACTER",
      `${source}: invalid character at position ${position}: "${character}". ` +
      `Valid characters are ${expected}.`,
      { character, position }
    )
  }

  static emptyInput(source: string): FUIDError {
    return new FUIDError(
      "EMPTY_INPUT",
      `${source}: input must not be empty. The zero FUID encodes as "0".`
    )
  }

  static overflow(source: string, detail: string): FUIDError {
    return new FUIDError(
      "OVERFLOW",
      `${source}: value exceeds the 128-bit range (max 2^128 - 1). ${detail}`
    )
  }

  static outOfRange(source: string, received: bigint | number): FUIDError {
    return new FUIDError(
      "OUT_OF_RANGE",
      `${source}: value must be between 0 and 2^128 - 1. Received: ${received}`
    )
  }

  static invalidFormat(source: string, detail: string): FUIDError {
    return new FUIDError(
      "INVALID_FORMAT",
      `${source}: expected a UUID in 8-4-4-4-12 hex form ` +
      `(e.g. "0f8fad5b-d9cb-469f-a165-70867728950e"). ${detail}`
    )
  }

  static randomSource(source: string, detail: string, cause?: unknown): FUIDError {
    const causeMessage =
      cause === undefined
        ? ""
        : ` Cause: ${cause instanceof Error ? cause.message : String(cause)}`

    return new FUIDError(
      "RANDOM_SOURCE_ERROR",
      `${source}: random source failed. ${detail}${causeMessage}`,
      { cause }
    )
  }

  static notRandomUUID(
    source: string,
    base62: string,
    version: number,
    variant: string
  ): FUIDError {
    return new FUIDError(
      "NOT_RANDOM_UUID",
      `${source}: "${base62}" is not a version-4 RFC 4122 identifier ` +
      `(version ${version}, variant ${variant}). ` +
      `Pass { requireRandom: false } to accept any UUID.`
    )
  }

  /**
   * Type guard that also narrows on a specific code.
   */
  static isFUIDError(value: unknown, code?: FUIDErrorCode): value is FUIDError {
    return value instanceof FUIDError && (code === undefined || value.code === code)
  }
}
