import {
  RandomSource,
  RandomSourceKind,
  RandomSourceResolution,
  RandomSourceResolver,
} from "../crypto/RandomSource"
import { FUIDError } from "../errors/FUIDError"
import { FUIDInput, FUIDMetadata, ValidationResult } from "../types"
import { FUIDGenerator } from "./FUIDGenerator"
import { FUIDParser } from "./FUIDParser"
import { FUIDValidator } from "./FUIDValidator"
import { FUIDValue } from "./FUIDValue"

/**
 * Input shape for FUID.initialize().
 *
 * randomSource (optional):
 *   A function `(length) => Uint8Array`, or the name of a built-in source
 *   ("node" | "webcrypto"). If omitted, FUID_RANDOM_SOURCE is read from the
 *   environment, then "node" is used.
 *
 * requireRandom (optional):
 *   Default for validate(), validateDetailed() and parse(): when true, only
 *   version-4 / RFC 4122 values are accepted. Defaults to false, so any
 *   UUID round-trips.
 */
export interface FUIDInitOptions {
  randomSource?: RandomSource | RandomSourceKind
  requireRandom?: boolean
}

/**
 * Per-call override of the instance's requireRandom default.
 */
export interface FUIDCheckOptions {
  requireRandom?: boolean
}

/**
 * FUID: Friendly Universal Identifier engine.
 *
 * The single public entry point for generating, parsing and validating FUIDs.
 * Create one instance per application (or per random source) and reuse it;
 * it holds no mutable state.
 *
 * Usage:
 * const fuid = FUID.initialize()
 *
 * const id   = fuid.generate()
 * id.toString()      // e.g. "TMXp8QPR6yGvKuV2GZQ10"
 * id.toUUIDString()  // e.g. "0f8fad5b-d9cb-469f-a165-70867728950e"
 *
 * const same = fuid.parse(id.toUUIDString())
 */
export class FUID {
  private readonly randomSource: RandomSource
  private readonly resolution: RandomSourceResolution
  private readonly requireRandom: boolean
  private readonly generator: FUIDGenerator

  private constructor(options: FUIDInitOptions) {
    FUID.validateOptions(options)

    this.resolution = RandomSourceResolver.resolve(options.randomSource)

    if (this.resolution.warning) {
      console.warn(this.resolution.warning)
    }

    this.randomSource = this.resolution.source
    this.requireRandom = options.requireRandom === true
    this.generator = new FUIDGenerator()
  }

  /**
   * Creates and returns a configured FUID engine.
   *
   * @throws {TypeError}  options is not a plain object, or a field has the wrong type.
   * @throws {RangeError} randomSource names no built-in source.
   *
   * @example
   * ```ts
   * const fuid = FUID.initialize({ randomSource: "webcrypto" })
   * ```
   */
  static initialize(options: FUIDInitOptions = {}): FUID {
    return new FUID(options)
  }

  /**
   * Generates a new random FUID.
   *
   * The result is also a valid version-4 UUID: version nibble 4, variant
   * bits 10, 122 random bits.
   *
   * @throws {FUIDError} RANDOM_SOURCE_ERROR if the random source fails.
   *                     Not retried; retrying is the caller's decision.
   */
  generate(): FUIDValue {
    return this.generator.generate(this.randomSource)
  }

  /**
   * Parses any accepted representation into a FUIDValue.
   *
   * @throws {TypeError}  Unsupported input type.
   * @throws {RangeError} Byte input is not 16 bytes.
   * @throws {FUIDError}  Malformed string or out-of-range bigint, or
   *                      NOT_RANDOM_UUID when requireRandom is in effect and
   *                      the value is not version 4 / RFC 4122.
   */
  parse(input: FUIDInput, options?: FUIDCheckOptions): FUIDValue {
    const value = FUIDParser.toValue(input)

    if (this.shouldRequireRandom(options) && !FUID.isRandomLayout(value)) {
      throw FUIDError.notRandomUUID("FUID.parse", value.toString(), value.version, value.variant)
    }

    return value
  }

  /**
   * Parses and describes a FUID. See FUIDParser.parse().
   */
  inspect(input: FUIDInput): FUIDMetadata {
    return FUIDParser.parse(input)
  }

  /**
   * @returns true if input is a valid FUID under this instance's rules.
   */
  validate(input: FUIDInput, options?: FUIDCheckOptions): boolean {
    return this.validateDetailed(input, options).valid
  }

  /**
   * Validates and returns the parsed value or a typed failure reason.
   * Never throws for bad identifiers.
   */
  validateDetailed(input: FUIDInput, options?: FUIDCheckOptions): ValidationResult {
    return FUIDValidator.validateDetailed(input, {
      requireRandom: this.shouldRequireRandom(options),
    })
  }

  // ─── Diagnostics ─────────────────────────────────────────────────────────

  /**
   * Which random source this instance uses: "node", "webcrypto" or "custom".
   *
   * @example
   * ```ts
   * console.info("FUID engine initialized", { randomSource: fuid.getRandomSourceKind() })
   * ```
   */
  getRandomSourceKind(): RandomSourceResolution["kind"] {
    return this.resolution.kind
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private shouldRequireRandom(options?: FUIDCheckOptions): boolean {
    return options?.requireRandom ?? this.requireRandom
  }

  private static isRandomLayout(value: FUIDValue): boolean {
    return value.version === 4 && value.variant === "RFC4122"
  }

  /**
   * Validates all options fields at initialization time, before any
   * resolution or logging happens.
   *
   * @throws {TypeError} Wrong-typed options or fields.
   */
  private static validateOptions(options: FUIDInitOptions): void {
    if (options === null || typeof options !== "object" || Array.isArray(options)) {
      throw new TypeError(
        `FUID.initialize: options must be a plain object. ` +
        `Received: ${options === null ? "null" : Array.isArray(options) ? "array" : typeof options}`
      )
    }

    if (
      options.randomSource !== undefined &&
      typeof options.randomSource !== "function" &&
      typeof options.randomSource !== "string"
    ) {
      throw new TypeError(
        `FUID.initialize: options.randomSource must be a function or one of "node", "webcrypto". ` +
        `Received: ${typeof options.randomSource}`
      )
    }

    if (options.requireRandom !== undefined && typeof options.requireRandom !== "boolean") {
      throw new TypeError(
        `FUID.initialize: options.requireRandom must be a boolean. ` +
        `Received: ${typeof options.requireRandom}`
      )
    }
  }
}
