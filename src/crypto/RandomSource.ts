import crypto from "crypto"

/**
 * Synchronous source of random bytes.
 *
 * Must return a Uint8Array of exactly `length` bytes, or throw. FUIDGenerator
 * treats any other outcome as a RANDOM_SOURCE_ERROR.
 *
 * Inject a fixed-sequence source in tests:
 *   const source: RandomSource = (length) => new Uint8Array(length).fill(0xab)
 */
export type RandomSource = (length: number) => Uint8Array

/** Names of the built-in sources. */
export type RandomSourceKind = "node" | "webcrypto"

/**
 * Environment variable consulted when no source is configured explicitly.
 */
export const RANDOM_SOURCE_ENV = "FUID_RANDOM_SOURCE"

/** Node's CSPRNG via crypto.randomFillSync(). */
export const nodeRandomSource: RandomSource = (length) => {
  return crypto.randomFillSync(new Uint8Array(length))
}

/** Web Crypto CSPRNG via crypto.webcrypto.getRandomValues(). */
export const webCryptoRandomSource: RandomSource = (length) => {
  return crypto.webcrypto.getRandomValues(new Uint8Array(length))
}

const BUILT_IN_SOURCES: Readonly<Record<RandomSourceKind, RandomSource>> = {
  node: nodeRandomSource,
  webcrypto: webCryptoRandomSource,
}

export interface RandomSourceResolution {
  /** The capability passed to FUIDGenerator.generate(). */
  source: RandomSource
  /** Where the source came from, for startup diagnostics. */
  origin: "explicit_function" | "explicit_kind" | "env" | "default"
  /** Built-in kind, or "custom" for a caller-supplied function. */
  kind: RandomSourceKind | "custom"
  /** Set when the environment named an unknown source. Caller should log it. */
  warning?: string
}

/**
 * Resolves the random source in priority order:
 *
 *   1. Explicit function:  caller-owned capability, used as-is
 *   2. Explicit kind name: "node" or "webcrypto"
 *   3. FUID_RANDOM_SOURCE: same names, read from the environment
 *   4. Default:            "node"
 *
 * An unknown kind passed in code is a configuration mistake and throws.
 * An unknown environment value falls back to "node" (both built-ins are
 * CSPRNGs) and reports a warning for the caller to log.
 */
export class RandomSourceResolver {
  /**
   * @throws {RangeError} explicit is a string that names no built-in source.
   * @throws {TypeError}  explicit is neither a function nor a string.
   */
  static resolve(explicit?: RandomSource | RandomSourceKind): RandomSourceResolution {
    if (typeof explicit === "function") {
      return { source: explicit, origin: "explicit_function", kind: "custom" }
    }

    if (typeof explicit === "string") {
      if (!RandomSourceResolver.isKind(explicit)) {
        throw new RangeError(
          `FUID: unknown randomSource "${explicit}". ` +
          `Expected one of: ${Object.keys(BUILT_IN_SOURCES).join(", ")}, or a function.`
        )
      }
      return { source: BUILT_IN_SOURCES[explicit], origin: "explicit_kind", kind: explicit }
    }

    if (explicit !== undefined) {
      throw new TypeError(
        `FUID: randomSource must be a function or a source name. Received: ${typeof explicit}`
      )
    }

    const fromEnv = process.env[RANDOM_SOURCE_ENV]?.trim()

    if (fromEnv) {
      if (RandomSourceResolver.isKind(fromEnv)) {
        return { source: BUILT_IN_SOURCES[fromEnv], origin: "env", kind: fromEnv }
      }

      return {
        source: nodeRandomSource,
        origin: "default",
        kind: "node",
        warning:
          `[FUID] WARNING: ${RANDOM_SOURCE_ENV}="${fromEnv}" is not a known random source. ` +
          `Using "node". Valid values: ${Object.keys(BUILT_IN_SOURCES).join(", ")}.`,
      }
    }

    return { source: nodeRandomSource, origin: "default", kind: "node" }
  }

  static isKind(value: string): value is RandomSourceKind {
    return Object.prototype.hasOwnProperty.call(BUILT_IN_SOURCES, value)
  }
}
