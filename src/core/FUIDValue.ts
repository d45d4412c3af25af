import { inspect } from "util"
import { Base62Encoder } from "../encoding/Base62Encoder"
import { UUIDFormatter } from "../encoding/UUIDFormatter"
import { UUIDVariant } from "../types"
import { UInt128 } from "./UInt128"

/** Byte holding the version nibble (high 4 bits). */
const OFFSET_VERSION = 6

/** Byte holding the variant bits (top 1–3 bits). */
const OFFSET_VARIANT = 8

/**
 * Immutable FUID value object.
 *
 * Responsibilities:
 *   - Holds one 128-bit value
 *   - Renders it as Base62 via toString(), as UUID text via toUUIDString(),
 *     as 16 big-endian bytes via toBinary()
 *   - Supports value equality and ordering by integer value
 *   - Serializes to its Base62 string in JSON
 *
 * Immutability:
 *   - The value is an immutable UInt128
 *   - toBinary() returns a fresh array every call
 *   - The instance is frozen after construction
 *
 * The Base62 string is computed once in the constructor, since nearly every
 * FUID ends up rendered.
 */
export class FUIDValue {
  /** The nil UUID, 00000000-0000-0000-0000-000000000000, Base62 "0". */
  static readonly NIL = new FUIDValue(UInt128.ZERO)

  /** ffffffff-ffff-ffff-ffff-ffffffffffff, Base62 "7n42DGM5Tflk9n8mt7Fhc7". */
  static readonly MAX = new FUIDValue(UInt128.MAX)

  private readonly value: UInt128

  private readonly base62: string

  // ─── Constructor ────────────────────────────────────────────────────────

  /**
   * Prefer the static factories; they validate their input format.
   *
   * @throws {TypeError} If value is not a UInt128.
   */
  constructor(value: UInt128) {
    if (!(value instanceof UInt128)) {
      throw new TypeError(
        `FUIDValue: constructor requires a UInt128. Received: ${value === null ? "null" : typeof value}`
      )
    }

    this.value = value
    this.base62 = Base62Encoder.encode(value)
    Object.freeze(this)
  }

  // ─── Views ──────────────────────────────────────────────────────────────

  /**
   * Canonical Base62 form: 1–22 characters of 0–9A–Za–z, no leading zeros.
   *
   * Use cases: URLs, APIs, logs, anything a human might type.
   */
  toString(): string {
    return this.base62
  }

  /**
   * Lowercase 8-4-4-4-12 UUID text. Bit-identical to the binary form, so any
   * UUID-typed column or API receives the same 128 bits.
   */
  toUUIDString(): string {
    return UUIDFormatter.format(this.value.toBytes())
  }

  /**
   * Fresh 16-byte big-endian copy.
   */
  toBinary(): Uint8Array {
    return this.value.toBytes()
  }

  toBigInt(): bigint {
    return this.value.toBigInt()
  }

  toUInt128(): UInt128 {
    return this.value
  }

  /**
   * JSON.stringify() emits the Base62 string. Read it back with fromJSON().
   */
  toJSON(): string {
    return this.base62
  }

  [inspect.custom](): string {
    return `FUID(${this.base62})`
  }

  // ─── Layout ─────────────────────────────────────────────────────────────

  /**
   * UUID version nibble. 4 for every generated FUID; parsed values may hold
   * any of 0–15.
   */
  get version(): number {
    return this.value.toBytes()[OFFSET_VERSION] >> 4
  }

  get variant(): UUIDVariant {
    const bits = this.value.toBytes()[OFFSET_VARIANT]

    if ((bits & 0x80) === 0x00) return "NCS"
    if ((bits & 0xc0) === 0x80) return "RFC4122"
    if ((bits & 0xe0) === 0xc0) return "MICROSOFT"
    return "FUTURE"
  }

  // ─── Comparison ─────────────────────────────────────────────────────────

  equals(other: FUIDValue): boolean {
    return other instanceof FUIDValue && this.value.equals(other.value)
  }

  /**
   * Orders by integer value. Usable directly as an Array.prototype.sort comparator
   * via `(a, b) => a.compareTo(b)`.
   */
  compareTo(other: FUIDValue): -1 | 0 | 1 {
    return this.value.compare(other.value)
  }

  // ─── Static Factories ───────────────────────────────────────────────────

  static fromUInt128(value: UInt128): FUIDValue {
    return new FUIDValue(value)
  }

  /**
   * Parses a Base62 string. Case-sensitive, not trimmed; leading "0" digits
   * are accepted and dropped from toString().
   *
   * @throws {TypeError} input is not a string.
   * @throws {FUIDError} EMPTY_INPUT, INVALID_CHARACTER or OVERFLOW.
   *
   * @example
   * ```ts
   * const id = FUIDValue.fromString("TMXp8QPR6yGvKuV2GZQ10")
   * id.toUUIDString() // "0f8fad5b-d9cb-469f-a165-70867728950e"
   * ```
   */
  static fromString(input: string): FUIDValue {
    return new FUIDValue(Base62Encoder.decode(input))
  }

  /**
   * @throws {TypeError} input is not a string.
   * @throws {FUIDError} INVALID_FORMAT or INVALID_CHARACTER.
   */
  static fromUUIDString(input: string): FUIDValue {
    return new FUIDValue(UInt128.fromBytes(UUIDFormatter.parse(input)))
  }

  /**
   * The bytes are read, not retained; later mutation of `binary` has no effect.
   *
   * @throws {TypeError}  binary is not a Uint8Array.
   * @throws {RangeError} binary is not exactly 16 bytes.
   */
  static fromBinary(binary: Uint8Array): FUIDValue {
    return new FUIDValue(UInt128.fromBytes(binary))
  }

  /**
   * @throws {FUIDError} OUT_OF_RANGE when value is negative or above 2^128 - 1.
   */
  static fromBigInt(value: bigint): FUIDValue {
    return new FUIDValue(UInt128.fromBigInt(value))
  }

  /**
   * Inverse of toJSON(). Use in a JSON.parse reviver or schema transform.
   *
   * @throws {TypeError} value is not a string.
   * @throws {FUIDError} The string is not valid Base62.
   */
  static fromJSON(value: unknown): FUIDValue {
    if (typeof value !== "string") {
      throw new TypeError(
        `FUIDValue.fromJSON: expected a Base62 string. Received: ${value === null ? "null" : typeof value}`
      )
    }

    return FUIDValue.fromString(value)
  }

  static isFUIDValue(value: unknown): value is FUIDValue {
    return value instanceof FUIDValue
  }
}
