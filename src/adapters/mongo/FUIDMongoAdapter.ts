import { Binary } from "bson"
import { FUIDValue } from "../../core/FUIDValue"
import { UInt128 } from "../../core/UInt128"
import { ByteUtils } from "../../utils/ByteUtils"

/**
 * Required byte length of a stored FUID.
 */
const FUID_BYTE_LENGTH = UInt128.BYTES

/**
 * Subtypes fromDatabase() accepts. New documents are always written with
 * SUBTYPE_UUID (4); SUBTYPE_DEFAULT (0) is read for collections that stored
 * raw 16-byte buffers before switching to this adapter.
 */
const READABLE_SUBTYPES: ReadonlySet<number> = new Set([
  Binary.SUBTYPE_UUID,
  Binary.SUBTYPE_DEFAULT,
])

/**
 * Shape of a MongoDB document field storing a FUID.
 *
 * @example
 * ```ts
 * interface UserDocument {
 *   _id: FUIDDocument
 *   email: string
 * }
 * ```
 */
export type FUIDDocument = Binary

// ─────────────────────────────────────────────────────────────────────────────
// FUIDMongoAdapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * MongoDB adapter. Converts between FUIDs and BSON Binary subtype 4.
 *
 * Subtype 4 is BSON's standard UUID subtype, so other drivers and tools
 * (mongosh, Compass) display a stored FUID as UUID("…") with the same 16
 * bytes that FUIDValue.toUUIDString() prints.
 *
 * Setup:
 *   ```ts
 *   await collection.insertOne({
 *     _id: FUIDMongoAdapter.toDatabase(fuid.generate()),
 *   })
 *   ```
 *
 * Query pattern:
 *   ```ts
 *   const doc = await collection.findOne({ _id: FUIDMongoAdapter.fromString(req.params.id) })
 *   ```
 */
export class FUIDMongoAdapter {

  /**
   * Converts a FUIDValue or raw 16 bytes to a BSON Binary (subtype 4).
   *
   * @throws {TypeError}  input is not a FUIDValue or Uint8Array.
   * @throws {RangeError} Uint8Array is not exactly 16 bytes.
   */
  static toDatabase(input: FUIDValue | Uint8Array): Binary {
    const bytes = FUIDMongoAdapter.resolveToBytes(input, "toDatabase")
    return new Binary(bytes, Binary.SUBTYPE_UUID)
  }

  /**
   * Converts a BSON Binary read from MongoDB back to a FUIDValue.
   *
   * @throws {TypeError}  value is not a Binary, or has a subtype other than 4 or 0.
   * @throws {RangeError} Binary is not exactly 16 bytes.
   *
   * @example
   * ```ts
   * const doc = await collection.findOne({ email: "user@example.com" })
   * const id  = FUIDMongoAdapter.fromDatabase(doc._id)
   * res.json({ id: id.toString() })
   * ```
   */
  static fromDatabase(value: Binary): FUIDValue {
    if (!(value instanceof Binary)) {
      throw new TypeError(
        `FUIDMongoAdapter.fromDatabase: expected a BSON Binary instance. ` +
        `Received: ${value === null ? "null" : value === undefined ? "undefined" : typeof value}. ` +
        `Ensure the field was stored using FUIDMongoAdapter.toDatabase().`
      )
    }

    if (!READABLE_SUBTYPES.has(value.sub_type)) {
      throw new TypeError(
        `FUIDMongoAdapter.fromDatabase: unsupported BSON Binary subtype ${value.sub_type}. ` +
        `Expected ${Binary.SUBTYPE_UUID} (UUID) or ${Binary.SUBTYPE_DEFAULT} (generic).`
      )
    }

    // buffer may be over-allocated; length() is the number of bytes written.
    const bytes = value.buffer.subarray(0, value.length())

    if (bytes.length !== FUID_BYTE_LENGTH) {
      throw new RangeError(
        `FUIDMongoAdapter.fromDatabase: BSON Binary must be exactly ${FUID_BYTE_LENGTH} bytes. ` +
        `Received ${bytes.length} bytes. ` +
        `This document field may be corrupt or was not stored as a FUID.`
      )
    }

    return FUIDValue.fromBinary(bytes)
  }

  /**
   * Converts a Base62 FUID string directly to a BSON Binary for query filters.
   *
   * @throws {TypeError} fuidString is not a string.
   * @throws {FUIDError} fuidString is not valid Base62.
   */
  static fromString(fuidString: string): Binary {
    return FUIDMongoAdapter.toDatabase(FUIDValue.fromString(fuidString))
  }

  // ─── Private Helpers ──────────────────────────────────────────────────────

  private static resolveToBytes(
    input: FUIDValue | Uint8Array,
    callerName: string
  ): Uint8Array {
    if (input instanceof FUIDValue) {
      return input.toBinary()
    }

    if (input instanceof Uint8Array) {
      if (input.length !== FUID_BYTE_LENGTH) {
        throw new RangeError(
          `FUIDMongoAdapter.${callerName}: Uint8Array must be exactly ${FUID_BYTE_LENGTH} bytes. ` +
          `Received ${input.length} bytes.`
        )
      }
      // Binary keeps a reference to the array it is given; detach from the caller's buffer.
      return ByteUtils.copy(input)
    }

    throw new TypeError(
      `FUIDMongoAdapter.${callerName}: input must be a FUIDValue or Uint8Array. ` +
      `Received: ${input === null ? "null" : input === undefined ? "undefined" : typeof input}`
    )
  }
}
