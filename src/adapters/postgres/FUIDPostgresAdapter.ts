import { FUIDValue } from "../../core/FUIDValue"
import { UInt128 } from "../../core/UInt128"
import { ByteUtils } from "../../utils/ByteUtils"

/** Required byte length of a FUID in a BYTEA column. */
const FUID_BYTE_LENGTH = UInt128.BYTES

// ─────────────────────────────────────────────────────────────────────────────
// FUIDPostgresAdapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * PostgreSQL adapter for FUID.
 *
 * Store FUIDs in a native `uuid` column. A FUID is bit-identical to a UUID,
 * so the column takes 16 bytes, existing UUID foreign keys keep working,
 * and the Base62 form is purely a presentation concern.
 *
 *   ```sql
 *   CREATE TABLE users (
 *     id    UUID PRIMARY KEY,
 *     email TEXT NOT NULL
 *   );
 *   ```
 *
 * node-postgres sends and returns `uuid` values as text, so toDatabase()
 * produces the hyphenated string and fromDatabase() accepts it.
 * Tables that already store 16-byte BYTEA ids can use toBytea(); fromDatabase()
 * accepts the Buffer pg returns for those too.
 */
export class FUIDPostgresAdapter {

  /**
   * Converts a FUIDValue or 16 raw bytes to the text parameter for a `uuid` column.
   *
   * @throws {TypeError}  input is not a FUIDValue or Uint8Array.
   * @throws {RangeError} Uint8Array is not exactly 16 bytes.
   *
   * @example
   * ```ts
   * await db.query(
   *   "INSERT INTO users (id, email) VALUES ($1, $2)",
   *   [FUIDPostgresAdapter.toDatabase(fuid.generate()), "user@example.com"]
   * )
   * ```
   */
  static toDatabase(input: FUIDValue | Uint8Array): string {
    return FUIDPostgresAdapter.resolveToValue(input, "toDatabase").toUUIDString()
  }

  /**
   * Converts a FUIDValue or 16 raw bytes to a Buffer for a BYTEA column.
   *
   * @throws {TypeError}  input is not a FUIDValue or Uint8Array.
   * @throws {RangeError} Uint8Array is not exactly 16 bytes.
   */
  static toBytea(input: FUIDValue | Uint8Array): Buffer {
    return ByteUtils.toBuffer(FUIDPostgresAdapter.resolveToValue(input, "toBytea").toBinary())
  }

  /**
   * Converts a `uuid` (string) or `bytea` (Buffer) column value to a FUIDValue.
   *
   * @throws {TypeError}  value is neither a string nor a Buffer / Uint8Array.
   * @throws {RangeError} Binary value is not exactly 16 bytes.
   * @throws {FUIDError}  String value is not UUID text.
   *
   * @example
   * ```ts
   * const { rows } = await db.query("SELECT id FROM users WHERE email = $1", [email])
   * const id = FUIDPostgresAdapter.fromDatabase(rows[0].id)
   * res.json({ id: id.toString() })
   * ```
   */
  static fromDatabase(value: string | Buffer | Uint8Array): FUIDValue {
    if (typeof value === "string") {
      return FUIDValue.fromUUIDString(value)
    }

    if (value instanceof Uint8Array) {
      if (value.length !== FUID_BYTE_LENGTH) {
        throw new RangeError(
          `FUIDPostgresAdapter.fromDatabase: BYTEA value must be exactly ${FUID_BYTE_LENGTH} bytes. ` +
          `Received ${value.length} bytes. ` +
          `This row may be corrupt or the column does not hold FUIDs.`
        )
      }
      return FUIDValue.fromBinary(value)
    }

    throw new TypeError(
      `FUIDPostgresAdapter.fromDatabase: expected a UUID string or a Buffer. ` +
      `Received: ${value === null ? "null" : value === undefined ? "undefined" : typeof value}. ` +
      `Ensure the column is defined as UUID or BYTEA.`
    )
  }

  /**
   * Converts a Base62 FUID string (e.g. from a URL) to a `uuid` query parameter.
   *
   * @throws {TypeError} fuidString is not a string.
   * @throws {FUIDError} fuidString is not valid Base62.
   *
   * @example
   * ```ts
   * // GET /users/:id
   * const { rows } = await db.query(
   *   "SELECT * FROM users WHERE id = $1",
   *   [FUIDPostgresAdapter.fromString(req.params.id)]
   * )
   * ```
   */
  static fromString(fuidString: string): string {
    return FUIDValue.fromString(fuidString).toUUIDString()
  }

  // ─── Private Helpers ──────────────────────────────────────────────────────

  private static resolveToValue(
    input: FUIDValue | Uint8Array,
    callerName: string
  ): FUIDValue {
    if (input instanceof FUIDValue) {
      return input
    }

    if (input instanceof Uint8Array) {
      if (input.length !== FUID_BYTE_LENGTH) {
        throw new RangeError(
          `FUIDPostgresAdapter.${callerName}: Uint8Array must be exactly ${FUID_BYTE_LENGTH} bytes. ` +
          `Received ${input.length} bytes.`
        )
      }
      return FUIDValue.fromBinary(input)
    }

    throw new TypeError(
      `FUIDPostgresAdapter.${callerName}: input must be a FUIDValue or Uint8Array. ` +
      `Received: ${input === null ? "null" : input === undefined ? "undefined" : typeof input}`
    )
  }
}
