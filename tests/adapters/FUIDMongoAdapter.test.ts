import { Binary, UUID as BsonUUID } from "bson"
import { describe, it, expect } from "vitest"
import { FUIDMongoAdapter } from "../../src/adapters/mongo/FUIDMongoAdapter"
import { FUIDValue } from "../../src/core/FUIDValue"
import { callUntyped, catchError } from "../helpers"

const BASE62 = "TMXp8QPR6yGvKuV2GZQ10"
const UUID = "0f8fad5b-d9cb-469f-a165-70867728950e"

describe("FUIDMongoAdapter.toDatabase", () => {
  it("writes BSON Binary subtype 4 holding the 16 bytes", () => {
    const binary = FUIDMongoAdapter.toDatabase(FUIDValue.fromString(BASE62))
    expect(binary).toBeInstanceOf(Binary)
    expect(binary.sub_type).toBe(Binary.SUBTYPE_UUID)
    expect(binary.length()).toBe(16)
    expect(Buffer.from(binary.buffer.subarray(0, 16)).toString("hex")).toBe("0f8fad5bd9cb469fa16570867728950e")
  })

  it("is read by bson as the same UUID", () => {
    const binary = FUIDMongoAdapter.toDatabase(FUIDValue.fromString(BASE62))
    expect(binary.toUUID().toHexString()).toBe(UUID)
  })

  it("copies raw byte input", () => {
    const bytes = FUIDValue.fromString(BASE62).toBinary()
    const binary = FUIDMongoAdapter.toDatabase(bytes)
    bytes.fill(0)
    expect(FUIDMongoAdapter.fromDatabase(binary).toString()).toBe(BASE62)
  })

  it("rejects bad input", () => {
    expect(() => FUIDMongoAdapter.toDatabase(new Uint8Array(10))).toThrow(RangeError)
    expect(() => callUntyped(FUIDMongoAdapter.toDatabase, BASE62)).toThrow(TypeError)
  })
})

describe("FUIDMongoAdapter.fromDatabase", () => {
  it("reads what toDatabase wrote", () => {
    const original = FUIDValue.fromUUIDString(UUID)
    expect(FUIDMongoAdapter.fromDatabase(FUIDMongoAdapter.toDatabase(original)).equals(original)).toBe(true)
  })

  it("reads a bson UUID", () => {
    expect(FUIDMongoAdapter.fromDatabase(new BsonUUID(UUID)).toString()).toBe(BASE62)
  })

  it("reads generic subtype 0 binaries", () => {
    const bytes = FUIDValue.fromString(BASE62).toBinary()
    expect(FUIDMongoAdapter.fromDatabase(new Binary(bytes, Binary.SUBTYPE_DEFAULT)).toString()).toBe(BASE62)
  })

  it("rejects other subtypes", () => {
    const legacy = new Binary(new Uint8Array(16), Binary.SUBTYPE_UUID_OLD)
    const err = catchError(() => FUIDMongoAdapter.fromDatabase(legacy))
    expect(err).toBeInstanceOf(TypeError)
    expect(err).toHaveProperty(
      "message",
      "FUIDMongoAdapter.fromDatabase: unsupported BSON Binary subtype 3. Expected 4 (UUID) or 0 (generic)."
    )
  })

  it("rejects binaries of the wrong length", () => {
    expect(() => FUIDMongoAdapter.fromDatabase(new Binary(new Uint8Array(12), Binary.SUBTYPE_DEFAULT))).toThrow(RangeError)
  })

  it("rejects values that are not Binary", () => {
    expect(() => callUntyped(FUIDMongoAdapter.fromDatabase, UUID)).toThrow(TypeError)
    expect(() => callUntyped(FUIDMongoAdapter.fromDatabase, null)).toThrow(TypeError)
  })
})

describe("FUIDMongoAdapter.fromString", () => {
  it("builds a query value from Base62", () => {
    expect(FUIDMongoAdapter.fromString(BASE62).toUUID().toHexString()).toBe(UUID)
  })

  it("propagates Base62 errors", () => {
    expect(catchError(() => FUIDMongoAdapter.fromString("x-y"))).toMatchObject({ code: "INVALID_CHARACTER" })
  })
})
