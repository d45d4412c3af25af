import { describe, it, expect } from "vitest"
import { FUIDValidator } from "../../src/core/FUIDValidator"
import { FUIDValue } from "../../src/core/FUIDValue"
import { callUntyped } from "../helpers"

const BASE62 = "TMXp8QPR6yGvKuV2GZQ10"
const UUID = "0f8fad5b-d9cb-469f-a165-70867728950e"
const VERSION_1_UUID = "c232ab00-9414-11ec-b3c8-9f6bdeced846"

describe("FUIDValidator.validateDetailed", () => {
  it("returns the parsed value for valid input", () => {
    const result = FUIDValidator.validateDetailed(BASE62)
    expect(result.valid).toBe(true)
    if (result.valid) {
      expect(result.value.toUUIDString()).toBe(UUID)
    }
  })

  it.each([
    ["", "EMPTY_INPUT"],
    ["abc def", "INVALID_CHARACTER"],
    ["7n42DGM5Tflk9n8mt7Fhc8", "OVERFLOW"],
    ["0f8fad5b-d9cb-469f-a165", "INVALID_CHARACTER"],
    ["0f8fad5b-d9cb-469f-a16570867728950e-", "INVALID_FORMAT"],
    ["0f8fad5b-d9cb-469f-a165-70867728950x", "INVALID_CHARACTER"],
  ])("rejects %j with %s", (input, reason) => {
    expect(FUIDValidator.validateDetailed(input)).toEqual({ valid: false, reason })
  })

  it("maps an out-of-range bigint to OUT_OF_RANGE", () => {
    expect(FUIDValidator.validateDetailed(1n << 128n)).toEqual({ valid: false, reason: "OUT_OF_RANGE" })
  })

  it("maps wrong-length bytes to INVALID_BINARY_LENGTH", () => {
    expect(FUIDValidator.validateDetailed(new Uint8Array(4))).toEqual({
      valid: false,
      reason: "INVALID_BINARY_LENGTH",
    })
  })

  it("maps null and undefined to NULL_INPUT", () => {
    expect(callUntyped(FUIDValidator.validateDetailed, null)).toEqual({ valid: false, reason: "NULL_INPUT" })
    expect(callUntyped(FUIDValidator.validateDetailed, undefined)).toEqual({ valid: false, reason: "NULL_INPUT" })
  })

  it("maps other types to UNSUPPORTED_TYPE", () => {
    expect(callUntyped(FUIDValidator.validateDetailed, 123)).toEqual({ valid: false, reason: "UNSUPPORTED_TYPE" })
  })

  it("accepts any UUID layout by default", () => {
    expect(FUIDValidator.validateDetailed(VERSION_1_UUID).valid).toBe(true)
    expect(FUIDValidator.validateDetailed("0").valid).toBe(true)
  })

  it("rejects non-random layouts under requireRandom", () => {
    expect(FUIDValidator.validateDetailed(VERSION_1_UUID, { requireRandom: true })).toEqual({
      valid: false,
      reason: "NOT_RANDOM_UUID",
    })
    expect(FUIDValidator.validateDetailed(FUIDValue.NIL, { requireRandom: true })).toEqual({
      valid: false,
      reason: "NOT_RANDOM_UUID",
    })
    expect(FUIDValidator.validateDetailed(UUID, { requireRandom: true }).valid).toBe(true)
  })
})

describe("FUIDValidator.validate", () => {
  it("returns a boolean", () => {
    expect(FUIDValidator.validate(BASE62)).toBe(true)
    expect(FUIDValidator.validate("not valid")).toBe(false)
    expect(FUIDValidator.validate(VERSION_1_UUID, { requireRandom: true })).toBe(false)
  })
})
