import { afterEach, beforeEach, describe, it, expect, vi } from "vitest"
import { FUID } from "../../src/core/FUID"
import { FUIDValue } from "../../src/core/FUIDValue"
import { RANDOM_SOURCE_ENV } from "../../src/crypto/RandomSource"
import { FUIDError } from "../../src/errors/FUIDError"
import { callUntyped, catchError, countingSource, fixedSource } from "../helpers"

const BASE62 = "TMXp8QPR6yGvKuV2GZQ10"
const UUID = "0f8fad5b-d9cb-469f-a165-70867728950e"
const VERSION_1_UUID = "c232ab00-9414-11ec-b3c8-9f6bdeced846"

let savedEnv: string | undefined

beforeEach(() => {
  savedEnv = process.env[RANDOM_SOURCE_ENV]
  delete process.env[RANDOM_SOURCE_ENV]
})

afterEach(() => {
  if (savedEnv === undefined) {
    delete process.env[RANDOM_SOURCE_ENV]
  } else {
    process.env[RANDOM_SOURCE_ENV] = savedEnv
  }
  vi.restoreAllMocks()
})

describe("FUID.initialize", () => {
  it("defaults to the node source", () => {
    expect(FUID.initialize().getRandomSourceKind()).toBe("node")
  })

  it("accepts a built-in source name", () => {
    expect(FUID.initialize({ randomSource: "webcrypto" }).getRandomSourceKind()).toBe("webcrypto")
  })

  it("accepts a custom source", () => {
    expect(FUID.initialize({ randomSource: fixedSource(1) }).getRandomSourceKind()).toBe("custom")
  })

  it("reads the source from the environment", () => {
    process.env[RANDOM_SOURCE_ENV] = "webcrypto"
    expect(FUID.initialize().getRandomSourceKind()).toBe("webcrypto")
  })

  it("logs a warning and uses node for an unknown environment value", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    process.env[RANDOM_SOURCE_ENV] = "quantum"

    const fuid = FUID.initialize()

    expect(fuid.getRandomSourceKind()).toBe("node")
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith(
      `[FUID] WARNING: FUID_RANDOM_SOURCE="quantum" is not a known random source. ` +
      `Using "node". Valid values: node, webcrypto.`
    )
  })

  it("does not log for a valid configuration", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    FUID.initialize({ randomSource: "node" })
    expect(warn).not.toHaveBeenCalled()
  })

  it("rejects an unknown source name", () => {
    expect(() => callUntyped(FUID.initialize, { randomSource: "quantum" })).toThrow(RangeError)
  })

  it("rejects malformed options", () => {
    expect(() => callUntyped(FUID.initialize, null)).toThrow(TypeError)
    expect(() => callUntyped(FUID.initialize, [])).toThrow(TypeError)
    expect(() => callUntyped(FUID.initialize, "node")).toThrow(TypeError)
    expect(() => callUntyped(FUID.initialize, { randomSource: 4 })).toThrow(TypeError)
    expect(() => callUntyped(FUID.initialize, { requireRandom: "yes" })).toThrow(TypeError)
  })

  it("describes what was wrong with the options", () => {
    const err = catchError(() => callUntyped(FUID.initialize, []))
    expect(err).toHaveProperty("message", "FUID.initialize: options must be a plain object. Received: array")
  })
})

describe("FUID.generate", () => {
  it("draws from the configured source", () => {
    const fuid = FUID.initialize({ randomSource: countingSource() })
    expect(fuid.generate().toUUIDString()).toBe("00010203-0405-4607-8809-0a0b0c0d0e0f")
    expect(fuid.generate().toUUIDString()).toBe("10111213-1415-4617-9819-1a1b1c1d1e1f")
  })

  it("generates values that round-trip through both text forms", () => {
    const fuid = FUID.initialize()

    for (let i = 0; i < 100; i++) {
      const id = fuid.generate()
      expect(fuid.parse(id.toString()).equals(id)).toBe(true)
      expect(fuid.parse(id.toUUIDString()).equals(id)).toBe(true)
      expect(id.toString().length).toBeLessThanOrEqual(22)
    }
  })

  it("surfaces a failing source as RANDOM_SOURCE_ERROR", () => {
    const fuid = FUID.initialize({
      randomSource: () => {
        throw new Error("no entropy")
      },
    })
    const err = catchError(() => fuid.generate())
    expect(err).toBeInstanceOf(FUIDError)
    expect(err).toMatchObject({ code: "RANDOM_SOURCE_ERROR" })
  })
})

describe("FUID.parse", () => {
  const fuid = FUID.initialize({ randomSource: fixedSource(0) })

  it("parses every accepted representation", () => {
    const expected = FUIDValue.fromUUIDString(UUID)
    expect(fuid.parse(BASE62).equals(expected)).toBe(true)
    expect(fuid.parse(UUID).equals(expected)).toBe(true)
    expect(fuid.parse(expected.toBigInt()).equals(expected)).toBe(true)
    expect(fuid.parse(expected.toBinary()).equals(expected)).toBe(true)
  })

  it("accepts any layout by default", () => {
    expect(fuid.parse(VERSION_1_UUID).version).toBe(1)
  })

  it("enforces requireRandom per call", () => {
    const err = catchError(() => fuid.parse(VERSION_1_UUID, { requireRandom: true }))
    expect(err).toBeInstanceOf(FUIDError)
    expect(err).toMatchObject({ code: "NOT_RANDOM_UUID" })
    expect(err).toHaveProperty(
      "message",
      expect.stringContaining("is not a version-4 RFC 4122 identifier (version 1, variant RFC4122)")
    )
  })

  it("enforces requireRandom from initialize, with a per-call override", () => {
    const strict = FUID.initialize({ requireRandom: true })
    expect(catchError(() => strict.parse(VERSION_1_UUID))).toMatchObject({ code: "NOT_RANDOM_UUID" })
    expect(strict.parse(VERSION_1_UUID, { requireRandom: false }).version).toBe(1)
    expect(strict.parse(UUID).toString()).toBe(BASE62)
  })

  it("throws FUIDError for malformed strings", () => {
    expect(catchError(() => fuid.parse("bad!"))).toMatchObject({ code: "INVALID_CHARACTER", position: 3 })
  })

  it("reports a stray hyphen in a short id at its position", () => {
    expect(catchError(() => fuid.parse("abc-def"))).toMatchObject({
      code: "INVALID_CHARACTER",
      character: "-",
      position: 3,
    })
  })
})

describe("FUID.inspect", () => {
  it("returns metadata", () => {
    expect(FUID.initialize().inspect(BASE62)).toEqual({
      base62: BASE62,
      uuid: UUID,
      bigint: 0x0f8fad5bd9cb469fa16570867728950en,
      version: 4,
      variant: "RFC4122",
      isRandomUUID: true,
    })
  })
})

describe("FUID.validate", () => {
  it("validates with the instance default", () => {
    const lenient = FUID.initialize()
    const strict = FUID.initialize({ requireRandom: true })

    expect(lenient.validate(VERSION_1_UUID)).toBe(true)
    expect(strict.validate(VERSION_1_UUID)).toBe(false)
    expect(strict.validate(VERSION_1_UUID, { requireRandom: false })).toBe(true)
  })

  it("reports the failure reason", () => {
    const strict = FUID.initialize({ requireRandom: true })
    expect(strict.validateDetailed(VERSION_1_UUID)).toEqual({ valid: false, reason: "NOT_RANDOM_UUID" })
    expect(strict.validateDetailed("")).toEqual({ valid: false, reason: "EMPTY_INPUT" })
  })
})
