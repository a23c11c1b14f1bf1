/**
 * Tests for key code schemas.
 */
import { Effect, Exit, Schema } from "effect"
import { describe, expect, it } from "@effect/vitest"
import { UnknownKeyCodeError } from "../../src/effect/errors"
import {
  KeyCode,
  KeyCodeClass,
  KeyCodeFromString,
  decodeKeyCode,
} from "../../src/effect/types"

describe("KeyCode", () => {
  it("accepts canonical names", () => {
    expect(Schema.decodeUnknownSync(KeyCode)("ArrowUp")).toBe("ArrowUp")
  })

  it("rejects aliases and non-strings", () => {
    expect(() => Schema.decodeUnknownSync(KeyCode)("OSLeft")).toThrow()
    expect(() => Schema.decodeUnknownSync(KeyCode)(7)).toThrow()
  })
})

describe("KeyCodeClass", () => {
  it("accepts the ten class tags", () => {
    expect(Schema.decodeUnknownSync(KeyCodeClass)("NonStandard")).toBe("NonStandard")
    expect(() => Schema.decodeUnknownSync(KeyCodeClass)("Keypad")).toThrow()
  })
})

describe("KeyCodeFromString", () => {
  it("decodes aliases to the canonical key code", () => {
    expect(Schema.decodeUnknownSync(KeyCodeFromString)("VolumeUp")).toBe("AudioVolumeUp")
    expect(Schema.decodeUnknownSync(KeyCodeFromString)("5")).toBe("Digit5")
  })

  it("encodes the canonical name", () => {
    expect(Schema.encodeSync(KeyCodeFromString)("MetaLeft")).toBe("MetaLeft")
  })

  it("writes aliases back as canonical names", () => {
    const code = Schema.decodeUnknownSync(KeyCodeFromString)("OSLeft")
    expect(Schema.encodeSync(KeyCodeFromString)(code)).toBe("MetaLeft")
  })

  it("refuses to encode a value that is not a key code", () => {
    expect(() => Schema.encodeUnknownSync(KeyCodeFromString)("OSLeft")).toThrow()
  })

  it("fails on unknown names", () => {
    expect(() => Schema.decodeUnknownSync(KeyCodeFromString)("Hyper")).toThrow(
      'Unknown key code "Hyper"'
    )
  })

  it("decodes key codes inside a config object", () => {
    const Binding = Schema.Struct({ split: KeyCodeFromString, reset: KeyCodeFromString })
    const decoded = Schema.decodeUnknownSync(Binding)({ split: "OSRight", reset: "F5" })

    expect(decoded).toEqual({ split: "MetaRight", reset: "F5" })
    expect(Schema.encodeSync(Binding)(decoded)).toEqual({ split: "MetaRight", reset: "F5" })
  })
})

describe("decodeKeyCode", () => {
  it.effect("succeeds with the key code", () =>
    Effect.gen(function* () {
      const code = yield* decodeKeyCode("LaunchMediaPlayer")
      expect(code).toBe("MediaSelect")
    })
  )

  it.effect("fails with UnknownKeyCodeError", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(decodeKeyCode("NotARealKey"))
      expect(error).toBeInstanceOf(UnknownKeyCodeError)
      expect(error._tag).toBe("UnknownKeyCodeError")
      expect(error.input).toBe("NotARealKey")
    })
  )

  it.effect("is case-sensitive", () =>
    Effect.gen(function* () {
      const exit = yield* Effect.exit(decodeKeyCode("keya"))
      expect(Exit.isFailure(exit)).toBe(true)
    })
  )
})
