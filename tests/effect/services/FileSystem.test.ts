/**
 * Tests for FileSystem service.
 */
import { Effect, Schema } from "effect"
import { describe, expect, it } from "@effect/vitest"
import { FileReadError } from "../../../src/effect/errors"
import { FileSystem } from "../../../src/effect/services/FileSystem"

const Glyphs = Schema.Record({ key: Schema.String, value: Schema.String })

const files = FileSystem.layerFromFiles({
  "/layouts/ok.json": JSON.stringify({ KeyA: "q" }),
  "/layouts/broken.json": "{ KeyA: ",
  "/layouts/numbers.json": JSON.stringify({ KeyA: 1 }),
})

describe("FileSystem", () => {
  it.effect("reads and decodes JSON", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem
      expect(yield* fs.readJson("/layouts/ok.json", Glyphs)).toEqual({ KeyA: "q" })
    }).pipe(Effect.provide(files))
  )

  it.effect("fails with FileReadError for a missing file", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem
      const error = yield* Effect.flip(fs.readJson("/layouts/missing.json", Glyphs))
      expect(error).toBeInstanceOf(FileReadError)
      expect(error.path).toBe("/layouts/missing.json")
    }).pipe(Effect.provide(files))
  )

  it.effect("fails with FileReadError for invalid JSON", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem
      const error = yield* Effect.flip(fs.readJson("/layouts/broken.json", Glyphs))
      expect(error.path).toBe("/layouts/broken.json")
      expect(error.cause).toBeInstanceOf(SyntaxError)
    }).pipe(Effect.provide(files))
  )

  it.effect("fails with FileReadError when the schema does not match", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem
      const error = yield* Effect.flip(fs.readJson("/layouts/numbers.json", Glyphs))
      expect(error._tag).toBe("FileReadError")
      expect(error.path).toBe("/layouts/numbers.json")
    }).pipe(Effect.provide(files))
  )

  it.effect("exposes only JSON reads", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem
      expect(Object.keys(fs)).toEqual(["readJson"])
    }).pipe(Effect.provide(FileSystem.testLayer))
  )
})
