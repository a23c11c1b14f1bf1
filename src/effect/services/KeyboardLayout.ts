/**
 * KeyboardLayout service: which glyph a physical key types under the active
 * keyboard layout.
 *
 * Lookups never fail. A layout that cannot answer, whether because the table
 * could not be loaded or because the underlying query threw, answers
 * `Option.none()` and the caller falls back to the US label.
 */
import { Context, Effect, Layer, Option, Schema } from "effect"
import { classifyKeyCode, isKeyCode, type KeyCode, type LayoutQuery } from "../../core/key-code"
import { BUNDLED_LAYOUTS, type LayoutId, type LayoutTable } from "../../layouts"
import { AppConfig } from "../Config"
import { KeyboardLayoutError } from "../errors"
import { FileSystem } from "./FileSystem"

// =============================================================================
// KeyboardLayout Service
// =============================================================================

interface KeyboardLayoutShape {
  /** Name of the active layout, for diagnostics */
  readonly name: string
  /**
   * Glyph the key types, if known. Implementations may be bound to a single
   * thread; callers query once per resolution and do not cache.
   */
  readonly query: (code: KeyCode) => Effect.Effect<Option.Option<string>>
}

const LayoutFileSchema = Schema.Record({ key: Schema.String, value: Schema.String })

const noLayout: KeyboardLayoutShape = {
  name: "none",
  query: () => Effect.succeedNone,
}

/** Keep only non-empty glyphs for writing system keys */
const compileTable = (
  name: string,
  table: LayoutTable
): Effect.Effect<KeyboardLayoutShape> =>
  Effect.gen(function* () {
    const glyphs = new Map<KeyCode, string>()

    for (const [key, glyph] of Object.entries(table)) {
      if (!isKeyCode(key) || classifyKeyCode(key) !== "WritingSystem" || glyph.length === 0) {
        yield* Effect.logDebug("Ignoring keyboard layout entry").pipe(
          Effect.annotateLogs({ layout: name, key, glyph })
        )
        continue
      }
      glyphs.set(key, glyph)
    }

    return {
      name,
      query: (code: KeyCode) => Effect.succeed(Option.fromNullable(glyphs.get(code))),
    }
  })

const fromQuery = (name: string, query: LayoutQuery): KeyboardLayoutShape => ({
  name,
  query: (code) =>
    Effect.try({
      try: () => query(code),
      catch: (cause) => KeyboardLayoutError.make({ layout: name, cause }),
    }).pipe(
      Effect.catchTag("KeyboardLayoutError", (error) =>
        Effect.logDebug("Keyboard layout query failed").pipe(
          Effect.annotateLogs({ layout: error.layout, code, cause: String(error.cause) }),
          Effect.as(Option.none<string>())
        )
      )
    ),
})

const fromBundled = (layout: LayoutId): Effect.Effect<KeyboardLayoutShape> =>
  layout === "none" ? Effect.succeed(noLayout) : compileTable(layout, BUNDLED_LAYOUTS[layout])

const fromFile = (
  fs: Context.Tag.Service<FileSystem>,
  path: string
): Effect.Effect<KeyboardLayoutShape> =>
  fs.readJson(path, LayoutFileSchema).pipe(
    Effect.flatMap((table) => compileTable(path, table)),
    Effect.catchTag("FileReadError", (error) =>
      Effect.logWarning("Could not load keyboard layout file; showing US labels").pipe(
        Effect.annotateLogs({ path: error.path, cause: String(error.cause) }),
        Effect.as(noLayout)
      )
    )
  )

export class KeyboardLayout extends Context.Tag("@keyglyph/KeyboardLayout")<
  KeyboardLayout,
  KeyboardLayoutShape
>() {
  /** Production layer - custom layout file if configured, else a bundled table */
  static readonly layer = Layer.effect(
    KeyboardLayout,
    Effect.gen(function* () {
      const config = yield* AppConfig
      const fs = yield* FileSystem

      const layout = yield* Option.match(config.layoutFile, {
        onNone: () => fromBundled(config.layout),
        onSome: (path) => fromFile(fs, path),
      })

      return KeyboardLayout.of(layout)
    })
  )

  /** No layout information; every lookup answers none */
  static readonly none = Layer.succeed(KeyboardLayout, KeyboardLayout.of(noLayout))

  /** Wrap a synchronous platform query */
  static readonly fromQuery = (name: string, query: LayoutQuery) =>
    Layer.succeed(KeyboardLayout, KeyboardLayout.of(fromQuery(name, query)))

  /** Serve lookups from a fixed table of canonical key name to glyph */
  static readonly fromTable = (name: string, table: LayoutTable) =>
    Layer.effect(
      KeyboardLayout,
      compileTable(name, table).pipe(Effect.map((layout) => KeyboardLayout.of(layout)))
    )

  /** Test layer - a German layout */
  static readonly testLayer = KeyboardLayout.fromTable("de", BUNDLED_LAYOUTS.de)
}
