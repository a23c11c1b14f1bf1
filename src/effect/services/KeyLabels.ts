/**
 * KeyLabels service: display labels that follow the user's keyboard layout.
 */
import { Context, Effect, Layer, Option } from "effect"
import {
  classifyKeyCode,
  keyCodeLabel,
  keyCodeName,
  normalizeLayoutGlyph,
  type KeyCode,
  type KeyCodeClass,
} from "../../core/key-code"
import { KeyboardLayout } from "./KeyboardLayout"

/** Everything a hotkey picker shows for one key */
export interface KeyDescription {
  readonly name: string
  readonly keyClass: KeyCodeClass
  readonly label: string
  readonly resolvedLabel: string
}

export class KeyLabels extends Context.Tag("@keyglyph/KeyLabels")<
  KeyLabels,
  {
    /**
     * Label under the active layout. Only writing system keys consult the
     * layout; anything it cannot answer falls back to the US label.
     */
    readonly resolve: (code: KeyCode) => Effect.Effect<string>
    readonly describe: (code: KeyCode) => Effect.Effect<KeyDescription>
  }
>() {
  static readonly layer = Layer.effect(
    KeyLabels,
    Effect.gen(function* () {
      const layout = yield* KeyboardLayout

      const resolve = (code: KeyCode): Effect.Effect<string> => {
        if (classifyKeyCode(code) !== "WritingSystem") {
          return Effect.succeed(keyCodeLabel(code))
        }

        return layout.query(code).pipe(
          Effect.map((glyph) =>
            glyph.pipe(
              Option.filter((value) => value.length > 0),
              Option.map(normalizeLayoutGlyph),
              Option.getOrElse(() => keyCodeLabel(code))
            )
          )
        )
      }

      const describe = (code: KeyCode): Effect.Effect<KeyDescription> =>
        resolve(code).pipe(
          Effect.map((resolvedLabel) => ({
            name: keyCodeName(code),
            keyClass: classifyKeyCode(code),
            label: keyCodeLabel(code),
            resolvedLabel,
          }))
        )

      return KeyLabels.of({ resolve, describe })
    })
  )
}
