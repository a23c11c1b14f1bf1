/**
 * Application configuration service using Effect.Config.
 */
import { Config, Context, Effect, Layer, LogLevel, Option } from "effect"
import { LAYOUT_IDS, type LayoutId } from "../layouts"

// =============================================================================
// Config Service
// =============================================================================

/** Application configuration */
export interface AppConfigShape {
  /** Bundled layout consulted for writing system keys */
  readonly layout: LayoutId
  /** Custom layout table; takes precedence over `layout` when set */
  readonly layoutFile: Option.Option<string>
  readonly logLevel: LogLevel.LogLevel
}

export class AppConfig extends Context.Tag("@keyglyph/AppConfig")<
  AppConfig,
  AppConfigShape
>() {
  /** Production layer - reads from environment with sensible defaults */
  static readonly layer = Layer.effect(
    AppConfig,
    Effect.gen(function* () {
      const layout = yield* Config.literal(...LAYOUT_IDS)("KEYGLYPH_LAYOUT").pipe(
        Config.orElse(() => Config.succeed<LayoutId>("none"))
      )

      const layoutFile = yield* Config.option(Config.nonEmptyString("KEYGLYPH_LAYOUT_FILE")).pipe(
        Config.orElse(() => Config.succeed(Option.none<string>()))
      )

      const logLevel = yield* Config.logLevel("KEYGLYPH_LOG_LEVEL").pipe(
        Config.orElse(() => Config.succeed(LogLevel.Warning))
      )

      return AppConfig.of({ layout, layoutFile, logLevel })
    })
  )

  /** Test layer - hardcoded values for testing */
  static readonly testLayer = Layer.succeed(AppConfig, {
    layout: "de",
    layoutFile: Option.none(),
    logLevel: LogLevel.None,
  })
}
