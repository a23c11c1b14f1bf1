/**
 * Effect runtime for the application.
 * Composes configuration, logging and the key label services.
 */
import { ConfigError, Effect, FiberRef, Layer, Logger, Option } from "effect"
import type { LayoutId } from "../layouts"
import { AppConfig } from "./Config"
import { FileSystem, KeyboardLayout, KeyLabels } from "./services"

// =============================================================================
// Layer Composition
// =============================================================================

export interface AppLayerOptions {
  /** Use this bundled layout regardless of environment configuration */
  readonly layout?: LayoutId
}

const configLayer = (options: AppLayerOptions): Layer.Layer<AppConfig, ConfigError.ConfigError> => {
  const { layout } = options
  if (layout === undefined) {
    return AppConfig.layer
  }

  return Layer.effect(
    AppConfig,
    Effect.map(AppConfig, (config) =>
      AppConfig.of({ ...config, layout, layoutFile: Option.none() })
    )
  ).pipe(Layer.provide(AppConfig.layer))
}

/** Key label services (depend on Config and FileSystem) */
const LabelsLayer = KeyLabels.layer.pipe(
  Layer.provideMerge(KeyboardLayout.layer),
  Layer.provide(FileSystem.layer)
)

/**
 * Key label services under the configured minimum log level. The level
 * applies while the layout is loaded as well as to effects run afterwards.
 */
const LoggedLabelsLayer = Layer.unwrapEffect(
  Effect.map(AppConfig, (config) =>
    LabelsLayer.pipe(
      Layer.locally(FiberRef.currentMinimumLogLevel, config.logLevel),
      Layer.merge(Logger.minimumLogLevel(config.logLevel))
    )
  )
)

/** Full application layer */
export const makeAppLayer = (options: AppLayerOptions = {}) =>
  LoggedLabelsLayer.pipe(Layer.provideMerge(configLayer(options)))

export const AppLayer = makeAppLayer()

/** Test layer composition */
export const TestAppLayer = KeyLabels.layer.pipe(
  Layer.provideMerge(KeyboardLayout.testLayer),
  Layer.provideMerge(AppConfig.testLayer)
)

// =============================================================================
// Runtime Types
// =============================================================================

/** All services provided by the app layer */
export type AppServices = AppConfig | KeyboardLayout | KeyLabels

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Run an effect with the app layer.
 * Returns a promise that resolves with the result.
 */
export const runEffect = <A, E>(
  effect: Effect.Effect<A, E, AppServices>,
  options: AppLayerOptions = {}
): Promise<A> => Effect.runPromise(effect.pipe(Effect.provide(makeAppLayer(options))))
