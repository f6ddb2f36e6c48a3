/**
 * Effect runtime for the application.
 * Provides a managed runtime with all services composed.
 */
import { Effect, Layer, Logger, ManagedRuntime } from "effect"
import { AppConfig } from "./Config"
import type { IndexFileError } from "./errors"
import {
  Clipboard,
  QueryDictionary,
  SearchProvider,
  SearchSession,
  ShellActions,
} from "./services"
import { createInitialOptions, type SearchOptions } from "../core/operations/search-options"

// =============================================================================
// Layer Composition
// =============================================================================

export interface AppLayerOptions {
  /** Search this JSON index file instead of the Everything server */
  readonly indexFile?: string
  /** Read the user config from this path instead of the default location */
  readonly configPath?: string
  /** Applied on top of the configured initial options */
  readonly searchOptions?: Partial<SearchOptions>
}

const makeConfigLayer = (options: AppLayerOptions) => {
  const base = options.configPath ? AppConfig.fromFile(options.configPath) : AppConfig.layer
  const overrides = options.searchOptions
  if (!overrides) return base

  return Layer.effect(
    AppConfig,
    Effect.map(AppConfig, (config) =>
      AppConfig.of({
        ...config,
        initialOptions: createInitialOptions({ ...config.initialOptions, ...overrides }),
      })
    )
  ).pipe(Layer.provide(base))
}

/** Logs go to stderr as logfmt, filtered by the configured level */
const LoggerLayer = Layer.merge(
  Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.logfmtLogger)),
  Layer.unwrapEffect(Effect.map(AppConfig, (config) => Logger.minimumLogLevel(config.logLevel)))
)

/** Full application layer */
export const makeAppLayer = (options: AppLayerOptions = {}) => {
  const ConfigLayer = makeConfigLayer(options)

  const baseProvider: Layer.Layer<SearchProvider, IndexFileError, AppConfig> = options.indexFile
    ? SearchProvider.indexFileLayer(options.indexFile)
    : SearchProvider.layer
  const ProviderLayer = baseProvider.pipe(Layer.provide(ConfigLayer))

  /** Desktop collaborators */
  const CollaboratorLayer = Layer.mergeAll(
    QueryDictionary.layer,
    ShellActions.layer,
    Clipboard.layer
  )

  /** Session layer (depends on everything above) */
  const SessionLayer = SearchSession.layer.pipe(
    Layer.provide(Layer.mergeAll(ConfigLayer, ProviderLayer, CollaboratorLayer))
  )

  return Layer.mergeAll(
    ConfigLayer,
    ProviderLayer,
    CollaboratorLayer,
    SessionLayer,
    LoggerLayer.pipe(Layer.provide(ConfigLayer))
  )
}

/** Test layer composition */
const TestCollaboratorLayer = Layer.mergeAll(
  QueryDictionary.testLayer,
  ShellActions.testLayer,
  Clipboard.testLayer
)

export const TestAppLayer = Layer.mergeAll(
  AppConfig.testLayer,
  SearchProvider.testLayer,
  TestCollaboratorLayer,
  SearchSession.layer.pipe(
    Layer.provide(
      Layer.mergeAll(AppConfig.testLayer, SearchProvider.testLayer, TestCollaboratorLayer)
    )
  )
)

// =============================================================================
// Runtime Types
// =============================================================================

/** All services provided by the app layer */
export type AppServices =
  | AppConfig
  | SearchProvider
  | QueryDictionary
  | ShellActions
  | Clipboard
  | SearchSession

// =============================================================================
// Managed Runtime
// =============================================================================

/** Managed runtime for the application */
export const makeAppRuntime = (options?: AppLayerOptions) =>
  ManagedRuntime.make(makeAppLayer(options))

export type AppRuntime = ReturnType<typeof makeAppRuntime>

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Run an effect with the given runtime, returning Exit.
 * Useful when you need to handle errors explicitly.
 */
export const runEffectExit = <A, E>(
  runtime: AppRuntime,
  effect: Effect.Effect<A, E, AppServices>
) => runtime.runPromiseExit(effect)
