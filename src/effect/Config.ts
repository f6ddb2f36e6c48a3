/**
 * Application configuration service using Effect.Config.
 * Environment variables override the TOML user config, which overrides defaults.
 */
import { Config, Context, Effect, Layer, LogLevel } from "effect"
import {
  DEFAULT_USER_CONFIG,
  loadUserConfigSync,
  type UserConfig,
} from "../core/user-config"
import { createInitialOptions, type SearchOptions } from "../core/operations/search-options"
import { PageSize } from "./types"

// =============================================================================
// Config Service
// =============================================================================

/** Application configuration */
export interface AppConfigShape {
  readonly pageSize: PageSize
  readonly debounceMs: number
  readonly retriggerDelayMs: number
  readonly everythingUrl: string
  readonly logLevel: LogLevel.LogLevel
  readonly ellipsis: string
  readonly nameWidth: number
  readonly pathWidth: number
  readonly initialOptions: SearchOptions
}

const positiveInteger = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must be a positive integer`, validation: (n) => n > 0 }),
    Config.orElse(() => Config.succeed(fallback))
  )

const nonNegativeInteger = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must not be negative`, validation: (n) => n >= 0 }),
    Config.orElse(() => Config.succeed(fallback))
  )

/** Resolve the service from a loaded user config plus the environment */
const fromUserConfig = (user: UserConfig) =>
  Effect.gen(function* () {
    const pageSize = yield* positiveInteger("EVERYFIND_PAGE_SIZE", user.search.pageSize)

    const debounceMs = yield* nonNegativeInteger("EVERYFIND_DEBOUNCE_MS", user.search.debounceMs)

    const retriggerDelayMs = yield* nonNegativeInteger(
      "EVERYFIND_RETRIGGER_MS",
      user.search.retriggerDelayMs
    )

    const everythingUrl = yield* Config.string("EVERYFIND_EVERYTHING_URL").pipe(
      Config.orElse(() => Config.succeed(user.provider.everythingUrl))
    )

    const logLevel = yield* Config.logLevel("EVERYFIND_LOG_LEVEL").pipe(
      Config.orElse(() => Config.succeed(LogLevel.Warning))
    )

    return AppConfig.of({
      pageSize: PageSize.make(pageSize),
      debounceMs,
      retriggerDelayMs,
      everythingUrl,
      logLevel,
      ellipsis: user.display.ellipsis,
      nameWidth: user.display.nameWidth,
      pathWidth: user.display.pathWidth,
      initialOptions: createInitialOptions({
        regex: user.search.regex,
        migemo: user.search.migemo,
        shellContextMenu: user.search.shellContextMenu,
      }),
    })
  })

export class AppConfig extends Context.Tag("@everyfind/AppConfig")<
  AppConfig,
  AppConfigShape
>() {
  /** Production layer - config file at the default location plus environment */
  static readonly layer = Layer.effect(
    AppConfig,
    Effect.sync(() => loadUserConfigSync()).pipe(Effect.flatMap(fromUserConfig))
  )

  /** Layer reading the user config from an explicit path */
  static readonly fromFile = (configPath: string) =>
    Layer.effect(
      AppConfig,
      Effect.sync(() => loadUserConfigSync({ configPath })).pipe(Effect.flatMap(fromUserConfig))
    )

  /** Test layer - defaults only, environment ignored */
  static readonly testLayer = Layer.succeed(AppConfig, {
    pageSize: PageSize.make(DEFAULT_USER_CONFIG.search.pageSize),
    debounceMs: DEFAULT_USER_CONFIG.search.debounceMs,
    retriggerDelayMs: DEFAULT_USER_CONFIG.search.retriggerDelayMs,
    everythingUrl: DEFAULT_USER_CONFIG.provider.everythingUrl,
    logLevel: LogLevel.Warning,
    ellipsis: DEFAULT_USER_CONFIG.display.ellipsis,
    nameWidth: DEFAULT_USER_CONFIG.display.nameWidth,
    pathWidth: DEFAULT_USER_CONFIG.display.pathWidth,
    initialOptions: createInitialOptions(),
  })
}
