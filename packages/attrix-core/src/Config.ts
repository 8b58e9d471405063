import { Config, Context, Effect, Layer, LogLevel, Option } from 'effect'

export interface AttributeConfigShape {
  /** Forward access events of the Effect API (`Attribute.get/set/has`) to the Debug sink. */
  readonly traceAccess: boolean
  /** Level used by `Debug.logLayer`. */
  readonly logLevel: LogLevel.LogLevel
}

export interface AttributeConfigSnapshot extends AttributeConfigShape {
  readonly source: 'runtime' | 'config' | 'default'
}

// Runtime 级配置 Tag：通过 Layer 覆盖默认行为。
export class AttributeConfigTag extends Context.Tag('@attrix/core/AttributeConfig')<
  AttributeConfigTag,
  AttributeConfigShape
>() {}

const DEFAULT_CONFIG: AttributeConfigShape = {
  traceAccess: false,
  logLevel: LogLevel.Debug,
}

/**
 * Keys read through the current ConfigProvider (env by default):
 * - attrix.trace_access: boolean, default false
 * - attrix.log_level: log level name, default Debug
 */
const AttributeConfigFromEnv = {
  traceAccess: Config.boolean('attrix.trace_access').pipe(Config.withDefault(DEFAULT_CONFIG.traceAccess)),
  logLevel: Config.logLevel('attrix.log_level').pipe(Config.withDefault(DEFAULT_CONFIG.logLevel)),
}

const fromEnv = Effect.gen(function* () {
  const traceAccess = yield* AttributeConfigFromEnv.traceAccess
  const logLevel = yield* AttributeConfigFromEnv.logLevel
  return { traceAccess, logLevel }
})

/**
 * load：
 * 1) a runtime override (AttributeConfigTag) wins;
 * 2) otherwise values come from the ConfigProvider;
 * 3) `source` is "default" when neither changed anything.
 */
export const load = Effect.gen(function* () {
  const override = yield* Effect.serviceOption(AttributeConfigTag)
  if (Option.isSome(override)) {
    const snapshot: AttributeConfigSnapshot = { ...override.value, source: 'runtime' }
    return snapshot
  }

  const env = yield* fromEnv
  const fromConfig = env.traceAccess !== DEFAULT_CONFIG.traceAccess || env.logLevel !== DEFAULT_CONFIG.logLevel
  const snapshot: AttributeConfigSnapshot = { ...env, source: fromConfig ? 'config' : 'default' }
  return snapshot
})

export const traceAccess = Effect.map(load, (config) => config.traceAccess)

export const logLevel = Effect.map(load, (config) => config.logLevel)

/**
 * replace：merges `partial` over the current value (override service if present, else the
 * ConfigProvider values), in the spirit of Logger.replace.
 */
export const replace = (partial: Partial<AttributeConfigShape>): Layer.Layer<AttributeConfigTag, never, never> =>
  Layer.effect(
    AttributeConfigTag,
    Effect.gen(function* () {
      const current = yield* Effect.serviceOption(AttributeConfigTag)
      const base = Option.isSome(current)
        ? current.value
        : yield* Effect.orElseSucceed(fromEnv, () => DEFAULT_CONFIG)
      return {
        ...base,
        ...partial,
      }
    }),
  )
