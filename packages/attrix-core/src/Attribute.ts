import { Effect, Either, Option } from 'effect'
import * as AttributeConfig from './Config.js'
import * as Debug from './Debug.js'
import * as Errors from './Errors.js'
import { fromView, isInterceptable, type Interceptable } from './Record.js'

// Generic attribute access：记录、记录的 view 与普通对象走同一套入口，
// 调用方只能通过行为区分拦截字段与普通字段。

const toRecord = (target: object): Option.Option<Interceptable> =>
  isInterceptable(target) ? Option.some(target) : fromView(target)

/**
 * hasSync：the "does this attribute exist" query.
 * - AttributeMissing becomes false; every other error propagates.
 * - On a lazily bound record this populates the attribute, like a read would.
 */
export const hasSync = (target: object, name: string): boolean =>
  Option.match(toRecord(target), {
    onSome: (record) => record.has(name),
    onNone: () => name in target,
  })

export const getSync = (target: object, name: string): unknown =>
  Option.match(toRecord(target), {
    onSome: (record) => record.read(name),
    onNone: () => {
      if (!(name in target)) throw Errors.attributeMissing('object', name)
      return Reflect.get(target, name)
    },
  })

export const getOrElse = (target: object, name: string, fallback: () => unknown): unknown => {
  try {
    return getSync(target, name)
  } catch (error) {
    if (Errors.isAttributeMissing(error)) return fallback()
    throw error
  }
}

const traced = <A, E>(run: (trace: Debug.Listener | undefined) => Either.Either<A, E>): Effect.Effect<A, E> =>
  Effect.gen(function* () {
    const traceAccess = yield* Effect.orElseSucceed(AttributeConfig.traceAccess, () => false)
    if (!traceAccess) {
      return yield* run(undefined)
    }

    const events: Array<Debug.Event> = []
    const result = run((event) => {
      events.push(event)
    })
    yield* Effect.forEach(events, Debug.record, { discard: true })
    return yield* result
  })

export const get = (target: object, name: string): Effect.Effect<unknown, Errors.AttributeMissing> =>
  Option.match(toRecord(target), {
    onSome: (record) => traced((trace) => record.resolve(name, trace)),
    onNone: () =>
      name in target
        ? Effect.sync(() => Reflect.get(target, name))
        : Effect.fail(Errors.attributeMissing('object', name)),
  })

export const set = (target: object, name: string, value: unknown): Effect.Effect<void, Errors.ValidationError> =>
  Option.match(toRecord(target), {
    onSome: (record) => traced((trace) => record.assign(name, value, trace)),
    onNone: () =>
      Effect.sync(() => {
        Reflect.set(target, name, value)
      }),
  })

export const has = (target: object, name: string): Effect.Effect<boolean> =>
  get(target, name).pipe(
    Effect.as(true),
    Effect.catchTag('AttributeMissing', () => Effect.succeed(false)),
  )
