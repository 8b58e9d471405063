import { Option, Predicate } from 'effect'
import type { RawAccess } from './internal/store.js'

export interface InterceptContext {
  readonly raw: RawAccess
  /** What the record itself holds for the name (declared field or own store); None on a miss. */
  readonly found: Option.Option<unknown>
  /** Runs the interceptor of the base type; None when there is none. */
  readonly next: () => Option.Option<unknown>
}

/**
 * FullInterceptor：
 * - The record consults it on every read, hit or miss, declared or not (the backing slot excepted).
 * - `found` carries the record's own answer. Some(value) answers the read from custom logic;
 *   None lets `found` stand, and on a miss passes on to the lazy binder.
 * - `resolve` receives RawAccess, never the record, so its own bookkeeping reads cannot re-enter
 *   interception.
 */
export interface FullInterceptor {
  readonly _tag: 'FullInterceptor'
  readonly resolve: (name: string, ctx: InterceptContext) => Option.Option<unknown>
}

export const full = (resolve: FullInterceptor['resolve']): FullInterceptor => ({
  _tag: 'FullInterceptor',
  resolve,
})

const lookup = (backing: unknown, name: string): Option.Option<unknown> => {
  if (backing instanceof Map) {
    return backing.has(name) ? Option.some<unknown>(backing.get(name)) : Option.none()
  }
  if (Predicate.isRecord(backing) && Object.hasOwn(backing, name)) {
    return Option.some(backing[name])
  }
  return Option.none()
}

/**
 * dictionary：
 * - Backs the record with an external dictionary (plain object or Map) passed as `backing`
 *   when the record is made.
 * - Names the record already holds keep their own value.
 */
export const dictionary = (): FullInterceptor =>
  full((name, { raw, found, next }) =>
    Option.isSome(found)
      ? next()
      : Option.orElse(
          Option.flatMap(raw.backing(), (backing) => lookup(backing, name)),
          next,
        ),
  )

export interface WriteContext {
  readonly raw: RawAccess
  /** Runs the write interceptor of the base type, if any. */
  readonly next: () => void
}

/**
 * WriteInterceptor：
 * - Runs before every write, declared names included (the backing slot excepted).
 * - After `before` returns, a declared name goes to its field (which may still reject it) and any
 *   other name is committed to the raw store; if `before` throws, nothing is written.
 */
export interface WriteInterceptor {
  readonly _tag: 'WriteInterceptor'
  readonly before: (name: string, value: unknown, ctx: WriteContext) => void
}

export const onWrite = (before: WriteInterceptor['before']): WriteInterceptor => ({
  _tag: 'WriteInterceptor',
  before,
})
