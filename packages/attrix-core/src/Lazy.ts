import { Option } from 'effect'
import type { RawAccess } from './internal/store.js'

export type { RawAccess }

export interface LazyContext {
  readonly raw: RawAccess
  /** Runs the binder of the base type (see `Record.extend`); None when there is none. */
  readonly next: () => Option.Option<unknown>
}

/**
 * LazyBinder：
 * - Consulted only when a name is absent from the record's store.
 * - A Some result is committed to the store, so later reads never reach the binder again.
 * - None means "unknown attribute" and surfaces as AttributeMissing.
 */
export interface LazyBinder {
  readonly _tag: 'LazyBinder'
  readonly compute: (name: string, ctx: LazyContext) => Option.Option<unknown>
}

export const make = (compute: LazyBinder['compute']): LazyBinder => ({
  _tag: 'LazyBinder',
  compute,
})

/** Every missing name is computable. */
export const fromFunction = (compute: (name: string) => unknown): LazyBinder =>
  make((name) => Option.some(compute(name)))

/** Keeps `names` missing; everything else goes to `binder`. */
export const except = (names: Iterable<string>, binder: LazyBinder): LazyBinder => {
  const blocked = new Set(names)
  return make((name, ctx) => (blocked.has(name) ? Option.none() : binder.compute(name, ctx)))
}
