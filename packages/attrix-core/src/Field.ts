import { Either, Option, ParseResult, Schema } from 'effect'
import type { Predicate } from 'effect'
import * as Errors from './Errors.js'
import { WeakSideTable } from './internal/side-table.js'

/**
 * Validate：
 * - Pure and deterministic: the same input always yields the same result.
 * - Right carries the value to store (it may differ from the input, e.g. a decoded Schema value).
 * - Left carries a human-readable reason.
 */
export type Validate<A> = (value: unknown) => Either.Either<A, string>

/**
 * Host：what a field sees of the record that owns it.
 * Records satisfy it; computed fields read and write sibling attributes through it.
 */
export interface Host {
  readonly read: (name: string) => unknown
  readonly write: (name: string, value: unknown) => void
}

/**
 * ValidatedField：
 * - A shared descriptor: one instance per declared field, used by every record of the declaring type.
 * - stored: per-record values live in a weak side-table keyed by record identity, so the descriptor
 *   never keeps a record alive.
 * - computed: no state of its own; reads and writes go through other attributes of the record.
 */
export interface ValidatedField<A> {
  readonly _tag: 'ValidatedField'
  readonly kind: 'stored' | 'computed'
  /** Current value for `record`; a stored field falls back to its default and never throws. */
  readonly read: (record: Host) => A
  /** Validates then stores. A rejection leaves the existing entry untouched. */
  readonly write: (record: Host, value: unknown) => Either.Either<void, Errors.ValidationError>
  /** Whether `record` holds an entry of its own (always false for computed fields). */
  readonly has: (record: Host) => boolean
  /** Number of side-table entries whose record has not been collected yet. */
  readonly liveEntries: () => number
  readonly label: () => string
}

export interface FieldOptions<A> {
  readonly default: A
  readonly label?: string
}

export interface MakeOptions<A> extends FieldOptions<A> {
  readonly validate: Validate<A>
}

const UNBOUND_LABEL = '<unbound>'

const labels = new WeakMap<object, string>()

/**
 * attachName：
 * - Called by `Record.make` when the field is installed under `name`.
 * - Only the first installation names the field; an explicit `label` always wins.
 *
 * @internal
 */
export const attachName = (field: ValidatedField<unknown>, name: string): void => {
  if (!labels.has(field)) {
    labels.set(field, name)
  }
}

export const make = <A>(options: MakeOptions<A>): ValidatedField<A> => {
  const table = new WeakSideTable<Host, A>()

  const field: ValidatedField<A> = {
    _tag: 'ValidatedField',
    kind: 'stored',
    read: (record) => Option.getOrElse(table.get(record), () => options.default),
    write: (record, value) =>
      Either.match(options.validate(value), {
        onLeft: (reason) => Either.left(Errors.validationError(field.label(), reason)),
        onRight: (accepted) => {
          table.set(record, accepted)
          return Either.right(undefined)
        },
      }),
    has: (record) => table.has(record),
    liveEntries: () => table.size,
    label: () => labels.get(field) ?? UNBOUND_LABEL,
  }

  if (options.label !== undefined) {
    labels.set(field, options.label)
  }

  return field
}

/**
 * fromSchema：
 * - Validation is `Schema.decodeUnknownEither`; the decoded value is what gets stored.
 * - The rejection reason is the TreeFormatter rendering of the parse error.
 */
export const fromSchema = <A, I>(schema: Schema.Schema<A, I, never>, options: FieldOptions<A>): ValidatedField<A> => {
  const decode = Schema.decodeUnknownEither(schema)
  return make({
    ...options,
    validate: (value) => Either.mapLeft(decode(value), (error) => ParseResult.TreeFormatter.formatErrorSync(error)),
  })
}

export interface RefineOptions<A> extends FieldOptions<A> {
  readonly reason: string
}

export const refine = <A>(guard: Predicate.Refinement<unknown, A>, options: RefineOptions<A>): ValidatedField<A> =>
  make({
    default: options.default,
    label: options.label,
    validate: (value) => (guard(value) ? Either.right(value) : Either.left(options.reason)),
  })

/**
 * range：inclusive numeric range, e.g. a 0..100 grade.
 * Defaults to `min` when no default is given.
 */
export const range = (
  min: number,
  max: number,
  options?: { readonly default?: number; readonly label?: string },
): ValidatedField<number> =>
  refine((value): value is number => typeof value === 'number' && value >= min && value <= max, {
    default: options?.default ?? min,
    label: options?.label,
    reason: `must be between ${min} and ${max}`,
  })

export interface ComputedOptions<A> {
  readonly get: (record: Host) => A
  /** Omitted for a read-only field. Left carries the rejection reason; validate before writing siblings. */
  readonly set?: (record: Host, value: unknown) => Either.Either<void, string>
  readonly label?: string
}

/**
 * computed：a derived attribute, e.g. `quota` over `max_quota` / `quota_consumed`.
 * - Holds nothing itself, so `names()` / `snapshot()` of a record leave it out.
 * - Writes to a read-only computed field fail with ValidationError ("is read-only").
 */
export const computed = <A>(options: ComputedOptions<A>): ValidatedField<A> => {
  const field: ValidatedField<A> = {
    _tag: 'ValidatedField',
    kind: 'computed',
    read: (record) => options.get(record),
    write: (record, value) => {
      const set = options.set
      if (set === undefined) {
        return Either.left(Errors.validationError(field.label(), 'is read-only'))
      }
      return Either.mapLeft(set(record, value), (reason) => Errors.validationError(field.label(), reason))
    },
    has: () => false,
    liveEntries: () => 0,
    label: () => labels.get(field) ?? UNBOUND_LABEL,
  }

  if (options.label !== undefined) {
    labels.set(field, options.label)
  }

  return field
}
