import { Either, Option, identity } from 'effect'
import type * as Debug from './Debug.js'
import * as Errors from './Errors.js'
import * as Field from './Field.js'
import type { FullInterceptor, WriteInterceptor } from './Interceptor.js'
import type { LazyBinder } from './Lazy.js'
import { firstFound, found, type Resolved, type Stage } from './internal/resolve.js'
import { AttributeStore, BACKING_FIELD, isReserved, type RawAccess } from './internal/store.js'

export type Fields = { readonly [name: string]: Field.ValidatedField<unknown> }

/**
 * Definition：
 * - fields: names owned by a ValidatedField (DECLARED_VALIDATED);
 * - lazy: fills names missing from the store, once per record and name;
 * - intercept: consulted on every read, with the record's own answer as `found`;
 * - onWrite: runs before every write, ahead of field validation;
 * - onTrace: synchronous listener for access events.
 */
export interface Definition<F extends Fields> {
  readonly fields: F
  readonly lazy?: LazyBinder
  readonly intercept?: FullInterceptor
  readonly onWrite?: WriteInterceptor
  readonly onTrace?: Debug.Listener
}

export interface Init {
  /** Initial values; each one goes through the ordinary write path. */
  readonly values?: Readonly<Record<string, unknown>>
  /** Backing value for a FullInterceptor (e.g. the dictionary read by `Interceptor.dictionary()`). */
  readonly backing?: unknown
}

/**
 * Interceptable：the capability every record exposes.
 * - `read` / `write` are the intercepted entry points and throw AttributeMissing / ValidationError;
 * - `resolve` / `assign` are the same paths returning Either;
 * - there is no raw accessor here: only interceptors get RawAccess.
 */
export interface Interceptable {
  readonly type: RecordType<Fields>
  readonly read: (name: string) => unknown
  readonly write: (name: string, value: unknown) => void
  readonly resolve: (name: string, trace?: Debug.Listener) => Either.Either<unknown, Errors.AttributeMissing>
  readonly assign: (name: string, value: unknown, trace?: Debug.Listener) => Either.Either<void, Errors.ValidationError>
  readonly has: (name: string) => boolean
  /** Declared names with a value, then store names in insertion order. */
  readonly names: () => ReadonlyArray<string>
  /** Contents of the record's own store (declared fields live in their descriptors). */
  readonly snapshot: () => Readonly<Record<string, unknown>>
}

export interface RecordType<F extends Fields> {
  readonly _tag: 'RecordType'
  readonly id: string
  readonly fields: F
  readonly make: (init?: Init) => Interceptable
  /** Derives a type: fields merge (derived wins), hooks receive the base hook as `next`. */
  readonly extend: <G extends Fields>(id: string, definition: Definition<G>) => RecordType<F & G>
  /** True for records of this type or of a type derived from it. */
  readonly is: (value: unknown) => value is Interceptable
}

type ReadChain = (name: string, raw: RawAccess, found: Option.Option<unknown>) => Option.Option<unknown>

type WriteChain = (name: string, value: unknown, raw: RawAccess) => void

interface TypeState {
  readonly id: string
  readonly lineage: ReadonlySet<symbol>
  readonly declared: ReadonlyMap<string, Field.ValidatedField<unknown>>
  readonly lazy: Option.Option<ReadChain>
  readonly intercept: Option.Option<ReadChain>
  readonly onWrite: Option.Option<WriteChain>
  readonly onTrace: Option.Option<Debug.Listener>
}

const chainRead = <H>(
  own: H | undefined,
  base: Option.Option<ReadChain>,
  run: (
    hook: H,
    name: string,
    raw: RawAccess,
    found: Option.Option<unknown>,
    next: () => Option.Option<unknown>,
  ) => Option.Option<unknown>,
): Option.Option<ReadChain> => {
  if (own === undefined) return base
  return Option.some((name, raw, found) =>
    run(own, name, raw, found, () =>
      Option.match(base, {
        onNone: () => Option.none(),
        onSome: (next) => next(name, raw, found),
      }),
    ),
  )
}

const chainWrite = (own: WriteInterceptor | undefined, base: Option.Option<WriteChain>): Option.Option<WriteChain> => {
  if (own === undefined) return base
  return Option.some((name, value, raw) =>
    own.before(name, value, {
      raw,
      next: () => {
        if (Option.isSome(base)) base.value(name, value, raw)
      },
    }),
  )
}

const buildDeclared = (
  id: string,
  own: Fields,
  base: ReadonlyMap<string, Field.ValidatedField<unknown>>,
): ReadonlyMap<string, Field.ValidatedField<unknown>> => {
  const declared = new Map(base)
  for (const [name, field] of Object.entries(own)) {
    if (isReserved(name)) {
      throw new Error(`[Record.make] "${id}" cannot declare the reserved name "${name}"`)
    }
    declared.set(name, field)
  }

  // 同一个 descriptor 挂在两个名字上会让两者共享同一条 side-table 记录。
  const owners = new Map<Field.ValidatedField<unknown>, string>()
  for (const [name, field] of declared) {
    const other = owners.get(field)
    if (other !== undefined) {
      throw new Error(
        `[Record.make] "${id}" installs the same field under "${other}" and "${name}".\n` +
          'Fix: create one field per declared name.',
      )
    }
    owners.set(field, name)
    Field.attachName(field, name)
  }

  return declared
}

class RecordInstance implements Interceptable {
  private readonly store = new AttributeStore()
  private readonly reading = new Set<string>()
  private readonly writing = new Set<string>()

  // the record's own answer: declared → store
  private readonly own: ReadonlyArray<Stage> = [
    (name) =>
      Option.map(Option.fromNullable(this.state.declared.get(name)), (field) => found('declared')(field.read(this))),
    (name) => Option.map(this.store.get(name), found('store')),
  ]

  constructor(
    readonly type: RecordType<Fields>,
    /** @internal */
    readonly state: TypeState,
    init: Init,
  ) {
    if (init.backing !== undefined) {
      this.store.set(BACKING_FIELD, init.backing)
    }
  }

  read(name: string): unknown {
    return Either.getOrThrowWith(this.resolve(name), identity)
  }

  write(name: string, value: unknown): void {
    Either.getOrThrowWith(this.assign(name, value), identity)
  }

  resolve(name: string, trace?: Debug.Listener): Either.Either<unknown, Errors.AttributeMissing> {
    const result = this.guarded(this.reading, 'read', name, () =>
      isReserved(name) ? Option.map(this.store.get(name), found('reserved')) : this.lookup(name),
    )

    if (Option.isNone(result)) {
      this.emit({ type: 'attribute:missing', recordType: this.state.id, name }, trace)
      return Either.left(Errors.attributeMissing(this.state.id, name))
    }

    const { source, value } = result.value
    if (source === 'lazy') {
      this.emit({ type: 'attribute:lazy', recordType: this.state.id, name }, trace)
    }
    this.emit({ type: 'attribute:read', recordType: this.state.id, name, source }, trace)
    return Either.right(value)
  }

  assign(name: string, value: unknown, trace?: Debug.Listener): Either.Either<void, Errors.ValidationError> {
    return this.guarded(this.writing, 'write', name, (): Either.Either<void, Errors.ValidationError> => {
      if (isReserved(name)) {
        this.store.set(name, value)
        this.emit({ type: 'attribute:write', recordType: this.state.id, name, target: 'reserved' }, trace)
        return Either.right(undefined)
      }

      if (Option.isSome(this.state.onWrite)) {
        this.state.onWrite.value(name, value, this.store.raw)
      }

      const field = this.state.declared.get(name)
      if (field !== undefined) {
        const result = field.write(this, value)
        if (Either.isLeft(result)) {
          this.emit({ type: 'attribute:rejected', recordType: this.state.id, name, reason: result.left.reason }, trace)
        } else {
          this.emit({ type: 'attribute:write', recordType: this.state.id, name, target: 'declared' }, trace)
        }
        return result
      }

      this.store.set(name, value)
      this.emit({ type: 'attribute:write', recordType: this.state.id, name, target: 'store' }, trace)
      return Either.right(undefined)
    })
  }

  has(name: string): boolean {
    return Either.isRight(this.resolve(name))
  }

  names(): ReadonlyArray<string> {
    const out = new Set<string>()
    for (const [name, field] of this.state.declared) {
      if (field.has(this)) out.add(name)
    }
    for (const name of this.store.names()) {
      out.add(name)
    }
    return Array.from(out)
  }

  snapshot(): Readonly<Record<string, unknown>> {
    return this.store.snapshot()
  }

  // own answer, then the interceptor (every read), then the lazy binder (misses only)
  private lookup(name: string): Option.Option<Resolved> {
    const own = firstFound(this.own, name)
    const intercepted = Option.flatMap(this.state.intercept, (intercept) =>
      Option.map(
        this.custom(() =>
          intercept(
            name,
            this.store.raw,
            Option.map(own, (resolved) => resolved.value),
          ),
        ),
        found('interceptor'),
      ),
    )
    return intercepted.pipe(
      Option.orElse(() => own),
      Option.orElse(() => this.bind(name)),
    )
  }

  private bind(name: string): Option.Option<Resolved> {
    return Option.flatMap(this.state.lazy, (lazy) =>
      Option.map(this.custom(() => lazy(name, this.store.raw, Option.none())), (value) => {
        this.store.set(name, value)
        return found('lazy')(value)
      }),
    )
  }

  private guarded<A>(active: Set<string>, access: 'read' | 'write', name: string, run: () => A): A {
    if (active.has(name)) {
      throw Errors.recursionGuardViolation(this.state.id, name, access)
    }
    active.add(name)
    try {
      return run()
    } finally {
      active.delete(name)
    }
  }

  // A custom hook that throws AttributeMissing reports a miss; anything else propagates.
  private custom(run: () => Option.Option<unknown>): Option.Option<unknown> {
    try {
      return run()
    } catch (error) {
      if (Errors.isAttributeMissing(error)) return Option.none()
      throw error
    }
  }

  private emit(event: Debug.Event, trace: Debug.Listener | undefined): void {
    if (Option.isSome(this.state.onTrace)) this.state.onTrace.value(event)
    trace?.(event)
  }
}

const build = <F extends Fields>(
  id: string,
  definition: Definition<F>,
  base: Option.Option<TypeState>,
): RecordType<F> => {
  const token = Symbol(id)

  const state: TypeState = {
    id,
    lineage: new Set([...Option.match(base, { onNone: () => [], onSome: (s) => s.lineage }), token]),
    declared: buildDeclared(
      id,
      definition.fields,
      Option.match(base, {
        onNone: () => new Map<string, Field.ValidatedField<unknown>>(),
        onSome: (s) => s.declared,
      }),
    ),
    lazy: chainRead(
      definition.lazy,
      Option.flatMap(base, (s) => s.lazy),
      (binder, name, raw, _found, next) => binder.compute(name, { raw, next }),
    ),
    intercept: chainRead(
      definition.intercept,
      Option.flatMap(base, (s) => s.intercept),
      (interceptor, name, raw, found, next) => interceptor.resolve(name, { raw, found, next }),
    ),
    onWrite: chainWrite(
      definition.onWrite,
      Option.flatMap(base, (s) => s.onWrite),
    ),
    onTrace: Option.orElse(Option.fromNullable(definition.onTrace), () => Option.flatMap(base, (s) => s.onTrace)),
  }

  const type: RecordType<F> = {
    _tag: 'RecordType',
    id,
    fields: definition.fields,
    make: (init = {}) => {
      const record = new RecordInstance(type, state, init)
      // 构造期赋值与之后的显式写入走同一条路径（同样的原子拒绝语义）。
      for (const [name, value] of Object.entries(init.values ?? {})) {
        record.write(name, value)
      }
      return record
    },
    extend: (childId, child) =>
      build(childId, { ...child, fields: { ...definition.fields, ...child.fields } }, Option.some(state)),
    is: (value: unknown): value is Interceptable => value instanceof RecordInstance && value.state.lineage.has(token),
  }

  return type
}

export const isInterceptable = (value: unknown): value is Interceptable => value instanceof RecordInstance

export const make = <F extends Fields>(id: string, definition: Definition<F>): RecordType<F> =>
  build(id, definition, Option.none())

const isAttributeKey = (key: string | symbol): key is string => typeof key === 'string' && key !== 'then'

const views = new WeakMap<Interceptable, Record<string, unknown>>()
const recordsByView = new WeakMap<object, Interceptable>()

/**
 * view：property-syntax access to a record.
 * - `view.x` reads, `view.x = v` writes, `"x" in view` is the existence check,
 *   `Object.keys(view)` enumerates populated names;
 * - symbol keys are not attributes and read as undefined;
 * - `then` is never routed to the record, so the view is not mistaken for a thenable
 *   (`await`, `Promise.resolve(view)`); use `record.read("then")` instead.
 */
export const view = (record: Interceptable): Record<string, unknown> => {
  const existing = views.get(record)
  if (existing !== undefined) return existing

  const proxy = new Proxy<Record<string, unknown>>(
    {},
    {
      get: (_target, key) => (isAttributeKey(key) ? record.read(key) : undefined),
      set: (_target, key, value) => {
        if (!isAttributeKey(key)) return false
        record.write(key, value)
        return true
      },
      has: (_target, key) => isAttributeKey(key) && record.has(key),
      ownKeys: () => record.names().filter(isAttributeKey),
      getOwnPropertyDescriptor: (_target, key) =>
        isAttributeKey(key) && record.has(key)
          ? { value: record.read(key), writable: true, enumerable: true, configurable: true }
          : undefined,
    },
  )

  views.set(record, proxy)
  recordsByView.set(proxy, record)
  return proxy
}

export const fromView = (value: object): Option.Option<Interceptable> => Option.fromNullable(recordsByView.get(value))
