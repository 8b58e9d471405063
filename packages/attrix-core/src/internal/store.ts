import { Option } from 'effect'

/**
 * Reserved store slot for a FullInterceptor backing value.
 * Reads and writes of this name never go through interception.
 */
export const BACKING_FIELD = '__backing__'

export const isReserved = (name: string): boolean => name === BACKING_FIELD

/**
 * RawAccess：
 * - The bypass path into a record's own store.
 * - This is the only handle interceptors and binders receive; it has no intercepted entry point,
 *   so custom logic cannot recurse back into interception through it.
 */
export interface RawAccess {
  readonly readRaw: (name: string) => Option.Option<unknown>
  readonly writeRaw: (name: string, value: unknown) => void
  readonly hasRaw: (name: string) => boolean
  readonly backing: () => Option.Option<unknown>
}

/**
 * AttributeStore: per-record mapping from attribute name to value.
 * A stored `undefined` counts as present.
 */
export class AttributeStore {
  private readonly values = new Map<string, unknown>()

  readonly raw: RawAccess = {
    readRaw: (name) => this.get(name),
    writeRaw: (name, value) => this.set(name, value),
    hasRaw: (name) => this.has(name),
    backing: () => this.get(BACKING_FIELD),
  }

  get(name: string): Option.Option<unknown> {
    return this.values.has(name) ? Option.some(this.values.get(name)) : Option.none()
  }

  set(name: string, value: unknown): void {
    this.values.set(name, value)
  }

  has(name: string): boolean {
    return this.values.has(name)
  }

  names(): ReadonlyArray<string> {
    return Array.from(this.values.keys()).filter((name) => !isReserved(name))
  }

  // Object.fromEntries defines own data properties, so a stored "__proto__" stays an entry.
  snapshot(): Readonly<Record<string, unknown>> {
    return Object.fromEntries(Array.from(this.values).filter(([name]) => !isReserved(name)))
  }
}
