import { Option } from 'effect'

/**
 * WeakSideTable：
 * - Per-descriptor storage keyed by record identity, without keeping records alive.
 * - WeakMap itself cannot be counted, so live entries are tracked separately and
 *   released by a FinalizationRegistry once the key is collected.
 */
export class WeakSideTable<K extends object, V> {
  private readonly entries = new WeakMap<K, { readonly value: V }>()
  private live = 0
  private readonly registry = new FinalizationRegistry<undefined>(() => {
    this.live -= 1
  })

  get(key: K): Option.Option<V> {
    return Option.fromNullable(this.entries.get(key)).pipe(Option.map((entry) => entry.value))
  }

  has(key: K): boolean {
    return this.entries.has(key)
  }

  set(key: K, value: V): void {
    if (!this.entries.has(key)) {
      this.live += 1
      this.registry.register(key, undefined)
    }
    this.entries.set(key, { value })
  }

  get size(): number {
    return this.live
  }
}
