import { Option } from 'effect'
import type { ReadSource } from '../Debug.js'

export interface Resolved {
  readonly value: unknown
  readonly source: ReadSource
}

/** One resolution stage: Some(Found) short-circuits the chain, None passes to the next stage. */
export type Stage = (name: string) => Option.Option<Resolved>

export const found =
  (source: ReadSource) =>
  (value: unknown): Resolved => ({ value, source })

export const firstFound = (stages: ReadonlyArray<Stage>, name: string): Option.Option<Resolved> => {
  for (const stage of stages) {
    const result = stage(name)
    if (Option.isSome(result)) return result
  }
  return Option.none()
}
