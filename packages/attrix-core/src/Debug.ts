import { Context, Effect, Layer, LogLevel, Option } from 'effect'
import * as AttributeConfig from './Config.js'

/**
 * Where a read was answered:
 * - declared: a ValidatedField owns the name;
 * - store: the record's own store (also when an interceptor let it stand);
 * - interceptor: FullInterceptor custom logic returned the value;
 * - lazy: computed by a LazyBinder and committed to the store;
 * - reserved: the interceptor backing slot.
 */
export type ReadSource = 'declared' | 'store' | 'interceptor' | 'lazy' | 'reserved'

export type WriteTarget = 'declared' | 'store' | 'reserved'

export type Event =
  | {
      readonly type: 'attribute:read'
      readonly recordType: string
      readonly name: string
      readonly source: ReadSource
    }
  | { readonly type: 'attribute:lazy'; readonly recordType: string; readonly name: string }
  | { readonly type: 'attribute:missing'; readonly recordType: string; readonly name: string }
  | {
      readonly type: 'attribute:write'
      readonly recordType: string
      readonly name: string
      readonly target: WriteTarget
    }
  | {
      readonly type: 'attribute:rejected'
      readonly recordType: string
      readonly name: string
      readonly reason: string
    }

/** Synchronous listener, installed per record type via `onTrace`. */
export type Listener = (event: Event) => void

export interface Sink {
  readonly record: (event: Event) => Effect.Effect<void>
}

export const SinkTag = Context.GenericTag<Sink>('@attrix/core/Debug.Sink')

export const noopLayer = Layer.succeed(SinkTag, {
  record: () => Effect.void,
})

const describe = (event: Event): string => {
  const target = `${event.recordType}.${event.name}`
  switch (event.type) {
    case 'attribute:read':
      return `read ${target} <- ${event.source}`
    case 'attribute:lazy':
      return `lazy ${target} computed`
    case 'attribute:missing':
      return `missing ${target}`
    case 'attribute:write':
      return `write ${target} -> ${event.target}`
    case 'attribute:rejected':
      return `rejected ${target}: ${event.reason}`
  }
}

/** Logs every event at `attrix.log_level` (Debug by default). */
export const logLayer = Layer.effect(
  SinkTag,
  Effect.map(Effect.orElseSucceed(AttributeConfig.logLevel, () => LogLevel.Debug), (level) => ({
    record: (event: Event) =>
      Effect.logWithLevel(level, `[attrix] ${describe(event)}`).pipe(Effect.annotateLogs('attrix.event', event.type)),
  })),
)

export const record = (event: Event): Effect.Effect<void> =>
  Effect.serviceOption(SinkTag).pipe(
    Effect.flatMap((maybeSink) =>
      Option.match(maybeSink, {
        onSome: (sink) => sink.record(event),
        onNone: () => Effect.void,
      }),
    ),
  )
