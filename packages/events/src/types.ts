/**
 * Event bus type definitions.
 *
 * Handlers always run in-process. Events emitted with `broadcast: true` are also
 * handed to the bus transport so that every other instance of the application
 * delivers them to its own handlers.
 */

/** Payload type for events; subscribers validate what they receive */
export type EventPayload = unknown

/** Context passed to event handlers */
export type SubscriberContext = {
  /** DI container resolve function */
  resolve: <T = unknown>(name: string) => T
  /** Name of the delivered event */
  eventName: string
  /** Instance id of the bus that emitted the event */
  origin: string
}

export type SubscriberHandler = (
  payload: EventPayload,
  ctx: SubscriberContext
) => Promise<void> | void

/** Full descriptor for a module subscriber */
export type SubscriberDescriptor = {
  id: string
  event: string
  handler: SubscriberHandler
}

export type EmitOptions = {
  /** Also publish to every other instance through the transport */
  broadcast?: boolean
}

export const EVENTS_STRATEGIES = ['local', 'redis'] as const
export type EventsStrategyName = (typeof EVENTS_STRATEGIES)[number]

/** Wire format used between instances */
export type EventEnvelope = {
  event: string
  payload: EventPayload
  origin: string
  emittedAt: string
}

export interface EventTransport {
  readonly name: EventsStrategyName
  publish(envelope: EventEnvelope): Promise<void>
  subscribe(onMessage: (envelope: EventEnvelope) => void): Promise<void>
  close(): Promise<void>
}

export type CreateBusOptions = {
  resolve: <T = unknown>(name: string) => T
  /** Defaults to EVENTS_STRATEGY, then 'local' */
  strategy?: EventsStrategyName
  /** Redis connection for the 'redis' strategy; defaults to REDIS_URL / EVENTS_REDIS_URL */
  redisUrl?: string
  /** Pub/sub channel name; defaults to EVENTS_CHANNEL, then 'tessera:events' */
  channel?: string
  /** Explicit transport, mostly for tests */
  transport?: EventTransport
  instanceId?: string
}

export interface EventBus {
  /** Unique per bus instance; carried as `origin` on every delivered event */
  readonly instanceId: string
  readonly strategy: EventsStrategyName

  /**
   * Delivers an event to local handlers and, with `broadcast`, to every other
   * instance.
   *
   * @example
   * ```typescript
   * await bus.emit('dynamic_entities.schema.changed', { entityName: 'Invoice', version: 3 }, { broadcast: true })
   * ```
   */
  emit(event: string, payload: EventPayload, options?: EmitOptions): Promise<void>

  /** Registers a handler; returns a function that removes it. */
  on(event: string, handler: SubscriberHandler): () => void

  registerModuleSubscribers(subs: SubscriberDescriptor[]): void

  /** Closes transport connections. */
  close(): Promise<void>
}
