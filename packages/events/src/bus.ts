import { randomUUID } from 'crypto'
import { parseEnumValue } from '@tessera/shared/lib/env'
import { createLocalTransport } from './strategies/local'
import { createRedisTransport } from './strategies/redis'
import {
  EVENTS_STRATEGIES,
  type CreateBusOptions,
  type EmitOptions,
  type EventBus,
  type EventPayload,
  type EventTransport,
  type EventsStrategyName,
  type SubscriberDescriptor,
  type SubscriberHandler,
} from './types'

const DEFAULT_CHANNEL = 'tessera:events'

function createTransport(strategy: EventsStrategyName, opts: CreateBusOptions): EventTransport {
  if (strategy === 'redis') {
    return createRedisTransport({
      url: opts.redisUrl,
      channel: opts.channel ?? process.env.EVENTS_CHANNEL ?? DEFAULT_CHANNEL,
    })
  }
  return createLocalTransport()
}

/**
 * Creates an event bus instance.
 *
 * @example
 * ```typescript
 * const bus = createEventBus({ resolve: container.resolve.bind(container) })
 * const off = bus.on('dynamic_entities.schema.changed', async (payload, ctx) => {
 *   console.log('changed by', ctx.origin, payload)
 * })
 * await bus.emit('dynamic_entities.schema.changed', { entityName: 'Invoice' }, { broadcast: true })
 * off()
 * ```
 */
export function createEventBus(opts: CreateBusOptions): EventBus {
  const listeners = new Map<string, Set<SubscriberHandler>>()
  const instanceId = opts.instanceId ?? randomUUID()
  const strategy = opts.transport?.name
    ?? opts.strategy
    ?? parseEnumValue('EVENTS_STRATEGY', process.env.EVENTS_STRATEGY, EVENTS_STRATEGIES, 'local')
  const transport = opts.transport ?? createTransport(strategy, opts)

  async function deliver(event: string, payload: EventPayload, origin: string): Promise<void> {
    const handlers = listeners.get(event)
    if (!handlers || handlers.size === 0) return

    for (const handler of [...handlers]) {
      try {
        await handler(payload, { resolve: opts.resolve, eventName: event, origin })
      } catch (error) {
        console.error(`[events] Handler error for "${event}":`, error)
      }
    }
  }

  const ready = transport.subscribe((envelope) => {
    if (envelope.origin === instanceId) return
    deliver(envelope.event, envelope.payload, envelope.origin).catch((error: unknown) => {
      console.error(`[events] Delivery failed for "${envelope.event}":`, error)
    })
  })
  ready.catch((error: unknown) => {
    console.error(`[events] Failed to subscribe with "${transport.name}" strategy:`, error)
  })

  function on(event: string, handler: SubscriberHandler): () => void {
    let handlers = listeners.get(event)
    if (!handlers) {
      handlers = new Set()
      listeners.set(event, handlers)
    }
    handlers.add(handler)
    return () => {
      listeners.get(event)?.delete(handler)
    }
  }

  function registerModuleSubscribers(subs: SubscriberDescriptor[]): void {
    for (const sub of subs) {
      on(sub.event, sub.handler)
    }
  }

  async function emit(event: string, payload: EventPayload, options?: EmitOptions): Promise<void> {
    await deliver(event, payload, instanceId)
    if (!options?.broadcast) return
    await ready
    await transport.publish({ event, payload, origin: instanceId, emittedAt: new Date().toISOString() })
  }

  async function close(): Promise<void> {
    listeners.clear()
    await transport.close()
  }

  return {
    instanceId,
    strategy,
    emit,
    on,
    registerModuleSubscribers,
    close,
  }
}
