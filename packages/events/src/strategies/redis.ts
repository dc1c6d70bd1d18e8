import Redis from 'ioredis'
import { z } from 'zod'
import type { EventEnvelope, EventTransport } from '../types'

const envelopeSchema = z.object({
  event: z.string().min(1),
  payload: z.unknown(),
  origin: z.string().min(1),
  emittedAt: z.string(),
})

export type RedisTransportOptions = {
  url?: string
  channel: string
}

export function parseEnvelope(raw: string): EventEnvelope | null {
  let decoded: unknown
  try {
    decoded = JSON.parse(raw)
  } catch {
    return null
  }
  const parsed = envelopeSchema.safeParse(decoded)
  if (!parsed.success) return null
  return {
    event: parsed.data.event,
    payload: parsed.data.payload,
    origin: parsed.data.origin,
    emittedAt: parsed.data.emittedAt,
  }
}

/**
 * Redis pub/sub transport. Publishing and subscribing use separate
 * connections because a subscribed ioredis client accepts no other commands.
 */
export function createRedisTransport(options: RedisTransportOptions): EventTransport {
  const url = options.url || process.env.REDIS_URL || process.env.EVENTS_REDIS_URL
  if (!url) throw new Error('REDIS_URL or EVENTS_REDIS_URL must be set for redis events strategy')

  const publisher = new Redis(url)
  const subscriber = new Redis(url)

  return {
    name: 'redis',

    async publish(envelope) {
      await publisher.publish(options.channel, JSON.stringify(envelope))
    },

    async subscribe(onMessage) {
      subscriber.on('message', (channel: string, message: string) => {
        if (channel !== options.channel) return
        const envelope = parseEnvelope(message)
        if (!envelope) {
          console.warn(`[events.redis] Ignoring malformed message on "${channel}"`)
          return
        }
        onMessage(envelope)
      })
      await subscriber.subscribe(options.channel)
    },

    async close() {
      await Promise.all([publisher.quit(), subscriber.quit()])
    },
  }
}
