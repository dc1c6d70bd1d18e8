import { z } from 'zod'
import type { EventBus } from '@tessera/events'
import { DYNAMIC_ENTITIES_EVENTS } from '../events'

export const schemaChangeSchema = z.object({
  entityName: z.string().min(1),
  tenantScope: z.string().nullable(),
  /** 0 when the entity was dropped */
  version: z.number().int().nonnegative(),
  origin: z.string().min(1),
})

export type SchemaChange = z.infer<typeof schemaChangeSchema>

export type SchemaChangeHandler = (change: SchemaChange) => Promise<void> | void

/** Broadcasts applied schema versions over the event bus to every instance, this one included. */
export class ClusterNotifier {
  constructor(private readonly eventBus: EventBus) {}

  get instanceId(): string {
    return this.eventBus.instanceId
  }

  async publish(entityName: string, version: number, tenantScope: string | null): Promise<void> {
    const change: SchemaChange = { entityName, tenantScope, version, origin: this.instanceId }
    await this.eventBus.emit(DYNAMIC_ENTITIES_EVENTS.schemaChanged, change, { broadcast: true })
  }

  onReceive(handler: SchemaChangeHandler): () => void {
    return this.eventBus.on(DYNAMIC_ENTITIES_EVENTS.schemaChanged, async (payload) => {
      const parsed = schemaChangeSchema.safeParse(payload)
      if (!parsed.success) {
        console.warn('[dynamic_entities.notifier] Ignoring malformed schema change event', parsed.error.issues)
        return
      }
      await handler(parsed.data)
    })
  }
}
